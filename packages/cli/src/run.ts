import { createGistFromDirectory, GistUploader, RunOptions } from "@gist-new/core";
import { loadConfig, resolveGitHubAuth } from "./config.js";
import { ConsoleLogger } from "./logger.js";
import { VERSION } from "./program.js";

/**
 * Wire config, credentials and the terminal logger into the pipeline.
 * Credentials are resolved first so a missing token fails before the
 * target directory is touched.
 */
export async function runGistNew(options: RunOptions): Promise<void> {
  const config = await loadConfig();
  const auth = resolveGitHubAuth(config);
  const logger = new ConsoleLogger(options.verbose);
  const uploader = new GistUploader(auth.token, {
    logger,
    baseUrl: auth.apiUrl,
    userAgent: `gist-new/${VERSION}`,
  });

  await createGistFromDirectory(options, {
    logger,
    uploader,
    ghPath: config.ghPath,
  });
}
