import { gatherFiles } from "./collector/files.js";
import { formatDuration, Logger } from "./logger.js";
import { cloneGistMetadata } from "./metadata/clone.js";
import type { CommandRunner } from "./metadata/command.js";
import { GistResult, RunOptions } from "./schema.js";
import { resolveTargetDirectory } from "./target/resolver.js";
import type { IUploader } from "./uploader/index.js";

export interface PipelineDeps {
  logger: Logger;
  uploader: IUploader;
  cwd?: string;
  ghPath?: string;
  runCommand?: CommandRunner;
  tempRoot?: string;
}

export interface PipelineResult extends GistResult {
  directory: string;
}

/**
 * Resolve the target directory, upload its files as a new gist, then bind
 * the directory to the gist's git history. Each stage runs only after the
 * previous one succeeded.
 */
export async function createGistFromDirectory(
  options: RunOptions,
  deps: PipelineDeps
): Promise<PipelineResult> {
  const { logger, uploader } = deps;

  logger.info("Resolving target directory…");
  const target = await resolveTargetDirectory(options.name, deps.cwd);
  logger.verbose(`Target directory: ${target.path}${target.created ? " (created)" : ""}`);

  logger.info("Collecting files for gist…");
  const scanStart = Date.now();
  const files = await gatherFiles(target.path, target.displayName, logger);
  logger.info(`Collected ${files.length} file(s)`);
  logger.verbose(`File collection completed in ${formatDuration(scanStart)}`);

  const createStart = Date.now();
  const gist = await logger.task("Creating gist via GitHub API…", () =>
    uploader.upload(files, { public: options.public, description: options.description })
  );
  logger.verbose(`Gist creation completed in ${formatDuration(createStart)}`);

  const cloneStart = Date.now();
  await logger.task("Cloning gist metadata into target directory…", () =>
    cloneGistMetadata(gist.id, target.path, {
      logger,
      ghPath: deps.ghPath,
      runCommand: deps.runCommand,
      tempRoot: deps.tempRoot,
    })
  );
  logger.verbose(`Metadata cloning completed in ${formatDuration(cloneStart)}`);

  logger.info(`Done! Gist ready at ${gist.url}`);
  return { ...gist, directory: target.path };
}
