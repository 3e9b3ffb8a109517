import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { MetadataError, describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { CommandRunner, runCommand } from "./command.js";
import { moveGitMetadata } from "./merge.js";

export const SCRATCH_PREFIX = "gist-new-";

export interface CloneOptions {
  logger: Logger;
  /** Executable of the GitHub CLI. */
  ghPath?: string;
  runCommand?: CommandRunner;
  /** Parent of the scratch directory; defaults to the system temp dir. */
  tempRoot?: string;
}

/**
 * Bind `targetDir` to the history of gist `gistId`: clone the gist into a
 * private scratch directory, then move only its git metadata across.
 * The scratch directory is always removed before returning.
 */
export async function cloneGistMetadata(
  gistId: string,
  targetDir: string,
  options: CloneOptions
): Promise<string[]> {
  const { logger, ghPath = "gh", runCommand: run = runCommand, tempRoot = tmpdir() } = options;

  let scratch: string;
  try {
    scratch = await mkdtemp(join(tempRoot, SCRATCH_PREFIX));
  } catch (err) {
    throw new MetadataError(
      gistId,
      targetDir,
      "failed to create temporary directory for cloning",
      describeError(err),
      { cause: err }
    );
  }

  try {
    const cloneDir = join(scratch, "clone");
    const { exitCode, output } = await run(ghPath, ["gist", "clone", gistId, cloneDir]);
    if (exitCode !== 0) {
      throw new MetadataError(
        gistId,
        targetDir,
        "failed to clone gist metadata",
        `${ghPath} exited with code ${exitCode}`,
        { output }
      );
    }

    const trimmed = output.trim();
    if (trimmed) {
      logger.verbose(`gh gist clone output:\n${trimmed}`);
    }

    try {
      const moved = await moveGitMetadata(cloneDir, targetDir);
      logger.verbose(`Moved ${moved.join(", ")} into ${targetDir}`);
      return moved;
    } catch (err) {
      throw new MetadataError(
        gistId,
        targetDir,
        "failed to move git metadata",
        describeError(err),
        { cause: err }
      );
    }
  } finally {
    try {
      await rm(scratch, { recursive: true, force: true });
    } catch (err) {
      logger.verbose(`Could not remove temporary directory ${scratch}: ${describeError(err)}`);
    }
  }
}
