import { readdir, readFile, stat, writeFile } from "fs/promises";
import type { Dirent, Stats } from "fs";
import { join } from "path";
import { PreconditionError, describeError, errorCode } from "../errors.js";
import type { Logger } from "../logger.js";
import { FilePayload } from "../schema.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Collect every regular, non-dot file directly inside `dir`, sorted by name.
 *
 * Gists are flat, so any subdirectory (or symlink to one) aborts the
 * collection. When nothing is left to upload, a `<displayName>.md` file is
 * written to disk and returned so the gist always has at least one file.
 */
export async function gatherFiles(
  dir: string,
  displayName: string,
  logger: Logger
): Promise<FilePayload[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    throw new PreconditionError(`read directory ${dir}: ${describeError(err)}`, { cause: err });
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: FilePayload[] = [];
  for (const entry of entries) {
    const path = join(dir, entry.name);

    if (entry.isSymbolicLink()) {
      const target = await statTarget(path);
      if (target?.isDirectory()) {
        throw new PreconditionError(
          `symlink ${entry.name} targets a directory; gists cannot include directories`
        );
      }
    }
    if (entry.isDirectory()) {
      throw new PreconditionError(
        `subdirectory ${entry.name} detected; gists only support flat file sets`
      );
    }
    if (entry.name.startsWith(".")) {
      logger.verbose(`Skipping dotfile ${entry.name}`);
      continue;
    }
    if (!entry.isFile()) {
      logger.verbose(`Skipping non-regular file ${entry.name}`);
      continue;
    }

    let content: Buffer;
    try {
      content = await readFile(path);
    } catch (err) {
      throw new PreconditionError(`read ${entry.name}: ${describeError(err)}`, { cause: err });
    }
    assertText(entry.name, content);
    files.push({ name: entry.name, path, content });
    logger.verbose(`Queued ${entry.name} (${content.length} bytes)`);
  }

  if (files.length === 0) {
    const bootstrap = await writeBootstrapFile(dir, displayName);
    logger.info(`Directory was empty; created ${bootstrap.name}`);
    files.push(bootstrap);
  }
  return files;
}

export function defaultFileName(displayName: string): string {
  return `${displayName}.md`;
}

async function writeBootstrapFile(dir: string, displayName: string): Promise<FilePayload> {
  const name = defaultFileName(displayName);
  const path = join(dir, name);
  const content = Buffer.from(`# ${displayName}\n`, "utf8");
  try {
    await writeFile(path, content, { mode: 0o644 });
  } catch (err) {
    throw new PreconditionError(`bootstrap default file ${name}: ${describeError(err)}`, {
      cause: err,
    });
  }
  return { name, path, content };
}

/** Follow a symlink; a dangling link resolves to undefined. */
async function statTarget(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch (err) {
    const code = errorCode(err);
    if (code === "ENOENT" || code === "ELOOP") return undefined;
    throw new PreconditionError(`inspect ${path}: ${describeError(err)}`, { cause: err });
  }
}

// Gist files are text only; refuse bytes that would not survive the trip.
function assertText(name: string, content: Buffer): void {
  try {
    utf8.decode(content);
  } catch (err) {
    throw new PreconditionError(
      `${name} is not valid UTF-8 text; gists cannot store binary files`,
      { cause: err }
    );
  }
}
