import { readdir, rm } from "fs/promises";
import { join } from "path";
import { describeError } from "../errors.js";
import { moveFileOrDir } from "../fs/move.js";

export const GIT_DIR = ".git";
const GIT_PREFIX = ".git";
const GIT_IGNORE = ".gitignore";

export type CloneEntryKind = "primary" | "metadata" | "ignore-file" | "content";

/**
 * `.gitignore` shares the metadata prefix but is ordinary gist content, so
 * it never travels with the metadata.
 */
export function classifyCloneEntry(name: string): CloneEntryKind {
  if (name === GIT_DIR) return "primary";
  if (name === GIT_IGNORE) return "ignore-file";
  if (name.startsWith(GIT_PREFIX)) return "metadata";
  return "content";
}

/**
 * Move the git metadata entries of a fresh clone into `to`, replacing any
 * entry of the same name. Returns the names that were moved.
 */
export async function moveGitMetadata(from: string, to: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(from);
  } catch (err) {
    throw new Error(`inspect cloned gist: ${describeError(err)}`, { cause: err });
  }

  const moved: string[] = [];
  for (const name of entries.sort()) {
    const kind = classifyCloneEntry(name);
    if (kind !== "primary" && kind !== "metadata") continue;

    const src = join(from, name);
    const dst = join(to, name);
    try {
      await rm(dst, { recursive: true, force: true });
    } catch (err) {
      throw new Error(`prepare destination ${dst}: ${describeError(err)}`, { cause: err });
    }
    try {
      await moveFileOrDir(src, dst);
    } catch (err) {
      throw new Error(`move ${name} into target directory: ${describeError(err)}`, { cause: err });
    }
    moved.push(name);
  }

  if (!moved.includes(GIT_DIR)) {
    throw new Error(`cloned gist did not include a ${GIT_DIR} directory`);
  }
  return moved;
}
