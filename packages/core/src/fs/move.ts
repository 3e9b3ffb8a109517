import { chmod, copyFile, lstat, mkdir, readdir, readlink, rename, rm, symlink } from "fs/promises";
import { join } from "path";
import { errorCode } from "../errors.js";

export type RenameOutcome =
  | { kind: "renamed" }
  | { kind: "cross-device"; error: unknown }
  | { kind: "failed"; error: unknown };

export type MoveMethod = "renamed" | "copied";

/**
 * Attempt an atomic rename and report how it went. Only EXDEV is singled
 * out: it is the one failure a copy can work around.
 */
export async function tryRename(src: string, dst: string): Promise<RenameOutcome> {
  try {
    await rename(src, dst);
    return { kind: "renamed" };
  } catch (error) {
    if (errorCode(error) === "EXDEV") {
      return { kind: "cross-device", error };
    }
    return { kind: "failed", error };
  }
}

/**
 * Move a file or directory tree to `dst`, which must not exist yet.
 * Falls back to copy-then-delete when source and destination live on
 * different filesystems; any other rename failure is rethrown as-is.
 */
export async function moveFileOrDir(src: string, dst: string): Promise<MoveMethod> {
  const outcome = await tryRename(src, dst);
  switch (outcome.kind) {
    case "renamed":
      return "renamed";
    case "failed":
      throw outcome.error;
    case "cross-device":
      await copyTree(src, dst);
      await rm(src, { recursive: true, force: true });
      return "copied";
  }
}

/**
 * Recursively copy `src` to `dst`, keeping each entry's permission bits.
 * Directory modes are applied after their contents are written so a
 * read-only directory can still be filled.
 */
export async function copyTree(src: string, dst: string): Promise<void> {
  const info = await lstat(src);
  const mode = info.mode & 0o7777;

  if (info.isSymbolicLink()) {
    await symlink(await readlink(src), dst);
    return;
  }

  if (!info.isDirectory()) {
    await copyFile(src, dst);
    await chmod(dst, mode);
    return;
  }

  await mkdir(dst, { recursive: true, mode });
  for (const entry of await readdir(src)) {
    await copyTree(join(src, entry), join(dst, entry));
  }
  await chmod(dst, mode);
}
