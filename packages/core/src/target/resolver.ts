import { lstat, mkdir, open, rm, stat } from "fs/promises";
import { basename, join, resolve, sep } from "path";
import { v4 as uuidv4 } from "uuid";
import { PreconditionError, describeError, errorCode } from "../errors.js";
import { TargetDirectory } from "../schema.js";
import { validateName } from "./name.js";

const FALLBACK_DISPLAY_NAME = "gist";
export const PROBE_PREFIX = ".gist-new-";

/**
 * Turn a validated name into an absolute, writable directory that is not
 * already a git working copy. Creates the directory when it is missing.
 */
export async function resolveTargetDirectory(
  name: string,
  cwd: string = process.cwd()
): Promise<TargetDirectory> {
  validateName(name);

  let target: TargetDirectory;
  if (name === ".") {
    const abs = resolve(cwd);
    target = { path: abs, displayName: displayNameFor(abs), created: false };
  } else {
    const abs = resolve(join(cwd, name));
    const created = await ensureDirectoryExists(abs);
    target = { path: abs, displayName: name, created };
  }

  await ensureWritable(target.path);
  await ensureNotGitRepo(target.path);
  return target;
}

export function displayNameFor(dir: string): string {
  const base = basename(dir);
  if (base === "" || base === "." || base === sep) {
    return FALLBACK_DISPLAY_NAME;
  }
  return base;
}

/** Returns true when the directory had to be created. */
async function ensureDirectoryExists(path: string): Promise<boolean> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(path)).isDirectory();
  } catch (err) {
    if (errorCode(err) !== "ENOENT") {
      throw new PreconditionError(`inspect directory ${path}: ${describeError(err)}`, { cause: err });
    }
    try {
      await mkdir(path, { recursive: true, mode: 0o755 });
    } catch (mkdirErr) {
      throw new PreconditionError(`create directory ${path}: ${describeError(mkdirErr)}`, {
        cause: mkdirErr,
      });
    }
    return true;
  }
  if (!isDirectory) {
    throw new PreconditionError(`${path} exists but is not a directory`);
  }
  return false;
}

/**
 * Prove the directory is writable by creating and removing a uniquely
 * named probe file.
 */
export async function ensureWritable(dir: string): Promise<void> {
  const probe = join(dir, `${PROBE_PREFIX}${uuidv4()}`);
  try {
    const handle = await open(probe, "wx");
    await handle.close();
  } catch (err) {
    throw new PreconditionError(`directory ${dir} must be writable: ${describeError(err)}`, {
      cause: err,
    });
  } finally {
    await rm(probe, { force: true });
  }
}

export async function ensureNotGitRepo(dir: string): Promise<void> {
  try {
    await lstat(join(dir, ".git"));
  } catch (err) {
    if (errorCode(err) === "ENOENT") return;
    throw new PreconditionError(`check git metadata in ${dir}: ${describeError(err)}`, { cause: err });
  }
  throw new PreconditionError(`${dir} already contains git metadata; pick a clean folder`);
}
