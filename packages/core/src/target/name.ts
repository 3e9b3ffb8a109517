import { ValidationError } from "../errors.js";

/**
 * Check a user-supplied directory name. "." means the current directory;
 * anything else must be a single path component that can't be mistaken
 * for a flag.
 */
export function validateName(name: string): void {
  if (name === "") {
    throw new ValidationError("name cannot be empty");
  }
  if (name === ".") return;
  if (name === "..") {
    throw new ValidationError("'..' is not a supported directory name");
  }
  if (/[/\\]/.test(name)) {
    throw new ValidationError(`name "${name}" may not contain path separators`);
  }
  if (name.startsWith("-")) {
    throw new ValidationError(`name "${name}" may not start with '-'`);
  }
}
