export type GistNewErrorKind =
  | "validation"
  | "precondition"
  | "config"
  | "remote"
  | "incomplete-response"
  | "metadata";

/**
 * Base class for every failure the pipeline reports to the user.
 * `kind` tells the CLI how to present it (usage echo, remediation text).
 */
export class GistNewError extends Error {
  readonly kind: GistNewErrorKind;

  constructor(kind: GistNewErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GistNewError";
    this.kind = kind;
  }
}

/** Bad command-line input, reported before any side effect. */
export class ValidationError extends GistNewError {
  constructor(message: string) {
    super("validation", message);
    this.name = "ValidationError";
  }
}

/** The target directory cannot be used as-is. No remote call has been made. */
export class PreconditionError extends GistNewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("precondition", message, options);
    this.name = "PreconditionError";
  }
}

export class ConfigError extends GistNewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
    this.name = "ConfigError";
  }
}

/** The create-gist request failed at the transport or API level. */
export class GistCreationError extends GistNewError {
  constructor(message: string, options?: { cause?: unknown; kind?: "remote" | "incomplete-response" }) {
    super(options?.kind ?? "remote", message, options);
    this.name = "GistCreationError";
  }
}

/** The API answered successfully but without a usable id or URL. */
export class IncompleteGistResponseError extends GistCreationError {
  constructor(message = "GitHub API returned an incomplete gist response") {
    super(message, { kind: "incomplete-response" });
    this.name = "IncompleteGistResponseError";
  }
}

/**
 * The gist exists but the target directory could not be bound to its
 * history. The message always carries the manual steps to finish the job,
 * followed by any captured command output.
 */
export class MetadataError extends GistNewError {
  readonly gistId: string;
  readonly targetDir: string;
  readonly output: string;

  constructor(
    gistId: string,
    targetDir: string,
    step: string,
    reason: string,
    options?: { cause?: unknown; output?: string }
  ) {
    const output = options?.output?.trim() ?? "";
    const message = `${step} (${remediation(gistId, targetDir)}): ${reason}`;
    super("metadata", output ? `${message}\n${output}` : message, options);
    this.name = "MetadataError";
    this.gistId = gistId;
    this.targetDir = targetDir;
    this.output = output;
  }
}

export function remediation(gistId: string, targetDir: string): string {
  return `retry manually: run 'gh gist clone ${gistId} <tempdir>' then move <tempdir>/.git into ${targetDir}`;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Returns the errno-style `code` of a Node.js system error, if any. */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
