import { z } from "zod";

// ── Run options ───────────────────────────────────────────────────────────────

export interface RunOptions {
  /** Directory name relative to the working directory, or "." for the cwd itself. */
  readonly name: string;
  readonly public: boolean;
  /** Already trimmed; absent when the flag was not given. */
  readonly description?: string;
  readonly verbose: boolean;
}

// ── Local files ───────────────────────────────────────────────────────────────

export interface TargetDirectory {
  path: string;
  displayName: string;
  /** True when this run had to create the directory. */
  created: boolean;
}

export interface FilePayload {
  name: string;
  path: string;
  content: Buffer;
}

// ── Gist API ──────────────────────────────────────────────────────────────────

export interface GistFile {
  content: string;
}

export type GistRequest = {
  description?: string;
  public: boolean;
  files: Record<string, GistFile>;
};

/**
 * The only fields of the create-gist response the tool consumes.
 * Both must be non-empty for the gist to be usable.
 */
export const GistCreateResponseSchema = z.object({
  id: z.string().min(1),
  html_url: z.string().min(1),
});

export interface GistResult {
  id: string;
  url: string;
}

// ── Config ────────────────────────────────────────────────────────────────────

export const GistNewConfigSchema = z.object({
  github: z
    .object({
      token: z.string().min(1).optional(),
      apiUrl: z.string().url().optional(),
    })
    .default({}),
  ghPath: z.string().min(1).default("gh"),
});

export type GistNewConfig = z.infer<typeof GistNewConfigSchema>;

export const DEFAULT_CONFIG: GistNewConfig = {
  github: {},
  ghPath: "gh",
};
