import { readFile } from "fs/promises";
import { join } from "path";
import { homedir } from "os";
import { execFileSync } from "child_process";
import { ConfigError, DEFAULT_CONFIG, GistNewConfig, GistNewConfigSchema, describeError, errorCode } from "@gist-new/core";

export function getConfigDir(): string {
  return join(homedir(), ".gist-new");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

/**
 * Load config from disk, filling in defaults. A missing file is not an
 * error; an unreadable or invalid one is.
 */
export async function loadConfig(path: string = getConfigPath()): Promise<GistNewConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return { ...DEFAULT_CONFIG, github: { ...DEFAULT_CONFIG.github } };
    }
    throw new ConfigError(`read config ${path}: ${describeError(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`config ${path} is not valid JSON: ${describeError(err)}`, { cause: err });
  }

  const parsed = GistNewConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid config ${path}: ${issues}`);
  }
  return parsed.data;
}

export interface GitHubAuth {
  token: string;
  /** Undefined means api.github.com. */
  apiUrl?: string;
}

export type TokenLookup = (ghPath: string, host: string | undefined) => string | undefined;

/**
 * Ask the GitHub CLI for its stored token. Returns undefined when gh is
 * missing or not logged in.
 */
export const ghAuthToken: TokenLookup = (ghPath, host) => {
  const args = ["auth", "token", ...(host ? ["--hostname", host] : [])];
  try {
    const out = execFileSync(ghPath, args, {
      stdio: ["ignore", "pipe", "pipe"],
      encoding: "utf8",
    }).trim();
    return out || undefined;
  } catch {
    return undefined;
  }
};

/**
 * Work out which token and API root to use. Environment variables win over
 * the config file, which wins over the GitHub CLI's own login.
 */
export function resolveGitHubAuth(
  config: GistNewConfig,
  env: NodeJS.ProcessEnv = process.env,
  lookup: TokenLookup = ghAuthToken
): GitHubAuth {
  const host = env.GH_HOST && env.GH_HOST !== "github.com" ? env.GH_HOST : undefined;
  const apiUrl = config.github.apiUrl ?? (host ? `https://${host}/api/v3` : undefined);

  const token =
    env.GH_TOKEN || env.GITHUB_TOKEN || config.github.token || lookup(config.ghPath, host);
  if (!token) {
    throw new ConfigError(
      "no GitHub token found; run `gh auth login` or set GH_TOKEN"
    );
  }
  return { token, apiUrl };
}
