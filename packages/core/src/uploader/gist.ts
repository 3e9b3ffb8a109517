import { Octokit } from "@octokit/rest";
import { GistCreationError, IncompleteGistResponseError, describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { FilePayload, GistCreateResponseSchema, GistRequest, GistResult } from "../schema.js";
import type { IUploader, UploadOptions } from "./index.js";

export interface GistUploaderOptions {
  logger: Logger;
  /** REST API root, for GitHub Enterprise hosts. */
  baseUrl?: string;
  userAgent?: string;
}

/**
 * Build the create-gist payload. Collected files are already known to be
 * valid UTF-8, so decoding them is lossless.
 */
export function buildGistRequest(files: FilePayload[], options: UploadOptions): GistRequest {
  const request: GistRequest = {
    public: options.public,
    files: {},
  };
  const description = options.description?.trim();
  if (description) {
    request.description = description;
  }
  for (const file of files) {
    request.files[file.name] = { content: file.content.toString("utf8") };
  }
  return request;
}

/**
 * Creates one gist holding every collected file in a single API call.
 */
export class GistUploader implements IUploader {
  name = "gist";
  private octokit: Octokit;
  private logger: Logger;

  constructor(token: string, options: GistUploaderOptions) {
    this.octokit = new Octokit({
      auth: token,
      baseUrl: options.baseUrl,
      userAgent: options.userAgent,
    });
    this.logger = options.logger;
  }

  async upload(files: FilePayload[], options: UploadOptions): Promise<GistResult> {
    const request = buildGistRequest(files, options);

    let data: unknown;
    try {
      ({ data } = await this.octokit.gists.create(request));
    } catch (err) {
      throw new GistCreationError(`create gist via GitHub API: ${describeError(err)}`, {
        cause: err,
      });
    }

    const parsed = GistCreateResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new IncompleteGistResponseError();
    }

    const visibility = options.public ? "public" : "secret";
    this.logger.info(`Created ${visibility} gist: ${parsed.data.html_url}`);
    return { id: parsed.data.id, url: parsed.data.html_url };
  }
}
