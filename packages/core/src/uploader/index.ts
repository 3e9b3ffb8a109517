import { FilePayload, GistResult } from "../schema.js";

export interface UploadOptions {
  public: boolean;
  description?: string;
}

export interface IUploader {
  name: string;
  upload(files: FilePayload[], options: UploadOptions): Promise<GistResult>;
}

export { GistUploader, buildGistRequest } from "./gist.js";
export type { GistUploaderOptions } from "./gist.js";
