export * from "./schema.js";
export * from "./errors.js";
export type { Logger } from "./logger.js";
export { formatDuration } from "./logger.js";
export { validateName } from "./target/name.js";
export { resolveTargetDirectory, displayNameFor, ensureWritable, ensureNotGitRepo } from "./target/resolver.js";
export { gatherFiles, defaultFileName } from "./collector/files.js";
export { GistUploader, buildGistRequest } from "./uploader/index.js";
export type { IUploader, UploadOptions, GistUploaderOptions } from "./uploader/index.js";
export { tryRename, moveFileOrDir, copyTree } from "./fs/move.js";
export type { RenameOutcome, MoveMethod } from "./fs/move.js";
export { runCommand } from "./metadata/command.js";
export type { CommandResult, CommandRunner } from "./metadata/command.js";
export { classifyCloneEntry, moveGitMetadata, GIT_DIR } from "./metadata/merge.js";
export type { CloneEntryKind } from "./metadata/merge.js";
export { cloneGistMetadata } from "./metadata/clone.js";
export type { CloneOptions } from "./metadata/clone.js";
export { createGistFromDirectory } from "./pipeline.js";
export type { PipelineDeps, PipelineResult } from "./pipeline.js";
