export * from "./config/index.js";
export * from "./errors.js";
export { createLogger, loggerFromConfig, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions, LogSink } from "./logger.js";
export * from "./skills/definitions.js";
export { readInput } from "./skills/input.js";
export { summarizeToNote, summarizeFailure } from "./skills/summarize.js";
export type { SummarizeResult } from "./skills/summarize.js";
export { NoteBuilder, notePath, renderNoteFile, parseNoteInput, defaultShortId } from "./notes/builder.js";
export type { NoteBuilderOptions } from "./notes/builder.js";
export type { NoteRecord, NoteFrontmatter, WriteOutcome, Confidence, ResolvedMode } from "./notes/types.js";
export { buildTags, detectTags, MAX_TAGS } from "./notes/tags.js";
export { slugify, extractEvidence, inferTitle, headingText } from "./notes/text.js";
export { GitSync, sync, transitions, generateCommitMessage, resolveStagePaths, NOTHING_TO_COMMIT } from "./sync/git-sync.js";
export type { SyncResult, SyncState, ActiveState, SyncContext, SyncDeps, GitSyncOptions, GitSyncEvents, Transition } from "./sync/git-sync.js";
export { SimpleGitClient, createSimpleGitClient, parseNameStatus } from "./sync/git-client.js";
export type { GitClient, GitClientFactory, StagedFile, GitAuthor, GitOutput } from "./sync/git-client.js";
export { truncateOutput, detectConflict } from "./sync/output.js";
