import { EventEmitter } from "events";
import { readFileSync } from "fs";
import { join } from "path";
import matter from "gray-matter";
import { Config, formatZodError, isGitRepository, resolveNotesRepoPath } from "../config/index.js";
import {
  ConfigError,
  ConflictError,
  GitError,
  SkillError,
  ValidationError,
  errorMessage,
  isSkillError,
} from "../errors.js";
import { Logger, silentLogger } from "../logger.js";
import { SyncRequest, SyncRequestSchema } from "../skills/definitions.js";
import { formatDate, formatTime } from "../utils/dates.js";
import { GitClient, GitClientFactory, StagedFile, createSimpleGitClient } from "./git-client.js";
import { detectConflict } from "./output.js";

export type SyncState = "validate" | "pull" | "stage" | "commit" | "push" | "done" | "error";
export type ActiveState = Exclude<SyncState, "done" | "error">;

export const NOTHING_TO_COMMIT = "nothing to commit";
const MAX_TITLES_IN_MESSAGE = 5;

export interface SyncResult {
  ok: boolean;
  state: SyncState;
  failed_state?: ActiveState;
  actions: string[];
  commit_hash?: string;
  stdout: string;
  stderr: string;
  error?: string;
  error_kind?: SkillError["kind"];
}

export interface SyncContext {
  request: SyncRequest;
  repoPath?: string;
  git?: GitClient;
  remote: string;
  branch?: string;
  stagePaths: string[];
  staged: StagedFile[];
  commitHash?: string;
  actions: string[];
}

export interface SyncDeps {
  config: Config;
  createGit: GitClientFactory;
  now: () => Date;
  logger: Logger;
}

export type Transition = (ctx: SyncContext, deps: SyncDeps) => Promise<SyncState>;

export interface GitSyncEvents {
  transition: (from: ActiveState, to: SyncState) => void;
  conflict: (files: string[]) => void;
  synced: (result: SyncResult) => void;
  failed: (error: SkillError, state: ActiveState) => void;
}

export function resolveStagePaths(request: SyncRequest, config: Config): string[] {
  const fromRequest = [
    ...(typeof request.stage_path === "string" ? [request.stage_path] : request.stage_path ?? []),
    ...(request.add_paths ?? []),
  ];
  return fromRequest.length > 0 ? [...new Set(fromRequest)] : config.sync.stagePaths;
}

function requireGit(ctx: SyncContext): GitClient {
  if (!ctx.git) {
    throw new GitError("git client used before the repository was validated");
  }
  return ctx.git;
}

function target(ctx: SyncContext): string {
  return ctx.branch ? `${ctx.remote}/${ctx.branch}` : ctx.remote;
}

function readNoteTitle(repoPath: string, file: StagedFile, logger: Logger): string | undefined {
  if (file.status === "D" || !file.path.endsWith(".md")) {
    return undefined;
  }
  try {
    const { data } = matter(readFileSync(join(repoPath, file.path), "utf-8"));
    return typeof data.title === "string" && data.title.trim() ? data.title.trim() : undefined;
  } catch (error) {
    logger.debug(`No title for ${file.path}: ${errorMessage(error)}`);
    return undefined;
  }
}

/**
 * `[YYYY-MM-DD] add 2 note(s), update 1 note(s)` followed by the titles of
 * the staged notes. Falls back to a timestamped sync message.
 */
export function generateCommitMessage(staged: StagedFile[], now: Date, titles: string[] = [], timeZone?: string): string {
  const date = formatDate(now, timeZone);
  const added = staged.filter((f) => f.status === "A").length;
  const removed = staged.filter((f) => f.status === "D").length;
  const updated = staged.length - added - removed;

  const parts: string[] = [];
  if (added > 0) {
    parts.push(`add ${added} note(s)`);
  }
  if (updated > 0) {
    parts.push(`update ${updated} note(s)`);
  }
  if (removed > 0) {
    parts.push(`remove ${removed} note(s)`);
  }

  if (parts.length === 0) {
    return `notes: sync ${date} ${formatTime(now, timeZone)}`;
  }

  const subject = `[${date}] ${parts.join(", ")}`;
  if (titles.length === 0) {
    return subject;
  }
  return `${subject}\n\n${titles.map((title) => `- ${title}`).join("\n")}`;
}

// One transition per state. Each returns the next state or throws a SkillError.

const validate: Transition = async (ctx, deps) => {
  const candidate = ctx.request.repo_path;
  const repoPath = resolveNotesRepoPath(deps.config, candidate);
  if (!isGitRepository(repoPath)) {
    throw new ConfigError(`Not a git repository (missing .git): ${repoPath}`);
  }

  ctx.repoPath = repoPath;
  ctx.git = deps.createGit(repoPath, {
    name: ctx.request.author_name ?? deps.config.sync.authorName,
    email: ctx.request.author_email ?? deps.config.sync.authorEmail,
  });
  ctx.branch = ctx.request.branch ?? deps.config.sync.branch ?? (await ctx.git.currentBranch()) ?? undefined;
  ctx.actions.push(`validate: ${repoPath} is a git repository (branch ${ctx.branch ?? "unknown"})`);
  return "pull";
};

const pull: Transition = async (ctx, deps) => {
  const git = requireGit(ctx);

  try {
    await git.pullRebase(ctx.remote, ctx.branch);
  } catch (error) {
    const output = isSkillError(error) ? error.output ?? "" : errorMessage(error);
    let conflicted: string[] = [];
    try {
      conflicted = await git.conflictedFiles();
    } catch (statusError) {
      deps.logger.warn(`Could not read status after failed pull: ${errorMessage(statusError)}`);
    }

    if (conflicted.length > 0 || detectConflict(output)) {
      throw new ConflictError("Pull failed due to conflicts. Resolve conflicts and rerun.", conflicted, output);
    }
    throw isSkillError(error) ? error : new GitError("git pull --rebase failed", output);
  }

  const conflicted = await git.conflictedFiles();
  if (conflicted.length > 0) {
    throw new ConflictError("Unmerged paths detected after pull. Resolve conflicts and rerun.", conflicted);
  }

  ctx.actions.push(`pull: rebased onto ${target(ctx)}`);
  return "stage";
};

const stage: Transition = async (ctx) => {
  const git = requireGit(ctx);

  await git.add(ctx.stagePaths);
  ctx.staged = await git.stagedFiles();

  if (ctx.staged.length === 0) {
    if (!ctx.request.allow_empty_commit) {
      ctx.actions.push(`stage: ${NOTHING_TO_COMMIT} in ${ctx.stagePaths.join(", ")}`);
      return "done";
    }
    ctx.actions.push(`stage: nothing staged in ${ctx.stagePaths.join(", ")}, committing empty`);
    return "commit";
  }

  ctx.actions.push(`stage: ${ctx.staged.length} file(s) staged from ${ctx.stagePaths.join(", ")}`);
  return "commit";
};

const commit: Transition = async (ctx, deps) => {
  const git = requireGit(ctx);
  const repoPath = ctx.repoPath ?? "";

  let message = ctx.request.commit_message;
  if (!message) {
    const titles = ctx.staged
      .map((file) => readNoteTitle(repoPath, file, deps.logger))
      .filter((title): title is string => title !== undefined)
      .slice(0, MAX_TITLES_IN_MESSAGE);
    message = generateCommitMessage(ctx.staged, deps.now(), titles, deps.config.timezone);
  }

  const subject = message.split("\n")[0];
  await git.commit(message, { allowEmpty: ctx.staged.length === 0 });

  try {
    ctx.commitHash = await git.headCommit();
  } catch (error) {
    // the commit exists even though its hash could not be read
    ctx.actions.push(`commit: (hash unknown) ${subject}`);
    throw error;
  }
  ctx.actions.push(`commit: ${ctx.commitHash.slice(0, 7)} ${subject}`);
  return "push";
};

const push: Transition = async (ctx) => {
  await requireGit(ctx).push(ctx.remote, ctx.branch);
  ctx.actions.push(`push: pushed to ${target(ctx)}`);
  return "done";
};

export const transitions: Record<ActiveState, Transition> = {
  validate,
  pull,
  stage,
  commit,
  push,
};

export interface GitSyncOptions {
  createGit?: GitClientFactory;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Runs validate → pull → stage → commit → push, stopping at the first
 * failure. The action log and any commit hash survive a failure so the
 * caller can tell which steps already happened.
 */
export class GitSync extends EventEmitter {
  private deps: SyncDeps;

  constructor(config: Config, options: GitSyncOptions = {}) {
    super();
    this.deps = {
      config,
      createGit: options.createGit ?? createSimpleGitClient(config.sync.maxOutputBytes),
      now: options.now ?? (() => new Date()),
      logger: options.logger ?? silentLogger,
    };
  }

  private newContext(request: SyncRequest): SyncContext {
    return {
      request,
      remote: request.remote || this.deps.config.sync.remote,
      stagePaths: resolveStagePaths(request, this.deps.config),
      staged: [],
      actions: [],
    };
  }

  async sync(raw: unknown): Promise<SyncResult> {
    const parsed = SyncRequestSchema.safeParse(raw);
    if (!parsed.success) {
      return this.fail(undefined, "validate", new ValidationError(formatZodError(parsed.error)));
    }

    const ctx = this.newContext(parsed.data);
    let state: SyncState = "validate";
    let current: ActiveState = "validate";

    try {
      while (state !== "done" && state !== "error") {
        current = state;
        const next: SyncState = await transitions[current](ctx, this.deps);
        this.deps.logger.debug(`sync: ${current} -> ${next}`);
        this.emit("transition", current, next);
        state = next;
      }
    } catch (error) {
      return this.fail(ctx, current, error);
    }

    const result: SyncResult = {
      ok: true,
      state,
      actions: ctx.actions,
      ...this.output(ctx),
    };
    if (ctx.commitHash) {
      result.commit_hash = ctx.commitHash;
    }
    this.emit("synced", result);
    return result;
  }

  private output(ctx: SyncContext | undefined): { stdout: string; stderr: string } {
    return ctx?.git?.output() ?? { stdout: "", stderr: "" };
  }

  private fail(ctx: SyncContext | undefined, state: ActiveState, error: unknown): SyncResult {
    const skillError = isSkillError(error) ? error : new GitError(errorMessage(error));
    const actions = ctx?.actions ?? [];
    actions.push(`${state}: failed - ${skillError.message}`);

    if (skillError instanceof ConflictError) {
      this.emit("conflict", skillError.files);
    }
    this.emit("failed", skillError, state);

    const output = this.output(ctx);
    const result: SyncResult = {
      ok: false,
      state: "error",
      failed_state: state,
      actions,
      stdout: output.stdout,
      stderr: output.stderr || skillError.output || "",
      error: skillError.message,
      error_kind: skillError.kind,
    };
    if (ctx?.commitHash) {
      result.commit_hash = ctx.commitHash;
    }
    return result;
  }
}

export async function sync(raw: unknown, config: Config, options: GitSyncOptions = {}): Promise<SyncResult> {
  return new GitSync(config, options).sync(raw);
}
