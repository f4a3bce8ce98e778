import { simpleGit, SimpleGit, type Options } from "simple-git";
import { GitError, errorMessage } from "../errors.js";
import { DEFAULT_MAX_OUTPUT_BYTES, truncateOutput } from "./output.js";

export interface StagedFile {
  status: string; // first letter of `git diff --name-status`: A, M, D, R, ...
  path: string;
}

export interface GitOutput {
  stdout: string;
  stderr: string;
}

export interface GitAuthor {
  name?: string;
  email?: string;
}

/**
 * The git operations a sync needs. Failures reject with a GitError whose
 * `output` carries what git printed.
 */
export interface GitClient {
  currentBranch(): Promise<string | null>;
  pullRebase(remote: string, branch?: string): Promise<void>;
  conflictedFiles(): Promise<string[]>;
  add(paths: string[]): Promise<void>;
  stagedFiles(): Promise<StagedFile[]>;
  commit(message: string, options: { allowEmpty: boolean }): Promise<void>;
  /** Full hash of HEAD. */
  headCommit(): Promise<string>;
  push(remote: string, branch?: string): Promise<void>;
  output(): GitOutput;
}

export type GitClientFactory = (repoPath: string, author: GitAuthor) => GitClient;

export function parseNameStatus(raw: string): StagedFile[] {
  return raw
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => {
      const fields = line.split("\t");
      // renames and copies list the old and new path; keep the new one
      return { status: fields[0].charAt(0), path: fields[fields.length - 1] };
    });
}

export class SimpleGitClient implements GitClient {
  private git: SimpleGit;
  private stdout: string[] = [];
  private stderr: string[] = [];
  private maxOutputBytes: number;

  constructor(repoPath: string, author: GitAuthor = {}, maxOutputBytes: number = DEFAULT_MAX_OUTPUT_BYTES) {
    const config: string[] = [];
    if (author.name) {
      config.push(`user.name=${author.name}`);
    }
    if (author.email) {
      config.push(`user.email=${author.email}`);
    }

    this.maxOutputBytes = maxOutputBytes;
    this.git = simpleGit({ baseDir: repoPath, config }).outputHandler((_command, stdout, stderr) => {
      stdout.on("data", (chunk: Buffer | string) => this.stdout.push(chunk.toString()));
      stderr.on("data", (chunk: Buffer | string) => this.stderr.push(chunk.toString()));
    });
  }

  private async run<T>(label: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new GitError(`git ${label} failed`, truncateOutput(errorMessage(error), this.maxOutputBytes));
    }
  }

  async currentBranch(): Promise<string | null> {
    try {
      const branch = (await this.git.revparse(["--abbrev-ref", "HEAD"])).trim();
      return branch && branch !== "HEAD" ? branch : null;
    } catch {
      // no commits yet, or a detached HEAD: let git pick its defaults
      return null;
    }
  }

  async pullRebase(remote: string, branch?: string): Promise<void> {
    await this.run("pull --rebase", () => this.git.pull(remote, branch, { "--rebase": null }));
  }

  async conflictedFiles(): Promise<string[]> {
    const status = await this.run("status", () => this.git.status());
    return status.conflicted;
  }

  async add(paths: string[]): Promise<void> {
    await this.run("add", () => this.git.add(paths));
  }

  async stagedFiles(): Promise<StagedFile[]> {
    const raw = await this.run("diff --cached", () => this.git.diff(["--cached", "--name-status"]));
    return parseNameStatus(raw);
  }

  async commit(message: string, options: { allowEmpty: boolean }): Promise<void> {
    const flags: Options = options.allowEmpty ? { "--allow-empty": null } : {};
    await this.run("commit", () => this.git.commit(message, undefined, flags));
  }

  async headCommit(): Promise<string> {
    const hash = await this.run("rev-parse", () => this.git.revparse(["HEAD"]));
    return hash.trim();
  }

  async push(remote: string, branch?: string): Promise<void> {
    await this.run("push", () => this.git.push(remote, branch));
  }

  output(): GitOutput {
    return {
      stdout: truncateOutput(this.stdout.join(""), this.maxOutputBytes),
      stderr: truncateOutput(this.stderr.join(""), this.maxOutputBytes),
    };
  }
}

export const createSimpleGitClient =
  (maxOutputBytes: number): GitClientFactory =>
  (repoPath, author) =>
    new SimpleGitClient(repoPath, author, maxOutputBytes);
