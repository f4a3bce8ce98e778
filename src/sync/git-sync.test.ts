import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Config, ConfigSchema } from "../config/index.js";
import { GitError, SkillError } from "../errors.js";
import { silentLogger } from "../logger.js";
import { GitAuthor, GitClient, GitOutput, StagedFile } from "./git-client.js";
import {
  ActiveState,
  GitSync,
  SyncContext,
  SyncState,
  generateCommitMessage,
  resolveStagePaths,
  transitions,
} from "./git-sync.js";

const HASH = "0123456789abcdef0123456789abcdef01234567";
const FIXED_NOW = new Date(2026, 1, 5, 9, 7);

class FakeGit implements GitClient {
  calls: string[] = [];
  branch: string | null = "main";
  staged: StagedFile[] = [];
  conflicted: string[] = [];
  pullError?: GitError;
  pushError?: GitError;
  headError?: GitError;
  commitMessages: string[] = [];

  async currentBranch(): Promise<string | null> {
    this.calls.push("currentBranch");
    return this.branch;
  }

  async pullRebase(remote: string, branch?: string): Promise<void> {
    this.calls.push(`pull ${remote} ${branch ?? "-"}`);
    if (this.pullError) {
      throw this.pullError;
    }
  }

  async conflictedFiles(): Promise<string[]> {
    this.calls.push("conflictedFiles");
    return this.conflicted;
  }

  async add(paths: string[]): Promise<void> {
    this.calls.push(`add ${paths.join(" ")}`);
  }

  async stagedFiles(): Promise<StagedFile[]> {
    this.calls.push("stagedFiles");
    return this.staged;
  }

  async commit(message: string, options: { allowEmpty: boolean }): Promise<void> {
    this.calls.push(`commit allowEmpty=${options.allowEmpty}`);
    this.commitMessages.push(message);
  }

  async headCommit(): Promise<string> {
    this.calls.push("headCommit");
    if (this.headError) {
      throw this.headError;
    }
    return HASH;
  }

  async push(remote: string, branch?: string): Promise<void> {
    this.calls.push(`push ${remote} ${branch ?? "-"}`);
    if (this.pushError) {
      throw this.pushError;
    }
  }

  output(): GitOutput {
    return { stdout: "", stderr: "" };
  }
}

describe("GitSync", () => {
  let repo: string;
  let git: FakeGit;
  let config: Config;
  let authors: GitAuthor[];

  beforeEach(() => {
    repo = fs.mkdtempSync(path.join(os.tmpdir(), "git-sync-"));
    fs.mkdirSync(path.join(repo, ".git"));
    git = new FakeGit();
    authors = [];
    config = ConfigSchema.parse({ notesRepoPath: repo });
  });

  afterEach(() => {
    fs.rmSync(repo, { recursive: true, force: true });
  });

  const createSync = () =>
    new GitSync(config, {
      createGit: (_repoPath, author) => {
        authors.push(author);
        return git;
      },
      now: () => FIXED_NOW,
      logger: silentLogger,
    });

  const validated = () => `validate: ${repo} is a git repository (branch main)`;

  it("stops after staging when nothing changed", async () => {
    const result = await createSync().sync({});

    expect(result).toEqual({
      ok: true,
      state: "done",
      actions: [validated(), "pull: rebased onto origin/main", "stage: nothing to commit in notes/"],
      stdout: "",
      stderr: "",
    });
    expect(result.commit_hash).toBeUndefined();
    expect(git.calls).toEqual(["currentBranch", "pull origin main", "conflictedFiles", "add notes/", "stagedFiles"]);
  });

  it("runs every step and reports the commit hash", async () => {
    git.staged = [
      { status: "A", path: "notes/a.md" },
      { status: "M", path: "inbox/b.md" },
    ];
    const sync = createSync();
    const transitionsSeen: Array<[ActiveState, SyncState]> = [];
    sync.on("transition", (from: ActiveState, to: SyncState) => transitionsSeen.push([from, to]));

    const result = await sync.sync({
      remote: "upstream",
      branch: "notes",
      commit_message: "manual",
      author_name: "Test User",
      author_email: "test@example.com",
      stage_path: ["notes/", "inbox/"],
    });

    expect(result.ok).toBe(true);
    expect(result.commit_hash).toBe(HASH);
    expect(result.actions).toEqual([
      `validate: ${repo} is a git repository (branch notes)`,
      "pull: rebased onto upstream/notes",
      "stage: 2 file(s) staged from notes/, inbox/",
      "commit: 0123456 manual",
      "push: pushed to upstream/notes",
    ]);
    expect(authors).toEqual([{ name: "Test User", email: "test@example.com" }]);
    expect(git.calls).not.toContain("currentBranch");
    expect(git.commitMessages).toEqual(["manual"]);
    expect(transitionsSeen).toEqual([
      ["validate", "pull"],
      ["pull", "stage"],
      ["stage", "commit"],
      ["commit", "push"],
      ["push", "done"],
    ]);
  });

  it("keeps the commit hash when the push fails", async () => {
    const notePath = path.join(repo, "notes", "a.md");
    fs.mkdirSync(path.dirname(notePath), { recursive: true });
    fs.writeFileSync(notePath, "---\ntitle: Build failed\n---\n\nbody\n");
    git.staged = [{ status: "A", path: "notes/a.md" }];
    git.pushError = new GitError("git push failed", "! [rejected] main -> main (non-fast-forward)");

    const result = await createSync().sync({});

    expect(result).toEqual({
      ok: false,
      state: "error",
      failed_state: "push",
      actions: [
        validated(),
        "pull: rebased onto origin/main",
        "stage: 1 file(s) staged from notes/",
        "commit: 0123456 [2026-02-05] add 1 note(s)",
        "push: failed - git push failed",
      ],
      commit_hash: HASH,
      stdout: "",
      stderr: "! [rejected] main -> main (non-fast-forward)",
      error: "git push failed",
      error_kind: "GitError",
    });
    expect(git.commitMessages).toEqual(["[2026-02-05] add 1 note(s)\n\n- Build failed"]);
  });

  it("records the commit when its hash cannot be read", async () => {
    git.staged = [{ status: "M", path: "notes/a.md" }];
    git.headError = new GitError("git rev-parse failed", "fatal: ambiguous argument 'HEAD'");

    const result = await createSync().sync({ commit_message: "update notes" });

    expect(result.ok).toBe(false);
    expect(result.failed_state).toBe("commit");
    expect(result.error_kind).toBe("GitError");
    expect(result.commit_hash).toBeUndefined();
    expect(result.actions.slice(2)).toEqual([
      "stage: 1 file(s) staged from notes/",
      "commit: (hash unknown) update notes",
      "commit: failed - git rev-parse failed",
    ]);
    expect(git.calls).not.toContain("push origin main");
  });

  it("reports a conflicting pull without touching the index", async () => {
    git.pullError = new GitError("git pull --rebase failed", "CONFLICT (content): Merge conflict in notes/a.md");
    git.conflicted = ["notes/a.md"];
    const sync = createSync();
    const conflicts = vi.fn();
    sync.on("conflict", conflicts);

    const result = await sync.sync({});

    expect(result.ok).toBe(false);
    expect(result.error_kind).toBe("ConflictError");
    expect(result.failed_state).toBe("pull");
    expect(result.stderr).toBe("CONFLICT (content): Merge conflict in notes/a.md");
    expect(result.actions).toEqual([
      validated(),
      "pull: failed - Pull failed due to conflicts. Resolve conflicts and rerun.",
    ]);
    expect(conflicts).toHaveBeenCalledWith(["notes/a.md"]);
    expect(git.calls).toEqual(["currentBranch", "pull origin main", "conflictedFiles"]);
  });

  it("treats other pull failures as git errors", async () => {
    git.pullError = new GitError("git pull --rebase failed", "fatal: could not read from remote repository");

    const result = await createSync().sync({});

    expect(result.error_kind).toBe("GitError");
    expect(result.error).toBe("git pull --rebase failed");
  });

  it("stops on unmerged paths left after a pull", async () => {
    git.conflicted = ["notes/b.md"];

    const result = await createSync().sync({});

    expect(result.error_kind).toBe("ConflictError");
    expect(result.error).toBe("Unmerged paths detected after pull. Resolve conflicts and rerun.");
    expect(git.calls).not.toContain("add notes/");
  });

  it("fails before any git call when the repository has no .git", async () => {
    fs.rmSync(path.join(repo, ".git"), { recursive: true });

    const result = await createSync().sync({});

    expect(result).toEqual({
      ok: false,
      state: "error",
      failed_state: "validate",
      actions: [`validate: failed - Not a git repository (missing .git): ${repo}`],
      stdout: "",
      stderr: "",
      error: `Not a git repository (missing .git): ${repo}`,
      error_kind: "ConfigError",
    });
    expect(authors).toEqual([]);
  });

  it("needs a repository path", async () => {
    config = ConfigSchema.parse({});

    const result = await createSync().sync({});

    expect(result.error_kind).toBe("ConfigError");
    expect(git.calls).toEqual([]);
  });

  it("rejects malformed requests", async () => {
    const result = await createSync().sync({ stage_path: 5 });

    expect(result.ok).toBe(false);
    expect(result.error_kind).toBe("ValidationError");
    expect(result.failed_state).toBe("validate");
    expect(git.calls).toEqual([]);
  });

  it("creates an empty commit when asked to", async () => {
    const result = await createSync().sync({ allow_empty_commit: true });

    expect(result.ok).toBe(true);
    expect(result.actions[2]).toBe("stage: nothing staged in notes/, committing empty");
    expect(git.calls).toContain("commit allowEmpty=true");
    expect(git.commitMessages).toEqual(["notes: sync 2026-02-05 09:07"]);
  });

  it("emits failed with the state that broke", async () => {
    git.staged = [{ status: "M", path: "notes/a.md" }];
    git.pushError = new GitError("git push failed");
    const sync = createSync();
    const failures: Array<[string, ActiveState]> = [];
    sync.on("failed", (error: SkillError, state: ActiveState) => failures.push([error.kind, state]));

    await sync.sync({});

    expect(failures).toEqual([["GitError", "push"]]);
  });
});

describe("transitions", () => {
  const deps = {
    config: ConfigSchema.parse({}),
    createGit: () => new FakeGit(),
    now: () => FIXED_NOW,
    logger: silentLogger,
  };

  const context = (git: FakeGit): SyncContext => ({
    request: {},
    repoPath: "/notes",
    git,
    remote: "origin",
    branch: "main",
    stagePaths: ["notes/"],
    staged: [],
    actions: [],
  });

  it("stage short-circuits to done when nothing is staged", async () => {
    const ctx = context(new FakeGit());
    await expect(transitions.stage(ctx, deps)).resolves.toBe("done");
    expect(ctx.actions).toEqual(["stage: nothing to commit in notes/"]);
  });

  it("stage moves on to commit when files are staged", async () => {
    const git = new FakeGit();
    git.staged = [{ status: "A", path: "notes/x.md" }];
    const ctx = context(git);

    await expect(transitions.stage(ctx, deps)).resolves.toBe("commit");
    expect(ctx.staged).toEqual(git.staged);
  });

  it("push records the target and finishes", async () => {
    const ctx = context(new FakeGit());
    await expect(transitions.push(ctx, deps)).resolves.toBe("done");
    expect(ctx.actions).toEqual(["push: pushed to origin/main"]);
  });
});

describe("generateCommitMessage", () => {
  it("counts added, updated and removed notes", () => {
    const staged: StagedFile[] = [
      { status: "A", path: "notes/a.md" },
      { status: "M", path: "notes/b.md" },
      { status: "D", path: "notes/c.md" },
      { status: "R", path: "notes/d.md" },
    ];
    expect(generateCommitMessage(staged, FIXED_NOW)).toBe(
      "[2026-02-05] add 1 note(s), update 2 note(s), remove 1 note(s)"
    );
  });

  it("lists note titles below the subject", () => {
    expect(generateCommitMessage([{ status: "A", path: "notes/a.md" }], FIXED_NOW, ["One", "Two"])).toBe(
      "[2026-02-05] add 1 note(s)\n\n- One\n- Two"
    );
  });
});

describe("resolveStagePaths", () => {
  const config = ConfigSchema.parse({});

  it("defaults to the configured paths", () => {
    expect(resolveStagePaths({}, config)).toEqual(["notes/"]);
  });

  it("merges stage_path and add_paths without duplicates", () => {
    expect(resolveStagePaths({ stage_path: "notes/", add_paths: ["notes/", "inbox/"] }, config)).toEqual([
      "notes/",
      "inbox/",
    ]);
  });
});
