import prompts from "prompts";
import chalk from "chalk";
import { existsSync, mkdirSync } from "fs";
import { simpleGit } from "simple-git";
import {
  Config,
  DEFAULT_CONFIG,
  saveConfig,
  getConfigPath,
  configExists,
  expandPath,
  isGitRepository,
} from "../config/index.js";

function isValidTimezone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export async function runInteractiveSetup(options: { force?: boolean } = {}): Promise<Config | null> {
  console.log(chalk.bold("\nNote Skills Setup\n"));

  if (configExists() && !options.force) {
    const { overwrite } = await prompts({
      type: "confirm",
      name: "overwrite",
      message: `Config already exists at ${getConfigPath()}. Overwrite?`,
      initial: false,
    });

    if (!overwrite) {
      console.log(chalk.yellow("Setup cancelled."));
      return null;
    }
  }

  let cancelled = false;
  const responses = await prompts(
    [
      {
        type: "text",
        name: "notesRepoPath",
        message: "Path of the notes repository:",
        validate: (value: string) => (value.trim() ? true : "Repository path is required"),
      },
      {
        type: "text",
        name: "timezone",
        message: "Timezone for note dates (leave empty for local time):",
        initial: "",
        validate: (value: string) =>
          !value.trim() || isValidTimezone(value.trim()) ? true : "Unknown IANA timezone",
      },
      {
        type: "text",
        name: "remote",
        message: "Git remote to sync with:",
        initial: DEFAULT_CONFIG.sync.remote,
      },
      {
        type: "text",
        name: "branch",
        message: "Branch to sync (leave empty for the current branch):",
        initial: "",
      },
      {
        type: "list",
        name: "stagePaths",
        message: "Paths to stage on sync (comma-separated):",
        initial: DEFAULT_CONFIG.sync.stagePaths.join(", "),
        separator: ",",
      },
      {
        type: "text",
        name: "authorName",
        message: "Commit author name (leave empty for git's default):",
        initial: "",
      },
      {
        type: "text",
        name: "authorEmail",
        message: "Commit author email (leave empty for git's default):",
        initial: "",
      },
    ],
    {
      onCancel: () => {
        cancelled = true;
        return false;
      },
    }
  );

  if (cancelled) {
    console.log(chalk.yellow("\nSetup cancelled."));
    return null;
  }

  const optional = (value: unknown): string | undefined =>
    typeof value === "string" && value.trim() ? value.trim() : undefined;
  const stagePaths = Array.isArray(responses.stagePaths)
    ? responses.stagePaths.map((p: string) => p.trim()).filter(Boolean)
    : [];

  const config: Config = {
    ...DEFAULT_CONFIG,
    notesRepoPath: String(responses.notesRepoPath).trim(),
    timezone: optional(responses.timezone),
    sync: {
      ...DEFAULT_CONFIG.sync,
      remote: optional(responses.remote) ?? DEFAULT_CONFIG.sync.remote,
      branch: optional(responses.branch),
      stagePaths: stagePaths.length > 0 ? stagePaths : DEFAULT_CONFIG.sync.stagePaths,
      authorName: optional(responses.authorName),
      authorEmail: optional(responses.authorEmail),
    },
  };

  const repoPath = expandPath(config.notesRepoPath ?? "");
  if (!existsSync(repoPath)) {
    mkdirSync(repoPath, { recursive: true });
    console.log(chalk.green(`Created ${repoPath}`));
  }

  if (!isGitRepository(repoPath)) {
    const { initRepo } = await prompts({
      type: "confirm",
      name: "initRepo",
      message: `${repoPath} is not a git repository. Initialize one?`,
      initial: true,
    });
    if (initRepo) {
      await simpleGit(repoPath).init();
      console.log(chalk.green("Initialized git repository"));
    } else {
      console.log(chalk.yellow("Sync will fail until the repository is a git repository."));
    }
  }

  saveConfig(config);
  console.log(chalk.green(`\nConfiguration saved to ${getConfigPath()}`));
  return config;
}
