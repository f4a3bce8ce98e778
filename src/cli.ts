#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { readFileSync } from "fs";
import { loadConfig, configExists, getConfigPath, Config } from "./config/index.js";
import { SkillError, errorMessage, isSkillError } from "./errors.js";
import { Logger, createLogger } from "./logger.js";
import { runInteractiveSetup } from "./setup/interactive.js";
import { readInput } from "./skills/input.js";
import { summarizeFailure, summarizeToNote } from "./skills/summarize.js";
import { GitSync, SyncResult } from "./sync/git-sync.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read version from package.json
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "..", "package.json"), "utf-8")
);

interface SkillOptions {
  input?: string;
}

function createCliLogger(config: Config): Logger {
  const verbose = program.opts<{ verbose?: boolean }>().verbose;
  return createLogger({
    level: verbose ? "debug" : config.log.level,
    file: config.log.file,
  });
}

/**
 * Reads the JSON input, runs a skill and prints exactly one JSON document.
 * Any failure, including an unreadable config, becomes `ok: false` and a
 * non-zero exit code.
 */
async function runSkill<T extends { ok: boolean }>(
  options: SkillOptions,
  run: (raw: unknown, config: Config, logger: Logger) => Promise<T> | T,
  onError: (error: unknown) => T
): Promise<void> {
  let result: T;
  try {
    const config = loadConfig();
    const logger = createCliLogger(config);
    const raw = await readInput(options.input);
    result = await run(raw, config, logger);
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    result = onError(error);
  }

  process.stdout.write(JSON.stringify(result) + "\n");
  if (!result.ok) {
    process.exitCode = 1;
  }
}

function syncFailure(error: unknown): SyncResult {
  const result: SyncResult = {
    ok: false,
    state: "error",
    actions: [],
    stdout: "",
    stderr: "",
    error: errorMessage(error),
  };
  if (isSkillError(error)) {
    result.error_kind = error.kind;
  }
  return result;
}

const program = new Command();

program
  .name("note-skills")
  .description("Agent skills that write Markdown notes and sync a notes git repository")
  .version(packageJson.version)
  .option("-v, --verbose", "Log debug output to stderr");

program
  .command("summarize")
  .description("Summarize raw text into a Markdown note (JSON in, JSON out)")
  .option("-i, --input <file>", "Read input JSON from a file instead of stdin")
  .action(async (options: SkillOptions) => {
    await runSkill(
      options,
      (raw, config, logger) => summarizeToNote(raw, config, { logger }),
      summarizeFailure
    );
  });

program
  .command("sync")
  .description("Pull, stage, commit and push the notes repository (JSON in, JSON out)")
  .option("-i, --input <file>", "Read input JSON from a file instead of stdin")
  .action(async (options: SkillOptions) => {
    await runSkill(
      options,
      (raw, config, logger) => {
        const gitSync = new GitSync(config, { logger });

        gitSync.on("transition", (from: string, to: string) => {
          logger.info(`Sync step ${from} complete, next: ${to}`);
        });
        gitSync.on("conflict", (files: string[]) => {
          logger.warn(`Git conflicts detected in: ${files.join(", ") || "(unknown files)"}`);
        });
        gitSync.on("failed", (error: SkillError, state: string) => {
          logger.error(`Sync failed during ${state}: ${error.kind}: ${error.message}`);
        });
        gitSync.on("synced", (result: SyncResult) => {
          logger.info(`Sync complete${result.commit_hash ? `: ${result.commit_hash}` : ""}`);
        });

        return gitSync.sync(raw);
      },
      syncFailure
    );
  });

program
  .command("init")
  .description("Create the configuration file with interactive setup")
  .option("-f, --force", "Overwrite existing configuration")
  .action(async (options: { force?: boolean }) => {
    await runInteractiveSetup({ force: options.force });
  });

program
  .command("config")
  .description("Show the resolved configuration")
  .action(() => {
    const config = loadConfig();
    console.log(chalk.bold("\nConfiguration:\n"));
    console.log(`Config file: ${getConfigPath()}${configExists() ? "" : chalk.dim(" (not found)")}`);
    console.log(`Notes repository: ${config.notesRepoPath ?? chalk.yellow("not set")}`);
    console.log(`Timezone: ${config.timezone ?? "local"}`);
    console.log(`Sync remote: ${config.sync.remote}${config.sync.branch ? `/${config.sync.branch}` : ""}`);
    console.log(`Stage paths: ${config.sync.stagePaths.join(", ")}`);
    console.log(`Log level: ${config.log.level}${config.log.file ? ` (file: ${config.log.file})` : ""}`);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(errorMessage(error)));
  process.exit(1);
});
