import { readFileSync, writeFileSync, existsSync, statSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { ZodError } from "zod";
import { ConfigError } from "../errors.js";
import { Config, ConfigSchema, LOG_LEVELS, LogLevel } from "./schema.js";

const CONFIG_FILENAME = ".note-skills.json";

export type Env = Record<string, string | undefined>;

export function getConfigPath(env: Env = process.env): string {
  if (env.NOTE_SKILLS_CONFIG) {
    return expandPath(env.NOTE_SKILLS_CONFIG);
  }
  return join(homedir(), CONFIG_FILENAME);
}

export function expandPath(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith("$HOME/")) {
    return join(homedir(), path.slice(6));
  }
  return resolve(path);
}

export function configExists(env: Env = process.env): boolean {
  return existsSync(getConfigPath(env));
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Environment values win over the config file, so an agent runtime can point
 * a skill at a repository without touching the user's file.
 */
function applyEnv(config: Config, env: Env): Config {
  const level = env.NOTE_SKILLS_LOG_LEVEL?.toLowerCase();
  return {
    ...config,
    notesRepoPath: env.NOTES_REPO_PATH || config.notesRepoPath,
    timezone: env.NOTE_SKILLS_TIMEZONE || config.timezone,
    log: {
      ...config.log,
      level: level && isLogLevel(level) ? level : config.log.level,
    },
  };
}

export function loadConfig(env: Env = process.env): Config {
  const configPath = getConfigPath(env);

  if (!existsSync(configPath)) {
    return applyEnv(ConfigSchema.parse({}), env);
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    return applyEnv(ConfigSchema.parse(parsed), env);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file: ${configPath}`);
    }
    if (error instanceof ZodError) {
      throw new ConfigError(`Invalid config file ${configPath}: ${formatZodError(error)}`);
    }
    throw error;
  }
}

export function saveConfig(config: Config, env: Env = process.env): void {
  const configPath = getConfigPath(env);
  const validated = ConfigSchema.parse(config);
  writeFileSync(configPath, JSON.stringify(validated, null, 2) + "\n");
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Picks the notes repository for one invocation: the path given in the input,
 * then the configured one. Fails when neither exists as a directory.
 */
export function resolveNotesRepoPath(config: Config, explicit?: string | null): string {
  const candidate = explicit || config.notesRepoPath;
  if (!candidate) {
    throw new ConfigError(
      "No notes repository configured. Pass notes_repo_path, set NOTES_REPO_PATH or run 'note-skills init'."
    );
  }

  const repoPath = expandPath(candidate);
  if (!isDirectory(repoPath)) {
    throw new ConfigError(`Notes repository does not exist or is not a directory: ${repoPath}`);
  }
  return repoPath;
}

export function isGitRepository(repoPath: string): boolean {
  return existsSync(join(repoPath, ".git"));
}

export * from "./schema.js";
