import { appendFileSync } from "fs";
import chalk from "chalk";
import { LogConfig, LogLevel, expandPath } from "./config/index.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  file?: string;
  sink?: LogSink;
}

// stdout is reserved for the JSON result
const stderrSink: LogSink = (line) => {
  process.stderr.write(line + "\n");
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const sink = options.sink ?? stderrSink;
  const logPath = options.file ? expandPath(options.file) : undefined;

  const log = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }

    const timestamp = new Date().toISOString();
    const label = level.toUpperCase().padEnd(5);
    sink(`${chalk.dim(`[${timestamp}]`)} ${LEVEL_COLOR[level](label)} ${message}`);

    if (logPath) {
      try {
        appendFileSync(logPath, `[${timestamp}] ${label} ${message}\n`);
      } catch {
        // Ignore log file errors
      }
    }
  };

  return {
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warn: (message) => log("warn", message),
    error: (message) => log("error", message),
  };
}

export function loggerFromConfig(config: LogConfig): Logger {
  return createLogger({ level: config.level, file: config.file });
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
