export type ErrorKind =
  | "ConfigError"
  | "ValidationError"
  | "ConflictError"
  | "WriteError"
  | "GitError";

/**
 * Base class for every failure a skill reports. `kind` ends up in the
 * `error_kind` field of the JSON result; `output` holds captured tool output
 * (already truncated) when there is any.
 */
export class SkillError extends Error {
  readonly kind: ErrorKind;
  readonly output?: string;

  constructor(kind: ErrorKind, message: string, output?: string) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.output = output;
  }
}

/** Missing or invalid repository path, or an unusable configuration file. */
export class ConfigError extends SkillError {
  constructor(message: string) {
    super("ConfigError", message);
  }
}

/** Malformed input JSON or a missing required field. */
export class ValidationError extends SkillError {
  constructor(message: string) {
    super("ValidationError", message);
  }
}

export class ConflictError extends SkillError {
  readonly files: string[];

  constructor(message: string, files: string[] = [], output?: string) {
    super("ConflictError", message, output);
    this.files = files;
  }
}

export class WriteError extends SkillError {
  constructor(message: string) {
    super("WriteError", message);
  }
}

export class GitError extends SkillError {
  constructor(message: string, output?: string) {
    super("GitError", message, output);
  }
}

export function isSkillError(error: unknown): error is SkillError {
  return error instanceof SkillError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
