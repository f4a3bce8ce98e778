import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export const SummarizerConfigSchema = z.object({
  maxExcerptLines: z.number().int().min(1).max(100).default(8),
  maxTags: z.number().int().min(1).max(12).default(12),
  maxLineLength: z.number().int().min(20).max(2000).default(300),
});

export const SyncConfigSchema = z.object({
  remote: z.string().min(1).default("origin"),
  branch: z.string().optional(),
  stagePaths: z.array(z.string().min(1)).min(1).default(["notes/"]),
  authorName: z.string().optional(),
  authorEmail: z.string().optional(),
  maxOutputBytes: z.number().int().min(64).default(8000),
});

export const LogConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default("info"),
  file: z.string().optional(),
});

export const ConfigSchema = z.object({
  notesRepoPath: z.string().optional(), // no built-in default
  timezone: z.string().optional(), // e.g., "Europe/Berlin"
  summarizer: SummarizerConfigSchema.default({}),
  sync: SyncConfigSchema.default({}),
  log: LogConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SummarizerConfig = z.infer<typeof SummarizerConfigSchema>;
export type SyncConfig = z.infer<typeof SyncConfigSchema>;
export type LogConfig = z.infer<typeof LogConfigSchema>;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
