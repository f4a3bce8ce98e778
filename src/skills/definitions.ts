import { z } from "zod";

export const NOTE_MODES = ["auto", "summary", "document"] as const;

const optionalString = z.string().nullish();
const optionalStringList = z.array(z.string()).nullish();

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

// 2026-02-30 matches the pattern but is no calendar day
function isCalendarDate(value: string): boolean {
  const match = DATE_RE.exec(value);
  if (!match) {
    return false;
  }
  const [year, month, day] = match.slice(1).map(Number);
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return year >= 1 && date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export const NoteMetaSchema = z.object({
  project: optionalString.describe("Project the text belongs to"),
  topic: optionalString.describe("Topic within the project"),
  source: optionalString.describe("Where the text came from (defaults to 'chat')"),
  tags: optionalStringList.describe("Tags to put first on the note"),
  files: optionalStringList.describe("Files related to the text"),
  functions: optionalStringList.describe("Functions related to the text"),
  links: optionalStringList.describe("Links to list under references"),
});

export const NoteInputSchema = z.object({
  text: z
    .string({ required_error: "text is required" })
    .refine((value) => value.trim().length > 0, "text must not be empty")
    .describe("Raw text to turn into a note"),
  meta: NoteMetaSchema.nullish().describe("Metadata about the text"),
  slug_hint: optionalString.describe("Preferred slug when meta has no project or topic"),
  mode: z
    .enum(NOTE_MODES)
    .nullish()
    .transform((value) => value ?? "auto")
    .describe("auto detects a leading Markdown heading; summary or document force a mode"),
  notes_repo_path: optionalString.describe("Notes repository (defaults to the configured one)"),
  date: z
    .string()
    .refine(isCalendarDate, "date must be in YYYY-MM-DD format")
    .nullish()
    .describe("Note date (defaults to today)"),
  timezone: optionalString.describe("IANA timezone used to compute today's date"),
  max_excerpt_lines: z
    .number()
    .int()
    .positive("max_excerpt_lines must be a positive integer")
    .nullish()
    .describe("Maximum number of evidence lines"),
});

const stagePath = z.union([z.string().min(1), z.array(z.string().min(1))]);

export const SyncRequestSchema = z.object({
  repo_path: optionalString.describe("Notes repository (defaults to the configured one)"),
  stage_path: stagePath.nullish().describe("Path or paths to stage (default: notes/)"),
  add_paths: z.array(z.string().min(1)).nullish().describe("Additional paths to stage"),
  commit_message: optionalString.describe("Commit message (generated when omitted)"),
  author_name: optionalString.describe("Commit author and committer name"),
  author_email: optionalString.describe("Commit author and committer email"),
  remote: optionalString.describe("Remote to pull from and push to"),
  branch: optionalString.describe("Branch to pull and push (defaults to the current branch)"),
  allow_empty_commit: z.boolean().nullish().describe("Commit even when nothing is staged"),
});

export type NoteMode = (typeof NOTE_MODES)[number];
export type NoteMeta = z.infer<typeof NoteMetaSchema>;
export type NoteInput = z.infer<typeof NoteInputSchema>;
export type NoteInputRaw = z.input<typeof NoteInputSchema>;
export type SyncRequest = z.infer<typeof SyncRequestSchema>;
export type SyncRequestRaw = z.input<typeof SyncRequestSchema>;
