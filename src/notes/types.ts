import type { NoteMode } from "../skills/definitions.js";

export type Confidence = "low" | "medium" | "high";
export type ResolvedMode = Exclude<NoteMode, "auto">;

export interface NoteFrontmatter {
  id: string;
  title: string;
  date: string; // YYYY-MM-DD
  mode: ResolvedMode;
  project: string;
  topic: string;
  tags: string[];
  source: string;
  confidence: Confidence;
}

export interface NoteRecord {
  id: string; // YYYY-MM-DD-<slug>-<shortid>
  path: string;
  repoPath: string;
  title: string;
  mode: ResolvedMode;
  slug: string;
  shortId: string;
  date: string;
  tags: string[];
  evidence: string[];
  excerpt: string[];
  fileRefs: string[];
  summary: string;
  confidence: Confidence;
  frontmatter: NoteFrontmatter;
  body: string;
  content: string; // front matter + blank line + body
}

export interface WriteOutcome {
  path: string;
  written: boolean; // false when an identical file was already there
}

export interface SummaryContext {
  text: string;
  title: string;
  project?: string;
  topic?: string;
  evidence: string[];
  excerpt: string[];
  fileRefs: string[];
  files: string[];
  functions: string[];
  links: string[];
}
