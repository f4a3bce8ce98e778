import { readFileSync, writeFileSync, mkdirSync } from "fs";
import { join, dirname } from "path";
import { createHash, randomBytes } from "crypto";
import matter from "gray-matter";
import { Config, formatZodError, resolveNotesRepoPath } from "../config/index.js";
import { ValidationError, WriteError, errorMessage } from "../errors.js";
import { Logger, silentLogger } from "../logger.js";
import { formatDate } from "../utils/dates.js";
import { NoteInput, NoteInputSchema, NoteMeta } from "../skills/definitions.js";
import { buildLinks, buildSummaryLine, estimateConfidence, renderSummaryBody } from "./summary.js";
import { buildTags } from "./tags.js";
import {
  extractEvidence,
  extractFileRefs,
  firstNonBlankLine,
  headingText,
  inferTitle,
  selectExcerpt,
  slugify,
  splitLines,
} from "./text.js";
import { NoteFrontmatter, NoteRecord, ResolvedMode, WriteOutcome } from "./types.js";

export interface NoteBuilderOptions {
  now?: () => Date;
  shortId?: (text: string, date: string) => string;
  logger?: Logger;
}

export function defaultShortId(text: string, date: string): string {
  return createHash("sha1")
    .update(text)
    .update(date)
    .update(randomBytes(8))
    .digest("hex")
    .slice(0, 8);
}

export function notePath(repoPath: string, date: string, slug: string, shortId: string): string {
  const [year, month] = date.split("-");
  return join(repoPath, "notes", year, `${year}-${month}`, `${date}-${slug}-${shortId}.md`);
}

export function renderNoteFile(frontmatter: NoteFrontmatter, body: string): string {
  // stringify("") yields the front matter block followed by one empty line
  return matter.stringify("", { ...frontmatter }) + body;
}

export function parseNoteInput(raw: unknown): NoteInput {
  const parsed = NoteInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(formatZodError(parsed.error));
  }
  return parsed.data;
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

export class NoteBuilder {
  private config: Config;
  private now: () => Date;
  private shortId: (text: string, date: string) => string;
  private logger: Logger;

  constructor(config: Config, options: NoteBuilderOptions = {}) {
    this.config = config;
    this.now = options.now ?? (() => new Date());
    this.shortId = options.shortId ?? defaultShortId;
    this.logger = options.logger ?? silentLogger;
  }

  private resolveDate(input: NoteInput): string {
    if (input.date) {
      return input.date;
    }
    return formatDate(this.now(), input.timezone ?? this.config.timezone);
  }

  private slugBasis(input: NoteInput, title: string): string {
    const project = input.meta?.project;
    const topic = input.meta?.topic;
    if (project || topic) {
      return [project, topic].filter(Boolean).join(" ");
    }
    if (input.slug_hint) {
      return input.slug_hint;
    }
    return title;
  }

  build(raw: unknown): NoteRecord {
    const input = parseNoteInput(raw);
    const repoPath = resolveNotesRepoPath(this.config, input.notes_repo_path);
    const date = this.resolveDate(input);
    const meta: NoteMeta = input.meta ?? {};
    const { maxLineLength } = this.config.summarizer;
    const maxLines = input.max_excerpt_lines ?? this.config.summarizer.maxExcerptLines;

    const text = input.text;
    const lines = splitLines(text);
    const evidence = extractEvidence(lines, maxLines, maxLineLength);
    const excerpt = selectExcerpt(lines, maxLines, maxLineLength);
    const fileRefs = extractFileRefs(lines);

    const heading = headingText(firstNonBlankLine(text) ?? "");
    const mode: ResolvedMode = input.mode === "auto" ? (heading ? "document" : "summary") : input.mode;
    const title = heading ?? inferTitle(lines, meta);

    const slug = slugify(this.slugBasis(input, title));
    const shortId = this.shortId(text, date);
    const id = `${date}-${slug}-${shortId}`;
    const tags = buildTags(text, meta.tags ?? [], this.config.summarizer.maxTags);

    const context = {
      text,
      title,
      project: meta.project ?? undefined,
      topic: meta.topic ?? undefined,
      evidence,
      excerpt,
      fileRefs,
      files: meta.files ?? [],
      functions: meta.functions ?? [],
      links: buildLinks(text, meta.links ?? []),
    };

    const confidence = estimateConfidence(excerpt.length);
    const body = mode === "document" ? text : renderSummaryBody(context);

    const frontmatter: NoteFrontmatter = {
      id,
      title,
      date,
      mode,
      project: meta.project || "general",
      topic: meta.topic || "general",
      tags,
      source: meta.source || "chat",
      confidence,
    };

    return {
      id,
      path: notePath(repoPath, date, slug, shortId),
      repoPath,
      title,
      mode,
      slug,
      shortId,
      date,
      tags,
      evidence,
      excerpt,
      fileRefs,
      summary: buildSummaryLine(context),
      confidence,
      frontmatter,
      body,
      content: renderNoteFile(frontmatter, body),
    };
  }

  /** Writes the note, never replacing a file whose content differs. */
  write(record: NoteRecord): WriteOutcome {
    try {
      mkdirSync(dirname(record.path), { recursive: true });
    } catch (error) {
      throw new WriteError(`Could not create ${dirname(record.path)}: ${errorMessage(error)}`);
    }

    try {
      writeFileSync(record.path, record.content, { encoding: "utf-8", flag: "wx" });
    } catch (error) {
      if (!hasCode(error, "EEXIST")) {
        throw new WriteError(`Could not write ${record.path}: ${errorMessage(error)}`);
      }

      const existing = readFileSync(record.path, "utf-8");
      if (existing !== record.content) {
        throw new WriteError(`Refusing to overwrite existing note with different content: ${record.path}`);
      }
      this.logger.warn(`Note already written: ${record.path}`);
      return { path: record.path, written: false };
    }

    this.logger.info(`Wrote ${record.mode} note: ${record.path}`);
    return { path: record.path, written: true };
  }

  createNote(raw: unknown): { record: NoteRecord; outcome: WriteOutcome } {
    const record = this.build(raw);
    this.logger.debug(
      `Built note ${record.id} (mode=${record.mode}, tags=${record.tags.join(",") || "none"}, evidence=${record.evidence.length})`
    );
    const outcome = this.write(record);
    return { record, outcome };
  }
}
