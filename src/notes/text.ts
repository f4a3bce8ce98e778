export const DEFAULT_MAX_LINE_LENGTH = 300;
export const MAX_SLUG_LENGTH = 40;
export const MAX_TITLE_LENGTH = 120;

export const FILE_LINE_RE = /([A-Za-z0-9_./\\-]+):(\d+)(?::(\d+))?/;
export const URL_RE = /https?:\/\/\S+/g;
export const ERROR_RE = /\b(error|fatal|exception|traceback)\b/i;
export const WARNING_RE = /\bwarning\b/i;
const TIMESTAMP_PREFIX_RE = /^\[?\d{4}-\d{2}-\d{2}(?:[T ][\d:.,]+(?:Z|[+-]\d{2}:?\d{2})?)?\]?\s*/;
const HEADING_RE = /^#{1,6}\s+(.*?)(?:\s+#+)?\s*$/;

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export function dedupe<T>(items: T[]): T[] {
  return [...new Set(items)];
}

export function slugify(value: string, maxLength: number = MAX_SLUG_LENGTH): string {
  let slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

  if (slug.length > maxLength) {
    slug = slug.slice(0, maxLength).replace(/-+$/, "");
  }
  return slug || "note";
}

export function normalizeTag(tag: string): string {
  return tag
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "-")
    .replace(/[^a-z0-9-]/g, "")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function sanitizeLine(line: string, maxLength: number = DEFAULT_MAX_LINE_LENGTH): string {
  const trimmed = line.replace(/\s+$/, "");
  if (trimmed.length > maxLength) {
    return trimmed.slice(0, maxLength - 3) + "...";
  }
  return trimmed;
}

export function firstNonBlankLine(text: string): string | undefined {
  return splitLines(text).find((line) => line.trim().length > 0);
}

/** Text of an ATX heading (`# Title`), or undefined when the line is not one. */
export function headingText(line: string): string | undefined {
  const match = HEADING_RE.exec(line.trim());
  if (!match || !match[1]) {
    return undefined;
  }
  return match[1];
}

export function scoreLine(line: string): number {
  const lower = line.toLowerCase();
  let score = 0;

  if (lower.includes("error")) score += 3;
  if (lower.includes("fatal")) score += 3;
  if (lower.includes("exception")) score += 2;
  if (lower.includes("traceback")) score += 2;
  if (lower.includes("warning")) score += 1;
  if (lower.includes("implicit declaration")) score += 2;
  if (lower.includes("redefinition")) score += 2;
  if (FILE_LINE_RE.test(line)) score += 2;

  return score;
}

// Dedupe after sanitizing: lines differing only past the cut or in trailing
// whitespace are the same line.
function sanitizedLines(lines: string[], maxLineLength: number): string[] {
  return dedupe(
    lines.filter((line) => line.trim().length > 0).map((line) => sanitizeLine(line, maxLineLength))
  );
}

/**
 * Lines carrying an error/warning marker or a `path:line` reference. The
 * highest scoring lines are kept, then put back in their original order.
 */
export function extractEvidence(
  lines: string[],
  maxLines: number,
  maxLineLength: number = DEFAULT_MAX_LINE_LENGTH
): string[] {
  const candidates = sanitizedLines(lines, maxLineLength);

  const scored = candidates
    .map((line, index) => ({ line, index, score: scoreLine(line) }))
    .filter((entry) => entry.score > 0);

  const selected = [...scored]
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, maxLines)
    .sort((a, b) => a.index - b.index);

  return selected.map((entry) => entry.line);
}

/**
 * Excerpt shown in a summary: the evidence, padded to three lines with other
 * text, or the opening lines when nothing scored.
 */
export function selectExcerpt(
  lines: string[],
  maxLines: number,
  maxLineLength: number = DEFAULT_MAX_LINE_LENGTH
): string[] {
  const nonEmpty = sanitizedLines(lines, maxLineLength);
  const evidence = extractEvidence(lines, maxLines, maxLineLength);

  if (evidence.length === 0) {
    return nonEmpty.slice(0, maxLines);
  }

  const target = Math.min(3, maxLines, nonEmpty.length);
  if (evidence.length >= target) {
    return evidence;
  }

  const excerpt = [...evidence];
  for (const line of nonEmpty) {
    if (excerpt.length >= target) break;
    if (!excerpt.includes(line)) {
      excerpt.push(line);
    }
  }
  return excerpt;
}

export function extractFileRefs(lines: string[]): string[] {
  const refs: string[] = [];
  for (const line of lines) {
    const match = FILE_LINE_RE.exec(line);
    if (match) {
      const [, path, lineNo, column] = match;
      refs.push(column ? `${path}:${lineNo}:${column}` : `${path}:${lineNo}`);
    }
  }
  return dedupe(refs);
}

export function extractLinks(text: string): string[] {
  return text.match(URL_RE) ?? [];
}

function truncateTitle(title: string): string {
  if (title.length > MAX_TITLE_LENGTH) {
    return title.slice(0, MAX_TITLE_LENGTH - 3) + "...";
  }
  return title;
}

/** Strips a leading timestamp and severity prefix so the title reads as the problem itself. */
export function cleanTitleFromLine(line: string): string {
  const original = line.trim();
  let cleaned = original
    .replace(TIMESTAMP_PREFIX_RE, "")
    .replace(/^(error|fatal|exception|warning)[:\s-]+/i, "");

  const errorMatch = /\berror\b\s*[:-]?\s*(.+)/i.exec(cleaned);
  if (errorMatch && errorMatch[1].trim()) {
    cleaned = errorMatch[1];
  }

  cleaned = cleaned.trim();
  return truncateTitle(cleaned || original);
}

function isIssueLine(line: string): boolean {
  const lower = line.toLowerCase();
  return (
    ERROR_RE.test(line) ||
    WARNING_RE.test(line) ||
    lower.includes("implicit declaration") ||
    lower.includes("redefinition")
  );
}

export function inferTitle(
  lines: string[],
  meta: { project?: string | null; topic?: string | null } = {}
): string {
  const issue = lines.find(isIssueLine);
  if (issue) {
    return cleanTitleFromLine(issue);
  }

  const { project, topic } = meta;
  if (project && topic) {
    return truncateTitle(`${project}: ${topic}`);
  }
  if (topic) {
    return truncateTitle(topic);
  }

  const first = lines.find((line) => line.trim().length > 0);
  if (first) {
    return cleanTitleFromLine(first);
  }
  if (project) {
    return truncateTitle(project);
  }
  return "Notes summary";
}
