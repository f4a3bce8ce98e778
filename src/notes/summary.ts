import {
  ERROR_RE,
  FILE_LINE_RE,
  WARNING_RE,
  cleanTitleFromLine,
  dedupe,
  extractLinks,
} from "./text.js";
import { Confidence, SummaryContext } from "./types.js";

const MAX_LINKS = 8;

function contextLabel(ctx: SummaryContext): string | undefined {
  const parts = [ctx.project, ctx.topic].filter((part): part is string => Boolean(part));
  return parts.length > 0 ? parts.join(" / ") : undefined;
}

export function buildTldr(ctx: SummaryContext): string[] {
  const bullets: string[] = [`Main issue: ${ctx.title}.`];

  const context = contextLabel(ctx);
  if (context) {
    bullets.push(`Context: ${context}.`);
  }
  if (ctx.fileRefs.length > 0) {
    bullets.push(`Likely location: ${ctx.fileRefs[0]}.`);
  }
  if (ctx.evidence.length > 0) {
    bullets.push(`Evidence lines captured: ${ctx.evidence.length}.`);
  }
  if (bullets.length < 3) {
    bullets.push("Next step: review the evidence and reproduce the issue with a minimal case.");
  }
  return bullets;
}

export function buildKeyFindings(ctx: SummaryContext): string[] {
  const findings: string[] = [];

  for (const line of ctx.excerpt) {
    const lower = line.toLowerCase();
    if (lower.includes("implicit declaration")) {
      findings.push("Implicit declaration detected in output.");
    } else if (lower.includes("redefinition")) {
      findings.push("Redefinition reported in output.");
    } else if (ERROR_RE.test(line)) {
      findings.push(`Error: ${cleanTitleFromLine(line)}`);
    } else if (WARNING_RE.test(line)) {
      findings.push(`Warning: ${cleanTitleFromLine(line)}`);
    } else if (FILE_LINE_RE.test(line)) {
      findings.push(`Location referenced: ${line.trim()}`);
    }
  }

  if (ctx.fileRefs.length > 0) {
    findings.push(`File references include: ${ctx.fileRefs.slice(0, 3).join(", ")}`);
  }
  if (ctx.files.length > 0) {
    findings.push(`Files mentioned: ${ctx.files.slice(0, 5).join(", ")}`);
  }
  if (ctx.functions.length > 0) {
    findings.push(`Functions mentioned: ${ctx.functions.slice(0, 5).join(", ")}`);
  }

  const unique = dedupe(findings);
  if (unique.length === 0) {
    return ["No explicit error lines found; review excerpts for context."];
  }
  return unique.slice(0, 5);
}

export function buildNextSteps(ctx: SummaryContext): string[] {
  const steps: string[] = [];
  const lower = ctx.text.toLowerCase();

  if (lower.includes("implicit declaration")) {
    steps.push("Verify C99 headers or missing prototypes for implicit declaration errors.");
  }
  if (lower.includes("redefinition")) {
    steps.push("Search for duplicate definitions or conflicting headers causing redefinition.");
  }
  if (ctx.fileRefs.length > 0) {
    steps.push(`Inspect ${ctx.fileRefs[0]} around the referenced line.`);
  }
  if (ctx.files.length > 0) {
    steps.push(`Review related files: ${ctx.files.slice(0, 3).join(", ")}.`);
  }
  if (steps.length === 0) {
    steps.push("Reproduce the issue with a minimal input and capture a short log excerpt.");
  }
  return steps.slice(0, 5);
}

export function buildLinks(text: string, metaLinks: string[] = []): string[] {
  const links = [...metaLinks, ...extractLinks(text)]
    .map((link) => link.trim())
    .filter((link) => link.length > 0);
  return dedupe(links).slice(0, MAX_LINKS);
}

export function estimateConfidence(evidenceCount: number): Confidence {
  if (evidenceCount >= 4) return "high";
  if (evidenceCount <= 1) return "low";
  return "medium";
}

/** One-paragraph summary returned to the caller alongside the note path. */
export function buildSummaryLine(ctx: Pick<SummaryContext, "title" | "project" | "topic" | "evidence">): string {
  const parts = [`Main issue: ${ctx.title}.`];
  const context = [ctx.project, ctx.topic].filter(Boolean).join(" / ");
  if (context) {
    parts.push(`Context: ${context}.`);
  }
  if (ctx.evidence.length > 0) {
    parts.push(`Evidence includes ${ctx.evidence.length} key lines.`);
  }
  return parts.join(" ");
}

function bulletList(items: string[], empty: string): string[] {
  if (items.length === 0) {
    return [`- ${empty}`];
  }
  return items.map((item) => `- ${item}`);
}

export function renderSummaryBody(ctx: SummaryContext): string {
  const lines: string[] = [`# ${ctx.title}`, "", "## TL;DR"];
  lines.push(...bulletList(buildTldr(ctx), ""));

  lines.push("", "## Key findings");
  lines.push(...bulletList(buildKeyFindings(ctx), ""));

  lines.push("", "## Evidence (excerpts)");
  lines.push(...bulletList(ctx.excerpt, "(no excerpts found)"));

  lines.push("", "## Next steps");
  lines.push(...bulletList(buildNextSteps(ctx), ""));

  lines.push("", "## Links / References");
  lines.push(...bulletList(ctx.links, "(none)"));

  lines.push("");
  return lines.join("\n");
}
