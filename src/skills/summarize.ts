import { Config } from "../config/index.js";
import { SkillError, errorMessage, isSkillError } from "../errors.js";
import { NoteBuilder, NoteBuilderOptions } from "../notes/builder.js";
import { ResolvedMode } from "../notes/types.js";

export interface SummarizeResult {
  ok: boolean;
  path?: string;
  note_id?: string;
  title?: string;
  tags?: string[];
  evidence?: string[];
  mode?: ResolvedMode;
  summary?: string;
  written?: boolean;
  error?: string;
  error_kind?: SkillError["kind"];
}

export function summarizeFailure(error: unknown): SummarizeResult {
  const result: SummarizeResult = { ok: false, error: errorMessage(error) };
  if (isSkillError(error)) {
    result.error_kind = error.kind;
  }
  return result;
}

/** Builds and writes one note; failures come back as `ok: false`, never thrown. */
export function summarizeToNote(raw: unknown, config: Config, options: NoteBuilderOptions = {}): SummarizeResult {
  const builder = new NoteBuilder(config, options);

  try {
    const { record, outcome } = builder.createNote(raw);
    return {
      ok: true,
      path: outcome.path,
      note_id: record.id,
      title: record.title,
      tags: record.tags,
      evidence: record.evidence,
      mode: record.mode,
      summary: record.summary,
      written: outcome.written,
    };
  } catch (error) {
    if (!isSkillError(error)) {
      throw error;
    }
    options.logger?.error(`${error.kind}: ${error.message}`);
    return summarizeFailure(error);
  }
}
