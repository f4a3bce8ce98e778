export const DEFAULT_MAX_OUTPUT_BYTES = 8000;
const TRUNCATED_MARKER = "...truncated";

const CONFLICT_MARKERS = [
  "conflict",
  "fix conflicts",
  "resolve all conflicts",
  "after resolving the conflicts",
  "could not apply",
];

/** Caps `text` at `maxBytes` UTF-8 bytes, marker included. */
export function truncateOutput(text: string, maxBytes: number = DEFAULT_MAX_OUTPUT_BYTES): string {
  if (!text) {
    return "";
  }
  const buffer = Buffer.from(text, "utf-8");
  if (buffer.length <= maxBytes) {
    return text;
  }

  const keep = Math.max(0, maxBytes - TRUNCATED_MARKER.length);
  // drop a partial multi-byte sequence left at the cut
  const head = buffer.subarray(0, keep).toString("utf-8").replace(/\uFFFD+$/, "");
  return head + TRUNCATED_MARKER;
}

export function detectConflict(output: string): boolean {
  const lowered = output.toLowerCase();
  return CONFLICT_MARKERS.some((marker) => lowered.includes(marker));
}
