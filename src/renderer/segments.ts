/**
 * Split buffer text into styled runs for a presentation layer.
 * Fills gaps between spans with unstyled runs.
 */

import type { BufferOffset, Style, StyleSpan } from "../highlight/types.ts";

export interface TextSegment {
  readonly text: string;
  readonly start: BufferOffset;
  readonly end: BufferOffset;
  readonly style: Style | null;
}

/**
 * Cover `text` with contiguous segments. Where spans overlap, the part
 * already covered by an earlier-starting span is dropped from the later one.
 */
export function segmentText(text: string, spans: readonly StyleSpan[]): TextSegment[] {
  const sorted = [...spans].sort(
    (a, b) => a.range.start - b.range.start || a.range.end - b.range.end,
  );
  const segments: TextSegment[] = [];

  const push = (start: number, end: number, style: Style | null) => {
    segments.push({ text: text.slice(start, end), start, end, style });
  };

  let pos = 0;
  for (const span of sorted) {
    const start = Math.max(span.range.start, pos);
    const end = Math.min(span.range.end, text.length);
    if (start >= end) continue;

    if (start > pos) push(pos, start, null);
    push(start, end, span.style);
    pos = end;
  }

  if (pos < text.length) push(pos, text.length, null);
  return segments;
}
