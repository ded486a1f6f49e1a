/**
 * Position translation: code-unit offsets to (row, column) points.
 *
 * A single scan routine backs all three points of an edit descriptor,
 * so start, old end and new end always agree on what a line break is.
 */

import type {
  BufferOffset,
  BufferPoint,
  BufferRange,
  EditDescriptor,
} from "./types.ts";

const NEWLINE = 10;

const ORIGIN: BufferPoint = { row: 0, column: 0 };

export class OutOfRangeError extends RangeError {
  readonly offset: number;
  readonly length: number;

  constructor(offset: number, length: number) {
    super(`Offset ${offset} is outside buffer of length ${length}`);
    this.name = "OutOfRangeError";
    this.offset = offset;
    this.length = length;
  }
}

/** Scan `text[start, end)` continuing from `from`. */
function scan(
  text: string,
  start: number,
  end: number,
  from: BufferPoint,
): BufferPoint {
  let row = from.row;
  let column = from.column;
  for (let i = start; i < end; i++) {
    if (text.charCodeAt(i) === NEWLINE) {
      row++;
      column = 0;
    } else {
      column++;
    }
  }
  return { row, column };
}

function checkOffset(text: string, offset: BufferOffset): void {
  if (!Number.isInteger(offset) || offset < 0 || offset > text.length) {
    throw new OutOfRangeError(offset, text.length);
  }
}

/**
 * Translate an offset into a point, counting from the start of `text`.
 * Throws OutOfRangeError past the end of the buffer.
 */
export function translate(text: string, offset: BufferOffset): BufferPoint {
  checkOffset(text, offset);
  return scan(text, 0, offset, ORIGIN);
}

/** The point reached after scanning all of `text` starting at `from`. */
export function advance(from: BufferPoint, text: string): BufferPoint {
  return scan(text, 0, text.length, from);
}

/**
 * Build the structural edit for replacing `range` of the pre-edit `text`
 * with `replacement`.
 */
export function computeEditDescriptor(
  text: string,
  range: BufferRange,
  replacement: string,
): EditDescriptor {
  checkOffset(text, range.start);
  checkOffset(text, range.end);
  if (range.start > range.end) {
    throw new RangeError(
      `Range start ${range.start} is after range end ${range.end}`,
    );
  }

  const startPosition = translate(text, range.start);
  const oldEndPosition = scan(text, range.start, range.end, startPosition);
  const newEndPosition = advance(startPosition, replacement);

  return {
    startIndex: range.start,
    oldEndIndex: range.end,
    newEndIndex: range.start + replacement.length,
    startPosition,
    oldEndPosition,
    newEndPosition,
  };
}
