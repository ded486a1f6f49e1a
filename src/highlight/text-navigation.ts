/**
 * Offset navigation over buffer text: code points, words and lines.
 * Pure functions. `undefined` means there is nowhere further to go.
 */

import type { BufferOffset } from "./types.ts";

const NEWLINE = 10;

export function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** True unless `offset` splits a surrogate pair. Offset must be in bounds. */
export function isCodepointBoundary(text: string, offset: BufferOffset): boolean {
  if (offset <= 0 || offset >= text.length) return true;
  return !(
    isHighSurrogate(text.charCodeAt(offset - 1)) &&
    isLowSurrogate(text.charCodeAt(offset))
  );
}

/** True when `text` contains no unpaired surrogate. */
export function isWellFormed(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (isHighSurrogate(code)) {
      if (!isLowSurrogate(text.charCodeAt(i + 1))) return false;
      i++;
    } else if (isLowSurrogate(code)) {
      return false;
    }
  }
  return true;
}

export function isWordChar(charCode: number): boolean {
  return (
    (charCode >= 48 && charCode <= 57) || // 0-9
    (charCode >= 65 && charCode <= 90) || // A-Z
    (charCode >= 97 && charCode <= 122) || // a-z
    charCode === 95 // _
  );
}

export function prevCodepointOffset(
  text: string,
  offset: BufferOffset,
): BufferOffset | undefined {
  if (offset <= 0 || offset > text.length) return undefined;
  const prev = offset - 1;
  if (prev > 0 && isLowSurrogate(text.charCodeAt(prev)) && isHighSurrogate(text.charCodeAt(prev - 1))) {
    return prev - 1;
  }
  return prev;
}

export function nextCodepointOffset(
  text: string,
  offset: BufferOffset,
): BufferOffset | undefined {
  if (offset < 0 || offset >= text.length) return undefined;
  if (isHighSurrogate(text.charCodeAt(offset)) && isLowSurrogate(text.charCodeAt(offset + 1))) {
    return offset + 2;
  }
  return offset + 1;
}

/** Skip non-word chars backwards, then the word before them. */
export function prevWordOffset(
  text: string,
  offset: BufferOffset,
): BufferOffset | undefined {
  if (offset <= 0 || offset > text.length) return undefined;
  let pos = offset;
  while (pos > 0 && !isWordChar(text.charCodeAt(pos - 1))) pos--;
  while (pos > 0 && isWordChar(text.charCodeAt(pos - 1))) pos--;
  return pos;
}

/** Skip the current word, then the non-word chars after it. */
export function nextWordOffset(
  text: string,
  offset: BufferOffset,
): BufferOffset | undefined {
  if (offset < 0 || offset >= text.length) return undefined;
  let pos = offset;
  while (pos < text.length && isWordChar(text.charCodeAt(pos))) pos++;
  while (pos < text.length && !isWordChar(text.charCodeAt(pos))) pos++;
  return pos;
}

/** Start of the line containing `offset`. */
export function precedingLineBreak(text: string, offset: BufferOffset): BufferOffset {
  let pos = Math.min(Math.max(offset, 0), text.length);
  while (pos > 0 && text.charCodeAt(pos - 1) !== NEWLINE) pos--;
  return pos;
}

/** Offset of the next "\n" at or after `offset`, or the end of the text. */
export function nextLineBreak(text: string, offset: BufferOffset): BufferOffset {
  const index = text.indexOf("\n", Math.max(offset, 0));
  return index === -1 ? text.length : index;
}
