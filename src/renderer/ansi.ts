/**
 * 24-bit color terminal rendering of highlighted text.
 */

import type { Style, StyleSpan } from "../highlight/types.ts";
import { segmentText } from "./segments.ts";

const RESET = "\x1b[0m";
const UNDERLINE = "\x1b[4m";

/** Parse "#rrggbb" (or "#rgb"); null for anything else. */
export function hexToRgb(hex: string): [number, number, number] | null {
  const match = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(hex);
  const digits = match?.[1];
  if (!digits) return null;
  const full =
    digits.length === 3
      ? digits
          .split("")
          .map((d) => d + d)
          .join("")
      : digits;
  const value = Number.parseInt(full, 16);
  return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
}

export function styleToAnsi(style: Style): string {
  let codes = "";
  const rgb = style.color ? hexToRgb(style.color) : null;
  if (rgb) codes += `\x1b[38;2;${rgb[0]};${rgb[1]};${rgb[2]}m`;
  if (style.underline) codes += UNDERLINE;
  return codes;
}

export function renderAnsi(text: string, spans: readonly StyleSpan[]): string {
  let out = "";
  for (const segment of segmentText(text, spans)) {
    const codes = segment.style ? styleToAnsi(segment.style) : "";
    out += codes ? `${codes}${segment.text}${RESET}` : segment.text;
  }
  return out;
}
