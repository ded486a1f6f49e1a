/**
 * Test helpers and utilities.
 */

import fc from "fast-check";
import { type HighlightConfig, loadHighlightConfig } from "../src/highlight/grammar.ts";
import type { BufferRange, Logger } from "../src/highlight/types.ts";

// =============================================================================
// Grammar
// =============================================================================

export const silentLogger: Logger = {
  warn: () => {},
};

let pythonConfig: Promise<HighlightConfig> | null = null;

/** The bundled Python config, loaded once per test file. */
export function loadPythonConfig(): Promise<HighlightConfig> {
  pythonConfig ??= loadHighlightConfig({ logger: silentLogger });
  return pythonConfig;
}

// =============================================================================
// Ranges
// =============================================================================

export function range(start: number, end: number): BufferRange {
  return { start, end };
}

/** Splice reference: what any accepted edit must produce. */
export function splice(text: string, at: BufferRange, replacement: string): string {
  return text.slice(0, at.start) + replacement + text.slice(at.end);
}

// =============================================================================
// Arbitraries
// =============================================================================

/** Short Python-ish fragments, including multi-unit code points. */
const FRAGMENTS = ["x", "y1", "42", " ", "=", "+", "\n", "(", ")", "'s'", "#c", "é", "😀", "def"];

export const fragmentText = fc
  .array(fc.constantFrom(...FRAGMENTS), { maxLength: 12 })
  .map((parts) => parts.join(""));

export interface EditStep {
  readonly a: number;
  readonly b: number;
  readonly text: string;
}

export const editStep: fc.Arbitrary<EditStep> = fc.record({
  a: fc.nat({ max: 200 }),
  b: fc.nat({ max: 200 }),
  text: fragmentText,
});

/** Map an arbitrary step onto an ordered, in-bounds range of `text`. */
export function stepRange(text: string, step: EditStep): BufferRange {
  const x = step.a % (text.length + 1);
  const y = step.b % (text.length + 1);
  return { start: Math.min(x, y), end: Math.max(x, y) };
}
