/**
 * Core types for the highlighting engine.
 *
 * Offsets and columns are UTF-16 code units, the unit web-tree-sitter
 * reports for string input.
 */

// =============================================================================
// Positions
// =============================================================================

/** Code-unit offset within a buffer */
export type BufferOffset = number;

/** A zero-based (row, column) position within a buffer */
export interface BufferPoint {
  readonly row: number;
  readonly column: number;
}

/** Half-open offset range `[start, end)` */
export interface BufferRange {
  readonly start: BufferOffset;
  readonly end: BufferOffset;
}

/**
 * Everything a tree needs to shift its node ranges for one text change.
 * Field names match web-tree-sitter's `Edit` so it can be passed through as-is.
 */
export interface EditDescriptor {
  readonly startIndex: BufferOffset;
  readonly oldEndIndex: BufferOffset;
  readonly newEndIndex: BufferOffset;
  readonly startPosition: BufferPoint;
  readonly oldEndPosition: BufferPoint;
  readonly newEndPosition: BufferPoint;
}

// =============================================================================
// Highlighting
// =============================================================================

/** One query match against one syntax node. */
export interface Capture {
  /** Node identity; two nodes may share a range but never an id */
  readonly nodeId: number;
  readonly range: BufferRange;
  readonly category: string;
}

export interface Style {
  /** Hex color, e.g. "#61afef" */
  readonly color?: string;
  readonly underline?: boolean;
}

export interface StyleSpan {
  readonly range: BufferRange;
  readonly style: Style;
}

// =============================================================================
// Edits
// =============================================================================

export type EditErrorKind = "InvalidRange" | "InvalidText";

export interface EditError {
  readonly kind: EditErrorKind;
  readonly message: string;
}

export type EditResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: EditError };

/** Text + spans, detached from the live parser. */
export interface HighlightSnapshot {
  readonly text: string;
  readonly spans: readonly StyleSpan[];
  readonly version: number;
}

// =============================================================================
// Ambient
// =============================================================================

export type Logger = Pick<Console, "warn">;
