/**
 * HighlightedBuffer: text + parse tree + style spans, kept in step.
 *
 * Every edit runs to completion synchronously:
 *   descriptor (pre-edit text) → structural tree edit → splice text
 *   → incremental reparse → captures → spans → notify listeners
 *
 * An edit is all-or-nothing: a rejected edit leaves text, tree and spans
 * untouched. Spans are regenerated wholesale, never patched. Listeners run
 * after the edit is committed; one that throws is logged and skipped.
 */

import type { HighlightConfig } from "./grammar.ts";
import { ParseEngine, type ParseState } from "./parse-engine.ts";
import { computeEditDescriptor } from "./position.ts";
import { QueryRunner } from "./query-runner.ts";
import {
  isCodepointBoundary,
  isWellFormed,
  nextCodepointOffset,
  nextLineBreak,
  nextWordOffset,
  precedingLineBreak,
  prevCodepointOffset,
  prevWordOffset,
} from "./text-navigation.ts";
import type {
  BufferOffset,
  BufferRange,
  EditError,
  EditResult,
  HighlightSnapshot,
  Logger,
  StyleSpan,
} from "./types.ts";

export interface HighlightedBufferOptions {
  logger?: Logger;
}

export type ChangeListener = (snapshot: HighlightSnapshot) => void;

function compareSpans(a: StyleSpan, b: StyleSpan): number {
  return a.range.start - b.range.start || a.range.end - b.range.end;
}

function invalidRange(message: string): EditError {
  return { kind: "InvalidRange", message };
}

/** Returns the reason `range` cannot be edited in `text`, or null. */
function validateRange(text: string, range: BufferRange): EditError | null {
  const { start, end } = range;
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    return invalidRange(`Range [${start}, ${end}) has non-integer bounds`);
  }
  if (start > end) {
    return invalidRange(`Range start ${start} is after end ${end}`);
  }
  if (start < 0 || end > text.length) {
    return invalidRange(`Range [${start}, ${end}) is outside buffer of length ${text.length}`);
  }
  if (!isCodepointBoundary(text, start) || !isCodepointBoundary(text, end)) {
    return invalidRange(`Range [${start}, ${end}) splits a surrogate pair`);
  }
  return null;
}

export class HighlightedBuffer {
  private readonly _config: HighlightConfig;
  private readonly _engine: ParseEngine;
  private readonly _runner: QueryRunner;
  private readonly _logger: Logger;
  private readonly _listeners = new Set<ChangeListener>();
  private _text: string;
  private _spans: readonly StyleSpan[] = [];
  private _version = 0;

  constructor(config: HighlightConfig, text: string, options: HighlightedBufferOptions = {}) {
    if (!isWellFormed(text)) {
      throw new TypeError("Buffer text contains an unpaired surrogate");
    }
    this._config = config;
    this._logger = options.logger ?? console;
    this._engine = new ParseEngine(config.language, this._logger);
    this._runner = new QueryRunner(config.query);
    this._text = text;
    this._engine.parseInitial(text);
    this._refresh();
  }

  get length(): number {
    return this._text.length;
  }

  get isEmpty(): boolean {
    return this._text.length === 0;
  }

  /** Incremented on every accepted edit. */
  get version(): number {
    return this._version;
  }

  get parseState(): ParseState {
    return this._engine.state;
  }

  currentText(): string {
    return this._text;
  }

  /** Most recently computed spans, sorted by start then end. */
  spans(): readonly StyleSpan[] {
    return this._spans;
  }

  snapshot(): HighlightSnapshot {
    return { text: this._text, spans: this._spans, version: this._version };
  }

  /** Replace `range` with `text`. Rejected edits change nothing. */
  edit(range: BufferRange, text: string): EditResult {
    const error = validateRange(this._text, range);
    if (error) return { ok: false, error };
    if (!isWellFormed(text)) {
      return {
        ok: false,
        error: { kind: "InvalidText", message: "Replacement contains an unpaired surrogate" },
      };
    }

    const descriptor = computeEditDescriptor(this._text, range, text);
    this._engine.applyStructuralEdit(descriptor);
    this._text = this._text.slice(0, range.start) + text + this._text.slice(range.end);
    this._engine.reparse(this._text);
    this._refresh();
    this._version++;

    const snapshot = this.snapshot();
    for (const listener of this._listeners) {
      try {
        listener(snapshot);
      } catch (err) {
        this._logger.warn("Change listener threw", err);
      }
    }
    return { ok: true };
  }

  insert(at: BufferOffset, text: string): EditResult {
    return this.edit({ start: at, end: at }, text);
  }

  delete(range: BufferRange): EditResult {
    return this.edit(range, "");
  }

  /** Called after every accepted edit. Returns an unsubscribe function. */
  onChange(listener: ChangeListener): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  slice(range: BufferRange): string | undefined {
    if (validateRange(this._text, range)) return undefined;
    return this._text.slice(range.start, range.end);
  }

  sameText(other: HighlightedBuffer): boolean {
    return this._text === other._text;
  }

  prevCodepointOffset(offset: BufferOffset): BufferOffset | undefined {
    return prevCodepointOffset(this._text, offset);
  }

  nextCodepointOffset(offset: BufferOffset): BufferOffset | undefined {
    return nextCodepointOffset(this._text, offset);
  }

  prevWordOffset(offset: BufferOffset): BufferOffset | undefined {
    return prevWordOffset(this._text, offset);
  }

  nextWordOffset(offset: BufferOffset): BufferOffset | undefined {
    return nextWordOffset(this._text, offset);
  }

  precedingLineBreak(offset: BufferOffset): BufferOffset {
    return precedingLineBreak(this._text, offset);
  }

  nextLineBreak(offset: BufferOffset): BufferOffset {
    return nextLineBreak(this._text, offset);
  }

  dispose(): void {
    this._listeners.clear();
    this._engine.dispose();
  }

  private _refresh(): void {
    const tree = this._engine.tree;
    if (!tree) {
      this._spans = [];
      return;
    }
    const spans: StyleSpan[] = [];
    for (const capture of this._runner.computeCaptures(tree)) {
      const style = this._config.styles.resolve(capture.category);
      if (style) spans.push({ range: capture.range, style });
    }
    spans.sort(compareSpans);
    this._spans = spans;
  }
}

export function createHighlightedBuffer(
  config: HighlightConfig,
  text: string,
  options?: HighlightedBufferOptions,
): HighlightedBuffer {
  return new HighlightedBuffer(config, text, options);
}
