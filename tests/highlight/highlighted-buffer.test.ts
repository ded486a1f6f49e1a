/**
 * HighlightedBuffer tests.
 *
 * Key patterns:
 * - Accepted edits are exact splices and refresh spans before returning
 * - Rejected edits leave text, spans and version untouched
 * - Spans are sorted by start and carry resolved styles
 */

import fc from "fast-check";
import { afterEach, beforeAll, describe, expect, test, vi } from "vitest";
import { Parser } from "web-tree-sitter";
import { type HighlightConfig, loadHighlightConfig } from "../../src/highlight/grammar.ts";
import {
  createHighlightedBuffer,
  type HighlightedBuffer,
} from "../../src/highlight/highlighted-buffer.ts";
import { translate } from "../../src/highlight/position.ts";
import { DEFAULT_STYLES, FALLBACK_STYLE } from "../../src/highlight/theme.ts";
import type { Style, StyleSpan } from "../../src/highlight/types.ts";
import {
  editStep,
  fragmentText,
  loadPythonConfig,
  range,
  silentLogger,
  splice,
  stepRange,
} from "../helpers.ts";

let config: HighlightConfig;
const buffers: HighlightedBuffer[] = [];

function open(text: string, cfg: HighlightConfig = config): HighlightedBuffer {
  const buffer = createHighlightedBuffer(cfg, text, { logger: silentLogger });
  buffers.push(buffer);
  return buffer;
}

function span(start: number, end: number, style: Style): StyleSpan {
  return { range: { start, end }, style };
}

beforeAll(async () => {
  config = await loadPythonConfig();
});

afterEach(() => {
  vi.restoreAllMocks();
  for (const buffer of buffers.splice(0)) buffer.dispose();
});

describe("HighlightedBuffer - creation", () => {
  test("highlights the initial text", () => {
    const buffer = open("x = 1");
    expect(buffer.spans()).toEqual([
      span(0, 1, DEFAULT_STYLES.variable),
      span(2, 3, DEFAULT_STYLES.operator),
      span(4, 5, DEFAULT_STYLES.number),
    ]);
    expect(buffer.parseState).toBe("has-tree");
    expect(buffer.version).toBe(0);
  });

  test("a number literal resolves to the number style", () => {
    const buffer = open("x = 1");
    expect(buffer.spans()).toContainEqual(span(4, 5, { color: "#c678dd" }));
  });

  test("empty buffer", () => {
    const buffer = open("");
    expect(buffer.isEmpty).toBe(true);
    expect(buffer.length).toBe(0);
    expect(buffer.spans()).toEqual([]);
  });

  test("rejects text with a lone surrogate", () => {
    expect(() => open("x = '\ud83d'")).toThrow(TypeError);
  });
});

describe("HighlightedBuffer - edits", () => {
  test("inserting at the end of a line", () => {
    const buffer = open("a\nb");
    expect(buffer.edit(range(3, 3), "c")).toEqual({ ok: true });
    expect(buffer.currentText()).toBe("a\nbc");
    expect(translate(buffer.currentText(), 3)).toEqual({ row: 1, column: 1 });
  });

  test("inserting at a line start", () => {
    const buffer = open("a\nb");
    expect(buffer.edit(range(2, 2), "c")).toEqual({ ok: true });
    expect(buffer.currentText()).toBe("a\ncb");
  });

  test("spans follow the edited text", () => {
    const buffer = open("x = 1");
    buffer.edit(range(4, 5), "42");
    expect(buffer.currentText()).toBe("x = 42");
    expect(buffer.spans()).toContainEqual(span(4, 6, DEFAULT_STYLES.number));
    expect(buffer.spans()).not.toContainEqual(span(4, 5, DEFAULT_STYLES.number));
    expect(buffer.version).toBe(1);
  });

  test("inserting a definition before existing code", () => {
    const buffer = open("x = 1");
    buffer.insert(0, "def f():\n    pass\n");
    expect(buffer.currentText()).toBe("def f():\n    pass\nx = 1");
    expect(buffer.spans()).toEqual([
      span(0, 3, DEFAULT_STYLES.keyword),
      span(4, 5, DEFAULT_STYLES.function),
      span(13, 17, DEFAULT_STYLES.keyword),
      span(18, 19, DEFAULT_STYLES.variable),
      span(20, 21, DEFAULT_STYLES.operator),
      span(22, 23, DEFAULT_STYLES.number),
    ]);
  });

  test("deleting a range", () => {
    const buffer = open("x = 1 + 2");
    buffer.delete(range(5, 9));
    expect(buffer.currentText()).toBe("x = 1");
    expect(buffer.spans()).toHaveLength(3);
  });

  test("turning an identifier into a keyword", () => {
    const buffer = open("pas");
    buffer.insert(3, "s");
    expect(buffer.spans()).toEqual([span(0, 4, DEFAULT_STYLES.keyword)]);
  });
});

describe("HighlightedBuffer - rejected edits", () => {
  test("start after end is InvalidRange and changes nothing", () => {
    const buffer = open("a\nb");
    const before = buffer.spans();
    const result = buffer.edit(range(2, 1), "z");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("InvalidRange");
    expect(buffer.currentText()).toBe("a\nb");
    expect(buffer.spans()).toBe(before);
    expect(buffer.version).toBe(0);
  });

  test("range past the end", () => {
    const buffer = open("abc");
    const result = buffer.edit(range(1, 4), "");
    expect(result).toEqual({
      ok: false,
      error: { kind: "InvalidRange", message: "Range [1, 4) is outside buffer of length 3" },
    });
  });

  test("negative and fractional offsets", () => {
    const buffer = open("abc");
    expect(buffer.edit(range(-1, 1), "").ok).toBe(false);
    expect(buffer.edit(range(0.5, 1), "").ok).toBe(false);
    expect(buffer.currentText()).toBe("abc");
  });

  test("boundary inside a surrogate pair", () => {
    const buffer = open("s = '😀'");
    const result = buffer.edit(range(6, 6), "x");
    expect(result).toEqual({
      ok: false,
      error: { kind: "InvalidRange", message: "Range [6, 6) splits a surrogate pair" },
    });
    expect(buffer.currentText()).toBe("s = '😀'");
  });

  test("replacement with a lone surrogate is InvalidText", () => {
    const buffer = open("x");
    const result = buffer.edit(range(1, 1), "\ude00");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("InvalidText");
    expect(buffer.currentText()).toBe("x");
  });
});

describe("HighlightedBuffer - overlapping patterns", () => {
  test("a node matched by two patterns is painted once", async () => {
    const overlapping = await loadHighlightConfig({
      querySource: '(function_definition "def" @keyword.function)\n"def" @keyword\n',
      logger: silentLogger,
    });
    const buffer = open("def f():\n    pass\n", overlapping);
    const atDef = buffer.spans().filter((s) => s.range.start === 0 && s.range.end === 3);
    expect(atDef).toHaveLength(1);
    expect([FALLBACK_STYLE, DEFAULT_STYLES.keyword]).toContainEqual(atDef[0]?.style);
  });
});

describe("HighlightedBuffer - degraded reparse", () => {
  test("spans are cleared and text is kept", () => {
    const buffer = open("x = 1");
    vi.spyOn(Parser.prototype, "parse").mockReturnValueOnce(null);
    expect(buffer.edit(range(4, 5), "2")).toEqual({ ok: true });
    expect(buffer.currentText()).toBe("x = 2");
    expect(buffer.parseState).toBe("no-tree");
    expect(buffer.spans()).toEqual([]);
  });

  test("highlighting returns with the next successful parse", () => {
    const buffer = open("x = 1");
    vi.spyOn(Parser.prototype, "parse").mockReturnValueOnce(null);
    buffer.edit(range(4, 5), "2");
    buffer.edit(range(5, 5), "3");
    expect(buffer.currentText()).toBe("x = 23");
    expect(buffer.parseState).toBe("has-tree");
    expect(buffer.spans()).toContainEqual(span(4, 6, DEFAULT_STYLES.number));
  });
});

describe("HighlightedBuffer - listeners and snapshots", () => {
  test("listeners see the post-edit snapshot", () => {
    const buffer = open("x = 1");
    const listener = vi.fn();
    buffer.onChange(listener);
    buffer.edit(range(0, 1), "y");
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({
      text: "y = 1",
      spans: buffer.spans(),
      version: 1,
    });
  });

  test("a throwing listener does not undo the edit or block others", () => {
    const warn = vi.fn();
    const buffer = createHighlightedBuffer(config, "x = 1", { logger: { warn } });
    buffers.push(buffer);
    const failure = new Error("listener failed");
    const second = vi.fn();
    buffer.onChange(() => {
      throw failure;
    });
    buffer.onChange(second);

    expect(buffer.edit(range(0, 1), "y")).toEqual({ ok: true });
    expect(buffer.currentText()).toBe("y = 1");
    expect(buffer.version).toBe(1);
    expect(second).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("Change listener threw", failure);
  });

  test("rejected edits do not notify", () => {
    const buffer = open("x = 1");
    const listener = vi.fn();
    buffer.onChange(listener);
    buffer.edit(range(3, 2), "");
    expect(listener).not.toHaveBeenCalled();
  });

  test("unsubscribe stops notifications", () => {
    const buffer = open("x = 1");
    const listener = vi.fn();
    const unsubscribe = buffer.onChange(listener);
    unsubscribe();
    buffer.edit(range(0, 1), "y");
    expect(listener).not.toHaveBeenCalled();
  });

  test("snapshots are not affected by later edits", () => {
    const buffer = open("x = 1");
    const snapshot = buffer.snapshot();
    buffer.edit(range(0, 5), "");
    expect(snapshot.text).toBe("x = 1");
    expect(snapshot.spans).toHaveLength(3);
    expect(buffer.spans()).toEqual([]);
  });
});

describe("HighlightedBuffer - text access", () => {
  test("slice", () => {
    const buffer = open("hello world");
    expect(buffer.slice(range(6, 11))).toBe("world");
    expect(buffer.slice(range(6, 20))).toBeUndefined();
  });

  test("sameText compares contents only", () => {
    const a = open("x = 1");
    const b = open("x = 2");
    expect(a.sameText(b)).toBe(false);
    b.edit(range(4, 5), "1");
    expect(a.sameText(b)).toBe(true);
  });

  test("navigation delegates to the current text", () => {
    const buffer = open("ab 😀\ncd");
    expect(buffer.nextCodepointOffset(3)).toBe(5);
    expect(buffer.prevCodepointOffset(5)).toBe(3);
    expect(buffer.nextWordOffset(0)).toBe(6);
    expect(buffer.prevWordOffset(8)).toBe(6);
    expect(buffer.precedingLineBreak(7)).toBe(6);
    expect(buffer.nextLineBreak(0)).toBe(5);
  });
});

describe("HighlightedBuffer - properties", () => {
  test("edits are splices and spans stay sorted and in bounds", () => {
    fc.assert(
      fc.property(fragmentText, fc.array(editStep, { maxLength: 8 }), (initial, steps) => {
        const buffer = open(initial);
        let model = initial;
        for (const step of steps) {
          const at = stepRange(model, step);
          const result = buffer.edit(at, step.text);
          if (result.ok) {
            model = splice(model, at, step.text);
          }
          expect(buffer.currentText()).toBe(model);

          const spans = buffer.spans();
          for (let i = 0; i < spans.length; i++) {
            const s = spans[i];
            if (!s) continue;
            expect(s.range.start).toBeGreaterThanOrEqual(0);
            expect(s.range.end).toBeLessThanOrEqual(model.length);
            const prev = spans[i - 1];
            if (prev) expect(prev.range.start).toBeLessThanOrEqual(s.range.start);
          }
          expect(buffer.spans()).toBe(spans);
        }
      }),
      { numRuns: 50 },
    );
  });
});
