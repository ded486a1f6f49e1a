/**
 * Full parse vs incremental edit on the same 2K line file.
 *
 * Target: a one-character edit + re-highlight stays under 5ms and beats
 * a full parse of the file.
 */

import type { HighlightConfig } from "../src/highlight/grammar.ts";
import { createHighlightedBuffer, type HighlightedBuffer } from "../src/highlight/highlighted-buffer.ts";
import { ParseEngine } from "../src/highlight/parse-engine.ts";
import { type Benchmark, formatTiming, measure, type Timing } from "./harness.ts";

const quiet = { warn: () => {} };

function generateSource(functions: number): string {
  return Array.from(
    { length: functions },
    (_, i) => `def handler_${i}(event, count=${i}):\n    total = count * 2 + len(event)\n    return total\n`,
  ).join("\n");
}

export interface Comparison {
  fullParse: Timing;
  incrementalEdit: Timing;
  /** fullParse.avgMs / incrementalEdit.avgMs */
  speedup: number;
}

export function compareParses(config: HighlightConfig): Comparison {
  const source = generateSource(500);
  const middle = source.indexOf("total", source.length >> 1);

  let engine: ParseEngine | null = null;
  const fullParse: Benchmark = {
    name: "Full parse",
    iterations: 20,
    setup: () => {
      engine = new ParseEngine(config.language, quiet);
    },
    fn: () => {
      engine?.parseInitial(source);
    },
    teardown: () => {
      engine?.dispose();
    },
  };

  let buffer: HighlightedBuffer | null = null;
  let typed = false;
  const incrementalEdit: Benchmark = {
    name: "Single character edit + highlight",
    iterations: 200,
    targetMs: 5,
    setup: () => {
      buffer = createHighlightedBuffer(config, source, { logger: quiet });
    },
    fn: () => {
      // Alternate insert/delete so the buffer does not grow.
      if (typed) {
        buffer?.delete({ start: middle, end: middle + 1 });
      } else {
        buffer?.insert(middle, "x");
      }
      typed = !typed;
    },
    teardown: () => {
      buffer?.dispose();
    },
  };

  const full = measure(fullParse);
  const incremental = measure(incrementalEdit);
  console.log(formatTiming(full));
  console.log(formatTiming(incremental, incrementalEdit.targetMs));

  return {
    fullParse: full,
    incrementalEdit: incremental,
    speedup: full.avgMs / incremental.avgMs,
  };
}
