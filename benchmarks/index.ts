/**
 * Benchmark runner for the highlighter.
 *
 * Run with: npm run bench
 */

import { loadHighlightConfig } from "../src/highlight/grammar.ts";
import { compareParses } from "./highlight.bench.ts";

console.log("Incremental Highlighter Benchmarks (2K lines)");
console.log("");

const config = await loadHighlightConfig();
const { incrementalEdit, speedup } = compareParses(config);

console.log("");
console.log(`Incremental edit is ${speedup.toFixed(1)}x faster than a full parse`);

if (!incrementalEdit.passed || speedup < 1) {
  process.exitCode = 1;
}
