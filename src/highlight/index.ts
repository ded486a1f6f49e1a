export {
  GrammarSetupError,
  type HighlightConfig,
  type HighlightConfigOptions,
  loadHighlightConfig,
  pythonGrammarPath,
} from "./grammar.ts";
export {
  type ChangeListener,
  createHighlightedBuffer,
  HighlightedBuffer,
  type HighlightedBufferOptions,
} from "./highlighted-buffer.ts";
export { ParseEngine, type ParseState } from "./parse-engine.ts";
export { advance, computeEditDescriptor, OutOfRangeError, translate } from "./position.ts";
export { dedupeCaptures, QueryRunner } from "./query-runner.ts";
export { createStyleTable, type StyleMapping, StyleTable } from "./style-table.ts";
export * from "./text-navigation.ts";
export * from "./theme.ts";
export * from "./types.ts";
