/**
 * Grammar setup: loads the Python grammar, compiles the highlight query and
 * builds the style table, once, into a shared immutable HighlightConfig.
 */

import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import { dirname, join } from "node:path";
import { Language, Parser, Query } from "web-tree-sitter";
import { createStyleTable, type StyleMapping, type StyleTable } from "./style-table.ts";
import { DEFAULT_STYLES } from "./theme.ts";
import type { Logger, Style } from "./types.ts";

const DEFAULT_QUERY_URL = new URL("../../queries/highlights.scm", import.meta.url);

export class GrammarSetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GrammarSetupError";
  }
}

/** Everything a buffer needs from its grammar. Shared, never mutated. */
export interface HighlightConfig {
  readonly language: Language;
  readonly query: Query;
  readonly styles: StyleTable;
  readonly captureNames: readonly string[];
}

export interface HighlightConfigOptions {
  /** Path to, or contents of, a grammar .wasm. Defaults to tree-sitter-wasms' Python build. */
  grammar?: string | Uint8Array;
  /** Highlight query source. Defaults to queries/highlights.scm. */
  querySource?: string;
  styles?: StyleMapping;
  fallbackStyle?: Style;
  logger?: Logger;
}

let parserInit: Promise<void> | null = null;

/** web-tree-sitter's runtime must be initialised once per process. */
function initParser(): Promise<void> {
  if (!parserInit) {
    parserInit = Parser.init().catch((error: unknown) => {
      parserInit = null;
      throw error;
    });
  }
  return parserInit;
}

/** Location of the prebuilt Python grammar inside tree-sitter-wasms/out/. */
export function pythonGrammarPath(): string {
  const require = createRequire(import.meta.url);
  const wasmPackagePath = require.resolve("tree-sitter-wasms/package.json");
  return join(dirname(wasmPackagePath), "out", "tree-sitter-python.wasm");
}

export async function loadHighlightConfig(
  options: HighlightConfigOptions = {},
): Promise<HighlightConfig> {
  const logger = options.logger ?? console;

  let language: Language;
  try {
    await initParser();
    language = await Language.load(options.grammar ?? pythonGrammarPath());
  } catch (error) {
    throw new GrammarSetupError("Failed to load grammar", { cause: error });
  }

  let source: string;
  try {
    source = options.querySource ?? (await readFile(DEFAULT_QUERY_URL, "utf8"));
  } catch (error) {
    throw new GrammarSetupError("Failed to read highlight query", { cause: error });
  }

  let query: Query;
  try {
    query = new Query(language, source);
  } catch (error) {
    throw new GrammarSetupError("Failed to compile highlight query", { cause: error });
  }

  const styles = createStyleTable(options.styles ?? DEFAULT_STYLES, options.fallbackStyle);
  const captureNames = Object.freeze([...query.captureNames]);

  const unmapped = styles.unmapped(captureNames);
  if (unmapped.length > 0) {
    logger.warn(
      `Highlight query captures without a style (shown with fallback): ${unmapped.join(", ")}`,
    );
  }

  return Object.freeze({ language, query, styles, captureNames });
}
