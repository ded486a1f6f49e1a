/**
 * One Monokai color theme for syntax highlighting.
 * Maps highlight-query capture categories to styles.
 */

import type { Style } from "./types.ts";

const ONE_MONOKAI = {
  blue: "#61afef",
  cyan: "#56b6c2",
  green: "#98c379",
  fg: "#abb2bf",
  purple: "#c678dd",
  gray: "#676f7d",
  yellow: "#e5c07b",
  red: "#e06c75",
} as const;

function color(hex: string): Style {
  return { color: hex };
}

/** Applied to categories the mapping does not know. */
export const FALLBACK_STYLE: Style = { underline: true };

/** Background behind highlighted text in the demo renderer. */
export const BACKGROUND = "#282c34";

/** The fixed category list the bundled highlight query produces. */
export const CAPTURE_CATEGORIES = [
  "constructor",
  "constant",
  "function.builtin",
  "function.method",
  "function",
  "variable",
  "property",
  "type",
  "constant.builtin",
  "number",
  "comment",
  "string",
  "escape",
  "punctuation.special",
  "embedded",
  "operator",
  "keyword",
] as const;

export type CaptureCategory = (typeof CAPTURE_CATEGORIES)[number];

/** Exhaustive over CaptureCategory: adding a category without a style fails to compile. */
export const DEFAULT_STYLES: Readonly<Record<CaptureCategory, Style>> = {
  constructor: color(ONE_MONOKAI.blue),
  constant: color(ONE_MONOKAI.cyan),
  "function.builtin": color(ONE_MONOKAI.green),
  "function.method": color(ONE_MONOKAI.green),
  function: color(ONE_MONOKAI.green),
  variable: color(ONE_MONOKAI.blue),
  property: color(ONE_MONOKAI.fg),
  type: color(ONE_MONOKAI.blue),
  "constant.builtin": color(ONE_MONOKAI.cyan),
  number: color(ONE_MONOKAI.purple),
  comment: color(ONE_MONOKAI.gray),
  string: color(ONE_MONOKAI.yellow),
  escape: color(ONE_MONOKAI.cyan),
  "punctuation.special": color(ONE_MONOKAI.purple),
  embedded: color(ONE_MONOKAI.purple),
  operator: color(ONE_MONOKAI.red),
  keyword: color(ONE_MONOKAI.red),
};
