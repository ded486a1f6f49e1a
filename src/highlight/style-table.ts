/**
 * StyleTable: immutable capture-category → style lookup.
 *
 * Built once and shared by reference between every buffer that uses the
 * same grammar. Lookups never fail: a category the mapping does not name
 * resolves to the fallback style so it stays visible on screen.
 */

import { DEFAULT_STYLES, FALLBACK_STYLE } from "./theme.ts";
import type { Style } from "./types.ts";

/** `null` marks a category that is deliberately left unstyled. */
export type StyleMapping = Readonly<Record<string, Style | null>>;

export class StyleTable {
  readonly fallback: Style;
  private readonly _styles: ReadonlyMap<string, Style | null>;

  constructor(mapping: StyleMapping, fallback: Style = FALLBACK_STYLE) {
    const styles = new Map<string, Style | null>();
    for (const [category, style] of Object.entries(mapping)) {
      styles.set(category, style === null ? null : Object.freeze({ ...style }));
    }
    this._styles = styles;
    this.fallback = Object.freeze({ ...fallback });
    Object.freeze(this);
  }

  resolve(category: string): Style | null {
    const style = this._styles.get(category);
    return style === undefined ? this.fallback : style;
  }

  has(category: string): boolean {
    return this._styles.has(category);
  }

  /**
   * Categories from a grammar's capture list that only the fallback covers.
   * Checked once at setup so typos surface at startup, not while painting.
   */
  unmapped(captureNames: readonly string[]): string[] {
    return captureNames.filter((name) => !this._styles.has(name));
  }
}

export function createStyleTable(
  mapping: StyleMapping = DEFAULT_STYLES,
  fallback: Style = FALLBACK_STYLE,
): StyleTable {
  return new StyleTable(mapping, fallback);
}
