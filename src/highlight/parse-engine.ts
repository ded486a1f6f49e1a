/**
 * ParseEngine: sole owner of one parser and its current tree.
 *
 * State machine:
 *   no-tree --parseInitial--> has-tree --applyStructuralEdit--> edited-stale
 *   edited-stale --reparse--> has-tree   (or no-tree if the parse degrades)
 *
 * Only a tree in the has-tree state is ever handed out.
 */

import { type Language, Parser, type Tree } from "web-tree-sitter";
import type { EditDescriptor, Logger } from "./types.ts";

export type ParseState = "no-tree" | "has-tree" | "edited-stale";

export class ParseEngine {
  private readonly _parser: Parser;
  private readonly _logger: Logger;
  private _tree: Tree | null = null;
  private _state: ParseState = "no-tree";

  constructor(language: Language, logger: Logger = console) {
    this._parser = new Parser();
    this._parser.setLanguage(language);
    this._logger = logger;
  }

  get state(): ParseState {
    return this._state;
  }

  /** The current tree, or null unless it matches the last parsed text. */
  get tree(): Tree | null {
    return this._state === "has-tree" ? this._tree : null;
  }

  /** Full parse with no previous tree. */
  parseInitial(text: string): Tree | null {
    this._replaceTree(null);
    return this._parse(text, null);
  }

  /**
   * Shift the stored node ranges of the current tree to reflect an edit.
   * Bookkeeping only, no parsing. No-op when there is no tree.
   */
  applyStructuralEdit(edit: EditDescriptor): void {
    if (!this._tree) return;
    this._tree.edit(edit);
    this._state = "edited-stale";
  }

  /** Parse `text` reusing every subtree the last structural edit left intact. */
  reparse(text: string): Tree | null {
    return this._parse(text, this._tree);
  }

  dispose(): void {
    this._replaceTree(null);
    this._parser.delete();
  }

  private _parse(text: string, previous: Tree | null): Tree | null {
    let next: Tree | null;
    try {
      next = this._parser.parse(text, previous);
    } catch (error) {
      this._logger.warn("ReparseDegraded: parser threw, highlighting suspended", error);
      this._replaceTree(null);
      return null;
    }
    if (!next) {
      this._logger.warn("ReparseDegraded: no tree produced, highlighting suspended");
    }
    this._replaceTree(next);
    return next;
  }

  private _replaceTree(next: Tree | null): void {
    if (this._tree && this._tree !== next) {
      this._tree.delete();
    }
    this._tree = next;
    this._state = next ? "has-tree" : "no-tree";
  }
}
