/**
 * QueryRunner: evaluates the compiled highlight query against a tree.
 *
 * Several patterns can capture the same node (a general rule and a more
 * specific one). Only the first capture seen for a node id is kept, so
 * whichever pattern the evaluator reports first wins. Ranges are not a
 * usable key: a parent and its only child share one.
 */

import type { Query, Tree } from "web-tree-sitter";
import type { Capture } from "./types.ts";

/** Keep the first capture per node id, preserving order. */
export function dedupeCaptures(captures: Iterable<Capture>): Capture[] {
  const seen = new Set<number>();
  const result: Capture[] = [];
  for (const capture of captures) {
    if (seen.has(capture.nodeId)) continue;
    seen.add(capture.nodeId);
    result.push(capture);
  }
  return result;
}

export class QueryRunner {
  private readonly _query: Query;

  constructor(query: Query) {
    this._query = query;
  }

  /**
   * Captures in the evaluator's order. That order is not guaranteed to be
   * sorted by offset; callers that need position order sort themselves.
   */
  computeCaptures(tree: Tree): Capture[] {
    const raw = this._query.captures(tree.rootNode);
    return dedupeCaptures(
      raw.map((capture) => ({
        nodeId: capture.node.id,
        range: { start: capture.node.startIndex, end: capture.node.endIndex },
        category: capture.name,
      })),
    );
  }
}
