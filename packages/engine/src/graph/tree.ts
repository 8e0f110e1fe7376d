/**
 * Depth-first tree walk over a package graph, for tree-shaped presentation.
 */

import type { PackageMetrics } from "../metrics/aggregate.js";
import { DEPENDENCY_KINDS, type DependencyKind, type GraphView, type Package } from "./types.js";

export interface TreeRow {
  depth: number;
  package: Package;
  /** Kind of the edge that led here; absent for the root. */
  kind?: DependencyKind;
  metrics?: PackageMetrics;
  /** Already shown earlier in the walk; children are not repeated. */
  repeated: boolean;
}

export interface TreeWalkOptions {
  /** Expand every occurrence of a package instead of only the first. */
  all?: boolean;
  metrics?: ReadonlyMap<string, PackageMetrics>;
}

interface Frame {
  index: number;
  depth: number;
  kind?: DependencyKind;
}

/**
 * Rows in preorder from `graph.root`. Children are grouped by edge kind
 * (normal, build, dev) and sorted by package key within a group.
 */
export function walkTree(graph: GraphView, options: TreeWalkOptions = {}): TreeRow[] {
  const rows: TreeRow[] = [];
  const shown = new Set<number>();
  const stack: Frame[] = [{ index: graph.root, depth: 0 }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const pkg = graph.packages[frame.index];
    const repeated = shown.has(frame.index);
    shown.add(frame.index);

    rows.push({
      depth: frame.depth,
      package: pkg,
      kind: frame.kind,
      metrics: options.metrics?.get(pkg.key),
      repeated,
    });
    if (repeated && !options.all) continue;

    const children = graph
      .neighbors(frame.index)
      .sort((a, b) => {
        const byKind = DEPENDENCY_KINDS.indexOf(a.kind) - DEPENDENCY_KINDS.indexOf(b.kind);
        if (byKind !== 0) return byKind;
        const ka = graph.packages[a.index].key;
        const kb = graph.packages[b.index].key;
        return ka < kb ? -1 : ka > kb ? 1 : 0;
      });

    // Reverse push so the first child is popped first.
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ index: children[i].index, depth: frame.depth + 1, kind: children[i].kind });
    }
  }

  return rows;
}
