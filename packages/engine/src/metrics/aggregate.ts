/**
 * Per-package aggregation of scanned file metrics.
 *
 * A file belongs to the package whose canonical source root is the longest
 * prefix of its path (on a path-segment boundary). Files outside every root
 * stay with the package that discovered them.
 */

import { sep } from "node:path";
import type { GraphView, Package } from "../graph/types.js";
import { sumCounters, type CounterBlock } from "../scan/counters.js";
import type { ScanContext, SourceFileMetrics } from "../scan/types.js";

export interface PackageMetrics {
  package: Package;
  counters: CounterBlock;
  /** Owned files in scan order. */
  files: SourceFileMetrics[];
}

export interface AggregatedMetrics {
  /** Package key -> metrics, for packages that own at least one file. */
  metrics: Map<string, PackageMetrics>;
  /** Keys of graph packages that own no scanned file. */
  withoutMetrics: Set<string>;
}

function isUnder(path: string, root: string): boolean {
  if (path === root) return true;
  const prefix = root.endsWith(sep) ? root : root + sep;
  return path.startsWith(prefix);
}

/** Key of the package owning `file`, by longest source-root prefix. */
export function owningPackage(file: SourceFileMetrics, sourceRoots: ReadonlyMap<string, string>): string {
  let best: string | undefined;
  let bestLength = -1;
  for (const [key, root] of sourceRoots) {
    if (root.length > bestLength && isUnder(file.path, root)) {
      best = key;
      bestLength = root.length;
    }
  }
  return best ?? file.discoveredBy;
}

export function aggregateMetrics(graph: GraphView, scan: ScanContext): AggregatedMetrics {
  const owned = new Map<string, SourceFileMetrics[]>();
  for (const file of scan.files) {
    const key = owningPackage(file, scan.sourceRoots);
    const list = owned.get(key);
    if (list) list.push(file);
    else owned.set(key, [file]);
  }

  const metrics = new Map<string, PackageMetrics>();
  const withoutMetrics = new Set<string>();

  for (const pkg of graph.packages) {
    const files = owned.get(pkg.key) ?? [];
    if (files.length === 0) {
      withoutMetrics.add(pkg.key);
      continue;
    }
    metrics.set(pkg.key, { package: pkg, counters: sumCounters(files.map((f) => f.counters)), files });
  }

  return { metrics, withoutMetrics };
}
