import type { GraphView } from "../graph/types.js";
import type { AggregatedMetrics } from "../metrics/aggregate.js";
import { packageForbidsUnsafe } from "./full-report.js";
import type { QuickReport } from "./schemas.js";

/** One verdict per graph package: do all of its scanned crate roots forbid unsafe code? */
export function buildQuickReport(graph: GraphView, aggregated: AggregatedMetrics): QuickReport {
  const packages: Record<string, boolean> = {};
  for (const key of graph.packages.map((p) => p.key).sort()) {
    packages[key] = packageForbidsUnsafe(aggregated.metrics.get(key));
  }
  return {
    kind: "quick",
    packages,
    packagesWithoutMetrics: [...aggregated.withoutMetrics].sort(),
  };
}
