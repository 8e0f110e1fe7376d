/**
 * Full report: per-package used/unused counters plus coverage diagnostics.
 */

import type { GraphView } from "../graph/types.js";
import type { AggregatedMetrics, PackageMetrics } from "../metrics/aggregate.js";
import { emptyCounters, sumCounters, unsafeRatio } from "../scan/counters.js";
import type { ScanContext } from "../scan/types.js";
import type { FullReport, FullReportEntry, ReportParseFailure } from "./schemas.js";

/**
 * True when the package owns target entry files and each of them forbids
 * unsafe code. Child modules inherit the lint level of their crate root.
 */
export function packageForbidsUnsafe(metrics: PackageMetrics | undefined): boolean {
  if (metrics === undefined) return false;
  const entries = metrics.files.filter((f) => f.entryPoint);
  return entries.length > 0 && entries.every((f) => f.forbidsUnsafe);
}

/** Compiled files that no scan reached, sorted. */
export function usedButNotScanned(compiled: ReadonlySet<string>, scanned: ReadonlySet<string>): string[] {
  return [...compiled].filter((p) => !scanned.has(p)).sort();
}

function entryFor(metrics: PackageMetrics, compiled: ReadonlySet<string> | undefined): FullReportEntry {
  const isUsed = (path: string): boolean => compiled === undefined || compiled.has(path);
  const used = sumCounters(metrics.files.filter((f) => isUsed(f.path)).map((f) => f.counters));
  const unused = compiled === undefined
    ? emptyCounters()
    : sumCounters(metrics.files.filter((f) => !isUsed(f.path)).map((f) => f.counters));
  return {
    package: metrics.package.id,
    used,
    unused,
    forbidsUnsafe: packageForbidsUnsafe(metrics),
    unsafeRatio: unsafeRatio(used),
  };
}

/**
 * Build the full report. Without a compiled set every scanned file counts as
 * used and `usedButNotScannedFiles` is empty.
 */
export function buildFullReport(
  graph: GraphView,
  aggregated: AggregatedMetrics,
  scan: ScanContext,
  compiled?: ReadonlySet<string>,
): FullReport {
  const packages: Record<string, FullReportEntry> = {};
  const keys = graph.packages.map((p) => p.key).sort();
  for (const key of keys) {
    const metrics = aggregated.metrics.get(key);
    if (metrics) packages[key] = entryFor(metrics, compiled);
  }

  const parseFailures: ReportParseFailure[] = scan.parseFailures
    .map((f) => ({ path: f.path, message: f.message }))
    .sort((a, b) => (a.path === b.path ? a.message.localeCompare(b.message) : a.path < b.path ? -1 : 1));

  return {
    kind: "full",
    packages,
    packagesWithoutMetrics: [...aggregated.withoutMetrics].sort(),
    usedButNotScannedFiles: compiled === undefined ? [] : usedButNotScanned(compiled, scan.scannedPaths),
    parseFailures,
  };
}
