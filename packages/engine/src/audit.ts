/**
 * Audit pipeline.
 *
 * Pipeline:
 *   1. Load and validate the metadata document
 *   2. Read the target platform's cfg set (unless every platform is selected)
 *   3. Build the pruned dependency graph
 *   4. Full mode: resolve the compiled file set before anything is scanned
 *   5. Scan, aggregate, build the report matching the mode
 *
 * Graph or build resolution failures end the run; no partial report is made.
 */

import { CargoOrchestrator } from "./build/cargo.js";
import { resolveCompiledFiles } from "./build/compiled-files.js";
import type { BuildOrchestrator, BuildSelection } from "./build/orchestrator.js";
import { DEFAULT_CONFIG, loadConfig, type AuditConfig } from "./config.js";
import { buildGraph, type PackageGraph } from "./graph/build-graph.js";
import { parseMetadata } from "./graph/metadata.js";
import type { DependencyKind, TargetFilter } from "./graph/types.js";
import { logger } from "./logger.js";
import { aggregateMetrics, type AggregatedMetrics } from "./metrics/aggregate.js";
import { buildFullReport } from "./report/full-report.js";
import { buildQuickReport } from "./report/quick-report.js";
import type { Report } from "./report/schemas.js";
import { scanPackages } from "./scan/scanner.js";
import type { ScanContext, ScanMode } from "./scan/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AuditParams {
  /** Directory holding the manifest and `.unsafe-ledger.yml`. */
  projectDir: string;
  manifestPath?: string;
  /** Root package spec: name, `name@version` or metadata id. */
  package?: string;
  mode?: ScanMode;
  dependencies?: DependencyKind[];
  includeTests?: boolean;
  features?: string[];
  allFeatures?: boolean;
  noDefaultFeatures?: boolean;
  target?: string;
  allTargets?: boolean;
  concurrency?: number;
  /** Defaults to a `CargoOrchestrator`. */
  orchestrator?: BuildOrchestrator;
  /** Read `.unsafe-ledger.yml` from `projectDir`. Default: true. */
  useConfigFile?: boolean;
  /** Decides whether a package's manifest directory is on disk. */
  hasLocalSource?: (dir: string) => boolean;
}

export interface AuditResult {
  graph: PackageGraph;
  scan: ScanContext;
  aggregated: AggregatedMetrics;
  /** Present in full mode. */
  compiled?: ReadonlySet<string>;
  report: Report;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const OS_TRIPLE_NAMES: Record<string, string> = { macos: "darwin" };

/**
 * Best-effort triple for the host, assembled from its cfg set, e.g.
 * `target_arch="x86_64"` + `target_vendor="unknown"` + `target_os="linux"` + `target_env="gnu"`.
 */
export function tripleFromCfg(lines: string[]): string {
  const values = new Map<string, string>();
  for (const line of lines) {
    const m = /^(\w+)="(.*)"$/.exec(line);
    if (m) values.set(m[1], m[2]);
  }
  const os = values.get("target_os") ?? "unknown";
  const parts = [
    values.get("target_arch") ?? "unknown",
    values.get("target_vendor") ?? "unknown",
    OS_TRIPLE_NAMES[os] ?? os,
  ];
  const env = values.get("target_env");
  if (env) parts.push(env);
  return parts.join("-");
}

function mergeConfig(params: AuditParams): AuditConfig {
  const file = params.useConfigFile === false ? null : loadConfig(params.projectDir);
  const base = file ?? DEFAULT_CONFIG;
  return {
    mode: params.mode ?? base.mode,
    dependencies: params.dependencies ?? base.dependencies,
    include_tests: params.includeTests ?? base.include_tests,
    features: params.features ?? base.features,
    all_features: params.allFeatures ?? base.all_features,
    no_default_features: params.noDefaultFeatures ?? base.no_default_features,
    target: params.target ?? base.target,
    all_targets: params.allTargets ?? base.all_targets,
    concurrency: params.concurrency ?? base.concurrency,
  };
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export async function runAudit(params: AuditParams): Promise<AuditResult> {
  const config = mergeConfig(params);
  const orchestrator = params.orchestrator ?? new CargoOrchestrator();

  const selection: BuildSelection = {
    cwd: params.projectDir,
    manifestPath: params.manifestPath,
    package: params.package,
    target: config.target,
    includeTests: config.include_tests,
    features: config.features,
    allFeatures: config.all_features,
    noDefaultFeatures: config.no_default_features,
  };

  // 1. Metadata
  const metadata = parseMetadata(await orchestrator.metadata(selection));

  // 2. Platform
  let target: TargetFilter = { kind: "all" };
  if (!config.all_targets) {
    const cfg = await orchestrator.targetCfg(config.target);
    target = { kind: "platform", triple: config.target ?? tripleFromCfg(cfg), cfg };
  }

  // 3. Graph
  const graph = buildGraph(
    metadata,
    { kinds: new Set(config.dependencies), target, root: params.package },
    { hasLocalSource: params.hasLocalSource },
  );
  logger.info(`Dependency graph: ${graph.packages.length} packages, ${graph.edges().length} edges`);

  // 4. Compiled file set, frozen before scanning
  const compiled = config.mode === "full"
    ? await resolveCompiledFiles(orchestrator, selection, metadata.workspace_root)
    : undefined;

  // 5. Scan, aggregate, report
  const scan = await scanPackages(graph, {
    mode: config.mode,
    includeTests: config.include_tests,
    concurrency: config.concurrency,
  });
  const aggregated = aggregateMetrics(graph, scan);
  const report = config.mode === "full"
    ? buildFullReport(graph, aggregated, scan, compiled)
    : buildQuickReport(graph, aggregated);

  logger.info(
    `Scanned ${scan.files.length} files; ${aggregated.withoutMetrics.size} packages without metrics, ` +
    `${scan.parseFailures.length} parse failures`,
  );

  return { graph, scan, aggregated, compiled, report };
}
