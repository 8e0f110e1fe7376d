// ---------------------------------------------------------------------------
// @unsafe-ledger/engine
//
// Audits a Rust package's dependency closure for `unsafe` usage.
// ---------------------------------------------------------------------------

// Pipeline
export { runAudit, tripleFromCfg, type AuditParams, type AuditResult } from "./audit.js";

// Config
export { loadConfig, DEFAULT_CONFIG, CONFIG_FILE, VALID_MODES, type AuditConfig } from "./config.js";

// Errors
export {
  AuditError,
  GraphResolutionError,
  BuildResolutionError,
  ParseError,
  SerializationError,
  type AuditErrorCode,
} from "./errors.js";

// Graph
export { buildGraph, PackageGraph, type BuildGraphOptions } from "./graph/build-graph.js";
export { parseMetadata, CargoMetadataSchema, type CargoMetadata } from "./graph/metadata.js";
export { parseCfgExpr, evaluateCfg, cfgSetFromLines, platformMatches, type CfgExpr, type CfgSet } from "./graph/cfg-expr.js";
export { packageKey, parseSource, formatSource } from "./graph/package-id.js";
export { walkTree, type TreeRow, type TreeWalkOptions } from "./graph/tree.js";
export {
  DEPENDENCY_KINDS,
  type DependencyKind,
  type DependencyEdge,
  type GraphSelection,
  type GraphView,
  type Package,
  type PackageId,
  type PackageSource,
  type TargetFilter,
} from "./graph/types.js";

// Build
export type { BuildOrchestrator, BuildSelection, CompiledUnit, FeatureSelection } from "./build/orchestrator.js";
export { CargoOrchestrator, type CargoOrchestratorOptions } from "./build/cargo.js";
export { resolveCompiledFiles } from "./build/compiled-files.js";
export { parseDepInfo } from "./build/dep-info.js";

// Scanning
export { scanSource, scanEntryPoint, type FileScan, type ModuleDecl, type IncludeRef } from "./parsers/unsafe-visitor.js";
export { tokenize, type Token, type TokenTree } from "./parsers/lexer.js";
export { scanPackages, type ScanOptions } from "./scan/scanner.js";
export {
  COUNTER_CATEGORIES,
  emptyCounters,
  addCounters,
  sumCounters,
  totals,
  unsafeRatio,
  type Count,
  type CounterBlock,
  type CounterCategory,
} from "./scan/counters.js";
export type { ScanContext, ScanMode, SourceFileMetrics, ParseFailure, ScanWarning } from "./scan/types.js";

// Metrics & reports
export { aggregateMetrics, type AggregatedMetrics, type PackageMetrics } from "./metrics/aggregate.js";
export { buildFullReport } from "./report/full-report.js";
export { buildQuickReport } from "./report/quick-report.js";
export { serializeReport, parseReport } from "./report/serialize.js";
export {
  ReportSchema,
  FullReportSchema,
  QuickReportSchema,
  type Report,
  type FullReport,
  type FullReportEntry,
  type QuickReport,
} from "./report/schemas.js";

// Logging
export { logger } from "./logger.js";
