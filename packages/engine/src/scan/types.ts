import type { CounterBlock } from "./counters.js";

export type ScanMode = "full" | "entry-points";

export interface SourceFileMetrics {
  /** Canonical path. */
  path: string;
  /** Key of the package whose targets led to this file. */
  discoveredBy: string;
  /** Entry file of a compilation target (crate root). */
  entryPoint: boolean;
  counters: CounterBlock;
  /** The file opens with `#![forbid(unsafe_code)]` and never loosens it. */
  forbidsUnsafe: boolean;
}

export interface ParseFailure {
  path: string;
  packageKey: string;
  message: string;
  line?: number;
  column?: number;
}

export interface ScanWarning {
  path: string;
  packageKey: string;
  message: string;
}

export interface ScanContext {
  mode: ScanMode;
  /** Every scanned file in discovery order. */
  files: SourceFileMetrics[];
  /** Canonical paths that were read and parsed successfully. */
  scannedPaths: Set<string>;
  /** Package key -> canonical source root, for packages with local source. */
  sourceRoots: Map<string, string>;
  parseFailures: ParseFailure[];
  warnings: ScanWarning[];
}
