/**
 * Package-scoped source scanner.
 *
 * Pipeline per batch:
 *   1. Canonicalize the batch's paths in parallel
 *   2. Dedup against the visited set, in batch order (no await in between)
 *   3. Read and parse the accepted files in parallel
 *   4. Append results and newly discovered child files, in batch order
 *
 * The worklist only grows at the tail, so the arena order depends on the
 * graph and the sources alone, never on I/O timing.
 */

import { readFile, realpath, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { ParseError, errorMessage } from "../errors.js";
import type { GraphView, Package } from "../graph/types.js";
import { logger } from "../logger.js";
import { scanEntryPoint, scanSource } from "../parsers/unsafe-visitor.js";
import { emptyCounters } from "./counters.js";
import { includePath, moduleCandidates, type ModuleCandidate } from "./module-path.js";
import type { ParseFailure, ScanContext, ScanMode, ScanWarning, SourceFileMetrics } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ScanOptions {
  mode: ScanMode;
  /** Also scan test, bench and example targets, `#[test]` fns and `#[cfg(test)]` modules. */
  includeTests?: boolean;
  /** Files processed in parallel. Defaults to UNSAFE_LEDGER_CONCURRENCY env var or 8. */
  concurrency?: number;
}

interface FileTask {
  path: string;
  packageKey: string;
  entryPoint: boolean;
  /** Directory child modules resolve against; undefined means the file's own directory. */
  moduleDir?: string;
}

type FileOutcome =
  | { ok: true; metrics: SourceFileMetrics; children: FileTask[]; warnings: ScanWarning[] }
  | { ok: false; failure: ParseFailure };

/** Target kinds whose entry files are always scanned. */
export const ENTRY_TARGET_KINDS: readonly string[] = [
  "lib", "rlib", "dylib", "cdylib", "staticlib", "proc-macro", "bin", "custom-build",
];

/** Scanned only when tests are included. */
export const TEST_TARGET_KINDS: readonly string[] = ["test", "bench", "example"];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function defaultConcurrency(): number {
  const parsed = parseInt(process.env.UNSAFE_LEDGER_CONCURRENCY ?? "8", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 8;
}

async function canonicalize(path: string): Promise<string | Error> {
  try {
    return await realpath(path);
  } catch (err) {
    return err instanceof Error ? err : new Error(String(err));
  }
}

async function isFile(path: string): Promise<boolean> {
  return stat(path).then((s) => s.isFile(), () => false);
}

async function firstExisting(candidates: ModuleCandidate[]): Promise<ModuleCandidate | undefined> {
  for (const candidate of candidates) {
    if (await isFile(candidate.path)) return candidate;
  }
  return undefined;
}

function entryTasks(pkg: Package, includeTests: boolean): FileTask[] {
  const kinds = includeTests ? [...ENTRY_TARGET_KINDS, ...TEST_TARGET_KINDS] : ENTRY_TARGET_KINDS;
  return pkg.targets
    .filter((t) => t.kinds.some((k) => kinds.includes(k)))
    .map((t) => ({ path: t.srcPath, packageKey: pkg.key, entryPoint: true }));
}

async function processFile(task: FileTask, path: string, options: ScanOptions): Promise<FileOutcome> {
  let source: string;
  try {
    source = await readFile(path, "utf-8");
  } catch (err) {
    return { ok: false, failure: { path, packageKey: task.packageKey, message: `cannot read file: ${errorMessage(err)}` } };
  }

  try {
    if (options.mode === "entry-points") {
      const forbidsUnsafe = scanEntryPoint(source, path);
      return {
        ok: true,
        metrics: { path, discoveredBy: task.packageKey, entryPoint: task.entryPoint, counters: emptyCounters(), forbidsUnsafe },
        children: [],
        warnings: [],
      };
    }

    const scan = scanSource(source, path, { includeTests: options.includeTests ?? false });
    const moduleDir = task.moduleDir ?? dirname(path);
    const children: FileTask[] = [];
    const warnings: ScanWarning[] = [];

    for (const decl of scan.modules) {
      const candidates = moduleCandidates(decl, path, moduleDir);
      const found = await firstExisting(candidates);
      if (found) {
        children.push({ path: found.path, packageKey: task.packageKey, entryPoint: false, moduleDir: found.moduleDir });
      } else {
        const tried = candidates.map((c) => c.path).join(", ");
        warnings.push({
          path,
          packageKey: task.packageKey,
          message: `module '${decl.name}' declared at line ${decl.line} not found (tried ${tried})`,
        });
      }
    }

    for (const ref of scan.includes) {
      const target = includePath(ref, path);
      if (target === undefined) {
        warnings.push({
          path,
          packageKey: task.packageKey,
          message: `untraceable include! at line ${ref.line} was not scanned`,
        });
      } else {
        children.push({ path: target, packageKey: task.packageKey, entryPoint: false, moduleDir });
      }
    }

    return {
      ok: true,
      metrics: {
        path,
        discoveredBy: task.packageKey,
        entryPoint: task.entryPoint,
        counters: scan.counters,
        forbidsUnsafe: scan.forbidsUnsafe,
      },
      children,
      warnings,
    };
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    return {
      ok: false,
      failure: { path, packageKey: task.packageKey, message: err.message, line: err.line, column: err.column },
    };
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Scan every package in `graph` that has local source.
 *
 * Read and parse failures are recorded in `parseFailures` and never stop
 * the scan; missing modules and untraceable includes become warnings.
 */
export async function scanPackages(graph: GraphView, options: ScanOptions): Promise<ScanContext> {
  const concurrency = Math.max(1, options.concurrency ?? defaultConcurrency());
  const includeTests = options.includeTests ?? false;

  const ctx: ScanContext = {
    mode: options.mode,
    files: [],
    scannedPaths: new Set(),
    sourceRoots: new Map(),
    parseFailures: [],
    warnings: [],
  };

  const local = graph.packages.flatMap((pkg) =>
    pkg.sourceRoot !== undefined ? [{ pkg, sourceRoot: pkg.sourceRoot }] : [],
  );
  const roots = await Promise.all(local.map((l) => canonicalize(l.sourceRoot)));

  const queue: FileTask[] = [];
  local.forEach(({ pkg, sourceRoot }, i) => {
    const root = roots[i];
    if (root instanceof Error) {
      logger.warn(`Skipping ${pkg.key}: source root unavailable (${root.message})`);
      ctx.warnings.push({ path: sourceRoot, packageKey: pkg.key, message: `source root unavailable: ${root.message}` });
      return;
    }
    ctx.sourceRoots.set(pkg.key, root);
    queue.push(...entryTasks(pkg, includeTests));
  });

  const recordFailure = (failure: ParseFailure): void => {
    logger.warn(`Skipping ${failure.path}: ${failure.message}`);
    ctx.parseFailures.push(failure);
  };

  const visited = new Set<string>();

  for (let head = 0; head < queue.length; ) {
    const batch = queue.slice(head, head + concurrency);
    head += batch.length;

    const canonical = await Promise.all(batch.map((t) => canonicalize(t.path)));

    const accepted: Array<{ task: FileTask; path: string }> = [];
    batch.forEach((task, i) => {
      const path = canonical[i];
      if (path instanceof Error) {
        recordFailure({ path: task.path, packageKey: task.packageKey, message: `cannot read file: ${path.message}` });
        return;
      }
      if (visited.has(path)) return;
      visited.add(path);
      accepted.push({ task, path });
    });

    const outcomes = await Promise.all(accepted.map(({ task, path }) => processFile(task, path, options)));

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        recordFailure(outcome.failure);
        continue;
      }
      const { metrics } = outcome;
      ctx.files.push(metrics);
      ctx.scannedPaths.add(metrics.path);
      for (const warning of outcome.warnings) {
        logger.warn(`${warning.path}: ${warning.message}`);
        ctx.warnings.push(warning);
      }
      queue.push(...outcome.children);
    }
  }

  logger.debug(`Scanned ${ctx.files.length} files across ${ctx.sourceRoots.size} packages (${options.mode} mode)`);
  return ctx;
}
