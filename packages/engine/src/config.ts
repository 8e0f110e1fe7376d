/**
 * Config loader: reads and validates `.unsafe-ledger.yml`.
 * Shape is checked with Zod; unknown keys and bad values only warn.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { DEPENDENCY_KINDS, type DependencyKind } from "./graph/types.js";
import type { ScanMode } from "./scan/types.js";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export interface AuditConfig {
  /** "full" counts every reachable file; "entry-points" only checks crate roots. */
  mode: ScanMode;
  /** Dependency kinds to follow: "normal", "build", "dev" */
  dependencies: DependencyKind[];
  include_tests: boolean;
  features: string[];
  all_features: boolean;
  no_default_features: boolean;
  /** Target triple; host platform when absent */
  target?: string;
  /** Follow dependencies for every platform instead of one */
  all_targets: boolean;
  concurrency: number;
}

export const CONFIG_FILE = ".unsafe-ledger.yml";

export const DEFAULT_CONFIG: AuditConfig = {
  mode: "full",
  dependencies: ["normal"],
  include_tests: false,
  features: [],
  all_features: false,
  no_default_features: false,
  all_targets: false,
  concurrency: 8,
};

export const VALID_MODES = ["full", "entry-points"] as const;

const KNOWN_KEYS = [
  "mode",
  "dependencies",
  "include_tests",
  "features",
  "all_features",
  "no_default_features",
  "target",
  "all_targets",
  "concurrency",
] as const;

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const auditConfigSchema = z.object({
  mode: z.string().optional(),
  dependencies: z.array(z.string()).optional(),
  include_tests: z.boolean().optional(),
  features: z.array(z.string()).optional(),
  all_features: z.boolean().optional(),
  no_default_features: z.boolean().optional(),
  target: z.string().optional(),
  all_targets: z.boolean().optional(),
  concurrency: z.number().int().positive().optional(),
}).passthrough();

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

function isMode(value: string): value is ScanMode {
  return VALID_MODES.some((m) => m === value);
}

function isDependencyKind(value: string): value is DependencyKind {
  return DEPENDENCY_KINDS.some((k) => k === value);
}

export function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

function warn(msg: string): void {
  process.stderr.write(`[unsafe-ledger] Warning: ${msg}\n`);
}

function hintFor(input: string, valid: readonly string[]): string {
  const suggestion = didYouMean(input, valid);
  return suggestion ? ` — did you mean '${suggestion}'?` : "";
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/**
 * Load `.unsafe-ledger.yml` from the given directory.
 * Returns the parsed config merged with defaults, or null if no config file exists.
 */
export function loadConfig(dir: string): AuditConfig | null {
  const configPath = resolve(join(dir, CONFIG_FILE));

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    warn(`could not read ${CONFIG_FILE} — ${errorMessage(err)}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    warn(`could not parse ${CONFIG_FILE} — ${errorMessage(err)}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  if (!parsed || typeof parsed !== "object") return { ...DEFAULT_CONFIG };

  // Validate shape with Zod
  const result = auditConfigSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      warn(`config validation error — ${issue.path.join(".")}: ${issue.message}`);
    }
    return { ...DEFAULT_CONFIG };
  }

  const data = result.data;

  // Warn about unknown top-level keys
  const knownKeys = new Set<string>(KNOWN_KEYS);
  for (const key of Object.keys(data)) {
    if (!knownKeys.has(key)) {
      warn(`unknown config key '${key}'${hintFor(key, KNOWN_KEYS)}`);
    }
  }

  const config: AuditConfig = { ...DEFAULT_CONFIG };

  // mode
  if (data.mode !== undefined) {
    if (isMode(data.mode)) {
      config.mode = data.mode;
    } else {
      warn(`invalid mode '${data.mode}'${hintFor(data.mode, VALID_MODES)}. Using default '${DEFAULT_CONFIG.mode}'.`);
    }
  }

  // dependencies
  if (data.dependencies !== undefined) {
    const valid: DependencyKind[] = [];
    for (const d of data.dependencies) {
      if (isDependencyKind(d)) {
        valid.push(d);
      } else {
        warn(`unknown dependency kind '${d}'${hintFor(d, DEPENDENCY_KINDS)}`);
      }
    }
    if (valid.length > 0) config.dependencies = valid;
  }

  if (data.include_tests !== undefined) config.include_tests = data.include_tests;
  if (data.features !== undefined) config.features = data.features;
  if (data.all_features !== undefined) config.all_features = data.all_features;
  if (data.no_default_features !== undefined) config.no_default_features = data.no_default_features;
  if (data.target !== undefined) config.target = data.target;
  if (data.all_targets !== undefined) config.all_targets = data.all_targets;
  if (data.concurrency !== undefined) config.concurrency = data.concurrency;

  return config;
}
