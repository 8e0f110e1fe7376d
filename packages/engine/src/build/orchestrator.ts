/**
 * Build orchestrator interface.
 *
 * The audit only needs four things from the build tool: the resolved
 * metadata document, the units a check build compiles, the dep-info file of
 * each unit, and the cfg set of the target platform.
 */

export interface FeatureSelection {
  features: string[];
  allFeatures: boolean;
  noDefaultFeatures: boolean;
}

export interface BuildSelection extends FeatureSelection {
  /** Directory the build tool runs in. */
  cwd: string;
  manifestPath?: string;
  /** Package spec to build instead of the default members. */
  package?: string;
  /** Target triple; host when absent. */
  target?: string;
  /** Also build tests, benches and examples. */
  includeTests: boolean;
}

/** One compiled unit reported by a check build. */
export interface CompiledUnit {
  packageId: string;
  target: string;
  depInfoPath: string;
}

export interface BuildOrchestrator {
  /** Raw metadata document; validated by the caller. */
  metadata(selection: BuildSelection): Promise<unknown>;
  checkBuild(selection: BuildSelection): Promise<CompiledUnit[]>;
  readDepInfo(path: string): Promise<string>;
  /** `key` / `key="value"` lines of the target's cfg set. */
  targetCfg(target?: string): Promise<string[]>;
}
