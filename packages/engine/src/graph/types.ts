/**
 * Shared types for the package dependency graph.
 */

export const DEPENDENCY_KINDS = ["normal", "build", "dev"] as const;
export type DependencyKind = (typeof DEPENDENCY_KINDS)[number];

/** Where a package's source came from. */
export type PackageSource =
  | { kind: "registry"; url: string }
  | { kind: "git"; url: string; rev?: string }
  | { kind: "path"; path: string };

export interface PackageId {
  name: string;
  version: string;
  source: PackageSource;
}

/** One compilation target of a package (library, binary, build script...). */
export interface BuildTarget {
  name: string;
  kinds: string[];
  /** Entry file of the target. */
  srcPath: string;
}

export interface Package {
  id: PackageId;
  /** Stable string form of `id`, used as map and report key. */
  key: string;
  manifestPath: string;
  /** Absent when the package has no source on local disk. */
  sourceRoot?: string;
  targets: BuildTarget[];
}

export interface DependencyEdge {
  from: number;
  to: number;
  kind: DependencyKind;
}

export interface Neighbor {
  index: number;
  kind: DependencyKind;
}

/**
 * Read-only view over a package graph. The canonical graph and its inverted
 * view both implement it; neither ever mutates the underlying arrays.
 */
export interface GraphView {
  readonly root: number;
  readonly packages: readonly Package[];
  readonly inverted: boolean;
  edges(): DependencyEdge[];
  neighbors(index: number): Neighbor[];
  invert(): GraphView;
  indexOf(key: string): number | undefined;
}

/** Platform used to evaluate `[target.'cfg(..)'.dependencies]` conditions. */
export type TargetFilter =
  | { kind: "all" }
  | { kind: "platform"; triple: string; cfg: string[] };

export interface GraphSelection {
  /** Edge kinds to keep; edges of other kinds are pruned. */
  kinds: ReadonlySet<DependencyKind>;
  target: TargetFilter;
  /** Package name, `name@version`, or metadata id. Defaults to `resolve.root`. */
  root?: string;
}
