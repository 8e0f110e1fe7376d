/**
 * Dependency graph builder.
 *
 * Turns validated cargo metadata into a pruned package graph: only packages
 * reachable from the root through edges of a selected kind (and a matching
 * platform) are kept. Excluded edges are dropped, not hidden.
 */

import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { GraphResolutionError } from "../errors.js";
import { cfgSetFromLines, platformMatches, type CfgSet } from "./cfg-expr.js";
import type { CargoMetadata, MetadataPackage } from "./metadata.js";
import { packageKey, parseSource } from "./package-id.js";
import type {
  DependencyEdge,
  DependencyKind,
  GraphSelection,
  GraphView,
  Neighbor,
  Package,
  TargetFilter,
} from "./types.js";

export interface BuildGraphOptions {
  /** Decides whether a manifest directory is available on disk. */
  hasLocalSource?: (dir: string) => boolean;
}

// ---------------------------------------------------------------------------
// Graph
// ---------------------------------------------------------------------------

/**
 * Adjacency list over integer node indices. `outgoing[i]` and `incoming[i]`
 * hold edge indices, so the inverted view is a swap rather than a copy.
 */
export class PackageGraph implements GraphView {
  readonly inverted = false;
  private readonly outgoing: number[][];
  private readonly incoming: number[][];
  private readonly byKey: Map<string, number>;

  constructor(
    readonly packages: readonly Package[],
    private readonly edgeList: readonly DependencyEdge[],
    readonly root: number,
  ) {
    this.outgoing = packages.map(() => []);
    this.incoming = packages.map(() => []);
    edgeList.forEach((e, i) => {
      this.outgoing[e.from].push(i);
      this.incoming[e.to].push(i);
    });
    this.byKey = new Map(packages.map((p, i) => [p.key, i]));
  }

  edges(): DependencyEdge[] {
    return this.edgeList.map((e) => ({ ...e }));
  }

  neighbors(index: number): Neighbor[] {
    return this.outgoing[index].map((ei) => ({ index: this.edgeList[ei].to, kind: this.edgeList[ei].kind }));
  }

  /** Used by the inverted view. */
  dependents(index: number): Neighbor[] {
    return this.incoming[index].map((ei) => ({ index: this.edgeList[ei].from, kind: this.edgeList[ei].kind }));
  }

  indexOf(key: string): number | undefined {
    return this.byKey.get(key);
  }

  invert(): GraphView {
    return new InvertedGraphView(this);
  }
}

class InvertedGraphView implements GraphView {
  readonly inverted = true;

  constructor(private readonly graph: PackageGraph) {}

  get root(): number {
    return this.graph.root;
  }

  get packages(): readonly Package[] {
    return this.graph.packages;
  }

  edges(): DependencyEdge[] {
    return this.graph.edges().map((e) => ({ from: e.to, to: e.from, kind: e.kind }));
  }

  neighbors(index: number): Neighbor[] {
    return this.graph.dependents(index);
  }

  indexOf(key: string): number | undefined {
    return this.graph.indexOf(key);
  }

  invert(): GraphView {
    return this.graph;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toPackage(meta: MetadataPackage, hasLocalSource: (dir: string) => boolean): Package {
  const id = {
    name: meta.name,
    version: meta.version,
    source: parseSource(meta.source, meta.manifest_path),
  };
  const dir = dirname(meta.manifest_path);
  return {
    id,
    key: packageKey(id),
    manifestPath: meta.manifest_path,
    sourceRoot: hasLocalSource(dir) ? dir : undefined,
    targets: meta.targets.map((t) => ({ name: t.name, kinds: t.kind, srcPath: t.src_path })),
  };
}

function findRoot(metadata: CargoMetadata, spec: string | undefined): string {
  if (spec === undefined) {
    const root = metadata.resolve?.root ?? null;
    if (root === null) {
      throw new GraphResolutionError(
        "No root package: the manifest is a virtual workspace; select a package explicitly",
      );
    }
    return root;
  }

  const byId = metadata.packages.find((p) => p.id === spec);
  if (byId) return byId.id;

  const at = spec.lastIndexOf("@");
  const matches = metadata.packages.filter((p) =>
    at > 0 ? p.name === spec.slice(0, at) && p.version === spec.slice(at + 1) : p.name === spec,
  );
  if (matches.length === 0) {
    throw new GraphResolutionError(`Root package '${spec}' not found in metadata`);
  }
  if (matches.length > 1) {
    const versions = matches.map((m) => `${m.name}@${m.version}`).join(", ");
    throw new GraphResolutionError(`Package spec '${spec}' is ambiguous: ${versions}`);
  }
  return matches[0].id;
}

function edgeAllowed(
  kind: DependencyKind,
  condition: string | null,
  selection: GraphSelection,
  cfg: CfgSet | null,
): boolean {
  if (!selection.kinds.has(kind)) return false;
  if (condition === null) return true;
  const target: TargetFilter = selection.target;
  if (target.kind === "all" || cfg === null) return true;
  return platformMatches(condition, target.triple, cfg);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build the pruned dependency graph rooted at the selected package.
 *
 * Nodes are numbered in breadth-first discovery order from the root, which
 * keeps indices stable for identical metadata.
 */
export function buildGraph(
  metadata: CargoMetadata,
  selection: GraphSelection,
  options: BuildGraphOptions = {},
): PackageGraph {
  const hasLocalSource = options.hasLocalSource ?? existsSync;

  if (!metadata.resolve) {
    throw new GraphResolutionError("Cargo metadata has no 'resolve' section (was --no-deps used?)");
  }

  const packagesById = new Map(metadata.packages.map((p) => [p.id, p]));
  const nodesById = new Map(metadata.resolve.nodes.map((n) => [n.id, n]));

  for (const node of metadata.resolve.nodes) {
    if (!packagesById.has(node.id)) {
      throw new GraphResolutionError(`Resolve node '${node.id}' has no package entry`);
    }
    for (const dep of node.deps) {
      if (!packagesById.has(dep.pkg) || !nodesById.has(dep.pkg)) {
        throw new GraphResolutionError(`Edge ${node.id} -> ${dep.pkg} references an unknown package`);
      }
    }
  }

  const rootId = findRoot(metadata, selection.root);
  if (!nodesById.has(rootId)) {
    throw new GraphResolutionError(`Root package '${rootId}' is not part of the resolved graph`);
  }

  const cfg = selection.target.kind === "platform" ? cfgSetFromLines(selection.target.cfg) : null;

  const indexById = new Map<string, number>();
  const packages: Package[] = [];
  const edges: DependencyEdge[] = [];
  const seenEdges = new Set<string>();
  const queue: string[] = [];

  const visit = (id: string): number => {
    const existing = indexById.get(id);
    if (existing !== undefined) return existing;
    const meta = packagesById.get(id);
    if (!meta) throw new GraphResolutionError(`Unknown package '${id}'`);
    const index = packages.length;
    packages.push(toPackage(meta, hasLocalSource));
    indexById.set(id, index);
    queue.push(id);
    return index;
  };

  visit(rootId);

  for (let head = 0; head < queue.length; head++) {
    const id = queue[head];
    const from = indexById.get(id);
    const node = nodesById.get(id);
    if (from === undefined || !node) continue;

    for (const dep of node.deps) {
      for (const info of dep.dep_kinds) {
        const kind: DependencyKind = info.kind ?? "normal";
        if (!edgeAllowed(kind, info.target, selection, cfg)) continue;
        const to = visit(dep.pkg);
        const edgeKey = `${from}:${to}:${kind}`;
        if (seenEdges.has(edgeKey)) continue;
        seenEdges.add(edgeKey);
        edges.push({ from, to, kind });
      }
    }
  }

  return new PackageGraph(packages, edges, 0);
}
