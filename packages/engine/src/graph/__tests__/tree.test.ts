import { describe, it, expect } from "vitest";
import { buildGraph } from "../build-graph.js";
import { parseMetadata } from "../metadata.js";
import { walkTree } from "../tree.js";
import { emptyCounters } from "../../scan/counters.js";
import type { PackageMetrics } from "../../metrics/aggregate.js";
import { fixtureId, metadataDoc } from "../../__tests__/helpers/metadata.js";

function graph() {
  const doc = metadataDoc(
    [
      { name: "app", source: null, manifestDir: "/ws/app" },
      { name: "serde", manifestDir: "/reg/serde" },
      { name: "testutil", manifestDir: "/reg/testutil" },
      { name: "cc", manifestDir: "/reg/cc" },
      { name: "log", manifestDir: "/reg/log" },
    ],
    [
      { from: fixtureId("app"), to: fixtureId("testutil"), kind: "dev" },
      { from: fixtureId("app"), to: fixtureId("serde") },
      { from: fixtureId("app"), to: fixtureId("cc"), kind: "build" },
      { from: fixtureId("app"), to: fixtureId("log") },
      { from: fixtureId("testutil"), to: fixtureId("serde") },
    ],
    fixtureId("app"),
  );
  return buildGraph(parseMetadata(doc), { kinds: new Set(["normal", "build", "dev"] as const), target: { kind: "all" } });
}

function summary(rows: ReturnType<typeof walkTree>): string[] {
  return rows.map((r) => `${"  ".repeat(r.depth)}${r.package.id.name}${r.kind ? ` [${r.kind}]` : ""}${r.repeated ? " (*)" : ""}`);
}

describe("walkTree", () => {
  it("walks in preorder with children grouped by kind and sorted by key", () => {
    expect(summary(walkTree(graph()))).toEqual([
      "app",
      "  log [normal]",
      "  serde [normal]",
      "  cc [build]",
      "  testutil [dev]",
      "    serde [normal] (*)",
    ]);
  });

  it("walks the inverted view from the root's dependents", () => {
    const g = graph();
    const serde = g.indexOf(g.packages[2].key);
    expect(g.packages[2].id.name).toBe("serde");
    expect(serde).toBe(2);

    const inverted = g.invert();
    expect(inverted.neighbors(2).map((n) => inverted.packages[n.index].id.name)).toEqual(["app", "testutil"]);
    expect(summary(walkTree(inverted))).toEqual(["app"]);
  });

  it("attaches metrics by package key", () => {
    const g = graph();
    const metrics: PackageMetrics = { package: g.packages[0], counters: emptyCounters(), files: [] };
    const rows = walkTree(g, { metrics: new Map([[g.packages[0].key, metrics]]) });
    expect(rows[0].metrics).toBe(metrics);
    expect(rows[1].metrics).toBeUndefined();
  });
});
