import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { runAudit, tripleFromCfg } from "../audit.js";
import type { BuildOrchestrator, CompiledUnit } from "../build/orchestrator.js";
import { GraphResolutionError } from "../errors.js";
import { REGISTRY, fixtureId, metadataDoc } from "./helpers/metadata.js";

let root: string;

const HOST_CFG = ['target_arch="x86_64"', 'target_vendor="unknown"', 'target_os="linux"', 'target_env="gnu"', "unix"];

function write(rel: string, content: string): void {
  const path = join(root, rel);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

function workspace(rootId: string | null = fixtureId("app")): Record<string, unknown> {
  return metadataDoc(
    [
      { name: "app", source: null, manifestDir: join(root, "app") },
      { name: "dep", manifestDir: join(root, "registry/dep-1.0.0") },
      { name: "remote", manifestDir: join(root, "registry/remote-1.0.0") },
      { name: "devonly", manifestDir: join(root, "registry/devonly-1.0.0") },
      { name: "winonly", manifestDir: join(root, "registry/winonly-1.0.0") },
    ],
    [
      { from: fixtureId("app"), to: fixtureId("dep") },
      { from: fixtureId("app"), to: fixtureId("remote") },
      { from: fixtureId("app"), to: fixtureId("devonly"), kind: "dev" },
      { from: fixtureId("app"), to: fixtureId("winonly"), target: "cfg(windows)" },
    ],
    rootId,
    root,
  );
}

function fakeOrchestrator(doc: Record<string, unknown>, units: CompiledUnit[], depInfo: Record<string, string>): BuildOrchestrator {
  return {
    metadata: vi.fn(async () => doc),
    checkBuild: vi.fn(async () => units),
    readDepInfo: vi.fn(async (path: string) => {
      const content = depInfo[path];
      if (content === undefined) throw new Error(`ENOENT: ${path}`);
      return content;
    }),
    targetCfg: vi.fn(async () => HOST_CFG),
  };
}

function buildOutputs(): { units: CompiledUnit[]; depInfo: Record<string, string> } {
  const deps = join(root, "target/debug/deps");
  return {
    units: [
      { packageId: fixtureId("app"), target: "app", depInfoPath: join(deps, "app-1.d") },
      { packageId: fixtureId("dep"), target: "dep", depInfoPath: join(deps, "dep-2.d") },
    ],
    depInfo: {
      [join(deps, "app-1.d")]: `${join(deps, "libapp-1.rmeta")}: ${join(root, "app/src/lib.rs")} ${join(root, "target/out/gen.rs")}\n`,
      [join(deps, "dep-2.d")]: `${join(deps, "libdep-2.rmeta")}: ${join(root, "registry/dep-1.0.0/src/lib.rs")}\n`,
    },
  };
}

const APP_KEY = (): string => `app 1.0.0 (path+file://${join(root, "app")})`;
const DEP_KEY = `dep 1.0.0 (${REGISTRY})`;
const REMOTE_KEY = `remote 1.0.0 (${REGISTRY})`;

beforeEach(() => {
  root = realpathSync(mkdtempSync(join(tmpdir(), "unsafe-ledger-audit-")));
  write("app/src/lib.rs", "#![forbid(unsafe_code)]\nmod util;\npub fn run() {}\n");
  write("app/src/util.rs", "pub fn helper() {}\n");
  write("registry/dep-1.0.0/src/lib.rs", "pub fn raw() {\n    unsafe { g(); }\n}\n");
  write("registry/devonly-1.0.0/src/lib.rs", "pub fn d() {}\n");
  write("registry/winonly-1.0.0/src/lib.rs", "pub fn w() {}\n");
  vi.spyOn(process.stderr, "write").mockImplementation(() => true);
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("runAudit (full mode)", () => {
  it("builds the full report from the pruned graph and compiled set", async () => {
    const { units, depInfo } = buildOutputs();
    const orchestrator = fakeOrchestrator(workspace(), units, depInfo);

    const result = await runAudit({ projectDir: root, orchestrator, useConfigFile: false });

    expect(result.graph.packages.map((p) => p.id.name)).toEqual(["app", "dep", "remote"]);
    expect(orchestrator.targetCfg).toHaveBeenCalledWith(undefined);

    const report = result.report;
    if (report.kind !== "full") throw new Error("expected a full report");

    expect(Object.keys(report.packages)).toEqual([APP_KEY(), DEP_KEY]);
    const app = report.packages[APP_KEY()];
    expect(app.used.functions).toEqual({ safe: 1, unsafe: 0 });
    expect(app.unused.functions).toEqual({ safe: 1, unsafe: 0 });
    // util.rs has no directive of its own; the crate root's forbid covers it.
    expect(app.forbidsUnsafe).toBe(true);
    expect(app.unsafeRatio).toBe(0);

    const dep = report.packages[DEP_KEY];
    expect(dep.used.functions).toEqual({ safe: 1, unsafe: 0 });
    expect(dep.used.exprs).toEqual({ safe: 0, unsafe: 1 });
    expect(dep.forbidsUnsafe).toBe(false);
    expect(dep.unsafeRatio).toBe(0.5);

    expect(report.packagesWithoutMetrics).toEqual([REMOTE_KEY]);
    expect(report.usedButNotScannedFiles).toEqual([join(root, "target/out/gen.rs")]);
    expect(report.parseFailures).toEqual([]);
  });

  it("follows dev edges when they are selected", async () => {
    const { units, depInfo } = buildOutputs();
    const orchestrator = fakeOrchestrator(workspace(), units, depInfo);

    const result = await runAudit({ projectDir: root, orchestrator, useConfigFile: false, dependencies: ["normal", "dev"] });
    expect(result.graph.packages.map((p) => p.id.name)).toEqual(["app", "dep", "remote", "devonly"]);
  });

  it("ignores platform conditions when every target is selected", async () => {
    const { units, depInfo } = buildOutputs();
    const orchestrator = fakeOrchestrator(workspace(), units, depInfo);

    const result = await runAudit({ projectDir: root, orchestrator, useConfigFile: false, allTargets: true });
    expect(result.graph.packages.map((p) => p.id.name)).toEqual(["app", "dep", "remote", "winonly"]);
    expect(orchestrator.targetCfg).not.toHaveBeenCalled();
  });

  it("fails before scanning when the compiled set cannot be resolved", async () => {
    const orchestrator = fakeOrchestrator(workspace(), [{ packageId: fixtureId("app"), target: "app", depInfoPath: "/gone.d" }], {});
    await expect(runAudit({ projectDir: root, orchestrator, useConfigFile: false })).rejects.toThrow(/Missing dep-info/);
  });

  it("fails on a virtual workspace without a selected package", async () => {
    const orchestrator = fakeOrchestrator(workspace(null), [], {});
    await expect(runAudit({ projectDir: root, orchestrator, useConfigFile: false })).rejects.toBeInstanceOf(GraphResolutionError);
    expect(orchestrator.checkBuild).not.toHaveBeenCalled();
  });
});

describe("runAudit (entry-points mode)", () => {
  it("produces a quick report without a build", async () => {
    const orchestrator = fakeOrchestrator(workspace(), [], {});

    const result = await runAudit({ projectDir: root, orchestrator, useConfigFile: false, mode: "entry-points" });

    expect(result.report).toEqual({
      kind: "quick",
      packages: { [APP_KEY()]: true, [DEP_KEY]: false, [REMOTE_KEY]: false },
      packagesWithoutMetrics: [REMOTE_KEY],
    });
    expect(result.compiled).toBeUndefined();
    expect(result.scan.files.map((f) => f.path)).toEqual([
      join(root, "app/src/lib.rs"),
      join(root, "registry/dep-1.0.0/src/lib.rs"),
    ]);
    expect(orchestrator.checkBuild).not.toHaveBeenCalled();
  });

  it("reads the mode from the config file", async () => {
    write(".unsafe-ledger.yml", "mode: entry-points\n");
    const orchestrator = fakeOrchestrator(workspace(), [], {});

    const result = await runAudit({ projectDir: root, orchestrator });
    expect(result.report.kind).toBe("quick");
  });

  it("lets explicit parameters override the config file", async () => {
    write(".unsafe-ledger.yml", "mode: entry-points\n");
    const { units, depInfo } = buildOutputs();
    const orchestrator = fakeOrchestrator(workspace(), units, depInfo);

    const result = await runAudit({ projectDir: root, orchestrator, mode: "full" });
    expect(result.report.kind).toBe("full");
  });
});

describe("tripleFromCfg", () => {
  it("assembles the host triple", () => {
    expect(tripleFromCfg(HOST_CFG)).toBe("x86_64-unknown-linux-gnu");
  });

  it("maps macos to darwin and omits an empty env", () => {
    expect(tripleFromCfg(['target_arch="aarch64"', 'target_vendor="apple"', 'target_os="macos"', 'target_env=""'])).toBe(
      "aarch64-apple-darwin",
    );
  });
});
