import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { PackageGraph } from "../../graph/build-graph.js";
import type { Package } from "../../graph/types.js";
import { scanPackages } from "../scanner.js";

let root: string;

function write(rel: string, content: string): void {
  const path = join(root, rel);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

function pkg(name: string, sourceRoot: string | undefined, targets: Package["targets"]): Package {
  const id = { name, version: "0.1.0", source: { kind: "path" as const, path: sourceRoot ?? `/missing/${name}` } };
  return { id, key: `${name} 0.1.0`, manifestPath: join(sourceRoot ?? "/missing", "Cargo.toml"), sourceRoot, targets };
}

function fixtureCrate(): Package {
  write("app/src/lib.rs", [
    "#![forbid(unsafe_code)]",
    "mod a;",
    "mod b;",
    "mod missing;",
    'include!("gen/extra.rs");',
    "",
  ].join("\n"));
  write("app/src/main.rs", "mod a;\nfn main() {}\n");
  write("app/src/a.rs", "mod nested;\nfn fa() {}\n");
  write("app/src/a/nested.rs", "fn n() {}\n");
  write("app/src/b/mod.rs", "fn fb() { unsafe { x(); } }\n");
  write("app/src/gen/extra.rs", "fn e() {}\n");
  write("app/tests/it.rs", "fn t() {}\n");

  const dir = join(root, "app");
  return pkg("app", dir, [
    { name: "app", kinds: ["lib"], srcPath: join(dir, "src/lib.rs") },
    { name: "app", kinds: ["bin"], srcPath: join(dir, "src/main.rs") },
    { name: "it", kinds: ["test"], srcPath: join(dir, "tests/it.rs") },
  ]);
}

beforeEach(() => {
  root = realpathSync(mkdtempSync(join(tmpdir(), "unsafe-ledger-scan-")));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("scanPackages (full)", () => {
  it("follows modules and includes, scanning each file once", async () => {
    const graph = new PackageGraph([fixtureCrate()], [], 0);
    const ctx = await scanPackages(graph, { mode: "full", concurrency: 8 });

    const rel = ctx.files.map((f) => f.path.slice(root.length + 1));
    expect(rel).toEqual([
      "app/src/lib.rs",
      "app/src/main.rs",
      "app/src/a.rs",
      "app/src/b/mod.rs",
      "app/src/gen/extra.rs",
      "app/src/a/nested.rs",
    ]);
    expect(ctx.scannedPaths.size).toBe(6);
    expect(ctx.files.map((f) => f.entryPoint)).toEqual([true, true, false, false, false, false]);
    expect(ctx.sourceRoots.get("app 0.1.0")).toBe(join(root, "app"));

    const functions = ctx.files.reduce((n, f) => n + f.counters.functions.safe, 0);
    const unsafeExprs = ctx.files.reduce((n, f) => n + f.counters.exprs.unsafe, 0);
    expect(functions).toBe(5);
    expect(unsafeExprs).toBe(1);

    expect(ctx.files.map((f) => f.forbidsUnsafe)).toEqual([true, false, false, false, false, false]);
  });

  it("records a missing module as a warning", async () => {
    const graph = new PackageGraph([fixtureCrate()], [], 0);
    const ctx = await scanPackages(graph, { mode: "full" });

    expect(ctx.warnings).toHaveLength(1);
    expect(ctx.warnings[0].message).toMatch(/^module 'missing' declared at line 4 not found/);
    expect(ctx.parseFailures).toEqual([]);
  });

  it("produces the same order regardless of concurrency", async () => {
    const graph = new PackageGraph([fixtureCrate()], [], 0);
    const serial = await scanPackages(graph, { mode: "full", concurrency: 1 });
    const parallel = await scanPackages(graph, { mode: "full", concurrency: 16 });
    expect(serial.files.map((f) => f.path)).toEqual(parallel.files.map((f) => f.path));
  });

  it("scans test targets only when tests are included", async () => {
    const graph = new PackageGraph([fixtureCrate()], [], 0);
    const ctx = await scanPackages(graph, { mode: "full", includeTests: true });
    expect(ctx.scannedPaths.has(join(root, "app/tests/it.rs"))).toBe(true);
    expect(ctx.files).toHaveLength(7);
  });

  it("records parse failures without stopping other packages", async () => {
    write("broken/src/lib.rs", "fn broken( {\n");
    write("ok/src/lib.rs", "fn fine() {}\n");
    const broken = pkg("broken", join(root, "broken"), [
      { name: "broken", kinds: ["lib"], srcPath: join(root, "broken/src/lib.rs") },
    ]);
    const ok = pkg("ok", join(root, "ok"), [
      { name: "ok", kinds: ["lib"], srcPath: join(root, "ok/src/lib.rs") },
    ]);
    const graph = new PackageGraph([broken, ok], [{ from: 0, to: 1, kind: "normal" }], 0);

    const ctx = await scanPackages(graph, { mode: "full" });
    expect(ctx.parseFailures).toHaveLength(1);
    expect(ctx.parseFailures[0]).toMatchObject({ path: join(root, "broken/src/lib.rs"), packageKey: "broken 0.1.0", line: 1 });
    expect(ctx.files.map((f) => f.discoveredBy)).toEqual(["ok 0.1.0"]);
  });

  it("skips packages without a local source root", async () => {
    const remote = pkg("remote", undefined, [{ name: "remote", kinds: ["lib"], srcPath: "/missing/remote/src/lib.rs" }]);
    const ctx = await scanPackages(new PackageGraph([remote], [], 0), { mode: "full" });
    expect(ctx.files).toEqual([]);
    expect(ctx.sourceRoots.size).toBe(0);
    expect(ctx.parseFailures).toEqual([]);
  });
});

describe("scanPackages (entry-points)", () => {
  it("reads only entry files and leaves counters at zero", async () => {
    const graph = new PackageGraph([fixtureCrate()], [], 0);
    const ctx = await scanPackages(graph, { mode: "entry-points" });

    expect(ctx.files.map((f) => f.path.slice(root.length + 1))).toEqual(["app/src/lib.rs", "app/src/main.rs"]);
    expect(ctx.files.map((f) => f.forbidsUnsafe)).toEqual([true, false]);
    expect(ctx.files.every((f) => f.counters.functions.safe === 0 && f.counters.exprs.safe === 0)).toBe(true);
    expect(ctx.warnings).toEqual([]);
  });
});
