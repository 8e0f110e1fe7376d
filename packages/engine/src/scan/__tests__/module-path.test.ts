import { describe, it, expect } from "vitest";
import { includePath, moduleCandidates } from "../module-path.js";

describe("moduleCandidates", () => {
  it("tries name.rs before name/mod.rs", () => {
    const decl = { name: "io", inlinePath: [], line: 1 };
    expect(moduleCandidates(decl, "/c/src/lib.rs", "/c/src")).toEqual([
      { path: "/c/src/io.rs", moduleDir: "/c/src/io" },
      { path: "/c/src/io/mod.rs", moduleDir: "/c/src/io" },
    ]);
  });

  it("nests lookups under enclosing inline modules", () => {
    const decl = { name: "c", inlinePath: ["a", "b"], line: 4 };
    expect(moduleCandidates(decl, "/c/src/net.rs", "/c/src/net")[0]).toEqual({
      path: "/c/src/net/a/b/c.rs",
      moduleDir: "/c/src/net/a/b/c",
    });
  });

  it("resolves a path attribute against the declaring file's directory", () => {
    const decl = { name: "sys", pathAttr: "platform/unix.rs", inlinePath: [], line: 2 };
    expect(moduleCandidates(decl, "/c/src/net.rs", "/c/src/net")).toEqual([
      { path: "/c/src/platform/unix.rs", moduleDir: "/c/src/platform" },
    ]);
  });

  it("resolves a path attribute inside an inline module against the module directory", () => {
    const decl = { name: "sys", pathAttr: "unix.rs", inlinePath: ["os"], line: 2 };
    expect(moduleCandidates(decl, "/c/src/lib.rs", "/c/src")).toEqual([
      { path: "/c/src/os/unix.rs", moduleDir: "/c/src/os" },
    ]);
  });
});

describe("includePath", () => {
  it("resolves relative to the including file", () => {
    expect(includePath({ path: "../gen/table.rs", line: 9 }, "/c/src/lib.rs")).toBe("/c/gen/table.rs");
  });

  it("returns undefined for untraceable includes", () => {
    expect(includePath({ line: 9 }, "/c/src/lib.rs")).toBeUndefined();
  });
});
