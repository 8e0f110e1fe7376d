import { describe, it, expect } from "vitest";
import { cfgSetFromLines, evaluateCfg, parseCfgExpr, platformMatches } from "../cfg-expr.js";
import { GraphResolutionError } from "../../errors.js";

const linux = cfgSetFromLines(["unix", 'target_os="linux"', 'target_arch="x86_64"', 'target_feature="sse2"', 'target_feature="fxsr"']);

describe("parseCfgExpr", () => {
  it("parses nested predicates inside cfg()", () => {
    expect(parseCfgExpr('cfg(all(unix, target_arch = "x86_64"))')).toEqual({
      op: "all",
      args: [
        { op: "name", name: "unix" },
        { op: "pair", key: "target_arch", value: "x86_64" },
      ],
    });
  });

  it("accepts a bare predicate", () => {
    expect(parseCfgExpr("not(windows)")).toEqual({ op: "not", arg: { op: "name", name: "windows" } });
  });

  it("rejects malformed input", () => {
    expect(() => parseCfgExpr("cfg(all(unix)")).toThrow(GraphResolutionError);
    expect(() => parseCfgExpr("cfg(xor(unix))")).toThrow(/unknown operator 'xor'/);
    expect(() => parseCfgExpr("cfg(unix) extra")).toThrow(/trailing tokens/);
  });
});

describe("evaluateCfg", () => {
  it("evaluates names, pairs and combinators", () => {
    expect(evaluateCfg(parseCfgExpr("cfg(unix)"), linux)).toBe(true);
    expect(evaluateCfg(parseCfgExpr("cfg(windows)"), linux)).toBe(false);
    expect(evaluateCfg(parseCfgExpr('cfg(any(windows, target_os = "linux"))'), linux)).toBe(true);
    expect(evaluateCfg(parseCfgExpr('cfg(all(unix, not(target_arch = "x86_64")))'), linux)).toBe(false);
  });

  it("treats multi-valued keys as sets", () => {
    expect(evaluateCfg(parseCfgExpr('cfg(target_feature = "fxsr")'), linux)).toBe(true);
    expect(evaluateCfg(parseCfgExpr('cfg(target_feature = "avx")'), linux)).toBe(false);
  });
});

describe("platformMatches", () => {
  it("compares plain conditions with the triple", () => {
    expect(platformMatches("x86_64-unknown-linux-gnu", "x86_64-unknown-linux-gnu", linux)).toBe(true);
    expect(platformMatches("i686-pc-windows-gnu", "x86_64-unknown-linux-gnu", linux)).toBe(false);
  });

  it("evaluates cfg() conditions against the cfg set", () => {
    expect(platformMatches("cfg(unix)", "x86_64-unknown-linux-gnu", linux)).toBe(true);
  });
});
