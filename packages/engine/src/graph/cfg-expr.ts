/**
 * Evaluator for platform conditions attached to dependencies
 * (`cfg(all(unix, target_arch = "x86_64"))` or a bare target triple).
 */

import { GraphResolutionError } from "../errors.js";

export type CfgExpr =
  | { op: "name"; name: string }
  | { op: "pair"; key: string; value: string }
  | { op: "all"; args: CfgExpr[] }
  | { op: "any"; args: CfgExpr[] }
  | { op: "not"; arg: CfgExpr };

/** Active cfg values, as printed by `rustc --print cfg`. */
export interface CfgSet {
  names: Set<string>;
  pairs: Map<string, Set<string>>;
}

type CfgToken =
  | { t: "ident"; v: string }
  | { t: "str"; v: string }
  | { t: "(" | ")" | "," | "=" };

function tokenize(src: string): CfgToken[] {
  const out: CfgToken[] = [];
  let i = 0;
  while (i < src.length) {
    const ch = src[i];
    if (/\s/.test(ch)) {
      i++;
    } else if (ch === "(" || ch === ")" || ch === "," || ch === "=") {
      out.push({ t: ch });
      i++;
    } else if (ch === '"') {
      const end = src.indexOf('"', i + 1);
      if (end < 0) throw new GraphResolutionError(`Unterminated string in cfg expression '${src}'`);
      out.push({ t: "str", v: src.slice(i + 1, end) });
      i = end + 1;
    } else if (/[A-Za-z_]/.test(ch)) {
      let j = i + 1;
      while (j < src.length && /[A-Za-z0-9_]/.test(src[j])) j++;
      out.push({ t: "ident", v: src.slice(i, j) });
      i = j;
    } else {
      throw new GraphResolutionError(`Unexpected '${ch}' in cfg expression '${src}'`);
    }
  }
  return out;
}

/** Parse the inside of `cfg(...)`, or the whole `cfg(...)` string. */
export function parseCfgExpr(src: string): CfgExpr {
  const tokens = tokenize(src);
  let pos = 0;

  const fail = (msg: string): never => {
    throw new GraphResolutionError(`Malformed cfg expression '${src}': ${msg}`);
  };

  const expect = (t: CfgToken["t"]): void => {
    if (tokens[pos]?.t !== t) fail(`expected '${t}'`);
    pos++;
  };

  const parseList = (): CfgExpr[] => {
    expect("(");
    const args: CfgExpr[] = [];
    while (tokens[pos] && tokens[pos].t !== ")") {
      args.push(parsePred());
      if (tokens[pos]?.t === ",") pos++;
      else break;
    }
    expect(")");
    return args;
  };

  const parsePred = (): CfgExpr => {
    const tok = tokens[pos];
    if (!tok || tok.t !== "ident") return fail("expected identifier");
    pos++;
    const next = tokens[pos];
    if (next?.t === "=") {
      pos++;
      const value = tokens[pos];
      if (!value || value.t !== "str") return fail("expected string after '='");
      pos++;
      return { op: "pair", key: tok.v, value: value.v };
    }
    if (next?.t === "(") {
      switch (tok.v) {
        case "all":
          return { op: "all", args: parseList() };
        case "any":
          return { op: "any", args: parseList() };
        case "not": {
          const args = parseList();
          if (args.length !== 1) fail("not() takes exactly one predicate");
          return { op: "not", arg: args[0] };
        }
        default:
          return fail(`unknown operator '${tok.v}'`);
      }
    }
    return { op: "name", name: tok.v };
  };

  let expr: CfgExpr;
  if (tokens[0]?.t === "ident" && tokens[0].v === "cfg" && tokens[1]?.t === "(") {
    pos = 1;
    const args = parseList();
    if (args.length !== 1) fail("cfg() takes exactly one predicate");
    expr = args[0];
  } else {
    expr = parsePred();
  }
  if (pos !== tokens.length) fail("trailing tokens");
  return expr;
}

/** Build a CfgSet from `rustc --print cfg` lines (`unix`, `target_os="linux"`). */
export function cfgSetFromLines(lines: string[]): CfgSet {
  const set: CfgSet = { names: new Set(), pairs: new Map() };
  for (const raw of lines) {
    const line = raw.trim();
    if (!line) continue;
    const eq = line.indexOf("=");
    if (eq < 0) {
      set.names.add(line);
      continue;
    }
    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim().replace(/^"|"$/g, "");
    const values = set.pairs.get(key) ?? new Set<string>();
    values.add(value);
    set.pairs.set(key, values);
  }
  return set;
}

export function evaluateCfg(expr: CfgExpr, cfg: CfgSet): boolean {
  switch (expr.op) {
    case "name":
      return cfg.names.has(expr.name);
    case "pair":
      return cfg.pairs.get(expr.key)?.has(expr.value) ?? false;
    case "all":
      return expr.args.every((a) => evaluateCfg(a, cfg));
    case "any":
      return expr.args.some((a) => evaluateCfg(a, cfg));
    case "not":
      return !evaluateCfg(expr.arg, cfg);
  }
}

/**
 * Does a dependency's platform condition hold for `triple`/`cfg`?
 * A condition is either `cfg(...)` or a plain target triple.
 */
export function platformMatches(condition: string, triple: string, cfg: CfgSet): boolean {
  const trimmed = condition.trim();
  if (trimmed.startsWith("cfg(")) return evaluateCfg(parseCfgExpr(trimmed), cfg);
  return trimmed === triple;
}
