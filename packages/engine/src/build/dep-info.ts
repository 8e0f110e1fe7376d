/**
 * Parser for makefile-style dep-info (`.d`) files written by the compiler.
 *
 *   /abs/target/debug/deps/foo-1a2b.rmeta: src/lib.rs src/a\ b.rs \
 *       src/util/mod.rs
 *
 *   src/lib.rs:
 */

import { isAbsolute, resolve } from "node:path";

/** Split on unescaped whitespace; `\ ` is a literal space. */
function splitPaths(list: string): string[] {
  const out: string[] = [];
  let current = "";
  for (let i = 0; i < list.length; i++) {
    const ch = list[i];
    if (ch === "\\" && list[i + 1] === " ") {
      current += " ";
      i++;
    } else if (/\s/.test(ch)) {
      if (current) out.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  if (current) out.push(current);
  return out;
}

/**
 * Prerequisites of every rule in `content`, in order of first appearance.
 * Relative entries are resolved against `baseDir`.
 */
export function parseDepInfo(content: string, baseDir: string): string[] {
  const logical = content.replace(/\r\n/g, "\n").replace(/\\\n/g, " ").split("\n");
  const seen = new Set<string>();
  const out: string[] = [];

  for (const line of logical) {
    if (line.trimStart().startsWith("#")) continue;
    // First colon followed by whitespace or end of line; `C:\` stays inside the target.
    const sep = /:(\s|$)/.exec(line);
    if (!sep) continue;
    for (const entry of splitPaths(line.slice(sep.index + 1))) {
      const abs = isAbsolute(entry) ? entry : resolve(baseDir, entry);
      if (seen.has(abs)) continue;
      seen.add(abs);
      out.push(abs);
    }
  }
  return out;
}

/** Rust sources among the prerequisites. */
export function rustSources(paths: string[]): string[] {
  return paths.filter((p) => p.endsWith(".rs"));
}
