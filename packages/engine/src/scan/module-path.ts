/**
 * File lookup for `mod name;` declarations and `include!` paths.
 *
 * Every scanned file carries a module directory: the directory its child
 * modules live in. Crate roots, `mod.rs` files and files loaded through
 * `#[path]` own their containing directory; any other `foo.rs` owns `foo/`.
 */

import { dirname, isAbsolute, join } from "node:path";
import type { IncludeRef, ModuleDecl } from "../parsers/unsafe-visitor.js";

export interface ModuleCandidate {
  path: string;
  moduleDir: string;
}

/**
 * Files that may hold the body of `decl`, in lookup order.
 * `file` is the declaring file and `moduleDir` its module directory.
 */
export function moduleCandidates(decl: ModuleDecl, file: string, moduleDir: string): ModuleCandidate[] {
  if (decl.pathAttr !== undefined) {
    const base = decl.inlinePath.length === 0 ? dirname(file) : join(moduleDir, ...decl.inlinePath);
    const path = isAbsolute(decl.pathAttr) ? decl.pathAttr : join(base, decl.pathAttr);
    return [{ path, moduleDir: dirname(path) }];
  }

  const base = join(moduleDir, ...decl.inlinePath);
  return [
    { path: join(base, `${decl.name}.rs`), moduleDir: join(base, decl.name) },
    { path: join(base, decl.name, "mod.rs"), moduleDir: join(base, decl.name) },
  ];
}

/** `include!` paths are relative to the including file. */
export function includePath(ref: IncludeRef, file: string): string | undefined {
  if (ref.path === undefined) return undefined;
  return isAbsolute(ref.path) ? ref.path : join(dirname(file), ref.path);
}
