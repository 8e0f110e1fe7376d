import { dirname } from "node:path";
import type { PackageId, PackageSource } from "./types.js";

/** Parse cargo's source string; `null` means a local path package. */
export function parseSource(raw: string | null, manifestPath: string): PackageSource {
  if (raw === null) return { kind: "path", path: dirname(manifestPath) };
  if (raw.startsWith("git+")) {
    const body = raw.slice("git+".length);
    const hash = body.indexOf("#");
    return hash >= 0
      ? { kind: "git", url: body.slice(0, hash), rev: body.slice(hash + 1) }
      : { kind: "git", url: body };
  }
  if (raw.startsWith("path+")) {
    return { kind: "path", path: raw.slice("path+".length).replace(/^file:\/\//, "") };
  }
  return { kind: "registry", url: raw.replace(/^(registry|sparse)\+/, "") };
}

export function formatSource(source: PackageSource): string {
  switch (source.kind) {
    case "registry":
      return `registry+${source.url}`;
    case "git":
      return source.rev ? `git+${source.url}#${source.rev}` : `git+${source.url}`;
    case "path":
      return `path+file://${source.path}`;
  }
}

/** `name version (source)`: unique across a resolved graph. */
export function packageKey(id: PackageId): string {
  return `${id.name} ${id.version} (${formatSource(id.source)})`;
}
