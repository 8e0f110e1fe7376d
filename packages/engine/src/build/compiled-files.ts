/**
 * Compiled-file-set resolver.
 *
 * Runs a check build for the selection and collects every Rust source listed
 * in the dep-info files of the compiled units. The returned set holds
 * canonical paths.
 */

import { realpath } from "node:fs/promises";
import { BuildResolutionError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { parseDepInfo, rustSources } from "./dep-info.js";
import type { BuildOrchestrator, BuildSelection, CompiledUnit } from "./orchestrator.js";

async function canonicalOrSelf(path: string): Promise<string> {
  return realpath(path).catch(() => path);
}

async function unitSources(
  orchestrator: BuildOrchestrator,
  unit: CompiledUnit,
  workspaceRoot: string,
): Promise<string[]> {
  let content: string;
  try {
    content = await orchestrator.readDepInfo(unit.depInfoPath);
  } catch (err) {
    throw new BuildResolutionError(
      `Missing dep-info for ${unit.target} (${unit.packageId}) at ${unit.depInfoPath}: ${errorMessage(err)}`,
    );
  }
  return rustSources(parseDepInfo(content, workspaceRoot));
}

/**
 * Resolve the set of source files that take part in a build of `selection`.
 * Throws `BuildResolutionError` when no compile plan can be produced or a
 * unit's dep-info is unreadable.
 */
export async function resolveCompiledFiles(
  orchestrator: BuildOrchestrator,
  selection: BuildSelection,
  workspaceRoot: string,
): Promise<ReadonlySet<string>> {
  let units: CompiledUnit[];
  try {
    units = await orchestrator.checkBuild(selection);
  } catch (err) {
    if (err instanceof BuildResolutionError) throw err;
    throw new BuildResolutionError(`Build plan unavailable: ${errorMessage(err)}`);
  }

  const perUnit = await Promise.all(units.map((u) => unitSources(orchestrator, u, workspaceRoot)));
  const unique = [...new Set(perUnit.flat())];
  const canonical = await Promise.all(unique.map(canonicalOrSelf));

  const files = new Set(canonical);
  logger.debug(`Compiled file set: ${files.size} files from ${units.length} units`);
  return files;
}
