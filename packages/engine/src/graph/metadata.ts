/**
 * Schema for the subset of `cargo metadata --format-version 1` output the
 * graph builder reads. Unknown fields pass through untouched.
 */

import { z } from "zod";
import { GraphResolutionError } from "../errors.js";

export const DepKindInfoSchema = z.object({
  kind: z.enum(["dev", "build"]).nullable().default(null),
  target: z.string().nullable().default(null),
});

export const NodeDepSchema = z.object({
  name: z.string(),
  pkg: z.string(),
  // Cargo older than 1.41 omits dep_kinds; those edges are all normal.
  dep_kinds: z.array(DepKindInfoSchema).default([{ kind: null, target: null }]),
});

export const ResolveNodeSchema = z.object({
  id: z.string(),
  deps: z.array(NodeDepSchema).default([]),
  features: z.array(z.string()).default([]),
});

export const MetadataTargetSchema = z.object({
  name: z.string(),
  kind: z.array(z.string()),
  src_path: z.string(),
});

export const MetadataPackageSchema = z.object({
  id: z.string(),
  name: z.string(),
  version: z.string(),
  source: z.string().nullable().default(null),
  manifest_path: z.string(),
  targets: z.array(MetadataTargetSchema).default([]),
});

export const CargoMetadataSchema = z.object({
  packages: z.array(MetadataPackageSchema),
  workspace_members: z.array(z.string()).default([]),
  resolve: z
    .object({
      nodes: z.array(ResolveNodeSchema),
      root: z.string().nullable().default(null),
    })
    .nullable()
    .default(null),
  workspace_root: z.string(),
  target_directory: z.string().optional(),
}).passthrough();

export type CargoMetadata = z.infer<typeof CargoMetadataSchema>;
export type MetadataPackage = z.infer<typeof MetadataPackageSchema>;
export type ResolveNode = z.infer<typeof ResolveNodeSchema>;

/** Validate a raw metadata document. */
export function parseMetadata(raw: unknown): CargoMetadata {
  const result = CargoMetadataSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first ? `${first.path.join(".")}: ${first.message}` : "unknown issue";
    throw new GraphResolutionError(`Invalid cargo metadata — ${where}`);
  }
  return result.data;
}
