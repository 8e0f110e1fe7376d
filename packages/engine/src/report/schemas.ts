import { z } from "zod";

export const CountSchema = z.object({
  safe: z.number().int().nonnegative(),
  unsafe: z.number().int().nonnegative(),
});

export const CounterBlockSchema = z.object({
  functions: CountSchema,
  exprs: CountSchema,
  itemImpls: CountSchema,
  itemTraits: CountSchema,
  methods: CountSchema,
});

export const PackageSourceSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("registry"), url: z.string() }),
  z.object({ kind: z.literal("git"), url: z.string(), rev: z.string().optional() }),
  z.object({ kind: z.literal("path"), path: z.string() }),
]);

export const PackageIdSchema = z.object({
  name: z.string(),
  version: z.string(),
  source: PackageSourceSchema,
});

export const FullReportEntrySchema = z.object({
  package: PackageIdSchema,
  /** Counters of files that are part of the build. */
  used: CounterBlockSchema,
  /** Counters of files scanned but not part of the build. */
  unused: CounterBlockSchema,
  forbidsUnsafe: z.boolean(),
  unsafeRatio: z.number().min(0).max(1),
});

export const ReportParseFailureSchema = z.object({
  path: z.string(),
  message: z.string(),
});

export const FullReportSchema = z.object({
  kind: z.literal("full"),
  packages: z.record(FullReportEntrySchema),
  packagesWithoutMetrics: z.array(z.string()),
  usedButNotScannedFiles: z.array(z.string()),
  parseFailures: z.array(ReportParseFailureSchema),
});

export const QuickReportSchema = z.object({
  kind: z.literal("quick"),
  /** Package key -> every owned file carries the forbid directive. */
  packages: z.record(z.boolean()),
  packagesWithoutMetrics: z.array(z.string()),
});

export const ReportSchema = z.discriminatedUnion("kind", [FullReportSchema, QuickReportSchema]);

export type FullReportEntry = z.infer<typeof FullReportEntrySchema>;
export type FullReport = z.infer<typeof FullReportSchema>;
export type QuickReport = z.infer<typeof QuickReportSchema>;
export type Report = z.infer<typeof ReportSchema>;
export type ReportParseFailure = z.infer<typeof ReportParseFailureSchema>;
