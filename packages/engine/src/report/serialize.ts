/**
 * Deterministic JSON serialization of reports.
 *
 * Field order follows the schema; package keys and every list are sorted,
 * so identical inputs give byte-identical output.
 */

import type { ZodError } from "zod";
import { SerializationError, errorMessage } from "../errors.js";
import { ReportSchema, type Report } from "./schemas.js";

function describe(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

function sortedRecord<T>(record: Record<string, T>): Record<string, T> {
  const out: Record<string, T> = {};
  for (const key of Object.keys(record).sort()) out[key] = record[key];
  return out;
}

function canonical(report: Report): Report {
  switch (report.kind) {
    case "full":
      return {
        kind: "full",
        packages: sortedRecord(report.packages),
        packagesWithoutMetrics: [...report.packagesWithoutMetrics].sort(),
        usedButNotScannedFiles: [...new Set(report.usedButNotScannedFiles)].sort(),
        parseFailures: report.parseFailures,
      };
    case "quick":
      return {
        kind: "quick",
        packages: sortedRecord(report.packages),
        packagesWithoutMetrics: [...report.packagesWithoutMetrics].sort(),
      };
  }
}

/** Validate and render `report` as pretty-printed JSON with a trailing newline. */
export function serializeReport(report: Report): string {
  const result = ReportSchema.safeParse(report);
  if (!result.success) {
    throw new SerializationError(`Invalid report — ${describe(result.error)}`);
  }
  return JSON.stringify(canonical(result.data), null, 2) + "\n";
}

/** Parse and validate a serialized report. */
export function parseReport(text: string): Report {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SerializationError(`Report is not valid JSON: ${errorMessage(err)}`);
  }
  const result = ReportSchema.safeParse(raw);
  if (!result.success) {
    throw new SerializationError(`Invalid report — ${describe(result.error)}`);
  }
  return result.data;
}
