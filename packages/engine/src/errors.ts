/**
 * Error taxonomy for an audit run.
 *
 * `ParseError` is recovered by the scanner (the file is dropped and recorded).
 * Everything else ends the current invocation.
 */

export type AuditErrorCode =
  | "GRAPH_RESOLUTION"
  | "BUILD_RESOLUTION"
  | "PARSE"
  | "SERIALIZATION";

export abstract class AuditError extends Error {
  abstract readonly code: AuditErrorCode;
}

/** Root missing, dangling edge, or metadata that does not match the schema. */
export class GraphResolutionError extends AuditError {
  readonly code = "GRAPH_RESOLUTION" as const;

  constructor(message: string) {
    super(message);
    this.name = "GraphResolutionError";
  }
}

/** The build orchestrator could not produce a compile plan. */
export class BuildResolutionError extends AuditError {
  readonly code = "BUILD_RESOLUTION" as const;

  constructor(message: string, readonly stderr?: string) {
    super(message);
    this.name = "BuildResolutionError";
  }
}

export class ParseError extends AuditError {
  readonly code = "PARSE" as const;

  constructor(
    readonly path: string,
    message: string,
    readonly line?: number,
    readonly column?: number,
  ) {
    super(line !== undefined ? `${path}:${line}:${column ?? 0}: ${message}` : `${path}: ${message}`);
    this.name = "ParseError";
  }
}

export class SerializationError extends AuditError {
  readonly code = "SERIALIZATION" as const;

  constructor(message: string) {
    super(message);
    this.name = "SerializationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
