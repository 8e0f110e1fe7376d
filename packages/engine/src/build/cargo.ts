/**
 * Cargo-backed build orchestrator.
 *
 * Shells out to `cargo metadata`, `cargo check --message-format=json` and
 * `rustc --print cfg`. Nothing is cached between calls.
 */

import { execFile } from "node:child_process";
import { readFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { promisify } from "node:util";
import { z } from "zod";
import { BuildResolutionError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { BuildOrchestrator, BuildSelection, CompiledUnit } from "./orchestrator.js";

const exec = promisify(execFile);

const MAX_BUFFER = 200 * 1024 * 1024;

export interface CargoOrchestratorOptions {
  /** Defaults to the CARGO env var, then `cargo`. */
  cargo?: string;
  /** Defaults to the RUSTC env var, then `rustc`. */
  rustc?: string;
  /** Per-command timeout in ms. Default: 30 minutes. */
  timeout?: number;
}

// ---------------------------------------------------------------------------
// Message schema
// ---------------------------------------------------------------------------

const ArtifactMessageSchema = z.object({
  reason: z.literal("compiler-artifact"),
  package_id: z.string(),
  target: z.object({
    name: z.string(),
    kind: z.array(z.string()),
  }),
  filenames: z.array(z.string()),
  executable: z.string().nullable().default(null),
});

const MessageSchema = z.object({ reason: z.string() }).passthrough();

type ArtifactMessage = z.infer<typeof ArtifactMessageSchema>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function featureArgs(selection: BuildSelection): string[] {
  const args: string[] = [];
  if (selection.allFeatures) args.push("--all-features");
  if (selection.noDefaultFeatures) args.push("--no-default-features");
  if (selection.features.length > 0) args.push("--features", selection.features.join(","));
  return args;
}

function manifestArgs(selection: BuildSelection): string[] {
  return selection.manifestPath ? ["--manifest-path", selection.manifestPath] : [];
}

/**
 * The dep-info file sits next to the unit's primary output:
 * `deps/libfoo-1a2b.rmeta` -> `deps/foo-1a2b.d`, `build/x/build_script_build-9f` -> `.../build_script_build-9f.d`.
 */
export function depInfoPathFor(message: Pick<ArtifactMessage, "filenames" | "executable">): string | undefined {
  const library = message.filenames.find((f) => f.endsWith(".rmeta"))
    ?? message.filenames.find((f) => /\.(rlib|so|dylib|dll|a|lib)$/.test(f));
  if (library !== undefined) {
    const stem = basename(library, extname(library));
    return join(dirname(library), `${stem.startsWith("lib") ? stem.slice(3) : stem}.d`);
  }
  const output = message.executable ?? message.filenames[0];
  if (output === undefined) return undefined;
  return join(dirname(output), `${basename(output, ".exe")}.d`);
}

/** Compiled units from `--message-format=json` output. */
export function parseCheckMessages(stdout: string): CompiledUnit[] {
  const units: CompiledUnit[] = [];
  for (const line of stdout.split("\n")) {
    if (!line.trim()) continue;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      throw new BuildResolutionError(`Unparseable build message: ${line.slice(0, 120)}`);
    }

    const message = MessageSchema.safeParse(json);
    if (!message.success) {
      throw new BuildResolutionError(`Unexpected build message: ${line.slice(0, 120)}`);
    }
    if (message.data.reason !== "compiler-artifact") continue;

    const artifact = ArtifactMessageSchema.safeParse(json);
    if (!artifact.success) {
      const issue = artifact.error.issues[0];
      throw new BuildResolutionError(
        `Invalid compiler-artifact message — ${issue?.path.join(".") ?? ""}: ${issue?.message ?? "unknown"}`,
      );
    }

    const depInfoPath = depInfoPathFor(artifact.data);
    if (depInfoPath === undefined) {
      throw new BuildResolutionError(`Unit ${artifact.data.target.name} of ${artifact.data.package_id} has no outputs`);
    }
    units.push({ packageId: artifact.data.package_id, target: artifact.data.target.name, depInfoPath });
  }
  return units;
}

function stderrOf(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "stderr" in err && typeof err.stderr === "string") {
    return err.stderr;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class CargoOrchestrator implements BuildOrchestrator {
  private readonly cargo: string;
  private readonly rustc: string;
  private readonly timeout: number;

  constructor(options: CargoOrchestratorOptions = {}) {
    this.cargo = options.cargo ?? process.env.CARGO ?? "cargo";
    this.rustc = options.rustc ?? process.env.RUSTC ?? "rustc";
    this.timeout = options.timeout ?? 30 * 60_000;
  }

  async metadata(selection: BuildSelection): Promise<unknown> {
    const args = ["metadata", "--format-version", "1", ...manifestArgs(selection), ...featureArgs(selection)];
    const stdout = await this.run(this.cargo, args, selection.cwd, "cargo metadata");
    try {
      return JSON.parse(stdout);
    } catch (err) {
      throw new BuildResolutionError(`cargo metadata produced invalid JSON: ${errorMessage(err)}`);
    }
  }

  async checkBuild(selection: BuildSelection): Promise<CompiledUnit[]> {
    const args = [
      "check",
      "--message-format=json",
      ...manifestArgs(selection),
      ...(selection.package ? ["-p", selection.package] : []),
      ...featureArgs(selection),
      ...(selection.target ? ["--target", selection.target] : []),
      ...(selection.includeTests ? ["--all-targets"] : []),
    ];
    const stdout = await this.run(this.cargo, args, selection.cwd, "cargo check");
    const units = parseCheckMessages(stdout);
    logger.debug(`cargo check reported ${units.length} compiled units`);
    return units;
  }

  async readDepInfo(path: string): Promise<string> {
    return readFile(path, "utf-8");
  }

  async targetCfg(target?: string): Promise<string[]> {
    const args = ["--print", "cfg", ...(target ? ["--target", target] : [])];
    const stdout = await this.run(this.rustc, args, process.cwd(), "rustc --print cfg");
    return stdout.split("\n").map((l) => l.trim()).filter(Boolean);
  }

  private async run(command: string, args: string[], cwd: string, label: string): Promise<string> {
    logger.debug(`Running ${command} ${args.join(" ")}`);
    try {
      const { stdout } = await exec(command, args, { cwd, timeout: this.timeout, maxBuffer: MAX_BUFFER });
      return stdout;
    } catch (err) {
      const stderr = stderrOf(err);
      throw new BuildResolutionError(`${label} failed: ${stderr?.trim().split("\n").pop() ?? errorMessage(err)}`, stderr);
    }
  }
}
