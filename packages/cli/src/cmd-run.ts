/**
 * skein run - execute Skein programs
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import {
  BuiltinRegistryBuilder,
  SkeinError,
  buildAllowedNamespaces,
  formatDiagnostic,
  formatDiagnostics,
  fromJson,
  hintFor,
  resolveConfig,
  run,
  toJson,
  validate,
} from "@skein/core";
import type { TraceEvent, Value } from "@skein/core";
import { registerStd } from "@skein/std";
import { registerHost } from "@skein/host";
import { deniedNamespaces, loadSource } from "./preflight.js";

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

export interface RunCommandOptions {
  trace?: string;
  pretty?: boolean;
  /** `path=json` bindings for host-visible variables. */
  set?: string[];
  unsafeAllowAll?: boolean;
  cwd?: string;
  homeDir?: string;
}

/**
 * Parse `--set` assignments. A value that is not valid JSON is taken as a
 * plain string.
 */
export function parseAssignments(assignments: string[]): Record<string, Value> {
  const bindings: Record<string, Value> = {};
  for (const assignment of assignments) {
    const eq = assignment.indexOf("=");
    if (eq <= 0) {
      throw new Error(`Invalid --set '${assignment}': expected 'container.varSet.var=value'.`);
    }
    const raw = assignment.slice(eq + 1);
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      data = raw;
    }
    bindings[assignment.slice(0, eq)] = fromJson(data);
  }
  return bindings;
}

export async function runRun(file: string, opts: RunCommandOptions): Promise<number> {
  const pretty = !!opts.pretty;
  const emitCliError = (code: string, message: string, hint?: string): void => {
    console.error(formatDiagnostic({ code, message, hint }, pretty));
  };

  const loaded = loadSource(file, pretty);
  if (!loaded.ok) return loaded.exitCode;
  const program = loaded.program;

  const validationDiags = validate(program);
  if (validationDiags.length > 0) {
    console.error(formatDiagnostics(validationDiags, pretty));
    return 2;
  }

  let bindings: Record<string, Value>;
  try {
    bindings = parseAssignments(opts.set ?? []);
  } catch (e) {
    emitCliError("E_USAGE", e instanceof Error ? e.message : String(e));
    return 2;
  }

  const config = resolveConfig(opts.cwd, opts.homeDir).config;
  const allowed = buildAllowedNamespaces(config, !!opts.unsafeAllowAll);

  const denied = deniedNamespaces(program, allowed);
  if (denied.length > 0) {
    console.error(formatDiagnostics(denied, pretty));
    return 3;
  }

  const builtins = registerHost(registerStd(new BuiltinRegistryBuilder()), allowed).build();
  const runId = crypto.randomUUID();

  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error opening trace file: ${msg}`);
      return 4;
    }
  }

  const fd = traceFd;
  const traceHandler =
    fd !== null
      ? (event: TraceEvent) => {
          try {
            fs.writeSync(fd, JSON.stringify(event) + "\n");
          } catch (e) {
            const msg = e instanceof Error ? e.message : String(e);
            throw new CliIoError(`Error writing trace file: ${msg}`);
          }
        }
      : undefined;

  let exitCode: number;
  try {
    const result = await run(program, {
      builtins,
      limits: config.limits,
      trace: traceHandler,
      runId,
      bindings,
      print: (line) => console.log(line),
    });
    console.log(JSON.stringify(toJson(result.value), null, 2));
    exitCode = 0;
  } catch (e) {
    exitCode = 4;
    if (e instanceof CliIoError) {
      emitCliError("E_IO", e.message);
    } else if (e instanceof SkeinError) {
      if (pretty) {
        console.error(formatDiagnostic(e.toDiagnostic(hintFor(e.code)), true));
      } else {
        console.error(JSON.stringify({ code: e.code, message: e.message, span: e.span, details: e.details }));
      }
    } else {
      emitCliError("E_RUNTIME", e instanceof Error ? e.message : String(e));
    }
  }

  if (traceFd !== null) {
    try {
      fs.closeSync(traceFd);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error closing trace file: ${msg}`);
      exitCode = 4;
    }
  }
  return exitCode;
}
