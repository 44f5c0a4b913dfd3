/**
 * Steps every command takes before it touches a program: read the source,
 * parse it with its imports, and hold it against the host namespace policy.
 */
import * as fs from "node:fs";
import { KNOWN_HOST_NAMESPACES, builtinNamespaces, formatDiagnostic, formatDiagnostics, parse } from "@skein/core";
import type { Diagnostic, Program } from "@skein/core";

export type LoadedSource =
  | { ok: true; source: string; program: Program }
  | { ok: false; exitCode: number };

/**
 * Read and parse `file` (`-` is standard input). Failures are printed to
 * stderr: exit code 4 for I/O, 2 for lex and parse errors.
 */
export function loadSource(file: string, pretty: boolean): LoadedSource {
  let source: string;
  try {
    source = fs.readFileSync(file === "-" ? 0 : file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, pretty));
    return { ok: false, exitCode: 4 };
  }

  const parsed = parse(source, file);
  if (!parsed.program || parsed.diagnostics.length > 0) {
    console.error(formatDiagnostics(parsed.diagnostics, pretty));
    return { ok: false, exitCode: 2 };
  }
  return { ok: true, source, program: parsed.program };
}

/** One E_NS_DENIED diagnostic per host namespace the program uses but may not. */
export function deniedNamespaces(program: Program, allowed: ReadonlySet<string>): Diagnostic[] {
  const used = builtinNamespaces(program);
  const denied: Diagnostic[] = [];
  for (const ns of KNOWN_HOST_NAMESPACES) {
    const span = used.get(ns);
    if (span && !allowed.has(ns)) {
      denied.push({
        code: "E_NS_DENIED",
        message: `Host namespace '${ns}' is not allowed by configuration.`,
        span,
        hint: `Add "${ns}" to "allow" in .skeinrc.json, or pass --unsafe-allow-all.`,
      });
    }
  }
  return denied;
}
