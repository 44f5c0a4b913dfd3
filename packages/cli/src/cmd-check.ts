/**
 * skein check - parse, validate and policy-check a program without running it
 */
import {
  buildAllowedNamespaces,
  formatDiagnostics,
  resolveConfig,
  summarizeDiagnostics,
  validate,
  withHints,
} from "@skein/core";
import type { Diagnostic, Program, Stmt } from "@skein/core";
import { deniedNamespaces, loadSource } from "./preflight.js";

export interface CheckCommandOptions {
  pretty?: boolean;
  unsafeAllowAll?: boolean;
  cwd?: string;
  homeDir?: string;
}

const DECLARATIONS: Array<[Stmt["kind"], string]> = [
  ["ImportDecl", "import"],
  ["TypeDecl", "type"],
  ["VarSetDecl", "varset"],
  ["FunctionDecl", "function"],
];

/** `No errors found (1 import, 2 functions).`, counting imported declarations too. */
export function describeProgram(program: Program): string {
  const parts: string[] = [];
  for (const [kind, noun] of DECLARATIONS) {
    const n = program.statements.filter((s) => s.kind === kind).length;
    if (n > 0) parts.push(`${n} ${noun}${n === 1 ? "" : "s"}`);
  }
  return parts.length > 0 ? `No errors found (${parts.join(", ")}).` : "No errors found.";
}

function report(diags: Diagnostic[], pretty: boolean): void {
  console.error(formatDiagnostics(diags, pretty));
  if (pretty) console.error(summarizeDiagnostics(diags));
}

/**
 * Exit codes follow `skein run`: 2 for invalid programs, 3 when the program
 * uses a host namespace the configuration denies, 4 for I/O failures.
 */
export async function runCheck(file: string, opts: CheckCommandOptions): Promise<number> {
  const pretty = !!opts.pretty;
  const loaded = loadSource(file, pretty);
  if (!loaded.ok) return loaded.exitCode;

  const invalid = withHints(validate(loaded.program));
  if (invalid.length > 0) {
    report(invalid, pretty);
    return 2;
  }

  const allowed = buildAllowedNamespaces(resolveConfig(opts.cwd, opts.homeDir).config, !!opts.unsafeAllowAll);
  const denied = deniedNamespaces(loaded.program, allowed);
  if (denied.length > 0) {
    report(denied, pretty);
    return 3;
  }

  console.log(pretty ? describeProgram(loaded.program) : "[]");
  return 0;
}
