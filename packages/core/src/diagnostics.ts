/**
 * Skein diagnostics: what the parser, validator, CLI and a failed run report
 * about a script.
 */
import type { Span } from "./ast.js";

export type Severity = "error" | "warning";

export interface Diagnostic {
  code: string;
  message: string;
  span?: Span;
  hint?: string;
  /** Omitted for errors. */
  severity?: Severity;
}

const HINTS: Record<string, string> = {
  E_LEX: "Check for invalid characters, unclosed strings or unclosed comments.",
  E_PARSE: "Check syntax near this location.",
  E_TYPE_CYCLE: "Break the cycle: a type cannot contain itself, directly or through other types.",
  E_IMPORT: "Import each file once, and never from a file it imports.",
  E_TYPE: "The value does not fit the declared type; convert it or change the declaration.",
  E_TYPE_OP: "Convert an operand with int(), double(), string() or bool() first.",
  E_SCOPE: "Check the varset scope: 'in' is written by the host, 'out' by the script.",
  E_CONST: "Declare it with 'var' or 'let' instead.",
  E_PATH: "Named paths have the form 'container.varSet.variable[.field...]'.",
  E_BUDGET: "Raise maxIterations in .skeinrc.json, or bound the loop.",
  E_STACK_OVERFLOW: "Raise maxCallDepth in .skeinrc.json, or give the recursion a base case.",
  E_UNKNOWN_BUILTIN: "Builtins are called with a qualified name such as 'string.upper(s)'.",
  E_NS_DENIED: "Add the namespace to \"allow\" in .skeinrc.json, or pass --unsafe-allow-all.",
};

/** The standing advice for a diagnostic code, if there is one. */
export function hintFor(code: string): string | undefined {
  return HINTS[code];
}

export function makeDiag(code: string, message: string, span?: Span, hint?: string): Diagnostic {
  return { code, message, span, hint };
}

export function makeWarning(code: string, message: string, span?: Span): Diagnostic {
  return { code, message, span, severity: "warning" };
}

/** Fill in the standing hint of every diagnostic that carries none. */
export function withHints(diags: Diagnostic[]): Diagnostic[] {
  return diags.map((d) => (d.hint !== undefined || hintFor(d.code) === undefined ? d : { ...d, hint: hintFor(d.code) }));
}

export function formatLocation(span: Span | undefined): string {
  return span ? `${span.file}:${span.startLine}:${span.startCol}` : "<unknown>";
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  let out = `${d.severity ?? "error"}[${d.code}]: ${d.message}\n  --> ${formatLocation(d.span)}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}

/** `2 errors, 1 warning`; empty when there is nothing to report. */
export function summarizeDiagnostics(diags: Diagnostic[]): string {
  const warnings = diags.filter((d) => d.severity === "warning").length;
  const errors = diags.length - warnings;
  const parts: string[] = [];
  if (errors > 0) parts.push(`${errors} error${errors === 1 ? "" : "s"}`);
  if (warnings > 0) parts.push(`${warnings} warning${warnings === 1 ? "" : "s"}`);
  return parts.join(", ");
}
