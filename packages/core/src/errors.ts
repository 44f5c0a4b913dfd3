/**
 * Skein error taxonomy.
 *
 * Every error the engine raises extends SkeinError and carries a stable code.
 * Script-level recovery (`try { } exceptions { when X { } }`) matches on the
 * category derived from that code.
 */
import type { Span } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

export const ERROR_CATEGORIES = [
  "ANY_ERROR",
  "TYPE_ERROR",
  "NULL_ERROR",
  "INDEX_ERROR",
  "MATH_ERROR",
  "NOT_FOUND_ERROR",
  "ACCESS_ERROR",
  "VALIDATION_ERROR",
  "HOST_ERROR",
  "IO_ERROR",
  "PARSE_ERROR",
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

export function isErrorCategory(name: string): name is ErrorCategory {
  return (ERROR_CATEGORIES as readonly string[]).includes(name);
}

export type ErrorDetails = Record<string, string | number | boolean | null>;

export class SkeinError extends Error {
  readonly code: string;
  span?: Span;
  details?: ErrorDetails;

  constructor(code: string, message: string, span?: Span, details?: ErrorDetails, options?: ErrorOptions) {
    super(message, options);
    this.name = "SkeinError";
    this.code = code;
    this.span = span;
    this.details = details;
  }

  toDiagnostic(hint?: string): Diagnostic {
    return makeDiag(this.code, this.message, this.span, hint);
  }
}

export class LexError extends SkeinError {
  constructor(message: string, span?: Span) {
    super("E_LEX", message, span);
    this.name = "LexError";
  }
}

export class ParseError extends SkeinError {
  constructor(message: string, span?: Span, code: string = "E_PARSE") {
    super(code, message, span);
    this.name = "ParseError";
  }
}

/**
 * Shape or coercion failure. `path` names the first failing field or element
 * (`items[2].id`), empty when the value itself is at fault.
 */
export class TypeCheckError extends SkeinError {
  readonly path: string;

  constructor(message: string, options: { path?: string; span?: Span; code?: string } = {}) {
    const path = options.path ?? "";
    super(options.code ?? "E_TYPE", path ? `${path}: ${message}` : message, options.span);
    this.name = "TypeCheckError";
    this.path = path;
  }
}

export class ScopeViolationError extends SkeinError {
  constructor(message: string, span?: Span, details?: ErrorDetails) {
    super("E_SCOPE", message, span, details);
    this.name = "ScopeViolationError";
  }
}

export class InterpreterError extends SkeinError {
  readonly category?: ErrorCategory;

  constructor(
    code: string,
    message: string,
    span?: Span,
    details?: ErrorDetails,
    options?: ErrorOptions & { category?: ErrorCategory }
  ) {
    super(code, message, span, details, options);
    this.name = "InterpreterError";
    this.category = options?.category;
  }
}

export class UnknownBuiltinError extends InterpreterError {
  readonly builtin: string;

  constructor(name: string, span?: Span) {
    super("E_UNKNOWN_BUILTIN", `Unknown builtin '${name}'.`, span, { builtin: name });
    this.name = "UnknownBuiltinError";
    this.builtin = name;
  }
}

/**
 * Thrown by builtin handlers. Never reaches a script as-is: the interpreter
 * wraps it into an InterpreterError with code E_HOST.
 */
export class HostError extends Error {
  readonly category?: ErrorCategory;

  constructor(message: string, options?: ErrorOptions & { category?: ErrorCategory }) {
    super(message, options);
    this.name = "HostError";
    this.category = options?.category;
  }
}

const CODE_CATEGORIES: Record<string, ErrorCategory> = {
  E_TYPE: "TYPE_ERROR",
  E_TYPE_OP: "TYPE_ERROR",
  E_NO_RETURN: "TYPE_ERROR",
  E_NULL: "NULL_ERROR",
  E_INDEX: "INDEX_ERROR",
  E_DIV_ZERO: "MATH_ERROR",
  E_UNBOUND: "NOT_FOUND_ERROR",
  E_UNKNOWN_FN: "NOT_FOUND_ERROR",
  E_UNKNOWN_BUILTIN: "NOT_FOUND_ERROR",
  E_FIELD: "NOT_FOUND_ERROR",
  E_PATH: "NOT_FOUND_ERROR",
  E_SCOPE: "ACCESS_ERROR",
  E_CONST: "ACCESS_ERROR",
  E_ARITY: "VALIDATION_ERROR",
  E_DUP_DECL: "VALIDATION_ERROR",
  E_HOST: "HOST_ERROR",
};

// Limits and lifecycle errors end the unit regardless of handlers.
const UNCATCHABLE_CODES = new Set(["E_CANCELLED", "E_BUDGET", "E_STACK_OVERFLOW", "E_STOPPED"]);

/**
 * Category used by `when` clauses, or null for errors no handler may intercept.
 */
export function errorCategory(err: SkeinError): ErrorCategory | null {
  if (UNCATCHABLE_CODES.has(err.code)) return null;
  if (err instanceof InterpreterError && err.category) return err.category;
  return CODE_CATEGORIES[err.code] ?? "ANY_ERROR";
}

export function matchesCategory(err: SkeinError, handler: ErrorCategory): boolean {
  const category = errorCategory(err);
  if (category === null) return false;
  return handler === "ANY_ERROR" || handler === category;
}
