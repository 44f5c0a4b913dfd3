/**
 * Tests for Skein diagnostics and the error taxonomy.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  formatDiagnostic,
  formatDiagnostics,
  hintFor,
  makeDiag,
  makeWarning,
  summarizeDiagnostics,
  withHints,
} from "./diagnostics.js";
import {
  errorCategory,
  InterpreterError,
  matchesCategory,
  ParseError,
  ScopeViolationError,
  TypeCheckError,
  UnknownBuiltinError,
} from "./errors.js";

const SPAN = { file: "test.skn", startLine: 3, startCol: 7, endLine: 3, endCol: 12 };

describe("Skein Diagnostics", () => {
  it("prints errors and warnings with their location and hint", () => {
    const error = formatDiagnostic(makeDiag("E_PARSE", "Unexpected token", SPAN, "Check syntax"), true);
    assert.equal(error, "error[E_PARSE]: Unexpected token\n  --> test.skn:3:7\n  hint: Check syntax");
    const warning = formatDiagnostic(makeWarning("W_FMT_COMMENTS", "Comments are dropped."), true);
    assert.equal(warning, "warning[W_FMT_COMMENTS]: Comments are dropped.\n  --> <unknown>");
  });

  it("serializes only the fields that are set", () => {
    assert.equal(formatDiagnostic(makeDiag("E_PARSE", "Unexpected token"), false), '{"code":"E_PARSE","message":"Unexpected token"}');
    assert.equal(
      formatDiagnostic(makeWarning("W_X", "w"), false),
      '{"code":"W_X","message":"w","severity":"warning"}'
    );
  });

  it("joins several diagnostics", () => {
    const diags = [makeDiag("E_1", "First error"), makeWarning("W_2", "Second")];
    assert.equal(
      formatDiagnostics(diags, true),
      "error[E_1]: First error\n  --> <unknown>\n\nwarning[W_2]: Second\n  --> <unknown>"
    );
    assert.deepEqual(JSON.parse(formatDiagnostics(diags, false)), [
      { code: "E_1", message: "First error" },
      { code: "W_2", message: "Second", severity: "warning" },
    ]);
  });

  it("fills in standing hints without replacing given ones", () => {
    const [imported, own, unknown] = withHints([
      makeDiag("E_IMPORT", "File 'a.skn' is already imported."),
      makeDiag("E_CONST", "Cannot assign to constant 'k'.", SPAN, "Use another name."),
      makeDiag("E_ELSEWHERE", "no advice"),
    ]);
    assert.equal(imported.hint, hintFor("E_IMPORT"));
    assert.equal(imported.hint, "Import each file once, and never from a file it imports.");
    assert.equal(own.hint, "Use another name.");
    assert.equal(unknown.hint, undefined);
  });

  it("counts errors and warnings", () => {
    assert.equal(summarizeDiagnostics([]), "");
    assert.equal(summarizeDiagnostics([makeDiag("E_1", "a")]), "1 error");
    assert.equal(
      summarizeDiagnostics([makeDiag("E_1", "a"), makeDiag("E_2", "b"), makeWarning("W_1", "c")]),
      "2 errors, 1 warning"
    );
    assert.equal(summarizeDiagnostics([makeWarning("W_1", "c"), makeWarning("W_2", "d")]), "2 warnings");
  });
});

describe("Skein Errors", () => {
  it("converts engine errors to diagnostics", () => {
    const d = new ParseError("Unexpected ';'.", SPAN).toDiagnostic("Check syntax near this location.");
    assert.deepEqual(d, {
      code: "E_PARSE",
      message: "Unexpected ';'.",
      span: SPAN,
      hint: "Check syntax near this location.",
    });
  });

  it("prefixes type errors with their path", () => {
    const err = new TypeCheckError("expected string, got int", { path: "address.zip" });
    assert.equal(err.message, "address.zip: expected string, got int");
    assert.equal(err.code, "E_TYPE");
    assert.equal(err.path, "address.zip");
  });

  it("names the builtin in UnknownBuiltinError", () => {
    const err = new UnknownBuiltinError("Foo.Bar");
    assert.equal(err.message, "Unknown builtin 'Foo.Bar'.");
    assert.equal(err.code, "E_UNKNOWN_BUILTIN");
    assert.ok(err instanceof InterpreterError);
  });

  it("derives categories from codes", () => {
    assert.equal(errorCategory(new InterpreterError("E_DIV_ZERO", "Division by zero.")), "MATH_ERROR");
    assert.equal(errorCategory(new TypeCheckError("bad")), "TYPE_ERROR");
    assert.equal(errorCategory(new ScopeViolationError("no")), "ACCESS_ERROR");
    assert.equal(errorCategory(new UnknownBuiltinError("a.b")), "NOT_FOUND_ERROR");
    assert.equal(errorCategory(new InterpreterError("E_SOMETHING", "x")), "ANY_ERROR");
  });

  it("prefers an explicit category", () => {
    const err = new InterpreterError("E_HOST", "failed", undefined, undefined, { category: "IO_ERROR" });
    assert.equal(errorCategory(err), "IO_ERROR");
    assert.ok(matchesCategory(err, "IO_ERROR"));
    assert.ok(matchesCategory(err, "ANY_ERROR"));
    assert.ok(!matchesCategory(err, "HOST_ERROR"));
  });

  it("never matches limit and lifecycle errors", () => {
    for (const code of ["E_CANCELLED", "E_BUDGET", "E_STACK_OVERFLOW", "E_STOPPED"]) {
      const err = new InterpreterError(code, "stop");
      assert.equal(errorCategory(err), null);
      assert.ok(!matchesCategory(err, "ANY_ERROR"));
    }
  });
});
