/**
 * Tests for the Skein parser.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { parse, parseOrThrow } from "./parser.js";
import type * as AST from "./ast.js";
import { ParseError, TypeCheckError } from "./errors.js";

function first(source: string): AST.Stmt {
  const program = parseOrThrow(source, "test.skn");
  return program.statements[0];
}

function initOf(source: string): AST.Expr {
  const stmt = first(source);
  assert.equal(stmt.kind, "VarDecl");
  assert.ok(stmt.kind === "VarDecl" && stmt.init);
  return stmt.init;
}

function declaredType(source: string): unknown {
  const stmt = first(source);
  assert.ok(stmt.kind === "VarDecl");
  return stmt.declaredType;
}

function parseError(source: string): ParseError {
  try {
    parseOrThrow(source, "test.skn");
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  assert.fail("expected a ParseError");
}

describe("Skein Parser", () => {
  describe("declarations", () => {
    it("parses a typed variable declaration", () => {
      const stmt = first("var x: int = 42;");
      assert.ok(stmt.kind === "VarDecl");
      assert.equal(stmt.name, "x");
      assert.deepEqual(stmt.declaredType, { kind: "int" });
      assert.equal(stmt.constant, false);
      assert.ok(stmt.init?.kind === "IntLiteral");
      assert.equal(stmt.init.value, 42n);
    });

    it("leaves untyped declarations without a type", () => {
      const stmt = first("let y;");
      assert.ok(stmt.kind === "VarDecl");
      assert.equal(stmt.declaredType, null);
      assert.equal(stmt.init, null);
    });

    it("requires an initializer for constants", () => {
      assert.equal(parseError("const k: int;").message, "Constant 'k' must be initialized.");
    });

    it("parses array dimensions outermost first", () => {
      assert.deepEqual(declaredType("var m: int[3][4];"), {
        kind: "array",
        capacity: 3,
        element: { kind: "array", capacity: 4, element: { kind: "int" } },
      });
      assert.deepEqual(declaredType("var d: string[*];"), { kind: "array", capacity: null, element: { kind: "string" } });
      assert.deepEqual(declaredType("var e: long[];"), { kind: "array", capacity: null, element: { kind: "int" } });
    });

    it("parses records, queues and maps", () => {
      assert.deepEqual(declaredType("var r: record{name: string, tags: string[]};"), {
        kind: "record",
        fields: [
          { name: "name", type: { kind: "string" } },
          { name: "tags", type: { kind: "array", capacity: null, element: { kind: "string" } } },
        ],
      });
      assert.deepEqual(declaredType("var q: queue<float>;"), { kind: "queue", element: { kind: "double" } });
      assert.deepEqual(declaredType("var m: map<string, boolean>;"), {
        kind: "map",
        key: { kind: "string" },
        value: { kind: "bool" },
      });
    });

    it("resolves declared type names by reference", () => {
      const program = parseOrThrow("type Point = record{x: int, y: int};\nvar p: Point;");
      const decl = program.statements[1];
      assert.ok(decl.kind === "VarDecl");
      assert.deepEqual(decl.declaredType, { kind: "named", name: "Point" });
    });

    it("requires types to be declared before use", () => {
      assert.equal(
        parseError("var p: Point;\ntype Point = record{x: int};").message,
        "Unknown type 'Point'. Types must be declared before use."
      );
    });

    it("rejects a redeclared type", () => {
      assert.equal(parseError("type A = int;\ntype A = string;").message, "Type 'A' is already declared.");
    });

    it("reports a self-referencing type as a cycle", () => {
      assert.throws(
        () => parseOrThrow("type Node = record{value: int, next: Node};", "test.skn"),
        (err: unknown) => {
          assert.ok(err instanceof TypeCheckError);
          assert.equal(err.code, "E_TYPE_CYCLE");
          assert.equal(err.message, "cyclic type definition: Node -> Node");
          assert.equal(err.span?.startLine, 1);
          return true;
        }
      );
    });

    it("parses varsets", () => {
      const stmt = first("varset in Inputs {\n  var age: int = 1;\n  const name = \"x\";\n}");
      assert.ok(stmt.kind === "VarSetDecl");
      assert.equal(stmt.scope, "in");
      assert.equal(stmt.name, "Inputs");
      assert.deepEqual(stmt.vars.map((v) => v.name), ["age", "name"]);
      assert.equal(stmt.vars[1].constant, true);
    });

    it("rejects unknown varset scopes", () => {
      assert.equal(
        parseError("varset public Stuff { }").message,
        "Unknown varset scope 'public'. Expected one of: visible, internal, in, out, inout."
      );
    });

    it("parses functions with defaults and a return type", () => {
      const stmt = first("function add(a: int, b: int = 2): int { return a + b; }");
      assert.ok(stmt.kind === "FunctionDecl");
      assert.deepEqual(stmt.params.map((p) => p.name), ["a", "b"]);
      assert.equal(stmt.params[0].defaultValue, null);
      assert.ok(stmt.params[1].defaultValue?.kind === "IntLiteral");
      assert.deepEqual(stmt.returnType, { kind: "int" });
      assert.equal(stmt.body.body[0].kind, "ReturnStmt");
    });

    it("keeps function, type and varset declarations at top level", () => {
      assert.equal(
        parseError("function outer() { function inner() { } }").message,
        "Function declarations are only allowed at top level."
      );
      assert.equal(parseError("if (true) { type T = int; }").message, "Type declarations are only allowed at top level.");
      assert.equal(parseError("{ varset out R { } }").message, "VarSet declarations are only allowed at top level.");
    });
  });

  describe("expressions", () => {
    it("applies precedence", () => {
      const e = initOf("var r = 1 + 2 * 3;");
      assert.ok(e.kind === "BinaryExpr");
      assert.equal(e.op, "+");
      assert.ok(e.right.kind === "BinaryExpr");
      assert.equal(e.right.op, "*");
    });

    it("associates equal precedence to the left", () => {
      const e = initOf("var r = 10 - 4 - 3;");
      assert.ok(e.kind === "BinaryExpr" && e.left.kind === "BinaryExpr");
      assert.equal(e.left.op, "-");
      assert.ok(e.right.kind === "IntLiteral");
      assert.equal(e.right.value, 3n);
    });

    it("maps word operators onto symbols", () => {
      const e = initOf("var b = not a or c and d;");
      assert.ok(e.kind === "BinaryExpr");
      assert.equal(e.op, "||");
      assert.ok(e.left.kind === "UnaryExpr");
      assert.equal(e.left.op, "!");
      assert.ok(e.right.kind === "BinaryExpr");
      assert.equal(e.right.op, "&&");
    });

    it("chains relational operators", () => {
      const e = initOf("var b = a < b <= c + 1 == d;");
      assert.ok(e.kind === "BinaryExpr" && e.op === "==");
      assert.ok(e.left.kind === "CompareChain");
      assert.deepEqual(e.left.ops, ["<", "<="]);
      assert.deepEqual(
        e.left.operands.map((o) => o.kind),
        ["Identifier", "Identifier", "BinaryExpr"]
      );
    });

    it("keeps a parenthesised comparison out of a chain", () => {
      const e = initOf("var b = (a < b) < c;");
      assert.ok(e.kind === "BinaryExpr" && e.op === "<");
      assert.ok(e.left.kind === "BinaryExpr" && e.left.op === "<");
    });

    it("binds comparison tighter than equality", () => {
      const e = initOf("var b = a < 1 == c > 2;");
      assert.ok(e.kind === "BinaryExpr");
      assert.equal(e.op, "==");
      assert.ok(e.left.kind === "BinaryExpr" && e.left.op === "<");
    });

    it("parses the ternary operator", () => {
      const e = initOf(`var t = a > 1 ? "x" : "y";`);
      assert.ok(e.kind === "ConditionalExpr");
      assert.ok(e.test.kind === "BinaryExpr");
      assert.ok(e.consequent.kind === "StrLiteral");
      assert.equal(e.consequent.value, "x");
    });

    it("binds postfix tighter than unary", () => {
      const e = initOf("var n = -p.count;");
      assert.ok(e.kind === "UnaryExpr");
      assert.ok(e.operand.kind === "MemberExpr");
      assert.equal(e.operand.property, "count");
    });

    it("parses member and index chains", () => {
      const e = initOf("var z = people[0].address.zip;");
      assert.ok(e.kind === "MemberExpr");
      assert.equal(e.property, "zip");
      assert.ok(e.object.kind === "MemberExpr");
      assert.ok(e.object.object.kind === "IndexExpr");
    });

    it("parses casts", () => {
      const e = initOf(`var n = int("30");`);
      assert.ok(e.kind === "CastExpr");
      assert.equal(e.target, "int");
      const l = initOf("var l = long(x);");
      assert.ok(l.kind === "CastExpr");
      assert.equal(l.target, "int");
    });

    it("parses builtin calls in type-named namespaces", () => {
      const e = initOf("var u = string.upper(name);");
      assert.ok(e.kind === "CallExpr");
      assert.deepEqual(e.callee, ["string", "upper"]);
      assert.equal(e.keyword, false);
      assert.equal(e.args.length, 1);
    });

    it("parses object and array literals", () => {
      const e = initOf(`var o = { "first name": "Ann", tags: [1, [2, 3]], inner: {} };`);
      assert.ok(e.kind === "ObjectLiteral");
      assert.deepEqual(e.entries.map((x) => x.key), ["first name", "tags", "inner"]);
      const tags = e.entries[1].value;
      assert.ok(tags.kind === "ArrayLiteral");
      assert.equal(tags.elements[1].kind, "ArrayLiteral");
    });

    it("rejects duplicate object keys", () => {
      assert.equal(parseError("var o = {a: 1, a: 2};").message, "Duplicate key 'a' in object literal.");
    });

    it("parses double literals and escapes", () => {
      const d = initOf("var d = 1.5e3;");
      assert.ok(d.kind === "DoubleLiteral");
      assert.equal(d.value, 1500);
      const s = initOf(`var s = 'tab\\there';`);
      assert.ok(s.kind === "StrLiteral");
      assert.equal(s.value, "tab\there");
    });

    it("accepts the largest 64-bit integer and rejects larger ones", () => {
      const e = initOf("var big = 9223372036854775807;");
      assert.ok(e.kind === "IntLiteral");
      assert.equal(e.value, 9223372036854775807n);
      assert.equal(
        parseError("var big = 9223372036854775808;").message,
        "Integer literal 9223372036854775808 does not fit in 64 bits."
      );
    });
  });

  describe("imports", () => {
    const files = new Map<string, string>([
      ["/proj/lib/shapes.skn", 'import "util.skn";\ntype Point = record{x: int, y: int};\nfunction origin(): Point { return {x: 0, y: 0}; }'],
      ["/proj/lib/util.skn", "function twice(n: int): int { return n * 2; }"],
      ["/proj/a.skn", 'import "b.skn";'],
      ["/proj/b.skn", 'import "a.skn";'],
    ]);
    const readFile = (file: string): string => {
      const text = files.get(file);
      if (text === undefined) throw new Error(`no such file '${file}'`);
      return text;
    };

    it("splices imported statements after the import", () => {
      const program = parseOrThrow('import "lib/shapes.skn";\nvar p: Point;', "/proj/main.skn", { readFile });
      assert.deepEqual(
        program.statements.map((s) => s.kind),
        ["ImportDecl", "ImportDecl", "FunctionDecl", "TypeDecl", "FunctionDecl", "VarDecl"]
      );
      assert.equal(program.statements[2].span.file, "/proj/lib/util.skn");
      assert.equal(program.statements[5].span.file, "/proj/main.skn");
    });

    it("rejects circular imports", () => {
      assert.throws(() => parseOrThrow(readFile("/proj/a.skn"), "/proj/a.skn", { readFile }), {
        code: "E_IMPORT",
        message: "Circular import detected: a.skn -> b.skn -> a.skn.",
      });
    });

    it("rejects a file imported twice", () => {
      const src = 'import "lib/util.skn";\nimport "lib/shapes.skn";';
      assert.throws(() => parseOrThrow(src, "/proj/main.skn", { readFile }), (err: unknown) => {
        assert.ok(err instanceof ParseError);
        assert.equal(err.code, "E_IMPORT");
        assert.equal(err.message, "File 'util.skn' is already imported.");
        assert.equal(err.span?.file, "/proj/lib/shapes.skn");
        return true;
      });
    });

    it("reports unreadable files and nested imports", () => {
      assert.throws(() => parseOrThrow('import "nope.skn";', "/proj/main.skn", { readFile }), {
        code: "E_IMPORT",
        message: "Cannot read imported file 'nope.skn': no such file '/proj/nope.skn'",
      });
      assert.throws(() => parseOrThrow('function f() { import "lib/util.skn"; }', "/proj/main.skn", { readFile }), {
        code: "E_PARSE",
        message: "Import declarations are only allowed at top level.",
      });
    });
  });

  describe("negative literals", () => {
    it("folds a minus sign into an integer literal", () => {
      const e = initOf("var small = -9223372036854775808;");
      assert.ok(e.kind === "IntLiteral");
      assert.equal(e.value, -9223372036854775808n);
      assert.equal(
        parseError("var small = -9223372036854775809;").message,
        "Integer literal -9223372036854775809 does not fit in 64 bits."
      );
    });

    it("keeps a minus before a parenthesised literal as an operator", () => {
      const e = initOf("var n = -(5);");
      assert.ok(e.kind === "UnaryExpr" && e.operand.kind === "IntLiteral");
      assert.equal(e.operand.value, 5n);
    });
  });

  describe("statements", () => {
    it("parses call statements", () => {
      const keyword = first("call foo.bar(1, 2);");
      assert.ok(keyword.kind === "CallStmt");
      assert.deepEqual(keyword.call.callee, ["foo", "bar"]);
      assert.equal(keyword.call.keyword, true);

      const plain = first("log.info(\"x\");");
      assert.ok(plain.kind === "CallStmt");
      assert.deepEqual(plain.call.callee, ["log", "info"]);
      assert.equal(plain.call.keyword, false);

      const user = first("f();");
      assert.ok(user.kind === "CallStmt");
      assert.deepEqual(user.call.callee, ["f"]);
    });

    it("parses assignments and updates", () => {
      const assign = first("p.items[2] += 5;");
      assert.ok(assign.kind === "AssignStmt");
      assert.equal(assign.op, "+=");
      assert.equal(assign.target.kind, "IndexExpr");

      const update = first("count--;");
      assert.ok(update.kind === "UpdateStmt");
      assert.equal(update.op, "--");
    });

    it("rejects bare expression statements", () => {
      assert.equal(parseError("x;").message, "Expected an assignment or a call.");
      assert.equal(parse("1 + 2;").diagnostics[0].code, "E_PARSE");
    });

    it("parses if / else if / else", () => {
      const stmt = first("if (a) { } else if (b) { print 1; } else { print 2; }");
      assert.ok(stmt.kind === "IfStmt");
      assert.ok(stmt.alternate?.kind === "IfStmt");
      assert.ok(stmt.alternate.alternate?.kind === "Block");
    });

    it("parses loops", () => {
      const f = first("for (var i = 0; i < 3; i++) { continue; }");
      assert.ok(f.kind === "ForStmt");
      assert.equal(f.init?.kind, "VarDecl");
      assert.equal(f.update?.kind, "UpdateStmt");

      const empty = first("for (;;) { break; }");
      assert.ok(empty.kind === "ForStmt");
      assert.equal(empty.init, null);
      assert.equal(empty.test, null);
      assert.equal(empty.update, null);

      const each = first("foreach (item in items) { print item; }");
      assert.ok(each.kind === "ForEachStmt");
      assert.equal(each.binding, "item");

      assert.equal(first("do { x++; } while (x < 3);").kind, "DoWhileStmt");
    });

    it("rejects break and continue outside loops", () => {
      assert.equal(parseError("break;").message, "'break' used outside of a loop.");
      assert.equal(
        parseError("while (true) { }\nfunction f() { continue; }").message,
        "'continue' used outside of a loop."
      );
    });

    it("parses try with handlers", () => {
      const stmt = first(`try { raise VALIDATION_ERROR("bad"); } exceptions {
  when VALIDATION_ERROR(msg) { print msg; }
  when ANY_ERROR { }
}`);
      assert.ok(stmt.kind === "TryStmt");
      assert.deepEqual(
        stmt.handlers.map((h) => [h.category, h.binding]),
        [
          ["VALIDATION_ERROR", "msg"],
          ["ANY_ERROR", null],
        ]
      );
      const raise = stmt.body.body[0];
      assert.ok(raise.kind === "RaiseStmt");
      assert.equal(raise.category, "VALIDATION_ERROR");
    });

    it("rejects unknown error categories", () => {
      assert.equal(parseError("raise OOPS_ERROR;").message, "Unknown error category 'OOPS_ERROR'.");
    });

    it("records spans", () => {
      const program = parseOrThrow("var a = 1;\n\nprint a;", "spans.skn");
      const span = program.statements[1].span;
      assert.equal(span.file, "spans.skn");
      assert.equal(span.startLine, 3);
      assert.equal(span.startCol, 1);
    });
  });

  describe("parse()", () => {
    it("returns the program and no diagnostics", () => {
      const result = parse("var a = 1;", "ok.skn");
      assert.ok(result.program);
      assert.deepEqual(result.diagnostics, []);
    });

    it("reports lex errors with a hint", () => {
      const result = parse("var a = #;", "bad.skn");
      assert.equal(result.program, undefined);
      assert.equal(result.diagnostics[0].code, "E_LEX");
      assert.equal(result.diagnostics[0].hint, "Check for invalid characters, unclosed strings or unclosed comments.");
    });

    it("reports syntax errors", () => {
      const result = parse("var = 5;", "bad.skn");
      assert.equal(result.diagnostics.length, 1);
      assert.equal(result.diagnostics[0].code, "E_PARSE");
      assert.equal(result.diagnostics[0].span?.file, "bad.skn");
    });

    it("reports type cycles", () => {
      const result = parse("type T = record{inner: T[]};");
      assert.equal(result.diagnostics[0].code, "E_TYPE_CYCLE");
    });
  });
});
