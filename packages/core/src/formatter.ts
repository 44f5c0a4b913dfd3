/**
 * Skein Canonical Formatter (AST pretty-printer).
 * Produces deterministic, idempotent output.
 */
import type * as AST from "./ast.js";
import { RESERVED_WORDS } from "./lexer.js";
import { BINARY_PRECEDENCE, isRelationalOp } from "./operators.js";
import { describeType } from "./types.js";
import { formatDouble } from "./values.js";

const INDENT = "  ";
const INLINE_LIMIT = 72;
const BARE_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

function needsParens(child: AST.Expr, parentOp: AST.BinaryOp, isRight: boolean): boolean {
  if (child.kind === "ConditionalExpr") return true;
  const parentPrec = BINARY_PRECEDENCE[parentOp];
  if (child.kind === "CompareChain") return parentPrec >= BINARY_PRECEDENCE["<"];
  if (child.kind !== "BinaryExpr") return false;
  const childPrec = BINARY_PRECEDENCE[child.op];
  if (childPrec < parentPrec) return true;
  // `(a < b) < c` would read back as a chain.
  if (childPrec === parentPrec && isRelationalOp(parentOp)) return true;
  // Same precedence on the right keeps left-associativity: a - (b - c)
  return childPrec === parentPrec && isRight;
}

// Operands of unary and postfix operators bind tighter than any binary operator.
function formatTight(e: AST.Expr, depth: number): string {
  const out = formatExpr(e, depth);
  const wrap =
    e.kind === "BinaryExpr" ||
    e.kind === "CompareChain" ||
    e.kind === "ConditionalExpr" ||
    e.kind === "UnaryExpr" ||
    (e.kind === "IntLiteral" && e.value < 0n);
  return wrap ? `(${out})` : out;
}

function formatPostfixObject(e: AST.Expr, depth: number): string {
  // `5.length` would not lex as an int followed by a dot.
  return e.kind === "IntLiteral" ? `(${e.value})` : formatTight(e, depth);
}

export function format(program: AST.Program): string {
  const lines: string[] = [];
  // Imported statements stay in their own files.
  const statements = program.statements.filter((s) => s.span.file === program.span.file);
  statements.forEach((s, i) => {
    const prev = statements[i - 1];
    if (prev && (s.kind === "FunctionDecl" || prev.kind === "FunctionDecl")) {
      lines.push("");
    }
    lines.push(formatStmt(s, 0));
  });
  return lines.join("\n") + "\n";
}

function formatBlock(block: AST.Block, depth: number): string {
  if (block.body.length === 0) return "{}";
  const body = block.body.map((s) => formatStmt(s, depth + 1)).join("\n");
  return `{\n${body}\n${INDENT.repeat(depth)}}`;
}

function formatVarDecl(d: AST.VarDecl, depth: number): string {
  let out = `${d.constant ? "const" : "var"} ${d.name}`;
  if (d.declaredType) out += `: ${describeType(d.declaredType)}`;
  if (d.init) out += ` = ${formatExpr(d.init, depth)}`;
  return out;
}

function formatSimple(s: AST.SimpleStmt, depth: number): string {
  switch (s.kind) {
    case "AssignStmt":
      return `${formatExpr(s.target, depth)} ${s.op} ${formatExpr(s.value, depth)}`;
    case "UpdateStmt":
      return `${formatExpr(s.target, depth)}${s.op}`;
    case "CallStmt":
      return formatExpr(s.call, depth);
  }
}

function formatParam(p: AST.Param, depth: number): string {
  const base = `${p.name}: ${describeType(p.type)}`;
  return p.defaultValue ? `${base} = ${formatExpr(p.defaultValue, depth)}` : base;
}

function formatStmt(s: AST.Stmt, depth: number): string {
  const prefix = INDENT.repeat(depth);
  switch (s.kind) {
    case "VarDecl":
      return `${prefix}${formatVarDecl(s, depth)};`;
    case "TypeDecl":
      return `${prefix}type ${s.name} = ${describeType(s.type)};`;
    case "VarSetDecl": {
      if (s.vars.length === 0) return `${prefix}varset ${s.scope} ${s.name} {}`;
      const inner = INDENT.repeat(depth + 1);
      const vars = s.vars.map((v) => `${inner}${formatVarDecl(v, depth + 1)};`);
      return `${prefix}varset ${s.scope} ${s.name} {\n${vars.join("\n")}\n${prefix}}`;
    }
    case "FunctionDecl": {
      const params = s.params.map((p) => formatParam(p, depth)).join(", ");
      const ret = s.returnType ? `: ${describeType(s.returnType)}` : "";
      return `${prefix}function ${s.name}(${params})${ret} ${formatBlock(s.body, depth)}`;
    }
    case "AssignStmt":
    case "UpdateStmt":
    case "CallStmt":
      return `${prefix}${formatSimple(s, depth)};`;
    case "IfStmt":
      return `${prefix}${formatIf(s, depth)}`;
    case "WhileStmt":
      return `${prefix}while (${formatExpr(s.test, depth)}) ${formatBlock(s.body, depth)}`;
    case "DoWhileStmt":
      return `${prefix}do ${formatBlock(s.body, depth)} while (${formatExpr(s.test, depth)});`;
    case "ForStmt": {
      const init = s.init ? (s.init.kind === "VarDecl" ? formatVarDecl(s.init, depth) : formatSimple(s.init, depth)) : "";
      const test = s.test ? ` ${formatExpr(s.test, depth)}` : "";
      const update = s.update ? ` ${formatSimple(s.update, depth)}` : "";
      return `${prefix}for (${init};${test};${update}) ${formatBlock(s.body, depth)}`;
    }
    case "ForEachStmt":
      return `${prefix}foreach (${s.binding} in ${formatExpr(s.iterable, depth)}) ${formatBlock(s.body, depth)}`;
    case "BreakStmt":
      return `${prefix}break;`;
    case "ContinueStmt":
      return `${prefix}continue;`;
    case "ReturnStmt":
      return s.value ? `${prefix}return ${formatExpr(s.value, depth)};` : `${prefix}return;`;
    case "PrintStmt":
      return `${prefix}print ${formatExpr(s.value, depth)};`;
    case "TryStmt": {
      const inner = INDENT.repeat(depth + 1);
      const handlers = s.handlers.map((h) => {
        const binding = h.binding !== null ? `(${h.binding})` : "";
        return `${inner}when ${h.category}${binding} ${formatBlock(h.body, depth + 1)}`;
      });
      return `${prefix}try ${formatBlock(s.body, depth)} exceptions {\n${handlers.join("\n")}\n${prefix}}`;
    }
    case "RaiseStmt":
      return s.message
        ? `${prefix}raise ${s.category}(${formatExpr(s.message, depth)});`
        : `${prefix}raise ${s.category};`;
    case "ImportDecl":
      return `${prefix}import ${JSON.stringify(s.path)};`;
    case "Block":
      return `${prefix}${formatBlock(s, depth)}`;
  }
}

function formatIf(s: AST.IfStmt, depth: number): string {
  let out = `if (${formatExpr(s.test, depth)}) ${formatBlock(s.consequent, depth)}`;
  if (s.alternate) {
    out += s.alternate.kind === "IfStmt"
      ? ` else ${formatIf(s.alternate, depth)}`
      : ` else ${formatBlock(s.alternate, depth)}`;
  }
  return out;
}

export function formatExpr(e: AST.Expr, depth: number = 0): string {
  switch (e.kind) {
    case "IntLiteral":
      return String(e.value);
    case "DoubleLiteral":
      return formatDouble(e.value);
    case "BoolLiteral":
      return String(e.value);
    case "StrLiteral":
      return JSON.stringify(e.value);
    case "NullLiteral":
      return "null";
    case "Identifier":
      return e.name;
    case "ObjectLiteral":
      return formatObject(e, depth);
    case "ArrayLiteral":
      return formatArray(e, depth);
    case "MemberExpr":
      return `${formatPostfixObject(e.object, depth)}.${e.property}`;
    case "IndexExpr":
      return `${formatPostfixObject(e.object, depth)}[${formatExpr(e.index, depth)}]`;
    case "CallExpr": {
      const args = e.args.map((a) => formatExpr(a, depth)).join(", ");
      return `${e.keyword ? "call " : ""}${e.callee.join(".")}(${args})`;
    }
    case "CastExpr":
      return `${e.target}(${formatExpr(e.operand, depth)})`;
    case "UnaryExpr": {
      // `-5` would read back as a single negative literal.
      const operand = e.op === "-" && e.operand.kind === "IntLiteral" ? `(${e.operand.value})` : formatTight(e.operand, depth);
      return e.op === "typeof" ? `typeof ${operand}` : `${e.op}${operand}`;
    }
    case "BinaryExpr": {
      let leftStr = formatExpr(e.left, depth);
      let rightStr = formatExpr(e.right, depth);
      if (needsParens(e.left, e.op, false)) leftStr = `(${leftStr})`;
      if (needsParens(e.right, e.op, true)) rightStr = `(${rightStr})`;
      return `${leftStr} ${e.op} ${rightStr}`;
    }
    case "CompareChain": {
      let out = formatChainOperand(e.operands[0], e.ops[0], false, depth);
      e.ops.forEach((op, i) => {
        out += ` ${op} ${formatChainOperand(e.operands[i + 1], op, true, depth)}`;
      });
      return out;
    }
    case "ConditionalExpr": {
      const test = e.test.kind === "ConditionalExpr" ? `(${formatExpr(e.test, depth)})` : formatExpr(e.test, depth);
      return `${test} ? ${formatExpr(e.consequent, depth)} : ${formatExpr(e.alternate, depth)}`;
    }
  }
}

function formatChainOperand(operand: AST.Expr, op: AST.RelationalOp, isRight: boolean, depth: number): string {
  const out = formatExpr(operand, depth);
  return needsParens(operand, op, isRight) ? `(${out})` : out;
}

function formatKey(key: string): string {
  return BARE_KEY.test(key) && !RESERVED_WORDS.has(key) ? key : JSON.stringify(key);
}

function formatObject(obj: AST.ObjectLiteral, depth: number): string {
  if (obj.entries.length === 0) return "{}";

  const inlineParts = obj.entries.map((p) => `${formatKey(p.key)}: ${formatExpr(p.value, depth + 1)}`);
  const inline = `{ ${inlineParts.join(", ")} }`;
  if (inline.length <= INLINE_LIMIT && !inline.includes("\n")) return inline;

  const inner = INDENT.repeat(depth + 1);
  const outer = INDENT.repeat(depth);
  const parts = obj.entries.map((p) => `${inner}${formatKey(p.key)}: ${formatExpr(p.value, depth + 1)}`);
  return `{\n${parts.join(",\n")}\n${outer}}`;
}

function formatArray(list: AST.ArrayLiteral, depth: number): string {
  if (list.elements.length === 0) return "[]";

  const inlineParts = list.elements.map((e) => formatExpr(e, depth + 1));
  const inline = `[${inlineParts.join(", ")}]`;
  if (inline.length <= INLINE_LIMIT && !inline.includes("\n")) return inline;

  const inner = INDENT.repeat(depth + 1);
  const outer = INDENT.repeat(depth);
  const parts = list.elements.map((e) => `${inner}${formatExpr(e, depth + 1)}`);
  return `[\n${parts.join(",\n")}\n${outer}]`;
}
