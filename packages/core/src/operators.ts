/**
 * Skein operator table and operator semantics.
 *
 * The precedence table drives both precedence climbing in the parser and
 * parenthesization in the formatter.
 */
import type { BinaryOp, RelationalOp, Span, UnaryOp } from "./ast.js";
import type { Value } from "./values.js";
import { formatValue, typeNameOf, valuesEqual, wrapInt } from "./values.js";
import { InterpreterError } from "./errors.js";

// Higher binds tighter.
export const BINARY_PRECEDENCE: Record<BinaryOp, number> = {
  "||": 1,
  "&&": 2,
  "==": 3, "!=": 3,
  "<": 4, ">": 4, "<=": 4, ">=": 4,
  "+": 5, "-": 5,
  "*": 6, "/": 6, "%": 6,
};

export const UNARY_PRECEDENCE = 7;

const BINARY_SPELLINGS: Record<string, BinaryOp> = {
  "||": "||", or: "||",
  "&&": "&&", and: "&&",
  "==": "==", "!=": "!=",
  "<": "<", ">": ">", "<=": "<=", ">=": ">=",
  "+": "+", "-": "-",
  "*": "*", "/": "/", "%": "%",
};

export function isRelationalOp(op: BinaryOp): op is RelationalOp {
  return op === "<" || op === ">" || op === "<=" || op === ">=";
}

export function binaryOpFromImage(image: string): BinaryOp | undefined {
  return BINARY_SPELLINGS[image];
}

function isNumeric(v: Value): v is bigint | number {
  return typeof v === "bigint" || typeof v === "number";
}

function operandError(op: string, left: Value, right: Value, span: Span): InterpreterError {
  return new InterpreterError(
    "E_TYPE_OP",
    `Operator '${op}' cannot be applied to ${typeNameOf(left)} and ${typeNameOf(right)}.`,
    span
  );
}

export function requireBool(value: Value, context: string, span: Span): boolean {
  if (typeof value !== "boolean") {
    throw new InterpreterError("E_TYPE_OP", `${context} must be bool, got ${typeNameOf(value)}.`, span);
  }
  return value;
}

/**
 * Evaluate a non-short-circuit binary operator.
 */
export function evalBinaryOp(op: Exclude<BinaryOp, "&&" | "||">, left: Value, right: Value, span: Span): Value {
  switch (op) {
    case "==":
    case "!=": {
      const equal = valuesEqual(left, right);
      return op === "==" ? equal : !equal;
    }
    case "<":
    case ">":
    case "<=":
    case ">=":
      return compare(op, left, right, span);
    case "+":
      if (typeof left === "string" || typeof right === "string") {
        return formatValue(left) + formatValue(right);
      }
      return arithmetic(op, left, right, span);
    case "-":
    case "*":
    case "/":
    case "%":
      return arithmetic(op, left, right, span);
  }
}

function arithmetic(op: "+" | "-" | "*" | "/" | "%", left: Value, right: Value, span: Span): Value {
  if (!isNumeric(left) || !isNumeric(right)) {
    throw operandError(op, left, right, span);
  }

  if (typeof left === "bigint" && typeof right === "bigint") {
    switch (op) {
      case "+": return wrapInt(left + right);
      case "-": return wrapInt(left - right);
      case "*": return wrapInt(left * right);
      case "/":
        if (right === 0n) throw new InterpreterError("E_DIV_ZERO", "Division by zero.", span);
        return wrapInt(left / right);
      case "%":
        if (right === 0n) throw new InterpreterError("E_DIV_ZERO", "Modulo by zero.", span);
        return left % right;
    }
  }

  const l = Number(left);
  const r = Number(right);
  switch (op) {
    case "+": return l + r;
    case "-": return l - r;
    case "*": return l * r;
    case "/":
      if (r === 0) throw new InterpreterError("E_DIV_ZERO", "Division by zero.", span);
      return l / r;
    case "%":
      if (r === 0) throw new InterpreterError("E_DIV_ZERO", "Modulo by zero.", span);
      return l % r;
  }
}

function compare(op: "<" | ">" | "<=" | ">=", left: Value, right: Value, span: Span): boolean {
  let order: number;
  if (typeof left === "bigint" && typeof right === "bigint") {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else if (isNumeric(left) && isNumeric(right)) {
    const l = Number(left);
    const r = Number(right);
    if (Number.isNaN(l) || Number.isNaN(r)) return false;
    order = l < r ? -1 : l > r ? 1 : 0;
  } else if (typeof left === "string" && typeof right === "string") {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else {
    throw operandError(op, left, right, span);
  }
  switch (op) {
    case "<": return order < 0;
    case ">": return order > 0;
    case "<=": return order <= 0;
    case ">=": return order >= 0;
  }
}

export function evalUnaryOp(op: UnaryOp, operand: Value, span: Span): Value {
  switch (op) {
    case "typeof":
      return typeNameOf(operand);
    case "!":
      if (typeof operand !== "boolean") {
        throw new InterpreterError("E_TYPE_OP", `Operator '!' cannot be applied to ${typeNameOf(operand)}.`, span);
      }
      return !operand;
    case "-":
    case "+":
      if (typeof operand === "bigint") return op === "-" ? wrapInt(-operand) : operand;
      if (typeof operand === "number") return op === "-" ? -operand : operand;
      throw new InterpreterError("E_TYPE_OP", `Operator '${op}' cannot be applied to ${typeNameOf(operand)}.`, span);
  }
}
