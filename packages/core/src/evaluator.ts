/**
 * Skein Evaluator - executes Skein programs statement by statement.
 *
 * Statements produce explicit completions; `return`, `break` and `continue`
 * never travel as exceptions. Runtime faults are InterpreterErrors carrying
 * the span of the statement or expression at fault.
 */
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { BuiltinDef, BuiltinRegistry, ExecutionContext } from "./builtins.js";
import type { DataType } from "./types.js";
import { ANY, BOOL, DOUBLE, INT, JSON_TYPE, STRING, describeType } from "./types.js";
import type { Environment, Scope, Var } from "./environment.js";
import type { JsonValue, Value } from "./values.js";
import { cloneValue, formatValue, isMapKey, isValue, makeArray, makeRecord, typeNameOf } from "./values.js";
import { HostError, InterpreterError, SkeinError, UnknownBuiltinError, matchesCategory } from "./errors.js";
import { evalBinaryOp, evalUnaryOp, requireBool } from "./operators.js";

// --- Trace events ---
export type TraceEventType =
  | "run_start"
  | "run_end"
  | "stmt_start"
  | "stmt_end"
  | "fn_call_start"
  | "fn_call_end"
  | "builtin_start"
  | "builtin_end"
  | "callback_start"
  | "callback_end"
  | "budget_exceeded";

export type TraceData = { [key: string]: JsonValue };

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  span?: Span;
  data?: TraceData;
}

// --- Limits ---
export interface Limits {
  /** Total loop iterations per execution unit. */
  maxIterations?: number;
  maxCallDepth?: number;
  /** Wall-clock budget per execution unit. */
  timeMs?: number;
}

export const DEFAULT_MAX_CALL_DEPTH = 200;

interface BudgetTracker {
  iterations: number;
  startMs: number;
}

export interface EvaluatorOptions {
  env: Environment;
  builtins: BuiltinRegistry;
  runId: string;
  signal: AbortSignal;
  instanceKey: object;
  submitCallback(functionName: string, args: Value[]): Promise<Value>;
  limits?: Limits;
  trace?: (event: TraceEvent) => void;
  print?: (line: string) => void;
}

type Completion =
  | { type: "normal" }
  | { type: "break" }
  | { type: "continue" }
  | { type: "return"; value: Value };

const NORMAL: Completion = { type: "normal" };

/** A writable location: a variable, or a field or element reached from one. */
interface Place {
  type: DataType;
  read(): Value;
  write(value: Value): void;
  /** Throws when the root variable may not be written. */
  check(): void;
}

export class Evaluator {
  /** Lines printed since the instance last took them; taken at the end of each unit. */
  private pendingOutput: string[] = [];

  private readonly env: Environment;
  private readonly options: EvaluatorOptions;
  private readonly functions = new Map<string, AST.FunctionDecl>();
  private tracker: BudgetTracker = { iterations: 0, startMs: Date.now() };
  private depth = 0;

  constructor(options: EvaluatorOptions) {
    this.options = options;
    this.env = options.env;
  }

  emitTrace(event: TraceEventType, span?: Span, data?: TraceData): void {
    if (this.options.trace) {
      this.options.trace({
        ts: new Date().toISOString(),
        runId: this.options.runId,
        event,
        span,
        data,
      });
    }
  }

  get bufferedLines(): number {
    return this.pendingOutput.length;
  }

  takeOutput(): string[] {
    const lines = this.pendingOutput;
    this.pendingOutput = [];
    return lines;
  }

  hasFunction(name: string): boolean {
    return this.functions.has(name);
  }

  /**
   * Register types and functions, then declare every VarSet with its
   * initializers, so hosts can bind `in` variables before the script starts.
   */
  async prepare(program: AST.Program): Promise<void> {
    for (const stmt of program.statements) {
      if (stmt.kind === "TypeDecl") {
        this.env.types.registry.define(stmt.name, stmt.type);
      } else if (stmt.kind === "FunctionDecl") {
        if (this.functions.has(stmt.name)) {
          throw new InterpreterError("E_DUP_DECL", `Function '${stmt.name}' is already declared.`, stmt.span);
        }
        this.functions.set(stmt.name, stmt);
      }
    }
    this.beginUnit();
    for (const stmt of program.statements) {
      if (stmt.kind !== "VarSetDecl") continue;
      const set = this.env.defineVarSet(stmt.name, stmt.scope, stmt.span);
      for (const decl of stmt.vars) {
        await this.declareVar(decl, this.env.global, set);
      }
    }
  }

  /** Run the remaining top-level statements. A top-level `return` ends the unit with its value. */
  async runProgram(program: AST.Program): Promise<Value> {
    this.beginUnit();
    this.emitTrace("run_start", program.span, { file: program.span.file, instance: this.env.name });
    const startMs = this.tracker.startMs;
    try {
      let result: Value = null;
      for (const stmt of program.statements) {
        if (stmt.kind === "TypeDecl" || stmt.kind === "FunctionDecl" || stmt.kind === "VarSetDecl") continue;
        const completion = await this.execStmt(stmt, this.env.global);
        if (completion.type === "return") {
          result = completion.value;
          break;
        }
      }
      this.emitTrace("run_end", program.span, { durationMs: Date.now() - startMs });
      return result;
    } catch (e) {
      const errorData: TraceData = { durationMs: Date.now() - startMs };
      errorData["error"] = e instanceof SkeinError ? e.code : "E_RUNTIME";
      errorData["message"] = e instanceof Error ? e.message : String(e);
      this.emitTrace("run_end", program.span, errorData);
      throw e;
    }
  }

  /** Invoke a script function as its own execution unit. */
  async runCallback(name: string, args: Value[]): Promise<Value> {
    this.beginUnit();
    const decl = this.functions.get(name);
    const span = decl?.span;
    this.emitTrace("callback_start", span, { fn: name });
    try {
      if (!decl) {
        throw new InterpreterError("E_UNKNOWN_FN", `Unknown function '${name}'.`, undefined, { fn: name });
      }
      const result = await this.callFunction(decl, args.map(cloneValue), decl.span);
      this.emitTrace("callback_end", span, { fn: name, outcome: "ok" });
      return result;
    } catch (e) {
      this.emitTrace("callback_end", span, {
        fn: name,
        outcome: "err",
        error: e instanceof SkeinError ? e.code : "E_RUNTIME",
      });
      throw e;
    }
  }

  private beginUnit(): void {
    this.tracker = { iterations: 0, startMs: Date.now() };
    this.depth = 0;
  }

  // --- Limits and cancellation ---

  private checkCancelled(span?: Span): void {
    if (this.options.signal.aborted) {
      throw new InterpreterError("E_CANCELLED", "Execution cancelled.", span);
    }
  }

  private budgetExceeded(budget: string, limit: number, actual: number, message: string, span?: Span): never {
    this.emitTrace("budget_exceeded", span, { budget, limit, actual });
    throw new InterpreterError("E_BUDGET", `Budget exceeded: ${message}`, span, { budget, limit, actual });
  }

  private enforceTimeBudget(span?: Span): void {
    const timeMs = this.options.limits?.timeMs;
    if (timeMs === undefined) return;
    const elapsed = Date.now() - this.tracker.startMs;
    if (elapsed > timeMs) {
      this.budgetExceeded("timeMs", timeMs, elapsed, `timeMs limit of ${timeMs}ms exceeded (${elapsed}ms elapsed).`, span);
    }
  }

  /** Loop back-edge: cancellation, iteration and time checks. */
  private tick(span: Span): void {
    this.checkCancelled(span);
    this.tracker.iterations++;
    const max = this.options.limits?.maxIterations;
    if (max !== undefined && this.tracker.iterations > max) {
      this.budgetExceeded("maxIterations", max, this.tracker.iterations, `maxIterations limit of ${max} reached.`, span);
    }
    this.enforceTimeBudget(span);
  }

  // --- Statements ---

  private async execStmts(stmts: AST.Stmt[], scope: Scope): Promise<Completion> {
    for (const stmt of stmts) {
      const completion = await this.execStmt(stmt, scope);
      if (completion.type !== "normal") return completion;
    }
    return NORMAL;
  }

  private async execBlock(block: AST.Block, scope: Scope): Promise<Completion> {
    return this.execStmts(block.body, this.env.child(scope, "block"));
  }

  private async execStmt(stmt: AST.Stmt, scope: Scope): Promise<Completion> {
    this.enforceTimeBudget(stmt.span);
    this.emitTrace("stmt_start", stmt.span);
    try {
      const completion = await this.execStmtInner(stmt, scope);
      this.emitTrace("stmt_end", stmt.span);
      return completion;
    } catch (e) {
      if (e instanceof SkeinError && !e.span) e.span = stmt.span;
      throw e;
    }
  }

  private async execStmtInner(stmt: AST.Stmt, scope: Scope): Promise<Completion> {
    switch (stmt.kind) {
      case "VarDecl":
        await this.declareVar(stmt, scope);
        return NORMAL;

      case "TypeDecl":
      case "FunctionDecl":
      case "VarSetDecl":
        // Registered by prepare(); the parser keeps them at top level.
        return NORMAL;

      case "AssignStmt": {
        const value = await this.evalExpr(stmt.value, scope);
        const place = await this.resolvePlace(stmt.target, scope);
        if (stmt.op === "=") {
          place.write(value);
        } else {
          place.check();
          const op = stmt.op === "+=" ? "+" : stmt.op === "-=" ? "-" : stmt.op === "*=" ? "*" : "/";
          place.write(evalBinaryOp(op, place.read(), value, stmt.span));
        }
        return NORMAL;
      }

      case "UpdateStmt": {
        const place = await this.resolvePlace(stmt.target, scope);
        place.check();
        place.write(evalBinaryOp(stmt.op === "++" ? "+" : "-", place.read(), 1n, stmt.span));
        return NORMAL;
      }

      case "CallStmt":
        await this.evalCall(stmt.call, scope);
        return NORMAL;

      case "PrintStmt": {
        const text = formatValue(await this.evalExpr(stmt.value, scope));
        this.pendingOutput.push(text);
        this.options.print?.(text);
        return NORMAL;
      }

      case "Block":
        return this.execBlock(stmt, scope);

      case "IfStmt": {
        const test = requireBool(await this.evalExpr(stmt.test, scope), "Condition", stmt.test.span);
        if (test) return this.execBlock(stmt.consequent, scope);
        if (stmt.alternate === null) return NORMAL;
        if (stmt.alternate.kind === "IfStmt") return this.execStmt(stmt.alternate, scope);
        return this.execBlock(stmt.alternate, scope);
      }

      case "WhileStmt":
        while (requireBool(await this.evalExpr(stmt.test, scope), "Condition", stmt.test.span)) {
          this.tick(stmt.span);
          const completion = await this.execBlock(stmt.body, scope);
          if (completion.type === "break") break;
          if (completion.type === "return") return completion;
        }
        return NORMAL;

      case "DoWhileStmt":
        do {
          this.tick(stmt.span);
          const completion = await this.execBlock(stmt.body, scope);
          if (completion.type === "break") break;
          if (completion.type === "return") return completion;
        } while (requireBool(await this.evalExpr(stmt.test, scope), "Condition", stmt.test.span));
        return NORMAL;

      case "ForStmt": {
        const header = this.env.child(scope, "block");
        if (stmt.init) {
          if (stmt.init.kind === "VarDecl") await this.declareVar(stmt.init, header);
          else await this.execStmt(stmt.init, header);
        }
        while (stmt.test === null || requireBool(await this.evalExpr(stmt.test, header), "Condition", stmt.test.span)) {
          this.tick(stmt.span);
          const completion = await this.execBlock(stmt.body, header);
          if (completion.type === "break") break;
          if (completion.type === "return") return completion;
          if (stmt.update) await this.execStmt(stmt.update, header);
        }
        return NORMAL;
      }

      case "ForEachStmt": {
        const items = this.iterationItems(await this.evalExpr(stmt.iterable, scope), stmt.iterable.span);
        for (const item of items) {
          this.tick(stmt.span);
          const iteration = this.env.child(scope, "block");
          this.env.declare(iteration, stmt.binding, ANY, cloneValue(item), { span: stmt.span });
          const completion = await this.execStmts(stmt.body.body, iteration);
          if (completion.type === "break") break;
          if (completion.type === "return") return completion;
        }
        return NORMAL;
      }

      case "BreakStmt":
        return { type: "break" };

      case "ContinueStmt":
        return { type: "continue" };

      case "ReturnStmt":
        return { type: "return", value: stmt.value ? await this.evalExpr(stmt.value, scope) : null };

      case "TryStmt":
        return this.execTry(stmt, scope);

      case "ImportDecl":
        return NORMAL;

      case "RaiseStmt": {
        const message = stmt.message ? formatValue(await this.evalExpr(stmt.message, scope)) : stmt.category;
        throw new InterpreterError("E_RAISED", message, stmt.span, { category: stmt.category }, { category: stmt.category });
      }
    }
  }

  private async declareVar(decl: AST.VarDecl, scope: Scope, varSet?: Var["varSet"]): Promise<Var> {
    const type = decl.declaredType ?? ANY;
    const initial = decl.init ? await this.evalExpr(decl.init, scope) : this.env.types.defaultValue(type);
    const value = this.env.types.convert(type, initial);
    return this.env.declare(scope, decl.name, type, value, { constant: decl.constant, varSet, span: decl.span });
  }

  private async execTry(stmt: AST.TryStmt, scope: Scope): Promise<Completion> {
    try {
      return await this.execBlock(stmt.body, scope);
    } catch (e) {
      if (!(e instanceof SkeinError)) throw e;
      const err = e;
      const handler = stmt.handlers.find((h) => matchesCategory(err, h.category));
      if (!handler) throw err;
      const handlerScope = this.env.child(scope, "block");
      if (handler.binding !== null) {
        this.env.declare(handlerScope, handler.binding, ANY, err.message, { span: handler.span });
      }
      return this.execStmts(handler.body.body, handlerScope);
    }
  }

  private iterationItems(value: Value, span: Span): Value[] {
    if (value === null) {
      throw new InterpreterError("E_NULL", "Cannot iterate over null.", span);
    }
    if (typeof value === "string") return value.split("");
    if (typeof value !== "object") {
      throw new InterpreterError("E_TYPE_OP", `Cannot iterate over ${typeNameOf(value)}.`, span);
    }
    switch (value.kind) {
      case "array":
      case "queue":
        return [...value.items];
      case "map":
        return [...value.entries.keys()];
      case "record":
        return [...value.fields.keys()];
      case "handle":
        throw new InterpreterError("E_TYPE_OP", "Cannot iterate over handle.", span);
    }
  }

  // --- Places (assignment targets) ---

  private lookup(scope: Scope, name: string, span: Span): Var {
    const v = scope.lookup(name);
    if (!v) {
      throw new InterpreterError("E_UNBOUND", `Unbound variable '${name}'.`, span, { variable: name });
    }
    return v;
  }

  private async resolvePlace(target: AST.Expr, scope: Scope): Promise<Place> {
    switch (target.kind) {
      case "Identifier": {
        const v = this.lookup(scope, target.name, target.span);
        return {
          type: v.type,
          read: () => v.value,
          check: () => this.env.checkWrite(v, "script", target.span),
          write: (value) => this.env.assign(v, value, "script", target.span),
        };
      }
      case "MemberExpr": {
        const parent = await this.resolvePlace(target.object, scope);
        return this.memberPlace(parent, target.property, target.span);
      }
      case "IndexExpr": {
        const parent = await this.resolvePlace(target.object, scope);
        const index = await this.evalExpr(target.index, scope);
        return this.indexPlace(parent, index, target.span);
      }
      default:
        throw new InterpreterError("E_TYPE_OP", "Invalid assignment target.", target.span);
    }
  }

  /** Declared type of a record field, from the static type or the record's named type. */
  private fieldType(staticType: DataType, record: { typeName: string | null }, name: string): DataType | null {
    const resolved = this.env.types.registry.resolve(staticType);
    if (resolved.kind === "record") {
      return resolved.fields.find((f) => f.name === name)?.type ?? null;
    }
    if (record.typeName !== null && this.env.types.registry.has(record.typeName)) {
      return this.env.types.memberType({ kind: "named", name: record.typeName }, name);
    }
    return resolved.kind === "json" ? JSON_TYPE : ANY;
  }

  private memberPlace(parent: Place, name: string, span: Span): Place {
    const container = parent.read();
    if (container === null) {
      throw new InterpreterError("E_NULL", `Cannot access '${name}' on null.`, span);
    }
    if (typeof container === "object" && container.kind === "record") {
      const type = this.fieldType(parent.type, container, name);
      if (type === null) {
        throw new InterpreterError("E_FIELD", `Record has no field '${name}'.`, span, { field: name });
      }
      return {
        type,
        read: () => {
          const value = container.fields.get(name);
          if (value === undefined) {
            throw new InterpreterError("E_FIELD", `Record has no field '${name}'.`, span, { field: name });
          }
          return value;
        },
        check: parent.check,
        write: (value) => {
          parent.check();
          container.fields.set(name, this.env.types.convert(type, value));
        },
      };
    }
    if (typeof container === "object" && container.kind === "map") {
      return this.indexPlace(parent, name, span);
    }
    throw new InterpreterError("E_TYPE_OP", `Cannot assign member '${name}' on ${typeNameOf(container)}.`, span);
  }

  private indexPlace(parent: Place, index: Value, span: Span): Place {
    const container = parent.read();
    if (container === null) {
      throw new InterpreterError("E_NULL", "Cannot index null.", span);
    }
    if (typeof container !== "object" || container.kind === "handle") {
      throw new InterpreterError("E_TYPE_OP", `Cannot assign an element of ${typeNameOf(container)}.`, span);
    }
    switch (container.kind) {
      case "record":
        if (typeof index !== "string") {
          throw new InterpreterError("E_TYPE_OP", `Record key must be string, got ${typeNameOf(index)}.`, span);
        }
        return this.memberPlace(parent, index, span);
      case "map": {
        const key = this.mapKey(container.keyType, index, span);
        const type = container.valueType;
        return {
          type,
          read: () => container.entries.get(key) ?? null,
          check: parent.check,
          write: (value) => {
            parent.check();
            container.entries.set(key, this.env.types.convert(type, value));
          },
        };
      }
      case "array":
      case "queue": {
        const i = this.elementIndex(index, span);
        const type = container.elementType;
        const capacity = container.kind === "array" ? container.capacity : null;
        if (capacity !== null && i >= capacity) {
          throw new InterpreterError("E_INDEX", `Index ${i} out of range for ${typeNameOf(container)}.`, span, {
            index: i,
            capacity,
          });
        }
        return {
          type,
          read: () => {
            if (i >= container.items.length) {
              throw new InterpreterError("E_INDEX", `Index ${i} out of range (length ${container.items.length}).`, span);
            }
            return container.items[i];
          },
          check: parent.check,
          write: (value) => {
            parent.check();
            if (container.kind === "queue" && i >= container.items.length) {
              throw new InterpreterError("E_INDEX", `Index ${i} out of range (length ${container.items.length}).`, span);
            }
            const converted = this.env.types.convert(type, value);
            while (container.items.length < i) container.items.push(this.env.types.defaultValue(type));
            container.items[i] = converted;
          },
        };
      }
    }
  }

  private elementIndex(index: Value, span: Span): number {
    if (typeof index !== "bigint") {
      throw new InterpreterError("E_TYPE_OP", `Index must be int, got ${typeNameOf(index)}.`, span);
    }
    if (index < 0n || index > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new InterpreterError("E_INDEX", `Index ${index} out of range.`, span, { index: index.toString() });
    }
    return Number(index);
  }

  private mapKey(keyType: DataType, index: Value, span: Span): string | bigint | number | boolean {
    const key = this.env.types.convert(keyType, index);
    if (!isMapKey(key)) {
      throw new InterpreterError("E_TYPE_OP", `Map key must be scalar, got ${typeNameOf(key)}.`, span);
    }
    return key;
  }

  // --- Expressions ---

  async evalExpr(expr: AST.Expr, scope: Scope): Promise<Value> {
    switch (expr.kind) {
      case "IntLiteral":
      case "DoubleLiteral":
      case "BoolLiteral":
      case "StrLiteral":
        return expr.value;
      case "NullLiteral":
        return null;

      case "Identifier":
        return this.lookup(scope, expr.name, expr.span).value;

      case "ObjectLiteral": {
        const entries: Array<[string, Value]> = [];
        for (const entry of expr.entries) {
          entries.push([entry.key, cloneValue(await this.evalExpr(entry.value, scope))]);
        }
        return makeRecord(entries);
      }

      case "ArrayLiteral": {
        const items: Value[] = [];
        for (const e of expr.elements) {
          items.push(cloneValue(await this.evalExpr(e, scope)));
        }
        return makeArray(items, ANY);
      }

      case "MemberExpr":
        return this.readMember(await this.evalExpr(expr.object, scope), expr.property, expr.span);

      case "IndexExpr": {
        const object = await this.evalExpr(expr.object, scope);
        const index = await this.evalExpr(expr.index, scope);
        return this.readIndex(object, index, expr.span);
      }

      case "CallExpr":
        return this.evalCall(expr, scope);

      case "CastExpr": {
        const operand = await this.evalExpr(expr.operand, scope);
        return this.env.types.convert(castType(expr.target), operand);
      }

      case "UnaryExpr":
        return evalUnaryOp(expr.op, await this.evalExpr(expr.operand, scope), expr.span);

      case "BinaryExpr": {
        if (expr.op === "&&" || expr.op === "||") {
          const left = requireBool(await this.evalExpr(expr.left, scope), `Left operand of '${expr.op}'`, expr.left.span);
          if (expr.op === "&&" ? !left : left) return left;
          return requireBool(await this.evalExpr(expr.right, scope), `Right operand of '${expr.op}'`, expr.right.span);
        }
        const left = await this.evalExpr(expr.left, scope);
        const right = await this.evalExpr(expr.right, scope);
        return evalBinaryOp(expr.op, left, right, expr.span);
      }

      case "CompareChain": {
        let left = await this.evalExpr(expr.operands[0], scope);
        for (let i = 0; i < expr.ops.length; i++) {
          const operand = expr.operands[i + 1];
          const right = await this.evalExpr(operand, scope);
          if (evalBinaryOp(expr.ops[i], left, right, expr.span) !== true) return false;
          left = right;
        }
        return true;
      }

      case "ConditionalExpr": {
        const test = requireBool(await this.evalExpr(expr.test, scope), "Condition", expr.test.span);
        return this.evalExpr(test ? expr.consequent : expr.alternate, scope);
      }
    }
  }

  private readMember(object: Value, name: string, span: Span): Value {
    if (object === null) {
      throw new InterpreterError("E_NULL", `Cannot access '${name}' on null.`, span);
    }
    const isCount = name === "length" || name === "size";
    if (typeof object === "string") {
      if (isCount) return BigInt(object.length);
    } else if (typeof object === "object") {
      switch (object.kind) {
        case "record": {
          const value = object.fields.get(name);
          if (value !== undefined) return value;
          if (isCount) return BigInt(object.fields.size);
          throw new InterpreterError("E_FIELD", `Record has no field '${name}'.`, span, { field: name });
        }
        case "map":
          if (isCount && !object.entries.has(name)) return BigInt(object.entries.size);
          return object.entries.get(name) ?? null;
        case "array":
        case "queue":
          if (isCount) return BigInt(object.items.length);
          break;
        case "handle":
          if (name === "tag") return object.tag;
          if (name === "id") return BigInt(object.id);
          break;
      }
    }
    throw new InterpreterError("E_FIELD", `${typeNameOf(object)} has no member '${name}'.`, span, { field: name });
  }

  private readIndex(object: Value, index: Value, span: Span): Value {
    if (object === null) {
      throw new InterpreterError("E_NULL", "Cannot index null.", span);
    }
    if (typeof object === "string") {
      const i = this.elementIndex(index, span);
      if (i >= object.length) {
        throw new InterpreterError("E_INDEX", `Index ${i} out of range (length ${object.length}).`, span);
      }
      return object[i];
    }
    if (typeof object !== "object" || object.kind === "handle") {
      throw new InterpreterError("E_TYPE_OP", `Cannot index ${typeNameOf(object)}.`, span);
    }
    switch (object.kind) {
      case "array":
      case "queue": {
        const i = this.elementIndex(index, span);
        if (i >= object.items.length) {
          throw new InterpreterError("E_INDEX", `Index ${i} out of range (length ${object.items.length}).`, span, {
            index: i,
            length: object.items.length,
          });
        }
        return object.items[i];
      }
      case "map":
        return object.entries.get(this.mapKey(object.keyType, index, span)) ?? null;
      case "record": {
        if (typeof index !== "string") {
          throw new InterpreterError("E_TYPE_OP", `Record key must be string, got ${typeNameOf(index)}.`, span);
        }
        const value = object.fields.get(index);
        if (value === undefined) {
          throw new InterpreterError("E_FIELD", `Record has no field '${index}'.`, span, { field: index });
        }
        return value;
      }
    }
  }

  // --- Calls ---

  private async evalCall(expr: AST.CallExpr, scope: Scope): Promise<Value> {
    const args: Value[] = [];
    for (const a of expr.args) {
      args.push(await this.evalExpr(a, scope));
    }

    if (expr.callee.length === 1) {
      const name = expr.callee[0];
      const decl = this.functions.get(name);
      if (!decl) {
        throw new InterpreterError("E_UNKNOWN_FN", `Unknown function '${name}'.`, expr.span, { fn: name });
      }
      return this.callFunction(decl, args.map(cloneValue), expr.span);
    }

    const name = expr.callee.join(".");
    const def = this.options.builtins.lookup(name);
    if (!def) {
      throw new UnknownBuiltinError(name, expr.span);
    }
    const target = def.mutates === undefined ? undefined : expr.args[def.mutates];
    if (target) this.checkInPlaceWrite(target, scope);
    return this.callBuiltin(def, args, expr.span);
  }

  /** A builtin that changes an argument in place writes to the variable the argument was read from. */
  private checkInPlaceWrite(target: AST.Expr, scope: Scope): void {
    let root = target;
    while (root.kind === "MemberExpr" || root.kind === "IndexExpr") root = root.object;
    if (root.kind !== "Identifier") return;
    this.env.checkWrite(this.lookup(scope, root.name, root.span), "script", target.span);
  }

  private async callFunction(decl: AST.FunctionDecl, args: Value[], span: Span): Promise<Value> {
    const required = decl.params.filter((p) => p.defaultValue === null).length;
    if (args.length < required || args.length > decl.params.length) {
      const expected = required === decl.params.length ? `${required}` : `${required} to ${decl.params.length}`;
      throw new InterpreterError(
        "E_ARITY",
        `Function '${decl.name}' expects ${expected} argument(s), got ${args.length}.`,
        span,
        { fn: decl.name, expected, actual: args.length }
      );
    }

    const maxDepth = this.options.limits?.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
    if (this.depth + 1 > maxDepth) {
      throw new InterpreterError("E_STACK_OVERFLOW", `Call depth limit of ${maxDepth} exceeded in '${decl.name}'.`, span, {
        fn: decl.name,
        limit: maxDepth,
      });
    }
    this.checkCancelled(span);

    this.emitTrace("fn_call_start", span, { fn: decl.name });
    this.depth++;
    try {
      const fnScope = this.env.child(this.env.global, "function");
      for (let i = 0; i < decl.params.length; i++) {
        const param = decl.params[i];
        const defaultValue = param.defaultValue;
        let value: Value;
        if (i < args.length) {
          value = args[i];
        } else if (defaultValue !== null) {
          value = await this.evalExpr(defaultValue, fnScope);
        } else {
          value = null;
        }
        this.env.declare(fnScope, param.name, param.type, this.env.types.convert(param.type, value), { span: param.span });
      }

      const completion = await this.execStmts(decl.body.body, fnScope);
      let result: Value = null;
      if (decl.returnType !== null) {
        if (completion.type !== "return") {
          throw new InterpreterError(
            "E_NO_RETURN",
            `Function '${decl.name}' must return a value of type ${describeType(decl.returnType)}.`,
            decl.span,
            { fn: decl.name }
          );
        }
        result = this.env.types.convert(decl.returnType, completion.value);
      } else if (completion.type === "return") {
        result = completion.value;
      }
      this.emitTrace("fn_call_end", span, { fn: decl.name });
      return result;
    } finally {
      this.depth--;
    }
  }

  private async callBuiltin(def: BuiltinDef, args: Value[], span: Span): Promise<Value> {
    this.checkCancelled(span);
    this.emitTrace("builtin_start", span, { builtin: def.name, argc: args.length });
    const startMs = Date.now();
    const env = this.env;
    const ctx: ExecutionContext = {
      instanceName: env.name,
      instanceKey: this.options.instanceKey,
      signal: this.options.signal,
      span,
      print: (text) => {
        this.pendingOutput.push(text);
        this.options.print?.(text);
      },
      getVar: (path) => env.getPath(path),
      setVar: (path, value) => env.setPath(path, value, "script", span),
      convert: (type, value) => env.types.convert(type, value),
      submitCallback: (fn, cbArgs = []) => this.options.submitCallback(fn, cbArgs),
    };

    let result: Value;
    try {
      const raw = await def.execute(args, ctx);
      result = isValue(raw) ? raw : null;
    } catch (e) {
      const errMsg = e instanceof Error ? e.message : String(e);
      this.emitTrace("builtin_end", span, {
        builtin: def.name,
        outcome: "err",
        durationMs: Date.now() - startMs,
        error: errMsg,
      });
      if (e instanceof SkeinError) throw e;
      throw new InterpreterError(
        "E_HOST",
        `Builtin '${def.name}' failed: ${errMsg}`,
        span,
        { builtin: def.name },
        { cause: e, category: e instanceof HostError ? e.category : undefined }
      );
    }

    this.emitTrace("builtin_end", span, { builtin: def.name, outcome: "ok", durationMs: Date.now() - startMs });
    this.checkCancelled(span);
    this.enforceTimeBudget(span);
    return result;
  }
}

function castType(target: AST.CastTarget): DataType {
  switch (target) {
    case "int":
      return INT;
    case "double":
      return DOUBLE;
    case "string":
      return STRING;
    case "bool":
      return BOOL;
    case "json":
      return JSON_TYPE;
  }
}
