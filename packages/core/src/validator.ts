/**
 * Skein Semantic Validator
 * Static checks over a parsed program: declarations, name resolution and
 * user function call shapes.
 */
import type * as AST from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

interface Binding {
  constant: boolean;
}

class StaticScope {
  readonly names = new Map<string, Binding>();

  constructor(readonly parent: StaticScope | null) {}

  lookup(name: string): Binding | undefined {
    for (let s: StaticScope | null = this; s; s = s.parent) {
      const found = s.names.get(name);
      if (found) return found;
    }
    return undefined;
  }
}

interface ValidationContext {
  diags: Diagnostic[];
  functions: Map<string, AST.FunctionDecl>;
  /** Builtin namespace -> first call site. */
  namespaces: Map<string, AST.Span>;
}

export function validate(program: AST.Program): Diagnostic[] {
  return analyze(program).diags;
}

/**
 * Namespaces of every builtin the program calls, lower-cased, mapped to the
 * first call site. Used to check host namespaces against configuration
 * before anything runs.
 */
export function builtinNamespaces(program: AST.Program): Map<string, AST.Span> {
  return analyze(program).namespaces;
}

function analyze(program: AST.Program): ValidationContext {
  const ctx: ValidationContext = { diags: [], functions: new Map(), namespaces: new Map() };

  // Functions are hoisted.
  for (const stmt of program.statements) {
    if (stmt.kind !== "FunctionDecl") continue;
    if (ctx.functions.has(stmt.name)) {
      ctx.diags.push(
        makeDiag("E_DUP_DECL", `Duplicate function definition '${stmt.name}'.`, stmt.span, "Use a different function name.")
      );
      continue;
    }
    ctx.functions.set(stmt.name, stmt);
  }

  // VarSet variables are declared before any other top-level statement runs.
  const global = new StaticScope(null);
  const varSetNames = new Set<string>();
  for (const stmt of program.statements) {
    if (stmt.kind !== "VarSetDecl") continue;
    if (varSetNames.has(stmt.name)) {
      ctx.diags.push(makeDiag("E_DUP_DECL", `Duplicate varset '${stmt.name}'.`, stmt.span, "Use a different varset name."));
    }
    varSetNames.add(stmt.name);
    for (const decl of stmt.vars) {
      validateVarDecl(decl, global, ctx);
    }
  }

  // Function bodies see every top-level variable, whenever it is declared.
  const globalView = new StaticScope(null);
  for (const stmt of program.statements) {
    if (stmt.kind === "VarDecl") globalView.names.set(stmt.name, { constant: stmt.constant });
    if (stmt.kind === "VarSetDecl") {
      for (const decl of stmt.vars) globalView.names.set(decl.name, { constant: decl.constant });
    }
  }

  for (const stmt of program.statements) {
    if (stmt.kind === "FunctionDecl") {
      validateFunction(stmt, globalView, ctx);
    } else if (stmt.kind !== "VarSetDecl" && stmt.kind !== "TypeDecl") {
      validateStmt(stmt, global, ctx);
    }
  }

  return ctx;
}

function validateFunction(fn: AST.FunctionDecl, globalView: StaticScope, ctx: ValidationContext): void {
  const scope = new StaticScope(globalView);
  for (const param of fn.params) {
    if (scope.names.has(param.name)) {
      ctx.diags.push(
        makeDiag(
          "E_DUP_DECL",
          `Duplicate parameter '${param.name}' in function '${fn.name}'.`,
          param.span,
          "Use unique parameter names in function declarations."
        )
      );
    }
    if (param.defaultValue) validateExpr(param.defaultValue, scope, ctx);
    scope.names.set(param.name, { constant: false });
  }
  validateStmts(fn.body.body, scope, ctx);
}

function declare(name: string, constant: boolean, span: AST.Span, scope: StaticScope, ctx: ValidationContext): void {
  if (scope.names.has(name)) {
    ctx.diags.push(
      makeDiag("E_DUP_DECL", `Duplicate declaration of '${name}' in the same scope.`, span, "Use a different variable name.")
    );
  }
  scope.names.set(name, { constant });
}

function validateVarDecl(decl: AST.VarDecl, scope: StaticScope, ctx: ValidationContext): void {
  if (decl.init) validateExpr(decl.init, scope, ctx);
  declare(decl.name, decl.constant, decl.span, scope, ctx);
}

function validateStmts(stmts: AST.Stmt[], scope: StaticScope, ctx: ValidationContext): void {
  for (const stmt of stmts) validateStmt(stmt, scope, ctx);
}

function validateBlock(block: AST.Block, scope: StaticScope, ctx: ValidationContext): void {
  validateStmts(block.body, new StaticScope(scope), ctx);
}

function validateTarget(target: AST.AssignTarget, scope: StaticScope, ctx: ValidationContext): void {
  if (target.kind === "Identifier") {
    const binding = scope.lookup(target.name);
    if (!binding) {
      ctx.diags.push(unbound(target));
    } else if (binding.constant) {
      ctx.diags.push(
        makeDiag("E_CONST", `Cannot assign to constant '${target.name}'.`, target.span, "Declare it with 'var' or 'let' instead.")
      );
    }
    return;
  }
  let root: AST.Expr = target;
  while (root.kind === "MemberExpr" || root.kind === "IndexExpr") {
    if (root.kind === "IndexExpr") validateExpr(root.index, scope, ctx);
    root = root.object;
  }
  if (root.kind === "Identifier") {
    validateTarget(root, scope, ctx);
  } else {
    validateExpr(root, scope, ctx);
  }
}

function validateStmt(stmt: AST.Stmt, scope: StaticScope, ctx: ValidationContext): void {
  switch (stmt.kind) {
    case "VarDecl":
      validateVarDecl(stmt, scope, ctx);
      break;
    case "TypeDecl":
    case "FunctionDecl":
    case "VarSetDecl":
      // Rejected by the parser below top level.
      break;
    case "AssignStmt":
      validateExpr(stmt.value, scope, ctx);
      validateTarget(stmt.target, scope, ctx);
      break;
    case "UpdateStmt":
      validateTarget(stmt.target, scope, ctx);
      break;
    case "CallStmt":
      validateExpr(stmt.call, scope, ctx);
      break;
    case "PrintStmt":
      validateExpr(stmt.value, scope, ctx);
      break;
    case "ReturnStmt":
      if (stmt.value) validateExpr(stmt.value, scope, ctx);
      break;
    case "RaiseStmt":
      if (stmt.message) validateExpr(stmt.message, scope, ctx);
      break;
    case "ImportDecl":
      // The imported statements follow it in the program.
      break;
    case "Block":
      validateBlock(stmt, scope, ctx);
      break;
    case "IfStmt":
      validateExpr(stmt.test, scope, ctx);
      validateBlock(stmt.consequent, scope, ctx);
      if (stmt.alternate) validateStmt(stmt.alternate, scope, ctx);
      break;
    case "WhileStmt":
    case "DoWhileStmt":
      validateExpr(stmt.test, scope, ctx);
      validateBlock(stmt.body, scope, ctx);
      break;
    case "ForStmt": {
      const header = new StaticScope(scope);
      if (stmt.init) validateStmt(stmt.init, header, ctx);
      if (stmt.test) validateExpr(stmt.test, header, ctx);
      if (stmt.update) validateStmt(stmt.update, header, ctx);
      validateBlock(stmt.body, header, ctx);
      break;
    }
    case "ForEachStmt": {
      validateExpr(stmt.iterable, scope, ctx);
      const iteration = new StaticScope(scope);
      iteration.names.set(stmt.binding, { constant: false });
      validateStmts(stmt.body.body, iteration, ctx);
      break;
    }
    case "TryStmt":
      validateBlock(stmt.body, scope, ctx);
      for (const handler of stmt.handlers) {
        const handlerScope = new StaticScope(scope);
        if (handler.binding !== null) handlerScope.names.set(handler.binding, { constant: false });
        validateStmts(handler.body.body, handlerScope, ctx);
      }
      break;
    case "BreakStmt":
    case "ContinueStmt":
      break;
  }
}

function unbound(expr: AST.Identifier): Diagnostic {
  return makeDiag(
    "E_UNBOUND",
    `Unbound variable '${expr.name}'.`,
    expr.span,
    "Make sure the variable is declared with 'var', 'let' or 'const' before use."
  );
}

function validateExpr(expr: AST.Expr, scope: StaticScope, ctx: ValidationContext): void {
  switch (expr.kind) {
    case "Identifier":
      if (!scope.lookup(expr.name)) ctx.diags.push(unbound(expr));
      break;
    case "ObjectLiteral":
      for (const entry of expr.entries) validateExpr(entry.value, scope, ctx);
      break;
    case "ArrayLiteral":
      for (const e of expr.elements) validateExpr(e, scope, ctx);
      break;
    case "MemberExpr":
      validateExpr(expr.object, scope, ctx);
      break;
    case "IndexExpr":
      validateExpr(expr.object, scope, ctx);
      validateExpr(expr.index, scope, ctx);
      break;
    case "CallExpr":
      for (const a of expr.args) validateExpr(a, scope, ctx);
      if (expr.callee.length === 1) {
        validateFunctionCall(expr, expr.callee[0], ctx);
      } else {
        const ns = expr.callee[0].toLowerCase();
        if (!ctx.namespaces.has(ns)) ctx.namespaces.set(ns, expr.span);
      }
      break;
    case "CastExpr":
    case "UnaryExpr":
      validateExpr(expr.operand, scope, ctx);
      break;
    case "BinaryExpr":
      validateExpr(expr.left, scope, ctx);
      validateExpr(expr.right, scope, ctx);
      break;
    case "CompareChain":
      for (const operand of expr.operands) validateExpr(operand, scope, ctx);
      break;
    case "ConditionalExpr":
      validateExpr(expr.test, scope, ctx);
      validateExpr(expr.consequent, scope, ctx);
      validateExpr(expr.alternate, scope, ctx);
      break;
    default:
      break;
  }
}

function validateFunctionCall(expr: AST.CallExpr, name: string, ctx: ValidationContext): void {
  const fn = ctx.functions.get(name);
  if (!fn) {
    ctx.diags.push(
      makeDiag(
        "E_UNKNOWN_FN",
        `Unknown function '${name}'.`,
        expr.span,
        "Builtins are called with a qualified name such as 'string.upper(s)'."
      )
    );
    return;
  }
  const required = fn.params.filter((p) => p.defaultValue === null).length;
  if (expr.args.length < required || expr.args.length > fn.params.length) {
    const expected = required === fn.params.length ? `${required}` : `${required} to ${fn.params.length}`;
    ctx.diags.push(
      makeDiag(
        "E_ARITY",
        `Function '${name}' expects ${expected} argument(s), got ${expr.args.length}.`,
        expr.span,
        `Check the parameter list of '${name}'.`
      )
    );
  }
}
