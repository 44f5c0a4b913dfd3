/**
 * Skein Language AST Node Definitions
 */
import type { DataType } from "./types.js";
import type { VarSetScope } from "./environment.js";
import type { ErrorCategory } from "./errors.js";

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

// Base node with span
export interface BaseNode {
  kind: string;
  span: Span;
}

// --- Literals ---
export interface IntLiteral extends BaseNode {
  kind: "IntLiteral";
  value: bigint;
}

export interface DoubleLiteral extends BaseNode {
  kind: "DoubleLiteral";
  value: number;
}

export interface BoolLiteral extends BaseNode {
  kind: "BoolLiteral";
  value: boolean;
}

export interface StrLiteral extends BaseNode {
  kind: "StrLiteral";
  value: string;
}

export interface NullLiteral extends BaseNode {
  kind: "NullLiteral";
}

export type Literal = IntLiteral | DoubleLiteral | BoolLiteral | StrLiteral | NullLiteral;

// --- Collections ---
export interface ObjectEntry extends BaseNode {
  kind: "ObjectEntry";
  key: string;
  value: Expr;
}

export interface ObjectLiteral extends BaseNode {
  kind: "ObjectLiteral";
  entries: ObjectEntry[];
}

export interface ArrayLiteral extends BaseNode {
  kind: "ArrayLiteral";
  elements: Expr[];
}

// --- Expressions ---
export interface Identifier extends BaseNode {
  kind: "Identifier";
  name: string;
}

export interface MemberExpr extends BaseNode {
  kind: "MemberExpr";
  object: Expr;
  property: string;
}

export interface IndexExpr extends BaseNode {
  kind: "IndexExpr";
  object: Expr;
  index: Expr;
}

/**
 * A single-part callee names a user function; two or more parts name a
 * builtin (`namespace.function`). `keyword` records the `call` prefix.
 */
export interface CallExpr extends BaseNode {
  kind: "CallExpr";
  callee: string[];
  args: Expr[];
  keyword: boolean;
}

export type CastTarget = "int" | "double" | "string" | "bool" | "json";

export interface CastExpr extends BaseNode {
  kind: "CastExpr";
  target: CastTarget;
  operand: Expr;
}

export type UnaryOp = "-" | "+" | "!" | "typeof";

export interface UnaryExpr extends BaseNode {
  kind: "UnaryExpr";
  op: UnaryOp;
  operand: Expr;
}

export type BinaryOp =
  | "||" | "&&"
  | "==" | "!="
  | "<" | ">" | "<=" | ">="
  | "+" | "-"
  | "*" | "/" | "%";

export interface BinaryExpr extends BaseNode {
  kind: "BinaryExpr";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export type RelationalOp = "<" | ">" | "<=" | ">=";

/** `a < b <= c`: each inner operand is evaluated once and the chain stops at the first false link. */
export interface CompareChain extends BaseNode {
  kind: "CompareChain";
  operands: Expr[];
  ops: RelationalOp[];
}

export interface ConditionalExpr extends BaseNode {
  kind: "ConditionalExpr";
  test: Expr;
  consequent: Expr;
  alternate: Expr;
}

export type Expr =
  | Literal
  | Identifier
  | ObjectLiteral
  | ArrayLiteral
  | MemberExpr
  | IndexExpr
  | CallExpr
  | CastExpr
  | UnaryExpr
  | BinaryExpr
  | CompareChain
  | ConditionalExpr;

export type AssignTarget = Identifier | MemberExpr | IndexExpr;

// --- Statements ---
export interface VarDecl extends BaseNode {
  kind: "VarDecl";
  name: string;
  /** null when declared without an annotation */
  declaredType: DataType | null;
  init: Expr | null;
  constant: boolean;
}

export interface TypeDecl extends BaseNode {
  kind: "TypeDecl";
  name: string;
  type: DataType;
}

export interface VarSetDecl extends BaseNode {
  kind: "VarSetDecl";
  name: string;
  scope: VarSetScope;
  vars: VarDecl[];
}

export interface Param extends BaseNode {
  kind: "Param";
  name: string;
  type: DataType;
  defaultValue: Expr | null;
}

export interface FunctionDecl extends BaseNode {
  kind: "FunctionDecl";
  name: string;
  params: Param[];
  returnType: DataType | null;
  body: Block;
}

export type AssignOp = "=" | "+=" | "-=" | "*=" | "/=";

export interface AssignStmt extends BaseNode {
  kind: "AssignStmt";
  target: AssignTarget;
  op: AssignOp;
  value: Expr;
}

export interface UpdateStmt extends BaseNode {
  kind: "UpdateStmt";
  target: AssignTarget;
  op: "++" | "--";
}

export interface CallStmt extends BaseNode {
  kind: "CallStmt";
  call: CallExpr;
}

export interface IfStmt extends BaseNode {
  kind: "IfStmt";
  test: Expr;
  consequent: Block;
  alternate: Block | IfStmt | null;
}

export interface WhileStmt extends BaseNode {
  kind: "WhileStmt";
  test: Expr;
  body: Block;
}

export interface DoWhileStmt extends BaseNode {
  kind: "DoWhileStmt";
  body: Block;
  test: Expr;
}

export type SimpleStmt = AssignStmt | UpdateStmt | CallStmt;

export interface ForStmt extends BaseNode {
  kind: "ForStmt";
  init: VarDecl | SimpleStmt | null;
  test: Expr | null;
  update: SimpleStmt | null;
  body: Block;
}

export interface ForEachStmt extends BaseNode {
  kind: "ForEachStmt";
  binding: string;
  iterable: Expr;
  body: Block;
}

export interface BreakStmt extends BaseNode {
  kind: "BreakStmt";
}

export interface ContinueStmt extends BaseNode {
  kind: "ContinueStmt";
}

export interface ReturnStmt extends BaseNode {
  kind: "ReturnStmt";
  value: Expr | null;
}

export interface PrintStmt extends BaseNode {
  kind: "PrintStmt";
  value: Expr;
}

export interface CatchClause extends BaseNode {
  kind: "CatchClause";
  category: ErrorCategory;
  binding: string | null;
  body: Block;
}

export interface TryStmt extends BaseNode {
  kind: "TryStmt";
  body: Block;
  handlers: CatchClause[];
}

export interface RaiseStmt extends BaseNode {
  kind: "RaiseStmt";
  category: ErrorCategory;
  message: Expr | null;
}

/** Marks where an imported file's statements were spliced into the program. */
export interface ImportDecl extends BaseNode {
  kind: "ImportDecl";
  path: string;
}

export interface Block extends BaseNode {
  kind: "Block";
  body: Stmt[];
}

export type Stmt =
  | VarDecl
  | TypeDecl
  | VarSetDecl
  | FunctionDecl
  | AssignStmt
  | UpdateStmt
  | CallStmt
  | IfStmt
  | WhileStmt
  | DoWhileStmt
  | ForStmt
  | ForEachStmt
  | BreakStmt
  | ContinueStmt
  | ReturnStmt
  | PrintStmt
  | TryStmt
  | RaiseStmt
  | ImportDecl
  | Block;

// --- Program ---
export interface Program extends BaseNode {
  kind: "Program";
  statements: Stmt[];
}

export type Node = Program | Stmt | Expr | ObjectEntry | Param | CatchClause;
