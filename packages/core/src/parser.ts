/**
 * Skein Language Parser using Chevrotain.
 * Produces a Skein AST from tokens.
 *
 * Binary expressions are recognized as a flat operand/operator sequence and
 * folded into a tree by precedence climbing over BINARY_PRECEDENCE.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { CstParser, type CstElement, type CstNode, type IToken } from "chevrotain";
import {
  allTokens,
  AnyName,
  AssignOperator,
  BinaryOperator,
  Bang,
  Break,
  Call,
  Colon,
  Comma,
  Const,
  Continue,
  Do,
  Dot,
  Else,
  Equals,
  Exceptions,
  False,
  FloatLit,
  For,
  Foreach,
  FunctionKw,
  Gt,
  Ident,
  If,
  Import,
  In,
  IntLit,
  LBrace,
  LBracket,
  Let,
  LParen,
  Lt,
  MapKw,
  Minus,
  MinusMinus,
  Not,
  Null,
  PlainTypeKeyword,
  Plus,
  PlusPlus,
  Print,
  Question,
  Queue,
  Raise,
  RBrace,
  RBracket,
  RecordKw,
  Return,
  RParen,
  Semi,
  Star,
  StringLit,
  True,
  Try,
  Type,
  TypeKeyword,
  Typeof,
  Var,
  VarSet,
  When,
  While,
  tokenSpan,
  tokenize,
  unescapeString,
} from "./lexer.js";
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { hintFor } from "./diagnostics.js";
import type { DataType } from "./types.js";
import { TypeRegistry, arrayOf, named } from "./types.js";
import type { VarSetScope } from "./environment.js";
import { VARSET_SCOPES } from "./environment.js";
import { isErrorCategory, LexError, ParseError, SkeinError, TypeCheckError } from "./errors.js";
import { binaryOpFromImage, BINARY_PRECEDENCE, isRelationalOp } from "./operators.js";
import { fitsInt64 } from "./values.js";

class SkeinCstParser extends CstParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false, nodeLocationTracking: "full", maxLookahead: 3 });
    this.performSelfAnalysis();
  }

  program = this.RULE("program", () => {
    this.MANY(() => {
      this.SUBRULE(this.statement);
    });
  });

  statement = this.RULE("statement", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.varDecl) },
      { ALT: () => this.SUBRULE(this.typeDecl) },
      { ALT: () => this.SUBRULE(this.varSetDecl) },
      { ALT: () => this.SUBRULE(this.functionDecl) },
      { ALT: () => this.SUBRULE(this.ifStmt) },
      { ALT: () => this.SUBRULE(this.whileStmt) },
      { ALT: () => this.SUBRULE(this.doWhileStmt) },
      { ALT: () => this.SUBRULE(this.forStmt) },
      { ALT: () => this.SUBRULE(this.foreachStmt) },
      { ALT: () => this.SUBRULE(this.breakStmt) },
      { ALT: () => this.SUBRULE(this.continueStmt) },
      { ALT: () => this.SUBRULE(this.returnStmt) },
      { ALT: () => this.SUBRULE(this.printStmt) },
      { ALT: () => this.SUBRULE(this.tryStmt) },
      { ALT: () => this.SUBRULE(this.raiseStmt) },
      { ALT: () => this.SUBRULE(this.importDecl) },
      { ALT: () => this.SUBRULE(this.block) },
      { ALT: () => this.SUBRULE(this.simpleStmt) },
    ]);
  });

  // --- Declarations ---

  varDecl = this.RULE("varDecl", () => {
    this.SUBRULE(this.varDeclBody);
    this.CONSUME(Semi);
  });

  varDeclBody = this.RULE("varDeclBody", () => {
    this.OR([
      { ALT: () => this.CONSUME(Var, { LABEL: "keyword" }) },
      { ALT: () => this.CONSUME(Let, { LABEL: "keyword" }) },
      { ALT: () => this.CONSUME(Const, { LABEL: "keyword" }) },
    ]);
    this.CONSUME(Ident, { LABEL: "name" });
    this.OPTION(() => {
      this.CONSUME(Colon);
      this.SUBRULE(this.typeExpr);
    });
    this.OPTION2(() => {
      this.CONSUME(Equals);
      this.SUBRULE(this.expression);
    });
  });

  typeDecl = this.RULE("typeDecl", () => {
    this.CONSUME(Type);
    this.CONSUME(Ident, { LABEL: "name" });
    this.CONSUME(Equals);
    this.SUBRULE(this.typeExpr);
    this.CONSUME(Semi);
  });

  varSetDecl = this.RULE("varSetDecl", () => {
    this.CONSUME(VarSet);
    this.OR([
      { ALT: () => this.CONSUME(Ident, { LABEL: "scope" }) },
      { ALT: () => this.CONSUME(In, { LABEL: "scope" }) },
    ]);
    this.CONSUME2(Ident, { LABEL: "name" });
    this.CONSUME(LBrace);
    this.MANY(() => {
      this.SUBRULE(this.varDecl);
    });
    this.CONSUME(RBrace);
  });

  functionDecl = this.RULE("functionDecl", () => {
    this.CONSUME(FunctionKw);
    this.CONSUME(Ident, { LABEL: "name" });
    this.CONSUME(LParen);
    this.OPTION(() => {
      this.SUBRULE(this.param);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.param);
      });
    });
    this.CONSUME(RParen);
    this.OPTION2(() => {
      this.CONSUME(Colon);
      this.SUBRULE(this.typeExpr);
    });
    this.SUBRULE(this.block);
  });

  param = this.RULE("param", () => {
    this.CONSUME(Ident, { LABEL: "name" });
    this.CONSUME(Colon);
    this.SUBRULE(this.typeExpr);
    this.OPTION(() => {
      this.CONSUME(Equals);
      this.SUBRULE(this.expression);
    });
  });

  // --- Types ---

  typeExpr = this.RULE("typeExpr", () => {
    this.SUBRULE(this.baseType);
    this.MANY(() => {
      this.SUBRULE(this.dimension);
    });
  });

  dimension = this.RULE("dimension", () => {
    this.CONSUME(LBracket);
    this.OPTION(() => {
      this.OR([
        { ALT: () => this.CONSUME(IntLit) },
        { ALT: () => this.CONSUME(Star) },
      ]);
    });
    this.CONSUME(RBracket);
  });

  baseType = this.RULE("baseType", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.recordType) },
      { ALT: () => this.SUBRULE(this.queueType) },
      { ALT: () => this.SUBRULE(this.mapType) },
      { ALT: () => this.CONSUME(PlainTypeKeyword, { LABEL: "plain" }) },
      { ALT: () => this.CONSUME(Ident, { LABEL: "named" }) },
    ]);
  });

  recordType = this.RULE("recordType", () => {
    this.CONSUME(RecordKw);
    this.CONSUME(LBrace);
    this.OPTION(() => {
      this.SUBRULE(this.fieldDef);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.fieldDef);
      });
      this.OPTION2(() => {
        this.CONSUME2(Comma);
      });
    });
    this.CONSUME(RBrace);
  });

  fieldDef = this.RULE("fieldDef", () => {
    this.CONSUME(AnyName, { LABEL: "name" });
    this.CONSUME(Colon);
    this.SUBRULE(this.typeExpr);
  });

  queueType = this.RULE("queueType", () => {
    this.CONSUME(Queue);
    this.CONSUME(Lt);
    this.SUBRULE(this.typeExpr);
    this.CONSUME(Gt);
  });

  mapType = this.RULE("mapType", () => {
    this.CONSUME(MapKw);
    this.CONSUME(Lt);
    this.SUBRULE(this.typeExpr);
    this.CONSUME(Comma);
    this.SUBRULE2(this.typeExpr);
    this.CONSUME(Gt);
  });

  // --- Statements ---

  ifStmt = this.RULE("ifStmt", () => {
    this.CONSUME(If);
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
    this.SUBRULE(this.block);
    this.OPTION(() => {
      this.CONSUME(Else);
      this.OR([
        { ALT: () => this.SUBRULE(this.ifStmt) },
        { ALT: () => this.SUBRULE2(this.block) },
      ]);
    });
  });

  whileStmt = this.RULE("whileStmt", () => {
    this.CONSUME(While);
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
    this.SUBRULE(this.block);
  });

  doWhileStmt = this.RULE("doWhileStmt", () => {
    this.CONSUME(Do);
    this.SUBRULE(this.block);
    this.CONSUME(While);
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
    this.CONSUME(Semi);
  });

  forStmt = this.RULE("forStmt", () => {
    this.CONSUME(For);
    this.CONSUME(LParen);
    this.OPTION(() => {
      this.SUBRULE(this.forInit);
    });
    this.CONSUME(Semi);
    this.OPTION2(() => {
      this.SUBRULE(this.expression);
    });
    this.CONSUME2(Semi);
    this.OPTION3(() => {
      this.SUBRULE(this.simpleBody);
    });
    this.CONSUME(RParen);
    this.SUBRULE(this.block);
  });

  forInit = this.RULE("forInit", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.varDeclBody) },
      { ALT: () => this.SUBRULE(this.simpleBody) },
    ]);
  });

  foreachStmt = this.RULE("foreachStmt", () => {
    this.CONSUME(Foreach);
    this.CONSUME(LParen);
    this.CONSUME(Ident, { LABEL: "binding" });
    this.CONSUME(In);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
    this.SUBRULE(this.block);
  });

  breakStmt = this.RULE("breakStmt", () => {
    this.CONSUME(Break);
    this.CONSUME(Semi);
  });

  continueStmt = this.RULE("continueStmt", () => {
    this.CONSUME(Continue);
    this.CONSUME(Semi);
  });

  returnStmt = this.RULE("returnStmt", () => {
    this.CONSUME(Return);
    this.OPTION(() => {
      this.SUBRULE(this.expression);
    });
    this.CONSUME(Semi);
  });

  printStmt = this.RULE("printStmt", () => {
    this.CONSUME(Print);
    this.SUBRULE(this.expression);
    this.CONSUME(Semi);
  });

  tryStmt = this.RULE("tryStmt", () => {
    this.CONSUME(Try);
    this.SUBRULE(this.block);
    this.CONSUME(Exceptions);
    this.CONSUME(LBrace);
    this.AT_LEAST_ONE(() => {
      this.SUBRULE(this.catchClause);
    });
    this.CONSUME(RBrace);
  });

  catchClause = this.RULE("catchClause", () => {
    this.CONSUME(When);
    this.CONSUME(Ident, { LABEL: "category" });
    this.OPTION(() => {
      this.CONSUME(LParen);
      this.CONSUME2(Ident, { LABEL: "binding" });
      this.CONSUME(RParen);
    });
    this.SUBRULE(this.block);
  });

  importDecl = this.RULE("importDecl", () => {
    this.CONSUME(Import);
    this.CONSUME(StringLit, { LABEL: "path" });
    this.CONSUME(Semi);
  });

  raiseStmt = this.RULE("raiseStmt", () => {
    this.CONSUME(Raise);
    this.CONSUME(Ident, { LABEL: "category" });
    this.OPTION(() => {
      this.CONSUME(LParen);
      this.OPTION2(() => {
        this.SUBRULE(this.expression);
      });
      this.CONSUME(RParen);
    });
    this.CONSUME(Semi);
  });

  block = this.RULE("block", () => {
    this.CONSUME(LBrace);
    this.MANY(() => {
      this.SUBRULE(this.statement);
    });
    this.CONSUME(RBrace);
  });

  simpleStmt = this.RULE("simpleStmt", () => {
    this.SUBRULE(this.simpleBody);
    this.CONSUME(Semi);
  });

  // Assignment, update or call, without the trailing semicolon.
  simpleBody = this.RULE("simpleBody", () => {
    this.SUBRULE(this.stmtHead);
    this.MANY(() => {
      this.SUBRULE(this.postfixOp);
    });
    this.OPTION(() => {
      this.OR([
        {
          ALT: () => {
            this.CONSUME(AssignOperator, { LABEL: "assignOp" });
            this.SUBRULE(this.expression);
          },
        },
        { ALT: () => this.CONSUME(PlusPlus, { LABEL: "updateOp" }) },
        { ALT: () => this.CONSUME(MinusMinus, { LABEL: "updateOp" }) },
      ]);
    });
  });

  stmtHead = this.RULE("stmtHead", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.callKeywordExpr) },
      { ALT: () => this.SUBRULE(this.keywordLed) },
      { ALT: () => this.CONSUME(Ident) },
    ]);
  });

  // --- Expressions ---

  expression = this.RULE("expression", () => {
    this.SUBRULE(this.binaryExpr);
    this.OPTION(() => {
      this.CONSUME(Question);
      this.SUBRULE(this.expression, { LABEL: "consequent" });
      this.CONSUME(Colon);
      this.SUBRULE2(this.expression, { LABEL: "alternate" });
    });
  });

  binaryExpr = this.RULE("binaryExpr", () => {
    this.SUBRULE(this.unaryExpr);
    this.MANY(() => {
      this.CONSUME(BinaryOperator);
      this.SUBRULE2(this.unaryExpr);
    });
  });

  unaryExpr = this.RULE("unaryExpr", () => {
    this.OR([
      {
        ALT: () => {
          this.OR2([
            { ALT: () => this.CONSUME(Minus, { LABEL: "op" }) },
            { ALT: () => this.CONSUME(Plus, { LABEL: "op" }) },
            { ALT: () => this.CONSUME(Bang, { LABEL: "op" }) },
            { ALT: () => this.CONSUME(Not, { LABEL: "op" }) },
            { ALT: () => this.CONSUME(Typeof, { LABEL: "op" }) },
          ]);
          this.SUBRULE(this.unaryExpr);
        },
      },
      { ALT: () => this.SUBRULE(this.postfixExpr) },
    ]);
  });

  postfixExpr = this.RULE("postfixExpr", () => {
    this.SUBRULE(this.primary);
    this.MANY(() => {
      this.SUBRULE(this.postfixOp);
    });
  });

  postfixOp = this.RULE("postfixOp", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Dot);
          this.CONSUME(AnyName, { LABEL: "member" });
        },
      },
      {
        ALT: () => {
          this.CONSUME(LBracket);
          this.SUBRULE(this.expression, { LABEL: "index" });
          this.CONSUME(RBracket);
        },
      },
      { ALT: () => this.SUBRULE(this.argList) },
    ]);
  });

  argList = this.RULE("argList", () => {
    this.CONSUME(LParen);
    this.OPTION(() => {
      this.SUBRULE(this.expression);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.expression);
      });
    });
    this.CONSUME(RParen);
  });

  primary = this.RULE("primary", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.literal) },
      { ALT: () => this.SUBRULE(this.parenExpr) },
      { ALT: () => this.SUBRULE(this.callKeywordExpr) },
      { ALT: () => this.SUBRULE(this.keywordLed) },
      { ALT: () => this.SUBRULE(this.objectLit) },
      { ALT: () => this.SUBRULE(this.arrayLit) },
      { ALT: () => this.CONSUME(Ident) },
    ]);
  });

  parenExpr = this.RULE("parenExpr", () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
  });

  callKeywordExpr = this.RULE("callKeywordExpr", () => {
    this.CONSUME(Call);
    this.CONSUME(AnyName, { LABEL: "part" });
    this.MANY(() => {
      this.CONSUME(Dot);
      this.CONSUME2(AnyName, { LABEL: "part" });
    });
    this.SUBRULE(this.argList);
  });

  // `int(x)` casts; `string.upper(x)` calls a builtin in a type-named namespace.
  keywordLed = this.RULE("keywordLed", () => {
    this.CONSUME(TypeKeyword, { LABEL: "head" });
    this.OR([
      { ALT: () => this.SUBRULE(this.parenExpr) },
      {
        ALT: () => {
          this.AT_LEAST_ONE(() => {
            this.CONSUME(Dot);
            this.CONSUME(AnyName, { LABEL: "part" });
          });
          this.SUBRULE(this.argList);
        },
      },
    ]);
  });

  objectLit = this.RULE("objectLit", () => {
    this.CONSUME(LBrace);
    this.OPTION(() => {
      this.SUBRULE(this.objectEntry);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.objectEntry);
      });
      this.OPTION2(() => {
        this.CONSUME2(Comma);
      });
    });
    this.CONSUME(RBrace);
  });

  objectEntry = this.RULE("objectEntry", () => {
    this.OR([
      { ALT: () => this.CONSUME(StringLit, { LABEL: "key" }) },
      { ALT: () => this.CONSUME(AnyName, { LABEL: "key" }) },
    ]);
    this.CONSUME(Colon);
    this.SUBRULE(this.expression);
  });

  arrayLit = this.RULE("arrayLit", () => {
    this.CONSUME(LBracket);
    this.OPTION(() => {
      this.SUBRULE(this.expression);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.expression);
      });
      this.OPTION2(() => {
        this.CONSUME2(Comma);
      });
    });
    this.CONSUME(RBracket);
  });

  literal = this.RULE("literal", () => {
    this.OR([
      { ALT: () => this.CONSUME(FloatLit) },
      { ALT: () => this.CONSUME(IntLit) },
      { ALT: () => this.CONSUME(StringLit) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Null) },
    ]);
  });
}

// Singleton parser instance
const cstParser = new SkeinCstParser();

// --- CST access helpers ---

function isNode(e: CstElement): e is CstNode {
  return "children" in e;
}

function isToken(e: CstElement): e is IToken {
  return "image" in e;
}

function nodes(cst: CstNode, key: string): CstNode[] {
  return (cst.children[key] ?? []).filter(isNode);
}

function tokens(cst: CstNode, key: string): IToken[] {
  return (cst.children[key] ?? []).filter(isToken);
}

function optNode(cst: CstNode, key: string): CstNode | undefined {
  return nodes(cst, key)[0];
}

function optToken(cst: CstNode, key: string): IToken | undefined {
  return tokens(cst, key)[0];
}

function node(cst: CstNode, key: string): CstNode {
  const found = optNode(cst, key);
  if (!found) throw new Error(`Malformed '${cst.name}' node: missing '${key}'.`);
  return found;
}

function token(cst: CstNode, key: string): IToken {
  const found = optToken(cst, key);
  if (!found) throw new Error(`Malformed '${cst.name}' node: missing '${key}'.`);
  return found;
}

// --- AST Builder (CST visitor) ---

interface VisitContext {
  file: string;
  types: TypeRegistry;
  /** type names visible so far, including the one being declared */
  declaredTypes: Set<string>;
  loopDepth: number;
  topLevel: boolean;
  imports: ImportState;
}

/** Shared by every file of one compilation unit. */
interface ImportState {
  readFile: (file: string) => string;
  /** resolved paths of every file already parsed */
  seen: Set<string>;
  /** resolved paths of the files whose imports are being followed */
  chain: string[];
}

function cstSpan(cst: CstNode, file: string): Span {
  const loc = cst.location;
  return {
    file,
    startLine: loc?.startLine ?? 1,
    startCol: loc?.startColumn ?? 1,
    endLine: loc?.endLine ?? 1,
    endCol: (loc?.endColumn ?? 0) + 1,
  };
}

function joinSpans(start: Span, end: Span): Span {
  return {
    file: start.file,
    startLine: start.startLine,
    startCol: start.startCol,
    endLine: end.endLine,
    endCol: end.endCol,
  };
}

function visitProgram(cst: CstNode, ctx: VisitContext): AST.Program {
  const statements: AST.Stmt[] = [];
  for (const s of nodes(cst, "statement")) {
    const stmt = visitStatement(s, ctx);
    statements.push(stmt);
    if (stmt.kind === "ImportDecl") statements.push(...importStatements(stmt, ctx));
  }
  return { kind: "Program", span: cstSpan(cst, ctx.file), statements };
}

/**
 * Parse an imported file into the importing unit. Paths resolve against the
 * importing file's directory; a file may be imported once per unit.
 */
function importStatements(decl: AST.ImportDecl, ctx: VisitContext): AST.Stmt[] {
  const { imports } = ctx;
  const target = path.resolve(path.dirname(ctx.file), decl.path);
  if (imports.chain.includes(target)) {
    const cycle = [...imports.chain.slice(imports.chain.indexOf(target)), target].map((f) => path.basename(f));
    throw new ParseError(`Circular import detected: ${cycle.join(" -> ")}.`, decl.span, "E_IMPORT");
  }
  if (imports.seen.has(target)) {
    throw new ParseError(`File '${decl.path}' is already imported.`, decl.span, "E_IMPORT");
  }
  let source: string;
  try {
    source = imports.readFile(target);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ParseError(`Cannot read imported file '${decl.path}': ${msg}`, decl.span, "E_IMPORT");
  }
  imports.seen.add(target);
  imports.chain.push(target);
  try {
    return visitProgram(buildCst(source, target), { ...ctx, file: target }).statements;
  } finally {
    imports.chain.pop();
  }
}

function visitStatement(cst: CstNode, ctx: VisitContext): AST.Stmt {
  const c = cst.children;
  if (c["varDecl"]) return visitVarDeclBody(node(node(cst, "varDecl"), "varDeclBody"), ctx, cstSpan(node(cst, "varDecl"), ctx.file));
  if (c["typeDecl"]) return visitTypeDecl(node(cst, "typeDecl"), ctx);
  if (c["varSetDecl"]) return visitVarSetDecl(node(cst, "varSetDecl"), ctx);
  if (c["functionDecl"]) return visitFunctionDecl(node(cst, "functionDecl"), ctx);
  if (c["ifStmt"]) return visitIf(node(cst, "ifStmt"), ctx);
  if (c["whileStmt"]) return visitWhile(node(cst, "whileStmt"), ctx);
  if (c["doWhileStmt"]) return visitDoWhile(node(cst, "doWhileStmt"), ctx);
  if (c["forStmt"]) return visitFor(node(cst, "forStmt"), ctx);
  if (c["foreachStmt"]) return visitForEach(node(cst, "foreachStmt"), ctx);
  if (c["breakStmt"]) return visitLoopJump(node(cst, "breakStmt"), "BreakStmt", ctx);
  if (c["continueStmt"]) return visitLoopJump(node(cst, "continueStmt"), "ContinueStmt", ctx);
  if (c["returnStmt"]) {
    const r = node(cst, "returnStmt");
    const value = optNode(r, "expression");
    return { kind: "ReturnStmt", span: cstSpan(r, ctx.file), value: value ? visitExpression(value, ctx) : null };
  }
  if (c["printStmt"]) {
    const p = node(cst, "printStmt");
    return { kind: "PrintStmt", span: cstSpan(p, ctx.file), value: visitExpression(node(p, "expression"), ctx) };
  }
  if (c["tryStmt"]) return visitTry(node(cst, "tryStmt"), ctx);
  if (c["raiseStmt"]) return visitRaise(node(cst, "raiseStmt"), ctx);
  if (c["importDecl"]) {
    const d = node(cst, "importDecl");
    const span = cstSpan(d, ctx.file);
    requireTopLevel("Import", span, ctx);
    return { kind: "ImportDecl", span, path: decodeString(token(d, "path"), ctx) };
  }
  if (c["block"]) return visitBlock(node(cst, "block"), ctx);
  const simple = node(cst, "simpleStmt");
  return visitSimpleBody(node(simple, "simpleBody"), ctx, cstSpan(simple, ctx.file));
}

function requireTopLevel(what: string, span: Span, ctx: VisitContext): void {
  if (!ctx.topLevel) {
    throw new ParseError(`${what} declarations are only allowed at top level.`, span);
  }
}

function nested(ctx: VisitContext): VisitContext {
  return { ...ctx, topLevel: false };
}

function visitVarDeclBody(cst: CstNode, ctx: VisitContext, span: Span): AST.VarDecl {
  const keywordToken = token(cst, "keyword");
  const name = token(cst, "name").image;
  const typeNode = optNode(cst, "typeExpr");
  const initNode = optNode(cst, "expression");
  const constant = keywordToken.image === "const";
  if (constant && !initNode) {
    throw new ParseError(`Constant '${name}' must be initialized.`, span);
  }
  return {
    kind: "VarDecl",
    span,
    name,
    declaredType: typeNode ? visitTypeExpr(typeNode, ctx) : null,
    init: initNode ? visitExpression(initNode, ctx) : null,
    constant,
  };
}

function visitTypeDecl(cst: CstNode, ctx: VisitContext): AST.TypeDecl {
  const span = cstSpan(cst, ctx.file);
  requireTopLevel("Type", span, ctx);
  const name = token(cst, "name").image;
  if (ctx.declaredTypes.has(name)) {
    throw new ParseError(`Type '${name}' is already declared.`, span);
  }
  ctx.declaredTypes.add(name);
  const type = visitTypeExpr(node(cst, "typeExpr"), ctx);
  try {
    ctx.types.define(name, type);
  } catch (e) {
    if (e instanceof TypeCheckError) {
      e.span = span;
    }
    throw e;
  }
  return { kind: "TypeDecl", span, name, type };
}

function visitVarSetDecl(cst: CstNode, ctx: VisitContext): AST.VarSetDecl {
  const span = cstSpan(cst, ctx.file);
  requireTopLevel("VarSet", span, ctx);
  const scopeToken = token(cst, "scope");
  const scope = VARSET_SCOPES.find((s): s is VarSetScope => s === scopeToken.image);
  if (!scope) {
    throw new ParseError(
      `Unknown varset scope '${scopeToken.image}'. Expected one of: ${VARSET_SCOPES.join(", ")}.`,
      tokenSpan(scopeToken, ctx.file)
    );
  }
  const inner = nested(ctx);
  const vars = nodes(cst, "varDecl").map((v) => visitVarDeclBody(node(v, "varDeclBody"), inner, cstSpan(v, ctx.file)));
  return { kind: "VarSetDecl", span, name: token(cst, "name").image, scope, vars };
}

function visitFunctionDecl(cst: CstNode, ctx: VisitContext): AST.FunctionDecl {
  const span = cstSpan(cst, ctx.file);
  requireTopLevel("Function", span, ctx);
  const inner: VisitContext = { ...ctx, topLevel: false, loopDepth: 0 };
  const params = nodes(cst, "param").map((p): AST.Param => {
    const defaultNode = optNode(p, "expression");
    return {
      kind: "Param",
      span: cstSpan(p, ctx.file),
      name: token(p, "name").image,
      type: visitTypeExpr(node(p, "typeExpr"), inner),
      defaultValue: defaultNode ? visitExpression(defaultNode, inner) : null,
    };
  });
  const returnNode = optNode(cst, "typeExpr");
  return {
    kind: "FunctionDecl",
    span,
    name: token(cst, "name").image,
    params,
    returnType: returnNode ? visitTypeExpr(returnNode, inner) : null,
    body: visitBlock(node(cst, "block"), inner),
  };
}

// --- Types ---

function visitTypeExpr(cst: CstNode, ctx: VisitContext): DataType {
  const base = visitBaseType(node(cst, "baseType"), ctx);
  const dims = nodes(cst, "dimension").map((d): number | null => {
    const size = optToken(d, "IntLit");
    if (!size) return null;
    const capacity = Number(size.image);
    if (!Number.isSafeInteger(capacity)) {
      throw new ParseError(`Array capacity ${size.image} is too large.`, tokenSpan(size, ctx.file));
    }
    return capacity;
  });
  // Outermost dimension first: wrap from the innermost outwards.
  let type = base;
  for (let i = dims.length - 1; i >= 0; i--) {
    type = arrayOf(type, dims[i]);
  }
  return type;
}

const PLAIN_TYPES: Record<string, DataType> = {
  int: { kind: "int" },
  integer: { kind: "int" },
  long: { kind: "int" },
  double: { kind: "double" },
  float: { kind: "double" },
  string: { kind: "string" },
  bool: { kind: "bool" },
  boolean: { kind: "bool" },
  json: { kind: "json" },
  handle: { kind: "handle" },
};

function visitBaseType(cst: CstNode, ctx: VisitContext): DataType {
  const plain = optToken(cst, "plain");
  if (plain) {
    const type = PLAIN_TYPES[plain.image];
    if (!type) throw new ParseError(`Unknown type keyword '${plain.image}'.`, tokenSpan(plain, ctx.file));
    return type;
  }
  const namedToken = optToken(cst, "named");
  if (namedToken) {
    if (!ctx.declaredTypes.has(namedToken.image)) {
      throw new ParseError(
        `Unknown type '${namedToken.image}'. Types must be declared before use.`,
        tokenSpan(namedToken, ctx.file)
      );
    }
    return named(namedToken.image);
  }
  const recordNode = optNode(cst, "recordType");
  if (recordNode) {
    const seen = new Set<string>();
    const fields = nodes(recordNode, "fieldDef").map((f) => {
      const nameToken = token(f, "name");
      if (seen.has(nameToken.image)) {
        throw new ParseError(`Duplicate field '${nameToken.image}' in record type.`, tokenSpan(nameToken, ctx.file));
      }
      seen.add(nameToken.image);
      return { name: nameToken.image, type: visitTypeExpr(node(f, "typeExpr"), ctx) };
    });
    return { kind: "record", fields };
  }
  const queueNode = optNode(cst, "queueType");
  if (queueNode) {
    return { kind: "queue", element: visitTypeExpr(node(queueNode, "typeExpr"), ctx) };
  }
  const mapNode = node(cst, "mapType");
  const [keyNode, valueNode] = nodes(mapNode, "typeExpr");
  return { kind: "map", key: visitTypeExpr(keyNode, ctx), value: visitTypeExpr(valueNode, ctx) };
}

// --- Statements ---

function visitBlock(cst: CstNode, ctx: VisitContext): AST.Block {
  const inner = nested(ctx);
  return {
    kind: "Block",
    span: cstSpan(cst, ctx.file),
    body: nodes(cst, "statement").map((s) => visitStatement(s, inner)),
  };
}

function visitIf(cst: CstNode, ctx: VisitContext): AST.IfStmt {
  const blocks = nodes(cst, "block");
  const elseIf = optNode(cst, "ifStmt");
  return {
    kind: "IfStmt",
    span: cstSpan(cst, ctx.file),
    test: visitExpression(node(cst, "expression"), ctx),
    consequent: visitBlock(blocks[0], ctx),
    alternate: elseIf ? visitIf(elseIf, ctx) : blocks[1] ? visitBlock(blocks[1], ctx) : null,
  };
}

function inLoop(ctx: VisitContext): VisitContext {
  return { ...ctx, topLevel: false, loopDepth: ctx.loopDepth + 1 };
}

function visitWhile(cst: CstNode, ctx: VisitContext): AST.WhileStmt {
  return {
    kind: "WhileStmt",
    span: cstSpan(cst, ctx.file),
    test: visitExpression(node(cst, "expression"), ctx),
    body: visitBlock(node(cst, "block"), inLoop(ctx)),
  };
}

function visitDoWhile(cst: CstNode, ctx: VisitContext): AST.DoWhileStmt {
  return {
    kind: "DoWhileStmt",
    span: cstSpan(cst, ctx.file),
    body: visitBlock(node(cst, "block"), inLoop(ctx)),
    test: visitExpression(node(cst, "expression"), ctx),
  };
}

function visitFor(cst: CstNode, ctx: VisitContext): AST.ForStmt {
  const initNode = optNode(cst, "forInit");
  let init: AST.ForStmt["init"] = null;
  if (initNode) {
    const declNode = optNode(initNode, "varDeclBody");
    init = declNode
      ? visitVarDeclBody(declNode, nested(ctx), cstSpan(declNode, ctx.file))
      : visitSimpleBody(node(initNode, "simpleBody"), ctx, cstSpan(initNode, ctx.file));
  }
  const testNode = optNode(cst, "expression");
  const updateNode = optNode(cst, "simpleBody");
  return {
    kind: "ForStmt",
    span: cstSpan(cst, ctx.file),
    init,
    test: testNode ? visitExpression(testNode, ctx) : null,
    update: updateNode ? visitSimpleBody(updateNode, ctx, cstSpan(updateNode, ctx.file)) : null,
    body: visitBlock(node(cst, "block"), inLoop(ctx)),
  };
}

function visitForEach(cst: CstNode, ctx: VisitContext): AST.ForEachStmt {
  return {
    kind: "ForEachStmt",
    span: cstSpan(cst, ctx.file),
    binding: token(cst, "binding").image,
    iterable: visitExpression(node(cst, "expression"), ctx),
    body: visitBlock(node(cst, "block"), inLoop(ctx)),
  };
}

function visitLoopJump(cst: CstNode, kind: "BreakStmt" | "ContinueStmt", ctx: VisitContext): AST.BreakStmt | AST.ContinueStmt {
  const span = cstSpan(cst, ctx.file);
  if (ctx.loopDepth === 0) {
    throw new ParseError(`'${kind === "BreakStmt" ? "break" : "continue"}' used outside of a loop.`, span);
  }
  return kind === "BreakStmt" ? { kind, span } : { kind, span };
}

function errorCategoryToken(t: IToken, ctx: VisitContext): AST.CatchClause["category"] {
  if (!isErrorCategory(t.image)) {
    throw new ParseError(`Unknown error category '${t.image}'.`, tokenSpan(t, ctx.file));
  }
  return t.image;
}

function visitTry(cst: CstNode, ctx: VisitContext): AST.TryStmt {
  const handlers = nodes(cst, "catchClause").map((h): AST.CatchClause => {
    const binding = optToken(h, "binding");
    return {
      kind: "CatchClause",
      span: cstSpan(h, ctx.file),
      category: errorCategoryToken(token(h, "category"), ctx),
      binding: binding ? binding.image : null,
      body: visitBlock(node(h, "block"), ctx),
    };
  });
  return { kind: "TryStmt", span: cstSpan(cst, ctx.file), body: visitBlock(node(cst, "block"), ctx), handlers };
}

function visitRaise(cst: CstNode, ctx: VisitContext): AST.RaiseStmt {
  const message = optNode(cst, "expression");
  return {
    kind: "RaiseStmt",
    span: cstSpan(cst, ctx.file),
    category: errorCategoryToken(token(cst, "category"), ctx),
    message: message ? visitExpression(message, ctx) : null,
  };
}

function visitSimpleBody(cst: CstNode, ctx: VisitContext, span: Span): AST.SimpleStmt {
  let target = visitStmtHead(node(cst, "stmtHead"), ctx);
  for (const op of nodes(cst, "postfixOp")) {
    target = applyPostfix(target, op, ctx);
  }

  const assignToken = optToken(cst, "assignOp");
  const updateToken = optToken(cst, "updateOp");
  if (!assignToken && !updateToken) {
    if (target.kind !== "CallExpr") {
      throw new ParseError("Expected an assignment or a call.", span);
    }
    return { kind: "CallStmt", span, call: target };
  }

  if (target.kind !== "Identifier" && target.kind !== "MemberExpr" && target.kind !== "IndexExpr") {
    throw new ParseError("Invalid assignment target.", target.span);
  }
  if (updateToken) {
    return { kind: "UpdateStmt", span, target, op: updateToken.image === "++" ? "++" : "--" };
  }
  return {
    kind: "AssignStmt",
    span,
    target,
    op: assignOpFromImage(assignToken?.image ?? "="),
    value: visitExpression(node(cst, "expression"), ctx),
  };
}

function assignOpFromImage(image: string): AST.AssignOp {
  switch (image) {
    case "+=":
    case "-=":
    case "*=":
    case "/=":
      return image;
    default:
      return "=";
  }
}

function visitStmtHead(cst: CstNode, ctx: VisitContext): AST.Expr {
  const callNode = optNode(cst, "callKeywordExpr");
  if (callNode) return visitCallKeyword(callNode, ctx);
  const keywordNode = optNode(cst, "keywordLed");
  if (keywordNode) return visitKeywordLed(keywordNode, ctx);
  const ident = token(cst, "Ident");
  return { kind: "Identifier", span: tokenSpan(ident, ctx.file), name: ident.image };
}

// --- Expressions ---

function visitExpression(cst: CstNode, ctx: VisitContext): AST.Expr {
  const test = visitBinary(node(cst, "binaryExpr"), ctx);
  const consequent = optNode(cst, "consequent");
  const alternate = optNode(cst, "alternate");
  if (!consequent || !alternate) return test;
  const alt = visitExpression(alternate, ctx);
  return {
    kind: "ConditionalExpr",
    span: joinSpans(test.span, alt.span),
    test,
    consequent: visitExpression(consequent, ctx),
    alternate: alt,
  };
}

function visitBinary(cst: CstNode, ctx: VisitContext): AST.Expr {
  const operands = nodes(cst, "unaryExpr").map((u) => visitUnary(u, ctx));
  const ops = tokens(cst, "BinaryOperator").map((t): AST.BinaryOp => {
    const op = binaryOpFromImage(t.image);
    if (!op) throw new ParseError(`Unknown operator '${t.image}'.`, tokenSpan(t, ctx.file));
    return op;
  });
  return climb(operands, ops);
}

/**
 * Fold `operands[0] ops[0] operands[1] ...` into a tree. Operators of equal
 * precedence associate to the left, except that consecutive relational
 * operators form one CompareChain.
 */
export function climb(operands: AST.Expr[], ops: AST.BinaryOp[]): AST.Expr {
  let pos = 0;
  const parseLevel = (minPrec: number): AST.Expr => {
    let left = operands[pos];
    // Set once `left` is built here; a parenthesised comparison never extends a chain.
    let built = false;
    while (pos < ops.length && BINARY_PRECEDENCE[ops[pos]] >= minPrec) {
      const op = ops[pos];
      pos++;
      const right = parseLevel(BINARY_PRECEDENCE[op] + 1);
      const span = joinSpans(left.span, right.span);
      if (built && isRelationalOp(op) && left.kind === "CompareChain") {
        left = { kind: "CompareChain", span, operands: [...left.operands, right], ops: [...left.ops, op] };
      } else if (built && isRelationalOp(op) && left.kind === "BinaryExpr" && isRelationalOp(left.op)) {
        left = { kind: "CompareChain", span, operands: [left.left, left.right, right], ops: [left.op, op] };
      } else {
        left = { kind: "BinaryExpr", span, op, left, right };
      }
      built = true;
    }
    return left;
  };
  return parseLevel(0);
}

function visitUnary(cst: CstNode, ctx: VisitContext): AST.Expr {
  const opToken = optToken(cst, "op");
  if (opToken) {
    if (opToken.image === "-") {
      const literal = negatedIntLiteral(node(cst, "unaryExpr"), opToken, ctx);
      if (literal) return literal;
    }
    const operand = visitUnary(node(cst, "unaryExpr"), ctx);
    const op: AST.UnaryOp =
      opToken.image === "not" || opToken.image === "!" ? "!" : opToken.image === "typeof" ? "typeof" : opToken.image === "+" ? "+" : "-";
    return { kind: "UnaryExpr", span: joinSpans(tokenSpan(opToken, ctx.file), operand.span), op, operand };
  }
  const postfix = node(cst, "postfixExpr");
  let expr = visitPrimary(node(postfix, "primary"), ctx);
  for (const op of nodes(postfix, "postfixOp")) {
    expr = applyPostfix(expr, op, ctx);
  }
  return expr;
}

function calleeParts(expr: AST.Expr): string[] | null {
  if (expr.kind === "Identifier") return [expr.name];
  if (expr.kind === "MemberExpr") {
    const base = calleeParts(expr.object);
    return base ? [...base, expr.property] : null;
  }
  return null;
}

function applyPostfix(object: AST.Expr, cst: CstNode, ctx: VisitContext): AST.Expr {
  const span = joinSpans(object.span, cstSpan(cst, ctx.file));
  const member = optToken(cst, "member");
  if (member) {
    return { kind: "MemberExpr", span, object, property: member.image };
  }
  const index = optNode(cst, "index");
  if (index) {
    return { kind: "IndexExpr", span, object, index: visitExpression(index, ctx) };
  }
  const callee = calleeParts(object);
  if (!callee) {
    throw new ParseError("Only named functions and builtins can be called.", span);
  }
  return { kind: "CallExpr", span, callee, args: visitArgs(node(cst, "argList"), ctx), keyword: false };
}

function visitArgs(cst: CstNode, ctx: VisitContext): AST.Expr[] {
  return nodes(cst, "expression").map((e) => visitExpression(e, ctx));
}

function visitPrimary(cst: CstNode, ctx: VisitContext): AST.Expr {
  const c = cst.children;
  if (c["literal"]) return visitLiteral(node(cst, "literal"), ctx);
  if (c["parenExpr"]) return visitExpression(node(node(cst, "parenExpr"), "expression"), ctx);
  if (c["callKeywordExpr"]) return visitCallKeyword(node(cst, "callKeywordExpr"), ctx);
  if (c["keywordLed"]) return visitKeywordLed(node(cst, "keywordLed"), ctx);
  if (c["objectLit"]) return visitObject(node(cst, "objectLit"), ctx);
  if (c["arrayLit"]) {
    const arr = node(cst, "arrayLit");
    return {
      kind: "ArrayLiteral",
      span: cstSpan(arr, ctx.file),
      elements: nodes(arr, "expression").map((e) => visitExpression(e, ctx)),
    };
  }
  const ident = token(cst, "Ident");
  return { kind: "Identifier", span: tokenSpan(ident, ctx.file), name: ident.image };
}

function visitCallKeyword(cst: CstNode, ctx: VisitContext): AST.CallExpr {
  return {
    kind: "CallExpr",
    span: cstSpan(cst, ctx.file),
    callee: tokens(cst, "part").map((t) => t.image),
    args: visitArgs(node(cst, "argList"), ctx),
    keyword: true,
  };
}

const CAST_TARGETS: Record<string, AST.CastTarget> = {
  int: "int",
  integer: "int",
  long: "int",
  double: "double",
  float: "double",
  string: "string",
  bool: "bool",
  boolean: "bool",
  json: "json",
};

function visitKeywordLed(cst: CstNode, ctx: VisitContext): AST.Expr {
  const head = token(cst, "head");
  const span = cstSpan(cst, ctx.file);
  const paren = optNode(cst, "parenExpr");
  if (paren) {
    const target = CAST_TARGETS[head.image];
    if (!target) {
      throw new ParseError(`Cannot convert to '${head.image}' with a cast.`, tokenSpan(head, ctx.file));
    }
    return { kind: "CastExpr", span, target, operand: visitExpression(node(paren, "expression"), ctx) };
  }
  return {
    kind: "CallExpr",
    span,
    callee: [head.image, ...tokens(cst, "part").map((t) => t.image)],
    args: visitArgs(node(cst, "argList"), ctx),
    keyword: false,
  };
}

function visitObject(cst: CstNode, ctx: VisitContext): AST.ObjectLiteral {
  const seen = new Set<string>();
  const entries = nodes(cst, "objectEntry").map((e): AST.ObjectEntry => {
    const keyToken = token(e, "key");
    const key = keyToken.tokenType === StringLit ? decodeString(keyToken, ctx) : keyToken.image;
    if (seen.has(key)) {
      throw new ParseError(`Duplicate key '${key}' in object literal.`, tokenSpan(keyToken, ctx.file));
    }
    seen.add(key);
    return { kind: "ObjectEntry", span: cstSpan(e, ctx.file), key, value: visitExpression(node(e, "expression"), ctx) };
  });
  return { kind: "ObjectLiteral", span: cstSpan(cst, ctx.file), entries };
}

function decodeString(t: IToken, ctx: VisitContext): string {
  const value = unescapeString(t.image);
  if (value === null) {
    throw new LexError("Invalid escape sequence in string literal.", tokenSpan(t, ctx.file));
  }
  return value;
}

/** A minus sign directly before an integer literal belongs to the literal, so the 64-bit minimum can be written. */
function negatedIntLiteral(operand: CstNode, opToken: IToken, ctx: VisitContext): AST.IntLiteral | undefined {
  const postfix = optNode(operand, "postfixExpr");
  if (!postfix || nodes(postfix, "postfixOp").length > 0) return undefined;
  const literal = optNode(node(postfix, "primary"), "literal");
  const t = literal ? optToken(literal, "IntLit") : undefined;
  if (!t) return undefined;
  const value = -BigInt(t.image);
  const span = joinSpans(tokenSpan(opToken, ctx.file), tokenSpan(t, ctx.file));
  if (!fitsInt64(value)) {
    throw new ParseError(`Integer literal -${t.image} does not fit in 64 bits.`, span);
  }
  return { kind: "IntLiteral", span, value };
}

function visitLiteral(cst: CstNode, ctx: VisitContext): AST.Literal {
  const children = cst.children;
  if (children["IntLit"]) {
    const t = token(cst, "IntLit");
    const value = BigInt(t.image);
    if (!fitsInt64(value)) {
      throw new ParseError(`Integer literal ${t.image} does not fit in 64 bits.`, tokenSpan(t, ctx.file));
    }
    return { kind: "IntLiteral", span: tokenSpan(t, ctx.file), value };
  }
  if (children["FloatLit"]) {
    const t = token(cst, "FloatLit");
    return { kind: "DoubleLiteral", span: tokenSpan(t, ctx.file), value: parseFloat(t.image) };
  }
  if (children["StringLit"]) {
    const t = token(cst, "StringLit");
    return { kind: "StrLiteral", span: tokenSpan(t, ctx.file), value: decodeString(t, ctx) };
  }
  if (children["True"]) {
    return { kind: "BoolLiteral", span: tokenSpan(token(cst, "True"), ctx.file), value: true };
  }
  if (children["False"]) {
    return { kind: "BoolLiteral", span: tokenSpan(token(cst, "False"), ctx.file), value: false };
  }
  return { kind: "NullLiteral", span: tokenSpan(token(cst, "Null"), ctx.file) };
}

// --- Public API ---

export interface ParseResult {
  program?: AST.Program;
  diagnostics: Diagnostic[];
}

export interface ParseOptions {
  /** Reads an imported file by its resolved path; defaults to the file system. */
  readFile?: (file: string) => string;
}

/**
 * Parse a whole compilation unit, throwing the first LexError, ParseError or
 * TypeCheckError. Nothing is returned unless the entire unit is valid.
 */
export function parseOrThrow(source: string, file: string = "<stdin>", options: ParseOptions = {}): AST.Program {
  const cst = buildCst(source, file);
  const ctx: VisitContext = {
    file,
    types: new TypeRegistry(),
    declaredTypes: new Set(),
    loopDepth: 0,
    topLevel: true,
    imports: {
      readFile: options.readFile ?? ((f) => fs.readFileSync(f, "utf-8")),
      seen: new Set([path.resolve(file)]),
      chain: [path.resolve(file)],
    },
  };
  return visitProgram(cst, ctx);
}

function buildCst(source: string, file: string): CstNode {
  const tokensIn = tokenize(source, file);

  cstParser.input = tokensIn;
  const cst = cstParser.program();

  if (cstParser.errors.length > 0) {
    const err = cstParser.errors[0];
    const t = err.token;
    const fallback = tokensIn[tokensIn.length - 1];
    const anchor = Number.isFinite(t.startLine) ? t : fallback;
    throw new ParseError(err.message, anchor ? tokenSpan(anchor, file) : undefined);
  }
  return cst;
}

export function parse(source: string, file: string = "<stdin>", options: ParseOptions = {}): ParseResult {
  try {
    return { program: parseOrThrow(source, file, options), diagnostics: [] };
  } catch (e) {
    if (e instanceof SkeinError) {
      return { diagnostics: [e.toDiagnostic(hintFor(e.code))] };
    }
    const message = e instanceof Error ? e.message : String(e);
    return { diagnostics: [{ code: "E_AST", message }] };
  }
}
