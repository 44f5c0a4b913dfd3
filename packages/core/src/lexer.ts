/**
 * Skein Language Lexer using Chevrotain.
 */
import { createToken, Lexer, type IToken, type TokenType } from "chevrotain";
import type { Span } from "./ast.js";
import { LexError } from "./errors.js";

// Token categories
export const AnyName = createToken({ name: "AnyName", pattern: Lexer.NA });
export const TypeKeyword = createToken({ name: "TypeKeyword", pattern: Lexer.NA });
export const BinaryOperator = createToken({ name: "BinaryOperator", pattern: Lexer.NA });
export const AssignOperator = createToken({ name: "AssignOperator", pattern: Lexer.NA });
// Type keywords with no further syntax (everything except record, queue, map)
export const PlainTypeKeyword = createToken({ name: "PlainTypeKeyword", pattern: Lexer.NA });

// Identifiers
export const Ident = createToken({ name: "Ident", pattern: /[A-Za-z_][A-Za-z0-9_]*/, categories: [AnyName] });

const reservedWords: string[] = [];

function keyword(name: string, word: string, categories: TokenType[] = []): TokenType {
  reservedWords.push(word);
  return createToken({ name, pattern: new RegExp(word), longer_alt: Ident, categories: [AnyName, ...categories] });
}

function typeKeyword(name: string, word: string, plain: boolean = true): TokenType {
  return keyword(name, word, plain ? [TypeKeyword, PlainTypeKeyword] : [TypeKeyword]);
}

// Statement keywords
export const VarSet = keyword("VarSet", "varset");
export const Var = keyword("Var", "var");
export const Let = keyword("Let", "let");
export const Const = keyword("Const", "const");
export const Typeof = keyword("Typeof", "typeof");
export const Type = keyword("Type", "type");
export const FunctionKw = keyword("Function", "function");
export const Return = keyword("Return", "return");
export const If = keyword("If", "if");
export const Else = keyword("Else", "else");
export const While = keyword("While", "while");
export const Foreach = keyword("Foreach", "foreach");
export const For = keyword("For", "for");
export const Break = keyword("Break", "break");
export const Continue = keyword("Continue", "continue");
export const Call = keyword("Call", "call");
export const Print = keyword("Print", "print");
export const Try = keyword("Try", "try");
export const Exceptions = keyword("Exceptions", "exceptions");
export const When = keyword("When", "when");
export const Raise = keyword("Raise", "raise");
export const Import = keyword("Import", "import");
export const True = keyword("True", "true");
export const False = keyword("False", "false");
export const Null = keyword("Null", "null");
export const And = keyword("And", "and", [BinaryOperator]);
export const Or = keyword("Or", "or", [BinaryOperator]);
export const Not = keyword("Not", "not");

// Type keywords double as builtin namespaces (string.upper, map.put)
export const Integer = typeKeyword("Integer", "integer");
export const Int = typeKeyword("Int", "int");
export const Long = typeKeyword("Long", "long");
export const Double = typeKeyword("Double", "double");
export const Float = typeKeyword("Float", "float");
export const StringKw = typeKeyword("StringType", "string");
export const BooleanKw = typeKeyword("Boolean", "boolean");
export const Bool = typeKeyword("Bool", "bool");
export const Json = typeKeyword("Json", "json");
export const Handle = typeKeyword("Handle", "handle");
export const RecordKw = typeKeyword("Record", "record", false);
export const Queue = typeKeyword("Queue", "queue", false);
export const MapKw = typeKeyword("MapType", "map", false);

// `in` after `integer`/`int` so those win the match
export const In = keyword("In", "in");
// `do` after `double`
export const Do = keyword("Do", "do");

// Literals (no leading minus: unary minus is an operator)
export const FloatLit = createToken({
  name: "FloatLit",
  pattern: /(?:0|[1-9]\d*)\.\d+(?:[eE][+-]?\d+)?/,
});
export const IntLit = createToken({
  name: "IntLit",
  pattern: /(?:0|[1-9]\d*)(?![.\deE])/,
});
export const StringLit = createToken({
  name: "StringLit",
  pattern: /"(?:[^"\\\r\n]|\\.)*"|'(?:[^'\\\r\n]|\\.)*'/,
});
// Matches only when StringLit could not: the closing quote is missing.
export const UnterminatedString = createToken({
  name: "UnterminatedString",
  pattern: /"(?:[^"\\\r\n]|\\.)*|'(?:[^'\\\r\n]|\\.)*/,
});

// Punctuation
export const LBrace = createToken({ name: "LBrace", pattern: /\{/ });
export const RBrace = createToken({ name: "RBrace", pattern: /\}/ });
export const LBracket = createToken({ name: "LBracket", pattern: /\[/ });
export const RBracket = createToken({ name: "RBracket", pattern: /\]/ });
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const Colon = createToken({ name: "Colon", pattern: /:/ });
export const Semi = createToken({ name: "Semi", pattern: /;/ });
export const Comma = createToken({ name: "Comma", pattern: /,/ });
export const Dot = createToken({ name: "Dot", pattern: /\./ });
export const Question = createToken({ name: "Question", pattern: /\?/ });

// Assignment and update operators
export const PlusPlus = createToken({ name: "PlusPlus", pattern: /\+\+/ });
export const MinusMinus = createToken({ name: "MinusMinus", pattern: /--/ });
export const PlusEq = createToken({ name: "PlusEq", pattern: /\+=/, categories: [AssignOperator] });
export const MinusEq = createToken({ name: "MinusEq", pattern: /-=/, categories: [AssignOperator] });
export const StarEq = createToken({ name: "StarEq", pattern: /\*=/, categories: [AssignOperator] });
export const SlashEq = createToken({ name: "SlashEq", pattern: /\/=/, categories: [AssignOperator] });

// Logical and comparison operators (multi-char before single-char)
export const AndAnd = createToken({ name: "AndAnd", pattern: /&&/, categories: [BinaryOperator] });
export const OrOr = createToken({ name: "OrOr", pattern: /\|\|/, categories: [BinaryOperator] });
export const EqEq = createToken({ name: "EqEq", pattern: /==/, categories: [BinaryOperator] });
export const BangEq = createToken({ name: "BangEq", pattern: /!=/, categories: [BinaryOperator] });
export const LtEq = createToken({ name: "LtEq", pattern: /<=/, categories: [BinaryOperator] });
export const GtEq = createToken({ name: "GtEq", pattern: />=/, categories: [BinaryOperator] });
export const Lt = createToken({ name: "Lt", pattern: /</, categories: [BinaryOperator] });
export const Gt = createToken({ name: "Gt", pattern: />/, categories: [BinaryOperator] });
export const Equals = createToken({ name: "Equals", pattern: /=/, categories: [AssignOperator] });
export const Bang = createToken({ name: "Bang", pattern: /!/ });

// Arithmetic operators
export const Plus = createToken({ name: "Plus", pattern: /\+/, categories: [BinaryOperator] });
export const Minus = createToken({ name: "Minus", pattern: /-/, categories: [BinaryOperator] });
export const Star = createToken({ name: "Star", pattern: /\*/, categories: [BinaryOperator] });
export const Slash = createToken({ name: "Slash", pattern: /\//, categories: [BinaryOperator] });
export const Percent = createToken({ name: "Percent", pattern: /%/, categories: [BinaryOperator] });

// Whitespace and comments
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t\f]+/,
  group: Lexer.SKIPPED,
});
export const Newline = createToken({
  name: "Newline",
  pattern: /\r?\n|\r/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});
export const LineComment = createToken({
  name: "LineComment",
  pattern: /\/\/[^\n\r]*/,
  group: Lexer.SKIPPED,
});
export const BlockComment = createToken({
  name: "BlockComment",
  pattern: /\/\*[\s\S]*?\*\//,
  group: Lexer.SKIPPED,
  line_breaks: true,
});
export const UnterminatedComment = createToken({
  name: "UnterminatedComment",
  pattern: /\/\*[\s\S]*/,
  line_breaks: true,
});

// Token order matters: longer/more specific tokens first
export const allTokens = [
  WhiteSpace,
  Newline,
  LineComment,
  BlockComment,
  UnterminatedComment,
  // Multi-char operators first (order critical)
  PlusPlus,
  MinusMinus,
  PlusEq,
  MinusEq,
  StarEq,
  SlashEq,
  AndAnd,
  OrOr,
  EqEq,
  BangEq,
  LtEq,
  GtEq,
  // Keywords (before Ident), longer prefixes first
  VarSet,
  Var,
  Let,
  Const,
  Typeof,
  Type,
  FunctionKw,
  Return,
  If,
  Else,
  While,
  Foreach,
  For,
  Break,
  Continue,
  Call,
  Print,
  Try,
  Exceptions,
  When,
  Raise,
  Import,
  True,
  False,
  Null,
  And,
  Or,
  Not,
  Integer,
  Int,
  Long,
  Double,
  Float,
  StringKw,
  BooleanKw,
  Bool,
  Json,
  Handle,
  RecordKw,
  Queue,
  MapKw,
  In,
  Do,
  // Literals
  FloatLit,
  IntLit,
  StringLit,
  UnterminatedString,
  // Ident after keywords
  Ident,
  // Punctuation & single-char operators
  LBrace,
  RBrace,
  LBracket,
  RBracket,
  LParen,
  RParen,
  Colon,
  Semi,
  Comma,
  Dot,
  Question,
  Equals,
  Bang,
  Lt,
  Gt,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  // Categories
  AnyName,
  TypeKeyword,
  PlainTypeKeyword,
  BinaryOperator,
  AssignOperator,
];

export const SkeinLexer = new Lexer(allTokens);

/** Words the lexer never yields as plain identifiers. */
export const RESERVED_WORDS: ReadonlySet<string> = new Set(reservedWords);

export function tokenSpan(t: IToken, file: string): Span {
  return {
    file,
    startLine: t.startLine ?? 1,
    startCol: t.startColumn ?? 1,
    endLine: t.endLine ?? t.startLine ?? 1,
    endCol: (t.endColumn ?? t.startColumn ?? 1) + 1,
  };
}

const SIMPLE_ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  b: "\b",
  f: "\f",
  "0": "\0",
  "\\": "\\",
  '"': '"',
  "'": "'",
  "/": "/",
};

/**
 * Decode the body of a quoted string token (quotes included).
 * Returns null when an escape sequence is invalid.
 */
export function unescapeString(image: string): string | null {
  const body = image.slice(1, -1);
  let out = "";
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== "\\") {
      out += ch;
      continue;
    }
    const next = body[i + 1];
    if (next === "u") {
      const hex = body.slice(i + 2, i + 6);
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) return null;
      out += String.fromCharCode(parseInt(hex, 16));
      i += 5;
      continue;
    }
    const simple = next === undefined ? undefined : SIMPLE_ESCAPES[next];
    if (simple === undefined) return null;
    out += simple;
    i++;
  }
  return out;
}

/**
 * Tokenize a whole compilation unit. Fails fast: the first problem raises a
 * LexError and no tokens are returned.
 */
export function tokenize(source: string, file: string = "<stdin>"): IToken[] {
  const result = SkeinLexer.tokenize(source);
  if (result.errors.length > 0) {
    const err = result.errors[0];
    const ch = source.charAt(err.offset);
    throw new LexError(`Unexpected character ${JSON.stringify(ch)}.`, {
      file,
      startLine: err.line ?? 1,
      startCol: err.column ?? 1,
      endLine: err.line ?? 1,
      endCol: (err.column ?? 1) + (err.length || 1),
    });
  }
  for (const t of result.tokens) {
    if (t.tokenType === UnterminatedString) {
      throw new LexError("Unterminated string literal.", tokenSpan(t, file));
    }
    if (t.tokenType === UnterminatedComment) {
      throw new LexError("Unterminated block comment.", tokenSpan(t, file));
    }
    if (t.tokenType === StringLit && unescapeString(t.image) === null) {
      throw new LexError("Invalid escape sequence in string literal.", tokenSpan(t, file));
    }
  }
  return result.tokens;
}
