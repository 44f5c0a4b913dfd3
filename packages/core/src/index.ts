/**
 * @skein/core - Skein Language Core
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export * from "./errors.js";
export * from "./types.js";
export * from "./values.js";
export { tokenize, RESERVED_WORDS } from "./lexer.js";
export { parse, parseOrThrow } from "./parser.js";
export type { ParseOptions, ParseResult } from "./parser.js";
export { validate, builtinNamespaces } from "./validator.js";
export { format, formatExpr } from "./formatter.js";
export { BINARY_PRECEDENCE, UNARY_PRECEDENCE } from "./operators.js";
export { TypeSystem } from "./typesystem.js";
export {
  Environment,
  VarSet,
  VARSET_SCOPES,
  GLOBALS_VARSET,
  LOCALS_VARSET,
} from "./environment.js";
export type { Var, VarSetScope, WriteOrigin } from "./environment.js";
export { Evaluator, DEFAULT_MAX_CALL_DEPTH } from "./evaluator.js";
export type { TraceEvent, TraceEventType, TraceData, Limits, EvaluatorOptions } from "./evaluator.js";
export {
  BuiltinRegistry,
  BuiltinRegistryBuilder,
  normalizeBuiltinName,
} from "./builtins.js";
export type { BuiltinDef, BuiltinHandler, BuiltinResult, ExecutionContext } from "./builtins.js";
export { SerialQueue } from "./serial-queue.js";
export { ScriptInstance, run } from "./instance.js";
export type { InstanceState, ScriptInstanceOptions, RunOptions, ExecutionResult } from "./instance.js";
export {
  resolveConfig,
  loadConfig,
  validateConfigShape,
  buildAllowedNamespaces,
  KNOWN_HOST_NAMESPACES,
  PROJECT_CONFIG_FILE,
} from "./config.js";
export type { SkeinConfig, ResolvedConfig } from "./config.js";
