/**
 * @skein/std - Skein Standard Builtins
 */
import type { BuiltinDef, BuiltinRegistryBuilder } from "@skein/core";
import { stringFns } from "./string-ops.js";
import { mathFns } from "./math-ops.js";
import { jsonFns } from "./parse-json.js";
import { arrayFns } from "./list-ops.js";
import { queueFns } from "./queue-ops.js";
import { mapFns } from "./map-ops.js";
import { systemFns } from "./system-ops.js";
import { varsFns } from "./path-ops.js";
import { timerFns } from "./timer-ops.js";

export { defineBuiltin } from "./define.js";
export type { BuiltinSpec } from "./define.js";
export * from "./schemas.js";
export * from "./string-ops.js";
export * from "./math-ops.js";
export * from "./parse-json.js";
export * from "./list-ops.js";
export * from "./queue-ops.js";
export * from "./map-ops.js";
export * from "./system-ops.js";
export * from "./path-ops.js";
export * from "./timer-ops.js";

/**
 * Get all standard builtins.
 */
export function getStdBuiltins(): BuiltinDef[] {
  return [...systemFns, ...stringFns, ...mathFns, ...jsonFns, ...arrayFns, ...queueFns, ...mapFns, ...varsFns, ...timerFns];
}

export function registerStd(builder: BuiltinRegistryBuilder): BuiltinRegistryBuilder {
  for (const def of getStdBuiltins()) builder.registerDef(def);
  return builder;
}
