/**
 * @skein/host - Skein host capability builtins
 */
import type { BuiltinDef, BuiltinRegistryBuilder } from "@skein/core";
import { fileFns } from "./file-ops.js";

export { fileReadFn, fileWriteFn, fileExistsFn, fileListFn } from "./file-ops.js";

const HOST_BUILTINS: ReadonlyMap<string, BuiltinDef[]> = new Map([["file", fileFns]]);

/** Host namespaces this package provides. */
export function hostNamespaces(): string[] {
  return [...HOST_BUILTINS.keys()];
}

/**
 * Register the builtins of every host namespace in `allowed`. Namespaces not
 * listed stay unregistered, so scripts calling them fail with
 * UnknownBuiltinError.
 */
export function registerHost(builder: BuiltinRegistryBuilder, allowed: ReadonlySet<string>): BuiltinRegistryBuilder {
  for (const [ns, defs] of HOST_BUILTINS) {
    if (!allowed.has(ns)) continue;
    for (const def of defs) builder.registerDef(def);
  }
  return builder;
}
