/**
 * Skein builtin registry and the context handed to builtin handlers.
 *
 * Registries are built once and injected into each instance; there is no
 * process-wide registry.
 */
import type { Span } from "./ast.js";
import type { DataType } from "./types.js";
import type { Value } from "./values.js";

export interface ExecutionContext {
  /** Name of the running instance, the first segment of variable paths. */
  instanceName: string;
  /** Identity of the running instance, for per-instance handler state. */
  instanceKey: object;
  signal: AbortSignal;
  /** Call site of the builtin. */
  span: Span;
  print(text: string): void;
  /** Script-side named access; writes obey VarSet scope rules. */
  getVar(path: string): Value;
  setVar(path: string, value: Value): void;
  convert(type: DataType, value: Value): Value;
  /** Queue a call to a script function once the current unit finishes. */
  submitCallback(functionName: string, args?: Value[]): Promise<Value>;
}

export type BuiltinResult = Value | void;

export type BuiltinHandler = (args: Value[], ctx: ExecutionContext) => BuiltinResult | Promise<BuiltinResult>;

export interface BuiltinDef {
  name: string;
  description?: string;
  /**
   * Index of the argument the handler changes in place. The variable that
   * argument is read from must be writable by the script at the call site.
   */
  mutates?: number;
  execute: BuiltinHandler;
}

const QUALIFIED_NAME = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)+$/;

export function normalizeBuiltinName(name: string): string {
  return name.toLowerCase();
}

export class BuiltinRegistry {
  private readonly defs: ReadonlyMap<string, BuiltinDef>;

  constructor(defs: Map<string, BuiltinDef>) {
    this.defs = new Map(defs);
    Object.freeze(this);
  }

  static empty(): BuiltinRegistry {
    return new BuiltinRegistry(new Map());
  }

  /** Case-insensitive lookup by qualified name. */
  lookup(name: string): BuiltinDef | undefined {
    return this.defs.get(normalizeBuiltinName(name));
  }

  has(name: string): boolean {
    return this.defs.has(normalizeBuiltinName(name));
  }

  /** Registered names, normalized and sorted. */
  names(): string[] {
    return [...this.defs.keys()].sort();
  }
}

export class BuiltinRegistryBuilder {
  private readonly defs = new Map<string, BuiltinDef>();

  register(name: string, execute: BuiltinHandler, description?: string): this {
    return this.registerDef({ name, description, execute });
  }

  registerDef(def: BuiltinDef): this {
    if (!QUALIFIED_NAME.test(def.name)) {
      throw new Error(`Invalid builtin name '${def.name}': expected 'namespace.function'.`);
    }
    const key = normalizeBuiltinName(def.name);
    if (this.defs.has(key)) {
      throw new Error(`Builtin '${key}' is already registered.`);
    }
    this.defs.set(key, { ...def, name: key });
    return this;
  }

  build(): BuiltinRegistry {
    return new BuiltinRegistry(this.defs);
  }
}
