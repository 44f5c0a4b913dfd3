/**
 * Skein Environment: the scope chain, VarSets and host-facing named paths.
 */
import type { Span } from "./ast.js";
import type { DataType } from "./types.js";
import type { JsonValue, MapKey, MapValue, Value } from "./values.js";
import { cloneValue, isMapKey, toJson } from "./values.js";
import { TypeSystem } from "./typesystem.js";
import { InterpreterError, ScopeViolationError, TypeCheckError } from "./errors.js";

export const VARSET_SCOPES = ["visible", "internal", "in", "out", "inout"] as const;

export type VarSetScope = (typeof VARSET_SCOPES)[number];

/** Who is writing: the running script, or the embedding host. */
export type WriteOrigin = "script" | "host";

export const GLOBALS_VARSET = "globals";
export const LOCALS_VARSET = "locals";

export interface Var {
  name: string;
  type: DataType;
  value: Value;
  constant: boolean;
  varSet: VarSet;
}

export class VarSet {
  readonly vars = new Map<string, Var>();

  constructor(
    readonly name: string,
    readonly scope: VarSetScope
  ) {}
}

export type ScopeKind = "global" | "function" | "block";

export class Scope {
  readonly vars = new Map<string, Var>();

  constructor(
    readonly kind: ScopeKind,
    readonly parent: Scope | null
  ) {}

  lookup(name: string): Var | undefined {
    for (let s: Scope | null = this; s; s = s.parent) {
      const found = s.vars.get(name);
      if (found) return found;
    }
    return undefined;
  }
}

export interface DeclareOptions {
  constant?: boolean;
  varSet?: VarSet;
  span?: Span;
}

export class Environment {
  readonly global = new Scope("global", null);
  readonly types: TypeSystem;
  /** Set once the instance starts running top-level statements. */
  started = false;

  private readonly varSets = new Map<string, VarSet>();
  private readonly locals = new VarSet(LOCALS_VARSET, "internal");

  constructor(
    readonly name: string,
    types: TypeSystem = new TypeSystem()
  ) {
    this.types = types;
    this.varSets.set(GLOBALS_VARSET, new VarSet(GLOBALS_VARSET, "internal"));
  }

  /** A child scope: functions hang off the global scope, blocks off their enclosing one. */
  child(parent: Scope, kind: Exclude<ScopeKind, "global">): Scope {
    return new Scope(kind, kind === "function" ? this.global : parent);
  }

  defineVarSet(name: string, scope: VarSetScope, span?: Span): VarSet {
    if (this.varSets.has(name)) {
      throw new InterpreterError("E_DUP_DECL", `VarSet '${name}' is already declared.`, span);
    }
    const set = new VarSet(name, scope);
    this.varSets.set(name, set);
    return set;
  }

  getVarSet(name: string): VarSet | undefined {
    return this.varSets.get(name);
  }

  /** VarSets a host may list. `internal` sets stay hidden but remain addressable. */
  listVarSets(): VarSet[] {
    return [...this.varSets.values()].filter((s) => s.scope !== "internal");
  }

  declare(scope: Scope, name: string, type: DataType, value: Value, options: DeclareOptions = {}): Var {
    if (scope.vars.has(name)) {
      throw new InterpreterError("E_DUP_DECL", `Variable '${name}' is already declared in this scope.`, options.span, {
        variable: name,
      });
    }
    const varSet = options.varSet ?? (scope.kind === "global" ? this.requireVarSet(GLOBALS_VARSET) : this.locals);
    const v: Var = { name, type, value, constant: options.constant ?? false, varSet };
    scope.vars.set(name, v);
    if (varSet !== this.locals) varSet.vars.set(name, v);
    return v;
  }

  /**
   * Enforce constness and VarSet scope rules for a write to `v`.
   */
  checkWrite(v: Var, origin: WriteOrigin, span?: Span): void {
    if (v.constant) {
      throw new InterpreterError("E_CONST", `Cannot assign to constant '${v.name}'.`, span, { variable: v.name });
    }
    const { scope } = v.varSet;
    const details = { varSet: v.varSet.name, scope, variable: v.name };
    if (scope === "in") {
      if (origin === "script" && this.started) {
        throw new ScopeViolationError(
          `Variable '${v.name}' in 'in' varset '${v.varSet.name}' is read-only to the script.`,
          span,
          details
        );
      }
      if (origin === "host" && this.started) {
        throw new ScopeViolationError(
          `Variable '${v.name}' in 'in' varset '${v.varSet.name}' can only be set before the script starts.`,
          span,
          details
        );
      }
    }
    if (scope === "out" && origin === "host") {
      throw new ScopeViolationError(
        `Variable '${v.name}' in 'out' varset '${v.varSet.name}' is read-only to the host.`,
        span,
        details
      );
    }
  }

  /**
   * Convert `value` to the variable's declared type and store it.
   */
  assign(v: Var, value: Value, origin: WriteOrigin, span?: Span): void {
    this.checkWrite(v, origin, span);
    v.value = this.types.convert(v.type, value);
  }

  // --- Named paths: container.varSet.var[.field...] ---

  private resolvePath(path: string): { variable: Var; segments: string[] } {
    const parts = path.split(".");
    if (parts.length < 3 || parts.some((p) => p === "")) {
      throw pathError(path, "expected 'container.varSet.variable'");
    }
    const [container, setName, varName, ...segments] = parts;
    if (container !== this.name) {
      throw pathError(path, `unknown container '${container}'`);
    }
    const set = this.varSets.get(setName);
    if (!set) throw pathError(path, `unknown varset '${setName}'`);
    const variable = set.vars.get(varName);
    if (!variable) throw pathError(path, `varset '${setName}' has no variable '${varName}'`);
    return { variable, segments };
  }

  /** Read a copy of the value at `path`. Reads are never scope-restricted. */
  getPath(path: string): Value {
    const { variable, segments } = this.resolvePath(path);
    let current: Value = variable.value;
    for (const seg of segments) {
      current = child(current, seg, path, this.pathKey);
    }
    return cloneValue(current);
  }

  setPath(path: string, value: Value, origin: WriteOrigin, span?: Span): void {
    const { variable, segments } = this.resolvePath(path);
    this.checkWrite(variable, origin, span);
    if (segments.length === 0) {
      variable.value = this.types.convert(variable.type, value);
      return;
    }
    const root = cloneValue(variable.value);
    let parent: Value = root;
    for (const seg of segments.slice(0, -1)) {
      parent = child(parent, seg, path, this.pathKey);
    }
    replaceChild(parent, segments[segments.length - 1], cloneValue(value), path, this.pathKey);
    variable.value = this.types.convert(variable.type, root);
  }

  /** A path segment into a map is converted to the map's key type. */
  private readonly pathKey = (map: MapValue, seg: string, path: string): MapKey => {
    let key: Value;
    try {
      key = this.types.convert(map.keyType, seg);
    } catch (e) {
      if (e instanceof TypeCheckError) throw pathError(path, `'${seg}' is not a valid key`);
      throw e;
    }
    if (!isMapKey(key)) throw pathError(path, `'${seg}' is not a valid key`);
    return key;
  };

  /** JSON view of every host-listable VarSet. */
  snapshot(): Record<string, Record<string, JsonValue>> {
    const out: Record<string, Record<string, JsonValue>> = {};
    for (const set of this.listVarSets()) {
      const vars: Record<string, JsonValue> = {};
      for (const [name, v] of set.vars) vars[name] = toJson(v.value);
      out[set.name] = vars;
    }
    return out;
  }

  private requireVarSet(name: string): VarSet {
    const set = this.varSets.get(name);
    if (!set) throw new Error(`Missing varset '${name}'.`);
    return set;
  }
}

function pathError(path: string, reason: string): InterpreterError {
  return new InterpreterError("E_PATH", `Invalid variable path '${path}': ${reason}.`, undefined, { path });
}

function arrayIndex(seg: string, length: number, path: string): number {
  if (!/^\d+$/.test(seg) || Number(seg) >= length) {
    throw pathError(path, `no element '${seg}'`);
  }
  return Number(seg);
}

type PathKey = (map: MapValue, seg: string, path: string) => MapKey;

function child(value: Value, seg: string, path: string, keyOf: PathKey): Value {
  if (value === null || typeof value !== "object") {
    throw pathError(path, `cannot access '${seg}' on a scalar`);
  }
  switch (value.kind) {
    case "record": {
      const fv = value.fields.get(seg);
      if (fv === undefined) throw pathError(path, `no field '${seg}'`);
      return fv;
    }
    case "map": {
      const ev = value.entries.get(keyOf(value, seg, path));
      if (ev === undefined) throw pathError(path, `no key '${seg}'`);
      return ev;
    }
    case "array":
    case "queue":
      return value.items[arrayIndex(seg, value.items.length, path)];
    case "handle":
      throw pathError(path, `cannot access '${seg}' on a handle`);
  }
}

function replaceChild(parent: Value, seg: string, value: Value, path: string, keyOf: PathKey): void {
  if (parent === null || typeof parent !== "object") {
    throw pathError(path, `cannot access '${seg}' on a scalar`);
  }
  switch (parent.kind) {
    case "record":
      if (!parent.fields.has(seg)) throw pathError(path, `no field '${seg}'`);
      parent.fields.set(seg, value);
      return;
    case "map":
      parent.entries.set(keyOf(parent, seg, path), value);
      return;
    case "array":
    case "queue":
      parent.items[arrayIndex(seg, parent.items.length, path)] = value;
      return;
    case "handle":
      throw pathError(path, `cannot access '${seg}' on a handle`);
  }
}
