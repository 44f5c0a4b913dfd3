/**
 * Skein TypeSystem: structural validation and greedy coercion of values
 * against DataTypes, resolving named types through a TypeRegistry.
 */
import type { DataType } from "./types.js";
import { TypeRegistry, describeType, JSON_TYPE } from "./types.js";
import type { Value, MapKey } from "./values.js";
import {
  cloneValue,
  fitsInt64,
  formatDouble,
  isMapKey,
  makeArray,
  makeMap,
  makeQueue,
  makeRecord,
  typeNameOf,
  wrapInt,
} from "./values.js";
import { TypeCheckError } from "./errors.js";

const INT_PATTERN = /^[+-]?\d+$/;
const DOUBLE_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function fieldPath(path: string, name: string): string {
  return path ? `${path}.${name}` : name;
}

export function indexPath(path: string, index: number | string): string {
  return `${path}[${index}]`;
}

function mismatch(label: string, value: Value, path: string): TypeCheckError {
  return new TypeCheckError(`expected ${label}, got ${typeNameOf(value)}`, { path });
}

function cannotConvert(value: string, label: string, path: string): TypeCheckError {
  return new TypeCheckError(`cannot convert ${JSON.stringify(value)} to ${label}`, { path });
}

export class TypeSystem {
  readonly registry: TypeRegistry;

  constructor(registry: TypeRegistry = new TypeRegistry()) {
    this.registry = registry;
  }

  /**
   * Strict shape check. Returns the first failure, or null when the value
   * matches. Records must carry exactly the declared fields.
   */
  validate(type: DataType, value: Value): TypeCheckError | null {
    try {
      this.validateAt(type, value, "", describeType(type));
      return null;
    } catch (e) {
      if (e instanceof TypeCheckError) return e;
      throw e;
    }
  }

  assertValid(type: DataType, value: Value): void {
    const err = this.validate(type, value);
    if (err) throw err;
  }

  /**
   * Coerce a value to `type`, returning a fresh copy. Leaf coercions follow a
   * fixed table; incompatible kinds raise a TypeCheckError naming the path.
   */
  convert(type: DataType, value: Value): Value {
    return this.convertAt(type, value, "", describeType(type));
  }

  defaultValue(type: DataType): Value {
    switch (type.kind) {
      case "int":
        return 0n;
      case "double":
        return 0;
      case "string":
        return "";
      case "bool":
        return false;
      case "json":
      case "handle":
      case "any":
        return null;
      case "named": {
        const value = this.defaultValue(this.registry.resolve(type));
        if (value !== null && typeof value === "object" && value.kind === "record") {
          value.typeName = type.name;
        }
        return value;
      }
      case "array": {
        const items: Value[] = [];
        for (let i = 0; i < (type.capacity ?? 0); i++) items.push(this.defaultValue(type.element));
        return makeArray(items, type.element, type.capacity);
      }
      case "record":
        return makeRecord(type.fields.map((f): [string, Value] => [f.name, this.defaultValue(f.type)]));
      case "queue":
        return makeQueue([], type.element);
      case "map":
        return makeMap([], type.key, type.value);
    }
  }

  /**
   * Type of the member `name` within a value of `type`, or null when the
   * type has no such field. Untyped containers yield `any`.
   */
  memberType(type: DataType, name: string): DataType | null {
    const resolved = this.registry.resolve(type);
    if (resolved.kind === "record") {
      return resolved.fields.find((f) => f.name === name)?.type ?? null;
    }
    if (resolved.kind === "map") return resolved.value;
    if (resolved.kind === "json") return JSON_TYPE;
    if (resolved.kind === "any") return resolved;
    return null;
  }

  private validateAt(type: DataType, value: Value, path: string, label: string): void {
    switch (type.kind) {
      case "any":
        return;
      case "int":
        if (typeof value !== "bigint") throw mismatch(label, value, path);
        return;
      case "double":
        if (typeof value !== "number") throw mismatch(label, value, path);
        return;
      case "string":
        if (typeof value !== "string") throw mismatch(label, value, path);
        return;
      case "bool":
        if (typeof value !== "boolean") throw mismatch(label, value, path);
        return;
      case "named":
        this.validateAt(this.resolveAt(type, path), value, path, type.name);
        return;
      case "json":
        this.validateJson(value, path);
        return;
    }

    if (value === null) return;
    if (typeof value !== "object") throw mismatch(label, value, path);

    switch (type.kind) {
      case "handle":
        if (value.kind !== "handle") throw mismatch(label, value, path);
        return;
      case "array":
        if (value.kind !== "array") throw mismatch(label, value, path);
        if (type.capacity !== null && value.items.length > type.capacity) {
          throw new TypeCheckError(`expected at most ${type.capacity} elements, got ${value.items.length}`, { path });
        }
        value.items.forEach((item, i) => this.validateAt(type.element, item, indexPath(path, i), describeType(type.element)));
        return;
      case "record": {
        if (value.kind !== "record") throw mismatch(label, value, path);
        for (const f of type.fields) {
          const fv = value.fields.get(f.name);
          if (fv === undefined) {
            throw new TypeCheckError("missing field", { path: fieldPath(path, f.name) });
          }
          this.validateAt(f.type, fv, fieldPath(path, f.name), describeType(f.type));
        }
        for (const k of value.fields.keys()) {
          if (!type.fields.some((f) => f.name === k)) {
            throw new TypeCheckError("unknown field", { path: fieldPath(path, k) });
          }
        }
        return;
      }
      case "queue":
        if (value.kind !== "queue") throw mismatch(label, value, path);
        value.items.forEach((item, i) => this.validateAt(type.element, item, indexPath(path, i), describeType(type.element)));
        return;
      case "map":
        if (value.kind !== "map") throw mismatch(label, value, path);
        for (const [k, v] of value.entries) {
          const at = indexPath(path, JSON.stringify(typeof k === "bigint" ? k.toString() : k));
          this.validateAt(type.key, k, at, describeType(type.key));
          this.validateAt(type.value, v, at, describeType(type.value));
        }
        return;
    }
  }

  private validateJson(value: Value, path: string): void {
    if (value === null || typeof value !== "object") return;
    switch (value.kind) {
      case "array":
        value.items.forEach((item, i) => this.validateJson(item, indexPath(path, i)));
        return;
      case "record":
        for (const [k, fv] of value.fields) this.validateJson(fv, fieldPath(path, k));
        return;
      default:
        throw mismatch("json", value, path);
    }
  }

  private resolveAt(type: DataType, path: string): DataType {
    try {
      return this.registry.resolve(type);
    } catch (e) {
      if (e instanceof TypeCheckError && path) {
        throw new TypeCheckError(e.message, { path, code: e.code });
      }
      throw e;
    }
  }

  private convertAt(type: DataType, value: Value, path: string, label: string): Value {
    switch (type.kind) {
      case "any":
        return cloneValue(value);
      case "named": {
        const result = this.convertAt(this.resolveAt(type, path), value, path, type.name);
        if (result !== null && typeof result === "object" && result.kind === "record") {
          result.typeName = type.name;
        }
        return result;
      }
      case "int":
        return this.toInt(value, path, label);
      case "double":
        return this.toDouble(value, path, label);
      case "string":
        return this.toStr(value, path, label);
      case "bool":
        return this.toBool(value, path, label);
      case "json":
        return this.toJsonTree(value, path);
    }

    if (value === null) return null;
    if (typeof value !== "object") throw mismatch(label, value, path);

    switch (type.kind) {
      case "handle":
        if (value.kind !== "handle") throw mismatch(label, value, path);
        return value;
      case "array": {
        if (value.kind !== "array" && value.kind !== "queue") throw mismatch(label, value, path);
        if (type.capacity !== null && value.items.length > type.capacity) {
          throw new TypeCheckError(`expected at most ${type.capacity} elements, got ${value.items.length}`, { path });
        }
        const elementLabel = describeType(type.element);
        const items = value.items.map((item, i) => this.convertAt(type.element, item, indexPath(path, i), elementLabel));
        while (type.capacity !== null && items.length < type.capacity) {
          items.push(this.defaultValue(type.element));
        }
        return makeArray(items, type.element, type.capacity);
      }
      case "record": {
        if (value.kind !== "record") throw mismatch(label, value, path);
        for (const k of value.fields.keys()) {
          if (!type.fields.some((f) => f.name === k)) {
            throw new TypeCheckError("unknown field", { path: fieldPath(path, k) });
          }
        }
        const entries: Array<[string, Value]> = [];
        for (const f of type.fields) {
          const fv = value.fields.get(f.name);
          entries.push([
            f.name,
            fv === undefined
              ? this.defaultValue(f.type)
              : this.convertAt(f.type, fv, fieldPath(path, f.name), describeType(f.type)),
          ]);
        }
        return makeRecord(entries);
      }
      case "queue": {
        if (value.kind !== "queue" && value.kind !== "array") throw mismatch(label, value, path);
        const elementLabel = describeType(type.element);
        return makeQueue(
          value.items.map((item, i) => this.convertAt(type.element, item, indexPath(path, i), elementLabel)),
          type.element
        );
      }
      case "map": {
        let source: Array<[Value, Value]>;
        if (value.kind === "map") source = [...value.entries];
        else if (value.kind === "record") source = [...value.fields];
        else throw mismatch(label, value, path);
        const entries: Array<[MapKey, Value]> = [];
        for (const [k, v] of source) {
          const at = indexPath(path, JSON.stringify(typeof k === "bigint" ? k.toString() : k));
          const key = this.convertAt(type.key, k, at, describeType(type.key));
          if (!isMapKey(key)) {
            throw new TypeCheckError(`map keys must be scalar, got ${typeNameOf(key)}`, { path: at });
          }
          entries.push([key, this.convertAt(type.value, v, at, describeType(type.value))]);
        }
        return makeMap(entries, type.key, type.value);
      }
    }
  }

  private toInt(value: Value, path: string, label: string): bigint {
    if (value === null) return 0n;
    if (typeof value === "bigint") return value;
    if (typeof value === "number") {
      if (!Number.isFinite(value)) throw new TypeCheckError(`cannot convert ${formatDouble(value)} to ${label}`, { path });
      return wrapInt(BigInt(Math.trunc(value)));
    }
    if (typeof value === "string") {
      const text = value.trim();
      if (INT_PATTERN.test(text)) {
        const n = BigInt(text);
        if (fitsInt64(n)) return n;
      }
      throw cannotConvert(value, label, path);
    }
    throw mismatch(label, value, path);
  }

  private toDouble(value: Value, path: string, label: string): number {
    if (value === null) return 0;
    if (typeof value === "number") return value;
    if (typeof value === "bigint") return Number(value);
    if (typeof value === "string") {
      const text = value.trim();
      if (DOUBLE_PATTERN.test(text)) return Number(text);
      throw cannotConvert(value, label, path);
    }
    throw mismatch(label, value, path);
  }

  private toStr(value: Value, path: string, label: string): string {
    if (value === null) return "";
    if (typeof value === "string") return value;
    if (typeof value === "bigint") return value.toString();
    if (typeof value === "number") return formatDouble(value);
    if (typeof value === "boolean") return value ? "true" : "false";
    throw mismatch(label, value, path);
  }

  private toBool(value: Value, path: string, label: string): boolean {
    if (value === null) return false;
    if (typeof value === "boolean") return value;
    if (typeof value === "string") {
      const text = value.trim().toLowerCase();
      if (text === "true") return true;
      if (text === "false") return false;
      throw cannotConvert(value, label, path);
    }
    throw mismatch(label, value, path);
  }

  private toJsonTree(value: Value, path: string): Value {
    if (value === null || typeof value !== "object") return value;
    switch (value.kind) {
      case "array":
        return makeArray(value.items.map((item, i) => this.toJsonTree(item, indexPath(path, i))));
      case "record":
        return makeRecord([...value.fields].map(([k, fv]): [string, Value] => [k, this.toJsonTree(fv, fieldPath(path, k))]));
      default:
        throw mismatch("json", value, path);
    }
  }
}
