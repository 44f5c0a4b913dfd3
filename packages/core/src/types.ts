/**
 * Skein DataType descriptors and the name-addressed type registry.
 *
 * Named types are stored once and referenced through `{ kind: "named" }`
 * nodes, so record types that refer to each other are never expanded eagerly.
 */
import { TypeCheckError } from "./errors.js";

export type ScalarKind = "int" | "double" | "string" | "bool";

export interface RecordField {
  name: string;
  type: DataType;
}

export type DataType =
  | { kind: "int" }
  | { kind: "double" }
  | { kind: "string" }
  | { kind: "bool" }
  | { kind: "json" }
  | { kind: "handle" }
  | { kind: "any" }
  | { kind: "array"; element: DataType; capacity: number | null }
  | { kind: "record"; fields: RecordField[] }
  | { kind: "named"; name: string }
  | { kind: "queue"; element: DataType }
  | { kind: "map"; key: DataType; value: DataType };

export const INT: DataType = { kind: "int" };
export const DOUBLE: DataType = { kind: "double" };
export const STRING: DataType = { kind: "string" };
export const BOOL: DataType = { kind: "bool" };
export const JSON_TYPE: DataType = { kind: "json" };
export const HANDLE: DataType = { kind: "handle" };
export const ANY: DataType = { kind: "any" };

export function arrayOf(element: DataType, capacity: number | null = null): DataType {
  return { kind: "array", element, capacity };
}

export function recordOf(fields: Array<[string, DataType]>): DataType {
  return { kind: "record", fields: fields.map(([name, type]) => ({ name, type })) };
}

export function named(name: string): DataType {
  return { kind: "named", name };
}

export function queueOf(element: DataType): DataType {
  return { kind: "queue", element };
}

export function mapOf(key: DataType, value: DataType): DataType {
  return { kind: "map", key, value };
}

export function isScalarType(type: DataType): type is { kind: ScalarKind } {
  return type.kind === "int" || type.kind === "double" || type.kind === "string" || type.kind === "bool";
}

/**
 * Render a type in source syntax. The output parses back to the same type.
 */
export function describeType(type: DataType): string {
  switch (type.kind) {
    case "int":
    case "double":
    case "string":
    case "bool":
    case "json":
    case "handle":
    case "any":
      return type.kind;
    case "named":
      return type.name;
    case "array": {
      // Dimensions read outermost-first: int[3][4] is 3 rows of int[4].
      const dims: string[] = [];
      let inner: DataType = type;
      while (inner.kind === "array") {
        dims.push(inner.capacity === null ? "[]" : `[${inner.capacity}]`);
        inner = inner.element;
      }
      return `${describeType(inner)}${dims.join("")}`;
    }
    case "record":
      return `record{${type.fields.map((f) => `${f.name}: ${describeType(f.type)}`).join(", ")}}`;
    case "queue":
      return `queue<${describeType(type.element)}>`;
    case "map":
      return `map<${describeType(type.key)}, ${describeType(type.value)}>`;
  }
}

export function typesEqual(a: DataType, b: DataType): boolean {
  return describeType(a) === describeType(b);
}

/**
 * Named references reachable from a type, in declaration order.
 */
export function namedReferences(type: DataType, out: string[] = []): string[] {
  switch (type.kind) {
    case "named":
      out.push(type.name);
      break;
    case "array":
    case "queue":
      namedReferences(type.element, out);
      break;
    case "map":
      namedReferences(type.key, out);
      namedReferences(type.value, out);
      break;
    case "record":
      for (const f of type.fields) namedReferences(f.type, out);
      break;
    default:
      break;
  }
  return out;
}

export class TypeRegistry {
  private readonly types = new Map<string, DataType>();

  /**
   * Register a named type. Rejects duplicates and definitions that close a
   * cycle through named references; the registry is unchanged on failure.
   */
  define(name: string, type: DataType): void {
    if (this.types.has(name)) {
      throw new TypeCheckError(`type '${name}' is already defined`);
    }
    this.types.set(name, type);
    const cycle = this.findCycle(name);
    if (cycle) {
      this.types.delete(name);
      throw new TypeCheckError(`cyclic type definition: ${cycle.join(" -> ")}`, { code: "E_TYPE_CYCLE" });
    }
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  get(name: string): DataType | undefined {
    return this.types.get(name);
  }

  names(): string[] {
    return [...this.types.keys()];
  }

  /**
   * Follow named references until a structural type is reached.
   */
  resolve(type: DataType): DataType {
    let current = type;
    const seen = new Set<string>();
    while (current.kind === "named") {
      if (seen.has(current.name)) {
        throw new TypeCheckError(`cyclic type definition: ${[...seen, current.name].join(" -> ")}`, { code: "E_TYPE_CYCLE" });
      }
      seen.add(current.name);
      const next = this.types.get(current.name);
      if (!next) {
        throw new TypeCheckError(`unknown type '${current.name}'`);
      }
      current = next;
    }
    return current;
  }

  /**
   * Depth-first search over named references starting at `start`. Returns the
   * path of names that leads back to `start`, or null. Undefined names are
   * skipped: they may still be registered later.
   */
  findCycle(start: string): string[] | null {
    const visiting = new Set<string>();
    const done = new Set<string>();

    const visit = (name: string, trail: string[]): string[] | null => {
      if (name === start && trail.length > 0) return [...trail, name];
      if (visiting.has(name) || done.has(name)) return null;
      const type = this.types.get(name);
      if (!type) return null;
      visiting.add(name);
      for (const ref of namedReferences(type)) {
        const found = visit(ref, [...trail, name]);
        if (found) return found;
      }
      visiting.delete(name);
      done.add(name);
      return null;
    };

    return visit(start, []);
  }
}
