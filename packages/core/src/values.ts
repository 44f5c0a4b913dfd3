/**
 * Skein runtime values.
 *
 * Scalars map onto JS primitives (ints are 64-bit bigints, doubles are
 * numbers). Composites are tagged objects; everything except handles is
 * copied on assignment.
 */
import type { DataType } from "./types.js";
import { ANY, JSON_TYPE, describeType } from "./types.js";

export type MapKey = string | bigint | number | boolean;

export interface ArrayValue {
  kind: "array";
  elementType: DataType;
  /** null for dynamic arrays */
  capacity: number | null;
  items: Value[];
}

export interface RecordValue {
  kind: "record";
  /** Declared type name when the record was converted to a named type. */
  typeName: string | null;
  fields: Map<string, Value>;
}

export interface QueueValue {
  kind: "queue";
  elementType: DataType;
  items: Value[];
}

export interface MapValue {
  kind: "map";
  keyType: DataType;
  valueType: DataType;
  entries: Map<MapKey, Value>;
}

export interface HandleValue {
  kind: "handle";
  tag: string;
  id: number;
  payload: unknown;
}

export type ScalarValue = null | boolean | bigint | number | string;
export type CompositeValue = ArrayValue | RecordValue | QueueValue | MapValue | HandleValue;
export type Value = ScalarValue | CompositeValue;

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export function wrapInt(n: bigint): bigint {
  return BigInt.asIntN(64, n);
}

export function fitsInt64(n: bigint): boolean {
  return n >= INT64_MIN && n <= INT64_MAX;
}

// --- Constructors ---

export function makeArray(items: Value[], elementType: DataType = JSON_TYPE, capacity: number | null = null): ArrayValue {
  return { kind: "array", elementType, capacity, items };
}

export function makeRecord(entries: Iterable<[string, Value]>, typeName: string | null = null): RecordValue {
  return { kind: "record", typeName, fields: new Map(entries) };
}

export function makeQueue(items: Value[], elementType: DataType = ANY): QueueValue {
  return { kind: "queue", elementType, items };
}

export function makeMap(entries: Iterable<[MapKey, Value]>, keyType: DataType = ANY, valueType: DataType = ANY): MapValue {
  return { kind: "map", keyType, valueType, entries: new Map(entries) };
}

let nextHandleId = 1;

export function makeHandle(tag: string, payload: unknown): HandleValue {
  return { kind: "handle", tag, id: nextHandleId++, payload };
}

// --- Guards ---

function isTagged(v: unknown): v is { kind: unknown } {
  return typeof v === "object" && v !== null && "kind" in v;
}

export function isArrayValue(v: unknown): v is ArrayValue {
  return isTagged(v) && v.kind === "array";
}

export function isRecordValue(v: unknown): v is RecordValue {
  return isTagged(v) && v.kind === "record";
}

export function isQueueValue(v: unknown): v is QueueValue {
  return isTagged(v) && v.kind === "queue";
}

export function isMapValue(v: unknown): v is MapValue {
  return isTagged(v) && v.kind === "map";
}

export function isHandleValue(v: unknown): v is HandleValue {
  return isTagged(v) && v.kind === "handle";
}

export function isMapKey(v: Value): v is MapKey {
  return typeof v === "string" || typeof v === "bigint" || typeof v === "number" || typeof v === "boolean";
}

export function isValue(v: unknown): v is Value {
  if (v === null) return true;
  switch (typeof v) {
    case "boolean":
    case "bigint":
    case "number":
    case "string":
      return true;
    default:
      return isArrayValue(v) || isRecordValue(v) || isQueueValue(v) || isMapValue(v) || isHandleValue(v);
  }
}

/**
 * Runtime type name, as reported by `typeof` and in error messages.
 */
export function typeNameOf(v: Value): string {
  if (v === null) return "null";
  switch (typeof v) {
    case "boolean":
      return "bool";
    case "bigint":
      return "int";
    case "number":
      return "double";
    case "string":
      return "string";
  }
  switch (v.kind) {
    case "record":
      return v.typeName ?? "record";
    case "array":
      return v.elementType.kind === "json" || v.elementType.kind === "any"
        ? "array"
        : `${describeType(v.elementType)}[${v.capacity === null ? "" : v.capacity}]`;
    case "queue":
      return "queue";
    case "map":
      return "map";
    case "handle":
      return "handle";
  }
}

// --- Copy semantics ---

/**
 * Structural copy. Handles are references and are shared.
 */
export function cloneValue(v: Value): Value {
  if (v === null || typeof v !== "object") return v;
  switch (v.kind) {
    case "array":
      return { kind: "array", elementType: v.elementType, capacity: v.capacity, items: v.items.map(cloneValue) };
    case "record": {
      const fields = new Map<string, Value>();
      for (const [k, fv] of v.fields) fields.set(k, cloneValue(fv));
      return { kind: "record", typeName: v.typeName, fields };
    }
    case "queue":
      return { kind: "queue", elementType: v.elementType, items: v.items.map(cloneValue) };
    case "map": {
      const entries = new Map<MapKey, Value>();
      for (const [k, ev] of v.entries) entries.set(k, cloneValue(ev));
      return { kind: "map", keyType: v.keyType, valueType: v.valueType, entries };
    }
    case "handle":
      return v;
  }
}

// --- Equality ---

function isNumeric(v: Value): v is bigint | number {
  return typeof v === "bigint" || typeof v === "number";
}

export function numericEquals(a: bigint | number, b: bigint | number): boolean {
  if (typeof a === "bigint" && typeof b === "bigint") return a === b;
  return Number(a) === Number(b);
}

/**
 * Deep structural equality. Ints and doubles compare numerically; values of
 * different kinds are never equal.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  if (isNumeric(a) && isNumeric(b)) return numericEquals(a, b);
  if (a === null || b === null || typeof a !== "object" || typeof b !== "object") return a === b;
  if (a.kind === "handle" || b.kind === "handle") return a === b;
  if (a.kind === "record" && b.kind === "record") {
    if (a.fields.size !== b.fields.size) return false;
    for (const [k, av] of a.fields) {
      const bv = b.fields.get(k);
      if (bv === undefined || !valuesEqual(av, bv)) return false;
    }
    return true;
  }
  if ((a.kind === "array" && b.kind === "array") || (a.kind === "queue" && b.kind === "queue")) {
    if (a.items.length !== b.items.length) return false;
    return a.items.every((item, i) => valuesEqual(item, b.items[i]));
  }
  if (a.kind === "map" && b.kind === "map") {
    if (a.entries.size !== b.entries.size) return false;
    for (const [k, av] of a.entries) {
      const bv = b.entries.get(k);
      if (bv === undefined || !valuesEqual(av, bv)) return false;
    }
    return true;
  }
  return false;
}

// --- Canonical formatting ---

/**
 * Doubles always carry a fractional part and never use exponent notation,
 * so `30.0` stays distinguishable from the int `30`.
 */
export function formatDouble(value: number): string {
  if (!Number.isFinite(value)) return String(value);

  const raw = String(value);
  const expanded = /e/i.test(raw) ? expandScientificNotation(raw) : raw;
  return expanded.includes(".") ? expanded : `${expanded}.0`;
}

function expandScientificNotation(value: string): string {
  const [mantissa, exponentPart] = value.toLowerCase().split("e");
  const exponent = Number.parseInt(exponentPart, 10);
  if (!Number.isFinite(exponent)) return value;

  let sign = "";
  let digits = mantissa;
  if (digits.startsWith("-")) {
    sign = "-";
    digits = digits.slice(1);
  }

  const dot = digits.indexOf(".");
  const intPart = dot >= 0 ? digits.slice(0, dot) : digits;
  const fracPart = dot >= 0 ? digits.slice(dot + 1) : "";
  const compact = intPart + fracPart;
  const decimalIndex = intPart.length + exponent;

  if (decimalIndex <= 0) {
    return `${sign}0.${"0".repeat(-decimalIndex)}${compact}`;
  }
  if (decimalIndex >= compact.length) {
    return `${sign}${compact}${"0".repeat(decimalIndex - compact.length)}.0`;
  }
  return `${sign}${compact.slice(0, decimalIndex)}.${compact.slice(decimalIndex)}`;
}

function formatKey(k: MapKey): string {
  return typeof k === "string" ? JSON.stringify(k) : formatValue(k);
}

/**
 * Canonical text of a value: what `print` writes and what `+` appends.
 * Strings are raw at the top level and quoted inside composites.
 */
export function formatValue(v: Value): string {
  if (v === null) return "null";
  switch (typeof v) {
    case "boolean":
      return v ? "true" : "false";
    case "bigint":
      return v.toString();
    case "number":
      return formatDouble(v);
    case "string":
      return v;
  }
  return formatNested(v);
}

function formatNested(v: Value): string {
  if (typeof v === "string") return JSON.stringify(v);
  if (v === null || typeof v !== "object") return formatValue(v);
  switch (v.kind) {
    case "array":
    case "queue":
      return `[${v.items.map(formatNested).join(", ")}]`;
    case "record":
      return `{${[...v.fields].map(([k, fv]) => `${JSON.stringify(k)}: ${formatNested(fv)}`).join(", ")}}`;
    case "map":
      return `{${[...v.entries].map(([k, ev]) => `${formatKey(k)}: ${formatNested(ev)}`).join(", ")}}`;
    case "handle":
      return `<${v.tag}#${v.id}>`;
  }
}

// --- JSON bridge ---

/**
 * Plain JSON view of a value for hosts and CLI output. Ints outside the safe
 * integer range become decimal strings; handles become `"<tag#id>"`.
 */
export function toJson(v: Value): JsonValue {
  if (v === null) return null;
  switch (typeof v) {
    case "boolean":
    case "number":
    case "string":
      return v;
    case "bigint":
      return v >= BigInt(Number.MIN_SAFE_INTEGER) && v <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(v) : v.toString();
  }
  switch (v.kind) {
    case "array":
    case "queue":
      return v.items.map(toJson);
    case "record": {
      const out: { [key: string]: JsonValue } = {};
      for (const [k, fv] of v.fields) out[k] = toJson(fv);
      return out;
    }
    case "map": {
      const out: { [key: string]: JsonValue } = {};
      for (const [k, ev] of v.entries) out[formatValue(k)] = toJson(ev);
      return out;
    }
    case "handle":
      return `<${v.tag}#${v.id}>`;
  }
}

/**
 * Build a value from parsed JSON. Integral numbers become ints, objects become
 * untyped records and arrays become dynamic json arrays.
 */
export function fromJson(data: unknown): Value {
  if (data === null || data === undefined) return null;
  switch (typeof data) {
    case "boolean":
    case "string":
      return data;
    case "bigint":
      return wrapInt(data);
    case "number":
      return Number.isSafeInteger(data) ? BigInt(data) : data;
  }
  if (isValue(data)) return data;
  if (Array.isArray(data)) {
    return makeArray(data.map(fromJson));
  }
  if (typeof data === "object" && data !== null) {
    return makeRecord(Object.entries(data).map(([k, fv]): [string, Value] => [k, fromJson(fv)]));
  }
  throw new TypeError(`Cannot convert ${typeof data} to a Skein value.`);
}
