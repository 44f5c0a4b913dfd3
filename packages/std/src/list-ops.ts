/**
 * Skein std: array operations
 * array.push, array.pop, array.indexOf, array.contains, array.sort
 *
 * Handlers receive the script's own array, so push, pop and sort change it
 * in place.
 */
import { z } from "zod";
import { HostError, describeType, typeNameOf, valuesEqual } from "@skein/core";
import type { ArrayValue, Value } from "@skein/core";
import { defineBuiltin } from "./define.js";
import { arrayArg, valueArg } from "./schemas.js";

function requireDynamic(items: ArrayValue, op: string): void {
  if (items.capacity !== null) {
    throw new HostError(`cannot ${op} a fixed array ${describeType(items.elementType)}[${items.capacity}]`, {
      category: "VALIDATION_ERROR",
    });
  }
}

/** array.push(items, value) -> int (the new length) */
export const arrayPushFn = defineBuiltin({
  name: "array.push",
  mutates: 0,
  args: z.tuple([arrayArg, valueArg]),
  execute: ([items, value], ctx) => {
    requireDynamic(items, "push to");
    items.items.push(ctx.convert(items.elementType, value));
    return BigInt(items.items.length);
  },
});

/** array.pop(items) -> the removed last element */
export const arrayPopFn = defineBuiltin({
  name: "array.pop",
  mutates: 0,
  args: z.tuple([arrayArg]),
  execute: ([items]) => {
    requireDynamic(items, "pop from");
    const last = items.items.pop();
    if (last === undefined) {
      throw new HostError("cannot pop from an empty array", { category: "INDEX_ERROR" });
    }
    return last;
  },
});

export const arrayIndexOfFn = defineBuiltin({
  name: "array.indexOf",
  description: "Index of the first equal element, or -1.",
  args: z.tuple([arrayArg, valueArg]),
  execute: ([items, value]) => BigInt(items.items.findIndex((item) => valuesEqual(item, value))),
});

export const arrayContainsFn = defineBuiltin({
  name: "array.contains",
  args: z.tuple([arrayArg, valueArg]),
  execute: ([items, value]) => items.items.some((item) => valuesEqual(item, value)),
});

type Comparator = (a: Value, b: Value) => number;

function comparatorFor(items: Value[]): Comparator {
  const kinds = new Set(items.map((v) => (typeof v === "bigint" || typeof v === "number" ? "number" : typeNameOf(v))));
  if (kinds.size > 1) {
    throw new HostError(`cannot sort mixed elements (${[...kinds].sort().join(", ")})`, { category: "TYPE_ERROR" });
  }
  const [kind] = kinds;
  switch (kind) {
    case undefined:
    case "number":
      return (a, b) => {
        if (typeof a === "bigint" && typeof b === "bigint") return a < b ? -1 : a > b ? 1 : 0;
        return Number(a) - Number(b);
      };
    case "string":
      return (a, b) => (String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0);
    case "bool":
      return (a, b) => Number(a === true) - Number(b === true);
    default:
      throw new HostError(`cannot sort elements of type ${kind}`, { category: "TYPE_ERROR" });
  }
}

/** array.sort(items): sorts scalars ascending, in place. */
export const arraySortFn = defineBuiltin({
  name: "array.sort",
  mutates: 0,
  args: z.tuple([arrayArg]),
  execute: ([items]) => {
    items.items.sort(comparatorFor(items.items));
  },
});

export const arrayFns = [arrayPushFn, arrayPopFn, arrayIndexOfFn, arrayContainsFn, arraySortFn];
