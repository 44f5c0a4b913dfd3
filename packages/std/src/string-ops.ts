/**
 * Skein std: string operations
 * string.length, string.upper, string.lower, string.trim, string.substring,
 * string.indexOf, string.contains, string.startsWith, string.endsWith,
 * string.replace, string.split, string.join
 */
import { z } from "zod";
import { HostError, STRING, formatValue, makeArray } from "@skein/core";
import { defineBuiltin } from "./define.js";
import { arrayArg, indexArg, stringArg } from "./schemas.js";

export const stringLengthFn = defineBuiltin({
  name: "string.length",
  description: "Number of UTF-16 code units in a string.",
  args: z.tuple([stringArg]),
  execute: ([s]) => BigInt(s.length),
});

export const stringUpperFn = defineBuiltin({
  name: "string.upper",
  args: z.tuple([stringArg]),
  execute: ([s]) => s.toUpperCase(),
});

export const stringLowerFn = defineBuiltin({
  name: "string.lower",
  args: z.tuple([stringArg]),
  execute: ([s]) => s.toLowerCase(),
});

export const stringTrimFn = defineBuiltin({
  name: "string.trim",
  args: z.tuple([stringArg]),
  execute: ([s]) => s.trim(),
});

/**
 * string.substring(s, start, end?) -> string
 * `end` defaults to the length; the range must lie within the string.
 */
export const stringSubstringFn = defineBuiltin({
  name: "string.substring",
  args: z.tuple([stringArg, indexArg, indexArg.optional()]),
  execute: ([s, startArg, endArg]) => {
    const start = Number(startArg);
    const end = endArg === undefined ? s.length : Number(endArg);
    if (start > end || end > s.length) {
      throw new HostError(`range ${start}..${end} is out of bounds for length ${s.length}`, { category: "INDEX_ERROR" });
    }
    return s.substring(start, end);
  },
});

export const stringIndexOfFn = defineBuiltin({
  name: "string.indexOf",
  description: "Index of the first occurrence, or -1.",
  args: z.tuple([stringArg, stringArg]),
  execute: ([s, sub]) => BigInt(s.indexOf(sub)),
});

export const stringContainsFn = defineBuiltin({
  name: "string.contains",
  args: z.tuple([stringArg, stringArg]),
  execute: ([s, sub]) => s.includes(sub),
});

export const stringStartsWithFn = defineBuiltin({
  name: "string.startsWith",
  args: z.tuple([stringArg, stringArg]),
  execute: ([s, prefix]) => s.startsWith(prefix),
});

export const stringEndsWithFn = defineBuiltin({
  name: "string.endsWith",
  args: z.tuple([stringArg, stringArg]),
  execute: ([s, suffix]) => s.endsWith(suffix),
});

/**
 * string.replace(s, from, to) -> string
 * Replaces all occurrences of `from` with `to`.
 */
export const stringReplaceFn = defineBuiltin({
  name: "string.replace",
  args: z.tuple([stringArg, stringArg, stringArg]),
  execute: ([s, from, to]) => {
    if (from === "") {
      throw new HostError("'from' must not be empty", { category: "VALIDATION_ERROR" });
    }
    return s.replaceAll(from, to);
  },
});

export const stringSplitFn = defineBuiltin({
  name: "string.split",
  args: z.tuple([stringArg, stringArg]),
  execute: ([s, sep]) => makeArray(s.split(sep), STRING),
});

/**
 * string.join(array, sep) -> string
 * Elements are formatted as `print` would show them.
 */
export const stringJoinFn = defineBuiltin({
  name: "string.join",
  args: z.tuple([arrayArg, stringArg]),
  execute: ([items, sep]) => items.items.map(formatValue).join(sep),
});

export const stringFns = [
  stringLengthFn,
  stringUpperFn,
  stringLowerFn,
  stringTrimFn,
  stringSubstringFn,
  stringIndexOfFn,
  stringContainsFn,
  stringStartsWithFn,
  stringEndsWithFn,
  stringReplaceFn,
  stringSplitFn,
  stringJoinFn,
];
