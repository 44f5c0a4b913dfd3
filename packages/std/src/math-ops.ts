/**
 * Skein std: math operations
 * math.abs, math.min, math.max, math.floor, math.ceil, math.round, math.sqrt, math.pow
 */
import { z } from "zod";
import { HostError, fitsInt64, wrapInt } from "@skein/core";
import { defineBuiltin } from "./define.js";
import { numberArg } from "./schemas.js";

function toInt(name: string, x: number): bigint {
  if (!Number.isFinite(x)) {
    throw new HostError(`cannot convert ${x} to int`, { category: "MATH_ERROR" });
  }
  const n = BigInt(x);
  if (!fitsInt64(n)) {
    throw new HostError(`${name} result ${n} does not fit in 64 bits`, { category: "MATH_ERROR" });
  }
  return n;
}

/** Ints stay ints; any double operand makes the result a double. */
function pick(values: Array<bigint | number>, better: (a: number, b: number) => boolean): bigint | number {
  let best = values[0];
  for (const v of values.slice(1)) {
    if (better(Number(v), Number(best))) best = v;
  }
  return values.every((v) => typeof v === "bigint") ? best : Number(best);
}

export const mathAbsFn = defineBuiltin({
  name: "math.abs",
  args: z.tuple([numberArg]),
  execute: ([x]) => (typeof x === "bigint" ? wrapInt(x < 0n ? -x : x) : Math.abs(x)),
});

export const mathMinFn = defineBuiltin({
  name: "math.min",
  description: "Smallest of one or more numbers.",
  args: z.tuple([numberArg]).rest(numberArg),
  execute: (values) => pick(values, (a, b) => a < b),
});

export const mathMaxFn = defineBuiltin({
  name: "math.max",
  description: "Largest of one or more numbers.",
  args: z.tuple([numberArg]).rest(numberArg),
  execute: (values) => pick(values, (a, b) => a > b),
});

export const mathFloorFn = defineBuiltin({
  name: "math.floor",
  args: z.tuple([numberArg]),
  execute: ([x]) => (typeof x === "bigint" ? x : toInt("math.floor", Math.floor(x))),
});

export const mathCeilFn = defineBuiltin({
  name: "math.ceil",
  args: z.tuple([numberArg]),
  execute: ([x]) => (typeof x === "bigint" ? x : toInt("math.ceil", Math.ceil(x))),
});

/** Halves round away from zero. */
export const mathRoundFn = defineBuiltin({
  name: "math.round",
  args: z.tuple([numberArg]),
  execute: ([x]) => (typeof x === "bigint" ? x : toInt("math.round", Math.sign(x) * Math.round(Math.abs(x)))),
});

export const mathSqrtFn = defineBuiltin({
  name: "math.sqrt",
  args: z.tuple([numberArg]),
  execute: ([x]) => {
    const n = Number(x);
    if (n < 0) {
      throw new HostError(`cannot take the square root of ${n}`, { category: "MATH_ERROR" });
    }
    return Math.sqrt(n);
  },
});

export const mathPowFn = defineBuiltin({
  name: "math.pow",
  args: z.tuple([numberArg, numberArg]),
  execute: ([base, exponent]) => Math.pow(Number(base), Number(exponent)),
});

export const mathFns = [mathAbsFn, mathMinFn, mathMaxFn, mathFloorFn, mathCeilFn, mathRoundFn, mathSqrtFn, mathPowFn];
