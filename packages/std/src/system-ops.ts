/**
 * Skein std: system.print, system.time, system.sleep
 */
import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import { formatValue } from "@skein/core";
import { defineBuiltin } from "./define.js";
import { indexArg, valueArg } from "./schemas.js";

/** system.print(values...): one output line, values separated by spaces. */
export const systemPrintFn = defineBuiltin({
  name: "system.print",
  args: z.tuple([]).rest(valueArg),
  execute: (values, ctx) => {
    ctx.print(values.map(formatValue).join(" "));
  },
});

/** system.time() -> milliseconds since the epoch */
export const systemTimeFn = defineBuiltin({
  name: "system.time",
  args: z.tuple([]),
  execute: () => BigInt(Date.now()),
});

/**
 * system.sleep(ms): resolves early when the instance is cancelled; the
 * interpreter then stops the unit.
 */
export const systemSleepFn = defineBuiltin({
  name: "system.sleep",
  args: z.tuple([indexArg]),
  execute: async ([ms], ctx) => {
    try {
      await delay(Number(ms), undefined, { signal: ctx.signal });
    } catch (e) {
      if (!ctx.signal.aborted) throw e;
    }
  },
});

export const systemFns = [systemPrintFn, systemTimeFn, systemSleepFn];
