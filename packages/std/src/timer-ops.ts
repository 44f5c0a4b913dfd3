/**
 * Skein std: timer.start, timer.stop
 *
 * Timers fire outside any execution unit and re-enter the instance through
 * `ctx.submitCallback`, so a firing never interleaves with running script
 * code. Every timer of an instance is cleared when its signal aborts.
 */
import { z } from "zod";
import { HostError, makeHandle } from "@skein/core";
import type { ExecutionContext } from "@skein/core";
import { defineBuiltin } from "./define.js";
import { boolArg, handleArg, indexArg, stringArg } from "./schemas.js";

export const TIMER_TAG = "timer";

interface TimerInfo {
  fn: string;
  ms: number;
  repeat: boolean;
}

// Active timers per instance, keyed by handle id.
const active = new WeakMap<object, Map<number, NodeJS.Timeout>>();

function timersOf(ctx: ExecutionContext): Map<number, NodeJS.Timeout> {
  let timers = active.get(ctx.instanceKey);
  if (!timers) {
    const created = new Map<number, NodeJS.Timeout>();
    ctx.signal.addEventListener(
      "abort",
      () => {
        for (const timer of created.values()) clearTimeout(timer);
        created.clear();
      },
      { once: true }
    );
    active.set(ctx.instanceKey, created);
    timers = created;
  }
  return timers;
}

/** Number of timers still scheduled for the instance. */
export function activeTimerCount(instanceKey: object): number {
  return active.get(instanceKey)?.size ?? 0;
}

/**
 * timer.start(ms, functionName, repeat?) -> handle
 * Calls the script function `functionName` with the handle after `ms`
 * milliseconds, and every `ms` milliseconds when `repeat` is true.
 */
export const timerStartFn = defineBuiltin({
  name: "timer.start",
  args: z.tuple([indexArg, stringArg, boolArg.optional()]),
  execute: ([msArg, fn, repeatArg], ctx) => {
    if (ctx.signal.aborted) {
      throw new HostError("instance is stopped", { category: "HOST_ERROR" });
    }
    const info: TimerInfo = { fn, ms: Number(msArg), repeat: repeatArg ?? false };
    const handle = makeHandle(TIMER_TAG, info);
    const timers = timersOf(ctx);

    const fire = (): void => {
      if (!info.repeat) timers.delete(handle.id);
      ctx.submitCallback(fn, [handle]).catch((e: unknown) => {
        if (ctx.signal.aborted) return;
        const msg = e instanceof Error ? e.message : String(e);
        ctx.print(`timer ${handle.id} (${fn}) failed: ${msg}`);
      });
    };
    timers.set(handle.id, info.repeat ? setInterval(fire, info.ms) : setTimeout(fire, info.ms));
    return handle;
  },
});

/** timer.stop(handle) -> whether the timer was still scheduled */
export const timerStopFn = defineBuiltin({
  name: "timer.stop",
  args: z.tuple([handleArg]),
  execute: ([handle], ctx) => {
    if (handle.tag !== TIMER_TAG) {
      throw new HostError(`expected a timer handle, got '${handle.tag}'`, { category: "VALIDATION_ERROR" });
    }
    const timers = active.get(ctx.instanceKey);
    const timer = timers?.get(handle.id);
    if (timers === undefined || timer === undefined) return false;
    clearTimeout(timer);
    timers.delete(handle.id);
    return true;
  },
});

export const timerFns = [timerStartFn, timerStopFn];
