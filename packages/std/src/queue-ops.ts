/**
 * Skein std: queue operations
 * queue.enqueue, queue.dequeue, queue.peek, queue.size, queue.isEmpty, queue.clear
 */
import { z } from "zod";
import { HostError } from "@skein/core";
import { defineBuiltin } from "./define.js";
import { queueArg, valueArg } from "./schemas.js";

export const queueEnqueueFn = defineBuiltin({
  name: "queue.enqueue",
  mutates: 0,
  args: z.tuple([queueArg, valueArg]),
  execute: ([queue, value], ctx) => {
    queue.items.push(ctx.convert(queue.elementType, value));
    return BigInt(queue.items.length);
  },
});

export const queueDequeueFn = defineBuiltin({
  name: "queue.dequeue",
  mutates: 0,
  args: z.tuple([queueArg]),
  execute: ([queue]) => {
    const head = queue.items.shift();
    if (head === undefined) {
      throw new HostError("cannot dequeue from an empty queue", { category: "INDEX_ERROR" });
    }
    return head;
  },
});

/** queue.peek(queue) -> the head, or null when empty */
export const queuePeekFn = defineBuiltin({
  name: "queue.peek",
  args: z.tuple([queueArg]),
  execute: ([queue]) => queue.items[0] ?? null,
});

export const queueSizeFn = defineBuiltin({
  name: "queue.size",
  args: z.tuple([queueArg]),
  execute: ([queue]) => BigInt(queue.items.length),
});

export const queueIsEmptyFn = defineBuiltin({
  name: "queue.isEmpty",
  args: z.tuple([queueArg]),
  execute: ([queue]) => queue.items.length === 0,
});

export const queueClearFn = defineBuiltin({
  name: "queue.clear",
  mutates: 0,
  args: z.tuple([queueArg]),
  execute: ([queue]) => {
    queue.items.length = 0;
  },
});

export const queueFns = [queueEnqueueFn, queueDequeueFn, queuePeekFn, queueSizeFn, queueIsEmptyFn, queueClearFn];
