/**
 * zod schemas for Skein values passed to builtins.
 */
import { z } from "zod";
import { isArrayValue, isHandleValue, isMapValue, isQueueValue, isValue } from "@skein/core";
import type { ArrayValue, HandleValue, MapValue, QueueValue, Value } from "@skein/core";

export const intArg = z.bigint();
export const doubleArg = z.number();
export const numberArg = z.union([z.bigint(), z.number()], {
  errorMap: () => ({ message: "Expected int or double" }),
});
export const stringArg = z.string();
export const boolArg = z.boolean();

export const valueArg = z.custom<Value>((v) => isValue(v), "Expected a value");
export const arrayArg = z.custom<ArrayValue>((v) => isArrayValue(v), "Expected array");
export const queueArg = z.custom<QueueValue>((v) => isQueueValue(v), "Expected queue");
export const mapArg = z.custom<MapValue>((v) => isMapValue(v), "Expected map");
export const handleArg = z.custom<HandleValue>((v) => isHandleValue(v), "Expected handle");

/** Non-negative int that fits a JS array index. */
export const indexArg = z
  .bigint()
  .refine((n) => n >= 0n && n <= BigInt(Number.MAX_SAFE_INTEGER), "Expected a non-negative int");
