/**
 * Skein std: map operations
 * map.put, map.get, map.has, map.remove, map.keys, map.size
 */
import { z } from "zod";
import { HostError, isMapKey, makeArray, typeNameOf } from "@skein/core";
import type { ExecutionContext, MapKey, MapValue, Value } from "@skein/core";
import { defineBuiltin } from "./define.js";
import { mapArg, valueArg } from "./schemas.js";

function keyOf(map: MapValue, key: Value, ctx: ExecutionContext): MapKey {
  const converted = ctx.convert(map.keyType, key);
  if (!isMapKey(converted)) {
    throw new HostError(`map key must be scalar, got ${typeNameOf(converted)}`, { category: "TYPE_ERROR" });
  }
  return converted;
}

export const mapPutFn = defineBuiltin({
  name: "map.put",
  mutates: 0,
  args: z.tuple([mapArg, valueArg, valueArg]),
  execute: ([map, key, value], ctx) => {
    map.entries.set(keyOf(map, key, ctx), ctx.convert(map.valueType, value));
  },
});

/** map.get(map, key) -> the value, or null when absent */
export const mapGetFn = defineBuiltin({
  name: "map.get",
  args: z.tuple([mapArg, valueArg]),
  execute: ([map, key], ctx) => map.entries.get(keyOf(map, key, ctx)) ?? null,
});

export const mapHasFn = defineBuiltin({
  name: "map.has",
  args: z.tuple([mapArg, valueArg]),
  execute: ([map, key], ctx) => map.entries.has(keyOf(map, key, ctx)),
});

/** map.remove(map, key) -> whether the key was present */
export const mapRemoveFn = defineBuiltin({
  name: "map.remove",
  mutates: 0,
  args: z.tuple([mapArg, valueArg]),
  execute: ([map, key], ctx) => map.entries.delete(keyOf(map, key, ctx)),
});

/** map.keys(map) -> keys in insertion order */
export const mapKeysFn = defineBuiltin({
  name: "map.keys",
  args: z.tuple([mapArg]),
  execute: ([map]) => makeArray([...map.entries.keys()], map.keyType),
});

export const mapSizeFn = defineBuiltin({
  name: "map.size",
  args: z.tuple([mapArg]),
  execute: ([map]) => BigInt(map.entries.size),
});

export const mapFns = [mapPutFn, mapGetFn, mapHasFn, mapRemoveFn, mapKeysFn, mapSizeFn];
