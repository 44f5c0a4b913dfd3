/**
 * Skein std: json.parse, json.stringify
 */
import { z } from "zod";
import { HostError, fromJson, toJson } from "@skein/core";
import { defineBuiltin } from "./define.js";
import { stringArg, valueArg } from "./schemas.js";

/**
 * json.parse(text) -> value
 * Objects become records, arrays dynamic arrays, integral numbers ints.
 */
export const jsonParseFn = defineBuiltin({
  name: "json.parse",
  args: z.tuple([stringArg]),
  execute: ([text]) => {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new HostError(msg, { category: "PARSE_ERROR", cause: e });
    }
    return fromJson(data);
  },
});

export const jsonStringifyFn = defineBuiltin({
  name: "json.stringify",
  args: z.tuple([valueArg]),
  execute: ([value]) => JSON.stringify(toJson(value)),
});

export const jsonFns = [jsonParseFn, jsonStringifyFn];
