/**
 * Skein std: vars.get, vars.set
 * Named access to `container.varSet.var[.field...]` through the execution
 * context. Writes obey VarSet scope rules as script-side writes.
 */
import { z } from "zod";
import { defineBuiltin } from "./define.js";
import { stringArg, valueArg } from "./schemas.js";

export const varsGetFn = defineBuiltin({
  name: "vars.get",
  args: z.tuple([stringArg]),
  execute: ([path], ctx) => ctx.getVar(path),
});

export const varsSetFn = defineBuiltin({
  name: "vars.set",
  args: z.tuple([stringArg, valueArg]),
  execute: ([path, value], ctx) => {
    ctx.setVar(path, value);
  },
});

export const varsFns = [varsGetFn, varsSetFn];
