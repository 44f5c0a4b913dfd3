/**
 * defineBuiltin: a builtin whose arguments are checked against a zod tuple.
 */
import type { z } from "zod";
import { HostError } from "@skein/core";
import type { BuiltinDef, BuiltinResult, ExecutionContext } from "@skein/core";

type TupleItems = [z.ZodTypeAny, ...z.ZodTypeAny[]] | [];

export interface BuiltinSpec<Items extends TupleItems, Rest extends z.ZodTypeAny | null> {
  /** Qualified `namespace.function` name. */
  name: string;
  description?: string;
  /** Index of the argument changed in place, checked against VarSet and const rules. */
  mutates?: number;
  args: z.ZodTuple<Items, Rest>;
  execute(args: z.output<z.ZodTuple<Items, Rest>>, ctx: ExecutionContext): BuiltinResult | Promise<BuiltinResult>;
}

function formatIssue(issue: z.ZodIssue): string {
  const [index, ...rest] = issue.path;
  if (typeof index !== "number") return issue.message;
  const where = rest.length > 0 ? `argument ${index + 1}.${rest.join(".")}` : `argument ${index + 1}`;
  return `${where}: ${issue.message}`;
}

/**
 * Wrap `spec.execute` with argument validation. Missing trailing arguments are
 * passed as undefined, so `.optional()` items may be omitted by the script.
 * Invalid arguments throw a HostError with category VALIDATION_ERROR.
 */
export function defineBuiltin<Items extends TupleItems, Rest extends z.ZodTypeAny | null = null>(
  spec: BuiltinSpec<Items, Rest>
): BuiltinDef {
  const arity = spec.args.items.length;
  return {
    name: spec.name,
    description: spec.description,
    mutates: spec.mutates,
    execute(args, ctx) {
      const padded: unknown[] =
        args.length < arity ? [...args, ...Array.from({ length: arity - args.length }, () => undefined)] : args;
      const parsed = spec.args.safeParse(padded);
      if (!parsed.success) {
        throw new HostError(`invalid arguments: ${parsed.error.issues.map(formatIssue).join("; ")}`, {
          category: "VALIDATION_ERROR",
        });
      }
      return spec.execute(parsed.data, ctx);
    },
  };
}
