/**
 * Argument schemas for host object methods.
 *
 * Scripts pass positional arguments; each method names its parameters and a
 * zod schema validates the resulting record.
 */
import { z } from "zod";
import { VMError, isTruthy } from "@uiscript/core";
import type { Value } from "@uiscript/core";
import { parseColor } from "./colors.js";

const NUMERIC = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)\s*$/;

type Scalar = string | number | boolean | null;

function isScalar(v: unknown): v is Scalar {
  return v === null || typeof v === "string" || typeof v === "number" || typeof v === "boolean";
}

export const numberArg = z.preprocess(
  (v) => (typeof v === "string" && NUMERIC.test(v) ? Number(v) : v),
  z.number({ invalid_type_error: "Expected a number" }).finite()
);

export const intArg = numberArg.transform(Math.trunc);

export const textArg = z.preprocess(
  (v) => (typeof v === "number" || typeof v === "boolean" ? String(v) : v),
  z.string({ invalid_type_error: "Expected text" })
);

export const boolArg = z.preprocess(
  (v) => (isScalar(v) ? isTruthy(v) : v),
  z.boolean({ invalid_type_error: "Expected a boolean" })
);

export const nameArg = z
  .string({ invalid_type_error: "Expected a name" })
  .trim()
  .min(1, "Expected a non-empty name");

export const colorArg = z.string({ invalid_type_error: "Expected a colour" }).transform((text, ctx) => {
  const color = parseColor(text);
  if (!color) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown colour '${text}'` });
    return z.NEVER;
  }
  return color;
});

export interface ArgSignature<T extends z.ZodRawShape> {
  names: readonly string[];
  schema: z.ZodObject<T>;
}

/** Parameter names follow the key order of `shape`. */
export function positional<T extends z.ZodRawShape>(shape: T): ArgSignature<T> {
  return { names: Object.keys(shape), schema: z.object(shape) };
}

export const noArgs = positional({});

/**
 * Maps positional `args` onto the signature's names and validates them. Extra
 * arguments are ignored. Failures are E_HOST_ARGS faults naming `label`.
 */
export function parseArgs<T extends z.ZodRawShape>(
  label: string,
  signature: ArgSignature<T>,
  args: readonly Value[]
): z.output<z.ZodObject<T>> {
  const record: Record<string, Value> = {};
  signature.names.forEach((name, i) => {
    if (i < args.length) record[name] = args[i];
  });
  const result = signature.schema.safeParse(record);
  if (!result.success) {
    const msg = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new VMError("E_HOST_ARGS", `Invalid arguments for ${label}: ${msg}`);
  }
  return result.data;
}
