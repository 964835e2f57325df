/**
 * uiscript stdlib: context and introspection
 * hasInContext, print, typeof
 */
import { toText, typeName } from "@uiscript/core";
import type { HostFunction, Value } from "@uiscript/core";

export type PrintSink = (text: string) => void;

/**
 * hasInContext(name) -> boolean
 * True when `name` is bound as a variable or host global.
 */
export const hasInContextFn: HostFunction = {
  name: "hasInContext",
  execute(args, context): Value {
    if (args.length < 1) return false;
    return context.hasVariable(toText(args[0]));
  },
};

/**
 * print(...values) -> null
 * Joins the arguments with spaces and hands the line to `sink`.
 */
export function makePrintFn(sink?: PrintSink): HostFunction {
  return {
    name: "print",
    execute(args): Value {
      sink?.(args.map(toText).join(" "));
      return null;
    },
  };
}

/**
 * typeof(x) -> "number" | "string" | "boolean" | "null" | "handle"
 */
export const typeofFn: HostFunction = {
  name: "typeof",
  execute(args): Value {
    if (args.length < 1) return "null";
    return typeName(args[0]);
  },
};
