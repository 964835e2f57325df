/**
 * uiscript stdlib: conversions
 */
import { toNumber, toText } from "@uiscript/core";
import type { HostFunction, Value } from "@uiscript/core";

export const toNumberFn: HostFunction = {
  name: "toNumber",
  execute(args): Value {
    if (args.length < 1) return 0;
    return toNumber(args[0]);
  },
};

export const toStringFn: HostFunction = {
  name: "toString",
  execute(args): Value {
    if (args.length < 1) return "";
    return toText(args[0]);
  },
};
