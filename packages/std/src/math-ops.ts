/**
 * uiscript stdlib: math operations
 * floor, ceil, round, abs, min, max, sin, cos, random, randomRange
 *
 * Missing arguments yield 0. Non-numeric arguments are coerced the same way
 * arithmetic coerces them.
 */
import { toNumber } from "@uiscript/core";
import type { HostFunction, Value } from "@uiscript/core";

export type RandomSource = () => number;

function unary(name: string, fn: (x: number) => number): HostFunction {
  return {
    name,
    execute(args): Value {
      if (args.length < 1) return 0;
      return fn(toNumber(args[0]));
    },
  };
}

function binary(name: string, fn: (a: number, b: number) => number): HostFunction {
  return {
    name,
    execute(args): Value {
      if (args.length < 2) return 0;
      return fn(toNumber(args[0]), toNumber(args[1]));
    },
  };
}

/** Rounds to the nearest integer; halves go to the even neighbour. */
export function roundHalfEven(x: number): number {
  const rounded = Math.round(x);
  if (Math.abs(x % 1) === 0.5 && rounded % 2 !== 0) return rounded - 1;
  return rounded;
}

export const floorFn = unary("floor", Math.floor);
export const ceilFn = unary("ceil", Math.ceil);
export const roundFn = unary("round", roundHalfEven);
export const absFn = unary("abs", Math.abs);
export const sinFn = unary("sin", Math.sin);
export const cosFn = unary("cos", Math.cos);
export const minFn = binary("min", Math.min);
export const maxFn = binary("max", Math.max);

/**
 * random() -> number in [0, 1)
 * randomRange(a, b) -> number between a and b
 */
export function makeRandomFns(random: RandomSource = Math.random): HostFunction[] {
  return [
    {
      name: "random",
      execute: (): Value => random(),
    },
    {
      name: "randomRange",
      execute(args): Value {
        if (args.length < 2) return 0;
        const lo = toNumber(args[0]);
        const hi = toNumber(args[1]);
        return lo + random() * (hi - lo);
      },
    },
  ];
}
