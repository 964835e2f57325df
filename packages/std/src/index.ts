/**
 * @uiscript/std - uiscript standard library
 */
import type { HostFunction, IntrinsicRegistry } from "@uiscript/core";
import { hasInContextFn, makePrintFn, typeofFn } from "./context-ops.js";
import type { PrintSink } from "./context-ops.js";
import { toNumberFn, toStringFn } from "./convert-ops.js";
import {
  absFn,
  ceilFn,
  cosFn,
  floorFn,
  makeRandomFns,
  maxFn,
  minFn,
  roundFn,
  sinFn,
} from "./math-ops.js";
import type { RandomSource } from "./math-ops.js";

export { hasInContextFn, makePrintFn, typeofFn } from "./context-ops.js";
export type { PrintSink } from "./context-ops.js";
export { toNumberFn, toStringFn } from "./convert-ops.js";
export {
  absFn,
  ceilFn,
  cosFn,
  floorFn,
  makeRandomFns,
  maxFn,
  minFn,
  roundFn,
  roundHalfEven,
  sinFn,
} from "./math-ops.js";
export type { RandomSource } from "./math-ops.js";

export interface StdlibOptions {
  /** Receives each `print` line. Output is discarded when absent. */
  print?: PrintSink;
  random?: RandomSource;
}

/**
 * Get all stdlib functions as a Map keyed by name.
 */
export function getStdlibFns(options: StdlibOptions = {}): Map<string, HostFunction> {
  const fns = new Map<string, HostFunction>();
  for (const fn of [
    hasInContextFn, makePrintFn(options.print), typeofFn,
    toNumberFn, toStringFn,
    floorFn, ceilFn, roundFn, absFn, minFn, maxFn, sinFn, cosFn,
    ...makeRandomFns(options.random),
  ]) {
    fns.set(fn.name, fn);
  }
  return fns;
}

export function registerStdlib(registry: IntrinsicRegistry, options: StdlibOptions = {}): IntrinsicRegistry {
  for (const fn of getStdlibFns(options).values()) registry.registerFunction(fn);
  return registry;
}
