/**
 * Resource limits enforced by VMContext and the VM.
 */

export interface ResourceLimits {
  /** Distinct script variables per context. */
  maxVariables: number;
  /** Longest string a script may store or build. */
  maxStringLength: number;
  /** Instructions executed per run. */
  maxIterations: number;
  /** Wall-clock budget per run. */
  maxExecutionMs: number;
  /** Operand stack depth. */
  maxStackSize: number;
  /** How many instructions run between wall-clock checks. */
  timeCheckInterval: number;
}

export const DEFAULT_LIMITS: Readonly<ResourceLimits> = Object.freeze({
  maxVariables: 100,
  maxStringLength: 102400,
  maxIterations: 40000,
  maxExecutionMs: 500,
  maxStackSize: 1024,
  timeCheckInterval: 1000,
});

export const LIMIT_KEYS: ReadonlyArray<keyof ResourceLimits> = [
  "maxVariables",
  "maxStringLength",
  "maxIterations",
  "maxExecutionMs",
  "maxStackSize",
  "timeCheckInterval",
];

/** Defaults with every defined override applied. */
export function resolveLimits(overrides?: Partial<ResourceLimits>): ResourceLimits {
  const limits: ResourceLimits = { ...DEFAULT_LIMITS };
  for (const key of LIMIT_KEYS) {
    const value = overrides?.[key];
    if (value !== undefined) limits[key] = value;
  }
  return limits;
}
