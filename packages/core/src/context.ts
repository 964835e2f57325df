/**
 * VMContext - persistent per-session variable store.
 *
 * Script variables are bounded in count and string size. Globals are
 * host-injected bindings that scripts can read but that do not count towards
 * the variable cap. Internal values are host state scripts cannot see.
 */
import { VMError } from "./errors.js";
import { DEFAULT_LIMITS, type ResourceLimits } from "./limits.js";
import type { Value } from "./values.js";

export type ContextLimits = Pick<ResourceLimits, "maxVariables" | "maxStringLength">;

export class VMContext {
  readonly limits: ContextLimits;
  private readonly variables = new Map<string, Value>();
  private readonly globals = new Map<string, Value>();
  private readonly internal = new Map<string, unknown>();

  constructor(limits?: Partial<ContextLimits>) {
    this.limits = {
      maxVariables: limits?.maxVariables ?? DEFAULT_LIMITS.maxVariables,
      maxStringLength: limits?.maxStringLength ?? DEFAULT_LIMITS.maxStringLength,
    };
  }

  /** Checks both caps before writing, so a rejected write changes nothing. */
  setVariable(name: string, value: Value): void {
    if (!this.variables.has(name) && this.variables.size >= this.limits.maxVariables) {
      throw new VMError("E_VARIABLE_LIMIT", `Variable limit exceeded (max ${this.limits.maxVariables}).`, {
        limit: this.limits.maxVariables,
        name,
      });
    }
    this.checkString(value);
    this.variables.set(name, value);
  }

  getVariable(name: string): Value | undefined {
    if (this.variables.has(name)) return this.variables.get(name);
    return this.globals.get(name);
  }

  hasVariable(name: string): boolean {
    return this.variables.has(name) || this.globals.has(name);
  }

  deleteVariable(name: string): boolean {
    return this.variables.delete(name);
  }

  variableNames(): string[] {
    return [...this.variables.keys()];
  }

  get variableCount(): number {
    return this.variables.size;
  }

  clearVariables(): void {
    this.variables.clear();
  }

  setGlobal(name: string, value: Value): void {
    this.globals.set(name, value);
  }

  hasGlobal(name: string): boolean {
    return this.globals.has(name);
  }

  setInternal(name: string, value: unknown): void {
    this.internal.set(name, value);
  }

  getInternal(name: string): unknown {
    return this.internal.get(name);
  }

  deleteInternal(name: string): void {
    this.internal.delete(name);
  }

  checkString(value: Value): void {
    if (typeof value === "string" && value.length > this.limits.maxStringLength) {
      throw new VMError("E_STRING_LIMIT", `String too large (max ${this.limits.maxStringLength} characters).`, {
        limit: this.limits.maxStringLength,
        actual: value.length,
      });
    }
  }
}
