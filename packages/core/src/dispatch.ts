/**
 * uiscript host-call dispatch registry.
 *
 * The registry is built once by the host, frozen, and passed into every VM.
 * Names are matched case-insensitively. Objects are addressed by handle, or
 * by their registered name as a plain string (what an unbound identifier
 * such as `canvas` evaluates to).
 */
import type { VMContext } from "./context.js";
import { VMError, errorMessage } from "./errors.js";
import { hostHandle, isHandle, toText, type HostHandle, type Value } from "./values.js";

export interface HostFunction {
  name: string;
  execute(args: readonly Value[], context: VMContext): Value;
}

export type HostMethod = (target: HostHandle, args: readonly Value[], context: VMContext) => Value;
export type HostGetter = (target: HostHandle, context: VMContext) => Value;
export type HostSetter = (target: HostHandle, value: Value, context: VMContext) => void;

export interface HostObject {
  name: string;
  /** Install a global handle under `name` (default true). Instance types opt out. */
  global?: boolean;
  methods?: Record<string, HostMethod>;
  getters?: Record<string, HostGetter>;
  setters?: Record<string, HostSetter>;
}

interface ObjectEntry {
  name: string;
  global: boolean;
  methods: Map<string, HostMethod>;
  getters: Map<string, HostGetter>;
  setters: Map<string, HostSetter>;
}

function lowerKeys<T>(record: Record<string, T> | undefined): Map<string, T> {
  return new Map(Object.entries(record ?? {}).map(([k, v]): [string, T] => [k.toLowerCase(), v]));
}

export class IntrinsicRegistry {
  private readonly functions = new Map<string, HostFunction>();
  private readonly objects = new Map<string, ObjectEntry>();
  private frozen = false;

  registerFunction(fn: HostFunction): this {
    this.assertMutable();
    this.functions.set(fn.name.toLowerCase(), fn);
    return this;
  }

  registerObject(obj: HostObject): this {
    this.assertMutable();
    this.objects.set(obj.name.toLowerCase(), {
      name: obj.name,
      global: obj.global ?? true,
      methods: lowerKeys(obj.methods),
      getters: lowerKeys(obj.getters),
      setters: lowerKeys(obj.setters),
    });
    return this;
  }

  /** Makes the registry read-only. Further registration throws. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  hasFunction(name: string): boolean {
    return this.functions.has(name.toLowerCase());
  }

  hasObject(name: string): boolean {
    return this.objects.has(name.toLowerCase());
  }

  functionNames(): string[] {
    return [...this.functions.values()].map((fn) => fn.name);
  }

  objectNames(): string[] {
    return [...this.objects.values()].map((obj) => obj.name);
  }

  /** Binds a handle for every global object so scripts can name it directly. */
  installGlobals(context: VMContext): void {
    for (const obj of this.objects.values()) {
      if (obj.global) context.setGlobal(obj.name, hostHandle(obj.name, obj.name));
    }
  }

  callFunction(name: string, args: readonly Value[], context: VMContext): Value {
    const fn = this.functions.get(name.toLowerCase());
    if (!fn) {
      throw new VMError("E_UNKNOWN_FUNCTION", `Unknown function: ${name}`, { name });
    }
    return invokeHost(`Function '${fn.name}'`, () => fn.execute(args, context));
  }

  callMethod(target: Value, name: string, args: readonly Value[], context: VMContext): Value {
    const resolved = this.resolve(target);
    const method = resolved?.entry.methods.get(name.toLowerCase());
    if (!resolved || !method) {
      throw new VMError("E_UNKNOWN_METHOD", `Unknown method: ${targetLabel(target, resolved?.entry)}.${name}`, {
        name,
      });
    }
    return invokeHost(`Method '${resolved.entry.name}.${name}'`, () => method(resolved.handle, args, context));
  }

  /** A getter's value, or `Object.method` as a reference string when `name` is a method. */
  getMember(target: Value, name: string, context: VMContext): Value {
    const resolved = this.resolve(target);
    if (resolved) {
      const key = name.toLowerCase();
      const getter = resolved.entry.getters.get(key);
      if (getter) {
        return invokeHost(`Getter '${resolved.entry.name}.${name}'`, () => getter(resolved.handle, context));
      }
      if (resolved.entry.methods.has(key)) {
        return `${resolved.entry.name}.${name}`;
      }
    }
    throw new VMError("E_UNKNOWN_MEMBER", `Unknown member: ${targetLabel(target, resolved?.entry)}.${name}`, {
      name,
    });
  }

  setMember(target: Value, name: string, value: Value, context: VMContext): void {
    const resolved = this.resolve(target);
    const setter = resolved?.entry.setters.get(name.toLowerCase());
    if (!resolved || !setter) {
      throw new VMError("E_UNKNOWN_MEMBER", `Cannot set member: ${targetLabel(target, resolved?.entry)}.${name}`, {
        name,
      });
    }
    invokeHost(`Setter '${resolved.entry.name}.${name}'`, () => {
      setter(resolved.handle, value, context);
      return null;
    });
  }

  private resolve(target: Value): { entry: ObjectEntry; handle: HostHandle } | null {
    if (isHandle(target)) {
      const entry = this.objects.get(target.type.toLowerCase());
      return entry ? { entry, handle: target } : null;
    }
    if (typeof target === "string") {
      const entry = this.objects.get(target.toLowerCase());
      return entry ? { entry, handle: hostHandle(entry.name, entry.name) } : null;
    }
    return null;
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new Error("Intrinsic registry is frozen; register host calls before the first run.");
    }
  }
}

function targetLabel(target: Value, entry: ObjectEntry | undefined): string {
  return entry ? entry.name : toText(target);
}

/** Runs host code; plain errors become E_HOST faults naming the callee. */
function invokeHost(label: string, fn: () => Value): Value {
  try {
    return fn();
  } catch (e) {
    if (e instanceof VMError) throw e;
    throw new VMError("E_HOST", `${label} failed: ${errorMessage(e)}`);
  }
}
