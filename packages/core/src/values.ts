/**
 * uiscript runtime values and coercion rules.
 */

/** Opaque reference to host state; only the dispatch registry resolves it. */
export interface HostHandle {
  readonly kind: "handle";
  readonly type: string;
  readonly id: string;
}

export type Value = number | string | boolean | null | HostHandle;

export function hostHandle(type: string, id: string): HostHandle {
  return Object.freeze({ kind: "handle", type, id });
}

export function isHandle(value: Value): value is HostHandle {
  return typeof value === "object" && value !== null;
}

export function isTruthy(value: Value): boolean {
  if (value === null || value === false) return false;
  if (value === 0) return false;
  if (value === "") return false;
  return true;
}

const DECIMAL = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?\s*$/;

/** Numeric form used by arithmetic and comparison. Unparseable text is 0. */
export function toNumber(value: Value): number {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string") return DECIMAL.test(value) ? Number(value) : 0;
  return 0;
}

/** Text form used by concatenation and `toString`. */
export function toText(value: Value): string {
  if (value === null) return "null";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return value.id;
}

export function isTextual(value: Value): value is string | HostHandle {
  return typeof value === "string" || isHandle(value);
}

/** Strict equality: values of different types are never equal. */
export function valuesEqual(a: Value, b: Value): boolean {
  if (isHandle(a) || isHandle(b)) {
    return isHandle(a) && isHandle(b) && a.type === b.type && a.id === b.id;
  }
  return a === b;
}

export function typeName(value: Value): "number" | "string" | "boolean" | "null" | "handle" {
  if (value === null) return "null";
  if (isHandle(value)) return "handle";
  if (typeof value === "number") return "number";
  if (typeof value === "string") return "string";
  return "boolean";
}

/** Short human-readable form for error messages. */
export function describeValue(value: Value): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (isHandle(value)) return `<${value.type} ${value.id}>`;
  return String(value);
}
