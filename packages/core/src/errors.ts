/**
 * uiscript error types.
 */
import type { Span } from "./ast.js";

export type TraceScalar = string | number | boolean | null;
export type TraceData = { [key: string]: TraceScalar | TraceScalar[] };

export type VMErrorCode =
  | "E_STOPPED"
  | "E_ITERATION_LIMIT"
  | "E_TIME_LIMIT"
  | "E_STACK_OVERFLOW"
  | "E_STACK_UNDERFLOW"
  | "E_VARIABLE_LIMIT"
  | "E_STRING_LIMIT"
  | "E_DIV_ZERO"
  | "E_NOT_CALLABLE"
  | "E_UNKNOWN_FUNCTION"
  | "E_UNKNOWN_METHOD"
  | "E_UNKNOWN_MEMBER"
  | "E_HOST"
  | "E_HOST_ARGS"
  | "E_INVALID_CHUNK"
  | "E_RUNTIME";

/** A runtime fault raised while a chunk executes. */
export class VMError extends Error {
  code: VMErrorCode;
  details?: TraceData;

  constructor(code: VMErrorCode, message: string, details?: TraceData) {
    super(message);
    this.name = "VMError";
    this.code = code;
    this.details = details;
  }
}

/** Compiler contract violation: the AST could not be lowered to bytecode. */
export class CompileError extends Error {
  code = "E_COMPILE";
  span?: Span;

  constructor(message: string, span?: Span) {
    super(message);
    this.name = "CompileError";
    this.span = span;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
