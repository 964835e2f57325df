/**
 * @uiscript/core - block lexer, parser, compiler, VM and session runtime
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export type { Token, TokenKind } from "./tokens.js";
export {
  BlockLexer,
  DEFAULT_SENTINEL,
  containsBlock,
  extractBlocks,
  splitBlocks,
  stripBlocks,
  tokenizeScript,
} from "./lexer.js";
export type { ConsumedRange, SplitResult } from "./lexer.js";
export { parse, parseScript } from "./parser.js";
export type { ParseResult } from "./parser.js";
export { ChunkBuilder, OpCode, disassemble, verifyChunk } from "./bytecode.js";
export type { CompiledChunk, Constant } from "./bytecode.js";
export { compile } from "./compiler.js";
export { compileBlock } from "./pipeline.js";
export type { CompileBlockResult } from "./pipeline.js";
export { VMError, CompileError, errorMessage } from "./errors.js";
export type { VMErrorCode, TraceData, TraceScalar } from "./errors.js";
export { makeEmitter } from "./trace.js";
export type { TraceEvent, TraceEventType, TraceFn, Emitter } from "./trace.js";
export {
  describeValue,
  hostHandle,
  isHandle,
  isTruthy,
  toNumber,
  toText,
  typeName,
  valuesEqual,
} from "./values.js";
export type { HostHandle, Value } from "./values.js";
export { DEFAULT_LIMITS, LIMIT_KEYS, resolveLimits } from "./limits.js";
export type { ResourceLimits } from "./limits.js";
export { VMContext } from "./context.js";
export type { ContextLimits } from "./context.js";
export { IntrinsicRegistry } from "./dispatch.js";
export type { HostFunction, HostGetter, HostMethod, HostObject, HostSetter } from "./dispatch.js";
export { VirtualMachine } from "./vm.js";
export type { VMOptions, VMResult } from "./vm.js";
export { SESSION_ID_KEY, Session, SessionManager } from "./session.js";
export type { BlockOutcome, SessionOptions } from "./session.js";
export {
  DEFAULT_CONFIG,
  PROJECT_CONFIG_FILE,
  loadConfig,
  resolveConfig,
  validateConfigShape,
} from "./config.js";
export type { ResolvedConfig, RuntimeConfig } from "./config.js";
