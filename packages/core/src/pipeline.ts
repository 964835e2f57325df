/**
 * Token list to runnable chunk: parse, then compile.
 */
import type { CompiledChunk } from "./bytecode.js";
import { compile } from "./compiler.js";
import { makeDiag, type Diagnostic } from "./diagnostics.js";
import { CompileError } from "./errors.js";
import { parse } from "./parser.js";
import type { Token } from "./tokens.js";

export interface CompileBlockResult {
  /** Null when the block could not be compiled at all. */
  chunk: CompiledChunk | null;
  /** Parse diagnostics for statements that were skipped, plus any compile error. */
  diagnostics: Diagnostic[];
}

export function compileBlock(tokens: readonly Token[]): CompileBlockResult {
  const { program, diagnostics } = parse(tokens);
  try {
    return { chunk: compile(program), diagnostics };
  } catch (e) {
    if (!(e instanceof CompileError)) throw e;
    return {
      chunk: null,
      diagnostics: [...diagnostics, makeDiag(e.code, e.message, e.span, "The block was not run.")],
    };
  }
}
