/**
 * uis disasm - print the bytecode of every block
 */
import {
  compileBlock,
  disassemble,
  errorMessage,
  formatDiagnostic,
  formatDiagnostics,
  resolveConfig,
  withFile,
} from "@uiscript/core";
import { readSource, sourceBlocks } from "./source.js";

export interface DisasmOptions {
  script?: boolean;
  pretty?: boolean;
  cwd?: string;
  homeDir?: string;
}

export async function runDisasm(file: string, opts: DisasmOptions): Promise<number> {
  let source: string;
  try {
    source = readSource(file);
  } catch (e) {
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${errorMessage(e)}` }, !!opts.pretty));
    return 4;
  }

  const { config } = resolveConfig(opts.cwd, opts.homeDir);
  let exitCode = 0;
  sourceBlocks(source, !!opts.script, config.sentinel).forEach((tokens, i) => {
    const { chunk, diagnostics } = compileBlock(tokens);
    if (diagnostics.length > 0) {
      console.error(formatDiagnostics(withFile(diagnostics, file), !!opts.pretty));
      exitCode = 2;
    }
    if (!chunk) return;
    const header = `; block ${i + 1}: ${chunk.code.length} bytes, ${chunk.constants.length} constants, ${chunk.names.length} names`;
    console.log([header, ...disassemble(chunk)].join("\n"));
  });
  return exitCode;
}
