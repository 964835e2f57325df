/**
 * uis check - compile every block without running it
 */
import { compileBlock, errorMessage, formatDiagnostic, formatDiagnostics, resolveConfig, withFile } from "@uiscript/core";
import type { Diagnostic } from "@uiscript/core";
import { readSource, sourceBlocks } from "./source.js";

export interface CheckOptions {
  pretty?: boolean;
  script?: boolean;
  cwd?: string;
  homeDir?: string;
}

export async function runCheck(file: string, opts: CheckOptions): Promise<number> {
  let source: string;
  try {
    source = readSource(file);
  } catch (e) {
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${errorMessage(e)}` }, !!opts.pretty));
    return 4;
  }

  const { config } = resolveConfig(opts.cwd, opts.homeDir);
  const blocks = sourceBlocks(source, !!opts.script, config.sentinel);
  const diagnostics: Diagnostic[] = [];
  for (const tokens of blocks) {
    diagnostics.push(...compileBlock(tokens).diagnostics);
  }

  if (diagnostics.length > 0) {
    console.error(formatDiagnostics(withFile(diagnostics, file), !!opts.pretty));
    return 2;
  }

  if (opts.pretty) {
    console.log(`No errors found in ${blocks.length} block(s).`);
  } else {
    console.log(JSON.stringify({ ok: true, blocks: blocks.length }));
  }
  return 0;
}
