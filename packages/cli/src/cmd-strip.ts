/**
 * uis strip - print a file with its blocks removed
 */
import { errorMessage, formatDiagnostic, resolveConfig, stripBlocks } from "@uiscript/core";
import { readSource } from "./source.js";

export async function runStrip(file: string, opts: { cwd?: string; homeDir?: string } = {}): Promise<number> {
  let source: string;
  try {
    source = readSource(file);
  } catch (e) {
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${errorMessage(e)}` }, false));
    return 4;
  }
  const { config } = resolveConfig(opts.cwd, opts.homeDir);
  console.log(stripBlocks(source, config.sentinel));
  return 0;
}
