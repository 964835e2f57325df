/**
 * Reading input files and splitting them into blocks.
 */
import * as fs from "node:fs";
import { extractBlocks, tokenizeScript } from "@uiscript/core";
import type { Token } from "@uiscript/core";

/** Reads `file`, or stdin when it is "-". */
export function readSource(file: string): string {
  return fs.readFileSync(file === "-" ? 0 : file, "utf-8");
}

/** Every block of `source`, or the whole source as one block when `script` is set. */
export function sourceBlocks(source: string, script: boolean, sentinel: string): Token[][] {
  return script ? [tokenizeScript(source)] : extractBlocks(source, sentinel);
}
