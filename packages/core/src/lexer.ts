/**
 * uiscript block lexer.
 *
 * Finds script blocks embedded in arbitrary text. A block starts at the
 * sentinel (`#UI{` by default) and ends at the brace that balances the
 * sentinel's own opening brace. Braces inside strings and comments are never
 * counted. Only the block's own text is handed to the Chevrotain lexer.
 */
import { ScriptLexer, kindOf, makeToken, scanString, skipTrivia, textOf } from "./tokens.js";
import type { Token } from "./tokens.js";

export const DEFAULT_SENTINEL = "#UI{";

export interface ConsumedRange {
  /** Offset of the sentinel. */
  start: number;
  /** Offset just past the closing brace (or the end of input). */
  end: number;
}

interface Position {
  line: number;
  column: number;
}

function computeLineStarts(input: string): number[] {
  const starts = [0];
  for (let i = 0; i < input.length; i++) {
    if (input[i] === "\n") starts.push(i + 1);
  }
  return starts;
}

class PositionIndex {
  private readonly lineStarts: number[];

  constructor(input: string) {
    this.lineStarts = computeLineStarts(input);
  }

  locate(offset: number): Position {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, column: offset - this.lineStarts[lo] + 1 };
  }
}

interface ScanResult {
  tokens: Token[];
  end: number;
}

/**
 * Offset of the brace that closes depth 1, or the end of input. Strings and
 * comments are skipped whole, as the token lexer would consume them.
 */
function closingBrace(input: string, from: number): number {
  let depth = 1;
  let i = skipTrivia(input, from);
  while (i < input.length) {
    const ch = input[i];
    if (ch === '"' || ch === "'") {
      const scanned = scanString(input, i);
      if (!scanned) return input.length;
      i = scanned.end;
    } else {
      if (ch === "{") depth++;
      else if (ch === "}" && --depth === 0) return i;
      i++;
    }
    i = skipTrivia(input, i);
  }
  return input.length;
}

/**
 * Tokenizes `input` from `from` until the brace that closes depth 1, the
 * first error token, or the end of input. The closing brace is consumed but
 * not emitted. Always terminates the list with EOF.
 */
function scanBody(input: string, from: number, positions: PositionIndex): ScanResult {
  const close = closingBrace(input, from);
  const lexed = ScriptLexer.tokenize(input.slice(from, close));
  const tokens: Token[] = [];
  let end = close < input.length ? close + 1 : close;

  for (const tok of lexed.tokens) {
    const offset = from + tok.startOffset;
    const pos = positions.locate(offset);
    const kind = kindOf(tok.tokenType);
    tokens.push(makeToken(kind, textOf(tok), pos.line, pos.column));
    if (kind === "Error") {
      end = offset + tok.image.length;
      break;
    }
  }

  const eof = positions.locate(end);
  tokens.push(makeToken("EOF", "", eof.line, eof.column));
  return { tokens, end };
}

export class BlockLexer {
  private cursor = 0;
  private lastRange: ConsumedRange | null = null;
  private readonly positions: PositionIndex;

  constructor(
    private readonly input: string,
    private readonly sentinel: string = DEFAULT_SENTINEL
  ) {
    if (!sentinel.endsWith("{")) {
      throw new Error(`Block sentinel must end with '{', got '${sentinel}'.`);
    }
    this.positions = new PositionIndex(input);
  }

  /**
   * Extracts the next block as a token list starting with a BlockStart token
   * for the sentinel. Returns null once no sentinel remains.
   */
  nextBlock(): Token[] | null {
    const start = this.input.indexOf(this.sentinel, this.cursor);
    if (start === -1) {
      this.cursor = this.input.length;
      return null;
    }

    const origin = this.positions.locate(start);
    const body = scanBody(this.input, start + this.sentinel.length, this.positions);
    this.cursor = body.end;
    this.lastRange = { start, end: body.end };
    return [makeToken("BlockStart", this.sentinel, origin.line, origin.column), ...body.tokens];
  }

  /** Source range of the block most recently returned by nextBlock(). */
  consumedRange(): ConsumedRange | null {
    return this.lastRange;
  }
}

export function containsBlock(input: string, sentinel: string = DEFAULT_SENTINEL): boolean {
  return input.includes(sentinel);
}

export interface SplitResult {
  /** The input with every block removed, trimmed. */
  text: string;
  blocks: Token[][];
}

/** Extracts every block and the surrounding text in one pass. */
export function splitBlocks(input: string, sentinel: string = DEFAULT_SENTINEL): SplitResult {
  const lexer = new BlockLexer(input, sentinel);
  const blocks: Token[][] = [];
  let text = "";
  let last = 0;
  for (let block = lexer.nextBlock(); block !== null; block = lexer.nextBlock()) {
    const range = lexer.consumedRange();
    if (!range) break;
    blocks.push(block);
    text += input.slice(last, range.start);
    last = range.end;
  }
  return { text: (text + input.slice(last)).trim(), blocks };
}

export function extractBlocks(input: string, sentinel: string = DEFAULT_SENTINEL): Token[][] {
  return splitBlocks(input, sentinel).blocks;
}

/** Removes every block from the text, leaving the surrounding text trimmed. */
export function stripBlocks(input: string, sentinel: string = DEFAULT_SENTINEL): string {
  return splitBlocks(input, sentinel).text;
}

/**
 * Tokenizes bare script text (no sentinel). An unmatched `}` ends the script
 * the same way it ends a block.
 */
export function tokenizeScript(source: string): Token[] {
  return scanBody(source, 0, new PositionIndex(source)).tokens;
}
