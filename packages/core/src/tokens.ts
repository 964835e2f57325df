/**
 * uiscript token vocabulary (Chevrotain token types) and the public Token model.
 */
import { createToken, Lexer, type IToken, type TokenType } from "chevrotain";

export type TokenKind =
  | "BlockStart"
  | "BlockEnd"
  | "Number"
  | "String"
  | "Identifier"
  | "Var"
  | "If"
  | "Then"
  | "Else"
  | "ElseIf"
  | "EndIf"
  | "While"
  | "Do"
  | "EndWhile"
  | "Return"
  | "And"
  | "Or"
  | "Not"
  | "True"
  | "False"
  | "Null"
  | "Plus"
  | "Minus"
  | "Star"
  | "Slash"
  | "Percent"
  | "Equals"
  | "EqualsEquals"
  | "NotEquals"
  | "Less"
  | "Greater"
  | "LessEquals"
  | "GreaterEquals"
  | "LParen"
  | "RParen"
  | "Comma"
  | "Semicolon"
  | "Dot"
  | "EOF"
  | "Error";

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly line: number;
  readonly column: number;
}

export function makeToken(kind: TokenKind, text: string, line: number, column: number): Token {
  return Object.freeze({ kind, text, line, column });
}

// ---------------------------------------------------------------------------
// Trivia
// ---------------------------------------------------------------------------

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

function isSpace(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch);
}

/** Index of the first character after any whitespace and comments. */
export function skipTrivia(text: string, offset: number): number {
  let i = offset;
  for (;;) {
    while (isSpace(text[i])) i++;
    if (text.startsWith("//", i)) {
      const nl = text.indexOf("\n", i);
      i = nl === -1 ? text.length : nl;
      continue;
    }
    if (text.startsWith("/*", i)) {
      const close = text.indexOf("*/", i + 2);
      i = close === -1 ? text.length : close + 2;
      continue;
    }
    return i;
  }
}

// ---------------------------------------------------------------------------
// Custom matchers
// ---------------------------------------------------------------------------

/**
 * Two-word keyword matcher. Reads the first word, skips trivia, and only
 * matches when the next identifier completes the pair.
 */
function compoundKeyword(first: string, second: string) {
  return (text: string, offset: number): [string] | null => {
    const firstEnd = offset + first.length;
    if (text.slice(offset, firstEnd).toLowerCase() !== first || isWordChar(text[firstEnd])) {
      return null;
    }
    const next = skipTrivia(text, firstEnd);
    const secondEnd = next + second.length;
    if (text.slice(next, secondEnd).toLowerCase() !== second || isWordChar(text[secondEnd])) {
      return null;
    }
    return [text.slice(offset, secondEnd)];
  };
}

export interface ScannedString {
  /** Offset just past the closing quote. */
  end: number;
  value: string;
}

const ESCAPES: Record<string, string> = { n: "\n", r: "\r", t: "\t" };

/**
 * Scans a quoted string starting at `offset`. Handles backslash escapes and
 * doubled quotes. Returns null when the string is not terminated.
 */
export function scanString(text: string, offset: number): ScannedString | null {
  const quote = text[offset];
  if (quote !== '"' && quote !== "'") return null;
  let value = "";
  let i = offset + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\\") {
      const esc = text[i + 1];
      if (esc === undefined) return null;
      value += ESCAPES[esc] ?? esc;
      i += 2;
      continue;
    }
    if (ch === quote) {
      if (text[i + 1] === quote) {
        value += quote;
        i += 2;
        continue;
      }
      return { end: i + 1, value };
    }
    value += ch;
    i++;
  }
  return null;
}

function matchString(text: string, offset: number): [string] | null {
  const scanned = scanString(text, offset);
  return scanned ? [text.slice(offset, scanned.end)] : null;
}

function matchUnterminatedString(text: string, offset: number): [string] | null {
  const quote = text[offset];
  if (quote !== '"' && quote !== "'") return null;
  return [text.slice(offset)];
}

const NUMBER_BODY = /\d+(?:\.\d+)?/y;

/**
 * A sign is folded into a number only where an operand is expected, so
 * `a -1` stays a subtraction while `x = -1` is a negative literal.
 */
function signAllowed(previous: IToken | undefined): boolean {
  if (!previous) return true;
  return !OPERAND_END_NAMES.has(previous.tokenType.name);
}

function matchNumber(text: string, offset: number, tokens: IToken[]): [string] | null {
  let start = offset;
  const ch = text[offset];
  if (ch === "-" || ch === "+") {
    if (!signAllowed(tokens[tokens.length - 1])) return null;
    start++;
  }
  NUMBER_BODY.lastIndex = start;
  const m = NUMBER_BODY.exec(text);
  if (!m) return null;
  return [text.slice(offset, start + m[0].length)];
}

// ---------------------------------------------------------------------------
// Token types
// ---------------------------------------------------------------------------

export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /\s+/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});
export const LineComment = createToken({
  name: "LineComment",
  pattern: /\/\/[^\n]*/,
  group: Lexer.SKIPPED,
});
export const BlockComment = createToken({
  name: "BlockComment",
  pattern: /\/\*(?:[\s\S]*?\*\/|[\s\S]*)/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});

export const Identifier = createToken({ name: "Identifier", pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

// Compound keywords (before their single-word prefixes)
export const EndIf = createToken({
  name: "EndIf",
  pattern: { exec: compoundKeyword("end", "if") },
  line_breaks: true,
  start_chars_hint: ["e", "E"],
});
export const EndWhile = createToken({
  name: "EndWhile",
  pattern: { exec: compoundKeyword("end", "while") },
  line_breaks: true,
  start_chars_hint: ["e", "E"],
});
export const ElseIf = createToken({
  name: "ElseIf",
  pattern: { exec: compoundKeyword("else", "if") },
  line_breaks: true,
  start_chars_hint: ["e", "E"],
});

// Keywords (case-insensitive)
export const Var = createToken({ name: "Var", pattern: /var/i, longer_alt: Identifier });
export const If = createToken({ name: "If", pattern: /if/i, longer_alt: Identifier });
export const Then = createToken({ name: "Then", pattern: /then/i, longer_alt: Identifier });
export const Else = createToken({ name: "Else", pattern: /else/i, longer_alt: Identifier });
export const While = createToken({ name: "While", pattern: /while/i, longer_alt: Identifier });
export const Do = createToken({ name: "Do", pattern: /do/i, longer_alt: Identifier });
export const Return = createToken({ name: "Return", pattern: /return/i, longer_alt: Identifier });
export const True = createToken({ name: "True", pattern: /true/i, longer_alt: Identifier });
export const False = createToken({ name: "False", pattern: /false/i, longer_alt: Identifier });
export const Null = createToken({ name: "Null", pattern: /null/i, longer_alt: Identifier });

// Operator categories
export const EqualityOperator = createToken({ name: "EqualityOperator", pattern: Lexer.NA });
export const RelationalOperator = createToken({ name: "RelationalOperator", pattern: Lexer.NA });
export const AdditiveOperator = createToken({ name: "AdditiveOperator", pattern: Lexer.NA });
export const MultiplicativeOperator = createToken({ name: "MultiplicativeOperator", pattern: Lexer.NA });
export const UnaryOperator = createToken({ name: "UnaryOperator", pattern: Lexer.NA });

// Logical operators: word and symbol spellings
export const And = createToken({ name: "And", pattern: /and|&&/i, longer_alt: Identifier });
export const Or = createToken({ name: "Or", pattern: /or|\|\|/i, longer_alt: Identifier });
export const NotEquals = createToken({
  name: "NotEquals",
  pattern: /!=/,
  categories: EqualityOperator,
});
export const Not = createToken({
  name: "Not",
  pattern: /not|!/i,
  longer_alt: Identifier,
  categories: UnaryOperator,
});

// Literals
export const NumberLit = createToken({
  name: "Number",
  pattern: { exec: matchNumber },
  line_breaks: false,
  start_chars_hint: ["-", "+", "0", "1", "2", "3", "4", "5", "6", "7", "8", "9"],
});
export const StringLit = createToken({
  name: "String",
  pattern: { exec: matchString },
  line_breaks: true,
  start_chars_hint: ['"', "'"],
});
export const UnterminatedString = createToken({
  name: "UnterminatedString",
  pattern: { exec: matchUnterminatedString },
  line_breaks: true,
  start_chars_hint: ['"', "'"],
});

// Comparison (multi-char first)
export const EqualsEquals = createToken({ name: "EqualsEquals", pattern: /==/, categories: EqualityOperator });
export const LessEquals = createToken({ name: "LessEquals", pattern: /<=/, categories: RelationalOperator });
export const GreaterEquals = createToken({ name: "GreaterEquals", pattern: />=/, categories: RelationalOperator });
export const Less = createToken({ name: "Less", pattern: /</, categories: RelationalOperator });
export const Greater = createToken({ name: "Greater", pattern: />/, categories: RelationalOperator });
export const Equals = createToken({ name: "Equals", pattern: /=/ });

// Arithmetic
export const Plus = createToken({ name: "Plus", pattern: /\+/, categories: AdditiveOperator });
export const Minus = createToken({
  name: "Minus",
  pattern: /-/,
  categories: [AdditiveOperator, UnaryOperator],
});
export const Star = createToken({ name: "Star", pattern: /\*/, categories: MultiplicativeOperator });
export const Slash = createToken({ name: "Slash", pattern: /\//, categories: MultiplicativeOperator });
export const Percent = createToken({ name: "Percent", pattern: /%/, categories: MultiplicativeOperator });

// Punctuation
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const LBrace = createToken({ name: "LBrace", pattern: /\{/ });
export const RBrace = createToken({ name: "RBrace", pattern: /\}/ });
export const Comma = createToken({ name: "Comma", pattern: /,/ });
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/ });
export const Dot = createToken({ name: "Dot", pattern: /\./ });

// Anything else is a lexical error
export const Unrecognized = createToken({ name: "Unrecognized", pattern: /[\s\S]/ });

const OPERAND_END_NAMES = new Set(
  [NumberLit, StringLit, Identifier, RParen, True, False, Null].map((t) => t.name)
);

// Token order matters: compound keywords before keywords, keywords before
// identifiers, multi-char operators before single-char ones.
export const allTokens: TokenType[] = [
  WhiteSpace,
  LineComment,
  BlockComment,
  EndIf,
  EndWhile,
  ElseIf,
  Var,
  If,
  Then,
  Else,
  While,
  Do,
  Return,
  True,
  False,
  Null,
  And,
  Or,
  NotEquals,
  Not,
  NumberLit,
  StringLit,
  UnterminatedString,
  Identifier,
  EqualsEquals,
  LessEquals,
  GreaterEquals,
  Less,
  Greater,
  Equals,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  LParen,
  RParen,
  LBrace,
  RBrace,
  Comma,
  Semicolon,
  Dot,
  Unrecognized,
  EqualityOperator,
  RelationalOperator,
  AdditiveOperator,
  MultiplicativeOperator,
  UnaryOperator,
];

export const ScriptLexer = new Lexer(allTokens, { positionTracking: "full" });

/** Public token kind for each lexed Chevrotain token type. */
const KIND_BY_TYPE = new Map<TokenType, TokenKind>([
  [EndIf, "EndIf"],
  [EndWhile, "EndWhile"],
  [ElseIf, "ElseIf"],
  [Var, "Var"],
  [If, "If"],
  [Then, "Then"],
  [Else, "Else"],
  [While, "While"],
  [Do, "Do"],
  [Return, "Return"],
  [True, "True"],
  [False, "False"],
  [Null, "Null"],
  [And, "And"],
  [Or, "Or"],
  [NotEquals, "NotEquals"],
  [Not, "Not"],
  [NumberLit, "Number"],
  [StringLit, "String"],
  [UnterminatedString, "Error"],
  [Identifier, "Identifier"],
  [EqualsEquals, "EqualsEquals"],
  [LessEquals, "LessEquals"],
  [GreaterEquals, "GreaterEquals"],
  [Less, "Less"],
  [Greater, "Greater"],
  [Equals, "Equals"],
  [Plus, "Plus"],
  [Minus, "Minus"],
  [Star, "Star"],
  [Slash, "Slash"],
  [Percent, "Percent"],
  [LParen, "LParen"],
  [RParen, "RParen"],
  [LBrace, "BlockStart"],
  [RBrace, "BlockEnd"],
  [Comma, "Comma"],
  [Semicolon, "Semicolon"],
  [Dot, "Dot"],
  [Unrecognized, "Error"],
]);

export function kindOf(type: TokenType): TokenKind {
  return KIND_BY_TYPE.get(type) ?? "Error";
}

const CANONICAL_TEXT: Partial<Record<TokenKind, string>> = {
  EndIf: "end if",
  EndWhile: "end while",
  ElseIf: "else if",
};

/** Public token text: canonical for compound keywords, decoded for strings. */
export function textOf(token: IToken): string {
  const kind = kindOf(token.tokenType);
  const canonical = CANONICAL_TEXT[kind];
  if (canonical !== undefined) return canonical;
  if (kind === "String") {
    return scanString(token.image, 0)?.value ?? token.image;
  }
  if (token.tokenType === UnterminatedString) {
    return `Unterminated string: ${token.image}`;
  }
  if (token.tokenType === Unrecognized) {
    return `Unexpected character '${token.image}'`;
  }
  return token.image;
}

/** Parser token type for each public kind (block braces map to the brace tokens). */
const TYPE_BY_KIND = new Map<TokenKind, TokenType>(
  [...KIND_BY_TYPE.entries()]
    .filter(([type]) => type !== UnterminatedString && type !== Unrecognized)
    .map(([type, kind]) => [kind, type] as const)
);

export function typeOfKind(kind: TokenKind): TokenType | undefined {
  return TYPE_BY_KIND.get(kind);
}
