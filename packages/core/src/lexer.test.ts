/**
 * Tests for block extraction and tokenization.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  BlockLexer,
  containsBlock,
  extractBlocks,
  splitBlocks,
  stripBlocks,
  tokenizeScript,
} from "./lexer.js";
import type { Token } from "./tokens.js";

function kinds(tokens: Token[]): string[] {
  return tokens.map((t) => t.kind);
}

describe("uiscript block lexer", () => {
  it("extracts a single block and strips it from the text", () => {
    const input = "Hello #UI{ var x = 1 } world";
    const blocks = extractBlocks(input);
    assert.equal(blocks.length, 1);
    assert.deepEqual(kinds(blocks[0]), ["BlockStart", "Var", "Identifier", "Equals", "Number", "EOF"]);
    assert.equal(blocks[0][0].text, "#UI{");
    assert.equal(stripBlocks(input), "Hello  world");
  });

  it("extracts several blocks in source order", () => {
    const input = "a #UI{ x } b #UI{ y } c";
    const { text, blocks } = splitBlocks(input);
    assert.equal(blocks.length, 2);
    assert.equal(blocks[0][1].text, "x");
    assert.equal(blocks[1][1].text, "y");
    assert.equal(text, "a  b  c");
  });

  it("returns the text unchanged apart from trimming when there is no block", () => {
    assert.equal(stripBlocks("  plain text  "), "plain text");
    assert.deepEqual(extractBlocks("plain text"), []);
    assert.equal(containsBlock("plain text"), false);
    assert.equal(containsBlock("x #UI{ }"), true);
  });

  it("ignores braces inside string literals", () => {
    const input = `#UI{ var s = "a}b" } tail`;
    const [block] = extractBlocks(input);
    assert.deepEqual(kinds(block), ["BlockStart", "Var", "Identifier", "Equals", "String", "EOF"]);
    assert.equal(block[4].text, "a}b");
    assert.equal(stripBlocks(input), "tail");
  });

  it("ignores braces inside comments", () => {
    const input = "#UI{ // }\n var a = 1 /* } */ } tail";
    const [block] = extractBlocks(input);
    assert.deepEqual(kinds(block), ["BlockStart", "Var", "Identifier", "Equals", "Number", "EOF"]);
    assert.equal(stripBlocks(input), "tail");
  });

  it("splits thousands of blocks in a large input without rescanning the rest", () => {
    const lines: string[] = [];
    for (let i = 0; i < 4000; i++) lines.push(`line ${i} #UI{ var v = ${i} } done`);
    const input = lines.join("\n");

    const started = performance.now();
    const { text, blocks } = splitBlocks(input);
    const elapsed = performance.now() - started;

    assert.equal(blocks.length, 4000);
    assert.equal(blocks[3999][4].text, "3999");
    assert.equal(text.split("\n")[1], "line 1  done");
    assert.ok(elapsed < 5000, `took ${elapsed}ms`);
  });

  it("tracks nested braces and emits them, but not the closing brace", () => {
    const input = "#UI{ { } var a = 1 } rest";
    const [block] = extractBlocks(input);
    assert.deepEqual(kinds(block), [
      "BlockStart",
      "BlockStart",
      "BlockEnd",
      "Var",
      "Identifier",
      "Equals",
      "Number",
      "EOF",
    ]);
    assert.equal(stripBlocks(input), "rest");
  });

  it("consumes an unclosed block to the end of input", () => {
    const input = "before #UI{ var a = 1";
    const { text, blocks } = splitBlocks(input);
    assert.equal(blocks.length, 1);
    assert.equal(blocks[0][blocks[0].length - 1].kind, "EOF");
    assert.equal(text, "before");
  });

  it("reports the consumed source range of each block", () => {
    const lexer = new BlockLexer("ab#UI{x}cd");
    assert.ok(lexer.nextBlock());
    assert.deepEqual(lexer.consumedRange(), { start: 2, end: 8 });
    assert.equal(lexer.nextBlock(), null);
  });

  it("supports a custom sentinel", () => {
    const { text, blocks } = splitBlocks("pre <<{ x } post", "<<{");
    assert.equal(blocks.length, 1);
    assert.equal(blocks[0][0].text, "<<{");
    assert.equal(text, "pre  post");
  });

  it("rejects a sentinel that does not open a brace", () => {
    assert.throws(() => new BlockLexer("x", "#UI"), /must end with '\{'/);
  });

  it("records line and column positions", () => {
    const [block] = extractBlocks("line1\n#UI{ var x }");
    assert.equal(block[0].line, 2);
    assert.equal(block[0].column, 1);
    assert.equal(block[1].kind, "Var");
    assert.equal(block[1].line, 2);
    assert.equal(block[1].column, 6);
  });
});

describe("uiscript tokens", () => {
  it("recognizes compound keywords with canonical text", () => {
    const tokens = tokenizeScript("end if END   WHILE else if");
    assert.deepEqual(kinds(tokens), ["EndIf", "EndWhile", "ElseIf", "EOF"]);
    assert.equal(tokens[1].text, "end while");
  });

  it("skips comments between the words of a compound keyword", () => {
    assert.deepEqual(kinds(tokenizeScript("end /* c */ while")), ["EndWhile", "EOF"]);
  });

  it("leaves a bare 'end' as an identifier", () => {
    const tokens = tokenizeScript("end x");
    assert.deepEqual(kinds(tokens), ["Identifier", "Identifier", "EOF"]);
    assert.equal(tokens[0].text, "end");
    assert.deepEqual(kinds(tokenizeScript("endif")), ["Identifier", "EOF"]);
    assert.deepEqual(kinds(tokenizeScript("else x")), ["Else", "Identifier", "EOF"]);
  });

  it("matches keywords case-insensitively but keeps identifier case", () => {
    const tokens = tokenizeScript("VAR While Foo variable");
    assert.deepEqual(kinds(tokens), ["Var", "While", "Identifier", "Identifier", "EOF"]);
    assert.equal(tokens[2].text, "Foo");
  });

  it("lexes symbolic logical operators", () => {
    assert.deepEqual(kinds(tokenizeScript("a && b || !c != d")), [
      "Identifier",
      "And",
      "Identifier",
      "Or",
      "Not",
      "Identifier",
      "NotEquals",
      "Identifier",
      "EOF",
    ]);
  });

  it("folds a sign into a number only where an operand is expected", () => {
    const negative = tokenizeScript("x = -1.5");
    assert.deepEqual(kinds(negative), ["Identifier", "Equals", "Number", "EOF"]);
    assert.equal(negative[2].text, "-1.5");

    const minus = tokenizeScript("a -1");
    assert.deepEqual(kinds(minus), ["Identifier", "Minus", "Number", "EOF"]);
    assert.equal(minus[2].text, "1");
  });

  it("decodes escapes and doubled quotes", () => {
    assert.equal(tokenizeScript(`'it''s'`)[0].text, "it's");
    assert.equal(tokenizeScript(`"a\\"b\\n"`)[0].text, 'a"b\n');
    assert.equal(tokenizeScript(`"back\\\\slash"`)[0].text, "back\\slash");
  });

  it("skips line and block comments", () => {
    assert.deepEqual(kinds(tokenizeScript("var a // note\n/* block */ = 1")), [
      "Var",
      "Identifier",
      "Equals",
      "Number",
      "EOF",
    ]);
  });

  it("stops at an unterminated string with an error token", () => {
    const tokens = tokenizeScript(`var s = "abc`);
    assert.deepEqual(kinds(tokens), ["Var", "Identifier", "Equals", "Error", "EOF"]);
    assert.equal(tokens[3].text, `Unterminated string: "abc`);
  });

  it("stops at an unrecognized character", () => {
    const tokens = tokenizeScript("var a = 1 @ 2");
    assert.deepEqual(kinds(tokens), ["Var", "Identifier", "Equals", "Number", "Error", "EOF"]);
    assert.equal(tokens[4].text, "Unexpected character '@'");
  });
});
