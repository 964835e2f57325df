/**
 * Tests for the chunk builder, verification and disassembly.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { ChunkBuilder, OpCode, disassemble, instructionSize, readI16, verifyChunk } from "./bytecode.js";
import type { CompiledChunk } from "./bytecode.js";
import { CompileError, VMError } from "./errors.js";

function chunkOf(code: number[], constants: Array<number | string> = [], names: string[] = []): CompiledChunk {
  return { code: Uint8Array.from(code), constants, names };
}

describe("ChunkBuilder", () => {
  it("encodes 16-bit operands big-endian", () => {
    const b = new ChunkBuilder();
    b.emitU16(OpCode.PUSH_CONST, 0x0102);
    assert.deepEqual([...b.build().code], [0x01, 0x01, 0x02]);
  });

  it("deduplicates constants by type and value", () => {
    const b = new ChunkBuilder();
    assert.equal(b.addConstant(1), 0);
    assert.equal(b.addConstant("1"), 1);
    assert.equal(b.addConstant(1), 0);
    assert.equal(b.addName("x"), 0);
    assert.equal(b.addName("x"), 0);
    assert.deepEqual(b.build().constants, [1, "1"]);
  });

  it("patches a forward jump relative to the byte after its operand", () => {
    const b = new ChunkBuilder();
    const at = b.emitJump(OpCode.JUMP);
    assert.equal(at, 1);
    b.emit(OpCode.POP);
    b.emit(OpCode.POP);
    b.patchJump(at);
    const { code } = b.build();
    assert.equal(readI16(code, 1), 2);
  });

  it("emits a backward loop jump", () => {
    const b = new ChunkBuilder();
    b.emit(OpCode.PUSH_TRUE);
    b.emit(OpCode.POP);
    b.emitLoop(0);
    const { code } = b.build();
    assert.equal(code[2], OpCode.JUMP);
    assert.equal(readI16(code, 3), -5);
  });

  it("rejects a jump longer than a signed 16-bit offset", () => {
    const b = new ChunkBuilder();
    const at = b.emitJump(OpCode.JUMP);
    for (let i = 0; i < 0x8000; i++) b.emit(OpCode.POP);
    assert.throws(() => b.patchJump(at), CompileError);
  });

  it("produces a frozen chunk", () => {
    const b = new ChunkBuilder();
    b.emit(OpCode.HALT);
    assert.ok(Object.isFrozen(b.build()));
  });
});

describe("verifyChunk", () => {
  it("accepts a well-formed chunk", () => {
    assert.doesNotThrow(() => verifyChunk(chunkOf([OpCode.PUSH_CONST, 0, 0, OpCode.HALT], [1])));
  });

  it("rejects an unknown opcode", () => {
    assert.throws(
      () => verifyChunk(chunkOf([0x99])),
      (e: unknown) => e instanceof VMError && e.code === "E_INVALID_CHUNK" && e.message === "Unknown opcode 0x99 at 0."
    );
  });

  it("rejects a truncated instruction", () => {
    assert.throws(() => verifyChunk(chunkOf([OpCode.PUSH_CONST, 0])), /Truncated PUSH_CONST at 0\./);
  });

  it("rejects pool indexes out of range", () => {
    assert.throws(() => verifyChunk(chunkOf([OpCode.PUSH_CONST, 0, 5], [1])), /Constant index out of range/);
    assert.throws(() => verifyChunk(chunkOf([OpCode.LOAD_VAR, 0, 0])), /Name index out of range/);
  });

  it("rejects a jump into the middle of an instruction", () => {
    const code = [OpCode.JUMP, 0, 1, OpCode.PUSH_CONST, 0, 0, OpCode.HALT];
    assert.throws(() => verifyChunk(chunkOf(code, [1])), /not an instruction boundary/);
  });

  it("allows a jump to the end of the chunk", () => {
    assert.doesNotThrow(() => verifyChunk(chunkOf([OpCode.JUMP, 0, 0])));
  });
});

describe("disassemble", () => {
  it("prints one line per instruction with pool comments", () => {
    const chunk = chunkOf(
      [OpCode.PUSH_CONST, 0, 0, OpCode.STORE_VAR, 0, 0, OpCode.JUMP, 0, 0, OpCode.CALL, 2, OpCode.HALT],
      ["hi"],
      ["msg"]
    );
    assert.deepEqual(disassemble(chunk), [
      '0000  PUSH_CONST 0  ; "hi"',
      "0003  STORE_VAR 0  ; msg",
      "0006  JUMP 0  ; -> 0009",
      "0009  CALL 2",
      "0011  HALT",
    ]);
  });

  it("marks unknown bytes", () => {
    assert.deepEqual(disassemble(chunkOf([0x99])), ["0000  ??? 0x99"]);
  });

  it("knows every instruction size", () => {
    assert.equal(instructionSize(OpCode.CALL_METHOD), 4);
    assert.equal(instructionSize(OpCode.CALL), 2);
    assert.equal(instructionSize(OpCode.JUMP_IF_TRUE), 3);
    assert.equal(instructionSize(OpCode.ADD), 1);
  });
});
