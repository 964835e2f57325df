/**
 * uiscript bytecode: opcodes, compiled chunks, the chunk builder used by the
 * compiler, and chunk verification/disassembly.
 *
 * Jump operands are signed 16-bit big-endian offsets relative to the byte
 * that follows the operand.
 */
import { CompileError, VMError } from "./errors.js";

export const OpCode = {
  PUSH_CONST: 0x01,
  PUSH_NULL: 0x02,
  PUSH_TRUE: 0x03,
  PUSH_FALSE: 0x04,
  POP: 0x05,
  LOAD_VAR: 0x10,
  STORE_VAR: 0x11,
  ADD: 0x20,
  SUB: 0x21,
  MUL: 0x22,
  DIV: 0x23,
  MOD: 0x24,
  NEG: 0x25,
  EQ: 0x30,
  NE: 0x31,
  LT: 0x32,
  GT: 0x33,
  LE: 0x34,
  GE: 0x35,
  NOT: 0x36,
  JUMP: 0x40,
  JUMP_IF_FALSE: 0x41,
  JUMP_IF_TRUE: 0x42,
  CALL: 0x50,
  CALL_METHOD: 0x51,
  GET_MEMBER: 0x52,
  SET_MEMBER: 0x53,
  RETURN: 0x60,
  RETURN_VALUE: 0x61,
  HALT: 0xff,
} as const;

export type OpCode = (typeof OpCode)[keyof typeof OpCode];

export type Constant = number | string;

export interface CompiledChunk {
  readonly code: Uint8Array;
  readonly constants: readonly Constant[];
  readonly names: readonly string[];
}

type Operand = "u8" | "u16" | "i16";

interface OpInfo {
  name: string;
  operands: readonly Operand[];
}

const OPERAND_WIDTH: Record<Operand, number> = { u8: 1, u16: 2, i16: 2 };

const OPERANDS: Partial<Record<string, readonly Operand[]>> = {
  PUSH_CONST: ["u16"],
  LOAD_VAR: ["u16"],
  STORE_VAR: ["u16"],
  JUMP: ["i16"],
  JUMP_IF_FALSE: ["i16"],
  JUMP_IF_TRUE: ["i16"],
  CALL: ["u8"],
  CALL_METHOD: ["u16", "u8"],
  GET_MEMBER: ["u16"],
  SET_MEMBER: ["u16"],
};

const OP_INFO = new Map<number, OpInfo>(
  Object.entries(OpCode).map(([name, op]): [number, OpInfo] => [op, { name, operands: OPERANDS[name] ?? [] }])
);

export function opInfo(op: number): OpInfo | undefined {
  return OP_INFO.get(op);
}

/** Total encoded size of an instruction, opcode byte included. */
export function instructionSize(op: number): number {
  const info = OP_INFO.get(op);
  if (!info) return 1;
  return info.operands.reduce((n, operand) => n + OPERAND_WIDTH[operand], 1);
}

export function readU16(code: Uint8Array, at: number): number {
  return (code[at] << 8) | code[at + 1];
}

export function readI16(code: Uint8Array, at: number): number {
  const raw = readU16(code, at);
  return raw & 0x8000 ? raw - 0x10000 : raw;
}

const MAX_POOL = 0xffff;
const MAX_JUMP = 0x7fff;

export class ChunkBuilder {
  private readonly code: number[] = [];
  private readonly constants: Constant[] = [];
  private readonly constantIndex = new Map<string, number>();
  private readonly names: string[] = [];
  private readonly nameIndex = new Map<string, number>();

  get position(): number {
    return this.code.length;
  }

  emit(op: OpCode, ...operands: number[]): void {
    this.code.push(op, ...operands);
  }

  emitU16(op: OpCode, value: number, ...rest: number[]): void {
    this.code.push(op, (value >> 8) & 0xff, value & 0xff, ...rest);
  }

  /** Deduplicated by type and value, so `1` and `"1"` get separate slots. */
  addConstant(value: Constant): number {
    const key = `${typeof value}:${value}`;
    const existing = this.constantIndex.get(key);
    if (existing !== undefined) return existing;
    if (this.constants.length > MAX_POOL) throw new CompileError("Too many constants in one block.");
    const index = this.constants.length;
    this.constants.push(value);
    this.constantIndex.set(key, index);
    return index;
  }

  addName(name: string): number {
    const existing = this.nameIndex.get(name);
    if (existing !== undefined) return existing;
    if (this.names.length > MAX_POOL) throw new CompileError("Too many names in one block.");
    const index = this.names.length;
    this.names.push(name);
    this.nameIndex.set(name, index);
    return index;
  }

  /** Emits a jump with a placeholder offset; returns the operand position for patchJump(). */
  emitJump(op: OpCode): number {
    this.code.push(op, 0xff, 0xff);
    return this.code.length - 2;
  }

  /** Points the jump whose operand sits at `operandAt` to the current position. */
  patchJump(operandAt: number): void {
    const offset = this.code.length - (operandAt + 2);
    if (offset > MAX_JUMP) {
      throw new CompileError(`Jump too large (${offset} bytes).`);
    }
    this.code[operandAt] = (offset >> 8) & 0xff;
    this.code[operandAt + 1] = offset & 0xff;
  }

  /** Emits a backward jump to `loopStart`. */
  emitLoop(loopStart: number): void {
    const offset = loopStart - (this.code.length + 3);
    if (offset < -MAX_JUMP - 1) {
      throw new CompileError(`Loop body too large (${-offset} bytes).`);
    }
    const raw = offset & 0xffff;
    this.code.push(OpCode.JUMP, (raw >> 8) & 0xff, raw & 0xff);
  }

  build(): CompiledChunk {
    return Object.freeze({
      code: Uint8Array.from(this.code),
      constants: Object.freeze([...this.constants]),
      names: Object.freeze([...this.names]),
    });
  }
}

/**
 * Checks that every opcode is known, every pool index is in range and every
 * jump lands on an instruction boundary inside the chunk.
 */
export function verifyChunk(chunk: CompiledChunk): void {
  const { code } = chunk;
  const boundaries = new Set<number>();
  const jumpTargets: Array<{ at: number; target: number }> = [];
  let ip = 0;

  while (ip < code.length) {
    boundaries.add(ip);
    const info = OP_INFO.get(code[ip]);
    if (!info) {
      throw new VMError("E_INVALID_CHUNK", `Unknown opcode 0x${code[ip].toString(16)} at ${ip}.`);
    }
    const size = instructionSize(code[ip]);
    if (ip + size > code.length) {
      throw new VMError("E_INVALID_CHUNK", `Truncated ${info.name} at ${ip}.`);
    }
    switch (info.name) {
      case "PUSH_CONST":
        if (readU16(code, ip + 1) >= chunk.constants.length) {
          throw new VMError("E_INVALID_CHUNK", `Constant index out of range at ${ip}.`);
        }
        break;
      case "LOAD_VAR":
      case "STORE_VAR":
      case "GET_MEMBER":
      case "SET_MEMBER":
      case "CALL_METHOD":
        if (readU16(code, ip + 1) >= chunk.names.length) {
          throw new VMError("E_INVALID_CHUNK", `Name index out of range at ${ip}.`);
        }
        break;
      case "JUMP":
      case "JUMP_IF_FALSE":
      case "JUMP_IF_TRUE":
        jumpTargets.push({ at: ip, target: ip + 3 + readI16(code, ip + 1) });
        break;
    }
    ip += size;
  }

  for (const { at, target } of jumpTargets) {
    if (target !== code.length && !boundaries.has(target)) {
      throw new VMError("E_INVALID_CHUNK", `Jump at ${at} targets ${target}, which is not an instruction boundary.`);
    }
  }
}

function describeConstant(value: Constant): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

/** One line per instruction: `offset  NAME  operands  ; comment`. */
export function disassemble(chunk: CompiledChunk): string[] {
  const { code } = chunk;
  const lines: string[] = [];
  let ip = 0;

  while (ip < code.length) {
    const info = OP_INFO.get(code[ip]);
    const offset = ip.toString().padStart(4, "0");
    if (!info) {
      lines.push(`${offset}  ??? 0x${code[ip].toString(16)}`);
      ip++;
      continue;
    }
    let text = `${offset}  ${info.name}`;
    switch (info.name) {
      case "PUSH_CONST": {
        const index = readU16(code, ip + 1);
        text += ` ${index}  ; ${describeConstant(chunk.constants[index])}`;
        break;
      }
      case "LOAD_VAR":
      case "STORE_VAR":
      case "GET_MEMBER":
      case "SET_MEMBER": {
        const index = readU16(code, ip + 1);
        text += ` ${index}  ; ${chunk.names[index]}`;
        break;
      }
      case "CALL_METHOD": {
        const index = readU16(code, ip + 1);
        text += ` ${index} ${code[ip + 3]}  ; ${chunk.names[index]}`;
        break;
      }
      case "CALL":
        text += ` ${code[ip + 1]}`;
        break;
      case "JUMP":
      case "JUMP_IF_FALSE":
      case "JUMP_IF_TRUE": {
        const target = ip + 3 + readI16(code, ip + 1);
        text += ` ${readI16(code, ip + 1)}  ; -> ${target.toString().padStart(4, "0")}`;
        break;
      }
    }
    lines.push(text);
    ip += instructionSize(code[ip]);
  }
  return lines;
}
