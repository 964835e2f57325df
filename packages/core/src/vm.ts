/**
 * uiscript Virtual Machine - executes compiled chunks against a VMContext.
 *
 * A run is synchronous and bounded: every instruction checks the stop flag
 * and the iteration cap, and every `timeCheckInterval` instructions the
 * elapsed wall-clock time is compared against `maxExecutionMs`. All faults
 * are returned as a failed VMResult. Context writes made before a fault stay
 * in place.
 */
import { OpCode, readI16, readU16, verifyChunk, type CompiledChunk } from "./bytecode.js";
import type { VMContext } from "./context.js";
import type { IntrinsicRegistry } from "./dispatch.js";
import { VMError, errorMessage, type VMErrorCode } from "./errors.js";
import { resolveLimits, type ResourceLimits } from "./limits.js";
import { makeEmitter, type Emitter, type TraceFn } from "./trace.js";
import {
  describeValue,
  isTextual,
  isTruthy,
  toNumber,
  toText,
  valuesEqual,
  type Value,
} from "./values.js";

export interface VMOptions {
  limits?: Partial<ResourceLimits>;
  /** Millisecond clock used for the time budget. Defaults to Date.now. */
  clock?: () => number;
  trace?: TraceFn;
  runId?: string;
}

export type VMResult =
  | { success: true; returnValue: Value }
  | { success: false; error: string; code: VMErrorCode };

const LIMIT_CODES: ReadonlySet<VMErrorCode> = new Set<VMErrorCode>([
  "E_ITERATION_LIMIT",
  "E_TIME_LIMIT",
  "E_STACK_OVERFLOW",
  "E_VARIABLE_LIMIT",
  "E_STRING_LIMIT",
]);

class OperandStack {
  private readonly slots: Value[] = [];

  constructor(private readonly max: number) {}

  get depth(): number {
    return this.slots.length;
  }

  push(value: Value): void {
    if (this.slots.length >= this.max) {
      throw new VMError("E_STACK_OVERFLOW", `Stack overflow (max ${this.max}).`, { limit: this.max });
    }
    this.slots.push(value);
  }

  pop(): Value {
    const value = this.slots.pop();
    if (value === undefined) throw new VMError("E_STACK_UNDERFLOW", "Stack underflow.");
    return value;
  }

  peek(): Value {
    if (this.slots.length === 0) throw new VMError("E_STACK_UNDERFLOW", "Stack underflow.");
    return this.slots[this.slots.length - 1];
  }

  /** Pops `count` values and returns them in push order. */
  popMany(count: number): Value[] {
    if (count > this.slots.length) throw new VMError("E_STACK_UNDERFLOW", "Stack underflow.");
    return this.slots.splice(this.slots.length - count, count);
  }
}

interface RunState {
  iterations: number;
}

export class VirtualMachine {
  readonly limits: ResourceLimits;
  private readonly clock: () => number;
  private readonly emit: Emitter;
  private readonly tracing: boolean;
  private stopRequested = false;
  private running = false;

  constructor(
    private readonly registry: IntrinsicRegistry,
    options: VMOptions = {}
  ) {
    this.limits = resolveLimits(options.limits);
    this.clock = options.clock ?? Date.now;
    this.emit = makeEmitter(options.trace, options.runId ?? "vm");
    this.tracing = options.trace !== undefined;
  }

  /** Requests the in-flight run to abort before its next instruction. */
  stop(): void {
    this.stopRequested = true;
  }

  get isRunning(): boolean {
    return this.running;
  }

  execute(chunk: CompiledChunk, context: VMContext): VMResult {
    this.stopRequested = false;
    this.running = true;
    const startedAt = this.clock();
    const state: RunState = { iterations: 0 };

    let result: VMResult;
    try {
      this.emit("run_start", {
        codeSize: chunk.code.length,
        constants: chunk.constants.length,
        names: chunk.names.length,
      });
      verifyChunk(chunk);
      result = { success: true, returnValue: this.run(chunk, context, state, startedAt) };
    } catch (e) {
      const fault = e instanceof VMError ? e : new VMError("E_RUNTIME", `Runtime error: ${errorMessage(e)}`);
      if (LIMIT_CODES.has(fault.code)) {
        this.emit("limit_exceeded", { code: fault.code, ...fault.details });
      }
      result = { success: false, error: fault.message, code: fault.code };
    } finally {
      this.running = false;
    }

    this.emit("run_end", {
      success: result.success,
      iterations: state.iterations,
      durationMs: this.clock() - startedAt,
      ...(result.success ? {} : { error: result.error, code: result.code }),
    });
    return result;
  }

  private run(chunk: CompiledChunk, context: VMContext, state: RunState, startedAt: number): Value {
    const { code, constants, names } = chunk;
    const { maxIterations, maxExecutionMs } = this.limits;
    const checkEvery = Math.max(1, this.limits.timeCheckInterval);
    const stack = new OperandStack(this.limits.maxStackSize);
    let ip = 0;

    while (ip < code.length) {
      if (this.stopRequested) {
        throw new VMError("E_STOPPED", "Execution stopped.");
      }
      if (++state.iterations > maxIterations) {
        throw new VMError(
          "E_ITERATION_LIMIT",
          `Iteration limit exceeded (max ${maxIterations}): possible infinite loop.`,
          { limit: maxIterations }
        );
      }
      if (state.iterations % checkEvery === 0) {
        const elapsed = this.clock() - startedAt;
        if (elapsed > maxExecutionMs) {
          throw new VMError("E_TIME_LIMIT", `Execution time limit exceeded (${maxExecutionMs}ms).`, {
            limit: maxExecutionMs,
            actual: elapsed,
          });
        }
      }

      const op = code[ip++];
      switch (op) {
        case OpCode.PUSH_CONST:
          stack.push(constants[readU16(code, ip)]);
          ip += 2;
          break;
        case OpCode.PUSH_NULL:
          stack.push(null);
          break;
        case OpCode.PUSH_TRUE:
          stack.push(true);
          break;
        case OpCode.PUSH_FALSE:
          stack.push(false);
          break;
        case OpCode.POP:
          stack.pop();
          break;

        case OpCode.LOAD_VAR: {
          const name = names[readU16(code, ip)];
          ip += 2;
          // An unbound name evaluates to itself, so `floor(x)` can resolve `floor` as a host function.
          const bound = context.getVariable(name);
          stack.push(bound === undefined ? name : bound);
          break;
        }
        case OpCode.STORE_VAR: {
          const name = names[readU16(code, ip)];
          ip += 2;
          context.setVariable(name, stack.pop());
          break;
        }

        case OpCode.ADD: {
          const b = stack.pop();
          const a = stack.pop();
          if (isTextual(a) || isTextual(b)) {
            const joined = toText(a) + toText(b);
            context.checkString(joined);
            stack.push(joined);
          } else {
            stack.push(toNumber(a) + toNumber(b));
          }
          break;
        }
        case OpCode.SUB: {
          const b = toNumber(stack.pop());
          stack.push(toNumber(stack.pop()) - b);
          break;
        }
        case OpCode.MUL: {
          const b = toNumber(stack.pop());
          stack.push(toNumber(stack.pop()) * b);
          break;
        }
        case OpCode.DIV: {
          const b = toNumber(stack.pop());
          const a = toNumber(stack.pop());
          if (b === 0) throw new VMError("E_DIV_ZERO", "Division by zero.");
          stack.push(a / b);
          break;
        }
        case OpCode.MOD: {
          const b = toNumber(stack.pop());
          const a = toNumber(stack.pop());
          if (b === 0) throw new VMError("E_DIV_ZERO", "Modulo by zero.");
          stack.push(a % b);
          break;
        }
        case OpCode.NEG:
          stack.push(-toNumber(stack.pop()));
          break;

        case OpCode.EQ: {
          const b = stack.pop();
          stack.push(valuesEqual(stack.pop(), b));
          break;
        }
        case OpCode.NE: {
          const b = stack.pop();
          stack.push(!valuesEqual(stack.pop(), b));
          break;
        }
        case OpCode.LT: {
          const b = toNumber(stack.pop());
          stack.push(toNumber(stack.pop()) < b);
          break;
        }
        case OpCode.GT: {
          const b = toNumber(stack.pop());
          stack.push(toNumber(stack.pop()) > b);
          break;
        }
        case OpCode.LE: {
          const b = toNumber(stack.pop());
          stack.push(toNumber(stack.pop()) <= b);
          break;
        }
        case OpCode.GE: {
          const b = toNumber(stack.pop());
          stack.push(toNumber(stack.pop()) >= b);
          break;
        }
        case OpCode.NOT:
          stack.push(!isTruthy(stack.pop()));
          break;

        case OpCode.JUMP: {
          const offset = readI16(code, ip);
          ip += 2 + offset;
          break;
        }
        case OpCode.JUMP_IF_FALSE: {
          const offset = readI16(code, ip);
          ip += 2;
          if (!isTruthy(stack.peek())) ip += offset;
          break;
        }
        case OpCode.JUMP_IF_TRUE: {
          const offset = readI16(code, ip);
          ip += 2;
          if (isTruthy(stack.peek())) ip += offset;
          break;
        }

        case OpCode.CALL: {
          const argc = code[ip++];
          const args = stack.popMany(argc);
          const callee = stack.pop();
          if (typeof callee !== "string") {
            throw new VMError("E_NOT_CALLABLE", `Cannot call ${describeValue(callee)}: not a function.`);
          }
          if (this.tracing) this.emit("host_call", { kind: "function", name: callee });
          stack.push(this.registry.callFunction(callee, args, context));
          break;
        }
        case OpCode.CALL_METHOD: {
          const name = names[readU16(code, ip)];
          const argc = code[ip + 2];
          ip += 3;
          const args = stack.popMany(argc);
          const target = stack.pop();
          if (this.tracing) this.emit("host_call", { kind: "method", target: toText(target), name });
          stack.push(this.registry.callMethod(target, name, args, context));
          break;
        }
        case OpCode.GET_MEMBER: {
          const name = names[readU16(code, ip)];
          ip += 2;
          const target = stack.pop();
          if (this.tracing) this.emit("host_call", { kind: "get", target: toText(target), name });
          stack.push(this.registry.getMember(target, name, context));
          break;
        }
        case OpCode.SET_MEMBER: {
          const name = names[readU16(code, ip)];
          ip += 2;
          const value = stack.pop();
          const target = stack.pop();
          if (this.tracing) this.emit("host_call", { kind: "set", target: toText(target), name });
          this.registry.setMember(target, name, value, context);
          break;
        }

        case OpCode.RETURN:
          return null;
        case OpCode.RETURN_VALUE:
          return stack.pop();
        case OpCode.HALT:
          return stack.depth > 0 ? stack.pop() : null;

        default:
          throw new VMError("E_INVALID_CHUNK", `Unknown opcode 0x${op.toString(16)} at ${ip - 1}.`);
      }
    }
    return null;
  }
}
