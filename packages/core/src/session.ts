/**
 * uiscript session runtime.
 *
 * One Session per terminal/connection: a persistent VMContext, a VM, and a
 * queue of extracted blocks. Blocks run one after another; a failing block is
 * reported and the next one still runs. Only one run is in flight per session.
 */
import { VMContext } from "./context.js";
import type { Diagnostic } from "./diagnostics.js";
import type { IntrinsicRegistry } from "./dispatch.js";
import type { VMErrorCode } from "./errors.js";
import { DEFAULT_SENTINEL, containsBlock, splitBlocks } from "./lexer.js";
import { resolveLimits, type ResourceLimits } from "./limits.js";
import { compileBlock } from "./pipeline.js";
import type { Token } from "./tokens.js";
import { makeEmitter, type Emitter, type TraceFn } from "./trace.js";
import type { Value } from "./values.js";
import { VirtualMachine } from "./vm.js";

export type BlockOutcome =
  | { status: "ok"; value: Value; diagnostics: Diagnostic[] }
  | { status: "compile_error"; diagnostics: Diagnostic[] }
  | { status: "runtime_error"; error: string; code: VMErrorCode; diagnostics: Diagnostic[] };

export interface SessionOptions {
  limits?: Partial<ResourceLimits>;
  /** When false, processOutput() strips blocks without queueing them. */
  enabled?: boolean;
  sentinel?: string;
  clock?: () => number;
  trace?: TraceFn;
  /** Run queued blocks as soon as processOutput() finds them (default true). */
  autoRun?: boolean;
  /** Called once per new session, before its first block runs. */
  setup?: (session: Session) => void;
  /** Called when a session is destroyed. */
  teardown?: (session: Session) => void;
}

export const SESSION_ID_KEY = "sessionId";

export class Session {
  readonly context: VMContext;
  readonly vm: VirtualMachine;
  private readonly queue: Token[][] = [];
  private readonly emit: Emitter;
  private busy = false;
  private blocksRun = 0;

  constructor(
    readonly id: string,
    registry: IntrinsicRegistry,
    options: SessionOptions = {}
  ) {
    const limits = resolveLimits(options.limits);
    this.context = new VMContext(limits);
    this.context.setInternal(SESSION_ID_KEY, id);
    registry.installGlobals(this.context);
    this.vm = new VirtualMachine(registry, { limits, clock: options.clock, trace: options.trace, runId: id });
    this.emit = makeEmitter(options.trace, id);
  }

  get pending(): number {
    return this.queue.length;
  }

  get isBusy(): boolean {
    return this.busy;
  }

  enqueue(tokens: Token[]): void {
    this.queue.push(tokens);
    this.emit("block_queued", { pending: this.queue.length });
  }

  /**
   * Runs every queued block in order. Returns an empty list when called while
   * a run is already in progress (for example from inside a host function).
   */
  runPending(): BlockOutcome[] {
    if (this.busy) return [];
    this.busy = true;
    try {
      const outcomes: BlockOutcome[] = [];
      for (let next = this.queue.shift(); next !== undefined; next = this.queue.shift()) {
        outcomes.push(this.runBlock(next));
      }
      return outcomes;
    } finally {
      this.busy = false;
    }
  }

  /** Drops queued blocks and stops the in-flight run. */
  stop(): void {
    this.queue.length = 0;
    this.vm.stop();
  }

  private runBlock(tokens: Token[]): BlockOutcome {
    const block = ++this.blocksRun;
    const { chunk, diagnostics } = compileBlock(tokens);

    if (diagnostics.length > 0) {
      this.emit("block_diagnostics", {
        block,
        codes: diagnostics.map((d) => d.code),
        message: diagnostics[0].message,
      });
    }
    if (!chunk) {
      this.emit("block_failed", { block, stage: "compile", message: diagnostics[diagnostics.length - 1].message });
      return { status: "compile_error", diagnostics };
    }

    const result = this.vm.execute(chunk, this.context);
    if (!result.success) {
      this.emit("block_failed", { block, stage: "runtime", code: result.code, message: result.error });
      return { status: "runtime_error", error: result.error, code: result.code, diagnostics };
    }
    return { status: "ok", value: result.returnValue, diagnostics };
  }
}

export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly sentinel: string;
  private readonly emit: Emitter;

  /** Freezes the registry: host calls are fixed once sessions exist. */
  constructor(
    private readonly registry: IntrinsicRegistry,
    private readonly options: SessionOptions = {}
  ) {
    registry.freeze();
    this.sentinel = options.sentinel ?? DEFAULT_SENTINEL;
    this.emit = makeEmitter(options.trace, "sessions");
  }

  get size(): number {
    return this.sessions.size;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  /** Returns the session, creating it on first use. */
  session(sessionId: string): Session {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;
    const session = new Session(sessionId, this.registry, this.options);
    this.sessions.set(sessionId, session);
    this.options.setup?.(session);
    this.emit("session_created", { sessionId });
    return session;
  }

  /**
   * Queues every block in `output` for the session and returns the output
   * with the blocks removed. Output without blocks is returned unchanged.
   */
  processOutput(output: string, sessionId: string): string {
    if (!containsBlock(output, this.sentinel)) return output;
    const { text, blocks } = splitBlocks(output, this.sentinel);
    if (this.options.enabled === false) return text;

    const session = this.session(sessionId);
    for (const block of blocks) session.enqueue(block);
    if (this.options.autoRun !== false) session.runPending();
    return text;
  }

  stop(sessionId: string): void {
    this.sessions.get(sessionId)?.stop();
  }

  destroy(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.stop();
    this.options.teardown?.(session);
    this.sessions.delete(sessionId);
    this.emit("session_destroyed", { sessionId });
    return true;
  }

  destroyAll(): void {
    for (const id of [...this.sessions.keys()]) this.destroy(id);
  }
}
