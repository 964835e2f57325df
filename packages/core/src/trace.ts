/**
 * Structured trace events emitted by the VM and the session runtime.
 */
import type { Span } from "./ast.js";
import type { TraceData } from "./errors.js";

export type TraceEventType =
  | "run_start"
  | "run_end"
  | "host_call"
  | "limit_exceeded"
  | "block_queued"
  | "block_diagnostics"
  | "block_failed"
  | "session_created"
  | "session_destroyed";

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  span?: Span;
  data?: TraceData;
}

export type TraceFn = (event: TraceEvent) => void;

export type Emitter = (event: TraceEventType, data?: TraceData, span?: Span) => void;

/** Binds a trace callback to a run id. A missing callback yields a no-op emitter. */
export function makeEmitter(trace: TraceFn | undefined, runId: string): Emitter {
  return (event, data, span) => {
    if (!trace) return;
    trace({
      ts: new Date().toISOString(),
      runId,
      event,
      ...(span ? { span } : {}),
      ...(data ? { data } : {}),
    });
  };
}
