/**
 * uis run - run every block of a file in one session
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import {
  IntrinsicRegistry,
  SessionManager,
  errorMessage,
  formatDiagnostic,
  formatDiagnostics,
  resolveConfig,
  withFile,
} from "@uiscript/core";
import type { BlockOutcome, TraceEvent } from "@uiscript/core";
import { registerStdlib } from "@uiscript/std";
import { RecordingSurface, attachHostState, registerHostObjects } from "@uiscript/objects";
import type { HostState } from "@uiscript/objects";
import { readSource } from "./source.js";

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

export interface RunOptions {
  trace?: string;
  canvas?: string;
  pretty?: boolean;
  cwd?: string;
  homeDir?: string;
}

export async function runRun(file: string, opts: RunOptions): Promise<number> {
  const pretty = !!opts.pretty;
  const emitCliError = (code: string, message: string): void => {
    console.error(formatDiagnostic({ code, message }, pretty));
  };

  let source: string;
  try {
    source = readSource(file);
  } catch (e) {
    emitCliError("E_IO", `Error reading file: ${errorMessage(e)}`);
    return 4;
  }

  const { config } = resolveConfig(opts.cwd, opts.homeDir);

  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      emitCliError("E_IO", `Error opening trace file: ${errorMessage(e)}`);
      return 4;
    }
  }

  const traceHandler =
    traceFd !== null
      ? (event: TraceEvent) => {
          try {
            fs.writeSync(traceFd, JSON.stringify(event) + "\n");
          } catch (e) {
            throw new CliIoError(`Error writing trace file: ${errorMessage(e)}`);
          }
        }
      : undefined;

  const registry = registerHostObjects(
    registerStdlib(new IntrinsicRegistry(), { print: (line) => console.log(line) })
  );
  const states = new Map<string, HostState>();
  const manager = new SessionManager(registry, {
    enabled: config.enabled,
    sentinel: config.sentinel,
    limits: config.limits,
    trace: traceHandler,
    autoRun: false,
    setup: (session) => {
      states.set(session.id, attachHostState(session.context));
    },
  });
  const sessionId = crypto.randomUUID();

  try {
    const text = manager.processOutput(source, sessionId);
    const outcomes: BlockOutcome[] = manager.get(sessionId)?.runPending() ?? [];

    let exitCode = 0;
    for (const outcome of outcomes) {
      if (outcome.diagnostics.length > 0) {
        console.error(formatDiagnostics(withFile(outcome.diagnostics, file), pretty));
        exitCode = Math.max(exitCode, 2);
      }
      if (outcome.status === "runtime_error") {
        emitCliError(outcome.code, outcome.error);
        exitCode = 4;
      }
    }

    if (opts.canvas) {
      const surface = states.get(sessionId)?.surface ?? new RecordingSurface();
      try {
        fs.writeFileSync(opts.canvas, JSON.stringify(surface.snapshot(), null, 2));
      } catch (e) {
        emitCliError("E_IO", `Error writing canvas file: ${errorMessage(e)}`);
        return 4;
      }
    }

    if (text !== "") console.log(text);
    return exitCode;
  } catch (e) {
    if (e instanceof CliIoError) {
      emitCliError("E_IO", e.message);
      return 4;
    }
    emitCliError("E_RUNTIME", errorMessage(e));
    return 4;
  } finally {
    manager.destroyAll();
    if (traceFd !== null) fs.closeSync(traceFd);
  }
}
