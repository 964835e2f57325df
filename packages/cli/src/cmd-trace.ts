/**
 * uis trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";
import { errorMessage } from "@uiscript/core";

const scalar = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const traceLineSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  data: z.record(z.string(), z.union([scalar, z.array(scalar)])).optional(),
});

type TraceLine = z.infer<typeof traceLineSchema>;

export interface TraceSummary {
  runIds: string[];
  totalEvents: number;
  sessions: number;
  blocks: number;
  runs: number;
  failures: number;
  hostCalls: number;
  hostCallsByName: Record<string, number>;
  limitsExceeded: number;
  iterations: number;
  durationMs: number;
}

function parseLine(line: string): TraceLine | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = traceLineSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function hostCallName(data: TraceLine["data"]): string {
  const name = typeof data?.["name"] === "string" ? data["name"] : "unknown";
  const target = data?.["target"];
  return typeof target === "string" ? `${target}.${name}` : name;
}

export function summarize(events: readonly TraceLine[]): TraceSummary {
  const summary: TraceSummary = {
    runIds: [],
    totalEvents: events.length,
    sessions: 0,
    blocks: 0,
    runs: 0,
    failures: 0,
    hostCalls: 0,
    hostCallsByName: {},
    limitsExceeded: 0,
    iterations: 0,
    durationMs: 0,
  };

  for (const ev of events) {
    if (!summary.runIds.includes(ev.runId)) summary.runIds.push(ev.runId);
    switch (ev.event) {
      case "session_created":
        summary.sessions++;
        break;
      case "block_queued":
        summary.blocks++;
        break;
      case "run_start":
        summary.runs++;
        break;
      case "run_end": {
        const iterations = ev.data?.["iterations"];
        const duration = ev.data?.["durationMs"];
        if (typeof iterations === "number") summary.iterations += iterations;
        if (typeof duration === "number") summary.durationMs += duration;
        if (ev.data?.["success"] === false) summary.failures++;
        break;
      }
      // Runtime failures are already counted by their run_end.
      case "block_failed":
        if (ev.data?.["stage"] === "compile") summary.failures++;
        break;
      case "host_call": {
        const name = hostCallName(ev.data);
        summary.hostCalls++;
        summary.hostCallsByName[name] = (summary.hostCallsByName[name] ?? 0) + 1;
        break;
      }
      case "limit_exceeded":
        summary.limitsExceeded++;
        break;
    }
  }
  return summary;
}

export async function runTrace(file: string, opts: { json?: boolean }): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    console.error(`Error reading trace file: ${errorMessage(e)}`);
    return 4;
  }

  const events = content
    .split("\n")
    .filter((l) => l.trim())
    .map(parseLine)
    .filter((ev): ev is TraceLine => ev !== null);

  if (events.length === 0) {
    console.error("No valid trace events found.");
    return 4;
  }

  const summary = summarize(events);
  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log(`Trace Summary`);
  console.log(`  Runs:             ${summary.runs}`);
  console.log(`  Blocks queued:    ${summary.blocks}`);
  console.log(`  Total events:     ${summary.totalEvents}`);
  console.log(`  Host calls:       ${summary.hostCalls}`);
  const names = Object.entries(summary.hostCallsByName);
  if (names.length > 0) {
    console.log(`  Calls by name:`);
    for (const [name, count] of names) {
      console.log(`    ${name}: ${count}`);
    }
  }
  console.log(`  Failures:         ${summary.failures}`);
  console.log(`  Limits exceeded:  ${summary.limitsExceeded}`);
  console.log(`  Iterations:       ${summary.iterations}`);
  console.log(`  Duration:         ${summary.durationMs}ms`);
  return 0;
}
