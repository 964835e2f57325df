/**
 * @uiscript/cli - CLI entry point re-exports
 */
export { runCheck } from "./cmd-check.js";
export type { CheckOptions } from "./cmd-check.js";
export { runConfig } from "./cmd-config.js";
export { runDisasm } from "./cmd-disasm.js";
export type { DisasmOptions } from "./cmd-disasm.js";
export { runHelp } from "./cmd-help.js";
export { runRun } from "./cmd-run.js";
export type { RunOptions } from "./cmd-run.js";
export { runStrip } from "./cmd-strip.js";
export { runTrace, summarize } from "./cmd-trace.js";
export type { TraceSummary } from "./cmd-trace.js";
