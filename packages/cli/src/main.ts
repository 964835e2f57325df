#!/usr/bin/env node
/**
 * uis - uiscript CLI
 */
import { createRequire } from "node:module";
import { Command } from "commander";
import { runCheck } from "./cmd-check.js";
import { runConfig } from "./cmd-config.js";
import { runDisasm } from "./cmd-disasm.js";
import { runHelp, QUICKREF } from "./cmd-help.js";
import { runRun } from "./cmd-run.js";
import { runStrip } from "./cmd-strip.js";
import { runTrace } from "./cmd-trace.js";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");

const program = new Command();

program
  .name("uis")
  .description("uiscript: run and inspect embedded UI script blocks")
  .version(pkg.version)
  .addHelpText("after", "\n" + QUICKREF);

program
  .command("run")
  .description("Run every block of a file in one session and print the remaining text")
  .argument("<file>", "Input file (or - for stdin)")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--canvas <path>", "Write the recorded canvas as JSON")
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, opts: { trace?: string; canvas?: string; pretty?: boolean }) => {
    const code = await runRun(file, opts);
    process.exit(code);
  });

program
  .command("check")
  .description("Lex, parse and compile every block without running it")
  .argument("<file>", "Input file (or - for stdin)")
  .option("--script", "Treat the file as bare script text", false)
  .option("--pretty", "Human-readable output", false)
  .action(async (file: string, opts: { script?: boolean; pretty?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("strip")
  .description("Print the file with every block removed")
  .argument("<file>", "Input file (or - for stdin)")
  .action(async (file: string) => {
    const code = await runStrip(file);
    process.exit(code);
  });

program
  .command("disasm")
  .description("Print the bytecode of every block")
  .argument("<file>", "Input file (or - for stdin)")
  .option("--script", "Treat the file as bare script text", false)
  .option("--pretty", "Human-readable diagnostics", false)
  .action(async (file: string, opts: { script?: boolean; pretty?: boolean }) => {
    const code = await runDisasm(file, opts);
    process.exit(code);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display the effective configuration and where it came from")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

program
  .command("help")
  .description("Language reference: run 'uis help <topic>' for details")
  .argument("[topic]", "Topic: syntax, values, stdlib, objects, limits")
  .action((topic: string | undefined) => {
    process.exitCode = runHelp(topic);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["run", "check", "strip", "disasm", "trace", "config", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(4);
});
