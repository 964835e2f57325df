/**
 * Tests for the uis strip, disasm and config commands.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runConfig } from "./cmd-config.js";
import { runDisasm } from "./cmd-disasm.js";
import { runStrip } from "./cmd-strip.js";

async function captureCmd(
  fn: () => Promise<number>
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await fn();
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

function tmpFile(source: string): { dir: string; file: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "uis-cli-inspect-"));
  const file = path.join(dir, "input.txt");
  fs.writeFileSync(file, source, "utf-8");
  return { dir, file, cleanup: () => fs.rmSync(dir, { recursive: true, force: true }) };
}

describe("uis strip", () => {
  it("prints the text with blocks removed", async () => {
    const { dir, file, cleanup } = tmpFile('  Score: #UI{ var s = "}" } done #UI{ s = 1 }  ');
    try {
      const result = await captureCmd(() => runStrip(file, { cwd: dir, homeDir: dir }));
      assert.equal(result.code, 0);
      assert.equal(result.stdout, "Score:  done");
    } finally {
      cleanup();
    }
  });

  it("returns exit code 4 on file read failure", async () => {
    const result = await captureCmd(() => runStrip(path.join(os.tmpdir(), `uis-missing-strip-${Date.now()}.txt`)));
    assert.equal(result.code, 4);
    assert.ok(result.stderr.startsWith('{"code":"E_IO"'));
  });
});

describe("uis disasm", () => {
  it("lists the bytecode of bare script text", async () => {
    const { dir, file, cleanup } = tmpFile("var x = 1");
    try {
      const result = await captureCmd(() => runDisasm(file, { script: true, cwd: dir, homeDir: dir }));
      assert.equal(result.code, 0);
      assert.equal(
        result.stdout,
        [
          "; block 1: 7 bytes, 1 constants, 1 names",
          "0000  PUSH_CONST 0  ; 1",
          "0003  STORE_VAR 0  ; x",
          "0006  HALT",
        ].join("\n")
      );
    } finally {
      cleanup();
    }
  });

  it("numbers blocks and exits 2 on diagnostics", async () => {
    const { dir, file, cleanup } = tmpFile("#UI{ var x } text #UI{ 1 = 2 }");
    try {
      const result = await captureCmd(() => runDisasm(file, { cwd: dir, homeDir: dir }));
      assert.equal(result.code, 2);
      assert.equal(
        result.stdout,
        [
          "; block 1: 5 bytes, 0 constants, 1 names",
          "0000  PUSH_NULL",
          "0001  STORE_VAR 0  ; x",
          "0004  HALT",
          "; block 2: 1 bytes, 0 constants, 0 names",
          "0000  HALT",
        ].join("\n")
      );
      const diags: Array<{ code: string }> = JSON.parse(result.stderr);
      assert.equal(diags[0].code, "E_ASSIGN_TARGET");
    } finally {
      cleanup();
    }
  });
});

describe("uis config", () => {
  it("reports defaults when no config file exists", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "uis-cli-config-"));
    try {
      const result = await captureCmd(() => runConfig({ json: true, cwd: dir, homeDir: dir }));
      assert.equal(result.code, 0);
      assert.deepEqual(JSON.parse(result.stdout), {
        source: "default",
        path: null,
        config: {
          version: 1,
          enabled: true,
          sentinel: "#UI{",
          limits: {
            maxVariables: 100,
            maxStringLength: 102400,
            maxIterations: 40000,
            maxExecutionMs: 500,
            maxStackSize: 1024,
            timeCheckInterval: 1000,
          },
        },
      });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("falls back to the user config when the project config is invalid", async () => {
    const projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "uis-cli-config-project-"));
    const fakeHome = fs.mkdtempSync(path.join(os.tmpdir(), "uis-cli-config-home-"));
    const userPath = path.join(fakeHome, ".uiscript", "config.json");
    fs.mkdirSync(path.dirname(userPath), { recursive: true });
    fs.writeFileSync(path.join(projectDir, ".uiscript.json"), JSON.stringify({ limits: { maxIterations: -1 } }));
    fs.writeFileSync(userPath, JSON.stringify({ version: 1, enabled: false, limits: { maxIterations: 9 } }));

    try {
      const result = await captureCmd(() => runConfig({ cwd: projectDir, homeDir: fakeHome }));
      assert.equal(result.code, 0);
      const lines = result.stdout.split("\n");
      assert.equal(lines[0], "Effective uiscript configuration");
      assert.equal(lines[1], "  Source:    user");
      assert.equal(lines[2], `  Path:      ${userPath}`);
      assert.equal(lines[3], "  Enabled:   false");
      assert.equal(lines[4], "  Sentinel:  #UI{");
      assert.ok(lines.includes("    maxIterations      9"));
    } finally {
      fs.rmSync(projectDir, { recursive: true, force: true });
      fs.rmSync(fakeHome, { recursive: true, force: true });
    }
  });
});
