/**
 * Tests for uis check command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runCheck } from "./cmd-check.js";
import type { CheckOptions } from "./cmd-check.js";

async function captureCheck(
  source: string,
  opts: CheckOptions = {}
): Promise<{ code: number; stdout: string; stderr: string; file: string }> {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "uis-cli-check-"));
  const file = path.join(tmpDir, "input.txt");
  fs.writeFileSync(file, source, "utf-8");

  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runCheck(file, { cwd: tmpDir, homeDir: tmpDir, ...opts });
    return { code, stdout: out.join("\n"), stderr: err.join("\n"), file };
  } finally {
    console.log = origLog;
    console.error = origError;
    fs.rmSync(tmpDir, { recursive: true, force: true });
  }
}

describe("uis check", () => {
  it("prints a JSON summary when every block compiles", async () => {
    const result = await captureCheck("Hi #UI{ var x = 1 } there #UI{ x = x + 1 }");
    assert.equal(result.code, 0);
    assert.equal(result.stderr, "");
    assert.equal(result.stdout, '{"ok":true,"blocks":2}');
  });

  it("prints a human-readable summary with --pretty", async () => {
    const result = await captureCheck("#UI{ var x = 1 }", { pretty: true });
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "No errors found in 1 block(s).");
  });

  it("reports diagnostics with file positions and exits 2", async () => {
    const result = await captureCheck("#UI{ 1 = 2 }");
    assert.equal(result.code, 2);
    assert.equal(result.stdout, "");
    const diags: Array<{ code: string; span?: unknown }> = JSON.parse(result.stderr);
    assert.equal(diags.length, 1);
    assert.equal(diags[0].code, "E_ASSIGN_TARGET");
    assert.deepEqual(diags[0].span, { line: 1, column: 8, file: result.file });
  });

  it("reads bare script text with --script", async () => {
    const asScript = await captureCheck("var a = 1 return a", { script: true });
    assert.equal(asScript.stdout, '{"ok":true,"blocks":1}');
    const asText = await captureCheck("var a = 1 return a");
    assert.equal(asText.stdout, '{"ok":true,"blocks":0}');
  });

  it("honours a project sentinel", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "uis-cli-check-sentinel-"));
    fs.writeFileSync(path.join(tmpDir, ".uiscript.json"), JSON.stringify({ version: 1, sentinel: "@ui{" }));
    try {
      const result = await captureCheck("@ui{ var a = 1 } #UI{ var b = 2 }", { cwd: tmpDir, homeDir: tmpDir });
      assert.equal(result.stdout, '{"ok":true,"blocks":1}');
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("returns exit code 4 with E_IO on file read failure", async () => {
    const missing = path.join(os.tmpdir(), `uis-missing-check-${Date.now()}.txt`);
    const err: string[] = [];
    const origError = console.error;
    console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));
    try {
      assert.equal(await runCheck(missing, {}), 4);
    } finally {
      console.error = origError;
    }
    assert.ok(err.join("\n").startsWith('{"code":"E_IO","message":"Error reading file: '));
  });
});
