/**
 * Tests for Sound, SoundInstance and the sound bank.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { IntrinsicRegistry, VMContext, VirtualMachine, compile, parseScript } from "@uiscript/core";
import type { VMResult } from "@uiscript/core";
import { MAX_NOTES, Sound, SoundBank, attachSoundBank, createSoundInstanceObject, createSoundObject } from "./sound.js";

function harness(bank = new SoundBank()) {
  const registry = new IntrinsicRegistry()
    .registerObject(createSoundObject())
    .registerObject(createSoundInstanceObject())
    .freeze();
  const ctx = new VMContext();
  registry.installGlobals(ctx);
  attachSoundBank(ctx, bank);
  const vm = new VirtualMachine(registry);
  const run = (src: string): VMResult => {
    const { program, diagnostics } = parseScript(src);
    assert.deepEqual(diagnostics, []);
    return vm.execute(compile(program), ctx);
  };
  return { run, bank, ctx };
}

describe("Sound", () => {
  it("clamps note fields", () => {
    const sound = new Sound("s");
    sound.addNote(200.7, 20, 2);
    sound.addNote(-5, 0, -1);
    assert.deepEqual(sound.notes, [
      { pitch: 127, duration: 10, velocity: 1 },
      { pitch: 0, duration: 0.001, velocity: 0 },
    ]);
  });

  it("ignores notes beyond the cap", () => {
    const sound = new Sound("s");
    for (let i = 0; i < MAX_NOTES; i++) sound.addNote(60, 0.1, 0.5);
    assert.equal(sound.addNote(61, 0.1, 0.5), false);
    assert.equal(sound.noteCount, MAX_NOTES);
  });

  it("plays only when it has notes", () => {
    const sound = new Sound("s");
    sound.play();
    assert.equal(sound.playing, false);
    sound.addNote(60, 1, 1);
    sound.play();
    assert.equal(sound.playing, true);
    sound.clear();
    assert.equal(sound.playing, false);
    assert.equal(sound.noteCount, 0);
  });
});

describe("SoundBank", () => {
  it("matches names case-insensitively", () => {
    const bank = new SoundBank();
    const beep = bank.create("Beep");
    assert.equal(bank.create("BEEP"), beep);
    assert.equal(bank.has("beep"), true);
    assert.deepEqual(bank.names(), ["Beep"]);
  });

  it("refuses new sounds at capacity", () => {
    const bank = new SoundBank(1);
    assert.ok(bank.create("a"));
    assert.equal(bank.create("b"), null);
    assert.equal(bank.destroy("A"), true);
    assert.equal(bank.destroy("a"), false);
    assert.equal(bank.size, 0);
  });
});

describe("Sound objects", () => {
  it("builds a sequence through an instance handle", () => {
    const { run, bank } = harness();
    const result = run(
      'var s = Sound.create("Beep") s.addNote(60, 0.5) s.addNote(64, 0.25, 0.9) s.setLoop(true) s.play() return s.noteCount'
    );
    assert.deepEqual(result, { success: true, returnValue: 2 });
    const sound = bank.get("beep");
    assert.ok(sound);
    assert.deepEqual(sound.notes, [
      { pitch: 60, duration: 0.5, velocity: 0.7 },
      { pitch: 64, duration: 0.25, velocity: 0.9 },
    ]);
    assert.equal(sound.loop, true);
    assert.equal(sound.playing, true);
    assert.deepEqual(run("return s.isPlaying"), { success: true, returnValue: true });
    assert.deepEqual(run('return Sound.exists("BEEP")'), { success: true, returnValue: true });
  });

  it("returns null from create at the cap", () => {
    const { run } = harness(new SoundBank(1));
    assert.deepEqual(run('Sound.create("a") return Sound.create("b")'), { success: true, returnValue: null });
  });

  it("fails to get a sound that was never created", () => {
    const { run } = harness();
    assert.deepEqual(run('Sound.get("missing")'), {
      success: false,
      error: "Method 'Sound.get' failed: Sound 'missing' not found. Create it first with Sound.create().",
      code: "E_HOST",
    });
  });

  it("tolerates stop but not play on a destroyed sound", () => {
    const { run } = harness();
    assert.deepEqual(run('var s = Sound.create("a") Sound.destroy("a") s.stop() return s.isPlaying'), {
      success: true,
      returnValue: false,
    });
    assert.deepEqual(run("s.play()"), {
      success: false,
      error: "Method 'SoundInstance.play' failed: Sound 'a' no longer exists.",
      code: "E_HOST",
    });
  });

  it("validates note arguments", () => {
    const { run } = harness();
    assert.deepEqual(run('var s = Sound.create("a") s.addNote("high", 1)'), {
      success: false,
      error: "Invalid arguments for SoundInstance.addNote: pitch: Expected a number",
      code: "E_HOST_ARGS",
    });
  });
});
