/**
 * Tests for the Canvas host object and the recording surface.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { IntrinsicRegistry, VMContext, VirtualMachine, compile, parseScript } from "@uiscript/core";
import type { VMResult } from "@uiscript/core";
import { DEFAULT_MAX_FRAMES, RecordingSurface, attachCanvas, createCanvasObject } from "./canvas.js";
import type { CanvasOptions } from "./canvas.js";

function harness(options: CanvasOptions = {}, surface: RecordingSurface | null = new RecordingSurface()) {
  const registry = new IntrinsicRegistry().registerObject(createCanvasObject(options)).freeze();
  const ctx = new VMContext();
  registry.installGlobals(ctx);
  if (surface) attachCanvas(ctx, surface);
  const vm = new VirtualMachine(registry);
  const run = (src: string): VMResult => {
    const { program, diagnostics } = parseScript(src);
    assert.deepEqual(diagnostics, []);
    return vm.execute(compile(program), ctx);
  };
  return { run, surface };
}

describe("RecordingSurface", () => {
  it("defaults to 320x240 and clamps sizes", () => {
    const surface = new RecordingSurface();
    assert.equal(surface.width, 320);
    assert.equal(surface.height, 240);
    surface.setSize(0, 99999);
    assert.equal(surface.width, 1);
    assert.equal(surface.height, 4096);
  });

  it("captures the display list on render and restarts it on clear", () => {
    const surface = new RecordingSurface();
    surface.setPixel(1, 2, { r: 255, g: 0, b: 0, a: 255 });
    surface.render();
    surface.clear({ r: 0, g: 0, b: 0, a: 255 });
    surface.render();
    assert.deepEqual(surface.frames, [
      [{ op: "pixel", x: 1, y: 2, color: "#ff0000ff" }],
      [{ op: "clear", color: "#000000ff" }],
    ]);
    assert.deepEqual(surface.snapshot().pending, [{ op: "clear", color: "#000000ff" }]);
  });

  it("keeps only the most recent frames", () => {
    const surface = new RecordingSurface(320, 240, { maxFrames: 2 });
    const red = { r: 255, g: 0, b: 0, a: 255 };
    for (let x = 0; x < 5; x++) {
      surface.clear(red);
      surface.setPixel(x, 0, red);
      surface.render();
    }
    assert.deepEqual(
      surface.frames.map((frame) => frame[1]),
      [
        { op: "pixel", x: 3, y: 0, color: "#ff0000ff" },
        { op: "pixel", x: 4, y: 0, color: "#ff0000ff" },
      ]
    );
  });

  it("caps frames at the default when rendering every tick", () => {
    const surface = new RecordingSurface();
    for (let i = 0; i < 1000; i++) surface.render();
    assert.equal(surface.frames.length, DEFAULT_MAX_FRAMES);
  });

  it("drops the oldest pending commands past the command cap", () => {
    const surface = new RecordingSurface(320, 240, { maxCommands: 3 });
    const white = { r: 255, g: 255, b: 255, a: 255 };
    for (let x = 0; x < 5; x++) surface.setPixel(x, 0, white);
    assert.deepEqual(
      surface.pending.map((command) => (command.op === "pixel" ? command.x : -1)),
      [2, 3, 4]
    );
  });
});

describe("Canvas object", () => {
  it("records drawing calls", () => {
    const { run, surface } = harness();
    const result = run(
      'Canvas.show() Canvas.setTitle("demo") Canvas.clear() ' +
        'Canvas.fillRect("blue", 1, 2, 30, 40) Canvas.drawCircle("#fff", 10, 10, 5) ' +
        'Canvas.drawText("white", 5, 6, "hi") Canvas.render()'
    );
    assert.deepEqual(result, { success: true, returnValue: null });
    assert.ok(surface);
    assert.equal(surface.visible, true);
    assert.equal(surface.title, "demo");
    assert.deepEqual(surface.frames, [
      [
        { op: "clear", color: "#000000ff" },
        { op: "rect", x: 1, y: 2, width: 30, height: 40, color: "#0000ffff", fill: true },
        { op: "circle", x: 10, y: 10, radius: 5, color: "#ffffffff", fill: false },
        { op: "text", x: 5, y: 6, text: "hi", size: 12, color: "#ffffffff" },
      ],
    ]);
  });

  it("exposes getters and the title setter", () => {
    const { run } = harness();
    assert.deepEqual(run("return Canvas.width"), { success: true, returnValue: 320 });
    assert.deepEqual(run("return Canvas.visible"), { success: true, returnValue: false });
    assert.deepEqual(run('Canvas.title = "score" return Canvas.title'), { success: true, returnValue: "score" });
  });

  it("rate limits setSize", () => {
    let now = 0;
    const { run, surface } = harness({ clock: () => now });
    assert.deepEqual(run("return Canvas.setSize(640, 480)"), { success: true, returnValue: true });
    now = 9_999;
    assert.deepEqual(run("return Canvas.setSize(100, 100)"), { success: true, returnValue: false });
    assert.equal(surface?.width, 640);
    now = 10_000;
    assert.deepEqual(run("return Canvas.setSize(100, 50)"), { success: true, returnValue: true });
    assert.equal(surface?.height, 50);
  });

  it("does nothing without a surface", () => {
    const { run } = harness({}, null);
    assert.deepEqual(run('Canvas.clear("red") return Canvas.width'), { success: true, returnValue: 0 });
    assert.deepEqual(run("return Canvas.setSize(10, 10)"), { success: true, returnValue: false });
  });

  it("rejects bad arguments", () => {
    const { run } = harness();
    assert.deepEqual(run('Canvas.clear("mauve")'), {
      success: false,
      error: "Invalid arguments for Canvas.clear: color: Unknown colour 'mauve'",
      code: "E_HOST_ARGS",
    });
    assert.deepEqual(run('Canvas.drawLine("red", 0, 0)'), {
      success: false,
      error: "Invalid arguments for Canvas.drawLine: x2: Required; y2: Required",
      code: "E_HOST_ARGS",
    });
  });
});
