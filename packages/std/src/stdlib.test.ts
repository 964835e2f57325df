/**
 * Tests for uiscript standard library functions.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { IntrinsicRegistry, VMContext, VirtualMachine, compile, hostHandle, parseScript } from "@uiscript/core";
import type { Value } from "@uiscript/core";
import { getStdlibFns, registerStdlib, roundHalfEven } from "./index.js";
import type { StdlibOptions } from "./index.js";

function call(name: string, args: Value[], options: StdlibOptions = {}, ctx = new VMContext()): Value {
  const fn = getStdlibFns(options).get(name);
  assert.ok(fn, `missing ${name}`);
  return fn.execute(args, ctx);
}

describe("math functions", () => {
  it("floors, ceils and takes absolute values", () => {
    assert.equal(call("floor", [3.7]), 3);
    assert.equal(call("floor", [-3.2]), -4);
    assert.equal(call("ceil", [3.2]), 4);
    assert.equal(call("abs", [-2.5]), 2.5);
  });

  it("rounds halves to even", () => {
    assert.equal(roundHalfEven(2.5), 2);
    assert.equal(roundHalfEven(3.5), 4);
    assert.equal(roundHalfEven(-2.5), -2);
    assert.equal(roundHalfEven(-3.5), -4);
    assert.equal(call("round", [2.4]), 2);
    assert.equal(call("round", [2.6]), 3);
  });

  it("returns 0 when arguments are missing", () => {
    for (const name of ["floor", "ceil", "round", "abs", "sin", "cos"]) {
      assert.equal(call(name, []), 0, name);
    }
    assert.equal(call("min", [1]), 0);
    assert.equal(call("randomRange", [1]), 0);
  });

  it("picks the smaller and larger of two values", () => {
    assert.equal(call("min", [4, 2]), 2);
    assert.equal(call("max", [4, "9"]), 9);
  });

  it("computes trigonometry in radians", () => {
    assert.equal(call("sin", [0]), 0);
    assert.equal(call("cos", [0]), 1);
  });

  it("draws from the injected random source", () => {
    const options = { random: () => 0.25 };
    assert.equal(call("random", [], options), 0.25);
    assert.equal(call("randomRange", [10, 20], options), 12.5);
  });
});

describe("conversion functions", () => {
  it("converts to numbers", () => {
    assert.equal(call("toNumber", ["12.5"]), 12.5);
    assert.equal(call("toNumber", ["twelve"]), 0);
    assert.equal(call("toNumber", []), 0);
  });

  it("converts to strings", () => {
    assert.equal(call("toString", [3]), "3");
    assert.equal(call("toString", [null]), "null");
    assert.equal(call("toString", [hostHandle("Sound", "beep")]), "beep");
    assert.equal(call("toString", []), "");
  });
});

describe("context functions", () => {
  it("checks whether a name is bound", () => {
    const ctx = new VMContext();
    ctx.setVariable("score", 3);
    ctx.setGlobal("Canvas", hostHandle("Canvas", "Canvas"));
    assert.equal(call("hasInContext", ["score"], {}, ctx), true);
    assert.equal(call("hasInContext", ["Canvas"], {}, ctx), true);
    assert.equal(call("hasInContext", ["missing"], {}, ctx), false);
    assert.equal(call("hasInContext", [], {}, ctx), false);
  });

  it("names value types", () => {
    assert.equal(call("typeof", [1]), "number");
    assert.equal(call("typeof", ["a"]), "string");
    assert.equal(call("typeof", [true]), "boolean");
    assert.equal(call("typeof", []), "null");
    assert.equal(call("typeof", [hostHandle("Canvas", "Canvas")]), "handle");
  });

  it("prints to the sink, or nowhere", () => {
    const lines: string[] = [];
    assert.equal(call("print", ["score", 3, null], { print: (l) => lines.push(l) }), null);
    assert.deepEqual(lines, ["score 3 null"]);
    assert.equal(call("print", ["quiet"]), null);
  });
});

describe("registerStdlib", () => {
  it("makes every function callable from scripts", () => {
    const lines: string[] = [];
    const registry = registerStdlib(new IntrinsicRegistry(), { print: (l) => lines.push(l) });
    const { program } = parseScript('var a = floor(3.7) var t = typeof(a) print("a is " + a, t) return round(2.5)');
    const ctx = new VMContext();
    const result = new VirtualMachine(registry).execute(compile(program), ctx);
    assert.deepEqual(result, { success: true, returnValue: 2 });
    assert.equal(ctx.getVariable("a"), 3);
    assert.deepEqual(lines, ["a is 3 number"]);
  });

  it("registers functions case-insensitively", () => {
    const registry = registerStdlib(new IntrinsicRegistry());
    assert.equal(registry.hasFunction("TONUMBER"), true);
    assert.equal(registry.functionNames().length, 15);
  });
});
