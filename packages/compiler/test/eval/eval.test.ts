import { describe, test, expect } from "vitest";

import { Content } from "../../src/content/content.js";
import { isSourceError } from "../../src/diagnostics/errors.js";
import { array, float, int, type Value } from "../../src/eval/value.js";
import type { CompilerDiagnostic } from "../../src/model/diagnostics.js";
import { compile, type CompileResult } from "../../src/compile.js";
import { compileText, evalMain, evalText, memoryWorld, testEngine } from "../_helpers/world.js";

function compileFiles(files: Record<string, string>): CompileResult {
  return compile(memoryWorld(files));
}

function valueOf(text: string, name: string): Value | undefined {
  return evalText(text).module.get(name);
}

function evalError(text: string): CompilerDiagnostic {
  try {
    evalText(text);
  } catch (error) {
    if (!isSourceError(error)) throw error;
    const [first] = error.diagnostics;
    if (!first) throw new Error("source error without diagnostics");
    return first;
  }
  throw new Error("evaluation succeeded");
}

describe("expressions", () => {
  test("integer arithmetic follows precedence", () => {
    expect(valueOf("#let x = 1 + 2 * 3", "x")).toEqual(int(7));
  });

  test("division always yields a float", () => {
    expect(valueOf("#let x = 7 / 2", "x")).toEqual(float(3.5));
  });

  test("strings concatenate and expose methods", () => {
    expect(valueOf('#let s = "ab" + "cd"', "s")).toBe("abcd");
    expect(valueOf('#let s = "quiet".upper()', "s")).toBe("QUIET");
    expect(valueOf('#let s = "a,b,c".split(",").join("-")', "s")).toBe("a-b-c");
  });

  test("arrays map through closures", () => {
    expect(valueOf("#let xs = (1, 2, 3).map(x => x * 2)", "xs")).toEqual(array([int(2), int(4), int(6)]));
  });

  test("calc functions keep integers integral", () => {
    expect(valueOf("#let p = calc.pow(2, 10)", "p")).toEqual(int(1024));
  });

  test("repr renders values as source", () => {
    expect(valueOf('#let r = repr((1, "a"))', "r")).toBe('(1, "a")');
    expect(valueOf("#let r = repr((1,))", "r")).toBe("(1,)");
  });

  test("content blocks evaluate to content", () => {
    const value = valueOf("#let c = [*hi* there]", "c");
    expect(value).toBeInstanceOf(Content);
    expect(value instanceof Content ? value.plainText() : null).toBe("hi there");
  });
});

describe("functions", () => {
  test("named parameters take defaults unless passed", () => {
    const text = "#let add(a, b: 1) = a + b\n#let x = add(2)\n#let y = add(2, b: 5)";
    const { module } = evalText(text);
    expect(module.get("x")).toEqual(int(3));
    expect(module.get("y")).toEqual(int(7));
  });

  test("closures capture their defining scope", () => {
    const text = "#let adder(n) = x => x + n\n#let add3 = adder(3)\n#let x = add3(4)";
    expect(valueOf(text, "x")).toEqual(int(7));
  });

  test("named functions can recurse", () => {
    const text = "#let fact(n) = if n <= 1 { 1 } else { n * fact(n - 1) }\n#let x = fact(5)";
    expect(valueOf(text, "x")).toEqual(int(120));
  });

  test("unbounded recursion stops at the call depth limit", () => {
    const { errors, document } = compileText("#let f(n) = f(n + 1)\n#f(0)", { limits: { maxCallDepth: 8 } });
    expect(document).toBeNull();
    expect(errors.map((error) => error.code)).toEqual(["quillset/eval/call-depth"]);
    expect(errors[0]?.data).toEqual({ limit: 8 });
  });
});

describe("control flow", () => {
  test("for loops assign to variables of the enclosing scope", () => {
    const text = "#let total = 0\n#for i in range(5) { total += i }";
    expect(valueOf(text, "total")).toEqual(int(10));
  });

  test("break leaves the loop", () => {
    const text = "#let found = none\n#for i in range(10) {\n  if i == 3 {\n    found = i\n    break\n  }\n}";
    expect(valueOf(text, "found")).toEqual(int(3));
  });

  test("an endless loop stops at the iteration limit", () => {
    const { errors } = compileText("#while true {}", { limits: { maxIterations: 50 } });
    expect(errors.map((error) => error.code)).toEqual(["quillset/eval/loop-limit"]);
    expect(errors[0]?.data).toEqual({ limit: 50 });
  });
});

describe("errors", () => {
  test("division by zero is an invalid operation", () => {
    const error = evalError("#let x = 1 / 0");
    expect(error.code).toBe("quillset/eval/invalid-operation");
    expect(error.message).toBe("cannot divide by zero");
  });

  test.each([
    ["#repr(calc.pow(10, 400))"],
    ["#repr(calc.pow(2, 62) * 8)"],
    ["#let x = 9007199254740991 + 1"],
    ["#let x = 4000000000 * 4000000000"],
    ["#let x = -9007199254740991 - 2"],
  ])("integer arithmetic past the exact range is an error: %s", (source) => {
    const error = evalError(source);
    expect([error.code, error.message]).toEqual(["quillset/eval/invalid-operation", "the result is too large"]);
  });

  test("float arithmetic may exceed the integer range", () => {
    expect(valueOf("#let x = 4000000000.0 * 4000000000", "x")).toEqual(float(16e18));
  });

  test("unknown variables name the missing binding", () => {
    const error = evalError("#let x = nothing + 1");
    expect(error.code).toBe("quillset/eval/unknown-variable");
    expect(error.data).toEqual({ name: "nothing" });
    expect(error.span?.start).toBe(9);
  });

  test("a failed assertion is fatal", () => {
    const { errors } = compileText('#assert.eq(1, 2, message: "not equal")');
    expect(errors.map((error) => [error.code, error.message])).toEqual([["quillset/eval/assert", "not equal"]]);
  });

  test("parse errors are reported together before evaluation", () => {
    const { errors } = compileText("#let = 1\n*open");
    expect(errors.length).toBeGreaterThan(1);
    expect(new Set(errors.map((error) => error.code))).toEqual(new Set(["quillset/parse/syntax"]));
  });
});

describe("modules", () => {
  test("imports bring selected bindings into scope", () => {
    const world = memoryWorld({
      "/main.quill": '#import "lib/greet.quill": greet\n#let g = greet("bob")',
      "/lib/greet.quill": '#let greet(name) = "hi " + name',
    });
    const module = evalMain(testEngine(world));
    expect(module.get("g")).toBe("hi bob");
  });

  test("a module import binds the module under its file stem", () => {
    const world = memoryWorld({
      "/main.quill": '#import "util.quill"\n#let x = util.double(4)',
      "/util.quill": "#let double(n) = n * 2",
    });
    expect(evalMain(testEngine(world)).get("x")).toEqual(int(8));
  });

  test("importing a name the module does not define fails", () => {
    const { errors } = compileFiles({
      "/main.quill": '#import "util.quill": missing',
      "/util.quill": "#let present = 1",
    });
    expect(errors.map((error) => [error.code, error.data])).toEqual([
      ["quillset/eval/import-missing", { name: "missing" }],
    ]);
  });

  test("an error inside an imported file carries the import in its trace", () => {
    const { errors } = compileFiles({
      "/main.quill": '#import "broken.quill"',
      "/broken.quill": "#let x = missing_name",
    });
    const [error] = errors;
    expect(error?.code).toBe("quillset/eval/unknown-variable");
    expect(error?.span?.file).toBe("/broken.quill");
    expect(error?.trace?.map((point) => [point.kind, point.target])).toEqual([["import", "/broken.quill"]]);
  });

  test("an import renamed to its own name warns, and the warning outlives a later error", () => {
    const { errors, warnings } = compileFiles({
      "/main.quill": '#import "util.quill" as util\n#let x = util.one / 0',
      "/util.quill": "#let one = 1",
    });
    expect(warnings.map((warning) => [warning.code, warning.message, warning.data, warning.span?.file])).toEqual([
      ["quillset/eval/unnecessary-alias", "unnecessary import rename to same name", { name: "util" }, "/main.quill"],
    ]);
    expect(errors.map((error) => error.code)).toEqual(["quillset/eval/invalid-operation"]);
  });

  test("an import renamed to another name does not warn", () => {
    const { errors, warnings } = compileFiles({
      "/main.quill": '#import "util.quill" as u\n#u.one',
      "/util.quill": "#let one = 1",
    });
    expect([errors, warnings]).toEqual([[], []]);
  });

  test("a missing file is reported at the import", () => {
    const { errors } = compileFiles({ "/main.quill": '#import "gone.quill"' });
    expect(errors.map((error) => [error.code, error.data])).toEqual([
      ["quillset/world/file-not-found", { path: "/gone.quill" }],
    ]);
  });
});
