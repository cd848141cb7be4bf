import { afterEach, beforeEach, describe, test, expect } from "vitest";

import { configureDebug, debug, isDebugEnabled, refreshDebugChannels } from "../../src/shared/debug.js";

function setDebugEnv(value: string | undefined): void {
  if (value === undefined) delete process.env["QUILLSET_DEBUG"];
  else process.env["QUILLSET_DEBUG"] = value;
  refreshDebugChannels();
}

let previous: string | undefined;
let messages: string[];

beforeEach(() => {
  previous = process.env["QUILLSET_DEBUG"];
  messages = [];
  configureDebug({ format: "pretty", timestamps: false, output: (message) => messages.push(message) });
});

afterEach(() => {
  setDebugEnv(previous);
  configureDebug({ format: "pretty", timestamps: false, output: console.log });
});

describe("channel activation", () => {
  test("only the named channels log", () => {
    setDebugEnv("layout");
    debug.layout("page", { number: 1 });
    debug.memo("hit", { fn: "evalModule" });
    expect(messages).toEqual(["[layout.page] { number=1 }"]);
  });

  test("a comma separated list enables several channels", () => {
    setDebugEnv("eval, MEMO");
    expect([isDebugEnabled("eval"), isDebugEnabled("memo"), isDebugEnabled("layout")]).toEqual([true, true, false]);
  });

  test("a wildcard enables every channel", () => {
    setDebugEnv("*");
    debug.world("fs.read");
    debug.realize("ref");
    expect(messages).toEqual(["[world.fs.read]", "[realize.ref]"]);
  });

  test("zero and an unset variable disable everything", () => {
    setDebugEnv("0");
    expect(isDebugEnabled()).toBe(false);
    setDebugEnv(undefined);
    debug.eval("compile.done", { errors: 0 });
    expect(messages).toEqual([]);
  });
});

describe("pretty format", () => {
  beforeEach(() => setDebugEnv("layout"));

  test("empty data prints only the label", () => {
    debug.layout("block", {});
    expect(messages).toEqual(["[layout.block]"]);
  });

  test("long strings are shortened", () => {
    debug.layout("text", { run: "x".repeat(70) });
    expect(messages).toEqual([`[layout.text] { run="${"x".repeat(57)}..." }`]);
  });

  test("arrays, tagged objects and nested records", () => {
    debug.layout("mix", { few: [1, 2], many: [1, 2, 3, 4, 5], node: { kind: "text" }, box: { w: 1, inner: { h: 2 } } });
    expect(messages).toEqual(['[layout.mix] { few=[1, 2], many=[5 items], node=<text>, box={ w=1, inner={...} } }']);
  });

  test("wide records are split over several lines", () => {
    debug.layout("wide", { a: "x".repeat(50), b: "y".repeat(50) });
    expect(messages).toEqual([`[layout.wide] {\n  a="${"x".repeat(50)}",\n  b="${"y".repeat(50)}"\n}`]);
  });

  test("timestamps prefix the label", () => {
    configureDebug({ timestamps: true });
    debug.layout("page");
    expect(messages[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+Z\] \[layout\.page\]$/);
  });
});

describe("json format", () => {
  test("records carry channel, point and data", () => {
    setDebugEnv("memo");
    configureDebug({ format: "json" });
    debug.memo("hit", { fn: "layoutBlock" });
    debug.memo("evict");
    expect(messages.map((message): unknown => JSON.parse(message))).toEqual([
      { channel: "memo", point: "hit", data: { fn: "layoutBlock" } },
      { channel: "memo", point: "evict" },
    ]);
  });
});
