import { describe, test, expect } from "vitest";

import { DiagnosticsSink, type SinkEffect } from "../../src/diagnostics/sink.js";
import { stableHash } from "../../src/memo/hash.js";
import { MemoStore, memoize } from "../../src/memo/store.js";
import type { TrackedInput } from "../../src/memo/tracked.js";
import type { CompilerDiagnostic } from "../../src/model/diagnostics.js";

/** Named integers read through the store, like a tiny World. */
class Cells implements TrackedInput {
  readonly #values = new Map<string, number>();

  constructor(readonly store: MemoStore) {}

  set(name: string, value: number): void {
    this.#values.set(name, value);
  }

  get(name: string): number {
    const value = this.#values.get(name) ?? 0;
    this.store.record(this, "get", [name], String(value));
    return value;
  }

  validate(_method: string, args: readonly unknown[]): string {
    return String(this.#values.get(String(args[0])) ?? 0);
  }

  reissue(_method: string, args: readonly unknown[]): void {
    this.get(String(args[0]));
  }
}

function warning(message: string): CompilerDiagnostic {
  return { code: "quillset/layout/overflow", message, stage: "layout", severity: "warning", span: null };
}

describe("memoize", () => {
  test("equal keys reuse the first result", () => {
    const store = new MemoStore();
    let calls = 0;
    const square = memoize<[number], number>("square", {
      store: () => store,
      key: (n: number) => n,
      compute: (n: number) => {
        calls++;
        return n * n;
      },
    });
    expect([square(3), square(3), square(4)]).toEqual([9, 9, 16]);
    expect(calls).toBe(2);
    expect(store.stats().byFunction["square"]).toEqual({ hits: 1, misses: 2, entries: 2 });
  });

  test("a changed tracked input invalidates the entry", () => {
    const store = new MemoStore();
    const cells = new Cells(store);
    let calls = 0;
    const read = memoize<[Cells, string], number>("read", {
      store: () => store,
      key: (_cells: Cells, name: string) => name,
      inputs: (cells: Cells) => ({ cells }),
      compute: (cells: Cells, name: string) => {
        calls++;
        return cells.get(name) + 1;
      },
    });
    cells.set("a", 1);
    expect(read(cells, "a")).toBe(2);
    cells.set("b", 9);
    expect(read(cells, "a")).toBe(2);
    expect(calls).toBe(1);
    cells.set("a", 5);
    expect(read(cells, "a")).toBe(6);
    expect(calls).toBe(2);
  });

  test("an outer entry depends on what nested calls read", () => {
    const store = new MemoStore();
    const cells = new Cells(store);
    let outerCalls = 0;
    const inner = memoize<[Cells], number>("inner", {
      store: () => store,
      key: () => "inner",
      inputs: (cells: Cells) => ({ cells }),
      compute: (cells: Cells) => cells.get("x"),
    });
    const outer = memoize<[Cells], number>("outer", {
      store: () => store,
      key: () => "outer",
      inputs: (cells: Cells) => ({ cells }),
      compute: (cells: Cells) => {
        outerCalls++;
        return inner(cells) * 10;
      },
    });
    cells.set("x", 2);
    expect(outer(cells)).toBe(20);
    expect(outer(cells)).toBe(20);
    expect(outerCalls).toBe(1);
    cells.set("x", 3);
    expect(outer(cells)).toBe(30);
    expect(outerCalls).toBe(2);
  });

  test("throwing computations are not cached", () => {
    const store = new MemoStore();
    let calls = 0;
    const flaky = memoize("flaky", {
      store: () => store,
      key: () => "k",
      compute: () => {
        calls++;
        if (calls === 1) throw new Error("first call fails");
        return calls;
      },
    });
    expect(() => flaky()).toThrow("first call fails");
    expect(flaky()).toBe(2);
    expect(flaky()).toBe(2);
    expect(store.stats().byFunction["flaky"]).toEqual({ hits: 1, misses: 2, entries: 1 });
  });

  test("sink writes made by a computation are replayed on a hit", () => {
    const store = new MemoStore();
    const warnOnce = memoize<[DiagnosticsSink, string], number, SinkEffect>("warnOnce", {
      store: () => store,
      key: (_sink, message) => message,
      effects: (sink) => sink,
      compute: (sink, message) => {
        sink.warn(warning(message));
        return message.length;
      },
    });
    const first = new DiagnosticsSink();
    warnOnce(first, "too wide");
    const second = new DiagnosticsSink();
    expect(warnOnce(second, "too wide")).toBe(8);
    expect(second.warnings.map((d) => d.message)).toEqual(["too wide"]);
    expect(store.stats().hits).toBe(1);
  });

  test("replayed writes are moved onto the anchor of the call that hit", () => {
    const store = new MemoStore();
    const warnAt = memoize<[DiagnosticsSink, string, number], number, SinkEffect, number>("warnAt", {
      store: () => store,
      key: (_sink, message) => message,
      effects: (sink) => sink,
      anchor: {
        of: (_sink, _message, at) => at,
        move: (effect, from, to) =>
          effect.kind === "warn" && effect.diagnostic.span
            ? {
                kind: "warn",
                diagnostic: {
                  ...effect.diagnostic,
                  span: { start: effect.diagnostic.span.start - from + to, end: effect.diagnostic.span.end - from + to },
                },
              }
            : effect,
      },
      compute: (sink, message, at) => {
        sink.warn({ ...warning(message), span: { start: at + 2, end: at + 4 } });
        return message.length;
      },
    });
    warnAt(new DiagnosticsSink(), "too wide", 10);
    const second = new DiagnosticsSink();
    warnAt(second, "too wide", 50);
    expect(second.warnings.map((d) => [d.span?.start, d.span?.end])).toEqual([[52, 54]]);
    expect(store.stats().hits).toBe(1);
  });

  test("a disabled store always computes", () => {
    const store = new MemoStore({ enabled: false });
    let calls = 0;
    const count = memoize("count", {
      store: () => store,
      key: () => "k",
      compute: () => ++calls,
    });
    expect([count(), count()]).toEqual([1, 2]);
    expect(store.stats().entries).toBe(0);
  });
});

describe("MemoStore", () => {
  function populated(): { store: MemoStore; call: (n: number) => number } {
    const store = new MemoStore();
    const call = memoize<[number], number>("identity", { store: () => store, key: (n: number) => n, compute: (n: number) => n });
    call(1);
    call(2);
    return { store, call };
  }

  test("evict drops entries unused for more than the given age", () => {
    const { store, call } = populated();
    store.evict(1);
    expect(store.stats().entries).toBe(2);
    call(1);
    store.evict(1);
    expect(store.stats().entries).toBe(1);
  });

  test("clear resets entries and counters of the named functions", () => {
    const { store } = populated();
    store.clear(["identity"]);
    expect(store.stats()).toEqual({ hits: 0, misses: 0, entries: 0, byFunction: { identity: { hits: 0, misses: 0, entries: 0 } } });
  });
});

describe("stableHash", () => {
  test("ignores object key order", () => {
    expect(stableHash({ a: 1, b: [2, 3] })).toBe(stableHash({ b: [2, 3], a: 1 }));
  });

  test("distinguishes maps by content", () => {
    expect(stableHash(new Map([["k", 1]]))).toBe(stableHash(new Map([["k", 1]])));
    expect(stableHash(new Map([["k", 1]]))).not.toBe(stableHash(new Map([["k", 2]])));
  });

  test("hashes hashable values by their fingerprint", () => {
    const a = { fingerprint: () => "same", extra: 1 };
    const b = { fingerprint: () => "same", extra: 2 };
    expect(stableHash(a)).toBe(stableHash(b));
  });
});

describe("DiagnosticsSink", () => {
  test("deduplicates warnings with the same code, span and message", () => {
    const sink = new DiagnosticsSink();
    sink.warn(warning("overfull"));
    sink.warn(warning("overfull"));
    sink.warn(warning("other"));
    expect(sink.warnings.map((d) => d.message)).toEqual(["overfull", "other"]);
    expect(sink.count("layout")).toBe(2);
  });

  test("ignores empty delays", () => {
    const sink = new DiagnosticsSink();
    const effects: SinkEffect[] = [];
    sink.observe((effect) => effects.push(effect));
    sink.delay([]);
    expect(effects).toEqual([]);
    expect(sink.delayed).toEqual([]);
  });
});
