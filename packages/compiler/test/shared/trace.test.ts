import { describe, test, expect } from "vitest";

import { createCollectingExporter, createConsoleExporter } from "../../src/shared/trace-exporters.js";
import { NOOP_SPAN, NOOP_TRACE, createTrace, formatDuration } from "../../src/shared/trace.js";

describe("createTrace", () => {
  test("the root span takes the trace name and id", () => {
    const trace = createTrace({ name: "compile", traceId: "trace-1" });
    expect(trace.rootSpan().name).toBe("compile");
    expect(trace.rootSpan().traceId).toBe("trace-1");
    expect(trace.currentSpan()).toBe(trace.rootSpan());
  });

  test("traces get distinct ids", () => {
    expect(createTrace().rootSpan().traceId).not.toBe(createTrace().rootSpan().traceId);
  });

  test("spans nest and return the value of their body", () => {
    const trace = createTrace();
    const result = trace.span("eval", () => trace.span("module", () => 42));
    const [evalSpan] = trace.rootSpan().children;
    expect(result).toBe(42);
    expect(evalSpan?.name).toBe("eval");
    expect(evalSpan?.children.map((span) => span.name)).toEqual(["module"]);
    expect(evalSpan?.duration).not.toBeNull();
    expect(trace.currentSpan()).toBe(trace.rootSpan());
  });

  test("a throwing body marks its span and restores the current span", () => {
    const trace = createTrace();
    expect(() =>
      trace.span("layout", () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    const [span] = trace.rootSpan().children;
    expect(span?.attributes.get("error")).toBe(true);
    expect(span?.attributes.get("error.message")).toBe("boom");
    expect(span?.endTime).not.toBeNull();
    expect(trace.currentSpan()).toBe(trace.rootSpan());
  });

  test("attributes and events land on the current span", () => {
    const trace = createTrace();
    trace.span("layout", () => {
      trace.setAttributes({ pages: 3, file: "/main.quill" });
      trace.event("memo", { hits: 2 });
    });
    const [span] = trace.rootSpan().children;
    expect([...(span?.attributes ?? [])]).toEqual([
      ["pages", 3],
      ["file", "/main.quill"],
    ]);
    expect(span?.events.map((event) => [event.name, event.attributes.get("hits")])).toEqual([["memo", 2]]);
  });

  test("ending a span twice keeps the first end time", () => {
    const span = createTrace().startSpan("once");
    span.end();
    const first = span.endTime;
    span.end();
    expect(span.endTime).toBe(first);
  });
});

describe("NOOP_TRACE", () => {
  test("runs bodies without recording anything", () => {
    expect(NOOP_TRACE.span("x", () => "value")).toBe("value");
    NOOP_TRACE.event("ignored");
    expect(NOOP_TRACE.startSpan("y")).toBe(NOOP_SPAN);
    expect(NOOP_TRACE.rootSpan().children).toEqual([]);
    expect(NOOP_TRACE.currentSpan()).toBeUndefined();
  });
});

describe("exporters", () => {
  test("the collecting exporter records spans as they end", () => {
    const exporter = createCollectingExporter();
    const trace = createTrace({ exporter });
    trace.span("outer", () => {
      trace.span("inner", () => trace.event("memo", { fn: "assemblePage" }));
    });
    expect(exporter.spans.map((span) => span.name)).toEqual(["inner", "outer"]);
    expect(exporter.findSpans("outer")).toHaveLength(1);
    expect(exporter.findEvents("memo").map(({ span }) => span.name)).toEqual(["inner"]);
    exporter.clear();
    expect([exporter.spans, exporter.events]).toEqual([[], []]);
  });

  test("the console exporter indents by depth", () => {
    const lines: string[] = [];
    const trace = createTrace({ exporter: createConsoleExporter({ log: (line) => lines.push(line), prefix: "T" }) });
    trace.span("work", () => {
      trace.setAttribute("file", "/a.quill");
      trace.event("memo", { fn: "f" });
    });
    expect(lines[0]).toBe('T     • memo fn="f"');
    expect(lines[1]).toMatch(/^T {3}work \d+(\.\d+)?(ns|µs|ms|s) \{file="\/a\.quill"\}$/);
    expect(lines).toHaveLength(2);
  });

  test("short spans and events can be filtered out", () => {
    const lines: string[] = [];
    const trace = createTrace({
      exporter: createConsoleExporter({ log: (line) => lines.push(line), minDuration: 10n ** 12n, logEvents: false }),
    });
    trace.span("quick", () => trace.event("memo"));
    expect(lines).toEqual([]);
  });
});

describe("formatDuration", () => {
  test("picks a unit by magnitude", () => {
    expect([500n, 1_500n, 2_500_000n, 3_000_000_000n].map(formatDuration)).toEqual([
      "500ns",
      "1.50µs",
      "2.50ms",
      "3.00s",
    ]);
  });
});
