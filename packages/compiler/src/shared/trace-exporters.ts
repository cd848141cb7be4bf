/* =======================================================================================
 * TRACE EXPORTERS - Pluggable backends for trace data
 * ---------------------------------------------------------------------------------------
 * - ConsoleExporter: indented, human-readable span tree for dev debugging
 * - CollectingExporter: keeps spans and events in memory for tests and tooling
 * ======================================================================================= */

import type { Span, SpanEvent, TraceExporter } from "./trace.js";
import { formatDuration } from "./trace.js";

export interface ConsoleExporterOptions {
  /** Spans shorter than this (nanoseconds) are not printed. Default 0n. */
  minDuration?: bigint;
  /** Default true. */
  logEvents?: boolean;
  /** Default console.log. */
  log?: (message: string) => void;
  /** Default "[trace]". */
  prefix?: string;
}

/**
 * Logs spans as they end, indented by nesting depth.
 *
 * @example
 * const trace = createTrace({ name: "compile", exporter: createConsoleExporter({ minDuration: 1_000_000n }) });
 */
export class ConsoleExporter implements TraceExporter {
  private readonly options: Required<ConsoleExporterOptions>;
  private depth = 0;

  constructor(options: ConsoleExporterOptions = {}) {
    this.options = {
      minDuration: options.minDuration ?? 0n,
      logEvents: options.logEvents ?? true,
      log: options.log ?? console.log,
      prefix: options.prefix ?? "[trace]",
    };
  }

  onSpanStart(_span: Span): void {
    this.depth++;
  }

  onSpanEnd(span: Span): void {
    this.depth = Math.max(0, this.depth - 1);
    if (span.duration !== null && span.duration < this.options.minDuration) return;

    const indent = "  ".repeat(this.depth);
    const duration = span.duration !== null ? formatDuration(span.duration) : "?";
    const attrs = [...span.attributes].map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    const suffix = attrs.length > 0 ? ` {${attrs.join(", ")}}` : "";
    this.options.log(`${this.options.prefix} ${indent}${span.name} ${duration}${suffix}`);
  }

  onEvent(_span: Span, event: SpanEvent): void {
    if (!this.options.logEvents) return;
    const indent = "  ".repeat(this.depth);
    const attrs = [...event.attributes].map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    this.options.log(`${this.options.prefix} ${indent}• ${event.name}${attrs.length > 0 ? ` ${attrs.join(" ")}` : ""}`);
  }
}

export function createConsoleExporter(options?: ConsoleExporterOptions): ConsoleExporter {
  return new ConsoleExporter(options);
}

/**
 * An exporter that collects all spans and events for inspection.
 */
export class CollectingExporter implements TraceExporter {
  readonly spans: Span[] = [];
  readonly events: Array<{ span: Span; event: SpanEvent }> = [];

  onSpanStart(_span: Span): void {}

  onSpanEnd(span: Span): void {
    this.spans.push(span);
  }

  onEvent(span: Span, event: SpanEvent): void {
    this.events.push({ span, event });
  }

  clear(): void {
    this.spans.length = 0;
    this.events.length = 0;
  }

  findSpans(name: string): Span[] {
    return this.spans.filter((s) => s.name === name);
  }

  findEvents(name: string): Array<{ span: Span; event: SpanEvent }> {
    return this.events.filter((e) => e.event.name === name);
  }
}

export function createCollectingExporter(): CollectingExporter {
  return new CollectingExporter();
}
