/* =======================================================================================
 * COMPILE TRACE - Instrumentation primitives for pipeline observability
 * ---------------------------------------------------------------------------------------
 * - Span: unit of work with timing, hierarchy, attributes and events
 * - CompileTrace: API used by the pipeline (span, event, setAttribute)
 * - TraceExporter: pluggable backend (console, collecting)
 * - NOOP_TRACE: no-op when tracing is disabled
 * ======================================================================================= */

// =============================================================================
// Attribute Types
// =============================================================================

/** Values that can be attached to spans and events. */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | readonly AttributeValue[];

export type ReadonlyAttributeMap = ReadonlyMap<string, AttributeValue>;

export interface SpanEvent {
  readonly name: string;
  /** Timestamp in nanoseconds */
  readonly timestamp: bigint;
  readonly attributes: ReadonlyAttributeMap;
}

/**
 * A unit of work with timing, context, and hierarchy.
 * Spans form a tree: compile → eval → module:/main.quill → ...
 */
export interface Span {
  readonly name: string;
  readonly spanId: string;
  readonly traceId: string;
  readonly parent: Span | null;
  readonly children: readonly Span[];
  readonly startTime: bigint;
  readonly endTime: bigint | null;
  readonly duration: bigint | null;
  readonly attributes: ReadonlyAttributeMap;
  readonly events: readonly SpanEvent[];

  end(): void;
  setAttribute(key: string, value: AttributeValue): void;
  setAttributes(attrs: Record<string, AttributeValue>): void;
  addEvent(name: string, attributes?: Record<string, AttributeValue>): void;
}

export interface TraceExporter {
  onSpanStart(span: Span): void;
  onSpanEnd(span: Span): void;
  onEvent(span: Span, event: SpanEvent): void;
}

/**
 * Main API for pipeline instrumentation.
 *
 * ```typescript
 * const doc = trace.span("layout", () => typeset(engine, content, styles));
 * trace.event("memo.hit", { fn: "layoutBlock" });
 * ```
 */
export interface CompileTrace {
  /** Execute `fn` inside a named span; the span ends when `fn` returns or throws. */
  span<T>(name: string, fn: () => T): T;
  event(name: string, attributes?: Record<string, AttributeValue>): void;
  setAttribute(key: string, value: AttributeValue): void;
  setAttributes(attrs: Record<string, AttributeValue>): void;
  startSpan(name: string): Span;
  currentSpan(): Span | undefined;
  rootSpan(): Span;
}

// =============================================================================
// Semantic Attribute Keys
// =============================================================================

export const CompilerAttributes = {
  FILE: "compiler.file",
  PAGES: "layout.pages",

  MEMO_FN: "memo.fn",

  DIAG_ERROR_COUNT: "diag.errors",
  DIAG_WARNING_COUNT: "diag.warnings",
} as const;

// =============================================================================
// No-Op Implementation
// =============================================================================

export const NOOP_SPAN: Span = {
  name: "",
  spanId: "",
  traceId: "",
  parent: null,
  children: [],
  startTime: 0n,
  endTime: null,
  duration: null,
  attributes: new Map(),
  events: [],
  end: () => {},
  setAttribute: () => {},
  setAttributes: () => {},
  addEvent: () => {},
};

export const NOOP_TRACE: CompileTrace = {
  span: <T>(_name: string, fn: () => T): T => fn(),
  event: () => {},
  setAttribute: () => {},
  setAttributes: () => {},
  startSpan: () => NOOP_SPAN,
  currentSpan: () => undefined,
  rootSpan: () => NOOP_SPAN,
};

// =============================================================================
// Timing Utilities
// =============================================================================

export function nowNanos(): bigint {
  return process.hrtime.bigint();
}

export function formatDuration(nanos: bigint): string {
  const ns = Number(nanos);
  if (ns < 1_000) return `${ns}ns`;
  if (ns < 1_000_000) return `${(ns / 1_000).toFixed(2)}µs`;
  if (ns < 1_000_000_000) return `${(ns / 1_000_000).toFixed(2)}ms`;
  return `${(ns / 1_000_000_000).toFixed(2)}s`;
}

// =============================================================================
// Span Implementation
// =============================================================================

let spanIdCounter = 0;

class SpanImpl implements Span {
  readonly name: string;
  readonly spanId: string;
  readonly traceId: string;
  readonly parent: SpanImpl | null;
  readonly startTime: bigint;

  #endTime: bigint | null = null;
  readonly #children: Span[] = [];
  readonly #attributes = new Map<string, AttributeValue>();
  readonly #events: SpanEvent[] = [];
  readonly #exporter: TraceExporter | null;
  readonly #onEnd: ((span: SpanImpl) => void) | null;

  constructor(
    name: string,
    traceId: string,
    parent: SpanImpl | null,
    exporter: TraceExporter | null,
    onEnd: ((span: SpanImpl) => void) | null,
  ) {
    this.name = name;
    this.spanId = `span_${++spanIdCounter}`;
    this.traceId = traceId;
    this.parent = parent;
    this.startTime = nowNanos();
    this.#exporter = exporter;
    this.#onEnd = onEnd;
    if (parent) parent.#children.push(this);
    this.#exporter?.onSpanStart(this);
  }

  get endTime(): bigint | null {
    return this.#endTime;
  }

  get duration(): bigint | null {
    return this.#endTime !== null ? this.#endTime - this.startTime : null;
  }

  get children(): readonly Span[] {
    return this.#children;
  }

  get attributes(): ReadonlyAttributeMap {
    return this.#attributes;
  }

  get events(): readonly SpanEvent[] {
    return this.#events;
  }

  end(): void {
    if (this.#endTime !== null) return;
    this.#endTime = nowNanos();
    this.#exporter?.onSpanEnd(this);
    this.#onEnd?.(this);
  }

  setAttribute(key: string, value: AttributeValue): void {
    this.#attributes.set(key, value);
  }

  setAttributes(attrs: Record<string, AttributeValue>): void {
    for (const [key, value] of Object.entries(attrs)) {
      this.#attributes.set(key, value);
    }
  }

  addEvent(name: string, attributes?: Record<string, AttributeValue>): void {
    const event: SpanEvent = {
      name,
      timestamp: nowNanos(),
      attributes: new Map(Object.entries(attributes ?? {})),
    };
    this.#events.push(event);
    this.#exporter?.onEvent(this, event);
  }
}

// =============================================================================
// Compile Trace Implementation
// =============================================================================

export interface CreateTraceOptions {
  /** Name for the root span */
  name?: string;
  exporter?: TraceExporter;
  traceId?: string;
}

class CompileTraceImpl implements CompileTrace {
  readonly #traceId: string;
  readonly #root: SpanImpl;
  readonly #exporter: TraceExporter | null;
  #current: SpanImpl;

  constructor(options: CreateTraceOptions = {}) {
    this.#traceId = options.traceId ?? `trace_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
    this.#exporter = options.exporter ?? null;
    this.#root = new SpanImpl(options.name ?? "trace", this.#traceId, null, this.#exporter, null);
    this.#current = this.#root;
  }

  span<T>(name: string, fn: () => T): T {
    const span = this.startSpan(name);
    try {
      return fn();
    } catch (error) {
      span.setAttribute("error", true);
      span.setAttribute("error.message", error instanceof Error ? error.message : String(error));
      throw error;
    } finally {
      span.end();
    }
  }

  event(name: string, attributes?: Record<string, AttributeValue>): void {
    this.#current.addEvent(name, attributes);
  }

  setAttribute(key: string, value: AttributeValue): void {
    this.#current.setAttribute(key, value);
  }

  setAttributes(attrs: Record<string, AttributeValue>): void {
    this.#current.setAttributes(attrs);
  }

  startSpan(name: string): Span {
    const previous = this.#current;
    const span = new SpanImpl(name, this.#traceId, previous, this.#exporter, (ended) => {
      if (this.#current === ended) this.#current = previous;
    });
    this.#current = span;
    return span;
  }

  currentSpan(): Span | undefined {
    return this.#current;
  }

  rootSpan(): Span {
    return this.#root;
  }
}

/**
 * Create a new CompileTrace.
 *
 * @example
 * const trace = createTrace({ name: "compile", exporter: createConsoleExporter() });
 * compile(world, { trace });
 */
export function createTrace(options?: CreateTraceOptions): CompileTrace {
  return new CompileTraceImpl(options);
}
