/* =======================================================================================
 * COMPILE
 * ---------------------------------------------------------------------------------------
 * One compilation: evaluate the main file, realize its content, lay it out into pages.
 *
 * Evaluation fails fast: the first fatal error aborts the compilation and comes back in
 * `errors`. Realization and layout never abort; their problems are warnings, or errors
 * delayed to the end that still withhold the document.
 * ======================================================================================= */

import { isSourceError } from "./diagnostics/errors.js";
import { DiagnosticsSink } from "./diagnostics/sink.js";
import { DEFAULT_LIMITS, type Engine, type EvalLimits } from "./eval/engine.js";
import { evalModule, fileErrorToSourceError } from "./eval/import.js";
import { Route } from "./eval/route.js";
import type { Document } from "./layout/frame.js";
import { typeset } from "./layout/pages.js";
import { MemoStore, type MemoStats } from "./memo/store.js";
import type { CompilerDiagnostic } from "./model/diagnostics.js";
import { realize } from "./realize/realize.js";
import { debug } from "./shared/debug.js";
import { CompilerAttributes, NOOP_TRACE, type CompileTrace } from "./shared/trace.js";
import { TrackedWorld } from "./world/tracked.js";
import type { World } from "./world/types.js";

export interface CompileOptions {
  /**
   * Cache shared across compilations. Pass the same store to every compilation of an
   * edited document to reuse unchanged work; `false` disables caching. A fresh store
   * per compilation when absent.
   */
  memo?: MemoStore | false;
  trace?: CompileTrace;
  limits?: Partial<EvalLimits>;
}

export interface CompileResult {
  /** Null when any error was reported. */
  readonly document: Document | null;
  readonly errors: readonly CompilerDiagnostic[];
  readonly warnings: readonly CompilerDiagnostic[];
}

export function compile(world: World, options: CompileOptions = {}): CompileResult {
  const memo = options.memo === false ? null : (options.memo ?? new MemoStore());
  const trace = options.trace ?? NOOP_TRACE;
  const sink = new DiagnosticsSink();
  const engine: Engine = {
    world: new TrackedWorld(world, memo),
    route: Route.root(memo),
    sink,
    memo,
    limits: { ...DEFAULT_LIMITS, ...options.limits },
    trace,
  };
  const before = memo?.stats() ?? null;

  let document: Document | null = null;
  let fatal: readonly CompilerDiagnostic[] = [];
  try {
    document = trace.span("compile", () => run(engine));
  } catch (error) {
    if (!isSourceError(error)) throw error;
    fatal = error.diagnostics;
  }

  const errors = [...fatal, ...sink.delayed];
  const warnings = sink.warnings;
  if (memo && before) recordMemoEvents(trace, before, memo.stats());
  trace.setAttributes({
    [CompilerAttributes.DIAG_ERROR_COUNT]: errors.length,
    [CompilerAttributes.DIAG_WARNING_COUNT]: warnings.length,
  });
  debug.eval("compile.done", { errors: errors.length, warnings: warnings.length, pages: document?.pages.length ?? 0 });
  return { document: errors.length > 0 ? null : document, errors, warnings };
}

function run(engine: Engine): Document {
  const main = engine.world.main();
  engine.trace.setAttribute(CompilerAttributes.FILE, main);
  const module = engine.trace.span("eval", () => {
    const loaded = engine.world.source(main);
    if (!loaded.ok) throw fileErrorToSourceError(loaded.error, null);
    return evalModule({ ...engine, route: engine.route.extend(main) }, loaded.value);
  });
  const { content } = realize(engine, module.content);
  const document = typeset(engine, content);
  engine.trace.setAttribute(CompilerAttributes.PAGES, document.pages.length);
  return document;
}

/** One trace event per memoized function that was called during this compilation. */
function recordMemoEvents(trace: CompileTrace, before: MemoStats, after: MemoStats): void {
  for (const [fn, stats] of Object.entries(after.byFunction)) {
    const prev = before.byFunction[fn] ?? { hits: 0, misses: 0, entries: 0 };
    const hits = stats.hits - prev.hits;
    const misses = stats.misses - prev.misses;
    if (hits === 0 && misses === 0) continue;
    trace.event("memo", { [CompilerAttributes.MEMO_FN]: fn, hits, misses });
  }
}
