import type { DiagnosticsSink } from "../diagnostics/sink.js";
import type { MemoStore } from "../memo/store.js";
import type { CompileTrace } from "../shared/trace.js";
import type { TrackedWorld } from "../world/tracked.js";
import type { Route } from "./route.js";

export interface EvalLimits {
  /** Nested function calls before `eval/call-depth`. */
  readonly maxCallDepth: number;
  /** Iterations of one loop before `eval/loop-limit`. */
  readonly maxIterations: number;
}

export const DEFAULT_LIMITS: EvalLimits = {
  maxCallDepth: 64,
  maxIterations: 10_000,
};

/**
 * Everything one compilation threads through evaluation, realization and layout.
 * Only `route` changes while descending into imported files.
 */
export interface Engine {
  readonly world: TrackedWorld;
  readonly route: Route;
  readonly sink: DiagnosticsSink;
  readonly memo: MemoStore | null;
  readonly limits: EvalLimits;
  readonly trace: CompileTrace;
}
