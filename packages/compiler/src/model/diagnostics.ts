/* =======================================================================================
 * DIAGNOSTIC MODEL (foundation types only)
 * ---------------------------------------------------------------------------------------
 * Pure type definitions. Builders live in diagnostics/build.ts.
 * ======================================================================================= */

import type { SourceSpan } from "./span.js";

export type DiagnosticSeverity = "error" | "warning";

/** Pipeline stage that produced the diagnostic. */
export type DiagnosticStage = "world" | "parse" | "eval" | "realize" | "layout";

/** One step of the evaluation stack a diagnostic travelled through. */
export interface TracePoint {
  readonly kind: "import" | "include" | "call" | "show";
  /** File being imported/included, or the called function's name. */
  readonly target: string;
  readonly span: SourceSpan | null;
}

export interface DiagnosticRelated {
  message: string;
  span?: SourceSpan | null;
}

/** Unified diagnostic envelope for every pipeline stage. */
export interface CompilerDiagnostic<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity: DiagnosticSeverity;
  span: SourceSpan | null;
  hints?: readonly string[];
  trace?: readonly TracePoint[];
  related?: readonly DiagnosticRelated[];
  data?: Readonly<TData>;
}
