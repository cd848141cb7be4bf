import type { CompilerDiagnostic, DiagnosticRelated, DiagnosticSeverity, DiagnosticStage, TracePoint } from "../model/diagnostics.js";
import type { SourceSpan } from "../model/span.js";

export interface BuildDiagnosticInput<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity: DiagnosticSeverity;
  span?: SourceSpan | null | undefined;
  hints?: readonly string[];
  trace?: readonly TracePoint[];
  related?: readonly DiagnosticRelated[];
  data?: Readonly<TData>;
}

/** Centralized diagnostic builder; optional fields are only present when set. */
export function buildDiagnostic<
  TCode extends string,
  TData extends Record<string, unknown> = Record<string, unknown>,
>(input: BuildDiagnosticInput<TCode, TData>): CompilerDiagnostic<TCode, TData> {
  return {
    code: input.code,
    message: input.message,
    stage: input.stage,
    severity: input.severity,
    span: input.span ?? null,
    ...(input.hints && input.hints.length > 0 ? { hints: input.hints } : {}),
    ...(input.trace && input.trace.length > 0 ? { trace: input.trace } : {}),
    ...(input.related ? { related: input.related } : {}),
    ...(input.data ? { data: input.data } : {}),
  };
}

/** Returns a copy with `point` appended to the diagnostic's trace. */
export function withTracePoint<T extends CompilerDiagnostic>(diag: T, point: TracePoint): T {
  return { ...diag, trace: [...(diag.trace ?? []), point] };
}

export function formatDiagnostic(diag: CompilerDiagnostic): string {
  const where = diag.span?.file ? `${diag.span.file}:${diag.span.start}-${diag.span.end}` : "<detached>";
  const lines = [`${diag.severity}[${diag.code}] ${where}: ${diag.message}`];
  for (const hint of diag.hints ?? []) lines.push(`  hint: ${hint}`);
  for (const point of diag.trace ?? []) lines.push(`  in ${point.kind} of ${point.target}`);
  return lines.join("\n");
}
