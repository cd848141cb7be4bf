import type { CompilerDiagnostic, TracePoint } from "../model/diagnostics.js";
import { diagnosticsCatalog, type KnownDiagnosticCode } from "./catalog/index.js";
import { createDiagnosticEmitter, type EmitDiagnosticInput } from "./emitter.js";
import { withTracePoint } from "./build.js";

/** Emitter over the full catalog; stage comes from each code's declaration. */
export const diagnostics = createDiagnosticEmitter(diagnosticsCatalog);

/**
 * A fatal failure of evaluation or realization. Carries every error that
 * caused it (a file with several syntax errors reports all of them).
 */
export class SourceError extends Error {
  readonly diagnostics: readonly CompilerDiagnostic[];

  constructor(diagnostics: readonly CompilerDiagnostic[]) {
    super(diagnostics.map((d) => d.message).join("; ") || "compilation failed");
    this.name = "SourceError";
    this.diagnostics = diagnostics;
  }

  /** Same error with `point` appended to the trace of every diagnostic. */
  traced(point: TracePoint): SourceError {
    return new SourceError(this.diagnostics.map((d) => withTracePoint(d, point)));
  }
}

export function sourceError(code: KnownDiagnosticCode, input: EmitDiagnosticInput): SourceError {
  return new SourceError([diagnostics.emit(code, input)]);
}

export function isSourceError(error: unknown): error is SourceError {
  return error instanceof SourceError;
}
