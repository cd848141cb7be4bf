import type { CompilerDiagnostic, DiagnosticRelated, DiagnosticSeverity, DiagnosticStage, TracePoint } from "../model/diagnostics.js";
import type { SourceSpan } from "../model/span.js";
import type { DiagnosticDataRecord, DiagnosticsCatalog } from "./types.js";
import { buildDiagnostic } from "./build.js";

export type EmitDiagnosticInput = {
  message: string;
  span?: SourceSpan | null;
  hints?: readonly string[];
  trace?: readonly TracePoint[];
  related?: readonly DiagnosticRelated[];
  /** Overrides the catalog's default severity. */
  severity?: DiagnosticSeverity;
  data?: Readonly<DiagnosticDataRecord>;
};

export type DiagnosticEmitter<
  Catalog extends DiagnosticsCatalog,
  AllowedCodes extends keyof Catalog & string = keyof Catalog & string,
> = {
  emit<Code extends AllowedCodes>(code: Code, input: EmitDiagnosticInput): CompilerDiagnostic<Code>;
};

export function createDiagnosticEmitter<
  Catalog extends DiagnosticsCatalog,
  AllowedCodes extends keyof Catalog & string = keyof Catalog & string,
>(catalog: Catalog, options: { stage?: DiagnosticStage } = {}): DiagnosticEmitter<Catalog, AllowedCodes> {
  return {
    emit(code, input) {
      const spec = catalog[code];
      if (!spec) {
        throw new Error(`Diagnostic code '${code}' is not declared in the catalog.`);
      }
      const missing = (spec.data?.required ?? []).filter((key) => input.data?.[key] === undefined);
      if (missing.length > 0) {
        throw new Error(`Diagnostic '${code}' is missing data fields: ${missing.join(", ")}.`);
      }
      return buildDiagnostic({
        code,
        message: input.message,
        stage: options.stage ?? spec.stages[0],
        severity: input.severity ?? spec.defaultSeverity,
        span: input.span,
        hints: input.hints,
        trace: input.trace,
        related: input.related,
        data: input.data,
      });
    },
  };
}
