import type { DiagnosticSeverity, DiagnosticStage } from "../model/diagnostics.js";

export type { DiagnosticSeverity, DiagnosticStage };

/** Impact captures the real consequence if ignored, which can differ from UI severity. */
export type DiagnosticImpact =
  | "blocking" // The compilation produces no document.
  | "degraded" // A document is produced, but a placeholder stands in for something.
  | "informational";

/** Category is the primary axis for grouping and reporting. */
export type DiagnosticCategory =
  | "resolution"
  | "syntax"
  | "evaluation"
  | "realization"
  | "layout";

/** Some diagnostics require a span, others can be reported without one. */
export type DiagnosticSpanRequirement = "span" | "either";

export type DiagnosticDataBase = {
  /** Marks diagnostics produced on a recovery path (the output carries a placeholder). */
  recovery?: boolean;
};

/** Required/optional data fields are validated to catch emitter mistakes. */
export type DiagnosticDataRequirement = {
  readonly required?: readonly string[];
  readonly optional?: readonly string[];
};

/** Single source of truth for severity and presentation metadata. */
export type DiagnosticSpec<TData extends DiagnosticDataBase = DiagnosticDataBase> = {
  readonly category: DiagnosticCategory;
  readonly defaultSeverity: DiagnosticSeverity;
  readonly impact: DiagnosticImpact;
  readonly span: DiagnosticSpanRequirement;
  /** First entry is the stage stamped on emitted diagnostics. */
  readonly stages: readonly [DiagnosticStage, ...DiagnosticStage[]];
  readonly description: string;
  readonly data?: DiagnosticDataRequirement;
  /** Example payload; also carries the data contract type for the catalog. */
  readonly example?: TData;
};

/** Preserves literal types (especially stages) without boilerplate in callers. */
export function defineDiagnostic<
  TData extends DiagnosticDataBase,
  const TSpec extends DiagnosticSpec<TData> = DiagnosticSpec<TData>,
>(spec: TSpec): TSpec {
  return spec;
}

/** Fallback data shape when exact fields are unknown at compile time. */
export type DiagnosticDataRecord = DiagnosticDataBase & Record<string, unknown>;
/** Catalog is the authoritative registry of codes and metadata. */
export type DiagnosticsCatalog = Record<string, DiagnosticSpec<DiagnosticDataRecord>>;
export type DiagnosticCode<Catalog extends DiagnosticsCatalog> = keyof Catalog & string;
