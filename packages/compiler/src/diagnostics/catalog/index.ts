import type { DiagnosticsCatalog } from "../types.js";
import { evalDiagnostics } from "./eval.js";
import { layoutDiagnostics } from "./layout.js";
import { realizeDiagnostics } from "./realize.js";
import { syntaxDiagnostics } from "./syntax.js";
import { worldDiagnostics } from "./world.js";

export const diagnosticsCatalog = {
  ...worldDiagnostics,
  ...syntaxDiagnostics,
  ...evalDiagnostics,
  ...realizeDiagnostics,
  ...layoutDiagnostics,
} as const satisfies DiagnosticsCatalog;

export type KnownDiagnosticCode = keyof typeof diagnosticsCatalog & string;

export const diagnosticsByCategory = {
  resolution: worldDiagnostics,
  syntax: syntaxDiagnostics,
  evaluation: evalDiagnostics,
  realization: realizeDiagnostics,
  layout: layoutDiagnostics,
} as const;

export type { CyclicImportData, NameData, TypeMismatchData, LimitData } from "./eval.js";
export type { FileDiagnosticData } from "./world.js";
export type { OverflowData } from "./layout.js";
