import { defineDiagnostic, type DiagnosticDataBase } from "../types.js";

export type OverflowData = DiagnosticDataBase & {
  /** Height of the unit in points. */
  height: number;
  /** Height of the region it was forced into, in points. */
  available: number;
};

export const layoutDiagnostics = {
  "quillset/layout/overflow": defineDiagnostic<OverflowData>({
    category: "layout",
    defaultSeverity: "warning",
    impact: "degraded",
    span: "either",
    stages: ["layout"],
    description: "An unbreakable unit is taller than any region and was placed anyway.",
    data: { required: ["height", "available"] },
  }),
  "quillset/layout/unknown-font": defineDiagnostic<DiagnosticDataBase & { family: string }>({
    category: "layout",
    defaultSeverity: "warning",
    impact: "degraded",
    span: "either",
    stages: ["layout"],
    description: "No font in the book belongs to the requested family; a fallback is used.",
    data: { required: ["family"] },
  }),
  "quillset/layout/missing-glyph": defineDiagnostic<DiagnosticDataBase & { char: string }>({
    category: "layout",
    defaultSeverity: "warning",
    impact: "degraded",
    span: "either",
    stages: ["layout"],
    description: "No available font covers a character; a .notdef placeholder is drawn.",
    data: { required: ["char"] },
  }),
  "quillset/layout/missing-image": defineDiagnostic<DiagnosticDataBase & { path: string }>({
    category: "layout",
    defaultSeverity: "warning",
    impact: "degraded",
    span: "either",
    stages: ["layout"],
    description: "An image file could not be loaded; a placeholder box is drawn.",
    data: { required: ["path"] },
  }),
  "quillset/layout/unsupported-image": defineDiagnostic<DiagnosticDataBase & { path: string }>({
    category: "layout",
    defaultSeverity: "warning",
    impact: "degraded",
    span: "either",
    stages: ["layout"],
    description: "An image file is not a recognised PNG, JPEG or GIF; a placeholder box is drawn.",
    data: { required: ["path"] },
  }),
  "quillset/layout/unresolved-reference": defineDiagnostic<DiagnosticDataBase & { label: string }>({
    category: "layout",
    defaultSeverity: "warning",
    impact: "degraded",
    span: "span",
    stages: ["layout"],
    description: "A reference names a label that no referenceable element carries.",
    data: { required: ["label"] },
  }),
} as const;
