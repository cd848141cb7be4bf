import { defineDiagnostic, type DiagnosticDataBase } from "../types.js";

export const syntaxDiagnostics = {
  "quillset/parse/syntax": defineDiagnostic<DiagnosticDataBase>({
    category: "syntax",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["parse"],
    description: "The source text does not follow the markup or code grammar.",
  }),
} as const;
