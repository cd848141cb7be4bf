import { defineDiagnostic, type DiagnosticDataBase } from "../types.js";

export type CyclicImportData = DiagnosticDataBase & {
  /** Files on the evaluation route, outermost first, ending with the repeated file. */
  chain: readonly string[];
};

export type NameData = DiagnosticDataBase & {
  name: string;
};

export type TypeMismatchData = DiagnosticDataBase & {
  expected?: string;
  actual?: string;
};

export type LimitData = DiagnosticDataBase & {
  limit: number;
};

export const evalDiagnostics = {
  "quillset/eval/cyclic-import": defineDiagnostic<CyclicImportData>({
    category: "evaluation",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["eval"],
    description: "A file imports or includes itself, directly or through other files.",
    data: { required: ["chain"] },
  }),
  "quillset/eval/unknown-variable": defineDiagnostic<NameData>({
    category: "evaluation",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["eval"],
    description: "An identifier is not bound in any enclosing scope.",
    data: { required: ["name"] },
  }),
  "quillset/eval/type-mismatch": defineDiagnostic<TypeMismatchData>({
    category: "evaluation",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["eval"],
    description: "A value of the wrong type was supplied.",
    data: { optional: ["expected", "actual"] },
  }),
  "quillset/eval/invalid-argument": defineDiagnostic<DiagnosticDataBase>({
    category: "evaluation",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["eval"],
    description: "An argument has the right type but an unacceptable value.",
  }),
  "quillset/eval/missing-argument": defineDiagnostic<NameData>({
    category: "evaluation",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["eval"],
    description: "A required argument was not supplied.",
    data: { required: ["name"] },
  }),
  "quillset/eval/unexpected-argument": defineDiagnostic<DiagnosticDataBase>({
    category: "evaluation",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["eval"],
    description: "A function received an argument it does not accept.",
  }),
  "quillset/eval/call-depth": defineDiagnostic<LimitData>({
    category: "evaluation",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["eval"],
    description: "Function calls nested deeper than the configured limit.",
    data: { required: ["limit"] },
  }),
  "quillset/eval/loop-limit": defineDiagnostic<LimitData>({
    category: "evaluation",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["eval"],
    description: "A loop ran more iterations than the configured limit.",
    data: { required: ["limit"] },
  }),
  "quillset/eval/invalid-operation": defineDiagnostic<DiagnosticDataBase>({
    category: "evaluation",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["eval"],
    description: "An operator or method cannot be applied to the given values.",
  }),
  "quillset/eval/unknown-field": defineDiagnostic<NameData>({
    category: "evaluation",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["eval"],
    description: "A field or method does not exist on the value.",
    data: { required: ["name"] },
  }),
  "quillset/eval/import-missing": defineDiagnostic<NameData>({
    category: "evaluation",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["eval"],
    description: "An imported name is not defined by the module.",
    data: { required: ["name"] },
  }),
  "quillset/eval/unnecessary-alias": defineDiagnostic<NameData>({
    category: "evaluation",
    defaultSeverity: "warning",
    impact: "informational",
    span: "span",
    stages: ["eval"],
    description: "An import is renamed to the name it already has.",
    data: { required: ["name"] },
  }),
  "quillset/eval/flow-outside": defineDiagnostic<DiagnosticDataBase>({
    category: "evaluation",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["eval"],
    description: "`break`, `continue` or `return` used outside of a loop or function.",
  }),
  "quillset/eval/assert": defineDiagnostic<DiagnosticDataBase>({
    category: "evaluation",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["eval"],
    description: "An assertion or explicit panic failed.",
  }),
} as const;
