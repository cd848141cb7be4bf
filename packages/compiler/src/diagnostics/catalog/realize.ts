import { defineDiagnostic, type DiagnosticDataBase } from "../types.js";

export const realizeDiagnostics = {
  "quillset/realize/recursion": defineDiagnostic<DiagnosticDataBase & { limit: number }>({
    category: "realization",
    defaultSeverity: "error",
    impact: "blocking",
    span: "either",
    stages: ["realize"],
    description: "Show rules kept producing elements that trigger further show rules.",
    data: { required: ["limit"] },
  }),
} as const;
