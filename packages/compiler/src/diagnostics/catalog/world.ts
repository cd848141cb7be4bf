import { defineDiagnostic, type DiagnosticDataBase } from "../types.js";

export type FileDiagnosticData = DiagnosticDataBase & {
  path: string;
};

export const worldDiagnostics = {
  "quillset/world/file-not-found": defineDiagnostic<FileDiagnosticData>({
    category: "resolution",
    defaultSeverity: "error",
    impact: "blocking",
    span: "either",
    stages: ["world"],
    description: "A source or data file could not be found in the world.",
    data: { required: ["path"] },
  }),
  "quillset/world/access-denied": defineDiagnostic<FileDiagnosticData>({
    category: "resolution",
    defaultSeverity: "error",
    impact: "blocking",
    span: "either",
    stages: ["world"],
    description: "A path resolves outside the project root or could not be read.",
    data: { required: ["path"] },
  }),
  "quillset/world/not-source": defineDiagnostic<FileDiagnosticData>({
    category: "resolution",
    defaultSeverity: "error",
    impact: "blocking",
    span: "either",
    stages: ["world"],
    description: "A file was loaded as source text but is not valid UTF-8.",
    data: { required: ["path"] },
  }),
} as const;
