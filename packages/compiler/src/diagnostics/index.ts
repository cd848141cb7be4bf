export * from "./types.js";
export * from "./catalog/index.js";
export { buildDiagnostic, formatDiagnostic, withTracePoint, type BuildDiagnosticInput } from "./build.js";
export { createDiagnosticEmitter, type DiagnosticEmitter, type EmitDiagnosticInput } from "./emitter.js";
export { SourceError, diagnostics, isSourceError, sourceError } from "./errors.js";
export { DiagnosticsSink, type SinkEffect } from "./sink.js";
