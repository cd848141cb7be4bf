// Compiler package public API
//
// `compile` is the entry point; the rest is exported for hosts and tooling that drive
// individual stages (parsing for editors, layout for previews, worlds for CLIs).

// === Compilation ===
export { compile, type CompileOptions, type CompileResult } from "./compile.js";

// === Worlds ===
export * from "./world/index.js";

// === Syntax ===
export * from "./syntax/index.js";

// === Evaluation ===
export * from "./eval/index.js";

// === Content & styles ===
export * from "./content/index.js";
export * from "./style/index.js";
export * from "./realize/index.js";

// === Layout ===
export * from "./geom/index.js";
export * from "./font/index.js";
export * from "./layout/index.js";

// === Memoization ===
export * from "./memo/index.js";

// === Diagnostics ===
export * from "./diagnostics/index.js";
export type { CompilerDiagnostic, DiagnosticSeverity, DiagnosticStage, TracePoint } from "./model/diagnostics.js";
export { DETACHED_SPAN, type SourceSpan } from "./model/span.js";

// === Instrumentation ===
export { configureDebug, debug, isDebugEnabled, refreshDebugChannels, type DebugConfig } from "./shared/debug.js";
export { CompilerAttributes, NOOP_TRACE, createTrace, type CompileTrace, type CreateTraceOptions, type Span } from "./shared/trace.js";
export { CollectingExporter, ConsoleExporter, createCollectingExporter, createConsoleExporter } from "./shared/trace-exporters.js";
