import type { CompilerDiagnostic, DiagnosticStage } from "../model/diagnostics.js";
import { spanKey } from "../model/span.js";
import type { EffectLog } from "../memo/tracked.js";
import { debug } from "../shared/debug.js";

/** A write to the sink, as recorded (and replayed) by memoized calls. */
export type SinkEffect =
  | { readonly kind: "warn"; readonly diagnostic: CompilerDiagnostic }
  | { readonly kind: "delay"; readonly diagnostics: readonly CompilerDiagnostic[] };

/**
 * Per-compilation accumulator of warnings and delayed errors.
 *
 * Append-only while a compilation runs; read once at the end. Delayed errors
 * do not stop the current pass but fail the compilation when it finishes.
 */
export class DiagnosticsSink implements EffectLog<SinkEffect> {
  readonly #warnings: CompilerDiagnostic[] = [];
  readonly #delayed: CompilerDiagnostic[] = [];
  readonly #listeners = new Set<(effect: SinkEffect) => void>();

  warn(diagnostic: CompilerDiagnostic): void {
    this.#apply({ kind: "warn", diagnostic });
  }

  delay(diagnostics: readonly CompilerDiagnostic[]): void {
    if (diagnostics.length === 0) return;
    this.#apply({ kind: "delay", diagnostics });
  }

  /** Warnings in emission order, duplicates (same code, span and message) removed. */
  get warnings(): readonly CompilerDiagnostic[] {
    return dedupe(this.#warnings);
  }

  get delayed(): readonly CompilerDiagnostic[] {
    return dedupe(this.#delayed);
  }

  count(stage?: DiagnosticStage): number {
    const all = [...this.warnings, ...this.delayed];
    return stage ? all.filter((d) => d.stage === stage).length : all.length;
  }

  observe(listener: (effect: SinkEffect) => void): () => void {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  replay(effects: readonly SinkEffect[]): void {
    for (const effect of effects) this.#apply(effect);
  }

  #apply(effect: SinkEffect): void {
    if (effect.kind === "warn") {
      debug.eval("sink.warn", { code: effect.diagnostic.code, message: effect.diagnostic.message });
      this.#warnings.push(effect.diagnostic);
    } else {
      this.#delayed.push(...effect.diagnostics);
    }
    for (const listener of this.#listeners) listener(effect);
  }
}

function dedupe(list: readonly CompilerDiagnostic[]): CompilerDiagnostic[] {
  const seen = new Set<string>();
  const out: CompilerDiagnostic[] = [];
  for (const diag of list) {
    const key = `${diag.code}|${spanKey(diag.span)}|${diag.message}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(diag);
  }
  return out;
}
