/* =======================================================================================
 * EFFECT ANCHORS
 * ---------------------------------------------------------------------------------------
 * Layout is cached on content fingerprints, which leave spans out. A hit may therefore
 * stand for the same content at other offsets (text was inserted above it, or it came
 * from another file). Replayed warnings are moved node by node: equal fingerprints mean
 * equal trees, so the n-th node of the recorded content matches the n-th node of the
 * current one.
 * ======================================================================================= */

import { Content } from "../content/content.js";
import type { SinkEffect } from "../diagnostics/sink.js";
import type { Value } from "../eval/value.js";
import type { EffectAnchor } from "../memo/store.js";
import type { CompilerDiagnostic } from "../model/diagnostics.js";
import type { SourceSpan } from "../model/span.js";

const outlines = new WeakMap<readonly Content[], readonly SourceSpan[]>();

/** Spans of every node under `roots`, in a fixed pre-order. */
function spanOutline(roots: readonly Content[]): readonly SourceSpan[] {
  const cached = outlines.get(roots);
  if (cached) return cached;
  const out: SourceSpan[] = [];
  for (const root of roots) visitContent(root, out);
  outlines.set(roots, out);
  return out;
}

function visitContent(content: Content, out: SourceSpan[]): void {
  out.push(content.span);
  for (const child of content.children) visitContent(child, out);
  if (content.child) visitContent(content.child, out);
  // Field order follows the fingerprint, which sorts map keys.
  const fields = [...content.fields()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [, value] of fields) visitValue(value, out);
}

function visitValue(value: Value, out: SourceSpan[]): void {
  if (value instanceof Content) {
    visitContent(value, out);
  } else if (value !== null && typeof value === "object") {
    if (value.type === "array") {
      for (const item of value.items) visitValue(item, out);
    } else if (value.type === "dictionary") {
      const entries = [...value.entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      for (const [, item] of entries) visitValue(item, out);
    }
  }
}

/**
 * `span` as it sits in `to`, found through the innermost node of `from` in the same file
 * that contains it. Spans with no such node are returned unchanged.
 */
function relocateSpan(span: SourceSpan, from: readonly SourceSpan[], to: readonly SourceSpan[]): SourceSpan {
  if (span.file === undefined || from.length !== to.length) return span;
  let best = -1;
  for (let i = 0; i < from.length; i++) {
    const node = from[i];
    if (!node || node.file !== span.file || node.start > span.start || node.end < span.end) continue;
    const current = from[best];
    if (!current || node.end - node.start <= current.end - current.start) best = i;
  }
  const source = from[best];
  const target = to[best];
  if (!source || !target || target.file === undefined) return span;
  const start = target.start + (span.start - source.start);
  return { start, end: start + (span.end - span.start), file: target.file };
}

function relocateDiagnostic(
  diag: CompilerDiagnostic,
  from: readonly SourceSpan[],
  to: readonly SourceSpan[],
): CompilerDiagnostic {
  const move = (span: SourceSpan | null | undefined) => (span ? relocateSpan(span, from, to) : span);
  return {
    ...diag,
    span: move(diag.span) ?? null,
    ...(diag.related ? { related: diag.related.map((r) => ({ ...r, span: move(r.span) })) } : {}),
  };
}

/** Anchor for layout steps whose sink writes point into `contents`. */
export function contentAnchor<Args extends readonly unknown[]>(
  of: (...args: Args) => readonly Content[],
): EffectAnchor<Args, SinkEffect, readonly Content[]> {
  return {
    of,
    move(effect, from, to) {
      const before = spanOutline(from);
      const after = spanOutline(to);
      return effect.kind === "warn"
        ? { kind: "warn", diagnostic: relocateDiagnostic(effect.diagnostic, before, after) }
        : { kind: "delay", diagnostics: effect.diagnostics.map((d) => relocateDiagnostic(d, before, after)) };
    },
  };
}
