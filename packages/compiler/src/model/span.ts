import type { FileId } from "@quillset/shared";

/**
 * Half-open byte range `[start, end)` in a source file's text.
 * Spans without a file are detached: they belong to content built by native code.
 */
export interface SourceSpan {
  readonly start: number;
  readonly end: number;
  readonly file?: FileId;
}

export const DETACHED_SPAN: SourceSpan = { start: 0, end: 0 };

export function spanFromBounds(start: number, end: number, file?: FileId): SourceSpan {
  const lo = Math.min(start, end);
  const hi = Math.max(start, end);
  return file ? { start: lo, end: hi, file } : { start: lo, end: hi };
}

export function spanKey(span: SourceSpan | null | undefined): string {
  if (!span) return "-";
  return `${span.file ?? "~"}:${span.start}-${span.end}`;
}
