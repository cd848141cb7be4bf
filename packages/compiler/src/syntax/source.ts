import type { FileId } from "@quillset/shared";
import { digest, type Hashable } from "../memo/hash.js";
import type { ParseResult } from "./ast.js";
import { parse } from "./parser.js";

export interface Position {
  /** Zero-based line. */
  line: number;
  /** Zero-based UTF-16 column. */
  character: number;
}

/**
 * An immutable source file. Parsing and line indexing happen lazily, once.
 * Two sources with the same id and text share a fingerprint.
 */
export class Source implements Hashable {
  readonly id: FileId;
  readonly text: string;
  #parsed: ParseResult | undefined;
  #lineStarts: number[] | undefined;
  #fingerprint: string | undefined;

  constructor(id: FileId, text: string) {
    this.id = id;
    this.text = text;
  }

  get root(): ParseResult {
    this.#parsed ??= parse(this.text, this.id);
    return this.#parsed;
  }

  fingerprint(): string {
    this.#fingerprint ??= digest(`source\0${this.id}\0${this.text}`);
    return this.#fingerprint;
  }

  /** New source with `[start, end)` replaced; this one is left untouched. */
  edit(start: number, end: number, replacement: string): Source {
    const lo = clamp(Math.min(start, end), 0, this.text.length);
    const hi = clamp(Math.max(start, end), 0, this.text.length);
    return new Source(this.id, this.text.slice(0, lo) + replacement + this.text.slice(hi));
  }

  /** Same id, new text. */
  replace(text: string): Source {
    return text === this.text ? this : new Source(this.id, text);
  }

  get lineCount(): number {
    return this.#lines().length;
  }

  positionAt(offset: number): Position {
    const starts = this.#lines();
    const clamped = clamp(offset, 0, this.text.length);
    let lo = 0;
    let hi = starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((starts[mid] ?? 0) <= clamped) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo, character: clamped - (starts[lo] ?? 0) };
  }

  offsetAt(position: Position): number | null {
    if (position.line < 0 || position.character < 0) return null;
    const starts = this.#lines();
    const lineStart = starts[position.line];
    if (lineStart === undefined) return null;
    const lineEnd = starts[position.line + 1] ?? this.text.length;
    return Math.min(lineEnd, lineStart + position.character);
  }

  #lines(): number[] {
    this.#lineStarts ??= computeLineStarts(this.text);
    return this.#lineStarts;
  }
}

export function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i += 1) {
    const ch = text.charCodeAt(i);
    if (ch === 13 /* CR */ || ch === 10 /* LF */) {
      if (ch === 13 /* CR */ && text.charCodeAt(i + 1) === 10 /* LF */) i += 1;
      starts.push(i + 1);
    }
  }
  return starts;
}

function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(value, hi));
}
