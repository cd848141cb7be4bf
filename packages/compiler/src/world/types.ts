/* =======================================================================================
 * WORLD
 * ---------------------------------------------------------------------------------------
 * The compiler's only window onto its environment. Loads must be cheap on repeat and
 * return shared values; the compiler never writes through a World.
 * ======================================================================================= */

import type { FileId } from "@quillset/shared";
import type { Library } from "../eval/library.js";
import type { DatetimeValue } from "../eval/value.js";
import type { Font } from "../font/font.js";
import type { FontBook } from "../font/book.js";
import type { Source } from "../syntax/source.js";

export type FileErrorKind = "not-found" | "access-denied" | "not-source" | "other";

export interface FileError {
  readonly kind: FileErrorKind;
  readonly path: string;
  readonly message?: string;
}

export type FileResult<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: FileError };

export interface World {
  /** Standard library the evaluator starts from. */
  library(): Library;
  book(): FontBook;
  /** Entry file of the compilation. */
  main(): FileId;
  source(id: FileId): FileResult<Source>;
  file(id: FileId): FileResult<Uint8Array>;
  /** Font at `index` in the book; null when it cannot be loaded. */
  font(index: number): Font | null;
  /** Current date, shifted to UTC+`offset` hours (local time when null); null when unavailable. */
  today(offset: number | null): DatetimeValue | null;
}

/** Line logger for hosts (CLIs, language servers) that want world activity reported. */
export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function ok<T>(value: T): FileResult<T> {
  return { ok: true, value };
}

export function fail<T>(kind: FileErrorKind, path: string, message?: string): FileResult<T> {
  return { ok: false, error: message === undefined ? { kind, path } : { kind, path, message } };
}
