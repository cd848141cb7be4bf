import { fileId, type FileId } from "@quillset/shared";
import { createLibrary, type Library } from "../eval/library.js";
import type { DatetimeValue } from "../eval/value.js";
import { FontBook } from "../font/book.js";
import { Font, type FontDescriptor } from "../font/font.js";
import { debug } from "../shared/debug.js";
import { Source } from "../syntax/source.js";
import { fail, ok, type FileResult, type World } from "./types.js";

export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

export interface MemoryWorldOptions {
  /** Path of the entry file. */
  readonly main: string;
  /** Text files by path; byte arrays are served through `file` only. */
  readonly files?: Readonly<Record<string, string | Uint8Array>>;
  readonly fonts?: readonly FontDescriptor[];
  /** Fixed date answered for every offset; no date when absent. */
  readonly today?: CalendarDate | null;
}

/** A World held entirely in memory, editable between compilations. */
export interface MemoryWorld extends World {
  /** Replace (or create) a text file. Unchanged text keeps the existing Source. */
  update(path: string, text: string): void;
  setFile(path: string, bytes: Uint8Array): void;
  remove(path: string): void;
}

type Entry =
  | { readonly kind: "text"; readonly source: Source; readonly bytes: Uint8Array }
  | { readonly kind: "bytes"; readonly bytes: Uint8Array };

const encoder = new TextEncoder();

export function createMemoryWorld(options: MemoryWorldOptions): MemoryWorld {
  const main = fileId(options.main);
  const library = createLibrary();
  const fonts = (options.fonts ?? []).map((descriptor) => new Font(descriptor));
  const book = new FontBook(fonts.map((font) => ({ family: font.family, variant: font.variant })));
  const today: DatetimeValue | null = options.today ? { type: "datetime", ...options.today } : null;
  const entries = new Map<FileId, Entry>();

  const textEntry = (id: FileId, text: string): Entry => {
    const previous = entries.get(id);
    if (previous?.kind === "text" && previous.source.text === text) return previous;
    return { kind: "text", source: new Source(id, text), bytes: encoder.encode(text) };
  };

  for (const [path, content] of Object.entries(options.files ?? {})) {
    const id = fileId(path);
    entries.set(id, typeof content === "string" ? textEntry(id, content) : { kind: "bytes", bytes: content });
  }

  return {
    library: (): Library => library,
    book: () => book,
    main: () => main,
    source(id: FileId): FileResult<Source> {
      const entry = entries.get(id);
      if (!entry) return fail("not-found", id);
      if (entry.kind !== "text") return fail("not-source", id);
      return ok(entry.source);
    },
    file(id: FileId): FileResult<Uint8Array> {
      const entry = entries.get(id);
      return entry ? ok(entry.bytes) : fail("not-found", id);
    },
    font: (index: number) => fonts[index] ?? null,
    today: () => today,
    update(path: string, text: string): void {
      const id = fileId(path);
      entries.set(id, textEntry(id, text));
      debug.world("memory.update", { id, length: text.length });
    },
    setFile(path: string, bytes: Uint8Array): void {
      const id = fileId(path);
      entries.set(id, { kind: "bytes", bytes });
      debug.world("memory.setFile", { id, length: bytes.length });
    },
    remove(path: string): void {
      const id = fileId(path);
      entries.delete(id);
      debug.world("memory.remove", { id });
    },
  };
}
