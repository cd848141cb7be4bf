import { readFileSync, realpathSync } from "node:fs";
import { sep } from "node:path";
import { fileId, fsPathFor, type FileId } from "@quillset/shared";
import { createLibrary } from "../eval/library.js";
import type { DatetimeValue } from "../eval/value.js";
import { FontBook } from "../font/book.js";
import { Font, parseFontDescriptor, type FontDescriptor } from "../font/font.js";
import { debug } from "../shared/debug.js";
import { Source } from "../syntax/source.js";
import type { CalendarDate } from "./memory.js";
import { fail, ok, type FileErrorKind, type FileResult, type Logger, type World } from "./types.js";

export interface FileSystemWorldOptions {
  /** Project directory; files outside it are never read. */
  readonly root: string;
  /** Entry file, relative to the root. */
  readonly main: string;
  /** Font descriptors, or the path of a JSON file holding an array of them. */
  readonly fonts?: string | readonly FontDescriptor[];
  /** Fixed date; the system clock when absent. */
  readonly today?: CalendarDate;
  readonly logger?: Logger;
}

export interface FileSystemWorld extends World {
  /** Forget every cached load, so the next compilation sees the disk as it is now. */
  reset(): void;
}

const nullLogger: Logger = {
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const HOUR_MS = 3_600_000;

export function createFileSystemWorld(options: FileSystemWorldOptions): FileSystemWorld {
  const logger = options.logger ?? nullLogger;
  const root = realpathSync(options.root);
  const main = fileId(options.main);
  const library = createLibrary();
  const fonts = loadFonts(options.fonts, logger).map((descriptor) => new Font(descriptor));
  const book = new FontBook(fonts.map((font) => ({ family: font.family, variant: font.variant })));
  const files = new Map<FileId, FileResult<Uint8Array>>();
  const sources = new Map<FileId, FileResult<Source>>();
  logger.info(`[world] root ${root}, ${fonts.length} font(s)`);

  const read = (id: FileId): FileResult<Uint8Array> => {
    const cached = files.get(id);
    if (cached) return cached;
    const result = readUnder(root, id);
    if (!result.ok) logger.warn(`[world] ${result.error.kind}: ${id}`);
    debug.world("fs.read", { id, ok: result.ok });
    files.set(id, result);
    return result;
  };

  return {
    library: () => library,
    book: () => book,
    main: () => main,
    file: read,
    source(id: FileId): FileResult<Source> {
      const cached = sources.get(id);
      if (cached) return cached;
      const bytes = read(id);
      let result: FileResult<Source>;
      if (!bytes.ok) {
        result = bytes;
      } else {
        const text = decodeUtf8(bytes.value);
        result = text === null ? fail("not-source", id, "file is not valid UTF-8") : ok(new Source(id, text));
      }
      sources.set(id, result);
      return result;
    },
    font: (index: number) => fonts[index] ?? null,
    today(offset: number | null): DatetimeValue | null {
      if (options.today) return { type: "datetime", ...options.today };
      const now = new Date();
      if (offset === null) {
        return { type: "datetime", year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() };
      }
      const shifted = new Date(now.getTime() + offset * HOUR_MS);
      return {
        type: "datetime",
        year: shifted.getUTCFullYear(),
        month: shifted.getUTCMonth() + 1,
        day: shifted.getUTCDate(),
      };
    },
    reset(): void {
      debug.world("fs.reset", { files: files.size, sources: sources.size });
      files.clear();
      sources.clear();
    },
  };
}

function readUnder(root: string, id: FileId): FileResult<Uint8Array> {
  const path = fsPathFor(root, id);
  try {
    // Symlinks may point out of the project.
    const real = realpathSync(path);
    if (real !== root && !real.startsWith(root + sep)) return fail("access-denied", id);
    return ok(new Uint8Array(readFileSync(real)));
  } catch (error) {
    return fail(errorKind(error), id, error instanceof Error ? error.message : String(error));
  }
}

function errorKind(error: unknown): FileErrorKind {
  const code = error instanceof Error ? Reflect.get(error, "code") : undefined;
  switch (code) {
    case "ENOENT":
    case "ENOTDIR":
    case "EISDIR":
      return "not-found";
    case "EACCES":
    case "EPERM":
      return "access-denied";
    default:
      return "other";
  }
}

function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) return null;
    throw error;
  }
}

function loadFonts(fonts: string | readonly FontDescriptor[] | undefined, logger: Logger): FontDescriptor[] {
  if (fonts === undefined) return [];
  if (typeof fonts !== "string") return [...fonts];
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fonts, "utf8"));
  } catch (error) {
    logger.error(`[world] cannot read fonts from ${fonts}: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }
  const entries: unknown[] = Array.isArray(raw) ? raw : [raw];
  const out: FontDescriptor[] = [];
  for (const [i, entry] of entries.entries()) {
    const descriptor = parseFontDescriptor(entry);
    if (descriptor) out.push(descriptor);
    else logger.warn(`[world] skipping font descriptor #${i} in ${fonts}`);
  }
  return out;
}
