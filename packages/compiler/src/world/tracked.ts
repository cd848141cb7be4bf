import { fileId, type FileId } from "@quillset/shared";
import type { Library } from "../eval/library.js";
import type { DatetimeValue } from "../eval/value.js";
import type { Font } from "../font/font.js";
import type { FontBook } from "../font/book.js";
import { bytesHash, stableHash } from "../memo/hash.js";
import type { MemoStore } from "../memo/store.js";
import type { TrackedInput } from "../memo/tracked.js";
import type { Source } from "../syntax/source.js";
import type { FileResult, World } from "./types.js";

/**
 * A World whose reads are recorded by the running memoized call, so a cached
 * result is dropped as soon as anything it read changes.
 */
export class TrackedWorld implements TrackedInput {
  constructor(
    readonly inner: World,
    readonly memo: MemoStore | null,
  ) {}

  library(): Library {
    const library = this.inner.library();
    this.#record("library", [], library.fingerprint());
    return library;
  }

  book(): FontBook {
    const book = this.inner.book();
    this.#record("book", [], book.fingerprint());
    return book;
  }

  main(): FileId {
    const main = this.inner.main();
    this.#record("main", [], main);
    return main;
  }

  source(id: FileId): FileResult<Source> {
    const result = this.inner.source(id);
    this.#record("source", [id], resultFingerprint(result, (s) => s.fingerprint()));
    return result;
  }

  file(id: FileId): FileResult<Uint8Array> {
    const result = this.inner.file(id);
    this.#record("file", [id], resultFingerprint(result, bytesHash));
    return result;
  }

  font(index: number): Font | null {
    const font = this.inner.font(index);
    this.#record("font", [index], font ? font.fingerprint() : "none");
    return font;
  }

  today(offset: number | null): DatetimeValue | null {
    const today = this.inner.today(offset);
    this.#record("today", [offset], stableHash(today));
    return today;
  }

  validate(method: string, args: readonly unknown[]): string {
    const [arg] = args;
    switch (method) {
      case "library":
        return this.inner.library().fingerprint();
      case "book":
        return this.inner.book().fingerprint();
      case "main":
        return this.inner.main();
      case "source":
        return resultFingerprint(this.inner.source(fileId(String(arg))), (s) => s.fingerprint());
      case "file":
        return resultFingerprint(this.inner.file(fileId(String(arg))), bytesHash);
      case "font": {
        const font = typeof arg === "number" ? this.inner.font(arg) : null;
        return font ? font.fingerprint() : "none";
      }
      case "today":
        return stableHash(this.inner.today(typeof arg === "number" ? arg : null));
      default:
        throw new Error(`untracked world method ${method}`);
    }
  }

  reissue(method: string, args: readonly unknown[]): void {
    const [arg] = args;
    switch (method) {
      case "library":
        this.library();
        return;
      case "book":
        this.book();
        return;
      case "main":
        this.main();
        return;
      case "source":
        this.source(fileId(String(arg)));
        return;
      case "file":
        this.file(fileId(String(arg)));
        return;
      case "font":
        if (typeof arg === "number") this.font(arg);
        return;
      case "today":
        this.today(typeof arg === "number" ? arg : null);
        return;
      default:
        throw new Error(`untracked world method ${method}`);
    }
  }

  #record(method: string, args: readonly unknown[], result: string): void {
    this.memo?.record(this, method, args, result);
  }
}

function resultFingerprint<T>(result: FileResult<T>, fingerprint: (value: T) => string): string {
  return result.ok ? fingerprint(result.value) : `error:${result.error.kind}:${result.error.path}`;
}
