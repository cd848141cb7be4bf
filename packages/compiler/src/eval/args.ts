import type { SourceSpan } from "../model/span.js";
import { sourceError } from "../diagnostics/errors.js";
import type { Cast } from "./cast.js";
import { typeName, type ArgItem, type ArgsValue, type Value } from "./value.js";

/**
 * Arguments of one call. Accessors consume what they read; `finish()` reports
 * whatever is left as unexpected.
 */
export class Args {
  #items: ArgItem[];

  constructor(
    readonly span: SourceSpan,
    items: readonly ArgItem[],
  ) {
    this.#items = [...items];
  }

  static positional(span: SourceSpan, values: readonly Value[]): Args {
    return new Args(
      span,
      values.map((value) => ({ name: null, value, span })),
    );
  }

  get items(): readonly ArgItem[] {
    return this.#items;
  }

  /** Consume the first positional argument, if any. A present argument must pass `cast`. */
  eat<T>(cast: Cast<T>): T | undefined {
    const index = this.#items.findIndex((item) => item.name === null);
    const item = this.#items[index];
    if (!item) return undefined;
    this.#items.splice(index, 1);
    return checked(item, cast);
  }

  /** Consume the first positional argument, failing when there is none. */
  expect<T>(what: string, cast: Cast<T>): T {
    const value = this.eat(cast);
    if (value === undefined) {
      throw sourceError("quillset/eval/missing-argument", {
        message: `missing argument: ${what}`,
        span: this.span,
        data: { name: what },
      });
    }
    return value;
  }

  /** Consume the first positional argument that passes `cast`, skipping others. */
  find<T>(cast: Cast<T>): T | undefined {
    for (let i = 0; i < this.#items.length; i++) {
      const item = this.#items[i];
      if (!item || item.name !== null) continue;
      const value = cast.check(item.value);
      if (value !== undefined) {
        this.#items.splice(i, 1);
        return value;
      }
    }
    return undefined;
  }

  /** Consume every positional argument. */
  all<T>(cast: Cast<T>): T[] {
    const out: T[] = [];
    for (let value = this.eat(cast); value !== undefined; value = this.eat(cast)) out.push(value);
    return out;
  }

  /** Consume every argument named `name`; the last one wins. */
  named<T>(name: string, cast: Cast<T>): T | undefined {
    const matching = this.#items.filter((item) => item.name === name);
    if (matching.length === 0) return undefined;
    this.#items = this.#items.filter((item) => item.name !== name);
    const last = matching[matching.length - 1];
    return last ? checked(last, cast) : undefined;
  }

  hasNamed(name: string): boolean {
    return this.#items.some((item) => item.name === name);
  }

  /** Move every remaining argument into a new `Args`. */
  take(): Args {
    const taken = new Args(this.span, this.#items);
    this.#items = [];
    return taken;
  }

  finish(): void {
    const extra = this.#items[0];
    if (!extra) return;
    throw sourceError("quillset/eval/unexpected-argument", {
      message: extra.name ? `unexpected argument: ${extra.name}` : "unexpected argument",
      span: extra.span,
    });
  }

  toValue(): ArgsValue {
    return { type: "arguments", items: [...this.#items] };
  }
}

function checked<T>(item: ArgItem, cast: Cast<T>): T {
  const value = cast.check(item.value);
  if (value === undefined) {
    throw sourceError("quillset/eval/type-mismatch", {
      message: `expected ${cast.describe}, found ${typeName(item.value)}`,
      span: item.span,
      data: { expected: cast.describe, actual: typeName(item.value) },
    });
  }
  return value;
}
