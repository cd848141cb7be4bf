import type { Value } from "./value.js";

/** One lexical scope: an insertion-ordered set of bindings. */
export class Scope {
  readonly #bindings: Map<string, Value>;

  constructor(entries: Iterable<readonly [string, Value]> = []) {
    this.#bindings = new Map(entries);
  }

  get(name: string): Value | undefined {
    return this.#bindings.get(name);
  }

  has(name: string): boolean {
    return this.#bindings.has(name);
  }

  define(name: string, value: Value): void {
    this.#bindings.set(name, value);
  }

  entries(): IterableIterator<[string, Value]> {
    return this.#bindings.entries();
  }

  get size(): number {
    return this.#bindings.size;
  }
}

/**
 * Lexical scope stack over a read-only base (the standard library).
 * Lookups walk innermost first; assignment rebinds the innermost definition.
 */
export class Scopes {
  readonly #stack: Scope[];

  constructor(
    readonly base: ReadonlyMap<string, Value>,
    top: Scope = new Scope(),
  ) {
    this.#stack = [top];
  }

  /** Outermost user scope; module exports are taken from here. */
  get top(): Scope {
    const first = this.#stack[0];
    if (!first) throw new Error("scope stack is empty");
    return first;
  }

  get current(): Scope {
    const last = this.#stack.at(-1);
    if (!last) throw new Error("scope stack is empty");
    return last;
  }

  enter(): void {
    this.#stack.push(new Scope());
  }

  exit(): void {
    if (this.#stack.length > 1) this.#stack.pop();
  }

  /** Run `fn` in a fresh nested scope. */
  nested<T>(fn: () => T): T {
    this.enter();
    try {
      return fn();
    } finally {
      this.exit();
    }
  }

  get(name: string): Value | undefined {
    for (let i = this.#stack.length - 1; i >= 0; i--) {
      const value = this.#stack[i]?.get(name);
      if (value !== undefined) return value;
    }
    return this.base.get(name);
  }

  /** Like `get`, ignoring the base. */
  getLocal(name: string): Value | undefined {
    for (let i = this.#stack.length - 1; i >= 0; i--) {
      const value = this.#stack[i]?.get(name);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  define(name: string, value: Value): void {
    this.current.define(name, value);
  }

  /** Rebinds an existing user variable. False when `name` is not a user variable. */
  assign(name: string, value: Value): boolean {
    for (let i = this.#stack.length - 1; i >= 0; i--) {
      const scope = this.#stack[i];
      if (scope?.has(name)) {
        scope.define(name, value);
        return true;
      }
    }
    return false;
  }
}
