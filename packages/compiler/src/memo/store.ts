/* =======================================================================================
 * MEMO STORE
 * ---------------------------------------------------------------------------------------
 * Content-addressed cache for pure pipeline steps (module evaluation, block layout,
 * shaping, page assembly).
 *
 * - Keys are fingerprints of argument content, never object identity.
 * - Reads through tracked inputs become constraints that must still hold on lookup.
 * - A nested memoized call hands its constraints to the enclosing call, so an outer
 *   entry is invalidated by anything an inner step read.
 * - Effects (sink writes) observed during a miss are stored and replayed on hits, moved
 *   onto the anchor of the call that hit.
 * - Throwing computations are never cached.
 * ======================================================================================= */

import { debug } from "../shared/debug.js";
import { stableHash, stableSerialize } from "./hash.js";
import { constraintKey, type Constraint, type EffectLog, type TrackedInput } from "./tracked.js";

export interface MemoStoreOptions {
  /** When false every call computes directly. Default true. */
  enabled?: boolean;
}

export interface MemoFunctionStats {
  hits: number;
  misses: number;
  entries: number;
}

export interface MemoStats extends MemoFunctionStats {
  byFunction: Record<string, MemoFunctionStats>;
}

interface MemoEntry<T, E> {
  readonly constraints: readonly Constraint[];
  readonly effects: readonly E[];
  readonly value: T;
  /** Evictions survived since the entry was last used. */
  age: number;
}

interface Frame {
  readonly inputs: Readonly<Record<string, TrackedInput>>;
  readonly constraints: Constraint[];
  readonly seen: Set<string>;
}

/** Non-generic view of one memoized function's table, for eviction and stats. */
interface CacheTable {
  readonly fn: string;
  hits: number;
  misses: number;
  readonly size: number;
  evict(maxAge: number): void;
  clear(): void;
}

export class MemoTable<T, E> implements CacheTable {
  hits = 0;
  misses = 0;
  readonly #entries = new Map<string, MemoEntry<T, E>[]>();

  constructor(readonly fn: string) {}

  get size(): number {
    let n = 0;
    for (const list of this.#entries.values()) n += list.length;
    return n;
  }

  lookup(key: string, inputs: Readonly<Record<string, TrackedInput>>): MemoEntry<T, E> | undefined {
    const candidates = this.#entries.get(key);
    if (!candidates) return undefined;
    return candidates.find((entry) => entry.constraints.every((c) => satisfied(c, inputs)));
  }

  insert(key: string, entry: MemoEntry<T, E>): void {
    const list = this.#entries.get(key);
    if (list) list.push(entry);
    else this.#entries.set(key, [entry]);
  }

  evict(maxAge: number): void {
    for (const [key, list] of this.#entries) {
      const kept = list.filter((entry) => ++entry.age <= maxAge);
      if (kept.length === 0) this.#entries.delete(key);
      else this.#entries.set(key, kept);
    }
  }

  clear(): void {
    this.#entries.clear();
  }
}

function satisfied(c: Constraint, inputs: Readonly<Record<string, TrackedInput>>): boolean {
  const input = inputs[c.input];
  return input !== undefined && input.validate(c.method, c.args) === c.result;
}

export class MemoStore {
  readonly enabled: boolean;
  readonly #tables = new Set<CacheTable>();
  readonly #frames: Frame[] = [];

  constructor(options: MemoStoreOptions = {}) {
    this.enabled = options.enabled ?? true;
  }

  /**
   * Record a call made through a tracked input. Only the innermost running
   * memoized call records it, and only if the input is one of its own.
   */
  record(input: TrackedInput, method: string, args: readonly unknown[], result: string): void {
    const frame = this.#frames.at(-1);
    if (!frame) return;
    const name = inputName(frame, input);
    if (name === undefined) return;
    const key = constraintKey({ input: name, method, args }, stableSerialize(args));
    if (frame.seen.has(key)) return;
    frame.seen.add(key);
    frame.constraints.push({ input: name, method, args, result });
  }

  /** True while some memoized call that owns `input` is running innermost. */
  isTracking(input: TrackedInput): boolean {
    const frame = this.#frames.at(-1);
    return frame !== undefined && inputName(frame, input) !== undefined;
  }

  /**
   * Age every entry by one compilation and drop those unused for more than
   * `maxAge` compilations. `evict(0)` keeps only what the next lookup
   * re-inserts.
   */
  evict(maxAge: number, fns?: readonly string[]): void {
    for (const table of this.#tables) {
      if (!fns || fns.includes(table.fn)) table.evict(maxAge);
    }
    debug.memo("evict", { maxAge, fns: fns ?? "*" });
  }

  clear(fns?: readonly string[]): void {
    for (const table of this.#tables) {
      if (!fns || fns.includes(table.fn)) {
        table.clear();
        table.hits = 0;
        table.misses = 0;
      }
    }
  }

  stats(): MemoStats {
    const byFunction: Record<string, MemoFunctionStats> = {};
    let hits = 0;
    let misses = 0;
    let entries = 0;
    for (const table of this.#tables) {
      const prev = byFunction[table.fn] ?? { hits: 0, misses: 0, entries: 0 };
      byFunction[table.fn] = {
        hits: prev.hits + table.hits,
        misses: prev.misses + table.misses,
        entries: prev.entries + table.size,
      };
      hits += table.hits;
      misses += table.misses;
      entries += table.size;
    }
    return { hits, misses, entries, byFunction };
  }

  /** @internal Used by {@link memoize}. */
  run<T, E>(
    table: MemoTable<T, E>,
    keyValue: unknown,
    inputs: Readonly<Record<string, TrackedInput>>,
    log: EffectLog<E> | undefined,
    compute: () => T,
  ): T {
    const key = stableHash([table.fn, keyValue]);
    const hit = table.lookup(key, inputs);
    if (hit) {
      table.hits++;
      hit.age = 0;
      debug.memo("hit", { fn: table.fn, key: key.slice(0, 12) });
      this.#propagate(hit.constraints, inputs);
      if (log && hit.effects.length > 0) log.replay(hit.effects);
      return hit.value;
    }

    table.misses++;
    debug.memo("miss", { fn: table.fn, key: key.slice(0, 12) });
    const frame: Frame = { inputs, constraints: [], seen: new Set() };
    const effects: E[] = [];
    const unobserve = log?.observe((effect) => effects.push(effect));
    this.#frames.push(frame);
    try {
      const value = compute();
      table.insert(key, { constraints: frame.constraints, effects, value, age: 0 });
      return value;
    } finally {
      this.#frames.pop();
      unobserve?.();
      this.#propagate(frame.constraints, inputs);
    }
  }

  /** @internal */
  table<T, E>(fn: string): MemoTable<T, E> {
    const table = new MemoTable<T, E>(fn);
    this.#tables.add(table);
    return table;
  }

  /** Hand a finished (or reused) call's constraints to the enclosing call. */
  #propagate(constraints: readonly Constraint[], inputs: Readonly<Record<string, TrackedInput>>): void {
    const parent = this.#frames.at(-1);
    if (!parent) return;
    for (const c of constraints) {
      const input = inputs[c.input];
      if (!input) continue;
      const shared = inputName(parent, input);
      if (shared !== undefined) {
        const key = constraintKey({ input: shared, method: c.method, args: c.args }, stableSerialize(c.args));
        if (parent.seen.has(key)) continue;
        parent.seen.add(key);
        parent.constraints.push({ ...c, input: shared });
      } else {
        input.reissue(c.method, c.args);
      }
    }
  }
}

function inputName(frame: Frame, input: TrackedInput): string | undefined {
  for (const [name, candidate] of Object.entries(frame.inputs)) {
    if (candidate === input) return name;
  }
  return undefined;
}

/* =======================================================================================
 * memoize()
 * ======================================================================================= */

/**
 * Where a call's effects sit. Equal keys can stand for content at another place (spans
 * are not part of a content fingerprint), so a hit moves each recorded effect from the
 * anchor it was recorded against onto the anchor of the current call.
 */
export interface EffectAnchor<Args extends readonly unknown[], E, A> {
  of(...args: Args): A;
  move(effect: E, from: A, to: A): E;
}

export interface MemoSpec<Args extends readonly unknown[], T, E, A = never> {
  /** Store serving the call; null computes without caching. */
  store(...args: Args): MemoStore | null;
  /** Content identifying the call (hashed with `stableHash`). */
  key(...args: Args): unknown;
  /** Tracked inputs the computation may read through. */
  inputs?(...args: Args): Readonly<Record<string, TrackedInput>>;
  /** Effect log whose writes are recorded and replayed. */
  effects?(...args: Args): EffectLog<E>;
  anchor?: EffectAnchor<Args, E, A>;
  compute(...args: Args): T;
}

interface Anchored<E, A> {
  readonly effect: E;
  readonly origin: A | undefined;
}

function anchoredLog<Args extends readonly unknown[], E, A>(
  log: EffectLog<E>,
  at: A | undefined,
  anchor: EffectAnchor<Args, E, A> | undefined,
): EffectLog<Anchored<E, A>> {
  return {
    observe: (listener) => log.observe((effect) => listener({ effect, origin: at })),
    replay: (recorded) =>
      log.replay(
        recorded.map(({ effect, origin }) =>
          anchor && origin !== undefined && at !== undefined && origin !== at ? anchor.move(effect, origin, at) : effect,
        ),
      ),
  };
}

/**
 * Wrap a pure step so repeated calls with equal content reuse the earlier result.
 *
 * ```ts
 * const shape = memoize("shape", {
 *   store: (engine) => engine.memo,
 *   key: (_engine, text, props) => [text, props],
 *   inputs: (engine) => ({ world: engine.world }),
 *   effects: (engine) => engine.sink,
 *   compute: (engine, text, props) => shapeUncached(engine, text, props),
 * });
 * ```
 */
export function memoize<Args extends readonly unknown[], T, E = never, A = never>(
  name: string,
  spec: MemoSpec<Args, T, E, A>,
): (...args: Args) => T {
  const tables = new WeakMap<MemoStore, MemoTable<T, Anchored<E, A>>>();
  return (...args: Args): T => {
    const store = spec.store(...args);
    if (!store || !store.enabled) return spec.compute(...args);
    let table = tables.get(store);
    if (!table) {
      table = store.table<T, Anchored<E, A>>(name);
      tables.set(store, table);
    }
    const log = spec.effects?.(...args);
    const effects = log ? anchoredLog(log, spec.anchor?.of(...args), spec.anchor) : undefined;
    return store.run(table, spec.key(...args), spec.inputs?.(...args) ?? {}, effects, () => spec.compute(...args));
  };
}
