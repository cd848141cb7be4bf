/* =======================================================================================
 * TRACKED INPUTS
 * ---------------------------------------------------------------------------------------
 * A memoized call only depends on its hashed arguments plus the calls it makes through
 * tracked inputs. Each call is recorded as a constraint (method, arguments, result
 * fingerprint); a cached entry is reused only while every constraint still holds.
 * ======================================================================================= */

/** One recorded call through a tracked input. */
export interface Constraint {
  /** Name of the input within the memoized call (e.g. "world", "route"). */
  readonly input: string;
  readonly method: string;
  readonly args: readonly unknown[];
  /** Fingerprint of the result observed when the call was recorded. */
  readonly result: string;
}

/**
 * An object whose method calls are recorded while a memoized call runs.
 *
 * Implementations forward each tracked call to the store
 * (`store.record(this, method, args, fingerprint)`) and can answer the same
 * call again later without recording.
 */
export interface TrackedInput {
  /** Fingerprint of `method(...args)` against the current state, unrecorded. */
  validate(method: string, args: readonly unknown[]): string;
  /**
   * Issue the call again through the tracked path so the enclosing memoized
   * call records whatever it depends on.
   */
  reissue(method: string, args: readonly unknown[]): void;
}

/** Side-effect channel whose writes are recorded and replayed by memoized calls. */
export interface EffectLog<E> {
  observe(listener: (effect: E) => void): () => void;
  replay(effects: readonly E[]): void;
}

export function constraintKey(c: Pick<Constraint, "input" | "method" | "args">, argsKey: string): string {
  return `${c.input}.${c.method}(${argsKey})`;
}
