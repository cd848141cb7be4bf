/* =======================================================================================
 * FUNCTIONS
 * ---------------------------------------------------------------------------------------
 * - NativeFunc: implemented in TypeScript (standard library)
 * - ElementFunc: constructs an element; also usable in set/show rules
 * - Closure: user-defined; captures the free variables it references at creation
 * - PartialFunc: a function with arguments pre-applied by `.with(..)`
 *
 * Calling lives in `vm.ts`; this file only describes the values.
 * ======================================================================================= */

import type { FileId } from "@quillset/shared";
import type { ElementDef } from "../content/elements.js";
import { digest, stableHash, type Hashable } from "../memo/hash.js";
import type { SourceSpan } from "../model/span.js";
import type { ClosureExpr } from "../syntax/ast.js";
import type { Args } from "./args.js";
import type { Engine } from "./engine.js";
import type { ArgItem, Value } from "./value.js";

export type FuncKind = "native" | "element" | "closure" | "partial";

/** What a native function sees of its caller. */
export interface CallContext {
  readonly engine: Engine;
  /** Span of the call expression. */
  readonly span: SourceSpan;
  /** Calls a function value with positional arguments (for callbacks). */
  call(func: Func, args: readonly Value[]): Value;
}

export type NativeImpl = (ctx: CallContext, args: Args) => Value;

const NO_SCOPE: ReadonlyMap<string, Value> = new Map();

export abstract class Func implements Hashable {
  readonly type = "function";
  abstract readonly kind: FuncKind;
  abstract readonly name: string | null;

  /** Definitions reachable by field access, e.g. `datetime.today`. */
  get scope(): ReadonlyMap<string, Value> {
    return NO_SCOPE;
  }

  abstract fingerprint(): string;

  withArgs(args: readonly ArgItem[]): PartialFunc {
    return new PartialFunc(this, args);
  }
}

export class NativeFunc extends Func {
  readonly kind = "native";
  readonly #scope: ReadonlyMap<string, Value>;

  constructor(
    readonly name: string,
    readonly impl: NativeImpl,
    scope: Iterable<readonly [string, Value]> = [],
  ) {
    super();
    this.#scope = new Map(scope);
  }

  override get scope(): ReadonlyMap<string, Value> {
    return this.#scope;
  }

  fingerprint(): string {
    return `native:${this.name}`;
  }
}

export class ElementFunc extends Func {
  readonly kind = "element";

  constructor(readonly def: ElementDef) {
    super();
  }

  get name(): string {
    return this.def.name;
  }

  fingerprint(): string {
    return `element:${this.def.name}`;
  }
}

/** Span-free identity of closure syntax, cached per node. */
const syntaxDigests = new WeakMap<ClosureExpr, string>();
const SPAN_KEYS = new Set(["span", "keySpan", "nameSpan", "fieldSpan", "argsSpan"]);

function syntaxDigest(node: ClosureExpr): string {
  let cached = syntaxDigests.get(node);
  if (cached === undefined) {
    cached = digest(JSON.stringify(node, (key, value: unknown) => (SPAN_KEYS.has(key) ? undefined : value)));
    syntaxDigests.set(node, cached);
  }
  return cached;
}

export class Closure extends Func {
  readonly kind = "closure";
  #fingerprint: string | undefined;

  constructor(
    readonly node: ClosureExpr,
    /** Free variables of the body, captured by value at creation. */
    readonly captured: ReadonlyMap<string, Value>,
    /** File the closure was defined in; relative paths inside resolve from here. */
    readonly file: FileId | null,
  ) {
    super();
  }

  get name(): string | null {
    return this.node.name;
  }

  fingerprint(): string {
    if (this.#fingerprint === undefined) {
      this.#fingerprint = stableHash(["closure", syntaxDigest(this.node), this.captured, this.file]);
    }
    return this.#fingerprint;
  }
}

export class PartialFunc extends Func {
  readonly kind = "partial";

  constructor(
    readonly inner: Func,
    readonly args: readonly ArgItem[],
  ) {
    super();
  }

  get name(): string | null {
    return this.inner.name;
  }

  override get scope(): ReadonlyMap<string, Value> {
    return this.inner.scope;
  }

  fingerprint(): string {
    return stableHash([
      "partial",
      this.inner.fingerprint(),
      this.args.map((a) => [a.name, a.value]),
    ]);
  }
}
