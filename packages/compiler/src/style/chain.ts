/* =======================================================================================
 * STYLE CHAIN
 * ---------------------------------------------------------------------------------------
 * Persistent linked list of style frames. `chain(styles)` pushes a frame and returns a
 * new chain sharing the whole prefix; nothing is ever mutated.
 *
 * Lookup walks innermost → outermost and the first match wins. Folding properties
 * combine every match, outermost first, starting from the element default.
 * ======================================================================================= */

import { elementDef, fieldSpec, type FoldKind } from "../content/elements.js";
import type { Cast } from "../eval/cast.js";
import { int, type Value } from "../eval/value.js";
import { stableHash, type Hashable } from "../memo/hash.js";
import { Styles, type Recipe } from "./styles.js";

export class StyleChain implements Hashable {
  static readonly EMPTY = new StyleChain(null, null);
  #fingerprint: string | undefined;

  private constructor(
    readonly head: Styles | null,
    readonly tail: StyleChain | null,
  ) {}

  /** New chain with `styles` as the innermost frame. */
  chain(styles: Styles): StyleChain {
    if (styles.isEmpty()) return this;
    return new StyleChain(styles, this);
  }

  get depth(): number {
    let n = 0;
    for (let link: StyleChain | null = this; link?.head; link = link.tail) n++;
    return n;
  }

  /** Frames innermost first. */
  *frames(): IterableIterator<Styles> {
    for (let link: StyleChain | null = this; link; link = link.tail) {
      if (link.head) yield link.head;
    }
  }

  /** Innermost explicitly set value, ignoring defaults and folding. */
  find(elem: string, name: string): Value | undefined {
    for (const frame of this.frames()) {
      for (let i = frame.items.length - 1; i >= 0; i--) {
        const item = frame.items[i];
        if (item?.kind === "property" && item.elem === elem && item.name === name) return item.value;
      }
    }
    return undefined;
  }

  /** Resolved value: innermost setting (or the fold of all settings), else the default. */
  value(elem: string, name: string): Value {
    const spec = fieldSpec(elem, name);
    if (!spec) throw new Error(`unknown style property ${elem}.${name}`);
    const fallback = spec.default ?? null;
    if (spec.fold) return this.#fold(elem, name, spec.fold, fallback);
    return this.find(elem, name) ?? fallback;
  }

  /** Resolved value extracted through `cast`. */
  get<T>(elem: string, name: string, cast: Cast<T>): T {
    const value = this.value(elem, name);
    const checked = cast.check(value);
    if (checked === undefined) throw new Error(`style property ${elem}.${name} does not hold a ${cast.describe}`);
    return checked;
  }

  /** Like `get`, with `fallback` when the property holds none/auto or another shape. */
  getOr<T>(elem: string, name: string, cast: Cast<T>, fallback: T): T {
    return cast.check(this.value(elem, name)) ?? fallback;
  }

  /** Folded value of a folding property (`text.delta`, `list.depth`, ...). */
  fold(elem: string, name: string): Value {
    return this.value(elem, name);
  }

  /** Show recipes, innermost first. */
  *recipes(): IterableIterator<Recipe> {
    for (const frame of this.frames()) {
      const recipes = [...frame.recipes()];
      for (let i = recipes.length - 1; i >= 0; i--) {
        const recipe = recipes[i];
        if (recipe) yield recipe;
      }
    }
  }

  /** Every element kind with at least one explicitly set property. */
  touched(): Set<string> {
    const out = new Set<string>();
    for (const frame of this.frames()) for (const prop of frame.properties()) out.add(prop.elem);
    return out;
  }

  fingerprint(): string {
    if (this.#fingerprint === undefined) {
      this.#fingerprint = stableHash([...this.frames()]);
    }
    return this.#fingerprint;
  }

  #fold(elem: string, name: string, kind: FoldKind, fallback: Value): Value {
    const settings: Value[] = [];
    for (const frame of this.frames()) {
      const props = [...frame.properties()].filter((p) => p.elem === elem && p.name === name);
      for (let i = props.length - 1; i >= 0; i--) {
        const prop = props[i];
        if (prop) settings.push(prop.value);
      }
    }
    settings.reverse();
    let acc = fallback;
    for (const setting of settings) acc = foldValues(kind, acc, setting);
    return acc;
  }
}

function foldValues(kind: FoldKind, outer: Value, inner: Value): Value {
  switch (kind) {
    case "sum": {
      const a = outer !== null && typeof outer === "object" && outer.type === "int" ? outer.value : 0;
      const b = inner !== null && typeof inner === "object" && inner.type === "int" ? inner.value : 0;
      return int(a + b);
    }
    case "toggle":
      return (outer === true) !== (inner === true);
  }
}

/** Whether `elem` is a known element kind. */
export function isElement(elem: string): boolean {
  return elementDef(elem) !== undefined;
}
