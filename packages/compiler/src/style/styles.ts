/* =======================================================================================
 * STYLES
 * ---------------------------------------------------------------------------------------
 * A style frame: the properties and show recipes one `set`/`show` rule (or one element
 * constructor like `text(..)`) introduces. Frames are immutable and pushed onto a
 * StyleChain; they are never edited in place.
 * ======================================================================================= */

import type { Content } from "../content/content.js";
import type { Func } from "../eval/func.js";
import type { Selector, Value } from "../eval/value.js";
import { stableHash, type Hashable } from "../memo/hash.js";
import type { SourceSpan } from "../model/span.js";

/** A settable field value for one element. */
export interface Property {
  readonly kind: "property";
  readonly elem: string;
  readonly name: string;
  readonly value: Value;
  readonly span: SourceSpan;
}

export type RecipeTransform =
  | { readonly kind: "func"; readonly func: Func }
  | { readonly kind: "content"; readonly content: Content }
  | { readonly kind: "styles"; readonly styles: Styles };

/**
 * A show rule. Applied recipes are recorded on the content they produced by
 * object identity, so a recipe never re-applies to its own output.
 */
export interface Recipe {
  readonly kind: "recipe";
  readonly selector: Selector;
  readonly transform: RecipeTransform;
  readonly span: SourceSpan;
}

export type Style = Property | Recipe;

export class Styles implements Hashable {
  static readonly EMPTY = new Styles([]);
  #fingerprint: string | undefined;

  constructor(readonly items: readonly Style[]) {}

  static of(...items: readonly Style[]): Styles {
    return items.length === 0 ? Styles.EMPTY : new Styles(items);
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** `this` followed by `other`; later entries win on lookup. */
  concat(other: Styles): Styles {
    if (other.isEmpty()) return this;
    if (this.isEmpty()) return other;
    return new Styles([...this.items, ...other.items]);
  }

  *properties(): IterableIterator<Property> {
    for (const item of this.items) if (item.kind === "property") yield item;
  }

  *recipes(): IterableIterator<Recipe> {
    for (const item of this.items) if (item.kind === "recipe") yield item;
  }

  /** Whether this frame sets any property of `elem`. */
  touches(elem: string): boolean {
    return this.items.some((item) => item.kind === "property" && item.elem === elem);
  }

  fingerprint(): string {
    if (this.#fingerprint === undefined) {
      this.#fingerprint = stableHash(
        this.items.map((item) =>
          item.kind === "property"
            ? ["p", item.elem, item.name, item.value]
            : ["r", item.selector, transformKey(item.transform)],
        ),
      );
    }
    return this.#fingerprint;
  }
}

function transformKey(transform: RecipeTransform): unknown {
  switch (transform.kind) {
    case "func":
      return ["func", transform.func];
    case "content":
      return ["content", transform.content];
    case "styles":
      return ["styles", transform.styles];
  }
}

export function property(elem: string, name: string, value: Value, span: SourceSpan): Property {
  return { kind: "property", elem, name, value, span };
}

export function recipe(selector: Selector, transform: RecipeTransform, span: SourceSpan): Recipe {
  return { kind: "recipe", selector, transform, span };
}
