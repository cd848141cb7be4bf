/* =======================================================================================
 * REALIZATION
 * ---------------------------------------------------------------------------------------
 * Runs once over the evaluated content, in document order, before layout:
 *
 * 1. Headings are numbered (counter per level, `heading.numbering` from the styles).
 * 2. Show recipes are applied innermost first. The element handed to a recipe is
 *    guarded against that recipe, so a transform that returns its input does not loop.
 * 3. Labels of referenceable elements are collected; a second pass attaches the
 *    resolved text to every `ref` that names one.
 *
 * Unchanged subtrees are returned by reference. Errors raised by recipe functions are
 * delayed into the sink; the element is kept as it was.
 * ======================================================================================= */

import { Content, text } from "../content/content.js";
import { elementDef } from "../content/elements.js";
import { formatNumbering } from "../content/numbering.js";
import { isSourceError, sourceError } from "../diagnostics/errors.js";
import * as C from "../eval/cast.js";
import type { Engine } from "../eval/engine.js";
import { display } from "../eval/repr.js";
import { array, int, type Value } from "../eval/value.js";
import { callFunc } from "../eval/vm.js";
import { debug } from "../shared/debug.js";
import { StyleChain } from "../style/chain.js";
import { matches, textMatches } from "../style/selector.js";
import type { Recipe } from "../style/styles.js";

/** Nested show rule applications before `realize/recursion`. */
export const MAX_SHOW_DEPTH = 64;

/** What a label points at, as far as references care. */
export interface LabelTarget {
  readonly elem: string;
  /** Numbering of the target (`1.2`), or null when it is not numbered. */
  readonly number: string | null;
  readonly supplement: Content | null;
}

export interface RealizeResult {
  readonly content: Content;
  readonly labels: ReadonlyMap<string, LabelTarget>;
}

export function realize(engine: Engine, content: Content, styles: StyleChain = StyleChain.EMPTY): RealizeResult {
  return engine.trace.span("realize", () => {
    const realizer = new Realizer(engine);
    const shown = realizer.visit(content, styles, 0);
    const labels = realizer.labels;
    const resolved = resolveRefs(shown, labels);
    debug.realize("done", { labels: labels.size, headings: realizer.headings });
    return { content: resolved, labels };
  });
}

class Realizer {
  readonly labels = new Map<string, LabelTarget>();
  headings = 0;
  readonly #engine: Engine;
  readonly #counter: number[] = [];

  constructor(engine: Engine) {
    this.#engine = engine;
  }

  visit(content: Content, chain: StyleChain, depth: number): Content {
    if (content.isStyled()) {
      const child = content.child;
      const styles = content.styles;
      if (!child || !styles) return content;
      return content.withChild(this.visit(child, chain.chain(styles), depth));
    }
    if (content.isSequence()) {
      return content.withChildren(content.children.map((c) => this.visit(c, chain, depth)));
    }

    let elem = content;
    if (elem.is("heading") && !elem.has("numbers")) elem = this.#number(elem, chain);

    const shown = this.#show(elem, chain, depth);
    if (shown) return shown;

    const visited = this.#visitFields(elem, chain, depth);
    if (visited.label !== null) this.#collect(visited, chain);
    return visited;
  }

  /* -------------------------------------------------------------------------------------
   * Show rules
   * ------------------------------------------------------------------------------------- */

  #show(elem: Content, chain: StyleChain, depth: number): Content | undefined {
    let synthesized: Content | undefined;
    for (const recipe of chain.recipes()) {
      if (elem.isGuarded(recipe)) continue;
      const selector = recipe.selector;
      if (selector.kind === "text" || selector.kind === "regex") {
        const split = this.#showText(recipe, elem);
        if (split) return this.#descend(split, chain, depth, recipe);
        continue;
      }
      synthesized ??= synthesize(elem, chain);
      if (!matches(selector, synthesized)) continue;
      const output = this.#transform(recipe, synthesized);
      return this.#descend(output, chain, depth, recipe);
    }
    return undefined;
  }

  #descend(output: Content, chain: StyleChain, depth: number, recipe: Recipe): Content {
    if (depth + 1 > MAX_SHOW_DEPTH) {
      throw sourceError("quillset/realize/recursion", {
        message: "maximum show rule depth exceeded",
        span: recipe.span,
        hints: ["check whether a show rule produces the element it matches"],
        data: { limit: MAX_SHOW_DEPTH },
      });
    }
    return this.visit(output, chain, depth + 1);
  }

  #transform(recipe: Recipe, target: Content): Content {
    const guarded = target.guarded(recipe);
    const transform = recipe.transform;
    switch (transform.kind) {
      case "styles":
        return Content.styled(guarded, transform.styles);
      case "content":
        return transform.content.guarded(recipe);
      case "func":
        try {
          const value = callFunc(this.#engine, transform.func, [guarded], recipe.span);
          const output = C.content.check(value) ?? text(display(value), recipe.span);
          debug.realize("show", { elem: target.elem, func: transform.func.name ?? "closure" });
          return output.is("text") ? output.guarded(recipe) : output;
        } catch (error) {
          if (!isSourceError(error)) throw error;
          const traced = error.traced({ kind: "show", target: target.elem, span: recipe.span });
          this.#engine.sink.delay(traced.diagnostics);
          return guarded;
        }
    }
  }

  /** Splits a text element around the matches of a text or regex recipe. */
  #showText(recipe: Recipe, elem: Content): Content | undefined {
    if (!elem.is("text")) return undefined;
    const value = elem.field("text");
    if (typeof value !== "string") return undefined;
    const ranges = textMatches(recipe.selector, value);
    if (ranges.length === 0) return undefined;
    const pieces: Content[] = [];
    let last = 0;
    for (const [start, end] of ranges) {
      if (start > last) pieces.push(elem.withField("text", value.slice(last, start)).guarded(recipe));
      pieces.push(this.#transform(recipe, elem.withField("text", value.slice(start, end))));
      last = end;
    }
    if (last < value.length) pieces.push(elem.withField("text", value.slice(last)).guarded(recipe));
    return Content.sequence(pieces, elem.span);
  }

  /* -------------------------------------------------------------------------------------
   * Fields, numbering, labels
   * ------------------------------------------------------------------------------------- */

  #visitFields(elem: Content, chain: StyleChain, depth: number): Content {
    const updates: [string, Value][] = [];
    for (const [name, value] of elem.fields()) {
      if (value instanceof Content) {
        updates.push([name, this.visit(value, chain, depth)]);
      } else if (value !== null && typeof value === "object" && value.type === "array") {
        const items = value.items.map((item) => (item instanceof Content ? this.visit(item, chain, depth) : item));
        if (items.some((item, i) => item !== value.items[i])) updates.push([name, array(items)]);
      }
    }
    return elem.withFields(updates);
  }

  #number(heading: Content, chain: StyleChain): Content {
    const level = C.positiveInt.check(heading.field("level") ?? chain.value("heading", "level")) ?? 1;
    while (this.#counter.length < level) this.#counter.push(0);
    this.#counter.length = level;
    this.#counter[level - 1] = (this.#counter[level - 1] ?? 0) + 1;
    this.headings++;
    const numbers = [...this.#counter];
    const numbering = heading.field("numbering") ?? chain.value("heading", "numbering");
    return heading.withFields([
      ["numbers", array(numbers.map((n) => int(n)))],
      ["prefix", this.#prefix(numbering, numbers, heading)],
    ]);
  }

  #prefix(numbering: Value, numbers: readonly number[], heading: Content): Value {
    if (typeof numbering === "string") return text(formatNumbering(numbering, numbers), heading.span);
    const func = C.func.check(numbering);
    if (!func) return null;
    try {
      return C.content.check(callFunc(this.#engine, func, numbers.map((n) => int(n)), heading.span)) ?? null;
    } catch (error) {
      if (!isSourceError(error)) throw error;
      this.#engine.sink.delay(error.diagnostics);
      return null;
    }
  }

  #collect(elem: Content, chain: StyleChain): void {
    const name = elem.label;
    if (name === null || this.labels.has(name)) return;
    if (!elementDef(elem.elem)?.referenceable) {
      this.labels.set(name, { elem: elem.elem, number: null, supplement: null });
      return;
    }
    const prefix = elem.field("prefix");
    const number = prefix instanceof Content ? trimNumber(prefix.plainText()) : null;
    const supplement = C.content.check(elem.field("supplement") ?? chain.value(elem.elem, "supplement")) ?? null;
    this.labels.set(name, { elem: elem.elem, number, supplement });
  }
}

/** Explicit values for every settable field the element leaves to the styles. */
function synthesize(elem: Content, chain: StyleChain): Content {
  const def = elementDef(elem.elem);
  if (!def) return elem;
  const missing: [string, Value][] = [];
  for (const field of def.fields) {
    if (!field.settable || field.internal || elem.has(field.name)) continue;
    missing.push([field.name, chain.value(elem.elem, field.name)]);
  }
  return elem.withFields(missing);
}

/** `1.2.` → `1.2`: references read better without the trailing separator. */
function trimNumber(number: string): string {
  return number.replace(/[.:)]+$/, "");
}

/** Attaches the resolved text to every reference whose label points at a numbered element. */
export function resolveRefs(content: Content, labels: ReadonlyMap<string, LabelTarget>): Content {
  if (content.isStyled()) {
    const child = content.child;
    return child ? content.withChild(resolveRefs(child, labels)) : content;
  }
  if (content.isSequence()) return content.withChildren(content.children.map((c) => resolveRefs(c, labels)));
  if (content.is("ref")) return resolveRef(content, labels);
  const updates: [string, Value][] = [];
  for (const [name, value] of content.fields()) {
    if (value instanceof Content) {
      updates.push([name, resolveRefs(value, labels)]);
    } else if (value !== null && typeof value === "object" && value.type === "array") {
      const items = value.items.map((item) => (item instanceof Content ? resolveRefs(item, labels) : item));
      if (items.some((item, i) => item !== value.items[i])) updates.push([name, array(items)]);
    }
  }
  return content.withFields(updates);
}

function resolveRef(ref: Content, labels: ReadonlyMap<string, LabelTarget>): Content {
  if (ref.has("resolved")) return ref;
  const target = C.label.check(ref.field("target") ?? null);
  const found = target === undefined ? undefined : labels.get(target);
  if (!found || found.number === null) return ref;
  const own = ref.field("supplement");
  const supplement = own === undefined || C.isAuto(own) ? found.supplement : (C.content.check(own) ?? null);
  const number = text(found.number, ref.span);
  const body =
    supplement && !supplement.isEmpty()
      ? Content.sequence([supplement, text(" ", ref.span), number], ref.span)
      : number;
  return ref.withField("resolved", body);
}
