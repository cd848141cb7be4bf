/* =======================================================================================
 * CONTENT
 * ---------------------------------------------------------------------------------------
 * Immutable document tree produced by evaluation. Three shapes share one class:
 * - sequence: ordered children
 * - styled: one child with a style frame applied
 * - element: a named element with a field map (text, heading, table, ...)
 *
 * Modifications return a new node; unchanged children are shared by reference.
 * Spans are excluded from the fingerprint so moving text around an element does not
 * change the element's identity for caching.
 * ======================================================================================= */

import { stableHash, type Hashable } from "../memo/hash.js";
import { DETACHED_SPAN, type SourceSpan } from "../model/span.js";
import type { Styles } from "../style/styles.js";
import type { Value } from "../eval/value.js";

const EMPTY_FIELDS: ReadonlyMap<string, Value> = new Map();
const NO_GUARDS: ReadonlySet<object> = new Set();

interface ContentInit {
  readonly elem: string;
  readonly fields?: ReadonlyMap<string, Value>;
  readonly span?: SourceSpan;
  readonly label?: string | null;
  readonly children?: readonly Content[];
  readonly child?: Content | null;
  readonly styles?: Styles | null;
  readonly guards?: ReadonlySet<object>;
}

export class Content implements Hashable {
  readonly type = "content";
  readonly elem: string;
  readonly span: SourceSpan;
  readonly label: string | null;
  /** Children of a sequence; empty for other shapes. */
  readonly children: readonly Content[];
  /** Styled child of a `styled` node. */
  readonly child: Content | null;
  readonly styles: Styles | null;
  /** Show recipes already applied to this node (compared by identity). */
  readonly guards: ReadonlySet<object>;
  readonly #fields: ReadonlyMap<string, Value>;
  #fingerprint: string | undefined;

  private constructor(init: ContentInit) {
    this.elem = init.elem;
    this.#fields = init.fields ?? EMPTY_FIELDS;
    this.span = init.span ?? DETACHED_SPAN;
    this.label = init.label ?? null;
    this.children = init.children ?? [];
    this.child = init.child ?? null;
    this.styles = init.styles ?? null;
    this.guards = init.guards ?? NO_GUARDS;
  }

  static readonly EMPTY = new Content({ elem: "sequence" });

  static element(elem: string, fields: Iterable<readonly [string, Value]> = [], span?: SourceSpan): Content {
    return new Content({ elem, fields: new Map(fields), span });
  }

  /** Joins `children`, flattening nested sequences. A single child is returned as is. */
  static sequence(children: readonly Content[], span?: SourceSpan): Content {
    const flat: Content[] = [];
    for (const child of children) {
      if (child.isSequence() && child.label === null) flat.push(...child.children);
      else flat.push(child);
    }
    if (flat.length === 0) return span ? new Content({ elem: "sequence", span }) : Content.EMPTY;
    if (flat.length === 1 && flat[0]) return flat[0];
    return new Content({ elem: "sequence", children: flat, span });
  }

  static styled(child: Content, styles: Styles): Content {
    if (styles.isEmpty()) return child;
    return new Content({ elem: "styled", child, styles, span: child.span });
  }

  isSequence(): boolean {
    return this.elem === "sequence";
  }

  isStyled(): boolean {
    return this.elem === "styled";
  }

  isEmpty(): boolean {
    return this.elem === "sequence" && this.children.length === 0;
  }

  is(elem: string): boolean {
    return this.elem === elem;
  }

  field(name: string): Value | undefined {
    return this.#fields.get(name);
  }

  has(name: string): boolean {
    return this.#fields.has(name);
  }

  fields(): ReadonlyMap<string, Value> {
    return this.#fields;
  }

  /** Body field as content, if present. */
  body(): Content | null {
    const body = this.#fields.get("body");
    return body instanceof Content ? body : null;
  }

  withField(name: string, value: Value): Content {
    const fields = new Map(this.#fields);
    fields.set(name, value);
    return this.#copy({ fields });
  }

  withFields(updates: Iterable<readonly [string, Value]>): Content {
    const fields = new Map(this.#fields);
    let changed = false;
    for (const [name, value] of updates) {
      if (fields.get(name) === value) continue;
      fields.set(name, value);
      changed = true;
    }
    return changed ? this.#copy({ fields }) : this;
  }

  withLabel(label: string | null): Content {
    if (label === this.label) return this;
    return this.#copy({ label });
  }

  withSpan(span: SourceSpan): Content {
    return this.#copy({ span });
  }

  withChildren(children: readonly Content[]): Content {
    if (children.length === this.children.length && children.every((c, i) => c === this.children[i])) return this;
    return this.#copy({ children });
  }

  withChild(child: Content): Content {
    if (child === this.child) return this;
    return this.#copy({ child });
  }

  guarded(recipe: object): Content {
    const guards = new Set(this.guards);
    guards.add(recipe);
    return this.#copy({ guards });
  }

  isGuarded(recipe: object): boolean {
    return this.guards.has(recipe);
  }

  /** Concatenated text of every leaf, the way `repr`-free string conversion sees it. */
  plainText(): string {
    switch (this.elem) {
      case "sequence":
        return this.children.map((c) => c.plainText()).join("");
      case "styled":
        return this.child?.plainText() ?? "";
      case "text":
      case "raw":
      case "equation": {
        const text = this.#fields.get("text");
        return typeof text === "string" ? text : (this.body()?.plainText() ?? "");
      }
      case "space":
        return " ";
      case "linebreak":
        return "\n";
      case "parbreak":
        return "\n\n";
      default: {
        const body = this.body();
        if (body) return body.plainText();
        const children = this.#fields.get("children");
        if (children && typeof children === "object" && "type" in children && children.type === "array") {
          return children.items.map((item) => (item instanceof Content ? item.plainText() : "")).join("");
        }
        return "";
      }
    }
  }

  fingerprint(): string {
    if (this.#fingerprint === undefined) {
      this.#fingerprint = stableHash({
        elem: this.elem,
        fields: this.#fields,
        label: this.label,
        children: this.children,
        child: this.child,
        styles: this.styles,
      });
    }
    return this.#fingerprint;
  }

  equals(other: Content): boolean {
    return this === other || this.fingerprint() === other.fingerprint();
  }

  #copy(patch: Partial<ContentInit>): Content {
    return new Content({
      elem: this.elem,
      fields: this.#fields,
      span: this.span,
      label: this.label,
      children: this.children,
      child: this.child,
      styles: this.styles,
      guards: this.guards,
      ...patch,
    });
  }
}

export function text(value: string, span?: SourceSpan): Content {
  return Content.element("text", [["text", value]], span);
}

export function space(span?: SourceSpan): Content {
  return Content.element("space", [], span);
}

export function isContent(value: unknown): value is Content {
  return value instanceof Content;
}
