/* =======================================================================================
 * ELEMENTS
 * ---------------------------------------------------------------------------------------
 * Declarative registry of element kinds. Each element lists its fields:
 * - positional / required / variadic: how call arguments map onto the field
 * - settable: may be set by `set` rules and resolved through the style chain
 * - fold: how values from several style frames combine (innermost otherwise wins)
 * - internal: written by the compiler (realization, nested lists), never by users
 *
 * Casts normalize user values (e.g. a ratio passed for a relative length becomes a
 * relative length), so later stages read a single representation.
 * ======================================================================================= */

import { fileId, resolveFileId } from "@quillset/shared";
import { Content, text } from "./content.js";
import { sourceError } from "../diagnostics/errors.js";
import { BLACK } from "../geom/color.js";
import { em, length as lengthOf } from "../geom/length.js";
import { pt } from "../geom/abs.js";
import type { SourceSpan } from "../model/span.js";
import { Styles, property, type Property } from "../style/styles.js";
import type { Args } from "../eval/args.js";
import * as C from "../eval/cast.js";
import {
  AUTO,
  align,
  array,
  color,
  dict,
  fraction,
  int,
  label,
  lengthValue,
  relative,
  type Value,
} from "../eval/value.js";

export type FoldKind = "sum" | "toggle";

export interface FieldSpec {
  readonly name: string;
  readonly cast: C.Cast<Value>;
  readonly positional?: boolean;
  readonly required?: boolean;
  readonly variadic?: boolean;
  readonly settable?: boolean;
  readonly default?: Value;
  readonly fold?: FoldKind;
  readonly internal?: boolean;
}

export interface ElementDef {
  readonly name: string;
  readonly fields: readonly FieldSpec[];
  /** Replaces generic construction from call arguments. */
  readonly construct?: (def: ElementDef, args: Args, span: SourceSpan) => Content;
  /** Can be the target of `@label` references. */
  readonly referenceable?: boolean;
}

/* =======================================================================================
 * Field casts
 * ======================================================================================= */

const V = {
  any: C.anyValue,
  str: C.map(C.str, (s): Value => s),
  bool: C.map(C.bool, (b): Value => b),
  int: C.map(C.int, (n): Value => int(n)),
  positiveInt: C.map(C.positiveInt, (n): Value => int(n)),
  content: C.map(C.content, (c): Value => c),
  length: C.map(C.length, (l): Value => lengthValue(l)),
  rel: C.map(C.rel, (r): Value => relative(r)),
  fraction: C.map(C.fraction, (f): Value => fraction(f)),
  color: C.map(C.color, (c): Value => color(c)),
  align: C.map(C.align, (a): Value => align(a)),
  label: C.map(C.label, (l): Value => label(l)),
  func: C.map(C.func, (f): Value => f),
} as const;

function oneOfStrings(...options: readonly string[]): C.Cast<Value> {
  return C.cast(C.describeAll(options.map((o) => JSON.stringify(o))), (value) =>
    typeof value === "string" && options.includes(value) ? value : undefined,
  );
}

function noneOr(inner: C.Cast<Value>): C.Cast<Value> {
  return C.noneOr(inner);
}

function autoOr(inner: C.Cast<Value>): C.Cast<Value> {
  return C.autoOr(inner);
}

/** A family name or a fallback list, stored as an array of names. */
const fontList: C.Cast<Value> = C.cast("string or array of strings", (value) => {
  if (typeof value === "string") return array([value]);
  const names = C.arrayOf(C.str).check(value);
  return names && names.length > 0 ? array(names) : undefined;
});

const WEIGHT_NAMES: Readonly<Record<string, number>> = {
  thin: 100,
  light: 300,
  regular: 400,
  medium: 500,
  semibold: 600,
  bold: 700,
  black: 900,
};

const weight: C.Cast<Value> = C.cast("integer or weight name", (value) => {
  if (typeof value === "string") {
    const named = WEIGHT_NAMES[value];
    return named === undefined ? undefined : int(named);
  }
  const n = C.int.check(value);
  return n !== undefined && n >= 100 && n <= 900 ? int(n) : undefined;
});

/** none, a thickness, a paint, or a `(paint: .., thickness: ..)` dictionary. */
export const stroke: C.Cast<Value> = C.cast("none, length, color or stroke dictionary", (value) => {
  if (value === null) return null;
  const thickness = C.length.check(value);
  if (thickness) return strokeValue(lengthValue(thickness), color(BLACK));
  const paint = C.color.check(value);
  if (paint) return strokeValue(lengthValue(lengthOf(pt(1))), color(paint));
  const entries = C.dict.check(value);
  if (!entries) return undefined;
  const t = entries.get("thickness");
  const p = entries.get("paint");
  const checkedThickness = t === undefined ? lengthOf(pt(1)) : C.length.check(t);
  const checkedPaint = p === undefined ? BLACK : C.color.check(p);
  if (!checkedThickness || !checkedPaint) return undefined;
  return strokeValue(lengthValue(checkedThickness), color(checkedPaint));
});

function strokeValue(thickness: Value, paint: Value): Value {
  return dict([
    ["paint", paint],
    ["thickness", thickness],
  ]);
}

const SIDE_KEYS = new Set(["left", "top", "right", "bottom", "x", "y", "rest"]);

/** A relative length for all sides, or a dictionary of sides. */
const sides: C.Cast<Value> = C.cast("relative length or dictionary of sides", (value) => {
  const all = C.rel.check(value);
  if (all) return relative(all);
  const entries = C.dict.check(value);
  if (!entries) return undefined;
  const out: [string, Value][] = [];
  for (const [key, side] of entries) {
    const checked = C.rel.check(side);
    if (!SIDE_KEYS.has(key) || !checked) return undefined;
    out.push([key, relative(checked)]);
  }
  return dict(out);
});

/** `auto`, a relative length or a fraction. */
const trackSize: C.Cast<Value> = C.anyOf(
  C.cast("auto", (value) => (C.isAuto(value) ? value : undefined)),
  V.rel,
  V.fraction,
);

/** A column count or a list of track sizes, stored as a list of track sizes. */
const tracks: C.Cast<Value> = C.cast("integer or array of track sizes", (value) => {
  const count = C.positiveInt.check(value);
  if (count !== undefined) return array(Array.from({ length: count }, () => AUTO));
  const sizes = C.arrayOf(trackSize).check(value);
  return sizes && sizes.length > 0 ? array(sizes) : undefined;
});

const markers: C.Cast<Value> = C.cast("content or array of content", (value) => {
  const list = C.arrayOf(C.content).check(value);
  if (list && list.length > 0) return array(list);
  const single = C.content.check(value);
  return single ? array([single]) : undefined;
});

const numbering: C.Cast<Value> = noneOr(C.anyOf(V.str, V.func));

const spacing: C.Cast<Value> = C.anyOf(V.rel, V.fraction);

function itemOf(elem: string): C.Cast<Value> {
  return C.map(C.content, (c): Value => (c.is(elem) ? c : Content.element(elem, [["body", c]], c.span)));
}

/* =======================================================================================
 * Construction
 * ======================================================================================= */

/** Build an element from call arguments using its field declarations. */
export function constructGeneric(def: ElementDef, args: Args, span: SourceSpan): Content {
  const fields: [string, Value][] = [];
  for (const field of def.fields) {
    if (field.internal) continue;
    let value: Value | undefined;
    if (field.variadic) {
      value = array(args.all(field.cast));
    } else if (field.positional) {
      value = field.required
        ? (args.named(field.name, field.cast) ?? args.expect(field.name, field.cast))
        : (args.eat(field.cast) ?? args.named(field.name, field.cast));
    } else {
      value = args.named(field.name, field.cast);
    }
    if (value !== undefined) fields.push([field.name, value]);
  }
  args.finish();
  return Content.element(def.name, fields, span);
}

/** Consume the named arguments that match settable fields as a style frame. */
export function collectProperties(def: ElementDef, args: Args, span: SourceSpan): Styles {
  const props: Property[] = [];
  for (const field of def.fields) {
    if (!field.settable || field.internal) continue;
    const value = args.named(field.name, field.cast);
    if (value !== undefined) props.push(property(def.name, field.name, value, span));
  }
  return Styles.of(...props);
}

/** Element whose call styles its body instead of wrapping it (`text(..)[..]`). */
function constructStyling(wrap: (body: Content, span: SourceSpan) => Content) {
  return (def: ElementDef, args: Args, span: SourceSpan): Content => {
    const styles = collectProperties(def, args, span);
    const body = args.eat(C.content) ?? Content.EMPTY;
    args.finish();
    return Content.styled(wrap(body, span), styles);
  };
}

function setOnly(def: ElementDef, _args: Args, span: SourceSpan): Content {
  throw sourceError("quillset/eval/invalid-operation", {
    message: `${def.name} can only be used with set rules`,
    span,
  });
}

function weakBreak(elem: string, span: SourceSpan): Content {
  return Content.element(elem, [["weak", true]], span);
}

/* =======================================================================================
 * Registry
 * ======================================================================================= */

const body: FieldSpec = { name: "body", cast: V.content, positional: true, required: true };
const optionalBody: FieldSpec = { name: "body", cast: V.content, positional: true };

function settable(name: string, cast: C.Cast<Value>, defaultValue: Value, extra: Partial<FieldSpec> = {}): FieldSpec {
  return { name, cast, settable: true, default: defaultValue, ...extra };
}

const ZERO_REL = relative({ rel: 0, abs: lengthOf(0) });

function relPt(points: number): Value {
  return relative({ rel: 0, abs: lengthOf(pt(points)) });
}

function relEm(value: number): Value {
  return relative({ rel: 0, abs: em(value) });
}

const DEFAULT_STROKE = strokeValue(lengthValue(lengthOf(pt(1))), color(BLACK));

const DEFINITIONS: readonly ElementDef[] = [
  {
    name: "text",
    fields: [
      { name: "text", cast: V.str, positional: true, required: true },
      settable("font", fontList, array(["Libertinus Serif"])),
      settable("fallback", V.bool, true),
      settable("size", V.length, lengthValue(lengthOf(pt(11)))),
      settable("fill", V.color, color(BLACK)),
      settable("weight", weight, int(400)),
      settable("style", oneOfStrings("normal", "italic", "oblique"), "normal"),
      settable("lang", V.str, "en"),
      settable("delta", V.int, int(0), { fold: "sum", internal: true }),
      settable("emph", V.bool, false, { fold: "toggle", internal: true }),
    ],
    construct: constructStyling((b) => b),
  },
  { name: "space", fields: [] },
  { name: "linebreak", fields: [settable("justify", V.bool, false)] },
  { name: "parbreak", fields: [] },
  { name: "strong", fields: [body, settable("delta", V.int, int(300))] },
  { name: "emph", fields: [body] },
  {
    name: "raw",
    fields: [
      { name: "text", cast: V.str, positional: true, required: true },
      settable("block", V.bool, false),
      settable("lang", noneOr(V.str), null),
      settable("font", fontList, array(["DejaVu Sans Mono"])),
    ],
  },
  {
    name: "equation",
    fields: [body, settable("block", V.bool, false)],
  },
  {
    name: "heading",
    referenceable: true,
    fields: [
      body,
      settable("level", V.positiveInt, int(1)),
      settable("numbering", numbering, null),
      settable("supplement", noneOr(V.content), text("Section")),
      { name: "numbers", cast: C.map(C.arrayOf(C.int), (ns): Value => array(ns.map(int))), internal: true },
      { name: "prefix", cast: noneOr(V.content), internal: true },
    ],
  },
  {
    name: "list",
    fields: [
      { name: "children", cast: itemOf("list-item"), variadic: true },
      settable("marker", markers, array([text("•"), text("‣"), text("–")])),
      settable("indent", V.length, lengthValue(lengthOf(0))),
      settable("body-indent", V.length, lengthValue(em(0.5))),
      settable("spacing", autoOr(spacing), AUTO),
      settable("tight", V.bool, true),
      settable("depth", V.int, int(0), { fold: "sum", internal: true }),
    ],
  },
  { name: "list-item", fields: [body] },
  {
    name: "enum",
    fields: [
      { name: "children", cast: itemOf("enum-item"), variadic: true },
      settable("numbering", C.anyOf(V.str, V.func), "1."),
      settable("start", V.int, int(1)),
      settable("indent", V.length, lengthValue(lengthOf(0))),
      settable("body-indent", V.length, lengthValue(em(0.5))),
      settable("spacing", autoOr(spacing), AUTO),
      settable("tight", V.bool, true),
      settable("depth", V.int, int(0), { fold: "sum", internal: true }),
    ],
  },
  {
    name: "enum-item",
    fields: [{ name: "number", cast: noneOr(V.int), settable: false }, body],
  },
  {
    name: "par",
    fields: [
      optionalBody,
      settable("leading", V.length, lengthValue(em(0.65))),
      settable("justify", V.bool, false),
      settable("spacing", V.length, lengthValue(em(1.2))),
      settable("first-line-indent", V.length, lengthValue(lengthOf(0))),
    ],
    construct: constructStyling((b, span) =>
      Content.sequence([Content.element("parbreak", [], span), b, Content.element("parbreak", [], span)]),
    ),
  },
  {
    name: "align",
    fields: [
      { name: "alignment", cast: V.align, positional: true, required: true },
      body,
    ],
  },
  {
    name: "block",
    fields: [
      optionalBody,
      settable("width", autoOr(V.rel), AUTO),
      settable("height", autoOr(V.rel), AUTO),
      settable("inset", sides, ZERO_REL),
      settable("fill", noneOr(V.color), null),
      settable("stroke", stroke, null),
      settable("breakable", V.bool, true),
      settable("above", autoOr(V.length), AUTO),
      settable("below", autoOr(V.length), AUTO),
    ],
  },
  {
    name: "box",
    fields: [
      optionalBody,
      settable("width", autoOr(C.anyOf(V.rel, V.fraction)), AUTO),
      settable("height", autoOr(V.rel), AUTO),
      settable("inset", sides, ZERO_REL),
      settable("fill", noneOr(V.color), null),
      settable("stroke", stroke, null),
    ],
  },
  {
    name: "rect",
    fields: [
      optionalBody,
      settable("width", autoOr(V.rel), AUTO),
      settable("height", autoOr(V.rel), AUTO),
      settable("inset", sides, relPt(5)),
      settable("fill", noneOr(V.color), null),
      settable("stroke", stroke, DEFAULT_STROKE),
    ],
  },
  {
    name: "image",
    fields: [
      { name: "path", cast: V.str, positional: true, required: true },
      settable("width", autoOr(V.rel), AUTO),
      settable("height", autoOr(V.rel), AUTO),
      settable("alt", noneOr(V.str), null),
    ],
    construct: (def, args, span) => {
      const content = constructGeneric(def, args, span);
      const path = content.field("path");
      if (typeof path !== "string") return content;
      const resolved = resolveFileId(span.file ?? fileId("/"), path);
      // Left as written when it climbs above the root; layout refuses such paths.
      return resolved ? content.withField("path", resolved) : content;
    },
  },
  tableDef("table", relPt(5), DEFAULT_STROKE),
  tableDef("grid", ZERO_REL, null),
  {
    name: "v",
    fields: [
      { name: "amount", cast: spacing, positional: true, required: true },
      settable("weak", V.bool, false),
    ],
  },
  {
    name: "h",
    fields: [
      { name: "amount", cast: spacing, positional: true, required: true },
      settable("weak", V.bool, false),
    ],
  },
  { name: "pagebreak", fields: [settable("weak", V.bool, false)] },
  { name: "colbreak", fields: [settable("weak", V.bool, false)] },
  {
    name: "page",
    fields: [
      optionalBody,
      settable("paper", V.str, "a4"),
      settable("width", autoOr(V.length), AUTO),
      settable("height", autoOr(V.length), AUTO),
      settable("margin", autoOr(sides), AUTO),
      settable("columns", V.positiveInt, int(1)),
      settable("gutter", V.rel, relative({ rel: 0.04, abs: lengthOf(0) })),
      settable("numbering", numbering, null),
      settable("number-align", V.align, align({ x: "center", y: "bottom" })),
      settable("fill", noneOr(V.color), null),
      settable("header", noneOr(V.content), null),
      settable("footer", noneOr(V.content), null),
    ],
    construct: constructStyling((b, span) =>
      Content.sequence([weakBreak("pagebreak", span), b, weakBreak("pagebreak", span)]),
    ),
  },
  {
    name: "document",
    fields: [settable("title", noneOr(V.content), null), settable("author", fontList, array([]))],
    construct: setOnly,
  },
  {
    name: "ref",
    fields: [
      { name: "target", cast: V.label, positional: true, required: true },
      settable("supplement", autoOr(noneOr(V.content)), AUTO),
      { name: "resolved", cast: V.content, internal: true },
    ],
  },
  {
    name: "link",
    fields: [
      { name: "dest", cast: C.anyOf(V.str, V.label), positional: true, required: true },
      optionalBody,
    ],
    construct: (def, args, span) => {
      const content = constructGeneric(def, args, span);
      if (content.has("body")) return content;
      const dest = content.field("dest");
      return content.withField("body", text(typeof dest === "string" ? dest.replace(/^(mailto:|tel:)/, "") : "", span));
    },
  },
  {
    name: "metadata",
    fields: [{ name: "value", cast: V.any, positional: true, required: true }],
  },
];

function tableDef(name: string, inset: Value, strokeDefault: Value): ElementDef {
  return {
    name,
    fields: [
      { name: "children", cast: V.content, variadic: true },
      settable("columns", tracks, array([AUTO])),
      settable("inset", sides, inset),
      settable("stroke", stroke, strokeDefault),
      settable("gutter", V.rel, ZERO_REL),
      settable("align", autoOr(V.align), AUTO),
      settable("fill", noneOr(V.color), null),
    ],
  };
}

const REGISTRY: ReadonlyMap<string, ElementDef> = new Map(DEFINITIONS.map((def) => [def.name, def]));

export function elementDef(name: string): ElementDef | undefined {
  return REGISTRY.get(name);
}

export function elementDefs(): Iterable<ElementDef> {
  return REGISTRY.values();
}

export function fieldSpec(elem: string, name: string): FieldSpec | undefined {
  return REGISTRY.get(elem)?.fields.find((field) => field.name === name);
}

/** Construct an element from call arguments. */
export function construct(def: ElementDef, args: Args, span: SourceSpan): Content {
  return (def.construct ?? constructGeneric)(def, args, span);
}

