/* =======================================================================================
 * VALUES
 * ---------------------------------------------------------------------------------------
 * none, booleans and strings are plain JS values; everything else is a tagged object
 * discriminated by `type`. All values are immutable.
 * ======================================================================================= */

import type { Content } from "../content/content.js";
import type { Align2D } from "../geom/shapes.js";
import type { Color } from "../geom/color.js";
import type { Length, Rel } from "../geom/length.js";
import type { SourceSpan } from "../model/span.js";
import type { Styles } from "../style/styles.js";
import type { Func } from "./func.js";
import type { Module } from "./module.js";

export interface AutoValue {
  readonly type: "auto";
}
export interface IntValue {
  readonly type: "int";
  readonly value: number;
}
export interface FloatValue {
  readonly type: "float";
  readonly value: number;
}
export interface LengthValue {
  readonly type: "length";
  readonly length: Length;
}
export interface RatioValue {
  readonly type: "ratio";
  /** 1 = 100%. */
  readonly value: number;
}
export interface RelativeValue {
  readonly type: "relative";
  readonly rel: Rel;
}
export interface FractionValue {
  readonly type: "fraction";
  readonly value: number;
}
export interface ColorValue {
  readonly type: "color";
  readonly color: Color;
}
export interface AlignValue {
  readonly type: "alignment";
  readonly align: Align2D;
}
export interface LabelValue {
  readonly type: "label";
  readonly name: string;
}
export interface ArrayValue {
  readonly type: "array";
  readonly items: readonly Value[];
}
export interface DictValue {
  readonly type: "dictionary";
  /** Insertion-ordered. */
  readonly entries: ReadonlyMap<string, Value>;
}
export interface StylesValue {
  readonly type: "styles";
  readonly styles: Styles;
}
export interface DatetimeValue {
  readonly type: "datetime";
  readonly year: number;
  readonly month: number;
  readonly day: number;
}
export interface RegexValue {
  readonly type: "regex";
  readonly source: string;
}
export interface SelectorValue {
  readonly type: "selector";
  readonly selector: Selector;
}

export interface ArgItem {
  readonly name: string | null;
  readonly value: Value;
  readonly span: SourceSpan;
}
export interface ArgsValue {
  readonly type: "arguments";
  readonly items: readonly ArgItem[];
}

/** What a show rule matches. */
export type Selector =
  | { readonly kind: "elem"; readonly elem: string; readonly where: ReadonlyMap<string, Value> | null }
  | { readonly kind: "label"; readonly label: string }
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "regex"; readonly source: string };

export type Value =
  | null
  | boolean
  | string
  | AutoValue
  | IntValue
  | FloatValue
  | LengthValue
  | RatioValue
  | RelativeValue
  | FractionValue
  | ColorValue
  | AlignValue
  | LabelValue
  | ArrayValue
  | DictValue
  | StylesValue
  | DatetimeValue
  | RegexValue
  | SelectorValue
  | ArgsValue
  | Content
  | Func
  | Module;

export type ValueType =
  | "none"
  | "boolean"
  | "string"
  | Exclude<Value, null | boolean | string>["type"];

/* =======================================================================================
 * Constructors
 * ======================================================================================= */

export const AUTO: AutoValue = { type: "auto" };

export function int(value: number): IntValue {
  return { type: "int", value: Math.trunc(value) };
}

export function float(value: number): FloatValue {
  return { type: "float", value };
}

export function lengthValue(length: Length): LengthValue {
  return { type: "length", length };
}

export function ratio(value: number): RatioValue {
  return { type: "ratio", value };
}

export function relative(rel: Rel): RelativeValue {
  return { type: "relative", rel };
}

export function fraction(value: number): FractionValue {
  return { type: "fraction", value };
}

export function color(c: Color): ColorValue {
  return { type: "color", color: c };
}

export function align(a: Align2D): AlignValue {
  return { type: "alignment", align: a };
}

export function label(name: string): LabelValue {
  return { type: "label", name };
}

export function array(items: readonly Value[]): ArrayValue {
  return { type: "array", items };
}

export function dict(entries: Iterable<readonly [string, Value]>): DictValue {
  return { type: "dictionary", entries: new Map(entries) };
}

export function selector(sel: Selector): SelectorValue {
  return { type: "selector", selector: sel };
}

/* =======================================================================================
 * Inspection
 * ======================================================================================= */

export function typeOf(value: Value): ValueType {
  if (value === null) return "none";
  if (typeof value === "boolean") return "boolean";
  if (typeof value === "string") return "string";
  return value.type;
}

const TYPE_NAMES: Record<ValueType, string> = {
  none: "none",
  auto: "auto",
  boolean: "boolean",
  string: "string",
  int: "integer",
  float: "float",
  length: "length",
  ratio: "ratio",
  relative: "relative length",
  fraction: "fraction",
  color: "color",
  alignment: "alignment",
  label: "label",
  array: "array",
  dictionary: "dictionary",
  styles: "styles",
  datetime: "datetime",
  regex: "regex",
  selector: "selector",
  arguments: "arguments",
  content: "content",
  function: "function",
  module: "module",
};

/** Human-facing type name ("integer", "relative length", ...). */
export function typeName(value: Value): string {
  return TYPE_NAMES[typeOf(value)];
}
