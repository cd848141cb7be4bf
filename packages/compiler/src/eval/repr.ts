import { Content } from "../content/content.js";
import { toHex } from "../geom/color.js";
import { toPt } from "../geom/abs.js";
import type { Length, Rel } from "../geom/length.js";
import type { Align2D } from "../geom/shapes.js";
import { stableHash } from "../memo/hash.js";
import type { Selector, Value } from "./value.js";

/** Source-like representation, as `repr(...)` returns it. */
export function repr(value: Value): string {
  if (value === null) return "none";
  if (typeof value === "boolean") return value ? "true" : "false";
  if (typeof value === "string") return JSON.stringify(value);
  switch (value.type) {
    case "auto":
      return "auto";
    case "int":
      return String(value.value);
    case "float":
      return formatFloat(value.value);
    case "length":
      return formatLength(value.length);
    case "ratio":
      return `${formatNumber(value.value * 100)}%`;
    case "relative":
      return formatRel(value.rel);
    case "fraction":
      return `${formatNumber(value.value)}fr`;
    case "color":
      return `rgb(${JSON.stringify(toHex(value.color))})`;
    case "alignment":
      return formatAlign(value.align);
    case "label":
      return `<${value.name}>`;
    case "array":
      return value.items.length === 1
        ? `(${repr(value.items[0] ?? null)},)`
        : `(${value.items.map(repr).join(", ")})`;
    case "dictionary":
      return value.entries.size === 0
        ? "(:)"
        : `(${[...value.entries].map(([k, v]) => `${k}: ${repr(v)}`).join(", ")})`;
    case "styles":
      return "..";
    case "datetime":
      return `datetime(year: ${value.year}, month: ${value.month}, day: ${value.day})`;
    case "regex":
      return `regex(${JSON.stringify(value.source)})`;
    case "selector":
      return reprSelector(value.selector);
    case "arguments":
      return `arguments(${value.items.map((a) => (a.name ? `${a.name}: ${repr(a.value)}` : repr(a.value))).join(", ")})`;
    case "content":
      return reprContent(value);
    case "function":
      return value.name ?? "(..) => ..";
    case "module":
      return `<module ${value.name}>`;
  }
}

function reprSelector(selector: Selector): string {
  switch (selector.kind) {
    case "elem":
      return selector.where
        ? `${selector.elem}.where(${[...selector.where].map(([k, v]) => `${k}: ${repr(v)}`).join(", ")})`
        : selector.elem;
    case "label":
      return `<${selector.label}>`;
    case "text":
      return JSON.stringify(selector.text);
    case "regex":
      return `regex(${JSON.stringify(selector.source)})`;
  }
}

/** Text a value contributes when it is joined into markup or passed to `str`. */
export function display(value: Value): string {
  if (typeof value === "string") return value;
  if (value instanceof Content) return value.plainText();
  return repr(value);
}

function reprContent(content: Content): string {
  if (content.elem === "text") {
    const text = content.field("text");
    return `[${typeof text === "string" ? text : ""}]`;
  }
  if (content.elem === "sequence" && content.children.length === 0) return "[]";
  return `${content.elem}(..)`;
}

export function formatNumber(n: number): string {
  return String(Math.round(n * 1e6) / 1e6);
}

function formatFloat(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (!Number.isFinite(n)) return n > 0 ? "inf" : "-inf";
  return Number.isInteger(n) ? `${n}.0` : formatNumber(n);
}

function formatLength(length: Length): string {
  const parts: string[] = [];
  if (length.abs !== 0 || length.em === 0) parts.push(`${formatNumber(toPt(length.abs))}pt`);
  if (length.em !== 0) parts.push(`${formatNumber(length.em)}em`);
  return parts.join(" + ");
}

function formatRel(rel: Rel): string {
  const parts: string[] = [];
  if (rel.rel !== 0) parts.push(`${formatNumber(rel.rel * 100)}%`);
  if (rel.abs.abs !== 0 || rel.abs.em !== 0 || parts.length === 0) parts.push(formatLength(rel.abs));
  return parts.join(" + ");
}

function formatAlign(align: Align2D): string {
  return [align.x, align.y].filter((a) => a !== undefined).join(" + ");
}

/* =======================================================================================
 * Equality and ordering
 * ======================================================================================= */

export function valuesEqual(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (a === null || b === null || typeof a !== "object" || typeof b !== "object") return false;
  if ((a.type === "int" || a.type === "float") && (b.type === "int" || b.type === "float")) {
    return a.value === b.value;
  }
  if (a.type !== b.type) return false;
  switch (a.type) {
    case "array":
      return (
        b.type === "array" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valuesEqual(item, b.items[i] ?? null))
      );
    case "dictionary":
      if (b.type !== "dictionary" || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valuesEqual(value, other)) return false;
      }
      return true;
    default:
      return stableHash(a) === stableHash(b);
  }
}

/** Ordering for `<`-style comparisons; null when the values are not comparable. */
export function compareValues(a: Value, b: Value): number | null {
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  if (a === null || b === null || typeof a !== "object" || typeof b !== "object") return null;
  if ((a.type === "int" || a.type === "float") && (b.type === "int" || b.type === "float")) {
    return Math.sign(a.value - b.value);
  }
  if (a.type === "length" && b.type === "length" && a.length.em === 0 && b.length.em === 0) {
    return Math.sign(a.length.abs - b.length.abs);
  }
  if (a.type === "ratio" && b.type === "ratio") return Math.sign(a.value - b.value);
  if (a.type === "fraction" && b.type === "fraction") return Math.sign(a.value - b.value);
  if (a.type === "datetime" && b.type === "datetime") {
    return Math.sign(a.year - b.year || a.month - b.month || a.day - b.day);
  }
  return null;
}
