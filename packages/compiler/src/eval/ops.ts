/* =======================================================================================
 * OPERATORS
 * ---------------------------------------------------------------------------------------
 * Arithmetic promotes int to float when the other side is a float; `/` always yields a
 * float. Lengths, ratios and relative lengths mix under `+`/`-` into relative lengths.
 * ======================================================================================= */

import { Content, text } from "../content/content.js";
import { sourceError } from "../diagnostics/errors.js";
import { addLengths, scaleLength, ZERO_LENGTH, type Length, type Rel } from "../geom/length.js";
import type { SourceSpan } from "../model/span.js";
import type { BinaryOp, UnaryOp } from "../syntax/ast.js";
import { compareValues, display, valuesEqual } from "./repr.js";
import {
  array,
  dict,
  float,
  fraction,
  int,
  lengthValue,
  ratio,
  relative,
  typeName,
  type Value,
} from "./value.js";

type Obj = Exclude<Value, null | boolean | string>;

function isObj(value: Value): value is Obj {
  return value !== null && typeof value === "object";
}

function numberOf(value: Value): number | undefined {
  return isObj(value) && (value.type === "int" || value.type === "float") ? value.value : undefined;
}

function isInt(value: Value): boolean {
  return isObj(value) && value.type === "int";
}

/** Length, ratio or relative length as a relative length. */
function relOf(value: Value): Rel | undefined {
  if (!isObj(value)) return undefined;
  if (value.type === "length") return { rel: 0, abs: value.length };
  if (value.type === "ratio") return { rel: value.value, abs: ZERO_LENGTH };
  if (value.type === "relative") return value.rel;
  return undefined;
}

/** Simplest value for `rel`: a plain length or ratio where possible. */
function fromRel(rel: Rel): Value {
  if (rel.rel === 0) return lengthValue(rel.abs);
  if (rel.abs.abs === 0 && rel.abs.em === 0) return ratio(rel.rel);
  return relative(rel);
}

function scaleValue(value: Value, factor: number): Value | undefined {
  if (!isObj(value)) return undefined;
  switch (value.type) {
    case "length":
      return lengthValue(scaleLength(value.length, factor));
    case "ratio":
      return ratio(value.value * factor);
    case "relative":
      return relative({ rel: value.rel.rel * factor, abs: scaleLength(value.rel.abs, factor) });
    case "fraction":
      return fraction(value.value * factor);
    default:
      return undefined;
  }
}

function mismatch(op: string, lhs: Value, rhs: Value, span: SourceSpan): never {
  throw sourceError("quillset/eval/invalid-operation", {
    message: `cannot apply '${op}' to ${typeName(lhs)} and ${typeName(rhs)}`,
    span,
  });
}

export function unaryOp(op: UnaryOp, value: Value, span: SourceSpan): Value {
  if (op === "not") {
    if (typeof value === "boolean") return !value;
    throw sourceError("quillset/eval/invalid-operation", {
      message: `cannot apply 'not' to ${typeName(value)}`,
      span,
    });
  }
  const n = numberOf(value);
  if (op === "+") {
    if (n !== undefined || relOf(value) !== undefined || (isObj(value) && value.type === "fraction")) return value;
  } else {
    if (n !== undefined) return isInt(value) ? int(-n) : float(-n);
    const negated = scaleValue(value, -1);
    if (negated) return negated;
  }
  throw sourceError("quillset/eval/invalid-operation", {
    message: `cannot apply '${op}' to ${typeName(value)}`,
    span,
  });
}

export function binaryOp(op: Exclude<BinaryOp, "and" | "or" | "=" | "+=" | "-=" | "*=" | "/=">, lhs: Value, rhs: Value, span: SourceSpan): Value {
  switch (op) {
    case "+":
      return add(lhs, rhs, span);
    case "-":
      return sub(lhs, rhs, span);
    case "*":
      return mul(lhs, rhs, span);
    case "/":
      return div(lhs, rhs, span);
    case "==":
      return valuesEqual(lhs, rhs);
    case "!=":
      return !valuesEqual(lhs, rhs);
    case "<":
    case "<=":
    case ">":
    case ">=": {
      const order = compareValues(lhs, rhs);
      if (order === null) {
        throw sourceError("quillset/eval/invalid-operation", {
          message: `cannot compare ${typeName(lhs)} with ${typeName(rhs)}`,
          span,
        });
      }
      return op === "<" ? order < 0 : op === "<=" ? order <= 0 : op === ">" ? order > 0 : order >= 0;
    }
    case "in":
      return contains(lhs, rhs, span);
    case "not in":
      return !contains(lhs, rhs, span);
  }
}

/** Integer arithmetic stays within the exactly representable range. */
function checkedInt(n: number, span: SourceSpan): Value {
  if (!Number.isSafeInteger(n)) {
    throw sourceError("quillset/eval/invalid-operation", { message: "the result is too large", span });
  }
  return int(n);
}

export function add(lhs: Value, rhs: Value, span: SourceSpan): Value {
  if (lhs === null) return rhs;
  if (rhs === null) return lhs;
  const a = numberOf(lhs);
  const b = numberOf(rhs);
  if (a !== undefined && b !== undefined) return isInt(lhs) && isInt(rhs) ? checkedInt(a + b, span) : float(a + b);
  if (typeof lhs === "string" && typeof rhs === "string") return lhs + rhs;
  if (lhs instanceof Content || rhs instanceof Content) {
    const left = toJoinable(lhs);
    const right = toJoinable(rhs);
    if (left && right) return Content.sequence([left, right]);
    return mismatch("+", lhs, rhs, span);
  }
  if (!isObj(lhs) || !isObj(rhs)) return mismatch("+", lhs, rhs, span);
  if (lhs.type === "array" && rhs.type === "array") return array([...lhs.items, ...rhs.items]);
  if (lhs.type === "dictionary" && rhs.type === "dictionary") return dict([...lhs.entries, ...rhs.entries]);
  if (lhs.type === "fraction" && rhs.type === "fraction") return fraction(lhs.value + rhs.value);
  if (lhs.type === "alignment" && rhs.type === "alignment") {
    const x = lhs.align.x ?? rhs.align.x;
    const y = lhs.align.y ?? rhs.align.y;
    if ((lhs.align.x && rhs.align.x) || (lhs.align.y && rhs.align.y)) {
      throw sourceError("quillset/eval/invalid-operation", {
        message: "cannot add two alignments on the same axis",
        span,
      });
    }
    return { type: "alignment", align: { ...(x ? { x } : {}), ...(y ? { y } : {}) } };
  }
  const strokeOf = (thickness: Value, paint: Value): Value => dict([["paint", paint], ["thickness", thickness]]);
  if (lhs.type === "length" && rhs.type === "color") return strokeOf(lhs, rhs);
  if (lhs.type === "color" && rhs.type === "length") return strokeOf(rhs, lhs);
  const l = relOf(lhs);
  const r = relOf(rhs);
  if (l && r) return fromRel({ rel: l.rel + r.rel, abs: addLengths(l.abs, r.abs) });
  return mismatch("+", lhs, rhs, span);
}

function sub(lhs: Value, rhs: Value, span: SourceSpan): Value {
  const a = numberOf(lhs);
  const b = numberOf(rhs);
  if (a !== undefined && b !== undefined) return isInt(lhs) && isInt(rhs) ? checkedInt(a - b, span) : float(a - b);
  const negated = scaleValue(rhs, -1);
  if (negated && (relOf(lhs) || (isObj(lhs) && lhs.type === "fraction"))) return add(lhs, negated, span);
  return mismatch("-", lhs, rhs, span);
}

function mul(lhs: Value, rhs: Value, span: SourceSpan): Value {
  const a = numberOf(lhs);
  const b = numberOf(rhs);
  if (a !== undefined && b !== undefined) return isInt(lhs) && isInt(rhs) ? checkedInt(a * b, span) : float(a * b);
  if (a !== undefined || b !== undefined) {
    const factor = a ?? b ?? 1;
    const other = a !== undefined ? rhs : lhs;
    const scaled = scaleValue(other, factor);
    if (scaled) return scaled;
    const count = a !== undefined && isInt(lhs) ? a : b !== undefined && isInt(rhs) ? b : undefined;
    if (count !== undefined) {
      if (count < 0) {
        throw sourceError("quillset/eval/invalid-operation", {
          message: "cannot repeat a negative number of times",
          span,
        });
      }
      if (typeof other === "string") return other.repeat(count);
      if (other instanceof Content) return Content.sequence(Array.from({ length: count }, () => other));
      if (isObj(other) && other.type === "array") {
        return array(Array.from({ length: count }, () => other.items).flat());
      }
    }
  }
  return mismatch("*", lhs, rhs, span);
}

function div(lhs: Value, rhs: Value, span: SourceSpan): Value {
  const b = numberOf(rhs);
  if (b === 0) {
    throw sourceError("quillset/eval/invalid-operation", { message: "cannot divide by zero", span });
  }
  const a = numberOf(lhs);
  if (a !== undefined && b !== undefined) return float(a / b);
  if (b !== undefined) {
    const scaled = scaleValue(lhs, 1 / b);
    if (scaled) return scaled;
  }
  if (isObj(lhs) && isObj(rhs)) {
    const quotient = ratioOf(lhs, rhs);
    if (quotient !== undefined) {
      if (quotient === null) {
        throw sourceError("quillset/eval/invalid-operation", { message: "cannot divide by zero", span });
      }
      return float(quotient);
    }
  }
  return mismatch("/", lhs, rhs, span);
}

/** `lhs / rhs` for two values of the same dimension; null on a zero divisor. */
function ratioOf(lhs: Obj, rhs: Obj): number | null | undefined {
  const pair = (x: number, y: number) => (y === 0 ? null : x / y);
  if (lhs.type === "length" && rhs.type === "length") {
    const x = absOnly(lhs.length);
    const y = absOnly(rhs.length);
    if (x !== undefined && y !== undefined) return pair(x, y);
    if (lhs.length.abs === 0 && rhs.length.abs === 0) return pair(lhs.length.em, rhs.length.em);
  }
  if (lhs.type === "ratio" && rhs.type === "ratio") return pair(lhs.value, rhs.value);
  if (lhs.type === "fraction" && rhs.type === "fraction") return pair(lhs.value, rhs.value);
  return undefined;
}

function absOnly(length: Length): number | undefined {
  return length.em === 0 ? length.abs : undefined;
}

function contains(needle: Value, haystack: Value, span: SourceSpan): boolean {
  if (typeof haystack === "string") {
    if (typeof needle === "string") return haystack.includes(needle);
  } else if (isObj(haystack) && haystack.type === "array") {
    return haystack.items.some((item) => valuesEqual(item, needle));
  } else if (isObj(haystack) && haystack.type === "dictionary") {
    if (typeof needle === "string") return haystack.entries.has(needle);
  }
  return mismatch("in", needle, haystack, span);
}

/** Joins the results of consecutive expressions in a block. */
export function join(lhs: Value, rhs: Value, span: SourceSpan): Value {
  if (rhs === null) return lhs;
  if (lhs === null) return rhs;
  if (typeof lhs === "string" && typeof rhs === "string") return lhs + rhs;
  const left = toJoinable(lhs);
  const right = toJoinable(rhs);
  if (left && right && (lhs instanceof Content || rhs instanceof Content || isDisplayable(lhs) || isDisplayable(rhs))) {
    return Content.sequence([left, right]);
  }
  if (isObj(lhs) && isObj(rhs)) {
    if (lhs.type === "array" && rhs.type === "array") return array([...lhs.items, ...rhs.items]);
    if (lhs.type === "dictionary" && rhs.type === "dictionary") return dict([...lhs.entries, ...rhs.entries]);
  }
  throw sourceError("quillset/eval/invalid-operation", {
    message: `cannot join ${typeName(lhs)} with ${typeName(rhs)}`,
    span,
  });
}

function isDisplayable(value: Value): boolean {
  return typeof value === "string" || numberOf(value) !== undefined;
}

/** Content a value contributes when joined into markup. */
export function toJoinable(value: Value): Content | undefined {
  if (value === null) return Content.EMPTY;
  if (value instanceof Content) return value;
  if (typeof value === "string" || numberOf(value) !== undefined) return text(display(value));
  return undefined;
}
