/* =======================================================================================
 * STANDARD LIBRARY
 * ---------------------------------------------------------------------------------------
 * Global bindings every file starts from: element functions, foundations (type, repr,
 * range, assert, ...), colors, alignments and the `calc` module.
 * ======================================================================================= */

import { resolveFileId } from "@quillset/shared";
import { Content } from "../content/content.js";
import { elementDefs } from "../content/elements.js";
import { formatNumbering, isNumberingPattern } from "../content/numbering.js";
import { sourceError } from "../diagnostics/errors.js";
import { NAMED_COLORS, luma, parseHexColor, rgb } from "../geom/color.js";
import { stableHash, type Hashable } from "../memo/hash.js";
import type { Args } from "./args.js";
import * as C from "./cast.js";
import { ElementFunc, NativeFunc, type CallContext, type NativeImpl } from "./func.js";
import { fileErrorToSourceError } from "./import.js";
import { Module } from "./module.js";
import { display, repr, valuesEqual } from "./repr.js";
import {
  align,
  array,
  color,
  float,
  int,
  label,
  typeName,
  type DatetimeValue,
  type Value,
} from "./value.js";

export class Library implements Hashable {
  #fingerprint: string | undefined;

  constructor(readonly global: ReadonlyMap<string, Value>) {}

  /** New library with `bindings` added or replaced. */
  with(bindings: Iterable<readonly [string, Value]>): Library {
    return new Library(new Map([...this.global, ...bindings]));
  }

  fingerprint(): string {
    if (this.#fingerprint === undefined) this.#fingerprint = stableHash(["library", this.global]);
    return this.#fingerprint;
  }
}

function native(name: string, impl: NativeImpl, scope: Iterable<readonly [string, Value]> = []): [string, Value] {
  return [name, new NativeFunc(name, impl, scope)];
}

function invalid(ctx: CallContext, message: string): never {
  throw sourceError("quillset/eval/invalid-argument", { message, span: ctx.span });
}

/* =======================================================================================
 * Foundations
 * ======================================================================================= */

const foundations: [string, Value][] = [
  native("type", (_ctx, args) => typeName(args.expect("value", C.anyValue))),
  native("repr", (_ctx, args) => repr(args.expect("value", C.anyValue))),
  native("str", (ctx, args) => {
    const value = args.expect("value", C.anyValue);
    const base = args.named("base", C.int);
    if (base !== undefined) {
      const n = C.int.check(value);
      if (n === undefined || base < 2 || base > 36) invalid(ctx, "base conversion needs an integer and a base from 2 to 36");
      return n.toString(base);
    }
    if (value instanceof Content) invalid(ctx, "cannot convert content to string; use `.text()`");
    return display(value);
  }),
  native("label", (ctx, args) => {
    const name = args.expect("name", C.str);
    if (name.length === 0) invalid(ctx, "label name must not be empty");
    return label(name);
  }),
  native("regex", (ctx, args) => {
    const source = args.expect("regex", C.str);
    try {
      new RegExp(source, "u");
    } catch (error) {
      invalid(ctx, `invalid regular expression: ${error instanceof Error ? error.message : String(error)}`);
    }
    return { type: "regex", source };
  }),
  native("lower", (_ctx, args) => caseOf(args, (s) => s.toLowerCase())),
  native("upper", (_ctx, args) => caseOf(args, (s) => s.toUpperCase())),
  native("len", (ctx, args) => {
    const value = args.expect("value", C.anyValue);
    if (typeof value === "string") return int([...value].length);
    const items = C.array.check(value);
    if (items) return int(items.length);
    const entries = C.dict.check(value);
    if (entries) return int(entries.size);
    return invalid(ctx, `cannot take the length of ${typeName(value)}`);
  }),
  native("range", (ctx, args) => {
    const first = args.expect("end", C.int);
    const second = args.eat(C.int);
    const step = args.named("step", C.int) ?? 1;
    if (step === 0) invalid(ctx, "step must not be zero");
    const [start, end] = second === undefined ? [0, first] : [first, second];
    const out: Value[] = [];
    for (let i = start; step > 0 ? i < end : i > end; i += step) out.push(int(i));
    return array(out);
  }),
  native(
    "assert",
    (ctx, args) => {
      const condition = args.expect("condition", C.bool);
      const message = args.named("message", C.str);
      if (!condition) fail(ctx, message ?? "assertion failed");
      return null;
    },
    [
      native("eq", (ctx, args) => {
        const left = args.expect("left", C.anyValue);
        const right = args.expect("right", C.anyValue);
        const message = args.named("message", C.str);
        if (!valuesEqual(left, right)) {
          fail(ctx, message ?? `equality assertion failed: value ${repr(left)} was not equal to ${repr(right)}`);
        }
        return null;
      }),
      native("ne", (ctx, args) => {
        const left = args.expect("left", C.anyValue);
        const right = args.expect("right", C.anyValue);
        const message = args.named("message", C.str);
        if (valuesEqual(left, right)) {
          fail(ctx, message ?? `inequality assertion failed: value ${repr(left)} was equal to ${repr(right)}`);
        }
        return null;
      }),
    ],
  ),
  native("panic", (ctx, args) => {
    const values = args.all(C.anyValue);
    fail(ctx, values.length === 0 ? "panicked" : `panicked with: ${values.map(repr).join(", ")}`);
  }),
  native("rgb", (ctx, args) => {
    const hex = args.find(C.str);
    if (hex !== undefined) {
      const parsed = parseHexColor(hex);
      if (!parsed) invalid(ctx, `invalid hex color: ${hex}`);
      return color(parsed);
    }
    const channels = args.all(C.anyOf(C.int, C.map(C.ratio, (r) => r * 255)));
    if (channels.length < 3 || channels.length > 4) invalid(ctx, "expected three or four color channels");
    const [r = 0, g = 0, b = 0, a = 255] = channels;
    return color(rgb(r, g, b, a));
  }),
  native("luma", (_ctx, args) => {
    const value = args.expect("lightness", C.anyOf(C.int, C.map(C.ratio, (r) => r * 255)));
    return color(luma(value));
  }),
  native("read", (ctx, args) => {
    const path = args.expect("path", C.str);
    const encoding = args.named("encoding", C.noneOr(C.str));
    const id = resolveFileId(ctx.span.file ?? ctx.engine.world.main(), path);
    if (!id) {
      throw sourceError("quillset/world/access-denied", {
        message: `cannot read ${path}: outside of the project root`,
        span: ctx.span,
        data: { path },
      });
    }
    const loaded = ctx.engine.world.file(id);
    if (!loaded.ok) throw fileErrorToSourceError(loaded.error, ctx.span);
    if (encoding === null) return array([...loaded.value].map((b) => int(b)));
    try {
      return new TextDecoder("utf-8", { fatal: true }).decode(loaded.value);
    } catch {
      return invalid(ctx, `${path} is not valid utf-8`);
    }
  }),
  native(
    "datetime",
    (ctx, args) => {
      const year = args.named("year", C.int);
      const month = args.named("month", C.int);
      const day = args.named("day", C.int);
      if (year === undefined || month === undefined || day === undefined) {
        invalid(ctx, "datetime needs a year, a month and a day");
      }
      return makeDate(ctx, year, month, day);
    },
    [
      native("today", (ctx, args) => {
        const offset = args.named("offset", C.autoOr(C.int));
        const today = ctx.engine.world.today(offset === undefined || C.isAuto(offset) ? null : offset);
        if (!today) {
          throw sourceError("quillset/eval/invalid-operation", {
            message: "unable to get the current date",
            span: ctx.span,
          });
        }
        return today;
      }),
    ],
  ),
  native("numbering", (ctx, args) => {
    const pattern = args.expect("numbering", C.anyOf<string | Value>(C.str, C.func));
    const numbers = args.all(C.int);
    if (typeof pattern === "string") {
      if (!isNumberingPattern(pattern)) invalid(ctx, `invalid numbering pattern: ${pattern}`);
      return formatNumbering(pattern, numbers);
    }
    const func = C.func.check(pattern);
    if (!func) return invalid(ctx, "expected a numbering pattern or function");
    return ctx.call(func, numbers.map((n) => int(n)));
  }),
];

function caseOf(args: Args, fn: (s: string) => string): Value {
  const value = args.expect("text", C.anyOf<Value>(C.map(C.str, (s): Value => s), C.map(C.content, (c): Value => c)));
  return typeof value === "string" ? fn(value) : fn(display(value));
}

function fail(ctx: CallContext, message: string): never {
  throw sourceError("quillset/eval/assert", { message, span: ctx.span });
}

function makeDate(ctx: CallContext, year: number, month: number, day: number): DatetimeValue {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    invalid(ctx, "date is invalid");
  }
  return { type: "datetime", year, month, day };
}

/* =======================================================================================
 * calc
 * ======================================================================================= */

const num = C.num;

function numeric(n: number, preferInt: boolean): Value {
  return preferInt && Number.isInteger(n) ? int(n) : float(n);
}

const calc = new Module(
  "calc",
  new Map<string, Value>([
    native("abs", (_ctx, args) => {
      const value = args.expect("value", C.anyValue);
      const n = num.check(value);
      if (n === undefined) throw typeError(args, "integer or float", value);
      return numeric(Math.abs(n), C.int.check(value) !== undefined);
    }),
    native("min", (ctx, args) => extremum(ctx, args, (a, b) => a < b)),
    native("max", (ctx, args) => extremum(ctx, args, (a, b) => a > b)),
    native("pow", (ctx, args) => {
      const base = args.expect("base", C.anyValue);
      const exponent = args.expect("exponent", C.anyValue);
      const b = num.check(base);
      const e = num.check(exponent);
      if (b === undefined || e === undefined) return invalid(ctx, "pow needs two numbers");
      const bothInt = C.int.check(base) !== undefined && C.int.check(exponent) !== undefined && e >= 0;
      const result = b ** e;
      if (bothInt && !Number.isSafeInteger(result)) {
        throw sourceError("quillset/eval/invalid-operation", { message: "the result is too large", span: ctx.span });
      }
      return numeric(result, bothInt);
    }),
    native("sqrt", (ctx, args) => {
      const n = args.expect("value", num);
      if (n < 0) invalid(ctx, "cannot take square root of negative number");
      return float(Math.sqrt(n));
    }),
    native("floor", (_ctx, args) => int(Math.floor(args.expect("value", num)))),
    native("ceil", (_ctx, args) => int(Math.ceil(args.expect("value", num)))),
    native("round", (_ctx, args) => {
      const value = args.expect("value", C.anyValue);
      const digits = args.named("digits", C.int) ?? 0;
      const n = num.check(value);
      if (n === undefined) throw typeError(args, "integer or float", value);
      if (digits === 0) return C.int.check(value) !== undefined ? int(n) : int(Math.round(n));
      const factor = 10 ** digits;
      return float(Math.round(n * factor) / factor);
    }),
    native("rem", (ctx, args) => {
      const dividend = args.expect("dividend", C.anyValue);
      const divisor = args.expect("divisor", C.anyValue);
      const a = num.check(dividend);
      const b = num.check(divisor);
      if (a === undefined || b === undefined) return invalid(ctx, "rem needs two numbers");
      if (b === 0) invalid(ctx, "divisor must not be zero");
      return numeric(a % b, C.int.check(dividend) !== undefined && C.int.check(divisor) !== undefined);
    }),
    native("clamp", (ctx, args) => {
      const value = args.expect("value", num);
      const lo = args.expect("min", num);
      const hi = args.expect("max", num);
      if (hi < lo) invalid(ctx, "max must be greater than or equal to min");
      return numeric(Math.min(hi, Math.max(lo, value)), false);
    }),
    native("even", (_ctx, args) => args.expect("value", C.int) % 2 === 0),
    native("odd", (_ctx, args) => Math.abs(args.expect("value", C.int) % 2) === 1),
    ["pi", float(Math.PI)],
    ["e", float(Math.E)],
  ]),
  Content.EMPTY,
);

function typeError(args: Args, expected: string, found: Value): Error {
  return sourceError("quillset/eval/type-mismatch", {
    message: `expected ${expected}, found ${typeName(found)}`,
    span: args.span,
    data: { expected, actual: typeName(found) },
  });
}

function extremum(ctx: CallContext, args: Args, better: (a: number, b: number) => boolean): Value {
  const values = args.all(C.anyValue);
  let best: Value | undefined;
  let bestNumber = 0;
  for (const value of values) {
    const n = num.check(value);
    if (n === undefined) throw typeError(args, "integer or float", value);
    if (best === undefined || better(n, bestNumber)) {
      best = value;
      bestNumber = n;
    }
  }
  if (best === undefined) return invalid(ctx, "expected at least one value");
  return best;
}

/* =======================================================================================
 * Assembly
 * ======================================================================================= */

/** Elements only the compiler builds; they have no global function. */
const HIDDEN_ELEMENTS = new Set(["list-item", "enum-item"]);

function elementBindings(): [string, Value][] {
  const out: [string, Value][] = [];
  for (const def of elementDefs()) {
    if (!HIDDEN_ELEMENTS.has(def.name)) out.push([def.name, new ElementFunc(def)]);
  }
  return out;
}

const colors: [string, Value][] = Object.entries(NAMED_COLORS).map(([name, c]) => [name, color(c)]);

const alignments: [string, Value][] = [
  ["left", align({ x: "left" })],
  ["center", align({ x: "center" })],
  ["right", align({ x: "right" })],
  ["start", align({ x: "start" })],
  ["end", align({ x: "end" })],
  ["top", align({ y: "top" })],
  ["horizon", align({ y: "horizon" })],
  ["bottom", align({ y: "bottom" })],
];

let defaultLibrary: Library | undefined;

/** The standard library. Shared; libraries are immutable. */
export function createLibrary(): Library {
  defaultLibrary ??= new Library(
    new Map<string, Value>([...elementBindings(), ...foundations, ...colors, ...alignments, ["calc", calc]]),
  );
  return defaultLibrary;
}
