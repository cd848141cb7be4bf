/* =======================================================================================
 * METHODS
 * ---------------------------------------------------------------------------------------
 * Methods on built-in values. Values are immutable: mutating methods (`push`, `insert`,
 * ...) compute the updated value and the evaluator writes it back to the variable.
 * ======================================================================================= */

import { Content } from "../content/content.js";
import { elementDef } from "../content/elements.js";
import { sourceError } from "../diagnostics/errors.js";
import type { Args } from "./args.js";
import * as C from "./cast.js";
import { ElementFunc, type CallContext } from "./func.js";
import { add } from "./ops.js";
import { compareValues, valuesEqual } from "./repr.js";
import {
  array,
  dict,
  int,
  selector,
  typeName,
  type ArrayValue,
  type DatetimeValue,
  type DictValue,
  type Value,
} from "./value.js";

export interface MutationResult {
  /** Value of the call expression. */
  readonly result: Value;
  /** New value of the variable the method was called on. */
  readonly updated: Value;
}

const MUTATING: Readonly<Record<string, ReadonlySet<string>>> = {
  array: new Set(["push", "pop", "insert", "remove"]),
  dictionary: new Set(["insert", "remove"]),
};

export function isMutatingMethod(target: Value, name: string): boolean {
  if (target === null || typeof target !== "object") return false;
  return MUTATING[target.type]?.has(name) ?? false;
}

export function callMethod(ctx: CallContext, target: Value, name: string, args: Args): Value {
  const result = dispatch(ctx, target, name, args);
  args.finish();
  return result;
}

export function callMutatingMethod(ctx: CallContext, target: Value, name: string, args: Args): MutationResult {
  const result = mutate(ctx, target, name, args);
  args.finish();
  return result;
}

function unknownMethod(target: Value, name: string, ctx: CallContext): never {
  throw sourceError("quillset/eval/unknown-field", {
    message: `type ${typeName(target)} has no method \`${name}\``,
    span: ctx.span,
    data: { name },
  });
}

function outOfBounds(index: number, len: number, ctx: CallContext): never {
  throw sourceError("quillset/eval/invalid-argument", {
    message: `index out of bounds (index: ${index}, len: ${len})`,
    span: ctx.span,
  });
}

/** Resolves a possibly negative index against `len`. */
function locate(index: number, len: number, ctx: CallContext, inclusiveEnd = false): number {
  const resolved = index < 0 ? len + index : index;
  if (resolved < 0 || resolved > len || (!inclusiveEnd && resolved === len)) outOfBounds(index, len, ctx);
  return resolved;
}

function dispatch(ctx: CallContext, target: Value, name: string, args: Args): Value {
  if (typeof target === "string") return stringMethod(ctx, target, name, args);
  if (target instanceof Content) return contentMethod(ctx, target, name, args);
  if (target === null || typeof target !== "object") return unknownMethod(target, name, ctx);
  switch (target.type) {
    case "array":
      return arrayMethod(ctx, target, name, args);
    case "dictionary":
      return dictMethod(ctx, target, name, args);
    case "datetime":
      return datetimeMethod(ctx, target, name, args);
    case "function":
      if (name === "with") return target.withArgs(args.take().items);
      if (name === "where" && target instanceof ElementFunc) {
        const fields = args.take().items;
        const positional = fields.find((item) => item.name === null);
        if (positional) {
          throw sourceError("quillset/eval/unexpected-argument", {
            message: "where() takes only named arguments",
            span: positional.span,
          });
        }
        return selector({
          kind: "elem",
          elem: target.name,
          where: new Map(fields.map((item): [string, Value] => [item.name ?? "", item.value])),
        });
      }
      return unknownMethod(target, name, ctx);
    case "color":
      if (name === "lighten" || name === "darken") {
        const amount = args.expect("factor", C.ratio);
        const c = target.color;
        const shift = (channel: number) =>
          name === "lighten" ? channel + (255 - channel) * amount : channel * (1 - amount);
        return {
          type: "color",
          color: { r: Math.round(shift(c.r)), g: Math.round(shift(c.g)), b: Math.round(shift(c.b)), a: c.a },
        };
      }
      return unknownMethod(target, name, ctx);
    default:
      return unknownMethod(target, name, ctx);
  }
}

function mutate(ctx: CallContext, target: Value, name: string, args: Args): MutationResult {
  if (target !== null && typeof target === "object" && target.type === "array") {
    const items = [...target.items];
    switch (name) {
      case "push":
        items.push(args.expect("value", C.anyValue));
        return { result: null, updated: array(items) };
      case "pop": {
        if (items.length === 0) {
          throw sourceError("quillset/eval/invalid-operation", { message: "array is empty", span: ctx.span });
        }
        const popped = items.pop() ?? null;
        return { result: popped, updated: array(items) };
      }
      case "insert": {
        const index = locate(args.expect("index", C.int), items.length, ctx, true);
        items.splice(index, 0, args.expect("value", C.anyValue));
        return { result: null, updated: array(items) };
      }
      case "remove": {
        const index = locate(args.expect("index", C.int), items.length, ctx);
        const [removed] = items.splice(index, 1);
        return { result: removed ?? null, updated: array(items) };
      }
    }
  }
  if (target !== null && typeof target === "object" && target.type === "dictionary") {
    const entries = new Map(target.entries);
    const key = args.expect("key", C.str);
    switch (name) {
      case "insert":
        entries.set(key, args.expect("value", C.anyValue));
        return { result: null, updated: { type: "dictionary", entries } };
      case "remove": {
        const removed = entries.get(key);
        if (removed === undefined) missingKey(key, ctx);
        entries.delete(key);
        return { result: removed, updated: { type: "dictionary", entries } };
      }
    }
  }
  return unknownMethod(target, name, ctx);
}

function missingKey(key: string, ctx: CallContext): never {
  throw sourceError("quillset/eval/unknown-field", {
    message: `dictionary does not contain key ${JSON.stringify(key)}`,
    span: ctx.span,
    data: { name: key },
  });
}

/* ---------------------------------------------------------------------------------------
 * Strings
 * --------------------------------------------------------------------------------------- */

function stringMethod(ctx: CallContext, s: string, name: string, args: Args): Value {
  const chars = [...s];
  switch (name) {
    case "len":
      return int(chars.length);
    case "upper":
      return s.toUpperCase();
    case "lower":
      return s.toLowerCase();
    case "trim":
      return s.trim();
    case "rev":
      return chars.reverse().join("");
    case "first":
    case "last": {
      const char = name === "first" ? chars[0] : chars.at(-1);
      if (char === undefined) {
        throw sourceError("quillset/eval/invalid-operation", { message: "string is empty", span: ctx.span });
      }
      return char;
    }
    case "at": {
      const index = args.expect("index", C.int);
      const fallback = args.named("default", C.anyValue);
      const resolved = index < 0 ? chars.length + index : index;
      const char = chars[resolved];
      if (char !== undefined) return char;
      if (fallback !== undefined) return fallback;
      return outOfBounds(index, chars.length, ctx);
    }
    case "slice": {
      const start = locate(args.expect("start", C.int), chars.length, ctx, true);
      const endArg = args.eat(C.noneOr(C.int)) ?? null;
      const end = endArg === null ? chars.length : locate(endArg, chars.length, ctx, true);
      return chars.slice(start, Math.max(start, end)).join("");
    }
    case "contains":
      return s.includes(args.expect("pattern", C.str));
    case "starts-with":
      return s.startsWith(args.expect("pattern", C.str));
    case "ends-with":
      return s.endsWith(args.expect("pattern", C.str));
    case "split": {
      const sep = args.eat(C.str);
      const parts = sep === undefined ? s.trim().split(/\s+/u).filter((p) => p.length > 0) : s.split(sep);
      return array(parts);
    }
    case "replace": {
      const pattern = args.expect("pattern", C.str);
      const replacement = args.expect("replacement", C.str);
      return pattern.length === 0 ? s : s.split(pattern).join(replacement);
    }
    default:
      return unknownMethod(s, name, ctx);
  }
}

/* ---------------------------------------------------------------------------------------
 * Arrays
 * --------------------------------------------------------------------------------------- */

function arrayMethod(ctx: CallContext, target: ArrayValue, name: string, args: Args): Value {
  const items = target.items;
  switch (name) {
    case "len":
      return int(items.length);
    case "first":
    case "last": {
      const item = name === "first" ? items[0] : items.at(-1);
      if (item === undefined) {
        throw sourceError("quillset/eval/invalid-operation", { message: "array is empty", span: ctx.span });
      }
      return item;
    }
    case "at": {
      const index = args.expect("index", C.int);
      const fallback = args.named("default", C.anyValue);
      const item = items[index < 0 ? items.length + index : index];
      if (item !== undefined) return item;
      if (fallback !== undefined) return fallback;
      return outOfBounds(index, items.length, ctx);
    }
    case "slice": {
      const start = locate(args.expect("start", C.int), items.length, ctx, true);
      const endArg = args.eat(C.noneOr(C.int)) ?? null;
      const end = endArg === null ? items.length : locate(endArg, items.length, ctx, true);
      return array(items.slice(start, Math.max(start, end)));
    }
    case "contains": {
      const needle = args.expect("value", C.anyValue);
      return items.some((item) => valuesEqual(item, needle));
    }
    case "rev":
      return array([...items].reverse());
    case "enumerate": {
      const start = args.named("start", C.int) ?? 0;
      return array(items.map((item, i) => array([int(i + start), item])));
    }
    case "map": {
      const f = args.expect("mapper", C.func);
      return array(items.map((item) => ctx.call(f, [item])));
    }
    case "filter": {
      const f = args.expect("test", C.func);
      return array(items.filter((item) => predicate(ctx, ctx.call(f, [item]))));
    }
    case "find": {
      const f = args.expect("searcher", C.func);
      return items.find((item) => predicate(ctx, ctx.call(f, [item]))) ?? null;
    }
    case "any": {
      const f = args.expect("test", C.func);
      return items.some((item) => predicate(ctx, ctx.call(f, [item])));
    }
    case "all": {
      const f = args.expect("test", C.func);
      return items.every((item) => predicate(ctx, ctx.call(f, [item])));
    }
    case "fold": {
      let acc = args.expect("init", C.anyValue);
      const f = args.expect("folder", C.func);
      for (const item of items) acc = ctx.call(f, [acc, item]);
      return acc;
    }
    case "sum": {
      const fallback = args.named("default", C.anyValue);
      const [first, ...rest] = items;
      if (first === undefined) {
        if (fallback !== undefined) return fallback;
        throw sourceError("quillset/eval/invalid-operation", {
          message: "cannot calculate sum of empty array with no default",
          span: ctx.span,
        });
      }
      return rest.reduce<Value>((acc, item) => add(acc, item, ctx.span), first);
    }
    case "join": {
      const sep = args.eat(C.anyValue) ?? null;
      const last = args.named("last", C.anyValue);
      let acc: Value = null;
      for (const [i, item] of items.entries()) {
        if (i > 0) acc = add(acc, i === items.length - 1 && last !== undefined ? last : sep, ctx.span);
        acc = add(acc, item, ctx.span);
      }
      return acc;
    }
    case "sorted": {
      const sorted = [...items];
      const failures: [Value, Value][] = [];
      sorted.sort((a, b) => {
        const order = compareValues(a, b);
        if (order === null) failures.push([a, b]);
        return order ?? 0;
      });
      const failure = failures[0];
      if (failure) {
        throw sourceError("quillset/eval/invalid-operation", {
          message: `cannot compare ${typeName(failure[0])} with ${typeName(failure[1])}`,
          span: ctx.span,
        });
      }
      return array(sorted);
    }
    default:
      return unknownMethod(target, name, ctx);
  }
}

function predicate(ctx: CallContext, value: Value): boolean {
  if (typeof value === "boolean") return value;
  throw sourceError("quillset/eval/type-mismatch", {
    message: `expected boolean from callback, found ${typeName(value)}`,
    span: ctx.span,
    data: { expected: "boolean", actual: typeName(value) },
  });
}

/* ---------------------------------------------------------------------------------------
 * Dictionaries
 * --------------------------------------------------------------------------------------- */

function dictMethod(ctx: CallContext, target: DictValue, name: string, args: Args): Value {
  switch (name) {
    case "len":
      return int(target.entries.size);
    case "at": {
      const key = args.expect("key", C.str);
      const fallback = args.named("default", C.anyValue);
      const value = target.entries.get(key);
      if (value !== undefined) return value;
      if (fallback !== undefined) return fallback;
      return missingKey(key, ctx);
    }
    case "keys":
      return array([...target.entries.keys()]);
    case "values":
      return array([...target.entries.values()]);
    case "pairs":
      return array([...target.entries].map(([k, v]) => array([k, v])));
    default:
      return unknownMethod(target, name, ctx);
  }
}

/* ---------------------------------------------------------------------------------------
 * Content
 * --------------------------------------------------------------------------------------- */

function contentMethod(ctx: CallContext, target: Content, name: string, args: Args): Value {
  switch (name) {
    case "func": {
      const def = elementDef(target.elem);
      if (!def) {
        throw sourceError("quillset/eval/invalid-operation", {
          message: `${target.elem} has no element function`,
          span: ctx.span,
        });
      }
      return new ElementFunc(def);
    }
    case "fields": {
      const entries: [string, Value][] = [...target.fields()];
      if (target.isSequence()) entries.push(["children", array(target.children)]);
      if (target.label !== null) entries.push(["label", { type: "label", name: target.label }]);
      return dict(entries);
    }
    case "has":
      return target.has(args.expect("field", C.str));
    case "at": {
      const field = args.expect("field", C.str);
      const fallback = args.named("default", C.anyValue);
      const value = target.field(field);
      if (value !== undefined) return value;
      if (fallback !== undefined) return fallback;
      throw sourceError("quillset/eval/unknown-field", {
        message: `content does not contain field ${JSON.stringify(field)}`,
        span: ctx.span,
        data: { name: field },
      });
    }
    case "text":
      return target.plainText();
    default:
      return unknownMethod(target, name, ctx);
  }
}

/* ---------------------------------------------------------------------------------------
 * Dates
 * --------------------------------------------------------------------------------------- */

function datetimeMethod(ctx: CallContext, target: DatetimeValue, name: string, args: Args): Value {
  switch (name) {
    case "year":
      return int(target.year);
    case "month":
      return int(target.month);
    case "day":
      return int(target.day);
    case "weekday": {
      const weekday = new Date(Date.UTC(target.year, target.month - 1, target.day)).getUTCDay();
      return int(weekday === 0 ? 7 : weekday);
    }
    case "display": {
      const pattern = args.eat(C.str) ?? "[year]-[month]-[day]";
      return formatDate(target, pattern);
    }
    default:
      return unknownMethod(target, name, ctx);
  }
}

export function formatDate(date: DatetimeValue, pattern: string): string {
  return pattern.replace(/\[(year|month|day)\]/g, (_, part: string) => {
    switch (part) {
      case "year":
        return String(date.year).padStart(4, "0");
      case "month":
        return String(date.month).padStart(2, "0");
      default:
        return String(date.day).padStart(2, "0");
    }
  });
}
