/* =======================================================================================
 * CASTS
 * ---------------------------------------------------------------------------------------
 * A cast checks a value against an expected shape and extracts it. `check` returns
 * undefined when the value does not fit; callers turn that into a type mismatch whose
 * message uses `describe`.
 * ======================================================================================= */

import { Content, text } from "../content/content.js";
import type { Color } from "../geom/color.js";
import { ZERO_LENGTH, type Length, type Rel } from "../geom/length.js";
import type { Align2D } from "../geom/shapes.js";
import { display } from "./repr.js";
import { ElementFunc, Func } from "./func.js";
import type { AutoValue, DatetimeValue, Selector, Value } from "./value.js";

export interface Cast<T> {
  readonly describe: string;
  check(value: Value): T | undefined;
}

export function cast<T>(describe: string, check: (value: Value) => T | undefined): Cast<T> {
  return { describe, check };
}

export function map<T, U>(inner: Cast<T>, fn: (value: T) => U): Cast<U> {
  return cast(inner.describe, (value) => {
    const checked = inner.check(value);
    return checked === undefined ? undefined : fn(checked);
  });
}

export function anyOf<T>(...casts: readonly Cast<T>[]): Cast<T> {
  return cast(describeAll(casts.map((c) => c.describe)), (value) => {
    for (const c of casts) {
      const checked = c.check(value);
      if (checked !== undefined) return checked;
    }
    return undefined;
  });
}

export function noneOr<T>(inner: Cast<T>): Cast<T | null> {
  return cast(describeAll(["none", inner.describe]), (value) => (value === null ? null : inner.check(value)));
}

export function autoOr<T>(inner: Cast<T>): Cast<T | AutoValue> {
  return cast(describeAll(["auto", inner.describe]), (value) =>
    isAuto(value) ? value : inner.check(value),
  );
}

/** Array of values each passing `inner`. */
export function arrayOf<T>(inner: Cast<T>): Cast<readonly T[]> {
  return cast(`array of ${inner.describe}`, (value) => {
    if (!isObject(value) || value.type !== "array") return undefined;
    const out: T[] = [];
    for (const item of value.items) {
      const checked = inner.check(item);
      if (checked === undefined) return undefined;
      out.push(checked);
    }
    return out;
  });
}

export function describeAll(names: readonly string[]): string {
  if (names.length <= 1) return names[0] ?? "nothing";
  return `${names.slice(0, -1).join(", ")} or ${names.at(-1) ?? ""}`;
}

function isObject(value: Value): value is Exclude<Value, null | boolean | string> {
  return value !== null && typeof value === "object";
}

export function isAuto(value: Value): value is AutoValue {
  return isObject(value) && value.type === "auto";
}

/* =======================================================================================
 * Primitive casts
 * ======================================================================================= */

export const anyValue: Cast<Value> = cast("any", (value) => value);

export const str: Cast<string> = cast("string", (value) => (typeof value === "string" ? value : undefined));

export const bool: Cast<boolean> = cast("boolean", (value) => (typeof value === "boolean" ? value : undefined));

export const int: Cast<number> = cast("integer", (value) =>
  isObject(value) && value.type === "int" ? value.value : undefined,
);

export const num: Cast<number> = cast("integer or float", (value) =>
  isObject(value) && (value.type === "int" || value.type === "float") ? value.value : undefined,
);

export const positiveInt: Cast<number> = cast("positive integer", (value) =>
  isObject(value) && value.type === "int" && value.value > 0 ? value.value : undefined,
);

/** Content, or a string/number shown as text. */
export const content: Cast<Content> = cast("content", (value) => {
  if (value === null) return Content.EMPTY;
  if (value instanceof Content) return value;
  if (typeof value === "string") return text(value);
  if (isObject(value) && (value.type === "int" || value.type === "float")) return text(display(value));
  return undefined;
});

export const length: Cast<Length> = cast("length", (value) => {
  if (!isObject(value)) return undefined;
  if (value.type === "length") return value.length;
  if (value.type === "int" && value.value === 0) return ZERO_LENGTH;
  return undefined;
});

export const ratio: Cast<number> = cast("ratio", (value) =>
  isObject(value) && value.type === "ratio" ? value.value : undefined,
);

export const rel: Cast<Rel> = cast("relative length", (value) => {
  if (!isObject(value)) return undefined;
  if (value.type === "relative") return value.rel;
  if (value.type === "ratio") return { rel: value.value, abs: ZERO_LENGTH };
  const abs = length.check(value);
  return abs === undefined ? undefined : { rel: 0, abs };
});

export const fraction: Cast<number> = cast("fraction", (value) =>
  isObject(value) && value.type === "fraction" ? value.value : undefined,
);

export const color: Cast<Color> = cast("color", (value) =>
  isObject(value) && value.type === "color" ? value.color : undefined,
);

export const align: Cast<Align2D> = cast("alignment", (value) =>
  isObject(value) && value.type === "alignment" ? value.align : undefined,
);

export const label: Cast<string> = cast("label", (value) =>
  isObject(value) && value.type === "label" ? value.name : undefined,
);

export const array: Cast<readonly Value[]> = cast("array", (value) =>
  isObject(value) && value.type === "array" ? value.items : undefined,
);

export const dict: Cast<ReadonlyMap<string, Value>> = cast("dictionary", (value) =>
  isObject(value) && value.type === "dictionary" ? value.entries : undefined,
);

export const func: Cast<Func> = cast("function", (value) => (value instanceof Func ? value : undefined));

export const datetime: Cast<DatetimeValue> = cast("datetime", (value) =>
  isObject(value) && value.type === "datetime" ? value : undefined,
);

/** What a show rule may target. */
export const selector: Cast<Selector> = cast("selector", (value) => {
  if (typeof value === "string") return { kind: "text", text: value };
  if (value instanceof ElementFunc) return { kind: "elem", elem: value.name, where: null };
  if (!isObject(value)) return undefined;
  if (value.type === "selector") return value.selector;
  if (value.type === "label") return { kind: "label", label: value.name };
  if (value.type === "regex") return { kind: "regex", source: value.source };
  return undefined;
});
