import { scale, type Abs } from "./abs.js";

/** Absolute part plus a multiple of the current font size. */
export interface Length {
  readonly abs: Abs;
  readonly em: number;
}

/** A length relative to some containing extent: `rel * whole + abs`. */
export interface Rel {
  readonly rel: number;
  readonly abs: Length;
}

export const ZERO_LENGTH: Length = { abs: 0, em: 0 };

export function length(abs: Abs, em = 0): Length {
  return { abs, em };
}

export function em(value: number): Length {
  return { abs: 0, em: value };
}

export function resolveLength(value: Length, fontSize: Abs): Abs {
  return value.abs + scale(fontSize, value.em);
}

export function resolveRel(value: Rel, whole: Abs, fontSize: Abs): Abs {
  return scale(whole, value.rel) + resolveLength(value.abs, fontSize);
}

export function addLengths(a: Length, b: Length): Length {
  return { abs: a.abs + b.abs, em: a.em + b.em };
}

export function scaleLength(a: Length, factor: number): Length {
  return { abs: scale(a.abs, factor), em: a.em * factor };
}
