import type { Abs } from "./abs.js";

export interface Size {
  readonly w: Abs;
  readonly h: Abs;
}

export interface Point {
  readonly x: Abs;
  readonly y: Abs;
}

export interface Sides<T> {
  readonly left: T;
  readonly top: T;
  readonly right: T;
  readonly bottom: T;
}

export const ORIGIN: Point = { x: 0, y: 0 };

export function size(w: Abs, h: Abs): Size {
  return { w, h };
}

export function point(x: Abs, y: Abs): Point {
  return { x, y };
}

export function uniformSides<T>(value: T): Sides<T> {
  return { left: value, top: value, right: value, bottom: value };
}

export type HAlign = "start" | "left" | "center" | "right" | "end";
export type VAlign = "top" | "horizon" | "bottom";

/** Alignment on one or both axes; an absent axis inherits. */
export interface Align2D {
  readonly x?: HAlign;
  readonly y?: VAlign;
}

/** Offset of an item of extent `inner` inside `outer` for left-to-right text. */
export function alignOffset(align: HAlign | VAlign, outer: Abs, inner: Abs): Abs {
  const free = Math.max(0, outer - inner);
  switch (align) {
    case "center":
    case "horizon":
      return Math.round(free / 2);
    case "right":
    case "end":
    case "bottom":
      return free;
    default:
      return 0;
  }
}
