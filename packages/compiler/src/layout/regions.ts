import { INFINITE, type Abs } from "../geom/abs.js";
import type { Frame } from "./frame.js";

/**
 * Space a breakable layout may fill: what is left of the current region, then
 * any number of regions of height `full`. Unbounded containers use infinite
 * heights, so nothing inside them ever breaks.
 */
export interface Regions {
  readonly width: Abs;
  /** Height left in the current region. */
  readonly height: Abs;
  /** Height of every following region. */
  readonly full: Abs;
  /** Nothing has been placed in the current region yet. */
  readonly fresh: boolean;
}

/** One frame per region used, the first one for the current region. */
export type Fragment = readonly Frame[];

export function regions(width: Abs, height: Abs): Regions {
  return { width, height, full: height, fresh: true };
}

export function unbounded(width: Abs): Regions {
  return { width, height: INFINITE, full: INFINITE, fresh: true };
}

export function nextRegion(current: Regions): Regions {
  return { width: current.width, height: current.full, full: current.full, fresh: true };
}

/** Regions with `amount` taken off every height (insets of a container). */
export function shrink(current: Regions, width: Abs, amount: Abs): Regions {
  return {
    width,
    height: Math.max(0, current.height - amount),
    full: Math.max(0, current.full - amount),
    fresh: current.fresh,
  };
}
