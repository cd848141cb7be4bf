/* =======================================================================================
 * ABSOLUTE LENGTHS
 * ---------------------------------------------------------------------------------------
 * Every absolute length is an integer count of scaled points (1pt = 65536sp). Sums and
 * differences stay exact; only multiplication by a ratio or em factor rounds, and it
 * always rounds to the nearest scaled point.
 * ======================================================================================= */

/** Integer scaled points. `Infinity` marks an unbounded extent. */
export type Abs = number;

export const SP_PER_PT = 65536;

/** Tolerance for "does it fit" checks, 16sp (about 0.00024pt). A unit fits when `height <= remaining + FIT_EPSILON`. */
export const FIT_EPSILON: Abs = 16;

export const INFINITE: Abs = Number.POSITIVE_INFINITY;

export function pt(value: number): Abs {
  return Math.round(value * SP_PER_PT);
}

export function mm(value: number): Abs {
  return pt((value * 72) / 25.4);
}

export function cm(value: number): Abs {
  return mm(value * 10);
}

export function inch(value: number): Abs {
  return pt(value * 72);
}

export function toPt(value: Abs): number {
  return value / SP_PER_PT;
}

/** `value * factor`, rounded to a whole scaled point. */
export function scale(value: Abs, factor: number): Abs {
  if (!Number.isFinite(value)) return factor === 0 ? 0 : value;
  return Math.round(value * factor);
}

export function fits(needed: Abs, available: Abs): boolean {
  return needed <= available + FIT_EPSILON;
}

export function isBounded(value: Abs): boolean {
  return Number.isFinite(value);
}

export function formatAbs(value: Abs): string {
  if (!Number.isFinite(value)) return "inf";
  const points = Math.round(toPt(value) * 100) / 100;
  return `${points}pt`;
}
