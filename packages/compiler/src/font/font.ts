/* =======================================================================================
 * FONTS
 * ---------------------------------------------------------------------------------------
 * Fonts are metric descriptors: enough to measure and place glyphs (advances, vertical
 * metrics, coverage). Outlines belong to export backends.
 * ======================================================================================= */

import { stableHash, type Hashable } from "../memo/hash.js";

export type FontStyle = "normal" | "italic" | "oblique";

/** JSON shape of a font metrics file. Advances and metrics are in font units. */
export interface FontDescriptor {
  readonly family: string;
  readonly style?: FontStyle;
  readonly weight?: number;
  readonly unitsPerEm: number;
  readonly ascender: number;
  /** Negative: distance below the baseline. */
  readonly descender: number;
  readonly defaultAdvance: number;
  readonly advances?: Readonly<Record<string, number>>;
  /** Covered code point ranges, inclusive, e.g. `[[32, 126]]`. All code points when absent. */
  readonly coverage?: readonly (readonly [number, number])[];
}

export interface FontVariant {
  readonly style: FontStyle;
  readonly weight: number;
}

export class Font implements Hashable {
  readonly family: string;
  readonly variant: FontVariant;
  #fingerprint: string | undefined;

  constructor(readonly descriptor: FontDescriptor) {
    this.family = descriptor.family;
    this.variant = { style: descriptor.style ?? "normal", weight: descriptor.weight ?? 400 };
  }

  get unitsPerEm(): number {
    return this.descriptor.unitsPerEm;
  }

  /** Ascender as a fraction of the em size. */
  get ascender(): number {
    return this.descriptor.ascender / this.descriptor.unitsPerEm;
  }

  /** Descender depth below the baseline as a positive fraction of the em size. */
  get descender(): number {
    return -this.descriptor.descender / this.descriptor.unitsPerEm;
  }

  covers(char: string): boolean {
    const ranges = this.descriptor.coverage;
    if (!ranges) return true;
    const cp = char.codePointAt(0);
    if (cp === undefined) return false;
    return ranges.some(([lo, hi]) => cp >= lo && cp <= hi);
  }

  /** Advance width of `char` as a fraction of the em size. */
  advance(char: string): number {
    const units = this.descriptor.advances?.[char] ?? this.descriptor.defaultAdvance;
    return units / this.descriptor.unitsPerEm;
  }

  fingerprint(): string {
    if (this.#fingerprint === undefined) this.#fingerprint = stableHash(["font", this.descriptor]);
    return this.#fingerprint;
  }
}

/** Parse and minimally validate a descriptor read from JSON. */
export function parseFontDescriptor(raw: unknown): FontDescriptor | null {
  if (typeof raw !== "object" || raw === null) return null;
  const family = Reflect.get(raw, "family");
  const unitsPerEm = Reflect.get(raw, "unitsPerEm");
  const ascender = Reflect.get(raw, "ascender");
  const descender = Reflect.get(raw, "descender");
  const defaultAdvance = Reflect.get(raw, "defaultAdvance");
  if (
    typeof family !== "string" ||
    typeof unitsPerEm !== "number" ||
    unitsPerEm <= 0 ||
    typeof ascender !== "number" ||
    typeof descender !== "number" ||
    typeof defaultAdvance !== "number"
  ) {
    return null;
  }
  const style = Reflect.get(raw, "style");
  const weight = Reflect.get(raw, "weight");
  const advances = parseAdvances(Reflect.get(raw, "advances"));
  const coverage = parseCoverage(Reflect.get(raw, "coverage"));
  return {
    family,
    unitsPerEm,
    ascender,
    descender,
    defaultAdvance,
    ...(style === "normal" || style === "italic" || style === "oblique" ? { style } : {}),
    ...(typeof weight === "number" ? { weight } : {}),
    ...(advances ? { advances } : {}),
    ...(coverage ? { coverage } : {}),
  };
}

function parseAdvances(raw: unknown): Record<string, number> | undefined {
  if (typeof raw !== "object" || raw === null) return undefined;
  const out: Record<string, number> = {};
  for (const [char, width] of Object.entries(raw)) {
    if (typeof width === "number") out[char] = width;
  }
  return out;
}

function parseCoverage(raw: unknown): [number, number][] | undefined {
  if (!Array.isArray(raw)) return undefined;
  const out: [number, number][] = [];
  for (const range of raw) {
    if (Array.isArray(range) && typeof range[0] === "number" && typeof range[1] === "number") {
      out.push([range[0], range[1]]);
    }
  }
  return out;
}
