import { stableHash, type Hashable } from "../memo/hash.js";
import type { FontStyle, FontVariant } from "./font.js";

export interface FontInfo {
  readonly family: string;
  readonly variant: FontVariant;
}

/**
 * Index of the fonts a World can load. Selection is by family name
 * (case-insensitive), then by the nearest variant.
 */
export class FontBook implements Hashable {
  readonly #infos: readonly FontInfo[];
  #fingerprint: string | undefined;

  constructor(infos: readonly FontInfo[]) {
    this.#infos = infos;
  }

  get infos(): readonly FontInfo[] {
    return this.#infos;
  }

  get size(): number {
    return this.#infos.length;
  }

  families(): string[] {
    return [...new Set(this.#infos.map((info) => info.family))];
  }

  contains(family: string): boolean {
    const key = family.toLowerCase();
    return this.#infos.some((info) => info.family.toLowerCase() === key);
  }

  /** Index of the best variant of `family`, or null when the family is absent. */
  select(family: string, variant: FontVariant): number | null {
    const key = family.toLowerCase();
    let best: number | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const [index, info] of this.#infos.entries()) {
      if (info.family.toLowerCase() !== key) continue;
      const distance = variantDistance(info.variant, variant);
      if (distance < bestDistance) {
        best = index;
        bestDistance = distance;
      }
    }
    return best;
  }

  fingerprint(): string {
    if (this.#fingerprint === undefined) this.#fingerprint = stableHash(["book", this.#infos]);
    return this.#fingerprint;
  }
}

const STYLE_RANK: Readonly<Record<FontStyle, number>> = { normal: 0, oblique: 1, italic: 2 };

function variantDistance(have: FontVariant, want: FontVariant): number {
  const style = Math.abs(STYLE_RANK[have.style] - STYLE_RANK[want.style]) * 10_000;
  return style + Math.abs(have.weight - want.weight);
}
