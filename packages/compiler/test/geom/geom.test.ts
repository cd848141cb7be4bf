import { describe, test, expect } from "vitest";

import { formatNumbering, isNumberingPattern } from "../../src/content/numbering.js";
import { FIT_EPSILON, fits, formatAbs, inch, mm, pt, scale } from "../../src/geom/abs.js";
import { parseHexColor, rgb, toHex } from "../../src/geom/color.js";
import { em, resolveRel } from "../../src/geom/length.js";

describe("absolute lengths", () => {
  test("units convert through points", () => {
    expect(pt(1)).toBe(65536);
    expect(inch(1)).toBe(pt(72));
    expect(mm(25.4)).toBe(inch(1));
  });

  test("fitting allows a small tolerance", () => {
    expect(fits(pt(10) + FIT_EPSILON, pt(10))).toBe(true);
    expect(fits(pt(10) + FIT_EPSILON + 1, pt(10))).toBe(false);
  });

  test("scaling an infinite extent by zero gives zero", () => {
    expect(scale(Number.POSITIVE_INFINITY, 0)).toBe(0);
    expect(scale(Number.POSITIVE_INFINITY, 2)).toBe(Number.POSITIVE_INFINITY);
  });

  test("formatting rounds to hundredths of a point", () => {
    expect([formatAbs(pt(12.5)), formatAbs(pt(1 / 3)), formatAbs(Number.POSITIVE_INFINITY)]).toEqual([
      "12.5pt",
      "0.33pt",
      "inf",
    ]);
  });

  test("relative lengths resolve against the whole and the font size", () => {
    expect(resolveRel({ rel: 0.5, abs: em(1) }, pt(100), pt(10))).toBe(pt(60));
  });
});

describe("colors", () => {
  test("hex colors in short and long forms", () => {
    expect(parseHexColor("#f00")).toEqual({ r: 255, g: 0, b: 0, a: 255 });
    expect(parseHexColor("11223344")).toEqual({ r: 0x11, g: 0x22, b: 0x33, a: 0x44 });
    expect([parseHexColor("#12345"), parseHexColor("zzz")]).toEqual([null, null]);
  });

  test("channels are clamped and printed back as hex", () => {
    expect(rgb(300, -5, 1.6)).toEqual({ r: 255, g: 0, b: 2, a: 255 });
    expect([toHex(rgb(255, 0, 0)), toHex(rgb(0, 0, 0, 128))]).toEqual(["#ff0000", "#00000080"]);
  });
});

describe("numbering patterns", () => {
  test("levels beyond the pattern repeat its last counter", () => {
    expect(formatNumbering("1.", [1, 2])).toBe("1.2.");
    expect(formatNumbering("1.a)", [2, 3])).toBe("2.c)");
  });

  test("counter kinds", () => {
    const cases: [pattern: string, n: number][] = [
      ["(I)", 4],
      ["i", 9],
      ["a", 27],
      ["A", 28],
      ["*", 7],
    ];
    expect(cases.map(([pattern, n]) => formatNumbering(pattern, [n]))).toEqual(["(IV)", "ix", "aa", "AB", "**"]);
  });

  test("a pattern needs a counter symbol", () => {
    expect([isNumberingPattern("1."), isNumberingPattern("-")]).toEqual([true, false]);
  });
});
