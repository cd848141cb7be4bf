/**
 * Numbering patterns such as `"1."`, `"1.a)"` or `"(I)"`.
 *
 * A pattern is a prefix, counter symbols with the separators that precede them,
 * and a suffix. Numbers beyond the last symbol reuse it, separated by its prefix
 * (or by the suffix when that prefix is empty), so `"1."` renders `(1, 2)` as `1.2.`.
 */

type CounterKind = "1" | "a" | "A" | "i" | "I" | "*";

interface NumberingPattern {
  readonly pieces: readonly (readonly [prefix: string, kind: CounterKind])[];
  readonly suffix: string;
}

const KINDS = new Set<string>(["1", "a", "A", "i", "I", "*"]);

function isKind(char: string): char is CounterKind {
  return KINDS.has(char);
}

const patternCache = new Map<string, NumberingPattern>();

function parsePattern(pattern: string): NumberingPattern {
  const cached = patternCache.get(pattern);
  if (cached) return cached;
  const pieces: [string, CounterKind][] = [];
  let pending = "";
  for (const char of pattern) {
    if (isKind(char)) {
      pieces.push([pending, char]);
      pending = "";
    } else {
      pending += char;
    }
  }
  const parsed: NumberingPattern = { pieces, suffix: pending };
  patternCache.set(pattern, parsed);
  return parsed;
}

/** Whether `pattern` contains at least one counter symbol. */
export function isNumberingPattern(pattern: string): boolean {
  return parsePattern(pattern).pieces.length > 0;
}

export function formatNumbering(pattern: string, numbers: readonly number[]): string {
  const { pieces, suffix } = parsePattern(pattern);
  const last = pieces.at(-1);
  if (!last) return suffix;
  let out = "";
  numbers.forEach((n, i) => {
    const piece = pieces[i];
    if (piece) {
      out += piece[0] + applyKind(piece[1], n);
    } else {
      out += (last[0] === "" ? suffix : last[0]) + applyKind(last[1], n);
    }
  });
  return out + suffix;
}

function applyKind(kind: CounterKind, n: number): string {
  switch (kind) {
    case "1":
      return String(n);
    case "a":
      return alphabetic(n).toLowerCase();
    case "A":
      return alphabetic(n);
    case "i":
      return roman(n).toLowerCase();
    case "I":
      return roman(n);
    case "*":
      return symbol(n);
  }
}

/** Bijective base 26: 1 → A, 26 → Z, 27 → AA. */
function alphabetic(n: number): string {
  if (n <= 0) return "-";
  let out = "";
  for (let rest = n; rest > 0; rest = Math.floor((rest - 1) / 26)) {
    out = String.fromCharCode(65 + ((rest - 1) % 26)) + out;
  }
  return out;
}

const ROMAN: readonly (readonly [number, string])[] = [
  [1000, "M"],
  [900, "CM"],
  [500, "D"],
  [400, "CD"],
  [100, "C"],
  [90, "XC"],
  [50, "L"],
  [40, "XL"],
  [10, "X"],
  [9, "IX"],
  [5, "V"],
  [4, "IV"],
  [1, "I"],
];

function roman(n: number): string {
  if (n <= 0) return "N";
  let rest = n;
  let out = "";
  for (const [value, letters] of ROMAN) {
    while (rest >= value) {
      out += letters;
      rest -= value;
    }
  }
  return out;
}

const SYMBOLS = ["*", "†", "‡", "§", "¶", "‖"];

function symbol(n: number): string {
  if (n <= 0) return "-";
  const base = SYMBOLS[(n - 1) % SYMBOLS.length] ?? "*";
  return base.repeat(Math.floor((n - 1) / SYMBOLS.length) + 1);
}
