/* =======================================================================================
 * TEXT
 * ---------------------------------------------------------------------------------------
 * Resolves the text properties of a style chain and shapes strings into glyph runs.
 *
 * Font selection walks the requested families in order and takes the first font that
 * covers a character. With `fallback` on, the rest of the book is tried after them.
 * A family the book lacks warns once; a character nothing covers warns once and is
 * set as .notdef in the first font.
 * ======================================================================================= */

import { diagnostics } from "../diagnostics/errors.js";
import type { SinkEffect } from "../diagnostics/sink.js";
import type { Engine } from "../eval/engine.js";
import * as C from "../eval/cast.js";
import { pt, scale, type Abs } from "../geom/abs.js";
import { BLACK, type Color } from "../geom/color.js";
import { resolveLength, type Length } from "../geom/length.js";
import type { Font, FontStyle, FontVariant } from "../font/font.js";
import { memoize } from "../memo/store.js";
import { debug } from "../shared/debug.js";
import type { StyleChain } from "../style/chain.js";
import type { Glyph, TextRun } from "./frame.js";

export interface TextStyle {
  readonly families: readonly string[];
  readonly fallback: boolean;
  readonly size: Abs;
  readonly fill: Color;
  readonly variant: FontVariant;
}

const DEFAULT_SIZE = pt(11);

/** Vertical metrics used when no font can be loaded at all. */
const BARE_ASCENDER = 0.8;
const BARE_DESCENDER = 0.2;
const BARE_ADVANCE = 0.5;

export function textStyle(chain: StyleChain): TextStyle {
  const weight = chain.getOr("text", "weight", C.int, 400) + chain.getOr("text", "delta", C.int, 0);
  const style = fontStyle(chain.value("text", "style"));
  const emph = chain.value("text", "emph") === true;
  return {
    families: chain.getOr("text", "font", C.arrayOf(C.str), []),
    fallback: chain.getOr("text", "fallback", C.bool, true),
    size: textSize(chain),
    fill: chain.getOr("text", "fill", C.color, BLACK),
    variant: {
      weight: Math.max(100, Math.min(900, weight)),
      style: emph ? (style === "normal" ? "italic" : "normal") : style,
    },
  };
}

/**
 * Font size with every `em` setting taken relative to the size outside it, so nested
 * `text(size: 1.2em)` calls compound.
 */
export function textSize(chain: StyleChain): Abs {
  const settings: Length[] = [];
  for (const frame of chain.frames()) {
    const props = [...frame.properties()];
    for (let i = props.length - 1; i >= 0; i--) {
      const prop = props[i];
      if (prop?.elem !== "text" || prop.name !== "size") continue;
      const length = C.length.check(prop.value);
      if (length) settings.push(length);
    }
  }
  let size = DEFAULT_SIZE;
  for (let i = settings.length - 1; i >= 0; i--) {
    const setting = settings[i];
    if (setting) size = Math.max(0, resolveLength(setting, size));
  }
  return size;
}

function fontStyle(value: unknown): FontStyle {
  return value === "italic" || value === "oblique" ? value : "normal";
}

/** Resolve a length against the chain's font size. */
export function resolveIn(chain: StyleChain, length: Length): Abs {
  return resolveLength(length, textSize(chain));
}

/* =======================================================================================
 * Shaping
 * ======================================================================================= */

export interface ShapedText {
  readonly text: string;
  readonly runs: readonly TextRun[];
  readonly width: Abs;
  readonly ascent: Abs;
  readonly descent: Abs;
}

export const shapeText: (engine: Engine, text: string, style: TextStyle) => ShapedText = memoize<
  [Engine, string, TextStyle],
  ShapedText,
  SinkEffect
>("shape", {
  store: (engine) => engine.memo,
  key: (_engine, text, style) => [text, style],
  inputs: (engine) => ({ world: engine.world }),
  effects: (engine) => engine.sink,
  compute: (engine, text, style) => shapeUncached(engine, text, style),
});

function shapeUncached(engine: Engine, text: string, style: TextStyle): ShapedText {
  const fonts = selectFonts(engine, style);
  const primary = fonts[0] ?? null;
  const runs: TextRun[] = [];
  let current: { font: Font | null; glyphs: Glyph[]; text: string; width: Abs } | null = null;
  const used = new Set<Font>();

  for (const char of text) {
    const font = fonts.find((candidate) => candidate.covers(char)) ?? null;
    let glyph: Glyph;
    let owner: Font | null;
    if (font) {
      glyph = { char, advance: scale(style.size, font.advance(char)) };
      owner = font;
    } else {
      if (!/\s/.test(char)) {
        engine.sink.warn(
          diagnostics.emit("quillset/layout/missing-glyph", {
            message: `no font covers ${JSON.stringify(char)}`,
            data: { char },
          }),
        );
      }
      glyph = { char, advance: scale(style.size, primary ? primary.advance(char) : BARE_ADVANCE), notdef: true };
      owner = primary;
    }
    if (owner) used.add(owner);
    if (!current || current.font !== owner) {
      if (current) runs.push(toRun(current, style));
      current = { font: owner, glyphs: [], text: "", width: 0 };
    }
    current.glyphs.push(glyph);
    current.text += char;
    current.width += glyph.advance;
  }
  if (current) runs.push(toRun(current, style));

  const metrics = used.size > 0 ? [...used] : primary ? [primary] : [];
  const ascent = metrics.length > 0 ? Math.max(...metrics.map((f) => scale(style.size, f.ascender))) : scale(style.size, BARE_ASCENDER);
  const descent =
    metrics.length > 0 ? Math.max(...metrics.map((f) => scale(style.size, f.descender))) : scale(style.size, BARE_DESCENDER);
  return { text, runs, width: runs.reduce((sum, run) => sum + run.width, 0), ascent, descent };
}

function toRun(
  current: { font: Font | null; glyphs: Glyph[]; text: string; width: Abs },
  style: TextStyle,
): TextRun {
  return {
    family: current.font?.family ?? "",
    variant: current.font?.variant ?? style.variant,
    size: style.size,
    fill: style.fill,
    text: current.text,
    glyphs: current.glyphs,
    width: current.width,
  };
}

/** Requested families in order, then (with fallback) every other family of the book. */
function selectFonts(engine: Engine, style: TextStyle): Font[] {
  const book = engine.world.book();
  const fonts: Font[] = [];
  const seen = new Set<string>();
  const add = (family: string): boolean => {
    const key = family.toLowerCase();
    if (seen.has(key)) return true;
    seen.add(key);
    const index = book.select(family, style.variant);
    if (index === null) return false;
    const font = engine.world.font(index);
    if (font) fonts.push(font);
    return true;
  };

  for (const family of style.families) {
    if (add(family)) continue;
    debug.layout("font.unknown", { family });
    engine.sink.warn(
      diagnostics.emit("quillset/layout/unknown-font", {
        message: `unknown font family: ${family}`,
        data: { family },
      }),
    );
  }
  if (style.fallback || fonts.length === 0) {
    for (const family of book.families()) add(family);
  }
  return fonts;
}
