/* =======================================================================================
 * CONTAINERS
 * ---------------------------------------------------------------------------------------
 * `block` (breakable unless told otherwise), `box` (atomic, inline) and `rect`
 * (atomic). All three share sizing, insets, fill and stroke.
 * ======================================================================================= */

import { Content } from "../content/content.js";
import type { Engine } from "../eval/engine.js";
import * as C from "../eval/cast.js";
import type { Value } from "../eval/value.js";
import { INFINITE, isBounded, pt, type Abs } from "../geom/abs.js";
import type { Color } from "../geom/color.js";
import { resolveLength, resolveRel, type Rel } from "../geom/length.js";
import { size, uniformSides, type Sides } from "../geom/shapes.js";
import type { StyleChain } from "../style/chain.js";
import { layoutFlow } from "./flow.js";
import { Frame, FrameBuilder, type Stroke } from "./frame.js";
import { shrink, unbounded, type Fragment, type Regions } from "./regions.js";
import { textSize } from "./text.js";

const ZERO_SIDES: Sides<Abs> = uniformSides(0);

/** Default size of a rect without a body. */
const RECT_WIDTH = pt(45);
const RECT_HEIGHT = pt(30);

/** Field value, falling back to the styles. */
function field(elem: Content, chain: StyleChain, name: string): Value {
  return elem.field(name) ?? chain.value(elem.elem, name);
}

export function resolveStroke(value: Value, chain: StyleChain): Stroke | null {
  const entries = C.dict.check(value);
  if (!entries) return null;
  const paint = C.color.check(entries.get("paint") ?? null);
  const thickness = C.length.check(entries.get("thickness") ?? null);
  if (!paint || !thickness) return null;
  return { paint, thickness: Math.max(0, resolveLength(thickness, textSize(chain))) };
}

function relSides(value: Value): Sides<Rel> | null {
  const all = C.rel.check(value);
  if (all) return uniformSides(all);
  const entries = C.dict.check(value);
  if (!entries) return null;
  const side = (name: string, axis: string): Rel =>
    C.rel.check(entries.get(name) ?? entries.get(axis) ?? entries.get("rest") ?? null) ?? { rel: 0, abs: { abs: 0, em: 0 } };
  return { left: side("left", "x"), top: side("top", "y"), right: side("right", "x"), bottom: side("bottom", "y") };
}

/** Sides resolved against `width` horizontally and `height` vertically. */
export function resolveSides(value: Value, chain: StyleChain, width: Abs, height: Abs): Sides<Abs> {
  const sides = relSides(value);
  if (!sides) return ZERO_SIDES;
  const fontSize = textSize(chain);
  const w = isBounded(width) ? width : 0;
  const h = isBounded(height) ? height : 0;
  return {
    left: resolveRel(sides.left, w, fontSize),
    right: resolveRel(sides.right, w, fontSize),
    top: resolveRel(sides.top, h, fontSize),
    bottom: resolveRel(sides.bottom, h, fontSize),
  };
}

/** `body` inset by `inset` in a frame of `width × height`, with background and border. */
function decorate(
  body: Frame | null,
  width: Abs,
  height: Abs,
  inset: Sides<Abs>,
  fill: Color | null,
  stroke: Stroke | null,
): Frame {
  const baseline = body ? inset.top + body.baseline : height;
  const builder = new FrameBuilder(size(width, height), baseline);
  if (fill || stroke) {
    builder.push(
      { x: 0, y: 0 },
      { kind: "shape", shape: { geometry: { kind: "rect", size: size(width, height) }, fill, stroke } },
    );
  }
  if (body) builder.pushFrame({ x: inset.left, y: inset.top }, body);
  return builder.finish();
}

interface Decoration {
  readonly inset: Sides<Abs>;
  readonly fill: Color | null;
  readonly stroke: Stroke | null;
}

function decoration(elem: Content, chain: StyleChain, width: Abs, height: Abs): Decoration {
  return {
    inset: resolveSides(field(elem, chain, "inset"), chain, width, height),
    fill: C.color.check(field(elem, chain, "fill")) ?? null,
    stroke: resolveStroke(field(elem, chain, "stroke"), chain),
  };
}

/** Fixed width from a relative length, or null for auto (and fractions). */
function fixedExtent(value: Value, whole: Abs, chain: StyleChain): Abs | null {
  const rel = C.rel.check(value);
  if (!rel) return null;
  return Math.max(0, resolveRel(rel, isBounded(whole) ? whole : 0, textSize(chain)));
}

export function layoutBlockContainer(engine: Engine, elem: Content, chain: StyleChain, regions: Regions): Fragment {
  const deco = decoration(elem, chain, regions.width, regions.full);
  const insetX = deco.inset.left + deco.inset.right;
  const insetY = deco.inset.top + deco.inset.bottom;
  const fixedWidth = fixedExtent(field(elem, chain, "width"), regions.width, chain);
  const fixedHeight = fixedExtent(field(elem, chain, "height"), regions.full, chain);
  const width = fixedWidth ?? regions.width;
  const innerWidth = Math.max(0, width - insetX);
  const body = elem.body() ?? Content.EMPTY;
  const breakable = field(elem, chain, "breakable") !== false;

  if (fixedHeight !== null || !breakable || !isBounded(regions.full)) {
    const [frame] = layoutFlow(engine, body, chain, unbounded(innerWidth));
    const inner = frame ?? Frame.empty(size(0, 0));
    const w = isBounded(width) ? width : inner.contentWidth() + insetX;
    const h = fixedHeight ?? inner.height + insetY;
    return [decorate(inner, w, h, deco.inset, deco.fill, deco.stroke)];
  }

  const fragment = layoutFlow(engine, body, chain, shrink(regions, innerWidth, insetY));
  return fragment.map((frame) => decorate(frame, width, frame.height + insetY, deco.inset, deco.fill, deco.stroke));
}

/** Atomic inline box. Auto width shrinks to the content. */
export function layoutBox(engine: Engine, elem: Content, chain: StyleChain, available: Abs): Frame {
  return atomic(engine, elem, chain, available, null);
}

/** Atomic rectangle; without a body it has a default size. */
export function layoutRect(engine: Engine, elem: Content, chain: StyleChain, regions: Regions): Fragment {
  return [atomic(engine, elem, chain, regions.width, size(RECT_WIDTH, RECT_HEIGHT))];
}

function atomic(engine: Engine, elem: Content, chain: StyleChain, available: Abs, empty: { w: Abs; h: Abs } | null): Frame {
  const deco = decoration(elem, chain, available, 0);
  const insetX = deco.inset.left + deco.inset.right;
  const insetY = deco.inset.top + deco.inset.bottom;
  const fixedWidth = fixedExtent(field(elem, chain, "width"), available, chain);
  const fixedHeight = fixedExtent(field(elem, chain, "height"), 0, chain);
  const body = elem.body();

  if (!body || body.isEmpty()) {
    const w = fixedWidth ?? (empty ? empty.w : insetX);
    const h = fixedHeight ?? (empty ? empty.h : insetY);
    return decorate(null, w, h, deco.inset, deco.fill, deco.stroke);
  }

  const measureWidth = fixedWidth !== null ? fixedWidth - insetX : isBounded(available) ? available - insetX : INFINITE;
  const [frame] = layoutFlow(engine, body, chain, unbounded(Math.max(0, measureWidth)));
  const inner = frame ?? Frame.empty(size(0, 0));
  const natural = inner.contentWidth();
  const w = fixedWidth ?? natural + insetX;
  const h = fixedHeight ?? inner.height + insetY;
  const fitted = fixedWidth === null ? inner.resized(size(natural, inner.height), inner.baseline) : inner;
  const out = decorate(fitted, w, h, deco.inset, deco.fill, deco.stroke);
  const baseline = fitted.firstBaseline();
  return baseline === null ? out : out.resized(out.size, deco.inset.top + baseline);
}
