/* =======================================================================================
 * INLINE LAYOUT
 * ---------------------------------------------------------------------------------------
 * A paragraph is a run of inline pieces, each with its own style chain. Layout happens
 * in three steps:
 *
 * 1. collect: pieces → items (shaped words, spaces, h-spacing, atomic frames, breaks)
 * 2. break:   greedy first fit; a word wider than the line gets a line of its own
 * 3. place:   lines are aligned or justified, then stacked into regions with leading
 *
 * Lines are the paragraph's break points: a paragraph continues in the next region
 * between two lines, never inside one.
 * ======================================================================================= */

import { Content, text } from "../content/content.js";
import { diagnostics } from "../diagnostics/errors.js";
import type { SinkEffect } from "../diagnostics/sink.js";
import type { Engine } from "../eval/engine.js";
import * as C from "../eval/cast.js";
import { int } from "../eval/value.js";
import { FIT_EPSILON, INFINITE, fits, isBounded, type Abs } from "../geom/abs.js";
import { resolveRel } from "../geom/length.js";
import { alignOffset, size, type HAlign } from "../geom/shapes.js";
import { memoize } from "../memo/store.js";
import type { StyleChain } from "../style/chain.js";
import { Styles, property } from "../style/styles.js";
import { contentAnchor } from "./anchor.js";
import { layoutBlock } from "./block.js";
import { layoutBox } from "./container.js";
import { Frame, FrameBuilder } from "./frame.js";
import { unbounded, type Fragment, type Regions } from "./regions.js";
import { resolveIn, shapeText, textSize, textStyle, type ShapedText } from "./text.js";

/** One inline element and the styles it is set in. */
export type InlinePiece = readonly [Content, StyleChain];

const INLINE_ELEMENTS = new Set(["text", "space", "linebreak", "strong", "emph", "link", "ref", "h", "box", "metadata"]);

/** Whether `content` joins the surrounding paragraph instead of standing as a block. */
export function isInline(content: Content): boolean {
  if (INLINE_ELEMENTS.has(content.elem)) return true;
  if (content.is("raw") || content.is("equation")) return content.field("block") !== true;
  return false;
}

type InlineItem =
  | { readonly kind: "text"; readonly shaped: ShapedText }
  | { readonly kind: "space"; readonly shaped: ShapedText }
  | { readonly kind: "h"; readonly amount: Abs; readonly weak: boolean }
  | { readonly kind: "fr"; readonly fr: number }
  | { readonly kind: "frame"; readonly frame: Frame }
  | { readonly kind: "break"; readonly justify: boolean };

interface Line {
  readonly items: readonly InlineItem[];
  readonly width: Abs;
  readonly ascent: Abs;
  readonly descent: Abs;
  /** Ended by the paragraph or by a non-justifying line break. */
  readonly ragged: boolean;
}

/* =======================================================================================
 * Paragraphs
 * ======================================================================================= */

export const layoutParagraph: (engine: Engine, pieces: readonly InlinePiece[], regions: Regions, indent: boolean) => Fragment =
  memoize<[Engine, readonly InlinePiece[], Regions, boolean], Fragment, SinkEffect, readonly Content[]>(
    "layoutParagraph",
    {
    store: (engine) => engine.memo,
    key: (_engine, pieces, regions, indent) => [pieces, regions, indent],
    inputs: (engine) => ({ world: engine.world }),
    effects: (engine) => engine.sink,
    anchor: contentAnchor((_engine, pieces) => pieces.map(([content]) => content)),
    compute: (engine, pieces, regions, indent) => paragraphUncached(engine, pieces, regions, indent),
    },
  );

function paragraphUncached(engine: Engine, pieces: readonly InlinePiece[], regions: Regions, indent: boolean): Fragment {
  const first = pieces[0];
  if (!first) return [Frame.empty(size(isBounded(regions.width) ? regions.width : 0, 0))];
  const chain = first[1];
  const collector = new InlineCollector(engine, regions.width);
  for (const [content, pieceChain] of pieces) collector.visit(content, pieceChain);

  const leading = resolveIn(chain, chain.get("par", "leading", C.length));
  const justify = chain.getOr("par", "justify", C.bool, false);
  const firstIndent = indent ? resolveIn(chain, chain.get("par", "first-line-indent", C.length)) : 0;
  const align = alignX(chain);
  const strut = shapeText(engine, "", textStyle(chain));

  const lines = breakLines(collector.items, regions.width, firstIndent, strut);
  const lineWidth = isBounded(regions.width)
    ? regions.width
    : Math.max(0, ...lines.map((line, i) => line.width + (i === 0 ? firstIndent : 0)));
  const frames = lines.map((line, i) =>
    placeLine(line, lineWidth, i === 0 ? firstIndent : 0, align, justify && !line.ragged),
  );
  return stackLines(frames, lineWidth, leading, regions);
}

/** Lines stacked top to bottom, continuing in the next region whenever one does not fit. */
function stackLines(lines: readonly Frame[], width: Abs, leading: Abs, regions: Regions): Fragment {
  const out: Frame[] = [];
  let builder = new FrameBuilder(size(width, 0));
  let y = 0;
  let remaining = regions.height;
  let fresh = regions.fresh;
  const finish = () => {
    builder.size = size(width, y);
    out.push(builder.finish());
    builder = new FrameBuilder(size(width, 0));
    y = 0;
    remaining = regions.full;
    fresh = true;
  };
  for (const line of lines) {
    const gap = y > 0 ? leading : 0;
    if (!fits(y + gap + line.height, remaining) && (y > 0 || !fresh)) {
      finish();
      builder.pushFrame({ x: 0, y: 0 }, line);
      y = line.height;
      continue;
    }
    builder.pushFrame({ x: 0, y: y + gap }, line);
    y += gap + line.height;
  }
  builder.size = size(width, y);
  out.push(builder.finish());
  return out;
}

/** Single-line frame for atomic inline content; its baseline is the first line's. */
export function layoutInlineFrame(engine: Engine, content: Content, chain: StyleChain): Frame {
  const [frame] = layoutParagraph(engine, [[content, chain]], unbounded(INFINITE), false);
  if (!frame) return Frame.empty(size(0, 0));
  return frame.resized(frame.size, frame.firstBaseline() ?? frame.height);
}

export function alignX(chain: StyleChain): HAlign {
  const align = C.align.check(chain.find("align", "alignment") ?? null);
  return align?.x ?? "start";
}

/* =======================================================================================
 * Collecting
 * ======================================================================================= */

class InlineCollector {
  readonly items: InlineItem[] = [];
  readonly #engine: Engine;
  readonly #width: Abs;

  constructor(engine: Engine, width: Abs) {
    this.#engine = engine;
    this.#width = width;
  }

  visit(content: Content, chain: StyleChain): void {
    if (content.isSequence()) {
      for (const child of content.children) this.visit(child, chain);
      return;
    }
    if (content.isStyled()) {
      if (content.child && content.styles) this.visit(content.child, chain.chain(content.styles));
      return;
    }
    switch (content.elem) {
      case "text": {
        const value = content.field("text");
        if (typeof value === "string") this.#text(value, chain);
        return;
      }
      case "space":
        this.#space(chain);
        return;
      case "linebreak":
        this.items.push({ kind: "break", justify: content.field("justify") === true || chain.value("linebreak", "justify") === true });
        return;
      case "parbreak":
        this.items.push({ kind: "break", justify: false });
        return;
      case "strong": {
        const delta = C.int.check(content.field("delta") ?? chain.value("strong", "delta")) ?? 300;
        this.#body(content, chain.chain(Styles.of(property("text", "delta", int(delta), content.span))));
        return;
      }
      case "emph":
        this.#body(content, chain.chain(Styles.of(property("text", "emph", true, content.span))));
        return;
      case "raw": {
        const value = content.field("text");
        const font = chain.value("raw", "font");
        if (typeof value === "string") this.#text(value, chain.chain(Styles.of(property("text", "font", font, content.span))));
        return;
      }
      case "equation":
        this.#body(content, chain.chain(Styles.of(property("text", "emph", true, content.span))));
        return;
      case "link":
        this.#link(content, chain);
        return;
      case "ref":
        this.#ref(content, chain);
        return;
      case "h":
        this.#h(content, chain);
        return;
      case "box":
        this.items.push({ kind: "frame", frame: layoutBox(this.#engine, content, chain, this.#width) });
        return;
      case "metadata":
      case "pagebreak":
      case "colbreak":
      case "v":
        return;
      default: {
        const [frame] = layoutBlock(this.#engine, content, chain, unbounded(isBounded(this.#width) ? this.#width : 0));
        if (frame) this.items.push({ kind: "frame", frame });
      }
    }
  }

  #body(content: Content, chain: StyleChain): void {
    const body = content.body();
    if (body) this.visit(body, chain);
  }

  #text(value: string, chain: StyleChain): void {
    const style = textStyle(chain);
    for (const part of value.split(/(\s+)/)) {
      if (part === "") continue;
      if (/^\s+$/.test(part)) this.#space(chain);
      else this.items.push({ kind: "text", shaped: shapeText(this.#engine, part, style) });
    }
  }

  #space(chain: StyleChain): void {
    if (this.items.at(-1)?.kind === "space") return;
    this.items.push({ kind: "space", shaped: shapeText(this.#engine, " ", textStyle(chain)) });
  }

  #link(content: Content, chain: StyleChain): void {
    const body = content.body() ?? Content.EMPTY;
    const inner = layoutInlineFrame(this.#engine, body, chain);
    const dest = content.field("dest");
    const target = typeof dest === "string" ? dest : `#${C.label.check(dest ?? null) ?? ""}`;
    const builder = new FrameBuilder(inner.size, inner.baseline);
    builder.pushFrame({ x: 0, y: 0 }, inner);
    builder.push({ x: 0, y: 0 }, { kind: "link", dest: target, size: inner.size });
    this.items.push({ kind: "frame", frame: builder.finish() });
  }

  #ref(content: Content, chain: StyleChain): void {
    const resolved = content.field("resolved");
    if (resolved instanceof Content) {
      this.visit(resolved, chain);
      return;
    }
    const target = C.label.check(content.field("target") ?? null) ?? "";
    this.#engine.sink.warn(
      diagnostics.emit("quillset/layout/unresolved-reference", {
        message: `label <${target}> does not exist in the document`,
        span: content.span,
        data: { label: target },
      }),
    );
    this.visit(text("??", content.span), chain);
  }

  #h(content: Content, chain: StyleChain): void {
    const amount = content.field("amount") ?? null;
    const weak = content.field("weak") === true || chain.value("h", "weak") === true;
    const fr = C.fraction.check(amount);
    if (fr !== undefined) {
      this.items.push({ kind: "fr", fr });
      return;
    }
    const rel = C.rel.check(amount);
    if (!rel) return;
    const whole = isBounded(this.#width) ? this.#width : 0;
    this.items.push({ kind: "h", amount: resolveRel(rel, whole, textSize(chain)), weak });
  }
}

/* =======================================================================================
 * Breaking and placing
 * ======================================================================================= */

function widthOf(item: InlineItem): Abs {
  switch (item.kind) {
    case "text":
    case "space":
      return item.shaped.width;
    case "h":
      return item.amount;
    case "frame":
      return item.frame.width;
    case "fr":
    case "break":
      return 0;
  }
}

function breakLines(items: readonly InlineItem[], width: Abs, firstIndent: Abs, strut: ShapedText): Line[] {
  const lines: Line[] = [];
  let current: InlineItem[] = [];
  let currentWidth = 0;
  let pending: InlineItem[] = [];

  const flush = (ragged: boolean) => {
    lines.push(measure(current, ragged, strut));
    current = [];
    currentWidth = 0;
    pending = [];
  };

  for (const item of items) {
    if (item.kind === "break") {
      flush(!item.justify);
      continue;
    }
    if (item.kind === "space" || (item.kind === "h" && item.weak)) {
      if (current.length > 0) pending.push(item);
      continue;
    }
    const available = width - (lines.length === 0 ? firstIndent : 0);
    const gap = pending.reduce((sum, p) => sum + widthOf(p), 0);
    const needed = widthOf(item);
    if (current.length > 0 && currentWidth + gap + needed > available + FIT_EPSILON) {
      flush(false);
      current.push(item);
      currentWidth = needed;
      continue;
    }
    current.push(...pending, item);
    currentWidth += gap + needed;
    pending = [];
  }
  if (current.length > 0 || lines.length === 0) flush(true);
  return lines;
}

function measure(items: readonly InlineItem[], ragged: boolean, strut: ShapedText): Line {
  let ascent = 0;
  let descent = 0;
  let width = 0;
  let sized = false;
  for (const item of items) {
    width += widthOf(item);
    if (item.kind === "text" || item.kind === "space") {
      ascent = Math.max(ascent, item.shaped.ascent);
      descent = Math.max(descent, item.shaped.descent);
      sized = true;
    } else if (item.kind === "frame") {
      ascent = Math.max(ascent, item.frame.baseline);
      descent = Math.max(descent, item.frame.height - item.frame.baseline);
      sized = true;
    }
  }
  if (!sized) {
    ascent = strut.ascent;
    descent = strut.descent;
  }
  return { items, width, ascent, descent, ragged };
}

function placeLine(line: Line, width: Abs, indent: Abs, align: HAlign, justify: boolean): Frame {
  const builder = new FrameBuilder(size(width, line.ascent + line.descent), line.ascent);
  const free = Math.max(0, width - indent - line.width);
  const frs = line.items.reduce((sum, item) => sum + (item.kind === "fr" ? item.fr : 0), 0);
  const spaces = line.items.filter((item) => item.kind === "space").length;

  let x = indent;
  let extra = 0;
  let remainder = 0;
  if (frs === 0 && justify && spaces > 0) {
    extra = Math.floor(free / spaces);
    remainder = free - extra * spaces;
  } else if (frs === 0) {
    x += alignOffset(align, width - indent, line.width);
  }

  for (const item of line.items) {
    switch (item.kind) {
      case "text":
      case "space": {
        let runX = x;
        for (const run of item.shaped.runs) {
          builder.push({ x: runX, y: line.ascent }, { kind: "text", run });
          runX += run.width;
        }
        x += item.shaped.width;
        if (item.kind === "space") {
          x += extra + (remainder > 0 ? 1 : 0);
          if (remainder > 0) remainder--;
        }
        break;
      }
      case "frame":
        builder.pushFrame({ x, y: line.ascent - item.frame.baseline }, item.frame);
        x += item.frame.width;
        break;
      case "h":
        x += item.amount;
        break;
      case "fr":
        if (frs > 0) x += Math.floor((free * item.fr) / frs);
        break;
      case "break":
        break;
    }
  }
  return builder.finish();
}
