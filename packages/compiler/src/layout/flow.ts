/* =======================================================================================
 * FLOW
 * ---------------------------------------------------------------------------------------
 * Block-level layout. Content is turned into a list of flow units (paragraphs, blocks,
 * spacing, breaks) which are then distributed over the regions in document order.
 *
 * Spacing:
 * - weak spacing collapses with its neighbours (the largest wins) and is dropped at
 *   the top of a region and at the end of the flow
 * - strong spacing is kept; spacing that does not fit ends the region
 * - fractional spacing shares whatever height is left when a region is finished
 *
 * A unit whose first frame does not fit moves to the next region. A frame that does
 * not fit an empty region either is placed anyway and reported once as overflow.
 * ======================================================================================= */

import type { Content } from "../content/content.js";
import { diagnostics } from "../diagnostics/errors.js";
import type { Engine } from "../eval/engine.js";
import * as C from "../eval/cast.js";
import { fits, formatAbs, isBounded, toPt, type Abs } from "../geom/abs.js";
import { resolveRel } from "../geom/length.js";
import { alignOffset, size, type HAlign } from "../geom/shapes.js";
import type { SourceSpan } from "../model/span.js";
import { debug } from "../shared/debug.js";
import type { StyleChain } from "../style/chain.js";
import { layoutBlock } from "./block.js";
import { Frame, FrameBuilder } from "./frame.js";
import { alignX, isInline, layoutParagraph, type InlinePiece } from "./inline.js";
import { nextRegion, type Fragment, type Regions } from "./regions.js";
import { resolveIn, textSize } from "./text.js";

export type FlowUnit =
  | { readonly kind: "spacing"; readonly amount: Abs; readonly weak: boolean }
  | { readonly kind: "fr"; readonly fr: number }
  | { readonly kind: "block"; readonly layout: (regions: Regions) => Fragment; readonly align: HAlign; readonly span: SourceSpan | null }
  | { readonly kind: "break"; readonly weak: boolean };

export interface FlowOptions {
  /** Frames take the full region height instead of the height of their content. */
  readonly expand?: boolean;
}

export function layoutFlow(
  engine: Engine,
  content: Content,
  chain: StyleChain,
  regions: Regions,
  options: FlowOptions = {},
): Fragment {
  return layoutFlowItems(engine, [[content, chain]], regions, options);
}

export function layoutFlowItems(
  engine: Engine,
  items: readonly InlinePiece[],
  regions: Regions,
  options: FlowOptions = {},
): Fragment {
  const collector = new FlowCollector(engine, regions);
  for (const [content, chain] of items) collector.visit(content, chain);
  collector.finishParagraph();
  return distribute(engine, collector.units, regions, options);
}

/** A unit for an already laid-out frame. */
export function frameUnit(frame: Frame, align: HAlign = "start", span: SourceSpan | null = null): FlowUnit {
  return { kind: "block", layout: () => [frame], align, span };
}

/* =======================================================================================
 * Collecting units
 * ======================================================================================= */

function parSpacing(chain: StyleChain): Abs {
  return resolveIn(chain, chain.get("par", "spacing", C.length));
}

class FlowCollector {
  readonly units: FlowUnit[] = [];
  readonly #engine: Engine;
  readonly #regions: Regions;
  #pieces: InlinePiece[] = [];
  #afterParagraph = false;

  constructor(engine: Engine, regions: Regions) {
    this.#engine = engine;
    this.#regions = regions;
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
    if (isInline(content)) {
      this.#pieces.push([content, chain]);
      return;
    }
    this.finishParagraph();
    switch (content.elem) {
      case "parbreak":
        return;
      case "v":
        this.#v(content, chain);
        return;
      case "colbreak":
      case "pagebreak":
        this.units.push({ kind: "break", weak: content.field("weak") === true || chain.value(content.elem, "weak") === true });
        this.#afterParagraph = false;
        return;
      default:
        this.#block(content, chain);
    }
  }

  finishParagraph(): void {
    const pieces = this.#pieces;
    this.#pieces = [];
    const first = pieces[0];
    if (!first || pieces.every(([piece]) => piece.is("space") || piece.is("metadata"))) return;
    const spacing = parSpacing(first[1]);
    const indent = this.#afterParagraph;
    const engine = this.#engine;
    this.units.push({ kind: "spacing", amount: spacing, weak: true });
    this.units.push({
      kind: "block",
      layout: (regions) => layoutParagraph(engine, pieces, regions, indent),
      align: "start",
      span: first[0].span,
    });
    this.units.push({ kind: "spacing", amount: spacing, weak: true });
    this.#afterParagraph = true;
  }

  #v(content: Content, chain: StyleChain): void {
    const amount = content.field("amount") ?? null;
    const fr = C.fraction.check(amount);
    if (fr !== undefined) {
      this.units.push({ kind: "fr", fr });
      return;
    }
    const rel = C.rel.check(amount);
    if (!rel) return;
    const whole = isBounded(this.#regions.full) ? this.#regions.full : 0;
    const weak = content.field("weak") === true || chain.value("v", "weak") === true;
    this.units.push({ kind: "spacing", amount: resolveRel(rel, whole, textSize(chain)), weak });
  }

  #block(content: Content, chain: StyleChain): void {
    if (content.is("metadata")) return;
    const spacing = parSpacing(chain);
    const above = content.is("block") ? this.#blockSpacing(content, chain, "above") : spacing;
    const below = content.is("block") ? this.#blockSpacing(content, chain, "below") : spacing;
    const engine = this.#engine;
    this.units.push({ kind: "spacing", amount: above, weak: true });
    this.units.push({
      kind: "block",
      layout: (regions) => layoutBlock(engine, content, chain, regions),
      align: alignX(chain),
      span: content.span,
    });
    this.units.push({ kind: "spacing", amount: below, weak: true });
    this.#afterParagraph = false;
  }

  #blockSpacing(content: Content, chain: StyleChain, side: "above" | "below"): Abs {
    const length = C.length.check(content.field(side) ?? chain.value("block", side));
    return length ? resolveIn(chain, length) : parSpacing(chain);
  }
}

/* =======================================================================================
 * Distribution
 * ======================================================================================= */

type Placed =
  | { readonly kind: "frame"; readonly frame: Frame; readonly align: HAlign }
  | { readonly kind: "gap"; readonly amount: Abs }
  | { readonly kind: "fr"; readonly fr: number };

export function distribute(engine: Engine, units: readonly FlowUnit[], regions: Regions, options: FlowOptions = {}): Fragment {
  const distributor = new Distributor(engine, regions, options.expand ?? false);
  for (const unit of units) distributor.unit(unit);
  return distributor.finish();
}

class Distributor {
  readonly #engine: Engine;
  readonly #expand: boolean;
  readonly #frames: Frame[] = [];
  #regions: Regions;
  #regionHeight: Abs;
  #items: Placed[] = [];
  #used = 0;
  #placed = false;
  #weak: Abs | null = null;

  constructor(engine: Engine, regions: Regions, expand: boolean) {
    this.#engine = engine;
    this.#regions = regions;
    this.#regionHeight = regions.height;
    this.#expand = expand;
  }

  unit(unit: FlowUnit): void {
    switch (unit.kind) {
      case "spacing":
        this.#spacing(unit.amount, unit.weak);
        return;
      case "fr":
        this.#weak = null;
        this.#items.push({ kind: "fr", fr: unit.fr });
        return;
      case "break":
        if (unit.weak && !this.#placed) return;
        this.#finishRegion();
        return;
      case "block":
        this.#block(unit);
        return;
    }
  }

  finish(): Fragment {
    this.#weak = null;
    this.#finishRegion();
    return this.#frames;
  }

  get #remaining(): Abs {
    return this.#regionHeight - this.#used;
  }

  get #fresh(): boolean {
    return !this.#placed && this.#regions.fresh;
  }

  #spacing(amount: Abs, weak: boolean): void {
    if (weak) {
      if (this.#placed) this.#weak = Math.max(this.#weak ?? 0, amount);
      return;
    }
    this.#weak = null;
    if (!fits(amount, this.#remaining)) {
      this.#finishRegion();
      return;
    }
    this.#items.push({ kind: "gap", amount });
    this.#used += amount;
  }

  #block(unit: Extract<FlowUnit, { kind: "block" }>): void {
    if (this.#weak !== null) {
      const gap = Math.max(0, Math.min(this.#weak, this.#remaining));
      this.#items.push({ kind: "gap", amount: gap });
      this.#used += gap;
      this.#weak = null;
    }
    const fragment = unit.layout({
      width: this.#regions.width,
      height: Math.max(0, this.#remaining),
      full: this.#regions.full,
      fresh: this.#fresh,
    });
    let warned = false;
    fragment.forEach((frame, i) => {
      if (i > 0) this.#finishRegion();
      if (frame.isEmpty() && frame.height === 0) return;
      if (!fits(frame.height, this.#remaining) && !this.#fresh) this.#finishRegion();
      if (!fits(frame.height, this.#remaining) && !warned) {
        warned = true;
        this.#overflow(frame.height, unit.span);
      }
      this.#items.push({ kind: "frame", frame, align: unit.align });
      this.#used += frame.height;
      this.#placed = true;
    });
  }

  #overflow(height: Abs, span: SourceSpan | null): void {
    debug.layout("overflow", { height: toPt(height), available: toPt(this.#remaining) });
    this.#engine.sink.warn(
      diagnostics.emit("quillset/layout/overflow", {
        message: `content of height ${formatAbs(height)} does not fit into a region of ${formatAbs(this.#regionHeight)}`,
        span,
        data: { height: toPt(height), available: toPt(this.#regionHeight) },
      }),
    );
  }

  #finishRegion(): void {
    const bounded = isBounded(this.#regions.width);
    const width = bounded
      ? this.#regions.width
      : Math.max(0, ...this.#items.map((item) => (item.kind === "frame" ? item.frame.width : 0)));
    const height = this.#expand && isBounded(this.#regionHeight) ? this.#regionHeight : this.#used;
    const frs = this.#items.reduce((sum, item) => sum + (item.kind === "fr" ? item.fr : 0), 0);
    const free = Math.max(0, height - this.#used);

    const builder = new FrameBuilder(size(width, height));
    let y = 0;
    for (const item of this.#items) {
      switch (item.kind) {
        case "gap":
          y += item.amount;
          break;
        case "fr":
          if (frs > 0) y += Math.floor((free * item.fr) / frs);
          break;
        case "frame":
          builder.pushFrame({ x: alignOffset(item.align, width, item.frame.width), y }, item.frame);
          y += item.frame.height;
          break;
      }
    }
    this.#frames.push(builder.finish());

    this.#regions = nextRegion(this.#regions);
    this.#regionHeight = this.#regions.height;
    this.#items = [];
    this.#used = 0;
    this.#placed = false;
    this.#weak = null;
  }
}
