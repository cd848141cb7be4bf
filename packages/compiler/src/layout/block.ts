/* =======================================================================================
 * BLOCK LAYOUT
 * ---------------------------------------------------------------------------------------
 * Entry point for one block-level element: dispatches on the element kind. Memoized on
 * the element, its styles and the regions it is given, so unchanged blocks are reused
 * as long as they land in a region of the same shape.
 * ======================================================================================= */

import { Content, space } from "../content/content.js";
import type { SinkEffect } from "../diagnostics/sink.js";
import type { Engine } from "../eval/engine.js";
import * as C from "../eval/cast.js";
import { align, int, lengthValue, type Value } from "../eval/value.js";
import { em } from "../geom/length.js";
import { size } from "../geom/shapes.js";
import { memoize } from "../memo/store.js";
import { debug } from "../shared/debug.js";
import type { StyleChain } from "../style/chain.js";
import { Styles, property } from "../style/styles.js";
import { contentAnchor } from "./anchor.js";
import { layoutBlockContainer, layoutBox, layoutRect } from "./container.js";
import { distribute, frameUnit, layoutFlow, type FlowUnit } from "./flow.js";
import { Frame, FrameBuilder } from "./frame.js";
import { layoutImage } from "./image.js";
import { layoutList } from "./list.js";
import type { Fragment, Regions } from "./regions.js";
import { layoutTable } from "./table.js";
import { resolveIn, shapeText, textStyle } from "./text.js";

/** Font size of headings by level, relative to the surrounding text. */
const HEADING_SIZES: readonly number[] = [1.4, 1.2];

export const layoutBlock: (engine: Engine, content: Content, chain: StyleChain, regions: Regions) => Fragment = memoize<
  [Engine, Content, StyleChain, Regions],
  Fragment,
  SinkEffect,
  readonly Content[]
>("layoutBlock", {
  store: (engine) => engine.memo,
  key: (_engine, content, chain, regions) => [content, chain, regions],
  inputs: (engine) => ({ world: engine.world }),
  effects: (engine) => engine.sink,
  anchor: contentAnchor((_engine, content) => [content]),
  compute: (engine, content, chain, regions) => blockUncached(engine, content, chain, regions),
});

function blockUncached(engine: Engine, content: Content, chain: StyleChain, regions: Regions): Fragment {
  debug.layout("block", { elem: content.elem, height: regions.height, fresh: regions.fresh });
  switch (content.elem) {
    case "heading":
      return layoutHeading(engine, content, chain, regions);
    case "list":
    case "enum":
      return layoutList(engine, content, chain, regions);
    case "raw":
      return layoutRawBlock(engine, content, chain, regions);
    case "equation": {
      const styled = withStyles(content, chain, [
        ["align", "alignment", align({ x: "center" })],
        ["text", "emph", true],
      ]);
      return layoutFlow(engine, content.body() ?? Content.EMPTY, styled, regions);
    }
    case "align":
      return layoutAlign(engine, content, chain, regions);
    case "block":
      return layoutBlockContainer(engine, content, chain, regions);
    case "rect":
      return layoutRect(engine, content, chain, regions);
    case "box":
      return [layoutBox(engine, content, chain, regions.width)];
    case "image":
      return layoutImage(engine, content, chain, regions);
    case "table":
    case "grid":
      return layoutTable(engine, content, chain, regions);
    default: {
      const body = content.body();
      return body ? layoutFlow(engine, body, chain, regions) : [Frame.empty(size(0, 0))];
    }
  }
}

function withStyles(
  content: Content,
  chain: StyleChain,
  props: readonly (readonly [elem: string, name: string, value: Value])[],
): StyleChain {
  return chain.chain(Styles.of(...props.map(([elem, name, value]) => property(elem, name, value, content.span))));
}

function layoutHeading(engine: Engine, heading: Content, chain: StyleChain, regions: Regions): Fragment {
  const level = C.positiveInt.check(heading.field("level") ?? chain.value("heading", "level")) ?? 1;
  const factor = HEADING_SIZES[level - 1] ?? 1;
  const styled = withStyles(heading, chain, [
    ["text", "size", lengthValue(em(factor))],
    ["text", "delta", int(300)],
  ]);
  const prefix = C.content.check(heading.field("prefix") ?? null) ?? Content.EMPTY;
  const body = heading.body() ?? Content.EMPTY;
  const line = prefix.isEmpty() ? body : Content.sequence([prefix, space(heading.span), body], heading.span);
  return layoutFlow(engine, line, styled, regions);
}

function layoutAlign(engine: Engine, content: Content, chain: StyleChain, regions: Regions): Fragment {
  const own = C.align.check(content.field("alignment") ?? null) ?? {};
  const outer = C.align.check(chain.find("align", "alignment") ?? null) ?? {};
  const merged = { ...outer, ...own };
  const styled = withStyles(content, chain, [["align", "alignment", align(merged)]]);
  return layoutFlow(engine, content.body() ?? Content.EMPTY, styled, regions);
}

/** Raw blocks keep their spaces and break between lines. */
function layoutRawBlock(engine: Engine, raw: Content, chain: StyleChain, regions: Regions): Fragment {
  const value = raw.field("text");
  const source = typeof value === "string" ? value : "";
  const styled = withStyles(raw, chain, [["text", "font", chain.value("raw", "font")]]);
  const style = textStyle(styled);
  const leading = resolveIn(styled, styled.get("par", "leading", C.length));
  const units: FlowUnit[] = [];
  for (const [i, line] of source.split("\n").entries()) {
    const shaped = shapeText(engine, line, style);
    const builder = new FrameBuilder(size(shaped.width, shaped.ascent + shaped.descent), shaped.ascent);
    let x = 0;
    for (const run of shaped.runs) {
      builder.push({ x, y: shaped.ascent }, { kind: "text", run });
      x += run.width;
    }
    if (i > 0) units.push({ kind: "spacing", amount: leading, weak: true });
    units.push(frameUnit(builder.finish(), "start", raw.span));
  }
  return distribute(engine, units, regions);
}
