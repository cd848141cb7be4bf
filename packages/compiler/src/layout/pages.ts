/* =======================================================================================
 * PAGES
 * ---------------------------------------------------------------------------------------
 * Top of layout. The document is split into runs at page breaks; each run takes its
 * page setup from the styles of its first element and flows into columns of the page
 * body. Every page is then assembled (fill, columns, header, footer) through the memo,
 * so a page whose body did not change comes back as the very same frame.
 * ======================================================================================= */

import { Content, text } from "../content/content.js";
import { formatNumbering } from "../content/numbering.js";
import { isSourceError } from "../diagnostics/errors.js";
import type { SinkEffect } from "../diagnostics/sink.js";
import type { Engine } from "../eval/engine.js";
import * as C from "../eval/cast.js";
import { align, int, type Value } from "../eval/value.js";
import { callFunc } from "../eval/vm.js";
import { mm, type Abs } from "../geom/abs.js";
import type { Color } from "../geom/color.js";
import { resolveRel } from "../geom/length.js";
import { size, uniformSides, type HAlign, type Sides, type Size } from "../geom/shapes.js";
import { memoize } from "../memo/store.js";
import { DETACHED_SPAN } from "../model/span.js";
import { debug } from "../shared/debug.js";
import { StyleChain } from "../style/chain.js";
import { Styles, property } from "../style/styles.js";
import { contentAnchor } from "./anchor.js";
import { resolveSides } from "./container.js";
import { layoutFlow, layoutFlowItems } from "./flow.js";
import { Document, Frame, FrameBuilder } from "./frame.js";
import type { InlinePiece } from "./inline.js";
import { regions, unbounded } from "./regions.js";
import { textSize } from "./text.js";

/** Paper sizes in millimetres, portrait. */
const PAPERS: Readonly<Record<string, readonly [number, number]>> = {
  a3: [297, 420],
  a4: [210, 297],
  a5: [148, 210],
  a6: [105, 148],
  b5: [176, 250],
  "us-letter": [215.9, 279.4],
  "us-legal": [215.9, 355.6],
  "us-executive": [184.15, 266.7],
};

export interface PageStyle {
  readonly size: Size;
  readonly margin: Sides<Abs>;
  readonly columns: number;
  readonly gutter: Abs;
  readonly fill: Color | null;
  /** Pattern string, function or none. */
  readonly numbering: Value;
  readonly numberAlign: HAlign;
  readonly header: Content | null;
  readonly footer: Content | null;
}

export function pageStyle(chain: StyleChain): PageStyle {
  const paper = PAPERS[chain.getOr("page", "paper", C.str, "a4")] ?? PAPERS.a4 ?? [210, 297];
  const width = chain.getOr("page", "width", C.length, null)?.abs ?? mm(paper[0]);
  const height = chain.getOr("page", "height", C.length, null)?.abs ?? mm(paper[1]);
  const marginValue = chain.value("page", "margin");
  // Default margin: 2.5cm on a4, scaled with the shorter side.
  const margin = C.isAuto(marginValue)
    ? uniformSides(Math.round((Math.min(width, height) * 2.5) / 21))
    : resolveSides(marginValue, chain, width, height);
  const bodyWidth = Math.max(0, width - margin.left - margin.right);
  const gutter = chain.getOr("page", "gutter", C.rel, null);
  return {
    size: size(width, height),
    margin,
    columns: chain.getOr("page", "columns", C.positiveInt, 1),
    gutter: gutter ? Math.max(0, resolveRel(gutter, bodyWidth, textSize(chain))) : 0,
    fill: chain.getOr("page", "fill", C.color, null),
    numbering: chain.value("page", "numbering"),
    numberAlign: chain.getOr("page", "number-align", C.align, {}).x ?? "center",
    header: chain.getOr("page", "header", C.noneOr(C.content), null),
    footer: chain.getOr("page", "footer", C.noneOr(C.content), null),
  };
}

/* =======================================================================================
 * Runs
 * ======================================================================================= */

interface PageRun {
  readonly items: readonly InlinePiece[];
  readonly chain: StyleChain;
}

function isTrivial(content: Content): boolean {
  return content.is("space") || content.is("parbreak") || content.is("metadata");
}

/** Splits the document at page breaks. A weak break only ends a run that has content. */
export function splitRuns(content: Content, styles: StyleChain): PageRun[] {
  const runs: PageRun[] = [];
  let items: InlinePiece[] = [];
  let first: StyleChain | null = null;
  let endedByStrongBreak = false;

  const visit = (node: Content, chain: StyleChain): void => {
    if (node.isSequence()) {
      for (const child of node.children) visit(child, chain);
      return;
    }
    if (node.isStyled()) {
      if (node.child && node.styles) visit(node.child, chain.chain(node.styles));
      return;
    }
    if (node.is("pagebreak")) {
      const weak = node.field("weak") === true || chain.value("pagebreak", "weak") === true;
      if (weak && first === null) return;
      runs.push({ items, chain: first ?? chain });
      items = [];
      first = null;
      endedByStrongBreak = !weak;
      return;
    }
    items.push([node, chain]);
    if (first === null && !isTrivial(node)) {
      first = chain;
      endedByStrongBreak = false;
    }
  };
  visit(content, styles);
  if (first !== null || runs.length === 0 || endedByStrongBreak) runs.push({ items, chain: first ?? styles });
  return runs;
}

/* =======================================================================================
 * Typesetting
 * ======================================================================================= */

export function typeset(engine: Engine, content: Content, styles: StyleChain = StyleChain.EMPTY): Document {
  return engine.trace.span("layout", () => {
    const runs = splitRuns(content, styles);
    const pages: Frame[] = [];
    for (const run of runs) {
      const style = pageStyle(run.chain);
      const bodyWidth = Math.max(0, style.size.w - style.margin.left - style.margin.right);
      const bodyHeight = Math.max(0, style.size.h - style.margin.top - style.margin.bottom);
      const columnWidth = Math.max(0, Math.floor((bodyWidth - style.gutter * (style.columns - 1)) / style.columns));
      const fragment = layoutFlowItems(engine, run.items, regions(columnWidth, bodyHeight), { expand: true });
      for (let i = 0; i < fragment.length; i += style.columns) {
        const columns = fragment.slice(i, i + style.columns);
        pages.push(assemblePage(engine, columns, style, run.chain, pages.length + 1));
      }
    }
    const meta = runs.find((run) => run.items.some(([item]) => !isTrivial(item)))?.chain ?? styles;
    const title = C.content.check(meta.value("document", "title"));
    const author = meta.getOr("document", "author", C.arrayOf(C.str), []);
    debug.layout("typeset", { runs: runs.length, pages: pages.length });
    return new Document(pages, title && !title.isEmpty() ? title.plainText() : null, author);
  });
}

export const assemblePage: (
  engine: Engine,
  columns: readonly Frame[],
  style: PageStyle,
  chain: StyleChain,
  number: number,
) => Frame = memoize<
  [Engine, readonly Frame[], PageStyle, StyleChain, number],
  Frame,
  SinkEffect,
  readonly Content[]
>("assemblePage", {
  store: (engine) => engine.memo,
  key: (_engine, columns, style, chain, number) => [columns, style, chain, number],
  inputs: (engine) => ({ world: engine.world }),
  effects: (engine) => engine.sink,
  anchor: contentAnchor((_engine, _columns, style) =>
    [style.header, style.footer].filter((c): c is Content => c !== null),
  ),
  compute: (engine, columns, style, chain, number) => assembleUncached(engine, columns, style, chain, number),
});

function assembleUncached(
  engine: Engine,
  columns: readonly Frame[],
  style: PageStyle,
  chain: StyleChain,
  number: number,
): Frame {
  const { size: page, margin } = style;
  const bodyWidth = Math.max(0, page.w - margin.left - margin.right);
  const builder = new FrameBuilder(page);
  if (style.fill) {
    builder.push({ x: 0, y: 0 }, { kind: "shape", shape: { geometry: { kind: "rect", size: page }, fill: style.fill, stroke: null } });
  }
  columns.forEach((column, i) => {
    builder.pushFrame({ x: margin.left + i * (column.width + style.gutter), y: margin.top }, column);
  });

  if (style.header) {
    const header = marginal(engine, style.header, chain, bodyWidth);
    builder.pushFrame({ x: margin.left, y: Math.max(0, Math.floor((margin.top - header.height) / 2)) }, header);
  }
  const footerContent = style.footer ?? numberingContent(engine, style.numbering, number);
  if (footerContent) {
    const footerChain = style.footer
      ? chain
      : chain.chain(Styles.of(property("align", "alignment", align({ x: style.numberAlign }), DETACHED_SPAN)));
    const footer = marginal(engine, footerContent, footerChain, bodyWidth);
    const y = page.h - margin.bottom + Math.max(0, Math.floor((margin.bottom - footer.height) / 2));
    builder.pushFrame({ x: margin.left, y }, footer);
  }
  debug.layout("page", { number, columns: columns.length });
  return builder.finish();
}

function marginal(engine: Engine, content: Content, chain: StyleChain, width: Abs): Frame {
  const [frame] = layoutFlow(engine, content, chain, unbounded(width));
  return frame ?? Frame.empty(size(width, 0));
}

function numberingContent(engine: Engine, numbering: Value, number: number): Content | null {
  if (typeof numbering === "string") return text(formatNumbering(numbering, [number]));
  const func = C.func.check(numbering);
  if (!func) return null;
  try {
    return C.content.check(callFunc(engine, func, [int(number)], DETACHED_SPAN)) ?? null;
  } catch (error) {
    if (!isSourceError(error)) throw error;
    engine.sink.delay(error.diagnostics);
    return null;
  }
}
