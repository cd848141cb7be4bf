/* =======================================================================================
 * TABLES AND GRIDS
 * ---------------------------------------------------------------------------------------
 * Cells fill the columns row by row. Column sizing, in order:
 * 1. fixed tracks resolve against the available width
 * 2. auto tracks take the widest cell in the column, shrunk proportionally when
 *    together they would exceed what the fixed tracks leave
 * 3. fr tracks share what is left
 *
 * Rows are atomic units: a table breaks between rows, never inside one.
 * ======================================================================================= */

import { Content } from "../content/content.js";
import type { Engine } from "../eval/engine.js";
import * as C from "../eval/cast.js";
import { AUTO, align, type Value } from "../eval/value.js";
import { INFINITE, isBounded, type Abs } from "../geom/abs.js";
import { resolveRel } from "../geom/length.js";
import { size } from "../geom/shapes.js";
import { debug } from "../shared/debug.js";
import type { StyleChain } from "../style/chain.js";
import { Styles, property } from "../style/styles.js";
import { resolveSides, resolveStroke } from "./container.js";
import { distribute, frameUnit, layoutFlow, type FlowUnit } from "./flow.js";
import { Frame, FrameBuilder } from "./frame.js";
import { unbounded, type Fragment, type Regions } from "./regions.js";
import { textSize } from "./text.js";

type Track =
  | { readonly kind: "auto" }
  | { readonly kind: "fixed"; readonly size: Abs }
  | { readonly kind: "fr"; readonly fr: number };

export function layoutTable(engine: Engine, table: Content, chain: StyleChain, regions: Regions): Fragment {
  const field = (name: string): Value => table.field(name) ?? chain.value(table.elem, name);
  const children = C.array.check(table.field("children") ?? null) ?? [];
  const cells = children.map((cell) => C.content.check(cell) ?? Content.EMPTY);
  const fontSize = textSize(chain);
  const bounded = isBounded(regions.width);
  const whole = bounded ? regions.width : 0;

  const tracks = (C.array.check(field("columns")) ?? [AUTO]).map((value): Track => {
    const fr = C.fraction.check(value);
    if (fr !== undefined) return bounded ? { kind: "fr", fr } : { kind: "auto" };
    const rel = C.rel.check(value);
    return rel ? { kind: "fixed", size: Math.max(0, resolveRel(rel, whole, fontSize)) } : { kind: "auto" };
  });
  const columns = Math.max(1, tracks.length);
  const gutterRel = C.rel.check(field("gutter"));
  const gutter = gutterRel ? Math.max(0, resolveRel(gutterRel, whole, fontSize)) : 0;
  const inset = resolveSides(field("inset"), chain, whole, 0);
  const insetX = inset.left + inset.right;
  const insetY = inset.top + inset.bottom;
  const stroke = resolveStroke(field("stroke"), chain);
  const fill = C.color.check(field("fill")) ?? null;
  const cellAlign = C.align.check(field("align"));
  const cellChain = cellAlign
    ? chain.chain(Styles.of(property("align", "alignment", align(cellAlign), table.span)))
    : chain;

  const widths = sizeColumns(engine, tracks, cells, chain, {
    available: bounded ? regions.width : INFINITE,
    gutter,
    insetX,
  });
  const tableWidth = widths.reduce((sum, w) => sum + w, 0) + gutter * (columns - 1);
  debug.layout("table", { columns, rows: Math.ceil(cells.length / columns), width: tableWidth });

  const units: FlowUnit[] = [];
  for (let start = 0; start < cells.length; start += columns) {
    const row = cells.slice(start, start + columns);
    const frames = row.map((cell, c) => {
      const [frame] = layoutFlow(engine, cell, cellChain, unbounded(Math.max(0, (widths[c] ?? 0) - insetX)));
      return frame ?? Frame.empty(size(0, 0));
    });
    const height = Math.max(0, ...frames.map((f) => f.height)) + insetY;
    const builder = new FrameBuilder(size(tableWidth, height));
    let x = 0;
    frames.forEach((frame, c) => {
      const width = widths[c] ?? 0;
      if (fill || stroke) {
        const geometry = { kind: "rect", size: size(width, height) } as const;
        builder.push({ x, y: 0 }, { kind: "shape", shape: { geometry, fill, stroke } });
      }
      builder.pushFrame({ x: x + inset.left, y: inset.top }, frame);
      x += width + gutter;
    });
    if (start > 0) units.push({ kind: "spacing", amount: gutter, weak: true });
    units.push(frameUnit(builder.finish(), "start", table.span));
  }
  if (units.length === 0) return [Frame.empty(size(tableWidth, 0))];
  return distribute(engine, units, regions);
}

interface Sizing {
  readonly available: Abs;
  readonly gutter: Abs;
  readonly insetX: Abs;
}

function sizeColumns(
  engine: Engine,
  tracks: readonly Track[],
  cells: readonly Content[],
  chain: StyleChain,
  sizing: Sizing,
): Abs[] {
  const columns = Math.max(1, tracks.length);
  const gutters = sizing.gutter * (columns - 1);
  const fixed = tracks.reduce((sum, t) => sum + (t.kind === "fixed" ? t.size : 0), 0);
  const budget = isBounded(sizing.available) ? Math.max(0, sizing.available - gutters - fixed) : INFINITE;

  const natural = tracks.map((track, c) => {
    if (track.kind !== "auto") return 0;
    let widest = 0;
    for (let i = c; i < cells.length; i += columns) {
      const cell = cells[i];
      if (!cell) continue;
      const measure = isBounded(budget) ? Math.max(0, budget - sizing.insetX) : INFINITE;
      const [frame] = layoutFlow(engine, cell, chain, unbounded(measure));
      widest = Math.max(widest, (frame?.contentWidth() ?? 0) + sizing.insetX);
    }
    return widest;
  });
  const autoSum = natural.reduce((sum, w) => sum + w, 0);
  const shrink = isBounded(budget) && autoSum > budget && autoSum > 0 ? budget / autoSum : 1;
  const autos = natural.map((w) => Math.floor(w * shrink));
  const leftover = isBounded(budget) ? Math.max(0, budget - autos.reduce((sum, w) => sum + w, 0)) : 0;
  const frs = tracks.reduce((sum, t) => sum + (t.kind === "fr" ? t.fr : 0), 0);

  return tracks.map((track, c) => {
    switch (track.kind) {
      case "fixed":
        return track.size;
      case "fr":
        return frs > 0 ? Math.floor((leftover * track.fr) / frs) : 0;
      case "auto":
        return autos[c] ?? 0;
    }
  });
}
