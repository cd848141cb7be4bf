/* =======================================================================================
 * LISTS
 * ---------------------------------------------------------------------------------------
 * Bullet lists and numbered lists. Each item is an atomic unit: a marker followed by the
 * item body, the body indented past the widest marker. Lists break between items.
 *
 * Nesting depth is a folding style property, so the marker of a nested bullet list
 * cycles through `list.marker` without the items knowing how deep they are.
 * ======================================================================================= */

import { Content, text } from "../content/content.js";
import { formatNumbering } from "../content/numbering.js";
import { isSourceError } from "../diagnostics/errors.js";
import type { Engine } from "../eval/engine.js";
import * as C from "../eval/cast.js";
import { int, type Value } from "../eval/value.js";
import { callFunc } from "../eval/vm.js";
import { resolveRel } from "../geom/length.js";
import { isBounded, type Abs } from "../geom/abs.js";
import { size } from "../geom/shapes.js";
import type { StyleChain } from "../style/chain.js";
import { Styles, property } from "../style/styles.js";
import { distribute, frameUnit, layoutFlow, type FlowUnit } from "./flow.js";
import { Frame, FrameBuilder } from "./frame.js";
import { layoutInlineFrame } from "./inline.js";
import { unbounded, type Fragment, type Regions } from "./regions.js";
import { resolveIn, textSize } from "./text.js";

export function layoutList(engine: Engine, list: Content, chain: StyleChain, regions: Regions): Fragment {
  const elem = list.elem;
  const field = (name: string) => list.field(name) ?? chain.value(elem, name);
  const children = C.array.check(list.field("children") ?? null) ?? [];
  const items = children.filter((item): item is Content => item instanceof Content);
  const depth = C.int.check(chain.value(elem, "depth")) ?? 0;
  const inner = chain.chain(Styles.of(property(elem, "depth", int(1), list.span)));

  const markers = items.map((item, i) =>
    layoutInlineFrame(engine, markerOf(engine, list, field, item, i, depth), chain),
  );
  const markerWidth = Math.max(0, ...markers.map((m) => m.width));
  const indent = resolveIn(chain, C.length.check(field("indent")) ?? { abs: 0, em: 0 });
  const bodyIndent = resolveIn(chain, C.length.check(field("body-indent")) ?? { abs: 0, em: 0 });
  const offset = indent + markerWidth + bodyIndent;
  const bodyWidth = isBounded(regions.width) ? Math.max(0, regions.width - offset) : regions.width;
  const gap = itemSpacing(chain, field("spacing"), field("tight") !== false, regions);

  const units: FlowUnit[] = [];
  items.forEach((item, i) => {
    const marker = markers[i] ?? Frame.empty(size(0, 0));
    const body = item.body() ?? Content.EMPTY;
    const [frame] = layoutFlow(engine, body, inner, unbounded(bodyWidth));
    const bodyFrame = frame ?? Frame.empty(size(0, 0));
    const baseline = bodyFrame.firstBaseline() ?? marker.baseline;
    const markerY = Math.max(0, baseline - marker.baseline);
    const bodyY = Math.max(0, marker.baseline - baseline);
    const width = isBounded(regions.width) ? regions.width : offset + bodyFrame.width;
    const height = Math.max(markerY + marker.height, bodyY + bodyFrame.height);
    const builder = new FrameBuilder(size(width, height));
    // Numbers are right-aligned so their separators line up.
    const markerX = indent + (elem === "enum" ? markerWidth - marker.width : 0);
    builder.pushFrame({ x: markerX, y: markerY }, marker);
    builder.pushFrame({ x: offset, y: bodyY }, bodyFrame);
    if (i > 0) units.push({ kind: "spacing", amount: gap, weak: true });
    units.push(frameUnit(builder.finish(), "start", item.span));
  });
  return distribute(engine, units, regions);
}

function markerOf(
  engine: Engine,
  list: Content,
  field: (name: string) => Value,
  item: Content,
  index: number,
  depth: number,
): Content {
  if (list.elem === "list") {
    const markers = C.arrayOf(C.content).check(field("marker")) ?? [];
    return markers[depth % Math.max(1, markers.length)] ?? text("•", list.span);
  }
  const number = enumNumber(list, field, index);
  const numbering = field("numbering");
  if (typeof numbering === "string") return text(formatNumbering(numbering, [number]), item.span);
  const func = C.func.check(numbering);
  if (!func) return text(`${number}.`, item.span);
  try {
    return C.content.check(callFunc(engine, func, [int(number)], item.span)) ?? Content.EMPTY;
  } catch (error) {
    if (!isSourceError(error)) throw error;
    engine.sink.delay(error.diagnostics);
    return text(`${number}.`, item.span);
  }
}

/** Number of the item at `index`: explicit numbers restart the count. */
function enumNumber(list: Content, field: (name: string) => Value, index: number): number {
  const items = C.array.check(list.field("children") ?? null) ?? [];
  let number = (C.int.check(field("start")) ?? 1) - 1;
  for (let i = 0; i <= index; i++) {
    const item = items[i];
    const explicit = item instanceof Content ? C.int.check(item.field("number") ?? null) : undefined;
    number = explicit ?? number + 1;
  }
  return number;
}

function itemSpacing(chain: StyleChain, spacing: Value, tight: boolean, regions: Regions): Abs {
  const rel = C.rel.check(spacing);
  if (rel) return resolveRel(rel, isBounded(regions.full) ? regions.full : 0, textSize(chain));
  const name = tight ? "leading" : "spacing";
  return resolveIn(chain, chain.get("par", name, C.length));
}
