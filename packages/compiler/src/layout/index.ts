export { layoutBlock } from "./block.js";
export { distribute, frameUnit, layoutFlow, layoutFlowItems, type FlowOptions, type FlowUnit } from "./flow.js";
export {
  Document,
  Frame,
  FrameBuilder,
  type FrameItem,
  type Geometry,
  type Glyph,
  type ImageFormat,
  type PositionedItem,
  type Shape,
  type Stroke,
  type TextRun,
} from "./frame.js";
export { decodeImageHeader, type ImageHeader } from "./image.js";
export { layoutParagraph, type InlinePiece } from "./inline.js";
export { assemblePage, pageStyle, splitRuns, typeset, type PageStyle } from "./pages.js";
export { regions, unbounded, type Fragment, type Regions } from "./regions.js";
export { shapeText, textSize, textStyle, type ShapedText, type TextStyle } from "./text.js";
