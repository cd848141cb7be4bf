export { Content, isContent, space, text } from "./content.js";
export { elementDef, elementDefs, fieldSpec, type ElementDef, type FieldSpec, type FoldKind } from "./elements.js";
export { formatNumbering, isNumberingPattern } from "./numbering.js";
