export type * from "./ast.js";
export { parse, parseCode } from "./parser.js";
export { Source, computeLineStarts, type Position } from "./source.js";
