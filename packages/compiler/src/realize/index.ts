export { MAX_SHOW_DEPTH, realize, resolveRefs, type LabelTarget, type RealizeResult } from "./realize.js";
