export * from "./abs.js";
export * from "./length.js";
export * from "./color.js";
export * from "./shapes.js";
