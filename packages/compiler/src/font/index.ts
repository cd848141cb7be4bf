export { Font, parseFontDescriptor } from "./font.js";
export type { FontDescriptor, FontStyle, FontVariant } from "./font.js";
export { FontBook } from "./book.js";
export type { FontInfo } from "./book.js";
