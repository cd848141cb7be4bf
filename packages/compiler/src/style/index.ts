export { StyleChain, isElement } from "./chain.js";
export { Styles, property, recipe } from "./styles.js";
export type { Property, Recipe, RecipeTransform, Style } from "./styles.js";
export { matches, textMatches } from "./selector.js";
