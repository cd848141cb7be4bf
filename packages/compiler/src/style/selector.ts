import type { Content } from "../content/content.js";
import { valuesEqual } from "../eval/repr.js";
import type { Selector } from "../eval/value.js";

/** Whether a show rule with `selector` targets `content` as a whole. */
export function matches(selector: Selector, content: Content): boolean {
  switch (selector.kind) {
    case "elem":
      if (content.elem !== selector.elem) return false;
      if (!selector.where) return true;
      for (const [name, expected] of selector.where) {
        const actual = content.field(name);
        if (actual === undefined || !valuesEqual(actual, expected)) return false;
      }
      return true;
    case "label":
      return content.label === selector.label;
    case "text":
    case "regex":
      return false;
  }
}

/** Matches of a text or regex selector inside `text`, as [start, end) pairs. */
export function textMatches(selector: Selector, text: string): [number, number][] {
  const out: [number, number][] = [];
  if (selector.kind === "text") {
    if (selector.text.length === 0) return out;
    for (let at = text.indexOf(selector.text); at >= 0; at = text.indexOf(selector.text, at + selector.text.length)) {
      out.push([at, at + selector.text.length]);
    }
  } else if (selector.kind === "regex") {
    const pattern = new RegExp(selector.source, "gu");
    for (const match of text.matchAll(pattern)) {
      if (match[0].length === 0 || match.index === undefined) continue;
      out.push([match.index, match.index + match[0].length]);
    }
  }
  return out;
}
