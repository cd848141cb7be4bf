import { describe, test, expect } from "vitest";

import { Content, text } from "../../src/content/content.js";
import * as C from "../../src/eval/cast.js";
import { int, lengthValue } from "../../src/eval/value.js";
import { pt } from "../../src/geom/abs.js";
import { length } from "../../src/geom/length.js";
import { DETACHED_SPAN } from "../../src/model/span.js";
import { StyleChain } from "../../src/style/chain.js";
import { matches, textMatches } from "../../src/style/selector.js";
import { Styles, property, recipe } from "../../src/style/styles.js";

function set(elem: string, name: string, value: Parameters<typeof property>[2]): Styles {
  return Styles.of(property(elem, name, value, DETACHED_SPAN));
}

describe("StyleChain", () => {
  test("unset properties resolve to the element default", () => {
    expect(StyleChain.EMPTY.get("text", "size", C.length)).toEqual(length(pt(11)));
    expect(StyleChain.EMPTY.find("text", "size")).toBeUndefined();
  });

  test("the innermost setting wins", () => {
    const chain = StyleChain.EMPTY.chain(set("text", "size", lengthValue(length(pt(9))))).chain(
      set("text", "size", lengthValue(length(pt(14)))),
    );
    expect(chain.get("text", "size", C.length)).toEqual(length(pt(14)));
  });

  test("within one frame the later property wins", () => {
    const frame = Styles.of(
      property("text", "lang", "de", DETACHED_SPAN),
      property("text", "lang", "fr", DETACHED_SPAN),
    );
    expect(StyleChain.EMPTY.chain(frame).value("text", "lang")).toBe("fr");
  });

  test("chaining leaves the outer chain untouched", () => {
    const outer = StyleChain.EMPTY.chain(set("text", "lang", "de"));
    const inner = outer.chain(set("text", "lang", "fr"));
    expect(outer.value("text", "lang")).toBe("de");
    expect(inner.value("text", "lang")).toBe("fr");
    expect(inner.depth).toBe(2);
  });

  test("pushing an empty frame returns the same chain", () => {
    const chain = StyleChain.EMPTY.chain(set("text", "lang", "de"));
    expect(chain.chain(Styles.EMPTY)).toBe(chain);
  });

  test("summing properties add up across frames", () => {
    const chain = StyleChain.EMPTY.chain(set("text", "delta", int(300))).chain(set("text", "delta", int(300)));
    expect(chain.fold("text", "delta")).toEqual(int(600));
  });

  test("toggling properties flip once per frame", () => {
    const once = StyleChain.EMPTY.chain(set("text", "emph", true));
    const twice = once.chain(set("text", "emph", true));
    expect(once.value("text", "emph")).toBe(true);
    expect(twice.value("text", "emph")).toBe(false);
  });

  test("getOr falls back when the value has another shape", () => {
    const fallback = { rel: 0, abs: length(0) };
    expect(StyleChain.EMPTY.getOr("page", "margin", C.rel, fallback)).toBe(fallback);
  });

  test("unknown properties are a programming error", () => {
    expect(() => StyleChain.EMPTY.value("text", "nonsense")).toThrow("unknown style property text.nonsense");
  });

  test("equal chains share a fingerprint", () => {
    const a = StyleChain.EMPTY.chain(set("text", "lang", "de"));
    const b = StyleChain.EMPTY.chain(set("text", "lang", "de"));
    expect(a.fingerprint()).toBe(b.fingerprint());
    expect(a.fingerprint()).not.toBe(StyleChain.EMPTY.fingerprint());
  });

  test("recipes come innermost first", () => {
    const onHeading = { kind: "elem", elem: "heading", where: null } as const;
    const onStrong = { kind: "elem", elem: "strong", where: null } as const;
    const first = recipe(onHeading, { kind: "content", content: text("one") }, DETACHED_SPAN);
    const second = recipe(onStrong, { kind: "content", content: text("two") }, DETACHED_SPAN);
    const chain = StyleChain.EMPTY.chain(Styles.of(first)).chain(Styles.of(second));
    expect([...chain.recipes()]).toEqual([second, first]);
  });

  test("touched lists elements with explicit settings", () => {
    const chain = StyleChain.EMPTY.chain(set("text", "lang", "de")).chain(set("par", "justify", true));
    expect([...chain.touched()].sort()).toEqual(["par", "text"]);
  });
});

describe("selectors", () => {
  const heading = Content.element("heading", [
    ["level", int(2)],
    ["body", text("Results")],
  ]);

  test("element selectors filter on field values", () => {
    expect(matches({ kind: "elem", elem: "heading", where: null }, heading)).toBe(true);
    expect(matches({ kind: "elem", elem: "heading", where: new Map([["level", int(2)]]) }, heading)).toBe(true);
    expect(matches({ kind: "elem", elem: "heading", where: new Map([["level", int(1)]]) }, heading)).toBe(false);
  });

  test("label selectors match labelled content", () => {
    expect(matches({ kind: "label", label: "res" }, heading.withLabel("res"))).toBe(true);
    expect(matches({ kind: "label", label: "res" }, heading)).toBe(false);
  });

  test("text selectors find every non-overlapping occurrence", () => {
    expect(textMatches({ kind: "text", text: "aa" }, "aaaa b aa")).toEqual([
      [0, 2],
      [2, 4],
      [7, 9],
    ]);
  });

  test("regex selectors skip empty matches", () => {
    expect(textMatches({ kind: "regex", source: "\\d*" }, "a12b3")).toEqual([
      [1, 3],
      [4, 5],
    ]);
  });
});
