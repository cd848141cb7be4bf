import { describe, test, expect } from "vitest";

import { compile } from "../../src/compile.js";
import { mm, pt, toPt } from "../../src/geom/abs.js";
import type { Document } from "../../src/layout/frame.js";
import { SMALL_PAGE, compileText, memoryWorld, pngBytes, words } from "../_helpers/world.js";

function documentOf(text: string): Document {
  const { document, errors } = compileText(text);
  expect(errors).toEqual([]);
  if (!document) throw new Error("no document");
  return document;
}

function squash(text: string): string {
  return text.replace(/\s+/g, "");
}

describe("pagination", () => {
  test("text one and a half pages tall fills exactly two pages", () => {
    const document = documentOf(SMALL_PAGE + words(60));
    expect(document.pages).toHaveLength(2);
    const all = words(60).split(" ");
    expect(squash(document.pages[0]?.text() ?? "")).toBe(all.slice(0, 40).join(""));
    expect(squash(document.pages[1]?.text() ?? "")).toBe(all.slice(40).join(""));
  });

  test("no text is lost or reordered across pages", () => {
    const document = documentOf(SMALL_PAGE + words(60));
    expect(squash(document.text())).toBe(squash(words(60)));
  });

  test("an explicit page break starts a new page", () => {
    const document = documentOf(SMALL_PAGE + "first\n#pagebreak()\nsecond");
    expect(document.pages.map((page) => page.text().trim())).toEqual(["first", "second"]);
  });

  test("a weak page break at the start adds no empty page", () => {
    expect(documentOf(SMALL_PAGE + "#pagebreak(weak: true)\nonly").pages).toHaveLength(1);
  });

  test("a trailing strong page break leaves an empty last page", () => {
    const document = documentOf(SMALL_PAGE + "only\n#pagebreak()");
    expect(document.pages).toHaveLength(2);
    expect(document.pages[1]?.text()).toBe("");
  });

  test("an empty document still has one page", () => {
    expect(documentOf("").pages).toHaveLength(1);
  });

  test("named paper sizes set the page size", () => {
    const [page] = documentOf('#set page(paper: "a5")\nx').pages;
    expect([page?.width, page?.height]).toEqual([mm(148), mm(210)]);
  });

  test("every page is numbered in the footer", () => {
    const document = documentOf(
      '#set page(width: 100pt, height: 80pt, margin: 10pt, numbering: "1")\n#set par(leading: 0pt)\n#set text(size: 10pt)\na\n#pagebreak()\nb',
    );
    expect(document.pages.map((page) => squash(page.text()))).toEqual(["a1", "b2"]);
  });

  test("columns fill left to right before a new page", () => {
    const document = documentOf(
      "#set page(width: 100pt, height: 20pt, margin: 0pt, columns: 2, gutter: 0pt)\n#set par(leading: 0pt)\n#set text(size: 10pt)\n" +
        words(8),
    );
    expect(document.pages).toHaveLength(1);
    const [page] = document.pages;
    expect(page?.items.map(([pos]) => pos.x)).toEqual([0, pt(50)]);
  });
});

describe("fractional spacing", () => {
  test("vertical spacing of zero fractions leaves the blocks in order", () => {
    const [page] = documentOf(SMALL_PAGE + "a\n#v(0fr)\nb").pages;
    const ys = page?.find("text").map(([pos]) => pos.y) ?? [];
    expect(ys).toHaveLength(2);
    expect(ys.every(Number.isFinite)).toBe(true);
    expect(ys[0]).toBeLessThan(ys[1] ?? Number.NaN);
  });

  test("horizontal spacing of zero fractions leaves the words in order", () => {
    const [page] = documentOf(SMALL_PAGE + "a#h(0fr)b").pages;
    const xs = page?.find("text").map(([pos]) => pos.x) ?? [];
    expect(xs.every(Number.isFinite)).toBe(true);
    expect(squash(page?.text() ?? "")).toBe("ab");
  });
});

describe("text styling", () => {
  test("a text call changes the size of its body only", () => {
    const [page] = documentOf("#text(size: 20pt)[big] small").pages;
    const sizes = new Map(page?.find("text").map(([, item]) => [item.run.text.trim(), toPt(item.run.size)] as const));
    expect(sizes.get("big")).toBe(20);
    expect(sizes.get("small")).toBe(11);
  });

  test("strong text uses the bold variant", () => {
    const [page] = documentOf("plain *bold*").pages;
    const bold = page?.find("text").find(([, item]) => item.run.text.trim() === "bold");
    expect(bold?.[1].run.variant.weight).toBe(700);
  });

  test("set rules inside a content block do not leak out of it", () => {
    const [page] = documentOf("#[#set text(size: 20pt)\ninner] outer").pages;
    const sizes = new Map(page?.find("text").map(([, item]) => [item.run.text.trim(), toPt(item.run.size)] as const));
    expect(sizes.get("inner")).toBe(20);
    expect(sizes.get("outer")).toBe(11);
  });
});

describe("blocks", () => {
  test("list items are laid out with their markers", () => {
    expect(squash(documentOf("- one\n- two").text())).toBe("•one•two");
  });

  test("table cells are placed row by row", () => {
    expect(squash(documentOf("#table(columns: 2, [a], [b], [c], [d])").text())).toBe("abcd");
  });
});

describe("images", () => {
  test("an image keeps its aspect ratio when only the width is given", () => {
    const world = memoryWorld({ "/main.quill": '#image("pic.png", width: 50pt)', "/pic.png": pngBytes(200, 100) });
    const { document, warnings } = compile(world);
    expect(warnings).toEqual([]);
    const image = document?.pages[0]?.find("image")[0]?.[1];
    expect(image?.size).toEqual({ w: pt(50), h: pt(25) });
    expect(image?.format).toBe("png");
  });

  test("a missing image becomes a placeholder with one warning", () => {
    const { document, warnings } = compileText(SMALL_PAGE + '#image("missing.png")');
    expect(document).not.toBeNull();
    expect(warnings.map((warning) => [warning.code, warning.data])).toEqual([
      ["quillset/layout/missing-image", { path: "/missing.png" }],
    ]);
    const placeholders = document?.pages[0]?.find("placeholder") ?? [];
    expect(placeholders.map(([, item]) => item.reason)).toEqual(["missing"]);
  });

  test("an image path above the project root is not read", () => {
    const world = memoryWorld({ "/main.quill": '#image("../pic.png")', "/pic.png": pngBytes(20, 10) });
    const { document, warnings } = compile(world);
    expect(warnings.map((warning) => [warning.code, warning.message, warning.data])).toEqual([
      ["quillset/layout/missing-image", "image outside of the project root: ../pic.png", { path: "../pic.png" }],
    ]);
    expect(document?.pages[0]?.find("image")).toEqual([]);
    expect(document?.pages[0]?.find("placeholder").map(([, item]) => item.reason)).toEqual(["missing"]);
  });
});

describe("layout warnings", () => {
  test("content taller than a page is placed anyway with one overflow warning", () => {
    const world = memoryWorld({
      "/main.quill": SMALL_PAGE + '#image("tall.png", width: 20pt)\nafter',
      "/tall.png": pngBytes(10, 100),
    });
    const { document, warnings } = compile(world);
    expect(warnings.map((warning) => [warning.code, warning.message, warning.data])).toEqual([
      [
        "quillset/layout/overflow",
        "content of height 200pt does not fit into a region of 80pt",
        { height: 200, available: 80 },
      ],
    ]);
    expect(document?.pages).toHaveLength(2);
    expect(document?.pages[0]?.find("image").map(([, item]) => toPt(item.size.h))).toEqual([200]);
    expect(squash(document?.pages[1]?.text() ?? "")).toBe("after");
  });

  test("an unknown font family falls back to the installed fonts", () => {
    const { document, warnings } = compileText(SMALL_PAGE + '#set text(font: "Nowhere Sans")\nhello');
    expect(warnings.map((warning) => [warning.code, warning.data])).toEqual([
      ["quillset/layout/unknown-font", { family: "Nowhere Sans" }],
    ]);
    const runs = document?.pages[0]?.find("text").map(([, item]) => [item.run.family, item.run.text.trim()]);
    expect(runs).toEqual([["Libertinus Serif", "hello"]]);
  });

  test("a character no font covers is drawn as a notdef glyph", () => {
    const { document, warnings } = compileText(SMALL_PAGE + "a\u2603b");
    expect(warnings.map((warning) => [warning.code, warning.data])).toEqual([
      ["quillset/layout/missing-glyph", { char: "\u2603" }],
    ]);
    const glyphs = document?.pages[0]?.find("text").flatMap(([, item]) => item.run.glyphs) ?? [];
    expect(glyphs.map((glyph) => [glyph.char, glyph.notdef ?? false])).toEqual([
      ["a", false],
      ["\u2603", true],
      ["b", false],
    ]);
  });
});
