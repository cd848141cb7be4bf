import { describe, test, expect } from "vitest";

import { Content } from "../../src/content/content.js";
import { realize, type RealizeResult } from "../../src/realize/realize.js";
import { compileText, evalText } from "../_helpers/world.js";

function realized(text: string): RealizeResult {
  const { module, engine } = evalText(text);
  return realize(engine, module.content);
}

/** Every element of kind `elem` in document order, descending into fields. */
function findAll(content: Content, elem: string, out: Content[] = []): Content[] {
  if (content.is(elem)) out.push(content);
  for (const child of content.children) findAll(child, elem, out);
  if (content.child) findAll(content.child, elem, out);
  for (const value of content.fields().values()) {
    if (value instanceof Content) findAll(value, elem, out);
  }
  return out;
}

function prefixText(heading: Content): string | null {
  const prefix = heading.field("prefix");
  return prefix instanceof Content ? prefix.plainText() : null;
}

describe("heading numbering", () => {
  test("counters reset below the level that advanced", () => {
    const { content } = realized('#set heading(numbering: "1.")\n= A\n== B\n== C\n= D\n== E');
    expect(findAll(content, "heading").map(prefixText)).toEqual(["1.", "1.1.", "1.2.", "2.", "2.1."]);
  });

  test("headings without numbering get no prefix", () => {
    const { content } = realized("= A\n= B");
    expect(findAll(content, "heading").map(prefixText)).toEqual([null, null]);
  });
});

describe("references", () => {
  test("a reference to a numbered heading resolves to its supplement and number", () => {
    const { content, labels } = realized('#set heading(numbering: "1.")\n= A\n= B <b>\nSee @b.');
    expect(labels.get("b")).toMatchObject({ elem: "heading", number: "2" });
    const [ref] = findAll(content, "ref");
    const resolved = ref?.field("resolved");
    expect(resolved instanceof Content ? resolved.plainText() : null).toBe("Section 2");
  });

  test("a reference to an unnumbered target stays unresolved", () => {
    const { content } = realized("= A <a>\nSee @a.");
    const [ref] = findAll(content, "ref");
    expect(ref?.has("resolved")).toBe(false);
  });
});

describe("show rules", () => {
  test("a function recipe replaces the matched element", () => {
    const { content } = realized("#show heading: it => [X]\n= A");
    expect(content.plainText().trim()).toBe("X");
    expect(findAll(content, "heading")).toEqual([]);
  });

  test("a recipe that returns its input does not apply again", () => {
    const { content } = realized("#show heading: it => it\n= A");
    expect(findAll(content, "heading")).toHaveLength(1);
  });

  test("text recipes replace each occurrence inside text", () => {
    const { content } = realized('#show "cat": [dog]\nA cat and a cat.');
    expect(content.plainText().trim()).toBe("A dog and a dog.");
  });

  test("recipes only apply inside the block they are written in", () => {
    const { content } = realized("#[\n#show strong: it => [S]\n*a*\n]\n*b*");
    expect(content.plainText().replace(/\s+/g, "")).toBe("Sb");
  });

  test("a recipe that keeps producing its own target hits the depth limit", () => {
    const { errors } = compileText("#show heading: it => heading[again]\n= A");
    expect(errors.map((error) => error.code)).toEqual(["quillset/realize/recursion"]);
  });

  test("an error inside a recipe is reported with the show rule in its trace", () => {
    const { errors, document } = compileText("#show heading: it => 1 / 0\n= A");
    expect(document).toBeNull();
    const [error] = errors;
    expect(error?.code).toBe("quillset/eval/invalid-operation");
    expect(error?.trace?.map((point) => [point.kind, point.target])).toEqual([
      ["call", "closure"],
      ["show", "heading"],
    ]);
  });
});
