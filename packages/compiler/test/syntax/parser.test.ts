import { describe, test, expect } from "vitest";

import { fileId } from "@quillset/shared";
import type { Expr, MarkupNode } from "../../src/syntax/ast.js";
import { parse, parseCode } from "../../src/syntax/parser.js";
import { Source } from "../../src/syntax/source.js";

function kinds(nodes: readonly MarkupNode[]): string[] {
  return nodes.filter((node) => node.kind !== "space").map((node) => node.kind);
}

function onlyExpr(text: string): Expr {
  const { exprs, errors } = parseCode(text);
  expect(errors).toEqual([]);
  const [expr] = exprs;
  if (!expr) throw new Error("no expression parsed");
  return expr;
}

describe("markup", () => {
  test("a blank line separates paragraphs; a single newline is a space", () => {
    const { root, errors } = parse("one\ntwo\n\nthree");
    expect(errors).toEqual([]);
    expect(root.nodes.map((node) => node.kind)).toEqual(["text", "space", "text", "parbreak", "text"]);
  });

  test("recognizes strong, emphasis, headings and raw text", () => {
    const { root, errors } = parse("== Title\n*bold* _slanted_ `code`");
    expect(errors).toEqual([]);
    expect(kinds(root.nodes)).toEqual(["heading", "strong", "emph", "raw"]);
    const [heading] = root.nodes;
    expect(heading?.kind === "heading" ? heading.level : null).toBe(2);
  });

  test("list and enum items start at the beginning of a line", () => {
    const { root } = parse("- first\n+ second\n3. third");
    expect(kinds(root.nodes)).toEqual(["list-item", "enum-item", "enum-item"]);
    const third = root.nodes.filter((node) => node.kind === "enum-item")[1];
    expect(third?.kind === "enum-item" ? third.number : undefined).toBe(3);
  });

  test("labels and references keep their names without trailing punctuation", () => {
    const { root } = parse("Intro <intro>\nSee @intro.");
    const label = root.nodes.find((node) => node.kind === "label");
    const ref = root.nodes.find((node) => node.kind === "ref");
    expect(label?.kind === "label" ? label.name : null).toBe("intro");
    expect(ref?.kind === "ref" ? ref.target : null).toBe("intro");
  });

  test("comments produce no nodes", () => {
    const { root } = parse("a // note\nb /* more */ c");
    expect(root.nodes.filter((node) => node.kind === "text").map((node) => (node.kind === "text" ? node.text : ""))).toEqual([
      "a",
      "b",
      "c",
    ]);
  });

  test("an embedded call takes a trailing content block as its last argument", () => {
    const { root, errors } = parse('#box(width: 10pt, "x")[body]');
    expect(errors).toEqual([]);
    const [embed] = root.nodes;
    if (embed?.kind !== "embed" || embed.expr.kind !== "call") throw new Error("expected an embedded call");
    expect(embed.expr.args.map((arg) => arg.kind)).toEqual(["named", "pos", "pos"]);
  });

  test("an unclosed strong delimiter is reported and the tree is still built", () => {
    const { root, errors } = parse("*never closed");
    expect(errors.map((error) => error.message)).toEqual(["expected asterisk"]);
    expect(root.nodes[0]?.kind).toBe("strong");
  });
});

describe("code", () => {
  test("multiplication binds tighter than addition", () => {
    const expr = onlyExpr("1 + 2 * 3");
    if (expr.kind !== "binary") throw new Error("expected a binary expression");
    expect(expr.op).toBe("+");
    expect(expr.rhs.kind === "binary" ? expr.rhs.op : null).toBe("*");
  });

  test("numbers with units become numeric literals", () => {
    const expr = onlyExpr("2.5em");
    expect(expr.kind === "numeric" ? [expr.value, expr.unit] : null).toEqual([2.5, "em"]);
  });

  test("closures take positional and named parameters", () => {
    const expr = onlyExpr("(a, b: 1) => a + b");
    if (expr.kind !== "closure") throw new Error("expected a closure");
    expect(expr.params.map((param) => `${param.kind}:${param.name ?? ""}`)).toEqual(["pos:a", "named:b"]);
  });

  test("dictionaries and arrays are told apart by their first item", () => {
    expect(onlyExpr("(a: 1, b: 2)").kind).toBe("dict");
    expect(onlyExpr("(1, 2)").kind).toBe("array");
    expect(onlyExpr("(1)").kind).toBe("paren");
  });
});

describe("Source", () => {
  test("edits return a new source and leave the original untouched", () => {
    const source = new Source(fileId("/main.quill"), "Hello world");
    const edited = source.edit(6, 11, "there");
    expect(edited.text).toBe("Hello there");
    expect(source.text).toBe("Hello world");
    expect(edited.fingerprint()).not.toBe(source.fingerprint());
  });

  test("sources with the same id and text share a fingerprint", () => {
    const a = new Source(fileId("/a.quill"), "x");
    const b = new Source(fileId("/a.quill"), "x");
    expect(a.fingerprint()).toBe(b.fingerprint());
    expect(a.replace("x")).toBe(a);
  });

  test("converts offsets to zero-based line and column", () => {
    const source = new Source(fileId("/main.quill"), "ab\ncd\nef");
    expect(source.positionAt(4)).toEqual({ line: 1, character: 1 });
    expect(source.lineCount).toBe(3);
  });
});
