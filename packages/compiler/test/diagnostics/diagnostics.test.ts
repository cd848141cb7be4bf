import { describe, test, expect } from "vitest";

import { fileId } from "@quillset/shared";
import { buildDiagnostic, formatDiagnostic } from "../../src/diagnostics/build.js";
import { diagnosticsByCategory, diagnosticsCatalog } from "../../src/diagnostics/catalog/index.js";
import { createDiagnosticEmitter } from "../../src/diagnostics/emitter.js";
import { SourceError, diagnostics, sourceError } from "../../src/diagnostics/errors.js";
import { defineDiagnostic, type DiagnosticsCatalog } from "../../src/diagnostics/types.js";

describe("diagnostic catalog", () => {
  test("every code is namespaced by its stage", () => {
    for (const [code, entry] of Object.entries(diagnosticsCatalog)) {
      expect(code.startsWith(`quillset/${entry.stages[0]}/`)).toBe(true);
    }
  });

  test("warnings are the layout codes and the unnecessary import rename", () => {
    const warnings = Object.entries(diagnosticsCatalog)
      .filter(([, entry]) => entry.defaultSeverity === "warning")
      .map(([code]) => code)
      .sort();
    expect(warnings).toEqual([...Object.keys(diagnosticsByCategory.layout), "quillset/eval/unnecessary-alias"].sort());
  });
});

describe("emitter", () => {
  test("stamps stage and severity from the catalog", () => {
    const diag = diagnostics.emit("quillset/layout/missing-image", { message: "no image", data: { path: "/a.png" } });
    expect([diag.stage, diag.severity, diag.span]).toEqual(["layout", "warning", null]);
  });

  test("an explicit severity overrides the default", () => {
    const diag = diagnostics.emit("quillset/layout/missing-image", {
      message: "no image",
      severity: "error",
      data: { path: "/a.png" },
    });
    expect(diag.severity).toBe("error");
  });

  test("required data fields are enforced", () => {
    expect(() => diagnostics.emit("quillset/world/file-not-found", { message: "gone" })).toThrow(
      "Diagnostic 'quillset/world/file-not-found' is missing data fields: path.",
    );
  });

  test("codes outside the catalog are refused", () => {
    const catalog: DiagnosticsCatalog = {
      "demo/x/known": defineDiagnostic({
        category: "syntax",
        defaultSeverity: "error",
        impact: "blocking",
        span: "span",
        stages: ["parse"],
        description: "Known.",
      }),
    };
    const emitter = createDiagnosticEmitter(catalog);
    expect(emitter.emit("demo/x/known", { message: "ok" }).stage).toBe("parse");
    expect(() => emitter.emit("demo/x/other", { message: "no" })).toThrow(
      "Diagnostic code 'demo/x/other' is not declared in the catalog.",
    );
  });
});

describe("building and formatting", () => {
  test("empty optional fields are left out", () => {
    const diag = buildDiagnostic({ code: "c", message: "m", stage: "eval", severity: "error", hints: [], trace: [] });
    expect(diag).toEqual({ code: "c", message: "m", stage: "eval", severity: "error", span: null });
  });

  test("formatting lists location, hints and trace", () => {
    const error = sourceError("quillset/eval/unknown-variable", {
      message: "unknown variable: x",
      span: { start: 3, end: 4, file: fileId("/lib.quill") },
      hints: ["define x before use"],
      data: { name: "x" },
    }).traced({ kind: "call", target: "f", span: null });
    const [diag] = error.diagnostics;
    expect(diag && formatDiagnostic(diag)).toBe(
      "error[quillset/eval/unknown-variable] /lib.quill:3-4: unknown variable: x\n  hint: define x before use\n  in call of f",
    );
  });

  test("a detached diagnostic has no location", () => {
    const diag = diagnostics.emit("quillset/realize/recursion", { message: "too deep", data: { limit: 64 } });
    expect(formatDiagnostic(diag)).toBe("error[quillset/realize/recursion] <detached>: too deep");
  });
});

describe("SourceError", () => {
  test("joins the messages of every diagnostic", () => {
    const a = diagnostics.emit("quillset/parse/syntax", { message: "expected ]" });
    const b = diagnostics.emit("quillset/parse/syntax", { message: "unclosed string" });
    const error = new SourceError([a, b]);
    expect(error.message).toBe("expected ]; unclosed string");
    expect(error.name).toBe("SourceError");
  });

  test("tracing appends to each diagnostic without touching the original", () => {
    const original = new SourceError([diagnostics.emit("quillset/parse/syntax", { message: "bad" })]);
    const traced = original
      .traced({ kind: "import", target: "/a.quill", span: null })
      .traced({ kind: "include", target: "/main.quill", span: null });
    expect(traced.diagnostics[0]?.trace?.map((point) => point.target)).toEqual(["/a.quill", "/main.quill"]);
    expect(original.diagnostics[0]?.trace).toBeUndefined();
  });
});
