import { describe, test, expect } from "vitest";

import { compile } from "../../src/compile.js";
import { MemoStore } from "../../src/memo/store.js";
import type { CompilerDiagnostic } from "../../src/model/diagnostics.js";
import { createCollectingExporter } from "../../src/shared/trace-exporters.js";
import { CompilerAttributes, createTrace } from "../../src/shared/trace.js";
import { SMALL_PAGE, compileText, memoryWorld, words } from "../_helpers/world.js";

const SAMPLE = `${SMALL_PAGE}#set heading(numbering: "1.")
= Intro <intro>
${words(30)}
#pagebreak()
= Next
See @intro and *more* _text_.
- one
- two`;

describe("compile", () => {
  test("compiling the same input twice gives identical documents", () => {
    const a = compileText(SAMPLE);
    const b = compileText(SAMPLE);
    expect(a.errors).toEqual([]);
    expect(a.document?.fingerprint()).toBe(b.document?.fingerprint());
  });

  test("caching does not change the output", () => {
    const uncached = compileText(SAMPLE, { memo: false });
    const store = new MemoStore();
    const cold = compile(memoryWorld({ "/main.quill": SAMPLE }), { memo: store });
    const warm = compile(memoryWorld({ "/main.quill": SAMPLE }), { memo: store });
    expect(cold.document?.fingerprint()).toBe(uncached.document?.fingerprint());
    expect(warm.document?.fingerprint()).toBe(uncached.document?.fingerprint());
    expect(store.stats().hits).toBeGreaterThan(0);
  });

  test("document metadata comes from the document settings", () => {
    const { document } = compileText('#set document(title: "Report", author: ("Ann", "Bo"))\nBody');
    expect(document?.title).toBe("Report");
    expect(document?.author).toEqual(["Ann", "Bo"]);
  });

  test("a document without metadata has no title", () => {
    expect(compileText("Body").document?.title).toBeNull();
  });

  test("warnings do not withhold the document", () => {
    const { document, errors, warnings } = compileText("See @nowhere.");
    expect(document).not.toBeNull();
    expect(errors).toEqual([]);
    expect(warnings.map((warning) => [warning.code, warning.data])).toEqual([
      ["quillset/layout/unresolved-reference", { label: "nowhere" }],
    ]);
  });

  test("a missing main file is a fatal error", () => {
    const { document, errors } = compile(memoryWorld({}, "/absent.quill"));
    expect(document).toBeNull();
    expect(errors.map((error) => [error.code, error.data])).toEqual([
      ["quillset/world/file-not-found", { path: "/absent.quill" }],
    ]);
  });
});

describe("cyclic includes", () => {
  test("a file including itself", () => {
    const { document, errors } = compileText('#include "main.quill"');
    expect(document).toBeNull();
    expect(errors.map((error) => error.code)).toEqual(["quillset/eval/cyclic-import"]);
    expect(errors[0]?.data).toEqual({ chain: ["/main.quill", "/main.quill"] });
  });

  test("two files including each other", () => {
    const { errors } = compile(
      memoryWorld({
        "/main.quill": '#include "b.quill"',
        "/b.quill": '#include "main.quill"',
      }),
    );
    expect(errors.map((error) => error.code)).toEqual(["quillset/eval/cyclic-import"]);
    expect(errors[0]?.data).toEqual({ chain: ["/main.quill", "/b.quill", "/main.quill"] });
    expect(errors[0]?.span?.file).toBe("/b.quill");
  });

  test("a cycle through ten files", () => {
    const files: Record<string, string> = { "/main.quill": '#include "f1.quill"' };
    for (let i = 1; i <= 9; i++) files[`/f${i}.quill`] = i < 9 ? `#include "f${i + 1}.quill"` : '#include "main.quill"';
    const { errors } = compile(memoryWorld(files));
    const chain = ["/main.quill", ...Array.from({ length: 9 }, (_, i) => `/f${i + 1}.quill`), "/main.quill"];
    expect(errors.map((error) => error.code)).toEqual(["quillset/eval/cyclic-import"]);
    expect(errors[0]?.data).toEqual({ chain });
    expect(errors[0]?.trace).toHaveLength(9);
  });

  test("including the same file twice without a cycle is fine", () => {
    const { errors, document } = compile(
      memoryWorld({
        "/main.quill": '#include "part.quill"\n#include "part.quill"',
        "/part.quill": "part",
      }),
    );
    expect(errors).toEqual([]);
    expect(document?.text().replace(/\s+/g, "")).toBe("partpart");
  });
});

describe("incremental compilation", () => {
  test("an edit on the last page reuses the first page", () => {
    const world = memoryWorld({ "/main.quill": `${SMALL_PAGE}page one\n#pagebreak()\npage two` });
    const memo = new MemoStore();
    const first = compile(world, { memo }).document;
    world.update("/main.quill", `${SMALL_PAGE}page one\n#pagebreak()\npage two, edited`);
    const exporter = createCollectingExporter();
    const second = compile(world, { memo, trace: createTrace({ exporter }) }).document;

    expect(second?.pages[0]).toBe(first?.pages[0]);
    expect(second?.pages[1]?.fingerprint()).not.toBe(first?.pages[1]?.fingerprint());
    const assembled = exporter
      .findEvents("memo")
      .map(({ event }) => event.attributes)
      .find((attributes) => attributes.get(CompilerAttributes.MEMO_FN) === "assemblePage");
    expect([assembled?.get("hits"), assembled?.get("misses")]).toEqual([1, 1]);
  });

  test("an edit on the first page reuses the later pages", () => {
    const world = memoryWorld({ "/main.quill": `${SMALL_PAGE}page one\n#pagebreak()\npage two\n#pagebreak()\npage three` });
    const memo = new MemoStore();
    const first = compile(world, { memo }).document;
    world.update("/main.quill", `${SMALL_PAGE}page one, edited\n#pagebreak()\npage two\n#pagebreak()\npage three`);
    const second = compile(world, { memo }).document;

    expect(second?.pages[0]?.fingerprint()).not.toBe(first?.pages[0]?.fingerprint());
    expect(second?.pages[1]).toBe(first?.pages[1]);
    expect(second?.pages[2]).toBe(first?.pages[2]);
  });

  test("warnings replayed from the cache point into the edited source", () => {
    const body = '#pagebreak()\n#image("nope.png")\nSee @nowhere.';
    const world = memoryWorld({ "/main.quill": `${SMALL_PAGE}page one\n${body}` });
    const memo = new MemoStore();
    compile(world, { memo });
    const edited = `${SMALL_PAGE}page XXXX one\n${body}`;
    world.update("/main.quill", edited);
    const cached = compile(world, { memo }).warnings;
    const fresh = compileText(edited, { memo: false }).warnings;

    const located = (warnings: readonly CompilerDiagnostic[]) =>
      warnings.map((w) => [w.code, w.span?.start, w.span?.end]);
    expect(fresh.map((w) => [w.code, w.span?.start])).toEqual([
      ["quillset/layout/missing-image", edited.indexOf('image("nope.png")')],
      ["quillset/layout/unresolved-reference", edited.indexOf("@nowhere")],
    ]);
    expect(located(cached)).toEqual(located(fresh));
  });

  test("an unchanged world is answered from the cache", () => {
    const world = memoryWorld({ "/main.quill": SAMPLE });
    const memo = new MemoStore();
    const first = compile(world, { memo }).document;
    const before = memo.stats().byFunction["evalModule"];
    const second = compile(world, { memo }).document;
    expect(second).not.toBe(first);
    expect(second?.pages).toEqual(first?.pages);
    expect(memo.stats().byFunction["evalModule"]?.hits).toBe((before?.hits ?? 0) + 1);
  });

  test("editing an included file invalidates the including module", () => {
    const world = memoryWorld({ "/main.quill": '#include "part.quill"', "/part.quill": "old" });
    const memo = new MemoStore();
    compile(world, { memo });
    world.update("/part.quill", "new");
    expect(compile(world, { memo }).document?.text().trim()).toBe("new");
  });
});

describe("tracing", () => {
  test("the compile span wraps evaluation, realization and layout", () => {
    const exporter = createCollectingExporter();
    compile(memoryWorld({ "/main.quill": "Body" }), { trace: createTrace({ exporter }) });
    const [root] = exporter.findSpans("compile");
    expect(root?.children.map((span) => span.name)).toEqual(["eval", "realize", "layout"]);
    expect(root?.attributes.get(CompilerAttributes.FILE)).toBe("/main.quill");
    expect(root?.attributes.get(CompilerAttributes.PAGES)).toBe(1);
  });
});
