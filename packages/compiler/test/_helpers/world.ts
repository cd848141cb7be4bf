import { readFileSync } from "node:fs";

import { compile, type CompileOptions, type CompileResult } from "../../src/compile.js";
import { DiagnosticsSink } from "../../src/diagnostics/sink.js";
import { DEFAULT_LIMITS, type Engine } from "../../src/eval/engine.js";
import { evalModule } from "../../src/eval/import.js";
import type { Module } from "../../src/eval/module.js";
import { Route } from "../../src/eval/route.js";
import { parseFontDescriptor, type FontDescriptor } from "../../src/font/font.js";
import { MemoStore } from "../../src/memo/store.js";
import { NOOP_TRACE } from "../../src/shared/trace.js";
import { createMemoryWorld, type MemoryWorld } from "../../src/world/memory.js";
import { TrackedWorld } from "../../src/world/tracked.js";
import type { World } from "../../src/world/types.js";

function loadFonts(): FontDescriptor[] {
  const raw: unknown = JSON.parse(readFileSync(new URL("../fixtures/fonts.json", import.meta.url), "utf8"));
  if (!Array.isArray(raw)) throw new Error("fonts.json must hold an array");
  return raw.map((entry, i) => {
    const descriptor = parseFontDescriptor(entry);
    if (!descriptor) throw new Error(`fonts.json entry ${i} is not a font descriptor`);
    return descriptor;
  });
}

/** Metrics of the serif text font (regular), the mono raw font and their variants. */
export const TEST_FONTS: readonly FontDescriptor[] = loadFonts();

/**
 * Page setup that keeps layout arithmetic in whole points: a 100pt × 80pt page without
 * margins, 10pt text (10pt lines with the test fonts) and no leading between lines.
 * Every character of the serif font is 5pt wide at that size, a space 2.5pt.
 */
export const SMALL_PAGE =
  "#set page(width: 100pt, height: 80pt, margin: 0pt)\n#set par(leading: 0pt)\n#set text(size: 10pt)\n";

export function memoryWorld(files: Readonly<Record<string, string | Uint8Array>>, main = "/main.quill"): MemoryWorld {
  return createMemoryWorld({ main, files, fonts: TEST_FONTS, today: { year: 2024, month: 3, day: 14 } });
}

export function compileText(text: string, options?: CompileOptions): CompileResult {
  return compile(memoryWorld({ "/main.quill": text }), options);
}

/** A compilation context for driving single stages directly. */
export function testEngine(world: World, memo: MemoStore | null = new MemoStore()): Engine {
  return {
    world: new TrackedWorld(world, memo),
    route: Route.root(memo),
    sink: new DiagnosticsSink(),
    memo,
    limits: DEFAULT_LIMITS,
    trace: NOOP_TRACE,
  };
}

/** Evaluates the main file of `world`. */
export function evalMain(engine: Engine): Module {
  const main = engine.world.main();
  const source = engine.world.source(main);
  if (!source.ok) throw new Error(`main file missing: ${main}`);
  return evalModule({ ...engine, route: engine.route.extend(main) }, source.value);
}

export function evalText(text: string): { module: Module; engine: Engine } {
  const engine = testEngine(memoryWorld({ "/main.quill": text }));
  return { module: evalMain(engine), engine };
}

/** The first 24 bytes of a PNG file: signature and IHDR size fields. */
export function pngBytes(width: number, height: number): Uint8Array {
  const bytes = new Uint8Array(33);
  bytes.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
  bytes.set([0, 0, 0, 13], 8);
  bytes.set([0x49, 0x48, 0x44, 0x52], 12);
  const view = new DataView(bytes.buffer);
  view.setUint32(16, width);
  view.setUint32(20, height);
  return bytes;
}

/** The words `w01` … `wNN`, space-separated. Each is 15pt wide at 10pt. */
export function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${String(i + 1).padStart(2, "0")}`).join(" ");
}
