import { mkdirSync, mkdtempSync, readFileSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, test, expect, vi } from "vitest";

import { fileId } from "@quillset/shared";
import { compile } from "../../src/compile.js";
import { createFileSystemWorld } from "../../src/world/fs.js";
import { createMemoryWorld } from "../../src/world/memory.js";
import type { FileResult, Logger } from "../../src/world/types.js";
import { TEST_FONTS } from "../_helpers/world.js";

function errorKind<T>(result: FileResult<T>): string | null {
  return result.ok ? null : result.error.kind;
}

describe("memory world", () => {
  test("serves text files as sources and bytes", () => {
    const world = createMemoryWorld({ main: "/main.quill", files: { "/main.quill": "hé" } });
    const source = world.source(fileId("/main.quill"));
    expect(source.ok && source.value.text).toBe("hé");
    const bytes = world.file(fileId("/main.quill"));
    expect(bytes.ok && [...bytes.value]).toEqual([0x68, 0xc3, 0xa9]);
  });

  test("binary files are not sources", () => {
    const world = createMemoryWorld({ main: "/main.quill", files: { "/logo.png": new Uint8Array([1, 2]) } });
    expect(errorKind(world.source(fileId("/logo.png")))).toBe("not-source");
    expect(errorKind(world.source(fileId("/absent.quill")))).toBe("not-found");
  });

  test("an update with the same text keeps the source object", () => {
    const world = createMemoryWorld({ main: "/main.quill", files: { "/main.quill": "a" } });
    const before = world.source(fileId("/main.quill"));
    world.update("/main.quill", "a");
    const same = world.source(fileId("/main.quill"));
    world.update("/main.quill", "b");
    const changed = world.source(fileId("/main.quill"));
    expect(same.ok && before.ok && same.value === before.value).toBe(true);
    expect(changed.ok && before.ok && changed.value === before.value).toBe(false);
  });

  test("removed files are gone", () => {
    const world = createMemoryWorld({ main: "/main.quill", files: { "/x.quill": "x" } });
    world.remove("/x.quill");
    expect(errorKind(world.file(fileId("/x.quill")))).toBe("not-found");
  });

  test("the date is fixed or absent", () => {
    const fixed = createMemoryWorld({ main: "/main.quill", today: { year: 2024, month: 3, day: 14 } });
    expect(fixed.today(null)).toEqual({ type: "datetime", year: 2024, month: 3, day: 14 });
    expect(createMemoryWorld({ main: "/main.quill" }).today(2)).toBeNull();
  });
});

describe("file-system world", () => {
  let base: string;
  let root: string;

  beforeEach(() => {
    base = mkdtempSync(join(tmpdir(), "quillset-world-"));
    root = join(base, "project");
    mkdirSync(join(root, "chapters"), { recursive: true });
    writeFileSync(join(root, "main.quill"), '#include "chapters/one.quill"');
    writeFileSync(join(root, "chapters", "one.quill"), "Chapter one");
    writeFileSync(join(base, "secret.quill"), "outside");
  });

  afterEach(() => {
    rmSync(base, { recursive: true, force: true });
  });

  test("reads sources under the root", () => {
    const world = createFileSystemWorld({ root, main: "main.quill" });
    expect(world.main()).toBe("/main.quill");
    const source = world.source(fileId("/chapters/one.quill"));
    expect(source.ok && source.value.text).toBe("Chapter one");
  });

  test("compiles a project from disk", () => {
    const { document, errors } = compile(createFileSystemWorld({ root, main: "main.quill", fonts: TEST_FONTS }));
    expect(errors).toEqual([]);
    expect(document?.text().trim()).toBe("Chapter one");
  });

  test("maps read failures to file error kinds", () => {
    const world = createFileSystemWorld({ root, main: "main.quill" });
    expect(errorKind(world.file(fileId("/missing.quill")))).toBe("not-found");
    expect(errorKind(world.file(fileId("/chapters")))).toBe("not-found");
  });

  test("refuses symlinks that leave the root", () => {
    symlinkSync(join(base, "secret.quill"), join(root, "link.quill"));
    const world = createFileSystemWorld({ root, main: "main.quill" });
    expect(errorKind(world.file(fileId("/link.quill")))).toBe("access-denied");
  });

  test("follows symlinks that stay inside the root", () => {
    symlinkSync(join(root, "chapters", "one.quill"), join(root, "alias.quill"));
    const world = createFileSystemWorld({ root, main: "main.quill" });
    const source = world.source(fileId("/alias.quill"));
    expect(source.ok && source.value.text).toBe("Chapter one");
  });

  test("invalid UTF-8 is not a source", () => {
    writeFileSync(join(root, "bad.quill"), Buffer.from([0x66, 0xff, 0xfe]));
    const world = createFileSystemWorld({ root, main: "main.quill" });
    expect(errorKind(world.source(fileId("/bad.quill")))).toBe("not-source");
    expect(world.file(fileId("/bad.quill")).ok).toBe(true);
  });

  test("serves cached loads until reset", () => {
    const world = createFileSystemWorld({ root, main: "main.quill" });
    const id = fileId("/chapters/one.quill");
    world.source(id);
    writeFileSync(join(root, "chapters", "one.quill"), "Rewritten");
    const cached = world.source(id);
    world.reset();
    const fresh = world.source(id);
    expect(cached.ok && cached.value.text).toBe("Chapter one");
    expect(fresh.ok && fresh.value.text).toBe("Rewritten");
  });

  test("loads fonts from a JSON file and skips invalid entries", () => {
    const fixture: unknown = JSON.parse(readFileSync(new URL("../fixtures/fonts.json", import.meta.url), "utf8"));
    const regular: unknown = Array.isArray(fixture) ? fixture[0] : null;
    const fontsPath = join(base, "fonts.json");
    writeFileSync(fontsPath, JSON.stringify([regular, { family: 3 }]));
    const logger: Logger = { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const world = createFileSystemWorld({ root, main: "main.quill", fonts: fontsPath, logger });

    expect(world.font(0)?.family).toBe("Libertinus Serif");
    expect(world.font(1)).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(`[world] skipping font descriptor #1 in ${fontsPath}`);
  });

  test("an unreadable font file is logged and leaves no fonts", () => {
    const logger: Logger = { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const world = createFileSystemWorld({ root, main: "main.quill", fonts: join(base, "nope.json"), logger });
    expect(world.font(0)).toBeNull();
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});
