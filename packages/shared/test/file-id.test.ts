import { describe, test, expect } from "vitest";

import {
  basenameOf,
  directoryOf,
  extensionOf,
  fileId,
  fileIdFromUri,
  fileUriFor,
  resolveFileId,
} from "../src/index.js";

describe("file ids", () => {
  test("normalizes separators and dot segments", () => {
    expect(fileId("chapters\\intro.quill")).toBe("/chapters/intro.quill");
    expect(fileId("/a/./b/../c.quill")).toBe("/a/c.quill");
    expect(fileId("../outside.quill")).toBe("/outside.quill");
  });

  test("resolves relative targets from the importing file's directory", () => {
    const base = fileId("/chapters/intro.quill");
    expect(resolveFileId(base, "util.quill")).toBe("/chapters/util.quill");
    expect(resolveFileId(base, "../lib/util.quill")).toBe("/lib/util.quill");
    expect(resolveFileId(base, "/top.quill")).toBe("/top.quill");
  });

  test("rejects targets above the root", () => {
    expect(resolveFileId(fileId("/main.quill"), "../secret.quill")).toBeNull();
  });

  test("splits directory, basename and extension", () => {
    const id = fileId("/img/Logo.PNG");
    expect(directoryOf(id)).toBe("/img");
    expect(basenameOf(id)).toBe("Logo.PNG");
    expect(extensionOf(id)).toBe(".png");
    expect(directoryOf(fileId("/main.quill"))).toBe("/");
  });

  test("maps ids to URIs under a root and back", () => {
    const uri = fileUriFor("/work/doc", fileId("/chapters/a.quill"));
    expect(uri).toBe("file:///work/doc/chapters/a.quill");
    expect(fileIdFromUri("/work/doc", uri)).toBe("/chapters/a.quill");
    expect(fileIdFromUri("/work/doc", "file:///elsewhere/a.quill")).toBeNull();
  });
});
