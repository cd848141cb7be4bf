import { URI, Utils } from "vscode-uri";

/* =======================================================================================
 * FILE IDENTITY
 * ---------------------------------------------------------------------------------------
 * Files are identified by root-relative virtual paths ("/main.quill", "/chapters/a.quill").
 * The root is whatever directory or in-memory namespace the host world serves; ids never
 * carry a drive letter or scheme, so they hash the same on every platform.
 * ======================================================================================= */

/** Branded root-relative path. Always starts with "/", never contains "." or ".." segments. */
export type FileId = string & { readonly __brand: "FileId" };

export const SOURCE_EXTENSION = ".quill";

/** Normalize an authored path into a file id. Relative paths are taken from the root. */
export function fileId(path: string): FileId {
  const segments: string[] = [];
  for (const segment of splitSegments(path.replace(/\\/g, "/"))) {
    if (segment === ".") continue;
    if (segment === "..") segments.pop();
    else segments.push(segment);
  }
  return toId(segments);
}

/**
 * Resolve `target` as written in the source file `base`.
 * Absolute targets ("/x.quill") resolve from the root; relative targets from base's directory.
 * Returns null when the target climbs above the root.
 */
export function resolveFileId(base: FileId, target: string): FileId | null {
  const normalized = target.replace(/\\/g, "/");
  const start = normalized.startsWith("/") ? [] : splitSegments(directoryOf(base));
  const resolved = resolveSegments(start, splitSegments(normalized));
  return resolved ? toId(resolved) : null;
}

export function directoryOf(id: FileId): string {
  const uri = Utils.dirname(URI.file(id));
  return uri.path;
}

export function extensionOf(id: FileId): string {
  return Utils.extname(URI.file(id)).toLowerCase();
}

export function basenameOf(id: FileId): string {
  return Utils.basename(URI.file(id));
}

/** `file://` URI for an id under a host root directory (LSP hosts address files this way). */
export function fileUriFor(root: string, id: FileId): string {
  return Utils.joinPath(URI.file(root), ...splitSegments(id)).toString();
}

/** Inverse of {@link fileUriFor}; null when the URI is not under the root. */
export function fileIdFromUri(root: string, uri: string): FileId | null {
  const rootPath = URI.file(root).path.replace(/\/+$/, "");
  const filePath = URI.parse(uri).path;
  if (filePath !== rootPath && !filePath.startsWith(`${rootPath}/`)) return null;
  return fileId(filePath.slice(rootPath.length));
}

/** Host file-system path for an id under a root directory. */
export function fsPathFor(root: string, id: FileId): string {
  return Utils.joinPath(URI.file(root), ...splitSegments(id)).fsPath;
}

function splitSegments(path: string): string[] {
  return path.split("/").filter((segment) => segment.length > 0);
}

function resolveSegments(start: readonly string[], segments: readonly string[]): string[] | null {
  const out = [...start];
  for (const segment of segments) {
    if (segment === ".") continue;
    if (segment === "..") {
      if (out.length === 0) return null;
      out.pop();
      continue;
    }
    out.push(segment);
  }
  return out;
}

function toId(segments: readonly string[]): FileId {
  return `/${segments.join("/")}` as FileId;
}
