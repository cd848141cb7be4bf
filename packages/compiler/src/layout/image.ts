/* =======================================================================================
 * IMAGES
 * ---------------------------------------------------------------------------------------
 * Images are sized from their headers (PNG, JPEG, GIF); pixels are not decoded here.
 * One pixel is one point. An image wider than the region is scaled down to fit it.
 *
 * A file that cannot be loaded or recognised becomes a placeholder of the requested
 * size, with one warning.
 * ======================================================================================= */

import { fileId, resolveFileId } from "@quillset/shared";
import type { Content } from "../content/content.js";
import { diagnostics } from "../diagnostics/errors.js";
import type { Engine } from "../eval/engine.js";
import * as C from "../eval/cast.js";
import { isBounded, pt, scale, type Abs } from "../geom/abs.js";
import { resolveRel } from "../geom/length.js";
import { size, type Size } from "../geom/shapes.js";
import { debug } from "../shared/debug.js";
import type { StyleChain } from "../style/chain.js";
import { FrameBuilder, type ImageFormat } from "./frame.js";
import type { Fragment, Regions } from "./regions.js";
import { textSize } from "./text.js";

export interface ImageHeader {
  readonly format: ImageFormat;
  /** Pixels. */
  readonly width: number;
  readonly height: number;
}

const PLACEHOLDER_WIDTH = pt(100);
const PLACEHOLDER_RATIO = 0.75;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** Format and pixel size from the first bytes of an image file, or null. */
export function decodeImageHeader(bytes: Uint8Array): ImageHeader | null {
  if (PNG_SIGNATURE.every((byte, i) => bytes[i] === byte) && bytes.length >= 24) {
    return { format: "png", width: readU32BE(bytes, 16), height: readU32BE(bytes, 20) };
  }
  if (bytes.length >= 10 && /^GIF8[79]a$/.test(ascii(bytes, 0, 6))) {
    return { format: "gif", width: readU16LE(bytes, 6), height: readU16LE(bytes, 8) };
  }
  if (bytes[0] === 0xff && bytes[1] === 0xd8) return decodeJpeg(bytes);
  return null;
}

/** Walks the JPEG segments up to the first start-of-frame marker. */
function decodeJpeg(bytes: Uint8Array): ImageHeader | null {
  let i = 2;
  while (i + 3 < bytes.length) {
    if (bytes[i] !== 0xff) return null;
    const marker = bytes[i + 1] ?? 0;
    if (marker === 0xff) {
      i++;
      continue;
    }
    if (marker === 0xd8 || marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7)) {
      i += 2;
      continue;
    }
    const length = readU16BE(bytes, i + 2);
    const isFrame = marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
    if (isFrame) {
      if (i + 8 >= bytes.length) return null;
      return { format: "jpeg", height: readU16BE(bytes, i + 5), width: readU16BE(bytes, i + 7) };
    }
    i += 2 + length;
  }
  return null;
}

function readU16BE(bytes: Uint8Array, at: number): number {
  return ((bytes[at] ?? 0) << 8) | (bytes[at + 1] ?? 0);
}

function readU16LE(bytes: Uint8Array, at: number): number {
  return (bytes[at] ?? 0) | ((bytes[at + 1] ?? 0) << 8);
}

function readU32BE(bytes: Uint8Array, at: number): number {
  return readU16BE(bytes, at) * 0x10000 + readU16BE(bytes, at + 2);
}

const ROOT = fileId("/");

function ascii(bytes: Uint8Array, start: number, end: number): string {
  return String.fromCharCode(...bytes.subarray(start, end));
}

export function layoutImage(engine: Engine, image: Content, chain: StyleChain, regions: Regions): Fragment {
  const path = C.str.check(image.field("path") ?? null) ?? "";
  const fontSize = textSize(chain);
  const whole = isBounded(regions.width) ? regions.width : 0;
  const rel = (name: string): Abs | null => {
    const value = C.rel.check(image.field(name) ?? chain.value("image", name));
    return value ? Math.max(0, resolveRel(value, name === "width" ? whole : 0, fontSize)) : null;
  };
  const width = rel("width");
  const height = rel("height");

  // Paths are resolved against the calling file when the image is built. One that still
  // climbs above the root there was never resolved, and is not read.
  const id = resolveFileId(ROOT, path);
  if (!id) {
    engine.sink.warn(
      diagnostics.emit("quillset/layout/missing-image", {
        message: `image outside of the project root: ${path}`,
        span: image.span,
        data: { path },
      }),
    );
    return placeholder(width, height, regions, "missing");
  }
  const loaded = engine.world.file(id);
  if (!loaded.ok) {
    engine.sink.warn(
      diagnostics.emit("quillset/layout/missing-image", {
        message: `image not found: ${path}`,
        span: image.span,
        data: { path },
      }),
    );
    return placeholder(width, height, regions, "missing");
  }
  const header = decodeImageHeader(loaded.value);
  if (!header || header.width === 0 || header.height === 0) {
    engine.sink.warn(
      diagnostics.emit("quillset/layout/unsupported-image", {
        message: `unknown image format: ${path}`,
        span: image.span,
        data: { path },
      }),
    );
    return placeholder(width, height, regions, "unsupported");
  }
  debug.layout("image", { path, format: header.format, width: header.width, height: header.height });

  const imageSize = fitSize(pt(header.width), pt(header.height), width, height, regions.width);
  const builder = new FrameBuilder(imageSize);
  builder.push({ x: 0, y: 0 }, { kind: "image", id, format: header.format, size: imageSize });
  return [builder.finish()];
}

/** Requested extents win; a missing one follows the aspect ratio. Auto sizes shrink to the width. */
function fitSize(naturalW: Abs, naturalH: Abs, width: Abs | null, height: Abs | null, available: Abs): Size {
  const ratio = naturalH / naturalW;
  if (width !== null && height !== null) return size(width, height);
  if (width !== null) return size(width, scale(width, ratio));
  if (height !== null) return size(scale(height, 1 / ratio), height);
  if (isBounded(available) && naturalW > available) return size(available, scale(available, ratio));
  return size(naturalW, naturalH);
}

function placeholder(width: Abs | null, height: Abs | null, regions: Regions, reason: string): Fragment {
  const available = isBounded(regions.width) ? regions.width : PLACEHOLDER_WIDTH;
  const w = width ?? (height !== null ? scale(height, 1 / PLACEHOLDER_RATIO) : Math.min(PLACEHOLDER_WIDTH, available));
  const h = height ?? scale(w, PLACEHOLDER_RATIO);
  const builder = new FrameBuilder(size(w, h));
  builder.push({ x: 0, y: 0 }, { kind: "placeholder", size: size(w, h), reason });
  return [builder.finish()];
}
