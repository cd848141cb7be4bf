/* =======================================================================================
 * FRAMES
 * ---------------------------------------------------------------------------------------
 * Output of layout: a fixed-size box with positioned items. Frames are immutable once
 * built; `FrameBuilder` is the only way to assemble one.
 *
 * Item positions are relative to the frame's top-left corner. Text items are positioned
 * at the left end of their baseline.
 * ======================================================================================= */

import type { FileId } from "@quillset/shared";
import type { Abs } from "../geom/abs.js";
import type { Color } from "../geom/color.js";
import { ORIGIN, type Point, type Size } from "../geom/shapes.js";
import type { FontVariant } from "../font/font.js";
import { stableHash, type Hashable } from "../memo/hash.js";

export interface Glyph {
  readonly char: string;
  readonly advance: Abs;
  /** Drawn as the font's .notdef box: no font covers the character. */
  readonly notdef?: boolean;
}

/** Consecutive glyphs set in one font. */
export interface TextRun {
  readonly family: string;
  readonly variant: FontVariant;
  readonly size: Abs;
  readonly fill: Color;
  readonly text: string;
  readonly glyphs: readonly Glyph[];
  readonly width: Abs;
}

export interface Stroke {
  readonly paint: Color;
  readonly thickness: Abs;
}

export type Geometry = { readonly kind: "rect"; readonly size: Size } | { readonly kind: "line"; readonly to: Point };

export interface Shape {
  readonly geometry: Geometry;
  readonly fill: Color | null;
  readonly stroke: Stroke | null;
}

export type ImageFormat = "png" | "jpeg" | "gif";

export type FrameItem =
  | { readonly kind: "group"; readonly frame: Frame }
  | { readonly kind: "text"; readonly run: TextRun }
  | { readonly kind: "shape"; readonly shape: Shape }
  | { readonly kind: "image"; readonly id: FileId; readonly format: ImageFormat; readonly size: Size }
  | { readonly kind: "placeholder"; readonly size: Size; readonly reason: string }
  | { readonly kind: "link"; readonly dest: string; readonly size: Size };

export type PositionedItem = readonly [Point, FrameItem];

export class Frame implements Hashable {
  readonly size: Size;
  readonly items: readonly PositionedItem[];
  /** Distance from the top to the baseline the frame sits on when set inline. */
  readonly baseline: Abs;
  #fingerprint: string | undefined;

  constructor(size: Size, items: readonly PositionedItem[] = [], baseline?: Abs) {
    this.size = size;
    this.items = items;
    this.baseline = baseline ?? size.h;
  }

  static empty(size: Size): Frame {
    return new Frame(size);
  }

  get width(): Abs {
    return this.size.w;
  }

  get height(): Abs {
    return this.size.h;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Right edge of the rightmost item, looking into groups; the width the content needs. */
  contentWidth(): Abs {
    let width = 0;
    for (const [pos, item] of this.items) {
      width = Math.max(width, pos.x + itemWidth(item));
    }
    return width;
  }

  /** Baseline of the first text line, searching nested groups top-down. */
  firstBaseline(): Abs | null {
    let best: Abs | null = null;
    for (const [pos, item] of this.items) {
      let y: Abs | null = null;
      if (item.kind === "text") y = pos.y;
      else if (item.kind === "group") {
        const inner = item.frame.firstBaseline();
        if (inner !== null) y = pos.y + inner;
      }
      if (y !== null && (best === null || y < best)) best = y;
    }
    return best;
  }

  /** Same items in a frame of another size. */
  resized(size: Size, baseline?: Abs): Frame {
    return new Frame(size, this.items, baseline ?? this.baseline);
  }

  /** Every text run in reading order of the item lists, nested groups inlined. */
  text(): string {
    const out: string[] = [];
    collectText(this, out);
    return out.join("");
  }

  /** Items of `kind` anywhere in the frame, with positions relative to this frame. */
  find<K extends FrameItem["kind"]>(kind: K): [Point, Extract<FrameItem, { kind: K }>][] {
    const out: [Point, Extract<FrameItem, { kind: K }>][] = [];
    walk(this, ORIGIN, (pos, item) => {
      if (isKind(item, kind)) out.push([pos, item]);
    });
    return out;
  }

  fingerprint(): string {
    if (this.#fingerprint === undefined) {
      this.#fingerprint = stableHash({ size: this.size, baseline: this.baseline, items: this.items });
    }
    return this.#fingerprint;
  }
}

function isKind<K extends FrameItem["kind"]>(item: FrameItem, kind: K): item is Extract<FrameItem, { kind: K }> {
  return item.kind === kind;
}

function walk(frame: Frame, origin: Point, visit: (pos: Point, item: FrameItem) => void): void {
  for (const [pos, item] of frame.items) {
    const at = { x: origin.x + pos.x, y: origin.y + pos.y };
    visit(at, item);
    if (item.kind === "group") walk(item.frame, at, visit);
  }
}

function collectText(frame: Frame, out: string[]): void {
  for (const [, item] of frame.items) {
    if (item.kind === "text") out.push(item.run.text);
    else if (item.kind === "group") collectText(item.frame, out);
  }
}

function itemWidth(item: FrameItem): Abs {
  switch (item.kind) {
    case "group":
      return item.frame.contentWidth();
    case "text":
      return item.run.width;
    case "shape":
      return item.shape.geometry.kind === "rect" ? item.shape.geometry.size.w : Math.max(0, item.shape.geometry.to.x);
    case "image":
    case "placeholder":
    case "link":
      return item.size.w;
  }
}

export class FrameBuilder {
  readonly #items: PositionedItem[] = [];

  constructor(
    public size: Size,
    public baseline?: Abs,
  ) {}

  get isEmpty(): boolean {
    return this.#items.length === 0;
  }

  push(pos: Point, item: FrameItem): this {
    this.#items.push([pos, item]);
    return this;
  }

  /** Nests `frame`; an empty frame adds nothing. */
  pushFrame(pos: Point, frame: Frame): this {
    if (frame.isEmpty()) return this;
    return this.push(pos, { kind: "group", frame });
  }

  finish(): Frame {
    return new Frame(this.size, [...this.#items], this.baseline);
  }
}

/** Ordered pages plus document metadata. */
export class Document implements Hashable {
  #fingerprint: string | undefined;

  constructor(
    readonly pages: readonly Frame[],
    readonly title: string | null = null,
    readonly author: readonly string[] = [],
  ) {}

  /** Text of every page, pages separated by a form feed. */
  text(): string {
    return this.pages.map((page) => page.text()).join("\f");
  }

  fingerprint(): string {
    if (this.#fingerprint === undefined) {
      this.#fingerprint = stableHash({ pages: this.pages, title: this.title, author: this.author });
    }
    return this.#fingerprint;
  }
}
