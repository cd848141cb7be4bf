/** 8-bit RGBA color. */
export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export const BLACK: Color = { r: 0, g: 0, b: 0, a: 255 };
export const WHITE: Color = { r: 255, g: 255, b: 255, a: 255 };

export const NAMED_COLORS: Readonly<Record<string, Color>> = {
  black: BLACK,
  white: WHITE,
  gray: { r: 0xaa, g: 0xaa, b: 0xaa, a: 255 },
  silver: { r: 0xdd, g: 0xdd, b: 0xdd, a: 255 },
  red: { r: 0xff, g: 0x41, b: 0x36, a: 255 },
  green: { r: 0x2e, g: 0xcc, b: 0x40, a: 255 },
  blue: { r: 0x00, g: 0x74, b: 0xd9, a: 255 },
  navy: { r: 0x00, g: 0x1f, b: 0x3f, a: 255 },
  yellow: { r: 0xff, g: 0xdc, b: 0x00, a: 255 },
  orange: { r: 0xff, g: 0x85, b: 0x1b, a: 255 },
  purple: { r: 0xb1, g: 0x0d, b: 0xc9, a: 255 },
};

export function rgb(r: number, g: number, b: number, a = 255): Color {
  return { r: clampByte(r), g: clampByte(g), b: clampByte(b), a: clampByte(a) };
}

export function luma(value: number): Color {
  return rgb(value, value, value);
}

/** Parse `#rgb`, `#rgba`, `#rrggbb` or `#rrggbbaa` (leading `#` optional). */
export function parseHexColor(hex: string): Color | null {
  const body = hex.startsWith("#") ? hex.slice(1) : hex;
  if (!/^[0-9a-fA-F]+$/.test(body)) return null;
  const expand = body.length === 3 || body.length === 4 ? [...body].map((c) => c + c).join("") : body;
  if (expand.length !== 6 && expand.length !== 8) return null;
  const byte = (i: number) => Number.parseInt(expand.slice(i, i + 2), 16);
  return rgb(byte(0), byte(2), byte(4), expand.length === 8 ? byte(6) : 255);
}

export function toHex(color: Color): string {
  const parts = [color.r, color.g, color.b, ...(color.a === 255 ? [] : [color.a])];
  return `#${parts.map((n) => n.toString(16).padStart(2, "0")).join("")}`;
}

function clampByte(n: number): number {
  return Math.max(0, Math.min(255, Math.round(n)));
}
