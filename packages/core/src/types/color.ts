/**
 * RGBA color with every channel in [0,1]. Alpha is straight (not premultiplied).
 */
export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

export function rgb(r: number, g: number, b: number, a: number = 1): Color {
  return { r, g, b, a };
}

export const NAMED_COLORS = {
  black: rgb(0, 0, 0),
  white: rgb(1, 1, 1),
  red: rgb(1, 0, 0),
  green: rgb(0, 1, 0),
  blue: rgb(0, 0, 1),
  cyan: rgb(0, 1, 1),
  magenta: rgb(1, 0, 1),
  yellow: rgb(1, 1, 0),
  gray: rgb(0.5, 0.5, 0.5),
  clear: rgb(0, 0, 0, 0),
} as const satisfies Record<string, Color>;

export type ColorName = keyof typeof NAMED_COLORS;

function isColorName(value: string): value is ColorName {
  return Object.prototype.hasOwnProperty.call(NAMED_COLORS, value);
}

const HEX_PATTERN = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/**
 * Parse a named color or a `#rgb`, `#rrggbb` or `#rrggbbaa` hex string.
 * Returns null for anything else.
 */
export function tryParseColor(value: string): Color | null {
  const trimmed = value.trim().toLowerCase();
  if (isColorName(trimmed)) return NAMED_COLORS[trimmed];

  const match = HEX_PATTERN.exec(trimmed);
  if (!match) return null;

  let hex = match[1];
  if (hex.length === 3) {
    hex = hex
      .split("")
      .map((c) => c + c)
      .join("");
  }
  const channel = (i: number) => parseInt(hex.slice(i, i + 2), 16) / 255;
  return rgb(channel(0), channel(2), channel(4), hex.length === 8 ? channel(6) : 1);
}

export function parseColor(value: string): Color {
  const color = tryParseColor(value);
  if (!color) {
    throw new Error(`Unrecognised color "${value}"`);
  }
  return color;
}

function byte(channel: number): number {
  return Math.round(Math.min(1, Math.max(0, channel)) * 255);
}

/** `#rrggbb`, alpha dropped. */
export function toHexColor(color: Color): string {
  return (
    "#" +
    [color.r, color.g, color.b]
      .map((c) => byte(c).toString(16).padStart(2, "0"))
      .join("")
  );
}

/** CSS color string: hex when opaque, `rgba()` otherwise. */
export function toCssColor(color: Color): string {
  if (color.a >= 1) return toHexColor(color);
  const alpha = Number(Math.max(0, color.a).toFixed(3));
  return `rgba(${byte(color.r)},${byte(color.g)},${byte(color.b)},${alpha})`;
}

/** Linear interpolation between two colors, channel by channel. */
export function mixColors(from: Color, to: Color, t: number): Color {
  return {
    r: from.r + (to.r - from.r) * t,
    g: from.g + (to.g - from.g) * t,
    b: from.b + (to.b - from.b) * t,
    a: from.a + (to.a - from.a) * t,
  };
}
