import { NAMED_COLORS, type Color } from "@polydraw/core";
import type { PixelSurface } from "./pixel-surface.js";

function toByte(channel: number): number {
  return Math.round(Math.min(1, Math.max(0, channel)) * 255);
}

/**
 * Encode a surface as binary PPM (P6), flattening its alpha over `background`.
 */
export function encodePpm(
  surface: PixelSurface,
  background: Color = NAMED_COLORS.white,
): Buffer {
  const { width, height, data } = surface;
  const header = Buffer.from(`P6\n${width} ${height}\n255\n`, "ascii");
  const body = Buffer.alloc(width * height * 3);

  for (let p = 0; p < width * height; p++) {
    const a = data[p * 4 + 3];
    const bgA = background.a * (1 - a);
    body[p * 3] = toByte(data[p * 4] * a + background.r * bgA);
    body[p * 3 + 1] = toByte(data[p * 4 + 1] * a + background.g * bgA);
    body[p * 3 + 2] = toByte(data[p * 4 + 2] * a + background.b * bgA);
  }

  return Buffer.concat([header, body]);
}
