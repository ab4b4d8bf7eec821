import type { Color } from "../types/color.js";
import type { GradientStop } from "../types/surface.js";
import type { DropShadow, ShadowOptions } from "./contracts.js";
import { ContractViolationError } from "./errors.js";

export const DEFAULT_SHADOW: Readonly<ShadowOptions> = Object.freeze({
  opacity: 0.75,
  offset: Object.freeze({ width: 0, height: 3 }),
  radius: 3,
});

/**
 * Drop shadow with the default configuration, optionally overriding parts of it.
 * Forwards to the interpreter's full `shadow` operation.
 */
export function withShadow<R>(
  d: DropShadow<R>,
  child: R,
  overrides?: Partial<ShadowOptions>,
): R {
  const options = { ...DEFAULT_SHADOW, ...overrides };
  return d.shadow({ ...options, offset: { ...options.offset } }, child);
}

/** Clamp to [0,1]. NaN becomes 0. */
export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function requireGradientColors(colors: readonly Color[]): void {
  if (colors.length < 2) {
    throw new ContractViolationError(
      "gradient",
      `needs at least 2 colors, got ${colors.length}`,
    );
  }
}

/** Evenly spaced stops: stop i of n sits at i/(n-1). */
export function gradientStops(colors: readonly Color[]): GradientStop[] {
  requireGradientColors(colors);
  const last = colors.length - 1;
  return colors.map((color, i) => ({ color, position: i / last }));
}
