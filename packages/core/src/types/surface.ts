import type { Color } from "./color.js";
import type { Point, Rect } from "./geometry.js";

export interface GradientStop {
  color: Color;
  /** Position along the gradient axis, 0 at the start point and 1 at the end. */
  position: number;
}

/**
 * Mutable immediate-mode raster surface.
 * Enables painting the same drawing into different raster backends.
 */
export interface PaintSurface {
  /** Push the fill color, alpha and clip onto the state stack. */
  save(): void;
  /** Pop the state stack. No-op when nothing was saved. */
  restore(): void;
  setFillColor(color: Color): void;
  /**
   * Set the alpha for subsequent fills to `factor` times the alpha in effect at
   * the most recent `save()`, so nested scopes compose multiplicatively.
   */
  setAlpha(factor: number): void;
  fillRect(bounds: Rect): void;
  /** Fill the ellipse inscribed in `bounds`. */
  fillEllipse(bounds: Rect): void;
  /** Intersect the current clip with `bounds`. */
  clipToRect(bounds: Rect): void;
  /** Fill the whole clip region with a linear gradient from `start` to `end`. */
  fillLinearGradient(start: Point, end: Point, stops: readonly GradientStop[]): void;
}

/**
 * Run `body` inside a save/restore pair. The state is restored on every exit
 * path, including when `body` throws.
 */
export function withSavedState(surface: PaintSurface, body: () => void): void {
  surface.save();
  try {
    body();
  } finally {
    surface.restore();
  }
}
