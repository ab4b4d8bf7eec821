import type { Color } from "../types/color.js";
import type { Point, Rect, Size } from "../types/geometry.js";

/**
 * Drawing operations, one interface per capability.
 * An interpreter implements the capabilities it can support over its own result
 * type `R`; builders ask for the intersection they need, so pairing a builder
 * with an interpreter that lacks one is a compile error.
 */

export interface ShapeDrawing<R> {
  rectangle(bounds: Rect, fill: Color): R;
  /** Ellipse inscribed in `bounds`. */
  ellipse(bounds: Rect, fill: Color): R;
  /** Children in paint order: the first is bottom-most. Empty draws nothing. */
  combined(children: readonly R[]): R;
}

export interface AlphaBlending<R> {
  /** `factor` is clamped to [0,1]. Nested alpha multiplies. */
  alpha(factor: number, child: R): R;
}

export interface ShadowOptions {
  opacity: number;
  offset: Size;
  radius: number;
}

export interface DropShadow<R> {
  shadow(options: ShadowOptions, child: R): R;
}

export interface LinearGradient<R> {
  /**
   * `start` and `end` live in the unit square of `bounds`.
   * Requires at least two colors, spaced evenly along the axis.
   */
  gradient(bounds: Rect, start: Point, end: Point, colors: readonly Color[]): R;
}

// ---- Capability sets ----

export type ShapeAndAlpha<R> = ShapeDrawing<R> & AlphaBlending<R>;

export type PaintCapabilities<R> = ShapeAndAlpha<R> & LinearGradient<R>;

export type FullCapabilities<R> = PaintCapabilities<R> & DropShadow<R>;

export type CapabilityName = "shape" | "alpha" | "shadow" | "gradient";
