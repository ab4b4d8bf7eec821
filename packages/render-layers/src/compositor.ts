import {
  clampUnit,
  gradientStops,
  offsetRect,
  unitToAbsolute,
  withSavedState,
  type PaintSurface,
  type Point,
} from "@polydraw/core";
import { isGradientLayer, isShapeLayer, type Layer } from "./layer.js";

const ORIGIN: Point = { x: 0, y: 0 };

/**
 * Paint a layer tree onto an immediate-mode surface, the way a host would
 * flatten it for display. Each layer paints inside its own opacity scope;
 * shadows are not rasterised.
 */
export function compositeLayer(
  layer: Layer,
  surface: PaintSurface,
  origin: Point = ORIGIN,
): void {
  withSavedState(surface, () => {
    surface.setAlpha(clampUnit(layer.opacity));
    const frame = offsetRect(layer.frame, origin);

    if (layer.backgroundColor) {
      surface.setFillColor(layer.backgroundColor);
      surface.fillRect(frame);
    }

    if (isShapeLayer(layer) && layer.path && layer.fillColor) {
      surface.setFillColor(layer.fillColor);
      surface.fillEllipse(offsetRect(layer.path.bounds, frame));
    }

    // Gradients with fewer than two colors paint nothing
    if (isGradientLayer(layer) && layer.colors.length >= 2) {
      const stops = gradientStops(layer.colors);
      const start = unitToAbsolute(frame, layer.startPoint);
      const end = unitToAbsolute(frame, layer.endPoint);
      withSavedState(surface, () => {
        surface.clipToRect(frame);
        surface.fillLinearGradient(start, end, stops);
      });
    }

    for (const sublayer of layer.sublayers) {
      compositeLayer(sublayer, surface, frame);
    }
  });
}
