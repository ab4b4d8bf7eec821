import {
  clampUnit,
  requireGradientColors,
  type Color,
  type FullCapabilities,
  type Point,
  type Rect,
  type ShadowOptions,
} from "@polydraw/core";
import { GradientLayer, Layer, ShapeLayer } from "./layer.js";

/**
 * Layer factory. Retained nodes can only be attached in one place, so every
 * call to `render` builds a fresh tree, down to its frames and points.
 */
export interface LayerDrawing {
  readonly render: () => Layer;
}

function layers(render: () => Layer): LayerDrawing {
  return { render };
}

/** Retained-layer interpreter. Implements every drawing capability. */
export const layerDrawing: FullCapabilities<LayerDrawing> = {
  rectangle(bounds: Rect, fill: Color): LayerDrawing {
    return layers(() => {
      const result = new Layer();
      result.frame = { ...bounds };
      result.backgroundColor = fill;
      return result;
    });
  },

  ellipse(bounds: Rect, fill: Color): LayerDrawing {
    return layers(() => {
      const result = new ShapeLayer();
      result.path = { kind: "oval", bounds: { ...bounds } };
      result.fillColor = fill;
      return result;
    });
  },

  combined(children: readonly LayerDrawing[]): LayerDrawing {
    const parts = [...children];
    return layers(() => {
      const result = new Layer();
      for (const child of parts) {
        result.addSublayer(child.render());
      }
      return result;
    });
  },

  alpha(factor: number, child: LayerDrawing): LayerDrawing {
    const clamped = clampUnit(factor);
    return layers(() => {
      const result = child.render();
      result.opacity *= clamped;
      return result;
    });
  },

  shadow(options: ShadowOptions, child: LayerDrawing): LayerDrawing {
    const opacity = clampUnit(options.opacity);
    return layers(() => {
      const result = child.render();
      result.shadowOpacity = opacity;
      result.shadowRadius = options.radius;
      result.shadowOffset = { ...options.offset };
      return result;
    });
  },

  gradient(bounds: Rect, start: Point, end: Point, colors: readonly Color[]): LayerDrawing {
    requireGradientColors(colors);
    const palette = [...colors];
    return layers(() => {
      const result = new GradientLayer();
      result.frame = { ...bounds };
      result.startPoint = { ...start };
      result.endPoint = { ...end };
      result.colors = [...palette];
      return result;
    });
  },
};
