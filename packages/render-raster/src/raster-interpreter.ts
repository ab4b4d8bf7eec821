import {
  clampUnit,
  gradientStops,
  unitToAbsolute,
  withSavedState,
  type Color,
  type PaintCapabilities,
  type PaintSurface,
  type Point,
  type Rect,
} from "@polydraw/core";

/**
 * Deferred paint procedure. Running `draw` against a surface reproduces the
 * drawing; nothing is painted until then.
 */
export interface Paint {
  readonly draw: (surface: PaintSurface) => void;
}

function paint(draw: (surface: PaintSurface) => void): Paint {
  return { draw };
}

function fillShape(
  bounds: Rect,
  fill: Color,
  fillOp: (surface: PaintSurface, bounds: Rect) => void,
): Paint {
  return paint((surface) =>
    withSavedState(surface, () => {
      surface.setFillColor(fill);
      fillOp(surface, bounds);
    }),
  );
}

/**
 * Immediate-mode interpreter. Every operation brackets its surface changes in a
 * save/restore pair so siblings never see each other's color, alpha or clip.
 * Drop shadows are not part of its capability set.
 */
export const rasterDrawing: PaintCapabilities<Paint> = {
  rectangle(bounds: Rect, fill: Color): Paint {
    return fillShape(bounds, fill, (surface, r) => surface.fillRect(r));
  },

  ellipse(bounds: Rect, fill: Color): Paint {
    return fillShape(bounds, fill, (surface, r) => surface.fillEllipse(r));
  },

  combined(children: readonly Paint[]): Paint {
    const layers = [...children];
    return paint((surface) => {
      for (const child of layers) {
        child.draw(surface);
      }
    });
  },

  alpha(factor: number, child: Paint): Paint {
    const clamped = clampUnit(factor);
    return paint((surface) =>
      withSavedState(surface, () => {
        surface.setAlpha(clamped);
        child.draw(surface);
      }),
    );
  },

  gradient(bounds: Rect, start: Point, end: Point, colors: readonly Color[]): Paint {
    // Validated and laid out up front so a bad gradient fails at construction
    const stops = gradientStops(colors);
    const from = unitToAbsolute(bounds, start);
    const to = unitToAbsolute(bounds, end);
    return paint((surface) =>
      withSavedState(surface, () => {
        surface.clipToRect(bounds);
        surface.fillLinearGradient(from, to, stops);
      }),
    );
  },
};
