import type {
  FullCapabilities,
  PaintCapabilities,
  ShapeDrawing,
} from "../capabilities/contracts.js";
import { withShadow } from "../capabilities/helpers.js";
import { NAMED_COLORS } from "../types/color.js";
import { point, rect } from "../types/geometry.js";

const { red, green, blue, cyan } = NAMED_COLORS;

const ELLIPSE_BOUNDS = rect(0, 0, 100, 100);
const OVERLAY_BOUNDS = rect(50, 50, 100, 100);
const OVERLAY_ALPHA = 0.7;

/** Red circle partly covered by a blue square. */
export function overlappingShapes<R>(d: ShapeDrawing<R>): R {
  return d.combined([
    d.ellipse(ELLIPSE_BOUNDS, red),
    d.rectangle(OVERLAY_BOUNDS, blue),
  ]);
}

function diagonalGradient<R>(d: PaintCapabilities<R>): R {
  return d.alpha(
    OVERLAY_ALPHA,
    d.gradient(OVERLAY_BOUNDS, point(0, 0), point(1, 1), [red, green, blue, cyan]),
  );
}

/** Red circle under a translucent four-color diagonal gradient. */
export function gradientOverlay<R>(d: PaintCapabilities<R>): R {
  return d.combined([d.ellipse(ELLIPSE_BOUNDS, red), diagonalGradient(d)]);
}

/** Same as {@link gradientOverlay}, with the circle casting a drop shadow. */
export function shadowedGradientOverlay<R>(d: FullCapabilities<R>): R {
  return d.combined([
    withShadow(d, d.ellipse(ELLIPSE_BOUNDS, red)),
    diagonalGradient(d),
  ]);
}
