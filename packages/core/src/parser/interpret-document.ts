import type {
  CapabilityName,
  DropShadow,
  PaintCapabilities,
} from "../capabilities/contracts.js";
import { UnsupportedCapabilityError } from "../capabilities/errors.js";
import { DEFAULT_SHADOW } from "../capabilities/helpers.js";
import { parseColor } from "../types/color.js";
import type {
  DrawingNodeConfig,
  PointTuple,
  RectTuple,
} from "../types/document.js";
import { size, type Point, type Rect } from "../types/geometry.js";

function toRect([x, y, width, height]: RectTuple): Rect {
  return { x, y, width, height };
}

function toPoint([x, y]: PointTuple): Point {
  return { x, y };
}

/**
 * Evaluate a document node tree bottom-up against an interpreter.
 * Shadow nodes need the `shadows` capability; without it the whole evaluation
 * fails before the interpreter produces anything.
 */
export function interpretDrawing<R>(
  node: DrawingNodeConfig,
  d: PaintCapabilities<R>,
  shadows?: DropShadow<R>,
): R {
  if (!shadows && requiredCapabilities(node).has("shadow")) {
    throw new UnsupportedCapabilityError("shadow");
  }
  return evaluate(node, d, shadows);
}

function evaluate<R>(
  node: DrawingNodeConfig,
  d: PaintCapabilities<R>,
  shadows: DropShadow<R> | undefined,
): R {
  switch (node.type) {
    case "rectangle":
      return d.rectangle(toRect(node.rect), parseColor(node.fill));
    case "ellipse":
      return d.ellipse(toRect(node.rect), parseColor(node.fill));
    case "combined":
      return d.combined(node.children.map((child) => evaluate(child, d, shadows)));
    case "alpha":
      return d.alpha(node.factor, evaluate(node.child, d, shadows));
    case "shadow": {
      if (!shadows) throw new UnsupportedCapabilityError("shadow");
      const offset = node.offset
        ? size(node.offset[0], node.offset[1])
        : { ...DEFAULT_SHADOW.offset };
      return shadows.shadow(
        {
          opacity: node.opacity ?? DEFAULT_SHADOW.opacity,
          offset,
          radius: node.radius ?? DEFAULT_SHADOW.radius,
        },
        evaluate(node.child, d, shadows),
      );
    }
    case "gradient":
      return d.gradient(
        toRect(node.rect),
        toPoint(node.start),
        toPoint(node.end),
        node.colors.map(parseColor),
      );
  }
}

/** Capabilities a node tree uses, in first-use order. */
export function requiredCapabilities(node: DrawingNodeConfig): Set<CapabilityName> {
  const found = new Set<CapabilityName>();
  const visit = (n: DrawingNodeConfig): void => {
    switch (n.type) {
      case "rectangle":
      case "ellipse":
      case "combined":
        found.add("shape");
        if (n.type === "combined") n.children.forEach(visit);
        break;
      case "alpha":
        found.add("alpha");
        visit(n.child);
        break;
      case "shadow":
        found.add("shadow");
        visit(n.child);
        break;
      case "gradient":
        found.add("gradient");
        break;
    }
  };
  visit(node);
  return found;
}
