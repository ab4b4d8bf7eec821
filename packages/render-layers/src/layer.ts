import {
  type Color,
  type Point,
  type Rect,
  type Size,
} from "@polydraw/core";

/** Outline of a shape layer, relative to the layer's frame origin. */
export type LayerPath = { kind: "oval"; bounds: Rect };

export type LayerKind = "layer" | "shape" | "gradient";

/**
 * Retained drawable node. A layer draws its background, then its own content,
 * then its sublayers in attachment order. Sublayer frames are expressed relative
 * to the parent's frame origin.
 */
export class Layer {
  readonly kind: LayerKind = "layer";
  frame: Rect = { x: 0, y: 0, width: 0, height: 0 };
  backgroundColor: Color | null = null;
  opacity = 1;
  shadowOpacity = 0;
  shadowRadius = 3;
  shadowOffset: Size = { width: 0, height: -3 };
  private children: Layer[] = [];
  private parent: Layer | null = null;

  get sublayers(): readonly Layer[] {
    return this.children;
  }

  get superlayer(): Layer | null {
    return this.parent;
  }

  /** Attach on top of existing sublayers. A layer has at most one parent. */
  addSublayer(layer: Layer): void {
    if (layer === this) {
      throw new Error("A layer cannot be its own sublayer");
    }
    layer.removeFromSuperlayer();
    layer.parent = this;
    this.children.push(layer);
  }

  removeFromSuperlayer(): void {
    if (!this.parent) return;
    const siblings = this.parent.children;
    siblings.splice(siblings.indexOf(this), 1);
    this.parent = null;
  }

  get hasShadow(): boolean {
    return this.shadowOpacity > 0;
  }
}

export class ShapeLayer extends Layer {
  override readonly kind: LayerKind = "shape";
  path: LayerPath | null = null;
  fillColor: Color | null = null;
}

export class GradientLayer extends Layer {
  override readonly kind: LayerKind = "gradient";
  /** Unit-square coordinates relative to `frame`. */
  startPoint: Point = { x: 0.5, y: 0 };
  endPoint: Point = { x: 0.5, y: 1 };
  colors: Color[] = [];
}

export function isShapeLayer(layer: Layer): layer is ShapeLayer {
  return layer.kind === "shape";
}

export function isGradientLayer(layer: Layer): layer is GradientLayer {
  return layer.kind === "gradient";
}
