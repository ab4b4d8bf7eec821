export {
  GradientLayer,
  Layer,
  ShapeLayer,
  isGradientLayer,
  isShapeLayer,
  type LayerKind,
  type LayerPath,
} from "./layer.js";
export { layerDrawing, type LayerDrawing } from "./layer-interpreter.js";
export { compositeLayer } from "./compositor.js";
export { renderLayerSvg, type LayerSvgOptions } from "./render-layer-svg.js";
