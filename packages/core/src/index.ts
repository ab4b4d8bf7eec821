export * from "./types/color.js";
export * from "./types/document.js";
export * from "./types/geometry.js";
export * from "./types/surface.js";
export * from "./capabilities/contracts.js";
export * from "./capabilities/errors.js";
export * from "./capabilities/helpers.js";
export {
  overlappingShapes,
  gradientOverlay,
  shadowedGradientOverlay,
} from "./builders/samples.js";
export { parseDrawingDocument } from "./parser/document-parser.js";
export { interpretDrawing, requiredCapabilities } from "./parser/interpret-document.js";
