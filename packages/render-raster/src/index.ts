export { rasterDrawing, type Paint } from "./raster-interpreter.js";
export { PixelSurface } from "./pixel-surface.js";
export { encodePpm } from "./ppm.js";
