import {
  gradientOverlay,
  interpretDrawing,
  overlappingShapes,
  parseColor,
  shadowedGradientOverlay,
  type CapabilityName,
  type DrawingDocument,
  type FullCapabilities,
  type PaintCapabilities,
} from "@polydraw/core";
import {
  layerDrawing,
  renderLayerSvg,
  type LayerDrawing,
} from "@polydraw/render-layers";
import {
  encodePpm,
  PixelSurface,
  rasterDrawing,
  type Paint,
} from "@polydraw/render-raster";

export type Backend = "layers" | "raster";

export const BACKENDS: readonly Backend[] = ["layers", "raster"];

/** Capabilities each backend's interpreter implements. */
export const BACKEND_CAPABILITIES: Record<Backend, readonly CapabilityName[]> = {
  layers: ["shape", "alpha", "shadow", "gradient"],
  raster: ["shape", "alpha", "gradient"],
};

export interface RenderedOutput {
  extension: "svg" | "ppm";
  data: string | Buffer;
}

export interface CanvasOptions {
  width: number;
  height: number;
  background: string;
  title?: string;
}

const SAMPLE_CANVAS: CanvasOptions = { width: 200, height: 200, background: "white" };

// Builders are listed per backend so a backend only offers what it can draw
const RASTER_SAMPLES: Partial<Record<string, (d: PaintCapabilities<Paint>) => Paint>> = {
  overlap: overlappingShapes,
  gradient: gradientOverlay,
};

const LAYER_SAMPLES: Partial<
  Record<string, (d: FullCapabilities<LayerDrawing>) => LayerDrawing>
> = {
  overlap: overlappingShapes,
  gradient: gradientOverlay,
  shadow: shadowedGradientOverlay,
};

export function parseBackend(value: string): Backend {
  const backend = BACKENDS.find((b) => b === value);
  if (!backend) {
    throw new Error(`Unknown backend "${value}". Available: ${BACKENDS.join(", ")}`);
  }
  return backend;
}

export function sampleNames(backend: Backend): string[] {
  return Object.keys(backend === "raster" ? RASTER_SAMPLES : LAYER_SAMPLES);
}

function paintRaster(paint: Paint, canvas: CanvasOptions): RenderedOutput {
  const surface = new PixelSurface(canvas.width, canvas.height);
  paint.draw(surface);
  return { extension: "ppm", data: encodePpm(surface, parseColor(canvas.background)) };
}

function exportLayers(drawing: LayerDrawing, canvas: CanvasOptions): RenderedOutput {
  return { extension: "svg", data: renderLayerSvg(drawing.render(), canvas) };
}

export function renderDocument(doc: DrawingDocument, backend: Backend): RenderedOutput {
  const canvas: CanvasOptions = {
    width: doc.canvas.width,
    height: doc.canvas.height,
    background: doc.canvas.background ?? "white",
    title: doc.title,
  };

  if (backend === "raster") {
    return paintRaster(interpretDrawing(doc.drawing, rasterDrawing), canvas);
  }
  return exportLayers(interpretDrawing(doc.drawing, layerDrawing, layerDrawing), canvas);
}

export function renderSample(name: string, backend: Backend): RenderedOutput {
  if (backend === "raster") {
    const build = RASTER_SAMPLES[name];
    if (!build) throw unknownSample(name, backend);
    return paintRaster(build(rasterDrawing), SAMPLE_CANVAS);
  }
  const build = LAYER_SAMPLES[name];
  if (!build) throw unknownSample(name, backend);
  return exportLayers(build(layerDrawing), SAMPLE_CANVAS);
}

function unknownSample(name: string, backend: Backend): Error {
  return new Error(
    `Unknown sample "${name}" for the ${backend} backend. Available: ${sampleNames(backend).join(", ")}`,
  );
}
