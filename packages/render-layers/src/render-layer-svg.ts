import {
  clampUnit,
  gradientStops,
  offsetRect,
  toCssColor,
  toHexColor,
  type Color,
  type Point,
} from "@polydraw/core";
import type { DrawingContext } from "./svg/drawing-context.js";
import { SvgDocument } from "./svg/svg-document.js";
import { SvgDrawingContext } from "./svg/svg-drawing-context.js";
import { createIdSource, n } from "./svg/utils.js";
import { isGradientLayer, isShapeLayer, type Layer } from "./layer.js";

export interface LayerSvgOptions {
  width?: number;
  height?: number;
  /** Page background; null leaves it transparent. */
  background?: string | null;
  title?: string;
}

const DEFAULT_OPTIONS = {
  width: 200,
  height: 200,
  background: "white",
} as const;

interface ExportContext {
  doc: SvgDocument;
  nextId: (prefix: string) => string;
}

/**
 * Serialise a layer tree to a standalone SVG document.
 * Every layer becomes a group; opacity and shadows are set on the group so they
 * apply to the layer's sublayers too.
 */
export function renderLayerSvg(root: Layer, options?: LayerSvgOptions): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const doc = new SvgDocument(
    { x: 0, y: 0, width: opts.width, height: opts.height },
    opts.background,
  );
  if (opts.title) doc.setTitle(opts.title);

  const dc = new SvgDrawingContext();
  writeLayer(root, { x: 0, y: 0 }, dc, { doc, nextId: createIdSource() });
  doc.addElement(dc.getOutput());

  return doc.toString();
}

function writeLayer(
  layer: Layer,
  origin: Point,
  dc: DrawingContext,
  ctx: ExportContext,
): void {
  const frame = offsetRect(layer.frame, origin);
  const attrs: Record<string, string> = {
    class: layer.kind === "layer" ? "layer" : `layer ${layer.kind}`,
  };

  const opacity = clampUnit(layer.opacity);
  if (opacity < 1) attrs.opacity = n(opacity);

  if (layer.hasShadow) {
    const id = ctx.nextId("shadow");
    ctx.doc.addDef(shadowFilter(id, layer));
    attrs.filter = `url(#${id})`;
  }

  dc.openGroup(attrs);

  if (layer.backgroundColor) {
    dc.rect(frame.x, frame.y, frame.width, frame.height, fillOf(layer.backgroundColor));
  }

  if (isShapeLayer(layer) && layer.path && layer.fillColor) {
    const oval = offsetRect(layer.path.bounds, frame);
    dc.ellipse(
      oval.x + oval.width / 2,
      oval.y + oval.height / 2,
      oval.width / 2,
      oval.height / 2,
      fillOf(layer.fillColor),
    );
  }

  if (isGradientLayer(layer) && layer.colors.length >= 2) {
    const id = ctx.nextId("gradient");
    const stops = gradientStops(layer.colors)
      .map((stop) => {
        const opacity = stop.color.a < 1 ? ` stop-opacity="${n(stop.color.a)}"` : "";
        return `<stop offset="${n(stop.position)}" stop-color="${toHexColor(stop.color)}"${opacity}/>`;
      })
      .join("");
    const { startPoint: s, endPoint: e } = layer;
    ctx.doc.addDef(
      `<linearGradient id="${id}" x1="${n(s.x)}" y1="${n(s.y)}" x2="${n(e.x)}" y2="${n(e.y)}">${stops}</linearGradient>`,
    );
    dc.rect(frame.x, frame.y, frame.width, frame.height, { fill: `url(#${id})` });
  }

  for (const sublayer of layer.sublayers) {
    writeLayer(sublayer, frame, dc, ctx);
  }

  dc.closeGroup();
}

function fillOf(color: Color): { fill: string; fillOpacity?: number } {
  return color.a < 1
    ? { fill: toHexColor(color), fillOpacity: color.a }
    : { fill: toCssColor(color) };
}

function shadowFilter(id: string, layer: Layer): string {
  const { width: dx, height: dy } = layer.shadowOffset;
  // feDropShadow takes a standard deviation; a blur radius covers about two of them
  const deviation = layer.shadowRadius / 2;
  return (
    `<filter id="${id}" x="-50%" y="-50%" width="200%" height="200%">` +
    `<feDropShadow dx="${n(dx)}" dy="${n(dy)}" stdDeviation="${n(deviation)}" flood-color="#000000" flood-opacity="${n(clampUnit(layer.shadowOpacity))}"/>` +
    `</filter>`
  );
}
