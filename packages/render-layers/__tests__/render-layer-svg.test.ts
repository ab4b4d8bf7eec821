import {
  NAMED_COLORS,
  gradientOverlay,
  overlappingShapes,
  rect,
  rgb,
  shadowedGradientOverlay,
} from "@polydraw/core";
import { describe, expect, it } from "vitest";
import { layerDrawing } from "../src/layer-interpreter.js";
import { renderLayerSvg } from "../src/render-layer-svg.js";

const d = layerDrawing;

describe("renderLayerSvg", () => {
  it("serialises the overlap scenario in paint order", () => {
    const svg = renderLayerSvg(overlappingShapes(d).render(), { width: 200, height: 200 });
    expect(svg).toBe(
      [
        '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 200 200" width="200" height="200">',
        '<rect x="0" y="0" width="200" height="200" fill="white"/>',
        '<g class="layer">',
        '<g class="layer shape">',
        '<ellipse cx="50" cy="50" rx="50" ry="50" fill="#ff0000"/>',
        "</g>",
        '<g class="layer">',
        '<rect x="50" y="50" width="100" height="100" fill="#0000ff"/>',
        "</g>",
        "</g>",
        "</svg>",
      ].join("\n"),
    );
  });

  it("writes gradients as defs with evenly spaced stops", () => {
    const svg = renderLayerSvg(gradientOverlay(d).render());
    expect(svg).toContain(
      '<linearGradient id="gradient-1" x1="0" y1="0" x2="1" y2="1">' +
        '<stop offset="0" stop-color="#ff0000"/>' +
        '<stop offset="0.33" stop-color="#00ff00"/>' +
        '<stop offset="0.67" stop-color="#0000ff"/>' +
        '<stop offset="1" stop-color="#00ffff"/>' +
        "</linearGradient>",
    );
    expect(svg).toContain('<g class="layer gradient" opacity="0.7">');
    expect(svg).toContain('<rect x="50" y="50" width="100" height="100" fill="url(#gradient-1)"/>');
  });

  it("writes shadows as drop-shadow filters on the layer's group", () => {
    const svg = renderLayerSvg(shadowedGradientOverlay(d).render());
    expect(svg).toContain(
      '<filter id="shadow-1" x="-50%" y="-50%" width="200%" height="200%">' +
        '<feDropShadow dx="0" dy="3" stdDeviation="1.5" flood-color="#000000" flood-opacity="0.75"/>' +
        "</filter>",
    );
    expect(svg).toContain('<g class="layer shape" filter="url(#shadow-1)">');
  });

  it("numbers ids per kind", () => {
    const drawing = d.combined([
      d.gradient(rect(0, 0, 10, 10), { x: 0, y: 0 }, { x: 1, y: 0 }, [NAMED_COLORS.red, NAMED_COLORS.blue]),
      d.gradient(rect(10, 0, 10, 10), { x: 0, y: 0 }, { x: 0, y: 1 }, [NAMED_COLORS.red, NAMED_COLORS.blue]),
    ]);
    const svg = renderLayerSvg(drawing.render());
    expect(svg).toContain('fill="url(#gradient-1)"');
    expect(svg).toContain('fill="url(#gradient-2)"');
  });

  it("writes translucent fills with fill-opacity", () => {
    const svg = renderLayerSvg(d.rectangle(rect(0, 0, 4, 4), rgb(1, 0, 0, 0.5)).render());
    expect(svg).toContain('<rect x="0" y="0" width="4" height="4" fill="#ff0000" fill-opacity="0.5"/>');
  });

  it("omits the background when it is null and escapes the title", () => {
    const svg = renderLayerSvg(d.combined([]).render(), {
      width: 10,
      height: 10,
      background: null,
      title: "Red & Blue",
    });
    expect(svg).toBe(
      [
        '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 10 10" width="10" height="10">',
        "<title>Red &amp; Blue</title>",
        '<g class="layer">',
        "</g>",
        "</svg>",
      ].join("\n"),
    );
  });
});
