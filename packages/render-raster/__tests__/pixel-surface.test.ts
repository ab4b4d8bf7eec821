import { NAMED_COLORS, rect, rgb } from "@polydraw/core";
import { describe, expect, it } from "vitest";
import { PixelSurface } from "../src/pixel-surface.js";
import { encodePpm } from "../src/ppm.js";

const { red, blue, black, white } = NAMED_COLORS;

describe("PixelSurface fills", () => {
  it("covers pixels whose centers fall inside a rect", () => {
    const surface = new PixelSurface(4, 4);
    surface.setFillColor(red);
    surface.fillRect(rect(1, 1, 2, 2));
    expect(surface.pixel(1, 1)).toEqual(red);
    expect(surface.pixel(2, 2)).toEqual(red);
    expect(surface.pixel(0, 0).a).toBe(0);
    expect(surface.pixel(3, 3).a).toBe(0);
  });

  it("fills the ellipse inscribed in a rect", () => {
    const surface = new PixelSurface(10, 10);
    surface.setFillColor(blue);
    surface.fillEllipse(rect(0, 0, 10, 10));
    expect(surface.pixel(5, 5)).toEqual(blue);
    expect(surface.pixel(0, 5)).toEqual(blue);
    expect(surface.pixel(0, 0).a).toBe(0);
    expect(surface.pixel(9, 9).a).toBe(0);
  });

  it("rejects pixel reads outside the surface", () => {
    const surface = new PixelSurface(4, 3);
    expect(() => surface.pixel(4, 0)).toThrow(RangeError);
    expect(() => surface.pixel(0, -1)).toThrow(RangeError);
    expect(() => surface.pixel(1.5, 1)).toThrow(RangeError);
    expect(() => surface.pixel(0, 3)).toThrow("Pixel (0, 3) is outside the 4×3 surface");
    expect(surface.pixel(3, 2)).toEqual({ r: 0, g: 0, b: 0, a: 0 });
  });

  it("paints nothing for zero-size shapes", () => {
    const surface = new PixelSurface(4, 4);
    surface.fillRect(rect(1, 1, 0, 2));
    surface.fillEllipse(rect(1, 1, 2, 0));
    expect(surface.data.every((v) => v === 0)).toBe(true);
  });

  it("ignores shapes outside the surface", () => {
    const surface = new PixelSurface(4, 4);
    surface.fillRect(rect(-10, -10, 5, 5));
    surface.fillRect(rect(10, 10, 5, 5));
    expect(surface.data.every((v) => v === 0)).toBe(true);
  });
});

describe("PixelSurface state", () => {
  it("restores color, alpha and clip", () => {
    const surface = new PixelSurface(4, 1);
    surface.setFillColor(blue);
    surface.save();
    surface.setFillColor(red);
    surface.setAlpha(0.5);
    surface.clipToRect(rect(0, 0, 1, 1));
    surface.restore();
    surface.fillRect(rect(0, 0, 4, 1));
    expect(surface.pixel(3, 0)).toEqual(blue);
  });

  it("treats restore without save as a no-op", () => {
    const surface = new PixelSurface(1, 1);
    surface.restore();
    surface.setFillColor(red);
    surface.fillRect(rect(0, 0, 1, 1));
    expect(surface.pixel(0, 0)).toEqual(red);
  });

  it("scales alpha from the value in effect at the last save", () => {
    const surface = new PixelSurface(1, 1);
    surface.setAlpha(0.5);
    surface.setAlpha(0.5);
    surface.save();
    surface.setAlpha(0.5);
    surface.setFillColor(red);
    surface.fillRect(rect(0, 0, 1, 1));
    expect(surface.pixel(0, 0).a).toBe(0.25);
  });

  it("intersects successive clips", () => {
    const surface = new PixelSurface(4, 4);
    surface.clipToRect(rect(0, 0, 3, 3));
    surface.clipToRect(rect(1, 1, 3, 3));
    surface.setFillColor(red);
    surface.fillRect(rect(0, 0, 4, 4));
    expect(surface.pixel(0, 0).a).toBe(0);
    expect(surface.pixel(1, 1)).toEqual(red);
    expect(surface.pixel(2, 2)).toEqual(red);
    expect(surface.pixel(3, 3).a).toBe(0);
  });

  it("composites translucent color source-over", () => {
    const surface = new PixelSurface(1, 1);
    surface.setFillColor(blue);
    surface.fillRect(rect(0, 0, 1, 1));
    surface.setFillColor(rgb(1, 0, 0, 0.5));
    surface.fillRect(rect(0, 0, 1, 1));
    expect(surface.pixel(0, 0)).toEqual({ r: 0.5, g: 0, b: 0.5, a: 1 });
  });
});

describe("PixelSurface gradients", () => {
  it("interpolates along the axis and fills the clip", () => {
    const surface = new PixelSurface(10, 2);
    surface.clipToRect(rect(0, 0, 10, 1));
    surface.fillLinearGradient({ x: 0, y: 0 }, { x: 10, y: 0 }, [
      { color: black, position: 0 },
      { color: white, position: 1 },
    ]);
    expect(surface.pixel(0, 0).r).toBeCloseTo(0.05, 5);
    expect(surface.pixel(9, 0).r).toBeCloseTo(0.95, 5);
    expect(surface.pixel(0, 1).a).toBe(0);
  });

  it("extends the end colors beyond the axis", () => {
    const surface = new PixelSurface(10, 1);
    surface.fillLinearGradient({ x: 2, y: 0 }, { x: 4, y: 0 }, [
      { color: red, position: 0 },
      { color: blue, position: 1 },
    ]);
    expect(surface.pixel(0, 0)).toEqual(red);
    expect(surface.pixel(9, 0)).toEqual(blue);
  });

  it("paints nothing when start and end coincide", () => {
    const surface = new PixelSurface(2, 2);
    surface.fillLinearGradient({ x: 1, y: 1 }, { x: 1, y: 1 }, [
      { color: red, position: 0 },
      { color: blue, position: 1 },
    ]);
    expect(surface.data.every((v) => v === 0)).toBe(true);
  });
});

describe("encodePpm", () => {
  it("writes a P6 header and flattens alpha over the background", () => {
    const surface = new PixelSurface(2, 1);
    surface.setFillColor(red);
    surface.fillRect(rect(0, 0, 1, 1));

    const ppm = encodePpm(surface);
    const header = "P6\n2 1\n255\n";
    expect(ppm.subarray(0, header.length).toString("ascii")).toBe(header);
    expect([...ppm.subarray(header.length)]).toEqual([255, 0, 0, 255, 255, 255]);
  });

  it("blends translucent pixels with the background", () => {
    const surface = new PixelSurface(1, 1);
    surface.setFillColor(rgb(0, 0, 1, 0.5));
    surface.fillRect(rect(0, 0, 1, 1));
    const ppm = encodePpm(surface, black);
    expect([...ppm.subarray(ppm.length - 3)]).toEqual([0, 0, 128]);
  });
});
