import { describe, expect, it } from "vitest";
import {
  intersectRects,
  isEmptyRect,
  offsetRect,
  rect,
  rectCenter,
  unitToAbsolute,
} from "../src/types/geometry.js";

describe("unitToAbsolute", () => {
  const bounds = rect(50, 20, 100, 40);

  it("maps (0,0) to the rect origin", () => {
    expect(unitToAbsolute(bounds, { x: 0, y: 0 })).toEqual({ x: 50, y: 20 });
  });

  it("maps (1,1) to origin + size", () => {
    expect(unitToAbsolute(bounds, { x: 1, y: 1 })).toEqual({ x: 150, y: 60 });
  });

  it("maps (0.5,0.5) to the center", () => {
    expect(unitToAbsolute(bounds, { x: 0.5, y: 0.5 })).toEqual({ x: 100, y: 40 });
    expect(rectCenter(bounds)).toEqual({ x: 100, y: 40 });
  });

  it("interpolates each axis independently", () => {
    expect(unitToAbsolute(bounds, { x: 0.25, y: 1 })).toEqual({ x: 75, y: 60 });
  });
});

describe("rect helpers", () => {
  it("intersects overlapping rects", () => {
    expect(intersectRects(rect(0, 0, 100, 100), rect(50, 50, 100, 100))).toEqual(
      rect(50, 50, 50, 50),
    );
  });

  it("returns an empty rect for disjoint rects", () => {
    const overlap = intersectRects(rect(0, 0, 10, 10), rect(20, 20, 10, 10));
    expect(overlap.width).toBe(0);
    expect(overlap.height).toBe(0);
    expect(isEmptyRect(overlap)).toBe(true);
  });

  it("offsets a rect by a point", () => {
    expect(offsetRect(rect(1, 2, 3, 4), { x: 10, y: 20 })).toEqual(rect(11, 22, 3, 4));
  });
});
