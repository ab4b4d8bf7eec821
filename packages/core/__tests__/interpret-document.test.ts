import { describe, expect, it } from "vitest";
import {
  DEFAULT_SHADOW,
  UnsupportedCapabilityError,
  interpretDrawing,
  requiredCapabilities,
  type DrawingNodeConfig,
  type DropShadow,
  type ShadowOptions,
} from "../src/index.js";
import { textDrawing } from "./text-interpreter.js";

const overlap: DrawingNodeConfig = {
  type: "combined",
  children: [
    { type: "ellipse", rect: [0, 0, 100, 100], fill: "red" },
    { type: "rectangle", rect: [50, 50, 100, 100], fill: "blue" },
  ],
};

const shadowed: DrawingNodeConfig = {
  type: "alpha",
  factor: 0.5,
  child: { type: "shadow", child: overlap },
};

describe("interpretDrawing", () => {
  it("evaluates children in order", () => {
    expect(interpretDrawing(overlap, textDrawing)).toBe(
      "[ellipse(0,0,100,100 #ff0000), rect(50,50,100,100 #0000ff)]",
    );
  });

  it("fills in default shadow settings", () => {
    expect(interpretDrawing(shadowed, textDrawing, textDrawing)).toBe(
      "alpha(0.5, shadow(0.75, 0,3, 3, [ellipse(0,0,100,100 #ff0000), rect(50,50,100,100 #0000ff)]))",
    );
  });

  it("passes a fresh default offset for every shadow node", () => {
    const seen: ShadowOptions[] = [];
    const shadows: DropShadow<string> = {
      shadow(options, child) {
        seen.push(options);
        return child;
      },
    };
    const node: DrawingNodeConfig = {
      type: "combined",
      children: [
        { type: "shadow", child: { type: "rectangle", rect: [0, 0, 1, 1], fill: "red" } },
        { type: "shadow", child: { type: "rectangle", rect: [2, 2, 1, 1], fill: "red" } },
      ],
    };
    interpretDrawing(node, textDrawing, shadows);
    expect(seen).toHaveLength(2);
    expect(seen[0].offset).toEqual({ width: 0, height: 3 });
    expect(seen[0].offset).not.toBe(DEFAULT_SHADOW.offset);
    expect(seen[1].offset).not.toBe(seen[0].offset);
  });

  it("uses explicit shadow settings", () => {
    const node: DrawingNodeConfig = {
      type: "shadow",
      opacity: 0.2,
      offset: [2, 4],
      radius: 6,
      child: { type: "rectangle", rect: [0, 0, 1, 1], fill: "black" },
    };
    expect(interpretDrawing(node, textDrawing, textDrawing)).toBe(
      "shadow(0.2, 2,4, 6, rect(0,0,1,1 #000000))",
    );
  });

  it("maps gradient tuples and colors", () => {
    const node: DrawingNodeConfig = {
      type: "gradient",
      rect: [10, 20, 30, 40],
      start: [0, 0.5],
      end: [1, 0.5],
      colors: ["#000", "white"],
    };
    expect(interpretDrawing(node, textDrawing)).toBe(
      "gradient(10,20,30,40 0,0.5->1,0.5 #000000 #ffffff)",
    );
  });

  it("refuses shadow nodes without a shadow capability", () => {
    expect(() => interpretDrawing(shadowed, textDrawing)).toThrow(UnsupportedCapabilityError);
    expect(() => interpretDrawing(shadowed, textDrawing)).toThrow(
      'Drawing uses the "shadow" capability, which this interpreter does not support',
    );
  });
});

describe("requiredCapabilities", () => {
  it("lists capabilities in first-use order", () => {
    expect([...requiredCapabilities(shadowed)]).toEqual(["alpha", "shadow", "shape"]);
  });

  it("reports gradients without shapes", () => {
    const node: DrawingNodeConfig = {
      type: "gradient",
      rect: [0, 0, 1, 1],
      start: [0, 0],
      end: [1, 1],
      colors: ["red", "blue"],
    };
    expect([...requiredCapabilities(node)]).toEqual(["gradient"]);
  });
});
