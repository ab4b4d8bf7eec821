import { z } from "zod";
import { tryParseColor } from "./color.js";

// ---- Tuple types ----

/** `[x, y, width, height]` */
export type RectTuple = [number, number, number, number];
/** `[x, y]` */
export type PointTuple = [number, number];
/** `[width, height]` */
export type SizeTuple = [number, number];

// ---- Document interfaces ----

export interface DrawingDocument {
  version: string;
  title?: string;
  canvas: CanvasConfig;
  drawing: DrawingNodeConfig;
}

export interface CanvasConfig {
  width: number;
  height: number;
  background?: string;
}

export interface RectangleNodeConfig {
  type: "rectangle";
  rect: RectTuple;
  fill: string;
}

export interface EllipseNodeConfig {
  type: "ellipse";
  rect: RectTuple;
  fill: string;
}

export interface CombinedNodeConfig {
  type: "combined";
  children: DrawingNodeConfig[];
}

export interface AlphaNodeConfig {
  type: "alpha";
  factor: number;
  child: DrawingNodeConfig;
}

export interface ShadowNodeConfig {
  type: "shadow";
  opacity?: number;
  offset?: SizeTuple;
  radius?: number;
  child: DrawingNodeConfig;
}

export interface GradientNodeConfig {
  type: "gradient";
  rect: RectTuple;
  /** Unit-square coordinates relative to `rect`. */
  start: PointTuple;
  end: PointTuple;
  colors: string[];
}

export type DrawingNodeConfig =
  | RectangleNodeConfig
  | EllipseNodeConfig
  | CombinedNodeConfig
  | AlphaNodeConfig
  | ShadowNodeConfig
  | GradientNodeConfig;

// ---- Zod schemas for runtime validation ----

const ColorSchema = z
  .string()
  .refine((value) => tryParseColor(value) !== null, {
    message: "Expected a color name or #rgb, #rrggbb, #rrggbbaa hex value",
  });

const ExtentSchema = z.number().finite();
const RectTupleSchema = z.tuple([ExtentSchema, ExtentSchema, ExtentSchema, ExtentSchema]);
const PairSchema = z.tuple([ExtentSchema, ExtentSchema]);

const RectangleNodeSchema = z.object({
  type: z.literal("rectangle"),
  rect: RectTupleSchema,
  fill: ColorSchema,
});

const EllipseNodeSchema = z.object({
  type: z.literal("ellipse"),
  rect: RectTupleSchema,
  fill: ColorSchema,
});

const GradientNodeSchema = z.object({
  type: z.literal("gradient"),
  rect: RectTupleSchema,
  start: PairSchema,
  end: PairSchema,
  colors: z.array(ColorSchema).min(2, "A gradient needs at least 2 colors"),
});

export const DrawingNodeSchema: z.ZodType<DrawingNodeConfig> = z.lazy(() =>
  z.union([
    RectangleNodeSchema,
    EllipseNodeSchema,
    z.object({
      type: z.literal("combined"),
      children: z.array(DrawingNodeSchema),
    }),
    z.object({
      type: z.literal("alpha"),
      factor: z.number(),
      child: DrawingNodeSchema,
    }),
    z.object({
      type: z.literal("shadow"),
      opacity: z.number().optional(),
      offset: PairSchema.optional(),
      radius: z.number().nonnegative().optional(),
      child: DrawingNodeSchema,
    }),
    GradientNodeSchema,
  ]),
);

const CanvasSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  background: ColorSchema.optional(),
});

export const DrawingDocumentSchema = z.object({
  version: z.string(),
  title: z.string().optional(),
  canvas: CanvasSchema,
  drawing: DrawingNodeSchema,
});
