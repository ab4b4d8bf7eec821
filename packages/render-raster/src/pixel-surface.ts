import {
  intersectRects,
  mixColors,
  rgb,
  type Color,
  type GradientStop,
  type PaintSurface,
  type Point,
  type Rect,
} from "@polydraw/core";

interface SurfaceState {
  fill: Color;
  alpha: number;
  /** Alpha in effect at the last save; setAlpha scales from here. */
  baseAlpha: number;
  clip: Rect;
}

/**
 * In-memory RGBA raster. Channels are stored as floats in [0,1] with straight
 * alpha, composited source-over. A pixel is covered when its center lies inside
 * the shape and the clip.
 */
export class PixelSurface implements PaintSurface {
  readonly data: Float32Array;
  private state: SurfaceState;
  private stack: SurfaceState[] = [];

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.data = new Float32Array(width * height * 4);
    this.state = {
      fill: rgb(0, 0, 0),
      alpha: 1,
      baseAlpha: 1,
      clip: { x: 0, y: 0, width, height },
    };
  }

  save(): void {
    this.stack.push({ ...this.state });
    this.state = { ...this.state, baseAlpha: this.state.alpha };
  }

  restore(): void {
    const previous = this.stack.pop();
    if (previous) this.state = previous;
  }

  setFillColor(color: Color): void {
    this.state.fill = color;
  }

  setAlpha(factor: number): void {
    this.state.alpha = this.state.baseAlpha * factor;
  }

  fillRect(bounds: Rect): void {
    const right = bounds.x + bounds.width;
    const bottom = bounds.y + bounds.height;
    this.fillCovered(bounds, (cx, cy) => cx >= bounds.x && cx < right && cy >= bounds.y && cy < bottom);
  }

  fillEllipse(bounds: Rect): void {
    const rx = bounds.width / 2;
    const ry = bounds.height / 2;
    if (!(rx > 0 && ry > 0)) return;
    const centerX = bounds.x + rx;
    const centerY = bounds.y + ry;
    this.fillCovered(bounds, (cx, cy) => {
      const dx = (cx - centerX) / rx;
      const dy = (cy - centerY) / ry;
      return dx * dx + dy * dy <= 1;
    });
  }

  clipToRect(bounds: Rect): void {
    this.state.clip = intersectRects(this.state.clip, bounds);
  }

  fillLinearGradient(start: Point, end: Point, stops: readonly GradientStop[]): void {
    const vx = end.x - start.x;
    const vy = end.y - start.y;
    const lengthSquared = vx * vx + vy * vy;
    if (lengthSquared === 0 || stops.length === 0) return;

    this.forEachPixel(this.state.clip, (x, y) => {
      const t = ((x + 0.5 - start.x) * vx + (y + 0.5 - start.y) * vy) / lengthSquared;
      this.blend(x, y, colorAt(stops, Math.min(1, Math.max(0, t))));
    });
  }

  /** Color at integer pixel coordinates. */
  pixel(x: number, y: number): Color {
    const inside =
      Number.isInteger(x) && Number.isInteger(y) &&
      x >= 0 && y >= 0 && x < this.width && y < this.height;
    if (!inside) {
      throw new RangeError(`Pixel (${x}, ${y}) is outside the ${this.width}×${this.height} surface`);
    }
    const i = (y * this.width + x) * 4;
    return rgb(this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]);
  }

  private fillCovered(bounds: Rect, covers: (cx: number, cy: number) => boolean): void {
    const region = intersectRects(this.state.clip, bounds);
    const fill = this.state.fill;
    this.forEachPixel(region, (x, y) => {
      if (covers(x + 0.5, y + 0.5)) this.blend(x, y, fill);
    });
  }

  /** Visit every pixel whose center lies inside `region` and the clip. */
  private forEachPixel(region: Rect, visit: (x: number, y: number) => void): void {
    const clip = this.state.clip;
    const x0 = Math.max(0, Math.floor(region.x));
    const y0 = Math.max(0, Math.floor(region.y));
    const x1 = Math.min(this.width, Math.ceil(region.x + region.width));
    const y1 = Math.min(this.height, Math.ceil(region.y + region.height));

    for (let y = y0; y < y1; y++) {
      const cy = y + 0.5;
      if (cy < clip.y || cy >= clip.y + clip.height) continue;
      for (let x = x0; x < x1; x++) {
        const cx = x + 0.5;
        if (cx < clip.x || cx >= clip.x + clip.width) continue;
        visit(x, y);
      }
    }
  }

  private blend(x: number, y: number, color: Color): void {
    const srcA = color.a * this.state.alpha;
    if (srcA <= 0) return;
    const i = (y * this.width + x) * 4;
    const dstA = this.data[i + 3];
    const keep = dstA * (1 - srcA);
    const outA = srcA + keep;
    this.data[i] = (color.r * srcA + this.data[i] * keep) / outA;
    this.data[i + 1] = (color.g * srcA + this.data[i + 1] * keep) / outA;
    this.data[i + 2] = (color.b * srcA + this.data[i + 2] * keep) / outA;
    this.data[i + 3] = outA;
  }
}

function colorAt(stops: readonly GradientStop[], t: number): Color {
  if (t <= stops[0].position) return stops[0].color;
  for (let i = 0; i < stops.length - 1; i++) {
    const from = stops[i];
    const to = stops[i + 1];
    if (t <= to.position) {
      const span = to.position - from.position;
      return span > 0 ? mixColors(from.color, to.color, (t - from.position) / span) : to.color;
    }
  }
  return stops[stops.length - 1].color;
}
