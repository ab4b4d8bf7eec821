// ---- Primitive geometry ----

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function rect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width, height };
}

export function point(x: number, y: number): Point {
  return { x, y };
}

export function size(width: number, height: number): Size {
  return { width, height };
}

// ---- Rect helpers ----

/**
 * Map a point in the unit square [0,1]×[0,1] onto `bounds`:
 * `absolute = origin + size * unit`.
 */
export function unitToAbsolute(bounds: Rect, unit: Point): Point {
  return {
    x: bounds.x + bounds.width * unit.x,
    y: bounds.y + bounds.height * unit.y,
  };
}

export function rectCenter(bounds: Rect): Point {
  return unitToAbsolute(bounds, { x: 0.5, y: 0.5 });
}

export function offsetRect(bounds: Rect, by: Point): Rect {
  return { ...bounds, x: bounds.x + by.x, y: bounds.y + by.y };
}

/** Overlap of two rects; a rect with zero extent when they are disjoint. */
export function intersectRects(a: Rect, b: Rect): Rect {
  const x = Math.max(a.x, b.x);
  const y = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.width, b.x + b.width);
  const bottom = Math.min(a.y + a.height, b.y + b.height);
  return {
    x,
    y,
    width: Math.max(0, right - x),
    height: Math.max(0, bottom - y),
  };
}

export function isEmptyRect(bounds: Rect): boolean {
  return !(bounds.width > 0 && bounds.height > 0);
}
