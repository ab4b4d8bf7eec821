/**
 * Abstract drawing interface for the primitives a layer tree exports to.
 * Keeps the layer walk independent of the output format.
 */
export interface StyleOpts {
  fill?: string;
  fillOpacity?: number;
}

export interface DrawingContext {
  rect(
    x: number,
    y: number,
    width: number,
    height: number,
    opts?: StyleOpts,
  ): void;
  ellipse(
    cx: number,
    cy: number,
    rx: number,
    ry: number,
    opts?: StyleOpts,
  ): void;
  openGroup(attrs?: Record<string, string>): void;
  closeGroup(): void;
  getOutput(): string;
}
