import type { DrawingContext, StyleOpts } from "./drawing-context.js";
import { escapeXml, n } from "./utils.js";

/**
 * SVG implementation of DrawingContext.
 * Builds SVG elements as string output.
 */
export class SvgDrawingContext implements DrawingContext {
  private parts: string[] = [];

  rect(x: number, y: number, width: number, height: number, opts?: StyleOpts): void {
    this.parts.push(
      `<rect x="${n(x)}" y="${n(y)}" width="${n(width)}" height="${n(height)}"${styleAttrs(opts)}/>`,
    );
  }

  ellipse(cx: number, cy: number, rx: number, ry: number, opts?: StyleOpts): void {
    this.parts.push(
      `<ellipse cx="${n(cx)}" cy="${n(cy)}" rx="${n(rx)}" ry="${n(ry)}"${styleAttrs(opts)}/>`,
    );
  }

  openGroup(attrs?: Record<string, string>): void {
    if (!attrs || Object.keys(attrs).length === 0) {
      this.parts.push("<g>");
    } else {
      const attrStr = Object.entries(attrs)
        .map(([k, v]) => `${k}="${escapeXml(v)}"`)
        .join(" ");
      this.parts.push(`<g ${attrStr}>`);
    }
  }

  closeGroup(): void {
    this.parts.push("</g>");
  }

  getOutput(): string {
    return this.parts.join("\n");
  }
}

function styleAttrs(opts?: StyleOpts): string {
  if (!opts) return "";
  const attrs: string[] = [];
  if (opts.fill !== undefined) attrs.push(`fill="${escapeXml(opts.fill)}"`);
  if (opts.fillOpacity !== undefined) attrs.push(`fill-opacity="${n(opts.fillOpacity)}"`);
  return attrs.length > 0 ? " " + attrs.join(" ") : "";
}
