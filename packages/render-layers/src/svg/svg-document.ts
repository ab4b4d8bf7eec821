import { escapeXml, n } from "./utils.js";

/**
 * Lightweight SVG document builder. No DOM dependency.
 */
export class SvgDocument {
  private defs: string[] = [];
  private elements: string[] = [];
  private title: string | null = null;

  constructor(
    private viewBox: {
      x: number;
      y: number;
      width: number;
      height: number;
    },
    private background: string | null = "white",
  ) {}

  setTitle(title: string): void {
    this.title = title;
  }

  addDef(svg: string): void {
    this.defs.push(svg);
  }

  /** Append markup after the background, in paint order. */
  addElement(svg: string): void {
    this.elements.push(svg);
  }

  toString(): string {
    const { x, y, width, height } = this.viewBox;
    const parts: string[] = [];

    parts.push(
      `<svg xmlns="http://www.w3.org/2000/svg" viewBox="${n(x)} ${n(y)} ${n(width)} ${n(height)}" width="${n(width)}" height="${n(height)}">`,
    );

    if (this.title) {
      parts.push(`<title>${escapeXml(this.title)}</title>`);
    }

    if (this.defs.length > 0) {
      parts.push("<defs>");
      for (const def of this.defs) {
        parts.push(def);
      }
      parts.push("</defs>");
    }

    if (this.background) {
      parts.push(
        `<rect x="${n(x)}" y="${n(y)}" width="${n(width)}" height="${n(height)}" fill="${escapeXml(this.background)}"/>`,
      );
    }

    for (const el of this.elements) {
      parts.push(el);
    }

    parts.push("</svg>");
    return parts.join("\n");
  }
}
