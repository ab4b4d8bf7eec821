/** Round a number for clean SVG attribute output */
export function n(value: number): string {
  return Number(value.toFixed(2)).toString();
}

/** Escape XML special characters in text content and attribute values */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Hands out document-unique ids for defs: `gradient-1`, `shadow-1`, ... */
export function createIdSource(): (prefix: string) => string {
  const counters = new Map<string, number>();
  return (prefix) => {
    const next = (counters.get(prefix) ?? 0) + 1;
    counters.set(prefix, next);
    return `${prefix}-${next}`;
  };
}
