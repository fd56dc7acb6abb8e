/** An ordered SVG attribute list. Order is preserved in the output. */
export type Attributes = Array<readonly [name: string, value: string]>;

/**
 * Round a number for clean SVG attribute output. Values too small for six
 * decimals keep six significant digits instead of collapsing to 0.
 */
export function n(value: number): string {
  const rounded = Number(value.toFixed(6));
  if (rounded === 0 && value !== 0) {
    return Number(value.toPrecision(6)).toString();
  }
  return rounded.toString();
}

/** Escape XML special characters in text content */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Concatenate attribute groups, failing on a repeated name.
 * Geometry, appearance and transform attributes are disjoint by construction,
 * so a collision means a component emits the wrong names.
 */
export function mergeAttributes(...groups: Attributes[]): Attributes {
  const seen = new Set<string>();
  const merged: Attributes = [];
  for (const group of groups) {
    for (const [name, value] of group) {
      if (seen.has(name)) {
        throw new Error(`Duplicate SVG attribute "${name}"`);
      }
      seen.add(name);
      merged.push([name, value]);
    }
  }
  return merged;
}

/** Render attributes as ` name="value"` pairs (leading space included). */
export function attrString(attrs: Attributes): string {
  if (attrs.length === 0) return "";
  return " " + attrs.map(([k, v]) => `${k}="${escapeXml(v)}"`).join(" ");
}
