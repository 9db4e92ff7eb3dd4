/**
 * Shortest round-trip decimal text for an SVG attribute value.
 * Integers print without a decimal point; negative zero keeps its sign.
 */
export function n(value: number): string {
  return Object.is(value, -0) ? "-0" : String(value);
}

/** `name="value"` for a numeric attribute */
export function floatAttr(name: string, value: number): string {
  return `${name}="${n(value)}"`;
}

/** `name="true"` / `name="false"` */
export function boolAttr(name: string, value: boolean): string {
  return `${name}="${value ? "true" : "false"}"`;
}

/**
 * `name="value"` for a string attribute, written verbatim.
 * An empty value produces no attribute at all.
 */
export function stringAttr(name: string, value: string): string {
  if (value === "") return "";
  return `${name}="${value}"`;
}

/** Join attribute fragments with single spaces, dropping empty ones */
export function joinAttrs(fragments: readonly string[]): string {
  return fragments.filter((f) => f !== "").join(" ");
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
