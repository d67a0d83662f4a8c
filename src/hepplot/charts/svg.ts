/**
 * Small helpers for writing SVG markup by hand
 */

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;'
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, c => XML_ESCAPES[c]);
}

/** Format a coordinate with at most two decimals */
export function num(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return Object.is(rounded, -0) ? '0' : String(rounded);
}
