/**
 * Number and size formatting
 */

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Format a pixel coordinate for SVG output (at most two decimals, no trailing zeros)
 */
export function formatPixel(value: number): string {
  const rounded = Number(value.toFixed(2));
  // Avoid "-0"
  return String(rounded === 0 ? 0 : rounded);
}
