/**
 * CSS length parsing and the layout-pixel → device-pixel conversion.
 *
 * Every font size and explicit length passes through `devicePx` so that zoom
 * scales content and container alike; wrapping, not clipping, is then the
 * visible effect of zooming.
 */

/**
 * Parse a "<number>px" length. Anything else (missing value, other units,
 * garbage) yields `fallback`.
 */
export function px(value: string | undefined, fallback = 0): number {
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  if (!trimmed.endsWith("px")) return fallback;
  const n = Number.parseFloat(trimmed.slice(0, -2));
  return Number.isFinite(n) ? n : fallback;
}

export function devicePx(layoutPx: number, zoom: number): number {
  return layoutPx * zoom;
}
