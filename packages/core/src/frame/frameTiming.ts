/**
 * Frame-timer delay anchored to the previous frame's start.
 *
 * Scheduling each frame `cadence` ms after the previous frame *finished*
 * drifts the period to cadence + pipeline cost. Anchoring to the previous
 * start keeps frame starts on the cadence while the pipeline fits in it.
 */
export function computeFrameDelay(
  nowMs: number,
  lastFrameStartMs: number | null,
  cadenceMs: number,
): number {
  const cadence = Number.isFinite(cadenceMs) && cadenceMs > 0 ? cadenceMs : 16;
  if (lastFrameStartMs === null || !Number.isFinite(nowMs)) return cadence;
  const elapsed = nowMs - lastFrameStartMs;
  return Math.max(0, cadence - elapsed);
}
