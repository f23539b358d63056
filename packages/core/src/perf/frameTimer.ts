/**
 * packages/core/src/perf/frameTimer.ts — Per-phase frame timing.
 *
 * Opt-in via the `perf` config flag (defaults to WAYMARK_PERF=1). When
 * disabled every call is a no-op and snapshot() is empty.
 */

/** Phases of a frame that can be timed. */
export type FramePhase =
  | "raf_callbacks"
  | "style"
  | "layout_size"
  | "layout_height"
  | "layout_position"
  | "paint"
  | "commit"
  | "draw";

export const FRAME_PHASES: readonly FramePhase[] = Object.freeze([
  "raf_callbacks",
  "style",
  "layout_size",
  "layout_height",
  "layout_position",
  "paint",
  "commit",
  "draw",
]);

/** Statistics for a single phase. */
export type PhaseStats = Readonly<{
  count: number;
  avg: number;
  p50: number;
  p95: number;
  max: number;
}>;

export type PerfSnapshot = Readonly<{
  phases: Readonly<{ [K in FramePhase]?: PhaseStats }>;
}>;

/**
 * Check WAYMARK_PERF without importing Node modules.
 */
export function readPerfEnv(): boolean {
  try {
    const g = globalThis as { process?: { env?: { WAYMARK_PERF?: string } } };
    return g.process?.env?.WAYMARK_PERF === "1";
  } catch {
    return false;
  }
}

/** Maximum samples kept per phase (ring buffer). */
const RING_CAP = 512;

type PhaseRing = {
  samples: Float64Array;
  cursor: number;
  count: number;
  sum: number;
  max: number;
};

function createPhaseRing(): PhaseRing {
  return { samples: new Float64Array(RING_CAP), cursor: 0, count: 0, sum: 0, max: 0 };
}

function recordSample(ring: PhaseRing, dt: number): void {
  if (ring.count >= RING_CAP) {
    ring.sum -= ring.samples[ring.cursor] ?? 0;
  }
  ring.samples[ring.cursor] = dt;
  ring.sum += dt;
  ring.cursor = (ring.cursor + 1) % RING_CAP;
  ring.count = Math.min(ring.count + 1, RING_CAP);
  if (dt > ring.max) ring.max = dt;
}

function computeStats(ring: PhaseRing): PhaseStats | null {
  if (ring.count === 0) return null;
  const arr = Array.from(ring.samples.subarray(0, ring.count)).sort((a, b) => a - b);
  const at = (q: number) => arr[Math.min(arr.length - 1, Math.floor(arr.length * q))] ?? 0;
  return Object.freeze({
    count: ring.count,
    avg: ring.sum / ring.count,
    p50: at(0.5),
    p95: at(0.95),
    max: ring.max,
  });
}

export class FrameTimer {
  private readonly enabled: boolean;
  private readonly clock: () => number;
  private readonly rings = new Map<FramePhase, PhaseRing>();

  constructor(enabled: boolean, clock: () => number) {
    this.enabled = enabled;
    this.clock = clock;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /** Time `fn` under `phase`; returns its result. */
  measure<T>(phase: FramePhase, fn: () => T): T {
    if (!this.enabled) return fn();
    const start = this.clock();
    try {
      return fn();
    } finally {
      this.record(phase, this.clock() - start);
    }
  }

  /** Record a duration directly (for timings computed elsewhere). */
  record(phase: FramePhase, durationMs: number): void {
    if (!this.enabled) return;
    let ring = this.rings.get(phase);
    if (!ring) {
      ring = createPhaseRing();
      this.rings.set(phase, ring);
    }
    recordSample(ring, durationMs);
  }

  snapshot(): PerfSnapshot {
    const phases: { [K in FramePhase]?: PhaseStats } = {};
    for (const p of FRAME_PHASES) {
      const ring = this.rings.get(p);
      const stats = ring ? computeStats(ring) : null;
      if (stats) phases[p] = stats;
    }
    return Object.freeze({ phases: Object.freeze(phases) });
  }

  reset(): void {
    this.rings.clear();
  }
}
