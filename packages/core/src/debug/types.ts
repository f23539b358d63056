/**
 * packages/core/src/debug/types.ts — Debug log record types.
 *
 * @see ./debugLog.ts
 */

/**
 * Record categories.
 *
 *   - frame: frame scheduling and lifecycle
 *   - layout: style, layout and paint pipeline
 *   - script: script tasks, callbacks, listeners, timers
 *   - task: browser tasks run by the main loop
 *   - input: input routing
 *   - load: page loads and navigation
 *   - compositor: commit, draw and the compositor loop
 */
export type DebugCategory = "frame" | "layout" | "script" | "task" | "input" | "load" | "compositor";

/** Severity levels, low to high. */
export type DebugSeverity = "trace" | "info" | "warn" | "error";

export const DEBUG_SEVERITY_RANK: Readonly<Record<DebugSeverity, number>> = Object.freeze({
  trace: 0,
  info: 1,
  warn: 2,
  error: 3,
});

export type DebugRecord = Readonly<{
  /** Monotonic record counter. */
  recordId: number;
  /** Host clock time of the record. */
  timestampMs: number;
  /** Frame being produced when the record was written (0 before the first). */
  frameId: number;
  category: DebugCategory;
  severity: DebugSeverity;
  message: string;
}>;

export type DebugConfig = Readonly<{
  /** Ring capacity in records. */
  capacity: number;
  /** Records below this severity are dropped. */
  minSeverity: DebugSeverity;
  /** Echo warn/error records to the console. */
  echo: boolean;
}>;

export type DebugQuery = Readonly<{
  categories?: readonly DebugCategory[];
  minSeverity?: DebugSeverity;
  /** Return at most this many of the newest matches. */
  limit?: number;
}>;

export type DebugStats = Readonly<{
  totalRecords: number;
  totalDropped: number;
  errorCount: number;
  warnCount: number;
  currentRingUsage: number;
  ringCapacity: number;
}>;
