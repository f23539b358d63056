/**
 * packages/core/src/debug/debugLog.ts — In-memory debug log.
 *
 * Records go into a fixed-capacity ring; the oldest are overwritten once it
 * is full. warn and error records are also echoed to the console with a
 * `[waymark][<category>]` prefix unless echo is off.
 */

import {
  DEBUG_SEVERITY_RANK,
  type DebugCategory,
  type DebugConfig,
  type DebugQuery,
  type DebugRecord,
  type DebugSeverity,
  type DebugStats,
} from "./types.js";

export type DebugRecordHandler = (record: DebugRecord) => void;

export type DebugLog = Readonly<{
  log(category: DebugCategory, severity: DebugSeverity, message: string): void;
  trace(category: DebugCategory, message: string): void;
  info(category: DebugCategory, message: string): void;
  warn(category: DebugCategory, message: string): void;
  error(category: DebugCategory, message: string): void;
  /** Frame id stamped on subsequent records. */
  setFrameId(frameId: number): void;
  query(query?: DebugQuery): readonly DebugRecord[];
  stats(): DebugStats;
  /** Returns an unsubscribe function. */
  subscribe(handler: DebugRecordHandler): () => void;
  clear(): void;
}>;

export type CreateDebugLogOptions = Readonly<{
  config: DebugConfig;
  clock: () => number;
}>;

function echo(record: DebugRecord): void {
  const c = (
    globalThis as {
      console?: { warn?: (msg: string) => void; error?: (msg: string) => void };
    }
  ).console;
  const line = `[waymark][${record.category}] ${record.message}`;
  if (record.severity === "error") c?.error?.(line);
  else c?.warn?.(line);
}

export function createDebugLog(opts: CreateDebugLogOptions): DebugLog {
  const { config, clock } = opts;
  const capacity = Math.max(1, config.capacity);
  const minRank = DEBUG_SEVERITY_RANK[config.minSeverity];
  const ring: Array<DebugRecord | undefined> = new Array<DebugRecord | undefined>(capacity);
  let cursor = 0;
  let used = 0;
  let nextId = 1;
  let frameId = 0;
  let totalRecords = 0;
  let totalDropped = 0;
  let errorCount = 0;
  let warnCount = 0;
  const handlers = new Set<DebugRecordHandler>();

  const ordered = (): DebugRecord[] => {
    const out: DebugRecord[] = [];
    const start = used < capacity ? 0 : cursor;
    for (let i = 0; i < used; i++) {
      const r = ring[(start + i) % capacity];
      if (r) out.push(r);
    }
    return out;
  };

  const log = (category: DebugCategory, severity: DebugSeverity, message: string): void => {
    if (DEBUG_SEVERITY_RANK[severity] < minRank) return;
    const record: DebugRecord = Object.freeze({
      recordId: nextId++,
      timestampMs: clock(),
      frameId,
      category,
      severity,
      message,
    });
    if (used === capacity) totalDropped++;
    ring[cursor] = record;
    cursor = (cursor + 1) % capacity;
    used = Math.min(used + 1, capacity);
    totalRecords++;
    if (severity === "error") errorCount++;
    if (severity === "warn") warnCount++;
    if (config.echo && DEBUG_SEVERITY_RANK[severity] >= DEBUG_SEVERITY_RANK.warn) echo(record);
    for (const handler of handlers) handler(record);
  };

  return Object.freeze({
    log,
    trace: (category: DebugCategory, message: string) => log(category, "trace", message),
    info: (category: DebugCategory, message: string) => log(category, "info", message),
    warn: (category: DebugCategory, message: string) => log(category, "warn", message),
    error: (category: DebugCategory, message: string) => log(category, "error", message),
    setFrameId(id: number): void {
      frameId = id;
    },
    query(query: DebugQuery = {}): readonly DebugRecord[] {
      const categories = query.categories ? new Set(query.categories) : null;
      const qMin = query.minSeverity ? DEBUG_SEVERITY_RANK[query.minSeverity] : 0;
      const matches = ordered().filter(
        (r) => (categories === null || categories.has(r.category)) && DEBUG_SEVERITY_RANK[r.severity] >= qMin,
      );
      const limit = query.limit;
      if (limit !== undefined && limit >= 0 && matches.length > limit) {
        return Object.freeze(matches.slice(matches.length - limit));
      }
      return Object.freeze(matches);
    },
    stats(): DebugStats {
      return Object.freeze({
        totalRecords,
        totalDropped,
        errorCount,
        warnCount,
        currentRingUsage: used,
        ringCapacity: capacity,
      });
    },
    subscribe(handler: DebugRecordHandler): () => void {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },
    clear(): void {
      ring.fill(undefined);
      cursor = 0;
      used = 0;
    },
  });
}
