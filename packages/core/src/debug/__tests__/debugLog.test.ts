import { assert, describe, test } from "@waymark/testkit";
import { createDebugLog } from "../debugLog.js";
import type { DebugConfig, DebugRecord } from "../types.js";

function makeLog(config: Partial<DebugConfig> = {}) {
  let now = 0;
  const log = createDebugLog({
    config: { capacity: 8, minSeverity: "trace", echo: false, ...config },
    clock: () => now,
  });
  return {
    log,
    setNow(t: number) {
      now = t;
    },
  };
}

describe("debug log", () => {
  test("records carry id, time, frame and category", () => {
    const { log, setNow } = makeLog();
    setNow(5);
    log.info("load", "loading /a");
    log.setFrameId(3);
    setNow(9);
    log.warn("script", "slow");
    assert.deepEqual(log.query(), [
      { recordId: 1, timestampMs: 5, frameId: 0, category: "load", severity: "info", message: "loading /a" },
      { recordId: 2, timestampMs: 9, frameId: 3, category: "script", severity: "warn", message: "slow" },
    ]);
  });

  test("records below minSeverity are dropped", () => {
    const { log } = makeLog({ minSeverity: "warn" });
    log.trace("frame", "a");
    log.info("frame", "b");
    log.error("frame", "c");
    assert.deepEqual(
      log.query().map((r) => r.message),
      ["c"],
    );
    assert.equal(log.stats().totalRecords, 1);
  });

  test("query filters by category and severity and limits to the newest", () => {
    const { log } = makeLog();
    log.trace("frame", "f1");
    log.info("layout", "l1");
    log.warn("frame", "f2");
    log.trace("frame", "f3");
    assert.deepEqual(
      log.query({ categories: ["frame"] }).map((r) => r.message),
      ["f1", "f2", "f3"],
    );
    assert.deepEqual(
      log.query({ minSeverity: "info" }).map((r) => r.message),
      ["l1", "f2"],
    );
    assert.deepEqual(
      log.query({ categories: ["frame"], limit: 2 }).map((r) => r.message),
      ["f2", "f3"],
    );
  });

  test("ring overwrites the oldest records and counts drops", () => {
    const { log } = makeLog({ capacity: 3 });
    for (let i = 1; i <= 5; i++) log.info("task", `m${String(i)}`);
    assert.deepEqual(
      log.query().map((r) => r.message),
      ["m3", "m4", "m5"],
    );
    assert.deepEqual(log.stats(), {
      totalRecords: 5,
      totalDropped: 2,
      errorCount: 0,
      warnCount: 0,
      currentRingUsage: 3,
      ringCapacity: 3,
    });
    log.clear();
    assert.equal(log.query().length, 0);
    assert.equal(log.stats().currentRingUsage, 0);
  });

  test("subscribers see records until they unsubscribe", () => {
    const { log } = makeLog();
    const seen: DebugRecord[] = [];
    const off = log.subscribe((r) => seen.push(r));
    log.error("compositor", "x");
    off();
    log.error("compositor", "y");
    assert.deepEqual(
      seen.map((r) => r.message),
      ["x"],
    );
    assert.equal(log.stats().errorCount, 2);
  });
});
