import { assert, describe, test } from "@waymark/testkit";
import { FrameTimer } from "../frameTimer.js";

function steppingClock(step: number): () => number {
  let t = 0;
  return () => {
    const now = t;
    t += step;
    return now;
  };
}

describe("FrameTimer", () => {
  test("disabled timer runs the callback and records nothing", () => {
    const timer = new FrameTimer(false, steppingClock(1));
    assert.equal(
      timer.measure("paint", () => 7),
      7,
    );
    assert.deepEqual(timer.snapshot().phases, {});
  });

  test("measure records durations per phase", () => {
    const timer = new FrameTimer(true, steppingClock(2));
    timer.measure("paint", () => undefined);
    timer.record("paint", 10);
    timer.record("draw", 1);
    const snap = timer.snapshot();
    assert.deepEqual(snap.phases.paint, { count: 2, avg: 6, p50: 10, p95: 10, max: 10 });
    assert.deepEqual(snap.phases.draw, { count: 1, avg: 1, p50: 1, p95: 1, max: 1 });
    assert.equal(snap.phases.commit, undefined);
  });

  test("measure records even when the callback throws", () => {
    const timer = new FrameTimer(true, steppingClock(3));
    assert.throws(() =>
      timer.measure("commit", () => {
        throw new Error("boom");
      }),
    );
    assert.equal(timer.snapshot().phases.commit?.count, 1);
    timer.reset();
    assert.deepEqual(timer.snapshot().phases, {});
  });

  test("ring keeps the newest 512 samples", () => {
    const timer = new FrameTimer(true, () => 0);
    for (let i = 0; i < 600; i++) timer.record("style", i < 88 ? 1000 : 1);
    const stats = timer.snapshot().phases.style;
    assert.equal(stats?.count, 512);
    assert.equal(stats?.avg, 1);
    assert.equal(stats?.max, 1000);
  });
});
