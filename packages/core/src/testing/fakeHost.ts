/**
 * packages/core/src/testing/fakeHost.ts — Virtual-time RuntimeHost.
 *
 * Why: Cadence and thread-isolation behaviour depends on timer order, not on
 * wall time. This host fires timers in (due time, creation order) and only
 * when the test advances the clock, so frame timing is exact and repeatable.
 *
 * Between timer callbacks the host yields one macrotask, so promise chains
 * started by a callback (an awaited task, a resolved sleep) settle before the
 * next timer fires.
 */

import type { RuntimeHost, TimerHandle } from "../host.js";

type PendingTimer = {
  readonly id: number;
  readonly at: number;
  readonly seq: number;
  readonly callback: () => void;
};

type Yield = (resolve: () => void) => void;

const yieldMacrotask: Yield = (() => {
  const g = globalThis as {
    setImmediate?: (cb: () => void) => unknown;
    setTimeout?: (cb: () => void, ms: number) => unknown;
  };
  const immediate = g.setImmediate;
  if (typeof immediate === "function") return (resolve: () => void) => void immediate(resolve);
  const timeout = g.setTimeout;
  if (typeof timeout === "function") return (resolve: () => void) => void timeout(resolve, 0);
  return (resolve: () => void) => queueMicrotask(resolve);
})();

/** Let pending promise callbacks run. */
export function settle(): Promise<void> {
  return new Promise<void>((resolve) => yieldMacrotask(resolve));
}

export class FakeHost implements RuntimeHost {
  private time: number;
  private nextId = 1;
  private nextSeq = 0;
  private timers: PendingTimer[] = [];

  constructor(startMs = 0) {
    this.time = startMs;
  }

  now(): number {
    return this.time;
  }

  setTimer(callback: () => void, delayMs: number): TimerHandle {
    const delay = Number.isFinite(delayMs) && delayMs > 0 ? delayMs : 0;
    const timer: PendingTimer = {
      id: this.nextId++,
      at: this.time + delay,
      seq: this.nextSeq++,
      callback,
    };
    this.timers.push(timer);
    return { id: timer.id };
  }

  clearTimer(handle: TimerHandle): void {
    this.timers = this.timers.filter((t) => t.id !== handle.id);
  }

  sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      this.setTimer(resolve, ms);
    });
  }

  get pendingTimers(): number {
    return this.timers.length;
  }

  /** Simulate synchronous work: move the clock without firing timers. */
  spend(ms: number): void {
    if (ms > 0) this.time += ms;
  }

  private takeDue(limit: number): PendingTimer | null {
    let best: PendingTimer | null = null;
    for (const t of this.timers) {
      if (t.at > limit) continue;
      if (best === null || t.at < best.at || (t.at === best.at && t.seq < best.seq)) best = t;
    }
    if (best === null) return null;
    const picked = best;
    this.timers = this.timers.filter((t) => t !== picked);
    return picked;
  }

  /**
   * Advance virtual time by `ms`, firing every timer that falls due on the
   * way. The clock never moves backwards: a timer that became overdue while
   * a callback spent time fires at the current time.
   */
  async advance(ms: number): Promise<void> {
    const target = this.time + Math.max(0, ms);
    await settle();
    for (;;) {
      const next = this.takeDue(Math.max(target, this.time));
      if (next === null) break;
      if (next.at > this.time) this.time = next.at;
      next.callback();
      await settle();
    }
    if (this.time < target) this.time = target;
    await settle();
  }
}
