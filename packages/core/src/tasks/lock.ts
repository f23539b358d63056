/**
 * packages/core/src/tasks/lock.ts — Scoped critical sections.
 *
 * The main loop and the compositor loop share one JavaScript thread, so a
 * critical section that never awaits is atomic with respect to the other
 * loop. withLock() enforces that shape: the callback must return
 * synchronously, and acquiring a lock that is already held (which would
 * deadlock a threaded runtime) throws instead of proceeding.
 */

import { WmError } from "../errors.js";

export function isThenable(v: unknown): v is PromiseLike<unknown> {
  return (
    (typeof v === "object" || typeof v === "function") &&
    v !== null &&
    "then" in v &&
    typeof v.then === "function"
  );
}

export class Lock {
  readonly name: string;
  private heldFlag = false;
  private acquisitions = 0;

  constructor(name: string) {
    this.name = name;
  }

  get held(): boolean {
    return this.heldFlag;
  }

  /** Number of completed or in-progress acquisitions; test observability. */
  get acquireCount(): number {
    return this.acquisitions;
  }

  withLock<T>(fn: () => T): T {
    if (this.heldFlag) {
      throw new WmError("WM_REENTRANT_CALL", `${this.name}: lock is already held`);
    }
    this.heldFlag = true;
    this.acquisitions++;
    try {
      const result = fn();
      if (isThenable(result)) {
        throw new WmError("WM_INVALID_STATE", `${this.name}: critical section must be synchronous`);
      }
      return result;
    } finally {
      this.heldFlag = false;
    }
  }
}
