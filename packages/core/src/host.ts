/**
 * Host interface for time and timers.
 *
 * Core never imports Node modules; the Node package and the virtual-time
 * test host both implement this contract.
 */

/** Opaque handle returned by setTimer. */
export type TimerHandle = Readonly<{ id: number }>;

export interface RuntimeHost {
  /** Monotonic clock in milliseconds. */
  now(): number;

  /** Run `callback` once after `delayMs`. */
  setTimer(callback: () => void, delayMs: number): TimerHandle;

  /** Cancel a pending timer. Idempotent. */
  clearTimer(handle: TimerHandle): void;

  /** Resolve after `ms` milliseconds. */
  sleep(ms: number): Promise<void>;
}
