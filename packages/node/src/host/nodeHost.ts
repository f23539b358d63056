/**
 * packages/node/src/host/nodeHost.ts — RuntimeHost backed by Node timers.
 */

import { performance } from "node:perf_hooks";
import { clearTimeout, setTimeout } from "node:timers";
import { setTimeout as sleep } from "node:timers/promises";
import type { RuntimeHost, TimerHandle } from "@waymark/core";

export type NodeHostOptions = Readonly<{
  /**
   * Keep the event loop alive while timers are pending. Defaults to true;
   * tests that must not hang on a forgotten timer pass false.
   */
  ref?: boolean;
}>;

export function createNodeHost(opts: NodeHostOptions = {}): RuntimeHost {
  const ref = opts.ref !== false;
  const timers = new Map<number, ReturnType<typeof setTimeout>>();
  let nextId = 1;

  return Object.freeze({
    now: () => performance.now(),
    setTimer(callback: () => void, delayMs: number): TimerHandle {
      const id = nextId++;
      const t = setTimeout(
        () => {
          timers.delete(id);
          callback();
        },
        Math.max(0, delayMs),
      );
      if (!ref) t.unref();
      timers.set(id, t);
      return { id };
    },
    clearTimer(handle: TimerHandle): void {
      const t = timers.get(handle.id);
      if (t === undefined) return;
      clearTimeout(t);
      timers.delete(handle.id);
    },
    sleep: (ms: number) => sleep(Math.max(0, ms), undefined, { ref }),
  });
}
