/**
 * packages/core/src/frame/frameState.ts — Per-browser frame request flags.
 *
 * Ownership:
 *   - needsAnimationFrame: shared; read and written only while the
 *     compositor lock is held (enforced)
 *   - needsRafCallbacks, needsLayoutTreeRebuild, reflowRoots: main thread only
 */

import { WmError } from "../errors.js";
import { ReflowRootSet } from "../layout/engine/reflowRoots.js";
import type { Lock } from "../tasks/lock.js";

export class FrameState {
  private readonly compositorLock: Lock;
  private animationFrameRequested = false;

  needsRafCallbacks = false;
  needsLayoutTreeRebuild = false;
  readonly reflowRoots = new ReflowRootSet();

  constructor(compositorLock: Lock) {
    this.compositorLock = compositorLock;
  }

  private assertLocked(op: string): void {
    if (!this.compositorLock.held) {
      throw new WmError("WM_INVALID_STATE", `${op} outside the ${this.compositorLock.name} lock`);
    }
  }

  get needsAnimationFrame(): boolean {
    this.assertLocked("needsAnimationFrame read");
    return this.animationFrameRequested;
  }

  set needsAnimationFrame(value: boolean) {
    this.assertLocked("needsAnimationFrame write");
    this.animationFrameRequested = value;
  }

  /** Drop every pending request; used when the tab is torn down. */
  reset(): void {
    this.compositorLock.withLock(() => {
      this.animationFrameRequested = false;
    });
    this.needsRafCallbacks = false;
    this.needsLayoutTreeRebuild = false;
    this.reflowRoots.clear();
  }
}
