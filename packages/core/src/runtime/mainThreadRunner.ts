/**
 * packages/core/src/runtime/mainThreadRunner.ts — The main thread's event loop.
 *
 * Loop iteration:
 *   1. take-and-clear the "animation frame scheduled" flag under the lock
 *   2. if it was set, run the tab's animation frame
 *   3. run at most one browser task, then at most one script task
 *   4. sleep mainTickMs
 *
 * Tasks may be async; the loop awaits them, which suspends only this loop.
 * A task that throws or rejects is logged and the loop continues. Tab
 * commands posted by the compositor become browser tasks.
 */

import type { MainThreadPort } from "../compositor/compositor.js";
import type { DebugCategory } from "../debug/types.js";
import type { DebugLog } from "../debug/debugLog.js";
import { WmError, describeThrown } from "../errors.js";
import type { RuntimeHost } from "../host.js";
import { type TabCommand, type TabCommandTarget, runTabCommand } from "../tab/commands.js";
import { Lock, isThenable } from "../tasks/lock.js";
import { Task } from "../tasks/task.js";
import { TaskQueue } from "../tasks/taskQueue.js";

/** Receiver of frames posted by the compositor's frame timer. */
export interface AnimationFrameTarget {
  runAnimationFrame(scroll: number): void;
}

/** The tab a runner drives. */
export type MainThreadTarget = AnimationFrameTarget & TabCommandTarget;

export type MainThreadRunnerOptions = Readonly<{
  host: RuntimeHost;
  log: DebugLog;
  mainTickMs: number;
}>;

export class MainThreadRunner implements MainThreadPort {
  readonly lock = new Lock("main-thread");
  readonly browserTasks = new TaskQueue(this.lock);
  readonly scriptTasks = new TaskQueue(this.lock);

  private readonly host: RuntimeHost;
  private readonly log: DebugLog;
  private readonly mainTickMs: number;
  private target: MainThreadTarget | null = null;
  private frameScheduled = false;
  private frameScroll = 0;
  private stopped = false;
  private running = false;

  constructor(opts: MainThreadRunnerOptions) {
    this.host = opts.host;
    this.log = opts.log;
    this.mainTickMs = opts.mainTickMs;
  }

  /** Bind the tab whose frames this loop runs. */
  attach(target: MainThreadTarget): void {
    this.target = target;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Called from the compositor's frame timer. */
  scheduleAnimationFrame(scroll: number): void {
    this.lock.withLock(() => {
      this.frameScheduled = true;
      this.frameScroll = scroll;
    });
  }

  postTabCommand(command: TabCommand): void {
    this.browserTasks.addTask(
      Task.named(command.op, () => {
        const target = this.target;
        if (target === null) throw new WmError("WM_INVALID_STATE", `${command.op} posted before a tab was attached`);
        return runTabCommand(target, command);
      }),
    );
  }

  private takeScheduledFrame(): number | null {
    return this.lock.withLock(() => {
      if (!this.frameScheduled) return null;
      this.frameScheduled = false;
      return this.frameScroll;
    });
  }

  private async execute(task: Task, category: DebugCategory): Promise<void> {
    try {
      const result = task.run();
      if (isThenable(result)) await result;
    } catch (e: unknown) {
      this.log.error(category, `${task.label} failed: ${describeThrown(e)}`);
    }
  }

  /** One loop iteration without the trailing sleep. */
  async runOnce(): Promise<void> {
    const scroll = this.takeScheduledFrame();
    if (scroll !== null && this.target !== null) {
      try {
        this.target.runAnimationFrame(scroll);
      } catch (e: unknown) {
        this.log.error("frame", `animation frame failed: ${describeThrown(e)}`);
      }
    }

    const browserTask = this.browserTasks.takeNext();
    if (browserTask) await this.execute(browserTask, "task");

    const scriptTask = this.scriptTasks.takeNext();
    if (scriptTask) await this.execute(scriptTask, "script");
  }

  /** Run until stop(). Resolves after the iteration in progress finishes. */
  async run(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.stopped = false;
    try {
      while (!this.stopped) {
        await this.runOnce();
        if (this.stopped) break;
        await this.host.sleep(this.mainTickMs);
      }
    } finally {
      this.running = false;
    }
  }

  stop(): void {
    this.stopped = true;
  }
}
