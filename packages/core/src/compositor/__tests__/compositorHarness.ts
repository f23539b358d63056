import { resolveBrowserConfig } from "../../app/config.js";
import { createDebugLog } from "../../debug/debugLog.js";
import { createDisplayListBuilder } from "../../displayList/builder.js";
import type { DisplayList } from "../../displayList/types.js";
import { FrameState } from "../../frame/frameState.js";
import { FontCache, createFixedWidthFontLoader } from "../../layout/fonts.js";
import { FrameTimer } from "../../perf/frameTimer.js";
import { Lock, isThenable } from "../../tasks/lock.js";
import { TaskQueue } from "../../tasks/taskQueue.js";
import { FakeHost } from "../../testing/fakeHost.js";
import { RecordingSurface } from "../../testing/recordingSurface.js";
import { type TabCommandTarget, runTabCommand } from "../../tab/commands.js";
import { Task } from "../../tasks/task.js";
import { Compositor } from "../compositor.js";

export function makeCompositor() {
  const host = new FakeHost();
  const config = resolveBrowserConfig({ perf: false, debug: { minSeverity: "trace", echo: false } });
  const lock = new Lock("compositor");
  const frame = new FrameState(lock);
  const browserTasks = new TaskQueue(new Lock("main-thread"));
  const scheduled: number[] = [];
  const calls: string[] = [];
  const tab: TabCommandTarget = {
    click: async (x, y) => void calls.push(`click ${String(x)},${String(y)}`),
    keypress: (c) => void calls.push(`keypress ${c}`),
    enter: async () => void calls.push("enter"),
    advanceFocus: () => void calls.push("advanceFocus"),
    zoomBy: (d) => void calls.push(`zoom ${String(d)}`),
    goBack: async () => void calls.push("goBack"),
    load: async (url) => void calls.push(`load ${url}`),
  };
  const surface = new RecordingSurface(config.width, config.height, () => host.now());
  let quits = 0;
  const compositor = new Compositor({
    host,
    config,
    surface,
    fonts: new FontCache(createFixedWidthFontLoader()),
    frame,
    lock,
    mainThread: {
      postTabCommand: (command) => browserTasks.addTask(Task.named(command.op, () => runTabCommand(tab, command))),
      scheduleAnimationFrame: (s) => void scheduled.push(s),
    },
    log: createDebugLog({ config: config.debug, clock: () => host.now() }),
    perf: new FrameTimer(false, () => host.now()),
    onQuit: () => {
      quits++;
    },
  });
  return {
    host,
    config,
    lock,
    frame,
    compositor,
    surface,
    scheduled,
    calls,
    browserTasks,
    quits: () => quits,
    requestFrame(): void {
      compositor.requestAnimationFrame();
    },
    /** Run posted browser tasks the way the main loop would. */
    async runPosted(): Promise<void> {
      for (let t = browserTasks.takeNext(); t !== null; t = browserTasks.takeNext()) {
        const r = t.run();
        if (isThenable(r)) await r;
      }
    },
  };
}

export function rects(...ys: Array<[number, string]>): DisplayList {
  const b = createDisplayListBuilder();
  for (const [y, color] of ys) b.fillRect(0, y, 10, 10, color);
  const res = b.build();
  if (!res.ok) throw new Error(res.error.detail);
  return res.list;
}
