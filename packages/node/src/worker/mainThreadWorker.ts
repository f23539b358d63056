/**
 * packages/node/src/worker/mainThreadWorker.ts — Worker-thread entrypoint
 * running the tab and its main-thread loop.
 *
 * The parent thread keeps the compositor. Scripts and layout run here, so a
 * script that blocks this thread never stalls scrolling or drawing.
 *
 * The page module named in workerData supplies the PageLoader (and
 * optionally the FontLoader); loaders hold functions and cannot be cloned
 * across the boundary themselves.
 */

import { parentPort, workerData } from "node:worker_threads";
import {
  type FontLoader,
  FontCache,
  FrameState,
  FrameTimer,
  Lock,
  MainThreadRunner,
  type PageLoader,
  Tab,
  createDebugLog,
  createFixedWidthFontLoader,
  describeThrown,
  resolveBrowserConfig,
} from "@waymark/core";
import { createNodeHost } from "../host/nodeHost.js";
import {
  type MainToWorkerMessage,
  type WorkerToMainMessage,
  isMainThreadWorkerData,
  isMainToWorkerMessage,
} from "./protocol.js";

type PageModule = Readonly<{
  createPageLoader: () => PageLoader;
  createFontLoader?: () => FontLoader;
}>;

function isPageModule(v: unknown): v is PageModule {
  if (typeof v !== "object" || v === null) return false;
  if (!("createPageLoader" in v) || typeof v.createPageLoader !== "function") return false;
  return !("createFontLoader" in v) || v.createFontLoader === undefined || typeof v.createFontLoader === "function";
}

if (parentPort === null) {
  throw new Error("mainThreadWorker: parentPort is null (not running in worker_threads)");
}
const port = parentPort;

function postToMain(msg: WorkerToMainMessage): void {
  port.postMessage(msg);
}

async function main(): Promise<void> {
  const data: unknown = workerData;
  if (!isMainThreadWorkerData(data)) {
    throw new Error("mainThreadWorker: workerData must carry pageModule and config");
  }
  const pageModule: unknown = await import(data.pageModule);
  if (!isPageModule(pageModule)) {
    throw new Error(`mainThreadWorker: ${data.pageModule} does not export createPageLoader()`);
  }

  const config = resolveBrowserConfig(data.config);
  const host = createNodeHost();
  const log = createDebugLog({ config: config.debug, clock: () => host.now() });
  const perf = new FrameTimer(config.perf, () => host.now());
  const fonts = new FontCache(pageModule.createFontLoader?.() ?? createFixedWidthFontLoader());
  const runner = new MainThreadRunner({ host, log, mainTickMs: config.mainTickMs });
  // The compositor's FrameState lives in the parent; this one carries only
  // the main-thread flags. Frame requests leave as messages.
  const tab = new Tab({
    host,
    config,
    loader: pageModule.createPageLoader(),
    fonts,
    frame: new FrameState(new Lock("compositor")),
    compositor: {
      requestAnimationFrame: () => postToMain({ type: "requestFrame" }),
      commit: (commitData) => postToMain({ type: "commit", data: commitData }),
    },
    scriptTasks: runner.scriptTasks,
    log,
    perf,
  });
  runner.attach(tab);

  const onMessage = (msg: MainToWorkerMessage): void => {
    switch (msg.type) {
      case "command":
        runner.postTabCommand(msg.command);
        return;
      case "frame":
        runner.scheduleAnimationFrame(msg.scroll);
        return;
      case "stop":
        runner.stop();
        tab.close();
        return;
    }
  };
  port.on("message", (m: unknown) => {
    if (!isMainToWorkerMessage(m)) return;
    onMessage(m);
  });

  postToMain({ type: "ready" });
  await runner.run();
  port.close();
}

main().catch((e: unknown) => {
  postToMain({ type: "fatal", detail: describeThrown(e) });
  port.close();
});
