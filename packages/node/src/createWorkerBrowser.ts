/**
 * packages/node/src/createWorkerBrowser.ts — Browser whose main thread runs
 * in a worker thread.
 *
 * Threads:
 *   - this thread: compositor loop, chrome, surface
 *   - worker (mainThreadWorker.ts): tab, scripts, layout, paint
 *
 * Tab commands and frame ticks are posted to the worker; frame requests and
 * commits come back. CommitData crosses by structured clone, which gives
 * the compositor its own copy of the display list.
 */

import type { Writable } from "node:stream";
import { Worker } from "node:worker_threads";
import {
  type BrowserConfig,
  type BrowserInput,
  Compositor,
  type DebugLog,
  FontCache,
  type FontLoader,
  FrameState,
  FrameTimer,
  Lock,
  type MainThreadPort,
  type ResolvedBrowserConfig,
  type Surface,
  type SurfaceFactory,
  type TabCommand,
  createDebugLog,
  createFixedWidthFontLoader,
  describeThrown,
  resolveBrowserConfig,
} from "@waymark/core";
import { createNodeHost } from "./host/nodeHost.js";
import { FrameLogSurface } from "./streams/frameLogSurface.js";
import {
  type MainThreadWorkerData,
  type MainToWorkerMessage,
  type WorkerToMainMessage,
  isWorkerToMainMessage,
} from "./worker/protocol.js";

export type CreateWorkerBrowserOptions = Readonly<{
  /**
   * URL of the module the worker imports for its loaders. It must export
   * `createPageLoader()` and may export `createFontLoader()`.
   */
  pageModule: string | URL;
  config?: BrowserConfig;
  /** Fonts for the chrome drawn on this thread. Defaults to fixed-width. */
  fontLoader?: FontLoader;
  /** Custom surface; by default frames are logged to `stream`. */
  surface?: Surface | SurfaceFactory;
  /** Stream for the default frame-log surface. Defaults to stdout. */
  stream?: Writable;
}>;

export type WorkerBrowser = Readonly<{
  config: ResolvedBrowserConfig;
  compositor: Compositor;
  surface: Surface;
  frame: FrameState;
  fonts: FontCache;
  log: DebugLog;
  perf: FrameTimer;
  /** Spawn the worker and start the compositor; resolves when the worker exits. */
  start(): Promise<void>;
  /** Queue a page load on the worker's main thread. */
  load(url: string): void;
  dispatchInput(event: BrowserInput): void;
  /** Stop the compositor and terminate the worker. */
  shutdown(): void;
}>;

// Under tsx the sources run as .ts; the build emits .js beside each other.
const WORKER_EXT = import.meta.url.endsWith(".ts") ? ".ts" : ".js";

export function createWorkerBrowser(opts: CreateWorkerBrowserOptions): WorkerBrowser {
  const config = resolveBrowserConfig(opts.config);
  const surface =
    opts.surface === undefined
      ? new FrameLogSurface({
          width: config.width,
          height: config.height,
          stream: opts.stream ?? process.stdout,
        })
      : typeof opts.surface === "function"
        ? opts.surface(config)
        : opts.surface;
  const host = createNodeHost();
  const log = createDebugLog({ config: config.debug, clock: () => host.now() });
  const perf = new FrameTimer(config.perf, () => host.now());
  const fonts = new FontCache(opts.fontLoader ?? createFixedWidthFontLoader());
  const compositorLock = new Lock("compositor");
  const frame = new FrameState(compositorLock);
  const pageModule = typeof opts.pageModule === "string" ? opts.pageModule : opts.pageModule.href;

  let worker: Worker | null = null;
  let started = false;
  // Messages posted before start() are delivered once the worker exists.
  const pending: MainToWorkerMessage[] = [];

  const send = (msg: MainToWorkerMessage): void => {
    if (worker === null) {
      pending.push(msg);
      return;
    }
    worker.postMessage(msg);
  };

  const mainThread: MainThreadPort = {
    postTabCommand: (command: TabCommand) => send({ type: "command", command }),
    scheduleAnimationFrame: (scroll: number) => send({ type: "frame", scroll }),
  };

  const compositor = new Compositor({
    host,
    config,
    surface,
    fonts,
    frame,
    lock: compositorLock,
    mainThread,
    log,
    perf,
    onQuit: () => send({ type: "stop" }),
  });

  const handleWorkerMessage = (msg: WorkerToMainMessage): void => {
    switch (msg.type) {
      case "ready":
        log.info("task", "main-thread worker ready");
        return;
      case "requestFrame":
        compositor.requestAnimationFrame();
        return;
      case "commit":
        compositor.commit(msg.data);
        return;
      case "fatal":
        log.error("task", `main-thread worker failed: ${msg.detail}`);
        compositor.stop();
        return;
    }
  };

  const shutdown = (): void => {
    compositor.stop();
    const w = worker;
    if (w === null) return;
    w.terminate().catch((e: unknown) => {
      log.warn("task", `worker terminate failed: ${describeThrown(e)}`);
    });
  };

  return Object.freeze({
    config,
    compositor,
    surface,
    frame,
    fonts,
    log,
    perf,
    start(): Promise<void> {
      if (started) return Promise.reject(new Error("createWorkerBrowser: already started"));
      started = true;
      const workerData: MainThreadWorkerData = { pageModule, config };
      const entry = new URL(`./worker/mainThreadWorker${WORKER_EXT}`, import.meta.url);
      const w = new Worker(entry, { workerData });
      worker = w;
      const exited = new Promise<void>((resolve) => {
        w.on("exit", (code) => {
          if (code !== 0) log.error("task", `main-thread worker exited with code ${code}`);
          compositor.stop();
          resolve();
        });
      });
      w.on("message", (m: unknown) => {
        if (!isWorkerToMainMessage(m)) return;
        handleWorkerMessage(m);
      });
      w.on("error", (err) => {
        log.error("task", `main-thread worker error: ${describeThrown(err)}`);
      });
      for (const msg of pending.splice(0)) w.postMessage(msg);
      compositor.start();
      return exited;
    },
    load(url: string): void {
      mainThread.postTabCommand({ op: "load", url });
    },
    dispatchInput(event: BrowserInput): void {
      compositor.dispatchInput(event);
    },
    shutdown,
  });
}
