/**
 * packages/core/src/browser.ts — Wires the tab, both loops and shared state.
 *
 * Ownership:
 *   - compositor lock: guards FrameState.needsAnimationFrame and compositor state
 *   - main-thread lock: guards the task queues and the scheduled-frame flag
 */

import { type BrowserConfig, type ResolvedBrowserConfig, resolveBrowserConfig } from "./app/config.js";
import { Compositor } from "./compositor/compositor.js";
import type { BrowserInput } from "./compositor/input.js";
import type { Surface } from "./compositor/surface.js";
import { type DebugLog, createDebugLog } from "./debug/debugLog.js";
import { WmError } from "./errors.js";
import { FrameState } from "./frame/frameState.js";
import type { RuntimeHost } from "./host.js";
import { FontCache, type FontLoader, createFixedWidthFontLoader } from "./layout/fonts.js";
import { FrameTimer } from "./perf/frameTimer.js";
import { MainThreadRunner } from "./runtime/mainThreadRunner.js";
import type { PageLoader } from "./tab/pageLoader.js";
import { Tab } from "./tab/tab.js";
import { Lock } from "./tasks/lock.js";

/** Builds the surface once the configuration is resolved. */
export type SurfaceFactory = (config: ResolvedBrowserConfig) => Surface;

export type CreateBrowserOptions = Readonly<{
  host: RuntimeHost;
  surface: Surface | SurfaceFactory;
  loader: PageLoader;
  /** Defaults to the fixed-width loader. */
  fontLoader?: FontLoader;
  config?: BrowserConfig;
}>;

export type Browser = Readonly<{
  config: ResolvedBrowserConfig;
  tab: Tab;
  runner: MainThreadRunner;
  compositor: Compositor;
  surface: Surface;
  frame: FrameState;
  fonts: FontCache;
  log: DebugLog;
  perf: FrameTimer;
  /** Start both loops; resolves when the main loop stops. */
  start(): Promise<void>;
  /** Queue a page load as a browser task. */
  load(url: string): void;
  dispatchInput(event: BrowserInput): void;
  /** Stop both loops immediately. */
  shutdown(): void;
}>;

export function createBrowser(opts: CreateBrowserOptions): Browser {
  const config = resolveBrowserConfig(opts.config);
  const surface = typeof opts.surface === "function" ? opts.surface(config) : opts.surface;
  const host = opts.host;
  const log = createDebugLog({ config: config.debug, clock: () => host.now() });
  const perf = new FrameTimer(config.perf, () => host.now());
  const fonts = new FontCache(opts.fontLoader ?? createFixedWidthFontLoader());
  const compositorLock = new Lock("compositor");
  const frame = new FrameState(compositorLock);
  const runner = new MainThreadRunner({ host, log, mainTickMs: config.mainTickMs });

  // The tab reports to the compositor, which is created after it.
  let compositorRef: Compositor | null = null;
  const requireCompositor = (): Compositor => {
    if (compositorRef === null) throw new WmError("WM_INVALID_STATE", "tab used before the compositor exists");
    return compositorRef;
  };
  const tab = new Tab({
    host,
    config,
    loader: opts.loader,
    fonts,
    frame,
    compositor: {
      requestAnimationFrame: () => requireCompositor().requestAnimationFrame(),
      commit: (data) => requireCompositor().commit(data),
    },
    scriptTasks: runner.scriptTasks,
    log,
    perf,
  });
  runner.attach(tab);

  const shutdown = (): void => {
    compositor.stop();
    runner.stop();
    tab.close();
  };

  const compositor = new Compositor({
    host,
    config,
    surface,
    fonts,
    frame,
    lock: compositorLock,
    mainThread: runner,
    log,
    perf,
    onQuit: () => {
      runner.stop();
      tab.close();
    },
  });
  compositorRef = compositor;

  return Object.freeze({
    config,
    tab,
    runner,
    compositor,
    surface,
    frame,
    fonts,
    log,
    perf,
    start(): Promise<void> {
      compositor.start();
      return runner.run();
    },
    load(url: string): void {
      runner.postTabCommand({ op: "load", url });
    },
    dispatchInput(event: BrowserInput): void {
      compositor.dispatchInput(event);
    },
    shutdown,
  });
}
