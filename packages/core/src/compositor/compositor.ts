/**
 * packages/core/src/compositor/compositor.ts — The compositor thread.
 *
 * Why: Scrolling, chrome interaction and drawing must stay responsive while
 * the main thread is busy with scripts or layout. The compositor keeps its
 * own copy of the last committed display list and redraws from it without
 * ever waiting for the main thread.
 *
 * Per tick:
 *   1. handle at most one queued input event
 *   2. under the lock: exit on quit, arm the frame timer if a frame was
 *      requested and none is in flight, take a draw snapshot if needed
 *   3. draw the snapshot outside the lock
 *   4. re-arm the tick timer
 *
 * A frame stays "in flight" from the moment its timer is armed until the
 * main thread commits it, so at most one frame is pending at a time.
 */

import type { ResolvedBrowserConfig } from "../app/config.js";
import type { DebugLog } from "../debug/debugLog.js";
import { cloneDisplayList } from "../displayList/builder.js";
import type { DisplayList } from "../displayList/types.js";
import { describeThrown } from "../errors.js";
import type { FrameState } from "../frame/frameState.js";
import { computeFrameDelay } from "../frame/frameTiming.js";
import type { RuntimeHost, TimerHandle } from "../host.js";
import type { FontCache } from "../layout/fonts.js";
import type { FrameTimer } from "../perf/frameTimer.js";
import type { TabCommand } from "../tab/commands.js";
import type { CommitData, CompositorPort } from "../tab/tab.js";
import type { Lock } from "../tasks/lock.js";
import {
  CHROME_FONT_SIZE,
  type ChromeLayout,
  type ChromeState,
  chromeHitTest,
  chromeLayout,
  drawChrome,
} from "./chrome.js";
import type { BrowserInput } from "./input.js";
import { type Surface, replayCommand } from "./surface.js";

/**
 * The main-thread side the compositor posts work to: a MainThreadRunner in
 * process, or a worker running one.
 */
export interface MainThreadPort {
  /** Queue a tab operation as a browser task. */
  postTabCommand(command: TabCommand): void;
  scheduleAnimationFrame(scroll: number): void;
}

export type CompositorOptions = Readonly<{
  host: RuntimeHost;
  config: ResolvedBrowserConfig;
  surface: Surface;
  fonts: FontCache;
  frame: FrameState;
  lock: Lock;
  mainThread: MainThreadPort;
  log: DebugLog;
  perf: FrameTimer;
  onQuit?: () => void;
}>;

type DrawSnapshot = Readonly<{
  list: DisplayList;
  scroll: number;
  chrome: Readonly<ChromeState>;
}>;

const EMPTY_LIST: DisplayList = Object.freeze([]);

export class Compositor implements CompositorPort {
  private readonly host: RuntimeHost;
  private readonly config: ResolvedBrowserConfig;
  private readonly surface: Surface;
  private readonly fonts: FontCache;
  private readonly frame: FrameState;
  private readonly lock: Lock;
  private readonly mainThread: MainThreadPort;
  private readonly log: DebugLog;
  private readonly perf: FrameTimer;
  private readonly onQuit: (() => void) | undefined;
  private readonly chromeGeometry: ChromeLayout;

  // Guarded by `lock`.
  private committed: CommitData | null = null;
  private scrollValue = 0;
  private readonly chrome: ChromeState = { focus: null, typed: "", url: "" };
  private needsDraw = true;
  private frameTimer: TimerHandle | null = null;
  private lastFrameStart: number | null = null;
  private needsQuit = false;
  private readonly inputQueue: BrowserInput[] = [];

  private tickTimer: TimerHandle | null = null;
  private running = false;
  private drawCountValue = 0;

  constructor(opts: CompositorOptions) {
    this.host = opts.host;
    this.config = opts.config;
    this.surface = opts.surface;
    this.fonts = opts.fonts;
    this.frame = opts.frame;
    this.lock = opts.lock;
    this.mainThread = opts.mainThread;
    this.log = opts.log;
    this.perf = opts.perf;
    this.onQuit = opts.onQuit;
    this.chromeGeometry = chromeLayout(opts.config.width, opts.config.chromePx);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get scroll(): number {
    return this.lock.withLock(() => this.scrollValue);
  }

  get drawCount(): number {
    return this.drawCountValue;
  }

  /** The compositor's private copy of the last commit. */
  get committedData(): CommitData | null {
    return this.lock.withLock(() => this.committed);
  }

  get chromeState(): Readonly<ChromeState> {
    return this.lock.withLock(() => ({ ...this.chrome }));
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.scheduleTick();
  }

  stop(): void {
    this.running = false;
    if (this.tickTimer !== null) {
      this.host.clearTimer(this.tickTimer);
      this.tickTimer = null;
    }
    const frameTimer = this.lock.withLock(() => {
      const t = this.frameTimer;
      this.frameTimer = null;
      return t;
    });
    if (frameTimer !== null) this.host.clearTimer(frameTimer);
  }

  quit(): void {
    this.lock.withLock(() => {
      this.needsQuit = true;
    });
  }

  dispatchInput(event: BrowserInput): void {
    this.lock.withLock(() => {
      this.inputQueue.push(event);
    });
  }

  private scheduleTick(): void {
    this.tickTimer = this.host.setTimer(() => this.tick(), this.config.compositorTickMs);
  }

  tick(): void {
    this.tickTimer = null;
    try {
      const event = this.lock.withLock(() => this.inputQueue.shift() ?? null);
      if (event !== null) this.handleInput(event);

      const snapshot = this.lock.withLock((): DrawSnapshot | "quit" | null => {
        if (this.needsQuit) return "quit";
        if (this.frame.needsAnimationFrame && this.frameTimer === null) this.armFrameTimer();
        if (!this.needsDraw) return null;
        this.needsDraw = false;
        return {
          list: this.committed ? this.committed.displayList : EMPTY_LIST,
          scroll: this.scrollValue,
          chrome: { ...this.chrome },
        };
      });

      if (snapshot === "quit") {
        this.stop();
        this.log.info("compositor", "quit");
        this.onQuit?.();
        return;
      }
      if (snapshot !== null) this.draw(snapshot);
    } catch (e: unknown) {
      this.log.error("compositor", `tick failed: ${describeThrown(e)}`);
    } finally {
      if (this.running && this.tickTimer === null) this.scheduleTick();
    }
  }

  /** Caller holds the lock. */
  private armFrameTimer(): void {
    const delay = computeFrameDelay(this.host.now(), this.lastFrameStart, this.config.refreshRateMs);
    this.frameTimer = this.host.setTimer(() => this.onFrameTimer(), delay);
  }

  private onFrameTimer(): void {
    const scroll = this.lock.withLock(() => {
      this.frame.needsAnimationFrame = false;
      this.lastFrameStart = this.host.now();
      return this.scrollValue;
    });
    this.log.trace("frame", "frame start");
    this.mainThread.scheduleAnimationFrame(scroll);
  }

  private maxScroll(): number {
    const docHeight = this.committed ? this.committed.documentHeight : 0;
    return Math.max(0, docHeight - (this.config.height - this.config.chromePx));
  }

  private clampScroll(scroll: number): number {
    return Math.max(0, Math.min(scroll, this.maxScroll()));
  }

  /** Called by the main thread whenever its tab needs a new frame. */
  requestAnimationFrame(): void {
    this.lock.withLock(() => {
      this.frame.needsAnimationFrame = true;
    });
  }

  /** Called by the main thread at the end of each animation frame. */
  commit(data: CommitData): void {
    this.perf.measure("commit", () => {
      this.lock.withLock(() => {
        this.committed = { ...data, displayList: cloneDisplayList(data.displayList) };
        if (data.scroll !== null) this.scrollValue = data.scroll;
        this.scrollValue = this.clampScroll(this.scrollValue);
        this.frameTimer = null;
        this.needsDraw = true;
        this.chrome.url = data.url ?? "";
        if (this.chrome.focus !== "address") this.chrome.typed = "";
      });
    });
  }

  private post(command: TabCommand): void {
    this.mainThread.postTabCommand(command);
  }

  private handleInput(event: BrowserInput): void {
    switch (event.kind) {
      case "click": {
        const { x, y } = event;
        if (y < this.config.chromePx) {
          this.handleChromeClick(x, y);
          return;
        }
        const pageY = this.lock.withLock(() => {
          this.chrome.focus = "content";
          this.needsDraw = true;
          return y - this.config.chromePx + this.scrollValue;
        });
        this.post({ op: "click", x, y: pageY });
        return;
      }
      case "key": {
        const char = event.char;
        const editing = this.lock.withLock(() => {
          if (this.chrome.focus !== "address") return false;
          this.chrome.typed += char;
          this.needsDraw = true;
          return true;
        });
        if (!editing) this.post({ op: "keypress", char });
        return;
      }
      case "enter": {
        const url = this.lock.withLock(() => {
          if (this.chrome.focus !== "address") return null;
          this.chrome.focus = null;
          this.needsDraw = true;
          return this.chrome.typed;
        });
        if (url !== null) this.post({ op: "load", url });
        else this.post({ op: "enter" });
        return;
      }
      case "tab":
        this.lock.withLock(() => {
          this.chrome.focus = "content";
          this.needsDraw = true;
        });
        this.post({ op: "advanceFocus" });
        return;
      case "down":
        this.scrollBy(this.config.scrollStep);
        return;
      case "scroll":
        this.scrollBy(event.delta);
        return;
      case "zoom":
        this.post({ op: "zoom", direction: event.direction });
        return;
      case "quit":
        this.quit();
        return;
    }
  }

  private scrollBy(delta: number): void {
    this.lock.withLock(() => {
      this.scrollValue = this.clampScroll(this.scrollValue + delta);
      this.needsDraw = true;
    });
  }

  private handleChromeClick(x: number, y: number): void {
    const target = chromeHitTest(this.chromeGeometry, x, y);
    this.lock.withLock(() => {
      this.needsDraw = true;
      if (target === "address") {
        this.chrome.focus = "address";
        this.chrome.typed = "";
      } else {
        this.chrome.focus = null;
      }
    });
    if (target === "back") this.post({ op: "goBack" });
  }

  private draw(snapshot: DrawSnapshot): void {
    this.perf.measure("draw", () => {
      const { chromePx, height } = this.config;
      const surface = this.surface;
      surface.clear("white");
      const top = snapshot.scroll;
      const bottom = snapshot.scroll + height - chromePx;
      const dy = chromePx - snapshot.scroll;
      for (const cmd of snapshot.list) {
        if (cmd.rect.y > bottom || cmd.rect.y + cmd.rect.h < top) continue;
        replayCommand(surface, cmd, dy);
      }
      const font = this.fonts.get(CHROME_FONT_SIZE, "normal", "normal");
      drawChrome(surface, this.chromeGeometry, snapshot.chrome, font, chromePx);
      surface.present();
    });
    this.drawCountValue++;
  }
}
