/**
 * packages/core/src/tab/tab.ts — Main-thread page state and the rendering pipeline.
 *
 * Why: The tab owns everything that only the main thread touches: the
 * content tree, the layout tree, focus, history, script listeners and the
 * display list it paints. The compositor only ever sees CommitData copies.
 *
 * Frame structure (runAnimationFrame):
 *   1. runCallbacks: swap out and invoke requestAnimationFrame callbacks, then
 *      step running CSS transitions
 *   2. runPipeline: style + size() reflow roots, propagate heights, position(), paint
 *   3. commit: hand a CommitData to the compositor
 *
 * Reads that depend on layout (hit testing, bounding rects, computed style)
 * call ensureLayout(), which runs the pipeline synchronously only when
 * something is dirty.
 */

import { TransitionSet } from "../animation/transitions.js";
import type { ResolvedBrowserConfig } from "../app/config.js";
import { replaceChildren, treeToList } from "../content/build.js";
import { type RestyleHook, resolveStyles } from "../content/style.js";
import type { ContentNode, ElementNode, StyleMap } from "../content/types.js";
import type { DebugLog } from "../debug/debugLog.js";
import { createDisplayListBuilder } from "../displayList/builder.js";
import type { DisplayList } from "../displayList/types.js";
import { describeThrown } from "../errors.js";
import type { FrameState } from "../frame/frameState.js";
import type { RuntimeHost } from "../host.js";
import { positionNode, propagateHeights, sizeNode } from "../layout/engine/layoutEngine.js";
import { type LayoutContext, type LayoutProfile, createLayoutProfile } from "../layout/engine/types.js";
import type { FontCache } from "../layout/fonts.js";
import { findLayout } from "../layout/hitTest.js";
import { createDocument } from "../layout/kinds/document.js";
import { LayoutIndex, isAttached, leafBounds } from "../layout/lookup.js";
import type { DocumentLayout, LayoutNode, Rect } from "../layout/types.js";
import { rectOf } from "../layout/types.js";
import type { FrameTimer } from "../perf/frameTimer.js";
import { paintTree } from "../renderer/paint.js";
import { Task } from "../tasks/task.js";
import type { TaskQueue } from "../tasks/taskQueue.js";
import { EventRegistry, type EventListener } from "./events.js";
import { type PageDocument, type PageLoader, resolveUrl } from "./pageLoader.js";
import { type ScriptBindings, createScriptContext } from "./scriptContext.js";
import { focusableElements } from "./tabOrder.js";

export type TabPhase = "idle" | "runCallbacks" | "runPipeline" | "commit";

/** Everything the compositor needs from one frame. */
export type CommitData = Readonly<{
  frameId: number;
  url: string | null;
  documentHeight: number;
  /** Scroll set by the tab (page load), or null to keep the compositor's. */
  scroll: number | null;
  displayList: DisplayList;
}>;

/**
 * The compositor side a tab reports to: in process the compositor itself,
 * across a worker boundary a pair of posted messages.
 */
export interface CompositorPort {
  /** Set needsAnimationFrame under the compositor lock. */
  requestAnimationFrame(): void;
  commit(data: CommitData): void;
}

export type TabOptions = Readonly<{
  host: RuntimeHost;
  config: ResolvedBrowserConfig;
  loader: PageLoader;
  fonts: FontCache;
  frame: FrameState;
  compositor: CompositorPort;
  scriptTasks: TaskQueue;
  log: DebugLog;
  perf: FrameTimer;
}>;

const EMPTY_LIST: DisplayList = Object.freeze([]);
const ZERO_RECT: Rect = Object.freeze({ x: 0, y: 0, w: 0, h: 0 });

function closestFormWithAction(node: ElementNode): ElementNode | null {
  let current: ElementNode | null = node;
  while (current) {
    if (current.tag === "form" && current.attributes.action !== undefined) return current;
    current = current.parent;
  }
  return null;
}

export class Tab {
  private readonly host: RuntimeHost;
  private readonly config: ResolvedBrowserConfig;
  private readonly loader: PageLoader;
  private readonly fonts: FontCache;
  private readonly frame: FrameState;
  private readonly compositor: CompositorPort;
  private readonly scriptTasks: TaskQueue;
  private readonly log: DebugLog;
  private readonly perf: FrameTimer;

  private readonly index = new LayoutIndex();
  private readonly events = new EventRegistry();
  private readonly builder = createDisplayListBuilder();
  private readonly transitions: TransitionSet;
  readonly layoutProfile: LayoutProfile = createLayoutProfile();

  private urlValue: string | null = null;
  private readonly historyStack: string[] = [];
  private root: ElementNode | null = null;
  private layoutDoc: DocumentLayout | null = null;
  private zoomValue = 1;
  private focusValue: ElementNode | null = null;
  private scroll = 0;
  private scrollChanged = false;
  private displayListValue: DisplayList = EMPTY_LIST;
  private rafCallbacks: Array<(timestampMs: number) => void> = [];
  private phaseValue: TabPhase = "idle";
  private frameId = 0;
  /** Bumped per navigation; stale timers and scripts compare against it. */
  private generation = 0;

  constructor(opts: TabOptions) {
    this.host = opts.host;
    this.config = opts.config;
    this.loader = opts.loader;
    this.fonts = opts.fonts;
    this.frame = opts.frame;
    this.compositor = opts.compositor;
    this.scriptTasks = opts.scriptTasks;
    this.log = opts.log;
    this.perf = opts.perf;
    this.transitions = new TransitionSet(opts.config.refreshRateMs);
  }

  get url(): string | null {
    return this.urlValue;
  }

  get history(): readonly string[] {
    return this.historyStack.slice();
  }

  get document(): ElementNode | null {
    return this.root;
  }

  get layout(): DocumentLayout | null {
    return this.layoutDoc;
  }

  get zoom(): number {
    return this.zoomValue;
  }

  get focus(): ElementNode | null {
    return this.focusValue;
  }

  get phase(): TabPhase {
    return this.phaseValue;
  }

  get displayList(): DisplayList {
    return this.displayListValue;
  }

  // ---------------------------------------------------------------------------
  // Navigation
  // ---------------------------------------------------------------------------

  async load(url: string, body?: string): Promise<void> {
    let page: PageDocument;
    try {
      page = await this.loader.load(body === undefined ? { url } : { url, body });
    } catch (e: unknown) {
      this.log.error("load", `failed to load ${url}: ${describeThrown(e)}`);
      return;
    }

    this.generation++;
    this.historyStack.push(page.url);
    this.urlValue = page.url;
    this.root = page.root;
    this.layoutDoc = null;
    this.focusValue = null;
    this.rafCallbacks = [];
    this.events.clear();
    this.transitions.clear();
    this.frame.needsRafCallbacks = false;
    this.frame.reflowRoots.clear();
    this.frame.needsLayoutTreeRebuild = true;
    this.scroll = 0;
    this.scrollChanged = true;
    this.log.info("load", `loaded ${page.url} (${String(page.scripts.length)} scripts)`);

    const generation = this.generation;
    const ctx = createScriptContext(this.bindings(page.url, page.root, generation));
    page.scripts.forEach((script, i) => {
      const label = `script #${String(i)} of ${page.url}`;
      this.scriptTasks.addTask(
        Task.named(label, () => {
          if (generation !== this.generation) return undefined;
          return script(ctx);
        }),
      );
    });
    this.setNeedsAnimationFrame();
  }

  async goBack(): Promise<void> {
    if (this.historyStack.length <= 1) return;
    this.historyStack.pop();
    const back = this.historyStack.pop();
    if (back !== undefined) await this.load(back);
  }

  // ---------------------------------------------------------------------------
  // Frame requests
  // ---------------------------------------------------------------------------

  setNeedsAnimationFrame(): void {
    this.compositor.requestAnimationFrame();
  }

  setNeedsRafCallbacks(): void {
    this.frame.needsRafCallbacks = true;
    this.setNeedsAnimationFrame();
  }

  /** Queue `node`'s subtree for re-sizing on the next pipeline run. */
  markDirty(node: LayoutNode): void {
    this.frame.reflowRoots.add(node);
    this.setNeedsAnimationFrame();
  }

  /** Mark the layout subtree that renders `node` dirty. */
  markContentDirty(node: ContentNode): void {
    const doc = this.layoutDoc;
    if (doc === null || this.frame.needsLayoutTreeRebuild) {
      this.setNeedsAnimationFrame();
      return;
    }
    const target = this.index.nearest(node, doc);
    if (target === null) {
      this.log.trace("layout", "mutation outside the rendered tree ignored");
      return;
    }
    this.markDirty(target);
  }

  incrementZoom(direction: 1 | -1): void {
    if (direction > 0) this.zoomValue *= this.config.zoomStep;
    else this.zoomValue /= this.config.zoomStep;
    this.zoomChanged();
  }

  resetZoom(): void {
    this.zoomValue = 1;
    this.zoomChanged();
  }

  /** Zoom key: +1 zooms in, -1 zooms out, 0 resets. */
  zoomBy(direction: -1 | 0 | 1): void {
    if (direction === 0) this.resetZoom();
    else this.incrementZoom(direction);
  }

  private zoomChanged(): void {
    this.frame.needsLayoutTreeRebuild = true;
    this.setNeedsAnimationFrame();
  }

  // ---------------------------------------------------------------------------
  // Frame
  // ---------------------------------------------------------------------------

  runAnimationFrame(scroll: number): void {
    this.frameId++;
    this.log.setFrameId(this.frameId);
    if (!this.scrollChanged) this.scroll = scroll;

    try {
      this.phaseValue = "runCallbacks";
      if (this.frame.needsRafCallbacks) {
        this.frame.needsRafCallbacks = false;
        const callbacks = this.rafCallbacks;
        this.rafCallbacks = [];
        const timestamp = this.host.now();
        this.perf.measure("raf_callbacks", () => {
          for (const callback of callbacks) {
            try {
              callback(timestamp);
            } catch (e: unknown) {
              this.log.error("script", `requestAnimationFrame callback threw: ${describeThrown(e)}`);
            }
          }
        });
      }
      this.stepTransitions();

      this.phaseValue = "runPipeline";
      try {
        this.runRenderingPipeline();
      } catch (e: unknown) {
        // Commit the previous display list anyway: the compositor waits for it.
        this.log.error("frame", `rendering pipeline failed: ${describeThrown(e)}`);
        this.frame.needsLayoutTreeRebuild = true;
      }

      this.phaseValue = "commit";
      this.commit();
    } finally {
      this.phaseValue = "idle";
    }
  }

  /** Number of running transitions. */
  get activeTransitions(): number {
    return this.transitions.size;
  }

  private stepTransitions(): void {
    if (this.transitions.size === 0) return;
    for (const step of this.transitions.step()) {
      if (step.effect === "layout") this.markContentDirty(step.node);
    }
    // Paint-only steps need nothing more: the pipeline repaints every frame.
    if (this.transitions.size > 0) this.setNeedsAnimationFrame();
  }

  private readonly restyle: RestyleHook = (node, previous, next) => {
    if (this.transitions.restyle(node, previous, next)) this.setNeedsAnimationFrame();
  };

  private layoutContext(): LayoutContext {
    return {
      fonts: this.fonts,
      viewportWidth: this.config.width,
      hstep: this.config.hstep,
      vstep: this.config.vstep,
      inputWidthPx: this.config.inputWidthPx,
      profile: this.layoutProfile,
      index: this.index,
    };
  }

  runRenderingPipeline(): void {
    const root = this.root;
    if (root === null) return;
    const ctx = this.layoutContext();

    let doc = this.layoutDoc;
    if (doc === null || this.frame.needsLayoutTreeRebuild) {
      // The document is the only (implicit) reflow root.
      this.frame.needsLayoutTreeRebuild = false;
      this.frame.reflowRoots.clear();
      this.perf.measure("style", () => resolveStyles(root, this.restyle));
      const built = createDocument(root, this.zoomValue);
      this.perf.measure("layout_size", () => sizeNode(built, ctx));
      this.layoutDoc = built;
      doc = built;
    } else {
      const current = doc;
      for (const reflowRoot of this.frame.reflowRoots.drain()) {
        // Superseded by an earlier root that rebuilt this subtree.
        if (!isAttached(reflowRoot, current)) continue;
        this.perf.measure("style", () => resolveStyles(reflowRoot.node, this.restyle));
        this.perf.measure("layout_size", () => sizeNode(reflowRoot, ctx));
        this.perf.measure("layout_height", () => propagateHeights(reflowRoot.parent, ctx));
      }
    }

    const positioned = doc;
    this.perf.measure("layout_position", () => positionNode(positioned, ctx));
    this.perf.measure("paint", () => this.paint(positioned));
  }

  private paint(doc: DocumentLayout): void {
    this.builder.reset();
    paintTree(doc, { focus: this.focusValue }, this.builder);
    const res = this.builder.build();
    if (res.ok) {
      this.displayListValue = res.list;
      return;
    }
    this.log.error("layout", `display list build failed: ${res.error.code}: ${res.error.detail}`);
    this.displayListValue = EMPTY_LIST;
  }

  /** Run the pipeline now if anything is dirty. Returns whether it ran. */
  ensureLayout(): boolean {
    if (this.root === null) return false;
    const clean =
      this.layoutDoc !== null &&
      !this.frame.needsLayoutTreeRebuild &&
      this.frame.reflowRoots.size === 0;
    if (clean) return false;
    this.runRenderingPipeline();
    return true;
  }

  commit(): void {
    const data: CommitData = {
      frameId: this.frameId,
      url: this.urlValue,
      documentHeight: this.layoutDoc ? this.layoutDoc.h : 0,
      scroll: this.scrollChanged ? this.scroll : null,
      displayList: this.displayListValue,
    };
    this.scrollChanged = false;
    this.compositor.commit(data);
  }

  // ---------------------------------------------------------------------------
  // Input
  // ---------------------------------------------------------------------------

  private dispatch(type: string, target: ElementNode): boolean {
    return this.events.dispatch(type, target, (t, e) => {
      this.log.error("script", `"${t}" listener threw: ${describeThrown(e)}`);
    });
  }

  private setFocus(node: ElementNode | null): void {
    if (this.focusValue === node) return;
    this.focusValue = node;
    this.setNeedsAnimationFrame();
  }

  /** Click at page coordinates (scroll already applied). */
  async click(x: number, y: number): Promise<void> {
    if (this.root === null) return;
    this.ensureLayout();
    const doc = this.layoutDoc;
    if (doc === null) return;
    const hit = findLayout(x, y, doc);
    if (hit === null) return;
    const hitNode = hit.node;
    const target = hitNode.kind === "text" ? hitNode.parent : hitNode;
    this.setFocus(null);
    if (target === null) return;
    if (this.dispatch("click", target)) return;

    let elt: ElementNode | null = target;
    while (elt) {
      if (elt.tag === "a" && elt.attributes.href !== undefined) {
        await this.load(resolveUrl(this.urlValue, elt.attributes.href));
        return;
      }
      if (elt.tag === "input") {
        elt.attributes.value = "";
        this.setFocus(elt);
        this.setNeedsAnimationFrame();
        return;
      }
      if (elt.tag === "button") {
        const form = closestFormWithAction(elt);
        if (form) await this.submitForm(form);
        return;
      }
      elt = elt.parent;
    }
  }

  private async submitForm(form: ElementNode): Promise<void> {
    if (this.dispatch("submit", form)) return;
    const pairs: string[] = [];
    for (const node of treeToList(form)) {
      if (node.kind !== "element" || node.tag !== "input") continue;
      const name = node.attributes.name;
      if (name === undefined) continue;
      const value = node.attributes.value ?? "";
      pairs.push(`${encodeURIComponent(name)}=${encodeURIComponent(value)}`);
    }
    const action = form.attributes.action ?? "";
    await this.load(resolveUrl(this.urlValue, action), pairs.join("&"));
  }

  /** Printable character typed into the page. */
  keypress(char: string): void {
    const focus = this.focusValue;
    if (focus === null || focus.tag !== "input") return;
    if (this.dispatch("keydown", focus)) return;
    focus.attributes.value = (focus.attributes.value ?? "") + char;
    this.dispatch("change", focus);
    this.setNeedsAnimationFrame();
  }

  /** Move focus to the next focusable element; past the last one, focus clears. */
  advanceFocus(): void {
    if (this.root === null) return;
    const order = focusableElements(this.root);
    const current = this.focusValue;
    const idx = current === null ? 0 : order.indexOf(current) + 1;
    this.setFocus(order[idx] ?? null);
  }

  /** Activate the focused element: follow a link, submit a form. */
  async enter(): Promise<void> {
    const focus = this.focusValue;
    if (focus === null) return;
    if (this.dispatch("click", focus)) return;
    if (focus.tag === "a" && focus.attributes.href !== undefined) {
      await this.load(resolveUrl(this.urlValue, focus.attributes.href));
      return;
    }
    if (focus.tag === "button" || focus.tag === "input") {
      const form = closestFormWithAction(focus);
      if (form) await this.submitForm(form);
    }
  }

  // ---------------------------------------------------------------------------
  // Script bindings
  // ---------------------------------------------------------------------------

  /** Page-coordinate rect of `node`'s layout, running layout first if dirty. */
  boundingRect(node: ElementNode): Rect {
    this.ensureLayout();
    const doc = this.layoutDoc;
    if (doc === null) return ZERO_RECT;
    const exact = this.index.exact(node, doc);
    if (exact) return rectOf(exact);
    const container = this.index.nearest(node, doc);
    if (container === null) return ZERO_RECT;
    return leafBounds(container, node) ?? rectOf(container);
  }

  computedStyle(node: ElementNode): Readonly<StyleMap> {
    this.ensureLayout();
    return Object.freeze({ ...node.computedStyle });
  }

  private bindings(url: string, root: ElementNode, generation: number): ScriptBindings {
    return {
      url,
      document: root,
      markContentDirty: (node: ContentNode) => this.markContentDirty(node),
      replaceContent: (node: ElementNode, children: readonly ContentNode[]) => {
        replaceChildren(node, children);
        this.markContentDirty(node);
      },
      boundingRect: (node: ElementNode) => this.boundingRect(node),
      computedStyle: (node: ElementNode) => this.computedStyle(node),
      addEventListener: (node: ElementNode, type: string, listener: EventListener) =>
        this.events.add(node, type, listener),
      requestAnimationFrame: (callback: (timestampMs: number) => void) => {
        if (generation !== this.generation) return;
        this.rafCallbacks.push(callback);
        this.setNeedsRafCallbacks();
      },
      setScriptTimeout: (callback: () => void, delayMs: number) => {
        this.host.setTimer(() => {
          if (generation !== this.generation) return;
          this.scriptTasks.addTask(Task.named("setTimeout callback", callback));
        }, delayMs);
      },
      now: () => this.host.now(),
      scriptLog: (message: string) => this.log.info("script", message),
    };
  }

  /** Drop per-page frame requests; used when the browser shuts down. */
  close(): void {
    this.generation++;
    this.rafCallbacks = [];
    this.transitions.clear();
    this.frame.reset();
  }
}

