/**
 * @waymark/core
 *
 * Host-agnostic rendering core: incremental two-phase layout, the main-thread
 * loop and the compositor loop.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Errors & host
// =============================================================================

export { WmError, type WmErrorCode, describeThrown } from "./errors.js";
export type { RuntimeHost, TimerHandle } from "./host.js";

// =============================================================================
// Configuration
// =============================================================================

export {
  DEFAULT_CONFIG,
  resolveBrowserConfig,
  type BrowserConfig,
  type ResolvedBrowserConfig,
} from "./app/config.js";

// =============================================================================
// Content tree & style
// =============================================================================

export type { ContentNode, ElementNode, StyleMap, TextNode } from "./content/types.js";
export { isElement } from "./content/types.js";
export {
  closestTag,
  element,
  isDescendantOf,
  parseInlineStyle,
  replaceChildren,
  text,
  textContent,
  treeToList,
} from "./content/build.js";
export { matchesSelector, parseSelector, querySelectorAll, type Selector } from "./content/selectors.js";
export { INHERITED_PROPERTIES, type RestyleHook, resolveStyles, styleValue } from "./content/style.js";
export { clamp01, interpolateNumber } from "./animation/interpolate.js";
export {
  ANIMATED_PROPERTIES,
  NumericAnimation,
  type TransitionEffect,
  TransitionSet,
  type TransitionStep,
  parseNumericValue,
  parseTransition,
} from "./animation/transitions.js";

// =============================================================================
// Layout
// =============================================================================

export type {
  BlockLayout,
  BoxEdges,
  DocumentLayout,
  InlineItem,
  InlineLayout,
  InputLayout,
  LayoutKind,
  LayoutNode,
  LineLayout,
  Rect,
  TextLayout,
} from "./layout/types.js";
export { rectOf } from "./layout/types.js";
export {
  computeHeight,
  positionNode,
  propagateHeights,
  sizeNode,
} from "./layout/engine/layoutEngine.js";
export {
  createLayoutProfile,
  type LayoutContext,
  type LayoutProfile,
} from "./layout/engine/types.js";
export { ReflowRootSet } from "./layout/engine/reflowRoots.js";
export { createDocument } from "./layout/kinds/document.js";
export { LayoutIndex, isAttached, leafBounds } from "./layout/lookup.js";
export { contains, findLayout } from "./layout/hitTest.js";
export { devicePx, px } from "./layout/units.js";
export {
  FontCache,
  createFixedWidthFontLoader,
  type FixedWidthFontOptions,
  type FontDescriptor,
  type FontHandle,
  type FontLoader,
  type FontMetrics,
  type FontSlant,
  type FontWeight,
} from "./layout/fonts.js";

// =============================================================================
// Display list & paint
// =============================================================================

export * from "./displayList/index.js";
export {
  paintTree,
  parseOpacity,
  parseOutline,
  type OutlineSpec,
  type PaintState,
} from "./renderer/paint.js";

// =============================================================================
// Tasks, frames, loops
// =============================================================================

export { Lock, Task, TaskQueue, type TaskArgs } from "./tasks/index.js";
export { FrameState, computeFrameDelay } from "./frame/index.js";
export {
  MainThreadRunner,
  type AnimationFrameTarget,
  type MainThreadRunnerOptions,
  type MainThreadTarget,
} from "./runtime/mainThreadRunner.js";
export {
  Tab,
  type CommitData,
  type CompositorPort,
  type TabOptions,
  type TabPhase,
} from "./tab/tab.js";
export {
  isTabCommand,
  runTabCommand,
  type TabCommand,
  type TabCommandTarget,
} from "./tab/commands.js";
export type { ScriptEvent, EventListener } from "./tab/events.js";
export type { ScriptContext } from "./tab/scriptContext.js";
export {
  createStaticPageLoader,
  resolveUrl,
  type PageDocument,
  type PageLoader,
  type PageRequest,
  type PageScript,
} from "./tab/pageLoader.js";
export { focusableElements, tabIndexOf } from "./tab/tabOrder.js";
export {
  Compositor,
  type CompositorOptions,
  type MainThreadPort,
} from "./compositor/compositor.js";
export type { BrowserInput } from "./compositor/input.js";
export type { Surface } from "./compositor/surface.js";
export { createBrowser, type Browser, type CreateBrowserOptions, type SurfaceFactory } from "./browser.js";

// =============================================================================
// Instrumentation
// =============================================================================

export * from "./debug/index.js";
export {
  FRAME_PHASES,
  FrameTimer,
  readPerfEnv,
  type FramePhase,
  type PerfSnapshot,
  type PhaseStats,
} from "./perf/frameTimer.js";
