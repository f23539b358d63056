/**
 * packages/core/src/tab/scriptContext.ts — The API page scripts see.
 *
 * Mutations mark the affected layout subtree dirty and request a frame; they
 * never run layout themselves. Reads that depend on layout (bounding rects,
 * computed style) go through the tab's forced-recompute path first.
 */

import { parseInlineStyle, text } from "../content/build.js";
import { querySelectorAll } from "../content/selectors.js";
import type { ContentNode, ElementNode, StyleMap } from "../content/types.js";
import { declaredDisplayOf, displayOf } from "../layout/kinds/display.js";
import type { Rect } from "../layout/types.js";
import type { EventListener } from "./events.js";

export type ScriptContext = Readonly<{
  /** Root element of the current page. */
  document: ElementNode;
  url: string;
  querySelectorAll(selector: string): ElementNode[];
  getAttribute(node: ElementNode, name: string): string | null;
  setAttribute(node: ElementNode, name: string, value: string): void;
  /** Replace `node`'s children; a string becomes a single text node. */
  setInnerContent(node: ElementNode, content: string | readonly ContentNode[]): void;
  /** Page-coordinate rect of the node's box, or of its laid-out content for inline elements. */
  getBoundingClientRect(node: ElementNode): Rect;
  getComputedStyle(node: ElementNode): Readonly<StyleMap>;
  addEventListener(node: ElementNode, type: string, listener: EventListener): void;
  requestAnimationFrame(callback: (timestampMs: number) => void): void;
  setTimeout(callback: () => void, delayMs: number): void;
  now(): number;
  log(...values: readonly unknown[]): void;
}>;

/** What a script context needs from its tab. */
export interface ScriptBindings {
  readonly url: string;
  readonly document: ElementNode;
  markContentDirty(node: ContentNode): void;
  replaceContent(node: ElementNode, children: readonly ContentNode[]): void;
  boundingRect(node: ElementNode): Rect;
  computedStyle(node: ElementNode): Readonly<StyleMap>;
  addEventListener(node: ElementNode, type: string, listener: EventListener): void;
  requestAnimationFrame(callback: (timestampMs: number) => void): void;
  setScriptTimeout(callback: () => void, delayMs: number): void;
  now(): number;
  scriptLog(message: string): void;
}

function formatValue(v: unknown): string {
  if (typeof v === "string") return v;
  try {
    const json = JSON.stringify(v);
    return json === undefined ? String(v) : json;
  } catch {
    return String(v);
  }
}

export function createScriptContext(bindings: ScriptBindings): ScriptContext {
  const document = bindings.document;
  return Object.freeze({
    document,
    url: bindings.url,
    querySelectorAll: (selector: string) => querySelectorAll(document, selector),
    getAttribute: (node: ElementNode, name: string) => node.attributes[name] ?? null,
    setAttribute(node: ElementNode, name: string, value: string): void {
      node.attributes[name] = value;
      if (name !== "style") {
        bindings.markContentDirty(node);
        return;
      }
      const before = displayOf(node);
      node.inlineStyle = parseInlineStyle(value);
      // The parent decides block vs inline layout and skips display:none children.
      const parent = node.parent;
      bindings.markContentDirty(parent !== null && declaredDisplayOf(node) !== before ? parent : node);
    },
    setInnerContent(node: ElementNode, content: string | readonly ContentNode[]): void {
      const children = typeof content === "string" ? [text(content)] : content;
      bindings.replaceContent(node, children);
    },
    getBoundingClientRect: (node: ElementNode) => bindings.boundingRect(node),
    getComputedStyle: (node: ElementNode) => bindings.computedStyle(node),
    addEventListener: (node: ElementNode, type: string, listener: EventListener) =>
      bindings.addEventListener(node, type, listener),
    requestAnimationFrame: (callback: (timestampMs: number) => void) =>
      bindings.requestAnimationFrame(callback),
    setTimeout: (callback: () => void, delayMs: number) =>
      bindings.setScriptTimeout(callback, delayMs),
    now: () => bindings.now(),
    log(...values: readonly unknown[]): void {
      bindings.scriptLog(values.map(formatValue).join(" "));
    },
  });
}
