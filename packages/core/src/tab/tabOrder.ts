import { treeToList } from "../content/build.js";
import type { ElementNode } from "../content/types.js";

/** Order key for elements without a usable positive tabindex. */
export const DEFAULT_TAB_INDEX = 9999999;

const NATURALLY_FOCUSABLE: ReadonlySet<string> = new Set(["input", "button", "a"]);

/**
 * Parsed tabindex. Missing or malformed values and 0 sort with the default
 * order, after every positive index.
 */
export function tabIndexOf(node: ElementNode): number {
  const raw = node.attributes.tabindex;
  if (raw === undefined || !/^\s*-?\d+\s*$/.test(raw)) return DEFAULT_TAB_INDEX;
  const n = Number.parseInt(raw, 10);
  return n === 0 ? DEFAULT_TAB_INDEX : n;
}

export function isFocusable(node: ElementNode): boolean {
  if (tabIndexOf(node) < 0) return false;
  if (node.attributes.tabindex !== undefined) return true;
  return NATURALLY_FOCUSABLE.has(node.tag);
}

/** Focusable elements in Tab order: by tabindex, then document order. */
export function focusableElements(root: ElementNode): ElementNode[] {
  const out: ElementNode[] = [];
  for (const node of treeToList(root)) {
    if (node.kind === "element" && isFocusable(node)) out.push(node);
  }
  // Array.prototype.sort is stable, so equal indices keep document order.
  return out.sort((a, b) => tabIndexOf(a) - tabIndexOf(b));
}
