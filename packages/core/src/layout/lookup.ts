/**
 * packages/core/src/layout/lookup.ts — Content node → layout node lookup.
 *
 * size() registers every block, document and input node it creates. Entries
 * are never removed eagerly: a rebuilt subtree simply overwrites them, and a
 * lookup accepts an entry only while the layout node is still attached to the
 * document it is asked about. Content nodes without an attached layout node
 * (inline elements, text) resolve to their nearest ancestor that has one.
 */

import { isDescendantOf } from "../content/build.js";
import type { ContentNode, ElementNode } from "../content/types.js";
import type { DocumentLayout, LayoutNode, Rect } from "./types.js";

export function isAttached(node: LayoutNode, document: DocumentLayout): boolean {
  let current: LayoutNode = node;
  while (current.parent !== null) {
    const parent: LayoutNode = current.parent;
    if (parent.children === null || !parent.children.includes(current)) return false;
    current = parent;
  }
  return current === document;
}

/**
 * Union of the text and input leaves under `container` that `element`'s
 * subtree produced; null when it produced none. Inline elements have no box
 * of their own, so this is their rect.
 */
export function leafBounds(container: LayoutNode, element: ElementNode): Rect | null {
  let x1 = Number.POSITIVE_INFINITY;
  let y1 = Number.POSITIVE_INFINITY;
  let x2 = Number.NEGATIVE_INFINITY;
  let y2 = Number.NEGATIVE_INFINITY;
  const stack: LayoutNode[] = [container];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if ((current.kind === "text" || current.kind === "input") && isDescendantOf(current.node, element)) {
      x1 = Math.min(x1, current.x);
      y1 = Math.min(y1, current.y);
      x2 = Math.max(x2, current.x + current.w);
      y2 = Math.max(y2, current.y + current.h);
    }
    for (const child of current.children ?? []) stack.push(child);
  }
  if (x1 > x2) return null;
  return { x: x1, y: y1, w: x2 - x1, h: y2 - y1 };
}

export class LayoutIndex {
  private readonly byNode = new WeakMap<ElementNode, LayoutNode>();

  register(node: LayoutNode): void {
    if (node.kind === "document" || node.kind === "block" || node.kind === "input") {
      this.byNode.set(node.node, node);
    }
  }

  /** Attached layout node created for exactly `node`, if any. */
  exact(node: ElementNode, document: DocumentLayout): LayoutNode | null {
    const hit = this.byNode.get(node);
    if (!hit) return null;
    return isAttached(hit, document) ? hit : null;
  }

  /**
   * Layout node to reflow when `node` changes: its own, or the one of its
   * nearest ancestor.
   */
  nearest(node: ContentNode, document: DocumentLayout): LayoutNode | null {
    let current: ContentNode | null = node;
    while (current) {
      if (current.kind === "element") {
        const hit = this.exact(current, document);
        if (hit) return hit;
      }
      current = current.parent;
    }
    return null;
  }
}
