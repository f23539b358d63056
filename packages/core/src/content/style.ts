/**
 * packages/core/src/content/style.ts — Style phase.
 *
 * Computes `computedStyle` for a subtree from declared style plus inherited
 * properties. Cascade and selector matching happen upstream; this phase only
 * resolves inheritance so layout can read every property it needs.
 */

import type { ContentNode, ElementNode, StyleMap } from "./types.js";

/** Inherited properties and their root defaults. */
export const INHERITED_PROPERTIES: Readonly<StyleMap> = Object.freeze({
  "font-size": "16px",
  "font-style": "normal",
  "font-weight": "normal",
  color: "black",
});

function parentComputedStyle(node: ContentNode): Readonly<StyleMap> | null {
  return node.parent ? node.parent.computedStyle : null;
}

/**
 * Called for each restyled element that already had a computed style, before
 * `next` is installed. May rewrite values in `next`.
 */
export type RestyleHook = (node: ElementNode, previous: Readonly<StyleMap>, next: StyleMap) => void;

/**
 * Recompute computed style for `root` and its descendants.
 * `root`'s parent must already have a computed style (or be absent).
 */
export function resolveStyles(root: ContentNode, onRestyle?: RestyleHook): void {
  const stack: ContentNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) continue;
    const inherited = parentComputedStyle(node);
    if (node.kind === "text") {
      node.computedStyle = inherited ?? { ...INHERITED_PROPERTIES };
      continue;
    }
    const computed: StyleMap = { ...node.style, ...node.inlineStyle };
    for (const [prop, fallback] of Object.entries(INHERITED_PROPERTIES)) {
      if (computed[prop] !== undefined) continue;
      computed[prop] = inherited?.[prop] ?? fallback;
    }
    if (onRestyle && Object.keys(node.computedStyle).length > 0) onRestyle(node, node.computedStyle, computed);
    node.computedStyle = computed;
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) stack.push(child);
    }
  }
}

/** Computed value with a fallback for properties the cascade did not set. */
export function styleValue(node: ContentNode, prop: string, fallback: string): string {
  return node.computedStyle[prop] ?? fallback;
}
