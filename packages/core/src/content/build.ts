import type { ContentNode, ElementNode, StyleMap, TextNode } from "./types.js";

/**
 * Parse an inline `style` attribute ("color: red; margin-left: 4px").
 * Declarations without a colon are skipped; property names are lowercased.
 */
export function parseInlineStyle(source: string): StyleMap {
  const out: StyleMap = {};
  for (const pair of source.split(";")) {
    const colon = pair.indexOf(":");
    if (colon < 0) continue;
    const prop = pair.slice(0, colon).trim().toLowerCase();
    const value = pair.slice(colon + 1).trim();
    if (prop.length === 0 || value.length === 0) continue;
    out[prop] = value;
  }
  return out;
}

export function text(value: string): TextNode {
  return { kind: "text", text: value, computedStyle: {}, parent: null };
}

/**
 * Create an element, parse its inline style attribute and adopt `children`.
 * `style` holds declarations resolved by the (external) cascade; inline
 * declarations are kept apart in `inlineStyle` and win over it.
 */
export function element(
  tag: string,
  attributes: Readonly<Record<string, string>> = {},
  children: readonly ContentNode[] = [],
  style: Readonly<StyleMap> = {},
): ElementNode {
  const node: ElementNode = {
    kind: "element",
    tag: tag.toLowerCase(),
    attributes: { ...attributes },
    style: { ...style },
    inlineStyle: attributes.style === undefined ? {} : parseInlineStyle(attributes.style),
    computedStyle: {},
    children: [],
    parent: null,
  };
  replaceChildren(node, children);
  return node;
}

/** Replace `parent`'s children, detaching the previous ones. */
export function replaceChildren(parent: ElementNode, children: readonly ContentNode[]): void {
  for (const old of parent.children) old.parent = null;
  parent.children = [...children];
  for (const child of parent.children) child.parent = parent;
}

/** Pre-order list of every node in the subtree. */
export function treeToList(root: ContentNode): ContentNode[] {
  const out: ContentNode[] = [];
  const stack: ContentNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) continue;
    out.push(node);
    if (node.kind === "element") {
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        if (child) stack.push(child);
      }
    }
  }
  return out;
}

/** Text content of a subtree, concatenated in document order. */
export function textContent(node: ContentNode): string {
  if (node.kind === "text") return node.text;
  let out = "";
  for (const child of node.children) out += textContent(child);
  return out;
}

/** Whether `ancestor` is `node` or one of its ancestors. */
export function isDescendantOf(node: ContentNode, ancestor: ElementNode): boolean {
  let current: ContentNode | null = node;
  while (current) {
    if (current === ancestor) return true;
    current = current.parent;
  }
  return false;
}

/** Nearest ancestor (inclusive) with the given tag. */
export function closestTag(node: ContentNode | null, tag: string): ElementNode | null {
  let current: ContentNode | null = node;
  while (current) {
    if (current.kind === "element" && current.tag === tag) return current;
    current = current.parent;
  }
  return null;
}
