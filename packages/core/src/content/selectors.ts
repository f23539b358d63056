import { treeToList } from "./build.js";
import type { ContentNode, ElementNode } from "./types.js";

/** Simple selector: `tag`, `#id` or `.class`. */
export type Selector =
  | Readonly<{ kind: "tag"; tag: string }>
  | Readonly<{ kind: "id"; id: string }>
  | Readonly<{ kind: "class"; className: string }>;

/** Returns null for empty or compound selectors, which are not supported. */
export function parseSelector(source: string): Selector | null {
  const s = source.trim();
  if (s.length < 1 || /\s/.test(s)) return null;
  if (s.startsWith("#")) return s.length > 1 ? { kind: "id", id: s.slice(1) } : null;
  if (s.startsWith(".")) return s.length > 1 ? { kind: "class", className: s.slice(1) } : null;
  if (!/^[a-zA-Z][a-zA-Z0-9-]*$/.test(s)) return null;
  return { kind: "tag", tag: s.toLowerCase() };
}

export function matchesSelector(selector: Selector, node: ElementNode): boolean {
  switch (selector.kind) {
    case "tag":
      return node.tag === selector.tag;
    case "id":
      return node.attributes.id === selector.id;
    case "class": {
      const classes = (node.attributes.class ?? "").split(/\s+/);
      return classes.includes(selector.className);
    }
  }
}

export function querySelectorAll(root: ContentNode, source: string): ElementNode[] {
  const selector = parseSelector(source);
  if (!selector) return [];
  const out: ElementNode[] = [];
  for (const node of treeToList(root)) {
    if (node.kind === "element" && matchesSelector(selector, node)) out.push(node);
  }
  return out;
}
