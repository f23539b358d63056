import type { ContentNode, ElementNode } from "../../content/types.js";

/** Elements laid out inline unless their style says otherwise. */
const INLINE_TAGS: ReadonlySet<string> = new Set([
  "a",
  "abbr",
  "b",
  "br",
  "button",
  "code",
  "em",
  "i",
  "input",
  "small",
  "span",
  "strong",
  "sub",
  "sup",
]);

export type DisplayMode = "block" | "inline" | "none";

function modeOf(node: ElementNode, declared: string | undefined): DisplayMode {
  if (declared === "none") return "none";
  if (declared === "inline") return "inline";
  if (declared === "block") return "block";
  return INLINE_TAGS.has(node.tag) ? "inline" : "block";
}

/** Display mode as of the last style phase. */
export function displayOf(node: ElementNode): DisplayMode {
  return modeOf(node, node.computedStyle.display ?? node.inlineStyle.display ?? node.style.display);
}

/** Display mode the next style phase will compute, ignoring any stale computed style. */
export function declaredDisplayOf(node: ElementNode): DisplayMode {
  return modeOf(node, node.inlineStyle.display ?? node.style.display);
}

function isWhitespaceText(node: ContentNode): boolean {
  return node.kind === "text" && node.text.trim().length === 0;
}

/** Block children when every child is block-level; any inline content switches to inline layout. */
export function hasBlockChildren(node: ElementNode): boolean {
  for (const child of node.children) {
    if (child.kind === "text") {
      if (!isWhitespaceText(child)) return false;
      continue;
    }
    if (displayOf(child) === "inline") return false;
  }
  return true;
}
