import type { ElementNode } from "../../content/types.js";
import type { LayoutContext, PositionFn } from "../engine/types.js";
import type { FontHandle } from "../fonts.js";
import type { InlineItem, InlineLayout, LayoutNode, LineLayout } from "../types.js";

/** Line height as a multiple of ascent + descent. */
const LINE_HEIGHT_FACTOR = 1.2;

function itemFont(node: LayoutNode): FontHandle | null {
  return node.kind === "text" || node.kind === "input" ? node.font : null;
}

function spaceAfter(node: LayoutNode): number {
  const font = itemFont(node);
  return font ? font.measure(" ") : 0;
}

export function createLine(node: ElementNode, parent: InlineLayout): LineLayout {
  return {
    kind: "line",
    node,
    parent,
    children: [],
    x: 0,
    y: 0,
    w: parent.w,
    h: 0,
    zoom: parent.zoom,
    cx: 0,
    cxs: [],
    maxAscent: 0,
    maxDescent: 0,
  };
}

/** Append an already-sized item, advancing the running offset. */
export function appendToLine(line: LineLayout, item: InlineItem): void {
  const children = line.children ?? [];
  line.children = children;
  children.push(item);
  item.parent = line;
  line.cx += item.w + spaceAfter(item);
}

export function sizeLine(line: LineLayout): void {
  const parent = line.parent;
  if (parent !== null) {
    line.zoom = parent.zoom;
    line.w = parent.w;
  }
  if (line.children === null) line.children = [];
  computeLineHeight(line);
}

/** Recompute metrics and per-child offsets from the children's current sizes. */
export function computeLineHeight(line: LineLayout): void {
  const children = line.children ?? [];
  let maxAscent = 0;
  let maxDescent = 0;
  let cx = 0;
  const cxs: number[] = [];
  for (const child of children) {
    const font = itemFont(child);
    if (font) {
      const m = font.metrics();
      maxAscent = Math.max(maxAscent, m.ascent);
      maxDescent = Math.max(maxDescent, m.descent);
    }
    cxs.push(cx);
    cx += child.w + spaceAfter(child);
  }
  line.maxAscent = maxAscent;
  line.maxDescent = maxDescent;
  line.cxs = cxs;
  line.cx = cx;
  line.h = children.length === 0 ? 0 : LINE_HEIGHT_FACTOR * (maxAscent + maxDescent);
}

export function positionLine(line: LineLayout, ctx: LayoutContext, positionChild: PositionFn): void {
  const baseline = line.y + LINE_HEIGHT_FACTOR * line.maxAscent;
  const children = line.children ?? [];
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (!child) continue;
    const font = itemFont(child);
    child.x = line.x + (line.cxs[i] ?? 0);
    child.y = baseline - (font ? font.metrics().ascent : 0);
    positionChild(child, ctx);
  }
}
