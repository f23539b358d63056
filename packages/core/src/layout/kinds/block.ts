import type { ElementNode } from "../../content/types.js";
import type { LayoutContext, PositionFn, SizeFn } from "../engine/types.js";
import type { BlockLayout, InlineLayout, LayoutNode } from "../types.js";
import { zeroEdges } from "../types.js";
import { devicePx, px } from "../units.js";
import { contentWidth, marginBottom, marginLeft, marginTop, readBoxEdges } from "./box.js";
import { displayOf, hasBlockChildren } from "./display.js";
import { createInline } from "./inline.js";

export function createBlock(node: ElementNode, parent: LayoutNode): BlockLayout {
  return {
    kind: "block",
    node,
    parent,
    children: null,
    x: 0,
    y: 0,
    w: 0,
    h: 0,
    zoom: parent.zoom,
    box: zeroEdges(),
  };
}

export function sizeBlock(block: BlockLayout, ctx: LayoutContext, sizeChild: SizeFn): void {
  const parent = block.parent;
  if (parent !== null) block.zoom = parent.zoom;
  const style = block.node.computedStyle;
  block.box = readBoxEdges(style, block.zoom);
  ctx.index.register(block);

  const children: Array<BlockLayout | InlineLayout> = [];
  if (hasBlockChildren(block.node)) {
    for (const child of block.node.children) {
      if (child.kind !== "element" || displayOf(child) === "none") continue;
      children.push(createBlock(child, block));
    }
  } else {
    children.push(createInline(block.node, block));
  }
  block.children = children;

  // Missing or malformed width falls back to the parent's content width.
  const available = Math.max(
    0,
    (parent ? contentWidth(parent, ctx) : ctx.viewportWidth) - block.box.ml - block.box.mr,
  );
  const explicit = px(style.width, Number.NaN);
  block.w =
    Number.isFinite(explicit) && explicit >= 0
      ? Math.min(devicePx(explicit, block.zoom), available)
      : available;

  for (const child of children) sizeChild(child, ctx);
  computeBlockHeight(block);
}

export function computeBlockHeight(block: BlockLayout): void {
  const explicit = px(block.node.computedStyle.height, Number.NaN);
  if (Number.isFinite(explicit) && explicit >= 0) {
    block.h = devicePx(explicit, block.zoom);
    return;
  }
  const b = block.box;
  let h = b.bt + b.pt + b.pb + b.bb;
  for (const child of block.children ?? []) {
    h += marginTop(child) + child.h + marginBottom(child);
  }
  block.h = h;
}

export function positionBlock(block: BlockLayout, ctx: LayoutContext, positionChild: PositionFn): void {
  const b = block.box;
  let cy = block.y + b.bt + b.pt;
  for (const child of block.children ?? []) {
    child.x = block.x + b.bl + b.pl + marginLeft(child);
    child.y = cy + marginTop(child);
    positionChild(child, ctx);
    cy += marginTop(child) + child.h + marginBottom(child);
  }
}
