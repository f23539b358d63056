import type { StyleMap } from "../../content/types.js";
import type { LayoutContext } from "../engine/types.js";
import type { BoxEdges, LayoutNode } from "../types.js";
import { devicePx, px } from "../units.js";

/** Read margin/border/padding widths from style, scaled to device pixels. */
export function readBoxEdges(style: Readonly<StyleMap>, zoom: number): BoxEdges {
  const edge = (prop: string) => Math.max(0, devicePx(px(style[prop], 0), zoom));
  return {
    mt: edge("margin-top"),
    mr: edge("margin-right"),
    mb: edge("margin-bottom"),
    ml: edge("margin-left"),
    bt: edge("border-top-width"),
    br: edge("border-right-width"),
    bb: edge("border-bottom-width"),
    bl: edge("border-left-width"),
    pt: edge("padding-top"),
    pr: edge("padding-right"),
    pb: edge("padding-bottom"),
    pl: edge("padding-left"),
  };
}

export function marginTop(node: LayoutNode): number {
  return node.kind === "block" ? node.box.mt : 0;
}

export function marginBottom(node: LayoutNode): number {
  return node.kind === "block" ? node.box.mb : 0;
}

export function marginLeft(node: LayoutNode): number {
  return node.kind === "block" ? node.box.ml : 0;
}

export function pageMarginX(node: LayoutNode, ctx: LayoutContext): number {
  return devicePx(ctx.hstep, node.zoom);
}

export function pageMarginY(node: LayoutNode, ctx: LayoutContext): number {
  return devicePx(ctx.vstep, node.zoom);
}

/** Width available to the children of `node`. Reads only sizes. */
export function contentWidth(node: LayoutNode, ctx: LayoutContext): number {
  switch (node.kind) {
    case "document":
      return Math.max(0, node.w - 2 * pageMarginX(node, ctx));
    case "block": {
      const b = node.box;
      return Math.max(0, node.w - b.pl - b.pr - b.bl - b.br);
    }
    case "inline":
    case "line":
    case "text":
    case "input":
      return node.w;
  }
}
