import type { ElementNode } from "../../content/types.js";
import type { LayoutContext } from "../engine/types.js";
import type { InputLayout, LineLayout } from "../types.js";
import { devicePx } from "../units.js";
import { fontFor } from "./text.js";

export function createInput(node: ElementNode, parent: LineLayout): InputLayout {
  return {
    kind: "input",
    node,
    parent,
    children: null,
    x: 0,
    y: 0,
    w: 0,
    h: 0,
    zoom: parent.zoom,
    font: null,
  };
}

/** Fixed-width control, never wider than the line it sits on. */
export function sizeInput(input: InputLayout, ctx: LayoutContext): void {
  const parent = input.parent;
  if (parent !== null) input.zoom = parent.zoom;
  input.children = [];
  ctx.index.register(input);
  input.font = fontFor(input.node.computedStyle, input.zoom, ctx);
  const natural = devicePx(ctx.inputWidthPx, input.zoom);
  input.w = parent !== null ? Math.min(natural, parent.w) : natural;
  input.h = input.font.metrics().linespace;
}
