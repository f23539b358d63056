import type { StyleMap, TextNode } from "../../content/types.js";
import type { LayoutContext } from "../engine/types.js";
import { type FontHandle, normalizeSlant, normalizeWeight } from "../fonts.js";
import type { LineLayout, TextLayout } from "../types.js";
import { devicePx, px } from "../units.js";

const DEFAULT_FONT_SIZE_PX = 16;

/** Cached font for a computed style at the given zoom. */
export function fontFor(style: Readonly<StyleMap>, zoom: number, ctx: LayoutContext): FontHandle {
  const size = devicePx(px(style["font-size"], DEFAULT_FONT_SIZE_PX), zoom);
  return ctx.fonts.get(size, normalizeWeight(style["font-weight"]), normalizeSlant(style["font-style"]));
}

export function createText(node: TextNode, word: string, parent: LineLayout): TextLayout {
  return {
    kind: "text",
    node,
    word,
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

export function sizeText(t: TextLayout, ctx: LayoutContext): void {
  if (t.parent !== null) t.zoom = t.parent.zoom;
  t.children = [];
  t.font = fontFor(t.node.computedStyle, t.zoom, ctx);
  t.w = t.font.measure(t.word);
  t.h = t.font.metrics().linespace;
}
