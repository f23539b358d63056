/**
 * Inline formatting: breaks a block's inline content into lines.
 *
 * Word widths are known once each word is sized, so horizontal placement is
 * accumulated as offsets (`cx`) on the line during size() and only turned
 * into absolute positions by the line's position().
 */

import type { ContentNode, ElementNode, TextNode } from "../../content/types.js";
import type { LayoutContext, PositionFn, SizeFn } from "../engine/types.js";
import type { InlineItem, InlineLayout, LayoutNode, LineLayout } from "../types.js";
import { contentWidth } from "./box.js";
import { displayOf } from "./display.js";
import { createInput } from "./input.js";
import { appendToLine, createLine } from "./line.js";
import { createText } from "./text.js";

export function createInline(node: ElementNode, parent: LayoutNode): InlineLayout {
  return {
    kind: "inline",
    node,
    parent,
    children: null,
    x: 0,
    y: 0,
    w: 0,
    h: 0,
    zoom: parent.zoom,
  };
}

type LineBreaker = {
  readonly inline: InlineLayout;
  readonly lines: LineLayout[];
  current: LineLayout;
};

function flush(state: LineBreaker, ctx: LayoutContext, sizeChild: SizeFn): void {
  sizeChild(state.current, ctx);
  state.current = createLine(state.inline.node, state.inline);
  state.lines.push(state.current);
}

function place(state: LineBreaker, item: InlineItem, ctx: LayoutContext, sizeChild: SizeFn): void {
  sizeChild(item, ctx);
  const line = state.current;
  const occupied = (line.children ?? []).length > 0;
  if (occupied && line.cx + item.w > state.inline.w) flush(state, ctx, sizeChild);
  appendToLine(state.current, item);
}

function placeText(state: LineBreaker, node: TextNode, ctx: LayoutContext, sizeChild: SizeFn): void {
  for (const word of node.text.split(/\s+/)) {
    if (word.length === 0) continue;
    place(state, createText(node, word, state.current), ctx, sizeChild);
  }
}

function recurse(state: LineBreaker, node: ContentNode, ctx: LayoutContext, sizeChild: SizeFn): void {
  if (node.kind === "text") {
    placeText(state, node, ctx, sizeChild);
    return;
  }
  if (node.tag === "br") {
    flush(state, ctx, sizeChild);
    return;
  }
  if (node.tag === "input" || node.tag === "button") {
    place(state, createInput(node, state.current), ctx, sizeChild);
    return;
  }
  if (displayOf(node) === "none") return;
  for (const child of node.children) recurse(state, child, ctx, sizeChild);
}

export function sizeInline(inline: InlineLayout, ctx: LayoutContext, sizeChild: SizeFn): void {
  const parent = inline.parent;
  if (parent !== null) {
    inline.zoom = parent.zoom;
    inline.w = contentWidth(parent, ctx);
  }
  const first = createLine(inline.node, inline);
  const state: LineBreaker = { inline, lines: [first], current: first };
  for (const child of inline.node.children) recurse(state, child, ctx, sizeChild);

  if ((state.current.children ?? []).length > 0) {
    sizeChild(state.current, ctx);
  } else {
    state.lines.pop();
  }
  inline.children = state.lines;
  computeInlineHeight(inline);
}

export function computeInlineHeight(inline: InlineLayout): void {
  let h = 0;
  for (const line of inline.children ?? []) h += line.h;
  inline.h = h;
}

export function positionInline(
  inline: InlineLayout,
  ctx: LayoutContext,
  positionChild: PositionFn,
): void {
  let cy = inline.y;
  for (const child of inline.children ?? []) {
    child.x = inline.x;
    child.y = cy;
    positionChild(child, ctx);
    cy += child.h;
  }
}
