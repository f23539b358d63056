/**
 * packages/core/src/renderer/paint.ts — Layout tree to display list.
 *
 * Traversal is depth-first preorder so a parent's background is emitted
 * before (and therefore drawn under) its children.
 *
 * Paint rules:
 *   - block: `background-color` fill (skipped for "transparent"), `outline`;
 *     `opacity` below 1 applies to the block and everything painted inside it
 *   - text: one run per word, coloured by the inherited `color`
 *   - input/button: light background, value (or label) text, caret when focused
 *   - focused element: 1px black focus outline around its box, or around
 *     the union of its text runs when it is laid out inline
 */

import { textContent } from "../content/build.js";
import type { ElementNode } from "../content/types.js";
import type { DisplayListBuilder } from "../displayList/types.js";
import { clamp01 } from "../animation/interpolate.js";
import { leafBounds } from "../layout/lookup.js";
import type { InputLayout, LayoutNode } from "../layout/types.js";
import { devicePx } from "../layout/units.js";

export const INPUT_BACKGROUND = "lightblue";
const FOCUS_COLOR = "black";

export type PaintState = Readonly<{
  /** Element that currently has content focus, if any. */
  focus: ElementNode | null;
}>;

export type OutlineSpec = Readonly<{ thickness: number; color: string }>;

/**
 * Parse `<N>px solid <color>`. Any other form (other styles, units, missing
 * parts) yields null and no outline is painted.
 */
export function parseOutline(value: string | undefined): OutlineSpec | null {
  if (value === undefined) return null;
  const parts = value.trim().split(/\s+/);
  if (parts.length !== 3) return null;
  const [width, style, color] = parts;
  if (width === undefined || style !== "solid" || color === undefined) return null;
  const m = /^(\d+(?:\.\d+)?)px$/.exec(width);
  if (!m || m[1] === undefined) return null;
  const thickness = Number.parseFloat(m[1]);
  if (!(thickness > 0)) return null;
  return { thickness, color };
}

/** `opacity` as a number in [0, 1]; missing or malformed values are opaque. */
export function parseOpacity(value: string | undefined): number {
  if (value === undefined) return 1;
  const n = Number.parseFloat(value);
  return Number.isFinite(n) ? clamp01(n) : 1;
}

/** Text shown inside an input-like control. */
export function inputText(node: ElementNode): string {
  if (node.tag === "input") return node.attributes.value ?? "";
  return textContent(node);
}

function paintInput(input: InputLayout, state: PaintState, builder: DisplayListBuilder): void {
  builder.fillRect(input.x, input.y, input.w, input.h, INPUT_BACKGROUND);
  const font = input.font;
  if (!font) return;
  const value = inputText(input.node);
  const color = input.node.computedStyle.color ?? "black";
  if (value.length > 0) {
    builder.drawText(input.x, input.y, value, color, font.descriptor, font.measure(value), input.h);
  }
  if (state.focus === input.node && input.node.tag === "input") {
    const cx = input.x + font.measure(value);
    builder.drawLine(cx, input.y, cx, input.y + input.h, "black", 1);
  }
}

/** Returns whether the focus outline was painted within `node`. */
function paintNode(node: LayoutNode, state: PaintState, builder: DisplayListBuilder): boolean {
  const opacity = node.kind === "block" ? parseOpacity(node.node.computedStyle.opacity) : 1;
  if (opacity < 1) builder.pushOpacity(opacity);
  const focused = paintContents(node, state, builder);
  if (opacity < 1) builder.popOpacity();
  return focused;
}

function paintContents(node: LayoutNode, state: PaintState, builder: DisplayListBuilder): boolean {
  switch (node.kind) {
    case "block": {
      const style = node.node.computedStyle;
      const bg = style["background-color"];
      if (bg !== undefined && bg !== "transparent") {
        builder.fillRect(node.x, node.y, node.w, node.h, bg);
      }
      const outline = parseOutline(style.outline);
      if (outline) {
        builder.strokeRect(
          node.x,
          node.y,
          node.w,
          node.h,
          outline.color,
          devicePx(outline.thickness, node.zoom),
        );
      }
      break;
    }
    case "text": {
      const font = node.font;
      if (font) {
        const color = node.node.computedStyle.color ?? "black";
        builder.drawText(node.x, node.y, node.word, color, font.descriptor, node.w, node.h);
      }
      break;
    }
    case "input":
      paintInput(node, state, builder);
      break;
    case "document":
    case "inline":
    case "line":
      break;
  }

  let focused = false;
  for (const child of node.children ?? []) {
    if (paintNode(child, state, builder)) focused = true;
  }

  if (
    state.focus !== null &&
    (node.kind === "block" || node.kind === "input") &&
    node.node === state.focus
  ) {
    builder.strokeRect(node.x, node.y, node.w, node.h, FOCUS_COLOR, 1);
    return true;
  }
  return focused;
}

export function paintTree(root: LayoutNode, state: PaintState, builder: DisplayListBuilder): void {
  if (paintNode(root, state, builder) || state.focus === null) return;
  const bounds = leafBounds(root, state.focus);
  if (bounds) builder.strokeRect(bounds.x, bounds.y, bounds.w, bounds.h, FOCUS_COLOR, 1);
}
