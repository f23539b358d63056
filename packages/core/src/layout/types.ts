/**
 * packages/core/src/layout/types.ts — Layout tree node types.
 *
 * Layout nodes are a tagged union dispatched by `kind`. Geometry is in device
 * pixels. `children === null` means the node was never sized; an empty array
 * is a valid, clean state.
 *
 * Invariants:
 *   - size() reads no x/y and calls no position()
 *   - position() writes a child's x/y, then positions that child before the next
 *
 * @see ./engine/layoutEngine.ts
 */

import type { ElementNode, TextNode } from "../content/types.js";
import type { FontHandle } from "./fonts.js";

/** Rectangle in device pixels. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

export type LayoutKind = "document" | "block" | "inline" | "line" | "text" | "input";

/** Margin, border and padding widths in device pixels. */
export type BoxEdges = {
  mt: number;
  mr: number;
  mb: number;
  ml: number;
  bt: number;
  br: number;
  bb: number;
  bl: number;
  pt: number;
  pr: number;
  pb: number;
  pl: number;
};

type LayoutBase = {
  parent: LayoutNode | null;
  children: LayoutNode[] | null;
  x: number;
  y: number;
  w: number;
  h: number;
  zoom: number;
};

export type DocumentLayout = LayoutBase & {
  readonly kind: "document";
  readonly node: ElementNode;
  parent: null;
};

export type BlockLayout = LayoutBase & {
  readonly kind: "block";
  readonly node: ElementNode;
  box: BoxEdges;
};

export type InlineLayout = LayoutBase & {
  readonly kind: "inline";
  /** The block-level element whose inline content this node lays out. */
  readonly node: ElementNode;
};

export type LineLayout = LayoutBase & {
  readonly kind: "line";
  readonly node: ElementNode;
  /** Running horizontal offset while the inline parent appends children. */
  cx: number;
  /** Per-child horizontal offsets, applied as positions in position(). */
  cxs: number[];
  maxAscent: number;
  maxDescent: number;
};

export type TextLayout = LayoutBase & {
  readonly kind: "text";
  readonly node: TextNode;
  readonly word: string;
  font: FontHandle | null;
};

export type InputLayout = LayoutBase & {
  readonly kind: "input";
  readonly node: ElementNode;
  font: FontHandle | null;
};

export type LayoutNode =
  | DocumentLayout
  | BlockLayout
  | InlineLayout
  | LineLayout
  | TextLayout
  | InputLayout;

/** Leaves that sit on a line. */
export type InlineItem = TextLayout | InputLayout;

export function zeroEdges(): BoxEdges {
  return { mt: 0, mr: 0, mb: 0, ml: 0, bt: 0, br: 0, bb: 0, bl: 0, pt: 0, pr: 0, pb: 0, pl: 0 };
}

export function rectOf(node: LayoutNode): Rect {
  return { x: node.x, y: node.y, w: node.w, h: node.h };
}
