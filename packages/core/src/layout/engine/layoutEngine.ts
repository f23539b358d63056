/**
 * packages/core/src/layout/engine/layoutEngine.ts — Two-phase layout dispatch.
 *
 * Why: size() and position() are split so that a dirty subtree can be resized
 * in isolation and the whole tree then re-positioned in one cheap top-down
 * pass. Kind modules receive the dispatchers as callbacks to avoid import
 * cycles between kinds.
 *
 * Invariants:
 *   - size() reads no x/y and calls no position()
 *   - position() writes a child's x/y and recurses into it before the next child
 *   - computeHeight() never creates children; it only re-derives from sizes
 *
 * @see ../types.ts
 */

import { computeBlockHeight, positionBlock, sizeBlock } from "../kinds/block.js";
import { computeDocumentHeight, positionDocument, sizeDocument } from "../kinds/document.js";
import { computeInlineHeight, positionInline, sizeInline } from "../kinds/inline.js";
import { sizeInput } from "../kinds/input.js";
import { computeLineHeight, positionLine, sizeLine } from "../kinds/line.js";
import { sizeText } from "../kinds/text.js";
import type { LayoutNode } from "../types.js";
import type { LayoutContext } from "./types.js";

export function sizeNode(node: LayoutNode, ctx: LayoutContext): void {
  const profile = ctx.profile;
  profile.sizeCalls++;
  profile.sizeByKind[node.kind] = (profile.sizeByKind[node.kind] ?? 0) + 1;

  switch (node.kind) {
    case "document":
      sizeDocument(node, ctx, sizeNode);
      return;
    case "block":
      sizeBlock(node, ctx, sizeNode);
      return;
    case "inline":
      sizeInline(node, ctx, sizeNode);
      return;
    case "line":
      sizeLine(node);
      return;
    case "text":
      sizeText(node, ctx);
      return;
    case "input":
      sizeInput(node, ctx);
      return;
  }
}

export function positionNode(node: LayoutNode, ctx: LayoutContext): void {
  ctx.profile.positionCalls++;
  switch (node.kind) {
    case "document":
      positionDocument(node, ctx, positionNode);
      return;
    case "block":
      positionBlock(node, ctx, positionNode);
      return;
    case "inline":
      positionInline(node, ctx, positionNode);
      return;
    case "line":
      positionLine(node, ctx, positionNode);
      return;
    case "text":
    case "input":
      // Leaves: x/y were written by the parent line.
      return;
  }
}

/** Re-derive `node`'s height from its already-sized children. */
export function computeHeight(node: LayoutNode, ctx: LayoutContext): void {
  ctx.profile.heightCalls++;
  switch (node.kind) {
    case "document":
      computeDocumentHeight(node, ctx);
      return;
    case "block":
      computeBlockHeight(node);
      return;
    case "inline":
      computeInlineHeight(node);
      return;
    case "line":
      computeLineHeight(node);
      return;
    case "text":
    case "input":
      return;
  }
}

/** Recompute heights from `node` up to the root of its tree. */
export function propagateHeights(node: LayoutNode | null, ctx: LayoutContext): void {
  let current = node;
  while (current !== null) {
    computeHeight(current, ctx);
    current = current.parent;
  }
}
