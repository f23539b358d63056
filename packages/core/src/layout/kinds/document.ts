import type { ElementNode } from "../../content/types.js";
import type { LayoutContext, PositionFn, SizeFn } from "../engine/types.js";
import type { DocumentLayout } from "../types.js";
import { createBlock } from "./block.js";
import { marginLeft, marginTop, pageMarginX, pageMarginY } from "./box.js";

export function createDocument(node: ElementNode, zoom: number): DocumentLayout {
  return { kind: "document", node, parent: null, children: null, x: 0, y: 0, w: 0, h: 0, zoom };
}

export function sizeDocument(doc: DocumentLayout, ctx: LayoutContext, sizeChild: SizeFn): void {
  doc.w = ctx.viewportWidth;
  ctx.index.register(doc);
  const child = createBlock(doc.node, doc);
  doc.children = [child];
  sizeChild(child, ctx);
  computeDocumentHeight(doc, ctx);
}

export function computeDocumentHeight(doc: DocumentLayout, ctx: LayoutContext): void {
  const child = doc.children?.[0];
  doc.h = (child ? child.h : 0) + 2 * pageMarginY(doc, ctx);
}

/** The document anchors itself at the device-pixel origin. */
export function positionDocument(
  doc: DocumentLayout,
  ctx: LayoutContext,
  positionChild: PositionFn,
): void {
  doc.x = 0;
  doc.y = 0;
  for (const child of doc.children ?? []) {
    child.x = doc.x + pageMarginX(doc, ctx) + marginLeft(child);
    child.y = doc.y + pageMarginY(doc, ctx) + marginTop(child);
    positionChild(child, ctx);
  }
}
