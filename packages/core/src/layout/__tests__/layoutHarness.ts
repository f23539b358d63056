import type { ElementNode } from "../../content/types.js";
import { resolveStyles } from "../../content/style.js";
import { positionNode, sizeNode } from "../engine/layoutEngine.js";
import { type LayoutContext, createLayoutProfile } from "../engine/types.js";
import { FontCache, createFixedWidthFontLoader } from "../fonts.js";
import { createDocument } from "../kinds/document.js";
import { LayoutIndex } from "../lookup.js";
import type { DocumentLayout, LayoutKind, LayoutNode } from "../types.js";

export function makeCtx(overrides: Partial<LayoutContext> = {}): LayoutContext {
  return {
    fonts: new FontCache(createFixedWidthFontLoader()),
    viewportWidth: 800,
    hstep: 10,
    vstep: 10,
    inputWidthPx: 200,
    profile: createLayoutProfile(),
    index: new LayoutIndex(),
    ...overrides,
  };
}

export function layoutPage(root: ElementNode, ctx: LayoutContext, zoom = 1): DocumentLayout {
  resolveStyles(root);
  const doc = createDocument(root, zoom);
  sizeNode(doc, ctx);
  positionNode(doc, ctx);
  return doc;
}

export function allNodes(root: LayoutNode): LayoutNode[] {
  const out: LayoutNode[] = [root];
  for (const child of root.children ?? []) out.push(...allNodes(child));
  return out;
}

export function nodesOfKind(root: LayoutNode, kind: LayoutKind): LayoutNode[] {
  return allNodes(root).filter((n) => n.kind === kind);
}

export function words(root: LayoutNode): string[] {
  const out: string[] = [];
  for (const n of allNodes(root)) if (n.kind === "text") out.push(n.word);
  return out;
}

export function assertClose(actual: number, expected: number, message?: string): void {
  if (Math.abs(actual - expected) > 1e-6) {
    throw new Error(message ?? `expected ${String(expected)}, got ${String(actual)}`);
  }
}
