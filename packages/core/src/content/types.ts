/**
 * packages/core/src/content/types.ts — Content (DOM) tree types.
 *
 * The content tree comes from the parser/style subsystem, which lives outside
 * this package. Style values are opaque strings; layout parses the ones it
 * needs (e.g. "12px").
 *
 * Ownership: the tree is mutated only on the main thread.
 */

/** String-keyed CSS property → value map. */
export type StyleMap = Record<string, string>;

export type ElementNode = {
  readonly kind: "element";
  readonly tag: string;
  attributes: Record<string, string>;
  /** Declarations resolved by the stylesheet cascade. */
  style: StyleMap;
  /** Declarations from the `style` attribute; win over `style`. */
  inlineStyle: StyleMap;
  /** Declared style plus inherited properties; filled by the style phase. */
  computedStyle: StyleMap;
  children: ContentNode[];
  parent: ElementNode | null;
};

export type TextNode = {
  readonly kind: "text";
  text: string;
  /** Shares the parent's computed style after the style phase. */
  computedStyle: StyleMap;
  parent: ElementNode | null;
};

export type ContentNode = ElementNode | TextNode;

export function isElement(node: ContentNode | null | undefined): node is ElementNode {
  return node !== null && node !== undefined && node.kind === "element";
}
