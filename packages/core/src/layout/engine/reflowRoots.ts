import type { LayoutNode } from "../types.js";

/**
 * Layout nodes whose subtree must be re-sized on the next pipeline run.
 *
 * Insertion order is kept and duplicates are not removed: re-sizing a root
 * twice is redundant but harmless, and an ancestor/descendant pair is sized
 * in the order it was marked.
 */
export class ReflowRootSet {
  private roots: LayoutNode[] = [];

  add(node: LayoutNode): void {
    this.roots.push(node);
  }

  get size(): number {
    return this.roots.length;
  }

  has(node: LayoutNode): boolean {
    return this.roots.includes(node);
  }

  /** Return the queued roots in insertion order and empty the set. */
  drain(): readonly LayoutNode[] {
    const out = this.roots;
    this.roots = [];
    return out;
  }

  clear(): void {
    this.roots = [];
  }
}
