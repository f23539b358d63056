import type { FontCache } from "../fonts.js";
import type { LayoutIndex } from "../lookup.js";
import type { LayoutKind, LayoutNode } from "../types.js";

/** Per-kind call counters; used to observe how much of the tree a run touched. */
export type LayoutProfile = {
  sizeCalls: number;
  positionCalls: number;
  heightCalls: number;
  sizeByKind: Partial<Record<LayoutKind, number>>;
  reset(): void;
};

export function createLayoutProfile(): LayoutProfile {
  return {
    sizeCalls: 0,
    positionCalls: 0,
    heightCalls: 0,
    sizeByKind: {},
    reset(): void {
      this.sizeCalls = 0;
      this.positionCalls = 0;
      this.heightCalls = 0;
      this.sizeByKind = {};
    },
  };
}

/** Inputs shared by every node during a layout run. */
export type LayoutContext = Readonly<{
  fonts: FontCache;
  /** Viewport width in device pixels (not scaled by zoom). */
  viewportWidth: number;
  /** Page margins and input width in layout pixels. */
  hstep: number;
  vstep: number;
  inputWidthPx: number;
  profile: LayoutProfile;
  index: LayoutIndex;
}>;

export type SizeFn = (node: LayoutNode, ctx: LayoutContext) => void;
export type PositionFn = (node: LayoutNode, ctx: LayoutContext) => void;
