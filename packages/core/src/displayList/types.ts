/**
 * packages/core/src/displayList/types.ts — Paint output consumed by the compositor.
 *
 * A display list is produced on the main thread by paint, deep-copied into
 * compositor storage at commit, and replayed against a Surface on draw.
 * Coordinates are page coordinates in device pixels; the compositor applies
 * scroll and chrome offset. Every command carries its bounding rect so the
 * compositor can skip commands outside the viewport, and an `alpha` (the
 * product of its ancestors' opacities) when that is below 1.
 */

import type { FontDescriptor } from "../layout/fonts.js";
import type { Rect } from "../layout/types.js";

export type DrawRect = Readonly<{
  kind: "rect";
  rect: Rect;
  color: string;
  alpha?: number;
}>;

export type DrawText = Readonly<{
  kind: "text";
  rect: Rect;
  /** Top-left of the text run. */
  x: number;
  y: number;
  text: string;
  color: string;
  font: FontDescriptor;
  alpha?: number;
}>;

export type DrawOutline = Readonly<{
  kind: "outline";
  rect: Rect;
  color: string;
  thickness: number;
  alpha?: number;
}>;

export type DrawLine = Readonly<{
  kind: "line";
  rect: Rect;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  color: string;
  thickness: number;
  alpha?: number;
}>;

export type DrawCommand = DrawRect | DrawText | DrawOutline | DrawLine;

export type DisplayList = readonly DrawCommand[];

/**
 * Error codes for display list build failures.
 *
 *   - DL_BAD_PARAMS: non-finite or negative geometry passed to a command, an
 *     opacity outside [0, 1], or unbalanced pushOpacity/popOpacity
 *   - DL_TOO_LARGE: command count exceeds the configured cap
 */
export type DisplayListBuildErrorCode = "DL_BAD_PARAMS" | "DL_TOO_LARGE";

export type DisplayListBuildError = Readonly<{ code: DisplayListBuildErrorCode; detail: string }>;

export type DisplayListBuildResult =
  | Readonly<{ ok: true; list: DisplayList }>
  | Readonly<{ ok: false; error: DisplayListBuildError }>;

/**
 * Display list builder.
 *
 * Error handling: commands record the first error internally; build() returns
 * failure if any command failed, so paint code can emit without per-call checks.
 */
export interface DisplayListBuilder {
  fillRect(x: number, y: number, w: number, h: number, color: string): void;
  drawText(x: number, y: number, text: string, color: string, font: FontDescriptor, w: number, h: number): void;
  strokeRect(x: number, y: number, w: number, h: number, color: string, thickness: number): void;
  drawLine(x1: number, y1: number, x2: number, y2: number, color: string, thickness: number): void;
  /** Multiply the alpha of every following command by `opacity` until the matching pop. */
  pushOpacity(opacity: number): void;
  popOpacity(): void;
  build(): DisplayListBuildResult;
  reset(): void;
}
