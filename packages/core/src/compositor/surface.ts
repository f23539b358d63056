/**
 * packages/core/src/compositor/surface.ts — Raster target the compositor draws into.
 *
 * Rasterization lives outside this package (a canvas, a window, a frame
 * log). Coordinates are window device pixels.
 */

import type { DrawCommand } from "../displayList/types.js";
import type { FontDescriptor } from "../layout/fonts.js";

/** Draw calls take a trailing `alpha` in [0, 1]; omitted means opaque. */
export interface Surface {
  readonly width: number;
  readonly height: number;
  clear(color: string): void;
  fillRect(x: number, y: number, w: number, h: number, color: string, alpha?: number): void;
  strokeRect(
    x: number,
    y: number,
    w: number,
    h: number,
    color: string,
    thickness: number,
    alpha?: number,
  ): void;
  drawText(x: number, y: number, text: string, color: string, font: FontDescriptor, alpha?: number): void;
  drawLine(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    color: string,
    thickness: number,
    alpha?: number,
  ): void;
  /** Finish the frame. */
  present(): void;
}

/** Replay one display-list command, shifted vertically by `dy`. */
export function replayCommand(surface: Surface, cmd: DrawCommand, dy: number): void {
  switch (cmd.kind) {
    case "rect":
      surface.fillRect(cmd.rect.x, cmd.rect.y + dy, cmd.rect.w, cmd.rect.h, cmd.color, cmd.alpha);
      return;
    case "outline":
      surface.strokeRect(
        cmd.rect.x,
        cmd.rect.y + dy,
        cmd.rect.w,
        cmd.rect.h,
        cmd.color,
        cmd.thickness,
        cmd.alpha,
      );
      return;
    case "text":
      surface.drawText(cmd.x, cmd.y + dy, cmd.text, cmd.color, cmd.font, cmd.alpha);
      return;
    case "line":
      surface.drawLine(cmd.x1, cmd.y1 + dy, cmd.x2, cmd.y2 + dy, cmd.color, cmd.thickness, cmd.alpha);
      return;
  }
}
