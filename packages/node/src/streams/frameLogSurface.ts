/**
 * packages/node/src/streams/frameLogSurface.ts — Surface that logs frames to a stream.
 *
 * Each present() writes one line per draw call, prefixed with the frame
 * number, followed by a blank line. Meant for headless runs and debugging;
 * there is no rasterization.
 */

import type { Writable } from "node:stream";
import type { FontDescriptor, Surface } from "@waymark/core";

export type FrameLogSurfaceOptions = Readonly<{
  width: number;
  height: number;
  stream: Writable;
  /** Only write the per-frame summary line. */
  summaryOnly?: boolean;
}>;

function fmt(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(2);
}

function alphaSuffix(alpha: number | undefined): string {
  return alpha !== undefined && alpha < 1 ? ` alpha ${fmt(alpha)}` : "";
}

export class FrameLogSurface implements Surface {
  readonly width: number;
  readonly height: number;
  private readonly stream: Writable;
  private readonly summaryOnly: boolean;
  private lines: string[] = [];
  private frame = 0;

  constructor(opts: FrameLogSurfaceOptions) {
    this.width = opts.width;
    this.height = opts.height;
    this.stream = opts.stream;
    this.summaryOnly = opts.summaryOnly === true;
  }

  clear(color: string): void {
    this.lines.push(`clear ${color}`);
  }

  fillRect(x: number, y: number, w: number, h: number, color: string, alpha?: number): void {
    this.lines.push(`rect ${fmt(x)},${fmt(y)} ${fmt(w)}x${fmt(h)} ${color}${alphaSuffix(alpha)}`);
  }

  strokeRect(
    x: number,
    y: number,
    w: number,
    h: number,
    color: string,
    thickness: number,
    alpha?: number,
  ): void {
    this.lines.push(
      `outline ${fmt(x)},${fmt(y)} ${fmt(w)}x${fmt(h)} ${color} ${fmt(thickness)}px${alphaSuffix(alpha)}`,
    );
  }

  drawText(x: number, y: number, text: string, color: string, font: FontDescriptor, alpha?: number): void {
    this.lines.push(
      `text ${fmt(x)},${fmt(y)} ${color} ${fmt(font.size)}px ${JSON.stringify(text)}${alphaSuffix(alpha)}`,
    );
  }

  drawLine(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    color: string,
    thickness: number,
    alpha?: number,
  ): void {
    this.lines.push(
      `line ${fmt(x1)},${fmt(y1)} -> ${fmt(x2)},${fmt(y2)} ${color} ${fmt(thickness)}px${alphaSuffix(alpha)}`,
    );
  }

  present(): void {
    this.frame++;
    const header = `frame ${String(this.frame)}: ${String(this.lines.length)} ops`;
    const body = this.summaryOnly ? "" : this.lines.map((l) => `  ${l}\n`).join("");
    this.stream.write(`${header}\n${body}`);
    this.lines = [];
  }
}
