/**
 * packages/core/src/app/config.ts — Browser configuration defaults and validation.
 */

import type { DebugConfig, DebugSeverity } from "../debug/types.js";
import { DEBUG_SEVERITY_RANK } from "../debug/types.js";
import { WmError } from "../errors.js";
import { readPerfEnv } from "../perf/frameTimer.js";

export type BrowserConfig = Readonly<{
  /** Viewport width in device pixels. */
  width?: number;
  /** Window height in device pixels, chrome included. */
  height?: number;
  /** Height of the browser chrome strip above the page. */
  chromePx?: number;
  /** Frame cadence. */
  refreshRateMs?: number;
  /** Compositor loop period. */
  compositorTickMs?: number;
  /** Main loop sleep between iterations. */
  mainTickMs?: number;
  scrollStep?: number;
  /** Page margins in layout pixels. */
  hstep?: number;
  vstep?: number;
  inputWidthPx?: number;
  /** Factor applied per zoom step. */
  zoomStep?: number;
  /** Enable per-phase frame timing; defaults to WAYMARK_PERF=1. */
  perf?: boolean;
  debug?: Partial<DebugConfig>;
}>;

export type ResolvedBrowserConfig = Readonly<{
  width: number;
  height: number;
  chromePx: number;
  refreshRateMs: number;
  compositorTickMs: number;
  mainTickMs: number;
  scrollStep: number;
  hstep: number;
  vstep: number;
  inputWidthPx: number;
  zoomStep: number;
  perf: boolean;
  debug: DebugConfig;
}>;

/** Default configuration values (perf is read from the environment per call). */
export const DEFAULT_CONFIG: Omit<ResolvedBrowserConfig, "perf"> = Object.freeze({
  width: 800,
  height: 600,
  chromePx: 60,
  refreshRateMs: 16,
  compositorTickMs: 1,
  mainTickMs: 1,
  scrollStep: 100,
  hstep: 13,
  vstep: 18,
  inputWidthPx: 200,
  zoomStep: 1.1,
  debug: Object.freeze({ capacity: 1024, minSeverity: "info", echo: true }),
});

function invalidProps(detail: string): never {
  throw new WmError("WM_INVALID_PROPS", detail);
}

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidProps(`${name} must be a positive integer`);
  return v;
}

function requireNonNegativeInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidProps(`${name} must be a non-negative integer`);
  return v;
}

function isSeverity(v: string): v is DebugSeverity {
  return Object.hasOwn(DEBUG_SEVERITY_RANK, v);
}

function resolveDebug(debug: Partial<DebugConfig> | undefined): DebugConfig {
  const defaults = DEFAULT_CONFIG.debug;
  if (!debug) return defaults;
  const capacity =
    debug.capacity === undefined
      ? defaults.capacity
      : requirePositiveInt("debug.capacity", debug.capacity);
  let minSeverity = defaults.minSeverity;
  if (debug.minSeverity !== undefined) {
    if (!isSeverity(debug.minSeverity)) {
      invalidProps(`debug.minSeverity must be one of trace, info, warn, error`);
    }
    minSeverity = debug.minSeverity;
  }
  const echo = debug.echo === undefined ? defaults.echo : debug.echo !== false;
  return Object.freeze({ capacity, minSeverity, echo });
}

export function resolveBrowserConfig(config: BrowserConfig | undefined): ResolvedBrowserConfig {
  const c = config ?? {};
  const pos = (name: keyof typeof DEFAULT_CONFIG & string, v: number | undefined, d: number) =>
    v === undefined ? d : requirePositiveInt(name, v);

  const width = pos("width", c.width, DEFAULT_CONFIG.width);
  const height = pos("height", c.height, DEFAULT_CONFIG.height);
  const chromePx =
    c.chromePx === undefined ? DEFAULT_CONFIG.chromePx : requireNonNegativeInt("chromePx", c.chromePx);
  if (chromePx >= height) invalidProps("chromePx must be smaller than height");
  const hstep = c.hstep === undefined ? DEFAULT_CONFIG.hstep : requireNonNegativeInt("hstep", c.hstep);
  const vstep = c.vstep === undefined ? DEFAULT_CONFIG.vstep : requireNonNegativeInt("vstep", c.vstep);
  if (2 * hstep >= width) invalidProps("hstep leaves no content width");

  let zoomStep = DEFAULT_CONFIG.zoomStep;
  if (c.zoomStep !== undefined) {
    if (!Number.isFinite(c.zoomStep) || c.zoomStep <= 1) invalidProps("zoomStep must be a finite number > 1");
    zoomStep = c.zoomStep;
  }

  return Object.freeze({
    width,
    height,
    chromePx,
    refreshRateMs: pos("refreshRateMs", c.refreshRateMs, DEFAULT_CONFIG.refreshRateMs),
    compositorTickMs: pos("compositorTickMs", c.compositorTickMs, DEFAULT_CONFIG.compositorTickMs),
    mainTickMs: pos("mainTickMs", c.mainTickMs, DEFAULT_CONFIG.mainTickMs),
    scrollStep: pos("scrollStep", c.scrollStep, DEFAULT_CONFIG.scrollStep),
    hstep,
    vstep,
    inputWidthPx: pos("inputWidthPx", c.inputWidthPx, DEFAULT_CONFIG.inputWidthPx),
    zoomStep,
    perf: c.perf === undefined ? readPerfEnv() : c.perf === true,
    debug: resolveDebug(c.debug),
  });
}
