import type { Writable } from "node:stream";
import {
  type Browser,
  type BrowserConfig,
  type FontLoader,
  type PageLoader,
  type ResolvedBrowserConfig,
  type Surface,
  createBrowser,
} from "@waymark/core";
import { createNodeHost } from "./host/nodeHost.js";
import { FrameLogSurface } from "./streams/frameLogSurface.js";

export type CreateNodeBrowserOptions = Readonly<{
  loader: PageLoader;
  config?: BrowserConfig;
  fontLoader?: FontLoader;
  /** Custom surface; by default frames are logged to `stream`. */
  surface?: Surface;
  /** Stream for the default frame-log surface. Defaults to stdout. */
  stream?: Writable;
}>;

/**
 * Browser on Node timers. Without a surface, every presented frame is
 * written to `stream` as text.
 */
export function createNodeBrowser(opts: CreateNodeBrowserOptions): Browser {
  const surface =
    opts.surface ??
    ((config: ResolvedBrowserConfig) =>
      new FrameLogSurface({
        width: config.width,
        height: config.height,
        stream: opts.stream ?? process.stdout,
      }));
  return createBrowser({
    host: createNodeHost(),
    surface,
    loader: opts.loader,
    ...(opts.fontLoader ? { fontLoader: opts.fontLoader } : {}),
    config: opts.config ?? {},
  });
}
