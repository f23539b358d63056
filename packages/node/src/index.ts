/**
 * @waymark/node
 *
 * Node.js bindings for @waymark/core: timers, a frame-log surface and
 * browser wiring, in process or with the main thread in a worker.
 */

export { createNodeHost, type NodeHostOptions } from "./host/nodeHost.js";
export { FrameLogSurface, type FrameLogSurfaceOptions } from "./streams/frameLogSurface.js";
export { createNodeBrowser, type CreateNodeBrowserOptions } from "./createNodeBrowser.js";
export {
  createWorkerBrowser,
  type CreateWorkerBrowserOptions,
  type WorkerBrowser,
} from "./createWorkerBrowser.js";
export type { MainToWorkerMessage, WorkerToMainMessage } from "./worker/protocol.js";
