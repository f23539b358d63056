export { FrameState } from "./frameState.js";
export { computeFrameDelay } from "./frameTiming.js";
