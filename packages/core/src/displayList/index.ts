export { cloneDisplayList, createDisplayListBuilder } from "./builder.js";
export type { DisplayListBuilderOptions } from "./builder.js";
export type {
  DisplayList,
  DisplayListBuildError,
  DisplayListBuildErrorCode,
  DisplayListBuildResult,
  DisplayListBuilder,
  DrawCommand,
  DrawLine,
  DrawOutline,
  DrawRect,
  DrawText,
} from "./types.js";
