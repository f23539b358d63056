/**
 * packages/core/src/debug/index.ts — Debug log public exports.
 */

export type {
  DebugCategory,
  DebugConfig,
  DebugQuery,
  DebugRecord,
  DebugSeverity,
  DebugStats,
} from "./types.js";
export { DEBUG_SEVERITY_RANK } from "./types.js";
export {
  createDebugLog,
  type CreateDebugLogOptions,
  type DebugLog,
  type DebugRecordHandler,
} from "./debugLog.js";
