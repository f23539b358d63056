/**
 * packages/node/src/worker/protocol.ts — Messages between the compositor
 * (parent thread) and the main-thread worker.
 *
 * Everything here crosses `postMessage` by structured clone, so payloads are
 * plain data: tab commands, scroll offsets and committed display lists.
 */

import { type BrowserConfig, type CommitData, type TabCommand, isTabCommand } from "@waymark/core";

export type MainToWorkerMessage =
  | Readonly<{ type: "command"; command: TabCommand }>
  | Readonly<{ type: "frame"; scroll: number }>
  | Readonly<{ type: "stop" }>;

export type WorkerToMainMessage =
  | Readonly<{ type: "ready" }>
  | Readonly<{ type: "requestFrame" }>
  | Readonly<{ type: "commit"; data: CommitData }>
  | Readonly<{ type: "fatal"; detail: string }>;

export type MainThreadWorkerData = Readonly<{
  /** Module URL exporting `createPageLoader()` and optionally `createFontLoader()`. */
  pageModule: string;
  config: BrowserConfig;
}>;

function isRecord(v: unknown): v is Readonly<Record<string, unknown>> {
  return typeof v === "object" && v !== null;
}

export function isMainToWorkerMessage(v: unknown): v is MainToWorkerMessage {
  if (!isRecord(v)) return false;
  switch (v.type) {
    case "command":
      return isTabCommand(v.command);
    case "frame":
      return typeof v.scroll === "number" && Number.isFinite(v.scroll);
    case "stop":
      return true;
    default:
      return false;
  }
}

function isCommitData(v: unknown): v is CommitData {
  if (!isRecord(v)) return false;
  return (
    typeof v.frameId === "number" &&
    (v.url === null || typeof v.url === "string") &&
    typeof v.documentHeight === "number" &&
    (v.scroll === null || typeof v.scroll === "number") &&
    Array.isArray(v.displayList)
  );
}

export function isWorkerToMainMessage(v: unknown): v is WorkerToMainMessage {
  if (!isRecord(v)) return false;
  switch (v.type) {
    case "ready":
    case "requestFrame":
      return true;
    case "commit":
      return isCommitData(v.data);
    case "fatal":
      return typeof v.detail === "string";
    default:
      return false;
  }
}

export function isMainThreadWorkerData(v: unknown): v is MainThreadWorkerData {
  return isRecord(v) && typeof v.pageModule === "string" && isRecord(v.config);
}
