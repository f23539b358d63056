/**
 * packages/core/src/tab/commands.ts — Tab operations as plain data.
 *
 * The compositor turns input into TabCommands and posts them to the main
 * thread, which runs them against its tab. Commands are structured-clone
 * safe so they can cross a worker boundary unchanged.
 */

import type { Tab } from "./tab.js";

export type TabCommand =
  | Readonly<{ op: "click"; x: number; y: number }>
  | Readonly<{ op: "keypress"; char: string }>
  | Readonly<{ op: "enter" }>
  | Readonly<{ op: "advanceFocus" }>
  | Readonly<{ op: "zoom"; direction: -1 | 0 | 1 }>
  | Readonly<{ op: "goBack" }>
  | Readonly<{ op: "load"; url: string }>;

/** Tab operations a command can reach. */
export type TabCommandTarget = Pick<
  Tab,
  "click" | "keypress" | "enter" | "advanceFocus" | "zoomBy" | "goBack" | "load"
>;

export function runTabCommand(tab: TabCommandTarget, command: TabCommand): void | Promise<void> {
  switch (command.op) {
    case "click":
      return tab.click(command.x, command.y);
    case "keypress":
      return tab.keypress(command.char);
    case "enter":
      return tab.enter();
    case "advanceFocus":
      return tab.advanceFocus();
    case "zoom":
      return tab.zoomBy(command.direction);
    case "goBack":
      return tab.goBack();
    case "load":
      return tab.load(command.url);
  }
}

function isRecord(v: unknown): v is Readonly<Record<string, unknown>> {
  return typeof v === "object" && v !== null;
}

/** Shape check for commands that arrive as untyped messages. */
export function isTabCommand(v: unknown): v is TabCommand {
  if (!isRecord(v)) return false;
  switch (v.op) {
    case "click":
      return typeof v.x === "number" && typeof v.y === "number";
    case "keypress":
      return typeof v.char === "string";
    case "zoom":
      return v.direction === -1 || v.direction === 0 || v.direction === 1;
    case "load":
      return typeof v.url === "string";
    case "enter":
    case "advanceFocus":
    case "goBack":
      return true;
    default:
      return false;
  }
}
