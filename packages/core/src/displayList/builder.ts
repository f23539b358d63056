import type { Rect } from "../layout/types.js";
import type {
  DisplayList,
  DisplayListBuildError,
  DisplayListBuildResult,
  DisplayListBuilder,
  DrawCommand,
} from "./types.js";

export type DisplayListBuilderOptions = Readonly<{
  /** Maximum number of commands accepted before build() fails. */
  maxCommands?: number;
}>;

const DEFAULT_MAX_COMMANDS = 100_000;

function isFiniteNumber(v: number): boolean {
  return Number.isFinite(v);
}

export function createDisplayListBuilder(opts: DisplayListBuilderOptions = {}): DisplayListBuilder {
  const maxCommands = opts.maxCommands ?? DEFAULT_MAX_COMMANDS;
  let commands: DrawCommand[] = [];
  let error: DisplayListBuildError | null = null;
  let alphaStack: number[] = [];

  const fail = (e: DisplayListBuildError): void => {
    if (error === null) error = e;
  };

  const push = (cmd: DrawCommand): void => {
    if (error !== null) return;
    if (commands.length >= maxCommands) {
      fail({ code: "DL_TOO_LARGE", detail: `more than ${String(maxCommands)} commands` });
      return;
    }
    const alpha = alphaStack[alphaStack.length - 1] ?? 1;
    commands.push(alpha < 1 ? { ...cmd, alpha } : cmd);
  };

  const checkRect = (op: string, x: number, y: number, w: number, h: number): Rect | null => {
    if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(w) || !isFiniteNumber(h)) {
      fail({ code: "DL_BAD_PARAMS", detail: `${op}: non-finite geometry` });
      return null;
    }
    if (w < 0 || h < 0) {
      fail({ code: "DL_BAD_PARAMS", detail: `${op}: negative size ${String(w)}x${String(h)}` });
      return null;
    }
    return Object.freeze({ x, y, w, h });
  };

  return {
    fillRect(x, y, w, h, color) {
      const rect = checkRect("fillRect", x, y, w, h);
      if (rect) push({ kind: "rect", rect, color });
    },
    drawText(x, y, text, color, font, w, h) {
      const rect = checkRect("drawText", x, y, w, h);
      if (rect) push({ kind: "text", rect, x, y, text, color, font });
    },
    strokeRect(x, y, w, h, color, thickness) {
      const rect = checkRect("strokeRect", x, y, w, h);
      if (!rect) return;
      if (!isFiniteNumber(thickness) || thickness <= 0) {
        fail({ code: "DL_BAD_PARAMS", detail: `strokeRect: bad thickness ${String(thickness)}` });
        return;
      }
      push({ kind: "outline", rect, color, thickness });
    },
    drawLine(x1, y1, x2, y2, color, thickness) {
      const rect = checkRect(
        "drawLine",
        Math.min(x1, x2),
        Math.min(y1, y2),
        Math.abs(x2 - x1),
        Math.abs(y2 - y1),
      );
      if (rect) push({ kind: "line", rect, x1, y1, x2, y2, color, thickness });
    },
    pushOpacity(opacity) {
      if (!isFiniteNumber(opacity) || opacity < 0 || opacity > 1) {
        fail({ code: "DL_BAD_PARAMS", detail: `pushOpacity: bad opacity ${String(opacity)}` });
        return;
      }
      const outer = alphaStack[alphaStack.length - 1] ?? 1;
      alphaStack.push(outer * opacity);
    },
    popOpacity() {
      if (alphaStack.length === 0) {
        fail({ code: "DL_BAD_PARAMS", detail: "popOpacity: no matching pushOpacity" });
        return;
      }
      alphaStack.pop();
    },
    build(): DisplayListBuildResult {
      if (error === null && alphaStack.length > 0) {
        fail({ code: "DL_BAD_PARAMS", detail: `build: ${String(alphaStack.length)} unbalanced pushOpacity` });
      }
      if (error !== null) return { ok: false, error };
      return { ok: true, list: Object.freeze(commands.slice()) };
    },
    reset() {
      commands = [];
      error = null;
      alphaStack = [];
    },
  };
}

function cloneCommand(cmd: DrawCommand): DrawCommand {
  const rect = Object.freeze({ ...cmd.rect });
  switch (cmd.kind) {
    case "rect":
      return Object.freeze({ ...cmd, rect });
    case "text":
      return Object.freeze({ ...cmd, rect, font: Object.freeze({ ...cmd.font }) });
    case "outline":
      return Object.freeze({ ...cmd, rect });
    case "line":
      return Object.freeze({ ...cmd, rect });
  }
}

/** Deep copy; the result shares no object with `list`. */
export function cloneDisplayList(list: DisplayList): DisplayList {
  return Object.freeze(list.map(cloneCommand));
}
