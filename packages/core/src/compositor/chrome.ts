/**
 * packages/core/src/compositor/chrome.ts — Minimal browser chrome.
 *
 * A strip of `chromePx` at the top of the window with a back button and an
 * address bar. Owned and drawn by the compositor; never touches the page.
 */

import type { FontHandle } from "../layout/fonts.js";
import type { Rect } from "../layout/types.js";
import { contains } from "../layout/hitTest.js";
import type { Surface } from "./surface.js";

export const CHROME_FONT_SIZE = 20;
const PAD = 10;
const BACK_BUTTON_WIDTH = 25;
const ADDRESS_BAR_X = 50;
const TEXT_INSET = 5;

export type ChromeFocus = "address" | "content" | null;

export type ChromeState = {
  focus: ChromeFocus;
  /** Text typed into the address bar while it has focus. */
  typed: string;
  /** URL of the last committed page. */
  url: string;
};

export type ChromeLayout = Readonly<{
  backButton: Rect;
  addressBar: Rect;
}>;

export type ChromeTarget = "back" | "address";

export function chromeLayout(width: number, chromePx: number): ChromeLayout {
  const h = Math.max(0, chromePx - 2 * PAD);
  return {
    backButton: { x: PAD, y: PAD, w: BACK_BUTTON_WIDTH, h },
    addressBar: { x: ADDRESS_BAR_X, y: PAD, w: Math.max(0, width - ADDRESS_BAR_X - PAD), h },
  };
}

export function chromeHitTest(layout: ChromeLayout, x: number, y: number): ChromeTarget | null {
  if (contains(layout.backButton, x, y)) return "back";
  if (contains(layout.addressBar, x, y)) return "address";
  return null;
}

export function drawChrome(
  surface: Surface,
  layout: ChromeLayout,
  state: Readonly<ChromeState>,
  font: FontHandle,
  chromePx: number,
): void {
  surface.fillRect(0, 0, surface.width, chromePx, "white");
  surface.drawLine(0, chromePx, surface.width, chromePx, "black", 1);

  const back = layout.backButton;
  surface.strokeRect(back.x, back.y, back.w, back.h, "black", 1);
  surface.drawText(back.x + TEXT_INSET, back.y + TEXT_INSET, "<", "black", font.descriptor);

  const bar = layout.addressBar;
  surface.strokeRect(bar.x, bar.y, bar.w, bar.h, "black", 1);
  const editing = state.focus === "address";
  const text = editing ? state.typed : state.url;
  const tx = bar.x + PAD;
  const ty = bar.y + TEXT_INSET;
  if (text.length > 0) surface.drawText(tx, ty, text, "black", font.descriptor);
  if (editing) {
    const cx = tx + font.measure(text);
    surface.drawLine(cx, ty, cx, ty + font.metrics().linespace, "red", 1);
  }
}
