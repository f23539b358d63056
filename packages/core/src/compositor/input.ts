/**
 * Input events delivered to the compositor by the host window.
 *
 * Click coordinates are window coordinates (the chrome strip included).
 */
export type BrowserInput =
  | Readonly<{ kind: "click"; x: number; y: number }>
  /** A printable character. */
  | Readonly<{ kind: "key"; char: string }>
  | Readonly<{ kind: "enter" }>
  | Readonly<{ kind: "tab" }>
  | Readonly<{ kind: "down" }>
  | Readonly<{ kind: "scroll"; delta: number }>
  /** +1 zoom in, -1 zoom out, 0 reset. */
  | Readonly<{ kind: "zoom"; direction: -1 | 0 | 1 }>
  | Readonly<{ kind: "quit" }>;
