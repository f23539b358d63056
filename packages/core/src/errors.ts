/**
 * packages/core/src/errors.ts — Error codes and the core error class.
 *
 * Error codes are deterministic strings so tests and hosts can branch on
 * them without parsing messages.
 */

/**
 * Error codes for runtime violations surfaced as WmError instances.
 *
 *   - WM_INVALID_STATE: operation not valid in the current state (task run twice, empty queue)
 *   - WM_INVALID_PROPS: invalid configuration or arguments
 *   - WM_REENTRANT_CALL: lock acquired while already held
 *   - WM_USER_CODE_THROW: script, callback or listener threw
 *   - WM_LOAD_ERROR: page loader failed
 *   - WM_DISPLAY_LIST_BUILD_ERROR: paint produced an invalid command
 */
export type WmErrorCode =
  | "WM_INVALID_STATE"
  | "WM_INVALID_PROPS"
  | "WM_REENTRANT_CALL"
  | "WM_USER_CODE_THROW"
  | "WM_LOAD_ERROR"
  | "WM_DISPLAY_LIST_BUILD_ERROR";

export class WmError extends Error {
  override readonly name = "WmError";
  readonly code: WmErrorCode;

  constructor(code: WmErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WmError);
    }
  }
}

/** Format a thrown value for log records and error details. */
export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}
