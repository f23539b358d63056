import { WmError } from "../errors.js";

/** Argument lists a task may bind: none, one or two. */
export type TaskArgs = readonly [] | readonly [unknown] | readonly [unknown, unknown];

/**
 * A deferred call bound to its arguments. run() executes the call once and
 * releases the callable and its arguments; a second run() is a programming
 * error.
 */
export class Task<R = unknown> {
  private fn: (() => R) | null;
  readonly label: string;

  private constructor(fn: () => R, label: string) {
    this.fn = fn;
    this.label = label;
  }

  static of<A extends TaskArgs, R>(fn: (...args: A) => R, ...args: A): Task<R> {
    return new Task(() => fn(...args), fn.name || "anonymous");
  }

  /** Like of(), with an explicit label for logs. */
  static named<A extends TaskArgs, R>(label: string, fn: (...args: A) => R, ...args: A): Task<R> {
    return new Task(() => fn(...args), label);
  }

  get consumed(): boolean {
    return this.fn === null;
  }

  run(): R {
    const fn = this.fn;
    if (fn === null) {
      throw new WmError("WM_INVALID_STATE", `task "${this.label}" already ran`);
    }
    this.fn = null;
    return fn();
  }
}
