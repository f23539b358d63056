/**
 * packages/core/src/tab/events.ts — Script event listeners on content nodes.
 *
 * Events bubble from the target through its ancestors. A listener that
 * throws is reported through `onError` and the remaining listeners still
 * run. dispatch() returns true when a listener called preventDefault().
 */

import type { ElementNode } from "../content/types.js";

export type ScriptEvent = {
  readonly type: string;
  readonly target: ElementNode;
  /** Element whose listener is currently running. */
  readonly currentTarget: ElementNode;
  readonly defaultPrevented: boolean;
  preventDefault(): void;
  stopPropagation(): void;
};

export type EventListener = (event: ScriptEvent) => void;

export type ListenerErrorHandler = (type: string, error: unknown) => void;

export class EventRegistry {
  private listeners = new WeakMap<ElementNode, Map<string, EventListener[]>>();

  add(node: ElementNode, type: string, listener: EventListener): void {
    let byType = this.listeners.get(node);
    if (!byType) {
      byType = new Map();
      this.listeners.set(node, byType);
    }
    const list = byType.get(type);
    if (list) list.push(listener);
    else byType.set(type, [listener]);
  }

  remove(node: ElementNode, type: string, listener: EventListener): void {
    const list = this.listeners.get(node)?.get(type);
    if (!list) return;
    const i = list.indexOf(listener);
    if (i >= 0) list.splice(i, 1);
  }

  /** Drop every listener (page navigation). */
  clear(): void {
    this.listeners = new WeakMap();
  }

  dispatch(type: string, target: ElementNode, onError: ListenerErrorHandler): boolean {
    let prevented = false;
    let stopped = false;
    let current: ElementNode | null = target;

    while (current !== null && !stopped) {
      const list = this.listeners.get(current)?.get(type);
      if (list && list.length > 0) {
        const currentTarget = current;
        const event: ScriptEvent = {
          type,
          target,
          currentTarget,
          get defaultPrevented() {
            return prevented;
          },
          preventDefault() {
            prevented = true;
          },
          stopPropagation() {
            stopped = true;
          },
        };
        // Snapshot so listeners added during dispatch run next time.
        for (const listener of list.slice()) {
          try {
            listener(event);
          } catch (e: unknown) {
            onError(type, e);
          }
        }
      }
      current = current.parent;
    }
    return prevented;
  }
}
