/**
 * packages/core/src/animation/transitions.ts — CSS transitions on numeric properties.
 *
 * The style phase reports every restyled element with its previous and next
 * computed style. When a property named in the element's `transition` value
 * changes, an animation starts from the old value and the next computed style
 * keeps showing it; each animation frame then steps the value toward the new
 * one, one refresh interval at a time.
 *
 * `width` is a layout property: a step re-sizes the element. `opacity` is
 * paint-only: a step changes the computed style in place and the next paint
 * picks it up without any layout work.
 */

import type { ElementNode, StyleMap } from "../content/types.js";
import { interpolateNumber } from "./interpolate.js";

export type TransitionEffect = "layout" | "paint";

/** Properties that can transition, and what a change to them invalidates. */
export const ANIMATED_PROPERTIES: Readonly<Record<string, TransitionEffect>> = Object.freeze({
  width: "layout",
  opacity: "paint",
});

/**
 * Parse a `transition` value ("opacity 2s, width 500ms") into property →
 * frame count. Items without a property and a duration are skipped.
 */
export function parseTransition(value: string | undefined, refreshRateMs: number): Map<string, number> {
  const out = new Map<string, number>();
  if (value === undefined) return out;
  for (const item of value.split(",")) {
    const [prop, duration] = item.trim().split(/\s+/);
    if (prop === undefined || duration === undefined) continue;
    const m = /^(\d+(?:\.\d+)?)(ms|s)$/.exec(duration);
    if (!m || m[1] === undefined) continue;
    const ms = Number.parseFloat(m[1]) * (m[2] === "s" ? 1000 : 1);
    out.set(prop.toLowerCase(), Math.max(1, Math.round(ms / refreshRateMs)));
  }
  return out;
}

type NumericValue = Readonly<{ value: number; unit: "px" | "" }>;

/** "100px" or a plain number; anything else does not animate. */
export function parseNumericValue(value: string | undefined): NumericValue | null {
  if (value === undefined) return null;
  const m = /^(-?\d+(?:\.\d+)?)(px)?$/.exec(value.trim());
  if (!m || m[1] === undefined) return null;
  return { value: Number.parseFloat(m[1]), unit: m[2] === "px" ? "px" : "" };
}

function formatNumeric(value: number, unit: NumericValue["unit"]): string {
  return `${String(value)}${unit}`;
}

export class NumericAnimation {
  readonly property: string;
  /** Computed value the animation ends on. */
  readonly target: string;
  private readonly from: number;
  private readonly to: number;
  private readonly unit: NumericValue["unit"];
  private readonly frames: number;
  private frame = 0;
  private currentValue: string;

  constructor(property: string, from: NumericValue, to: NumericValue, frames: number, target: string) {
    this.property = property;
    this.from = from.value;
    this.to = to.value;
    this.unit = to.unit;
    this.frames = frames;
    this.target = target;
    this.currentValue = formatNumeric(from.value, to.unit);
  }

  /** Value shown at the current frame. */
  get current(): string {
    return this.currentValue;
  }

  get done(): boolean {
    return this.frame >= this.frames;
  }

  /** Advance one frame; the last frame lands exactly on the target. */
  step(): string {
    this.frame = Math.min(this.frame + 1, this.frames);
    this.currentValue = this.done
      ? this.target
      : formatNumeric(interpolateNumber(this.from, this.to, this.frame / this.frames), this.unit);
    return this.currentValue;
  }
}

export type TransitionStep = Readonly<{ node: ElementNode; property: string; effect: TransitionEffect }>;

/** Running animations of one tab, keyed by element and property. */
export class TransitionSet {
  private readonly refreshRateMs: number;
  private readonly active = new Map<ElementNode, Map<string, NumericAnimation>>();

  constructor(refreshRateMs: number) {
    this.refreshRateMs = refreshRateMs;
  }

  get size(): number {
    let n = 0;
    for (const byProp of this.active.values()) n += byProp.size;
    return n;
  }

  animation(node: ElementNode, property: string): NumericAnimation | null {
    return this.active.get(node)?.get(property) ?? null;
  }

  /**
   * Style phase hook: start, keep or cancel animations for `node` and make
   * `next` show the animated values. Returns whether an animation started.
   */
  restyle(node: ElementNode, previous: Readonly<StyleMap>, next: StyleMap): boolean {
    let started = false;
    const transitions = parseTransition(next.transition, this.refreshRateMs);
    for (const property of Object.keys(ANIMATED_PROPERTIES)) {
      const value = next[property];
      const running = this.animation(node, property);
      if (running !== null && value === running.target) {
        next[property] = running.current;
        continue;
      }
      this.remove(node, property);
      const frames = transitions.get(property);
      const before = previous[property];
      if (frames === undefined || value === undefined || before === undefined || before === value) continue;
      const from = parseNumericValue(before);
      const to = parseNumericValue(value);
      if (from === null || to === null || from.unit !== to.unit) continue;
      this.add(node, new NumericAnimation(property, from, to, frames, value));
      next[property] = before;
      started = true;
    }
    return started;
  }

  /**
   * Advance every animation one frame and write the values into the
   * elements' computed styles. Finished animations are dropped after their
   * last step.
   */
  step(): TransitionStep[] {
    const out: TransitionStep[] = [];
    for (const [node, byProp] of this.active) {
      for (const [property, animation] of byProp) {
        node.computedStyle[property] = animation.step();
        out.push({ node, property, effect: ANIMATED_PROPERTIES[property] ?? "layout" });
        if (animation.done) byProp.delete(property);
      }
      if (byProp.size === 0) this.active.delete(node);
    }
    return out;
  }

  clear(): void {
    this.active.clear();
  }

  private add(node: ElementNode, animation: NumericAnimation): void {
    let byProp = this.active.get(node);
    if (!byProp) {
      byProp = new Map();
      this.active.set(node, byProp);
    }
    byProp.set(animation.property, animation);
  }

  private remove(node: ElementNode, property: string): void {
    const byProp = this.active.get(node);
    if (!byProp) return;
    byProp.delete(property);
    if (byProp.size === 0) this.active.delete(node);
  }
}
