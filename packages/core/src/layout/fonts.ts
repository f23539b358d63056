/**
 * packages/core/src/layout/fonts.ts — Font handles, loader contract and cache.
 *
 * Font shaping and rasterization live outside this package. Layout only needs
 * widths and vertical metrics, obtained from a FontHandle. Loading a handle is
 * assumed to be expensive, so layout always goes through FontCache; without it
 * pipeline time scales with node count × font load cost.
 */

export type FontWeight = "normal" | "bold";
export type FontSlant = "normal" | "italic";

export type FontDescriptor = Readonly<{
  /** Size in device pixels. */
  size: number;
  weight: FontWeight;
  style: FontSlant;
}>;

export type FontMetrics = Readonly<{
  ascent: number;
  descent: number;
  linespace: number;
}>;

export interface FontHandle {
  readonly descriptor: FontDescriptor;
  /** Advance width of `text` in device pixels. */
  measure(text: string): number;
  metrics(): FontMetrics;
}

export interface FontLoader {
  load(descriptor: FontDescriptor): FontHandle;
}

export function normalizeWeight(value: string | undefined): FontWeight {
  return value === "bold" ? "bold" : "normal";
}

export function normalizeSlant(value: string | undefined): FontSlant {
  return value === "italic" ? "italic" : "normal";
}

/** Maximum number of cached handles before the oldest is evicted. */
const FONT_CACHE_MAX_SIZE = 256;

/** Keyed cache from (size, weight, style) to a loaded handle. */
export class FontCache {
  private readonly loader: FontLoader;
  private readonly entries = new Map<string, FontHandle>();
  private hitCount = 0;
  private missCount = 0;

  constructor(loader: FontLoader) {
    this.loader = loader;
  }

  get(size: number, weight: FontWeight, style: FontSlant): FontHandle {
    const key = `${String(size)}|${weight}|${style}`;
    const hit = this.entries.get(key);
    if (hit) {
      this.hitCount++;
      return hit;
    }
    this.missCount++;
    if (this.entries.size >= FONT_CACHE_MAX_SIZE) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    const handle = this.loader.load({ size, weight, style });
    this.entries.set(key, handle);
    return handle;
  }

  stats(): Readonly<{ size: number; hits: number; misses: number }> {
    return { size: this.entries.size, hits: this.hitCount, misses: this.missCount };
  }

  clear(): void {
    this.entries.clear();
  }
}

export type FixedWidthFontOptions = Readonly<{
  /** Advance per character as a fraction of the font size. */
  advance?: number;
  /** Extra advance factor applied to bold faces. */
  boldAdvance?: number;
  ascent?: number;
  descent?: number;
}>;

/**
 * Deterministic loader: every character advances `size * advance`, ascent
 * and descent are fixed fractions of the size and linespace is their sum.
 */
export function createFixedWidthFontLoader(opts: FixedWidthFontOptions = {}): FontLoader {
  const advance = opts.advance ?? 0.5;
  const boldAdvance = opts.boldAdvance ?? 1;
  const ascent = opts.ascent ?? 0.8;
  const descent = opts.descent ?? 0.2;
  return {
    load(descriptor: FontDescriptor): FontHandle {
      const perChar =
        descriptor.size * advance * (descriptor.weight === "bold" ? boldAdvance : 1);
      const metrics: FontMetrics = Object.freeze({
        ascent: descriptor.size * ascent,
        descent: descriptor.size * descent,
        linespace: descriptor.size * (ascent + descent),
      });
      return {
        descriptor,
        measure: (value: string) => Array.from(value).length * perChar,
        metrics: () => metrics,
      };
    },
  };
}
