import type { FontMetrics, ShapedRun, ShapingBackend, TextStyle } from '@textflow/contracts';

/** Counters for one of the cache's tables. `hitRate` is 0 before the first lookup. */
export type CacheTableStats = {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  hitRate: number;
};

/** Shaped runs and measured widths live in separate tables, each bounded by `capacity`. */
export type ShapeCacheStats = {
  capacity: number;
  shapes: CacheTableStats;
  widths: CacheTableStats;
};

/**
 * Only the fields that influence glyph selection and advances take part in the
 * key; colour, line height and decorations share cache entries.
 */
export function shapingKey(style: TextStyle): string {
  return `${style.fontFamilies.join(',')}|${style.fontSize}|${style.fontWeight}|${style.fontStyle}`;
}

class LruTable<V> {
  readonly #entries = new Map<string, V>();
  #hits = 0;
  #misses = 0;
  #evictions = 0;

  get(key: string): V | undefined {
    const value = this.#entries.get(key);
    if (value === undefined) {
      this.#misses += 1;
      return undefined;
    }
    this.#hits += 1;
    // Re-insert to mark as most recently used.
    this.#entries.delete(key);
    this.#entries.set(key, value);
    return value;
  }

  set(key: string, value: V, capacity: number): void {
    this.#entries.set(key, value);
    this.evictDownTo(capacity);
  }

  evictDownTo(limit: number): void {
    while (this.#entries.size > limit) {
      const oldest = this.#entries.keys().next();
      if (oldest.done) return;
      this.#entries.delete(oldest.value);
      this.#evictions += 1;
    }
  }

  clear(): void {
    this.#entries.clear();
    this.#hits = 0;
    this.#misses = 0;
    this.#evictions = 0;
  }

  stats(): CacheTableStats {
    const lookups = this.#hits + this.#misses;
    return {
      hits: this.#hits,
      misses: this.#misses,
      evictions: this.#evictions,
      size: this.#entries.size,
      hitRate: lookups === 0 ? 0 : this.#hits / lookups,
    };
  }
}

/**
 * LRU cache in front of a {@link ShapingBackend}.
 *
 * Shaped runs are stored relative to offset 0 and rebased on the way out, so
 * identical text reused at different positions of a layout hits the same entry.
 */
export class ShapeCache implements ShapingBackend {
  readonly #backend: ShapingBackend;
  #capacity: number;
  readonly #shapes = new LruTable<ShapedRun>();
  readonly #widths = new LruTable<number>();

  constructor(backend: ShapingBackend, capacity = 2048) {
    this.#backend = backend;
    this.#capacity = Math.max(1, Math.floor(capacity));
  }

  shape(text: string, style: TextStyle, baseOffset: number): ShapedRun {
    const key = `${shapingKey(style)}\u0000${text}`;
    let shaped = this.#shapes.get(key);
    if (!shaped) {
      shaped = this.#backend.shape(text, style, 0);
      this.#shapes.set(key, shaped, this.#capacity);
    }
    return baseOffset === 0 ? shaped : rebaseShapedRun(shaped, baseOffset);
  }

  measure(text: string, style: TextStyle): number {
    const key = `${shapingKey(style)}\u0000${text}`;
    const cached = this.#widths.get(key);
    if (cached !== undefined) return cached;
    const width = this.#backend.measure(text, style);
    this.#widths.set(key, width, this.#capacity);
    return width;
  }

  metrics(style: TextStyle): FontMetrics {
    return this.#backend.metrics(style);
  }

  setCapacity(capacity: number): void {
    this.#capacity = Math.max(1, Math.floor(capacity));
    this.#shapes.evictDownTo(this.#capacity);
    this.#widths.evictDownTo(this.#capacity);
  }

  /**
   * Evicts least recently used entries from both tables until each is at or
   * below `maxUtilization` (0..1) of capacity.
   */
  trim(maxUtilization: number): void {
    const limit = Math.floor(this.#capacity * Math.min(1, Math.max(0, maxUtilization)));
    this.#shapes.evictDownTo(limit);
    this.#widths.evictDownTo(limit);
  }

  clear(): void {
    this.#shapes.clear();
    this.#widths.clear();
  }

  stats(): ShapeCacheStats {
    return { capacity: this.#capacity, shapes: this.#shapes.stats(), widths: this.#widths.stats() };
  }
}

export function rebaseShapedRun(shaped: ShapedRun, baseOffset: number): ShapedRun {
  return {
    width: shaped.width,
    glyphs: shaped.glyphs.map((glyph) => ({ ...glyph, cluster: glyph.cluster + baseOffset })),
  };
}
