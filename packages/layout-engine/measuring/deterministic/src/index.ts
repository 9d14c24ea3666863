/**
 * Deterministic shaping backend for the layout engine.
 *
 * Uses fixed advances instead of font files so layouts are reproducible in
 * Node and in tests:
 * - every grapheme cluster advances `fontSize * advanceRatio`
 * - `\n` and `\r` advance 0
 * - ascent ≈ fontSize * 0.8, descent ≈ fontSize * 0.2
 *
 * Ligature sequences (see {@link LigatureConfig}) collapse into one glyph
 * and one cluster without changing the total advance, which keeps the caret
 * from landing inside them.
 */

import { z } from 'zod';
import {
  createDebugLogger,
  parseOrThrow,
  type FontMetrics,
  type ShapedGlyph,
  type ShapedRun,
  type ShapingBackend,
  type TextStyle,
} from '@textflow/contracts';
import { DEFAULT_LIGATURE_CONFIG, isLigatureEnabledForFont, type LigatureConfig } from './ligature-config.js';
import { graphemeSegments, type GraphemeSegment } from './segmenter.js';
import { ShapeCache } from './shape-cache.js';

export { ShapeCache, shapingKey, rebaseShapedRun, type CacheTableStats, type ShapeCacheStats } from './shape-cache.js';
export {
  DEFAULT_LIGATURE_CONFIG,
  DEFAULT_LIGATURE_SEQUENCES,
  programmingLigatureDefaults,
  isLigatureEnabledForFont,
  withFontOverride,
  type LigatureConfig,
} from './ligature-config.js';
export { graphemeSegments, graphemeCount, type GraphemeSegment } from './segmenter.js';

export type MeasurementConfig = {
  advanceRatio: number;
  ascentRatio: number;
  descentRatio: number;
  cacheSize: number;
  ligatures: LigatureConfig;
};

const DEFAULT_MEASUREMENT_CONFIG: MeasurementConfig = {
  advanceRatio: 0.5,
  ascentRatio: 0.8,
  descentRatio: 0.2,
  cacheSize: 2048,
  ligatures: DEFAULT_LIGATURE_CONFIG,
};

let measurementConfig: MeasurementConfig = { ...DEFAULT_MEASUREMENT_CONFIG };

const ligatureConfigSchema = z
  .object({
    enabled: z.boolean(),
    fontOverrides: z.record(z.boolean()),
    sequences: z.array(z.string().min(2)),
  })
  .strict();

const measurementConfigSchema = z
  .object({
    advanceRatio: z.number().finite().positive(),
    ascentRatio: z.number().finite().nonnegative(),
    descentRatio: z.number().finite().nonnegative(),
    cacheSize: z.number().int().positive(),
    ligatures: ligatureConfigSchema,
  })
  .partial()
  .strict();

const log = createDebugLogger('measuring');

/**
 * Updates the module-level measurement configuration. Shapers created
 * afterwards pick up the new values; existing ones keep their snapshot.
 *
 * @throws {InvalidInputError} On unknown keys or invalid values.
 */
export function configureMeasurement(options: Partial<MeasurementConfig>): void {
  const parsed = parseOrThrow(measurementConfigSchema, options, 'INVALID_OPTIONS', 'Invalid measurement config');
  measurementConfig = {
    ...measurementConfig,
    ...parsed,
    ligatures: parsed.ligatures ?? measurementConfig.ligatures,
  };
  log('configured', { ...measurementConfig });
}

export function resetMeasurementConfig(): void {
  measurementConfig = { ...DEFAULT_MEASUREMENT_CONFIG };
}

export function getMeasurementConfig(): Readonly<MeasurementConfig> {
  return measurementConfig;
}

const isZeroAdvance = (segment: string): boolean => segment === '\n' || segment === '\r' || segment === '\r\n';

export class DeterministicShaper implements ShapingBackend {
  readonly config: Readonly<MeasurementConfig>;

  constructor(overrides: Partial<MeasurementConfig> = {}) {
    const parsed = parseOrThrow(measurementConfigSchema, overrides, 'INVALID_OPTIONS', 'Invalid shaper options');
    this.config = {
      ...measurementConfig,
      ...parsed,
      ligatures: parsed.ligatures ?? measurementConfig.ligatures,
    };
  }

  shape(text: string, style: TextStyle, baseOffset: number): ShapedRun {
    const advance = this.#advance(style);
    const useLigatures = isLigatureEnabledForFont(this.config.ligatures, style.fontFamilies[0]);
    const segments = graphemeSegments(text);
    const glyphs: ShapedGlyph[] = [];
    let x = 0;
    let index = 0;

    while (index < segments.length) {
      const segment = segments[index];
      const ligatureLength = useLigatures ? this.#matchLigature(text, segments, index) : 0;
      if (ligatureLength > 1) {
        const last = segments[index + ligatureLength - 1];
        const width = advance * ligatureLength;
        glyphs.push({
          glyphId: ligatureGlyphId(text.slice(segment.index, last.index + last.segment.length)),
          cluster: baseOffset + segment.index,
          advance: width,
          x,
        });
        x += width;
        index += ligatureLength;
        continue;
      }
      const glyphAdvance = isZeroAdvance(segment.segment) ? 0 : advance;
      glyphs.push({
        glyphId: segment.segment.codePointAt(0) ?? 0,
        cluster: baseOffset + segment.index,
        advance: glyphAdvance,
        x,
      });
      x += glyphAdvance;
      index += 1;
    }

    return { glyphs, width: x };
  }

  measure(text: string, style: TextStyle): number {
    const advance = this.#advance(style);
    let width = 0;
    for (const segment of graphemeSegments(text)) {
      if (!isZeroAdvance(segment.segment)) width += advance;
    }
    return width;
  }

  metrics(style: TextStyle): FontMetrics {
    return {
      ascent: style.fontSize * this.config.ascentRatio,
      descent: style.fontSize * this.config.descentRatio,
    };
  }

  #advance(style: TextStyle): number {
    return style.fontSize * this.config.advanceRatio;
  }

  /** Number of grapheme segments covered by the longest ligature starting at `index`, or 0. */
  #matchLigature(text: string, segments: GraphemeSegment[], index: number): number {
    const start = segments[index].index;
    let best = 0;
    for (const sequence of this.config.ligatures.sequences) {
      if (!text.startsWith(sequence, start)) continue;
      let covered = 0;
      let consumed = 0;
      while (consumed < sequence.length && index + covered < segments.length) {
        consumed += segments[index + covered].segment.length;
        covered += 1;
      }
      // Only accept sequences that end on a cluster boundary.
      if (consumed === sequence.length && covered > best) best = covered;
    }
    return best;
  }
}

// Private-use range ids so ligature glyphs never collide with code points of plain text.
function ligatureGlyphId(sequence: string): number {
  let hash = 0;
  for (let i = 0; i < sequence.length; i += 1) {
    hash = (hash * 31 + sequence.charCodeAt(i)) % 0x1900;
  }
  return 0xe000 + hash;
}

/**
 * Creates the default backend: a {@link DeterministicShaper} behind a
 * {@link ShapeCache} sized from the current measurement config.
 */
export function createDeterministicShaper(overrides: Partial<MeasurementConfig> = {}): ShapeCache {
  const shaper = new DeterministicShaper(overrides);
  return new ShapeCache(shaper, shaper.config.cacheSize);
}
