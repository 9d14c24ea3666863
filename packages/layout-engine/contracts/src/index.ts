export {
  LogicError,
  InvalidInputError,
  isLogicError,
  isInvalidInputError,
  type LogicErrorCode,
  type InvalidInputErrorCode,
} from './errors.js';
export { createDebugLogger, isDebugScopeEnabled, type DebugLogger } from './debug.js';
export {
  textStyleOverrideSchema,
  inlineBoxSpecSchema,
  lineHeightSchema,
  parseOrThrow,
  assertFiniteCoordinate,
  assertOffset,
} from './validation.js';

export const CONTRACTS_VERSION = '1.0.0';

// ---------------------------------------------------------------------------
// Styles
// ---------------------------------------------------------------------------

/**
 * Line height is either a multiple of the font size or an absolute pixel value.
 * CSS `line-height: 1.25` maps to `{ kind: 'multiplier', value: 1.25 }`,
 * `line-height: 20px` to `{ kind: 'absolute', px: 20 }`.
 */
export type LineHeight = { kind: 'multiplier'; value: number } | { kind: 'absolute'; px: number };

export type FontStyle = 'normal' | 'italic';

/**
 * Opaque decoration bag (underline, strikethrough, composition marker...).
 * The engine passes it through to glyph runs without interpreting it.
 */
export type TextDecorations = Readonly<Record<string, unknown>>;

/**
 * Fully resolved text style. Produced by the style resolver or by merging
 * overrides onto a default style; frozen once constructed.
 */
export type TextStyle = {
  /** Ordered fallback chain; family names or generic keywords such as `monospace`. */
  readonly fontFamilies: readonly string[];
  /** Font size in device-independent pixels. */
  readonly fontSize: number;
  readonly lineHeight: LineHeight;
  /** Paint reference, typically a CSS colour string. */
  readonly color: string;
  readonly fontWeight: number;
  readonly fontStyle: FontStyle;
  readonly decorations: TextDecorations;
};

/**
 * Partial style applied over an enclosing style. An absent field inherits;
 * `decorations` merges key-wise, every other field replaces.
 */
export type TextStyleOverride = {
  readonly [K in keyof TextStyle]?: TextStyle[K];
};

/**
 * - `collapse`: whitespace runs merge into one space, lines may break there.
 * - `preserve`: whitespace kept verbatim, only `\n` breaks a line.
 * - `pre-wrap`: whitespace kept verbatim, lines may break after whitespace and at `\n`.
 */
export type WhiteSpaceMode = 'collapse' | 'preserve' | 'pre-wrap';

export const WhiteSpaceModes = {
  Collapse: 'collapse',
  Preserve: 'preserve',
  PreWrap: 'pre-wrap',
} as const satisfies Record<string, WhiteSpaceMode>;

// ---------------------------------------------------------------------------
// Inline boxes
// ---------------------------------------------------------------------------

/** Caller-supplied placeholder for replaced content (image, widget...). */
export type InlineBoxSpec = {
  readonly id: string;
  readonly width: number;
  readonly height: number;
};

/**
 * Geometry resolved for an {@link InlineBoxSpec} by `Layout.breakAllLines`.
 * Keyed by the same id; the InlineBoxSpec itself is never mutated.
 */
export type InlineBoxGeometry = {
  readonly id: string;
  /** Text offset of the zero-length marker the box occupies. */
  readonly offset: number;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly lineIndex: number;
};

// ---------------------------------------------------------------------------
// Shaping backend
// ---------------------------------------------------------------------------

export type FontMetrics = {
  /** Distance from baseline to the top of the em box, px. */
  readonly ascent: number;
  /** Distance from baseline to the bottom of the em box, px (positive). */
  readonly descent: number;
};

export type ShapedGlyph = {
  readonly glyphId: number;
  /** Start offset (in the layout's backing text) of the cluster this glyph belongs to. */
  readonly cluster: number;
  readonly advance: number;
  /** Pen position relative to the start of the run. */
  readonly x: number;
};

export type ShapedRun = {
  readonly glyphs: readonly ShapedGlyph[];
  readonly width: number;
};

/**
 * Maps text + style to positioned glyphs. Implementations must be synchronous
 * and must return a usable result for any input (fallback fonts are their concern).
 */
export interface ShapingBackend {
  /**
   * @param baseOffset Offset of `text` within the backing string; glyph clusters are reported relative to it.
   */
  shape(text: string, style: TextStyle, baseOffset: number): ShapedRun;
  measure(text: string, style: TextStyle): number;
  metrics(style: TextStyle): FontMetrics;
}

/** Resolves host nodes into styles. Lives outside the engine; declared here for callers. */
export interface StyleResolver<TNode> {
  resolveStyle(node: TNode): TextStyle;
  resolveWhiteSpace(node: TNode): WhiteSpaceMode;
}

// ---------------------------------------------------------------------------
// Layout output
// ---------------------------------------------------------------------------

export type GlyphRunItem = {
  readonly kind: 'glyphs';
  readonly runIndex: number;
  /** Range in the backing text, `[start, end)`. */
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly style: TextStyle;
  readonly whiteSpace: WhiteSpaceMode;
  /** Left edge relative to the layout origin. */
  readonly x: number;
  readonly width: number;
  readonly glyphs: readonly ShapedGlyph[];
};

export type InlineBoxItem = {
  readonly kind: 'box';
  readonly id: string;
  readonly offset: number;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
};

export type LayoutItem = GlyphRunItem | InlineBoxItem;

export type LayoutLine = {
  readonly index: number;
  readonly startOffset: number;
  readonly endOffset: number;
  readonly top: number;
  readonly height: number;
  /** Baseline distance from the line top. */
  readonly baseline: number;
  /** Content width, excluding hanging trailing whitespace. */
  readonly width: number;
  readonly items: readonly LayoutItem[];
};

export type ContentWidths = {
  readonly min: number;
  readonly max: number;
};

export type LayoutSize = {
  readonly width: number;
  readonly height: number;
};

export type CaretPosition = {
  readonly x: number;
  /** Top of the line holding the caret. */
  readonly y: number;
  readonly lineIndex: number;
  readonly height: number;
};

export type TextRange = {
  readonly start: number;
  readonly end: number;
};
