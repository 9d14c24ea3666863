/**
 * @textflow/style-engine
 *
 * Owns the style cascade for inline text: default style construction,
 * override merging and the span stack used while building a layout.
 *
 * Line heights stay in their declared form (`multiplier` or `absolute`) until
 * measurement; {@link resolveLineHeightPx} is the single conversion point.
 */

export { mergeTextStyle, combineTextStyleOverrides, mergeDecorations, freezeTextStyle } from './cascade.js';
export { StyleSpanStack } from './style-span-stack.js';

import { parseOrThrow, textStyleOverrideSchema, type TextStyle, type TextStyleOverride } from '@textflow/contracts';
import { freezeTextStyle, mergeTextStyle } from './cascade.js';

export const DEFAULT_FONT_SIZE = 16;
export const DEFAULT_LINE_HEIGHT_MULTIPLIER = 1.25;

export const DEFAULT_TEXT_STYLE: TextStyle = freezeTextStyle({
  fontFamilies: ['sans-serif'],
  fontSize: DEFAULT_FONT_SIZE,
  lineHeight: { kind: 'multiplier', value: DEFAULT_LINE_HEIGHT_MULTIPLIER },
  color: '#000000',
  fontWeight: 400,
  fontStyle: 'normal',
  decorations: {},
});

/**
 * Builds a complete style from the defaults plus a validated override.
 *
 * @throws {InvalidInputError} When the override has unknown keys or out-of-range values.
 *
 * @example
 * ```typescript
 * createTextStyle({ fontSize: 20, fontWeight: 700 });
 * // { ...DEFAULT_TEXT_STYLE, fontSize: 20, fontWeight: 700 }
 * ```
 */
export function createTextStyle(override: TextStyleOverride = {}, base: TextStyle = DEFAULT_TEXT_STYLE): TextStyle {
  return mergeTextStyle(base, validateTextStyleOverride(override));
}

export function validateTextStyleOverride(override: unknown): TextStyleOverride {
  return parseOrThrow(textStyleOverrideSchema, override, 'INVALID_STYLE', 'Invalid text style override');
}

export function resolveLineHeightPx(style: TextStyle): number {
  return style.lineHeight.kind === 'absolute' ? style.lineHeight.px : style.fontSize * style.lineHeight.value;
}

/**
 * Structural equality used to coalesce adjacent runs. Decorations compare by
 * key and strict value equality; nested decoration objects compare by reference.
 */
export function textStylesEqual(a: TextStyle, b: TextStyle): boolean {
  if (a === b) return true;
  if (
    a.fontSize !== b.fontSize ||
    a.color !== b.color ||
    a.fontWeight !== b.fontWeight ||
    a.fontStyle !== b.fontStyle ||
    a.fontFamilies.length !== b.fontFamilies.length
  ) {
    return false;
  }
  if (a.fontFamilies.some((family, index) => family !== b.fontFamilies[index])) return false;
  if (a.lineHeight.kind !== b.lineHeight.kind) return false;
  if (a.lineHeight.kind === 'absolute' && b.lineHeight.kind === 'absolute' && a.lineHeight.px !== b.lineHeight.px) {
    return false;
  }
  if (
    a.lineHeight.kind === 'multiplier' &&
    b.lineHeight.kind === 'multiplier' &&
    a.lineHeight.value !== b.lineHeight.value
  ) {
    return false;
  }
  const aKeys = Object.keys(a.decorations);
  const bKeys = Object.keys(b.decorations);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((key) => Object.is(a.decorations[key], b.decorations[key]));
}
