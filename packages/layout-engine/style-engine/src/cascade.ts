import type { TextDecorations, TextStyle, TextStyleOverride } from '@textflow/contracts';

/**
 * Merges one override onto a resolved style. Absent fields inherit from `base`;
 * `decorations` merges key-wise (later keys win) and every other field replaces.
 * The result is frozen and `base` is left untouched.
 */
export function mergeTextStyle(base: TextStyle, override: TextStyleOverride | null | undefined): TextStyle {
  if (!override) return base;
  return freezeTextStyle({
    fontFamilies: override.fontFamilies ?? base.fontFamilies,
    fontSize: override.fontSize ?? base.fontSize,
    lineHeight: override.lineHeight ?? base.lineHeight,
    color: override.color ?? base.color,
    fontWeight: override.fontWeight ?? base.fontWeight,
    fontStyle: override.fontStyle ?? base.fontStyle,
    decorations: mergeDecorations(base.decorations, override.decorations),
  });
}

/**
 * Combines overrides in cascade order (earlier entries are enclosing, later
 * entries win). Null entries are skipped. Inputs are not mutated.
 *
 * @example
 * combineTextStyleOverrides([{ fontSize: 12, decorations: { underline: true } }, { fontSize: 14 }]);
 * // { fontSize: 14, decorations: { underline: true } }
 */
export function combineTextStyleOverrides(
  overrides: ReadonlyArray<TextStyleOverride | null | undefined>,
): TextStyleOverride {
  let combined: TextStyleOverride = {};
  for (const override of overrides) {
    if (!override) continue;
    combined = {
      fontFamilies: override.fontFamilies ?? combined.fontFamilies,
      fontSize: override.fontSize ?? combined.fontSize,
      lineHeight: override.lineHeight ?? combined.lineHeight,
      color: override.color ?? combined.color,
      fontWeight: override.fontWeight ?? combined.fontWeight,
      fontStyle: override.fontStyle ?? combined.fontStyle,
      decorations:
        combined.decorations && override.decorations
          ? mergeDecorations(combined.decorations, override.decorations)
          : (override.decorations ?? combined.decorations),
    };
  }
  return dropUndefined(combined);
}

export function mergeDecorations(base: TextDecorations, override: TextDecorations | undefined): TextDecorations {
  if (!override || Object.keys(override).length === 0) return base;
  return Object.freeze({ ...base, ...override });
}

export function freezeTextStyle(style: TextStyle): TextStyle {
  if (Object.isFrozen(style)) return style;
  return Object.freeze({
    ...style,
    fontFamilies: Object.freeze([...style.fontFamilies]),
    lineHeight: Object.freeze({ ...style.lineHeight }),
    decorations: Object.isFrozen(style.decorations) ? style.decorations : Object.freeze({ ...style.decorations }),
  });
}

function dropUndefined(override: TextStyleOverride): TextStyleOverride {
  const result: { -readonly [K in keyof TextStyleOverride]: TextStyleOverride[K] } = {};
  if (override.fontFamilies !== undefined) result.fontFamilies = override.fontFamilies;
  if (override.fontSize !== undefined) result.fontSize = override.fontSize;
  if (override.lineHeight !== undefined) result.lineHeight = override.lineHeight;
  if (override.color !== undefined) result.color = override.color;
  if (override.fontWeight !== undefined) result.fontWeight = override.fontWeight;
  if (override.fontStyle !== undefined) result.fontStyle = override.fontStyle;
  if (override.decorations !== undefined) result.decorations = override.decorations;
  return result;
}
