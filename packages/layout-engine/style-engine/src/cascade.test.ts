import { describe, expect, it } from 'vitest';
import type { TextStyle } from '@textflow/contracts';
import { combineTextStyleOverrides, freezeTextStyle, mergeDecorations, mergeTextStyle } from './cascade.js';

const base: TextStyle = freezeTextStyle({
  fontFamilies: ['Inter', 'sans-serif'],
  fontSize: 16,
  lineHeight: { kind: 'multiplier', value: 1.25 },
  color: '#111111',
  fontWeight: 400,
  fontStyle: 'normal',
  decorations: { underline: 'single' },
});

describe('cascade - mergeTextStyle', () => {
  it('returns the base style when there is no override', () => {
    expect(mergeTextStyle(base, undefined)).toBe(base);
    expect(mergeTextStyle(base, null)).toBe(base);
  });

  it('replaces present fields and inherits absent ones', () => {
    const result = mergeTextStyle(base, { fontSize: 20, fontStyle: 'italic' });
    expect(result).toEqual({ ...base, fontSize: 20, fontStyle: 'italic' });
  });

  it('replaces the family chain as a whole', () => {
    expect(mergeTextStyle(base, { fontFamilies: ['Fira Code'] }).fontFamilies).toEqual(['Fira Code']);
  });

  it('merges decorations key-wise', () => {
    const result = mergeTextStyle(base, { decorations: { strike: true } });
    expect(result.decorations).toEqual({ underline: 'single', strike: true });
  });

  it('lets later decoration keys win', () => {
    const result = mergeTextStyle(base, { decorations: { underline: 'composition' } });
    expect(result.decorations).toEqual({ underline: 'composition' });
  });

  it('freezes the result and leaves the base untouched', () => {
    const result = mergeTextStyle(base, { color: '#ff0000' });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.fontFamilies)).toBe(true);
    expect(base.color).toBe('#111111');
  });
});

describe('cascade - combineTextStyleOverrides', () => {
  it('returns an empty override for an empty list', () => {
    expect(combineTextStyleOverrides([])).toEqual({});
  });

  it('skips null entries and lets later entries win', () => {
    const result = combineTextStyleOverrides([{ fontSize: 12, color: '#000' }, null, { fontSize: 14 }, undefined]);
    expect(result).toEqual({ fontSize: 14, color: '#000' });
  });

  it('merges decorations across entries', () => {
    const result = combineTextStyleOverrides([{ decorations: { underline: true } }, { decorations: { strike: true } }]);
    expect(result).toEqual({ decorations: { underline: true, strike: true } });
  });

  it('does not emit keys for fields nobody set', () => {
    expect(Object.keys(combineTextStyleOverrides([{ fontWeight: 700 }]))).toEqual(['fontWeight']);
  });
});

describe('cascade - mergeDecorations', () => {
  it('returns the base bag for an empty override', () => {
    const decorations = { underline: true };
    expect(mergeDecorations(decorations, {})).toBe(decorations);
    expect(mergeDecorations(decorations, undefined)).toBe(decorations);
  });
});
