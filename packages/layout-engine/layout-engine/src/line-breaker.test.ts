import { describe, it, expect } from 'vitest';
import { createDeterministicShaper } from '@textflow/measuring-deterministic';
import { DEFAULT_TEXT_STYLE } from '@textflow/style-engine';
import type { WhiteSpaceMode } from '@textflow/contracts';
import { buildBreakUnits, minContentWidth, planLines } from './line-breaker.js';
import { collapseSource } from './source.js';

const unitsFor = (text: string, whiteSpace: WhiteSpaceMode) => {
  const source = collapseSource([{ kind: 'text', text, style: DEFAULT_TEXT_STYLE, whiteSpace }], DEFAULT_TEXT_STYLE);
  return buildBreakUnits(source, createDeterministicShaper());
};

const summarize = (text: string, whiteSpace: WhiteSpaceMode) =>
  unitsFor(text, whiteSpace).map((unit) => [unit.kind, unit.start, unit.end, unit.width]);

describe('buildBreakUnits', () => {
  it('splits collapsed text into words and spaces', () => {
    expect(summarize('ab cd', 'collapse')).toEqual([
      ['word', 0, 2, 16],
      ['space', 2, 3, 8],
      ['word', 3, 5, 16],
    ]);
  });

  it('keeps preserved spaces inside words and splits at newlines', () => {
    expect(summarize('a b\nc', 'preserve')).toEqual([
      ['word', 0, 3, 24],
      ['newline', 3, 4, 0],
      ['word', 4, 5, 8],
    ]);
  });

  it('groups pre-wrap whitespace into one hanging unit and keeps CRLF together', () => {
    expect(summarize('a \t b\r\nc', 'pre-wrap')).toEqual([
      ['word', 0, 1, 8],
      ['space', 1, 4, 24],
      ['word', 4, 5, 8],
      ['newline', 5, 7, 0],
      ['word', 7, 8, 8],
    ]);
  });

  it('emits one newline unit per forced break', () => {
    expect(summarize('\n\n', 'preserve').map(([kind]) => kind)).toEqual(['newline', 'newline']);
  });
});

describe('buildBreakUnits with inline boxes', () => {
  const withBox = (whiteSpace: WhiteSpaceMode) => {
    const source = collapseSource(
      [
        { kind: 'text', text: 'ab', style: DEFAULT_TEXT_STYLE, whiteSpace },
        { kind: 'box', spec: { id: 'img', width: 10, height: 10 }, style: DEFAULT_TEXT_STYLE, whiteSpace },
        { kind: 'text', text: 'cd', style: DEFAULT_TEXT_STYLE, whiteSpace },
      ],
      DEFAULT_TEXT_STYLE,
    );
    return buildBreakUnits(source, createDeterministicShaper()).map((unit) => [unit.kind, unit.start, unit.end, unit.width]);
  };

  it('gives a box its own unit in collapse mode', () => {
    expect(withBox('collapse')).toEqual([
      ['word', 0, 2, 16],
      ['box', 2, 2, 10],
      ['word', 2, 4, 16],
    ]);
  });

  it('folds a box into the surrounding word in preserve mode', () => {
    expect(withBox('preserve')).toEqual([['word', 0, 4, 42]]);
  });
});

describe('buildBreakUnits with grapheme clusters', () => {
  it('keeps a space carrying a combining mark inside the word', () => {
    expect(summarize('a \u0301b', 'pre-wrap')).toEqual([['word', 0, 4, 24]]);
    expect(summarize('a \u0301b', 'collapse')).toEqual([['word', 0, 4, 24]]);
  });
});

describe('planLines', () => {
  it('puts everything on one line per paragraph without a width', () => {
    const plans = planLines(unitsFor('ab cd', 'collapse'), 5);
    expect(plans.map((plan) => [plan.startOffset, plan.endOffset, plan.width])).toEqual([[0, 5, 40]]);
  });

  it('fits a unit that ends exactly at the limit', () => {
    const plans = planLines(unitsFor('ab cd', 'collapse'), 5, 40);
    expect(plans).toHaveLength(1);
  });

  it('excludes hanging spaces from the line width', () => {
    const plans = planLines(unitsFor('ab cd ', 'collapse'), 6, 20);
    expect(plans.map((plan) => [plan.startOffset, plan.endOffset, plan.width])).toEqual([
      [0, 3, 16],
      [3, 6, 16],
    ]);
  });

  it('returns a single empty plan for no units', () => {
    expect(planLines([], 0, 100)).toEqual([{ startOffset: 0, endOffset: 0, units: [], width: 0 }]);
  });
});

describe('minContentWidth', () => {
  it('ignores spaces and newlines', () => {
    expect(minContentWidth(unitsFor('a   bbb\n', 'pre-wrap'))).toBe(24);
  });
});
