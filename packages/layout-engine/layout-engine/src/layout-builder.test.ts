import { describe, it, expect } from 'vitest';
import { InvalidInputError, LogicError } from '@textflow/contracts';
import { LayoutBuilder } from './layout-builder.js';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
};

describe('LayoutBuilder', () => {
  describe('whitespace collapsing', () => {
    it('drops leading whitespace and merges interior runs into one space', () => {
      const builder = new LayoutBuilder();
      builder.pushText('  a \n\t b  ');
      expect(builder.build().text).toBe('a b ');
    });

    it('collapses across chunk boundaries', () => {
      const builder = new LayoutBuilder();
      builder.pushText('a ');
      builder.pushText(' b');
      const { text, layout } = builder.build();
      expect(text).toBe('a b');
      expect(layout.runs).toHaveLength(1);
    });

    it('drops a collapsible space that follows preserved whitespace', () => {
      const builder = new LayoutBuilder();
      builder.setWhiteSpaceMode('preserve');
      builder.pushText('x ');
      builder.setWhiteSpaceMode('collapse');
      builder.pushText(' y');
      const { text, layout } = builder.build();
      expect(text).toBe('x y');
      expect(layout.runs.map((run) => [run.start, run.end, run.whiteSpace])).toEqual([
        [0, 2, 'preserve'],
        [2, 3, 'collapse'],
      ]);
    });

    it('keeps a space after an inline box', () => {
      const builder = new LayoutBuilder();
      builder.pushText('a ');
      builder.pushInlineBox({ id: 'box', width: 10, height: 10 });
      builder.pushText(' b');
      const { text, layout } = builder.build();
      expect(text).toBe('a  b');
      expect(layout.inlineBoxGeometry('box')?.offset).toBe(2);
    });

    it('copies preserved text verbatim', () => {
      const builder = new LayoutBuilder({ whiteSpace: 'preserve' });
      builder.pushText('  a\t\tb\n');
      expect(builder.build().text).toBe('  a\t\tb\n');
    });
  });

  describe('runs', () => {
    it('coalesces adjacent chunks with structurally equal styles', () => {
      const builder = new LayoutBuilder();
      builder.pushText('ab');
      builder.pushStyleSpan({ color: '#000000' });
      builder.pushText('cd');
      builder.popStyleSpan();
      expect(builder.build().layout.runs).toHaveLength(1);
    });

    it('splits runs when the style changes', () => {
      const builder = new LayoutBuilder();
      builder.pushText('ab');
      builder.pushStyleSpan({ fontWeight: 700 });
      builder.pushText('cd');
      builder.popStyleSpan();
      builder.pushText('ef');
      const runs = builder.build().layout.runs;
      expect(runs.map((run) => [run.start, run.end, run.style.fontWeight])).toEqual([
        [0, 2, 400],
        [2, 4, 700],
        [4, 6, 400],
      ]);
    });

    it('tags temporary styles like regular spans', () => {
      const builder = new LayoutBuilder();
      builder.pushTemporaryStyle({ decorations: { underline: 'composition' } });
      builder.pushText('ni');
      builder.popStyleSpan();
      const [run] = builder.build().layout.runs;
      expect(run.style.decorations).toEqual({ underline: 'composition' });
    });

    it('allows build with spans still open', () => {
      const builder = new LayoutBuilder();
      builder.pushStyleSpan({ fontSize: 20 });
      builder.pushText('x');
      expect(builder.styleDepth).toBe(1);
      expect(builder.build().layout.runs[0].style.fontSize).toBe(20);
    });
  });

  describe('errors', () => {
    it('throws LogicError on pop without push', () => {
      const builder = new LayoutBuilder();
      const error = captureError(() => builder.popStyleSpan());
      expect(error).toBeInstanceOf(LogicError);
      expect(error).toMatchObject({ code: 'STYLE_STACK_UNDERFLOW' });
    });

    it('throws LogicError on any call after build', () => {
      const builder = new LayoutBuilder();
      builder.build();
      for (const call of [
        () => builder.pushText('x'),
        () => builder.pushStyleSpan({ fontSize: 12 }),
        () => builder.setWhiteSpaceMode('preserve'),
        () => builder.pushInlineBox({ id: 'late', width: 1, height: 1 }),
        () => builder.build(),
      ]) {
        expect(captureError(call)).toMatchObject({ name: 'LogicError', code: 'BUILDER_CONSUMED' });
      }
    });

    it('rejects duplicate inline box ids', () => {
      const builder = new LayoutBuilder();
      builder.pushInlineBox({ id: 'img', width: 10, height: 10 });
      const error = captureError(() => builder.pushInlineBox({ id: 'img', width: 5, height: 5 }));
      expect(error).toBeInstanceOf(LogicError);
      expect(error).toMatchObject({ code: 'DUPLICATE_INLINE_BOX', details: { id: 'img' } });
    });

    it.each([
      { id: '', width: 10, height: 10 },
      { id: 'neg', width: -1, height: 10 },
      { id: 'nan', width: 10, height: Number.NaN },
      { id: 'inf', width: Number.POSITIVE_INFINITY, height: 10 },
    ])('rejects invalid inline box %o', (spec) => {
      const builder = new LayoutBuilder();
      const error = captureError(() => builder.pushInlineBox(spec));
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({ code: 'INVALID_INLINE_BOX' });
    });

    it('rejects invalid style overrides', () => {
      const builder = new LayoutBuilder();
      const error = captureError(() => builder.pushStyleSpan({ fontSize: -4 }));
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({ code: 'INVALID_STYLE' });
      expect(builder.styleDepth).toBe(0);
    });
  });
});
