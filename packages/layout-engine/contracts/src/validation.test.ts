import { describe, expect, it } from 'vitest';
import { InvalidInputError } from './errors.js';
import { assertFiniteCoordinate, assertOffset, inlineBoxSpecSchema, parseOrThrow } from './validation.js';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
};

describe('validation', () => {
  it('returns parsed data on success', () => {
    const spec = parseOrThrow(inlineBoxSpecSchema, { id: 'a', width: 1, height: 2 }, 'INVALID_INLINE_BOX', 'Bad box');
    expect(spec).toEqual({ id: 'a', width: 1, height: 2 });
  });

  it('wraps zod issues into an InvalidInputError', () => {
    const error = captureError(() =>
      parseOrThrow(inlineBoxSpecSchema, { id: 'a', width: -1, height: 2 }, 'INVALID_INLINE_BOX', 'Bad box'),
    );
    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toMatchObject({ code: 'INVALID_INLINE_BOX', details: { issues: [{ path: 'width' }] } });
  });

  it('rejects unknown keys', () => {
    expect(() =>
      parseOrThrow(inlineBoxSpecSchema, { id: 'a', width: 1, height: 1, depth: 1 }, 'INVALID_INLINE_BOX', 'Bad box'),
    ).toThrow(/^Bad box: /);
  });

  it('accepts finite coordinates only', () => {
    expect(() => assertFiniteCoordinate(-10, 1e6)).not.toThrow();
    expect(captureError(() => assertFiniteCoordinate(Number.NaN, 0))).toMatchObject({ code: 'INVALID_COORDINATE' });
    expect(() => assertFiniteCoordinate(0, Number.NEGATIVE_INFINITY)).toThrow(InvalidInputError);
  });

  it('accepts integer offsets of any sign', () => {
    expect(() => assertOffset(-4)).not.toThrow();
    expect(captureError(() => assertOffset(0.5))).toMatchObject({ code: 'INVALID_OFFSET', details: { offset: 0.5 } });
  });
});
