import { describe, expect, it } from 'vitest';
import { InvalidInputError, isInvalidInputError, isLogicError, LogicError } from './errors.js';

describe('errors', () => {
  it('carries code, details and name', () => {
    const error = new LogicError('BUILDER_CONSUMED', 'consumed', { step: 'build' });
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(LogicError);
    expect(error.name).toBe('LogicError');
    expect(error.code).toBe('BUILDER_CONSUMED');
    expect(error.details).toEqual({ step: 'build' });
    expect(error.message).toBe('consumed');
  });

  it('distinguishes the two families with type guards', () => {
    const invalid = new InvalidInputError('INVALID_OFFSET', 'bad offset');
    expect(isInvalidInputError(invalid)).toBe(true);
    expect(isLogicError(invalid)).toBe(false);
    expect(isLogicError(new Error('plain'))).toBe(false);
    expect(invalid.details).toBeUndefined();
  });
});
