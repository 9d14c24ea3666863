export type LogicErrorCode = 'STYLE_STACK_UNDERFLOW' | 'BUILDER_CONSUMED' | 'DUPLICATE_INLINE_BOX';

export type InvalidInputErrorCode =
  | 'INVALID_COORDINATE'
  | 'INVALID_OFFSET'
  | 'INVALID_INLINE_BOX'
  | 'INVALID_STYLE'
  | 'INVALID_OPTIONS';

/**
 * Programmer misuse: mismatched style pops, mutating a consumed builder.
 * Never recovered internally; continuing would corrupt style attribution.
 *
 * Consumers should prefer checking `error.code` over `instanceof` when the
 * error may cross package or bundle boundaries.
 */
export class LogicError extends Error {
  readonly code: LogicErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: LogicErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LogicError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, LogicError.prototype);
  }
}

/**
 * Malformed input from outside the engine (NaN coordinates, fractional
 * offsets, negative box sizes). The operation that throws leaves state untouched.
 */
export class InvalidInputError extends Error {
  readonly code: InvalidInputErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: InvalidInputErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'InvalidInputError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

export function isLogicError(error: unknown): error is LogicError {
  return error instanceof LogicError;
}

export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}
