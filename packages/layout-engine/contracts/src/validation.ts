import { z } from 'zod';
import { InvalidInputError, type InvalidInputErrorCode } from './errors.js';

const positiveFinite = z.number().finite().positive();
const nonNegativeFinite = z.number().finite().nonnegative();

export const lineHeightSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('multiplier'), value: positiveFinite }),
  z.object({ kind: z.literal('absolute'), px: positiveFinite }),
]);

export const textStyleOverrideSchema = z
  .object({
    fontFamilies: z.array(z.string().trim().min(1)).nonempty(),
    fontSize: positiveFinite,
    lineHeight: lineHeightSchema,
    color: z.string().min(1),
    fontWeight: z.number().int().min(1).max(1000),
    fontStyle: z.enum(['normal', 'italic']),
    decorations: z.record(z.unknown()),
  })
  .partial()
  .strict();

export const inlineBoxSpecSchema = z
  .object({
    id: z.string().min(1),
    width: nonNegativeFinite,
    height: nonNegativeFinite,
  })
  .strict();

/**
 * Parses `value` with `schema`, converting zod failures into an
 * {@link InvalidInputError} that carries the issue list in `details`.
 */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  code: InvalidInputErrorCode,
  message: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    throw new InvalidInputError(code, `${message}: ${issues.map((issue) => issue.message).join('; ')}`, { issues });
  }
  return result.data;
}

export function assertFiniteCoordinate(x: number, y: number): void {
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new InvalidInputError('INVALID_COORDINATE', `Coordinates must be finite numbers (got ${x}, ${y})`, { x, y });
  }
}

export function assertOffset(offset: number): void {
  if (!Number.isInteger(offset)) {
    throw new InvalidInputError('INVALID_OFFSET', `Offset must be an integer (got ${offset})`, { offset });
  }
}
