import type { z } from 'zod';
import { ValidationError, type ErrorReason } from '../../application/errors/AppError.js';

/**
 * Parses request input against a schema, raising a `ValidationError` with the
 * first issue's message on failure.
 */
export const parseInput = <S extends z.ZodTypeAny>(schema: S, input: unknown, reason: ErrorReason): z.output<S> => {
  const result = schema.safeParse(input);

  if (!result.success) {
    const [first] = result.error.issues;
    throw new ValidationError(reason, first?.message ?? 'Invalid request', result.error.flatten());
  }

  return result.data;
};
