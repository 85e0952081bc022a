import { z, ZodError, type ZodTypeAny } from 'zod';
import { ValidationException } from '../utils/exceptions';

/**
 * Validate engine input against a Zod schema.
 * The first issue becomes the ValidationException message.
 */
export function validateInput<S extends ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof ZodError) {
      const firstError = error.issues[0];
      throw new ValidationException(firstError ? firstError.message : 'Validation failed');
    }
    throw error;
  }
}
