import type { Response } from 'express';
import type { z, ZodTypeAny } from 'zod';

/**
 * Validate request input (body or query) against a Zod schema.
 * Sends 400 with flattened errors and returns null if validation fails.
 */
export function validateInput<T extends ZodTypeAny>(
  schema: T,
  input: unknown,
  res: Response,
  error = 'Validation failed',
): z.infer<T> | null {
  const result = schema.safeParse(input);
  if (!result.success) {
    res.status(400).json({
      error,
      details: result.error.flatten(),
    });
    return null;
  }
  return result.data;
}
