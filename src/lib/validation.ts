import type { ZodTypeAny, output } from 'zod';
import { ValidationError, type FieldErrors } from '../errors';

/**
 * Parses request input with a zod schema, turning a failure into a
 * ValidationError whose details are keyed by field path.
 */
export function parseInput<S extends ZodTypeAny>(schema: S, input: unknown): output<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const details: FieldErrors = {};
  for (const issue of result.error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : '_';
    (details[field] ??= []).push(issue.message);
  }
  throw new ValidationError('Invalid input', details);
}
