import { z } from 'zod';
import { ValidationError } from './errors';

// Shared validation helpers

/**
 * Remove NUL and control characters (newline and tab are kept), then trim
 */
export const sanitizeString = (value: string): string =>
  Array.from(value)
    .filter((char) => char.charCodeAt(0) >= 32 || char === '\n' || char === '\t')
    .join('')
    .replace(/\u007f/g, '')
    .trim();

const boundedId = (schema: z.ZodNumber) =>
  schema.int('ID must be an integer').positive('ID must be a positive integer').max(2147483647, 'ID value too large');

/**
 * Ids from route params and query strings, which always arrive as text
 */
export const idSchema = boundedId(z.coerce.number({ invalid_type_error: 'ID must be a number' }));

/**
 * Ids inside a JSON body must already be numbers
 */
export const bodyIdSchema = boundedId(
  z.number({ required_error: 'ID is required', invalid_type_error: 'ID must be a number' })
);

/**
 * Free text that is sanitized first, then length-checked
 */
export const sanitizedText = (field: string, min: number, max: number) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .transform(sanitizeString)
    .pipe(
      z
        .string()
        .min(min, `${field} must be at least ${min} characters`)
        .max(max, `${field} must not exceed ${max} characters`)
    );

/**
 * Parse with a zod schema, surfacing failures as ValidationError
 */
export const parseInput = <T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  message: string = 'Invalid request data'
): z.output<T> => {
  const result = schema.safeParse(input);

  if (!result.success) {
    throw new ValidationError(message, result.error.errors);
  }

  return result.data;
};
