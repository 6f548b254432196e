/**
 * Validator Utilities
 *
 * Common validation utilities using Zod for schema validation.
 */

import { z } from 'zod';
import type { ValidationResult, ValidationError } from './types';

/**
 * Convert zod issues into field/message pairs
 */
export function formatZodIssues(error: z.ZodError): ValidationError[] {
  return error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message
  }));
}

/**
 * Validates a value against a schema
 * @returns Validation result with the parsed data or one error per invalid field
 */
export function validateWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(value);

  if (result.success) {
    return {
      isValid: true,
      data: result.data,
      errors: []
    };
  }

  return {
    isValid: false,
    errors: formatZodIssues(result.error)
  };
}
