/**
 * Validation Types
 *
 * Type definitions for validation results and errors.
 */

/**
 * Validation error for a specific field
 */
export interface ValidationError {
  field: string;
  message: string;
  received?: unknown;
}

/**
 * Result of validation
 */
export type ValidationResult<T> =
  | { isValid: true; data: T; errors: [] }
  | { isValid: false; errors: ValidationError[] };
