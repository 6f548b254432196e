/**
 * Validation Schemas
 *
 * Zod schemas for common data structures.
 */

import { z } from 'zod';

/**
 * Month period ('YYYY-MM') or year period ('YYYY')
 */
export const PeriodSchema = z.string().trim().regex(
  /^\d{4}(-(0[1-9]|1[0-2]))?$/,
  "Period must be 'YYYY-MM' or 'YYYY'"
);

/**
 * ISO 8601 timestamp
 */
export const ISOTimestampSchema = z.string().refine(
  (value) => !isNaN(Date.parse(value)),
  'Invalid ISO 8601 timestamp'
);

/**
 * Identifier: trimmed, non-empty
 */
export const IdentifierSchema = z.string().trim().min(1, 'Identifier cannot be empty');

/**
 * Non-negative finite number
 */
export const NonNegativeNumberSchema = z.number().finite().nonnegative();

/**
 * Number coerced from oracle output, where numbers sometimes arrive as strings
 * ("5", "5+ years") or are missing
 */
export const LenientNumberSchema = z.preprocess((value) => {
  if (typeof value === 'string') {
    const match = value.match(/-?\d+(\.\d+)?/);
    return match ? Number(match[0]) : undefined;
  }
  return value === null ? undefined : value;
}, z.number().finite().optional());
