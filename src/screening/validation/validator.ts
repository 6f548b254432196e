/**
 * Screening Validators
 *
 * Schema boundary for oracle output and caller input. Oracle text is parsed
 * and validated immediately on receipt; nothing untyped flows downstream.
 */

import { z } from 'zod';
import { parseJsonResponse } from '../../shared/llm/client';
import { validateWith } from '../../shared/validation/validator';
import { ScreeningErrorFactory } from '../errors/types';

/**
 * Parse raw oracle text against the schema for its prompt kind
 * @throws ScreeningError ORACLE_PARSE_ERROR when the text is not JSON or does not match
 */
export function parseOracleResponse<S extends z.ZodTypeAny>(
  promptKind: string,
  schema: S,
  text: string
): z.output<S> {
  let json: unknown;
  try {
    json = parseJsonResponse(text);
  } catch (error) {
    throw ScreeningErrorFactory.oracleParse(
      promptKind,
      error instanceof Error ? error.message : String(error)
    );
  }

  const result = validateWith(schema, json);
  if (!result.isValid) {
    throw ScreeningErrorFactory.oracleParse(
      promptKind,
      `Response does not match the ${promptKind} schema`,
      result.errors
    );
  }
  return result.data;
}

/**
 * Validate caller input
 * @throws ScreeningError INVALID_ARGUMENT listing every invalid field
 */
export function validateInput<S extends z.ZodTypeAny>(
  subject: string,
  schema: S,
  value: unknown
): z.output<S> {
  const result = validateWith(schema, value);
  if (!result.isValid) {
    throw ScreeningErrorFactory.invalidInput(subject, result.errors);
  }
  return result.data;
}
