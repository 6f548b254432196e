/**
 * Oracle Fault Classification
 *
 * Maps provider SDK errors onto the screening error taxonomy.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { ScreeningError, ScreeningErrorFactory } from '../errors/types';

function statusOf(error: unknown): unknown {
  return typeof error === 'object' && error !== null ? Reflect.get(error, 'status') : undefined;
}

/**
 * - ScreeningErrors pass through
 * - rate-limit errors and HTTP 429 become ORACLE_THROTTLED
 * - connection timeouts and aborts become ORACLE_TIMEOUT
 * - anything else is returned as an Error, unchanged
 */
export function classifyOracleError(error: unknown, timeoutMs: number): ScreeningError | Error {
  if (error instanceof ScreeningError) {
    return error;
  }

  if (
    error instanceof Anthropic.RateLimitError ||
    error instanceof OpenAI.RateLimitError ||
    statusOf(error) === 429
  ) {
    return ScreeningErrorFactory.oracleThrottled(error instanceof Error ? error.message : 'HTTP 429');
  }

  if (
    error instanceof Anthropic.APIConnectionTimeoutError ||
    error instanceof OpenAI.APIConnectionTimeoutError
  ) {
    return ScreeningErrorFactory.oracleTimeout(timeoutMs, error.message);
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || /timed? ?out/i.test(error.message)) {
      return ScreeningErrorFactory.oracleTimeout(timeoutMs, error.message);
    }
    return error;
  }

  return new Error(String(error));
}
