/**
 * Tests for mapping provider errors onto screening error codes
 */

import { describe, it, expect } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { classifyOracleError } from '../../screening/oracle/faults';
import { ScreeningErrorCode, ScreeningErrorFactory } from '../../screening/errors/types';

describe('classifyOracleError', () => {
  it('passes screening errors through', () => {
    const original = ScreeningErrorFactory.oracleParse('work_history', 'bad json');
    expect(classifyOracleError(original, 1000)).toBe(original);
  });

  it('maps HTTP 429 to ORACLE_THROTTLED', () => {
    const error = Object.assign(new Error('Too many requests'), { status: 429 });
    expect(classifyOracleError(error, 1000)).toMatchObject({ code: ScreeningErrorCode.ORACLE_THROTTLED });
  });

  it('maps SDK connection timeouts to ORACLE_TIMEOUT', () => {
    expect(classifyOracleError(new Anthropic.APIConnectionTimeoutError(), 5000)).toMatchObject({
      code: ScreeningErrorCode.ORACLE_TIMEOUT,
      context: { timeoutMs: 5000 }
    });
    expect(classifyOracleError(new OpenAI.APIConnectionTimeoutError(), 5000)).toMatchObject({
      code: ScreeningErrorCode.ORACLE_TIMEOUT
    });
  });

  it('maps aborts and timeout messages to ORACLE_TIMEOUT', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';

    expect(classifyOracleError(abort, 1000)).toMatchObject({ code: ScreeningErrorCode.ORACLE_TIMEOUT });
    expect(classifyOracleError(new Error('Request timed out'), 1000)).toMatchObject({
      code: ScreeningErrorCode.ORACLE_TIMEOUT
    });
  });

  it('leaves other errors unchanged', () => {
    const error = new TypeError('fetch failed');
    expect(classifyOracleError(error, 1000)).toBe(error);
  });

  it('wraps thrown non-errors', () => {
    const result = classifyOracleError('bad gateway', 1000);
    expect(result).toBeInstanceOf(Error);
    expect(result.message).toBe('bad gateway');
  });
});
