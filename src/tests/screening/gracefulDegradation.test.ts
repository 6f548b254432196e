/**
 * Tests for graceful degradation of failed collaborator calls
 */

import { describe, it, expect } from 'vitest';
import { GracefulDegradation, unavailableNote } from '../../screening/errors/gracefulDegradation';
import { ScreeningErrorCode, ScreeningErrorFactory } from '../../screening/errors/types';
import { ScreeningLogger, LogType } from '../../screening/logging/logger';
import { catchAsyncError, experience, requirement } from './helpers';

describe('unavailableNote', () => {
  it('names the error code, or the error name for other errors', () => {
    expect(unavailableNote('Go', ScreeningErrorFactory.oracleTimeout(1000))).toBe(
      'Evidence for Go was unavailable (ORACLE_TIMEOUT)'
    );
    expect(unavailableNote('Go', new TypeError('x is undefined'))).toBe('Evidence for Go was unavailable (TypeError)');
  });
});

describe('GracefulDegradation', () => {
  it('degrades only external service faults', () => {
    expect(GracefulDegradation.isDegradable(ScreeningErrorFactory.embeddingFailed('down'))).toBe(true);
    expect(GracefulDegradation.isDegradable(ScreeningErrorFactory.oracleParse('evidence_grade', 'bad'))).toBe(true);
    expect(GracefulDegradation.isDegradable(ScreeningErrorFactory.storage('write', 'disk full'))).toBe(false);
    expect(GracefulDegradation.isDegradable(ScreeningErrorFactory.cancelled('Scoring request'))).toBe(false);
    expect(GracefulDegradation.isDegradable(new Error('Request timed out'))).toBe(false);
  });

  it('scores a degraded skill as zero and unmatched but keeps its years', () => {
    const logger = new ScreeningLogger();

    const result = GracefulDegradation.degradeSkill(
      requirement('Python', { minYears: 3 }),
      experience('Python', 4),
      ScreeningErrorFactory.oracleTimeout(1000),
      logger
    );

    expect(result).toEqual({
      skillName: 'Python',
      score: 0,
      yearsFound: 4,
      yearsRequired: 3,
      meetsRequirement: true,
      matched: false,
      evidenceStrength: 'none',
      evidenceAvailable: false,
      note: 'Evidence for Python was unavailable (ORACLE_TIMEOUT)'
    });

    const [entry] = logger.getLogsByType(LogType.DEGRADATION);
    expect(entry.message).toBe('Evidence for Python unavailable: Oracle call timed out');
    expect(entry.context).toMatchObject({ code: ScreeningErrorCode.ORACLE_TIMEOUT });
  });

  it('returns the fallback for a degradable failure', async () => {
    const logger = new ScreeningLogger();

    const result = await GracefulDegradation.withOracleFallback(
      () => Promise.reject(ScreeningErrorFactory.oracleThrottled('429')),
      () => 'fallback',
      { operation: 'work_history', logger }
    );

    expect(result).toBe('fallback');
    expect(logger.getLogsByType(LogType.DEGRADATION)).toHaveLength(1);
  });

  it('rethrows everything else', async () => {
    const cancelled = ScreeningErrorFactory.cancelled('Scoring request');

    const error = await catchAsyncError(GracefulDegradation.withOracleFallback(
      () => Promise.reject(cancelled),
      () => 'fallback',
      { operation: 'work_history' }
    ));

    expect(error).toBe(cancelled);
  });

  it('turns thrown non-errors into errors', async () => {
    const error = await catchAsyncError(GracefulDegradation.withOracleFallback(
      () => Promise.reject('boom'),
      () => 'fallback',
      { operation: 'work_history' }
    ));

    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ message: 'boom' });
  });
});
