/**
 * Tests for the Score Aggregator
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { aggregate, experienceScore } from '../../screening/scoring/scoreAggregator';
import { ScreeningErrorCode } from '../../screening/errors/types';
import type { JobRequirement, SkillScore } from '../../screening/types';
import { catchError, requirement } from './helpers';

function skill(skillName: string, matched: boolean, overrides: Partial<SkillScore> = {}): SkillScore {
  return {
    skillName,
    score: matched ? 1 : 0,
    yearsFound: 0,
    yearsRequired: 0,
    meetsRequirement: true,
    matched,
    evidenceStrength: matched ? 'strong' : 'none',
    evidenceAvailable: true,
    ...overrides
  };
}

describe('experienceScore', () => {
  it('loses 10 points per missing year, floored at 0', () => {
    expect(experienceScore(8, 5)).toBe(100);
    expect(experienceScore(4, 6)).toBe(80);
    expect(experienceScore(0, 15)).toBe(0);
  });
});

describe('aggregate', () => {
  const requirements: JobRequirement[] = [
    requirement('Python', { importance: 'critical' }),
    requirement('SQL', { importance: 'required' }),
    requirement('Go', { importance: 'nice_to_have' })
  ];

  it('weights core skills, experience and extras', () => {
    const result = aggregate(
      [skill('Python', true), skill('SQL', false), skill('Go', true)],
      requirements,
      4,
      6,
      true,
      false
    );

    expect(result.coreSkillsScore).toBe(50);
    expect(result.experienceScore).toBe(80);
    expect(result.additionalScore).toBe(50);
    // 50 * 0.60 + 80 * 0.25 + 50 * 0.15 = 57.5, rounded half up
    expect(result.overallScore).toBe(58);
    expect(result.notes).toEqual([]);
  });

  it('scores core skills at 100 when the job has none', () => {
    const result = aggregate([skill('Go', false)], [requirement('Go', { importance: 'nice_to_have' })], 10, 5, false, false);

    expect(result.coreSkillsScore).toBe(100);
    expect(result.overallScore).toBe(85);
  });

  it('counts a core requirement without a score as unmatched', () => {
    const result = aggregate([skill('Python', true)], requirements.slice(0, 2), 6, 6, true, true);

    expect(result.coreSkillsScore).toBe(50);
    expect(result.overallScore).toBe(70);
  });

  it('matches skill scores to requirements case-insensitively', () => {
    const result = aggregate([skill('python', true), skill('sql', true)], requirements, 6, 6, false, false);
    expect(result.coreSkillsScore).toBe(100);
  });

  it('lists a note for every skill without evidence', () => {
    const result = aggregate(
      [
        skill('Python', false, { evidenceAvailable: false, note: 'Evidence for Python was unavailable (ORACLE_TIMEOUT)' }),
        skill('SQL', false, { evidenceAvailable: false })
      ],
      requirements,
      6,
      6,
      false,
      false
    );

    expect(result.notes).toEqual([
      'Evidence for Python was unavailable (ORACLE_TIMEOUT)',
      'Evidence for SQL was unavailable'
    ]);
  });

  it('copies the skill scores', () => {
    const scores = [skill('Python', true)];
    const result = aggregate(scores, requirements, 1, 1, false, false);

    expect(result.skillScores).toEqual(scores);
    expect(result.skillScores).not.toBe(scores);
  });

  it('rejects a score for an unknown requirement', () => {
    expect(catchError(() => aggregate([skill('Rust', true)], requirements, 1, 1, false, false))).toMatchObject({
      code: ScreeningErrorCode.AGGREGATION_INPUT_ERROR
    });
  });

  it('rejects two scores for one requirement', () => {
    const scores = [skill('Python', true), skill('PYTHON', false)];
    expect(catchError(() => aggregate(scores, requirements, 1, 1, false, false))).toMatchObject({
      code: ScreeningErrorCode.AGGREGATION_INPUT_ERROR
    });
  });

  it('rejects a requirement listed twice', () => {
    const duplicated = [...requirements, requirement('sql', { importance: 'nice_to_have' })];
    expect(catchError(() => aggregate([], duplicated, 1, 1, false, false))).toMatchObject({
      code: ScreeningErrorCode.AGGREGATION_INPUT_ERROR
    });
  });

  it('rejects negative years', () => {
    expect(catchError(() => aggregate([], requirements, -1, 1, false, false))).toMatchObject({
      code: ScreeningErrorCode.INVALID_ARGUMENT
    });
  });

  it('always produces an integer overall score in [0, 100]', () => {
    fc.assert(
      fc.property(
        fc.array(fc.boolean(), { minLength: 3, maxLength: 3 }),
        fc.double({ min: 0, max: 40, noNaN: true }),
        fc.double({ min: 0, max: 40, noNaN: true }),
        fc.boolean(),
        fc.boolean(),
        (matched, resumeYears, jdYears, certs, projects) => {
          const scores = requirements.map((r, i) => skill(r.skillName, matched[i]));
          const result = aggregate(scores, requirements, resumeYears, jdYears, certs, projects);

          expect(Number.isInteger(result.overallScore)).toBe(true);
          expect(result.overallScore).toBeGreaterThanOrEqual(0);
          expect(result.overallScore).toBeLessThanOrEqual(100);
        }
      )
    );
  });
});
