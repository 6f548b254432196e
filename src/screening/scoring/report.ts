/**
 * Score Report
 *
 * Display form of a ScoreResult. Rounding happens here and nowhere else.
 */

import type { ScoreReport, ScoreResult } from '../types';

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Years to one decimal, sub-scores to two, skill scores to four
 */
export function toScoreReport(result: ScoreResult): ScoreReport {
  return {
    overallScore: result.overallScore,
    breakdown: {
      coreSkillsScore: roundTo(result.coreSkillsScore, 2),
      experienceScore: roundTo(result.experienceScore, 2),
      additionalScore: roundTo(result.additionalScore, 2)
    },
    skills: result.skillScores.map(skill => ({
      skillName: skill.skillName,
      score: roundTo(skill.score, 4),
      yearsFound: roundTo(skill.yearsFound, 1),
      yearsRequired: roundTo(skill.yearsRequired, 1),
      meetsRequirement: skill.meetsRequirement,
      matched: skill.matched,
      evidenceStrength: skill.evidenceStrength,
      evidenceAvailable: skill.evidenceAvailable,
      ...(skill.note === undefined ? {} : { note: skill.note })
    })),
    notes: [...result.notes]
  };
}
