/**
 * Skill Scorer
 *
 * Combines the evidence grade for one requirement with the candidate's
 * aggregated tenure in that skill.
 */

import type { EvidenceMatch, EvidenceStrength, JobRequirement, SkillExperience, SkillScore } from '../types';
import { ScreeningErrorFactory } from '../errors/types';

/**
 * Evidence value per strength
 */
export const STRENGTH_VALUES: Readonly<Record<EvidenceStrength, number>> = {
  strong: 1.0,
  moderate: 0.7,
  weak: 0.4,
  none: 0.0
};

export const EVIDENCE_WEIGHT = 0.6;
export const YEARS_WEIGHT = 0.4;
/** Years value lost per missing year */
export const YEARS_SHORTFALL_PENALTY = 0.15;

export interface SkillScoreOptions {
  /** False when the evidence is a stand-in for a failed evaluation */
  evidenceAvailable?: boolean;
  note?: string;
}

/**
 * 1.0 when the requirement is met, otherwise 1 - shortfall x 0.15, floored at 0
 */
export function yearsValue(yearsFound: number, yearsRequired: number): number {
  if (yearsFound >= yearsRequired) {
    return 1.0;
  }
  return Math.max(0, 1 - (yearsRequired - yearsFound) * YEARS_SHORTFALL_PENALTY);
}

function clampScore(score: number): number {
  return Math.max(0, Math.min(1, score));
}

/**
 * Score one skill.
 *
 * Algorithm:
 * 1. evidence = STRENGTH_VALUES[evidence.strength]
 * 2. years = yearsValue(experience.totalYears, requirement.minYears)
 * 3. score = clamp(evidence x 0.6 + years x 0.4, 0, 1)
 *
 * `meetsRequirement` looks at years only; `matched` is the evidence's flag.
 *
 * @throws ScreeningError INVALID_ARGUMENT for negative or non-finite years
 */
export function score(
  evidence: EvidenceMatch,
  experience: SkillExperience,
  requirement: JobRequirement,
  options: SkillScoreOptions = {}
): SkillScore {
  const yearsFound = experience.totalYears;
  const yearsRequired = requirement.minYears;

  if (!Number.isFinite(yearsFound) || yearsFound < 0) {
    throw ScreeningErrorFactory.invalidArgument('totalYears', 'Must be a non-negative number', yearsFound);
  }
  if (!Number.isFinite(yearsRequired) || yearsRequired < 0) {
    throw ScreeningErrorFactory.invalidArgument('minYears', 'Must be a non-negative number', yearsRequired);
  }

  const evidenceValue = STRENGTH_VALUES[evidence.strength];
  const combined = evidenceValue * EVIDENCE_WEIGHT + yearsValue(yearsFound, yearsRequired) * YEARS_WEIGHT;

  const result: SkillScore = {
    skillName: requirement.skillName,
    score: clampScore(combined),
    yearsFound,
    yearsRequired,
    meetsRequirement: yearsFound >= yearsRequired,
    matched: evidence.matched,
    evidenceStrength: evidence.strength,
    evidenceAvailable: options.evidenceAvailable ?? true
  };

  return options.note === undefined ? result : { ...result, note: options.note };
}
