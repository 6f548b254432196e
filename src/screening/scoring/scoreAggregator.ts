/**
 * Score Aggregator
 *
 * Folds per-skill scores and resume-level facts into the 0-100 match score.
 */

import type { JobRequirement, ScoreResult, SkillScore } from '../types';
import { ScreeningErrorFactory } from '../errors/types';
import { normalizeKey } from '../parser/textUtils';

/** Weights in percent; they sum to 100 */
export const SCORE_WEIGHTS = {
  coreSkills: 60,
  experience: 25,
  additional: 15
} as const;

/** Experience score lost per missing year */
export const EXPERIENCE_GAP_PENALTY = 10;
export const CERTIFICATIONS_POINTS = 50;
export const PROJECTS_POINTS = 50;

function assertYears(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw ScreeningErrorFactory.invalidArgument(field, 'Must be a non-negative number', value);
  }
}

export function isCoreRequirement(requirement: JobRequirement): boolean {
  return requirement.importance === 'critical' || requirement.importance === 'required';
}

/**
 * 100 when the resume meets the required years, else 100 - gap x 10, floored at 0
 */
export function experienceScore(resumeTotalYears: number, jdRequiredYears: number): number {
  if (resumeTotalYears >= jdRequiredYears) {
    return 100;
  }
  return Math.max(0, 100 - (jdRequiredYears - resumeTotalYears) * EXPERIENCE_GAP_PENALTY);
}

/**
 * Aggregate skill scores into a ScoreResult.
 *
 * Algorithm:
 * 1. Core skills = critical and required requirements. None: 100. Otherwise
 *    the percentage whose skill score is matched; a core requirement with no
 *    skill score counts as unmatched.
 * 2. Experience = experienceScore(resume years, required years)
 * 3. Additional = 50 for certifications + 50 for projects
 * 4. Overall = round-half-up(core x 0.60 + experience x 0.25 + additional x 0.15),
 *    clamped to [0, 100]
 *
 * @throws ScreeningError INVALID_ARGUMENT for negative or non-finite years
 * @throws ScreeningError AGGREGATION_INPUT_ERROR when a skill score names no
 *   requirement, or two skill scores name the same one
 */
export function aggregate(
  skillScores: readonly SkillScore[],
  requirements: readonly JobRequirement[],
  resumeTotalYears: number,
  jdRequiredYears: number,
  hasCertifications: boolean,
  hasProjects: boolean
): ScoreResult {
  assertYears('resumeTotalYears', resumeTotalYears);
  assertYears('jdRequiredYears', jdRequiredYears);

  const requirementKeys = new Set<string>();
  for (const requirement of requirements) {
    const key = normalizeKey(requirement.skillName);
    if (requirementKeys.has(key)) {
      throw ScreeningErrorFactory.aggregationInput(
        `Requirement ${requirement.skillName} appears more than once`,
        { skillName: requirement.skillName }
      );
    }
    requirementKeys.add(key);
  }

  const scoresByKey = new Map<string, SkillScore>();
  for (const skillScore of skillScores) {
    const key = normalizeKey(skillScore.skillName);
    if (!requirementKeys.has(key)) {
      throw ScreeningErrorFactory.aggregationInput(
        `Skill score ${skillScore.skillName} does not match any requirement`,
        { skillName: skillScore.skillName }
      );
    }
    if (scoresByKey.has(key)) {
      throw ScreeningErrorFactory.aggregationInput(
        `Requirement ${skillScore.skillName} has more than one skill score`,
        { skillName: skillScore.skillName }
      );
    }
    scoresByKey.set(key, skillScore);
  }

  const core = requirements.filter(isCoreRequirement);
  const matchedCore = core.filter(r => scoresByKey.get(normalizeKey(r.skillName))?.matched === true).length;
  const coreSkillsScore = core.length === 0 ? 100 : (matchedCore / core.length) * 100;

  const experience = experienceScore(resumeTotalYears, jdRequiredYears);
  const additionalScore = (hasCertifications ? CERTIFICATIONS_POINTS : 0) + (hasProjects ? PROJECTS_POINTS : 0);

  const weighted = (
    coreSkillsScore * SCORE_WEIGHTS.coreSkills +
    experience * SCORE_WEIGHTS.experience +
    additionalScore * SCORE_WEIGHTS.additional
  ) / 100;
  const overallScore = Math.max(0, Math.min(100, Math.floor(weighted + 0.5)));

  const notes = skillScores
    .filter(s => !s.evidenceAvailable)
    .map(s => s.note ?? `Evidence for ${s.skillName} was unavailable`);

  return {
    overallScore,
    coreSkillsScore,
    experienceScore: experience,
    additionalScore,
    skillScores: [...skillScores],
    notes
  };
}
