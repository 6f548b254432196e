/**
 * Experience Aggregator
 *
 * Turns the oracle's per-skill job matches into a tenure figure.
 */

import type { JobBreakdownEntry, SkillExperience, SkillJobMatch } from '../types';
import { ScreeningErrorFactory } from '../errors/types';
import { normalizeKey } from './textUtils';

/**
 * Collapse matches that name the same company (trimmed, case-insensitive).
 *
 * The longer duration survives; on a tie the first seen wins. Output keeps
 * first-seen order. Durations are never summed across duplicates, so applying
 * this twice gives the same list.
 */
export function dedupeJobMatches(matches: readonly SkillJobMatch[]): SkillJobMatch[] {
  const byCompany = new Map<string, SkillJobMatch>();

  for (const match of matches) {
    const key = normalizeKey(match.company);
    const existing = byCompany.get(key);
    if (!existing || match.durationMonths > existing.durationMonths) {
      byCompany.set(key, match);
    }
  }

  return [...byCompany.values()];
}

/**
 * Aggregate a skill's job matches into total years.
 *
 * Algorithm:
 * 1. Reject an empty skill name and negative or non-finite durations
 * 2. Deduplicate by company
 * 3. totalYears = sum(durationMonths) / 12, unrounded
 *
 * An empty match list is a valid outcome: 0 years, empty breakdown.
 */
export function aggregate(skillName: string, matches: readonly SkillJobMatch[]): SkillExperience {
  if (typeof skillName !== 'string' || skillName.trim().length === 0) {
    throw ScreeningErrorFactory.invalidArgument('skillName', 'Skill name cannot be empty', skillName);
  }
  if (!Array.isArray(matches)) {
    throw ScreeningErrorFactory.invalidArgument('matches', 'Job matches must be an array', typeof matches);
  }

  for (const match of matches) {
    if (!Number.isFinite(match.durationMonths) || match.durationMonths < 0) {
      throw ScreeningErrorFactory.invalidArgument(
        'durationMonths',
        `Duration for ${match.company} must be a non-negative number`,
        match.durationMonths
      );
    }
  }

  const jobBreakdown: JobBreakdownEntry[] = dedupeJobMatches(matches).map(match => ({
    company: match.company,
    durationMonths: match.durationMonths,
    evidenceText: match.evidence
  }));

  const totalMonths = jobBreakdown.reduce((sum, job) => sum + job.durationMonths, 0);

  return {
    skillName,
    totalYears: totalMonths / 12,
    jobBreakdown
  };
}

/**
 * Aggregate every skill in the map independently
 */
export function aggregateAll(
  matchesBySkill: ReadonlyMap<string, readonly SkillJobMatch[]>
): Record<string, SkillExperience> {
  const result: Record<string, SkillExperience> = {};
  for (const [skillName, matches] of matchesBySkill) {
    result[skillName] = aggregate(skillName, matches);
  }
  return result;
}
