/**
 * Resume Profile
 *
 * Builds the resume profile from oracle output and picks the skills worth a
 * per-skill experience extraction.
 */

import type { ResumeProfile } from '../types';
import type { ResumeProfileResponse } from '../validation/schemas';
import { ScreeningErrorFactory } from '../errors/types';
import { countOccurrences, uniqueIgnoreCase } from './textUtils';

export function buildResumeProfile(response: ResumeProfileResponse): ResumeProfile {
  const years = response.years_exp;
  return {
    name: response.name.trim(),
    title: response.title.trim(),
    totalYears: years !== undefined && years > 0 ? years : 0,
    skills: uniqueIgnoreCase(response.skills),
    hasCertifications: response.certifications.length > 0,
    hasProjects: response.projects.length > 0
  };
}

/**
 * Top `n` skills by case-insensitive occurrence count in the resume text.
 * Ties keep the oracle's order.
 */
export function selectProminentSkills(
  skills: readonly string[],
  text: string,
  n: number
): string[] {
  if (!Number.isInteger(n) || n < 0) {
    throw ScreeningErrorFactory.invalidArgument('n', 'Must be a non-negative integer', n);
  }

  return uniqueIgnoreCase(skills)
    .map((skill, order) => ({ skill, order, count: countOccurrences(text, skill) }))
    .sort((a, b) => b.count - a.count || a.order - b.order)
    .slice(0, n)
    .map(entry => entry.skill);
}
