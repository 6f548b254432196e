/**
 * Skill Experience Lookup
 *
 * Resolves a job requirement to the candidate's stored experience.
 */

import type { JobRequirement, SkillExperience, SkillExperienceMap, SkillJobMatch } from '../types';
import { aggregate } from '../parser/experienceAggregator';
import { normalizeKey } from '../parser/textUtils';

/**
 * Asks the oracle which stored skills count toward a requirement
 */
export interface SkillVariantMatcher {
  matchVariants(requirement: JobRequirement, availableSkills: readonly string[]): Promise<string[]>;
}

/**
 * Stored skill names that count toward the requirement.
 *
 * Order of precedence:
 * 1. exact key
 * 2. case-insensitive key
 * 3. every key equal (case-insensitively) to one of the requirement's variants
 */
export function findExperienceKeys(map: SkillExperienceMap, requirement: JobRequirement): string[] {
  const keys = Object.keys(map);

  if (Object.prototype.hasOwnProperty.call(map, requirement.skillName)) {
    return [requirement.skillName];
  }

  const target = normalizeKey(requirement.skillName);
  const caseInsensitive = keys.find(key => normalizeKey(key) === target);
  if (caseInsensitive !== undefined) {
    return [caseInsensitive];
  }

  const variants = new Set(requirement.nameVariants.map(normalizeKey));
  return keys.filter(key => variants.has(normalizeKey(key)));
}

/**
 * Merge the job breakdowns of several stored skills and re-aggregate them
 * under the requirement's name. Jobs are deduplicated by company.
 */
export function mergeExperience(
  skillName: string,
  map: SkillExperienceMap,
  keys: readonly string[]
): SkillExperience {
  if (keys.length === 1 && normalizeKey(keys[0]) === normalizeKey(skillName)) {
    return map[keys[0]];
  }

  const matches: SkillJobMatch[] = [];
  for (const key of keys) {
    const experience = map[key];
    if (!experience) continue;
    for (const job of experience.jobBreakdown) {
      matches.push({
        company: job.company,
        durationMonths: job.durationMonths,
        evidence: job.evidenceText
      });
    }
  }

  return aggregate(skillName, matches);
}

/**
 * Experience for a requirement, or an empty experience when nothing matches
 */
export function lookupSkillExperience(map: SkillExperienceMap, requirement: JobRequirement): SkillExperience {
  return mergeExperience(requirement.skillName, map, findExperienceKeys(map, requirement));
}

/**
 * Like lookupSkillExperience, but a miss asks the matcher which stored skills
 * count toward the requirement. Names the matcher invents are ignored.
 */
export async function resolveSkillExperience(
  map: SkillExperienceMap,
  requirement: JobRequirement,
  matcher?: SkillVariantMatcher
): Promise<SkillExperience> {
  const keys = findExperienceKeys(map, requirement);
  const available = Object.keys(map);

  if (keys.length > 0 || !matcher || available.length === 0) {
    return mergeExperience(requirement.skillName, map, keys);
  }

  const suggested = await matcher.matchVariants(requirement, available);
  const known = new Map(available.map(key => [normalizeKey(key), key]));
  const matchedKeys: string[] = [];
  for (const name of suggested) {
    const key = known.get(normalizeKey(name));
    if (key !== undefined && !matchedKeys.includes(key)) {
      matchedKeys.push(key);
    }
  }

  return mergeExperience(requirement.skillName, map, matchedKeys);
}
