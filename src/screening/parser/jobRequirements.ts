/**
 * Job Requirements
 *
 * Maps the oracle's job-description analysis onto job requirements.
 */

import type { JobProfile, JobRequirement, RequirementImportance } from '../types';
import type { JobRequirementsResponse, RequirementItem } from '../validation/schemas';
import { normalizeKey, uniqueIgnoreCase } from './textUtils';

type Section = 'core' | 'secondary' | 'nice_to_have';

/**
 * Importance for one extracted item.
 *
 * - nice-to-have section, or preferred / nice_to_have: nice_to_have
 * - critical / required: kept
 * - otherwise: core items are critical, secondary items required
 */
export function mapImportance(section: Section, importance: RequirementItem['importance']): RequirementImportance {
  if (section === 'nice_to_have' || importance === 'preferred' || importance === 'nice_to_have') {
    return 'nice_to_have';
  }
  if (importance === 'critical' || importance === 'required') {
    return importance;
  }
  return section === 'core' ? 'critical' : 'required';
}

/**
 * Build a job profile from the oracle response.
 *
 * Requirements are de-duplicated by name case-insensitively: the first
 * occurrence wins and later variants are merged into it. The skill name is
 * always one of its own variants.
 */
export function mapJobRequirements(jobId: string, response: JobRequirementsResponse): JobProfile {
  const sections: Array<[Section, RequirementItem[]]> = [
    ['core', response.core_skills],
    ['secondary', response.secondary_skills],
    ['nice_to_have', response.nice_to_have_skills]
  ];

  const byName = new Map<string, { requirement: JobRequirement; variants: string[] }>();

  for (const [section, items] of sections) {
    for (const item of items) {
      const key = normalizeKey(item.name);
      const existing = byName.get(key);

      if (existing) {
        existing.variants.push(...item.variants);
        continue;
      }

      const minYears = item.min_years;
      byName.set(key, {
        requirement: {
          skillName: item.name.trim(),
          importance: mapImportance(section, item.importance),
          minYears: minYears !== undefined && minYears > 0 ? minYears : 0,
          nameVariants: []
        },
        variants: [item.name, ...item.variants]
      });
    }
  }

  const requiredYears = response.experience_requirements.total_years;

  return {
    jobId,
    title: response.job_title.trim(),
    requirements: [...byName.values()].map(({ requirement, variants }) => ({
      ...requirement,
      nameVariants: uniqueIgnoreCase(variants)
    })),
    requiredYears: requiredYears !== undefined && requiredYears > 0 ? requiredYears : 0
  };
}
