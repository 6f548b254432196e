/**
 * Tests for resolving a requirement to stored skill experience
 */

import { describe, it, expect } from 'vitest';
import {
  findExperienceKeys,
  lookupSkillExperience,
  resolveSkillExperience,
  type SkillVariantMatcher
} from '../../screening/scoring/experienceLookup';
import type { JobRequirement, SkillExperienceMap } from '../../screening/types';
import { experience, requirement } from './helpers';

function buildMap(): SkillExperienceMap {
  return {
    Python: experience('Python', 3),
    postgres: {
      skillName: 'postgres',
      totalYears: 2,
      jobBreakdown: [{ company: 'Acme', durationMonths: 24, evidenceText: 'Tuned postgres queries' }]
    },
    PostgreSQL: {
      skillName: 'PostgreSQL',
      totalYears: 1,
      jobBreakdown: [{ company: 'Globex', durationMonths: 12, evidenceText: 'Ran PostgreSQL replicas' }]
    },
    MySQL: {
      skillName: 'MySQL',
      totalYears: 0.5,
      jobBreakdown: [{ company: 'Initech', durationMonths: 6, evidenceText: 'Maintained MySQL' }]
    }
  };
}

class StubMatcher implements SkillVariantMatcher {
  readonly calls: Array<{ requirement: JobRequirement; availableSkills: readonly string[] }> = [];
  private readonly answer: string[];

  constructor(answer: string[]) {
    this.answer = answer;
  }

  async matchVariants(req: JobRequirement, availableSkills: readonly string[]): Promise<string[]> {
    this.calls.push({ requirement: req, availableSkills });
    return this.answer;
  }
}

describe('findExperienceKeys', () => {
  it('prefers the exact key', () => {
    expect(findExperienceKeys(buildMap(), requirement('Python'))).toEqual(['Python']);
  });

  it('falls back to a case-insensitive key', () => {
    expect(findExperienceKeys(buildMap(), requirement('python'))).toEqual(['Python']);
  });

  it('collects every key named by a variant', () => {
    const req = requirement('SQL', { nameVariants: ['SQL', 'PostgreSQL', 'Postgres'] });
    expect(findExperienceKeys(buildMap(), req)).toEqual(['postgres', 'PostgreSQL']);
  });

  it('returns nothing on a miss', () => {
    expect(findExperienceKeys(buildMap(), requirement('Rust'))).toEqual([]);
  });
});

describe('lookupSkillExperience', () => {
  it('returns the stored entry for a direct hit', () => {
    const map = buildMap();
    expect(lookupSkillExperience(map, requirement('Python'))).toBe(map.Python);
  });

  it('merges variant entries under the requirement name', () => {
    const req = requirement('SQL', { nameVariants: ['PostgreSQL', 'Postgres'] });
    const result = lookupSkillExperience(buildMap(), req);

    expect(result.skillName).toBe('SQL');
    expect(result.totalYears).toBe(3);
    expect(result.jobBreakdown.map(job => job.company)).toEqual(['Acme', 'Globex']);
  });

  it('does not count one company twice across variants', () => {
    const map: SkillExperienceMap = {
      k8s: {
        skillName: 'k8s',
        totalYears: 1,
        jobBreakdown: [{ company: 'Acme', durationMonths: 12, evidenceText: 'k8s' }]
      },
      Kubernetes: {
        skillName: 'Kubernetes',
        totalYears: 2,
        jobBreakdown: [{ company: 'acme ', durationMonths: 24, evidenceText: 'Kubernetes' }]
      }
    };
    const result = lookupSkillExperience(map, requirement('Container orchestration', { nameVariants: ['k8s', 'Kubernetes'] }));

    expect(result.totalYears).toBe(2);
    expect(result.jobBreakdown).toHaveLength(1);
  });

  it('gives zero years on a miss', () => {
    expect(lookupSkillExperience(buildMap(), requirement('Rust'))).toEqual({
      skillName: 'Rust',
      totalYears: 0,
      jobBreakdown: []
    });
  });
});

describe('resolveSkillExperience', () => {
  it('does not consult the matcher on a hit', async () => {
    const matcher = new StubMatcher(['MySQL']);
    const result = await resolveSkillExperience(buildMap(), requirement('Python'), matcher);

    expect(result.totalYears).toBe(3);
    expect(matcher.calls).toHaveLength(0);
  });

  it('uses the matcher on a miss and ignores unknown names', async () => {
    const map = buildMap();
    const matcher = new StubMatcher(['MySQL', 'Oracle', 'mysql']);
    const result = await resolveSkillExperience(map, requirement('Databases'), matcher);

    expect(matcher.calls).toHaveLength(1);
    expect(matcher.calls[0].availableSkills).toEqual(['Python', 'postgres', 'PostgreSQL', 'MySQL']);
    expect(result.skillName).toBe('Databases');
    expect(result.totalYears).toBe(0.5);
    expect(result.jobBreakdown).toEqual([
      { company: 'Initech', durationMonths: 6, evidenceText: 'Maintained MySQL' }
    ]);
  });

  it('skips the matcher when nothing is stored', async () => {
    const matcher = new StubMatcher(['MySQL']);
    const result = await resolveSkillExperience({}, requirement('Databases'), matcher);

    expect(result.totalYears).toBe(0);
    expect(matcher.calls).toHaveLength(0);
  });

  it('gives zero years without a matcher', async () => {
    const result = await resolveSkillExperience(buildMap(), requirement('Databases'));
    expect(result.totalYears).toBe(0);
  });
});
