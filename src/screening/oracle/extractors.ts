/**
 * Oracle Extractors
 *
 * Typed wrappers over the gateway, one per prompt kind. Each maps the
 * validated response onto the pipeline's data model.
 */

import type {
  JobProfile,
  JobRequirement,
  ResumeProfile,
  SkillJobMatch,
  WorkHistoryEntry
} from '../types';
import {
  EvidenceGradeResponseSchema,
  JobRequirementsResponseSchema,
  ResumeProfileResponseSchema,
  SkillExperienceResponseSchema,
  SkillVariantsResponseSchema,
  WorkHistoryResponseSchema
} from '../validation/schemas';
import type { SkillExperienceResponse, SkillJobEvidence } from '../validation/schemas';
import type { EvidenceGrade, EvidenceGrader, GradeSubject } from '../retrieval/evidenceRetriever';
import type { SkillVariantMatcher } from '../scoring/experienceLookup';
import type { ScreeningLogger } from '../logging/logger';
import { GracefulDegradation } from '../errors/gracefulDegradation';
import { buildResumeProfile } from '../parser/profile';
import { mapJobRequirements } from '../parser/jobRequirements';
import { canonicalPeriod, normalizeWorkHistory, resolveDurationMonths } from '../parser/workHistory';
import { normalizeKey, splitWords } from '../parser/textUtils';
import { mapWithConcurrency, resolveParallelism } from '../../shared/concurrency/workerPool';
import type { OracleGateway } from './gateway';
import {
  MAX_QUOTE_WORDS,
  MAX_VARIANT_CANDIDATES,
  buildEvidenceGradePrompt,
  buildJobRequirementsPrompt,
  buildResumeProfilePrompt,
  buildSkillExperiencePrompt,
  buildSkillVariantsPrompt,
  buildWorkHistoryPrompt
} from './prompts';

/**
 * Candidate profile. Failure is fatal to ingestion.
 */
export async function extractResumeProfile(
  gateway: OracleGateway,
  resumeText: string,
  maxOutputTokens: number
): Promise<ResumeProfile> {
  const response = await gateway.request({
    kind: 'resume_profile',
    prompt: buildResumeProfilePrompt(resumeText),
    schema: ResumeProfileResponseSchema,
    maxOutputTokens
  });
  return buildResumeProfile(response);
}

/**
 * Work history; an oracle fault degrades to no jobs
 */
export async function extractWorkHistory(
  gateway: OracleGateway,
  resumeText: string,
  ingestedAt: string,
  maxOutputTokens: number,
  logger?: ScreeningLogger
): Promise<WorkHistoryEntry[]> {
  const response = await GracefulDegradation.withOracleFallback(
    () => gateway.request({
      kind: 'work_history',
      prompt: buildWorkHistoryPrompt(resumeText),
      schema: WorkHistoryResponseSchema,
      maxOutputTokens,
      fallback: () => ({ jobs: [] })
    }),
    () => ({ jobs: [] }),
    { operation: 'work_history', logger }
  );
  return normalizeWorkHistory(response.jobs, ingestedAt);
}

export interface SkillExperienceExtractionOptions {
  batchSize: number;
  parallelism: number;
  maxParallelism: number;
  maxOutputTokens: number;
  ingestedAt: string;
  logger?: ScreeningLogger;
}

function toJobMatch(job: SkillJobEvidence, ingestedAt: string): SkillJobMatch {
  const reported = job.duration_months;
  return {
    company: job.company.trim(),
    durationMonths: reported !== undefined && reported >= 0
      ? Math.round(reported)
      : resolveDurationMonths(canonicalPeriod(job.start_date), canonicalPeriod(job.end_date), ingestedAt),
    evidence: job.evidence.trim()
  };
}

/**
 * Pick out the requested skills from one batch response. Keys are matched
 * case-insensitively; keys that were not asked for are ignored.
 */
export function readSkillBatch(
  skills: readonly string[],
  response: SkillExperienceResponse,
  ingestedAt: string
): Map<string, SkillJobMatch[]> {
  const byKey = new Map<string, SkillJobEvidence[]>();
  for (const [key, value] of Object.entries(response)) {
    byKey.set(normalizeKey(key), value.jobs_using_skill);
  }

  const result = new Map<string, SkillJobMatch[]>();
  for (const skill of skills) {
    const jobs = byKey.get(normalizeKey(skill)) ?? [];
    result.set(skill, jobs.map(job => toJobMatch(job, ingestedAt)));
  }
  return result;
}

/**
 * Per-skill job matches for the given skills.
 *
 * Skills are asked for in batches, a bounded number at a time. A batch that
 * fails leaves its skills with no matches. Every requested skill appears in
 * the result, in the order given.
 */
export async function extractSkillExperience(
  gateway: OracleGateway,
  skills: readonly string[],
  workHistory: readonly WorkHistoryEntry[],
  resumeText: string,
  options: SkillExperienceExtractionOptions
): Promise<Map<string, SkillJobMatch[]>> {
  const batches: string[][] = [];
  for (let i = 0; i < skills.length; i += options.batchSize) {
    batches.push(skills.slice(i, i + options.batchSize));
  }

  const limit = resolveParallelism(batches.length, options.parallelism, options.maxParallelism);

  const results = await mapWithConcurrency(batches, limit, batch => {
    const empty = (): SkillExperienceResponse => ({});
    return GracefulDegradation.withOracleFallback(
      () => gateway.request({
        kind: 'skill_experience',
        prompt: buildSkillExperiencePrompt(batch, workHistory, resumeText),
        schema: SkillExperienceResponseSchema,
        maxOutputTokens: options.maxOutputTokens,
        fallback: empty
      }),
      empty,
      { operation: 'skill_experience', logger: options.logger }
    ).then(response => readSkillBatch(batch, response, options.ingestedAt));
  });

  const merged = new Map<string, SkillJobMatch[]>();
  for (const batchResult of results) {
    for (const [skill, matches] of batchResult) {
      merged.set(skill, [...(merged.get(skill) ?? []), ...matches]);
    }
  }
  return merged;
}

/**
 * Job profile from a job description. Failure is fatal.
 */
export async function extractJobRequirements(
  gateway: OracleGateway,
  jobId: string,
  jobDescription: string,
  maxOutputTokens: number
): Promise<JobProfile> {
  const response = await gateway.request({
    kind: 'job_requirements',
    prompt: buildJobRequirementsPrompt(jobDescription),
    schema: JobRequirementsResponseSchema,
    maxOutputTokens
  });
  return mapJobRequirements(jobId, response);
}

/**
 * First `maxWords` words of the quote
 */
export function limitQuote(quote: string, maxWords: number = MAX_QUOTE_WORDS): string {
  const words = splitWords(quote);
  return words.length <= maxWords ? quote.trim() : words.slice(0, maxWords).join(' ');
}

/**
 * Grades chunks through the oracle. Faults propagate so the caller can
 * degrade the one skill.
 */
export class OracleEvidenceGrader implements EvidenceGrader {
  private readonly gateway: OracleGateway;
  private readonly maxOutputTokens: number;

  constructor(gateway: OracleGateway, maxOutputTokens: number) {
    this.gateway = gateway;
    this.maxOutputTokens = maxOutputTokens;
  }

  async grade(subject: GradeSubject, chunkText: string): Promise<EvidenceGrade> {
    const response = await this.gateway.request({
      kind: 'evidence_grade',
      prompt: buildEvidenceGradePrompt(subject.skillName, subject.minYears, chunkText),
      schema: EvidenceGradeResponseSchema,
      maxOutputTokens: this.maxOutputTokens
    });

    const confidence = response.confidence ?? 0;
    return {
      hasSkill: response.has_skill,
      strength: response.has_skill ? response.evidence_strength : 'none',
      quote: limitQuote(response.quote),
      reasoning: response.why.trim(),
      confidence: Math.max(0, Math.min(1, confidence)),
      yearsSupported: response.years_supported === undefined ? undefined : Math.max(0, response.years_supported),
      meetsYears: response.meets_years
    };
  }
}

/**
 * Asks the oracle which stored skills satisfy a requirement. Any oracle fault
 * gives no matches.
 */
export class OracleSkillVariantMatcher implements SkillVariantMatcher {
  private readonly gateway: OracleGateway;
  private readonly maxOutputTokens: number;
  private readonly logger?: ScreeningLogger;

  constructor(gateway: OracleGateway, maxOutputTokens: number, logger?: ScreeningLogger) {
    this.gateway = gateway;
    this.maxOutputTokens = maxOutputTokens;
    this.logger = logger;
  }

  async matchVariants(requirement: JobRequirement, availableSkills: readonly string[]): Promise<string[]> {
    const candidates = availableSkills.slice(0, MAX_VARIANT_CANDIDATES);
    if (candidates.length === 0) {
      return [];
    }

    const response = await GracefulDegradation.withOracleFallback(
      () => this.gateway.request({
        kind: 'skill_variants',
        prompt: buildSkillVariantsPrompt(requirement, candidates),
        schema: SkillVariantsResponseSchema,
        maxOutputTokens: this.maxOutputTokens,
        fallback: () => ({ skills: [] })
      }),
      () => ({ skills: [] }),
      { operation: 'skill_variants', logger: this.logger }
    );

    const allowed = new Set(candidates.map(normalizeKey));
    return response.skills.filter(name => allowed.has(normalizeKey(name)));
  }
}
