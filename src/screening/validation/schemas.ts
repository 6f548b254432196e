/**
 * Screening Validation Schemas
 *
 * Zod schemas for caller inputs, oracle responses and stored records.
 * Extends shared validation schemas for consistency.
 */

import { z } from 'zod';
import {
  IdentifierSchema,
  ISOTimestampSchema,
  LenientNumberSchema,
  NonNegativeNumberSchema,
  PeriodSchema
} from '../../shared/validation/schemas';

// ============================================================================
// Caller Input Schemas
// ============================================================================

export const IngestResumeInputSchema = z.object({
  resumeId: IdentifierSchema,
  text: z.string({ invalid_type_error: 'Resume text must be a string' }),
  ingestedAt: ISOTimestampSchema.optional()
});

export const RequirementImportanceSchema = z.enum(['critical', 'required', 'nice_to_have']);

export const JobRequirementSchema = z.object({
  skillName: z.string().trim().min(1, 'Skill name is required'),
  importance: RequirementImportanceSchema,
  minYears: NonNegativeNumberSchema,
  nameVariants: z.array(z.string())
});

export const JobProfileSchema = z.object({
  jobId: IdentifierSchema,
  title: z.string(),
  requirements: z.array(JobRequirementSchema),
  requiredYears: NonNegativeNumberSchema
});

export const JobDescriptionInputSchema = z.object({
  jobId: IdentifierSchema,
  text: z.string().trim().min(1, 'Job description is required')
});

// ============================================================================
// Oracle Response Schemas
// ============================================================================

/**
 * Missing or null strings become ''
 */
const LenientString = z.preprocess(
  (value) => (value === null || value === undefined ? '' : value),
  z.string()
);

const OptionalPeriod = z.preprocess(
  (value) => (value === '' ? null : value),
  z.string().nullable().optional()
);

/**
 * Top-level arrays are wrapped under the given key
 */
function wrapArray<S extends z.ZodTypeAny>(key: string, schema: S) {
  return z.preprocess(
    (value) => (Array.isArray(value) ? { [key]: value } : value),
    schema
  );
}

export const ResumeProfileResponseSchema = z.object({
  name: LenientString,
  title: LenientString,
  years_exp: LenientNumberSchema,
  skills: z.array(z.string()).default([]),
  certifications: z.array(z.unknown()).default([]),
  projects: z.array(z.unknown()).default([])
});

export const WorkHistoryResponseSchema = wrapArray('jobs', z.object({
  jobs: z.array(z.object({
    company: z.string().trim().min(1, 'Company is required'),
    title: LenientString,
    start_date: OptionalPeriod,
    end_date: OptionalPeriod,
    duration_months: LenientNumberSchema,
    technologies: z.array(z.string()).default([])
  }))
}));

export const SkillJobEvidenceSchema = z.object({
  company: z.string().trim().min(1, 'Company is required'),
  start_date: OptionalPeriod,
  end_date: OptionalPeriod,
  duration_months: LenientNumberSchema,
  evidence: LenientString
});

export const SkillExperienceResponseSchema = z.record(
  z.string(),
  z.object({
    jobs_using_skill: z.array(SkillJobEvidenceSchema).default([])
  })
);

const ImportanceResponseSchema = z
  .enum(['critical', 'required', 'preferred', 'nice_to_have'])
  .optional()
  .catch(undefined);

// Bare skill names are accepted in place of objects
const RequirementItemSchema = z.preprocess(
  (value) => (typeof value === 'string' ? { name: value } : value),
  z.object({
    name: z.string().trim().min(1, 'Skill name is required'),
    importance: ImportanceResponseSchema,
    min_years: LenientNumberSchema,
    variants: z.array(z.string()).default([])
  })
);

export const JobRequirementsResponseSchema = z.object({
  job_title: LenientString,
  core_skills: z.array(RequirementItemSchema).default([]),
  secondary_skills: z.array(RequirementItemSchema).default([]),
  nice_to_have_skills: z.array(RequirementItemSchema).default([]),
  keywords: z.array(z.string()).default([]),
  experience_requirements: z.object({
    total_years: LenientNumberSchema
  }).default({})
});

export const EvidenceStrengthSchema = z.enum(['none', 'weak', 'moderate', 'strong']);

export const EvidenceGradeResponseSchema = z.object({
  has_skill: z.boolean(),
  evidence_strength: z.preprocess(
    (value) => (typeof value === 'string' ? value.toLowerCase() : value),
    EvidenceStrengthSchema
  ),
  years_supported: LenientNumberSchema,
  meets_years: z.boolean().optional(),
  why: LenientString,
  quote: LenientString,
  confidence: LenientNumberSchema
});

export const SkillVariantsResponseSchema = wrapArray('skills', z.object({
  skills: z.array(z.string())
}));

export type ResumeProfileResponse = z.output<typeof ResumeProfileResponseSchema>;
export type WorkHistoryResponse = z.output<typeof WorkHistoryResponseSchema>;
export type RawWorkHistoryItem = WorkHistoryResponse['jobs'][number];
export type SkillJobEvidence = z.output<typeof SkillJobEvidenceSchema>;
export type SkillExperienceResponse = z.output<typeof SkillExperienceResponseSchema>;
export type JobRequirementsResponse = z.output<typeof JobRequirementsResponseSchema>;
export type RequirementItem = z.output<typeof RequirementItemSchema>;
export type EvidenceGradeResponse = z.output<typeof EvidenceGradeResponseSchema>;
export type SkillVariantsResponse = z.output<typeof SkillVariantsResponseSchema>;

// ============================================================================
// Stored Record Schemas
// ============================================================================

export const ResumeProfileSchema = z.object({
  name: z.string(),
  title: z.string(),
  totalYears: NonNegativeNumberSchema,
  skills: z.array(z.string()),
  hasCertifications: z.boolean(),
  hasProjects: z.boolean()
});

export const WorkHistoryEntrySchema = z.object({
  company: z.string(),
  title: z.string(),
  startPeriod: PeriodSchema.nullable(),
  endPeriod: PeriodSchema.nullable(),
  durationMonths: z.number().int().nonnegative(),
  technologies: z.array(z.string())
});

export const ChunkSchema = z.object({
  text: z.string(),
  wordOverlapWithPredecessor: z.number().int().nonnegative(),
  jobContext: WorkHistoryEntrySchema.nullable(),
  sequenceIndex: z.number().int().nonnegative()
});

export const SkillExperienceSchema = z.object({
  skillName: z.string(),
  totalYears: NonNegativeNumberSchema,
  jobBreakdown: z.array(z.object({
    company: z.string(),
    durationMonths: NonNegativeNumberSchema,
    evidenceText: z.string()
  }))
});

export const SkillScoreSchema = z.object({
  skillName: z.string(),
  score: z.number().min(0).max(1),
  yearsFound: NonNegativeNumberSchema,
  yearsRequired: NonNegativeNumberSchema,
  meetsRequirement: z.boolean(),
  matched: z.boolean(),
  evidenceStrength: EvidenceStrengthSchema,
  evidenceAvailable: z.boolean(),
  note: z.string().optional()
});

export const ScoreResultSchema = z.object({
  overallScore: z.number().int().min(0).max(100),
  coreSkillsScore: z.number(),
  experienceScore: z.number(),
  additionalScore: z.number(),
  skillScores: z.array(SkillScoreSchema),
  notes: z.array(z.string())
});
