/**
 * Screening Core Type Definitions
 *
 * Data models for ingestion (documents, work history, chunks, skill
 * experience), job requirements, evidence retrieval and scoring.
 */

// ============================================================================
// Resume Types
// ============================================================================

/**
 * Oracle-extracted summary of a resume
 */
export interface ResumeProfile {
  name: string;
  title: string;
  totalYears: number;
  /** De-duplicated, in the order the oracle reported them */
  skills: string[];
  hasCertifications: boolean;
  hasProjects: boolean;
}

/**
 * Normalized resume text; immutable once ingested
 */
export interface ResumeDocument {
  readonly id: string;
  readonly text: string;
  /** ISO-8601 timestamp */
  readonly ingestedAt: string;
  readonly profile?: ResumeProfile;
}

/**
 * A job held by the candidate.
 *
 * Periods are 'YYYY-MM' or 'YYYY'. A null end period means the job is current.
 */
export interface WorkHistoryEntry {
  readonly company: string;
  readonly title: string;
  readonly startPeriod: string | null;
  readonly endPeriod: string | null;
  readonly durationMonths: number;
  readonly technologies: readonly string[];
}

/**
 * Fixed-size overlapping window of resume text
 */
export interface Chunk {
  readonly text: string;
  /** Words shared with the previous chunk; 0 for the first one */
  readonly wordOverlapWithPredecessor: number;
  readonly jobContext: WorkHistoryEntry | null;
  readonly sequenceIndex: number;
}

/**
 * One job in which the oracle saw a skill being used
 */
export interface SkillJobMatch {
  company: string;
  durationMonths: number;
  evidence: string;
}

export interface JobBreakdownEntry {
  readonly company: string;
  readonly durationMonths: number;
  readonly evidenceText: string;
}

/**
 * Pre-aggregated tenure for one skill
 */
export interface SkillExperience {
  readonly skillName: string;
  /** Full precision; rounded only by the presentation layer */
  readonly totalYears: number;
  readonly jobBreakdown: readonly JobBreakdownEntry[];
}

/**
 * Skill name → experience, for one resume
 */
export type SkillExperienceMap = Readonly<Record<string, SkillExperience>>;

// ============================================================================
// Job Types
// ============================================================================

export type RequirementImportance = 'critical' | 'required' | 'nice_to_have';

export interface JobRequirement {
  readonly skillName: string;
  readonly importance: RequirementImportance;
  readonly minYears: number;
  readonly nameVariants: readonly string[];
}

/**
 * Structured job description
 */
export interface JobProfile {
  readonly jobId: string;
  readonly title: string;
  readonly requirements: readonly JobRequirement[];
  /** Total years of experience the job asks for */
  readonly requiredYears: number;
}

// ============================================================================
// Retrieval Types
// ============================================================================

export type EvidenceStrength = 'none' | 'weak' | 'moderate' | 'strong';

/**
 * Chunk as stored in the vector index
 */
export interface IndexedChunk {
  readonly id: string;
  readonly resumeId: string;
  readonly sequenceIndex: number;
  readonly text: string;
}

/**
 * Search hit before and after the keyword boost
 */
export interface RankedCandidate {
  readonly chunk: IndexedChunk;
  /** Raw similarity reported by the vector index */
  readonly similarity: number;
  /** Similarity after the keyword boost */
  readonly boostedScore: number;
  /** Position in the vector index's result list */
  readonly originalRank: number;
  readonly keywordHit: boolean;
}

/**
 * Best evidence found for one skill within one scoring request
 */
export interface EvidenceMatch {
  readonly chunk: IndexedChunk | null;
  readonly relevanceScore: number;
  readonly similarity: number;
  readonly matched: boolean;
  readonly strength: EvidenceStrength;
  readonly quote: string;
  readonly reasoning: string;
  /** Oracle's reading of the chunk; audit only, scoring uses looked-up years */
  readonly yearsSupported?: number;
  readonly meetsYears?: boolean;
}

// ============================================================================
// Scoring Types
// ============================================================================

export interface SkillScore {
  readonly skillName: string;
  /** In [0, 1] */
  readonly score: number;
  readonly yearsFound: number;
  readonly yearsRequired: number;
  readonly meetsRequirement: boolean;
  /** Evidence supported the skill; used for the core-skills score */
  readonly matched: boolean;
  readonly evidenceStrength: EvidenceStrength;
  /** False when the evaluation degraded because a collaborator failed */
  readonly evidenceAvailable: boolean;
  readonly note?: string;
}

export interface ScoreResult {
  /** Integer in [0, 100] */
  readonly overallScore: number;
  readonly coreSkillsScore: number;
  readonly experienceScore: number;
  readonly additionalScore: number;
  readonly skillScores: readonly SkillScore[];
  /** One line per skill whose evidence was unavailable */
  readonly notes: readonly string[];
}

/**
 * Rounded, display-ready form of a ScoreResult
 */
export interface ScoreReport {
  overallScore: number;
  breakdown: {
    coreSkillsScore: number;
    experienceScore: number;
    additionalScore: number;
  };
  skills: Array<{
    skillName: string;
    score: number;
    yearsFound: number;
    yearsRequired: number;
    meetsRequirement: boolean;
    matched: boolean;
    evidenceStrength: EvidenceStrength;
    evidenceAvailable: boolean;
    note?: string;
  }>;
  notes: string[];
}
