/**
 * Evidence Retriever
 *
 * Finds the resume chunk that best demonstrates a skill: vector search
 * restricted to one resume, a keyword boost for chunks that name the skill
 * outright, then an oracle grade of the winning chunk.
 */

import type { EvidenceMatch, EvidenceStrength, IndexedChunk, RankedCandidate } from '../types';
import type { EmbeddingProvider } from './embedding';
import type { VectorIndex, VectorSearchHit } from './vectorIndex';
import { ScreeningErrorFactory, isScreeningError } from '../errors/types';
import { RetryPolicy } from '../../shared/errors/retryPolicy';
import { withTimeout } from '../../shared/concurrency/timeout';
import { containsIgnoreCase } from '../parser/textUtils';
import type { ScreeningLogger } from '../logging/logger';

export interface GradeSubject {
  skillName: string;
  minYears: number;
}

/**
 * Oracle judgement of one chunk
 */
export interface EvidenceGrade {
  hasSkill: boolean;
  strength: EvidenceStrength;
  quote: string;
  reasoning: string;
  confidence: number;
  /** Years of use the chunk supports, when the oracle says */
  yearsSupported?: number;
  /** Whether those years meet the role's minimum */
  meetsYears?: boolean;
}

export interface EvidenceGrader {
  grade(subject: GradeSubject, chunkText: string): Promise<EvidenceGrade>;
}

export interface RetrieverOptions {
  k: number;
  keywordBoost: number;
  /** Raw similarity below which the best chunk is not graded */
  evidenceThreshold: number;
  /** `{skill}` is replaced with the skill name */
  queryTemplate: string;
  /** Bound on each embedder and index call */
  timeoutMs: number;
}

export const DEFAULT_RETRIEVER_OPTIONS: RetrieverOptions = {
  k: 10,
  keywordBoost: 1.5,
  evidenceThreshold: 0.05,
  queryTemplate: 'Experience with {skill} skill',
  timeoutMs: 30000
};

export interface RetrieveOptions {
  k?: number;
  minYears?: number;
}

export interface RetrieverDependencies {
  embedder: EmbeddingProvider;
  index: VectorIndex;
  grader: EvidenceGrader;
  retryPolicy?: RetryPolicy;
  logger?: ScreeningLogger;
}

/**
 * "No evidence found": a valid outcome, not an error
 */
export function noEvidence(reasoning: string = 'No supporting evidence found'): EvidenceMatch {
  return {
    chunk: null,
    relevanceScore: 0,
    similarity: 0,
    matched: false,
    strength: 'none',
    quote: '',
    reasoning
  };
}

/**
 * Hybrid re-rank of vector hits.
 *
 * Algorithm:
 * 1. Hits whose text contains the skill name (case-insensitive) get
 *    similarity x boost
 * 2. Sort by boosted score, descending
 * 3. Ties keep the index's original order
 */
export function rerankCandidates(
  skillName: string,
  hits: readonly VectorSearchHit[],
  boost: number = DEFAULT_RETRIEVER_OPTIONS.keywordBoost
): RankedCandidate[] {
  return hits
    .map((hit, originalRank) => {
      const keywordHit = containsIgnoreCase(hit.chunkText, skillName);
      return {
        chunk: toIndexedChunk(hit),
        similarity: hit.similarity,
        boostedScore: keywordHit ? hit.similarity * boost : hit.similarity,
        originalRank,
        keywordHit
      };
    })
    .sort((a, b) => b.boostedScore - a.boostedScore || a.originalRank - b.originalRank);
}

function toIndexedChunk(hit: VectorSearchHit): IndexedChunk {
  return {
    id: hit.id,
    resumeId: hit.metadata.resumeId,
    sequenceIndex: hit.metadata.sequenceIndex,
    text: hit.chunkText
  };
}

/**
 * Run a collaborator call, wrapping foreign errors in the given screening error.
 * With a timeout, a call still pending when it expires fails through `wrap`.
 */
export async function guardCollaborator<T>(
  operation: () => Promise<T>,
  wrap: (reason: string) => Error,
  timeoutMs?: number
): Promise<T> {
  try {
    if (timeoutMs === undefined) {
      return await operation();
    }
    return await withTimeout(operation(), timeoutMs, () => wrap(`No response within ${timeoutMs}ms`));
  } catch (error) {
    if (isScreeningError(error)) {
      throw error;
    }
    throw wrap(error instanceof Error ? error.message : String(error));
  }
}

export class EvidenceRetriever {
  private readonly deps: RetrieverDependencies;
  private readonly options: RetrieverOptions;
  private readonly retryPolicy: RetryPolicy;

  constructor(deps: RetrieverDependencies, options: Partial<RetrieverOptions> = {}) {
    this.deps = deps;
    this.options = { ...DEFAULT_RETRIEVER_OPTIONS, ...options };
    this.retryPolicy = deps.retryPolicy ?? new RetryPolicy();
  }

  /**
   * Query text for a skill
   */
  buildQuery(skillName: string): string {
    return this.options.queryTemplate.split('{skill}').join(skillName);
  }

  /**
   * Vector search for the resume, re-ranked. Empty when the resume has no chunks.
   */
  async findCandidates(skillName: string, resumeId: string, k: number = this.options.k): Promise<RankedCandidate[]> {
    const vector = await this.retryPolicy.execute(() => guardCollaborator(
      () => this.deps.embedder.embed(this.buildQuery(skillName)),
      reason => ScreeningErrorFactory.embeddingFailed(reason),
      this.options.timeoutMs
    ));

    const hits = await this.retryPolicy.execute(() => guardCollaborator(
      () => this.deps.index.search(vector, { resumeId }, k),
      reason => ScreeningErrorFactory.vectorIndexFailed('search', reason),
      this.options.timeoutMs
    ));

    // The index filter is best-effort; enforce it here
    const own = hits.filter(hit => hit.metadata.resumeId === resumeId);
    return rerankCandidates(skillName, own, this.options.keywordBoost);
  }

  /**
   * Best evidence for one skill in one resume.
   *
   * Zero candidates, a best similarity under the evidence threshold, or a
   * blank best chunk all give the no-evidence sentinel without grading.
   *
   * @throws ScreeningError INVALID_ARGUMENT for an empty skill name or resume id
   */
  async retrieve(skillName: string, resumeId: string, options: RetrieveOptions = {}): Promise<EvidenceMatch> {
    if (!skillName || !skillName.trim()) {
      throw ScreeningErrorFactory.invalidArgument('skillName', 'Skill name cannot be empty', skillName);
    }
    if (!resumeId || !resumeId.trim()) {
      throw ScreeningErrorFactory.invalidArgument('resumeId', 'Resume id cannot be empty', resumeId);
    }

    const k = options.k ?? this.options.k;
    const minYears = options.minYears ?? 0;
    if (!Number.isInteger(k) || k < 1) {
      throw ScreeningErrorFactory.invalidArgument('k', 'Must be a positive integer', k);
    }
    if (!Number.isFinite(minYears) || minYears < 0) {
      throw ScreeningErrorFactory.invalidArgument('minYears', 'Must be a non-negative number', minYears);
    }

    const candidates = await this.findCandidates(skillName, resumeId, k);
    const evidence = await this.gradeBest(skillName, minYears, candidates);

    this.deps.logger?.logRetrieval(resumeId, skillName, candidates.length, evidence);
    return evidence;
  }

  private async gradeBest(
    skillName: string,
    minYears: number,
    candidates: readonly RankedCandidate[]
  ): Promise<EvidenceMatch> {
    if (candidates.length === 0) {
      return noEvidence('No chunks found for this resume');
    }

    const best = candidates[0];
    if (best.similarity < this.options.evidenceThreshold || !best.chunk.text.trim()) {
      return {
        ...noEvidence(),
        similarity: best.similarity,
        relevanceScore: best.boostedScore
      };
    }

    const grade = await this.deps.grader.grade({ skillName, minYears }, best.chunk.text);
    const matched = grade.hasSkill && grade.strength !== 'none';

    return {
      chunk: best.chunk,
      relevanceScore: best.boostedScore,
      similarity: best.similarity,
      matched,
      strength: matched ? grade.strength : 'none',
      quote: grade.quote,
      reasoning: grade.reasoning,
      yearsSupported: grade.yearsSupported,
      meetsYears: grade.meetsYears
    };
  }
}
