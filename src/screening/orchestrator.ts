/**
 * Screening Orchestrator
 *
 * Main entry point that wires the components into the ingestion and scoring
 * pipelines.
 *
 * Ingestion: profile and work history (oracle) → chunks → embeddings →
 * vector index → skill experience (oracle, batched) → store.
 *
 * Scoring: per requirement, in parallel: experience lookup → evidence
 * retrieval → skill score; then one aggregation over all of them.
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type {
  Chunk,
  JobProfile,
  JobRequirement,
  ResumeDocument,
  ScoreResult,
  SkillExperienceMap,
  SkillScore,
  WorkHistoryEntry
} from './types';
import type { TextOracle } from '../shared/llm/types';
import { OracleCache } from '../shared/llm/cache';
import { createLLMClientFromEnv } from '../shared/llm/client';
import { config as envConfig } from '../shared/config';
import { RetryPolicy } from '../shared/errors/retryPolicy';
import { mapWithConcurrency, resolveParallelism } from '../shared/concurrency/workerPool';
import { ConfigManager } from './config';
import type { ScreeningConfig, ScreeningConfigOverrides } from './config';
import { ScreeningLogger } from './logging/logger';
import { ScreeningErrorFactory } from './errors/types';
import { GracefulDegradation } from './errors/gracefulDegradation';
import { IngestResumeInputSchema, JobDescriptionInputSchema, JobProfileSchema } from './validation/schemas';
import { validateInput } from './validation/validator';
import { chunk } from './parser/chunker';
import { aggregateAll } from './parser/experienceAggregator';
import { selectProminentSkills } from './parser/profile';
import { EvidenceRetriever, guardCollaborator } from './retrieval/evidenceRetriever';
import type { EmbeddingProvider } from './retrieval/embedding';
import { createEmbeddingProviderFromEnv } from './retrieval/embedding';
import { InMemoryVectorIndex } from './retrieval/vectorIndex';
import type { VectorIndex, VectorRecord } from './retrieval/vectorIndex';
import { score } from './scoring/skillScorer';
import { aggregate } from './scoring/scoreAggregator';
import { resolveSkillExperience } from './scoring/experienceLookup';
import type { SkillVariantMatcher } from './scoring/experienceLookup';
import { OracleGateway } from './oracle/gateway';
import {
  OracleEvidenceGrader,
  OracleSkillVariantMatcher,
  extractJobRequirements,
  extractResumeProfile,
  extractSkillExperience,
  extractWorkHistory
} from './oracle/extractors';
import type { ScreeningStore } from './storage/interface';
import { SqliteScreeningStore } from './storage/sqliteStore';

export interface ScreeningDependencies {
  oracle: TextOracle;
  embedder: EmbeddingProvider;
  index: VectorIndex;
  store: ScreeningStore;
  /** Owned by the caller; omitted means no caching */
  cache?: OracleCache;
  logger?: ScreeningLogger;
  /** Backoff sleep; injectable for tests */
  sleep?: (ms: number) => Promise<void>;
  /** Clock for ingestion timestamps */
  now?: () => Date;
}

export interface IngestResumeInput {
  resumeId: string;
  text: string;
  /** ISO-8601; defaults to now */
  ingestedAt?: string;
}

export interface IngestionResult {
  document: ResumeDocument;
  workHistory: WorkHistoryEntry[];
  chunks: Chunk[];
  skillExperience: SkillExperienceMap;
}

export interface ScoreRequest {
  resumeId: string;
  job: JobProfile;
  /** Abandons the request; no further skills are evaluated */
  signal?: AbortSignal;
}

/**
 * Vector index id of a chunk
 */
export function chunkId(resumeId: string, sequenceIndex: number): string {
  return `${resumeId}:${sequenceIndex}`;
}

/**
 * Screening orchestrator
 *
 * Coordinates all components for resume ingestion and scoring.
 */
export class ScreeningOrchestrator {
  private readonly deps: ScreeningDependencies;
  private readonly config: ScreeningConfig;
  private readonly logger: ScreeningLogger;
  private readonly gateway: OracleGateway;
  private readonly retryPolicy: RetryPolicy;
  private readonly retriever: EvidenceRetriever;
  private readonly variantMatcher?: SkillVariantMatcher;

  constructor(deps: ScreeningDependencies, overrides?: ScreeningConfigOverrides) {
    this.deps = deps;
    this.config = new ConfigManager(overrides).getConfig();
    this.logger = deps.logger ?? new ScreeningLogger(this.config.logging);

    const { oracle, retrieval, experience } = this.config;

    this.gateway = new OracleGateway(
      deps.oracle,
      {
        timeoutMs: oracle.timeoutMs,
        timeoutRetryMultiplier: oracle.timeoutRetryMultiplier,
        maxAttempts: oracle.maxAttempts,
        initialDelayMs: oracle.initialDelayMs,
        backoffMultiplier: oracle.backoffMultiplier
      },
      { cache: deps.cache, logger: this.logger, sleep: deps.sleep }
    );

    this.retryPolicy = new RetryPolicy({
      maxAttempts: oracle.maxAttempts,
      initialDelayMs: oracle.initialDelayMs,
      backoffMultiplier: oracle.backoffMultiplier,
      sleep: deps.sleep
    });

    this.retriever = new EvidenceRetriever(
      {
        embedder: deps.embedder,
        index: deps.index,
        grader: new OracleEvidenceGrader(this.gateway, oracle.gradeMaxOutputTokens),
        retryPolicy: this.retryPolicy,
        logger: this.logger
      },
      {
        k: retrieval.k,
        keywordBoost: retrieval.keywordBoost,
        evidenceThreshold: retrieval.evidenceThreshold,
        queryTemplate: retrieval.queryTemplate,
        timeoutMs: retrieval.timeoutMs
      }
    );

    if (experience.enableVariantMatching) {
      this.variantMatcher = new OracleSkillVariantMatcher(this.gateway, oracle.gradeMaxOutputTokens, this.logger);
    }
  }

  getLogger(): ScreeningLogger {
    return this.logger;
  }

  /**
   * Ingest a resume, replacing anything stored for the same id.
   *
   * @throws ScreeningError INVALID_ARGUMENT for a malformed input
   * @throws ScreeningError ORACLE_* when the profile cannot be extracted
   */
  async ingestResume(input: IngestResumeInput): Promise<IngestionResult> {
    const startTime = Date.now();
    const { resumeId, text, ingestedAt } = validateInput('ingestResume', IngestResumeInputSchema, input);
    const asOf = ingestedAt ?? (this.deps.now ? this.deps.now() : new Date()).toISOString();
    const { oracle, chunking, experience, concurrency } = this.config;

    const [profile, workHistory] = await Promise.all([
      extractResumeProfile(this.gateway, text, oracle.maxOutputTokens),
      extractWorkHistory(this.gateway, text, asOf, oracle.maxOutputTokens, this.logger)
    ]);

    const chunks = chunk(text, workHistory, chunking);
    const records = await this.embedChunks(resumeId, chunks);

    const skills = selectProminentSkills(profile.skills, text, experience.topSkills);
    const matches = await extractSkillExperience(this.gateway, skills, workHistory, text, {
      batchSize: experience.batchSize,
      parallelism: concurrency.parallelism,
      maxParallelism: concurrency.maxParallelism,
      maxOutputTokens: oracle.maxOutputTokens,
      ingestedAt: asOf,
      logger: this.logger
    });
    const skillExperience = aggregateAll(matches);

    const document: ResumeDocument = { id: resumeId, text, ingestedAt: asOf, profile };
    await this.deps.store.saveResume(document);
    await this.deps.store.saveWorkHistory(resumeId, workHistory);
    await this.deps.store.replaceChunks(resumeId, chunks);
    await this.deps.store.replaceSkillExperience(resumeId, skillExperience);
    await this.swapVectors(resumeId, records);

    this.logger.logIngestion(
      resumeId,
      { chunks: chunks.length, jobs: workHistory.length, skills: Object.keys(skillExperience).length },
      Date.now() - startTime
    );

    return { document, workHistory, chunks, skillExperience };
  }

  /**
   * Embed every chunk. Nothing is written to the index here.
   */
  private async embedChunks(resumeId: string, chunks: readonly Chunk[]): Promise<VectorRecord[]> {
    const { concurrency, retrieval } = this.config;
    const limit = resolveParallelism(chunks.length, concurrency.parallelism, concurrency.maxParallelism);

    return mapWithConcurrency(chunks, limit, async (item): Promise<VectorRecord> => {
      const vector = await this.retryPolicy.execute(() => guardCollaborator(
        () => this.deps.embedder.embed(item.text),
        reason => ScreeningErrorFactory.embeddingFailed(reason),
        retrieval.timeoutMs
      ));
      return {
        id: chunkId(resumeId, item.sequenceIndex),
        vector,
        resumeId,
        sequenceIndex: item.sequenceIndex,
        text: item.text
      };
    });
  }

  /**
   * Replace the resume's vectors: upsert the new records, then drop the old
   * ones they did not overwrite. A failed upsert leaves the old set searchable.
   */
  private async swapVectors(resumeId: string, records: readonly VectorRecord[]): Promise<void> {
    const { timeoutMs } = this.config.retrieval;

    await this.retryPolicy.execute(() => guardCollaborator(
      () => this.deps.index.upsert(records),
      reason => ScreeningErrorFactory.vectorIndexFailed('upsert', reason),
      timeoutMs
    ));

    const keepIds = new Set(records.map(record => record.id));
    await this.retryPolicy.execute(() => guardCollaborator(
      () => this.deps.index.deleteByResume(resumeId, keepIds),
      reason => ScreeningErrorFactory.vectorIndexFailed('delete', reason),
      timeoutMs
    ));
  }

  /**
   * Extract and store the job profile for a job description
   */
  async analyzeJobDescription(jobId: string, text: string): Promise<JobProfile> {
    const input = validateInput('analyzeJobDescription', JobDescriptionInputSchema, { jobId, text });
    const profile = await extractJobRequirements(
      this.gateway,
      input.jobId,
      input.text,
      this.config.oracle.maxOutputTokens
    );
    await this.deps.store.saveJobProfile(profile);
    this.logger.logInfo(`Analyzed job ${input.jobId}`, {
      jobId: input.jobId,
      requirementCount: profile.requirements.length,
      requiredYears: profile.requiredYears
    });
    return profile;
  }

  /**
   * Score an ingested resume against a job.
   *
   * A collaborator fault while evaluating one skill degrades that skill only.
   *
   * @throws ScreeningError RESUME_NOT_FOUND when the resume was never ingested
   * @throws ScreeningError REQUEST_CANCELLED when the signal aborts first
   * @throws ScreeningError INVALID_ARGUMENT or AGGREGATION_INPUT_ERROR for bad job data
   */
  async scoreResume(request: ScoreRequest): Promise<ScoreResult> {
    const startTime = Date.now();
    const { resumeId, signal } = request;
    const job = validateInput('job', JobProfileSchema, request.job);

    const document = await this.deps.store.getResume(resumeId);
    if (!document) {
      throw ScreeningErrorFactory.resumeNotFound(resumeId);
    }
    const experienceMap = await this.deps.store.getSkillExperience(resumeId);

    const { concurrency } = this.config;
    const limit = resolveParallelism(job.requirements.length, concurrency.parallelism, concurrency.maxParallelism);
    const cancelled = () => ScreeningErrorFactory.cancelled('Scoring request');

    const skillScores = await mapWithConcurrency(
      job.requirements,
      limit,
      requirement => this.evaluateSkill(resumeId, requirement, experienceMap),
      { signal, abortError: cancelled }
    );

    if (signal?.aborted) {
      throw cancelled();
    }

    const profile = document.profile;
    const result = aggregate(
      skillScores,
      job.requirements,
      profile?.totalYears ?? 0,
      job.requiredYears,
      profile?.hasCertifications ?? false,
      profile?.hasProjects ?? false
    );

    await this.deps.store.saveScoreResult(resumeId, job.jobId, result);
    this.logger.logScoring(job.jobId, resumeId, result, Date.now() - startTime);
    return result;
  }

  /**
   * Score one requirement: experience lookup, evidence retrieval, skill score
   */
  private async evaluateSkill(
    resumeId: string,
    requirement: JobRequirement,
    experienceMap: SkillExperienceMap
  ): Promise<SkillScore> {
    const experience = await resolveSkillExperience(experienceMap, requirement, this.variantMatcher);

    try {
      const evidence = await this.retriever.retrieve(requirement.skillName, resumeId, {
        minYears: requirement.minYears
      });
      return score(evidence, experience, requirement);
    } catch (error) {
      if (GracefulDegradation.isDegradable(error)) {
        return GracefulDegradation.degradeSkill(requirement, experience, error, this.logger);
      }
      throw error;
    }
  }
}

/**
 * Create an orchestrator from environment variables: configured oracle
 * provider, OpenAI embeddings, an in-process vector index and the SQLite
 * store at DATABASE_PATH.
 */
export function createScreeningOrchestratorFromEnv(
  overrides?: ScreeningConfigOverrides
): ScreeningOrchestrator {
  const screeningConfig = new ConfigManager(overrides).getConfig();
  const databasePath = envConfig.database.path;
  if (databasePath !== ':memory:') {
    mkdirSync(dirname(databasePath), { recursive: true });
  }

  return new ScreeningOrchestrator(
    {
      oracle: createLLMClientFromEnv({ timeout: screeningConfig.oracle.timeoutMs }),
      embedder: createEmbeddingProviderFromEnv({
        maxChars: screeningConfig.retrieval.maxEmbeddingChars,
        timeoutMs: screeningConfig.oracle.timeoutMs
      }),
      index: new InMemoryVectorIndex(),
      store: new SqliteScreeningStore({ databasePath }),
      cache: new OracleCache(screeningConfig.oracle.cache)
    },
    overrides
  );
}
