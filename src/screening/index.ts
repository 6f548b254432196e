/**
 * Resume Screening
 *
 * Explainable resume-to-job scoring:
 * - parser: chunking, work history, experience aggregation
 * - retrieval: embeddings, vector index, evidence retrieval
 * - scoring: skill scores, score aggregation, reports
 * - oracle: prompts, gateway and typed extractors
 * - storage: memory and SQLite stores
 */

export * from './types';
export * from './errors';
export { parseOracleResponse, validateInput } from './validation/validator';
export * from './validation/schemas';
export * from './config';
export * from './logging/logger';
export * from './parser';
export * from './retrieval';
export * from './scoring';
export * from './oracle';
export * from './storage';
export * from './orchestrator';
