/**
 * resume-screening-core
 *
 * Library entry point.
 */

export * from './screening';
export {
  LLMClient,
  createLLMClientFromEnv,
  OracleCache,
  DEFAULT_CACHE_CONFIG,
  config,
  logger,
  loggers,
  RetryPolicy,
  AppError,
  ErrorCategory,
  ErrorSeverity,
  ErrorHandler,
  mapWithConcurrency,
  resolveParallelism
} from './shared';
export type {
  TextOracle,
  LLMProvider,
  CacheConfig,
  RetryPolicyOptions,
  ValidationResult
} from './shared';
