/**
 * Shared Infrastructure
 *
 * Provider-agnostic building blocks used by the screening pipeline.
 *
 * Modules:
 * - config: Environment configuration
 * - logger: pino root and component loggers
 * - llm: Unified LLM client (Anthropic + OpenAI), response cache, prompt helpers
 * - validation: Common validation utilities
 * - errors: Error types, handler and retry policy
 * - concurrency: Bounded worker pool
 */

export { config, ConfigurationError, requireLLMApiKey, requireEmbeddingApiKey } from './config';
export type { Config, LLMProviderType, NodeEnv } from './config';
export { logger, loggers, createComponentLogger, serializeError } from './logger';
export * from './llm';
export * from './validation';
export * from './errors';
export * from './concurrency';
