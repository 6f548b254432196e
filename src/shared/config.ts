/**
 * Environment Configuration
 *
 * Loads environment variables into a typed configuration object shared by the
 * logger, the oracle client factory and the store factory.
 *
 * Usage:
 *   import { config } from './config';
 *   console.log(config.llm.provider);
 */

import 'dotenv/config';

// =============================================================================
// Types
// =============================================================================

export type LLMProviderType = 'anthropic' | 'openai';
export type NodeEnv = 'development' | 'production' | 'test';

export interface ServerConfig {
  nodeEnv: NodeEnv;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
}

export interface DatabaseConfig {
  /** SQLite file path, or ':memory:' */
  path: string;
}

export interface LLMConfig {
  provider: LLMProviderType;
  model: string;
  anthropicApiKey: string;
  openaiApiKey: string;
  hasAnthropicKey: boolean;
  hasOpenaiKey: boolean;
}

export interface EmbeddingConfig {
  model: string;
}

export interface LoggingConfig {
  level: string;
  pretty: boolean;
}

export interface Config {
  server: ServerConfig;
  database: DatabaseConfig;
  llm: LLMConfig;
  embedding: EmbeddingConfig;
  logging: LoggingConfig;
}

// =============================================================================
// Validation Helpers
// =============================================================================

class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function getEnv(key: string): string {
  return process.env[key] || '';
}

function getEnvWithDefault(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseLLMProvider(value: string): LLMProviderType {
  if (value === 'openai') return 'openai';
  return 'anthropic';
}

function parseNodeEnv(value: string): NodeEnv {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
}

// =============================================================================
// Configuration Loader
// =============================================================================

function loadConfig(): Config {
  const nodeEnv = parseNodeEnv(getEnvWithDefault('NODE_ENV', 'development'));

  const anthropicApiKey = getEnv('ANTHROPIC_API_KEY');
  const openaiApiKey = getEnv('OPENAI_API_KEY');
  const hasAnthropicKey = !!anthropicApiKey;
  const hasOpenaiKey = !!openaiApiKey;

  // Fall back to OpenAI when only its key is present
  let provider = parseLLMProvider(getEnvWithDefault('LLM_PROVIDER', 'anthropic'));
  if (provider === 'anthropic' && !hasAnthropicKey && hasOpenaiKey) {
    provider = 'openai';
  }

  const defaultLevel = nodeEnv === 'test' ? 'silent' : nodeEnv === 'development' ? 'debug' : 'info';

  return {
    server: {
      nodeEnv,
      isDevelopment: nodeEnv === 'development',
      isProduction: nodeEnv === 'production',
      isTest: nodeEnv === 'test',
    },

    database: {
      path: getEnvWithDefault('DATABASE_PATH', './data/screening.db'),
    },

    llm: {
      provider,
      model: getEnv('LLM_MODEL'),
      anthropicApiKey,
      openaiApiKey,
      hasAnthropicKey,
      hasOpenaiKey,
    },

    embedding: {
      model: getEnvWithDefault('EMBEDDING_MODEL', 'text-embedding-3-small'),
    },

    logging: {
      level: getEnvWithDefault('LOG_LEVEL', defaultLevel),
      pretty: getEnvBoolean('LOG_PRETTY', false),
    },
  };
}

// =============================================================================
// Export
// =============================================================================

/**
 * Application configuration loaded from environment variables.
 */
export const config: Config = loadConfig();

export { ConfigurationError };

/**
 * Return the API key for the configured oracle provider, throwing when it is missing
 */
export function requireLLMApiKey(provider: LLMProviderType = config.llm.provider): string {
  const apiKey = provider === 'anthropic' ? config.llm.anthropicApiKey : config.llm.openaiApiKey;
  if (!apiKey) {
    throw new ConfigurationError(
      `Missing required environment variable: ${provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY'}. ` +
      `Please set it in your .env file or environment.`
    );
  }
  return apiKey;
}

/**
 * Return the OpenAI key used for embeddings, throwing when it is missing
 */
export function requireEmbeddingApiKey(): string {
  if (!config.llm.openaiApiKey) {
    throw new ConfigurationError(
      'Missing required environment variable: OPENAI_API_KEY. Embeddings are served by OpenAI.'
    );
  }
  return config.llm.openaiApiKey;
}
