/**
 * Configuration Management
 *
 * Centralized configuration for the screening pipeline with environment
 * variable support. Score weights are constants of the scorers, not settings.
 */

import { ScreeningErrorFactory } from '../errors/types';

/**
 * Complete screening configuration
 */
export interface ScreeningConfig {
  chunking: {
    chunkWords: number;
    overlapWords: number;
  };

  retrieval: {
    k: number;
    keywordBoost: number;
    /** Raw similarity below which the best chunk is not graded */
    evidenceThreshold: number;
    /** `{skill}` is replaced with the skill name */
    queryTemplate: string;
    maxEmbeddingChars: number;
    /** Bound on each embedder and vector index call */
    timeoutMs: number;
  };

  experience: {
    topSkills: number;
    batchSize: number;
    enableVariantMatching: boolean;
  };

  oracle: {
    timeoutMs: number;
    timeoutRetryMultiplier: number;
    maxAttempts: number;
    initialDelayMs: number;
    backoffMultiplier: number;
    maxOutputTokens: number;
    gradeMaxOutputTokens: number;
    cache: {
      enabled: boolean;
      ttlSeconds: number;
      maxEntries: number;
    };
  };

  concurrency: {
    parallelism: number;
    maxParallelism: number;
  };

  logging: {
    enabled: boolean;
    maxLogs: number;
  };
}

export type ScreeningConfigOverrides = {
  [S in keyof ScreeningConfig]?: Partial<ScreeningConfig[S]>;
};

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ScreeningConfig = {
  chunking: {
    chunkWords: 250,
    overlapWords: 50
  },
  retrieval: {
    k: 10,
    keywordBoost: 1.5,
    evidenceThreshold: 0.05,
    queryTemplate: 'Experience with {skill} skill',
    maxEmbeddingChars: 8000,
    timeoutMs: 30000
  },
  experience: {
    topSkills: 30,
    batchSize: 10,
    enableVariantMatching: true
  },
  oracle: {
    timeoutMs: 30000,
    timeoutRetryMultiplier: 2,
    maxAttempts: 3,
    initialDelayMs: 1000,
    backoffMultiplier: 2,
    maxOutputTokens: 4096,
    gradeMaxOutputTokens: 512,
    cache: {
      enabled: true,
      ttlSeconds: 3600,
      maxEntries: 1000
    }
  },
  concurrency: {
    parallelism: 4,
    maxParallelism: 16
  },
  logging: {
    enabled: true,
    maxLogs: 5000
  }
};

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: ScreeningConfig;

  constructor(config?: ScreeningConfigOverrides) {
    this.config = this.loadConfig(config);
    this.validateConfig();
  }

  /**
   * Load configuration from environment variables and provided config
   */
  private loadConfig(provided: ScreeningConfigOverrides = {}): ScreeningConfig {
    const env = process.env;
    const d = DEFAULT_CONFIG;

    const envConfig: ScreeningConfig = {
      chunking: {
        chunkWords: this.parseInt(env.SCREENING_CHUNK_WORDS, d.chunking.chunkWords),
        overlapWords: this.parseInt(env.SCREENING_CHUNK_OVERLAP, d.chunking.overlapWords)
      },
      retrieval: {
        k: this.parseInt(env.SCREENING_RETRIEVAL_K, d.retrieval.k),
        keywordBoost: this.parseFloat(env.SCREENING_KEYWORD_BOOST, d.retrieval.keywordBoost),
        evidenceThreshold: this.parseFloat(env.SCREENING_EVIDENCE_THRESHOLD, d.retrieval.evidenceThreshold),
        queryTemplate: env.SCREENING_QUERY_TEMPLATE || d.retrieval.queryTemplate,
        maxEmbeddingChars: this.parseInt(env.SCREENING_MAX_EMBEDDING_CHARS, d.retrieval.maxEmbeddingChars),
        timeoutMs: this.parseInt(env.SCREENING_RETRIEVAL_TIMEOUT_MS, d.retrieval.timeoutMs)
      },
      experience: {
        topSkills: this.parseInt(env.SCREENING_TOP_SKILLS, d.experience.topSkills),
        batchSize: this.parseInt(env.SCREENING_SKILL_BATCH_SIZE, d.experience.batchSize),
        enableVariantMatching: this.parseBoolean(env.SCREENING_VARIANT_MATCHING, d.experience.enableVariantMatching)
      },
      oracle: {
        timeoutMs: this.parseInt(env.SCREENING_ORACLE_TIMEOUT_MS, d.oracle.timeoutMs),
        timeoutRetryMultiplier: this.parseFloat(env.SCREENING_ORACLE_TIMEOUT_MULTIPLIER, d.oracle.timeoutRetryMultiplier),
        maxAttempts: this.parseInt(env.SCREENING_ORACLE_MAX_ATTEMPTS, d.oracle.maxAttempts),
        initialDelayMs: this.parseInt(env.SCREENING_ORACLE_RETRY_DELAY_MS, d.oracle.initialDelayMs),
        backoffMultiplier: this.parseFloat(env.SCREENING_ORACLE_BACKOFF_MULTIPLIER, d.oracle.backoffMultiplier),
        maxOutputTokens: this.parseInt(env.SCREENING_ORACLE_MAX_TOKENS, d.oracle.maxOutputTokens),
        gradeMaxOutputTokens: this.parseInt(env.SCREENING_GRADE_MAX_TOKENS, d.oracle.gradeMaxOutputTokens),
        cache: {
          enabled: this.parseBoolean(env.SCREENING_CACHE_ENABLED, d.oracle.cache.enabled),
          ttlSeconds: this.parseInt(env.SCREENING_CACHE_TTL_SECONDS, d.oracle.cache.ttlSeconds),
          maxEntries: this.parseInt(env.SCREENING_CACHE_MAX_ENTRIES, d.oracle.cache.maxEntries)
        }
      },
      concurrency: {
        parallelism: this.parseInt(env.SCREENING_PARALLELISM, d.concurrency.parallelism),
        maxParallelism: this.parseInt(env.SCREENING_MAX_PARALLELISM, d.concurrency.maxParallelism)
      },
      logging: {
        enabled: this.parseBoolean(env.SCREENING_LOGGING_ENABLED, d.logging.enabled),
        maxLogs: this.parseInt(env.SCREENING_MAX_LOGS, d.logging.maxLogs)
      }
    };

    // Merge: DEFAULT_CONFIG < envConfig < providedConfig
    return this.merge(envConfig, provided);
  }

  /**
   * Validate configuration
   */
  private validateConfig(): void {
    const { chunking, retrieval, experience, oracle, concurrency, logging } = this.config;

    if (!Number.isInteger(chunking.chunkWords) || chunking.chunkWords < 1) {
      throw ScreeningErrorFactory.configurationError('chunking.chunkWords', 'Must be a positive integer');
    }

    if (!Number.isInteger(chunking.overlapWords) || chunking.overlapWords < 0 || chunking.overlapWords >= chunking.chunkWords) {
      throw ScreeningErrorFactory.configurationError(
        'chunking.overlapWords',
        'Must be a non-negative integer smaller than chunkWords'
      );
    }

    if (retrieval.k < 1) {
      throw ScreeningErrorFactory.configurationError('retrieval.k', 'Must be at least 1');
    }

    if (retrieval.keywordBoost < 1) {
      throw ScreeningErrorFactory.configurationError('retrieval.keywordBoost', 'Must be at least 1');
    }

    if (retrieval.evidenceThreshold < 0 || retrieval.evidenceThreshold > 1) {
      throw ScreeningErrorFactory.configurationError('retrieval.evidenceThreshold', 'Must be between 0 and 1');
    }

    if (!retrieval.queryTemplate.includes('{skill}')) {
      throw ScreeningErrorFactory.configurationError('retrieval.queryTemplate', 'Must contain {skill}');
    }

    if (retrieval.timeoutMs < 1) {
      throw ScreeningErrorFactory.configurationError('retrieval.timeoutMs', 'Must be at least 1');
    }

    if (experience.topSkills < 1 || experience.batchSize < 1) {
      throw ScreeningErrorFactory.configurationError('experience', 'topSkills and batchSize must be at least 1');
    }

    if (oracle.maxAttempts < 1) {
      throw ScreeningErrorFactory.configurationError('oracle.maxAttempts', 'Must be at least 1');
    }

    if (oracle.timeoutMs < 1 || oracle.timeoutRetryMultiplier < 1) {
      throw ScreeningErrorFactory.configurationError(
        'oracle.timeoutMs',
        'Timeout must be positive and the retry multiplier at least 1'
      );
    }

    if (oracle.initialDelayMs < 0 || oracle.backoffMultiplier < 1) {
      throw ScreeningErrorFactory.configurationError(
        'oracle.initialDelayMs',
        'Delay must be non-negative and the backoff multiplier at least 1'
      );
    }

    if (concurrency.parallelism < 1 || concurrency.maxParallelism < 1) {
      throw ScreeningErrorFactory.configurationError('concurrency', 'Parallelism must be at least 1');
    }

    if (logging.maxLogs < 1) {
      throw ScreeningErrorFactory.configurationError('logging.maxLogs', 'Must be at least 1');
    }
  }

  /**
   * Get configuration
   */
  getConfig(): ScreeningConfig {
    return { ...this.config };
  }

  /**
   * Update configuration
   */
  updateConfig(updates: ScreeningConfigOverrides): void {
    this.config = this.merge(this.config, updates);
    this.validateConfig();
  }

  /**
   * Parse integer from environment variable
   */
  private parseInt(value: string | undefined, defaultValue: number): number {
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  /**
   * Parse float from environment variable
   */
  private parseFloat(value: string | undefined, defaultValue: number): number {
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  /**
   * Parse boolean from environment variable
   */
  private parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
    if (!value) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
  }

  /**
   * Merge overrides into a full configuration, section by section
   */
  private merge(base: ScreeningConfig, overrides: ScreeningConfigOverrides): ScreeningConfig {
    const oracle = mergeSection(base.oracle, overrides.oracle);
    return {
      chunking: mergeSection(base.chunking, overrides.chunking),
      retrieval: mergeSection(base.retrieval, overrides.retrieval),
      experience: mergeSection(base.experience, overrides.experience),
      oracle: {
        ...oracle,
        cache: mergeSection(base.oracle.cache, overrides.oracle?.cache)
      },
      concurrency: mergeSection(base.concurrency, overrides.concurrency),
      logging: mergeSection(base.logging, overrides.logging)
    };
  }
}

/**
 * Shallow merge that ignores undefined override values
 */
function mergeSection<T extends object>(base: T, override?: Partial<T>): T {
  const result = { ...base };
  if (!override) {
    return result;
  }

  for (const key in override) {
    const value = override[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Global configuration instance
 */
let globalConfig: ConfigManager | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(config?: ScreeningConfigOverrides): ConfigManager {
  globalConfig = new ConfigManager(config);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): ConfigManager {
  if (!globalConfig) {
    globalConfig = new ConfigManager();
  }
  return globalConfig;
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  globalConfig = new ConfigManager();
}
