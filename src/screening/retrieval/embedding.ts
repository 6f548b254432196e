/**
 * Embedding Providers
 */

import OpenAI from 'openai';
import { config, requireEmbeddingApiKey } from '../../shared/config';
import { ScreeningErrorFactory, isScreeningError } from '../errors/types';

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model: string;
  /** Input is cut to this many characters before embedding */
  maxChars: number;
  timeoutMs: number;
}

export const DEFAULT_EMBEDDING_MAX_CHARS = 8000;

/**
 * Embeddings from the OpenAI embeddings endpoint
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly client: OpenAI;
  private readonly options: OpenAIEmbeddingOptions;

  constructor(options: Partial<OpenAIEmbeddingOptions> & { apiKey: string }, client?: OpenAI) {
    this.options = {
      model: config.embedding.model,
      maxChars: DEFAULT_EMBEDDING_MAX_CHARS,
      timeoutMs: 30000,
      ...options
    };
    this.client = client ?? new OpenAI({
      apiKey: this.options.apiKey,
      timeout: this.options.timeoutMs,
      maxRetries: 0
    });
  }

  async embed(text: string): Promise<number[]> {
    const input = (text || ' ').slice(0, this.options.maxChars);

    try {
      const response = await this.client.embeddings.create({
        model: this.options.model,
        input
      });

      const first = response.data[0];
      if (!first || first.embedding.length === 0) {
        throw ScreeningErrorFactory.embeddingFailed('Embedding response contained no vector');
      }
      return first.embedding;
    } catch (error) {
      if (isScreeningError(error)) {
        throw error;
      }
      throw ScreeningErrorFactory.embeddingFailed(error instanceof Error ? error.message : String(error));
    }
  }
}

/**
 * Create an embedding provider from environment variables
 */
export function createEmbeddingProviderFromEnv(
  overrides: Partial<OpenAIEmbeddingOptions> = {}
): OpenAIEmbeddingProvider {
  return new OpenAIEmbeddingProvider({
    ...overrides,
    apiKey: overrides.apiKey ?? requireEmbeddingApiKey()
  });
}
