/**
 * LLM Types
 *
 * Type definitions for LLM configuration and responses.
 * Supports both Anthropic and OpenAI providers.
 */

/**
 * Supported LLM providers
 */
export type LLMProvider = 'anthropic' | 'openai';

/**
 * LLM configuration
 */
export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeout: number; // milliseconds
}

/**
 * Default configurations for each provider
 */
export const DEFAULT_LLM_CONFIG: Record<LLMProvider, Omit<LLMConfig, 'apiKey'>> = {
  anthropic: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    temperature: 0,
    maxTokens: 4096,
    timeout: 30000
  },
  openai: {
    provider: 'openai',
    model: 'gpt-4o',
    temperature: 0,
    maxTokens: 4096,
    timeout: 30000
  }
};

/**
 * LLM request parameters
 */
export interface LLMRequest {
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  /** Ask the provider for a JSON object when it supports a JSON mode */
  json?: boolean;
  model?: string; // Override the default model for this request
}

/**
 * LLM response structure
 */
export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  finishReason?: string;
}

export interface OracleInvokeOptions {
  timeoutMs?: number;
}

/**
 * Text-understanding oracle: takes a prompt, returns the model's raw text.
 *
 * Implementations throw on transport failure; interpreting the text is the
 * caller's job.
 */
export interface TextOracle {
  invoke(prompt: string, maxOutputTokens: number, options?: OracleInvokeOptions): Promise<string>;
}
