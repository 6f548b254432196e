/**
 * LLM Client
 *
 * Unified client for Anthropic and OpenAI LLM providers.
 * Implements the TextOracle contract used by the screening pipeline.
 *
 * Retries are not done here: SDK retries are disabled so the caller's retry
 * policy is the only one in effect.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { jsonrepair } from 'jsonrepair';
import type { Logger } from 'pino';
import {
  LLMConfig,
  LLMProvider,
  LLMRequest,
  LLMResponse,
  DEFAULT_LLM_CONFIG,
  OracleInvokeOptions,
  TextOracle
} from './types';
import { config as envConfig, requireLLMApiKey } from '../config';
import { loggers } from '../logger';

/**
 * Unified LLM client supporting both Anthropic and OpenAI
 */
export class LLMClient implements TextOracle {
  private config: LLMConfig;
  private anthropicClient?: Anthropic;
  private openaiClient?: OpenAI;
  private log: Logger;

  constructor(
    config: Partial<LLMConfig> & { apiKey: string },
    log: Logger = loggers.oracle
  ) {
    const provider: LLMProvider = config.provider || envConfig.llm.provider;

    // Merge with defaults
    const defaults = DEFAULT_LLM_CONFIG[provider];
    this.config = {
      ...defaults,
      ...config,
      provider
    };
    this.log = log;

    // Initialize the appropriate client
    if (this.config.provider === 'anthropic') {
      this.anthropicClient = new Anthropic({
        apiKey: this.config.apiKey,
        timeout: this.config.timeout,
        maxRetries: 0
      });
    } else {
      this.openaiClient = new OpenAI({
        apiKey: this.config.apiKey,
        timeout: this.config.timeout,
        maxRetries: 0
      });
    }
  }

  /**
   * TextOracle entry point: one JSON-seeking completion, raw text back
   */
  async invoke(prompt: string, maxOutputTokens: number, options: OracleInvokeOptions = {}): Promise<string> {
    const response = await this.complete({
      prompt,
      maxTokens: maxOutputTokens,
      timeoutMs: options.timeoutMs,
      json: true
    });
    return response.content;
  }

  /**
   * Send a completion request to the LLM
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const temperature = request.temperature ?? this.config.temperature;
    const maxTokens = request.maxTokens ?? this.config.maxTokens;
    const model = request.model ?? this.config.model;
    const timeout = request.timeoutMs ?? this.config.timeout;

    const start = Date.now();
    this.log.debug(
      { provider: this.config.provider, model, temperature, maxTokens, timeout },
      'LLM request start'
    );

    const response = this.config.provider === 'anthropic'
      ? await this.callAnthropic(request, temperature, maxTokens, model, timeout)
      : await this.callOpenAI(request, temperature, maxTokens, model, timeout);

    this.log.debug(
      {
        model: response.model,
        finishReason: response.finishReason ?? 'unknown',
        elapsedMs: Date.now() - start,
        usage: response.usage
      },
      'LLM request end'
    );

    return response;
  }

  /**
   * Call Anthropic API
   */
  private async callAnthropic(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string,
    timeout: number
  ): Promise<LLMResponse> {
    if (!this.anthropicClient) {
      throw new Error('Anthropic client not initialized');
    }

    const response = await this.anthropicClient.messages.create(
      {
        model,
        max_tokens: maxTokens,
        temperature,
        system: request.systemPrompt || '',
        messages: [{ role: 'user', content: request.prompt }]
      },
      { timeout }
    );

    // Extract text content
    const content = response.content.find(block => block.type === 'text');
    if (!content || content.type !== 'text') {
      throw new Error('Unexpected response type from Anthropic');
    }

    return {
      content: content.text,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens
      },
      finishReason: response.stop_reason || undefined
    };
  }

  /**
   * Call OpenAI API
   */
  private async callOpenAI(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string,
    timeout: number
  ): Promise<LLMResponse> {
    if (!this.openaiClient) {
      throw new Error('OpenAI client not initialized');
    }

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

    if (request.systemPrompt) {
      messages.push({
        role: 'system',
        content: request.systemPrompt
      });
    }

    messages.push({ role: 'user', content: request.prompt });

    const requestOptions: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages,
      temperature,
      max_tokens: maxTokens
    };

    if (request.json && supportsJsonMode(model)) {
      requestOptions.response_format = { type: 'json_object' };
    }

    const response = await this.openaiClient.chat.completions.create(requestOptions, { timeout });

    const choice = response.choices[0];
    if (!choice || !choice.message.content) {
      throw new Error('No content in OpenAI response');
    }

    return {
      content: choice.message.content,
      model: response.model,
      usage: response.usage ? {
        inputTokens: response.usage.prompt_tokens,
        outputTokens: response.usage.completion_tokens,
        totalTokens: response.usage.total_tokens
      } : undefined,
      finishReason: choice.finish_reason || undefined
    };
  }

  /**
   * Get current configuration
   */
  getConfig(): LLMConfig {
    return { ...this.config };
  }
}

/**
 * JSON mode is only offered by some OpenAI chat models
 */
export function supportsJsonMode(model: string): boolean {
  return model.includes('gpt-4-turbo') ||
    model.includes('gpt-4o') ||
    model.includes('gpt-4.1') ||
    model.includes('gpt-3.5-turbo-1106') ||
    model.includes('gpt-3.5-turbo-0125');
}

/**
 * Parse JSON response from LLM, handling potential formatting issues
 */
export function parseJsonResponse(text: string): unknown {
  try {
    // Remove markdown code blocks if present
    let cleanText = text.trim();
    cleanText = cleanText.replace(/^```json\s*/i, '');
    cleanText = cleanText.replace(/^```\s*/, '');
    cleanText = cleanText.replace(/\s*```$/, '');

    return JSON.parse(cleanText.trim());
  } catch (error) {
    const candidate = extractJsonCandidate(text);

    if (candidate !== null) {
      try {
        return JSON.parse(candidate);
      } catch {
        // try repair next
      }
    }

    // Last-resort: attempt JSON repair on the extracted or cleaned text
    try {
      return JSON.parse(jsonrepair(candidate ?? text.trim()));
    } catch {
      // report the original failure
    }

    const errorMsg = error instanceof Error ? error.message : 'Unknown error';
    const preview = text.substring(0, 200);
    throw new Error(`Failed to parse LLM response as JSON: ${errorMsg}. Response preview: ${preview}`);
  }
}

/**
 * Outermost object or array in the text, whichever starts first
 */
function extractJsonCandidate(text: string): string | null {
  const firstBrace = text.indexOf('{');
  const firstBracket = text.indexOf('[');
  const useArray = firstBracket !== -1 && (firstBrace === -1 || firstBracket < firstBrace);
  const open = useArray ? firstBracket : firstBrace;
  const close = text.lastIndexOf(useArray ? ']' : '}');

  if (open === -1 || close <= open) {
    return null;
  }
  return text.substring(open, close + 1);
}

/**
 * Create an LLM client from environment variables
 */
export function createLLMClientFromEnv(overrides: Partial<LLMConfig> = {}): LLMClient {
  const provider = overrides.provider ?? envConfig.llm.provider;
  const apiKey = overrides.apiKey ?? requireLLMApiKey(provider);

  return new LLMClient({
    ...overrides,
    provider,
    apiKey,
    model: overrides.model || envConfig.llm.model || DEFAULT_LLM_CONFIG[provider].model
  });
}
