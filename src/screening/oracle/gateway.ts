/**
 * Oracle Gateway
 *
 * The single path by which the pipeline talks to the text oracle: cache
 * lookup, invocation, JSON and schema validation, and the retry rules for
 * each fault kind.
 *
 * Retry rules:
 * - parse error: up to `maxAttempts`, exponential backoff, stricter re-prompt
 * - throttled: up to `maxAttempts`, exponential backoff
 * - timeout: one more round with the timeout multiplied; a second timeout
 *   returns the request's fallback when it has one
 */

import type { z } from 'zod';
import type { TextOracle } from '../../shared/llm/types';
import type { OracleCache } from '../../shared/llm/cache';
import { RetryPolicy } from '../../shared/errors/retryPolicy';
import { withTimeout } from '../../shared/concurrency/timeout';
import { ScreeningErrorCode, ScreeningErrorFactory, isScreeningError } from '../errors/types';
import { parseOracleResponse } from '../validation/validator';
import type { ScreeningLogger } from '../logging/logger';
import type { OraclePromptKind } from './prompts';
import { STRICT_JSON_SUFFIX } from './prompts';
import { classifyOracleError } from './faults';

export interface OracleRequest<S extends z.ZodTypeAny> {
  kind: OraclePromptKind;
  prompt: string;
  schema: S;
  maxOutputTokens: number;
  /** Neutral result used when the call times out twice */
  fallback?: () => z.output<S>;
}

export interface OracleGatewayOptions {
  timeoutMs: number;
  timeoutRetryMultiplier: number;
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_GATEWAY_OPTIONS: OracleGatewayOptions = {
  timeoutMs: 30000,
  timeoutRetryMultiplier: 2,
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2
};

export interface OracleGatewayDependencies {
  cache?: OracleCache;
  logger?: ScreeningLogger;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

export class OracleGateway {
  private readonly oracle: TextOracle;
  private readonly options: OracleGatewayOptions;
  private readonly deps: OracleGatewayDependencies;

  constructor(
    oracle: TextOracle,
    options: Partial<OracleGatewayOptions> = {},
    deps: OracleGatewayDependencies = {}
  ) {
    this.oracle = oracle;
    this.options = { ...DEFAULT_GATEWAY_OPTIONS, ...options };
    this.deps = deps;
  }

  /**
   * Validated oracle response for the request
   *
   * @throws ScreeningError ORACLE_PARSE_ERROR or ORACLE_THROTTLED once retries run out
   * @throws ScreeningError ORACLE_TIMEOUT after two timeouts when there is no fallback
   */
  async request<S extends z.ZodTypeAny>(request: OracleRequest<S>): Promise<z.output<S>> {
    const cached = this.deps.cache?.get(request.kind, request.prompt);
    if (cached !== undefined && cached !== null) {
      this.deps.logger?.logOracleCall(request.kind, 'cache_hit', 0);
      return parseOracleResponse(request.kind, request.schema, cached);
    }

    try {
      return await this.callWithRetries(request, this.options.timeoutMs);
    } catch (error) {
      if (!isScreeningError(error, ScreeningErrorCode.ORACLE_TIMEOUT)) {
        throw error;
      }
    }

    const extendedTimeout = this.options.timeoutMs * this.options.timeoutRetryMultiplier;
    this.deps.logger?.logOracleCall(request.kind, 'retry', 1, {
      code: ScreeningErrorCode.ORACLE_TIMEOUT,
      timeoutMs: extendedTimeout
    });

    try {
      return await this.callWithRetries(request, extendedTimeout);
    } catch (error) {
      if (request.fallback && isScreeningError(error, ScreeningErrorCode.ORACLE_TIMEOUT)) {
        this.deps.logger?.logOracleCall(request.kind, 'fallback', 2, { timeoutMs: extendedTimeout });
        return request.fallback();
      }
      throw error;
    }
  }

  private callWithRetries<S extends z.ZodTypeAny>(
    request: OracleRequest<S>,
    timeoutMs: number
  ): Promise<z.output<S>> {
    const policy = new RetryPolicy({
      maxAttempts: this.options.maxAttempts,
      initialDelayMs: this.options.initialDelayMs,
      backoffMultiplier: this.options.backoffMultiplier,
      sleep: this.deps.sleep,
      isRetryable: error => isScreeningError(
        error,
        ScreeningErrorCode.ORACLE_PARSE_ERROR,
        ScreeningErrorCode.ORACLE_THROTTLED
      ),
      onRetry: (error, attempt, delayMs) => {
        this.deps.logger?.logOracleCall(request.kind, 'retry', attempt, {
          code: isScreeningError(error) ? error.code : error.name,
          delayMs
        });
      }
    });

    let strict = false;

    return policy.execute(async attempt => {
      const prompt = strict ? `${request.prompt}\n\n${STRICT_JSON_SUFFIX}` : request.prompt;

      let text: string;
      try {
        // The oracle may not honour its own timeout
        text = await withTimeout(
          this.oracle.invoke(prompt, request.maxOutputTokens, { timeoutMs }),
          timeoutMs,
          () => ScreeningErrorFactory.oracleTimeout(timeoutMs)
        );
      } catch (error) {
        throw classifyOracleError(error, timeoutMs);
      }

      let data: z.output<S>;
      try {
        data = parseOracleResponse(request.kind, request.schema, text);
      } catch (error) {
        strict = true;
        throw error;
      }

      this.deps.cache?.set(request.kind, request.prompt, text);
      this.deps.logger?.logOracleCall(request.kind, 'ok', attempt);
      return data;
    });
  }
}
