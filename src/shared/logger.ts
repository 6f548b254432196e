/**
 * Logger Configuration
 *
 * Configures pino with environment-aware formatting:
 * - Default: JSON output for log aggregation
 * - LOG_PRETTY=true: colorized output through pino-pretty
 * - Tests: silent unless LOG_LEVEL says otherwise
 *
 * Usage:
 *   import { logger } from './logger';
 *   logger.info({ resumeId }, 'Resume ingested');
 *   logger.error({ err: serializeError(err) }, 'Scoring failed');
 */

import pino, { Logger, LoggerOptions } from 'pino';
import { config } from './config';

// =============================================================================
// Configuration
// =============================================================================

const baseOptions: LoggerOptions = {
  level: config.logging.level,
  base: {
    pid: process.pid,
    env: config.server.nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Keys and prompt bodies never reach the log stream
  redact: {
    paths: [
      'apiKey',
      'token',
      'secret',
      'prompt',
      '*.apiKey',
      '*.token',
      '*.secret',
      '*.prompt',
    ],
    remove: true,
  },
};

const prettyOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
      messageFormat: '{component} {msg}',
      singleLine: false,
    },
  },
};

const jsonOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      env: config.server.nodeEnv,
    }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

export const logger: Logger = pino(
  config.logging.pretty && !config.server.isTest ? prettyOptions : jsonOptions
);

/**
 * Create a child logger for a specific component
 *
 * @example
 * const retrievalLogger = createComponentLogger('retrieval');
 * retrievalLogger.debug({ skill }, 'Querying vector index');
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

export const loggers = {
  /** Oracle (LLM) calls */
  oracle: createComponentLogger('oracle'),
  /** Embedding and vector index calls */
  retrieval: createComponentLogger('retrieval'),
  /** Resume ingestion */
  ingestion: createComponentLogger('ingestion'),
  /** Scoring requests */
  scoring: createComponentLogger('scoring'),
  /** Persistence */
  db: createComponentLogger('db'),
};

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Serialize an error for structured logging, keeping custom error fields
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const extras: Record<string, unknown> = {};
    for (const key of Object.getOwnPropertyNames(err)) {
      if (!['name', 'message', 'stack'].includes(key)) {
        extras[key] = Reflect.get(err, key);
      }
    }
    return {
      type: err.constructor.name,
      message: err.message,
      stack: config.server.isDevelopment ? err.stack : undefined,
      ...extras,
    };
  }
  return { message: String(err) };
}

export default logger;
