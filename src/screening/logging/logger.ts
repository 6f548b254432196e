/**
 * Screening Logger
 *
 * Audit trail of ingestion, retrieval, scoring and error events, kept in
 * memory for explainability and mirrored to pino.
 */

import type { Logger } from 'pino';
import { createComponentLogger, serializeError } from '../../shared/logger';
import { AppError } from '../../shared/errors/types';
import type { EvidenceMatch, ScoreResult } from '../types';

/**
 * Log entry types
 */
export enum LogType {
  INGESTION = 'INGESTION',
  ORACLE = 'ORACLE',
  RETRIEVAL = 'RETRIEVAL',
  SCORING = 'SCORING',
  DEGRADATION = 'DEGRADATION',
  ERROR = 'ERROR',
  INFO = 'INFO'
}

/**
 * Log entry interface
 */
export interface LogEntry {
  type: LogType;
  timestamp: Date;
  message: string;
  context?: Record<string, unknown>;
}

export interface ScreeningLoggerOptions {
  enabled: boolean;
  maxLogs: number;
}

/**
 * Screening audit logger
 */
export class ScreeningLogger {
  private logs: LogEntry[] = [];
  private readonly maxLogs: number;
  private enabled: boolean;
  private readonly sink: Logger;

  constructor(
    options: Partial<ScreeningLoggerOptions> = {},
    sink: Logger = createComponentLogger('screening')
  ) {
    this.maxLogs = options.maxLogs ?? 5000;
    this.enabled = options.enabled ?? true;
    this.sink = sink;
  }

  /**
   * Enable or disable logging
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /**
   * Log a completed resume ingestion
   */
  logIngestion(
    resumeId: string,
    counts: { chunks: number; jobs: number; skills: number },
    durationMs?: number
  ): void {
    this.addLog({
      type: LogType.INGESTION,
      timestamp: new Date(),
      message: `Ingested resume ${resumeId}`,
      context: {
        resumeId,
        chunkCount: counts.chunks,
        jobCount: counts.jobs,
        skillCount: counts.skills,
        durationMs
      }
    });
  }

  /**
   * Log an oracle call outcome
   */
  logOracleCall(
    promptKind: string,
    outcome: 'ok' | 'cache_hit' | 'retry' | 'fallback',
    attempt: number,
    context?: Record<string, unknown>
  ): void {
    this.addLog({
      type: LogType.ORACLE,
      timestamp: new Date(),
      message: `Oracle ${promptKind}: ${outcome}`,
      context: {
        ...context,
        promptKind,
        outcome,
        attempt
      }
    });
  }

  /**
   * Log the evidence chosen for a skill
   */
  logRetrieval(
    resumeId: string,
    skillName: string,
    candidateCount: number,
    evidence: EvidenceMatch
  ): void {
    this.addLog({
      type: LogType.RETRIEVAL,
      timestamp: new Date(),
      message: `Evidence for ${skillName}: ${evidence.strength}`,
      context: {
        resumeId,
        skillName,
        candidateCount,
        chunkId: evidence.chunk?.id ?? null,
        similarity: evidence.similarity,
        relevanceScore: evidence.relevanceScore,
        matched: evidence.matched,
        strength: evidence.strength,
        yearsSupported: evidence.yearsSupported ?? null,
        meetsYears: evidence.meetsYears ?? null
      }
    });
  }

  /**
   * Log scoring calculation with full breakdown
   */
  logScoring(
    jobId: string,
    resumeId: string,
    result: ScoreResult,
    durationMs?: number
  ): void {
    this.addLog({
      type: LogType.SCORING,
      timestamp: new Date(),
      message: `Match score calculated: ${result.overallScore}`,
      context: {
        jobId,
        resumeId,
        overallScore: result.overallScore,
        breakdown: {
          coreSkillsScore: result.coreSkillsScore,
          experienceScore: result.experienceScore,
          additionalScore: result.additionalScore
        },
        skillCount: result.skillScores.length,
        matchedCount: result.skillScores.filter(s => s.matched).length,
        degradedCount: result.notes.length,
        durationMs
      }
    });
  }

  /**
   * Log a skill evaluation that fell back to a neutral result
   */
  logDegradation(
    skillName: string,
    reason: string,
    context?: Record<string, unknown>
  ): void {
    this.addLog({
      type: LogType.DEGRADATION,
      timestamp: new Date(),
      message: `Evidence for ${skillName} unavailable: ${reason}`,
      context: {
        ...context,
        skillName,
        reason
      }
    });
  }

  /**
   * Log an error
   */
  logError(error: AppError | Error, context?: Record<string, unknown>): void {
    this.addLog({
      type: LogType.ERROR,
      timestamp: new Date(),
      message: error.message,
      context: {
        ...context,
        error: error instanceof AppError ? {
          category: error.category,
          severity: error.severity,
          recoverable: error.recoverable
        } : {
          name: error.name
        }
      }
    }, error);
  }

  /**
   * Log general information
   */
  logInfo(message: string, context?: Record<string, unknown>): void {
    this.addLog({
      type: LogType.INFO,
      timestamp: new Date(),
      message,
      context
    });
  }

  /**
   * Get all logs
   */
  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  /**
   * Get logs by type
   */
  getLogsByType(type: LogType): LogEntry[] {
    return this.logs.filter(log => log.type === type);
  }

  /**
   * Get recent logs
   */
  getRecentLogs(count: number): LogEntry[] {
    return this.logs.slice(-count);
  }

  /**
   * Get logs for a specific job/resume pair
   */
  getLogsForPair(jobId: string, resumeId: string): LogEntry[] {
    return this.logs.filter(log =>
      log.context?.jobId === jobId && log.context?.resumeId === resumeId
    );
  }

  /**
   * Clear all logs
   */
  clearLogs(): void {
    this.logs = [];
  }

  /**
   * Export logs as JSON
   */
  exportLogs(): string {
    return JSON.stringify(this.logs, null, 2);
  }

  private addLog(entry: LogEntry, error?: Error): void {
    if (!this.enabled) return;

    this.logs.push(entry);

    // Keep only the most recent logs
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const fields = { logType: entry.type, ...entry.context };
    if (error) {
      this.sink.error({ ...fields, err: serializeError(error) }, entry.message);
    } else if (entry.type === LogType.DEGRADATION) {
      this.sink.warn(fields, entry.message);
    } else {
      this.sink.debug(fields, entry.message);
    }
  }
}
