/**
 * Graceful Degradation Utilities
 *
 * Fallback strategies when an external collaborator fails.
 *
 * Strategy:
 * - If evidence for one skill cannot be obtained, that skill scores zero,
 *   unmatched, with a note; the request still completes
 * - If work history or a skill-experience batch fails, continue with none
 * - Caller errors and cancellation are never degraded
 */

import type { JobRequirement, SkillExperience, SkillScore } from '../types';
import { ErrorCategory } from '../../shared/errors/types';
import { ErrorHandler } from '../../shared/errors/handler';
import type { ScreeningLogger } from '../logging/logger';
import { ScreeningError } from './types';

/**
 * Note recorded on a skill whose evidence could not be evaluated
 */
export function unavailableNote(skillName: string, error: Error): string {
  const reason = error instanceof ScreeningError ? error.code : error.name;
  return `Evidence for ${skillName} was unavailable (${reason})`;
}

/**
 * Graceful degradation handler
 */
export class GracefulDegradation {
  /**
   * True for faults of an external collaborator (oracle, embeddings, vector index)
   */
  static isDegradable(error: unknown): error is ScreeningError {
    return error instanceof ScreeningError && error.category === ErrorCategory.EXTERNAL_SERVICE;
  }

  /**
   * Zero, unmatched score for a skill whose evaluation failed. Years found are
   * still reported from the stored experience.
   */
  static degradeSkill(
    requirement: JobRequirement,
    experience: SkillExperience,
    error: Error,
    logger?: ScreeningLogger
  ): SkillScore {
    logger?.logDegradation(requirement.skillName, error.message, {
      code: error instanceof ScreeningError ? error.code : undefined
    });

    return {
      skillName: requirement.skillName,
      score: 0,
      yearsFound: experience.totalYears,
      yearsRequired: requirement.minYears,
      meetsRequirement: experience.totalYears >= requirement.minYears,
      matched: false,
      evidenceStrength: 'none',
      evidenceAvailable: false,
      note: unavailableNote(requirement.skillName, error)
    };
  }

  /**
   * Run an oracle-backed operation, returning the fallback when it fails with
   * a degradable fault. Everything else is rethrown.
   */
  static async withOracleFallback<T>(
    operation: () => Promise<T>,
    fallback: () => T,
    context: { operation: string; logger?: ScreeningLogger }
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (!GracefulDegradation.isDegradable(error)) {
        throw ErrorHandler.toError(error);
      }
      context.logger?.logDegradation(context.operation, error.message, { code: error.code });
      return fallback();
    }
  }
}
