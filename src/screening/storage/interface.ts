/**
 * Screening Store Interface
 *
 * Keyed persistence for everything the pipeline produces. Enables swapping
 * between backends:
 * - MemoryScreeningStore: in-process maps (tests, single-run tools)
 * - SqliteScreeningStore: better-sqlite3 file or ':memory:' database
 *
 * Reads return copies; mutating them never changes stored state.
 */

import type {
  Chunk,
  JobProfile,
  ResumeDocument,
  ScoreResult,
  SkillExperienceMap,
  WorkHistoryEntry
} from '../types';

export interface ScreeningStore {
  saveResume(document: ResumeDocument): Promise<void>;
  getResume(resumeId: string): Promise<ResumeDocument | null>;

  /** Replaces the resume's work history */
  saveWorkHistory(resumeId: string, entries: readonly WorkHistoryEntry[]): Promise<void>;
  getWorkHistory(resumeId: string): Promise<WorkHistoryEntry[]>;

  /** Replaces every chunk of the resume */
  replaceChunks(resumeId: string, chunks: readonly Chunk[]): Promise<void>;
  /** Ordered by sequence index */
  getChunks(resumeId: string): Promise<Chunk[]>;

  /**
   * Swap in the resume's whole skill-experience map. Readers see either the
   * old map or the new one, never a mix.
   */
  replaceSkillExperience(resumeId: string, experience: SkillExperienceMap): Promise<void>;
  /** Empty map when nothing is stored */
  getSkillExperience(resumeId: string): Promise<SkillExperienceMap>;

  saveJobProfile(profile: JobProfile): Promise<void>;
  getJobProfile(jobId: string): Promise<JobProfile | null>;

  saveScoreResult(resumeId: string, jobId: string, result: ScoreResult): Promise<void>;
  getScoreResult(resumeId: string, jobId: string): Promise<ScoreResult | null>;
}
