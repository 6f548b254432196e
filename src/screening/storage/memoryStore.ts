/**
 * In-Memory Screening Store
 *
 * Map-backed implementation for tests and development. Data lives only as
 * long as the instance.
 */

import type {
  Chunk,
  JobProfile,
  ResumeDocument,
  ScoreResult,
  SkillExperienceMap,
  WorkHistoryEntry
} from '../types';
import type { ScreeningStore } from './interface';

function scoreKey(resumeId: string, jobId: string): string {
  return `${resumeId}\u0000${jobId}`;
}

export class MemoryScreeningStore implements ScreeningStore {
  private resumes = new Map<string, ResumeDocument>();
  private workHistory = new Map<string, WorkHistoryEntry[]>();
  private chunks = new Map<string, Chunk[]>();
  private skillExperience = new Map<string, SkillExperienceMap>();
  private jobProfiles = new Map<string, JobProfile>();
  private scoreResults = new Map<string, ScoreResult>();

  async saveResume(document: ResumeDocument): Promise<void> {
    this.resumes.set(document.id, structuredClone(document));
  }

  async getResume(resumeId: string): Promise<ResumeDocument | null> {
    const document = this.resumes.get(resumeId);
    return document ? structuredClone(document) : null;
  }

  async saveWorkHistory(resumeId: string, entries: readonly WorkHistoryEntry[]): Promise<void> {
    this.workHistory.set(resumeId, structuredClone([...entries]));
  }

  async getWorkHistory(resumeId: string): Promise<WorkHistoryEntry[]> {
    return structuredClone(this.workHistory.get(resumeId) ?? []);
  }

  async replaceChunks(resumeId: string, chunks: readonly Chunk[]): Promise<void> {
    const ordered = [...chunks].sort((a, b) => a.sequenceIndex - b.sequenceIndex);
    this.chunks.set(resumeId, structuredClone(ordered));
  }

  async getChunks(resumeId: string): Promise<Chunk[]> {
    return structuredClone(this.chunks.get(resumeId) ?? []);
  }

  async replaceSkillExperience(resumeId: string, experience: SkillExperienceMap): Promise<void> {
    this.skillExperience.set(resumeId, structuredClone(experience));
  }

  async getSkillExperience(resumeId: string): Promise<SkillExperienceMap> {
    return structuredClone(this.skillExperience.get(resumeId) ?? {});
  }

  async saveJobProfile(profile: JobProfile): Promise<void> {
    this.jobProfiles.set(profile.jobId, structuredClone(profile));
  }

  async getJobProfile(jobId: string): Promise<JobProfile | null> {
    const profile = this.jobProfiles.get(jobId);
    return profile ? structuredClone(profile) : null;
  }

  async saveScoreResult(resumeId: string, jobId: string, result: ScoreResult): Promise<void> {
    this.scoreResults.set(scoreKey(resumeId, jobId), structuredClone(result));
  }

  async getScoreResult(resumeId: string, jobId: string): Promise<ScoreResult | null> {
    const result = this.scoreResults.get(scoreKey(resumeId, jobId));
    return result ? structuredClone(result) : null;
  }
}
