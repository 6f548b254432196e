/**
 * SQLite Screening Store
 *
 * better-sqlite3 implementation of ScreeningStore. Records are stored as JSON
 * documents keyed by resume and job id, and validated on the way out.
 *
 * Schema:
 *   resumes(id, text, ingested_at, profile)
 *   work_history(resume_id, position, data)
 *   chunks(resume_id, sequence_index, data)
 *   skill_experience(resume_id, skill_name, data)
 *   job_profiles(job_id, data, updated_at)
 *   score_results(resume_id, job_id, data, scored_at)
 */

import Database from 'better-sqlite3';
import type { z } from 'zod';
import type {
  Chunk,
  JobProfile,
  ResumeDocument,
  ScoreResult,
  SkillExperience,
  SkillExperienceMap,
  WorkHistoryEntry
} from '../types';
import type { ScreeningStore } from './interface';
import { ScreeningErrorFactory, isScreeningError } from '../errors/types';
import {
  ChunkSchema,
  JobProfileSchema,
  ResumeProfileSchema,
  ScoreResultSchema,
  SkillExperienceSchema,
  WorkHistoryEntrySchema
} from '../validation/schemas';
import { validateWith } from '../../shared/validation/validator';
import { loggers } from '../../shared/logger';

// ============================================================================
// Types
// ============================================================================

export interface SqliteScreeningStoreOptions {
  /**
   * Path to the SQLite database file
   * Use ':memory:' for an in-memory database (useful for testing)
   */
  databasePath: string;

  /**
   * Whether to enable WAL mode
   * Default: true
   */
  walMode?: boolean;
}

interface ResumeRow {
  id: string;
  text: string;
  ingested_at: string;
  profile: string | null;
}

interface DataRow {
  data: string;
}

interface SkillRow {
  skill_name: string;
  data: string;
}

// ============================================================================
// Schema Migration
// ============================================================================

const SCHEMA_VERSION = 1;

const MIGRATIONS: Record<number, string[]> = {
  1: [
    `CREATE TABLE IF NOT EXISTS resumes (
      id TEXT PRIMARY KEY,
      text TEXT NOT NULL,
      ingested_at TEXT NOT NULL,
      profile TEXT
    )`,
    `CREATE TABLE IF NOT EXISTS work_history (
      resume_id TEXT NOT NULL,
      position INTEGER NOT NULL,
      data TEXT NOT NULL,
      PRIMARY KEY (resume_id, position)
    )`,
    `CREATE TABLE IF NOT EXISTS chunks (
      resume_id TEXT NOT NULL,
      sequence_index INTEGER NOT NULL,
      data TEXT NOT NULL,
      PRIMARY KEY (resume_id, sequence_index)
    )`,
    `CREATE TABLE IF NOT EXISTS skill_experience (
      resume_id TEXT NOT NULL,
      skill_name TEXT NOT NULL,
      data TEXT NOT NULL,
      PRIMARY KEY (resume_id, skill_name)
    )`,
    `CREATE TABLE IF NOT EXISTS job_profiles (
      job_id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
    )`,
    `CREATE TABLE IF NOT EXISTS score_results (
      resume_id TEXT NOT NULL,
      job_id TEXT NOT NULL,
      data TEXT NOT NULL,
      scored_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      PRIMARY KEY (resume_id, job_id)
    )`
  ]
};

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse and validate a stored JSON column
 */
function decode<S extends z.ZodTypeAny>(schema: S, json: string, record: string): z.output<S> {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    throw ScreeningErrorFactory.storage('read', `Corrupt ${record} record: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = validateWith(schema, value);
  if (!result.isValid) {
    const detail = result.errors.map(e => `${e.field}: ${e.message}`).join('; ');
    throw ScreeningErrorFactory.storage('read', `Invalid ${record} record: ${detail}`);
  }
  return result.data;
}

// ============================================================================
// SQLite Store Implementation
// ============================================================================

export class SqliteScreeningStore implements ScreeningStore {
  private db: Database.Database;

  constructor(options: SqliteScreeningStoreOptions) {
    this.db = this.guard('open', () => {
      const db = new Database(options.databasePath);
      if (options.walMode !== false) {
        db.pragma('journal_mode = WAL');
      }
      return db;
    });

    this.guard('migrate', () => this.runMigrations());
  }

  /**
   * Run database migrations
   */
  private runMigrations(): void {
    this.db.exec('CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY)');

    const row = this.db
      .prepare<[], { version: number }>('SELECT version FROM schema_version ORDER BY version DESC LIMIT 1')
      .get();
    const currentVersion = row?.version ?? 0;

    for (let v = currentVersion + 1; v <= SCHEMA_VERSION; v++) {
      const statements = MIGRATIONS[v];
      if (!statements) continue;

      const migrate = this.db.transaction(() => {
        for (const sql of statements) {
          this.db.exec(sql);
        }
        this.db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(v);
      });
      migrate();
      loggers.db.info({ version: v }, 'Migrated screening store schema');
    }
  }

  /**
   * Run a database operation, mapping failures to STORAGE_ERROR
   */
  private guard<T>(operation: string, run: () => T): T {
    try {
      return run();
    } catch (error) {
      if (isScreeningError(error)) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      loggers.db.error({ operation, reason }, 'Screening store operation failed');
      throw ScreeningErrorFactory.storage(operation, reason);
    }
  }

  async saveResume(document: ResumeDocument): Promise<void> {
    this.guard('saveResume', () => {
      this.db.prepare(`
        INSERT INTO resumes (id, text, ingested_at, profile) VALUES (?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          text = excluded.text,
          ingested_at = excluded.ingested_at,
          profile = excluded.profile
      `).run(
        document.id,
        document.text,
        document.ingestedAt,
        document.profile ? JSON.stringify(document.profile) : null
      );
    });
  }

  async getResume(resumeId: string): Promise<ResumeDocument | null> {
    return this.guard('getResume', () => {
      const row = this.db
        .prepare<[string], ResumeRow>('SELECT id, text, ingested_at, profile FROM resumes WHERE id = ?')
        .get(resumeId);
      if (!row) {
        return null;
      }

      const document: ResumeDocument = { id: row.id, text: row.text, ingestedAt: row.ingested_at };
      return row.profile === null
        ? document
        : { ...document, profile: decode(ResumeProfileSchema, row.profile, 'resume profile') };
    });
  }

  async saveWorkHistory(resumeId: string, entries: readonly WorkHistoryEntry[]): Promise<void> {
    this.guard('saveWorkHistory', () => {
      const remove = this.db.prepare('DELETE FROM work_history WHERE resume_id = ?');
      const insert = this.db.prepare('INSERT INTO work_history (resume_id, position, data) VALUES (?, ?, ?)');

      this.db.transaction(() => {
        remove.run(resumeId);
        entries.forEach((entry, position) => insert.run(resumeId, position, JSON.stringify(entry)));
      })();
    });
  }

  async getWorkHistory(resumeId: string): Promise<WorkHistoryEntry[]> {
    return this.guard('getWorkHistory', () =>
      this.db
        .prepare<[string], DataRow>('SELECT data FROM work_history WHERE resume_id = ? ORDER BY position')
        .all(resumeId)
        .map(row => decode(WorkHistoryEntrySchema, row.data, 'work history'))
    );
  }

  async replaceChunks(resumeId: string, chunks: readonly Chunk[]): Promise<void> {
    this.guard('replaceChunks', () => {
      const remove = this.db.prepare('DELETE FROM chunks WHERE resume_id = ?');
      const insert = this.db.prepare('INSERT INTO chunks (resume_id, sequence_index, data) VALUES (?, ?, ?)');

      this.db.transaction(() => {
        remove.run(resumeId);
        for (const chunk of chunks) {
          insert.run(resumeId, chunk.sequenceIndex, JSON.stringify(chunk));
        }
      })();
    });
  }

  async getChunks(resumeId: string): Promise<Chunk[]> {
    return this.guard('getChunks', () =>
      this.db
        .prepare<[string], DataRow>('SELECT data FROM chunks WHERE resume_id = ? ORDER BY sequence_index')
        .all(resumeId)
        .map(row => decode(ChunkSchema, row.data, 'chunk'))
    );
  }

  async replaceSkillExperience(resumeId: string, experience: SkillExperienceMap): Promise<void> {
    this.guard('replaceSkillExperience', () => {
      const remove = this.db.prepare('DELETE FROM skill_experience WHERE resume_id = ?');
      const insert = this.db.prepare('INSERT INTO skill_experience (resume_id, skill_name, data) VALUES (?, ?, ?)');

      this.db.transaction(() => {
        remove.run(resumeId);
        for (const [skillName, value] of Object.entries(experience)) {
          insert.run(resumeId, skillName, JSON.stringify(value));
        }
      })();
    });
  }

  async getSkillExperience(resumeId: string): Promise<SkillExperienceMap> {
    return this.guard('getSkillExperience', () => {
      const rows = this.db
        .prepare<[string], SkillRow>('SELECT skill_name, data FROM skill_experience WHERE resume_id = ? ORDER BY rowid')
        .all(resumeId);

      const map: Record<string, SkillExperience> = {};
      for (const row of rows) {
        map[row.skill_name] = decode(SkillExperienceSchema, row.data, 'skill experience');
      }
      return map;
    });
  }

  async saveJobProfile(profile: JobProfile): Promise<void> {
    this.guard('saveJobProfile', () => {
      this.db.prepare(`
        INSERT INTO job_profiles (job_id, data, updated_at) VALUES (?, ?, CURRENT_TIMESTAMP)
        ON CONFLICT(job_id) DO UPDATE SET
          data = excluded.data,
          updated_at = CURRENT_TIMESTAMP
      `).run(profile.jobId, JSON.stringify(profile));
    });
  }

  async getJobProfile(jobId: string): Promise<JobProfile | null> {
    return this.guard('getJobProfile', () => {
      const row = this.db
        .prepare<[string], DataRow>('SELECT data FROM job_profiles WHERE job_id = ?')
        .get(jobId);
      return row ? decode(JobProfileSchema, row.data, 'job profile') : null;
    });
  }

  async saveScoreResult(resumeId: string, jobId: string, result: ScoreResult): Promise<void> {
    this.guard('saveScoreResult', () => {
      this.db.prepare(`
        INSERT INTO score_results (resume_id, job_id, data, scored_at) VALUES (?, ?, ?, CURRENT_TIMESTAMP)
        ON CONFLICT(resume_id, job_id) DO UPDATE SET
          data = excluded.data,
          scored_at = CURRENT_TIMESTAMP
      `).run(resumeId, jobId, JSON.stringify(result));
    });
  }

  async getScoreResult(resumeId: string, jobId: string): Promise<ScoreResult | null> {
    return this.guard('getScoreResult', () => {
      const row = this.db
        .prepare<[string, string], DataRow>('SELECT data FROM score_results WHERE resume_id = ? AND job_id = ?')
        .get(resumeId, jobId);
      return row ? decode(ScoreResultSchema, row.data, 'score result') : null;
    });
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }
}
