/**
 * Vector Index
 *
 * Contract for the nearest-neighbour index that holds chunk embeddings, plus
 * an exact in-process implementation.
 */

import { ScreeningErrorFactory } from '../errors/types';

export type DistanceMetric = 'cosine' | 'euclidean';

export interface VectorRecord {
  id: string;
  vector: readonly number[];
  resumeId: string;
  sequenceIndex: number;
  text: string;
}

export interface VectorSearchHit {
  id: string;
  /** Higher is closer */
  similarity: number;
  chunkText: string;
  metadata: {
    resumeId: string;
    sequenceIndex: number;
  };
}

export interface VectorSearchFilter {
  resumeId: string;
}

/**
 * Approximate nearest-neighbour index. Results are ordered best-effort by
 * similarity; callers must not rely on stricter ordering.
 */
export interface VectorIndex {
  search(vector: readonly number[], filter: VectorSearchFilter, k: number): Promise<VectorSearchHit[]>;
  upsert(records: readonly VectorRecord[]): Promise<void>;
  /** Remove the resume's records, sparing any whose id is in `keepIds` */
  deleteByResume(resumeId: string, keepIds?: ReadonlySet<string>): Promise<void>;
}

/**
 * Convert an index distance into a similarity where higher is better.
 * Cosine distance d gives 1 - d; euclidean distance d gives 1 / (1 + d).
 */
export function toSimilarity(distance: number, metric: DistanceMetric): number {
  if (metric === 'cosine') {
    return 1 - distance;
  }
  return 1 / (1 + distance);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Exact cosine search over records held in memory
 */
export class InMemoryVectorIndex implements VectorIndex {
  private records: Map<string, VectorRecord> = new Map();

  async search(vector: readonly number[], filter: VectorSearchFilter, k: number): Promise<VectorSearchHit[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw ScreeningErrorFactory.invalidArgument('k', 'Must be a positive integer', k);
    }

    const hits: VectorSearchHit[] = [];
    for (const record of this.records.values()) {
      if (record.resumeId !== filter.resumeId) continue;

      if (record.vector.length !== vector.length) {
        throw ScreeningErrorFactory.vectorIndexFailed(
          'search',
          `Dimension mismatch: query has ${vector.length}, record ${record.id} has ${record.vector.length}`
        );
      }

      const distance = 1 - cosineSimilarity(vector, record.vector);
      hits.push({
        id: record.id,
        similarity: toSimilarity(distance, 'cosine'),
        chunkText: record.text,
        metadata: {
          resumeId: record.resumeId,
          sequenceIndex: record.sequenceIndex
        }
      });
    }

    return hits
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, k);
  }

  async upsert(records: readonly VectorRecord[]): Promise<void> {
    for (const record of records) {
      this.records.set(record.id, { ...record, vector: [...record.vector] });
    }
  }

  async deleteByResume(resumeId: string, keepIds?: ReadonlySet<string>): Promise<void> {
    for (const [id, record] of this.records) {
      if (record.resumeId === resumeId && !keepIds?.has(id)) {
        this.records.delete(id);
      }
    }
  }

  get size(): number {
    return this.records.size;
  }
}
