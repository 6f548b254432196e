/**
 * Tests for the in-memory vector index
 */

import { describe, it, expect } from 'vitest';
import { InMemoryVectorIndex, cosineSimilarity, toSimilarity } from '../../screening/retrieval/vectorIndex';
import { ScreeningErrorCode } from '../../screening/errors/types';
import { catchAsyncError } from './helpers';

describe('toSimilarity', () => {
  it('maps distances so that closer is higher', () => {
    expect(toSimilarity(0.25, 'cosine')).toBe(0.75);
    expect(toSimilarity(1, 'euclidean')).toBe(0.5);
    expect(toSimilarity(0, 'euclidean')).toBe(1);
  });
});

describe('cosineSimilarity', () => {
  it('handles parallel, orthogonal and degenerate vectors', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1], [1, 2])).toBe(0);
  });
});

describe('InMemoryVectorIndex', () => {
  async function seeded(): Promise<InMemoryVectorIndex> {
    const index = new InMemoryVectorIndex();
    await index.upsert([
      { id: 'r1:0', vector: [1, 0], resumeId: 'r1', sequenceIndex: 0, text: 'first' },
      { id: 'r1:1', vector: [0, 1], resumeId: 'r1', sequenceIndex: 1, text: 'second' },
      { id: 'r2:0', vector: [1, 0], resumeId: 'r2', sequenceIndex: 0, text: 'other resume' }
    ]);
    return index;
  }

  it('returns hits for one resume, closest first', async () => {
    const index = await seeded();

    const hits = await index.search([0, 1], { resumeId: 'r1' }, 10);

    expect(hits.map(h => h.id)).toEqual(['r1:1', 'r1:0']);
    expect(hits[0].similarity).toBeCloseTo(1, 10);
    expect(hits[0].metadata).toEqual({ resumeId: 'r1', sequenceIndex: 1 });
  });

  it('limits results to k', async () => {
    const index = await seeded();
    expect(await index.search([1, 0], { resumeId: 'r1' }, 1)).toHaveLength(1);
  });

  it('replaces a record with the same id', async () => {
    const index = await seeded();
    await index.upsert([{ id: 'r1:0', vector: [0, 1], resumeId: 'r1', sequenceIndex: 0, text: 'rewritten' }]);

    const hits = await index.search([0, 1], { resumeId: 'r1' }, 10);

    expect(index.size).toBe(3);
    expect(hits.find(h => h.id === 'r1:0')?.chunkText).toBe('rewritten');
  });

  it('deletes every record of a resume', async () => {
    const index = await seeded();
    await index.deleteByResume('r1');

    expect(index.size).toBe(1);
    expect(await index.search([1, 0], { resumeId: 'r1' }, 10)).toEqual([]);
  });

  it('spares the kept ids when deleting a resume', async () => {
    const index = await seeded();
    await index.deleteByResume('r1', new Set(['r1:1']));

    expect(index.size).toBe(2);
    expect((await index.search([0, 1], { resumeId: 'r1' }, 10)).map(h => h.id)).toEqual(['r1:1']);
  });

  it('rejects a query of the wrong dimension', async () => {
    const index = await seeded();
    const error = await catchAsyncError(index.search([1, 0, 0], { resumeId: 'r1' }, 10));
    expect(error).toMatchObject({ code: ScreeningErrorCode.VECTOR_INDEX_FAILED });
  });

  it('rejects a non-positive k', async () => {
    const index = await seeded();
    const error = await catchAsyncError(index.search([1, 0], { resumeId: 'r1' }, 0));
    expect(error).toMatchObject({ code: ScreeningErrorCode.INVALID_ARGUMENT });
  });
});
