/**
 * Tests for the Evidence Retriever
 */

import { describe, it, expect } from 'vitest';
import {
  EvidenceRetriever,
  rerankCandidates,
  type EvidenceGrade,
  type EvidenceGrader,
  type GradeSubject,
  type RetrieverOptions
} from '../../screening/retrieval/evidenceRetriever';
import type {
  VectorIndex,
  VectorRecord,
  VectorSearchFilter,
  VectorSearchHit
} from '../../screening/retrieval/vectorIndex';
import type { EmbeddingProvider } from '../../screening/retrieval/embedding';
import { RetryPolicy } from '../../shared/errors/retryPolicy';
import { ScreeningErrorCode } from '../../screening/errors/types';
import { KeywordEmbedder, catchAsyncError, noSleep } from './helpers';

function hit(id: string, similarity: number, chunkText: string, resumeId: string = 'r1'): VectorSearchHit {
  const sequenceIndex = Number(id.split(':')[1] ?? 0);
  return { id, similarity, chunkText, metadata: { resumeId, sequenceIndex } };
}

class StubIndex implements VectorIndex {
  readonly searches: Array<{ filter: VectorSearchFilter; k: number }> = [];
  private readonly hits: VectorSearchHit[];

  constructor(hits: VectorSearchHit[]) {
    this.hits = hits;
  }

  async search(_vector: readonly number[], filter: VectorSearchFilter, k: number): Promise<VectorSearchHit[]> {
    this.searches.push({ filter, k });
    return this.hits;
  }

  async upsert(_records: readonly VectorRecord[]): Promise<void> {}

  async deleteByResume(_resumeId: string): Promise<void> {}
}

class StubGrader implements EvidenceGrader {
  readonly calls: Array<{ subject: GradeSubject; chunkText: string }> = [];
  private readonly result: EvidenceGrade;

  constructor(result: Partial<EvidenceGrade> = {}) {
    this.result = {
      hasSkill: true,
      strength: 'strong',
      quote: 'Wrote Python services',
      reasoning: 'Names the skill in a production role',
      confidence: 0.9,
      ...result
    };
  }

  async grade(subject: GradeSubject, chunkText: string): Promise<EvidenceGrade> {
    this.calls.push({ subject, chunkText });
    return this.result;
  }
}

function build(
  hits: VectorSearchHit[],
  grader: StubGrader = new StubGrader(),
  embedder: EmbeddingProvider = new KeywordEmbedder(['python']),
  options: Partial<RetrieverOptions> = {}
): { retriever: EvidenceRetriever; index: StubIndex; grader: StubGrader } {
  const index = new StubIndex(hits);
  const retriever = new EvidenceRetriever({
    embedder,
    index,
    grader,
    retryPolicy: new RetryPolicy({ maxAttempts: 2, initialDelayMs: 1, backoffMultiplier: 1, sleep: noSleep })
  }, options);
  return { retriever, index, grader };
}

describe('rerankCandidates', () => {
  it('boosts chunks that name the skill', () => {
    const ranked = rerankCandidates('Python', [
      hit('r1:0', 0.8, 'Built dashboards in React'),
      hit('r1:1', 0.75, 'Wrote python services')
    ]);

    expect(ranked.map(c => c.chunk.id)).toEqual(['r1:1', 'r1:0']);
    expect(ranked[0].boostedScore).toBeCloseTo(1.125, 10);
    expect(ranked[0].keywordHit).toBe(true);
    expect(ranked[1].boostedScore).toBe(0.8);
  });

  it('keeps the original order on ties', () => {
    const ranked = rerankCandidates('Go', [
      hit('r1:0', 0.5, 'Led a team'),
      hit('r1:1', 0.5, 'Ran on-call')
    ]);
    expect(ranked.map(c => c.originalRank)).toEqual([0, 1]);
  });
});

describe('EvidenceRetriever', () => {
  it('builds the query from the template', async () => {
    const embedder = new KeywordEmbedder(['python']);
    const { retriever } = build([], new StubGrader(), embedder);

    await retriever.retrieve('Python', 'r1');

    expect(embedder.inputs).toEqual(['Experience with Python skill']);
  });

  it('returns the no-evidence sentinel when the resume has no chunks', async () => {
    const { retriever, grader } = build([]);

    const result = await retriever.retrieve('Python', 'r1');

    expect(result).toEqual({
      chunk: null,
      relevanceScore: 0,
      similarity: 0,
      matched: false,
      strength: 'none',
      quote: '',
      reasoning: 'No chunks found for this resume'
    });
    expect(grader.calls).toHaveLength(0);
  });

  it('grades the keyword-boosted chunk over a closer vector hit', async () => {
    const { retriever, grader } = build([
      hit('r1:0', 0.8, 'Built dashboards in React'),
      hit('r1:1', 0.75, 'Wrote Python services')
    ]);

    const result = await retriever.retrieve('Python', 'r1', { minYears: 3 });

    expect(result.chunk?.id).toBe('r1:1');
    expect(result.relevanceScore).toBeCloseTo(1.125, 10);
    expect(result.similarity).toBe(0.75);
    expect(result.matched).toBe(true);
    expect(result.strength).toBe('strong');
    expect(grader.calls).toEqual([
      { subject: { skillName: 'Python', minYears: 3 }, chunkText: 'Wrote Python services' }
    ]);
  });

  it('searches only the requested resume and drops stray hits', async () => {
    const { retriever, index } = build([
      hit('r2:0', 0.95, 'Wrote Python services', 'r2'),
      hit('r1:0', 0.6, 'Automated Python tests')
    ]);

    const result = await retriever.retrieve('Python', 'r1', { k: 5 });

    expect(index.searches).toEqual([{ filter: { resumeId: 'r1' }, k: 5 }]);
    expect(result.chunk?.resumeId).toBe('r1');
  });

  it('does not grade a best chunk below the evidence threshold', async () => {
    const { retriever, grader } = build([hit('r1:0', 0.03, 'Hobbies: sailing')]);

    const result = await retriever.retrieve('Python', 'r1');

    expect(result.matched).toBe(false);
    expect(result.chunk).toBeNull();
    expect(result.similarity).toBe(0.03);
    expect(grader.calls).toHaveLength(0);
  });

  it('does not grade a blank chunk', async () => {
    const { retriever, grader } = build([hit('r1:0', 0.9, '   ')]);

    const result = await retriever.retrieve('Python', 'r1');

    expect(result.strength).toBe('none');
    expect(grader.calls).toHaveLength(0);
  });

  it('treats a grade without the skill as unmatched', async () => {
    const { retriever } = build(
      [hit('r1:0', 0.7, 'Mentioned Python once')],
      new StubGrader({ hasSkill: false, strength: 'weak' })
    );

    const result = await retriever.retrieve('Python', 'r1');

    expect(result.matched).toBe(false);
    expect(result.strength).toBe('none');
    expect(result.chunk?.id).toBe('r1:0');
  });

  it('retries a failing embedder and reports EMBEDDING_FAILED', async () => {
    let calls = 0;
    const embedder: EmbeddingProvider = {
      embed: async () => {
        calls++;
        throw new Error('socket hang up');
      }
    };
    const { retriever } = build([], new StubGrader(), embedder);

    const error = await catchAsyncError(retriever.retrieve('Python', 'r1'));

    expect(error).toMatchObject({ code: ScreeningErrorCode.EMBEDDING_FAILED, technicalDetails: 'socket hang up' });
    expect(calls).toBe(2);
  });

  it('gives up on an embedder that never answers', async () => {
    let calls = 0;
    const embedder: EmbeddingProvider = {
      embed: () => {
        calls++;
        return new Promise<number[]>(() => {});
      }
    };
    const { retriever, index } = build([], new StubGrader(), embedder, { timeoutMs: 10 });

    const error = await catchAsyncError(retriever.retrieve('Python', 'r1'));

    expect(error).toMatchObject({
      code: ScreeningErrorCode.EMBEDDING_FAILED,
      technicalDetails: 'No response within 10ms'
    });
    expect(calls).toBe(2);
    expect(index.searches).toEqual([]);
  });

  it('gives up on an index search that never answers', async () => {
    const { retriever, index } = build([], new StubGrader(), new KeywordEmbedder(['python']), { timeoutMs: 10 });
    index.search = () => new Promise<VectorSearchHit[]>(() => {});

    const error = await catchAsyncError(retriever.retrieve('Python', 'r1'));

    expect(error).toMatchObject({
      code: ScreeningErrorCode.VECTOR_INDEX_FAILED,
      technicalDetails: 'No response within 10ms',
      context: { operation: 'search' }
    });
  });

  it('carries the grade\'s years reading onto the match', async () => {
    const { retriever } = build(
      [hit('r1:0', 0.7, 'Five years of Python services')],
      new StubGrader({ yearsSupported: 5, meetsYears: true })
    );

    const result = await retriever.retrieve('Python', 'r1', { minYears: 3 });

    expect(result.yearsSupported).toBe(5);
    expect(result.meetsYears).toBe(true);
  });

  it('rejects bad arguments', async () => {
    const { retriever } = build([]);

    const calls = [
      () => retriever.retrieve('', 'r1'),
      () => retriever.retrieve('Python', '  '),
      () => retriever.retrieve('Python', 'r1', { k: 0 }),
      () => retriever.retrieve('Python', 'r1', { minYears: -1 })
    ];
    for (const call of calls) {
      expect(await catchAsyncError(call())).toMatchObject({ code: ScreeningErrorCode.INVALID_ARGUMENT });
    }
  });
});
