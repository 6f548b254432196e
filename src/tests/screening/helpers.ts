/**
 * Test helpers: in-process stand-ins for the oracle, the embedder and the
 * vector index, plus error capture.
 */

import type { OracleInvokeOptions, TextOracle } from '../../shared/llm/types';
import type { EmbeddingProvider } from '../../screening/retrieval/embedding';
import type { EvidenceMatch, JobRequirement, SkillExperience } from '../../screening/types';

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

export async function catchAsyncError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

export const noSleep = (): Promise<void> => Promise.resolve();

export interface OracleCall {
  prompt: string;
  maxOutputTokens: number;
  timeoutMs?: number;
}

/**
 * Scripted oracle. The handler returns the response text, or an Error to throw.
 */
export class FakeOracle implements TextOracle {
  readonly calls: OracleCall[] = [];
  private readonly handler: (prompt: string, callIndex: number) => string | Error;

  constructor(handler: (prompt: string, callIndex: number) => string | Error) {
    this.handler = handler;
  }

  async invoke(prompt: string, maxOutputTokens: number, options: OracleInvokeOptions = {}): Promise<string> {
    const index = this.calls.length;
    this.calls.push({ prompt, maxOutputTokens, timeoutMs: options.timeoutMs });
    const result = this.handler(prompt, index);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

/**
 * Oracle that replies with the given texts in order, repeating the last one
 */
export function sequenceOracle(...responses: Array<string | Error>): FakeOracle {
  return new FakeOracle((_prompt, index) => responses[Math.min(index, responses.length - 1)]);
}

/**
 * Bag-of-words embedder over a fixed vocabulary, with a constant bias
 * component so no vector is all zeros
 */
export class KeywordEmbedder implements EmbeddingProvider {
  readonly inputs: string[] = [];
  private readonly vocabulary: string[];

  constructor(vocabulary: string[]) {
    this.vocabulary = vocabulary.map(word => word.toLowerCase());
  }

  async embed(text: string): Promise<number[]> {
    this.inputs.push(text);
    const lower = text.toLowerCase();
    return [0.1, ...this.vocabulary.map(word => (lower.includes(word) ? 1 : 0))];
  }
}

export function requirement(
  skillName: string,
  overrides: Partial<JobRequirement> = {}
): JobRequirement {
  return {
    skillName,
    importance: 'critical',
    minYears: 0,
    nameVariants: [skillName],
    ...overrides
  };
}

export function experience(skillName: string, totalYears: number): SkillExperience {
  return {
    skillName,
    totalYears,
    jobBreakdown: totalYears > 0
      ? [{ company: 'Acme', durationMonths: totalYears * 12, evidenceText: `Used ${skillName}` }]
      : []
  };
}

export function evidence(overrides: Partial<EvidenceMatch> = {}): EvidenceMatch {
  return {
    chunk: { id: 'r1:0', resumeId: 'r1', sequenceIndex: 0, text: 'chunk text' },
    relevanceScore: 0.9,
    similarity: 0.9,
    matched: true,
    strength: 'strong',
    quote: '',
    reasoning: '',
    ...overrides
  };
}
