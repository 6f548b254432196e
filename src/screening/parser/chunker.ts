/**
 * Chunker
 *
 * Splits resume text into fixed-size overlapping word windows and associates
 * each window with the work-history entry it most likely describes.
 */

import type { Chunk, WorkHistoryEntry } from '../types';
import { ScreeningErrorFactory } from '../errors/types';
import { countOccurrences, splitWords } from './textUtils';
import { periodOrdinal } from './workHistory';

export interface ChunkOptions {
  chunkWords: number;
  overlapWords: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkWords: 250,
  overlapWords: 50
};

/**
 * Split text into overlapping chunks.
 *
 * Algorithm:
 * 1. Split on whitespace
 * 2. Emit windows of `chunkWords` words starting every
 *    `chunkWords - overlapWords` words; the last window may be shorter
 * 3. Stop once a window reaches the final word
 * 4. Tag each window with its best-matching job (see `associateJobContext`)
 *
 * @throws ScreeningError INVALID_ARGUMENT for non-string text, a non-array
 *   work history or inconsistent window sizes
 */
export function chunk(
  text: string,
  workHistory: readonly WorkHistoryEntry[],
  options: Partial<ChunkOptions> = {}
): Chunk[] {
  if (typeof text !== 'string') {
    throw ScreeningErrorFactory.invalidArgument('text', 'Resume text must be a string', typeof text);
  }
  if (!Array.isArray(workHistory)) {
    throw ScreeningErrorFactory.invalidArgument('workHistory', 'Work history must be an array', typeof workHistory);
  }

  const { chunkWords, overlapWords } = { ...DEFAULT_CHUNK_OPTIONS, ...options };
  validateOptions(chunkWords, overlapWords);

  const words = splitWords(text);
  if (words.length === 0) {
    return [];
  }

  const chunks: Chunk[] = [];
  let start = 0;
  let previousEnd = 0;

  for (;;) {
    const end = Math.min(start + chunkWords, words.length);
    const chunkText = words.slice(start, end).join(' ');

    chunks.push({
      text: chunkText,
      wordOverlapWithPredecessor: chunks.length === 0 ? 0 : previousEnd - start,
      jobContext: associateJobContext(chunkText, workHistory),
      sequenceIndex: chunks.length
    });

    if (end === words.length) {
      break;
    }
    previousEnd = end;
    start = end - overlapWords;
  }

  return chunks;
}

function validateOptions(chunkWords: number, overlapWords: number): void {
  if (!Number.isInteger(chunkWords) || chunkWords < 1) {
    throw ScreeningErrorFactory.invalidArgument('chunkWords', 'Must be a positive integer', chunkWords);
  }
  if (!Number.isInteger(overlapWords) || overlapWords < 0 || overlapWords >= chunkWords) {
    throw ScreeningErrorFactory.invalidArgument(
      'overlapWords',
      'Must be a non-negative integer smaller than chunkWords',
      overlapWords
    );
  }
}

/**
 * Keyword hits of one job in a chunk: company, title and each technology
 */
export function jobContextScore(chunkText: string, entry: WorkHistoryEntry): number {
  const keywords = [entry.company, entry.title, ...entry.technologies];
  return keywords.reduce((sum, keyword) => sum + countOccurrences(chunkText, keyword), 0);
}

/**
 * Pick the job with the most keyword hits.
 *
 * Ties go to the most recent start period (a missing start sorts oldest),
 * then to the earlier entry. No hits at all gives null.
 */
export function associateJobContext(
  chunkText: string,
  workHistory: readonly WorkHistoryEntry[]
): WorkHistoryEntry | null {
  let best: WorkHistoryEntry | null = null;
  let bestScore = 0;

  for (const entry of workHistory) {
    const score = jobContextScore(chunkText, entry);
    if (score === 0) continue;

    if (
      best === null ||
      score > bestScore ||
      (score === bestScore && periodOrdinal(entry.startPeriod, 'start') > periodOrdinal(best.startPeriod, 'start'))
    ) {
      best = entry;
      bestScore = score;
    }
  }

  return best;
}
