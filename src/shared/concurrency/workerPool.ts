/**
 * Bounded worker pool
 *
 * Runs independent units of work against rate-limited collaborators with a
 * fixed number of lanes. Results keep input order regardless of completion
 * order.
 */

export const DEFAULT_PARALLELISM = 4;
export const MAX_PARALLELISM = 16;

export interface WorkerPoolOptions {
  /** Stops launching new work once aborted */
  signal?: AbortSignal;
  /** Error to reject with on abort */
  abortError?: () => Error;
}

function defaultAbortError(): Error {
  const error = new Error('Operation aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Clamp the configured parallelism to [1, min(total, cap)]
 */
export function resolveParallelism(
  total: number,
  configured: number = DEFAULT_PARALLELISM,
  cap: number = MAX_PARALLELISM
): number {
  if (total <= 0 || !Number.isFinite(configured)) {
    return 1;
  }
  return Math.max(1, Math.min(total, Math.floor(configured), cap));
}

/**
 * Map items through an async worker with at most `limit` in flight.
 *
 * The first failure stops new work from starting; the pool waits for work
 * already in flight, then rejects with that failure.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  options: WorkerPoolOptions = {}
): Promise<R[]> {
  const { signal } = options;
  const makeAbortError = options.abortError ?? defaultAbortError;

  if (signal?.aborted) {
    throw makeAbortError();
  }

  const results = new Array<R>(items.length);
  const state: { next: number; failure?: { error: unknown } } = { next: 0 };

  const runLane = async (): Promise<void> => {
    while (!state.failure && state.next < items.length) {
      if (signal?.aborted) {
        state.failure = { error: makeAbortError() };
        return;
      }

      const index = state.next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        if (!state.failure) {
          state.failure = { error };
        }
      }
    }
  };

  const lanes = resolveParallelism(items.length, limit, Math.max(1, items.length));
  await Promise.all(Array.from({ length: lanes }, () => runLane()));

  if (state.failure) {
    throw state.failure.error;
  }
  return results;
}
