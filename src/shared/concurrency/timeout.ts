/**
 * Call Timeouts
 *
 * Bounds a collaborator call that may ignore the timeout it was given.
 */

/**
 * Race the promise against a timer. The timer is cleared once either side
 * settles.
 *
 * @param onTimeout - Error to reject with when the timer wins
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => reject(onTimeout()), timeoutMs);
      })
    ]);
  } finally {
    clearTimeout(timer);
  }
}
