/**
 * AbortController-based timeout for the embedding call, the one step in
 * capture and recall whose latency we do not control.
 */

import { EmbeddingTimeoutError, MAX_TIMER_MS, ValidationError } from '@mnemo/shared';

/**
 * Run fn with an AbortSignal that fires after timeoutMs.
 * Rejects with EmbeddingTimeoutError if fn has not settled by then.
 * The timer is cleared once either side settles. A timeoutMs outside
 * (0, MAX_TIMER_MS] rejects with ValidationError before fn is called.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  if (!(timeoutMs > 0) || timeoutMs > MAX_TIMER_MS) {
    throw new ValidationError('timeoutMs', `must be > 0 and <= ${MAX_TIMER_MS}, got ${timeoutMs}`);
  }
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // reject before aborting so the timeout wins the race
        reject(new EmbeddingTimeoutError(timeoutMs));
        controller.abort();
      }, timeoutMs);
    });

    return await Promise.race([fn(controller.signal), timeoutPromise]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
