import { setTimeout as sleep } from 'timers/promises';

// ---------------------------------------------------------------------------
// Retry helpers
//
// withRetry calls `fn` at most `attempts` times. Between attempts it waits
// baseDelayMs * 2^(attempt - 1), so with the defaults used for stream URL
// resolution (3 attempts, 500 ms) the pauses are 500 ms and 1 s. If every
// attempt fails, the last error is re-thrown.
//
// `shouldRetry` lets callers give up early on errors that will not go away
// (a deleted video will still be deleted a second later). An aborted signal
// stops the loop immediately and rejects with the abort reason.
// ---------------------------------------------------------------------------

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
}

export function backoffDelay(baseDelayMs: number, failures: number): number {
  return baseDelayMs * 2 ** Math.max(0, failures - 1);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { attempts, baseDelayMs, signal, shouldRetry } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (signal?.aborted) throw error;
      if (shouldRetry && !shouldRetry(error)) throw error;
      if (attempt < attempts) {
        await sleep(backoffDelay(baseDelayMs, attempt), undefined, { signal });
      }
    }
  }

  throw lastError;
}
