import { isAbortError } from "../domain/errors.js";

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  backoff?: number;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, nextDelayMs: number) => void;
}

/**
 * Runs `task` up to `attempts` times with exponential backoff between failures.
 * Aborts are never retried.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const backoff = options.backoff ?? 2;
  let delay = Math.max(0, options.delayMs);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    options.signal?.throwIfAborted();
    try {
      return await task(attempt);
    } catch (error) {
      lastError = error;
      if (isAbortError(error) || options.signal?.aborted) {
        throw error;
      }
      if (attempt === attempts || (options.shouldRetry && !options.shouldRetry(error))) {
        throw error;
      }
      options.onRetry?.(error, attempt, delay);
      await sleep(delay, options.signal);
      delay *= backoff;
    }
  }

  throw lastError;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
