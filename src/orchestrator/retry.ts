/**
 * Bounded exponential backoff for steps that have not signed anything yet.
 */

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  const maxDelayMs = options.maxDelayMs ?? 4000;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt >= options.attempts || !options.shouldRetry(error)) {
        throw error;
      }

      // 250ms, 500ms, 1s, ... capped
      const delay = Math.min(options.baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }

  throw lastError;
}
