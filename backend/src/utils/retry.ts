import { isTransientDbError } from './db-errors';

export type RetryOptions = {
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Multiplier applied to the delay after each failed attempt; 1 keeps it constant. */
  backoffFactor?: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number) => void;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = options.attempts ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 200;
  const maxDelayMs = options.maxDelayMs ?? 2000;
  const backoffFactor = options.backoffFactor ?? 2;
  const isRetryable = options.isRetryable ?? isTransientDbError;

  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (!isRetryable(err) || attempt === attempts) {
        break;
      }
      options.onRetry?.(err, attempt);
      const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }

  throw lastError;
}
