import { sleep } from './timeout';

interface RetryIdempotentInput<T> {
  run: () => Promise<T>;
  maxRetries: number;
  baseDelayMs: number;
  jitterMs: number;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function nextDelayMs(baseDelayMs: number, jitterMs: number, attempt: number): number {
  const expo = baseDelayMs * Math.pow(2, attempt);
  const jitter = jitterMs > 0 ? Math.floor(Math.random() * (jitterMs + 1)) : 0;
  return expo + jitter;
}

/**
 * Retries every failure with exponential backoff. Only for operations that
 * are safe to repeat, such as idempotent inserts.
 */
export async function retryIdempotent<T>(input: RetryIdempotentInput<T>): Promise<T> {
  for (let attempt = 0; attempt <= input.maxRetries; attempt += 1) {
    try {
      return await input.run();
    } catch (error) {
      if (attempt >= input.maxRetries) {
        throw error;
      }

      const delayMs = nextDelayMs(input.baseDelayMs, input.jitterMs, attempt);
      input.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs);
    }
  }

  throw new Error('retryIdempotent exhausted unexpectedly');
}
