import { describe, expect, it, vi } from 'vitest';
import { TimeoutError, cleanCompletionText, estimateTokens, retryIdempotent, withTimeout } from '../src/index';

describe('withTimeout', () => {
  it('resolves when the work finishes first', async () => {
    const value = await withTimeout({ timeoutMs: 100, label: 'fast', run: async () => 'done' });

    expect(value).toBe('done');
  });

  it('rejects with TimeoutError and aborts the signal handed to the work', async () => {
    let seen: AbortSignal | undefined;

    const pending = withTimeout({
      timeoutMs: 10,
      label: 'slow',
      run: (signal) => {
        seen = signal;
        return new Promise<string>(() => undefined);
      }
    });

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow('slow timed out after 10ms');
    expect(seen?.aborted).toBe(true);
  });
});

describe('retryIdempotent', () => {
  it('retries failures and reports each retry', async () => {
    const run = vi.fn()
      .mockRejectedValueOnce(new Error('database is locked'))
      .mockResolvedValueOnce(42);
    const onRetry = vi.fn();

    const value = await retryIdempotent({ run, maxRetries: 2, baseDelayMs: 1, jitterMs: 0, onRetry });

    expect(value).toBe(42);
    expect(run).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 1);
  });

  it('gives up after maxRetries', async () => {
    const run = vi.fn().mockRejectedValue(new Error('boom'));

    await expect(retryIdempotent({
      run,
      maxRetries: 2,
      baseDelayMs: 1,
      jitterMs: 0
    })).rejects.toThrow('boom');
    expect(run).toHaveBeenCalledTimes(3);
  });
});

describe('text helpers', () => {
  it('estimates tokens by whitespace word count', () => {
    expect(estimateTokens('  one two\nthree  ')).toBe(3);
    expect(estimateTokens('   ')).toBe(0);
  });

  it('keeps only the text after the last Assistant: marker', () => {
    expect(cleanCompletionText('User: hi\nAssistant:  Hello there ')).toBe('Hello there');
    expect(cleanCompletionText('  plain answer ')).toBe('plain answer');
  });
});
