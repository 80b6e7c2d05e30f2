export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

interface WithTimeoutInput<T> {
  timeoutMs: number;
  label: string;
  /** Receives a signal that aborts when the deadline passes. */
  run: (signal: AbortSignal) => Promise<T>;
}

export async function withTimeout<T>(input: WithTimeoutInput<T>): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const controller = new AbortController();

  try {
    return await Promise.race([
      input.run(controller.signal),
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          const error = new TimeoutError(input.label, input.timeoutMs);
          controller.abort(error);
          reject(error);
        }, input.timeoutMs);
      })
    ]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
