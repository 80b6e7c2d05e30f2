export type DispatchErrorCode =
  | 'ValidationError'
  | 'ServiceUnavailable'
  | 'SessionBusy'
  | 'Overloaded'
  | 'InferenceTimeout'
  | 'InferenceError'
  | 'Cancelled';

/**
 * Base class for every failure the dispatcher reports to its caller.
 * `retryable` tells the caller whether trying again later can succeed;
 * the gateway itself never retries a request.
 */
export abstract class DispatchError extends Error {
  public abstract readonly code: DispatchErrorCode;
  public abstract readonly retryable: boolean;

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends DispatchError {
  public readonly code = 'ValidationError' as const;
  public readonly retryable = false;
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(`Invalid request: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ServiceUnavailableError extends DispatchError {
  public readonly code = 'ServiceUnavailable' as const;
  public readonly retryable = true;

  public constructor(public readonly health: string) {
    super(`Model server not available (health: ${health})`);
  }
}

export class SessionBusyError extends DispatchError {
  public readonly code = 'SessionBusy' as const;
  public readonly retryable = true;

  public constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} already has a request in flight`);
  }
}

export class OverloadedError extends DispatchError {
  public readonly code = 'Overloaded' as const;
  public readonly retryable = true;

  public constructor(public readonly waitedMs: number) {
    super(`No inference slot available after ${waitedMs}ms`);
  }
}

export class InferenceTimeoutError extends DispatchError {
  public readonly code = 'InferenceTimeout' as const;
  public readonly retryable = true;

  public constructor(public readonly timeoutMs: number) {
    super(`Inference timed out after ${timeoutMs}ms`);
  }
}

export class InferenceError extends DispatchError {
  public readonly code = 'InferenceError' as const;
  public readonly retryable = true;

  public constructor(cause: unknown) {
    super(`Model error: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class CancelledError extends DispatchError {
  public readonly code = 'Cancelled' as const;
  public readonly retryable = false;

  public constructor(stage: 'queue' | 'inference') {
    super(`Request cancelled by caller while waiting for ${stage === 'queue' ? 'a slot' : 'inference'}`);
  }
}

export class StartupTimeoutError extends Error {
  public constructor(public readonly timeoutMs: number) {
    super(`Model server did not become healthy within ${timeoutMs}ms`);
    this.name = 'StartupTimeoutError';
  }
}

export class ProcessLaunchError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProcessLaunchError';
  }
}

export class UnrecoverableProcessError extends Error {
  public constructor(public readonly attempts: number) {
    super(`Model server could not be restarted after ${attempts} attempts; operator intervention required`);
    this.name = 'UnrecoverableProcessError';
  }
}

export function isDispatchError(error: unknown): error is DispatchError {
  return error instanceof DispatchError;
}
