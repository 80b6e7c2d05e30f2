import { randomUUID } from 'node:crypto';
import {
  CancelledError,
  InferenceError,
  InferenceTimeoutError,
  ServiceUnavailableError,
  SessionBusyError,
  TimeoutError,
  ValidationError,
  buildContextWindow,
  cleanCompletionText,
  createTurn,
  estimateTokens,
  isAcceptingWork,
  isDispatchError,
  validateInferenceRequest,
  withTimeout,
  type ConversationRecord,
  type DispatchConfig,
  type DispatchError,
  type GenerateInput,
  type GenerateOutput,
  type InferenceClientPort,
  type InferenceRequest,
  type InferenceResult,
  type InferenceStatus,
  type Logger,
  type ProcessHealth,
  type Turn,
  type UsageRecord
} from '@kiln/core';

import { mergeTurns, type SessionStore } from '../session/sessionStore';
import { type UsageSink } from '../usage/usageLogger';
import { type SlotPool } from './slotPool';

export type DispatchOutcome =
  | { ok: true; result: InferenceResult }
  | { ok: false; error: DispatchError };

/** The slice of the supervisor the request path reads and signals. */
export interface HealthSource {
  readonly health: ProcessHealth;
  reportInferenceFailure(error: unknown): void;
}

export interface HandleOptions {
  /** Aborts slot waiting or the inference call. */
  signal?: AbortSignal;
}

export interface RequestDispatcherOptions {
  config: DispatchConfig;
  health: HealthSource;
  sessions: SessionStore;
  slots: SlotPool;
  inference: Pick<InferenceClientPort, 'generate'>;
  usage: UsageSink;
  logger: Logger;
  now?: () => Date;
  generateId?: () => string;
}

interface Admitted {
  request: InferenceRequest;
  requestId: string;
  sessionId: string;
  startedAt: Date;
}

interface Prepared {
  input: GenerateInput;
  newTurns: Turn[];
  userMessage: string;
}

interface CallerAbortLink {
  /** Rejects with the caller's abort reason. */
  rejected: Promise<never>;
  dispose(): void;
}

/** Forwards the caller's abort to `controller` until disposed. */
function linkCallerAbort(signal: AbortSignal, controller: AbortController): CallerAbortLink {
  let onAbort: () => void = () => undefined;
  const rejected = new Promise<never>((_, reject) => {
    onAbort = () => {
      controller.abort(signal.reason);
      reject(signal.reason);
    };
  });
  signal.addEventListener('abort', onAbort, { once: true });
  return {
    rejected,
    dispose: () => signal.removeEventListener('abort', onAbort)
  };
}

function statusFor(error: DispatchError): InferenceStatus {
  if (error.code === 'Cancelled') return 'cancelled';
  if (error.code === 'InferenceTimeout') return 'timeout';
  return 'error';
}

export class RequestDispatcher {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  public constructor(private readonly options: RequestDispatcherOptions) {
    this.logger = options.logger.child({ component: 'dispatcher' });
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Runs one request end to end. Never rejects for request-level failures:
   * they come back as `{ ok: false, error }`.
   *
   * Requests rejected by validation or health are not admitted and leave no
   * usage record. Every admitted request leaves exactly one.
   */
  public async handle(payload: unknown, options: HandleOptions = {}): Promise<DispatchOutcome> {
    let request: InferenceRequest;
    try {
      request = validateInferenceRequest(payload, this.options.config);
    } catch (error) {
      if (error instanceof ValidationError) {
        return { ok: false, error };
      }
      throw error;
    }

    const health = this.options.health.health;
    if (!isAcceptingWork(health)) {
      return { ok: false, error: new ServiceUnavailableError(health) };
    }

    const admitted: Admitted = {
      request,
      requestId: this.generateId(),
      sessionId: request.sessionId ?? this.generateId(),
      startedAt: this.now()
    };

    try {
      const result = await this.execute(admitted, options.signal);
      return { ok: true, result };
    } catch (error) {
      const failure = isDispatchError(error) ? error : new InferenceError(error);
      if (!isDispatchError(error)) {
        this.logger.error({ requestId: admitted.requestId, error: String(error) }, 'Unexpected dispatch failure');
      }
      this.recordFailure(admitted, failure);
      return { ok: false, error: failure };
    }
  }

  private async execute(admitted: Admitted, signal: AbortSignal | undefined): Promise<InferenceResult> {
    const { request, sessionId } = admitted;
    const { sessions } = this.options;
    const exclusive = request.kind === 'chat';

    if (exclusive && !sessions.claim(sessionId)) {
      throw new SessionBusyError(sessionId);
    }

    try {
      const prepared = this.prepare(admitted);
      const lease = await this.options.slots.acquire({
        timeoutMs: this.options.config.slotWaitTimeoutMs,
        signal
      });

      let output: GenerateOutput;
      try {
        output = await this.generate(prepared.input, signal);
      } finally {
        lease.release();
      }

      return this.complete(admitted, prepared, output);
    } finally {
      if (exclusive) {
        sessions.release(sessionId);
      }
    }
  }

  private prepare(admitted: Admitted): Prepared {
    const { request, sessionId, startedAt } = admitted;

    if (request.kind === 'completion') {
      return {
        input: { kind: 'completion', prompt: request.prompt, params: request.params },
        newTurns: [],
        userMessage: request.prompt
      };
    }

    const session = this.options.sessions.get(sessionId) ?? this.options.sessions.create(sessionId);
    const newTurns = request.messages.map((message) => createTurn(message.role, message.content, startedAt));
    const window = buildContextWindow(mergeTurns(session.turns, newTurns), {
      maxTurns: this.options.config.maxContextTurns,
      maxTokens: this.options.config.maxContextTokens
    });

    return {
      input: {
        kind: 'chat',
        messages: window.map((turn) => ({ role: turn.role, content: turn.content })),
        params: request.params
      },
      newTurns,
      userMessage: request.messages[request.messages.length - 1]?.content ?? ''
    };
  }

  private async generate(input: GenerateInput, signal: AbortSignal | undefined): Promise<GenerateOutput> {
    const timeoutMs = this.options.config.requestTimeoutMs;
    if (signal?.aborted) {
      throw new CancelledError('inference');
    }

    const controller = new AbortController();
    const callerAbort = signal ? linkCallerAbort(signal, controller) : null;
    try {
      return await withTimeout({
        timeoutMs,
        label: 'Inference',
        run: (timeoutSignal) => {
          timeoutSignal.addEventListener('abort', () => controller.abort(timeoutSignal.reason), { once: true });
          const call = this.options.inference.generate(input, controller.signal);
          return callerAbort ? Promise.race([call, callerAbort.rejected]) : call;
        }
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError('inference');
      }
      this.options.health.reportInferenceFailure(error);
      if (error instanceof TimeoutError) {
        throw new InferenceTimeoutError(timeoutMs);
      }
      throw new InferenceError(error);
    } finally {
      callerAbort?.dispose();
    }
  }

  private complete(admitted: Admitted, prepared: Prepared, output: GenerateOutput): InferenceResult {
    const { request, requestId, sessionId, startedAt } = admitted;
    const finishedAt = this.now();
    const text = cleanCompletionText(output.text);
    const promptText = prepared.input.kind === 'chat'
      ? prepared.input.messages.map((message) => message.content).join(' ')
      : prepared.input.prompt;

    if (request.kind === 'chat') {
      this.options.sessions.append(sessionId, [...prepared.newTurns, createTurn('assistant', text, finishedAt)]);
    }

    const result: InferenceResult = {
      requestId,
      sessionId,
      text,
      model: output.model || request.params.model,
      usage: output.usage ?? {
        promptTokens: estimateTokens(promptText),
        completionTokens: estimateTokens(text)
      },
      latencyMs: finishedAt.getTime() - startedAt.getTime(),
      status: 'ok'
    };

    const conversation: ConversationRecord = {
      requestId,
      sessionId,
      userMessage: prepared.userMessage,
      assistantResponse: text,
      modelName: result.model,
      temperature: request.params.temperature,
      maxTokens: request.params.maxTokens,
      responseTimeMs: result.latencyMs,
      tokensGenerated: result.usage.completionTokens,
      createdAt: finishedAt
    };

    this.options.usage.record(this.usageRecord(admitted, finishedAt, result, null), conversation);
    this.logger.info({ requestId, sessionId, latencyMs: result.latencyMs }, 'Request completed');
    return result;
  }

  private recordFailure(admitted: Admitted, error: DispatchError): void {
    const finishedAt = this.now();
    this.options.usage.record(this.usageRecord(admitted, finishedAt, null, error));

    const fields = { requestId: admitted.requestId, sessionId: admitted.sessionId, code: error.code };
    if (error.code === 'Cancelled') {
      this.logger.info(fields, 'Request cancelled');
    } else {
      this.logger.warn({ ...fields, error: error.message }, 'Request failed');
    }
  }

  private usageRecord(
    admitted: Admitted,
    finishedAt: Date,
    result: InferenceResult | null,
    error: DispatchError | null
  ): UsageRecord {
    const { request } = admitted;
    return {
      requestId: admitted.requestId,
      endpoint: request.endpoint ?? (request.kind === 'chat' ? '/v1/chat/completions' : '/v1/completions'),
      sessionId: admitted.sessionId,
      request,
      result,
      status: error ? statusFor(error) : 'ok',
      errorCode: error?.code ?? null,
      errorMessage: error?.message ?? null,
      clientIp: request.client?.ip ?? null,
      userAgent: request.client?.userAgent ?? null,
      startedAt: admitted.startedAt,
      finishedAt,
      latencyMs: finishedAt.getTime() - admitted.startedAt.getTime()
    };
  }
}
