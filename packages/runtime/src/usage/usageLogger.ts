import {
  TimeoutError,
  retryIdempotent,
  withTimeout,
  type ConversationRecord,
  type Logger,
  type RuntimeResource,
  type UsageLoggingConfig,
  type UsageRecord,
  type UsageStorePort
} from '@kiln/core';

/** What the dispatcher hands off once per admitted request. */
export interface UsageSink {
  record(usage: UsageRecord, conversation?: ConversationRecord): void;
}

export interface UsageLoggerStats {
  enqueued: number;
  persisted: number;
  dropped: number;
  lost: number;
  pending: number;
}

interface UsageEntry {
  usage: UsageRecord;
  conversation?: ConversationRecord | undefined;
}

export interface UsageLoggerOptions {
  config: UsageLoggingConfig;
  store: UsageStorePort;
  logger: Logger;
}

/**
 * Bounded queue between the request path and the usage store.
 *
 * `record` never blocks or throws. When the queue is full the oldest entry is
 * dropped. A single background drain persists entries in batches, retrying
 * each one before counting it as lost.
 */
export class UsageLogger implements RuntimeResource, UsageSink {
  private readonly queue: UsageEntry[] = [];
  private readonly logger: Logger;
  private draining: Promise<void> | null = null;
  private inBatch = 0;
  private closed = false;
  private counters = { enqueued: 0, persisted: 0, dropped: 0, lost: 0 };

  public constructor(private readonly options: UsageLoggerOptions) {
    this.logger = options.logger.child({ component: 'usage-logger' });
  }

  public record(usage: UsageRecord, conversation?: ConversationRecord): void {
    if (this.closed) {
      this.counters.dropped += 1;
      this.logger.warn({ requestId: usage.requestId }, 'Usage logger closed; record dropped');
      return;
    }

    if (this.queue.length >= this.options.config.queueCapacity) {
      const oldest = this.queue.shift();
      this.counters.dropped += 1;
      this.logger.warn(
        { droppedRequestId: oldest?.usage.requestId, dropped: this.counters.dropped },
        'Usage queue full; dropped oldest record'
      );
    }

    this.queue.push({ usage, conversation });
    this.counters.enqueued += 1;
    this.kick();
  }

  public stats(): UsageLoggerStats {
    return { ...this.counters, pending: this.queue.length + this.inBatch };
  }

  /** Stops intake and waits, up to the drain timeout, for queued records. */
  public async close(): Promise<void> {
    this.closed = true;
    this.kick();
    if (!this.draining) return;

    try {
      await withTimeout({
        timeoutMs: this.options.config.drainTimeoutMs,
        label: 'Usage queue drain',
        run: async () => {
          while (this.draining) {
            await this.draining;
          }
        }
      });
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
      this.logger.warn({ pending: this.stats().pending }, 'Usage queue not fully drained before close');
    }
  }

  private kick(): void {
    if (this.draining || this.queue.length === 0) return;
    this.draining = this.drain()
      .catch((error: unknown) => {
        this.logger.error({ error: String(error) }, 'Usage drain stopped unexpectedly');
      })
      .finally(() => {
        this.draining = null;
        this.kick();
      });
  }

  private async drain(): Promise<void> {
    while (this.queue.length > 0) {
      const batch = this.queue.splice(0, this.options.config.batchSize);
      this.inBatch = batch.length;
      for (const entry of batch) {
        await this.persist(entry);
        this.inBatch -= 1;
      }
    }
  }

  private async persist(entry: UsageEntry): Promise<void> {
    const { store, config } = this.options;
    const requestId = entry.usage.requestId;

    try {
      await retryIdempotent({
        run: async () => {
          await store.insertUsageRecord(entry.usage);
          if (entry.conversation) {
            await store.insertConversationTurn(entry.conversation);
          }
        },
        maxRetries: config.persistRetries,
        baseDelayMs: config.retryBaseDelayMs,
        jitterMs: config.retryJitterMs,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn({ requestId, attempt, delayMs, error: String(error) }, 'Retrying usage persist');
        }
      });
      this.counters.persisted += 1;
    } catch (error) {
      this.counters.lost += 1;
      this.logger.error({ requestId, error: String(error), lost: this.counters.lost }, 'Usage record lost');
    }
  }
}
