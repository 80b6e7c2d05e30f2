import {
  type ConversationRecord,
  type GatewayConfig,
  type HealthTransition,
  type InferenceClientPort,
  type Logger,
  type ModelProcessLauncher,
  type ProcessHealth,
  type RuntimeResource,
  type UsageStatsReport,
  type UsageStorePort
} from '@kiln/core';

import { RequestDispatcher, type DispatchOutcome, type HandleOptions } from '../dispatch/requestDispatcher';
import { SlotPool } from '../dispatch/slotPool';
import { closeResources, collectLifecycleResources, startResources } from '../resources/lifecycle';
import { SessionStore } from '../session/sessionStore';
import { ModelProcessSupervisor } from '../supervisor/modelProcessSupervisor';
import { UsageLogger, type UsageLoggerStats } from '../usage/usageLogger';

export interface GatewayDeps {
  config: GatewayConfig;
  logger: Logger;
  inference: InferenceClientPort;
  launcher: ModelProcessLauncher;
  store: UsageStorePort;
  now?: () => Date;
  generateId?: () => string;
}

export interface GatewayStatus {
  health: ProcessHealth;
  model: string;
  pid: number | undefined;
  uptimeSeconds: number;
  restartAttempts: number;
  sessions: number;
  slots: { capacity: number; inUse: number; waiting: number };
  usage: UsageLoggerStats;
}

/**
 * Composition root. Builds every component once and owns their lifetimes:
 * started as store, inference client, usage logger, supervisor, session
 * sweeper, and closed in the reverse order.
 */
export class Gateway implements RuntimeResource {
  public readonly supervisor: ModelProcessSupervisor;
  public readonly sessions: SessionStore;
  public readonly slots: SlotPool;
  public readonly usage: UsageLogger;
  public readonly dispatcher: RequestDispatcher;

  private readonly logger: Logger;
  private readonly now: () => Date;
  private lifecycleResources: RuntimeResource[] = [];
  private startedAt: Date | null = null;

  public constructor(private readonly deps: GatewayDeps) {
    const { config } = deps;
    this.logger = deps.logger.child({ component: 'gateway' });
    this.now = deps.now ?? (() => new Date());

    this.supervisor = new ModelProcessSupervisor({
      config: config.supervisor,
      launcher: deps.launcher,
      inference: deps.inference,
      logger: deps.logger,
      adoptExisting: config.modelServer.adoptExisting
    });
    this.sessions = new SessionStore({ config: config.sessions, logger: deps.logger, now: deps.now });
    this.slots = new SlotPool({
      capacity: config.dispatch.slotCount,
      maxQueued: config.dispatch.maxQueuedRequests
    });
    this.usage = new UsageLogger({ config: config.usage, store: deps.store, logger: deps.logger });
    this.dispatcher = new RequestDispatcher({
      config: config.dispatch,
      health: this.supervisor,
      sessions: this.sessions,
      slots: this.slots,
      inference: deps.inference,
      usage: this.usage,
      logger: deps.logger,
      now: deps.now,
      generateId: deps.generateId
    });
  }

  public get health(): ProcessHealth {
    return this.supervisor.health;
  }

  public async start(): Promise<void> {
    const resources = collectLifecycleResources([
      this.deps.store,
      this.deps.inference,
      this.usage,
      this.supervisor,
      this.sessions
    ]);
    await startResources(resources);
    this.lifecycleResources = resources;
    this.startedAt = this.now();
    this.logger.info({ model: this.deps.config.sampling.model, health: this.health }, 'Gateway started');
  }

  public async close(): Promise<void> {
    const resources = this.lifecycleResources;
    this.lifecycleResources = [];
    await closeResources(resources);
    this.logger.info({ usage: this.usage.stats() }, 'Gateway closed');
  }

  public handle(request: unknown, options?: HandleOptions): Promise<DispatchOutcome> {
    return this.dispatcher.handle(request, options);
  }

  public on(event: 'transition', listener: (transition: HealthTransition) => void): this {
    this.supervisor.on(event, listener);
    return this;
  }

  public conversationHistory(sessionId: string, limit: number): Promise<ConversationRecord[]> {
    return this.deps.store.queryConversation(sessionId, limit);
  }

  public usageStats(hours: number): Promise<UsageStatsReport> {
    const since = new Date(this.now().getTime() - hours * 3_600_000);
    return this.deps.store.queryStats(since);
  }

  public status(): GatewayStatus {
    return {
      health: this.health,
      model: this.deps.config.sampling.model,
      pid: this.supervisor.pid,
      uptimeSeconds: this.startedAt ? Math.floor((this.now().getTime() - this.startedAt.getTime()) / 1000) : 0,
      restartAttempts: this.supervisor.restartCount,
      sessions: this.sessions.size,
      slots: { capacity: this.slots.capacity, inUse: this.slots.inUse, waiting: this.slots.waiting },
      usage: this.usage.stats()
    };
  }
}
