import { randomUUID } from 'node:crypto';
import {
  type Logger,
  type RuntimeResource,
  type Session,
  type SessionConfig,
  type Turn
} from '@kiln/core';

interface SessionState {
  id: string;
  turns: Turn[];
  createdAt: Date;
  lastActiveAt: Date;
}

export interface SessionStoreOptions {
  config: SessionConfig;
  logger: Logger;
  now?: () => Date;
}

function snapshot(state: SessionState): Session {
  return Object.freeze({
    id: state.id,
    turns: Object.freeze([...state.turns]),
    createdAt: state.createdAt,
    lastActiveAt: state.lastActiveAt
  });
}

/**
 * Appends `incoming` after `existing`. A session holds at most one system
 * turn: a newer one replaces the stored one and sits at the front.
 */
export function mergeTurns(existing: readonly Turn[], incoming: readonly Turn[]): Turn[] {
  const merged = [...existing];
  for (const turn of incoming) {
    if (turn.role === 'system') {
      const rest = merged.filter((kept) => kept.role !== 'system');
      merged.splice(0, merged.length, turn, ...rest);
    } else {
      merged.push(turn);
    }
  }
  return merged;
}

/**
 * In-memory multi-turn sessions.
 *
 * A session claimed by an in-flight request is never evicted, and only one
 * claim per session can be held at a time.
 */
export class SessionStore implements RuntimeResource {
  private readonly sessions = new Map<string, SessionState>();
  private readonly claimed = new Set<string>();
  private readonly logger: Logger;
  private readonly now: () => Date;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  public constructor(private readonly options: SessionStoreOptions) {
    this.logger = options.logger.child({ component: 'session-store' });
    this.now = options.now ?? (() => new Date());
  }

  public get size(): number {
    return this.sessions.size;
  }

  public async start(): Promise<void> {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweepExpired();
    }, this.options.config.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  public async close(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  public get(id: string): Session | undefined {
    const state = this.sessions.get(id);
    return state ? snapshot(state) : undefined;
  }

  /** Returns the existing session when `id` is already known. */
  public create(id: string = randomUUID()): Session {
    const existing = this.sessions.get(id);
    if (existing) {
      return snapshot(existing);
    }
    const now = this.now();
    const state: SessionState = { id, turns: [], createdAt: now, lastActiveAt: now };
    this.sessions.set(id, state);
    this.logger.debug({ sessionId: id }, 'Session created');
    return snapshot(state);
  }

  /**
   * Appends turns in order, replacing the system turn when a new one arrives.
   * Past `maxTurnsPerSession`, the oldest non-system turns are pruned.
   */
  public append(id: string, turns: readonly Turn[]): Session {
    const state = this.sessions.get(id);
    if (!state) {
      throw new Error(`Unknown session: ${id}`);
    }

    state.turns = mergeTurns(state.turns, turns);
    const cap = this.options.config.maxTurnsPerSession;
    let pruned = 0;
    while (state.turns.length > cap) {
      const oldest = state.turns.findIndex((turn) => turn.role !== 'system');
      if (oldest === -1) break;
      state.turns.splice(oldest, 1);
      pruned += 1;
    }
    if (pruned > 0) {
      this.logger.debug({ sessionId: id, pruned }, 'Pruned oldest turns');
    }

    state.lastActiveAt = this.now();
    return snapshot(state);
  }

  /** Marks the session as in flight. Returns false when it already is. */
  public claim(id: string): boolean {
    if (this.claimed.has(id)) {
      return false;
    }
    this.claimed.add(id);
    return true;
  }

  public release(id: string): void {
    this.claimed.delete(id);
  }

  public isClaimed(id: string): boolean {
    return this.claimed.has(id);
  }

  /** Evicts sessions idle longer than the TTL. Returns how many were evicted. */
  public sweepExpired(now: Date = this.now()): number {
    const cutoff = now.getTime() - this.options.config.idleTtlMs;
    let evicted = 0;
    for (const [id, state] of this.sessions) {
      if (state.lastActiveAt.getTime() < cutoff && !this.claimed.has(id)) {
        this.sessions.delete(id);
        evicted += 1;
      }
    }
    if (evicted > 0) {
      this.logger.info({ evicted, remaining: this.sessions.size }, 'Evicted idle sessions');
    }
    return evicted;
  }
}
