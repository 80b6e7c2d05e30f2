export type ProcessHealth =
  | 'stopped'
  | 'starting'
  | 'ready'
  | 'degraded'
  | 'crashed'
  | 'restarting'
  | 'unrecoverable'
  | 'shutting_down';

export interface HealthTransition {
  from   : ProcessHealth;
  to     : ProcessHealth;
  reason : string;
  at     : Date;
}

/** Health states in which the dispatcher admits new work. */
export function isAcceptingWork(health: ProcessHealth): boolean {
  return health === 'ready' || health === 'degraded';
}

