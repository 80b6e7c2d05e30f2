export type TurnRole = 'user' | 'assistant' | 'system';

export interface Turn {
  readonly role      : TurnRole;
  readonly content   : string;
  readonly createdAt : Date;
}

/**
 * A caller-identified, ordered multi-turn conversation.
 * Turns are append-only; a snapshot handed out by the store never changes.
 */
export interface Session {
  readonly id           : string;
  readonly turns        : readonly Turn[];
  readonly createdAt    : Date;
  readonly lastActiveAt : Date;
}

export function createTurn(role: TurnRole, content: string, createdAt: Date = new Date()): Turn {
  return Object.freeze({ role, content, createdAt });
}
