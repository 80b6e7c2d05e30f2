import { type Turn } from '../entities/session';
import { estimateTokens } from './text';

export interface ContextBudget {
  /** Maximum number of non-system turns sent to the model. */
  maxTurns: number;
  /** Maximum estimated tokens across all turns sent to the model. */
  maxTokens: number;
}

/**
 * Builds the prompt context from a session's turns.
 *
 * - System turns are always kept, in their original positions.
 * - Non-system turns are taken newest-first while both budgets allow;
 *   the oldest are dropped first.
 * - The newest turn is always kept, even when it alone exceeds the budget.
 *
 * The result is a subsequence of the input, and feeding it back through the
 * same budget returns it unchanged.
 */
export function buildContextWindow(turns: readonly Turn[], budget: ContextBudget): Turn[] {
  if (turns.length === 0) {
    return [];
  }

  const keep = new Set<number>();
  let tokens = 0;

  turns.forEach((turn, index) => {
    if (turn.role === 'system') {
      keep.add(index);
      tokens += estimateTokens(turn.content);
    }
  });

  const newest = turns.length - 1;
  let keptTurns = 0;

  for (let index = newest; index >= 0; index -= 1) {
    const turn = turns[index];
    if (!turn || turn.role === 'system') continue;

    const cost = estimateTokens(turn.content);
    const forced = index === newest;
    if (!forced && (keptTurns >= budget.maxTurns || tokens + cost > budget.maxTokens)) {
      break;
    }

    keep.add(index);
    keptTurns += 1;
    tokens += cost;
  }

  return turns.filter((_, index) => keep.has(index));
}
