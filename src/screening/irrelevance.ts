import type { SessionState } from './sessionState';

/** Irrelevant answers tolerated across the whole call before it is ended. */
export const MAX_IRRELEVANT = 3;

export const IRRELEVANT_LIMIT_REACHED = Symbol('irrelevant_limit_reached');

export type IrrelevanceCheck = string | typeof IRRELEVANT_LIMIT_REACHED;

/**
 * Counts one irrelevant answer. Returns the note telling the model to warn the
 * candidate, or IRRELEVANT_LIMIT_REACHED once the call must end.
 */
export function checkIrrelevant(
  state: SessionState,
  ask = 'to answer the question',
): IrrelevanceCheck {
  state.irrelevantCount += 1;
  if (state.irrelevantCount >= MAX_IRRELEVANT) {
    return IRRELEVANT_LIMIT_REACHED;
  }
  const remaining = MAX_IRRELEVANT - state.irrelevantCount;
  return (
    `[SYSTEM] Irrelevant answer ${state.irrelevantCount}/${MAX_IRRELEVANT}. ` +
    `${remaining} chance(s) left. Politely but clearly ask the candidate ${ask}.`
  );
}

export function irrelevantLimitReached(state: SessionState): boolean {
  return state.irrelevantCount >= MAX_IRRELEVANT;
}

export function resetIrrelevant(state: SessionState): void {
  state.irrelevantCount = 0;
}
