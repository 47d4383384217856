import type { GameAction, GameState } from '@kasino/shared';

/** Appends `action`, dropping the oldest entries beyond `max`. */
export const appendAction = (log: readonly GameAction[], action: GameAction, max: number): GameAction[] => {
  const next = [...log, action];
  return next.length > max ? next.slice(next.length - max) : next;
};

export const recordAction = (state: GameState, entry: Omit<GameAction, 'version'>): GameAction[] =>
  appendAction(state.actionLog, { ...entry, version: state.version + 1 }, state.config.maxActionLog);
