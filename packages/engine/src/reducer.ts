import type { Card, EngineAction, GameState } from '@kasino/shared';
import { augmentBuild, createBuild, increaseBuild } from './builds';
import { executeCapture, findCaptures } from './capture';
import { engineError, reject } from './result';
import { buildCards, currentPlayer, findCardById, isPlayingPhase, startNextHand } from './state';
import { applyScores } from './scoring';
import { drift, nextTurn } from './turn';
import type { EngineEffect, EngineResult, MoveResult, ValidationResult } from './types';

type MoveAction = Extract<EngineAction, { type: 'CAPTURE' | 'BUILD' | 'AUGMENT' | 'INCREASE' | 'DRIFT' }>;

export const isMoveAction = (action: EngineAction): action is MoveAction =>
  action.type !== 'SCORE_HAND' && action.type !== 'NEXT_HAND';

export const validateAction = (state: GameState, action: EngineAction): ValidationResult => {
  if (action.type === 'SCORE_HAND') {
    if (state.phase !== 'SCORING') {
      return { ok: false, code: 'NOT_SCORING' };
    }
    if (state.handScores) {
      return { ok: false, code: 'ALREADY_SCORED' };
    }
    return { ok: true };
  }

  if (action.type === 'NEXT_HAND') {
    if (state.phase !== 'SCORING') {
      return { ok: false, code: 'NOT_SCORING' };
    }
    if (!state.handScores) {
      return { ok: false, code: 'NOT_SCORED' };
    }
    return { ok: true };
  }

  if (!isPlayingPhase(state)) {
    return { ok: false, code: 'NOT_PLAYING' };
  }
  return { ok: true };
};

const resolveCards = (pool: readonly Card[], ids: readonly string[]): Card[] | undefined => {
  const cards: Card[] = [];
  for (const id of ids) {
    const card = findCardById(pool, id);
    if (!card) {
      return undefined;
    }
    cards.push(card);
  }
  return cards;
};

const opponentPileCards = (state: GameState): Card[] =>
  state.players.filter((_, index) => index !== state.currentPlayerIndex).flatMap((player) => [...player.capturePile]);

const dispatchMove = (state: GameState, action: MoveAction, handCard: Card | undefined): MoveResult => {
  switch (action.type) {
    case 'CAPTURE': {
      if (!handCard) {
        return reject(state, 'CARD_NOT_IN_HAND', `${action.cardId} is not in hand`);
      }
      const options = findCaptures(state, handCard);
      if (options.length === 0) {
        return reject(state, 'NO_CAPTURE_OPTION', `${action.cardId} captures nothing`);
      }
      const option = options[action.optionIndex ?? 0];
      if (!option) {
        return reject(state, 'INVALID_OPTION', `no capture option ${action.optionIndex ?? 0}`);
      }
      return { state: executeCapture(state, handCard, option) };
    }
    case 'BUILD': {
      const tableCards = resolveCards(state.tableCards, action.tableCardIds);
      if (!tableCards) {
        return reject(state, 'CARD_NOT_ON_TABLE', 'unknown table card');
      }
      const stolenCards = resolveCards(opponentPileCards(state), action.stolenCardIds ?? []);
      if (!stolenCards) {
        return reject(state, 'STOLEN_CARD_NOT_ON_TOP', 'unknown stolen card');
      }
      return createBuild(state, { handCard, tableCards, declaredValue: action.declaredValue, stolenCards });
    }
    case 'AUGMENT': {
      const tableCards = resolveCards(state.tableCards, action.tableCardIds);
      if (!tableCards) {
        return reject(state, 'CARD_NOT_ON_TABLE', 'unknown table card');
      }
      const stolenCard =
        action.stolenCardId === undefined ? undefined : findCardById(opponentPileCards(state), action.stolenCardId);
      if (action.stolenCardId !== undefined && !stolenCard) {
        return reject(state, 'STOLEN_CARD_NOT_ON_TOP', 'unknown stolen card');
      }
      return augmentBuild(state, { buildId: action.buildId, tableCards, handCard, stolenCard });
    }
    case 'INCREASE':
      return handCard
        ? increaseBuild(state, { buildId: action.buildId, handCard })
        : reject(state, 'CARD_NOT_IN_HAND', `${action.cardId} is not in hand`);
    case 'DRIFT':
      return handCard ? drift(state, handCard) : reject(state, 'CARD_NOT_IN_HAND', `${action.cardId} is not in hand`);
  }
};

const applyMove = (state: GameState, action: MoveAction): EngineResult => {
  const handCard = action.cardId === undefined ? undefined : findCardById(currentPlayer(state).hand, action.cardId);
  if (action.cardId !== undefined && !handCard) {
    return { state, effects: [], error: engineError('CARD_NOT_IN_HAND', `${action.cardId} is not in hand`) };
  }

  const result = dispatchMove(state, action, handCard);
  if (result.error) {
    return { state, effects: [], error: result.error };
  }

  const moved = result.state;
  const lastAction = moved.actionLog[moved.actionLog.length - 1];
  const effects: EngineEffect[] = lastAction
    ? [
        {
          type: 'MOVE_APPLIED',
          userId: lastAction.userId,
          actionType: lastAction.type,
          description: lastAction.description,
        },
      ]
    : [];

  const next = nextTurn(moved);
  if (next.isSecondDeal && !moved.isSecondDeal) {
    effects.push({ type: 'SECOND_DEAL', cardsPerPlayer: next.players[0]?.hand.length ?? 0 });
  }
  if (next.phase === 'SCORING') {
    const sweeper = moved.lastCapturerIndex === undefined ? undefined : moved.players[moved.lastCapturerIndex];
    const leftOver = moved.tableCards.length + moved.builds.flatMap(buildCards).length;
    effects.push({
      type: 'HAND_ENDED',
      handNumber: next.handNumber,
      ...(sweeper ? { sweptByUserId: sweeper.userId } : {}),
      sweptCount: sweeper ? leftOver : 0,
    });
  }

  return { state: next, effects };
};

export const applyAction = (state: GameState, action: EngineAction): EngineResult => {
  const validation = validateAction(state, action);
  if (!validation.ok) {
    return {
      state,
      effects: [],
      error: engineError(validation.code, `invalid action: ${action.type}`),
    };
  }

  if (action.type === 'SCORE_HAND') {
    const next = applyScores(state);
    const effects: EngineEffect[] = [
      {
        type: 'HAND_SCORED',
        handNumber: next.handNumber,
        handScores: { ...next.handScores },
        matchScores: { ...next.matchScores },
      },
    ];
    if (next.phase === 'GAME_OVER') {
      effects.push({ type: 'MATCH_FINISHED', winnerUserIds: [...(next.winnerUserIds ?? [])] });
    }
    return { state: next, effects };
  }

  if (action.type === 'NEXT_HAND') {
    const next = startNextHand(state, action.seed === undefined ? {} : { seed: action.seed });
    return { state: next, effects: [{ type: 'HAND_STARTED', handNumber: next.handNumber }] };
  }

  return applyMove(state, action);
};
