import { SECOND_DEAL_HAND_SIZE, type Card, type GameState } from '@kasino/shared';
import { recordAction } from './action-log';
import { cardLabel } from './deck';
import { reject } from './result';
import {
  allHandsEmpty,
  buildCards,
  canDrift,
  containsCard,
  currentPlayer,
  isPlayingPhase,
  nextPlayerIndex,
  replacePlayer,
  withoutCards,
} from './state';
import type { MoveResult } from './types';

/** Plays a hand card face up onto the table without capturing. */
export const drift = (state: GameState, handCard: Card): MoveResult => {
  if (!isPlayingPhase(state)) {
    return reject(state, 'NOT_PLAYING', 'cards can only be drifted during play');
  }
  const player = currentPlayer(state);
  if (!containsCard(player.hand, handCard)) {
    return reject(state, 'CARD_NOT_IN_HAND', `${handCard.id} is not in hand`);
  }
  if (!canDrift(state)) {
    return reject(state, 'DRIFT_BLOCKED', 'you own a build and must capture or add to it');
  }

  return {
    state: {
      ...state,
      players: replacePlayer(state.players, state.currentPlayerIndex, {
        hand: withoutCards(player.hand, [handCard]),
      }),
      tableCards: [...state.tableCards, handCard],
      actionLog: recordAction(state, {
        userId: player.userId,
        type: 'DRIFT',
        cardPlayed: handCard,
        cardsCaptured: [],
        description: `${player.displayName} drifted ${cardLabel(handCard)}`,
      }),
      version: state.version + 1,
    },
  };
};

const needsSecondDeal = (state: GameState): boolean =>
  state.players.length === 2 && !state.isSecondDeal && state.drawPile.length > 0;

const dealSecondRound = (state: GameState): GameState => {
  const players = state.players.map((player, index) => ({
    ...player,
    hand: state.drawPile.slice(index * SECOND_DEAL_HAND_SIZE, (index + 1) * SECOND_DEAL_HAND_SIZE),
  }));

  return {
    ...state,
    players,
    drawPile: state.drawPile.slice(state.players.length * SECOND_DEAL_HAND_SIZE),
    isSecondDeal: true,
    phase: 'PLAYING_SECOND',
    currentPlayerIndex: 0,
  };
};

/**
 * The last capturer takes whatever is left on the table, loose cards first,
 * then build cards. With no capture in the hand the cards stay where they are.
 */
const endHand = (state: GameState): GameState => {
  const sweeperIndex = state.lastCapturerIndex;
  const sweeper = sweeperIndex === undefined ? undefined : state.players[sweeperIndex];
  if (sweeperIndex === undefined || !sweeper) {
    return { ...state, phase: 'SCORING' };
  }

  const remaining = [...state.tableCards, ...state.builds.flatMap(buildCards)];
  return {
    ...state,
    players: replacePlayer(state.players, sweeperIndex, {
      capturePile: [...sweeper.capturePile, ...remaining],
    }),
    tableCards: [],
    builds: [],
    phase: 'SCORING',
  };
};

export const nextTurn = (state: GameState): GameState => {
  if (!isPlayingPhase(state)) {
    return state;
  }

  const advanced: GameState = {
    ...state,
    currentPlayerIndex: nextPlayerIndex(state),
    version: state.version + 1,
  };
  if (!allHandsEmpty(advanced)) {
    return advanced;
  }
  return needsSecondDeal(advanced) ? dealSecondRound(advanced) : endHand(advanced);
};
