import {
  ACE_POINTS,
  BIG_TEN_POINTS,
  MOST_CARDS_POINTS,
  MOST_CARDS_TIED_POINTS,
  SPADES_MAJOR_THRESHOLD,
  SPADES_MINOR_THRESHOLD,
  SPY_TWO_POINTS,
  TIEBREAK_CARD_THRESHOLD,
  type GameState,
  type PlayerState,
} from '@kasino/shared';
import { isAce, isBigTen, isSpade, isSpyTwo } from './deck';

export interface ScoreBreakdown {
  userId: string;
  cards: number;
  mostCards: number;
  spades: number;
  spyTwo: number;
  bigTen: number;
  aces: number;
  total: number;
}

const spadesPoints = (count: number): number => {
  if (count >= SPADES_MAJOR_THRESHOLD) {
    return 2;
  }
  return count >= SPADES_MINOR_THRESHOLD ? 1 : 0;
};

const breakdownFor = (player: PlayerState, mostCards: number): ScoreBreakdown => {
  const pile = player.capturePile;
  const spades = spadesPoints(pile.filter(isSpade).length);
  const spyTwo = pile.some(isSpyTwo) ? SPY_TWO_POINTS : 0;
  const bigTen = pile.some(isBigTen) ? BIG_TEN_POINTS : 0;
  const aces = pile.filter(isAce).length * ACE_POINTS;
  return {
    userId: player.userId,
    cards: pile.length,
    mostCards,
    spades,
    spyTwo,
    bigTen,
    aces,
    total: mostCards + spades + spyTwo + bigTen + aces,
  };
};

export const scoreBreakdown = (state: GameState): ScoreBreakdown[] => {
  const most = Math.max(...state.players.map((player) => player.capturePile.length));
  const leaders = state.players.filter((player) => player.capturePile.length === most).length;
  const leaderPoints = leaders > 1 ? MOST_CARDS_TIED_POINTS : MOST_CARDS_POINTS;

  return state.players.map((player) => breakdownFor(player, player.capturePile.length === most ? leaderPoints : 0));
};

export const calculateScores = (state: GameState): Record<string, number> =>
  Object.fromEntries(scoreBreakdown(state).map((entry) => [entry.userId, entry.total]));

const isUniform = (values: number[]): boolean => new Set(values).size === 1;

/**
 * Adds the hand's scores into the match totals. When both hand and match are
 * level, every player with at least 21 captured cards gets one extra point.
 */
export const applyScores = (state: GameState): GameState => {
  const handScores = calculateScores(state);
  const matchScores: Record<string, number> = { ...state.matchScores };
  for (const [userId, points] of Object.entries(handScores)) {
    matchScores[userId] = (matchScores[userId] ?? 0) + points;
  }

  if (isUniform(Object.values(handScores)) && isUniform(Object.values(matchScores))) {
    for (const player of state.players) {
      if (player.capturePile.length >= TIEBREAK_CARD_THRESHOLD) {
        matchScores[player.userId] = (matchScores[player.userId] ?? 0) + 1;
      }
    }
  }

  const totals = Object.values(matchScores);
  const best = Math.max(...totals);
  const finished = best >= state.config.targetScore;

  return {
    ...state,
    matchScores,
    handScores,
    phase: finished ? 'GAME_OVER' : 'SCORING',
    ...(finished
      ? { winnerUserIds: Object.keys(matchScores).filter((userId) => matchScores[userId] === best) }
      : {}),
    version: state.version + 1,
  };
};
