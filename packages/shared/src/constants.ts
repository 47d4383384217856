export const SUITS = ['spades', 'hearts', 'diamonds', 'clubs'] as const;
export const RANKS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10] as const;
export const SUIT_SYMBOLS = {
  spades: '♠',
  hearts: '♥',
  diamonds: '♦',
  clubs: '♣',
} as const;

export const GAME_PHASES = ['PLAYING', 'PLAYING_SECOND', 'SCORING', 'GAME_OVER'] as const;
export const GAME_MODES = ['SINGLE_PLAYER', 'MULTIPLAYER', 'PRACTICE'] as const;
export const ACTION_TYPES = [
  'CAPTURE',
  'BUILD_CREATE',
  'BUILD_AUGMENT',
  'BUILD_INCREASE',
  'STEAL_AND_BUILD',
  'DRIFT',
] as const;

export const DECK_SIZE = 40;
export const MAX_CAPTURE_VALUE = 10;
export const SECOND_DEAL_HAND_SIZE = 10;

// player count -> cards per hand and face-up table cards
export const DEAL_LAYOUT = {
  2: { handSize: 10, tableCards: 0 },
  3: { handSize: 13, tableCards: 1 },
  4: { handSize: 10, tableCards: 0 },
} as const;

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 4;

export const DEFAULT_TARGET_SCORE = 11;
export const DEFAULT_MAX_ACTION_LOG = 50;

export const MOST_CARDS_POINTS = 2;
export const MOST_CARDS_TIED_POINTS = 1;
export const SPADES_MINOR_THRESHOLD = 5;
export const SPADES_MAJOR_THRESHOLD = 6;
export const SPY_TWO_POINTS = 1;
export const BIG_TEN_POINTS = 2;
export const ACE_POINTS = 1;
export const TIEBREAK_CARD_THRESHOLD = 21;
