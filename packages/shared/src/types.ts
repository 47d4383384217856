import type { ACTION_TYPES, GAME_MODES, GAME_PHASES, RANKS, SUITS } from './constants';
import type { ErrorCode } from './errors';

export type Suit = (typeof SUITS)[number];
export type Rank = (typeof RANKS)[number];
export type GamePhase = (typeof GAME_PHASES)[number];
export type GameMode = (typeof GAME_MODES)[number];
export type ActionType = (typeof ACTION_TYPES)[number];

export interface Card {
  readonly id: string;
  readonly rank: Rank;
  readonly suit: Suit;
}

export type CardGroup = readonly Card[];

export interface Build {
  readonly id: string;
  readonly ownerId: string;
  readonly value: number;
  readonly groups: readonly CardGroup[];
}

export interface PlayerState {
  readonly userId: string;
  readonly displayName: string;
  readonly hand: readonly Card[];
  readonly capturePile: readonly Card[];
}

export interface GameAction {
  readonly userId: string;
  readonly type: ActionType;
  readonly cardPlayed: Card;
  readonly cardsCaptured: readonly Card[];
  readonly description: string;
  readonly version: number;
}

export interface GameConfig {
  readonly targetScore: number;
  readonly maxActionLog: number;
}

export interface GameState {
  readonly gameId: string;
  readonly mode: GameMode;
  readonly phase: GamePhase;
  readonly players: readonly PlayerState[];
  readonly currentPlayerIndex: number;
  readonly tableCards: readonly Card[];
  readonly builds: readonly Build[];
  readonly drawPile: readonly Card[];
  readonly lastCapturerIndex?: number | undefined;
  readonly isSecondDeal: boolean;
  readonly matchScores: Readonly<Record<string, number>>;
  readonly handScores?: Readonly<Record<string, number>> | undefined;
  readonly winnerUserIds?: readonly string[] | undefined;
  readonly handNumber: number;
  readonly actionLog: readonly GameAction[];
  readonly version: number;
  readonly config: GameConfig;
}

export interface PublicPlayerState {
  userId: string;
  displayName: string;
  seatIndex: number;
  handCount: number;
  capturedCount: number;
  capturePileTop?: Card | undefined;
  matchScore: number;
}

export interface ClientGameView {
  gameId: string;
  mode: GameMode;
  phase: GamePhase;
  players: PublicPlayerState[];
  meHand: Card[];
  currentPlayerIndex: number;
  tableCards: Card[];
  builds: Build[];
  drawPileCount: number;
  isSecondDeal: boolean;
  handNumber: number;
  handScores?: Record<string, number> | undefined;
  winnerUserIds?: string[] | undefined;
  actionLog: GameAction[];
  version: number;
}

export interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: unknown | undefined;
}
