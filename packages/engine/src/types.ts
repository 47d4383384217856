import type { ActionType, Build, Card, ErrorCode, GameMode, GameState, ServiceError } from '@kasino/shared';

export interface InitialPlayer {
  userId: string;
  displayName: string;
}

export interface InitializeGameConfig {
  gameId: string;
  mode: GameMode;
  players: InitialPlayer[];
  seed?: string | number;
  deck?: readonly Card[];
  shuffle?: boolean;
  targetScore?: number;
  maxActionLog?: number;
  matchScores?: Readonly<Record<string, number>>;
  handNumber?: number;
}

export interface NextHandOptions {
  seed?: string | number;
  deck?: readonly Card[];
  shuffle?: boolean;
}

export interface CaptureOption {
  handCard: Card;
  singles: Card[];
  builds: Build[];
  combinations: Card[][];
  capturedCards: Card[];
  totalCaptured: number;
  description: string;
}

export interface CreateBuildInput {
  handCard?: Card | undefined;
  tableCards: readonly Card[];
  declaredValue: number;
  stolenCards?: readonly Card[] | undefined;
}

export interface AugmentBuildInput {
  buildId: string;
  tableCards: readonly Card[];
  handCard?: Card | undefined;
  stolenCard?: Card | undefined;
}

export interface IncreaseBuildInput {
  buildId: string;
  handCard: Card;
}

/** `state` is the input snapshot itself whenever `error` is set. */
export interface MoveResult {
  state: GameState;
  error?: ServiceError;
}

export type EngineEffect =
  | {
      type: 'MOVE_APPLIED';
      userId: string;
      actionType: ActionType;
      description: string;
    }
  | {
      type: 'SECOND_DEAL';
      cardsPerPlayer: number;
    }
  | {
      type: 'HAND_ENDED';
      handNumber: number;
      sweptByUserId?: string;
      sweptCount: number;
    }
  | {
      type: 'HAND_SCORED';
      handNumber: number;
      handScores: Record<string, number>;
      matchScores: Record<string, number>;
    }
  | {
      type: 'MATCH_FINISHED';
      winnerUserIds: string[];
    }
  | {
      type: 'HAND_STARTED';
      handNumber: number;
    };

export type ValidationResult = { ok: true } | { ok: false; code: ErrorCode };

export interface EngineResult {
  state: GameState;
  effects: EngineEffect[];
  error?: ServiceError;
}

export class EngineContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineContractError';
  }
}
