import { applyAction, buildClientView, initializeGame, isMoveAction, type EngineEffect } from '@kasino/engine';
import {
  DEFAULT_MAX_ACTION_LOG,
  createMatchSchema,
  engineActionSchema,
  type ClientGameView,
  type EngineAction,
  type ErrorCode,
  type GameState,
} from '@kasino/shared';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { MatchStore } from '../store/match-store';

export class ServiceError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ServiceError';
  }
}

export interface MatchServiceOptions {
  maxActionLog?: number;
}

export interface CreatedMatch {
  matchId: string;
  userIds: string[];
  state: GameState;
}

export interface ActionOutcome {
  state: GameState;
  effects: EngineEffect[];
}

export class MatchService {
  private readonly mutationQueueByMatchId = new Map<string, Promise<void>>();

  constructor(
    private readonly store: MatchStore,
    private readonly logger: Logger,
    private readonly options: MatchServiceOptions = {},
  ) {}

  private async withMatchMutationLock<T>(matchId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.mutationQueueByMatchId.get(matchId) ?? Promise.resolve();
    let release: (() => void) | undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const queued = previous.then(() => current);
    this.mutationQueueByMatchId.set(matchId, queued);

    await previous;
    try {
      return await task();
    } finally {
      release?.();
      if (this.mutationQueueByMatchId.get(matchId) === queued) {
        this.mutationQueueByMatchId.delete(matchId);
      }
    }
  }

  async createMatch(payload: unknown): Promise<CreatedMatch> {
    const parsed = createMatchSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ServiceError('INVALID_PAYLOAD', 'invalid match payload', parsed.error.issues);
    }

    const matchId = uuidv4();
    const players = parsed.data.players.map((player) => ({ userId: uuidv4(), displayName: player.displayName }));
    const state = initializeGame({
      gameId: matchId,
      mode: parsed.data.mode,
      players,
      targetScore: parsed.data.targetScore,
      maxActionLog: this.options.maxActionLog ?? DEFAULT_MAX_ACTION_LOG,
      ...(parsed.data.seed !== undefined ? { seed: parsed.data.seed } : {}),
    });

    await this.store.saveMatch(state);
    this.logger.info({ matchId, players: players.length, mode: state.mode }, 'match created');
    return { matchId, userIds: players.map((player) => player.userId), state };
  }

  async getMatch(matchId: string): Promise<GameState> {
    const state = await this.store.getMatch(matchId);
    if (!state) {
      throw new ServiceError('MATCH_NOT_FOUND', `match ${matchId} does not exist`);
    }
    return state;
  }

  /** Drops a match from the store once its result has been read. */
  async closeMatch(matchId: string): Promise<void> {
    await this.withMatchMutationLock(matchId, async () => {
      const state = await this.getMatch(matchId);
      await this.store.deleteMatch(matchId);
      this.logger.info({ matchId, phase: state.phase, handNumber: state.handNumber }, 'match closed');
    });
  }

  async getView(matchId: string, userId: string): Promise<ClientGameView> {
    return buildClientView(await this.getMatch(matchId), userId);
  }

  async submit(matchId: string, userId: string, payload: unknown): Promise<ActionOutcome> {
    const parsed = engineActionSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ServiceError('INVALID_PAYLOAD', 'invalid action payload', parsed.error.issues);
    }
    const action = parsed.data;

    return this.withMatchMutationLock(matchId, async () => {
      const state = await this.getMatch(matchId);
      if (isMoveAction(action) && state.players[state.currentPlayerIndex]?.userId !== userId) {
        throw new ServiceError('NOT_YOUR_TURN', 'it is not your turn');
      }
      return this.consumeEngineResult(state, action);
    });
  }

  async scoreHand(matchId: string): Promise<ActionOutcome> {
    return this.withMatchMutationLock(matchId, async () =>
      this.consumeEngineResult(await this.getMatch(matchId), { type: 'SCORE_HAND' }),
    );
  }

  async nextHand(matchId: string, seed?: string | number): Promise<ActionOutcome> {
    return this.withMatchMutationLock(matchId, async () =>
      this.consumeEngineResult(
        await this.getMatch(matchId),
        seed === undefined ? { type: 'NEXT_HAND' } : { type: 'NEXT_HAND', seed },
      ),
    );
  }

  private async consumeEngineResult(state: GameState, action: EngineAction): Promise<ActionOutcome> {
    const result = applyAction(state, action);
    if (result.error) {
      throw new ServiceError(result.error.code, result.error.message);
    }

    await this.store.saveMatch(result.state);

    for (const effect of result.effects) {
      this.logEffect(state.gameId, effect);
    }
    return { state: result.state, effects: result.effects };
  }

  private logEffect(matchId: string, effect: EngineEffect): void {
    switch (effect.type) {
      case 'MOVE_APPLIED':
        this.logger.debug({ matchId, userId: effect.userId, actionType: effect.actionType }, effect.description);
        return;
      case 'SECOND_DEAL':
        this.logger.info({ matchId, cardsPerPlayer: effect.cardsPerPlayer }, 'second deal');
        return;
      case 'HAND_ENDED':
        this.logger.info(
          { matchId, handNumber: effect.handNumber, sweptByUserId: effect.sweptByUserId, sweptCount: effect.sweptCount },
          'hand ended',
        );
        return;
      case 'HAND_SCORED':
        this.logger.info(
          { matchId, handNumber: effect.handNumber, handScores: effect.handScores, matchScores: effect.matchScores },
          'hand scored',
        );
        return;
      case 'MATCH_FINISHED':
        this.logger.info({ matchId, winnerUserIds: effect.winnerUserIds }, 'match finished');
        return;
      case 'HAND_STARTED':
        this.logger.info({ matchId, handNumber: effect.handNumber }, 'hand started');
        return;
    }
  }

  handleFailure(error: unknown, context: Record<string, unknown> = {}): ServiceError {
    if (error instanceof ServiceError) {
      this.logger.warn({ ...context, errorCode: error.code }, error.message);
      return error;
    }

    this.logger.error({ ...context, error }, 'unexpected match service failure');
    return new ServiceError('INTERNAL_ERROR', 'unexpected match service error');
  }
}
