import type { Logger } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { chooseAutoplayAction } from '../../src/autoplay';
import { playMatch } from '../../src/play-match';
import { MatchService, ServiceError } from '../../src/service/match-service';
import { InMemoryMatchStore } from '../../src/store/in-memory-match-store';

const createLogger = (): Logger =>
  ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }) as unknown as Logger;

const setupMatch = async () => {
  const logger = createLogger();
  const store = new InMemoryMatchStore();
  const service = new MatchService(store, logger, { maxActionLog: 10 });
  const created = await service.createMatch({
    players: [{ displayName: 'Alice' }, { displayName: 'Bob' }],
    seed: 'service-test',
  });
  const [first, second] = created.userIds;
  if (!first || !second) {
    throw new Error('expected two players');
  }
  return { logger, store, service, matchId: created.matchId, first, second };
};

const expectServiceError = async (promise: Promise<unknown>, code: string): Promise<void> => {
  await expect(promise).rejects.toBeInstanceOf(ServiceError);
  await expect(promise).rejects.toMatchObject({ code });
};

describe('MatchService', () => {
  it('creates a dealt match and stores it', async () => {
    const { service, store, matchId } = await setupMatch();

    const state = await service.getMatch(matchId);
    expect(state.phase).toBe('PLAYING');
    expect(state.mode).toBe('PRACTICE');
    expect(state.config).toEqual({ targetScore: 11, maxActionLog: 10 });
    expect(state.players.map((player) => player.displayName)).toEqual(['Alice', 'Bob']);
    expect(state.players.map((player) => player.hand.length)).toEqual([10, 10]);
    expect(await store.listMatchIds()).toEqual([matchId]);
  });

  it('rejects a malformed create payload', async () => {
    const service = new MatchService(new InMemoryMatchStore(), createLogger());

    await expectServiceError(service.createMatch({ players: [{ displayName: 'Solo' }] }), 'INVALID_PAYLOAD');
  });

  it('reports unknown matches', async () => {
    const service = new MatchService(new InMemoryMatchStore(), createLogger());

    await expectServiceError(service.getMatch('missing'), 'MATCH_NOT_FOUND');
  });

  it('applies a move from the current player', async () => {
    const { service, matchId, first, logger } = await setupMatch();
    const before = await service.getMatch(matchId);

    const outcome = await service.submit(matchId, first, chooseAutoplayAction(before));

    expect(outcome.state.version).toBe(before.version + 2);
    expect(outcome.state.currentPlayerIndex).toBe(1);
    expect(outcome.effects[0]?.type).toBe('MOVE_APPLIED');
    expect(await service.getMatch(matchId)).toEqual(outcome.state);
    expect(logger.debug).toHaveBeenCalledTimes(1);
  });

  it('refuses moves out of turn', async () => {
    const { service, matchId, second } = await setupMatch();
    const state = await service.getMatch(matchId);

    await expectServiceError(service.submit(matchId, second, chooseAutoplayAction(state)), 'NOT_YOUR_TURN');
  });

  it('refuses payloads that are not actions', async () => {
    const { service, matchId, first } = await setupMatch();

    await expectServiceError(service.submit(matchId, first, { type: 'PASS' }), 'INVALID_PAYLOAD');
  });

  it('surfaces engine rejections as service errors', async () => {
    const { service, matchId } = await setupMatch();

    await expectServiceError(service.scoreHand(matchId), 'NOT_SCORING');
    await expectServiceError(service.nextHand(matchId), 'NOT_SCORING');
  });

  it('serializes concurrent moves on one match', async () => {
    const { service, matchId, first } = await setupMatch();
    const state = await service.getMatch(matchId);
    const action = chooseAutoplayAction(state);

    const results = await Promise.allSettled([
      service.submit(matchId, first, action),
      service.submit(matchId, first, action),
    ]);

    expect(results[0]?.status).toBe('fulfilled');
    expect(results[1]).toMatchObject({ status: 'rejected', reason: { code: 'NOT_YOUR_TURN' } });
    expect((await service.getMatch(matchId)).version).toBe(state.version + 2);
  });

  it('projects a per-player view', async () => {
    const { service, matchId, first } = await setupMatch();

    const view = await service.getView(matchId, first);

    expect(view.meHand).toHaveLength(10);
    expect(view.players.map((player) => player.handCount)).toEqual([10, 10]);
    expect(view.drawPileCount).toBe(20);
  });

  it('removes a closed match from the store', async () => {
    const { service, store, matchId } = await setupMatch();

    await service.closeMatch(matchId);

    expect(await store.listMatchIds()).toEqual([]);
    await expectServiceError(service.getMatch(matchId), 'MATCH_NOT_FOUND');
    await expectServiceError(service.closeMatch(matchId), 'MATCH_NOT_FOUND');
  });

  it('turns unexpected failures into internal errors', () => {
    const logger = createLogger();
    const service = new MatchService(new InMemoryMatchStore(), logger);

    const failure = service.handleFailure(new Error('boom'), { match: 1 });

    expect(failure.code).toBe('INTERNAL_ERROR');
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(service.handleFailure(new ServiceError('NOT_YOUR_TURN', 'wait')).code).toBe('NOT_YOUR_TURN');
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('playMatch', () => {
  it('plays seeded hands until someone reaches the target', async () => {
    const logger = createLogger();
    const store = new InMemoryMatchStore();
    const service = new MatchService(store, logger);

    const scores = await playMatch(
      service,
      { playerCount: 2, mode: 'PRACTICE', targetScore: 11, seed: 'autoplay', maxHandsPerMatch: 40 },
      1,
      logger,
    );

    expect(Object.keys(scores)).toHaveLength(2);
    expect(Math.max(...Object.values(scores))).toBeGreaterThanOrEqual(11);
    expect(logger.warn).not.toHaveBeenCalled();
    expect(await store.listMatchIds()).toEqual([]);
  });

  it('closes a match stopped at the hand limit', async () => {
    const logger = createLogger();
    const store = new InMemoryMatchStore();
    const service = new MatchService(store, logger);

    const scores = await playMatch(
      service,
      { playerCount: 2, mode: 'PRACTICE', targetScore: 100, seed: 'limit', maxHandsPerMatch: 1 },
      1,
      logger,
    );

    expect(Object.keys(scores)).toHaveLength(2);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(await store.listMatchIds()).toEqual([]);
  });

  it('plays three-player matches', async () => {
    const logger = createLogger();
    const service = new MatchService(new InMemoryMatchStore(), logger);

    const scores = await playMatch(
      service,
      { playerCount: 3, mode: 'MULTIPLAYER', targetScore: 11, seed: 'autoplay', maxHandsPerMatch: 40 },
      2,
      logger,
    );

    expect(Object.keys(scores)).toHaveLength(3);
    expect(Math.max(...Object.values(scores))).toBeGreaterThanOrEqual(11);
  });
});
