import type { Logger } from 'pino';
import { chooseAutoplayAction } from './autoplay';
import type { AppConfig } from './config';
import type { MatchService } from './service/match-service';

const seatNames = ['North', 'East', 'South', 'West'];

export type PlayMatchConfig = Pick<AppConfig, 'playerCount' | 'mode' | 'targetScore' | 'seed' | 'maxHandsPerMatch'>;

/** Plays one match to the end with every seat on autoplay and returns the match scores. */
export const playMatch = async (
  service: MatchService,
  config: PlayMatchConfig,
  index: number,
  logger: Logger,
): Promise<Record<string, number>> => {
  const seed = config.seed === undefined ? undefined : `${config.seed}:${index}`;
  const { matchId } = await service.createMatch({
    players: seatNames.slice(0, config.playerCount).map((displayName) => ({ displayName })),
    mode: config.mode,
    targetScore: config.targetScore,
    ...(seed !== undefined ? { seed } : {}),
  });

  for (let hand = 1; hand <= config.maxHandsPerMatch; hand += 1) {
    let state = await service.getMatch(matchId);
    while (state.phase === 'PLAYING' || state.phase === 'PLAYING_SECOND') {
      const player = state.players[state.currentPlayerIndex];
      if (!player) {
        throw new Error(`no player at seat ${state.currentPlayerIndex}`);
      }
      ({ state } = await service.submit(matchId, player.userId, chooseAutoplayAction(state)));
    }

    ({ state } = await service.scoreHand(matchId));
    if (state.phase === 'GAME_OVER') {
      await service.closeMatch(matchId);
      return state.matchScores;
    }
    await service.nextHand(matchId, seed === undefined ? undefined : `${seed}:${hand + 1}`);
  }

  logger.warn({ matchId, maxHandsPerMatch: config.maxHandsPerMatch }, 'match stopped at hand limit');
  const { matchScores } = await service.getMatch(matchId);
  await service.closeMatch(matchId);
  return matchScores;
};
