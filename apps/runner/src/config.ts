import { DEFAULT_MAX_ACTION_LOG, DEFAULT_TARGET_SCORE, MAX_PLAYERS, MIN_PLAYERS, gameModeSchema, type GameMode } from '@kasino/shared';
import { z } from 'zod';

const rawEnvSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.string().default('development'),
  PLAYER_COUNT: z.coerce.number().int().min(MIN_PLAYERS).max(MAX_PLAYERS).default(MIN_PLAYERS),
  TARGET_SCORE: z.coerce.number().int().min(1).default(DEFAULT_TARGET_SCORE),
  MAX_ACTION_LOG: z.coerce.number().int().min(1).default(DEFAULT_MAX_ACTION_LOG),
  MATCH_COUNT: z.coerce.number().int().min(1).default(1),
  MAX_HANDS_PER_MATCH: z.coerce.number().int().min(1).default(40),
  SEED: z.string().trim().min(1).optional(),
  GAME_MODE: gameModeSchema.default('PRACTICE'),
});

export interface AppConfig {
  logLevel: string;
  nodeEnv: string;
  isProduction: boolean;
  playerCount: number;
  targetScore: number;
  maxActionLog: number;
  matchCount: number;
  maxHandsPerMatch: number;
  seed: string | undefined;
  mode: GameMode;
}

export const parseConfigFromEnv = (env: NodeJS.ProcessEnv): AppConfig => {
  const raw = rawEnvSchema.parse(env);

  if (raw.GAME_MODE === 'SINGLE_PLAYER' && raw.PLAYER_COUNT !== MIN_PLAYERS) {
    throw new Error('GAME_MODE=SINGLE_PLAYER is played by exactly two seats');
  }

  return {
    logLevel: raw.LOG_LEVEL,
    nodeEnv: raw.NODE_ENV,
    isProduction: raw.NODE_ENV === 'production',
    playerCount: raw.PLAYER_COUNT,
    targetScore: raw.TARGET_SCORE,
    maxActionLog: raw.MAX_ACTION_LOG,
    matchCount: raw.MATCH_COUNT,
    maxHandsPerMatch: raw.MAX_HANDS_PER_MATCH,
    seed: raw.SEED,
    mode: raw.GAME_MODE,
  };
};
