import { z } from 'zod';
import {
  ACTION_TYPES,
  DEFAULT_TARGET_SCORE,
  GAME_MODES,
  GAME_PHASES,
  MAX_CAPTURE_VALUE,
  MAX_PLAYERS,
  MIN_PLAYERS,
  RANKS,
  SUITS,
} from './constants';
import { ERROR_CODES } from './errors';
import type { Rank } from './types';

const isRank = (value: number): value is Rank => RANKS.some((rank) => rank === value);

export const suitSchema = z.enum(SUITS);
export const rankSchema = z.number().int().refine(isRank, { message: 'rank must be between 1 and 10' });
export const gamePhaseSchema = z.enum(GAME_PHASES);
export const gameModeSchema = z.enum(GAME_MODES);
export const actionTypeSchema = z.enum(ACTION_TYPES);

export const cardIdSchema = z.string().trim().min(1);
export const displayNameSchema = z.string().trim().min(2).max(24);
export const captureValueSchema = z.number().int().min(1).max(MAX_CAPTURE_VALUE);

export const cardSchema = z.object({
  id: cardIdSchema,
  rank: rankSchema,
  suit: suitSchema,
});

export const buildSchema = z.object({
  id: z.string().min(1),
  ownerId: z.string().min(1),
  value: captureValueSchema,
  groups: z.array(z.array(cardSchema).min(1)).min(1),
});

export const gameActionSchema = z.object({
  userId: z.string().min(1),
  type: actionTypeSchema,
  cardPlayed: cardSchema,
  cardsCaptured: z.array(cardSchema),
  description: z.string(),
  version: z.number().int().nonnegative(),
});

export const publicPlayerSchema = z.object({
  userId: z.string().min(1),
  displayName: z.string(),
  seatIndex: z.number().int().min(0).max(MAX_PLAYERS - 1),
  handCount: z.number().int().min(0),
  capturedCount: z.number().int().min(0),
  capturePileTop: cardSchema.optional(),
  matchScore: z.number().int(),
});

export const clientGameViewSchema = z.object({
  gameId: z.string().min(1),
  mode: gameModeSchema,
  phase: gamePhaseSchema,
  players: z.array(publicPlayerSchema).min(MIN_PLAYERS).max(MAX_PLAYERS),
  meHand: z.array(cardSchema),
  currentPlayerIndex: z.number().int().min(0),
  tableCards: z.array(cardSchema),
  builds: z.array(buildSchema),
  drawPileCount: z.number().int().nonnegative(),
  isSecondDeal: z.boolean(),
  handNumber: z.number().int().positive(),
  handScores: z.record(z.number().int()).optional(),
  winnerUserIds: z.array(z.string()).optional(),
  actionLog: z.array(gameActionSchema),
  version: z.number().int().nonnegative(),
});

export const engineActionSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('CAPTURE'),
    cardId: cardIdSchema,
    optionIndex: z.number().int().nonnegative().optional(),
  }),
  z.object({
    type: z.literal('BUILD'),
    cardId: cardIdSchema.optional(),
    tableCardIds: z.array(cardIdSchema),
    declaredValue: z.number().int(),
    stolenCardIds: z.array(cardIdSchema).optional(),
  }),
  z.object({
    type: z.literal('AUGMENT'),
    buildId: z.string().min(1),
    tableCardIds: z.array(cardIdSchema),
    cardId: cardIdSchema.optional(),
    stolenCardId: cardIdSchema.optional(),
  }),
  z.object({
    type: z.literal('INCREASE'),
    buildId: z.string().min(1),
    cardId: cardIdSchema,
  }),
  z.object({
    type: z.literal('DRIFT'),
    cardId: cardIdSchema,
  }),
  z.object({
    type: z.literal('SCORE_HAND'),
  }),
  z.object({
    type: z.literal('NEXT_HAND'),
    seed: z.union([z.string(), z.number()]).optional(),
  }),
]);

export const createMatchSchema = z.object({
  players: z
    .array(z.object({ displayName: displayNameSchema }))
    .min(MIN_PLAYERS)
    .max(MAX_PLAYERS),
  mode: gameModeSchema.default('PRACTICE'),
  targetScore: z.number().int().positive().default(DEFAULT_TARGET_SCORE),
  seed: z.union([z.string(), z.number()]).optional(),
});

export const serviceErrorSchema = z.object({
  code: z.enum(ERROR_CODES),
  message: z.string(),
  details: z.unknown().optional(),
});

export type EngineAction = z.infer<typeof engineActionSchema>;
export type CreateMatchPayload = z.infer<typeof createMatchSchema>;
