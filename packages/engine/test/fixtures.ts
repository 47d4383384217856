import { DEFAULT_MAX_ACTION_LOG, DEFAULT_TARGET_SCORE, RANKS, SUITS } from '@kasino/shared';
import { createDeck } from '../src';
import type { Build, Card, GameState, PlayerState } from '@kasino/shared';

export const card = (id: string): Card => {
  const [suitPart, rankPart] = id.split('-');
  const suit = SUITS.find((candidate) => candidate === suitPart);
  const rank = RANKS.find((candidate) => candidate === Number(rankPart));
  if (!suit || !rank) {
    throw new Error(`bad card id ${id}`);
  }
  return { id, rank, suit };
};

export const cards = (...ids: string[]): Card[] => ids.map(card);

export const ids = (list: readonly Card[]): string[] => list.map((entry) => entry.id);

export const build = (ownerId: string, value: number, ...groups: string[][]): Build => ({
  id: `build_${groups.flat().sort().join('_')}`,
  ownerId,
  value,
  groups: groups.map((group) => cards(...group)),
});

export interface StateFixture {
  hands: string[][];
  piles?: string[][];
  table?: string[];
  builds?: Build[];
  drawPile?: string[];
  currentPlayerIndex?: number;
  lastCapturerIndex?: number;
  isSecondDeal?: boolean;
  phase?: GameState['phase'];
  matchScores?: Record<string, number>;
  targetScore?: number;
  maxActionLog?: number;
  /** Puts every card the fixture does not place into the draw pile. */
  completeDeck?: boolean;
}

export const makeState = (fixture: StateFixture): GameState => {
  const players: PlayerState[] = fixture.hands.map((hand, index) => ({
    userId: `u${index + 1}`,
    displayName: `P${index + 1}`,
    hand: cards(...hand),
    capturePile: cards(...(fixture.piles?.[index] ?? [])),
  }));

  const placed = [
    ...fixture.hands.flat(),
    ...(fixture.piles ?? []).flat(),
    ...(fixture.table ?? []),
    ...(fixture.builds ?? []).flatMap((entry) => entry.groups.flat().map((member) => member.id)),
    ...(fixture.drawPile ?? []),
  ];
  const rest = fixture.completeDeck ? ids(createDeck()).filter((id) => !placed.includes(id)) : [];

  return {
    gameId: 'g1',
    mode: 'PRACTICE',
    phase: fixture.phase ?? (fixture.isSecondDeal ? 'PLAYING_SECOND' : 'PLAYING'),
    players,
    currentPlayerIndex: fixture.currentPlayerIndex ?? 0,
    tableCards: cards(...(fixture.table ?? [])),
    builds: fixture.builds ?? [],
    drawPile: cards(...(fixture.drawPile ?? []), ...rest),
    ...(fixture.lastCapturerIndex !== undefined ? { lastCapturerIndex: fixture.lastCapturerIndex } : {}),
    isSecondDeal: fixture.isSecondDeal ?? false,
    matchScores: fixture.matchScores ?? Object.fromEntries(players.map((player) => [player.userId, 0])),
    handNumber: 1,
    actionLog: [],
    version: 1,
    config: {
      targetScore: fixture.targetScore ?? DEFAULT_TARGET_SCORE,
      maxActionLog: fixture.maxActionLog ?? DEFAULT_MAX_ACTION_LOG,
    },
  };
};

export const players = [
  { userId: 'u1', displayName: 'P1' },
  { userId: 'u2', displayName: 'P2' },
];

export const deckIds = (): string[] => ids(createDeck()).sort();
