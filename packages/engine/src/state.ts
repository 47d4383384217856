import {
  DEAL_LAYOUT,
  DEFAULT_MAX_ACTION_LOG,
  DEFAULT_TARGET_SCORE,
  type Build,
  type Card,
  type CardGroup,
  type GameState,
  type PlayerState,
} from '@kasino/shared';
import { createDeck, isValidDeck, shuffleDeck, validatePlayerCount } from './deck';
import { EngineContractError, type InitializeGameConfig, type NextHandOptions } from './types';

const dealLayout = (playerCount: number) => {
  if (playerCount === 2 || playerCount === 3 || playerCount === 4) {
    return DEAL_LAYOUT[playerCount];
  }
  throw new Error('player count out of range');
};

/**
 * Deals the first hand. Without a `seed` the shuffle is seeded from
 * `gameId` and `handNumber`, so the same id always deals the same cards;
 * pass a seed for a different deal.
 */
export const initializeGame = (config: InitializeGameConfig): GameState => {
  if (!validatePlayerCount(config.players.length)) {
    throw new Error('player count out of range');
  }

  const deckSource = config.deck ?? createDeck();
  if (!isValidDeck(deckSource)) {
    throw new Error('deck must hold each of the 40 cards exactly once');
  }

  const seed = config.seed ?? `${config.gameId}:${config.handNumber ?? 1}`;
  const shuffled = config.shuffle === false ? [...deckSource] : shuffleDeck(deckSource, seed);
  const layout = dealLayout(config.players.length);

  const players: PlayerState[] = config.players.map((player, index) => ({
    userId: player.userId,
    displayName: player.displayName,
    hand: shuffled.slice(index * layout.handSize, (index + 1) * layout.handSize),
    capturePile: [],
  }));
  const dealt = config.players.length * layout.handSize;

  const matchScores: Record<string, number> = {};
  for (const player of players) {
    matchScores[player.userId] = config.matchScores?.[player.userId] ?? 0;
  }

  return {
    gameId: config.gameId,
    mode: config.mode,
    phase: 'PLAYING',
    players,
    currentPlayerIndex: 0,
    tableCards: shuffled.slice(dealt, dealt + layout.tableCards),
    builds: [],
    drawPile: shuffled.slice(dealt + layout.tableCards),
    isSecondDeal: false,
    matchScores,
    handNumber: config.handNumber ?? 1,
    actionLog: [],
    version: 1,
    config: {
      targetScore: config.targetScore ?? DEFAULT_TARGET_SCORE,
      maxActionLog: config.maxActionLog ?? DEFAULT_MAX_ACTION_LOG,
    },
  };
};

/** Deals the following hand of a match once the current one has been scored. */
export const startNextHand = (state: GameState, options: NextHandOptions = {}): GameState => {
  if (state.phase !== 'SCORING' || !state.handScores) {
    throw new EngineContractError('next hand can only be dealt after the current hand is scored');
  }

  const next = initializeGame({
    gameId: state.gameId,
    mode: state.mode,
    players: state.players.map((player) => ({ userId: player.userId, displayName: player.displayName })),
    targetScore: state.config.targetScore,
    maxActionLog: state.config.maxActionLog,
    matchScores: state.matchScores,
    handNumber: state.handNumber + 1,
    ...(options.seed !== undefined ? { seed: options.seed } : {}),
    ...(options.deck ? { deck: options.deck } : {}),
    ...(options.shuffle !== undefined ? { shuffle: options.shuffle } : {}),
  });
  return { ...next, version: state.version + 1 };
};

export const currentPlayer = (state: GameState): PlayerState => {
  const player = state.players[state.currentPlayerIndex];
  if (!player) {
    throw new EngineContractError(`no player at index ${state.currentPlayerIndex}`);
  }
  return player;
};

export const isPlayingPhase = (state: GameState): boolean =>
  state.phase === 'PLAYING' || state.phase === 'PLAYING_SECOND';

export const ownedBuilds = (state: GameState, userId: string): Build[] =>
  state.builds.filter((build) => build.ownerId === userId);

export const ownsBuild = (state: GameState, userId: string): boolean =>
  state.builds.some((build) => build.ownerId === userId);

export const canDrift = (state: GameState): boolean =>
  state.isSecondDeal || !ownsBuild(state, currentPlayer(state).userId);

export const allHandsEmpty = (state: GameState): boolean => state.players.every((player) => player.hand.length === 0);

export const nextPlayerIndex = (state: GameState): number => (state.currentPlayerIndex + 1) % state.players.length;

export const buildCards = (build: Build): Card[] => build.groups.flatMap((group) => [...group]);

export const buildId = (groups: readonly CardGroup[]): string => {
  const ids = groups.flatMap((group) => group.map((card) => card.id)).sort();
  return `build_${ids.join('_')}`;
};

export const findBuild = (state: GameState, id: string): Build | undefined =>
  state.builds.find((build) => build.id === id);

export const findCardById = (cards: readonly Card[], id: string): Card | undefined =>
  cards.find((card) => card.id === id);

export const containsCard = (cards: readonly Card[], card: Card): boolean =>
  cards.some((candidate) => candidate.id === card.id);

export const withoutCards = (cards: readonly Card[], removed: readonly Card[]): Card[] => {
  const ids = new Set(removed.map((card) => card.id));
  return cards.filter((card) => !ids.has(card.id));
};

export const opponentTopCards = (state: GameState): Map<string, Card> => {
  const me = currentPlayer(state).userId;
  const tops = new Map<string, Card>();
  for (const player of state.players) {
    const top = player.capturePile[player.capturePile.length - 1];
    if (player.userId !== me && top) {
      tops.set(player.userId, top);
    }
  }
  return tops;
};

export const capturedCounts = (state: GameState): Record<string, number> =>
  Object.fromEntries(state.players.map((player) => [player.userId, player.capturePile.length]));

/** Every card id in the snapshot, wherever it sits. */
export const allCardIds = (state: GameState): string[] => [
  ...state.tableCards.map((card) => card.id),
  ...state.builds.flatMap((build) => buildCards(build).map((card) => card.id)),
  ...state.drawPile.map((card) => card.id),
  ...state.players.flatMap((player) => [
    ...player.hand.map((card) => card.id),
    ...player.capturePile.map((card) => card.id),
  ]),
];

export const replacePlayer = (
  players: readonly PlayerState[],
  index: number,
  patch: Partial<Pick<PlayerState, 'hand' | 'capturePile'>>,
): PlayerState[] => players.map((player, i) => (i === index ? { ...player, ...patch } : player));

/**
 * Removes `stolen` from the tops of the current player's opponents' capture
 * piles. Returns `null` when any stolen card is not part of an unbroken top
 * segment of one opponent's pile.
 */
export const peelStolenCards = (state: GameState, stolen: readonly Card[]): PlayerState[] | null => {
  if (stolen.length === 0) {
    return [...state.players];
  }

  const stolenIds = new Set(stolen.map((card) => card.id));
  let matched = 0;
  const players = state.players.map((player, index) => {
    if (index === state.currentPlayerIndex) {
      return player;
    }
    let keep = player.capturePile.length;
    while (keep > 0) {
      const card = player.capturePile[keep - 1];
      if (!card || !stolenIds.has(card.id)) {
        break;
      }
      keep -= 1;
    }
    matched += player.capturePile.length - keep;
    return keep === player.capturePile.length ? player : { ...player, capturePile: player.capturePile.slice(0, keep) };
  });

  return matched === stolenIds.size && stolenIds.size === stolen.length ? players : null;
};
