import { MAX_CAPTURE_VALUE, type Build, type Card, type GameState, type PlayerState } from '@kasino/shared';
import { recordAction } from './action-log';
import { partitionExactSums } from './combinatorics';
import { captureValue, cardLabel, sumValues } from './deck';
import { reject } from './result';
import {
  buildCards,
  buildId,
  containsCard,
  currentPlayer,
  findBuild,
  isPlayingPhase,
  ownedBuilds,
  peelStolenCards,
  replacePlayer,
  withoutCards,
} from './state';
import type { AugmentBuildInput, CreateBuildInput, IncreaseBuildInput, MoveResult } from './types';

export const describeBuild = (build: Build): string =>
  `[${build.value}: ${build.groups.map((group) => group.map(cardLabel).join('+')).join(' | ')}]`;

const holdsCaptureCard = (player: PlayerState, value: number, played?: Card): boolean =>
  player.hand.some((card) => captureValue(card) === value && card.id !== played?.id);

const allLooseOnTable = (state: GameState, cards: readonly Card[]): boolean =>
  new Set(cards.map((card) => card.id)).size === cards.length &&
  cards.every((card) => containsCard(state.tableCards, card));

const isCaptureValue = (value: number): boolean => Number.isInteger(value) && value >= 1 && value <= MAX_CAPTURE_VALUE;

const withPlayedCard = (players: readonly PlayerState[], index: number, handCard?: Card): PlayerState[] => {
  const player = players[index];
  if (!player || !handCard) {
    return [...players];
  }
  return replacePlayer(players, index, { hand: withoutCards(player.hand, [handCard]) });
};

/**
 * Builds `declaredValue` from the selected table cards, an optional hand card
 * and cards stolen from the tops of opponents' capture piles.
 */
export const createBuild = (state: GameState, input: CreateBuildInput): MoveResult => {
  const { handCard, tableCards, declaredValue } = input;
  const stolenCards = input.stolenCards ?? [];

  if (!isPlayingPhase(state)) {
    return reject(state, 'NOT_PLAYING', 'builds can only be made during play');
  }
  if (!isCaptureValue(declaredValue)) {
    return reject(state, 'INVALID_VALUE', `cannot build ${declaredValue}`);
  }
  if (stolenCards.length > 0 && !handCard) {
    return reject(state, 'STEAL_REQUIRES_HAND_CARD', 'stealing requires playing a card from hand');
  }

  const player = currentPlayer(state);
  const owned = ownedBuilds(state, player.userId);
  if (owned.some((build) => build.value !== declaredValue)) {
    return reject(state, 'OWNS_OTHER_BUILD', 'resolve your existing build first');
  }
  if (handCard && !containsCard(player.hand, handCard)) {
    return reject(state, 'CARD_NOT_IN_HAND', `${handCard.id} is not in hand`);
  }
  if (!allLooseOnTable(state, tableCards)) {
    return reject(state, 'CARD_NOT_ON_TABLE', 'selected cards must be loose on the table');
  }

  const contributors = [...tableCards, ...(handCard ? [handCard] : []), ...stolenCards];
  const cardPlayed = handCard ?? tableCards[0];
  if (!cardPlayed) {
    return reject(state, 'EMPTY_BUILD', 'a build needs at least one card');
  }
  if (!holdsCaptureCard(player, declaredValue, handCard)) {
    return reject(state, 'NO_CAPTURE_CARD', `no ${declaredValue} left in hand to capture the build`);
  }

  const peeled = peelStolenCards(state, stolenCards);
  if (!peeled) {
    return reject(state, 'STOLEN_CARD_NOT_ON_TOP', 'only the top of an opponent capture pile can be stolen');
  }

  const groups = partitionExactSums(contributors, declaredValue, captureValue);
  if (!groups) {
    return reject(state, 'NO_EXACT_PARTITION', `cards cannot be grouped into sums of ${declaredValue}`);
  }

  // a loose card of the build value may not stay beside the build
  const absorbed = withoutCards(state.tableCards, tableCards).filter((card) => captureValue(card) === declaredValue);
  const newGroups = [...groups, ...absorbed.map((card) => [card])];

  const existing = owned.find((build) => build.value === declaredValue);
  const build: Build = existing
    ? { ...existing, groups: [...existing.groups, ...newGroups] }
    : { id: buildId(newGroups), ownerId: player.userId, value: declaredValue, groups: newGroups };
  const builds = existing
    ? state.builds.map((candidate) => (candidate.id === existing.id ? build : candidate))
    : [...state.builds, build];

  const type = stolenCards.length > 0 ? 'STEAL_AND_BUILD' : existing ? 'BUILD_AUGMENT' : 'BUILD_CREATE';
  const description =
    stolenCards.length > 0
      ? `${player.displayName} built ${describeBuild(build)} (stole ${stolenCards.map(cardLabel).join(', ')})`
      : `${player.displayName} built ${describeBuild(build)}`;

  return {
    state: {
      ...state,
      players: withPlayedCard(peeled, state.currentPlayerIndex, handCard),
      tableCards: withoutCards(state.tableCards, [...tableCards, ...absorbed]),
      builds,
      actionLog: recordAction(state, {
        userId: player.userId,
        type,
        cardPlayed,
        cardsCaptured: [...stolenCards],
        description,
      }),
      version: state.version + 1,
    },
  };
};

/** Adds one more group of the build's value to a build the current player owns. */
export const augmentBuild = (state: GameState, input: AugmentBuildInput): MoveResult => {
  const { buildId: targetId, tableCards, handCard, stolenCard } = input;

  if (!isPlayingPhase(state)) {
    return reject(state, 'NOT_PLAYING', 'builds can only be augmented during play');
  }
  const build = findBuild(state, targetId);
  if (!build) {
    return reject(state, 'BUILD_NOT_FOUND', `no build ${targetId}`);
  }

  const player = currentPlayer(state);
  if (build.ownerId !== player.userId) {
    return reject(state, 'NOT_BUILD_OWNER', 'only the owner can augment a build');
  }
  if (stolenCard && !handCard) {
    return reject(state, 'STEAL_REQUIRES_HAND_CARD', 'stealing requires playing a card from hand');
  }
  if (handCard && !containsCard(player.hand, handCard)) {
    return reject(state, 'CARD_NOT_IN_HAND', `${handCard.id} is not in hand`);
  }
  if (!allLooseOnTable(state, tableCards)) {
    return reject(state, 'CARD_NOT_ON_TABLE', 'selected cards must be loose on the table');
  }

  const group = [...tableCards, ...(handCard ? [handCard] : []), ...(stolenCard ? [stolenCard] : [])];
  const cardPlayed = handCard ?? tableCards[0];
  if (!cardPlayed) {
    return reject(state, 'EMPTY_BUILD', 'an augment needs at least one card');
  }
  if (sumValues(group) !== build.value) {
    return reject(state, 'VALUE_MISMATCH', `new group must add up to ${build.value}`);
  }
  if (handCard && !holdsCaptureCard(player, build.value, handCard)) {
    return reject(state, 'NO_CAPTURE_CARD', `no ${build.value} left in hand to capture the build`);
  }

  const peeled = peelStolenCards(state, stolenCard ? [stolenCard] : []);
  if (!peeled) {
    return reject(state, 'STOLEN_CARD_NOT_ON_TOP', 'only the top of an opponent capture pile can be stolen');
  }

  const augmented: Build = { ...build, groups: [...build.groups, group] };

  return {
    state: {
      ...state,
      players: withPlayedCard(peeled, state.currentPlayerIndex, handCard),
      tableCards: withoutCards(state.tableCards, tableCards),
      builds: state.builds.map((candidate) => (candidate.id === build.id ? augmented : candidate)),
      actionLog: recordAction(state, {
        userId: player.userId,
        type: stolenCard ? 'STEAL_AND_BUILD' : 'BUILD_AUGMENT',
        cardPlayed,
        cardsCaptured: stolenCard ? [stolenCard] : [],
        description: `${player.displayName} augmented build to ${describeBuild(augmented)}`,
      }),
      version: state.version + 1,
    },
  };
};

/**
 * Raises an opponent's single-group build by one hand card and takes it over.
 * A build the increaser already owns at the new value absorbs it.
 */
export const increaseBuild = (state: GameState, input: IncreaseBuildInput): MoveResult => {
  const { buildId: targetId, handCard } = input;

  if (!isPlayingPhase(state)) {
    return reject(state, 'NOT_PLAYING', 'builds can only be increased during play');
  }
  const build = findBuild(state, targetId);
  if (!build) {
    return reject(state, 'BUILD_NOT_FOUND', `no build ${targetId}`);
  }

  const player = currentPlayer(state);
  if (build.ownerId === player.userId) {
    return reject(state, 'OWN_BUILD_INCREASE', 'you cannot increase your own build');
  }
  if (build.groups.length > 1) {
    return reject(state, 'BUILD_AUGMENTED', 'augmented builds cannot be increased');
  }
  if (!containsCard(player.hand, handCard)) {
    return reject(state, 'CARD_NOT_IN_HAND', `${handCard.id} is not in hand`);
  }

  const value = build.value + captureValue(handCard);
  if (value > MAX_CAPTURE_VALUE) {
    return reject(state, 'VALUE_EXCEEDS_MAX', `builds cannot exceed ${MAX_CAPTURE_VALUE}`);
  }
  if (!holdsCaptureCard(player, value, handCard)) {
    return reject(state, 'NO_CAPTURE_CARD', `no ${value} left in hand to capture the build`);
  }

  const increasedGroup = [...buildCards(build), handCard];
  const mergeTarget = state.builds.find(
    (candidate) => candidate.id !== build.id && candidate.ownerId === player.userId && candidate.value === value,
  );

  const builds: Build[] = mergeTarget
    ? state.builds
        .filter((candidate) => candidate.id !== build.id)
        .map((candidate) =>
          candidate.id === mergeTarget.id ? { ...mergeTarget, groups: [...mergeTarget.groups, increasedGroup] } : candidate,
        )
    : state.builds.map((candidate) =>
        candidate.id === build.id ? { id: build.id, ownerId: player.userId, value, groups: [increasedGroup] } : candidate,
      );

  return {
    state: {
      ...state,
      players: withPlayedCard(state.players, state.currentPlayerIndex, handCard),
      builds,
      actionLog: recordAction(state, {
        userId: player.userId,
        type: 'BUILD_INCREASE',
        cardPlayed: handCard,
        cardsCaptured: [],
        description: `${player.displayName} increased build to ${value}`,
      }),
      version: state.version + 1,
    },
  };
};
