import type { Build, Card, GameState } from '@kasino/shared';
import { recordAction } from './action-log';
import { findSubsetsWithSum, selectMaximalDisjointSets } from './combinatorics';
import { captureValue, cardLabel } from './deck';
import { buildCards, containsCard, currentPlayer, replacePlayer, withoutCards } from './state';
import { EngineContractError, type CaptureOption } from './types';

const cardKey = (card: Card): string => card.id;

const describeCapture = (singles: readonly Card[], builds: readonly Build[], combinations: readonly Card[][]): string => {
  const parts: string[] = [];
  if (singles.length > 0) {
    parts.push(singles.map(cardLabel).join(', '));
  }
  const firstBuild = builds[0];
  if (firstBuild) {
    parts.push(`build(s) of ${firstBuild.value}`);
  }
  for (const combination of combinations) {
    parts.push(combination.map(cardLabel).join('+'));
  }
  return parts.join(' & ');
};

const toCaptureOption = (
  handCard: Card,
  singles: Card[],
  builds: Build[],
  combinations: Card[][],
): CaptureOption => {
  const capturedCards = [...singles, ...builds.flatMap(buildCards), ...combinations.flat()];
  return {
    handCard,
    singles,
    builds,
    combinations,
    capturedCards,
    totalCaptured: capturedCards.length,
    description: describeCapture(singles, builds, combinations),
  };
};

/**
 * Lists the ways `handCard` can capture. Matching singles and builds are
 * always taken whole; the only choice is between overlapping combinations,
 * and only the largest non-overlapping selections are offered.
 */
export const findCaptures = (state: GameState, handCard: Card): CaptureOption[] => {
  const target = captureValue(handCard);
  const singles = state.tableCards.filter((card) => captureValue(card) === target);
  const builds = state.builds.filter((build) => build.value === target);
  const rest = state.tableCards.filter((card) => captureValue(card) !== target);
  const combinations = findSubsetsWithSum(rest, target, captureValue, 2);

  if (singles.length === 0 && builds.length === 0 && combinations.length === 0) {
    return [];
  }
  if (combinations.length === 0) {
    return [toCaptureOption(handCard, singles, builds, [])];
  }

  return selectMaximalDisjointSets(combinations, cardKey).map((selection) =>
    toCaptureOption(handCard, singles, builds, selection),
  );
};

export const executeCapture = (state: GameState, handCard: Card, option: CaptureOption): GameState => {
  const player = currentPlayer(state);
  if (option.handCard.id !== handCard.id) {
    throw new EngineContractError(`capture option belongs to ${option.handCard.id}, not ${handCard.id}`);
  }
  if (!containsCard(player.hand, handCard)) {
    throw new EngineContractError(`${handCard.id} is not in ${player.userId}'s hand`);
  }

  const fromTable = [...option.singles, ...option.combinations.flat()];
  if (fromTable.some((card) => !containsCard(state.tableCards, card))) {
    throw new EngineContractError('capture option refers to cards no longer on the table');
  }
  const capturedBuildIds = new Set(option.builds.map((build) => build.id));
  if (option.builds.some((build) => !state.builds.some((candidate) => candidate.id === build.id))) {
    throw new EngineContractError('capture option refers to a build no longer on the table');
  }

  const players = replacePlayer(state.players, state.currentPlayerIndex, {
    hand: withoutCards(player.hand, [handCard]),
    capturePile: [...player.capturePile, ...option.capturedCards, handCard],
  });

  return {
    ...state,
    players,
    tableCards: withoutCards(state.tableCards, fromTable),
    builds: state.builds.filter((build) => !capturedBuildIds.has(build.id)),
    lastCapturerIndex: state.currentPlayerIndex,
    actionLog: recordAction(state, {
      userId: player.userId,
      type: 'CAPTURE',
      cardPlayed: handCard,
      cardsCaptured: option.capturedCards,
      description: `${player.displayName} captured ${option.totalCaptured} cards with ${cardLabel(handCard)}`,
    }),
    version: state.version + 1,
  };
};
