export { appendAction } from './action-log';
export { augmentBuild, createBuild, describeBuild, increaseBuild } from './builds';
export { executeCapture, findCaptures } from './capture';
export { findSubsetsWithSum, partitionExactSums, selectMaximalDisjointSets } from './combinatorics';
export {
  captureValue,
  cardLabel,
  createDeck,
  isAce,
  isBigTen,
  isSpade,
  isSpyTwo,
  isValidDeck,
  shuffleDeck,
  sumValues,
} from './deck';
export { applyAction, isMoveAction, validateAction } from './reducer';
export { applyScores, calculateScores, scoreBreakdown } from './scoring';
export type { ScoreBreakdown } from './scoring';
export {
  allCardIds,
  allHandsEmpty,
  buildCards,
  canDrift,
  capturedCounts,
  currentPlayer,
  initializeGame,
  opponentTopCards,
  ownsBuild,
  startNextHand,
} from './state';
export { drift, nextTurn } from './turn';
export { EngineContractError } from './types';
export type {
  AugmentBuildInput,
  CaptureOption,
  CreateBuildInput,
  EngineEffect,
  EngineResult,
  IncreaseBuildInput,
  InitializeGameConfig,
  MoveResult,
  ValidationResult,
} from './types';
export { buildClientView } from './view';
