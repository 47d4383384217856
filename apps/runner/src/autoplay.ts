import { EngineContractError, canDrift, currentPlayer, findCaptures, type CaptureOption } from '@kasino/engine';
import type { EngineAction, GameState } from '@kasino/shared';

interface RankedCapture {
  option: CaptureOption;
  optionIndex: number;
}

const largestCapture = (state: GameState): RankedCapture | undefined => {
  let best: RankedCapture | undefined;
  for (const card of currentPlayer(state).hand) {
    for (const [optionIndex, option] of findCaptures(state, card).entries()) {
      if (!best || option.totalCaptured > best.option.totalCaptured) {
        best = { option, optionIndex };
      }
    }
  }
  return best;
};

/**
 * Picks a move for the current player: the capture that takes the most
 * cards, otherwise a drift of the first card in hand.
 */
export const chooseAutoplayAction = (state: GameState): EngineAction => {
  const capture = largestCapture(state);
  if (capture) {
    return { type: 'CAPTURE', cardId: capture.option.handCard.id, optionIndex: capture.optionIndex };
  }

  const first = currentPlayer(state).hand[0];
  if (first && canDrift(state)) {
    return { type: 'DRIFT', cardId: first.id };
  }
  throw new EngineContractError(`no legal move for ${currentPlayer(state).userId}`);
};
