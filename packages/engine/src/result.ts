import type { ErrorCode, GameState, ServiceError } from '@kasino/shared';
import type { MoveResult } from './types';

export const engineError = (code: ErrorCode, message: string): ServiceError => ({ code, message });

export const reject = (state: GameState, code: ErrorCode, message: string): MoveResult => ({
  state,
  error: engineError(code, message),
});
