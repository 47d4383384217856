import type { GameState } from '@kasino/shared';

export interface MatchStore {
  getMatch(matchId: string): Promise<GameState | null>;
  saveMatch(state: GameState): Promise<void>;
  deleteMatch(matchId: string): Promise<void>;
  listMatchIds(): Promise<string[]>;
}
