import type { GameState } from '@kasino/shared';
import type { MatchStore } from './match-store';

/** Keeps snapshots in process. Reads and writes go through `structuredClone`. */
export class InMemoryMatchStore implements MatchStore {
  private readonly matchesById = new Map<string, GameState>();

  async getMatch(matchId: string): Promise<GameState | null> {
    const state = this.matchesById.get(matchId);
    return state ? structuredClone(state) : null;
  }

  async saveMatch(state: GameState): Promise<void> {
    this.matchesById.set(state.gameId, structuredClone(state));
  }

  async deleteMatch(matchId: string): Promise<void> {
    this.matchesById.delete(matchId);
  }

  async listMatchIds(): Promise<string[]> {
    return [...this.matchesById.keys()];
  }
}
