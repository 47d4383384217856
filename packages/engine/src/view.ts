import type { ClientGameView, GameState } from '@kasino/shared';

/** Projects a snapshot for one player: other hands become counts and the draw pile is hidden. */
export const buildClientView = (state: GameState, meUserId: string): ClientGameView => {
  const me = state.players.find((player) => player.userId === meUserId);

  return {
    gameId: state.gameId,
    mode: state.mode,
    phase: state.phase,
    players: state.players.map((player, seatIndex) => {
      const top = player.capturePile[player.capturePile.length - 1];
      return {
        userId: player.userId,
        displayName: player.displayName,
        seatIndex,
        handCount: player.hand.length,
        capturedCount: player.capturePile.length,
        ...(top ? { capturePileTop: { ...top } } : {}),
        matchScore: state.matchScores[player.userId] ?? 0,
      };
    }),
    meHand: me ? me.hand.map((card) => ({ ...card })) : [],
    currentPlayerIndex: state.currentPlayerIndex,
    tableCards: state.tableCards.map((card) => ({ ...card })),
    builds: state.builds.map((build) => ({ ...build, groups: build.groups.map((group) => [...group]) })),
    drawPileCount: state.drawPile.length,
    isSecondDeal: state.isSecondDeal,
    handNumber: state.handNumber,
    ...(state.handScores ? { handScores: { ...state.handScores } } : {}),
    ...(state.winnerUserIds ? { winnerUserIds: [...state.winnerUserIds] } : {}),
    actionLog: state.actionLog.map((action) => ({ ...action })),
    version: state.version,
  };
};
