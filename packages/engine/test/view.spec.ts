import { clientGameViewSchema, engineActionSchema } from '@kasino/shared';
import { describe, expect, it } from 'vitest';
import { buildClientView } from '../src';
import { build, ids, makeState } from './fixtures';

const state = makeState({
  hands: [['hearts-7', 'clubs-9'], ['clubs-2']],
  piles: [[], ['spades-4']],
  table: ['spades-3'],
  builds: [build('u2', 6, ['diamonds-4', 'hearts-2'])],
  drawPile: ['clubs-10'],
});

describe('buildClientView', () => {
  it('shows only the viewer hand and counts for everything hidden', () => {
    const view = buildClientView(state, 'u1');

    expect(ids(view.meHand)).toEqual(['hearts-7', 'clubs-9']);
    expect(view.players[1]).toEqual({
      userId: 'u2',
      displayName: 'P2',
      seatIndex: 1,
      handCount: 1,
      capturedCount: 1,
      capturePileTop: { id: 'spades-4', rank: 4, suit: 'spades' },
      matchScore: 0,
    });
    expect(view.players[0]?.capturePileTop).toBeUndefined();
    expect(view.drawPileCount).toBe(1);
    expect('handScores' in view).toBe(false);
  });

  it('copies cards instead of sharing them with the snapshot', () => {
    const view = buildClientView(state, 'u1');

    expect(view.tableCards).toEqual(state.tableCards);
    expect(view.tableCards[0]).not.toBe(state.tableCards[0]);
    expect(view.builds[0]?.groups[0]).not.toBe(state.builds[0]?.groups[0]);
  });

  it('gives spectators an empty hand', () => {
    expect(buildClientView(state, 'nobody').meHand).toEqual([]);
  });

  it('survives a JSON round trip through the view schema', () => {
    const view = buildClientView(state, 'u2');
    const parsed = clientGameViewSchema.parse(JSON.parse(JSON.stringify(view)));

    expect(parsed).toEqual(view);
    expect(parsed.builds[0]?.id).toBe('build_diamonds-4_hearts-2');
  });
});

describe('engineActionSchema', () => {
  it('accepts a capture with an option index', () => {
    expect(engineActionSchema.parse({ type: 'CAPTURE', cardId: 'hearts-7', optionIndex: 1 })).toEqual({
      type: 'CAPTURE',
      cardId: 'hearts-7',
      optionIndex: 1,
    });
  });

  it('rejects unknown action types and incomplete builds', () => {
    expect(engineActionSchema.safeParse({ type: 'PASS' }).success).toBe(false);
    expect(engineActionSchema.safeParse({ type: 'BUILD', tableCardIds: [] }).success).toBe(false);
  });
});
