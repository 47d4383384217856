import { describe, expect, it } from 'vitest';
import { cardSchema, createMatchSchema, ERROR_CODES, serviceErrorSchema } from '../src';

describe('shared schemas', () => {
  it('fills match defaults', () => {
    expect(createMatchSchema.parse({ players: [{ displayName: ' Ann ' }, { displayName: 'Ben' }] })).toEqual({
      players: [{ displayName: 'Ann' }, { displayName: 'Ben' }],
      mode: 'PRACTICE',
      targetScore: 11,
    });
  });

  it('limits matches to two to four players', () => {
    const five = Array.from({ length: 5 }, (_, index) => ({ displayName: `Player ${index}` }));
    expect(createMatchSchema.safeParse({ players: five }).success).toBe(false);
    expect(createMatchSchema.safeParse({ players: [{ displayName: 'Ann' }] }).success).toBe(false);
  });

  it('only accepts ace-to-ten cards', () => {
    expect(cardSchema.safeParse({ id: 'hearts-10', rank: 10, suit: 'hearts' }).success).toBe(true);
    expect(cardSchema.safeParse({ id: 'hearts-11', rank: 11, suit: 'hearts' }).success).toBe(false);
    expect(cardSchema.safeParse({ id: 'stars-3', rank: 3, suit: 'stars' }).success).toBe(false);
  });

  it('knows every error code', () => {
    for (const code of ERROR_CODES) {
      expect(serviceErrorSchema.safeParse({ code, message: 'x' }).success).toBe(true);
    }
    expect(serviceErrorSchema.safeParse({ code: 'ROOM_FULL', message: 'x' }).success).toBe(false);
  });
});
