import { DECK_SIZE, MAX_PLAYERS, MIN_PLAYERS, RANKS, SUITS, SUIT_SYMBOLS } from '@kasino/shared';
import type { Card } from '@kasino/shared';

export const createDeck = (): Card[] => SUITS.flatMap((suit) => RANKS.map((rank) => ({ id: `${suit}-${rank}`, rank, suit })));

export const isValidDeck = (cards: readonly Card[]): boolean => {
  if (cards.length !== DECK_SIZE) {
    return false;
  }
  const expected = new Set(createDeck().map((card) => card.id));
  const seen = new Set<string>();
  for (const card of cards) {
    if (!expected.has(card.id) || seen.has(card.id) || card.id !== `${card.suit}-${card.rank}`) {
      return false;
    }
    seen.add(card.id);
  }
  return true;
};

const hashSeed = (seed: string | number): number => {
  if (typeof seed === 'number') {
    return seed >>> 0;
  }

  let h = 1779033703 ^ seed.length;
  for (let i = 0; i < seed.length; i += 1) {
    h = Math.imul(h ^ seed.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  return (h >>> 0) + 0x9e3779b9;
};

const mulberry32 = (seed: number): (() => number) => {
  let t = seed;
  return () => {
    t += 0x6d2b79f5;
    let x = Math.imul(t ^ (t >>> 15), 1 | t);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
};

export const shuffleDeck = <T>(cards: readonly T[], seed: string | number): T[] => {
  const rng = mulberry32(hashSeed(seed));
  const deck = [...cards];

  for (let i = deck.length - 1; i > 0; i -= 1) {
    const j = Math.floor(rng() * (i + 1));
    const a = deck[i];
    const b = deck[j];
    if (a === undefined || b === undefined) {
      continue;
    }
    deck[i] = b;
    deck[j] = a;
  }

  return deck;
};

export const validatePlayerCount = (count: number): boolean => count >= MIN_PLAYERS && count <= MAX_PLAYERS;

export const captureValue = (card: Card): number => card.rank;

export const isSpyTwo = (card: Card): boolean => card.rank === 2 && card.suit === 'spades';
export const isBigTen = (card: Card): boolean => card.rank === 10 && card.suit === 'diamonds';
export const isAce = (card: Card): boolean => card.rank === 1;
export const isSpade = (card: Card): boolean => card.suit === 'spades';

export const cardLabel = (card: Card): string => `${card.rank === 1 ? 'A' : card.rank}${SUIT_SYMBOLS[card.suit]}`;

export const sumValues = (cards: readonly Card[]): number => cards.reduce((sum, card) => sum + captureValue(card), 0);
