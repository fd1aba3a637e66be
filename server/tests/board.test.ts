import { describe, expect, it } from 'vitest';
import { cardDistribution, generateBoard, shuffle } from '../src/board.js';
import { GameRuleError } from '../src/errors.js';
import { WORD_POOL } from '../src/words.js';
import { FIXTURE_WORDS } from './fixtures.js';

// Deterministic LCG so board generation is reproducible.
function seeded(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

describe('cardDistribution', () => {
  it.each([
    [25, { red: 9, blue: 8, assassin: 1, neutral: 7 }],
    [36, { red: 12, blue: 11, assassin: 2, neutral: 11 }],
    [49, { red: 17, blue: 16, assassin: 2, neutral: 14 }],
    [64, { red: 20, blue: 19, assassin: 3, neutral: 22 }],
  ])('uses the fixed table for %i cards', (size, expected) => {
    expect(cardDistribution(size)).toEqual(expected);
  });

  it('derives other sizes from the board size', () => {
    expect(cardDistribution(30)).toEqual({ red: 11, blue: 10, assassin: 1, neutral: 8 });
  });

  it('rejects sizes that cannot hold a distribution', () => {
    expect(() => cardDistribution(0)).toThrow('Board size must be a positive integer, got 0.');
    expect(() => cardDistribution(1)).toThrow('Board size 1 is too small for a playable distribution.');
  });
});

describe('shuffle', () => {
  it('returns a permutation and leaves the input alone', () => {
    const input = [1, 2, 3];
    expect(shuffle(input, () => 0)).toEqual([2, 3, 1]);
    expect(input).toEqual([1, 2, 3]);
  });
});

describe('generateBoard', () => {
  it('deals distinct words with the expected types', () => {
    const cards = generateBoard(WORD_POOL, 36, seeded(7));
    expect(cards).toHaveLength(36);
    expect(new Set(cards.map((c) => c.word)).size).toBe(36);
    expect(cards.every((c) => !c.revealed)).toBe(true);

    const count = (type: string) => cards.filter((c) => c.type === type).length;
    expect([count('RED'), count('BLUE'), count('NEUTRAL'), count('ASSASSIN')]).toEqual([12, 11, 11, 2]);
  });

  it('is reproducible for the same random source', () => {
    expect(generateBoard(WORD_POOL, 25, seeded(42))).toEqual(generateBoard(WORD_POOL, 25, seeded(42)));
  });

  it('counts case-insensitive duplicates once', () => {
    const pool = [...FIXTURE_WORDS.slice(0, 24), 'apple', ' Apple '];
    try {
      generateBoard(pool, 25);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(GameRuleError);
      expect(err).toMatchObject({
        code: 'InsufficientWordPool',
        message: 'A board of 25 cards needs 25 distinct words, but the pool only has 24.',
      });
    }
  });

  it('uppercases words from the pool', () => {
    const cards = generateBoard(FIXTURE_WORDS.map((w) => w.toLowerCase()), 25, seeded(3));
    expect(cards.every((c) => c.word === c.word.toUpperCase())).toBe(true);
  });
});

describe('WORD_POOL', () => {
  it('holds enough distinct uppercase words for the largest board', () => {
    expect(WORD_POOL.length).toBeGreaterThanOrEqual(64);
    expect(new Set(WORD_POOL).size).toBe(WORD_POOL.length);
    expect(WORD_POOL.every((w) => /^[A-Z]+$/.test(w))).toBe(true);
  });
});
