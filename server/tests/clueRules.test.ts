import { describe, expect, it } from 'vitest';
import { assertLegalClue, describeCollision, findClueCollision, isSingleToken, normalizeClue } from '../src/clueRules.js';
import { GameRuleError } from '../src/errors.js';
import { makeCards } from './fixtures.js';

describe('findClueCollision', () => {
  const cards = makeCards();

  it('accepts a clue unrelated to the board', () => {
    expect(findClueCollision('FRUIT', cards)).toBeUndefined();
  });

  it('matches board words case-insensitively', () => {
    expect(findClueCollision('apple', cards)).toEqual({ kind: 'equals', boardWord: 'APPLE' });
  });

  it('rejects a clue that contains a board word', () => {
    expect(findClueCollision('Pineapple', cards)).toEqual({ kind: 'containsBoardWord', boardWord: 'APPLE' });
  });

  it('rejects a clue hidden inside a board word', () => {
    expect(findClueCollision('pea', cards)).toEqual({ kind: 'insideBoardWord', boardWord: 'PEACH' });
  });

  it('ignores revealed cards', () => {
    const revealed = makeCards().map((card) => (card.word === 'APPLE' ? { ...card, revealed: true } : card));
    expect(findClueCollision('APPLE', revealed)).toBeUndefined();
    expect(findClueCollision('PINEAPPLE', revealed)).toBeUndefined();
  });
});

describe('describeCollision', () => {
  it('names the offending board word', () => {
    expect(describeCollision('PINEAPPLE', { kind: 'containsBoardWord', boardWord: 'APPLE' })).toBe(
      'Clue "PINEAPPLE" cannot contain the board word "APPLE".',
    );
    expect(describeCollision('PEA', { kind: 'insideBoardWord', boardWord: 'PEACH' })).toBe(
      'Clue "PEA" cannot be part of the board word "PEACH".',
    );
  });
});

describe('assertLegalClue', () => {
  it('throws an IllegalClue rule error', () => {
    expect(() => assertLegalClue('LEMON', makeCards())).toThrow(
      new GameRuleError('IllegalClue', 'Clue "LEMON" is a word currently on the board.'),
    );
  });
});

describe('clue shape', () => {
  it('normalizes to trimmed uppercase', () => {
    expect(normalizeClue('  ocean ')).toBe('OCEAN');
  });

  it('requires a single token', () => {
    expect(isSingleToken('ocean')).toBe(true);
    expect(isSingleToken(' ocean ')).toBe(true);
    expect(isSingleToken('deep sea')).toBe(false);
    expect(isSingleToken('   ')).toBe(false);
  });
});
