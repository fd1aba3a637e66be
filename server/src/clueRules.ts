import { GameRuleError } from './errors.js';
import { type Card } from './types.js';

export type ClueCollision =
  | { kind: 'equals'; boardWord: string }
  | { kind: 'containsBoardWord'; boardWord: string }
  | { kind: 'insideBoardWord'; boardWord: string };

export function normalizeClue(word: string): string {
  return word.trim().toUpperCase();
}

/**
 * Finds the first unrevealed board word the clue collides with. Revealed words are no
 * longer live targets, so a clue may repeat one of them.
 */
export function findClueCollision(
  clue: string,
  cards: ReadonlyArray<Pick<Card, 'word' | 'revealed'>>,
): ClueCollision | undefined {
  const normalized = normalizeClue(clue);
  for (const card of cards) {
    if (card.revealed) continue;
    const boardWord = card.word.toUpperCase();
    if (boardWord === normalized) return { kind: 'equals', boardWord: card.word };
    if (normalized.includes(boardWord)) return { kind: 'containsBoardWord', boardWord: card.word };
    if (boardWord.includes(normalized)) return { kind: 'insideBoardWord', boardWord: card.word };
  }
  return undefined;
}

export function describeCollision(clue: string, collision: ClueCollision): string {
  switch (collision.kind) {
    case 'equals':
      return `Clue "${clue}" is a word currently on the board.`;
    case 'containsBoardWord':
      return `Clue "${clue}" cannot contain the board word "${collision.boardWord}".`;
    case 'insideBoardWord':
      return `Clue "${clue}" cannot be part of the board word "${collision.boardWord}".`;
    default: {
      const unreachable: never = collision;
      return unreachable;
    }
  }
}

export function assertLegalClue(clue: string, cards: readonly Card[]): void {
  const collision = findClueCollision(clue, cards);
  if (collision) throw new GameRuleError('IllegalClue', describeCollision(clue, collision));
}

/** Shape checks that sit in front of the board rules: one non-empty token. */
export function isSingleToken(clue: string): boolean {
  const trimmed = clue.trim();
  return trimmed.length > 0 && !/\s/.test(trimmed);
}
