import { GameRuleError } from './errors.js';
import { type Card, type CardType } from './types.js';

export type Rng = () => number;

export interface CardDistribution {
  red: number;
  blue: number;
  assassin: number;
  neutral: number;
}

const FIXED_DISTRIBUTIONS: Record<number, Omit<CardDistribution, 'neutral'>> = {
  25: { red: 9, blue: 8, assassin: 1 },
  36: { red: 12, blue: 11, assassin: 2 },
  49: { red: 17, blue: 16, assassin: 2 },
  64: { red: 20, blue: 19, assassin: 3 },
};

// RED moves first, so it always holds one card more than BLUE.
export function cardDistribution(size: number): CardDistribution {
  if (!Number.isInteger(size) || size < 1) throw new Error(`Board size must be a positive integer, got ${size}.`);
  const fixed = FIXED_DISTRIBUTIONS[size];
  const red = fixed?.red ?? Math.floor(size / 3) + 1;
  const blue = fixed?.blue ?? red - 1;
  const assassin = fixed?.assassin ?? Math.max(1, Math.floor(size / 25));
  const neutral = size - red - blue - assassin;
  if (neutral < 0) throw new Error(`Board size ${size} is too small for a playable distribution.`);
  return { red, blue, assassin, neutral };
}

export function shuffle<T>(items: readonly T[], rng: Rng = Math.random): T[] {
  const clone = [...items];
  for (let i = clone.length - 1; i > 0; i -= 1) {
    const j = Math.floor(rng() * (i + 1));
    [clone[i], clone[j]] = [clone[j], clone[i]];
  }
  return clone;
}

function distinctWords(pool: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of pool) {
    const word = raw.trim().toUpperCase();
    if (word) seen.add(word);
  }
  return [...seen];
}

export function generateBoard(pool: readonly string[], size: number, rng: Rng = Math.random): Card[] {
  const { red, blue, assassin, neutral } = cardDistribution(size);
  const words = distinctWords(pool);
  if (words.length < size) {
    throw new GameRuleError(
      'InsufficientWordPool',
      `A board of ${size} cards needs ${size} distinct words, but the pool only has ${words.length}.`,
    );
  }

  const types: CardType[] = [
    ...Array<CardType>(red).fill('RED'),
    ...Array<CardType>(blue).fill('BLUE'),
    ...Array<CardType>(neutral).fill('NEUTRAL'),
    ...Array<CardType>(assassin).fill('ASSASSIN'),
  ];
  const selected = shuffle(words, rng).slice(0, size);
  const shuffledTypes = shuffle(types, rng);

  return selected.map((word, index) => ({
    word,
    type: shuffledTypes[index],
    revealed: false,
  }));
}
