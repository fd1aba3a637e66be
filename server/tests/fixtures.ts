import { newGameState } from '../src/engine.js';
import { type Card, type CardType, type GameConfig, type GameState, type PlayerKind, type RoleKey } from '../src/types.js';

export const RED_WORDS = ['APPLE', 'BANANA', 'CHERRY', 'GRAPE', 'LEMON', 'MANGO', 'PEACH', 'PEAR', 'PLUM'];
export const BLUE_WORDS = ['HORSE', 'TIGER', 'EAGLE', 'SHARK', 'WOLF', 'BEAR', 'MOUSE', 'SNAKE'];
export const NEUTRAL_WORDS = ['TABLE', 'CHAIR', 'LAMP', 'DOOR', 'WINDOW', 'CARPET', 'SHELF'];
export const ASSASSIN_WORD = 'BOMB';

export const FIXTURE_WORDS = [...RED_WORDS, ...BLUE_WORDS, ...NEUTRAL_WORDS, ASSASSIN_WORD];

export const ALL_HUMAN: Record<RoleKey, PlayerKind> = {
  RED_SPYMASTER: 'human',
  RED_GUESSER: 'human',
  BLUE_SPYMASTER: 'human',
  BLUE_GUESSER: 'human',
};

export const ALL_AGENT: Record<RoleKey, PlayerKind> = {
  RED_SPYMASTER: 'agent',
  RED_GUESSER: 'agent',
  BLUE_SPYMASTER: 'agent',
  BLUE_GUESSER: 'agent',
};

function cardsOf(words: readonly string[], type: CardType): Card[] {
  return words.map((word) => ({ word, type, revealed: false }));
}

/** 25 cards in a fixed order: 9 RED, 8 BLUE, 7 NEUTRAL, 1 ASSASSIN. */
export function makeCards(): Card[] {
  return [
    ...cardsOf(RED_WORDS, 'RED'),
    ...cardsOf(BLUE_WORDS, 'BLUE'),
    ...cardsOf(NEUTRAL_WORDS, 'NEUTRAL'),
    ...cardsOf([ASSASSIN_WORD], 'ASSASSIN'),
  ];
}

export function makeGame(players: Record<RoleKey, PlayerKind> = ALL_HUMAN): GameState {
  const config: GameConfig = { boardSize: 25, players, llmModel: 'test-model' };
  return newGameState('test-game', config, makeCards(), new Date('2026-01-01T00:00:00.000Z'));
}

export function revealAll(game: GameState, words: readonly string[]): void {
  for (const card of game.cards) {
    if (words.includes(card.word)) card.revealed = true;
  }
}

/** Words of one type that are still hidden, in board order. */
export function hiddenWords(game: GameState, type: CardType): string[] {
  return game.cards.filter((c) => c.type === type && !c.revealed).map((c) => c.word);
}
