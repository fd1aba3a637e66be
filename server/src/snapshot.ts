import { isGameOver } from './engine.js';
import { computeScore } from './history.js';
import { type GameSnapshot, type GameState, type Viewer } from './types.js';

/**
 * Read-only projection handed to callers and observers. Guessers only see the type of a
 * card once it is revealed (or the game has ended); spymasters see everything.
 */
export function serializeGame(game: GameState, viewer: Viewer = 'guesser'): GameSnapshot {
  const showAll = viewer === 'spymaster' || isGameOver(game);
  return {
    id: game.id,
    createdAt: game.createdAt,
    cards: game.cards.map((card) => ({
      word: card.word,
      revealed: card.revealed,
      type: showAll || card.revealed ? card.type : null,
    })),
    phase: game.phase,
    currentTeam: game.currentTeam,
    players: { ...game.config.players },
    llmModel: game.config.llmModel,
    boardSize: game.config.boardSize,
    score: computeScore(game.cards),
    winner: game.winner ?? null,
    lastClue: game.lastClue ? { ...game.lastClue } : null,
    remainingGuesses: game.remainingGuesses,
    turnCount: game.turnCount,
    log: [...game.log],
    clueHistory: game.clueHistory.map((record) => ({
      ...record,
      guesses: record.guesses.map((g) => ({ ...g })),
    })),
    reasoningLog: game.reasoningLog.map((entry) => ({ ...entry })),
  };
}
