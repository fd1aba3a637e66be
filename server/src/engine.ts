import { generateBoard, type Rng } from './board.js';
import { assertLegalClue, normalizeClue } from './clueRules.js';
import { GameRuleError } from './errors.js';
import { appendLog, openClueRecord, recordGuess } from './history.js';
import {
  type Action,
  type Card,
  type GameConfig,
  type GameState,
  type Role,
  type RoleKey,
  type Team,
} from './types.js';
import { WORD_POOL } from './words.js';

export interface GuessOutcome {
  card: Card;
  turnEnded: boolean;
}

export function otherTeam(team: Team): Team {
  return team === 'RED' ? 'BLUE' : 'RED';
}

export function phaseFor(team: Team, role: Role): RoleKey {
  if (team === 'RED') return role === 'SPYMASTER' ? 'RED_SPYMASTER' : 'RED_GUESSER';
  return role === 'SPYMASTER' ? 'BLUE_SPYMASTER' : 'BLUE_GUESSER';
}

/** The role expected to act next, or undefined once the game is over. */
export function roleToMove(game: GameState): Role | undefined {
  switch (game.phase) {
    case 'RED_SPYMASTER':
    case 'BLUE_SPYMASTER':
      return 'SPYMASTER';
    case 'RED_GUESSER':
    case 'BLUE_GUESSER':
      return 'GUESSER';
    case 'GAME_OVER':
      return undefined;
    default: {
      const unreachable: never = game.phase;
      return unreachable;
    }
  }
}

export function isGameOver(game: GameState): boolean {
  return game.phase === 'GAME_OVER';
}

export function newGameState(id: string, config: GameConfig, cards: Card[], now = new Date()): GameState {
  const game: GameState = {
    id,
    createdAt: now.toISOString(),
    config,
    cards,
    phase: 'RED_SPYMASTER',
    currentTeam: 'RED',
    remainingGuesses: 0,
    turnCount: 0,
    log: [],
    clueHistory: [],
    reasoningLog: [],
  };
  appendLog(game, 'Game initialized. Team RED starts.');
  return game;
}

export function createGame(id: string, config: GameConfig, rng: Rng = Math.random): GameState {
  const pool = config.wordPool ?? WORD_POOL;
  return newGameState(id, config, generateBoard(pool, config.boardSize, rng));
}

function assertCanAct(game: GameState, team: Team, role: Role): void {
  if (game.phase !== phaseFor(game.currentTeam, role)) {
    const who = role === 'SPYMASTER' ? 'Spymasters' : 'Guessers';
    throw new GameRuleError('WrongPhase', `Invalid move: it is currently ${game.phase}. ${who} cannot move now.`);
  }
  if (team !== game.currentTeam) {
    throw new GameRuleError('WrongTurn', `Invalid turn: it is ${game.currentTeam}'s turn, but ${team} tried to move.`);
  }
}

function endTurn(game: GameState): void {
  const next = otherTeam(game.currentTeam);
  game.turnCount += 1;
  game.lastClue = undefined;
  game.remainingGuesses = 0;
  game.currentTeam = next;
  game.phase = phaseFor(next, 'SPYMASTER');
}

function countUnrevealed(cards: readonly Card[], team: Team): number {
  return cards.filter((c) => c.type === team && !c.revealed).length;
}

/** A team wins as soon as none of its cards remain hidden, whoever revealed the last one. */
export function detectWinner(cards: readonly Card[]): Team | undefined {
  if (countUnrevealed(cards, 'RED') === 0) return 'RED';
  if (countUnrevealed(cards, 'BLUE') === 0) return 'BLUE';
  return undefined;
}

function finishGame(game: GameState, winner: Team): void {
  game.winner = winner;
  game.phase = 'GAME_OVER';
}

function applyWinCheck(game: GameState): boolean {
  const winner = detectWinner(game.cards);
  if (!winner) return false;
  appendLog(game, `Team ${winner} wins!`);
  finishGame(game, winner);
  return true;
}

export function giveClue(game: GameState, team: Team, word: string, number: number): void {
  assertCanAct(game, team, 'SPYMASTER');
  if (!Number.isInteger(number) || number < 0) {
    throw new GameRuleError('IllegalClue', `Clue number must be a non-negative integer, got ${number}.`);
  }
  const clue = normalizeClue(word);
  assertLegalClue(clue, game.cards);

  game.lastClue = { word: clue, number };
  game.remainingGuesses = number + 1;
  game.turnCount += 1;
  openClueRecord(game, team, clue, number);
  appendLog(game, `${team} Spymaster gives clue: ${clue} ${number}`);
  game.phase = phaseFor(team, 'GUESSER');
}

export function guessCard(game: GameState, team: Team, word: string): GuessOutcome {
  assertCanAct(game, team, 'GUESSER');
  const target = word.trim().toUpperCase();
  const card = game.cards.find((c) => c.word.toUpperCase() === target);
  if (!card) throw new GameRuleError('CardNotFound', `"${word}" is not on the board.`);
  if (card.revealed) throw new GameRuleError('AlreadyRevealed', `"${card.word}" was already revealed.`);

  card.revealed = true;
  game.turnCount += 1;
  recordGuess(game, card.word, card.type);
  const prefix = `${team} guesses ${card.word}...`;

  switch (card.type) {
    case 'ASSASSIN':
      appendLog(game, `${prefix} It's the ASSASSIN! Game Over.`);
      finishGame(game, otherTeam(team));
      return { card, turnEnded: true };
    case 'NEUTRAL':
      appendLog(game, `${prefix} It's a Civilian. Turn Over.`);
      endTurn(game);
      return { card, turnEnded: true };
    case 'RED':
    case 'BLUE':
      break;
    default: {
      const unreachable: never = card.type;
      return unreachable;
    }
  }

  if (card.type !== team) {
    appendLog(game, `${prefix} It's the Opponent's card! Turn Over.`);
    if (!applyWinCheck(game)) endTurn(game);
    return { card, turnEnded: true };
  }

  appendLog(game, `${prefix} Correct!`);
  game.remainingGuesses -= 1;
  if (applyWinCheck(game)) return { card, turnEnded: true };
  if (game.remainingGuesses <= 0) {
    appendLog(game, 'Out of guesses. Turn Over.');
    endTurn(game);
    return { card, turnEnded: true };
  }
  return { card, turnEnded: false };
}

export function endTurnManually(game: GameState, team: Team): void {
  assertCanAct(game, team, 'GUESSER');
  appendLog(game, `${team} ends turn manually.`);
  endTurn(game);
}

/** Single entry point for every player action; returns whether the acting team's turn is over. */
export function applyAction(game: GameState, team: Team, action: Action): { turnEnded: boolean } {
  switch (action.type) {
    case 'giveClue':
      giveClue(game, team, action.word, action.number);
      return { turnEnded: false };
    case 'guess':
      return { turnEnded: guessCard(game, team, action.word).turnEnded };
    case 'endTurn':
      endTurnManually(game, team);
      return { turnEnded: true };
    default: {
      const unreachable: never = action;
      return unreachable;
    }
  }
}
