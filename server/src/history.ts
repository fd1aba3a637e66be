import { mkdir, readFile, readdir, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { errorMessage, HistoryCorruptedError, InvalidRequestError } from './errors.js';
import { createLogger } from './logger.js';
import {
  type Card,
  type CardType,
  type ClueRecord,
  type GameState,
  type ReasoningEntry,
  type Score,
  type Team,
} from './types.js';

const logger = createLogger('history');

export const HISTORY_SCHEMA_VERSION = 1;

// --- Recorder: append-only views over GameState ---

export function appendLog(game: GameState, line: string): void {
  game.log.push(line);
}

export function openClueRecord(game: GameState, team: Team, clue: string, number: number): ClueRecord {
  const record: ClueRecord = { team, clue, number, guesses: [] };
  game.clueHistory.push(record);
  return record;
}

export function recordGuess(game: GameState, word: string, result: CardType): void {
  const current = game.clueHistory[game.clueHistory.length - 1];
  current?.guesses.push({ word, result });
}

export function appendReasoning(game: GameState, entry: Omit<ReasoningEntry, 'timestamp'>, now = new Date()): ReasoningEntry {
  const full: ReasoningEntry = { ...entry, timestamp: now.toISOString() };
  game.reasoningLog.push(full);
  return full;
}

export function computeScore(cards: readonly Card[]): Score {
  return {
    RED: cards.filter((c) => c.type === 'RED' && c.revealed).length,
    BLUE: cards.filter((c) => c.type === 'BLUE' && c.revealed).length,
  };
}

// --- Persisted record ---

export interface HistoryRecord {
  schemaVersion: typeof HISTORY_SCHEMA_VERSION;
  gameId: string;
  savedAt: string;
  boardSize: number;
  cards: Array<{ word: string; type: CardType; revealed: boolean }>;
  winner: Team | null;
  log: string[];
  clueHistory: ClueRecord[];
  reasoningLog: ReasoningEntry[];
  finalScore: Score;
}

export interface HistorySummary {
  gameId: string;
  winner: Team | null;
  finalScore: Score | null;
  hasCards: boolean;
  error?: 'corrupted';
}

export function toHistoryRecord(game: GameState, now = new Date()): HistoryRecord {
  return {
    schemaVersion: HISTORY_SCHEMA_VERSION,
    gameId: game.id,
    savedAt: now.toISOString(),
    boardSize: game.config.boardSize,
    cards: game.cards.map((c) => ({ word: c.word, type: c.type, revealed: c.revealed })),
    winner: game.winner ?? null,
    log: [...game.log],
    clueHistory: game.clueHistory.map((r) => ({ ...r, guesses: r.guesses.map((g) => ({ ...g })) })),
    reasoningLog: game.reasoningLog.map((e) => ({ ...e })),
    finalScore: computeScore(game.cards),
  };
}

export interface HistoryStore {
  save(record: HistoryRecord): Promise<void>;
  list(): Promise<HistorySummary[]>;
  load(gameId: string): Promise<HistoryRecord | undefined>;
}

const GAME_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const FILE_PREFIX = 'game_history_';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseTeam(value: unknown): Team | null {
  return value === 'RED' || value === 'BLUE' ? value : null;
}

function parseScore(value: unknown): Score | null {
  if (!isRecord(value) || typeof value.RED !== 'number' || typeof value.BLUE !== 'number') return null;
  return { RED: value.RED, BLUE: value.BLUE };
}

const CARD_TYPES: readonly CardType[] = ['RED', 'BLUE', 'NEUTRAL', 'ASSASSIN'];

function parseCardType(value: unknown): CardType {
  const found = CARD_TYPES.find((t) => t === value);
  if (!found) throw new Error(`Unknown card type ${JSON.stringify(value)}.`);
  return found;
}

function parseString(value: unknown, field: string): string {
  if (typeof value !== 'string') throw new Error(`${field} must be a string.`);
  return value;
}

function parseArray<T>(value: unknown, field: string, item: (entry: unknown) => T): T[] {
  if (!Array.isArray(value)) throw new Error(`${field} must be an array.`);
  return value.map(item);
}

function parseObject(value: unknown, field: string): Record<string, unknown> {
  if (!isRecord(value)) throw new Error(`${field} must be an object.`);
  return value;
}

function parseHistoryRecord(value: unknown): HistoryRecord {
  const raw = parseObject(value, 'record');
  if (raw.schemaVersion !== HISTORY_SCHEMA_VERSION) {
    throw new Error(`Unsupported history schema version ${JSON.stringify(raw.schemaVersion)}.`);
  }
  const finalScore = parseScore(raw.finalScore);
  if (!finalScore) throw new Error('finalScore is missing.');
  if (typeof raw.boardSize !== 'number') throw new Error('boardSize must be a number.');

  return {
    schemaVersion: HISTORY_SCHEMA_VERSION,
    gameId: parseString(raw.gameId, 'gameId'),
    savedAt: parseString(raw.savedAt, 'savedAt'),
    boardSize: raw.boardSize,
    cards: parseArray(raw.cards, 'cards', (entry) => {
      const card = parseObject(entry, 'card');
      return { word: parseString(card.word, 'card.word'), type: parseCardType(card.type), revealed: card.revealed === true };
    }),
    winner: parseTeam(raw.winner),
    log: parseArray(raw.log, 'log', (line) => parseString(line, 'log line')),
    clueHistory: parseArray(raw.clueHistory, 'clueHistory', (entry) => {
      const record = parseObject(entry, 'clue record');
      const team = parseTeam(record.team);
      if (!team || typeof record.number !== 'number') throw new Error('Malformed clue record.');
      return {
        team,
        clue: parseString(record.clue, 'clue'),
        number: record.number,
        guesses: parseArray(record.guesses, 'guesses', (g) => {
          const guess = parseObject(g, 'guess');
          return { word: parseString(guess.word, 'guess.word'), result: parseCardType(guess.result) };
        }),
      };
    }),
    reasoningLog: parseArray(raw.reasoningLog, 'reasoningLog', (entry) => {
      const item = parseObject(entry, 'reasoning entry');
      return {
        role: parseString(item.role, 'role'),
        action: parseString(item.action, 'action'),
        reasoning: parseString(item.reasoning, 'reasoning'),
        timestamp: parseString(item.timestamp, 'timestamp'),
      };
    }),
    finalScore,
  };
}

export class FileHistoryStore implements HistoryStore {
  constructor(private readonly dir: string) {}

  private fileFor(gameId: string): string {
    if (!GAME_ID_PATTERN.test(gameId)) throw new InvalidRequestError(`Invalid game id "${gameId}".`);
    return path.join(this.dir, `${FILE_PREFIX}${gameId}.json`);
  }

  async save(record: HistoryRecord): Promise<void> {
    const file = this.fileFor(record.gameId);
    await mkdir(this.dir, { recursive: true });
    const tmp = `${file}.tmp`;
    await writeFile(tmp, `${JSON.stringify(record, null, 2)}\n`, 'utf8');
    await rename(tmp, file);
    logger.info('Saved game history', { gameId: record.gameId, winner: record.winner });
  }

  async list(): Promise<HistorySummary[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (err) {
      if (isRecord(err) && err.code === 'ENOENT') return [];
      throw err;
    }

    const summaries: HistorySummary[] = [];
    for (const name of entries.sort()) {
      if (!name.startsWith(FILE_PREFIX) || !name.endsWith('.json')) continue;
      const gameId = name.slice(FILE_PREFIX.length, -'.json'.length);
      try {
        const data: unknown = JSON.parse(await readFile(path.join(this.dir, name), 'utf8'));
        const parsed = isRecord(data) ? data : {};
        summaries.push({
          gameId,
          winner: parseTeam(parsed.winner),
          finalScore: parseScore(parsed.finalScore),
          hasCards: Array.isArray(parsed.cards),
        });
      } catch (err) {
        logger.warn('Unreadable history file', { file: name, error: errorMessage(err) });
        summaries.push({ gameId, winner: null, finalScore: null, hasCards: false, error: 'corrupted' });
      }
    }
    return summaries;
  }

  async load(gameId: string): Promise<HistoryRecord | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.fileFor(gameId), 'utf8');
    } catch (err) {
      if (isRecord(err) && err.code === 'ENOENT') return undefined;
      throw err;
    }
    try {
      return parseHistoryRecord(JSON.parse(raw));
    } catch (err) {
      logger.warn('Unreadable history file', { gameId, error: errorMessage(err) });
      throw new HistoryCorruptedError(gameId, { cause: err });
    }
  }
}

/** Keeps records in process memory; used by the headless runner and tests. */
export class MemoryHistoryStore implements HistoryStore {
  readonly records = new Map<string, HistoryRecord>();

  async save(record: HistoryRecord): Promise<void> {
    this.records.set(record.gameId, record);
  }

  async list(): Promise<HistorySummary[]> {
    return [...this.records.values()].map((r) => ({
      gameId: r.gameId,
      winner: r.winner,
      finalScore: r.finalScore,
      hasCards: true,
    }));
  }

  async load(gameId: string): Promise<HistoryRecord | undefined> {
    return this.records.get(gameId);
  }
}
