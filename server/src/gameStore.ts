import { randomUUID } from 'node:crypto';
import { type Rng } from './board.js';
import { Broadcaster } from './broadcaster.js';
import { applyAction, createGame, isGameOver } from './engine.js';
import { errorMessage, GameNotFoundError } from './errors.js';
import { type HistoryRecord, type HistoryStore, toHistoryRecord } from './history.js';
import { createLogger } from './logger.js';
import { Mutex } from './mutex.js';
import { serializeGame } from './snapshot.js';
import {
  type Action,
  BOARD_SIZES,
  type CreateGameInput,
  type GameConfig,
  type GameSnapshot,
  type GameState,
  type PlayerKind,
  type RoleKey,
  type Team,
  type Viewer,
} from './types.js';

const logger = createLogger('gameStore');

const DEFAULT_PLAYERS: Record<RoleKey, PlayerKind> = {
  RED_SPYMASTER: 'human',
  RED_GUESSER: 'human',
  BLUE_SPYMASTER: 'human',
  BLUE_GUESSER: 'human',
};

interface Session {
  game: GameState;
  mutex: Mutex;
}

export interface GameStoreOptions {
  history?: HistoryStore;
  broadcaster?: Broadcaster;
  defaultModel?: string;
  rng?: Rng;
  newId?: () => string;
}

export function buildConfig(input: CreateGameInput, defaultModel: string): GameConfig {
  return {
    boardSize: input.boardSize ?? BOARD_SIZES[0],
    wordPool: input.wordPool,
    players: { ...DEFAULT_PLAYERS, ...input.players },
    llmModel: input.llmModel?.trim() || defaultModel,
  };
}

/**
 * Owns every live game session. Each session is guarded by its own mutex so
 * concurrent submissions against one game are applied one at a time, while other
 * games proceed independently.
 */
export class GameStore {
  private readonly sessions = new Map<string, Session>();
  readonly broadcaster: Broadcaster;
  private readonly history?: HistoryStore;
  private readonly defaultModel: string;
  private readonly rng?: Rng;
  private readonly newId: () => string;

  constructor(options: GameStoreOptions = {}) {
    this.history = options.history;
    this.broadcaster = options.broadcaster ?? new Broadcaster();
    this.defaultModel = options.defaultModel ?? 'gpt-4o';
    this.rng = options.rng;
    this.newId = options.newId ?? (() => randomUUID().slice(0, 8));
  }

  createGame(input: CreateGameInput = {}): GameState {
    const id = this.newId();
    if (this.sessions.has(id)) throw new Error(`Game id collision: ${id}.`);
    const game = createGame(id, buildConfig(input, this.defaultModel), this.rng);
    this.sessions.set(id, { game, mutex: new Mutex() });
    logger.info('Game created', { gameId: id, boardSize: game.config.boardSize, players: game.config.players });
    return game;
  }

  has(gameId: string): boolean {
    return this.sessions.has(gameId);
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }

  private session(gameId: string): Session {
    const session = this.sessions.get(gameId);
    if (!session) throw new GameNotFoundError(gameId);
    return session;
  }

  /** Direct read access. Callers must not mutate the returned state. */
  getGame(gameId: string): GameState {
    return this.session(gameId).game;
  }

  snapshot(gameId: string, viewer: Viewer = 'guesser'): GameSnapshot {
    return serializeGame(this.getGame(gameId), viewer);
  }

  /**
   * Runs `fn` while holding the game's lock. If the game advanced, observers are
   * notified; if it just ended, the final record is handed to the history store.
   */
  async withGame<T>(gameId: string, fn: (game: GameState) => T): Promise<T> {
    const session = this.session(gameId);
    return session.mutex.runExclusive(async () => {
      const { game } = session;
      const turnBefore = game.turnCount;
      const wasOver = isGameOver(game);
      const result = fn(game);
      if (game.turnCount !== turnBefore) this.broadcaster.publish(game);
      if (!wasOver && isGameOver(game)) {
        logger.info('Game over', { gameId, winner: game.winner });
        await this.persist(game);
      }
      return result;
    });
  }

  async submitAction(gameId: string, team: Team, action: Action): Promise<GameState> {
    return this.withGame(gameId, (game) => {
      applyAction(game, team, action);
      logger.info('Action applied', { gameId, team, action: action.type, phase: game.phase, turnCount: game.turnCount });
      return game;
    });
  }

  async exportHistory(gameId: string): Promise<HistoryRecord> {
    const session = this.session(gameId);
    return session.mutex.runExclusive(() => this.persist(session.game));
  }

  /** Ends a session from outside the rules (abandoned or closed); the last state is archived. */
  async terminate(gameId: string): Promise<HistoryRecord> {
    const session = this.session(gameId);
    return session.mutex.runExclusive(async () => {
      const record = await this.persist(session.game);
      this.sessions.delete(gameId);
      this.broadcaster.dropGame(gameId);
      logger.info('Game terminated', { gameId });
      return record;
    });
  }

  private async persist(game: GameState): Promise<HistoryRecord> {
    const record = toHistoryRecord(game);
    if (!this.history) return record;
    try {
      await this.history.save(record);
    } catch (err) {
      logger.error('Failed to save game history', { gameId: game.id, error: errorMessage(err) });
    }
    return record;
  }
}
