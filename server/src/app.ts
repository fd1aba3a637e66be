import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import { isSingleToken } from './clueRules.js';
import { type AgentCoordinator, fireAndForget } from './deliberation.js';
import { GameNotFoundError, GameRuleError, InvalidRequestError } from './errors.js';
import { type GameStore } from './gameStore.js';
import { type HistoryStore } from './history.js';
import { createLogger } from './logger.js';
import {
  type Action,
  BOARD_SIZES,
  type CreateGameInput,
  type PlayerKind,
  ROLE_KEYS,
  type RoleKey,
  type Team,
  type Viewer,
} from './types.js';

const logger = createLogger('app');

export interface AppDeps {
  store: GameStore;
  coordinator: AgentCoordinator;
  history: HistoryStore;
  corsOrigin?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseTeam(value: unknown): Team {
  const upper = typeof value === 'string' ? value.trim().toUpperCase() : value;
  if (upper === 'RED' || upper === 'BLUE') return upper;
  throw new InvalidRequestError('Team must be RED or BLUE.');
}

export function parseViewer(value: unknown): Viewer {
  if (value === undefined || value === 'guesser') return 'guesser';
  if (value === 'spymaster') return 'spymaster';
  throw new InvalidRequestError('viewer must be spymaster or guesser.');
}

function parsePlayerKind(value: unknown, seat: RoleKey): PlayerKind {
  if (value === 'human' || value === 'agent') return value;
  throw new InvalidRequestError(`players.${seat} must be "human" or "agent".`);
}

export function parseCreateGame(body: unknown): CreateGameInput {
  const input = isRecord(body) ? body : {};
  const result: CreateGameInput = {};

  if (input.boardSize !== undefined) {
    const size = BOARD_SIZES.find((s) => s === input.boardSize);
    if (size === undefined) throw new InvalidRequestError(`boardSize must be one of ${BOARD_SIZES.join(', ')}.`);
    result.boardSize = size;
  }
  if (input.llmModel !== undefined) {
    if (typeof input.llmModel !== 'string') throw new InvalidRequestError('llmModel must be a string.');
    result.llmModel = input.llmModel;
  }
  if (input.players !== undefined) {
    if (!isRecord(input.players)) throw new InvalidRequestError('players must be an object.');
    const players: Partial<Record<RoleKey, PlayerKind>> = {};
    for (const seat of ROLE_KEYS) {
      const kind = input.players[seat];
      if (kind !== undefined) players[seat] = parsePlayerKind(kind, seat);
    }
    result.players = players;
  }
  return result;
}

function requireWord(value: unknown, field: string): string {
  if (typeof value !== 'string' || !value.trim()) throw new InvalidRequestError(`${field} must be a non-empty string.`);
  return value.trim();
}

export function parseAction(value: unknown): Action {
  if (!isRecord(value)) throw new InvalidRequestError('action must be an object.');
  switch (value.type) {
    case 'giveClue': {
      const word = requireWord(value.word, 'action.word');
      if (!isSingleToken(word)) throw new InvalidRequestError('Clue must be a single word.');
      const { number } = value;
      if (typeof number !== 'number' || !Number.isInteger(number) || number < 0) {
        throw new InvalidRequestError('action.number must be a non-negative integer.');
      }
      return { type: 'giveClue', word, number };
    }
    case 'guess':
      return { type: 'guess', word: requireWord(value.word, 'action.word') };
    case 'endTurn':
      return { type: 'endTurn' };
    default:
      throw new InvalidRequestError('action.type must be giveClue, guess or endTurn.');
  }
}

function parseTurnCount(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) throw new InvalidRequestError('expectedTurnCount must be a non-negative integer.');
  return parsed;
}

function statusFor(err: unknown): number {
  if (err instanceof GameNotFoundError) return 404;
  if (err instanceof InvalidRequestError) return 400;
  if (err instanceof GameRuleError) return err.code === 'WrongPhase' || err.code === 'WrongTurn' ? 409 : 400;
  return 500;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createApp({ store, coordinator, history, corsOrigin = '*' }: AppDeps): express.Express {
  const app = express();
  app.use(cors({ origin: corsOrigin }));
  app.use(express.json());

  function autoplayInBackground(gameId: string, label: string): void {
    fireAndForget(() => coordinator.autoplay(gameId), label);
  }

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.post('/api/games', (req, res) => {
    const game = store.createGame(parseCreateGame(req.body));
    res.status(201).json(store.snapshot(game.id));
    autoplayInBackground(game.id, 'gameCreate');
  });

  app.get('/api/games/:gameId', (req, res) => {
    res.json(store.snapshot(req.params.gameId, parseViewer(req.query.viewer)));
  });

  app.post(
    '/api/games/:gameId/actions',
    route(async (req, res) => {
      const body = isRecord(req.body) ? req.body : {};
      const team = parseTeam(body.team);
      const action = parseAction(body.action);
      const game = await store.submitAction(req.params.gameId, team, action);
      res.json(store.snapshot(game.id, parseViewer(req.query.viewer)));
      autoplayInBackground(game.id, 'afterHumanAction');
    }),
  );

  app.post(
    '/api/games/:gameId/agent-move',
    route(async (req, res) => {
      const result = await coordinator.runAgentMove(req.params.gameId, {
        expectedTurnCount: parseTurnCount(req.query.expectedTurnCount),
      });
      res.json(result);
    }),
  );

  app.post(
    '/api/games/:gameId/export',
    route(async (req, res) => {
      res.json(await store.exportHistory(req.params.gameId));
    }),
  );

  app.delete(
    '/api/games/:gameId',
    route(async (req, res) => {
      res.json(await store.terminate(req.params.gameId));
    }),
  );

  app.get(
    '/api/history',
    route(async (_req, res) => {
      res.json({ games: await history.list() });
    }),
  );

  app.get(
    '/api/history/:gameId',
    route(async (req, res) => {
      const record = await history.load(req.params.gameId);
      if (!record) {
        res.status(404).json({ error: 'Game history not found.' });
        return;
      }
      res.json(record);
    }),
  );

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(err);
    const message = err instanceof Error ? err.message : 'Unknown error';
    if (status >= 500) {
      logger.error('Request failed', { method: req.method, path: req.path, error: message });
    } else {
      logger.warn('Request rejected', { method: req.method, path: req.path, status, error: message });
    }
    const code = err instanceof GameRuleError ? err.code : undefined;
    res.status(status).json(code ? { error: message, code } : { error: message });
  });

  return app;
}
