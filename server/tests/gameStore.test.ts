import { describe, expect, it } from 'vitest';
import { GameNotFoundError, GameRuleError } from '../src/errors.js';
import { buildConfig, GameStore } from '../src/gameStore.js';
import { type HistoryStore, MemoryHistoryStore } from '../src/history.js';
import { type GameSnapshot } from '../src/types.js';
import { ALL_HUMAN, ASSASSIN_WORD, FIXTURE_WORDS } from './fixtures.js';

function makeStore(history: HistoryStore = new MemoryHistoryStore()) {
  let next = 0;
  return new GameStore({ history, defaultModel: 'test-model', newId: () => `game-${(next += 1)}` });
}

describe('buildConfig', () => {
  it('fills in defaults', () => {
    expect(buildConfig({}, 'test-model')).toEqual({ boardSize: 25, players: ALL_HUMAN, llmModel: 'test-model' });
  });

  it('merges seat overrides over human defaults', () => {
    const config = buildConfig({ boardSize: 36, llmModel: ' other-model ', players: { BLUE_GUESSER: 'agent' } }, 'test-model');
    expect(config.boardSize).toBe(36);
    expect(config.llmModel).toBe('other-model');
    expect(config.players).toEqual({ ...ALL_HUMAN, BLUE_GUESSER: 'agent' });
  });
});

describe('GameStore', () => {
  it('creates independent games', () => {
    const store = makeStore();
    const first = store.createGame({ wordPool: FIXTURE_WORDS });
    const second = store.createGame({ boardSize: 36 });

    expect(store.ids()).toEqual(['game-1', 'game-2']);
    expect(first.cards).toHaveLength(25);
    expect(second.cards).toHaveLength(36);
    expect(store.snapshot('game-1').llmModel).toBe('test-model');
  });

  it('reports unknown games', () => {
    const store = makeStore();
    expect(() => store.getGame('nope')).toThrow(GameNotFoundError);
    expect(() => store.getGame('nope')).toThrow('Game "nope" not found.');
  });

  it('serializes concurrent actions on one game', async () => {
    const store = makeStore();
    const { id } = store.createGame({ wordPool: FIXTURE_WORDS });

    const [first, second] = await Promise.allSettled([
      store.submitAction(id, 'RED', { type: 'giveClue', word: 'FRUIT', number: 2 }),
      store.submitAction(id, 'RED', { type: 'giveClue', word: 'ORCHARD', number: 1 }),
    ]);

    expect(first.status).toBe('fulfilled');
    expect(second.status).toBe('rejected');
    if (second.status === 'rejected') {
      expect(second.reason).toBeInstanceOf(GameRuleError);
      expect(second.reason).toMatchObject({ code: 'WrongPhase' });
    }
    expect(store.getGame(id).clueHistory.map((r) => r.clue)).toEqual(['FRUIT']);
  });

  it('publishes a snapshot only when the game advances', async () => {
    const store = makeStore();
    const { id } = store.createGame({ wordPool: FIXTURE_WORDS });
    const views: GameSnapshot[] = [];
    store.broadcaster.subscribe(id, { id: 'observer', viewer: 'guesser', deliver: (s) => void views.push(s) });

    await store.submitAction(id, 'RED', { type: 'giveClue', word: 'FRUIT', number: 1 });
    await expect(store.submitAction(id, 'BLUE', { type: 'endTurn' })).rejects.toThrow(GameRuleError);

    expect(views.map((v) => v.turnCount)).toEqual([1]);
    expect(views[0]?.phase).toBe('RED_GUESSER');
  });

  it('archives the game when it ends', async () => {
    const history = new MemoryHistoryStore();
    const store = makeStore(history);
    const { id } = store.createGame({ wordPool: FIXTURE_WORDS });

    await store.submitAction(id, 'RED', { type: 'giveClue', word: 'FRUIT', number: 1 });
    await store.submitAction(id, 'RED', { type: 'guess', word: ASSASSIN_WORD });

    const record = history.records.get(id);
    expect(record?.winner).toBe('BLUE');
    expect(record?.log.at(-1)).toBe("RED guesses BOMB... It's the ASSASSIN! Game Over.");
  });

  it('keeps playing when the history store fails', async () => {
    const failing: HistoryStore = {
      save: async () => {
        throw new Error('disk full');
      },
      list: async () => [],
      load: async () => undefined,
    };
    const store = makeStore(failing);
    const { id } = store.createGame({ wordPool: FIXTURE_WORDS });

    await store.submitAction(id, 'RED', { type: 'giveClue', word: 'FRUIT', number: 1 });
    const game = await store.submitAction(id, 'RED', { type: 'guess', word: ASSASSIN_WORD });
    expect(game.phase).toBe('GAME_OVER');
  });

  it('exports a running game without changing it', async () => {
    const history = new MemoryHistoryStore();
    const store = makeStore(history);
    const { id } = store.createGame({ wordPool: FIXTURE_WORDS });

    const record = await store.exportHistory(id);
    expect(record.winner).toBeNull();
    expect(history.records.get(id)).toEqual(record);
    expect(store.getGame(id).phase).toBe('RED_SPYMASTER');
  });

  it('archives and forgets a terminated game', async () => {
    const history = new MemoryHistoryStore();
    const store = makeStore(history);
    const { id } = store.createGame({ wordPool: FIXTURE_WORDS });
    store.broadcaster.subscribe(id, { id: 'observer', viewer: 'guesser', deliver: () => undefined });

    const record = await store.terminate(id);

    expect(record.gameId).toBe(id);
    expect(history.records.has(id)).toBe(true);
    expect(store.has(id)).toBe(false);
    expect(store.broadcaster.observerCount(id)).toBe(0);
    await expect(store.submitAction(id, 'RED', { type: 'endTurn' })).rejects.toThrow(GameNotFoundError);
  });
});
