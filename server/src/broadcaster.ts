import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { serializeGame } from './snapshot.js';
import { type GameSnapshot, type GameState, type Viewer } from './types.js';

const logger = createLogger('broadcaster');

export interface Observer {
  id: string;
  viewer: Viewer;
  deliver(snapshot: GameSnapshot): void | Promise<void>;
}

/**
 * Best-effort fan-out of fresh snapshots. A failing observer is logged and skipped; it
 * can re-fetch the game to catch up.
 */
export class Broadcaster {
  private readonly observers = new Map<string, Map<string, Observer>>();

  subscribe(gameId: string, observer: Observer): () => void {
    let forGame = this.observers.get(gameId);
    if (!forGame) {
      forGame = new Map();
      this.observers.set(gameId, forGame);
    }
    forGame.set(observer.id, observer);
    return () => this.unsubscribe(gameId, observer.id);
  }

  unsubscribe(gameId: string, observerId: string): void {
    const forGame = this.observers.get(gameId);
    if (!forGame) return;
    forGame.delete(observerId);
    if (forGame.size === 0) this.observers.delete(gameId);
  }

  observerCount(gameId: string): number {
    return this.observers.get(gameId)?.size ?? 0;
  }

  dropGame(gameId: string): void {
    this.observers.delete(gameId);
  }

  publish(game: GameState): void {
    const forGame = this.observers.get(game.id);
    if (!forGame) return;
    const views = new Map<Viewer, GameSnapshot>();
    for (const observer of [...forGame.values()]) {
      const snapshot = views.get(observer.viewer) ?? serializeGame(game, observer.viewer);
      views.set(observer.viewer, snapshot);
      const onFailure = (err: unknown) =>
        logger.warn('Observer delivery failed', { gameId: game.id, observerId: observer.id, error: errorMessage(err) });
      try {
        const pending = observer.deliver(snapshot);
        if (pending instanceof Promise) pending.catch(onFailure);
      } catch (err) {
        onFailure(err);
      }
    }
  }
}
