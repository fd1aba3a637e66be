import { type AgentDecision, type AgentFactory } from './agents.js';
import { applyAction, guessCard, isGameOver, phaseFor, roleToMove } from './engine.js';
import { errorMessage, GameRuleError } from './errors.js';
import { type GameStore } from './gameStore.js';
import { appendReasoning } from './history.js';
import { createLogger } from './logger.js';
import { serializeGame } from './snapshot.js';
import { type GameSnapshot, type GameState, type Role, type Team } from './types.js';

const logger = createLogger('deliberation');

export type AgentMoveResult =
  | { status: 'applied'; decision: AgentDecision; snapshot: GameSnapshot }
  | { status: 'ignored'; reason: string }
  | { status: 'rejected'; reason: string; decision: AgentDecision }
  | { status: 'failed'; reason: string };

export interface AgentMoveOptions {
  expectedTurnCount?: number;
}

interface PendingMove {
  team: Team;
  role: Role;
  turnCount: number;
  snapshot: GameSnapshot;
  model: string;
}

function describeDecision(decision: AgentDecision): string {
  return decision.kind === 'clue'
    ? `Clue: ${decision.word} ${decision.count}`
    : `Guess Plan: ${decision.words.length ? decision.words.join(', ') : 'END_TURN'}`;
}

/**
 * A guess plan is applied only if every word names a distinct, still hidden card, so a
 * malformed plan never reveals anything.
 */
function findPlanProblem(game: GameState, words: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const word of words) {
    const key = word.trim().toUpperCase();
    const card = game.cards.find((c) => c.word.toUpperCase() === key);
    if (!card) return `"${word}" is not on the board.`;
    if (card.revealed) return `"${card.word}" was already revealed.`;
    if (seen.has(key)) return `"${card.word}" appears twice in the plan.`;
    seen.add(key);
  }
  return undefined;
}

function applyDecision(game: GameState, team: Team, decision: AgentDecision): void {
  switch (decision.kind) {
    case 'clue':
      applyAction(game, team, { type: 'giveClue', word: decision.word, number: decision.count });
      return;
    case 'guesses': {
      for (const word of decision.words) {
        if (guessCard(game, team, word).turnEnded) return;
      }
      // Plan exhausted with guesses to spare: the agent chose to stop.
      applyAction(game, team, { type: 'endTurn' });
      return;
    }
    default: {
      const unreachable: never = decision;
      return unreachable;
    }
  }
}

export interface CoordinatorOptions {
  maxAutoplaySteps?: number;
}

/**
 * Drives agent-controlled roles. The agent is consulted without holding the game's lock;
 * its decision is applied only if no other action advanced the game in the meantime.
 */
export class AgentCoordinator {
  private readonly autoplaying = new Set<string>();
  private readonly rerunRequested = new Set<string>();
  private readonly maxAutoplaySteps: number;

  constructor(
    private readonly store: GameStore,
    private readonly agentFor: AgentFactory,
    options: CoordinatorOptions = {},
  ) {
    this.maxAutoplaySteps = options.maxAutoplaySteps ?? 100;
  }

  async runAgentMove(gameId: string, options: AgentMoveOptions = {}): Promise<AgentMoveResult> {
    const pending = await this.store.withGame(gameId, (game): PendingMove | string => {
      if (isGameOver(game)) return 'Game is over.';
      if (options.expectedTurnCount !== undefined && options.expectedTurnCount !== game.turnCount) {
        return `Stale request. Expected turn ${options.expectedTurnCount}, current is ${game.turnCount}.`;
      }
      const role = roleToMove(game);
      if (!role) return 'Game is over.';
      const seat = phaseFor(game.currentTeam, role);
      if (game.config.players[seat] !== 'agent') return `${seat} is played by a human.`;
      return {
        team: game.currentTeam,
        role,
        turnCount: game.turnCount,
        snapshot: serializeGame(game, role === 'SPYMASTER' ? 'spymaster' : 'guesser'),
        model: game.config.llmModel,
      };
    });
    if (typeof pending === 'string') {
      logger.info('Agent move skipped', { gameId, reason: pending });
      return { status: 'ignored', reason: pending };
    }

    const { team, role, turnCount } = pending;
    let decision: AgentDecision;
    try {
      decision = await this.agentFor({ team, role, model: pending.model }).decide({
        snapshot: pending.snapshot,
        team,
        role,
      });
    } catch (err) {
      logger.error('Agent failed to decide', { gameId, team, role, error: errorMessage(err) });
      return { status: 'failed', reason: errorMessage(err) };
    }

    return this.store.withGame(gameId, (game): AgentMoveResult => {
      if (game.turnCount !== turnCount) {
        logger.warn('Discarding stale agent decision', { gameId, startedAt: turnCount, current: game.turnCount });
        return { status: 'ignored', reason: 'State changed during processing.' };
      }
      if (decision.kind !== (role === 'SPYMASTER' ? 'clue' : 'guesses')) {
        return { status: 'rejected', reason: `A ${role} cannot submit a ${decision.kind} decision.`, decision };
      }
      if (decision.kind === 'guesses') {
        const problem = findPlanProblem(game, decision.words);
        if (problem) {
          logger.warn('Rejected malformed guess plan', { gameId, team, problem });
          return { status: 'rejected', reason: problem, decision };
        }
      }

      try {
        applyDecision(game, team, decision);
      } catch (err) {
        if (!(err instanceof GameRuleError)) throw err;
        logger.warn('Agent decision rejected by the rules', { gameId, team, code: err.code, error: err.message });
        return { status: 'rejected', reason: err.message, decision };
      }

      appendReasoning(game, {
        role: `${team} ${role}`,
        action: describeDecision(decision),
        reasoning: decision.rationale || 'No reasoning supplied.',
      });
      logger.info('Agent decision applied', { gameId, team, role, action: describeDecision(decision) });
      return { status: 'applied', decision, snapshot: serializeGame(game, 'guesser') };
    });
  }

  /**
   * Keeps playing while the seat to move belongs to an agent. One loop per game; a call
   * made while that loop runs asks it to go around again before it exits, so a move that
   * lands mid-decision is picked up.
   */
  async autoplay(gameId: string): Promise<number> {
    if (this.autoplaying.has(gameId)) {
      this.rerunRequested.add(gameId);
      return 0;
    }
    this.autoplaying.add(gameId);
    let steps = 0;
    try {
      do {
        this.rerunRequested.delete(gameId);
        steps += await this.playAgentSeats(gameId, this.maxAutoplaySteps - steps);
      } while (this.rerunRequested.has(gameId) && steps < this.maxAutoplaySteps);
      if (steps >= this.maxAutoplaySteps) logger.warn('Autoplay step limit reached', { gameId, steps });
    } finally {
      this.autoplaying.delete(gameId);
      this.rerunRequested.delete(gameId);
    }
    return steps;
  }

  private async playAgentSeats(gameId: string, budget: number): Promise<number> {
    let steps = 0;
    while (steps < budget && this.store.has(gameId)) {
      const game = this.store.getGame(gameId);
      const role = roleToMove(game);
      if (!role || game.config.players[phaseFor(game.currentTeam, role)] !== 'agent') break;

      const result = await this.runAgentMove(gameId, { expectedTurnCount: game.turnCount });
      if (result.status !== 'applied') {
        logger.warn('Autoplay stopped', { gameId, status: result.status, reason: result.reason });
        break;
      }
      steps += 1;
    }
    return steps;
  }
}

// Background work whose failure must only be logged.
export function fireAndForget(task: () => Promise<unknown>, label: string): void {
  task().catch((err: unknown) => {
    logger.error('Background task failed', { label, error: errorMessage(err) });
  });
}
