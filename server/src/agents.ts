import { describeCollision, findClueCollision, isSingleToken, normalizeClue } from './clueRules.js';
import { type ChatMessage, type JsonCompleter } from './llmClient.js';
import { createLogger } from './logger.js';
import { type ClueRecord, type GameSnapshot, type Role, type Team } from './types.js';

const logger = createLogger('agents');

export const END_TURN_SENTINEL = 'END_TURN';
const MAX_CLUE_ATTEMPTS = 3;

export type AgentDecision =
  | { kind: 'clue'; word: string; count: number; rationale: string }
  | { kind: 'guesses'; words: string[]; rationale: string };

export interface AgentRequest {
  snapshot: GameSnapshot;
  team: Team;
  role: Role;
}

/**
 * Anything that can play a role. Decisions go through the same action API as a
 * human's, so an agent gets no rule exemptions.
 */
export interface PlayerAgent {
  decide(request: AgentRequest): Promise<AgentDecision>;
}

export type AgentFactory = (request: { team: Team; role: Role; model: string }) => PlayerAgent;

export class AgentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AgentError';
  }
}

// --- prompt helpers ---

function formatBoard(snapshot: GameSnapshot): string {
  const lines = snapshot.cards.map((card) => {
    const status = card.revealed ? ' (REVEALED)' : '';
    return `- ${card.word} [${card.type ?? 'UNKNOWN'}]${status}`;
  });
  return `Current Board:\n${lines.join('\n')}`;
}

export function formatClueHistory(history: readonly ClueRecord[]): string {
  if (!history.length) return 'No clues given yet.';
  return history
    .map((entry) => {
      const guesses = entry.guesses.length
        ? entry.guesses.map((g) => `${g.word}(${g.result})`).join(', ')
        : '(no guesses yet)';
      return `${entry.team}: ${entry.clue} ${entry.number} → ${guesses}`;
    })
    .join('\n');
}

function wordsOf(snapshot: GameSnapshot, predicate: (card: GameSnapshot['cards'][number]) => boolean): string[] {
  return snapshot.cards.filter(predicate).map((c) => c.word);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readReasoning(value: Record<string, unknown>, fallback: string): string {
  return typeof value.reasoning === 'string' && value.reasoning.trim() ? value.reasoning.trim() : fallback;
}

// --- spymaster ---

export class SpymasterAgent implements PlayerAgent {
  constructor(
    private readonly team: Team,
    private readonly llm: JsonCompleter,
  ) {}

  private systemPrompt(snapshot: GameSnapshot): string {
    const opponent = this.team === 'RED' ? 'BLUE' : 'RED';
    const mine = wordsOf(snapshot, (c) => c.type === this.team && !c.revealed);
    const theirs = wordsOf(snapshot, (c) => c.type === opponent && !c.revealed);
    const assassin = wordsOf(snapshot, (c) => c.type === 'ASSASSIN' && !c.revealed);
    const neutral = wordsOf(snapshot, (c) => c.type === 'NEUTRAL' && !c.revealed);
    return [
      `You are the Spymaster for team ${this.team} in a word-association game.`,
      'Give a single-word clue that connects as many of your team\'s words as possible while avoiding the assassin, the opponent\'s words and neutral words, in that order of importance.',
      '',
      'Rules:',
      '1. The clue must be a single word (no spaces).',
      '2. The clue cannot be any unrevealed word on the board.',
      '3. The clue cannot contain an unrevealed board word, and no unrevealed board word may contain the clue.',
      '',
      `Game history:\n${formatClueHistory(snapshot.clueHistory)}`,
      '',
      `Your remaining words: ${mine.join(', ')}`,
      `Opponent words (avoid): ${theirs.join(', ')}`,
      `Assassin (never): ${assassin.join(', ')}`,
      `Neutral words: ${neutral.join(', ')}`,
      '',
      'Respond with JSON: {"reasoning": "max 2 sentences", "word": "CLUE", "number": INTEGER}',
    ].join('\n');
  }

  async decide({ snapshot }: AgentRequest): Promise<AgentDecision> {
    const system = this.systemPrompt(snapshot);
    const rejected: string[] = [];

    for (let attempt = 1; attempt <= MAX_CLUE_ATTEMPTS; attempt += 1) {
      const messages: ChatMessage[] = [{ role: 'user', content: formatBoard(snapshot) }];
      if (rejected.length) {
        messages.push({
          role: 'user',
          content: `Your previous clues were rejected:\n${rejected.join('\n')}\nPick a DIFFERENT word.`,
        });
      }

      const response = await this.llm.completeJson(system, messages);
      const outcome = this.validate(response, snapshot.cards);
      if (typeof outcome === 'string') {
        logger.warn('Spymaster clue rejected, retrying', { team: this.team, attempt, reason: outcome });
        rejected.push(outcome);
        continue;
      }
      return outcome;
    }

    throw new AgentError(`Spymaster for ${this.team} failed to produce a legal clue after ${MAX_CLUE_ATTEMPTS} attempts.`);
  }

  /** Returns the decision, or the reason the clue is unusable. */
  private validate(response: unknown, cards: GameSnapshot['cards']): AgentDecision | string {
    if (!isRecord(response)) return 'Response was not a JSON object.';
    const { word, number } = response;
    if (typeof word !== 'string' || !isSingleToken(word)) return `"${String(word)}" is not a single word.`;
    if (typeof number !== 'number' || !Number.isInteger(number) || number < 0) {
      return `Count ${String(number)} must be a non-negative integer.`;
    }
    const clue = normalizeClue(word);
    const collision = findClueCollision(clue, cards);
    if (collision) return describeCollision(clue, collision);
    return { kind: 'clue', word: clue, count: number, rationale: readReasoning(response, '') };
  }
}

// --- guesser ---

export class GuesserAgent implements PlayerAgent {
  constructor(
    private readonly team: Team,
    private readonly llm: JsonCompleter,
  ) {}

  async decide({ snapshot }: AgentRequest): Promise<AgentDecision> {
    if (!snapshot.lastClue) return { kind: 'guesses', words: [], rationale: 'No active clue.' };
    const { word, number } = snapshot.lastClue;

    const system = [
      `You are the Guesser for team ${this.team} in a word-association game.`,
      `Your Spymaster's clue is "${word}" for ${number} card(s).`,
      'Rank the unrevealed words by how well they fit the clue and pick the strongest matches, best first.',
      'Earlier clues from your Spymaster that you did not fully resolve may point at words too.',
      '',
      `Game history:\n${formatClueHistory(snapshot.clueHistory)}`,
      '',
      `Respond with JSON: {"reasoning": "max 2 sentences", "words": ["GUESS_1", "GUESS_2"]}`,
      `If you have no confident guess, respond with ["${END_TURN_SENTINEL}"] as the words list.`,
    ].join('\n');

    const response = await this.llm.completeJson(system, [{ role: 'user', content: formatBoard(snapshot) }]);
    if (!isRecord(response) || !Array.isArray(response.words)) {
      throw new AgentError('Guesser response is missing a "words" list.');
    }

    const words: string[] = [];
    for (const entry of response.words) {
      if (typeof entry !== 'string') throw new AgentError('Guesser words must be strings.');
      const guess = entry.trim().toUpperCase();
      if (guess === END_TURN_SENTINEL) break;
      if (guess) words.push(guess);
    }
    return { kind: 'guesses', words, rationale: readReasoning(response, words.length ? '' : 'Decided to end turn.') };
  }
}

export function createAgentFactory(clientFor: (model: string) => JsonCompleter): AgentFactory {
  return ({ team, role, model }) => {
    const llm = clientFor(model);
    return role === 'SPYMASTER' ? new SpymasterAgent(team, llm) : new GuesserAgent(team, llm);
  };
}
