export type Team = 'RED' | 'BLUE';
export type CardType = Team | 'NEUTRAL' | 'ASSASSIN';
export type Role = 'SPYMASTER' | 'GUESSER';
export type RoleKey = `${Team}_${Role}`;
export type GamePhase = RoleKey | 'GAME_OVER';
export type PlayerKind = 'human' | 'agent';
export type Viewer = 'spymaster' | 'guesser';

export const TEAMS: readonly Team[] = ['RED', 'BLUE'];
export const ROLE_KEYS: readonly RoleKey[] = ['RED_SPYMASTER', 'RED_GUESSER', 'BLUE_SPYMASTER', 'BLUE_GUESSER'];
export const BOARD_SIZES = [25, 36, 49, 64] as const;

export interface Card {
  readonly word: string;
  readonly type: CardType;
  revealed: boolean;
}

export interface GameConfig {
  readonly boardSize: number;
  readonly wordPool?: readonly string[];
  readonly players: Readonly<Record<RoleKey, PlayerKind>>;
  readonly llmModel: string;
}

export interface Clue {
  word: string;
  number: number;
}

export interface GuessRecord {
  word: string;
  result: CardType;
}

export interface ClueRecord {
  team: Team;
  clue: string;
  number: number;
  guesses: GuessRecord[];
}

export interface ReasoningEntry {
  role: string;
  action: string;
  reasoning: string;
  timestamp: string;
}

export interface GameState {
  id: string;
  createdAt: string;
  config: GameConfig;
  cards: Card[];
  phase: GamePhase;
  currentTeam: Team;
  lastClue?: Clue;
  remainingGuesses: number;
  turnCount: number;
  winner?: Team;
  log: string[];
  clueHistory: ClueRecord[];
  reasoningLog: ReasoningEntry[];
}

export type Action =
  | { type: 'giveClue'; word: string; number: number }
  | { type: 'guess'; word: string }
  | { type: 'endTurn' };

export type Score = Record<Team, number>;

export interface CardView {
  word: string;
  revealed: boolean;
  type: CardType | null;
}

export interface GameSnapshot {
  id: string;
  createdAt: string;
  cards: CardView[];
  phase: GamePhase;
  currentTeam: Team;
  players: Record<RoleKey, PlayerKind>;
  llmModel: string;
  boardSize: number;
  score: Score;
  winner: Team | null;
  lastClue: Clue | null;
  remainingGuesses: number;
  turnCount: number;
  log: string[];
  clueHistory: ClueRecord[];
  reasoningLog: ReasoningEntry[];
}

export interface CreateGameInput {
  boardSize?: number;
  llmModel?: string;
  players?: Partial<Record<RoleKey, PlayerKind>>;
  wordPool?: string[];
}
