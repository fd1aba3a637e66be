export type GameRuleCode =
  | 'WrongPhase'
  | 'WrongTurn'
  | 'IllegalClue'
  | 'CardNotFound'
  | 'AlreadyRevealed'
  | 'InsufficientWordPool';

/** A rejected action. Thrown before any state is touched, so the game is unchanged. */
export class GameRuleError extends Error {
  constructor(
    readonly code: GameRuleCode,
    message: string,
  ) {
    super(message);
    this.name = 'GameRuleError';
  }
}

export class GameNotFoundError extends Error {
  constructor(readonly gameId: string) {
    super(`Game "${gameId}" not found.`);
    this.name = 'GameNotFoundError';
  }
}

export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

export class HistoryCorruptedError extends Error {
  constructor(
    readonly gameId: string,
    options?: { cause?: unknown },
  ) {
    super('Corrupted game history', options);
    this.name = 'HistoryCorruptedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
