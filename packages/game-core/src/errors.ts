// packages/game-core/src/errors.ts
//
// Error kinds raised by the solver core. Every error carries a `code`
// discriminant so callers (the HTTP server, the game driver) can branch on
// the kind without instanceof chains.

export type MastermindErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'INVALID_FEEDBACK'
  | 'OUT_OF_TURN'
  | 'INCONSISTENT_HISTORY'
  | 'SEARCH_EXHAUSTED';

export abstract class MastermindError extends Error {
  abstract readonly code: MastermindErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Non-positive or non-integer `places` / `colors`, or mismatched code lengths. */
export class InvalidConfigurationError extends MastermindError {
  readonly code = 'INVALID_CONFIGURATION';
}

/** Feedback out of bounds, or supplied while no guess is pending. */
export class InvalidFeedbackError extends MastermindError {
  readonly code = 'INVALID_FEEDBACK';
}

/** `newGuess()` while a guess awaits feedback, or after the game is solved. */
export class OutOfTurnError extends MastermindError {
  readonly code = 'OUT_OF_TURN';
}

/** No code is consistent with the feedback received so far. */
export class InconsistentHistoryError extends MastermindError {
  readonly code = 'INCONSISTENT_HISTORY';
}

/** Iterative deepening reached its ceiling without a winning guess. */
export class SearchExhaustedError extends MastermindError {
  readonly code = 'SEARCH_EXHAUSTED';
}

export function isMastermindError(err: unknown): err is MastermindError {
  return err instanceof MastermindError;
}
