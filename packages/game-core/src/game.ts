// packages/game-core/src/game.ts
//
// Game driver: runs a solver against an oracle until the code is broken or
// the guess limit is used up. The limit belongs to the driver; the solver
// itself keeps guessing for as long as it is asked.

import type { Logger } from 'pino';

import type { Turn } from './candidates.js';
import { formatCode } from './codes.js';
import type { Oracle } from './oracle.js';
import { formatFeedback, isSolved } from './scoring.js';
import type { Solver } from './solver.js';

export const DEFAULT_MAX_GUESSES = 10;

export type GameState = 'won' | 'lost';

export interface GameResult {
  readonly state: GameState;
  readonly turns: readonly Turn[];
}

export interface PlayOptions {
  readonly maxGuesses?: number;
  readonly logger?: Logger;
}

/**
 * playGame resets the solver and plays one full game.
 * Solver errors (inconsistent oracle, exhausted search) propagate.
 */
export function playGame(
  solver: Solver,
  oracle: Oracle,
  options: PlayOptions = {},
): GameResult {
  const { maxGuesses = DEFAULT_MAX_GUESSES, logger } = options;
  const places = solver.universe.places;
  solver.reset();

  const turns: Turn[] = [];
  while (turns.length < maxGuesses) {
    const guess = solver.newGuess();
    const feedback = oracle.respond(guess);
    solver.feedback(feedback);
    turns.push({ guess, feedback });
    logger?.info(
      {
        round: turns.length,
        guess: formatCode(guess),
        feedback: formatFeedback(feedback),
      },
      'turn',
    );
    if (isSolved(feedback, places)) {
      logger?.info({ guesses: turns.length }, 'solved');
      return { state: 'won', turns };
    }
  }

  logger?.info({ maxGuesses }, 'out of guesses');
  return { state: 'lost', turns };
}
