// packages/game-core/src/scoring.ts
//
// Mastermind scoring, shared by the solvers, the oracles and the server.
//
// Feedback legend:
//   - exact: right color in the right position
//   - color: right color in the wrong position
//
// Rules:
//   • Guess and secret must have the same length.
//   • Colors may repeat. Color matches are counted by multiset intersection
//     (sum over colors of the smaller count) minus the exact matches, so a
//     repeated guess color is never credited twice against a single secret peg.

import { InvalidConfigurationError } from './errors.js';

/** A guess or a secret: one color (1-based) per place. */
export type Code = readonly number[];

export interface Feedback {
  readonly exact: number;
  readonly color: number;
}

/**
 * score compares a guess against the secret.
 *
 * Example:
 *   secret = [1, 1, 2, 2], guess = [1, 2, 1, 1]
 *   → { exact: 1, color: 2 }
 */
export function score(guess: Code, secret: Code): Feedback {
  if (guess.length !== secret.length) {
    throw new InvalidConfigurationError(
      `Code lengths differ: ${guess.length} vs ${secret.length}`,
    );
  }

  let exact = 0;
  const counts = new Map<number, number>();

  // Pass 1: count exact hits and tally the secret's colors
  for (let i = 0; i < secret.length; i++) {
    if (guess[i] === secret[i]) exact++;
    counts.set(secret[i], (counts.get(secret[i]) ?? 0) + 1);
  }

  // Pass 2: consume secret colors with the guess's colors
  let common = 0;
  for (const c of guess) {
    const left = counts.get(c) ?? 0;
    if (left > 0) {
      common++;
      counts.set(c, left - 1);
    }
  }

  return { exact, color: common - exact };
}

export function isSolved(feedback: Feedback, places: number): boolean {
  return feedback.exact === places && feedback.color === 0;
}

/**
 * Number of distinct feedback values a game with `places` pegs can produce.
 * Every (exact, color) with exact + color ≤ places is reachable except
 * (places - 1, 1): a single misplaced peg cannot be the only mismatch.
 */
export function feedbackCount(places: number): number {
  return ((places + 1) * (places + 2)) / 2 - 1;
}

/** Rejects feedback the scoring rules can never produce for `places` pegs. */
export function isValidFeedback(feedback: Feedback, places: number): boolean {
  const { exact, color } = feedback;
  return (
    Number.isInteger(exact) &&
    Number.isInteger(color) &&
    exact >= 0 &&
    color >= 0 &&
    exact + color <= places &&
    !(exact === places - 1 && color === 1)
  );
}

export function formatFeedback(feedback: Feedback): string {
  return `(${feedback.exact},${feedback.color})`;
}
