// packages/game-core/src/knuth.ts
//
// Knuth's worst-case (one-ply minimax) guess selection.
//
// For each guess in the pool, the candidates are bucketed by the feedback
// they would produce. The largest bucket is what an adversary would leave
// us with, so the guess's score is the number of candidates it is
// guaranteed to eliminate: |S| - largest bucket.
//
// The pool defaults to the whole universe: a guess known to be wrong can
// still split the candidates better than any candidate does.

import type { CandidateSet } from './candidates.js';
import { InconsistentHistoryError } from './errors.js';

export type GuessPool = 'universe' | 'candidates';

export interface GuessRating {
  /** Universe index of the guess. */
  readonly index: number;
  /** Guaranteed eliminations: |S| - worstCase. */
  readonly score: number;
  /** Size of the largest feedback bucket. */
  readonly worstCase: number;
  /** Whether the guess could itself be the secret. */
  readonly candidate: boolean;
}

export interface KnuthOptions {
  readonly guessPool?: GuessPool;
  /** Break score ties in favour of guesses that may win outright. */
  readonly preferCandidates?: boolean;
}

/** Pool indices in enumeration order. */
export function poolIndices(
  candidates: CandidateSet,
  pool: GuessPool,
): readonly number[] {
  if (pool === 'candidates') return candidates.indices;
  return Array.from({ length: candidates.universe.size }, (_, i) => i);
}

export function worstCase(candidates: CandidateSet, guessIndex: number): number {
  let worst = 0;
  for (const n of candidates.bucketSizes(guessIndex)) {
    if (n > worst) worst = n;
  }
  return worst;
}

export function rateGuess(
  candidates: CandidateSet,
  guessIndex: number,
): GuessRating {
  const worst = worstCase(candidates, guessIndex);
  return {
    index: guessIndex,
    score: candidates.size - worst,
    worstCase: worst,
    candidate: candidates.hasIndex(guessIndex),
  };
}

/**
 * Orders two ratings, best first (negative when `a` is better):
 *   1. higher score;
 *   2. with preferCandidates, a guess in the candidate set;
 *   3. lower universe index.
 */
export function compareRatings(
  a: GuessRating,
  b: GuessRating,
  preferCandidates: boolean,
): number {
  if (a.score !== b.score) return b.score - a.score;
  if (preferCandidates && a.candidate !== b.candidate) {
    return a.candidate ? -1 : 1;
  }
  return a.index - b.index;
}

/**
 * knuthGuess picks the best guess for the candidate set.
 * A single remaining candidate is returned as is.
 */
export function knuthGuess(
  candidates: CandidateSet,
  options: KnuthOptions = {},
): GuessRating {
  const { guessPool = 'universe', preferCandidates = true } = options;

  if (candidates.isEmpty) {
    throw new InconsistentHistoryError(
      'No code is consistent with the feedback given so far',
    );
  }
  if (candidates.size === 1) return rateGuess(candidates, candidates.indices[0]);

  let best: GuessRating | null = null;
  for (const g of poolIndices(candidates, guessPool)) {
    const rating = rateGuess(candidates, g);
    if (!best || compareRatings(rating, best, preferCandidates) < 0) {
      best = rating;
    }
  }
  if (!best) {
    throw new InconsistentHistoryError('The guess pool is empty');
  }
  return best;
}
