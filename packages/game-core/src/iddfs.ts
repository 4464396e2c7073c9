// packages/game-core/src/iddfs.ts
//
// Iterative-deepening depth-first search for a guess that wins within a
// depth bound whatever feedback the oracle gives.
//
// solves(S, d) answers: is there a guess such that every feedback bucket
// other than the winning one can itself be solved in d - 1 guesses? The
// first such guess in pool order is the answer, so results are reproducible
// and a cache hit is identical to recomputation.
//
// Pruning, none of which changes the answer:
//   • capacity: d guesses can tell apart at most capacity(d) codes, where
//     capacity(1) = 1 and capacity(d) = 1 + (F - 1) * capacity(d - 1) for F
//     distinct feedback values;
//   • a guess with a bucket larger than capacity(d - 1) is skipped unseen;
//   • a guess that leaves all candidates in one bucket is skipped;
//   • checking a guess stops at its first unsolvable bucket.

import type { SolveCache } from './cache.js';
import { CandidateSet } from './candidates.js';
import { InconsistentHistoryError, SearchExhaustedError } from './errors.js';
import { poolIndices, type GuessPool } from './knuth.js';
import { feedbackCount } from './scoring.js';

export interface SearchContext {
  readonly cache: SolveCache;
  readonly guessPool: GuessPool;
  /** Deepest bound tried before giving up; defaults to the universe size. */
  readonly maxDepth?: number;
}

export interface SearchResult {
  /** Universe index of the winning guess. */
  readonly index: number;
  /** Minimum number of guesses, this one included, that always wins. */
  readonly depth: number;
}

export function capacity(depth: number, places: number): number {
  const branches = feedbackCount(places) - 1;
  let cap = 0;
  for (let d = 1; d <= depth; d++) cap = 1 + branches * cap;
  return cap;
}

/**
 * Universe index of the first guess that wins within `depth` guesses for
 * every consistent secret, or null when none does.
 */
export function solves(
  candidates: CandidateSet,
  depth: number,
  ctx: SearchContext,
): number | null {
  const n = candidates.size;
  if (n === 0) return null;
  if (n === 1) return depth >= 1 ? candidates.indices[0] : null;
  if (depth <= 1) return null;

  const { universe } = candidates;
  if (n > capacity(depth, universe.places)) return null;

  const key = `${universe.key}|${ctx.guessPool}|${depth}|${candidates.signature}`;
  return ctx.cache.resolve(key, () => firstWinningGuess(candidates, depth, ctx));
}

function firstWinningGuess(
  candidates: CandidateSet,
  depth: number,
  ctx: SearchContext,
): number | null {
  const { universe } = candidates;
  const limit = capacity(depth - 1, universe.places);

  for (const g of poolIndices(candidates, ctx.guessPool)) {
    const buckets = candidates.partition(g);
    if (buckets.size === 1 && !buckets.has(universe.solvedId)) continue;

    const open = [...buckets.entries()]
      .filter(([id]) => id !== universe.solvedId)
      .sort(([a], [b]) => a - b)
      .map(([, bucket]) => bucket);
    if (open.some((bucket) => bucket.length > limit)) continue;

    const wins = open.every(
      (bucket) =>
        solves(CandidateSet.of(universe, bucket), depth - 1, ctx) !== null,
    );
    if (wins) return g;
  }
  return null;
}

/**
 * searchMinimumDepth raises the depth bound from 1 until a winning guess
 * exists for the candidate set.
 */
export function searchMinimumDepth(
  candidates: CandidateSet,
  ctx: SearchContext,
): SearchResult {
  if (candidates.isEmpty) {
    throw new InconsistentHistoryError(
      'No code is consistent with the feedback given so far',
    );
  }
  const ceiling = ctx.maxDepth ?? candidates.universe.size;
  for (let depth = 1; depth <= ceiling; depth++) {
    const index = solves(candidates, depth, ctx);
    if (index !== null) return { index, depth };
  }
  throw new SearchExhaustedError(
    `No guess wins within ${ceiling} guesses for ${candidates.size} candidates`,
  );
}
