// packages/game-core/src/adversary.ts
//
// Adversarial oracle: a code maker that never commits to a secret.
//
// Instead of choosing one secret up front, the oracle keeps the set of codes
// consistent with everything it has answered. When a guess arrives it
// buckets those codes by the feedback they *would* produce and answers with
// the bucket that is worst for the code breaker (most codes left, then
// fewest exact, then fewest color matches). Every answer is a legal score for
// some remaining code, so the oracle never breaks the scoring rules; it only
// delays the end of the game as long as possible.
//
// Exports:
//   • nextAdversarialBucket: picks the bucket for one guess.
//   • AdversarialOracle:     stateful oracle built on it.

import { CandidateSet } from './candidates.js';
import { InvalidConfigurationError } from './errors.js';
import type { Oracle } from './oracle.js';
import type { Code, Feedback } from './scoring.js';
import type { Universe } from './universe.js';

export interface AdversarialAnswer {
  /** Codes consistent with the answer (the chosen bucket). */
  readonly next: CandidateSet;
  readonly feedback: Feedback;
}

/**
 * nextAdversarialBucket selects the most code-maker-friendly partition.
 *
 * Example (2 places, 3 colors, all codes still open):
 *   guess [1, 1] → (1,0) and (0,0) both keep 4 codes; (0,0) has fewer
 *   exact matches, so the answer is (0,0) with next = 2,2 · 2,3 · 3,2 · 3,3
 */
export function nextAdversarialBucket(
  candidates: CandidateSet,
  guessIndex: number,
): AdversarialAnswer {
  const { universe } = candidates;
  let best: { id: number; bucket: number[]; feedback: Feedback } | null = null;

  for (const [id, bucket] of candidates.partition(guessIndex)) {
    const feedback = universe.decode(id);
    if (
      !best ||
      bucket.length > best.bucket.length ||
      (bucket.length === best.bucket.length &&
        (feedback.exact < best.feedback.exact ||
          (feedback.exact === best.feedback.exact &&
            feedback.color < best.feedback.color)))
    ) {
      best = { id, bucket, feedback };
    }
  }

  if (!best) {
    throw new InvalidConfigurationError('The adversary has no codes left');
  }
  return { next: CandidateSet.of(universe, best.bucket), feedback: best.feedback };
}

export class AdversarialOracle implements Oracle {
  private candidates: CandidateSet;

  constructor(private readonly universe: Universe) {
    this.candidates = CandidateSet.initial(universe);
  }

  /** Codes the oracle could still claim as its secret. */
  get remaining(): number {
    return this.candidates.size;
  }

  /** The secret, once only one code is left. */
  get secret(): Code | null {
    return this.candidates.size === 1 ? this.candidates.codes()[0] : null;
  }

  respond(guess: Code): Feedback {
    const g = this.universe.indexOf(guess);
    if (g < 0) {
      throw new InvalidConfigurationError(
        `Guess (${guess.join(',')}) is not a ${this.universe.key} code`,
      );
    }
    const { next, feedback } = nextAdversarialBucket(this.candidates, g);
    this.candidates = next;
    return feedback;
  }
}
