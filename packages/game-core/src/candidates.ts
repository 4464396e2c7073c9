// packages/game-core/src/candidates.ts
//
// The candidate set: codes still consistent with every guess/feedback pair.
//
// A CandidateSet is an immutable snapshot holding ascending universe indices.
// Filtering returns a new set, so a guess evaluation can never disturb the
// set another evaluation reads.

import type { Code, Feedback } from './scoring.js';
import type { Universe } from './universe.js';

export interface Turn {
  readonly guess: Code;
  readonly feedback: Feedback;
}

export class CandidateSet {
  private membership: Set<number> | undefined;
  private signatureCache: string | undefined;

  private constructor(
    readonly universe: Universe,
    readonly indices: readonly number[],
  ) {}

  /** The whole universe. */
  static initial(universe: Universe): CandidateSet {
    return new CandidateSet(
      universe,
      Array.from({ length: universe.size }, (_, i) => i),
    );
  }

  /** Wraps indices that are already ascending and unique. */
  static of(universe: Universe, indices: readonly number[]): CandidateSet {
    return new CandidateSet(universe, indices);
  }

  get size(): number {
    return this.indices.length;
  }

  get isEmpty(): boolean {
    return this.indices.length === 0;
  }

  codes(): Code[] {
    return this.indices.map((i) => this.universe.at(i));
  }

  hasIndex(index: number): boolean {
    this.membership ??= new Set(this.indices);
    return this.membership.has(index);
  }

  has(code: Code): boolean {
    const index = this.universe.indexOf(code);
    return index >= 0 && this.hasIndex(index);
  }

  /** Canonical key of the contents; equal sets share a signature. */
  get signature(): string {
    this.signatureCache ??= this.indices.join(',');
    return this.signatureCache;
  }

  /**
   * filter keeps the members `c` with score(guess, c) === feedback for every
   * turn. Guesses outside the universe match nothing.
   */
  filter(turns: readonly Turn[]): CandidateSet {
    let indices = this.indices;
    for (const { guess, feedback } of turns) {
      const g = this.universe.indexOf(guess);
      if (g < 0) return new CandidateSet(this.universe, []);
      const want = this.universe.encode(feedback);
      indices = indices.filter((c) => this.universe.feedbackId(g, c) === want);
    }
    return new CandidateSet(this.universe, indices);
  }

  /**
   * partition buckets the members by the feedback each would produce against
   * the guess at `guessIndex`. Buckets keep ascending order; the map is keyed
   * by encoded feedback (see Universe.encode).
   */
  partition(guessIndex: number): Map<number, number[]> {
    const buckets = new Map<number, number[]>();
    for (const c of this.indices) {
      const id = this.universe.feedbackId(guessIndex, c);
      const bucket = buckets.get(id);
      if (bucket) bucket.push(c);
      else buckets.set(id, [c]);
    }
    return buckets;
  }

  /** Size of each bucket of `partition`, indexed by encoded feedback. */
  bucketSizes(guessIndex: number): Uint32Array {
    const sizes = new Uint32Array(this.universe.feedbackIds);
    for (const c of this.indices) {
      sizes[this.universe.feedbackId(guessIndex, c)]++;
    }
    return sizes;
  }
}
