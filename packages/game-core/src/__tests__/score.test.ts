// packages/game-core/src/__tests__/score.test.ts
//
// Unit tests for score(), the Mastermind scoring function.
//
// Covered cases:
//   • Identical codes → all exact
//   • Disjoint colors → nothing
//   • Permutations → all color
//   • Repeated colors → multiset intersection, no over-crediting repeats
//   • Length mismatch → configuration error

import {
  InvalidConfigurationError,
  feedbackCount,
  isSolved,
  isValidFeedback,
  score,
} from '../index.js';

describe('score', () => {
  it('counts every peg as exact for identical codes', () => {
    expect(score([1, 2, 3, 4], [1, 2, 3, 4])).toEqual({ exact: 4, color: 0 });
  });

  it('returns nothing for codes without shared colors', () => {
    expect(score([5, 6, 5, 6], [1, 2, 3, 4])).toEqual({ exact: 0, color: 0 });
  });

  it('counts misplaced colors', () => {
    expect(score([4, 3, 2, 1], [1, 2, 3, 4])).toEqual({ exact: 0, color: 4 });
    expect(score([1, 2, 4, 6], [1, 2, 3, 4])).toEqual({ exact: 2, color: 1 });
  });

  it('does not credit a repeated guess color beyond the secret', () => {
    // Secret has two 1s; the guess's four 1s only match two of them.
    expect(score([1, 1, 1, 1], [1, 1, 2, 2])).toEqual({ exact: 2, color: 0 });
  });

  it('handles repeats on both sides', () => {
    // Exact: pos 0. Remaining secret [1, 2, 2], guess [2, 1, 1]:
    // one 1 and one 2 are misplaced.
    expect(score([1, 2, 1, 1], [1, 1, 2, 2])).toEqual({ exact: 1, color: 2 });
    expect(score([1, 1, 2, 2], [1, 2, 1, 1])).toEqual({ exact: 1, color: 2 });
  });

  it('matches the opening of the documented game', () => {
    expect(score([1, 1, 2, 2], [3, 3, 3, 6])).toEqual({ exact: 0, color: 0 });
    expect(score([3, 3, 4, 5], [3, 3, 3, 6])).toEqual({ exact: 2, color: 0 });
    expect(score([3, 6, 3, 6], [3, 3, 3, 6])).toEqual({ exact: 3, color: 0 });
  });

  it('rejects codes of different lengths', () => {
    expect(() => score([1, 2, 3], [1, 2, 3, 4])).toThrow(
      InvalidConfigurationError,
    );
  });
});

describe('feedback helpers', () => {
  it('recognises the terminal feedback', () => {
    expect(isSolved({ exact: 4, color: 0 }, 4)).toBe(true);
    expect(isSolved({ exact: 3, color: 0 }, 4)).toBe(false);
  });

  it('counts the distinct feedback values', () => {
    expect(feedbackCount(1)).toBe(2);
    expect(feedbackCount(4)).toBe(14);
  });

  it('validates feedback bounds', () => {
    expect(isValidFeedback({ exact: 2, color: 2 }, 4)).toBe(true);
    expect(isValidFeedback({ exact: 3, color: 2 }, 4)).toBe(false);
    expect(isValidFeedback({ exact: -1, color: 0 }, 4)).toBe(false);
    expect(isValidFeedback({ exact: 1.5, color: 0 }, 4)).toBe(false);
    expect(isValidFeedback({ exact: 3, color: 1 }, 4)).toBe(false);
  });
});
