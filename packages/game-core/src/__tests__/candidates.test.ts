// packages/game-core/src/__tests__/candidates.test.ts
//
// Unit tests for code enumeration, the universe and candidate sets.
//
// Helpers:
//   - keys: renders a candidate set as "1,1 1,2 …" for compact assertions.

import {
  CandidateSet,
  InvalidConfigurationError,
  Universe,
  allCodes,
  codeKey,
  parseCode,
  score,
} from '../index.js';

function keys(set: CandidateSet): string {
  return set.codes().map(codeKey).join(' ');
}

describe('allCodes', () => {
  it('enumerates codes with the leftmost peg most significant', () => {
    expect([...allCodes(2, 3)].map(codeKey)).toEqual([
      '1,1', '1,2', '1,3',
      '2,1', '2,2', '2,3',
      '3,1', '3,2', '3,3',
    ]);
  });

  it('restarts from the first code on every call', () => {
    const first = [...allCodes(3, 2)];
    const second = [...allCodes(3, 2)];
    expect(second).toEqual(first);
    expect(first).toHaveLength(8);
  });

  it('yields nothing for an empty configuration', () => {
    expect([...allCodes(0, 6)]).toEqual([]);
  });
});

describe('parseCode', () => {
  it('accepts the usual separators', () => {
    expect(parseCode('1,1,2,2')).toEqual([1, 1, 2, 2]);
    expect(parseCode('(3, 6, 3, 6)')).toEqual([3, 6, 3, 6]);
    expect(parseCode('1 2 3')).toEqual([1, 2, 3]);
  });

  it('rejects anything but positive integers', () => {
    expect(parseCode('')).toBeNull();
    expect(parseCode('1,a,2')).toBeNull();
    expect(parseCode('0,1')).toBeNull();
  });
});

describe('Universe', () => {
  const universe = new Universe({ places: 4, colors: 6 });

  it('holds colors^places codes', () => {
    expect(universe.size).toBe(1296);
    expect(universe.key).toBe('4x6');
  });

  it('maps codes to their enumeration index', () => {
    expect(universe.indexOf([1, 1, 1, 1])).toBe(0);
    expect(universe.indexOf([1, 1, 2, 2])).toBe(7);
    expect(universe.indexOf([6, 6, 6, 6])).toBe(1295);
    expect(universe.indexOf([7, 1, 1, 1])).toBe(-1);
    expect(universe.at(7)).toEqual([1, 1, 2, 2]);
  });

  it('scores by index the same way as score()', () => {
    const g = universe.indexOf([1, 2, 1, 1]);
    const s = universe.indexOf([1, 1, 2, 2]);
    expect(universe.decode(universe.feedbackId(g, s))).toEqual(
      score([1, 2, 1, 1], [1, 1, 2, 2]),
    );
    expect(universe.feedbackId(s, s)).toBe(universe.solvedId);
  });

  it('rejects non-positive configurations', () => {
    expect(() => new Universe({ places: 0, colors: 6 })).toThrow(
      InvalidConfigurationError,
    );
    expect(() => new Universe({ places: 4, colors: -1 })).toThrow(
      InvalidConfigurationError,
    );
    expect(() => new Universe({ places: 2.5, colors: 6 })).toThrow(
      InvalidConfigurationError,
    );
  });
});

describe('CandidateSet', () => {
  const universe = new Universe({ places: 2, colors: 3 });

  it('starts as the whole universe', () => {
    const set = CandidateSet.initial(universe);
    expect(set.size).toBe(9);
    expect(set.has([3, 3])).toBe(true);
  });

  it('keeps only codes consistent with every turn', () => {
    const set = CandidateSet.initial(universe).filter([
      { guess: [1, 2], feedback: { exact: 1, color: 0 } },
    ]);
    expect(keys(set)).toBe('1,1 1,3 2,2 3,2');

    const next = set.filter([{ guess: [1, 1], feedback: { exact: 0, color: 0 } }]);
    expect(keys(next)).toBe('2,2 3,2');
  });

  it('empties when the feedback has no satisfying code', () => {
    const set = CandidateSet.initial(universe).filter([
      { guess: [1, 1], feedback: { exact: 2, color: 0 } },
      { guess: [2, 2], feedback: { exact: 1, color: 0 } },
    ]);
    expect(set.isEmpty).toBe(true);
  });

  it('partitions members by the feedback they would produce', () => {
    const set = CandidateSet.initial(universe);
    const buckets = set.partition(universe.indexOf([1, 1]));
    const render = new Map(
      [...buckets].map(([id, bucket]) => {
        const f = universe.decode(id);
        return [
          `${f.exact}/${f.color}`,
          bucket.map((i) => codeKey(universe.at(i))).join(' '),
        ];
      }),
    );
    expect(render).toEqual(
      new Map([
        ['2/0', '1,1'],
        ['1/0', '1,2 1,3 2,1 3,1'],
        ['0/0', '2,2 2,3 3,2 3,3'],
      ]),
    );
  });

  it('shares a signature between equal sets', () => {
    const a = CandidateSet.initial(universe).filter([
      { guess: [1, 1], feedback: { exact: 0, color: 0 } },
    ]);
    const b = CandidateSet.initial(universe).filter([
      { guess: [1, 2], feedback: { exact: 0, color: 0 } },
      { guess: [3, 3], feedback: { exact: 2, color: 0 } },
    ]);
    expect(a.signature).toBe('4,5,7,8');
    expect(b.signature).toBe('8');
  });

  it('keeps the secret when a color repeats more than 255 times', () => {
    const long = new Universe({ places: 300, colors: 1 });
    const secret = long.at(0);
    const set = CandidateSet.initial(long).filter([
      { guess: secret, feedback: score(secret, secret) },
    ]);
    expect(set.size).toBe(1);
    expect(long.feedbackId(0, 0)).toBe(long.solvedId);
  });
});
