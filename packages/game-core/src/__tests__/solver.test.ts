// packages/game-core/src/__tests__/solver.test.ts
//
// The solver session contract: one outstanding guess at a time, feedback
// validation, inconsistent histories and configuration errors.

import {
  InconsistentHistoryError,
  InvalidConfigurationError,
  InvalidFeedbackError,
  KnuthSolver,
  OutOfTurnError,
  codeKey,
  createSolver,
  isMastermindError,
  type SolverConfig,
} from '../index.js';

const knuth: SolverConfig = { places: 4, colors: 6, strategy: 'knuth' };

describe('createSolver', () => {
  it('builds the configured strategy', () => {
    expect(createSolver(knuth)).toBeInstanceOf(KnuthSolver);
  });

  it.each([
    { places: 0, colors: 6 },
    { places: 4, colors: 0 },
    { places: -2, colors: 6 },
    { places: 4, colors: 1.5 },
  ])('rejects places=$places colors=$colors', ({ places, colors }) => {
    expect(() => createSolver({ places, colors, strategy: 'knuth' })).toThrow(
      InvalidConfigurationError,
    );
  });

  it('rejects a non-positive depth ceiling', () => {
    expect(() =>
      createSolver({ places: 2, colors: 2, strategy: 'iddfs', maxDepth: 0 }),
    ).toThrow(InvalidConfigurationError);
  });

  it('freezes the configuration', () => {
    const solver = createSolver(knuth);
    expect(Object.isFrozen(solver.config)).toBe(true);
  });
});

describe('Solver turn order', () => {
  it('alternates guesses and feedback', () => {
    const solver = createSolver(knuth);
    expect(solver.phase).toBe('ready');

    const guess = solver.newGuess();
    expect(codeKey(guess)).toBe('1,1,2,2');
    expect(solver.phase).toBe('awaiting-feedback');
    expect(solver.outstanding).toEqual(guess);

    solver.feedback({ exact: 0, color: 0 });
    expect(solver.phase).toBe('ready');
    expect(solver.remaining).toBe(256);
    expect(solver.history).toEqual([
      { guess: [1, 1, 2, 2], feedback: { exact: 0, color: 0 } },
    ]);
  });

  it('refuses a second guess before feedback', () => {
    const solver = createSolver(knuth);
    solver.newGuess();
    expect(() => solver.newGuess()).toThrow(OutOfTurnError);
    expect(solver.history).toHaveLength(0);
  });

  it('refuses feedback without a pending guess', () => {
    const solver = createSolver(knuth);
    expect(() => solver.feedback({ exact: 0, color: 0 })).toThrow(
      InvalidFeedbackError,
    );
  });

  it.each([
    { exact: 3, color: 2 },
    { exact: -1, color: 0 },
    { exact: 0, color: 5 },
    { exact: 3, color: 1 },
  ])('rejects out-of-bounds feedback $exact/$color', (feedback) => {
    const solver = createSolver(knuth);
    solver.newGuess();
    expect(() => solver.feedback(feedback)).toThrow(InvalidFeedbackError);
    // The guess stays outstanding.
    expect(solver.phase).toBe('awaiting-feedback');
  });

  it('stops after the winning feedback until reset', () => {
    const solver = createSolver(knuth);
    solver.newGuess();
    solver.feedback({ exact: 4, color: 0 });
    expect(solver.phase).toBe('solved');
    expect(() => solver.newGuess()).toThrow(OutOfTurnError);

    solver.reset();
    expect(solver.phase).toBe('ready');
    expect(solver.remaining).toBe(1296);
    expect(solver.history).toHaveLength(0);
  });

  it('reports feedback that no secret satisfies', () => {
    const solver = createSolver({ places: 2, colors: 3, strategy: 'knuth' });
    expect(codeKey(solver.newGuess())).toBe('1,1');
    // In bounds, but no code scores (0,2) against 1,1.
    solver.feedback({ exact: 0, color: 2 });
    expect(solver.remaining).toBe(0);

    let caught: unknown;
    try {
      solver.newGuess();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InconsistentHistoryError);
    expect(isMastermindError(caught) && caught.code).toBe('INCONSISTENT_HISTORY');
  });
});
