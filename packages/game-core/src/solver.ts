// packages/game-core/src/solver.ts
//
// Solver sessions: the stateful newGuess → feedback → newGuess … contract the
// game driver and the server talk to.
//
// A solver is bound to one configuration for its lifetime. Exactly one guess
// may be outstanding at a time; feedback filters the candidate set right
// away, while the choice of the next guess is deferred to newGuess().
//
// Strategies:
//   • KnuthSolver → one-ply minimax over the guess pool (knuth.ts)
//   • IddfsSolver → minimum-depth winning guess by iterative deepening (iddfs.ts)

import type { Logger } from 'pino';

import { GuessCache, SolveCache } from './cache.js';
import { CandidateSet, type Turn } from './candidates.js';
import { formatCode } from './codes.js';
import {
  InconsistentHistoryError,
  InvalidConfigurationError,
  InvalidFeedbackError,
  OutOfTurnError,
} from './errors.js';
import { searchMinimumDepth } from './iddfs.js';
import { knuthGuess, type GuessPool } from './knuth.js';
import {
  formatFeedback,
  isSolved,
  isValidFeedback,
  type Code,
  type Feedback,
} from './scoring.js';
import { Universe, validateGameConfig, type GameConfig } from './universe.js';

export type Strategy = 'knuth' | 'iddfs';

export interface SolverConfig extends GameConfig {
  readonly strategy: Strategy;
  /** Codes a guess is drawn from; defaults to the whole universe. */
  readonly guessPool?: GuessPool;
  /** Knuth only: prefer candidates among equally scored guesses (default true). */
  readonly preferCandidates?: boolean;
  /** IDDFS only: deepest bound searched (default: universe size). */
  readonly maxDepth?: number;
}

export interface SolverOptions {
  readonly logger?: Logger;
  readonly guessCache?: GuessCache;
  readonly solveCache?: SolveCache;
}

export type SolverPhase = 'ready' | 'awaiting-feedback' | 'solved';

export abstract class Solver {
  readonly universe: Universe;
  protected readonly log: Logger | undefined;

  private current: CandidateSet;
  private turns: Turn[] = [];
  private pending: Code | null = null;
  private done = false;

  constructor(
    readonly config: SolverConfig,
    options: SolverOptions = {},
  ) {
    this.universe = new Universe(config);
    this.current = CandidateSet.initial(this.universe);
    this.log = options.logger;
  }

  get phase(): SolverPhase {
    if (this.done) return 'solved';
    return this.pending ? 'awaiting-feedback' : 'ready';
  }

  get history(): readonly Turn[] {
    return this.turns;
  }

  get candidates(): CandidateSet {
    return this.current;
  }

  get remaining(): number {
    return this.current.size;
  }

  /** The guess awaiting feedback, if any. */
  get outstanding(): Code | null {
    return this.pending;
  }

  newGuess(): Code {
    if (this.pending) {
      throw new OutOfTurnError(
        `Guess ${formatCode(this.pending)} is still awaiting feedback`,
      );
    }
    if (this.done) throw new OutOfTurnError('The code has already been solved');
    if (this.current.isEmpty) {
      throw new InconsistentHistoryError(
        'No code is consistent with the feedback given so far',
      );
    }

    const guess = this.universe.at(this.chooseGuess(this.current));
    this.pending = guess;
    this.log?.debug(
      { guess: formatCode(guess), remaining: this.current.size },
      'new guess',
    );
    return guess;
  }

  feedback(feedback: Feedback): void {
    const guess = this.pending;
    if (!guess) {
      throw new InvalidFeedbackError('No guess is awaiting feedback');
    }
    if (!isValidFeedback(feedback, this.universe.places)) {
      throw new InvalidFeedbackError(
        `Feedback ${formatFeedback(feedback)} is impossible with ${this.universe.places} places`,
      );
    }

    const turn: Turn = {
      guess,
      feedback: { exact: feedback.exact, color: feedback.color },
    };
    this.turns.push(turn);
    this.pending = null;
    this.current = this.current.filter([turn]);
    this.done = isSolved(feedback, this.universe.places);
    this.log?.debug(
      { feedback: formatFeedback(feedback), remaining: this.current.size },
      'updated candidates',
    );
  }

  /** Starts a new game with the same configuration. */
  reset(): void {
    this.current = CandidateSet.initial(this.universe);
    this.turns = [];
    this.pending = null;
    this.done = false;
  }

  /** Universe index of the next guess for a non-empty candidate set. */
  protected abstract chooseGuess(candidates: CandidateSet): number;
}

export class KnuthSolver extends Solver {
  private readonly cache: GuessCache;

  constructor(config: SolverConfig, options: SolverOptions = {}) {
    super(config, options);
    this.cache = options.guessCache ?? new GuessCache();
  }

  protected chooseGuess(candidates: CandidateSet): number {
    const guessPool = this.config.guessPool ?? 'universe';
    const preferCandidates = this.config.preferCandidates ?? true;
    const key = `${this.universe.key}|${guessPool}|${preferCandidates}|${candidates.signature}`;
    return this.cache.resolve(
      key,
      () => knuthGuess(candidates, { guessPool, preferCandidates }).index,
    );
  }
}

export class IddfsSolver extends Solver {
  private readonly cache: SolveCache;
  private planned: number | null = null;
  private found: number | null = null;

  constructor(config: SolverConfig, options: SolverOptions = {}) {
    super(config, options);
    this.cache = options.solveCache ?? new SolveCache();
  }

  /** Guesses the last search needed in the worst case, this guess included. */
  get depth(): number | null {
    return this.found;
  }

  /** Worst-case game length promised by the search for the first move. */
  get plannedDepth(): number | null {
    return this.planned;
  }

  override reset(): void {
    super.reset();
    this.planned = null;
    this.found = null;
  }

  protected chooseGuess(candidates: CandidateSet): number {
    const { index, depth } = searchMinimumDepth(candidates, {
      cache: this.cache,
      guessPool: this.config.guessPool ?? 'universe',
      maxDepth: this.config.maxDepth,
    });
    this.found = depth;
    if (this.planned === null) this.planned = depth;

    const budget = this.planned - this.history.length;
    if (depth > budget) {
      this.log?.warn({ depth, budget }, 'search deeper than planned');
    }
    return index;
  }
}

export function validateSolverConfig(config: SolverConfig): void {
  validateGameConfig(config);
  if (config.strategy !== 'knuth' && config.strategy !== 'iddfs') {
    throw new InvalidConfigurationError(
      `Unknown strategy: ${String(config.strategy)}`,
    );
  }
  if (
    config.guessPool !== undefined &&
    config.guessPool !== 'universe' &&
    config.guessPool !== 'candidates'
  ) {
    throw new InvalidConfigurationError(
      `Unknown guess pool: ${String(config.guessPool)}`,
    );
  }
  if (
    config.maxDepth !== undefined &&
    (!Number.isInteger(config.maxDepth) || config.maxDepth < 1)
  ) {
    throw new InvalidConfigurationError(
      `maxDepth must be a positive integer, got ${config.maxDepth}`,
    );
  }
}

/** Builds the solver for the configured strategy. */
export function createSolver(
  config: SolverConfig,
  options: SolverOptions = {},
): Solver {
  validateSolverConfig(config);
  const frozen: SolverConfig = Object.freeze({ ...config });
  return frozen.strategy === 'knuth'
    ? new KnuthSolver(frozen, options)
    : new IddfsSolver(frozen, options);
}
