// packages/game-core/src/stats.ts
//
// Plays one game per secret and tallies how many guesses each took.
// A single solver is reused (reset between games) so its cache carries over
// from one secret to the next.

import type { Logger } from 'pino';

import type { GuessCache, SolveCache } from './cache.js';
import { playGame } from './game.js';
import { SecretOracle } from './oracle.js';
import type { Code } from './scoring.js';
import { createSolver, type SolverConfig } from './solver.js';

export interface DistributionOptions {
  /** Secrets to play; defaults to the whole universe. */
  readonly secrets?: Iterable<Code>;
  readonly maxGuesses?: number;
  readonly guessCache?: GuessCache;
  readonly solveCache?: SolveCache;
  readonly logger?: Logger;
}

export interface GuessDistribution {
  /** Number of won games per guess count, ascending by guess count. */
  readonly counts: ReadonlyMap<number, number>;
  readonly games: number;
  readonly lost: number;
  /** Guesses summed over won games. */
  readonly total: number;
  readonly average: number;
  readonly worst: number;
}

export function guessDistribution(
  config: SolverConfig,
  options: DistributionOptions = {},
): GuessDistribution {
  const { logger } = options;
  const solver = createSolver(config, {
    guessCache: options.guessCache,
    solveCache: options.solveCache,
  });

  const tally = new Map<number, number>();
  let games = 0;
  let lost = 0;
  let total = 0;

  for (const secret of options.secrets ?? solver.universe.codes) {
    const result = playGame(solver, new SecretOracle(secret), {
      maxGuesses: options.maxGuesses ?? solver.universe.size,
    });
    games++;
    if (result.state === 'lost') {
      lost++;
      continue;
    }
    const n = result.turns.length;
    tally.set(n, (tally.get(n) ?? 0) + 1);
    total += n;
  }

  const counts = new Map([...tally].sort(([a], [b]) => a - b));
  const won = games - lost;
  const distribution: GuessDistribution = {
    counts,
    games,
    lost,
    total,
    average: won > 0 ? total / won : 0,
    worst: Math.max(0, ...counts.keys()),
  };
  logger?.info(
    { games, lost, average: distribution.average, worst: distribution.worst },
    'distribution',
  );
  return distribution;
}
