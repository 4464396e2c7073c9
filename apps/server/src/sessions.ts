// apps/server/src/sessions.ts
//
// In-memory solver sessions. Nothing is persisted: restarting the server
// drops every session. The store is bounded; when full, the oldest session
// is evicted to make room.
//
// All sessions share one Knuth cache and one IDDFS cache. Cache keys carry
// the configuration, so sessions of different shapes never see each other's
// entries, while sessions of the same shape reuse the expensive openings.
// Both caches are bounded by `cacheLimit` entries.

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';

import {
  GuessCache,
  SolveCache,
  createSolver,
  type Solver,
  type SolverConfig,
} from '@mastermind/game-core';
import type { SessionState, SolverConfigBody } from '@mastermind/protocol';

export interface Session {
  readonly id: string;
  readonly config: SolverConfigBody;
  readonly maxGuesses: number;
  readonly solver: Solver;
  state: SessionState;
}

export function toSolverConfig(body: SolverConfigBody): SolverConfig {
  return {
    places: body.places,
    colors: body.colors,
    strategy: body.strategy,
    guessPool: body.guessPool,
    preferCandidates: body.preferCandidates,
    maxDepth: body.maxDepth,
  };
}

export class SessionStore {
  readonly guessCache: GuessCache;
  readonly solveCache: SolveCache;
  private readonly sessions = new Map<string, Session>();

  constructor(
    private readonly limit: number,
    private readonly log: Logger,
    cacheLimit = 5000,
  ) {
    this.guessCache = new GuessCache(cacheLimit);
    this.solveCache = new SolveCache(cacheLimit);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Builds a solver sharing the store's caches. */
  solverFor(config: SolverConfigBody, logger: Logger = this.log): Solver {
    return createSolver(toSolverConfig(config), {
      logger,
      guessCache: this.guessCache,
      solveCache: this.solveCache,
    });
  }

  create(config: SolverConfigBody, maxGuesses: number): Session {
    const id = nanoid();
    const solver = this.solverFor(config, this.log.child({ sessionId: id }));

    if (this.sessions.size >= this.limit) {
      const oldest = this.sessions.keys().next();
      if (!oldest.done) {
        this.sessions.delete(oldest.value);
        this.log.info({ sessionId: oldest.value }, 'session evicted');
      }
    }

    const session: Session = { id, config, maxGuesses, solver, state: 'playing' };
    this.sessions.set(id, session);
    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }
}
