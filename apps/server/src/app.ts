// apps/server/src/app.ts
//
// Express application for the solver service.
//
// Responsibilities:
//   • Host solver sessions: the client holds the secret, asks the solver for
//     guesses and reports feedback (the solver's newGuess/feedback contract
//     over HTTP). The session enforces the guess limit.
//   • Play automated games against a secret or an adversarial code maker.
//
// createApp() does not listen; src/index.ts boots it and the tests mount it
// on an ephemeral port.

import cors from 'cors';
import express, { type Request } from 'express';
import type { Logger } from 'pino';

import {
  AdversarialOracle,
  SecretOracle,
  assertCode,
  pickSecret,
  playGame,
  universeSize,
  type Code,
  type Oracle,
} from '@mastermind/game-core';
import {
  feedbackReq,
  feedbackRes,
  guessRes,
  newSessionReq,
  newSessionRes,
  playReq,
  playRes,
  sessionRes,
  type SolverConfigBody,
} from '@mastermind/protocol';

import type { ServerConfig } from './config.js';
import { HttpError, errorHandler } from './errors.js';
import { SessionStore, type Session } from './sessions.js';

export interface AppDeps {
  readonly config: ServerConfig;
  readonly log: Logger;
  readonly store?: SessionStore;
}

export function createApp({ config, log, store: given }: AppDeps) {
  const store = given ?? new SessionStore(config.maxSessions, log, config.maxCacheEntries);
  const app = express();
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json());

  /* ------------------------------------------------------------------------ */
  /*                                 Helpers                                  */
  /* ------------------------------------------------------------------------ */

  // Exhaustive strategies are exponential; keep them to small boards.
  function checkSize(body: SolverConfigBody): void {
    const size = universeSize(body);
    if (size > config.maxUniverse) {
      throw new HttpError(400, `Too many codes: ${size} > ${config.maxUniverse}`);
    }
    if (body.strategy === 'iddfs' && size > config.maxSearchUniverse) {
      throw new HttpError(
        400,
        `Too many codes for iddfs: ${size} > ${config.maxSearchUniverse}`,
      );
    }
  }

  function sessionOf(req: Request<{ id: string }>): Session {
    const session = store.get(req.params.id);
    if (!session) throw new HttpError(404, 'Session not found');
    return session;
  }

  /* ------------------------------------------------------------------------ */
  /*                                  Routes                                  */
  /* ------------------------------------------------------------------------ */

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true, sessions: store.size });
  });

  app.post('/api/sessions', (req, res) => {
    const parsed = newSessionReq.safeParse(req.body);
    if (!parsed.success) {
      throw new HttpError(400, 'Invalid request', parsed.error.format());
    }
    const { maxGuesses = config.defaultMaxGuesses, ...body } = parsed.data;
    checkSize(body);

    const session = store.create(body, maxGuesses);
    log.info({ sessionId: session.id, config: body }, 'session created');
    res
      .status(201)
      .json(newSessionRes.parse({ sessionId: session.id, config: body, maxGuesses }));
  });

  app.get('/api/sessions/:id', (req, res) => {
    const session = sessionOf(req);
    const { solver } = session;
    res.json(
      sessionRes.parse({
        sessionId: session.id,
        config: session.config,
        maxGuesses: session.maxGuesses,
        state: session.state,
        pending: solver.outstanding,
        remaining: solver.remaining,
        history: solver.history,
      }),
    );
  });

  app.delete('/api/sessions/:id', (req, res) => {
    if (!store.delete(req.params.id)) throw new HttpError(404, 'Session not found');
    res.status(204).end();
  });

  app.post('/api/sessions/:id/guess', (req, res) => {
    const session = sessionOf(req);
    if (session.state !== 'playing') throw new HttpError(409, 'Session finished');

    const guess = session.solver.newGuess();
    const round = session.solver.history.length + 1;
    res.json(guessRes.parse({ guess, round }));
  });

  app.post('/api/sessions/:id/feedback', (req, res) => {
    const session = sessionOf(req);
    if (session.state !== 'playing') throw new HttpError(409, 'Session finished');
    const parsed = feedbackReq.safeParse(req.body);
    if (!parsed.success) {
      throw new HttpError(400, 'Invalid request', parsed.error.format());
    }

    const { solver } = session;
    solver.feedback(parsed.data);
    const round = solver.history.length;
    if (solver.phase === 'solved') session.state = 'won';
    else if (round >= session.maxGuesses) session.state = 'lost';
    if (session.state !== 'playing') {
      log.info({ sessionId: session.id, round, state: session.state }, 'session over');
    }

    res.json(
      feedbackRes.parse({ round, state: session.state, remaining: solver.remaining }),
    );
  });

  app.post('/api/play', (req, res) => {
    const parsed = playReq.safeParse(req.body);
    if (!parsed.success) {
      throw new HttpError(400, 'Invalid request', parsed.error.format());
    }
    const {
      mode,
      secret: given,
      seed,
      maxGuesses = config.defaultMaxGuesses,
      ...body
    } = parsed.data;
    checkSize(body);

    const gameLog = log.child({ game: mode });
    const solver = store.solverFor(body, gameLog);
    const { universe } = solver;

    let oracle: Oracle;
    let reveal: () => Code | null;
    if (mode === 'adversarial') {
      const adversary = new AdversarialOracle(universe);
      oracle = adversary;
      reveal = () => adversary.secret;
    } else {
      if (given) assertCode(universe, given);
      const secret = given ?? pickSecret(universe, seed);
      oracle = new SecretOracle(secret);
      reveal = () => secret;
    }

    const result = playGame(solver, oracle, { maxGuesses, logger: gameLog });
    res.json(
      playRes.parse({ state: result.state, secret: reveal(), turns: result.turns }),
    );
  });

  app.use(errorHandler(log));
  return app;
}
