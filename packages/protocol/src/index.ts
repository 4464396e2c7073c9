// packages/protocol/src/index.ts
//
// Shared protocol definitions for the solver service and its clients.
// Every body is a zod schema; the exported types are inferred from them.
//
// Defines:
//   - Strategy / GuessPool: how a solver picks guesses.
//   - Code and Feedback shapes.
//   - Request/response shapes for solver sessions and automated games.
//
// The server validates every request body with these schemas and parses its
// responses through them before sending.

import { z } from 'zod';

/**
 * Strategy schema:
 *  - "knuth" → one-ply worst-case minimax
 *  - "iddfs" → iterative-deepening search for a guaranteed win
 */
export const strategySchema = z.enum(['knuth', 'iddfs']);
export type Strategy = z.infer<typeof strategySchema>;

export const guessPoolSchema = z.enum(['universe', 'candidates']);
export type GuessPool = z.infer<typeof guessPoolSchema>;

export const codeSchema = z.array(z.number().int().min(1)).min(1);

export const feedbackSchema = z.object({
  exact: z.number().int().min(0),
  color: z.number().int().min(0),
});

export const turnSchema = z.object({
  guess: codeSchema,
  feedback: feedbackSchema,
});

/**
 * Solver configuration, fixed for the life of a session.
 *  - places / colors: board shape (colors are numbered 1..colors)
 *  - strategy:        defaults to "knuth"
 *  - guessPool:       codes a guess may be drawn from, defaults to "universe"
 *  - preferCandidates: Knuth tie-break, defaults to true
 *  - maxDepth:        IDDFS depth ceiling
 */
export const solverConfigSchema = z.object({
  places: z.number().int().min(1).max(8),
  colors: z.number().int().min(1).max(12),
  strategy: strategySchema.default('knuth'),
  guessPool: guessPoolSchema.default('universe'),
  preferCandidates: z.boolean().default(true),
  maxDepth: z.number().int().min(1).optional(),
});
export type SolverConfigBody = z.infer<typeof solverConfigSchema>;

/* -------------------------------------------------------------------------- */
/*                            /api/sessions endpoints                         */
/* -------------------------------------------------------------------------- */

/**
 * Request to open a solver session.
 *  - maxGuesses: guesses allowed before the session is lost (1–100)
 */
export const newSessionReq = solverConfigSchema.extend({
  maxGuesses: z.number().int().min(1).max(100).optional(),
});

export const newSessionRes = z.object({
  sessionId: z.string(),
  config: solverConfigSchema,
  maxGuesses: z.number().int(),
});

export const sessionStateSchema = z.enum(['playing', 'won', 'lost']);
export type SessionState = z.infer<typeof sessionStateSchema>;

/** Response to POST /api/sessions/:id/guess. */
export const guessRes = z.object({
  guess: codeSchema,
  round: z.number().int().min(1),
});

/** Request to POST /api/sessions/:id/feedback. */
export const feedbackReq = feedbackSchema;

/**
 * Response to POST /api/sessions/:id/feedback:
 *  - round:     rounds played so far
 *  - state:     "playing" | "won" | "lost"
 *  - remaining: codes still consistent with the history
 */
export const feedbackRes = z.object({
  round: z.number().int().min(1),
  state: sessionStateSchema,
  remaining: z.number().int().min(0),
});

/** Response to GET /api/sessions/:id. */
export const sessionRes = z.object({
  sessionId: z.string(),
  config: solverConfigSchema,
  maxGuesses: z.number().int(),
  state: sessionStateSchema,
  pending: codeSchema.nullable(),
  remaining: z.number().int().min(0),
  history: z.array(turnSchema),
});

/* -------------------------------------------------------------------------- */
/*                               /api/play endpoint                           */
/* -------------------------------------------------------------------------- */

/**
 * Request for an automated game.
 *  - mode:   "normal" plays against a fixed secret, "adversarial" against a
 *            code maker that keeps every consistent code open
 *  - secret: explicit secret (normal mode); otherwise picked at random, or
 *            deterministically from `seed`
 */
export const playModeSchema = z.enum(['normal', 'adversarial']);

export const playReq = solverConfigSchema.extend({
  mode: playModeSchema.default('normal'),
  secret: codeSchema.optional(),
  seed: z.string().optional(),
  maxGuesses: z.number().int().min(1).max(100).optional(),
});

export const playRes = z.object({
  state: z.enum(['won', 'lost']),
  secret: codeSchema.nullable(),
  turns: z.array(turnSchema),
});
