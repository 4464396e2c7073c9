// apps/server/src/errors.ts
//
// HTTP error translation. Route handlers throw; one error middleware turns
// the error into a status code and a JSON body.

import type { ErrorRequestHandler } from 'express';
import type { Logger } from 'pino';

import { isMastermindError, type MastermindErrorCode } from '@mastermind/game-core';

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

const STATUS_BY_CODE: Record<MastermindErrorCode, number> = {
  INVALID_CONFIGURATION: 400,
  INVALID_FEEDBACK: 400,
  OUT_OF_TURN: 409,
  INCONSISTENT_HISTORY: 422,
  SEARCH_EXHAUSTED: 500,
};

export function statusFor(code: MastermindErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function errorHandler(log: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (err instanceof HttpError) {
      res.status(err.status).json({ error: err.message, details: err.details });
      return;
    }
    // express.json() reports unparsable bodies as SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    if (isMastermindError(err)) {
      const status = statusFor(err.code);
      if (status >= 500) log.error({ err, path: req.path }, err.message);
      res.status(status).json({ error: err.message, code: err.code });
      return;
    }
    log.error({ err, path: req.path }, 'unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  };
}
