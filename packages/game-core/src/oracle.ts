// packages/game-core/src/oracle.ts
//
// Oracles answer guesses with feedback. The solver never sees the secret;
// the driver asks an oracle and hands its answer to Solver.feedback().

import { InvalidConfigurationError } from './errors.js';
import { score, type Code, type Feedback } from './scoring.js';
import type { Universe } from './universe.js';

export interface Oracle {
  respond(guess: Code): Feedback;
}

/** Scores every guess against a fixed secret. */
export class SecretOracle implements Oracle {
  constructor(readonly secret: Code) {}

  respond(guess: Code): Feedback {
    return score(guess, this.secret);
  }
}

/**
 * pickSecret chooses a secret from the universe.
 * Without a seed the choice is random; with one it is a deterministic
 * FNV-1a hash of the seed, so the same seed always yields the same secret.
 */
export function pickSecret(universe: Universe, seed?: string): Code {
  if (!seed) return universe.at(Math.floor(Math.random() * universe.size));
  let h = 2166136261;
  for (const ch of seed) {
    h ^= ch.charCodeAt(0);
    h = Math.imul(h, 16777619);
  }
  return universe.at(Math.abs(h) % universe.size);
}

/** Checks that a code fits the universe's places and colors. */
export function assertCode(universe: Universe, code: Code): void {
  if (!universe.contains(code)) {
    throw new InvalidConfigurationError(
      `(${code.join(',')}) is not a code of ${universe.places} places and ${universe.colors} colors`,
    );
  }
}
