// packages/game-core/src/universe.ts
//
// The universe of all codes for one (places, colors) configuration.
//
// Codes are addressed by their index in enumeration order (see allCodes).
// That order doubles as the deterministic tie-break order of the solvers.
// Scoring by index uses per-code color counts computed once, and encodes the
// feedback as a small integer so partitions can be tallied in a flat array.

import { allCodes, codeKey } from './codes.js';
import { InvalidConfigurationError } from './errors.js';
import type { Code, Feedback } from './scoring.js';

export interface GameConfig {
  readonly places: number;
  readonly colors: number;
}

export function validateGameConfig(config: GameConfig): void {
  const { places, colors } = config;
  if (!Number.isInteger(places) || places < 1) {
    throw new InvalidConfigurationError(
      `places must be a positive integer, got ${places}`,
    );
  }
  if (!Number.isInteger(colors) || colors < 1) {
    throw new InvalidConfigurationError(
      `colors must be a positive integer, got ${colors}`,
    );
  }
}

export function universeSize(config: GameConfig): number {
  return config.colors ** config.places;
}

export class Universe implements GameConfig {
  readonly places: number;
  readonly colors: number;
  /** Distinguishes cache entries of different configurations. */
  readonly key: string;
  readonly codes: readonly Code[];

  private readonly indexByKey: Map<string, number>;
  private readonly colorCounts: (Uint8Array | Uint32Array)[];

  constructor(config: GameConfig) {
    validateGameConfig(config);
    this.places = config.places;
    this.colors = config.colors;
    this.key = `${this.places}x${this.colors}`;
    this.codes = [...allCodes(this.places, this.colors)];
    this.indexByKey = new Map(this.codes.map((c, i) => [codeKey(c), i]));
    this.colorCounts = this.codes.map((code) => {
      // a byte per color holds counts up to 255
      const counts =
        this.places < 256
          ? new Uint8Array(this.colors + 1)
          : new Uint32Array(this.colors + 1);
      for (const c of code) counts[c]++;
      return counts;
    });
  }

  get size(): number {
    return this.codes.length;
  }

  /** Upper bound (exclusive) of the values returned by feedbackId. */
  get feedbackIds(): number {
    return (this.places + 1) * (this.places + 1);
  }

  at(index: number): Code {
    const code = this.codes[index];
    if (code === undefined) throw new RangeError(`No code at index ${index}`);
    return code;
  }

  /** Index of a code, or -1 when it does not belong to this universe. */
  indexOf(code: Code): number {
    return this.indexByKey.get(codeKey(code)) ?? -1;
  }

  contains(code: Code): boolean {
    return this.indexOf(code) >= 0;
  }

  /** Encoded feedback of guess `g` against secret `s`, both by index. */
  feedbackId(g: number, s: number): number {
    const guess = this.codes[g];
    const secret = this.codes[s];
    let exact = 0;
    for (let i = 0; i < this.places; i++) {
      if (guess[i] === secret[i]) exact++;
    }
    const gc = this.colorCounts[g];
    const sc = this.colorCounts[s];
    let common = 0;
    for (let c = 1; c <= this.colors; c++) {
      common += gc[c] < sc[c] ? gc[c] : sc[c];
    }
    return this.encode({ exact, color: common - exact });
  }

  encode(feedback: Feedback): number {
    return feedback.exact * (this.places + 1) + feedback.color;
  }

  decode(id: number): Feedback {
    const base = this.places + 1;
    return { exact: Math.floor(id / base), color: id % base };
  }

  /** Encoded terminal feedback (places, 0). */
  get solvedId(): number {
    return this.places * (this.places + 1);
  }
}
