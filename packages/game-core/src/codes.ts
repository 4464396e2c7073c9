// packages/game-core/src/codes.ts
//
// Code enumeration and the textual form used by the server and the logs.

import type { Code } from './scoring.js';

/**
 * allCodes yields every code of `places` pegs over colors 1..`colors` in
 * lexicographic order, leftmost peg most significant:
 *   (1,1,1,1), (1,1,1,2), …, (6,6,6,6)
 *
 * The generator is lazy and restartable; each call starts from the first code.
 */
export function* allCodes(places: number, colors: number): Generator<Code> {
  if (places <= 0 || colors <= 0) return;
  const digits = new Array<number>(places).fill(1);
  while (true) {
    yield [...digits];
    let i = places - 1;
    while (i >= 0 && digits[i] === colors) {
      digits[i] = 1;
      i--;
    }
    if (i < 0) return;
    digits[i]++;
  }
}

export function sameCode(a: Code, b: Code): boolean {
  return a.length === b.length && a.every((c, i) => c === b[i]);
}

/** Canonical key of a code: "1,1,2,2". */
export function codeKey(code: Code): string {
  return code.join(',');
}

export function formatCode(code: Code): string {
  return `(${codeKey(code)})`;
}

/**
 * parseCode reads "1,1,2,2", "(1, 1, 2, 2)" or "1 1 2 2".
 * Returns null when the text is not a list of positive integers.
 */
export function parseCode(text: string): Code | null {
  const parts = text
    .trim()
    .replace(/^\(|\)$/g, '')
    .split(/[\s,]+/)
    .filter((p) => p.length > 0);
  if (parts.length === 0 || !parts.every((p) => /^\d+$/.test(p))) return null;
  const code = parts.map(Number);
  return code.every((c) => c > 0) ? code : null;
}
