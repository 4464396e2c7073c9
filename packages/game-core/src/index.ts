// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all solver logic so consumers can import from one place.
//
// Includes:
//   • scoring.ts    → score(), Feedback and Code types
//   • codes.ts      → code enumeration and text form
//   • universe.ts   → indexed universe of codes for one configuration
//   • candidates.ts → immutable candidate sets
//   • knuth.ts      → worst-case guess rating
//   • iddfs.ts      → iterative-deepening search
//   • solver.ts     → stateful solver sessions (createSolver)
//   • oracle.ts / adversary.ts → secret-holding and adversarial oracles
//   • game.ts / stats.ts       → game driver and guess-count distribution
//
// Example usage:
//   import { createSolver, playGame, SecretOracle } from '@mastermind/game-core';

export * from './errors.js';
export * from './scoring.js';
export * from './codes.js';
export * from './universe.js';
export * from './candidates.js';
export * from './cache.js';
export * from './knuth.js';
export * from './iddfs.js';
export * from './solver.js';
export * from './oracle.js';
export * from './adversary.js';
export * from './game.js';
export * from './stats.js';
