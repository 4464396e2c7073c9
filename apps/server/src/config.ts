// apps/server/src/config.ts
//
// Server settings from the environment (.env is loaded by the entry point
// through dotenv). Every value has a default so the server starts with no
// configuration at all.
//
//   PORT                 listen port                               (3001)
//   LOG_LEVEL            pino level                                (info)
//   CORS_ORIGIN          allowed origin for browsers               (*)
//   MAX_UNIVERSE         largest colors^places accepted            (10000)
//   MAX_SEARCH_UNIVERSE  largest colors^places for the IDDFS solver (100)
//   MAX_SESSIONS         sessions kept before the oldest is evicted (1000)
//   DEFAULT_MAX_GUESSES  guess limit when a request names none     (10)
//   MAX_CACHE_ENTRIES    entries per shared solver cache            (5000)

import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  CORS_ORIGIN: z.string().default('*'),
  MAX_UNIVERSE: z.coerce.number().int().min(1).default(10_000),
  MAX_SEARCH_UNIVERSE: z.coerce.number().int().min(1).default(100),
  MAX_SESSIONS: z.coerce.number().int().min(1).default(1000),
  DEFAULT_MAX_GUESSES: z.coerce.number().int().min(1).max(100).default(10),
  MAX_CACHE_ENTRIES: z.coerce.number().int().min(1).default(5000),
});

export interface ServerConfig {
  readonly port: number;
  readonly logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  readonly corsOrigin: string;
  readonly maxUniverse: number;
  readonly maxSearchUniverse: number;
  readonly maxSessions: number;
  readonly defaultMaxGuesses: number;
  readonly maxCacheEntries: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    corsOrigin: e.CORS_ORIGIN,
    maxUniverse: e.MAX_UNIVERSE,
    maxSearchUniverse: e.MAX_SEARCH_UNIVERSE,
    maxSessions: e.MAX_SESSIONS,
    defaultMaxGuesses: e.DEFAULT_MAX_GUESSES,
    maxCacheEntries: e.MAX_CACHE_ENTRIES,
  };
}
