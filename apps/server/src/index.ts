// apps/server/src/index.ts
//
// Entry point: loads .env, builds the app and listens.
//
// Responsibilities:
//   • Read the environment into a ServerConfig (see config.ts).
//   • Create the root pino logger every session and game logs through.
//   • Serve the Express app from app.ts.

import 'dotenv/config';
import pino from 'pino';

import { createApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const log = pino({ level: config.logLevel });
const app = createApp({ config, log });

app.listen(config.port, () => log.info({ port: config.port }, 'server up'));
