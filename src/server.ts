/**
 * Admin API entry point. Reads configuration from the environment and
 * listens on loopback unless HOST says otherwise.
 */

import type { Server } from 'node:http';
import { fileURLToPath } from 'node:url';

import { AccountManager } from './accountManager.js';
import { createApp } from './app.js';
import { loadConfigFromEnv } from './config.js';
import { createLogger, isLogLevel } from './logger.js';

const logLevel = process.env.LOG_LEVEL;
const logger = createLogger({ level: isLogLevel(logLevel) ? logLevel : 'info' });

/** Start server. Call from CLI or tests. */
export function startServer(env: NodeJS.ProcessEnv = process.env): Server {
  const config = loadConfigFromEnv(env);
  const manager = new AccountManager(config, { logger });
  const app = createApp({
    manager,
    logger,
    getApiKey: () => env.API_KEY,
    rateLimit: {
      windowMs: Number(env.RATE_LIMIT_WINDOW_MS ?? 60_000),
      max: Number(env.RATE_LIMIT_MAX ?? 100),
    },
  });

  const port = Number(env.PORT ?? 3100);
  const host = env.HOST ?? '127.0.0.1';

  return app.listen(port, host, () => {
    logger.info('server_listening', {
      host,
      port,
      accountsFile: config.accountsFile,
      credentialsDir: config.credentialsDir,
    });
  });
}

const __filename = fileURLToPath(import.meta.url);
const isMain = process.argv[1] === __filename;
if (isMain) {
  startServer();
}
