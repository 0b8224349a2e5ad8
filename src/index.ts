/**
 * relaycall application entry point.
 * Bootstraps configuration, the backend client and usage database, then
 * starts the HTTP server.
 */

import { serve } from '@hono/node-server';
import { logger } from './shared/logger.js';
import { VERSION } from './shared/version.js';
import { ConfigError } from './shared/errors.js';
import { loadConfig, resolveConfigPath } from './config/loader.js';
import { BackendClient } from './backend/client.js';
import { initializeDatabase } from './persistence/db.js';
import { migrateSchema } from './persistence/schema.js';
import { RequestLogger } from './persistence/request-logger.js';
import { UsageAggregator } from './persistence/aggregator.js';
import { createApp } from './app.js';
import type { Config } from './config/types.js';

// --- Bootstrap ---

logger.info(`relaycall v${VERSION} starting...`);

const configPath = resolveConfigPath();

let config: Config;
try {
  config = loadConfig(configPath);
} catch (err) {
  if (!(err instanceof ConfigError)) throw err;
  console.error(`\n${err.message}\n`);
  console.error('To create a config file, run:');
  console.error('  relaycall --init\n');
  console.error('Or specify a custom config path:');
  console.error('  relaycall --config /path/to/config.yaml\n');
  process.exit(1);
}

logger.level = config.settings.logLevel;

const portOverride = process.env['PORT'] ? Number(process.env['PORT']) : undefined;
const port = portOverride !== undefined && Number.isInteger(portOverride) ? portOverride : config.settings.port;

const backend = new BackendClient(
  config.backend.baseUrl,
  config.backend.apiKey,
  config.settings.requestTimeoutMs,
);

const db = initializeDatabase(config.settings.dbPath);
migrateSchema(db);

const app = createApp({
  config,
  backend,
  requestLogger: new RequestLogger(db),
  aggregator: new UsageAggregator(db),
});

// --- Start server ---

const server = serve(
  {
    fetch: app.fetch,
    port,
  },
  (info) => {
    logger.info({ port: info.port }, `relaycall listening on port ${info.port}`);
    logger.info(
      {
        backend: backend.baseUrl,
        models: config.models.length,
        defaultModel: config.settings.defaultModel,
        dbPath: config.settings.dbPath,
      },
      'Ready',
    );
  },
);

// --- Graceful shutdown ---

const shutdown = () => {
  logger.info('Shutting down...');
  db.close();
  logger.info('Database closed');
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});
