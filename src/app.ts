/**
 * Hono application assembly. Kept separate from index.ts so tests can build
 * the app around in-process fakes without starting a server.
 */

import { Hono } from 'hono';
import { createAuthMiddleware } from './api/middleware/auth.js';
import { errorHandler } from './api/middleware/error-handler.js';
import { createChatRoutes } from './api/routes/chat.js';
import { createImageRoutes } from './api/routes/images.js';
import { createModelsRoutes } from './api/routes/models.js';
import { createHealthRoutes } from './api/routes/health.js';
import { createStatsRoutes } from './api/routes/stats.js';
import type { Config } from './config/types.js';
import type { CompletionBackend } from './backend/types.js';
import type { RequestLogger } from './persistence/request-logger.js';
import type { UsageAggregator } from './persistence/aggregator.js';

export interface AppDependencies {
  config: Config;
  backend: CompletionBackend;
  requestLogger: RequestLogger;
  aggregator: UsageAggregator;
}

export function createApp({ config, backend, requestLogger, aggregator }: AppDependencies): Hono {
  const app = new Hono();

  app.onError(errorHandler);

  app.route('/health', createHealthRoutes(config.models.length));

  const v1 = new Hono();
  v1.use('*', createAuthMiddleware(config.settings.apiKeys));

  const modelIds = new Set(config.models.map((m) => m.id));

  v1.route('/', createChatRoutes(backend, modelIds, config.settings.defaultModel, requestLogger));
  v1.route('/', createImageRoutes(backend, config.settings.defaultImageModel));
  v1.route('/', createModelsRoutes(config.models));
  v1.route('/stats', createStatsRoutes(aggregator));

  app.route('/v1', v1);

  return app;
}
