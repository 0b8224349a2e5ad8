/**
 * Stats routes for querying usage aggregations.
 */

import { Hono } from 'hono';
import type { UsageAggregator } from '../../persistence/aggregator.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

export function createStatsRoutes(aggregator: UsageAggregator) {
  const app = new Hono();

  // GET /models - per-model totals
  app.get('/models', (c) => {
    return c.json({
      models: aggregator.getAllModelUsage(),
    });
  });

  // GET /models/:model - one model's totals
  app.get('/models/:model', (c) => {
    const usage = aggregator.getModelUsage(c.req.param('model'));

    if (usage === null) {
      return c.json({ error: 'No usage data for model' }, 404);
    }

    return c.json(usage);
  });

  // GET /requests - recent request rows
  app.get('/requests', (c) => {
    const limitParam = Number(c.req.query('limit') ?? DEFAULT_LIMIT);
    const limit = Number.isInteger(limitParam) && limitParam > 0 ? Math.min(limitParam, MAX_LIMIT) : DEFAULT_LIMIT;

    return c.json({
      requests: aggregator.getRecentRequests(limit),
    });
  });

  return app;
}
