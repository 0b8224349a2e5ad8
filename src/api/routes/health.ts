/**
 * GET /health handler.
 * Returns proxy status information. No authentication required.
 */

import { Hono } from 'hono';
import { VERSION } from '../../shared/version.js';

/**
 * @param modelCount - Number of configured models.
 */
export function createHealthRoutes(modelCount: number) {
  const app = new Hono();

  app.get('/', (c) => {
    return c.json({
      status: 'ok',
      version: VERSION,
      uptime: process.uptime(),
      models: modelCount,
    });
  });

  return app;
}
