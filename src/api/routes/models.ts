/**
 * GET /v1/models handler.
 * Lists the configured models in OpenAI list format.
 */

import { Hono } from 'hono';
import type { ModelEntry } from '../../config/types.js';
import type { ModelInfo, ModelsResponse } from '../../shared/types.js';

export function createModelsRoutes(models: ModelEntry[]) {
  const app = new Hono();

  app.get('/models', (c) => {
    const created = Math.floor(Date.now() / 1000);
    const data: ModelInfo[] = models.map((m) => ({
      id: m.id,
      object: 'model',
      created,
      owned_by: m.ownedBy,
    }));

    const response: ModelsResponse = { object: 'list', data };
    return c.json(response);
  });

  return app;
}
