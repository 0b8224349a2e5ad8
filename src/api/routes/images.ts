/**
 * POST /v1/images/generations handler.
 * Maps an OpenAI-style image request onto the backend's image endpoint.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { logger } from '../../shared/logger.js';
import { openAIError } from '../../shared/errors.js';
import { ImageGenerationRequestSchema } from '../schemas.js';
import type { CompletionBackend, ImageRequest } from '../../backend/types.js';

/**
 * @param backend - Backend client.
 * @param defaultImageModel - Used when the request names no model.
 */
export function createImageRoutes(backend: CompletionBackend, defaultImageModel?: string) {
  const app = new Hono();

  app.post('/images/generations', async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return c.json(openAIError('Request body must be valid JSON.', 'invalid_request_error', 'invalid_json'), 400);
    }

    const parsed = ImageGenerationRequestSchema.safeParse(raw);
    if (!parsed.success) {
      return c.json(openAIError(z.prettifyError(parsed.error), 'invalid_request_error', 'invalid_request'), 400);
    }
    const body = parsed.data;

    const model = body.model ?? defaultImageModel;
    if (model === undefined) {
      return c.json(
        openAIError('No image model given and no default configured.', 'invalid_request_error', 'model_required', 'model'),
        400,
      );
    }

    const request: ImageRequest = {
      model,
      description: body.prompt,
      size: body.size ?? 'square',
      variations: body.n ?? 1,
    };

    logger.info({ model, size: request.size, variations: request.variations }, 'Image generation request');

    const result = await backend.createImage(request, c.req.raw.signal);

    return c.json({
      created: Math.floor(Date.now() / 1000),
      data: result.images.map((url) => ({ url })),
      zip: result.zip,
    });
  });

  return app;
}
