/**
 * API key validation middleware for Hono.
 * Validates the Bearer token in the Authorization header against the
 * configured proxy keys. Missing or unknown keys get an OpenAI-format 401.
 */

import { createMiddleware } from 'hono/factory';
import { openAIError } from '../../shared/errors.js';

const BEARER_PREFIX = 'Bearer ';

/**
 * @param apiKeys - Keys accepted by the proxy (settings.apiKeys).
 */
export function createAuthMiddleware(apiKeys: string[]) {
  const keySet = new Set(apiKeys);

  return createMiddleware(async (c, next) => {
    const authorization = c.req.header('authorization');

    if (!authorization?.startsWith(BEARER_PREFIX)) {
      return c.json(
        openAIError(
          'Missing or invalid API key. Provide a valid key in the Authorization header as Bearer <key>.',
          'invalid_request_error',
          'invalid_api_key',
        ),
        401,
      );
    }

    if (!keySet.has(authorization.slice(BEARER_PREFIX.length))) {
      return c.json(
        openAIError('Invalid API key provided.', 'invalid_request_error', 'invalid_api_key'),
        401,
      );
    }

    await next();
  });
}
