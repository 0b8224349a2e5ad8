/**
 * Global error handler returning OpenAI-format errors.
 *
 * Error mapping:
 * - MarkupDecodeError -> 502, the model produced tool-call markup we cannot decode
 * - EmptySelectionError -> 502, the backend answered without any completion
 * - UpstreamError -> 502, the backend failed or sent an undecodable payload
 * - ConfigError -> 500 (no internal details exposed)
 * - Unknown -> 500 (generic server error)
 */

import type { ErrorHandler } from 'hono';
import { logger } from '../../shared/logger.js';
import {
  ConfigError,
  EmptySelectionError,
  MarkupDecodeError,
  UpstreamError,
  openAIError,
} from '../../shared/errors.js';

export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof MarkupDecodeError) {
    logger.warn({ span: err.span, reason: err.message }, 'Tool call markup could not be decoded');
    return c.json(err.toOpenAIError(), 502);
  }

  if (err instanceof EmptySelectionError) {
    logger.warn('Backend returned an empty completion set');
    return c.json(err.toOpenAIError(), 502);
  }

  if (err instanceof UpstreamError) {
    logger.error(
      { endpoint: err.endpoint, status: err.statusCode, body: err.responseBody },
      'Backend request failed',
    );
    return c.json(err.toOpenAIError(), 502);
  }

  if (err instanceof ConfigError) {
    logger.error({ err }, 'Configuration error');
    return c.json(openAIError('Internal configuration error', 'server_error', 'config_error'), 500);
  }

  logger.error({ err }, 'Unhandled error');
  return c.json(openAIError('Internal server error', 'server_error'), 500);
};
