/**
 * POST /v1/chat/completions handler.
 * Turns an OpenAI-compatible chat request into a backend prompt, selects a
 * completion from the backend's result set, extracts tool-call markup, and
 * answers in the OpenAI wire shape.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { logger } from '../../shared/logger.js';
import { openAIError } from '../../shared/errors.js';
import { renderPrompt } from '../../backend/prompt.js';
import { getCompletionEntry } from '../../completion/select.js';
import { parseCompletion } from '../../completion/parse.js';
import { toWireCompletion } from '../../completion/wire.js';
import { ChatCompletionRequestSchema } from '../schemas.js';
import type { Completion } from '../../completion/types.js';
import type { CompletionBackend, CompletionRequest } from '../../backend/types.js';
import type { RequestLogEntry, RequestLogger } from '../../persistence/request-logger.js';

/** Number of structured tool calls across all choices. */
export function countToolCalls(completion: Completion): number {
  let total = 0;
  for (const choice of completion.choices) {
    if (choice.message.role === 'assistant') {
      total += choice.message.tool_calls?.length ?? 0;
    }
  }
  return total;
}

/**
 * Create chat completion routes with injected dependencies.
 * @param backend - Completion backend client.
 * @param modelIds - Models clients may ask for by name.
 * @param defaultModel - Model used when the request names none, or an unknown one.
 * @param requestLogger - Usage logger.
 */
export function createChatRoutes(
  backend: CompletionBackend,
  modelIds: ReadonlySet<string>,
  defaultModel: string,
  requestLogger: RequestLogger,
) {
  const app = new Hono();

  // Fire-and-forget: usage logging never blocks or fails the response.
  const logUsage = (entry: RequestLogEntry) => {
    setImmediate(() => {
      try {
        requestLogger.logRequest(entry);
      } catch (error) {
        logger.error({ error }, 'Failed to log request');
      }
    });
  };

  app.post('/chat/completions', async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return c.json(openAIError('Request body must be valid JSON.', 'invalid_request_error', 'invalid_json'), 400);
    }

    const parsed = ChatCompletionRequestSchema.safeParse(raw);
    if (!parsed.success) {
      return c.json(openAIError(z.prettifyError(parsed.error), 'invalid_request_error', 'invalid_request'), 400);
    }
    const body = parsed.data;

    if (body.stream) {
      return c.json(
        openAIError('Streaming responses are not supported.', 'invalid_request_error', 'stream_unsupported', 'stream'),
        400,
      );
    }

    const requestedModel = body.model;
    const model = requestedModel !== undefined && modelIds.has(requestedModel) ? requestedModel : defaultModel;

    logger.info(
      { requestedModel, model, tools: body.tools?.length ?? 0 },
      `Chat completion request (model="${requestedModel ?? ''}" -> "${model}")`,
    );

    const completionRequest: CompletionRequest = {
      models: [model],
      message: renderPrompt(body.messages, body.tools),
      ...(body.temperature !== undefined && { temperature: body.temperature }),
      ...(body.max_tokens !== undefined && { max_tokens: body.max_tokens }),
    };

    const start = performance.now();
    const failed = (error: unknown) => {
      logUsage({
        timestamp: Date.now(),
        model,
        promptTokens: 0,
        completionTokens: 0,
        totalTokens: 0,
        priceTotal: 0,
        wordsTotal: 0,
        toolCalls: 0,
        latencyMs: performance.now() - start,
        httpStatus: 502,
        errorMessage: error instanceof Error ? error.message : String(error),
      });
    };

    let label: string;
    let completion: Completion;
    let priceTotal: number;
    let wordsTotal: number;
    try {
      const data = await backend.createCompletion(completionRequest, c.req.raw.signal);
      const [entryLabel, entry] = getCompletionEntry(data);
      label = entryLabel;
      completion = parseCompletion(entry.completion);
      priceTotal = entry.price.total;
      wordsTotal = entry.words.total;
    } catch (error) {
      failed(error);
      throw error;
    }

    const latencyMs = performance.now() - start;
    const toolCalls = countToolCalls(completion);

    logUsage({
      timestamp: Date.now(),
      model: label,
      promptTokens: completion.usage.prompt_tokens,
      completionTokens: completion.usage.completion_tokens,
      totalTokens: completion.usage.total_tokens,
      priceTotal,
      wordsTotal,
      toolCalls,
      latencyMs,
      httpStatus: 200,
    });

    logger.debug({ model: label, toolCalls, latencyMs: Math.round(latencyMs) }, 'Chat completion succeeded');

    c.header('X-Relaycall-Model', label);
    return c.json(toWireCompletion(completion));
  });

  return app;
}
