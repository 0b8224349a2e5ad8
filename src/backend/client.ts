/**
 * HTTP client for the completion backend.
 * Sends bearer-authenticated JSON requests and validates the `data`
 * envelope of every response before handing it back.
 */

import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { UpstreamError } from '../shared/errors.js';
import { CompletionDataSchema } from '../completion/schema.js';
import type { CompletionData } from '../completion/types.js';
import {
  Endpoints,
  ImageDataSchema,
  type CompletionBackend,
  type CompletionRequest,
  type ImageData,
  type ImageRequest,
} from './types.js';

/** Every backend response wraps its payload as `{ data, success }`. */
const EnvelopeSchema = z.object({
  success: z.boolean().optional(),
  data: z.unknown(),
});

export class BackendClient implements CompletionBackend {
  public readonly baseUrl: string;
  protected readonly apiKey: string;
  public readonly timeoutMs?: number;

  constructor(baseUrl: string, apiKey: string, timeoutMs?: number) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.apiKey = apiKey;
    this.timeoutMs = timeoutMs;
  }

  /**
   * POST a JSON payload and decode `{ data }` from the response with `schema`.
   *
   * @throws UpstreamError on a network failure or timeout, non-OK status,
   * non-JSON body, or a payload that does not match `schema`. A rejection
   * caused by the caller's own `signal` is rethrown as-is.
   */
  async post<S extends z.ZodType>(
    endpoint: string,
    payload: unknown,
    schema: S,
    signal?: AbortSignal,
  ): Promise<z.output<S>> {
    const url = `${this.baseUrl}${endpoint}`;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${this.apiKey}`,
    };

    logger.debug({ endpoint, url }, 'Sending backend request');

    const start = performance.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: this.buildSignal(signal),
      });
    } catch (err) {
      // The caller gave up; that is not a backend failure.
      if (signal?.aborted) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ endpoint, err }, 'Backend request failed before a response');
      throw new UpstreamError(endpoint, 0, '', `Backend request to ${endpoint} failed: ${message}`, { cause: err });
    }

    const latencyMs = Math.round(performance.now() - start);

    if (!response.ok) {
      const errorText = await response.text();
      logger.error(
        { endpoint, status: response.status, latencyMs },
        'Backend returned error',
      );
      throw new UpstreamError(endpoint, response.status, errorText);
    }

    const text = await response.text();

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new UpstreamError(endpoint, response.status, text, `Backend returned invalid JSON for ${endpoint}: ${message}`);
    }

    const envelope = EnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new UpstreamError(endpoint, response.status, text, `Backend response for ${endpoint} is not a { data } envelope`);
    }

    const result = schema.safeParse(envelope.data.data);
    if (!result.success) {
      logger.error({ endpoint, latencyMs }, 'Backend payload failed validation');
      throw new UpstreamError(
        endpoint,
        response.status,
        text,
        `Backend payload for ${endpoint} failed validation:\n${z.prettifyError(result.error)}`,
      );
    }

    logger.debug({ endpoint, status: response.status, latencyMs }, 'Backend request succeeded');

    return result.data;
  }

  async createCompletion(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionData> {
    return this.post(Endpoints.Completion, request, CompletionDataSchema, signal);
  }

  async createImage(request: ImageRequest, signal?: AbortSignal): Promise<ImageData> {
    return this.post(Endpoints.Image, request, ImageDataSchema, signal);
  }

  private buildSignal(signal?: AbortSignal): AbortSignal | undefined {
    if (this.timeoutMs === undefined) {
      return signal;
    }
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }
}
