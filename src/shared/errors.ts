/**
 * Custom error classes for the relaycall proxy.
 * Errors that can reach a client know how to render themselves as
 * OpenAI-compatible error responses.
 */

import type { OpenAIErrorResponse } from './types.js';

/** Build an OpenAI-format error body. */
export function openAIError(
  message: string,
  type: string,
  code: string | null = null,
  param: string | null = null,
): OpenAIErrorResponse {
  return { error: { message, type, param, code } };
}

/** Error thrown when config validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** The backend was unreachable, returned a non-OK status, or sent a payload we could not decode. */
export class UpstreamError extends Error {
  public readonly endpoint: string;
  public readonly statusCode: number;
  public readonly responseBody: string;

  /** `statusCode` is 0 when no response arrived. */
  constructor(endpoint: string, statusCode: number, responseBody: string, detail?: string, options?: ErrorOptions) {
    super(detail ?? `Backend returned ${statusCode} for ${endpoint}`, options);
    this.name = 'UpstreamError';
    this.endpoint = endpoint;
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }

  toOpenAIError(): OpenAIErrorResponse {
    return openAIError(this.message, 'server_error', 'upstream_error');
  }
}

/**
 * A `<tool_call>` span in an assistant message could not be decoded
 * into `{ name, arguments }`.
 */
export class MarkupDecodeError extends Error {
  /** The trimmed span text that failed to decode. */
  public readonly span: string;

  constructor(span: string, reason: string, options?: { cause?: unknown }) {
    super(`Invalid tool call markup: ${reason}`, options);
    this.name = 'MarkupDecodeError';
    this.span = span;
  }

  toOpenAIError(): OpenAIErrorResponse {
    return openAIError(this.message, 'server_error', 'tool_call_decode_failed');
  }
}

/** Thrown when a completion is requested from a result set with no entries. */
export class EmptySelectionError extends Error {
  constructor() {
    super('Backend returned no completions to select from');
    this.name = 'EmptySelectionError';
  }

  toOpenAIError(): OpenAIErrorResponse {
    return openAIError(this.message, 'server_error', 'empty_completion');
  }
}
