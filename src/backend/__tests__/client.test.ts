import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { BackendClient } from '../client.js';
import { UpstreamError } from '../../shared/errors.js';
import type { CompletionRequest, ImageRequest } from '../types.js';

// --- Test Helpers ---

function makeCompletionData() {
  return {
    completions: {
      'vendor/model': {
        completion: {
          id: 'cmpl-test',
          object: 'chat.completion',
          model: 'vendor/model',
          created: 1700000000,
          usage: { prompt_tokens: 5, completion_tokens: 10, total_tokens: 15 },
          choices: [
            { message: { role: 'assistant', content: 'Hello' }, index: 0, finish_reason: 'end_turn' },
          ],
        },
        price: { input: 0.5, output: 1.5, total: 2 },
        words: { input: 1, output: 1, total: 2 },
      },
    },
    overall_price: { input: 0.5, output: 1.5, total: 2 },
    overall_words: { input: 1, output: 1, total: 2 },
  };
}

function makeRequest(): CompletionRequest {
  return { models: ['vendor/model'], message: 'user: Hi' };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('BackendClient', () => {
  let client: BackendClient;
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    client = new BackendClient('https://backend.test/', 'test-backend-key');
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('strips trailing slashes from the base URL', () => {
    expect(client.baseUrl).toBe('https://backend.test');
  });

  describe('createCompletion', () => {
    it('posts the request with bearer auth to the completion endpoint', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ success: true, data: makeCompletionData() }));

      await client.createCompletion(makeRequest());

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock).toHaveBeenCalledWith(
        'https://backend.test/v1/prompt/completion',
        expect.objectContaining({
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'Authorization': 'Bearer test-backend-key',
          },
        }),
      );
      const body = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
      expect(body).toEqual({ models: ['vendor/model'], message: 'user: Hi' });
    });

    it('unwraps the data envelope', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ success: true, data: makeCompletionData() }));

      const data = await client.createCompletion(makeRequest());

      expect(Object.keys(data.completions)).toEqual(['vendor/model']);
      expect(data.completions['vendor/model']?.completion.choices[0]?.message).toEqual({
        role: 'assistant',
        content: 'Hello',
      });
      expect(data.overall_price.total).toBe(2);
    });

    it('accepts an envelope without the success flag', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ data: makeCompletionData() }));

      const data = await client.createCompletion(makeRequest());

      expect(data.overall_words.total).toBe(2);
    });

    it('throws UpstreamError with status and body on a non-OK response', async () => {
      fetchMock.mockResolvedValue(new Response('{"error":"boom"}', { status: 500 }));

      const error = await client.createCompletion(makeRequest()).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(UpstreamError);
      if (!(error instanceof UpstreamError)) return;
      expect(error.statusCode).toBe(500);
      expect(error.responseBody).toBe('{"error":"boom"}');
      expect(error.endpoint).toBe('/v1/prompt/completion');
      expect(error.message).toBe('Backend returned 500 for /v1/prompt/completion');
    });

    it('throws UpstreamError when the body is not JSON', async () => {
      fetchMock.mockResolvedValue(new Response('not json', { status: 200 }));

      await expect(client.createCompletion(makeRequest())).rejects.toThrow(
        'Backend returned invalid JSON for /v1/prompt/completion',
      );
    });

    it('throws UpstreamError when the body is not an envelope', async () => {
      fetchMock.mockResolvedValue(jsonResponse(['unexpected']));

      await expect(client.createCompletion(makeRequest())).rejects.toThrow(
        'Backend response for /v1/prompt/completion is not a { data } envelope',
      );
    });

    it('throws UpstreamError when the payload fails validation', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ data: { completions: {} } }));

      const error = await client.createCompletion(makeRequest()).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(UpstreamError);
      if (!(error instanceof UpstreamError)) return;
      expect(error.statusCode).toBe(200);
      expect(error.message.startsWith('Backend payload for /v1/prompt/completion failed validation:\n')).toBe(true);
    });

    it('wraps a network failure in UpstreamError', async () => {
      const cause = new TypeError('fetch failed');
      fetchMock.mockRejectedValue(cause);

      const error = await client.createCompletion(makeRequest()).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(UpstreamError);
      if (!(error instanceof UpstreamError)) return;
      expect(error.statusCode).toBe(0);
      expect(error.responseBody).toBe('');
      expect(error.message).toBe('Backend request to /v1/prompt/completion failed: fetch failed');
      expect(error.cause).toBe(cause);
    });

    it('wraps a timeout in UpstreamError', async () => {
      const timed = new BackendClient('https://backend.test', 'test-backend-key', 10);
      fetchMock.mockImplementation((_input, init) => {
        const signal = init?.signal;
        return new Promise<Response>((_resolve, reject) => {
          if (signal) {
            signal.addEventListener('abort', () => reject(signal.reason));
          }
        });
      });

      const error = await timed.createCompletion(makeRequest()).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(UpstreamError);
      if (!(error instanceof UpstreamError)) return;
      expect(error.statusCode).toBe(0);
      expect(error.message.startsWith('Backend request to /v1/prompt/completion failed: ')).toBe(true);
    });

    it('rethrows a rejection caused by the caller aborting', async () => {
      const controller = new AbortController();
      const reason = new Error('client disconnected');
      controller.abort(reason);
      fetchMock.mockRejectedValue(reason);

      const error = await client.createCompletion(makeRequest(), controller.signal).catch((err: unknown) => err);

      expect(error).toBe(reason);
    });

    it('passes a timeout signal when a timeout is configured', async () => {
      const timed = new BackendClient('https://backend.test', 'test-backend-key', 5000);
      fetchMock.mockResolvedValue(jsonResponse({ data: makeCompletionData() }));

      await timed.createCompletion(makeRequest());

      expect(fetchMock.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
    });
  });

  describe('createImage', () => {
    it('posts to the image endpoint and returns the image data', async () => {
      const request: ImageRequest = {
        model: 'vendor/image',
        description: 'a red bicycle',
        size: 'square',
        variations: 2,
      };
      const payload = {
        zip: 'https://files.test/images.zip',
        images: ['https://files.test/1.png', 'https://files.test/2.png'],
        price: { price_per_image: 3, quantity_images: 2, total: 6 },
      };
      fetchMock.mockResolvedValue(jsonResponse({ success: true, data: payload }));

      const data = await client.createImage(request);

      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://backend.test/v0/image/generation');
      expect(JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body))).toEqual(request);
      expect(data).toEqual(payload);
    });
  });
});
