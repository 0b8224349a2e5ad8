/**
 * Backend request/response types and the interface the HTTP layer uses.
 */

import { z } from 'zod';
import type { CompletionData } from '../completion/types.js';

/** Endpoint paths, relative to the configured base URL. */
export const Endpoints = {
  Completion: '/v1/prompt/completion',
  Image: '/v0/image/generation',
} as const;

/** Prompt completion request: one prompt fanned out to one or more models. */
export interface CompletionRequest {
  models: string[];
  message: string;
  temperature?: number;
  max_tokens?: number;
}

export type ImageSize = 'square' | 'landscape' | 'enlarged';

export interface ImageRequest {
  model: string;
  description: string;
  size: ImageSize;
  variations: number;
}

export const ImagePriceSchema = z.object({
  price_per_image: z.number().int().nonnegative(),
  quantity_images: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
});

export const ImageDataSchema = z.object({
  zip: z.string(),
  images: z.array(z.string()),
  price: ImagePriceSchema,
});

/** Generated images: a zip archive URL plus one URL per image. */
export type ImageData = z.infer<typeof ImageDataSchema>;

/**
 * What the HTTP layer needs from the backend. The production implementation
 * is BackendClient; tests supply in-process fakes.
 */
export interface CompletionBackend {
  /**
   * @throws UpstreamError on non-OK responses or undecodable payloads.
   */
  createCompletion(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionData>;

  /**
   * @throws UpstreamError on non-OK responses or undecodable payloads.
   */
  createImage(request: ImageRequest, signal?: AbortSignal): Promise<ImageData>;
}
