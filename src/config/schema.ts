/**
 * Zod schemas for YAML config file validation.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';

/** Schema for the completion backend the proxy forwards to. */
export const BackendSchema = z.object({
  baseUrl: z.url({ message: 'backend.baseUrl must be a valid URL' }),
  apiKey: z.string().min(1, { message: 'backend.apiKey must not be empty' }),
});

/** Schema for a model exposed through GET /v1/models. */
export const ModelEntrySchema = z.object({
  id: z.string().min(1, { message: 'Model id must not be empty' }),
  ownedBy: z.string().min(1).default('relaycall'),
});

/** Schema for proxy settings. */
export const SettingsSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8000),
  apiKeys: z
    .array(z.string().min(1, { message: 'API key must not be empty' }))
    .min(1, { message: 'At least one API key is required' }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  requestTimeoutMs: z.number().int().min(1000).default(60000),
  dbPath: z.string().default('./data/usage.db'),
  defaultModel: z.string().min(1, { message: 'defaultModel must not be empty' }),
  defaultImageModel: z.string().min(1).optional(),
});

/** Top-level config schema with cross-reference validation. */
export const ConfigSchema = z
  .object({
    version: z.literal(1),
    settings: SettingsSchema,
    backend: BackendSchema,
    models: z
      .array(ModelEntrySchema)
      .min(1, { message: 'At least one model is required' }),
  })
  .refine(
    (config) => config.models.some((m) => m.id === config.settings.defaultModel),
    {
      message: 'settings.defaultModel must reference an existing model id',
    },
  );
