/**
 * TypeScript types inferred from Zod schemas.
 */

import { z } from 'zod';
import { ConfigSchema, BackendSchema, ModelEntrySchema, SettingsSchema } from './schema.js';

/** Fully validated proxy configuration. */
export type Config = z.infer<typeof ConfigSchema>;

/** Backend connection settings. */
export type BackendConfig = z.infer<typeof BackendSchema>;

/** A model advertised to clients. */
export type ModelEntry = z.infer<typeof ModelEntrySchema>;

/** Proxy-level settings. */
export type Settings = z.infer<typeof SettingsSchema>;
