/**
 * Reading relaycall's YAML config. Every failure surfaces as a ConfigError
 * naming the file; index.ts turns that into a startup hint.
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigSchema } from './schema.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Config } from './types.js';

export const DEFAULT_CONFIG_PATH = './config/config.yaml';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Validate YAML text as a relaycall config.
 *
 * @param source - Where the text came from; used in error messages only.
 * @throws ConfigError
 */
export function parseConfig(text: string, source: string): Config {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Failed to parse YAML in config file "${source}": ${errorMessage(err)}`);
  }

  const result = ConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigError(`Config validation failed for "${source}":\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}

/** @throws ConfigError if the file is unreadable or invalid. */
export function loadConfig(path: string): Config {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Failed to read config file at "${path}": ${errorMessage(err)}`);
  }

  const config = parseConfig(text, path);
  logger.info(
    { configPath: path, backend: config.backend.baseUrl, models: config.models.length },
    'Config loaded',
  );
  return config;
}

/**
 * Where to read the config from: `--config <path>` or `--config=<path>`,
 * then CONFIG_PATH, then ./config/config.yaml.
 */
export function resolveConfigPath(argv: string[] = process.argv): string {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === '--config' && next !== undefined) {
      return next;
    }
    if (arg?.startsWith('--config=')) {
      return arg.slice('--config='.length);
    }
  }
  return process.env['CONFIG_PATH'] || DEFAULT_CONFIG_PATH;
}
