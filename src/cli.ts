#!/usr/bin/env node
/**
 * relaycall command line. `--help` and `--init` are answered here; any
 * other invocation starts the proxy with the given overrides.
 */

import { parseArgs } from 'node:util';
import { copyFileSync, existsSync, mkdirSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

const HELP = `
relaycall - OpenAI-compatible proxy for a multi-model completion backend

Usage:
  relaycall [options]

Options:
  -c, --config <path>   Config file (default: ./config/config.yaml)
  -p, --port <port>     Listen port, overriding settings.port
  --init                Write config/config.yaml from the bundled example
  -h, --help            Show this help

Examples:
  relaycall
  relaycall --config /etc/relaycall.yaml --port 9000
  relaycall --init
`;

/** Bundled example, next to dist/ in a package and next to src/ in a checkout. */
const EXAMPLE_CONFIG = join(dirname(fileURLToPath(import.meta.url)), '..', 'config', 'config.example.yaml');

/** @returns the process exit code */
function initConfig(cwd: string): number {
  const target = join(cwd, 'config', 'config.yaml');

  if (existsSync(target)) {
    console.error(`Error: Config file already exists at ${target}`);
    return 1;
  }
  if (!existsSync(EXAMPLE_CONFIG)) {
    console.error(`Error: Example config missing at ${EXAMPLE_CONFIG}`);
    return 1;
  }

  mkdirSync(dirname(target), { recursive: true });
  copyFileSync(EXAMPLE_CONFIG, target);

  console.log(`✓ Created config file: ${target}`);
  console.log('');
  console.log('Set backend.baseUrl, backend.apiKey and settings.apiKeys, then run: relaycall');
  return 0;
}

const { values } = parseArgs({
  options: {
    config: { type: 'string', short: 'c' },
    port: { type: 'string', short: 'p' },
    init: { type: 'boolean' },
    help: { type: 'boolean', short: 'h' },
  },
  strict: false,
});

if (values.help) {
  console.log(HELP);
  process.exit(0);
}

if (values.init) {
  process.exit(initConfig(process.cwd()));
}

if (typeof values.config === 'string') {
  process.env['CONFIG_PATH'] = values.config;
}
if (typeof values.port === 'string') {
  process.env['PORT'] = values.port;
}

await import('./index.js');
