/**
 * Process-wide pino logger. Client bearer tokens and backend keys are
 * censored in every line, so this module is the only way to log.
 */

import pino from 'pino';

/** Censored wherever they appear in a logged object. */
export const REDACT_PATHS = [
  'req.headers.authorization',
  'headers.Authorization',
  '*.apiKey',
  '*.apiKeys',
  '*.api_key',
];

export type LogFormat = 'pretty' | 'json';

/** An explicit LOG_FORMAT wins; otherwise JSON only under NODE_ENV=production. */
export function resolveLogFormat(env: NodeJS.ProcessEnv = process.env): LogFormat {
  const format = env['LOG_FORMAT'];
  if (format === 'pretty' || format === 'json') {
    return format;
  }
  return env['NODE_ENV'] === 'production' ? 'json' : 'pretty';
}

export interface LoggerOptions {
  level: string;
  format: LogFormat;
}

/**
 * Build a relaycall logger. A `destination` replaces stdout and disables the
 * pretty transport.
 */
export function createLogger({ level, format }: LoggerOptions, destination?: pino.DestinationStream): pino.Logger {
  const options: pino.LoggerOptions = {
    name: 'relaycall',
    level,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };

  if (destination) {
    return pino(options, destination);
  }

  if (format === 'pretty') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: { translateTime: 'HH:MM:ss.l', ignore: 'pid,hostname', colorize: true },
      },
    });
  }

  return pino(options);
}

export const logger = createLogger({
  level: process.env['LOG_LEVEL'] ?? 'info',
  format: resolveLogFormat(),
});
