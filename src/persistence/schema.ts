/**
 * Database schema migration system using PRAGMA user_version.
 * Manages schema evolution with idempotent migrations.
 */

import type Database from 'better-sqlite3';
import { logger } from '../shared/logger.js';

/**
 * Run schema migrations to bring database to current version.
 * @param db - Database instance to migrate
 */
export function migrateSchema(db: Database.Database): void {
  const currentVersion = Number(db.pragma('user_version', { simple: true }));
  logger.debug({ currentVersion }, 'Database schema version check');

  const migrations: Array<() => void> = [
    // 1: request log plus a trigger-maintained per-model rollup
    () => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS request_logs (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          timestamp INTEGER NOT NULL,
          model TEXT NOT NULL,
          prompt_tokens INTEGER NOT NULL DEFAULT 0,
          completion_tokens INTEGER NOT NULL DEFAULT 0,
          total_tokens INTEGER NOT NULL DEFAULT 0,
          price_total REAL NOT NULL DEFAULT 0,
          words_total INTEGER NOT NULL DEFAULT 0,
          tool_calls INTEGER NOT NULL DEFAULT 0,
          latency_ms INTEGER NOT NULL,
          http_status INTEGER NOT NULL,
          error_message TEXT
        );

        CREATE TABLE IF NOT EXISTS usage_by_model (
          model TEXT PRIMARY KEY,
          total_requests INTEGER NOT NULL DEFAULT 0,
          total_tokens INTEGER NOT NULL DEFAULT 0,
          total_prompt_tokens INTEGER NOT NULL DEFAULT 0,
          total_completion_tokens INTEGER NOT NULL DEFAULT 0,
          total_price REAL NOT NULL DEFAULT 0,
          total_words INTEGER NOT NULL DEFAULT 0,
          last_request_timestamp INTEGER
        );

        CREATE INDEX IF NOT EXISTS idx_logs_timestamp ON request_logs(timestamp DESC);
        CREATE INDEX IF NOT EXISTS idx_logs_model ON request_logs(model);

        CREATE TRIGGER IF NOT EXISTS update_model_usage
        AFTER INSERT ON request_logs
        BEGIN
          INSERT INTO usage_by_model (
            model,
            total_requests,
            total_tokens,
            total_prompt_tokens,
            total_completion_tokens,
            total_price,
            total_words,
            last_request_timestamp
          )
          VALUES (
            NEW.model,
            1,
            NEW.total_tokens,
            NEW.prompt_tokens,
            NEW.completion_tokens,
            NEW.price_total,
            NEW.words_total,
            NEW.timestamp
          )
          ON CONFLICT(model) DO UPDATE SET
            total_requests = total_requests + 1,
            total_tokens = total_tokens + NEW.total_tokens,
            total_prompt_tokens = total_prompt_tokens + NEW.prompt_tokens,
            total_completion_tokens = total_completion_tokens + NEW.completion_tokens,
            total_price = total_price + NEW.price_total,
            total_words = total_words + NEW.words_total,
            last_request_timestamp = MAX(last_request_timestamp, NEW.timestamp);
        END;
      `);
    },
  ];

  for (let i = currentVersion; i < migrations.length; i++) {
    const targetVersion = i + 1;
    logger.info({ from: currentVersion, to: targetVersion }, 'Running database migration');
    migrations[i]?.();
    db.pragma(`user_version = ${targetVersion}`);
  }

  if (currentVersion < migrations.length) {
    logger.info({ version: migrations.length }, 'Database migrations complete');
  }
}
