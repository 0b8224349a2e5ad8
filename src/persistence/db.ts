/**
 * Database initialization for SQLite usage persistence.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../shared/logger.js';

export const IN_MEMORY = ':memory:';

/**
 * Open the usage database. File-backed databases get WAL mode and the
 * usual performance pragmas; `:memory:` is opened as-is.
 */
export function initializeDatabase(dbPath: string): Database.Database {
  if (dbPath === IN_MEMORY) {
    const db = new Database(dbPath);
    logger.debug('In-memory SQLite database initialized');
    return db;
  }

  mkdirSync(dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('cache_size = -64000');
  db.pragma('temp_store = MEMORY');

  logger.info({ dbPath, journalMode: 'WAL' }, 'SQLite database initialized');

  return db;
}
