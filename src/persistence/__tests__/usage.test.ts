import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { initializeDatabase, IN_MEMORY } from '../db.js';
import { migrateSchema } from '../schema.js';
import { RequestLogger, type RequestLogEntry } from '../request-logger.js';
import { UsageAggregator } from '../aggregator.js';

function makeEntry(overrides: Partial<RequestLogEntry> = {}): RequestLogEntry {
  return {
    timestamp: 1_700_000_000_000,
    model: 'vendor/model-a',
    promptTokens: 10,
    completionTokens: 20,
    totalTokens: 30,
    priceTotal: 1.5,
    wordsTotal: 12,
    toolCalls: 0,
    latencyMs: 120.4,
    httpStatus: 200,
    ...overrides,
  };
}

describe('usage persistence', () => {
  let db: Database.Database;
  let requestLogger: RequestLogger;
  let aggregator: UsageAggregator;

  beforeEach(() => {
    db = initializeDatabase(IN_MEMORY);
    migrateSchema(db);
    requestLogger = new RequestLogger(db);
    aggregator = new UsageAggregator(db);
  });

  afterEach(() => {
    db.close();
  });

  it('sets the schema version and tolerates re-running migrations', () => {
    expect(db.pragma('user_version', { simple: true })).toBe(1);
    migrateSchema(db);
    expect(db.pragma('user_version', { simple: true })).toBe(1);
  });

  it('rolls up requests per model through the trigger', () => {
    requestLogger.logRequest(makeEntry());
    requestLogger.logRequest(
      makeEntry({
        timestamp: 1_700_000_001_000,
        promptTokens: 1,
        completionTokens: 2,
        totalTokens: 3,
        priceTotal: 0.5,
        wordsTotal: 3,
      }),
    );

    expect(aggregator.getModelUsage('vendor/model-a')).toEqual({
      model: 'vendor/model-a',
      totalRequests: 2,
      totalTokens: 33,
      totalPromptTokens: 11,
      totalCompletionTokens: 22,
      totalPrice: 2,
      totalWords: 15,
      lastRequestTimestamp: 1_700_000_001_000,
    });
  });

  it('returns null for a model with no usage', () => {
    expect(aggregator.getModelUsage('vendor/unknown')).toBeNull();
  });

  it('orders all model usage by most recent request', () => {
    requestLogger.logRequest(makeEntry({ model: 'vendor/model-a', timestamp: 1000 }));
    requestLogger.logRequest(makeEntry({ model: 'vendor/model-b', timestamp: 2000 }));

    expect(aggregator.getAllModelUsage().map((u) => u.model)).toEqual(['vendor/model-b', 'vendor/model-a']);
  });

  it('returns recent requests newest first with rounded latency', () => {
    requestLogger.logRequest(makeEntry({ timestamp: 1000 }));
    requestLogger.logRequest(
      makeEntry({ timestamp: 2000, httpStatus: 502, errorMessage: 'Backend returned 500', toolCalls: 2 }),
    );

    const rows = aggregator.getRecentRequests();

    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatchObject({ timestamp: 2000, httpStatus: 502, errorMessage: 'Backend returned 500', toolCalls: 2 });
    expect(rows[1]).toMatchObject({ timestamp: 1000, httpStatus: 200, errorMessage: null, latencyMs: 120 });
  });

  it('honours the recent request limit', () => {
    for (let i = 0; i < 5; i++) {
      requestLogger.logRequest(makeEntry({ timestamp: i }));
    }

    expect(aggregator.getRecentRequests(3).map((r) => r.timestamp)).toEqual([4, 3, 2]);
  });
});
