/**
 * Request logger for insertion of per-request usage rows.
 */

import type Database from 'better-sqlite3';

/** One proxied completion request. Price and words are the backend's figures. */
export interface RequestLogEntry {
  timestamp: number;
  model: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  priceTotal: number;
  wordsTotal: number;
  toolCalls: number;
  latencyMs: number;
  httpStatus: number;
  errorMessage?: string;
}

/**
 * RequestLogger inserts request rows; the usage_by_model rollup is kept
 * current by a trigger.
 */
export class RequestLogger {
  private insertStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare(`
      INSERT INTO request_logs (
        timestamp,
        model,
        prompt_tokens,
        completion_tokens,
        total_tokens,
        price_total,
        words_total,
        tool_calls,
        latency_ms,
        http_status,
        error_message
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }

  logRequest(entry: RequestLogEntry): void {
    this.insertStmt.run(
      entry.timestamp,
      entry.model,
      entry.promptTokens,
      entry.completionTokens,
      entry.totalTokens,
      entry.priceTotal,
      entry.wordsTotal,
      entry.toolCalls,
      Math.round(entry.latencyMs),
      entry.httpStatus,
      entry.errorMessage ?? null,
    );
  }
}
