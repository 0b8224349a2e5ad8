/**
 * Read access to usage statistics.
 * Per-model totals come from the trigger-maintained usage_by_model table.
 */

import type Database from 'better-sqlite3';

export interface ModelUsage {
  model: string;
  totalRequests: number;
  totalTokens: number;
  totalPromptTokens: number;
  totalCompletionTokens: number;
  totalPrice: number;
  totalWords: number;
  lastRequestTimestamp: number | null;
}

export interface RequestLogRow {
  id: number;
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
  errorMessage: string | null;
}

const MODEL_USAGE_COLUMNS = `
  model,
  total_requests as totalRequests,
  total_tokens as totalTokens,
  total_prompt_tokens as totalPromptTokens,
  total_completion_tokens as totalCompletionTokens,
  total_price as totalPrice,
  total_words as totalWords,
  last_request_timestamp as lastRequestTimestamp
`;

export class UsageAggregator {
  private getAllModelUsageStmt: Database.Statement;
  private getModelUsageStmt: Database.Statement;
  private getRecentRequestsStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.getAllModelUsageStmt = db.prepare(`
      SELECT ${MODEL_USAGE_COLUMNS}
      FROM usage_by_model
      ORDER BY last_request_timestamp DESC
    `);

    this.getModelUsageStmt = db.prepare(`
      SELECT ${MODEL_USAGE_COLUMNS}
      FROM usage_by_model
      WHERE model = ?
    `);

    this.getRecentRequestsStmt = db.prepare(`
      SELECT
        id,
        timestamp,
        model,
        prompt_tokens as promptTokens,
        completion_tokens as completionTokens,
        total_tokens as totalTokens,
        price_total as priceTotal,
        words_total as wordsTotal,
        tool_calls as toolCalls,
        latency_ms as latencyMs,
        http_status as httpStatus,
        error_message as errorMessage
      FROM request_logs
      ORDER BY timestamp DESC, id DESC
      LIMIT ?
    `);
  }

  getAllModelUsage(): ModelUsage[] {
    return this.getAllModelUsageStmt.all() as ModelUsage[];
  }

  getModelUsage(model: string): ModelUsage | null {
    return (this.getModelUsageStmt.get(model) as ModelUsage | undefined) ?? null;
  }

  /** Most recent requests first. */
  getRecentRequests(limit: number = 50): RequestLogRow[] {
    return this.getRecentRequestsStmt.all(limit) as RequestLogRow[];
  }
}
