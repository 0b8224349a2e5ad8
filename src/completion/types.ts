/**
 * Data shapes for a backend completion response.
 * Pure data: decoding lives in schema.ts, encoding in wire.ts.
 */

import type { JsonValue } from '../shared/json.js';

/** Function name plus its structured (already decoded) arguments. */
export interface FunctionData {
  name: string;
  arguments: JsonValue;
}

/** A function invocation recovered from an assistant message. */
export interface FunctionToolCall {
  type: 'function';
  id: string;
  function: FunctionData;
}

/** Only function calls exist today; keep the union so new kinds stay exhaustive. */
export type ToolCall = FunctionToolCall;

export interface UserMessage {
  role: 'user';
  content: string;
}

/**
 * Assistant output. Before parsing `tool_calls` is absent and `content` may
 * carry `<tool_call>` markup; after a successful extraction `content` is
 * absent and `tool_calls` holds the calls in source order.
 */
export interface AssistantMessage {
  role: 'assistant';
  content?: string;
  tool_calls?: ToolCall[];
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface ToolMessage {
  role: 'tool';
  content: string;
}

export type Message = UserMessage | AssistantMessage | SystemMessage | ToolMessage;

/** One candidate response within a completion. */
export interface Choice {
  message: Message;
  /** Zero-based position; mirrors the choice's place in `choices`. */
  index: number;
  /** Provider-supplied stop label, e.g. "stop", "length", "end_turn". */
  finish_reason: string;
}

/** Token counters, passed through as received. */
export interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface Completion {
  id: string;
  object: string;
  model: string;
  /** Unix timestamp (seconds). */
  created: number;
  usage: Usage;
  choices: Choice[];
}

export interface Price {
  input: number;
  output: number;
  total: number;
}

export interface Words {
  input: number;
  output: number;
  total: number;
}

/** A single model's completion with the backend's bookkeeping for it. */
export interface Model {
  completion: Completion;
  price: Price;
  words: Words;
}

/**
 * Parallel results for one prompt, keyed by an opaque label (usually the
 * model name). Key order carries no meaning.
 */
export interface CompletionData {
  completions: Record<string, Model>;
  overall_price: Price;
  overall_words: Words;
}
