/**
 * Zod schemas for decoding backend completion payloads.
 * Each schema's output type matches the corresponding interface in types.ts.
 */

import { z } from 'zod';
import { isJsonValue, type JsonValue } from '../shared/json.js';
import type {
  AssistantMessage,
  Completion,
  CompletionData,
  FunctionData,
  Message,
  Model,
} from './types.js';

/** Checked in place rather than rebuilt, so keys like "__proto__" and bigint values survive. */
const JsonValueSchema = z.custom<JsonValue>(isJsonValue, { message: 'Expected a JSON value' });

/** `{ name, arguments }` with both keys required; extra keys are dropped. */
export const FunctionDataSchema = z.object({
  name: z.string(),
  arguments: JsonValueSchema,
}) satisfies z.ZodType<FunctionData>;

export const ToolCallSchema = z.object({
  type: z.literal('function'),
  id: z.string(),
  function: FunctionDataSchema,
});

const AssistantMessageSchema = z
  .object({
    role: z.literal('assistant'),
    content: z.string().nullish(),
    tool_calls: z.array(ToolCallSchema).nullish(),
  })
  .transform((raw): AssistantMessage => {
    const message: AssistantMessage = { role: 'assistant' };
    if (raw.content !== null && raw.content !== undefined) {
      message.content = raw.content;
    }
    if (raw.tool_calls !== null && raw.tool_calls !== undefined) {
      message.tool_calls = raw.tool_calls;
    }
    return message;
  });

export const MessageSchema = z.union([
  z.object({ role: z.literal('user'), content: z.string() }),
  AssistantMessageSchema,
  z.object({ role: z.literal('system'), content: z.string() }),
  z.object({ role: z.literal('tool'), content: z.string() }),
]) satisfies z.ZodType<Message, unknown>;

export const UsageSchema = z.object({
  prompt_tokens: z.number().int().nonnegative(),
  completion_tokens: z.number().int().nonnegative(),
  total_tokens: z.number().int().nonnegative(),
});

export const ChoiceSchema = z.object({
  message: MessageSchema,
  index: z.number().int().min(0).max(255),
  finish_reason: z.string(),
});

export const CompletionSchema = z.object({
  choices: z.array(ChoiceSchema),
  object: z.string(),
  id: z.string(),
  model: z.string(),
  created: z.number().int().nonnegative(),
  usage: UsageSchema,
}) satisfies z.ZodType<Completion, unknown>;

export const PriceSchema = z.object({
  input: z.number(),
  output: z.number(),
  total: z.number(),
});

export const WordsSchema = z.object({
  input: z.number().int().nonnegative(),
  output: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
});

export const ModelSchema = z.object({
  completion: CompletionSchema,
  price: PriceSchema,
  words: WordsSchema,
}) satisfies z.ZodType<Model, unknown>;

export const CompletionDataSchema = z.object({
  completions: z.record(z.string(), ModelSchema),
  overall_price: PriceSchema,
  overall_words: WordsSchema,
}) satisfies z.ZodType<CompletionData, unknown>;
