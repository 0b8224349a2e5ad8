/**
 * Zod schemas for incoming OpenAI-compatible request bodies.
 */

import { z } from 'zod';
import type { ChatCompletionRequest, ImageGenerationRequest } from '../shared/types.js';

const ChatToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function'),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string().nullable().default(null),
  name: z.string().optional(),
  tool_calls: z.array(ChatToolCallSchema).optional(),
  tool_call_id: z.string().optional(),
});

const ToolSchema = z.object({
  type: z.literal('function'),
  function: z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    parameters: z.record(z.string(), z.unknown()).optional(),
  }),
});

export const ChatCompletionRequestSchema = z.object({
  model: z.string().optional(),
  messages: z.array(ChatMessageSchema).min(1, { message: 'messages must not be empty' }),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  stream: z.boolean().optional(),
  tools: z.array(ToolSchema).optional(),
}) satisfies z.ZodType<ChatCompletionRequest, unknown>;

export const ImageGenerationRequestSchema = z.object({
  model: z.string().optional(),
  prompt: z.string().min(1, { message: 'prompt must not be empty' }),
  size: z.enum(['square', 'landscape', 'enlarged']).optional(),
  n: z.number().int().min(1).max(4).optional(),
}) satisfies z.ZodType<ImageGenerationRequest, unknown>;
