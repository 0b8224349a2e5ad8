/**
 * OpenAI-compatible request/response type definitions.
 * These types define the contract between the proxy and its clients.
 */

/** A single message in an incoming chat conversation. */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string | null;
  name?: string;
  tool_calls?: ChatToolCall[];
  tool_call_id?: string;
}

/** A tool call as clients send it back in conversation history. */
export interface ChatToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

/** Tool definition for function calling. */
export interface Tool {
  type: 'function';
  function: {
    name: string;
    description?: string;
    parameters?: Record<string, unknown>;
  };
}

/** OpenAI-compatible chat completion request body. */
export interface ChatCompletionRequest {
  model?: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
  stream?: boolean;
  tools?: Tool[];
}

/** OpenAI-compatible image generation request body. */
export interface ImageGenerationRequest {
  model?: string;
  prompt: string;
  size?: 'square' | 'landscape' | 'enlarged';
  n?: number;
}

/** OpenAI-compatible error response. */
export interface OpenAIErrorResponse {
  error: {
    message: string;
    type: string;
    param: string | null;
    code: string | null;
  };
}

/** OpenAI-compatible models list response. */
export interface ModelsResponse {
  object: 'list';
  data: ModelInfo[];
}

/** A single model entry in the models list. */
export interface ModelInfo {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
}
