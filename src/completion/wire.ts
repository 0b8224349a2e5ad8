/**
 * Encoding of parsed completions into the OpenAI chat-completion wire shape.
 *
 * The one asymmetry with decoding: function arguments are decoded as
 * structured JSON but written back as a JSON-encoded string, which is what
 * OpenAI clients expect in `tool_calls[].function.arguments`.
 */

import { canonicalJson } from '../shared/json.js';
import type { Choice, Completion, FunctionData, Message, ToolCall, Usage } from './types.js';

export interface WireFunctionData {
  name: string;
  arguments: string;
}

export interface WireToolCall {
  type: 'function';
  id: string;
  function: WireFunctionData;
}

export interface WireAssistantMessage {
  role: 'assistant';
  content: string | null;
  tool_calls?: WireToolCall[];
}

export type WireMessage =
  | { role: 'user' | 'system' | 'tool'; content: string }
  | WireAssistantMessage;

export interface WireChoice {
  message: WireMessage;
  index: number;
  finish_reason: string;
}

export interface WireCompletion {
  choices: WireChoice[];
  object: string;
  id: string;
  model: string;
  created: number;
  usage: Usage;
}

export function toWireFunctionData(data: FunctionData): WireFunctionData {
  return { name: data.name, arguments: canonicalJson(data.arguments) };
}

export function toWireToolCall(call: ToolCall): WireToolCall {
  switch (call.type) {
    case 'function':
      return { type: 'function', id: call.id, function: toWireFunctionData(call.function) };
  }
}

/** Absent assistant content is written as `null`; absent tool calls are omitted. */
export function toWireMessage(message: Message): WireMessage {
  switch (message.role) {
    case 'assistant': {
      const wire: WireAssistantMessage = { role: 'assistant', content: message.content ?? null };
      if (message.tool_calls !== undefined) {
        wire.tool_calls = message.tool_calls.map(toWireToolCall);
      }
      return wire;
    }
    case 'user':
    case 'system':
    case 'tool':
      return { role: message.role, content: message.content };
  }
}

function toWireChoice(choice: Choice): WireChoice {
  return {
    message: toWireMessage(choice.message),
    index: choice.index,
    finish_reason: choice.finish_reason,
  };
}

export function toWireCompletion(completion: Completion): WireCompletion {
  return {
    choices: completion.choices.map(toWireChoice),
    object: completion.object,
    id: completion.id,
    model: completion.model,
    created: completion.created,
    usage: { ...completion.usage },
  };
}
