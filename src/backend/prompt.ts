/**
 * Flattening of an OpenAI chat conversation into the single text prompt the
 * backend accepts.
 *
 * When tools are offered, a preamble asks the model to reply with
 * `<tool_call>` blocks, which completion/tool-calls.ts later turns back into
 * structured calls.
 */

import type { ChatMessage, ChatToolCall, Tool } from '../shared/types.js';

/** Render tool definitions and the calling convention. */
export function renderToolPreamble(tools: Tool[]): string {
  const definitions = tools.map((tool) => JSON.stringify(tool.function)).join('\n');
  return [
    'You can call the following tools:',
    '<tools>',
    definitions,
    '</tools>',
    'To call a tool, answer only with one block per call, in the order the calls should run:',
    '<tool_call>{"name": "<tool name>", "arguments": {<arguments object>}}</tool_call>',
  ].join('\n');
}

/** A previous call rendered back into the markup the model is asked to produce. */
export function renderToolCall(call: ChatToolCall): string {
  let args: unknown;
  try {
    args = JSON.parse(call.function.arguments);
  } catch {
    // Clients may echo back arguments that were never valid JSON; keep them as a string.
    args = call.function.arguments;
  }
  return `<tool_call>${JSON.stringify({ name: call.function.name, arguments: args })}</tool_call>`;
}

function renderMessage(message: ChatMessage): string {
  const content = message.content ?? '';

  switch (message.role) {
    case 'system':
    case 'user':
      return `${message.role}: ${content}`;
    case 'assistant': {
      const calls = (message.tool_calls ?? []).map(renderToolCall);
      return ['assistant:' + (content ? ` ${content}` : ''), ...calls].join('\n');
    }
    case 'tool': {
      let prefix = message.name ? `tool:${message.name}` : 'tool';
      if (message.tool_call_id) {
        prefix += `[${message.tool_call_id}]`;
      }
      return `${prefix}: ${content}`;
    }
  }
}

/**
 * Build the prompt text for a conversation.
 *
 * @example
 * renderPrompt([{ role: 'user', content: 'Hi' }])
 * // => 'user: Hi'
 */
export function renderPrompt(messages: ChatMessage[], tools: Tool[] = []): string {
  const sections: string[] = [];
  if (tools.length > 0) {
    sections.push(renderToolPreamble(tools));
  }
  for (const message of messages) {
    sections.push(renderMessage(message));
  }
  return sections.join('\n\n');
}
