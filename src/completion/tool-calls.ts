/**
 * Extraction of `<tool_call>` markup embedded in assistant text.
 *
 * Models without native function calling are prompted to answer with
 * blocks such as
 *
 *   <tool_call>{"name": "lookup", "arguments": {"id": 7}}</tool_call>
 *
 * This module turns those blocks into structured tool calls.
 */

import { MarkupDecodeError } from '../shared/errors.js';
import { parseJson } from '../shared/json.js';
import { FunctionDataSchema } from './schema.js';
import type { FunctionData, Message, ToolCall } from './types.js';

export const TOOL_CALL_OPEN = '<tool_call>';
export const TOOL_CALL_CLOSE = '</tool_call>';

/** Every extracted call gets this id; downstream consumers match on it. */
export const TOOL_CALL_ID = 'func';

const SPAN_PATTERN = /<tool_call>([\s\S]*?)<\/tool_call>/g;

/**
 * True when the text carries either marker. One marker alone is enough to
 * attempt extraction.
 */
export function containsToolCallMarkup(text: string): boolean {
  return text.includes(TOOL_CALL_OPEN) || text.includes(TOOL_CALL_CLOSE);
}

/**
 * Return the trimmed inner text of each `<tool_call>...</tool_call>` span,
 * left to right. Newlines are removed before scanning so JSON bodies may
 * span several lines.
 */
export function findToolCallSpans(text: string): string[] {
  const flattened = text.replaceAll('\n', '');
  return Array.from(flattened.matchAll(SPAN_PATTERN), (match) => (match[1] ?? '').trim());
}

/**
 * Decode one span into `{ name, arguments }`. Integers too large for a
 * double keep their exact digits.
 * @throws MarkupDecodeError if the span is not JSON or lacks a required field.
 */
export function decodeFunctionData(span: string): FunctionData {
  let parsed: unknown;
  try {
    parsed = parseJson(span);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new MarkupDecodeError(span, message, { cause: err });
  }

  const result = FunctionDataSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new MarkupDecodeError(span, issues, { cause: result.error });
  }

  return result.data;
}

/**
 * Move tool-call markup out of an assistant message's content.
 *
 * Returns the input message itself when there is nothing to do (other
 * roles, no content, no markers). Otherwise returns a new assistant message
 * with `content` absent and one tool call per span. Decoding is
 * all-or-nothing: if any span is invalid this throws and the input is left
 * as it was.
 *
 * @throws MarkupDecodeError
 */
export function extractToolCalls(message: Message): Message {
  if (message.role !== 'assistant' || message.content === undefined) {
    return message;
  }
  if (!containsToolCallMarkup(message.content)) {
    return message;
  }

  const toolCalls: ToolCall[] = findToolCallSpans(message.content).map((span) => ({
    type: 'function',
    id: TOOL_CALL_ID,
    function: decodeFunctionData(span),
  }));

  const { content: _content, ...rest } = message;
  return { ...rest, tool_calls: toolCalls };
}
