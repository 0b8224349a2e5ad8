/**
 * Finish-reason reconciliation for parsed choices.
 */

import type { Choice } from './types.js';

/**
 * Compute the finish reason a choice should report once markup extraction
 * has run.
 *
 * For assistant messages, absent content always means the answer is a set
 * of tool calls, whatever the provider said. Anthropic-style `end_turn` is
 * mapped to OpenAI's `stop`. Every other label, and every non-assistant
 * choice, is kept as-is.
 */
export function normalizeFinishReason(choice: Choice): string {
  const { message, finish_reason } = choice;

  if (message.role !== 'assistant') {
    return finish_reason;
  }
  if (message.content === undefined) {
    return 'tool_calls';
  }
  if (finish_reason === 'end_turn') {
    return 'stop';
  }
  return finish_reason;
}
