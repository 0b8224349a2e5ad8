/**
 * Post-processing pass over a decoded completion.
 */

import { logger } from '../shared/logger.js';
import { normalizeFinishReason } from './finish-reason.js';
import { extractToolCalls } from './tool-calls.js';
import type { Choice, Completion } from './types.js';

/**
 * Extract tool calls from a single choice and reconcile its finish reason.
 * Pure: returns the input choice when nothing changes, a new one otherwise.
 *
 * @throws MarkupDecodeError
 */
export function parseChoice(choice: Choice): Choice {
  const message = extractToolCalls(choice.message);
  const next: Choice = { ...choice, message };
  const finishReason = normalizeFinishReason(next);

  if (message === choice.message && finishReason === choice.finish_reason) {
    return choice;
  }
  return { ...next, finish_reason: finishReason };
}

/**
 * Run tool-call extraction and finish-reason normalization over every
 * choice, in index order, writing each result back into `completion.choices`.
 *
 * Fail-fast: the first MarkupDecodeError stops the pass and propagates.
 * Choices before the failing one have already been replaced with their
 * parsed form; the failing choice and the ones after it are untouched.
 * Callers that must not observe a half-parsed completion should pass a copy.
 *
 * @returns The same completion object, parsed. Treat it as immutable from here.
 * @throws MarkupDecodeError
 */
export function parseCompletion(completion: Completion): Completion {
  const { choices } = completion;

  for (let i = 0; i < choices.length; i++) {
    const choice = choices[i];
    if (choice === undefined) continue;

    const parsed = parseChoice(choice);
    if (parsed !== choice) {
      choices[i] = parsed;
      if (parsed.message.role === 'assistant' && parsed.message.tool_calls !== undefined) {
        logger.debug(
          { completionId: completion.id, index: parsed.index, toolCalls: parsed.message.tool_calls.length },
          'Extracted tool calls from assistant content',
        );
      }
    }
  }

  return completion;
}
