/**
 * Reduce a multi-model result set to a single completion.
 */

import { EmptySelectionError } from '../shared/errors.js';
import type { Completion, CompletionData, Model } from './types.js';

/**
 * Pick one labelled entry from the result set.
 *
 * The labels form an unordered mapping, so which entry comes back when
 * there are several is unspecified. Callers must not rely on it.
 *
 * @throws EmptySelectionError if there are no entries.
 */
export function getCompletionEntry(data: CompletionData): [label: string, model: Model] {
  const first = Object.entries(data.completions)[0];
  if (first === undefined) {
    throw new EmptySelectionError();
  }
  return first;
}

/**
 * The completion of one (arbitrary) entry in the result set.
 * @throws EmptySelectionError if there are no entries.
 */
export function getCompletion(data: CompletionData): Completion {
  return getCompletionEntry(data)[1].completion;
}
