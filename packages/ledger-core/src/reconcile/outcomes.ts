import type { OutcomeError } from '../errors.js';

export type OutcomeKind = 'new' | 'updated' | 'duplicate' | 'error';

/**
 * What happened to one event of a batch. `index` is the event's position
 * in the submitted batch.
 */
export type EventOutcome =
  | { index: number; fingerprint: string; outcome: 'new' | 'updated' | 'duplicate' }
  | { index: number; fingerprint: string | null; outcome: 'error'; error: OutcomeError };

export interface BatchCounts {
  received: number;
  new: number;
  updated: number;
  duplicate: number;
  error: number;
}

export interface BatchResult {
  /** One entry per submitted event, in submission order */
  outcomes: EventOutcome[];
  counts: BatchCounts;
}

export function summarize(outcomes: EventOutcome[], received: number): BatchResult {
  const counts: BatchCounts = { received, new: 0, updated: 0, duplicate: 0, error: 0 };
  for (const outcome of outcomes) {
    counts[outcome.outcome] += 1;
  }
  return { outcomes, counts };
}

/**
 * HTTP status a transport should answer a batch with: 500 when any event
 * hit a store-side failure (worth retrying), 400 when the only failures
 * are invalid events, 200 otherwise.
 */
export function httpStatusFor(result: BatchResult): 200 | 400 | 500 {
  let invalid = false;
  for (const outcome of result.outcomes) {
    if (outcome.outcome !== 'error') continue;
    if (outcome.error.kind !== 'validation') return 500;
    invalid = true;
  }
  return invalid ? 400 : 200;
}
