import type { ErrorKind } from '../errors.js';

/**
 * Sink for per-outcome counters.
 *
 * Each increment is made once per classified event, after the store step
 * for that event has succeeded.
 */
export interface OutcomeReporter {
  incrementReceived(count: number): void;
  incrementNew(): void;
  incrementDuplicate(): void;
  incrementUpdated(): void;
  incrementError(kind: ErrorKind): void;
}

export const noopReporter: OutcomeReporter = {
  incrementReceived: () => {},
  incrementNew: () => {},
  incrementDuplicate: () => {},
  incrementUpdated: () => {},
  incrementError: () => {},
};
