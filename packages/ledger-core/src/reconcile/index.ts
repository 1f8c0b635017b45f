export { Reconciler, createReconciler } from './reconciler.js';
export type { ReconcilerOptions } from './reconciler.js';
export { summarize, httpStatusFor } from './outcomes.js';
export type { OutcomeKind, EventOutcome, BatchCounts, BatchResult } from './outcomes.js';
export { noopReporter } from './reporter.js';
export type { OutcomeReporter } from './reporter.js';
