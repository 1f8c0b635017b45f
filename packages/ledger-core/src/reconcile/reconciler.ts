import pino from 'pino';
import { DuplicateKeyError, SerializationError, ValidationError, toOutcomeError } from '../errors.js';
import { normalizeBatch, rawFingerprint } from '../normalize/index.js';
import { AlertEventSchema, type AlertEvent, type AlertRecord, type LabelSet } from '../schemas/index.js';
import type { AlertStore } from '../storage/index.js';
import { serializeLabelSet } from '../utils/index.js';
import { type BatchResult, type EventOutcome, summarize } from './outcomes.js';
import { type OutcomeReporter, noopReporter } from './reporter.js';

/**
 * Options for building a reconciler
 */
export interface ReconcilerOptions {
  store: AlertStore;

  /** Counter sink (default: discards everything) */
  reporter?: OutcomeReporter;

  /** Logger for failed events and batch summaries (default: silent) */
  logger?: pino.BaseLogger;

  /** Clock for `createdAt`, epoch milliseconds (default: Date.now) */
  now?: () => number;

  /** Label/annotation encoder (default: sorted-key JSON) */
  serializeLabels?: (labels: LabelSet) => string;
}

/**
 * Reconciler - applies incoming alert events to stored alert state
 *
 * For every event, in order, exactly one outcome applies:
 * - unknown fingerprint: insert a new record (`new`)
 * - known fingerprint, different status: update status and endsAt (`updated`)
 * - known fingerprint, same status: nothing is written (`duplicate`)
 * - any failure: the event is skipped and reported (`error`)
 *
 * Failures never stop the batch. The reconciler keeps no state between
 * calls, so concurrent batches only meet at the store. When a first insert
 * loses a race to a concurrent batch, the event is re-read and applied as
 * a transition against the winner's record.
 */
export class Reconciler {
  private readonly store: AlertStore;
  private readonly reporter: OutcomeReporter;
  private readonly logger: pino.BaseLogger;
  private readonly now: () => number;
  private readonly serializeLabels: (labels: LabelSet) => string;

  constructor(options: ReconcilerOptions) {
    this.store = options.store;
    this.reporter = options.reporter ?? noopReporter;
    this.logger = options.logger ?? pino({ level: 'silent' });
    this.now = options.now ?? Date.now;
    this.serializeLabels = options.serializeLabels ?? serializeLabelSet;
  }

  /**
   * Reconcile a batch of already-normalized events.
   *
   * Events that do not match the canonical shape (an empty fingerprint,
   * a non-integer timestamp) take a `validation` error in their slot.
   */
  async reconcile(batch: readonly AlertEvent[]): Promise<BatchResult> {
    this.report((r) => r.incrementReceived(batch.length));

    const outcomes: EventOutcome[] = [];
    for (const [index, event] of batch.entries()) {
      const checked = AlertEventSchema.safeParse(event);
      if (checked.success) {
        outcomes.push(await this.reconcileEvent(checked.data, index));
      } else {
        outcomes.push(this.fail(index, rawFingerprint(event), ValidationError.fromZodError(checked.error)));
      }
    }

    return this.finish(outcomes, batch.length);
  }

  /**
   * Normalize and reconcile a batch of raw webhook alerts.
   *
   * Invalid events take a `validation` error in their own slot; the valid
   * ones around them are reconciled as usual.
   */
  async processBatch(raws: readonly unknown[]): Promise<BatchResult> {
    this.report((r) => r.incrementReceived(raws.length));

    const outcomes: EventOutcome[] = [];
    for (const [index, item] of normalizeBatch(raws).entries()) {
      if (item.ok) {
        outcomes.push(await this.reconcileEvent(item.event, index));
      } else {
        outcomes.push(this.fail(index, item.fingerprint, item.error));
      }
    }

    return this.finish(outcomes, raws.length);
  }

  private async reconcileEvent(event: AlertEvent, index: number): Promise<EventOutcome> {
    let existing: AlertRecord | undefined;
    try {
      existing = await this.store.findByFingerprint(event.fingerprint);
    } catch (err) {
      return this.fail(index, event.fingerprint, err);
    }

    if (!existing) {
      return this.create(event, index);
    }
    return this.transition(existing, event, index);
  }

  private async create(event: AlertEvent, index: number): Promise<EventOutcome> {
    let labelsJson: string;
    let annotationsJson: string;
    try {
      labelsJson = this.serializeLabels(event.labels);
      annotationsJson = this.serializeLabels(event.annotations);
    } catch (err) {
      const error = new SerializationError(
        `failed to serialize labels of ${event.fingerprint}`,
        { cause: err },
      );
      return this.fail(index, event.fingerprint, error);
    }

    try {
      await this.store.insert({
        fingerprint: event.fingerprint,
        status: event.status,
        labelsJson,
        annotationsJson,
        startsAt: event.startsAt,
        endsAt: event.endsAt,
        createdAt: this.now(),
      });
    } catch (err) {
      if (err instanceof DuplicateKeyError) {
        return this.retryAsTransition(event, index, err);
      }
      return this.fail(index, event.fingerprint, err);
    }

    this.report((r) => r.incrementNew());
    return { index, fingerprint: event.fingerprint, outcome: 'new' };
  }

  /**
   * A concurrent batch created the record between our lookup and insert.
   * Re-read it once and treat this event as a sighting of a known alert.
   */
  private async retryAsTransition(
    event: AlertEvent,
    index: number,
    conflict: DuplicateKeyError,
  ): Promise<EventOutcome> {
    let current: AlertRecord | undefined;
    try {
      current = await this.store.findByFingerprint(event.fingerprint);
    } catch (err) {
      return this.fail(index, event.fingerprint, err);
    }

    if (!current) {
      return this.fail(index, event.fingerprint, conflict);
    }

    this.logger.debug({ fingerprint: event.fingerprint }, 'insert lost race, applying as transition');
    return this.transition(current, event, index);
  }

  private async transition(
    existing: AlertRecord,
    event: AlertEvent,
    index: number,
  ): Promise<EventOutcome> {
    if (existing.status === event.status) {
      this.report((r) => r.incrementDuplicate());
      return { index, fingerprint: event.fingerprint, outcome: 'duplicate' };
    }

    try {
      await this.store.updateStatusAndEndsAt(existing.id, event.status, event.endsAt);
    } catch (err) {
      return this.fail(index, event.fingerprint, err);
    }

    this.report((r) => r.incrementUpdated());
    return { index, fingerprint: event.fingerprint, outcome: 'updated' };
  }

  private fail(index: number, fingerprint: string | null, err: unknown): EventOutcome {
    const error = toOutcomeError(err);
    this.logger.warn({ index, fingerprint, kind: error.kind, err }, 'alert not reconciled');
    this.report((r) => r.incrementError(error.kind));
    return { index, fingerprint, outcome: 'error', error };
  }

  private finish(outcomes: EventOutcome[], received: number): BatchResult {
    const result = summarize(outcomes, received);
    this.logger.debug({ counts: result.counts }, 'batch reconciled');
    return result;
  }

  /**
   * Metrics are best-effort: a failing reporter never changes an outcome
   */
  private report(increment: (reporter: OutcomeReporter) => void): void {
    try {
      increment(this.reporter);
    } catch (err) {
      this.logger.warn({ err }, 'outcome reporter failed');
    }
  }
}

/**
 * Create a reconciler
 */
export function createReconciler(options: ReconcilerOptions): Reconciler {
  return new Reconciler(options);
}
