import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type Database from 'better-sqlite3';
import { initDbWithInlineMigrations } from '../src/storage/db.js';
import { SqliteAlertStore } from '../src/storage/sqliteAlertStore.js';
import type { AlertListFilter, AlertStore } from '../src/storage/alertStore.js';
import { Reconciler, createReconciler, httpStatusFor } from '../src/reconcile/index.js';
import type { BatchResult, OutcomeReporter } from '../src/reconcile/index.js';
import { DuplicateKeyError, PersistenceError, type ErrorKind } from '../src/errors.js';
import type { AlertEvent, AlertRecord, NewAlertRecord } from '../src/schemas/index.js';

const T0 = 1714557600000; // 2024-05-01T10:00:00Z
const T1 = 1714564800000; // 2024-05-01T12:00:00Z
const NOW = 1714557601000;

let tmpDirs: string[] = [];
let dbs: Database.Database[] = [];

function openStore(): SqliteAlertStore {
  const dir = mkdtempSync(join(tmpdir(), 'ledger-reconcile-'));
  const db = initDbWithInlineMigrations(join(dir, 'test.db'));
  tmpDirs.push(dir);
  dbs.push(db);
  return new SqliteAlertStore(db);
}

afterEach(() => {
  for (const db of dbs) db.close();
  for (const dir of tmpDirs) rmSync(dir, { recursive: true, force: true });
  dbs = [];
  tmpDirs = [];
});

function makeEvent(overrides: Partial<AlertEvent> & { fingerprint: string }): AlertEvent {
  return {
    status: 'firing',
    labels: { alertname: 'HighLatency', service: 'checkout' },
    annotations: { summary: 'p99 above 2s' },
    startsAt: T0,
    endsAt: null,
    ...overrides,
  };
}

class RecordingReporter implements OutcomeReporter {
  received = 0;
  created = 0;
  duplicates = 0;
  updated = 0;
  errors: ErrorKind[] = [];

  incrementReceived(count: number): void {
    this.received += count;
  }
  incrementNew(): void {
    this.created += 1;
  }
  incrementDuplicate(): void {
    this.duplicates += 1;
  }
  incrementUpdated(): void {
    this.updated += 1;
  }
  incrementError(kind: ErrorKind): void {
    this.errors.push(kind);
  }
}

/**
 * Holds the first `parties` lookups until all of them have read the store,
 * so concurrent batches all see "not found" before any of them inserts.
 */
class BarrierStore implements AlertStore {
  private readonly inner: AlertStore;
  private parties: number;
  private readonly waiting: Array<() => void> = [];

  constructor(inner: AlertStore, parties: number) {
    this.inner = inner;
    this.parties = parties;
  }

  async findByFingerprint(fingerprint: string): Promise<AlertRecord | undefined> {
    const record = await this.inner.findByFingerprint(fingerprint);
    if (this.parties > 0) {
      this.parties -= 1;
      await new Promise<void>((resolve) => {
        this.waiting.push(resolve);
        if (this.parties === 0) {
          for (const release of this.waiting) release();
        }
      });
    }
    return record;
  }

  insert(record: NewAlertRecord): Promise<AlertRecord> {
    return this.inner.insert(record);
  }

  updateStatusAndEndsAt(id: number, status: string, endsAt: number | null): Promise<void> {
    return this.inner.updateStatusAndEndsAt(id, status, endsAt);
  }

  list(filter?: AlertListFilter): Promise<AlertRecord[]> {
    return this.inner.list(filter);
  }

  count(filter?: Pick<AlertListFilter, 'status'>): Promise<number> {
    return this.inner.count(filter);
  }
}

function outcomesOf(result: BatchResult): string[] {
  return result.outcomes.map((o) => o.outcome);
}

describe('Reconciler', () => {
  let store: SqliteAlertStore;
  let reporter: RecordingReporter;
  let reconciler: Reconciler;

  beforeEach(() => {
    store = openStore();
    reporter = new RecordingReporter();
    reconciler = createReconciler({ store, reporter, now: () => NOW });
  });

  describe('firing → firing → resolved', () => {
    it('creates, ignores the retransmission, then records the transition', async () => {
      const first = await reconciler.reconcile([makeEvent({ fingerprint: 'a1', status: 'firing' })]);
      expect(outcomesOf(first)).toEqual(['new']);

      const record = await store.findByFingerprint('a1');
      expect(record?.status).toBe('firing');

      const second = await reconciler.reconcile([makeEvent({ fingerprint: 'a1', status: 'firing' })]);
      expect(outcomesOf(second)).toEqual(['duplicate']);
      expect(await store.findByFingerprint('a1')).toEqual(record);

      const third = await reconciler.reconcile([
        makeEvent({ fingerprint: 'a1', status: 'resolved', endsAt: T1 }),
      ]);
      expect(outcomesOf(third)).toEqual(['updated']);

      const resolved = await store.findByFingerprint('a1');
      expect(resolved?.status).toBe('resolved');
      expect(resolved?.endsAt).toBe(T1);
    });
  });

  describe('idempotency', () => {
    it('persists exactly one record for a repeated event', async () => {
      const event = makeEvent({ fingerprint: 'idem' });

      expect(outcomesOf(await reconciler.reconcile([event]))).toEqual(['new']);
      expect(outcomesOf(await reconciler.reconcile([event]))).toEqual(['duplicate']);
      expect(await store.count()).toBe(1);
    });

    it('does not rewrite endsAt on a same-status retransmission', async () => {
      await reconciler.reconcile([makeEvent({ fingerprint: 'idem', status: 'resolved', endsAt: T0 })]);
      await reconciler.reconcile([makeEvent({ fingerprint: 'idem', status: 'resolved', endsAt: T1 })]);

      const record = await store.findByFingerprint('idem');
      expect(record?.endsAt).toBe(T0);
    });
  });

  describe('transitions', () => {
    it('keeps immutable fields from the first sighting', async () => {
      await reconciler.reconcile([makeEvent({ fingerprint: 'F' })]);
      const created = await store.findByFingerprint('F');

      const later = createReconciler({ store, now: () => NOW + 60_000 });
      await later.reconcile([
        makeEvent({
          fingerprint: 'F',
          status: 'resolved',
          labels: { alertname: 'Renamed' },
          annotations: { summary: 'changed' },
          startsAt: T0 + 5_000,
          endsAt: T1,
        }),
      ]);

      const updated = await store.findByFingerprint('F');
      expect(updated).toEqual({
        id: created?.id,
        fingerprint: 'F',
        status: 'resolved',
        labelsJson: '{"alertname":"HighLatency","service":"checkout"}',
        annotationsJson: '{"summary":"p99 above 2s"}',
        startsAt: T0,
        endsAt: T1,
        createdAt: NOW,
      });
    });

    it('allows any status value to follow any other', async () => {
      const result = await reconciler.reconcile([
        makeEvent({ fingerprint: 'cycle', status: 'firing' }),
        makeEvent({ fingerprint: 'cycle', status: 'resolved', endsAt: T1 }),
        makeEvent({ fingerprint: 'cycle', status: 'firing', endsAt: null }),
      ]);

      expect(outcomesOf(result)).toEqual(['new', 'updated', 'updated']);
      const record = await store.findByFingerprint('cycle');
      expect(record?.status).toBe('firing');
      expect(record?.endsAt).toBeNull();
    });
  });

  describe('order independence', () => {
    it('reaches the same state in one batch or two', async () => {
      const event = makeEvent({ fingerprint: 'A', status: 'firing' });

      const oneBatch = openStore();
      const oneResult = await createReconciler({ store: oneBatch, now: () => NOW }).reconcile([event, event]);

      const twoBatches = openStore();
      const split = createReconciler({ store: twoBatches, now: () => NOW });
      await split.reconcile([event]);
      await split.reconcile([event]);

      expect(outcomesOf(oneResult)).toEqual(['new', 'duplicate']);
      expect(await oneBatch.list()).toEqual(await twoBatches.list());
    });
  });

  describe('counters', () => {
    it('reports each outcome once', async () => {
      await reconciler.reconcile([
        makeEvent({ fingerprint: 'x' }),
        makeEvent({ fingerprint: 'x' }),
        makeEvent({ fingerprint: 'x', status: 'resolved' }),
        makeEvent({ fingerprint: 'y' }),
      ]);

      expect(reporter.received).toBe(4);
      expect(reporter.created).toBe(2);
      expect(reporter.duplicates).toBe(1);
      expect(reporter.updated).toBe(1);
      expect(reporter.errors).toEqual([]);
    });

    it('returns aggregate counts', async () => {
      const result = await reconciler.reconcile([
        makeEvent({ fingerprint: 'x' }),
        makeEvent({ fingerprint: 'x' }),
        makeEvent({ fingerprint: 'x', status: 'resolved' }),
      ]);

      expect(result.counts).toEqual({ received: 3, new: 1, updated: 1, duplicate: 1, error: 0 });
    });

    it('keeps reconciling when the reporter throws', async () => {
      const broken: OutcomeReporter = {
        incrementReceived: () => {
          throw new Error('sink down');
        },
        incrementNew: () => {
          throw new Error('sink down');
        },
        incrementDuplicate: () => {
          throw new Error('sink down');
        },
        incrementUpdated: () => {
          throw new Error('sink down');
        },
        incrementError: () => {
          throw new Error('sink down');
        },
      };
      const tolerant = createReconciler({ store, reporter: broken });

      const result = await tolerant.reconcile([makeEvent({ fingerprint: 'z' }), makeEvent({ fingerprint: 'z' })]);

      expect(outcomesOf(result)).toEqual(['new', 'duplicate']);
      expect(await store.count()).toBe(1);
    });

    it('handles an empty batch', async () => {
      const result = await reconciler.reconcile([]);

      expect(result).toEqual({
        outcomes: [],
        counts: { received: 0, new: 0, updated: 0, duplicate: 0, error: 0 },
      });
    });
  });

  describe('store failures', () => {
    it('records a failed lookup and continues with the next event', async () => {
      vi.spyOn(store, 'findByFingerprint').mockRejectedValueOnce(new PersistenceError('database is locked'));

      const result = await reconciler.reconcile([makeEvent({ fingerprint: 'p' }), makeEvent({ fingerprint: 'q' })]);

      expect(result.outcomes).toEqual([
        {
          index: 0,
          fingerprint: 'p',
          outcome: 'error',
          error: { kind: 'persistence', message: 'database is locked' },
        },
        { index: 1, fingerprint: 'q', outcome: 'new' },
      ]);
      expect(await store.findByFingerprint('p')).toBeUndefined();
      expect(reporter.errors).toEqual(['persistence']);
      expect(reporter.created).toBe(1);
    });

    it('records a failed insert without counting it as new', async () => {
      vi.spyOn(store, 'insert').mockRejectedValueOnce(new PersistenceError('disk I/O error'));

      const result = await reconciler.reconcile([makeEvent({ fingerprint: 'ins' })]);

      expect(result.outcomes[0]).toEqual({
        index: 0,
        fingerprint: 'ins',
        outcome: 'error',
        error: { kind: 'persistence', message: 'disk I/O error' },
      });
      expect(reporter.created).toBe(0);
    });

    it('records a failed update and leaves the record untouched', async () => {
      await reconciler.reconcile([makeEvent({ fingerprint: 'upd' })]);
      vi.spyOn(store, 'updateStatusAndEndsAt').mockRejectedValueOnce(new PersistenceError('readonly database'));

      const result = await reconciler.reconcile([makeEvent({ fingerprint: 'upd', status: 'resolved', endsAt: T1 })]);

      expect(result.outcomes[0]?.outcome).toBe('error');
      expect((await store.findByFingerprint('upd'))?.status).toBe('firing');
      expect(reporter.updated).toBe(0);
      expect(reporter.errors).toEqual(['persistence']);
    });

    it('classifies unexpected throws as persistence errors', async () => {
      vi.spyOn(store, 'findByFingerprint').mockRejectedValueOnce('connection reset');

      const result = await reconciler.reconcile([makeEvent({ fingerprint: 'odd' })]);

      expect(result.outcomes[0]).toEqual({
        index: 0,
        fingerprint: 'odd',
        outcome: 'error',
        error: { kind: 'persistence', message: 'connection reset' },
      });
    });
  });

  describe('serialization failures', () => {
    it('skips the event when labels cannot be encoded', async () => {
      const strict = createReconciler({
        store,
        reporter,
        serializeLabels: () => {
          throw new Error('unsupported value');
        },
      });

      const result = await strict.reconcile([makeEvent({ fingerprint: 'ser' })]);

      expect(result.outcomes[0]).toEqual({
        index: 0,
        fingerprint: 'ser',
        outcome: 'error',
        error: { kind: 'serialization', message: 'failed to serialize labels of ser' },
      });
      expect(await store.count()).toBe(0);
      expect(reporter.errors).toEqual(['serialization']);
    });
  });

  describe('concurrent first sightings', () => {
    it('yields one new and one updated outcome and a single record', async () => {
      const gated = new BarrierStore(store, 2);
      const racer = createReconciler({ store: gated, reporter, now: () => NOW });

      const firing = makeEvent({ fingerprint: 'race', status: 'firing' });
      const resolved = makeEvent({ fingerprint: 'race', status: 'resolved', endsAt: T1 });

      const results = await Promise.all([racer.reconcile([firing]), racer.reconcile([resolved])]);
      const outcomes = results.map((r) => r.outcomes[0]?.outcome);

      expect([...outcomes].sort()).toEqual(['new', 'updated']);
      expect(await store.count()).toBe(1);

      const updatedIndex = outcomes.indexOf('updated');
      const winner = updatedIndex === 0 ? firing : resolved;
      expect((await store.findByFingerprint('race'))?.status).toBe(winner.status);
      expect(reporter.created).toBe(1);
      expect(reporter.updated).toBe(1);
    });

    it('treats a lost race with the same status as a duplicate', async () => {
      const gated = new BarrierStore(store, 2);
      const racer = createReconciler({ store: gated, now: () => NOW });
      const event = makeEvent({ fingerprint: 'race-same' });

      const results = await Promise.all([racer.reconcile([event]), racer.reconcile([event])]);

      expect(results.map((r) => r.outcomes[0]?.outcome).sort()).toEqual(['duplicate', 'new']);
      expect(await store.count()).toBe(1);
    });

    it('reports the conflict when the winning record cannot be found', async () => {
      vi.spyOn(store, 'insert').mockRejectedValueOnce(new DuplicateKeyError('ghost'));

      const result = await reconciler.reconcile([makeEvent({ fingerprint: 'ghost' })]);

      expect(result.outcomes[0]).toEqual({
        index: 0,
        fingerprint: 'ghost',
        outcome: 'error',
        error: { kind: 'duplicate_key', message: 'alert with fingerprint ghost already exists' },
      });
      expect(reporter.errors).toEqual(['duplicate_key']);
    });
  });

  describe('event validation', () => {
    it('rejects an empty fingerprint in its own slot', async () => {
      const result = await reconciler.reconcile([
        makeEvent({ fingerprint: '' }),
        makeEvent({ fingerprint: 'kept' }),
      ]);

      expect(result.outcomes).toEqual([
        {
          index: 0,
          fingerprint: null,
          outcome: 'error',
          error: { kind: 'validation', message: 'fingerprint: String must contain at least 1 character(s)' },
        },
        { index: 1, fingerprint: 'kept', outcome: 'new' },
      ]);
      expect(result.counts).toEqual({ received: 2, new: 1, updated: 0, duplicate: 0, error: 1 });
      expect(await store.count()).toBe(1);
      expect(reporter.errors).toEqual(['validation']);
    });

    it('rejects a fractional timestamp', async () => {
      const result = await reconciler.reconcile([makeEvent({ fingerprint: 'frac', startsAt: T0 + 0.5 })]);

      expect(result.outcomes[0]).toEqual({
        index: 0,
        fingerprint: 'frac',
        outcome: 'error',
        error: { kind: 'validation', message: 'startsAt: Expected integer, received float' },
      });
      expect(await store.findByFingerprint('frac')).toBeUndefined();
    });
  });

  describe('processBatch', () => {
    it('isolates an invalid event between two valid ones', async () => {
      const result = await reconciler.processBatch([
        { fingerprint: 'valid-1', status: 'firing', startsAt: '2024-05-01T10:00:00Z' },
        { fingerprint: '', status: 'firing' },
        { fingerprint: 'valid-2', status: 'firing', labels: { alertname: 'DiskFull' } },
      ]);

      expect(result.outcomes).toEqual([
        { index: 0, fingerprint: 'valid-1', outcome: 'new' },
        {
          index: 1,
          fingerprint: null,
          outcome: 'error',
          error: { kind: 'validation', message: 'fingerprint: required' },
        },
        { index: 2, fingerprint: 'valid-2', outcome: 'new' },
      ]);
      expect(result.counts).toEqual({ received: 3, new: 2, updated: 0, duplicate: 0, error: 1 });
      expect(await store.count()).toBe(2);
      expect((await store.findByFingerprint('valid-1'))?.startsAt).toBe(T0);
      expect(reporter.received).toBe(3);
      expect(reporter.errors).toEqual(['validation']);
    });

    it('stores normalized label sets', async () => {
      await reconciler.processBatch([
        { fingerprint: 'labels', status: 'firing', labels: { severity: 'page', alertname: 'Up' } },
      ]);

      const record = await store.findByFingerprint('labels');
      expect(record?.labelsJson).toBe('{"alertname":"Up","severity":"page"}');
      expect(record?.annotationsJson).toBe('{}');
    });
  });
});

describe('httpStatusFor', () => {
  const ok = { index: 0, fingerprint: 'a', outcome: 'new' } as const;

  it('returns 200 when every event was reconciled', () => {
    expect(httpStatusFor({ outcomes: [ok], counts: { received: 1, new: 1, updated: 0, duplicate: 0, error: 0 } })).toBe(
      200,
    );
  });

  it('returns 400 when the only failures are invalid events', () => {
    const result: BatchResult = {
      outcomes: [ok, { index: 1, fingerprint: null, outcome: 'error', error: { kind: 'validation', message: 'x' } }],
      counts: { received: 2, new: 1, updated: 0, duplicate: 0, error: 1 },
    };
    expect(httpStatusFor(result)).toBe(400);
  });

  it('returns 500 when any event hit the store', () => {
    const result: BatchResult = {
      outcomes: [
        { index: 0, fingerprint: null, outcome: 'error', error: { kind: 'validation', message: 'x' } },
        { index: 1, fingerprint: 'b', outcome: 'error', error: { kind: 'persistence', message: 'y' } },
      ],
      counts: { received: 2, new: 0, updated: 0, duplicate: 0, error: 2 },
    };
    expect(httpStatusFor(result)).toBe(500);
  });
});
