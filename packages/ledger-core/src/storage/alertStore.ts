import type { AlertRecord, NewAlertRecord } from '../schemas/index.js';

/**
 * Filters for listing stored alerts
 */
export interface AlertListFilter {
  /** Only records currently in this status */
  status?: string;

  /** Page size (default: 100) */
  limit?: number;

  /** Rows to skip (default: 0) */
  offset?: number;
}

/**
 * Durable alert state keyed by fingerprint.
 *
 * Implementations must enforce fingerprint uniqueness themselves: the
 * reconciler relies on `insert` failing with DuplicateKeyError when two
 * batches race to create the same alert. Every other failure surfaces as
 * a PersistenceError.
 */
export interface AlertStore {
  /** Point lookup; resolves undefined when the fingerprint is unknown */
  findByFingerprint(fingerprint: string): Promise<AlertRecord | undefined>;

  /** Insert a first-seen alert and return it with its assigned id */
  insert(record: NewAlertRecord): Promise<AlertRecord>;

  /** Update the two mutable fields of an existing record */
  updateStatusAndEndsAt(id: number, status: string, endsAt: number | null): Promise<void>;

  /** Newest first */
  list(filter?: AlertListFilter): Promise<AlertRecord[]>;

  count(filter?: Pick<AlertListFilter, 'status'>): Promise<number>;
}
