import type Database from 'better-sqlite3';
import { DuplicateKeyError, PersistenceError } from '../errors.js';
import { AlertRecordSchema, type AlertRecord, type NewAlertRecord } from '../schemas/index.js';
import type { AlertListFilter, AlertStore } from './alertStore.js';

interface AlertRow {
  id: number;
  fingerprint: string;
  status: string;
  labels_json: string;
  annotations_json: string;
  starts_at: number | null;
  ends_at: number | null;
  created_at: number;
}

function toRecord(row: AlertRow): AlertRecord {
  const parsed = AlertRecordSchema.safeParse({
    id: row.id,
    fingerprint: row.fingerprint,
    status: row.status,
    labelsJson: row.labels_json,
    annotationsJson: row.annotations_json,
    startsAt: row.starts_at,
    endsAt: row.ends_at,
    createdAt: row.created_at,
  });
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`stored alert ${row.id} is malformed: ${issues}`);
  }
  return parsed.data;
}

function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    (err.code === 'SQLITE_CONSTRAINT_UNIQUE' || err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * AlertStore over a better-sqlite3 connection.
 *
 * better-sqlite3 is synchronous, so every statement completes before the
 * returned promise settles; the UNIQUE constraint on `fingerprint` is what
 * serializes concurrent first inserts.
 */
export class SqliteAlertStore implements AlertStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  async findByFingerprint(fingerprint: string): Promise<AlertRecord | undefined> {
    try {
      const row = this.db
        .prepare('SELECT * FROM alerts WHERE fingerprint = ?')
        .get(fingerprint) as AlertRow | undefined;
      return row ? toRecord(row) : undefined;
    } catch (err) {
      throw new PersistenceError(`lookup of ${fingerprint} failed: ${messageOf(err)}`, { cause: err });
    }
  }

  async insert(record: NewAlertRecord): Promise<AlertRecord> {
    try {
      const result = this.db
        .prepare(
          `INSERT INTO alerts (fingerprint, status, labels_json, annotations_json, starts_at, ends_at, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          record.fingerprint,
          record.status,
          record.labelsJson,
          record.annotationsJson,
          record.startsAt,
          record.endsAt,
          record.createdAt,
        );
      return { ...record, id: Number(result.lastInsertRowid) };
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new DuplicateKeyError(record.fingerprint, { cause: err });
      }
      throw new PersistenceError(`insert of ${record.fingerprint} failed: ${messageOf(err)}`, { cause: err });
    }
  }

  async updateStatusAndEndsAt(id: number, status: string, endsAt: number | null): Promise<void> {
    let changes: number;
    try {
      changes = this.db
        .prepare('UPDATE alerts SET status = ?, ends_at = ? WHERE id = ?')
        .run(status, endsAt, id).changes;
    } catch (err) {
      throw new PersistenceError(`update of alert ${id} failed: ${messageOf(err)}`, { cause: err });
    }

    if (changes === 0) {
      throw new PersistenceError(`update of alert ${id} failed: no such alert`);
    }
  }

  async list(filter: AlertListFilter = {}): Promise<AlertRecord[]> {
    let sql = 'SELECT * FROM alerts WHERE 1=1';
    const params: unknown[] = [];

    if (filter.status !== undefined) {
      sql += ' AND status = ?';
      params.push(filter.status);
    }

    sql += ' ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?';
    params.push(filter.limit ?? 100, filter.offset ?? 0);

    try {
      const rows = this.db.prepare(sql).all(...params) as AlertRow[];
      return rows.map(toRecord);
    } catch (err) {
      throw new PersistenceError(`listing alerts failed: ${messageOf(err)}`, { cause: err });
    }
  }

  async count(filter: Pick<AlertListFilter, 'status'> = {}): Promise<number> {
    try {
      const row =
        filter.status === undefined
          ? this.db.prepare('SELECT COUNT(*) AS n FROM alerts').get()
          : this.db.prepare('SELECT COUNT(*) AS n FROM alerts WHERE status = ?').get(filter.status);
      return (row as { n: number }).n;
    } catch (err) {
      throw new PersistenceError(`counting alerts failed: ${messageOf(err)}`, { cause: err });
    }
  }
}
