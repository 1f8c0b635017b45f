import Database from 'better-sqlite3';
import { readFileSync, readdirSync, mkdirSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const MIGRATIONS_DIR = join(__dirname, 'migrations');

export const DEFAULT_DB_PATH = './data/alert-ledger.db';

export interface DbOptions {
  /** How long a writer waits on a locked database (default: 5000) */
  busyTimeoutMs?: number;
}

/**
 * Initialize (or open) the SQLite database.
 * Runs pragmas and applies pending migrations from the migrations directory.
 */
export function initDb(dbPath?: string, options: DbOptions = {}): Database.Database {
  const db = openDb(dbPath ?? process.env['ALERT_LEDGER_DB_PATH'] ?? DEFAULT_DB_PATH, options);
  runMigrations(db);
  return db;
}

/**
 * Initialize DB with inline SQL (for built/bundled environments where migration files
 * may not be on disk). This is also useful for tests.
 */
export function initDbWithInlineMigrations(dbPath: string, options: DbOptions = {}): Database.Database {
  const db = openDb(dbPath, options);
  applyInlineMigrations(db, appliedMigrations(db));
  return db;
}

/**
 * Cheap liveness probe for health checks
 */
export function pingDb(db: Database.Database): boolean {
  try {
    db.prepare('SELECT 1').get();
    return true;
  } catch {
    return false;
  }
}

function openDb(dbPath: string, options: DbOptions): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    )
  `);

  return db;
}

function appliedMigrations(db: Database.Database): Set<string> {
  return new Set(
    db
      .prepare('SELECT name FROM _migrations')
      .all()
      .map((row) => (row as { name: string }).name),
  );
}

function recordMigration(db: Database.Database, name: string): void {
  db.prepare('INSERT INTO _migrations (name, applied_at) VALUES (?, ?)').run(
    name,
    Math.floor(Date.now() / 1000),
  );
}

function runMigrations(db: Database.Database): void {
  const applied = appliedMigrations(db);

  let migrationFiles: string[];
  try {
    migrationFiles = readdirSync(MIGRATIONS_DIR)
      .filter((f) => f.endsWith('.sql'))
      .sort();
  } catch {
    // migrations dir not found (bundled build), fall back to inline migrations
    applyInlineMigrations(db, applied);
    return;
  }

  if (migrationFiles.length === 0) {
    applyInlineMigrations(db, applied);
    return;
  }

  for (const file of migrationFiles) {
    if (applied.has(file)) continue;

    const sql = readFileSync(join(MIGRATIONS_DIR, file), 'utf-8');
    db.transaction(() => {
      db.exec(sql);
      recordMigration(db, file);
    })();
  }
}

function applyInlineMigrations(db: Database.Database, applied: Set<string>): void {
  if (!applied.has('001_init.sql')) {
    db.transaction(() => {
      db.exec(MIGRATION_001);
      recordMigration(db, '001_init.sql');
    })();
  }
}

const MIGRATION_001 = `
CREATE TABLE IF NOT EXISTS alerts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  fingerprint TEXT NOT NULL UNIQUE,
  status TEXT NOT NULL,
  labels_json TEXT NOT NULL DEFAULT '{}',
  annotations_json TEXT NOT NULL DEFAULT '{}',
  starts_at INTEGER,
  ends_at INTEGER,
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_alerts_status ON alerts(status, created_at DESC);
`;
