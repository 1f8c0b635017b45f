export { initDb, initDbWithInlineMigrations, pingDb, DEFAULT_DB_PATH } from './db.js';
export type { DbOptions } from './db.js';
export type { AlertStore, AlertListFilter } from './alertStore.js';
export { SqliteAlertStore } from './sqliteAlertStore.js';
