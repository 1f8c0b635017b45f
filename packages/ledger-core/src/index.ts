// Schemas
export {
  LabelSetSchema,
  TimestampSchema,
  RawAlertEventSchema,
  AlertEventSchema,
  AlertmanagerWebhookSchema,
  AlertRecordSchema,
} from './schemas/index.js';

export type {
  LabelSet,
  Timestamp,
  RawAlertEvent,
  AlertEvent,
  AlertmanagerWebhook,
  AlertRecord,
  NewAlertRecord,
} from './schemas/index.js';

// Errors
export {
  AlertLedgerError,
  ValidationError,
  PersistenceError,
  DuplicateKeyError,
  SerializationError,
  toOutcomeError,
} from './errors.js';

export type { ErrorKind, OutcomeError } from './errors.js';

// Utils
export {
  serializeLabelSet,
  parseLabelSet,
  parseTimestamp,
  toIsoString,
  ZERO_TIME_MS,
} from './utils/index.js';

// Normalizer
export { normalizeEvent, normalizeBatch, rawFingerprint } from './normalize/index.js';
export type { NormalizeResult } from './normalize/index.js';

// Storage
export {
  initDb,
  initDbWithInlineMigrations,
  pingDb,
  DEFAULT_DB_PATH,
  SqliteAlertStore,
} from './storage/index.js';

export type { AlertStore, AlertListFilter, DbOptions } from './storage/index.js';

// Reconciliation
export {
  Reconciler,
  createReconciler,
  summarize,
  httpStatusFor,
  noopReporter,
} from './reconcile/index.js';

export type {
  ReconcilerOptions,
  OutcomeKind,
  EventOutcome,
  BatchCounts,
  BatchResult,
  OutcomeReporter,
} from './reconcile/index.js';

// Views
export { toAlertView } from './views/index.js';
export type { AlertView } from './views/index.js';

// Logging
export { loggerOptions, createLogger } from './logging/index.js';
export type { LoggerFormat } from './logging/index.js';
