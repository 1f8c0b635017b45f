export { LabelSetSchema } from './labels.js';
export type { LabelSet } from './labels.js';

export { TimestampSchema } from './timestamp.js';
export type { Timestamp } from './timestamp.js';

export { RawAlertEventSchema, AlertEventSchema, AlertmanagerWebhookSchema } from './alertEvent.js';
export type { RawAlertEvent, AlertEvent, AlertmanagerWebhook } from './alertEvent.js';

export { AlertRecordSchema } from './alertRecord.js';
export type { AlertRecord, NewAlertRecord } from './alertRecord.js';
