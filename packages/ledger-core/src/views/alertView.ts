import type { AlertRecord, LabelSet } from '../schemas/index.js';
import { parseLabelSet, toIsoString } from '../utils/index.js';

/**
 * Consumer-facing shape of a stored alert: label sets decoded and
 * timestamps rendered as ISO 8601
 */
export interface AlertView {
  id: number;
  fingerprint: string;
  status: string;
  labels: LabelSet;
  annotations: LabelSet;
  startsAt: string | null;
  endsAt: string | null;
  createdAt: string;
}

export function toAlertView(record: AlertRecord): AlertView {
  return {
    id: record.id,
    fingerprint: record.fingerprint,
    status: record.status,
    labels: parseLabelSet(record.labelsJson),
    annotations: parseLabelSet(record.annotationsJson),
    startsAt: toIsoString(record.startsAt),
    endsAt: toIsoString(record.endsAt),
    createdAt: new Date(record.createdAt).toISOString(),
  };
}
