import { readFile } from 'node:fs/promises';
import {
  AlertmanagerWebhookSchema,
  ValidationError,
  type AlertView,
  type BatchCounts,
  type BatchResult,
  type Reconciler,
} from '@alert-ledger/ledger-core';

/**
 * Alerts held by an ingest file: either a full Alertmanager notification
 * or a bare array of alerts.
 */
export function parseIngestPayload(payload: unknown): unknown[] {
  if (Array.isArray(payload)) {
    return payload;
  }

  const parsed = AlertmanagerWebhookSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ValidationError('ingest file must hold an Alertmanager notification or an array of alerts');
  }
  return parsed.data.alerts;
}

/**
 * Read a JSON file and reconcile the alerts it holds
 */
export async function ingestFile(path: string, reconciler: Reconciler): Promise<BatchResult> {
  const text = await readFile(path, 'utf-8');

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  return reconciler.processBatch(parseIngestPayload(payload));
}

export function formatCounts(counts: BatchCounts): string {
  return `received ${counts.received}, new ${counts.new}, updated ${counts.updated}, duplicate ${counts.duplicate}, error ${counts.error}`;
}

/**
 * One line per failed alert, in batch order
 */
export function formatFailures(result: BatchResult): string[] {
  const lines: string[] = [];
  for (const outcome of result.outcomes) {
    if (outcome.outcome !== 'error') continue;
    lines.push(`#${outcome.index} ${outcome.fingerprint ?? '<none>'} [${outcome.error.kind}] ${outcome.error.message}`);
  }
  return lines;
}

function row(fingerprint: string, status: string, startsAt: string, endsAt: string): string {
  return [fingerprint.padEnd(24), status.padEnd(10), startsAt.padEnd(24), endsAt].join(' ');
}

export const ALERT_TABLE_HEADER = row('FINGERPRINT', 'STATUS', 'STARTS AT', 'ENDS AT');

export function formatAlertRow(view: AlertView): string {
  return row(view.fingerprint, view.status, view.startsAt ?? '-', view.endsAt ?? '-');
}
