import { ValidationError } from '../errors.js';
import { RawAlertEventSchema, type AlertEvent } from '../schemas/index.js';
import { parseTimestamp } from '../utils/index.js';

/**
 * Result of normalizing one slot of a batch
 */
export type NormalizeResult =
  | { ok: true; event: AlertEvent }
  | { ok: false; error: ValidationError; fingerprint: string | null };

function timestampField(
  value: string | null | undefined,
  field: 'startsAt' | 'endsAt',
): number | null {
  const ms = parseTimestamp(value);
  if (ms === undefined) {
    throw new ValidationError(`${field}: not a valid timestamp`);
  }
  return ms;
}

/**
 * Convert one raw webhook alert into the canonical event shape.
 *
 * Only the fingerprint is required; a missing status becomes the empty
 * string, missing maps become empty, and missing or zero timestamps
 * become null.
 *
 * @throws ValidationError if the fingerprint is missing or empty, a
 * present field has the wrong type, or a timestamp is not RFC 3339
 */
export function normalizeEvent(raw: unknown): AlertEvent {
  const result = RawAlertEventSchema.safeParse(raw);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }

  const { fingerprint, status, labels, annotations, startsAt, endsAt } = result.data;

  if (fingerprint === undefined || fingerprint === '') {
    throw new ValidationError('fingerprint: required');
  }

  return {
    fingerprint,
    status: status ?? '',
    labels: labels ?? {},
    annotations: annotations ?? {},
    startsAt: timestampField(startsAt, 'startsAt'),
    endsAt: timestampField(endsAt, 'endsAt'),
  };
}

/**
 * Normalize every raw event independently. A failure in one slot never
 * affects the others; the caller decides what to do with failed slots.
 */
export function normalizeBatch(raws: readonly unknown[]): NormalizeResult[] {
  return raws.map((raw): NormalizeResult => {
    try {
      return { ok: true, event: normalizeEvent(raw) };
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      return { ok: false, error: err, fingerprint: rawFingerprint(raw) };
    }
  });
}

/**
 * Fingerprint of an event that failed validation, when it has a usable one
 */
export function rawFingerprint(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null || !('fingerprint' in raw)) {
    return null;
  }
  const { fingerprint } = raw;
  return typeof fingerprint === 'string' && fingerprint !== '' ? fingerprint : null;
}
