import { TimestampSchema } from '../schemas/timestamp.js';

/**
 * Zero timestamp `0001-01-01T00:00:00Z`. Alertmanager sends it for timestamps that were never set.
 */
export const ZERO_TIME_MS = Date.parse('0001-01-01T00:00:00Z');

/**
 * Parse an RFC 3339 timestamp into epoch milliseconds.
 *
 * Returns null for absent, empty or zero-valued timestamps and undefined
 * for anything that is not RFC 3339 with a zone designator. Fractional
 * seconds beyond millisecond precision are truncated.
 */
export function parseTimestamp(value: unknown): number | null | undefined {
  const parsed = TimestampSchema.safeParse(value);
  if (!parsed.success) {
    return undefined;
  }
  if (parsed.data === undefined || parsed.data === null) {
    return null;
  }

  const ms = Date.parse(parsed.data.replace(/(\.\d{3})\d+/, '$1'));
  if (Number.isNaN(ms)) {
    return undefined;
  }
  return ms === ZERO_TIME_MS ? null : ms;
}

/**
 * Format epoch milliseconds as ISO 8601, passing null through
 */
export function toIsoString(ms: number | null): string | null {
  return ms === null ? null : new Date(ms).toISOString();
}
