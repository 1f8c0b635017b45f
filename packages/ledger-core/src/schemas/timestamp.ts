import { z } from 'zod';

/**
 * RFC 3339 timestamp as Alertmanager sends it. The zone designator is
 * mandatory (`Z` or a numeric offset); an empty string means unset.
 */
export const TimestampSchema = z.preprocess(
  (value) => (value === '' ? null : value),
  z.string().datetime({ offset: true, message: 'not a valid timestamp' }).nullish(),
);

export type Timestamp = z.infer<typeof TimestampSchema>;
