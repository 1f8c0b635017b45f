import { z } from 'zod';

/**
 * Persisted alert state, one row per fingerprint.
 *
 * Labels and annotations are kept in their serialized JSON form; they are
 * written once at creation and never touched again.
 */
export const AlertRecordSchema = z.object({
  id: z.number().int(),
  fingerprint: z.string().min(1),
  status: z.string(),
  labelsJson: z.string(),
  annotationsJson: z.string(),
  startsAt: z.number().int().nullable(),
  endsAt: z.number().int().nullable(),
  createdAt: z.number().int(),
});

export type AlertRecord = z.infer<typeof AlertRecordSchema>;

/**
 * Record as handed to the store for insertion (the store assigns `id`)
 */
export type NewAlertRecord = Omit<AlertRecord, 'id'>;
