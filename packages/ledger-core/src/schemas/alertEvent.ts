import { z } from 'zod';
import { LabelSetSchema } from './labels.js';
import { TimestampSchema } from './timestamp.js';

/**
 * One alert as it arrives in an Alertmanager webhook.
 *
 * Every field is optional at this stage; the normalizer decides what is
 * required. Timestamps must already be RFC 3339 with a zone. Unknown fields (generatorURL and friends) pass through.
 */
export const RawAlertEventSchema = z
  .object({
    fingerprint: z.string().optional(),
    status: z.string().optional(),
    labels: LabelSetSchema.nullish(),
    annotations: LabelSetSchema.nullish(),
    startsAt: TimestampSchema,
    endsAt: TimestampSchema,
  })
  .passthrough();

export type RawAlertEvent = z.infer<typeof RawAlertEventSchema>;

/**
 * Canonical alert event consumed by the reconciler.
 *
 * Timestamps are epoch milliseconds; null means unset (an open alert has
 * no `endsAt`).
 */
export const AlertEventSchema = z.object({
  fingerprint: z.string().min(1),
  status: z.string(),
  labels: LabelSetSchema,
  annotations: LabelSetSchema,
  startsAt: z.number().int().nullable(),
  endsAt: z.number().int().nullable(),
});

export type AlertEvent = z.infer<typeof AlertEventSchema>;

/**
 * Alertmanager webhook envelope. Only `alerts` is required; the group
 * metadata is accepted and ignored.
 */
export const AlertmanagerWebhookSchema = z
  .object({
    version: z.string().optional(),
    groupKey: z.string().optional(),
    status: z.string().optional(),
    receiver: z.string().optional(),
    alerts: z.array(z.unknown()),
  })
  .passthrough();

export type AlertmanagerWebhook = z.infer<typeof AlertmanagerWebhookSchema>;
