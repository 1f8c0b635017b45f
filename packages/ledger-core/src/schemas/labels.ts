import { z } from 'zod';

/**
 * Unordered string→string mapping used for alert labels and annotations
 */
export const LabelSetSchema = z.record(z.string(), z.string());

export type LabelSet = z.infer<typeof LabelSetSchema>;
