import { SerializationError } from '../errors.js';
import { LabelSetSchema, type LabelSet } from '../schemas/index.js';

/**
 * Serialize a label set as compact JSON with sorted keys, so equal sets
 * always produce identical column values.
 */
export function serializeLabelSet(labels: LabelSet): string {
  const sorted: LabelSet = {};
  for (const key of Object.keys(labels).sort()) {
    const value = labels[key];
    if (value !== undefined) {
      sorted[key] = value;
    }
  }
  return JSON.stringify(sorted);
}

/**
 * Parse a stored label set column back into a mapping
 */
export function parseLabelSet(json: string): LabelSet {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new SerializationError('stored label set is not valid JSON', { cause: err });
  }

  const result = LabelSetSchema.safeParse(parsed);
  if (!result.success) {
    throw new SerializationError('stored label set is not a string map', { cause: result.error });
  }
  return result.data;
}
