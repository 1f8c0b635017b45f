export { serializeLabelSet, parseLabelSet } from './labels.js';
export { ZERO_TIME_MS, parseTimestamp, toIsoString } from './time.js';
