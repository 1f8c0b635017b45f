export { normalizeEvent, normalizeBatch, rawFingerprint } from './normalizeEvent.js';
export type { NormalizeResult } from './normalizeEvent.js';
