export { toAlertView } from './alertView.js';
export type { AlertView } from './alertView.js';
