export { loggerOptions, createLogger } from './logger.js';
export type { LoggerFormat } from './logger.js';
