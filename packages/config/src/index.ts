export {
  envBooleanSchema,
  logLevelSchema,
  logFormatSchema,
  apiConfigSchema,
  storageConfigSchema,
  metricsConfigSchema,
  loggingConfigSchema,
  ledgerConfigSchema,
} from './schema.js';

export type {
  LogLevel,
  LogFormat,
  ApiConfig,
  StorageConfig,
  MetricsConfig,
  LoggingConfig,
  LedgerConfig,
} from './schema.js';

export { loadConfig } from './load.js';
